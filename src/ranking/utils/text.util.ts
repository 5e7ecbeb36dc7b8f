const WS_RE = /\s+/g;
const TAG_RE = /<[^>]+>/g;

const ENTITY_MAP: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&nbsp;': ' ',
};

export function decodeHtmlEntities(value: string): string {
  if (!value) {
    return '';
  }
  return value.replace(
    /&(amp|lt|gt|quot|#39|nbsp);/g,
    (match) => ENTITY_MAP[match] ?? match,
  );
}

export function cleanText(value: string): string {
  if (!value) {
    return '';
  }
  return decodeHtmlEntities(value)
    .replace(TAG_RE, ' ')
    .replace(WS_RE, ' ')
    .trim();
}

export function truncate(value: string, maxChars: number): string {
  if (!value || maxChars <= 0) {
    return '';
  }
  return value.length > maxChars ? value.slice(0, maxChars) : value;
}

export function countKeywordHits(text: string, keywords: string[]): string[] {
  const haystack = cleanText(text).toLowerCase();
  if (!haystack) {
    return [];
  }
  return keywords.filter((keyword) => haystack.includes(keyword));
}
