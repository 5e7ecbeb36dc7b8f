const KEY_PATTERNS: RegExp[] = [
  /sk-[A-Za-z0-9_-]{8,}/g,
  /AIza[0-9A-Za-z_-]{10,}/g,
  /Bearer\s+[A-Za-z0-9._-]{8,}/gi,
  /key=[A-Za-z0-9._-]{8,}/gi,
];

export function safePreview(text: string | null | undefined, maxLen = 200): string {
  if (!text) {
    return '[empty]';
  }
  let out = text;
  for (const pattern of KEY_PATTERNS) {
    out = out.replace(pattern, '[REDACTED_KEY]');
  }
  out = out.replace(/\s+/g, ' ').trim();
  if (!out) {
    return '[empty]';
  }
  return out.length > maxLen ? `${out.slice(0, maxLen)}...` : out;
}

// Keeps printable ASCII only so the value is valid inside an HTTP header.
export function sanitizeSecret(value: string | null | undefined): string {
  if (!value) {
    return '';
  }
  return value.trim().replace(/[^\x21-\x7e]/g, '');
}
