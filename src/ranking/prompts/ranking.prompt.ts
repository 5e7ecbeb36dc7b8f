import { PROMPT_SNIPPET_CHARS } from '../config/ranking.constants';
import { CandidateItem } from '../types/ranking.types';
import { formatDateYYYYMMDD } from '../utils/date.util';
import { cleanText, truncate } from '../utils/text.util';

export const RERANK_SYSTEM_PROMPT = `You are a careful research curator ranking new publications for a weekly digest.

Use ONLY the provided title, source, date and snippet of each item.
Judge each item on its own merits for the digest audience.
Respond ONLY in valid JSON.

Output schema:
{
  "rankings": [
    {
      "pub_id": string,
      "title": string,
      "llm_rank": number,
      "llm_score": number,
      "llm_reason": string,
      "llm_why_it_matters": string,
      "llm_key_findings": [string]
    }
  ]
}

Rules:
- Include every pub_id exactly once; copy pub_id and title verbatim.
- llm_rank starts at 1 for the most relevant item.
- llm_score: integer 0-100.
- llm_key_findings: at most 3 short items.
- Return JSON only.`;

export const RELEVANCY_SYSTEM_PROMPT = `You are a careful research curator scoring a single publication for a weekly digest.

Use ONLY the provided title, source and text.
Respond ONLY in valid JSON.

Output schema:
{
  "relevancy_score": number,
  "relevancy_reason": string,
  "confidence": "low" | "medium" | "high"
}

Rules:
- relevancy_score: integer 0-100.
- relevancy_reason: one or two sentences.
- Return JSON only.`;

export function buildRerankPrompt(candidates: CandidateItem[]): string {
  const lines = candidates.map((item) =>
    JSON.stringify({
      pub_id: item.id,
      title: cleanText(item.title),
      source: item.venue || item.source,
      date: item.publishedAt ? formatDateYYYYMMDD(item.publishedAt) : null,
      snippet: truncate(cleanText(item.textSnippet), PROMPT_SNIPPET_CHARS),
    }),
  );
  return `Rank these ${candidates.length} items:\n${lines.join('\n')}`;
}

export function buildRelevancyPrompt(
  item: CandidateItem,
  maxChars: number,
): string {
  return [
    `Title: ${cleanText(item.title)}`,
    `Source: ${item.venue || item.source}`,
    `Text: ${truncate(cleanText(item.textSnippet), maxChars)}`,
  ].join('\n');
}
