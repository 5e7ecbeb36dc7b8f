import { Injectable } from '@nestjs/common';
import {
  PRIORITY_KEYWORDS,
  PRIORITY_SOURCES,
  SOURCE_BASELINE_SCORE,
} from '../config/ranking.constants';
import { computeAgeDays } from '../utils/date.util';
import { countKeywordHits } from '../utils/text.util';

export interface HeuristicInput {
  title: string;
  textSnippet: string;
  source: string;
  venue?: string;
  publishedAt: Date | null;
}

export interface HeuristicScore {
  score: number;
  reason: string;
}

const RECENCY_STEPS: Array<{ maxDays: number; score: number }> = [
  { maxDays: 7, score: 200 },
  { maxDays: 14, score: 150 },
  { maxDays: 30, score: 100 },
];
const RECENCY_FLOOR = 50;

const KEYWORD_SCORES = [0, 100, 200, 300];

/** Local 0-600 estimate: source priority + recency + keyword relevance. */
@Injectable()
export class HeuristicScoringService {
  scoreCandidate(input: HeuristicInput, now: Date = new Date()): HeuristicScore {
    const source = this.sourcePriority(input.source, input.venue);
    const recency = this.recencyScore(input.publishedAt, now);
    const hits = countKeywordHits(
      `${input.title} ${input.textSnippet}`,
      PRIORITY_KEYWORDS,
    );
    const keywords =
      KEYWORD_SCORES[Math.min(hits.length, KEYWORD_SCORES.length - 1)] ?? 0;

    return {
      score: source + recency + keywords,
      reason: `source=${source} recency=${recency} keywords=${keywords}${
        hits.length ? ` (${hits.join(', ')})` : ''
      }`,
    };
  }

  sourcePriority(source: string, venue?: string): number {
    const haystack = `${source} ${venue ?? ''}`.toLowerCase();
    let best = SOURCE_BASELINE_SCORE;
    for (const [name, score] of Object.entries(PRIORITY_SOURCES)) {
      if (haystack.includes(name) && score > best) {
        best = score;
      }
    }
    return best;
  }

  recencyScore(publishedAt: Date | null, now: Date = new Date()): number {
    const ageDays = computeAgeDays(publishedAt, now);
    if (ageDays === null) {
      return RECENCY_FLOOR;
    }
    const step = RECENCY_STEPS.find((s) => ageDays < s.maxDays);
    return step ? step.score : RECENCY_FLOOR;
  }
}
