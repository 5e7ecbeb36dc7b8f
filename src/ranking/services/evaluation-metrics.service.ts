import { Injectable } from '@nestjs/common';
import { HUMAN_RATING_MAX } from '../config/ranking.constants';
import {
  ClassificationAccuracy,
  Disagreement,
  EvaluationItem,
  EvaluationSummary,
  NdcgResult,
  RecallResult,
  SpearmanResult,
} from '../types/ranking.types';

export type SourceCategory = 'pubmed' | 'preprint' | 'journal' | 'other';

export interface SourceBreakdown extends EvaluationSummary {
  count: number;
}

export interface ScoreRange {
  min: number;
  max: number;
}

const DEFAULT_KS = [5, 10, 20];
const DEFAULT_RATING_THRESHOLDS: [number, number, number] = [25, 50, 75];
const RELEVANT_THRESHOLD = 3;

interface ScoredPair {
  item: EvaluationItem;
  score: number;
  rel: number;
}

/** Agreement metrics between model scores and human ratings. */
@Injectable()
export class EvaluationMetricsService {
  spearman(items: EvaluationItem[]): SpearmanResult {
    const pairs = items.filter(
      (i): i is EvaluationItem & { modelScore: number; humanRating: number } =>
        this.isNum(i.modelScore) && this.isNum(i.humanRating),
    );
    const n = pairs.length;
    if (n < 3) {
      return { rho: null, n };
    }

    const xr = this.averageRanks(pairs.map((p) => p.modelScore));
    const yr = this.averageRanks(pairs.map((p) => p.humanRating));
    return { rho: this.pearson(xr, yr), n };
  }

  ndcgAtK(items: EvaluationItem[], k: number): NdcgResult {
    const pairs = this.scoredPairs(items);
    if (pairs.length === 0) {
      return { ndcg: null, dcg: null, idcg: null, k, nItems: 0 };
    }

    const byModel = [...pairs].sort((a, b) => b.score - a.score);
    const ideal = [...pairs].sort((a, b) => b.rel - a.rel);
    const dcg = this.dcg(byModel.slice(0, k).map((p) => p.rel));
    const idcg = this.dcg(ideal.slice(0, k).map((p) => p.rel));

    return {
      ndcg: idcg === 0 ? 0 : dcg / idcg,
      dcg,
      idcg,
      k,
      nItems: pairs.length,
    };
  }

  recallAtK(
    items: EvaluationItem[],
    k: number,
    threshold = RELEVANT_THRESHOLD,
  ): RecallResult {
    const pairs = this.scoredPairs(items);
    const totalRelevant = pairs.filter((p) => p.rel >= threshold).length;
    if (totalRelevant === 0) {
      return { recall: null, hits: 0, totalRelevant: 0, k };
    }

    const hits = [...pairs]
      .sort((a, b) => b.score - a.score)
      .slice(0, k)
      .filter((p) => p.rel >= threshold).length;
    return { recall: hits / totalRelevant, hits, totalRelevant, k };
  }

  computeAll(items: EvaluationItem[], ks: number[] = DEFAULT_KS): EvaluationSummary {
    const spearman = this.spearman(items);
    const ndcg: Record<string, number | null> = {};
    const recall: Record<string, number | null> = {};
    for (const k of ks) {
      ndcg[`ndcg@${k}`] = this.ndcgAtK(items, k).ndcg;
      recall[`recall@${k}`] = this.recallAtK(items, k).recall;
    }
    const recall5 = this.recallAtK(items, 5);

    return {
      spearmanRho: spearman.rho,
      spearmanN: spearman.n,
      ndcg,
      recall,
      recallAt5Hits: recall5.hits,
      recallAt5TotalRelevant: recall5.totalRelevant,
    };
  }

  computeBySource(
    items: EvaluationItem[],
  ): Partial<Record<SourceCategory, SourceBreakdown>> {
    const groups = new Map<SourceCategory, EvaluationItem[]>();
    for (const item of items) {
      const category = this.categorizeSource(item.source ?? '');
      const list = groups.get(category) ?? [];
      list.push(item);
      groups.set(category, list);
    }

    const out: Partial<Record<SourceCategory, SourceBreakdown>> = {};
    for (const [category, list] of groups) {
      out[category] = { count: list.length, ...this.computeAll(list) };
    }
    return out;
  }

  categorizeSource(source: string): SourceCategory {
    const s = source.toLowerCase();
    if (s.includes('pubmed') || s.includes('ncbi')) {
      return 'pubmed';
    }
    if (s.includes('medrxiv') || s.includes('biorxiv')) {
      return 'preprint';
    }
    if (s.includes('nature') || s.includes('lancet') || s.includes('nejm')) {
      return 'journal';
    }
    return 'other';
  }

  topDisagreements(items: EvaluationItem[], n = 10): Disagreement[] {
    const out: Disagreement[] = [];
    for (const item of items) {
      if (!this.isNum(item.modelScore) || !this.isNum(item.humanRating)) {
        continue;
      }
      const scaled = (item.modelScore / 100) * HUMAN_RATING_MAX;
      out.push({
        id: item.id ?? null,
        title: item.title ?? '',
        humanRating: item.humanRating,
        modelScore: item.modelScore,
        modelScoreScaled: scaled,
        absoluteError: Math.abs(scaled - item.humanRating),
        modelReason: item.modelReason ?? '',
        relevanceLabel: this.isNum(item.relevanceLabel)
          ? item.relevanceLabel
          : null,
      });
    }
    return out
      .sort((a, b) => b.absoluteError - a.absoluteError)
      .slice(0, Math.max(0, n));
  }

  scoreToRating(
    score: number,
    thresholds: [number, number, number] = DEFAULT_RATING_THRESHOLDS,
  ): number {
    const [low, mid, high] = thresholds;
    if (score < low) {
      return 0;
    }
    if (score < mid) {
      return 1;
    }
    if (score < high) {
      return 2;
    }
    return 3;
  }

  ratingToScoreRange(
    rating: number,
    thresholds: [number, number, number] = DEFAULT_RATING_THRESHOLDS,
  ): ScoreRange {
    const edges = [0, ...thresholds, 100];
    const index = Math.max(0, Math.min(HUMAN_RATING_MAX, Math.round(rating)));
    return { min: edges[index] ?? 0, max: edges[index + 1] ?? 100 };
  }

  classificationAccuracy(
    items: EvaluationItem[],
    thresholds: [number, number, number] = DEFAULT_RATING_THRESHOLDS,
  ): ClassificationAccuracy {
    const size = HUMAN_RATING_MAX + 1;
    const confusionMatrix = Array.from({ length: size }, () =>
      new Array<number>(size).fill(0),
    );
    let n = 0;
    let correct = 0;

    for (const item of items) {
      if (!this.isNum(item.modelScore) || !this.isNum(item.humanRating)) {
        continue;
      }
      const actual = Math.max(
        0,
        Math.min(HUMAN_RATING_MAX, Math.round(item.humanRating)),
      );
      const predicted = this.scoreToRating(item.modelScore, thresholds);
      const row = confusionMatrix[actual];
      if (row) {
        row[predicted] = (row[predicted] ?? 0) + 1;
      }
      n += 1;
      if (actual === predicted) {
        correct += 1;
      }
    }

    return {
      accuracy: n > 0 ? correct / n : null,
      n,
      correct,
      confusionMatrix,
    };
  }

  private scoredPairs(items: EvaluationItem[]): ScoredPair[] {
    const out: ScoredPair[] = [];
    for (const item of items) {
      const rel = this.isNum(item.relevanceLabel)
        ? item.relevanceLabel
        : item.humanRating;
      if (this.isNum(item.modelScore) && this.isNum(rel)) {
        out.push({ item, score: item.modelScore, rel });
      }
    }
    return out;
  }

  private dcg(rels: number[]): number {
    return rels.reduce(
      (sum, rel, i) => sum + (2 ** rel - 1) / Math.log2(i + 2),
      0,
    );
  }

  // Tied values share the mean of the positions they occupy.
  private averageRanks(values: number[]): number[] {
    const order = values
      .map((value, index) => ({ value, index }))
      .sort((a, b) => a.value - b.value);
    const ranks = new Array<number>(values.length).fill(0);

    let i = 0;
    while (i < order.length) {
      let j = i;
      while (j + 1 < order.length && order[j + 1]?.value === order[i]?.value) {
        j += 1;
      }
      const rank = (i + j) / 2 + 1;
      for (let m = i; m <= j; m += 1) {
        const entry = order[m];
        if (entry) {
          ranks[entry.index] = rank;
        }
      }
      i = j + 1;
    }
    return ranks;
  }

  private pearson(x: number[], y: number[]): number | null {
    const n = x.length;
    const mx = x.reduce((a, b) => a + b, 0) / n;
    const my = y.reduce((a, b) => a + b, 0) / n;
    let cov = 0;
    let vx = 0;
    let vy = 0;
    for (let i = 0; i < n; i += 1) {
      const dx = (x[i] ?? 0) - mx;
      const dy = (y[i] ?? 0) - my;
      cov += dx * dy;
      vx += dx * dx;
      vy += dy * dy;
    }
    if (vx === 0 || vy === 0) {
      return null;
    }
    return cov / Math.sqrt(vx * vy);
  }

  private isNum(value: unknown): value is number {
    return typeof value === 'number' && Number.isFinite(value);
  }
}
