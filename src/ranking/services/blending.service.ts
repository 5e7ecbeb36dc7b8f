import { Injectable } from '@nestjs/common';
import {
  ANOMALY_WINDOW_EXTRA,
  DEFAULT_BLEND_CONFIG,
  HIGH_RELEVANCE_THRESHOLD,
  MODERATE_RELEVANCE_THRESHOLD,
} from '../config/ranking.constants';
import {
  BlendConfig,
  BlendedItem,
  ScoreBands,
  ScoringMethod,
} from '../types/ranking.types';

type SortableItem = Pick<
  BlendedItem,
  'id' | 'title' | 'publishedAt' | 'relevancyScore' | 'totalScore'
>;

@Injectable()
export class BlendingService {
  /**
   * Model score below the demotion threshold replaces the heuristic
   * outright; otherwise the model score is rescaled to the heuristic range
   * and mixed by weight.
   */
  blendScore(
    heuristicScore: number,
    modelScore: number | null | undefined,
    config: BlendConfig = DEFAULT_BLEND_CONFIG,
  ): number {
    if (typeof modelScore !== 'number' || !Number.isFinite(modelScore)) {
      return heuristicScore;
    }
    if (modelScore < config.demotionThreshold) {
      return modelScore;
    }
    const scaledModel = (modelScore / 100) * config.heuristicMax;
    return (
      config.heuristicWeight * heuristicScore + config.modelWeight * scaledModel
    );
  }

  resolveConfig(override?: Partial<BlendConfig>): BlendConfig {
    return {
      heuristicWeight:
        override?.heuristicWeight ?? DEFAULT_BLEND_CONFIG.heuristicWeight,
      modelWeight: override?.modelWeight ?? DEFAULT_BLEND_CONFIG.modelWeight,
      demotionThreshold:
        override?.demotionThreshold ?? DEFAULT_BLEND_CONFIG.demotionThreshold,
      heuristicMax: override?.heuristicMax ?? DEFAULT_BLEND_CONFIG.heuristicMax,
    };
  }

  resolveScoringMethod(items: SortableItem[]): ScoringMethod {
    return items.some((item) => typeof item.relevancyScore === 'number')
      ? 'relevancy_only'
      : 'blended_legacy';
  }

  sortItems<T extends SortableItem>(
    items: T[],
    method: ScoringMethod = this.resolveScoringMethod(items),
  ): T[] {
    return [...items].sort((a, b) => this.compare(a, b, method));
  }

  /** Drops items under the threshold; unscored items never pass a set threshold. */
  applyMinScore<T extends SortableItem>(
    sorted: T[],
    minScore: number | null | undefined,
  ): T[] {
    if (typeof minScore !== 'number' || !Number.isFinite(minScore)) {
      return sorted;
    }
    return sorted.filter(
      (item) =>
        typeof item.relevancyScore === 'number' &&
        item.relevancyScore >= minScore,
    );
  }

  detectAnomalies(
    sorted: SortableItem[],
    topN: number,
    method: ScoringMethod = this.resolveScoringMethod(sorted),
  ): string[] {
    const warnings: string[] = [];
    const window = Math.min(sorted.length, topN + ANOMALY_WINDOW_EXTRA);

    for (let i = 0; i < Math.min(topN, sorted.length); i += 1) {
      const upper = sorted[i];
      if (!upper) {
        continue;
      }
      for (let j = i + 1; j < window; j += 1) {
        const lower = sorted[j];
        if (!lower) {
          continue;
        }
        const upperKey = this.primaryKey(upper, method);
        const lowerKey = this.primaryKey(lower, method);
        if (lowerKey > upperKey) {
          warnings.push(
            `ranking inversion: #${i + 1} ${upper.id} (${upperKey}) sits above #${j + 1} ${lower.id} (${lowerKey})`,
          );
        }
      }
    }

    sorted.slice(topN).forEach((item, offset) => {
      if (
        typeof item.relevancyScore === 'number' &&
        item.relevancyScore >= HIGH_RELEVANCE_THRESHOLD
      ) {
        warnings.push(
          `high-relevancy item excluded: ${item.id} (${item.relevancyScore}) at rank ${topN + offset + 1}`,
        );
      }
    });
    return warnings;
  }

  scoreBands(items: SortableItem[]): ScoreBands {
    const bands: ScoreBands = {
      high_80_plus: 0,
      moderate_65_79: 0,
      exploratory_below_65: 0,
    };
    for (const item of items) {
      const score = item.relevancyScore;
      if (typeof score !== 'number') {
        continue;
      }
      if (score >= HIGH_RELEVANCE_THRESHOLD) {
        bands.high_80_plus += 1;
      } else if (score >= MODERATE_RELEVANCE_THRESHOLD) {
        bands.moderate_65_79 += 1;
      } else {
        bands.exploratory_below_65 += 1;
      }
    }
    return bands;
  }

  private compare(
    a: SortableItem,
    b: SortableItem,
    method: ScoringMethod,
  ): number {
    const primary = this.primaryKey(b, method) - this.primaryKey(a, method);
    if (primary !== 0) {
      return primary;
    }

    const dateA = a.publishedAt ? a.publishedAt.getTime() : -Infinity;
    const dateB = b.publishedAt ? b.publishedAt.getTime() : -Infinity;
    if (dateA !== dateB) {
      return dateB > dateA ? 1 : -1;
    }

    const titleA = a.title.toLowerCase();
    const titleB = b.title.toLowerCase();
    if (titleA !== titleB) {
      return titleA < titleB ? -1 : 1;
    }
    if (a.id !== b.id) {
      return a.id < b.id ? -1 : 1;
    }
    return 0;
  }

  private primaryKey(item: SortableItem, method: ScoringMethod): number {
    if (method === 'blended_legacy') {
      return item.totalScore;
    }
    return typeof item.relevancyScore === 'number' ? item.relevancyScore : -1;
  }
}
