import { Injectable, Logger } from '@nestjs/common';
import {
  DEBUG_TOP_CANDIDATES,
  RELEVANCY_SCORING_ENABLED,
  RERANK_ENABLED,
  TOP_N,
} from '../config/ranking.constants';
import {
  BlendConfig,
  BlendedItem,
  CandidateItem,
  DataQuality,
  ExternalRankResult,
  RankingDebug,
  RankingOptions,
  RankingResult,
  RelevancyResult,
  RerankOutcome,
  ScoringErrorRecord,
  ScoringMethod,
  TimeWindow,
} from '../types/ranking.types';
import { toIsoOrNull } from '../utils/date.util';
import { AiRerankerService } from './ai-reranker.service';
import { BlendingService } from './blending.service';
import { CalibrationService } from './calibration.service';
import { CandidateStoreService } from './candidate-store.service';
import { RunScoreCache } from './rerank-cache.service';
import { RelevancyScoringService } from './relevancy-scoring.service';

const EMPTY_RERANK: RerankOutcome = {
  results: new Map(),
  order: null,
  cacheHits: 0,
  called: false,
  fallback: false,
};

/**
 * Runs one ranking pass: optional external rerank and relevancy scoring,
 * calibration, blending, strict sort, threshold and anomaly scan.
 * Degraded collaborators never stop the pass; they surface in dataQuality.
 */
@Injectable()
export class RankingEngineService {
  private readonly logger = new Logger(RankingEngineService.name);

  constructor(
    private readonly store: CandidateStoreService,
    private readonly reranker: AiRerankerService,
    private readonly relevancy: RelevancyScoringService,
    private readonly blending: BlendingService,
    private readonly calibration: CalibrationService,
  ) {}

  async rankWindow(
    window: TimeWindow,
    options: RankingOptions = {},
  ): Promise<RankingResult> {
    return this.rank(this.store.listCandidates(window), options);
  }

  async rank(
    candidates: CandidateItem[],
    options: RankingOptions = {},
  ): Promise<RankingResult> {
    const runId = options.runId ?? `run-${Date.now()}`;
    const topN = Math.max(1, options.topN ?? TOP_N);
    const mentions = Math.max(0, options.honorableMentions ?? 0);
    const config = this.blending.resolveConfig(options.blend);

    const rerank =
      (options.useExternalRanking ?? RERANK_ENABLED) && candidates.length > 0
        ? await this.reranker.rerank(candidates, { runId })
        : EMPTY_RERANK;
    if (rerank.fallback) {
      this.logger.warn(
        `external ranking fell back to heuristic: ${rerank.error ?? 'unknown'}`,
      );
    }

    const scoringErrors: ScoringErrorRecord[] = [];
    const scored = await this.applyRelevancyScoring(
      candidates,
      runId,
      options.useRelevancyScoring ?? RELEVANCY_SCORING_ENABLED,
      scoringErrors,
    );

    const calibrator = await this.calibration.getActive();
    const blended = scored.map((item) =>
      this.toBlendedItem(item, rerank.results.get(item.id), config),
    );
    const calibrated = calibrator
      ? this.calibration.applyToItems(blended, calibrator)
      : blended;

    const method: ScoringMethod = this.blending.resolveScoringMethod(calibrated);
    const sorted = this.blending.sortItems(calibrated, method);
    const ranked = this.blending
      .applyMinScore(sorted, options.minRelevancyScore)
      .map((item, index) => ({ ...item, rankPosition: index + 1 }));

    const rankingWarnings = this.blending.detectAnomalies(ranked, topN, method);
    for (const warning of rankingWarnings) {
      this.logger.warn(warning);
    }

    const dataQuality: DataQuality = {
      externalRankingFallback: rerank.fallback,
      externalRankingError: rerank.error ?? null,
      externalCacheHits: rerank.cacheHits,
      unscoredCount: ranked.filter(
        (item) => item.relevancyScore === null && item.modelScore === null,
      ).length,
      scoringErrors,
      rankingWarnings,
      calibrated: calibrator !== null,
    };

    this.logger.log(
      `stage ranking done: candidates=${sorted.length} ranked=${ranked.length} method=${method}`,
    );

    return {
      mustReads: ranked.slice(0, topN),
      honorableMentions: ranked.slice(topN, topN + mentions),
      ranked,
      totalCandidates:
        method === 'relevancy_only'
          ? sorted.filter((item) => typeof item.relevancyScore === 'number')
              .length
          : sorted.length,
      scoringMethod: method,
      minRelevancyScore: options.minRelevancyScore ?? null,
      dataQuality,
      ...(options.debug
        ? { debug: this.buildDebug(sorted, method, rankingWarnings) }
        : {}),
    };
  }

  private async applyRelevancyScoring(
    candidates: CandidateItem[],
    runId: string,
    enabled: boolean,
    scoringErrors: ScoringErrorRecord[],
  ): Promise<Array<CandidateItem & { scoringError?: string }>> {
    const missing = candidates.filter(
      (item) => typeof item.relevancyScore !== 'number',
    );
    if (!enabled || missing.length === 0) {
      return candidates;
    }

    const results = await this.relevancy.scoreBatch(missing, {
      runId,
      runCache: new RunScoreCache<RelevancyResult>(),
    });
    const byId = new Map(results.map((r) => [r.itemId, r]));

    return candidates.map((item) => {
      const result = byId.get(item.id);
      if (!result) {
        return item;
      }
      if (result.relevancyScore === null) {
        const error = result.error ?? 'relevancy scoring failed';
        scoringErrors.push({ itemId: item.id, error });
        return { ...item, scoringError: error };
      }
      return {
        ...item,
        relevancyScore: result.relevancyScore,
        relevancySource: 'relevancy_scoring' as const,
        relevancyReason: result.relevancyReason,
      };
    });
  }

  private toBlendedItem(
    item: CandidateItem & { scoringError?: string },
    external: ExternalRankResult | undefined,
    config: BlendConfig,
  ): BlendedItem {
    const relevancy =
      typeof item.relevancyScore === 'number' ? item.relevancyScore : null;
    const modelScore = external?.modelScore ?? null;
    return {
      ...item,
      modelScore,
      modelRank: external?.modelRank ?? null,
      modelReason: external?.modelReason ?? '',
      modelWhy: external?.modelWhy ?? '',
      modelFindings: external?.modelFindings ?? [],
      totalScore: this.blending.blendScore(
        item.heuristicScore,
        modelScore,
        config,
      ),
      rawRelevancyScore: relevancy,
      relevancyScore: relevancy,
      rankPosition: 0,
    };
  }

  private buildDebug(
    sorted: BlendedItem[],
    method: ScoringMethod,
    rankingWarnings: string[],
  ): RankingDebug {
    return {
      rankingMethod: method,
      topCandidates: sorted.slice(0, DEBUG_TOP_CANDIDATES).map((item, index) => ({
        rank: index + 1,
        itemId: item.id,
        title: item.title,
        relevancyScore: item.relevancyScore,
        totalScore: item.totalScore,
        heuristicScore: item.heuristicScore,
        modelScore: item.modelScore,
        publishedAt: toIsoOrNull(item.publishedAt),
      })),
      rankingWarnings,
      totalCandidates: sorted.length,
      totalWithRelevancy: sorted.filter(
        (item) => typeof item.relevancyScore === 'number',
      ).length,
      relevancyDistribution: this.blending.scoreBands(sorted),
    };
  }
}
