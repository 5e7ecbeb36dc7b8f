import { Injectable, Logger } from '@nestjs/common';
import {
  RERANK_MAX_ITEMS,
  RERANK_TIMEOUT_SEC,
  RERANK_VERSION,
} from '../config/ranking.constants';
import {
  buildRerankPrompt,
  RERANK_SYSTEM_PROMPT,
} from '../prompts/ranking.prompt';
import {
  CandidateItem,
  ExternalRankResult,
  RerankOutcome,
} from '../types/ranking.types';
import { LlmClientService } from './llm-client.service';
import { RerankCacheService } from './rerank-cache.service';
import { RerankParserService } from './rerank-parser.service';
import { RerankValidationService } from './rerank-validation.service';

export interface RerankOptions {
  runId?: string | null;
  version?: string;
}

interface CallOutcome {
  results: ExternalRankResult[];
  error?: string;
}

/**
 * One batched external ranking call per pass, read-through and
 * write-through the scoring cache. Any failure degrades to the
 * heuristic order.
 */
@Injectable()
export class AiRerankerService {
  private readonly logger = new Logger(AiRerankerService.name);

  constructor(
    private readonly llmClient: LlmClientService,
    private readonly parser: RerankParserService,
    private readonly validation: RerankValidationService,
    private readonly cache: RerankCacheService,
  ) {}

  async rerank(
    candidates: CandidateItem[],
    options: RerankOptions = {},
  ): Promise<RerankOutcome> {
    const version = options.version ?? RERANK_VERSION;
    const pool = [...candidates]
      .sort((a, b) => b.heuristicScore - a.heuristicScore)
      .slice(0, RERANK_MAX_ITEMS);
    if (pool.length === 0) {
      return {
        results: new Map(),
        order: null,
        cacheHits: 0,
        called: false,
        fallback: false,
      };
    }

    const cached = this.cache.get(
      pool.map((c) => c.id),
      version,
    );
    const collected = new Map<string, ExternalRankResult>();
    for (const [itemId, entry] of cached) {
      collected.set(itemId, {
        itemId,
        modelScore: entry.modelScore,
        modelRank: entry.modelRank ?? 0,
        modelReason: entry.modelReason,
        modelWhy: entry.modelWhy,
        modelFindings: entry.modelFindings,
      });
    }

    const misses = pool.filter((c) => !collected.has(c.id));
    let called = false;
    let error: string | undefined;

    if (misses.length > 0) {
      called = true;
      const outcome = await this.callModel(misses);
      error = outcome.error;
      for (const result of outcome.results) {
        collected.set(result.itemId, result);
      }
      // Every result of a successful call is cached, scored or not.
      if (outcome.results.length > 0) {
        this.cache.put(
          outcome.results,
          this.llmClient.modelName,
          version,
          options.runId ?? null,
        );
      }
    }

    const heuristicById = new Map(pool.map((c) => [c.id, c.heuristicScore]));
    const ordered = this.assignRanks([...collected.values()], heuristicById);
    const results = new Map(ordered.map((r) => [r.itemId, r]));

    this.logger.log(
      `stage rerank done: pool=${pool.length} cache_hits=${cached.size} called=${called} fallback=${Boolean(error)}`,
    );

    return {
      results,
      order: ordered.length > 0 ? ordered.map((r) => r.itemId) : null,
      cacheHits: cached.size,
      called,
      fallback: Boolean(error),
      ...(error ? { error } : {}),
    };
  }

  private async callModel(misses: CandidateItem[]): Promise<CallOutcome> {
    if (!this.llmClient.isConfigured()) {
      return { results: [], error: 'API key not configured' };
    }

    const timeoutMs = RERANK_TIMEOUT_SEC * 1000;
    const text = await this.withTimeout(
      this.llmClient.generateText(
        RERANK_SYSTEM_PROMPT,
        buildRerankPrompt(misses),
        { timeoutMs, jsonMode: true },
      ),
      timeoutMs,
    );
    if (text === undefined) {
      return {
        results: [],
        error: `external ranking timed out after ${RERANK_TIMEOUT_SEC}s`,
      };
    }
    if (!text) {
      return { results: [], error: 'external ranking call failed' };
    }

    const parsed = this.parser.parseRanking(text, misses.length);
    if (!parsed) {
      return { results: [], error: 'external ranking response unparseable' };
    }

    const results = this.validation.buildRankResults(parsed, misses);
    if (!results) {
      return { results: [], error: 'external ranking returned no usable ids' };
    }
    return { results };
  }

  // Scored items first by model score, then by the model's own rank, then by heuristic.
  private assignRanks(
    results: ExternalRankResult[],
    heuristicById: Map<string, number>,
  ): ExternalRankResult[] {
    return [...results]
      .sort((a, b) => {
        const scoreA = a.modelScore ?? -1;
        const scoreB = b.modelScore ?? -1;
        if (scoreA !== scoreB) {
          return scoreB - scoreA;
        }
        const rankA = a.modelRank > 0 ? a.modelRank : Number.MAX_SAFE_INTEGER;
        const rankB = b.modelRank > 0 ? b.modelRank : Number.MAX_SAFE_INTEGER;
        if (rankA !== rankB) {
          return rankA - rankB;
        }
        const heuristicDiff =
          (heuristicById.get(b.itemId) ?? 0) -
          (heuristicById.get(a.itemId) ?? 0);
        if (heuristicDiff !== 0) {
          return heuristicDiff;
        }
        return a.itemId < b.itemId ? -1 : a.itemId > b.itemId ? 1 : 0;
      })
      .map((result, index) => ({ ...result, modelRank: index + 1 }));
  }

  private async withTimeout<T>(
    promise: Promise<T>,
    timeoutMs: number,
  ): Promise<T | undefined> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<undefined>((resolve) => {
      timer = setTimeout(() => resolve(undefined), timeoutMs);
    });
    try {
      return await Promise.race([promise, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
