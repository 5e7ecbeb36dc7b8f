import { Injectable, Logger } from '@nestjs/common';
import {
  RELEVANCY_CONCURRENCY,
  RELEVANCY_INPUT_MAX_CHARS,
  RELEVANCY_MAX_ATTEMPTS,
  RELEVANCY_SCORING_VERSION,
} from '../config/ranking.constants';
import {
  buildRelevancyPrompt,
  RELEVANCY_SYSTEM_PROMPT,
} from '../prompts/ranking.prompt';
import {
  CandidateItem,
  Confidence,
  RelevancyResult,
} from '../types/ranking.types';
import { LlmClientService } from './llm-client.service';
import { RerankCacheService, RunScoreCache } from './rerank-cache.service';
import { RerankParserService } from './rerank-parser.service';

export interface RelevancyScoringOptions {
  runId: string;
  runCache: RunScoreCache<RelevancyResult>;
  version?: string;
}

interface ValidatedRelevancy {
  relevancyScore: number;
  relevancyReason: string;
  confidence: Confidence;
}

const CONFIDENCE_LEVELS: Confidence[] = ['low', 'medium', 'high'];

@Injectable()
export class RelevancyScoringService {
  private readonly logger = new Logger(RelevancyScoringService.name);

  constructor(
    private readonly llmClient: LlmClientService,
    private readonly parser: RerankParserService,
    private readonly cache: RerankCacheService,
  ) {}

  async scoreItem(
    candidate: CandidateItem,
    options: RelevancyScoringOptions,
  ): Promise<RelevancyResult> {
    const version = options.version ?? RELEVANCY_SCORING_VERSION;
    const memo = options.runCache.get(options.runId, candidate.id);
    if (memo) {
      return memo;
    }

    const stored = this.cache.get([candidate.id], version).get(candidate.id);
    if (stored && typeof stored.modelScore === 'number') {
      const result: RelevancyResult = {
        itemId: candidate.id,
        relevancyScore: stored.modelScore,
        relevancyReason: stored.modelReason,
        confidence: this.toConfidence(stored.modelWhy) ?? 'medium',
        scoringVersion: version,
        scoringModel: stored.modelName,
        scoredAt: stored.createdAt,
      };
      options.runCache.set(options.runId, candidate.id, result);
      return result;
    }

    if (!this.llmClient.isConfigured()) {
      return this.failure(candidate.id, version, 'API key not configured');
    }

    const prompt = buildRelevancyPrompt(candidate, RELEVANCY_INPUT_MAX_CHARS);
    for (let attempt = 1; attempt <= RELEVANCY_MAX_ATTEMPTS; attempt += 1) {
      const text = await this.llmClient.generateText(
        RELEVANCY_SYSTEM_PROMPT,
        prompt,
        { jsonMode: true },
      );
      const validated = this.validate(this.parser.decodeObject(text));
      if (!validated) {
        continue;
      }

      const result: RelevancyResult = {
        itemId: candidate.id,
        ...validated,
        scoringVersion: version,
        scoringModel: this.llmClient.modelName,
        scoredAt: new Date().toISOString(),
      };
      options.runCache.set(options.runId, candidate.id, result);
      // Confidence rides in the model_why column of the shared cache table.
      this.cache.put(
        [
          {
            itemId: candidate.id,
            modelScore: validated.relevancyScore,
            modelReason: validated.relevancyReason,
            modelWhy: validated.confidence,
          },
        ],
        this.llmClient.modelName,
        version,
        options.runId,
      );
      return result;
    }

    this.logger.error(
      `relevancy scoring failed for ${candidate.id} after ${RELEVANCY_MAX_ATTEMPTS} attempts`,
    );
    return this.failure(candidate.id, version, 'LLM scoring failed after retries');
  }

  /** Scores items independently with bounded parallelism; output follows input order. */
  async scoreBatch(
    candidates: CandidateItem[],
    options: RelevancyScoringOptions,
  ): Promise<RelevancyResult[]> {
    const results: RelevancyResult[] = [];
    for (let i = 0; i < candidates.length; i += RELEVANCY_CONCURRENCY) {
      const chunk = candidates.slice(i, i + RELEVANCY_CONCURRENCY);
      const scored = await Promise.all(
        chunk.map((candidate) => this.scoreItem(candidate, options)),
      );
      results.push(...scored);
    }

    const failed = results.filter((r) => r.relevancyScore === null).length;
    this.logger.log(
      `stage relevancy done: items=${results.length} failed=${failed}`,
    );
    return results;
  }

  validate(
    payload: Record<string, unknown> | null,
  ): ValidatedRelevancy | null {
    if (!payload) {
      return null;
    }
    const score = payload.relevancy_score;
    const reason = payload.relevancy_reason;
    const confidence = this.toConfidence(payload.confidence);
    if (
      typeof score !== 'number' ||
      !Number.isInteger(score) ||
      score < 0 ||
      score > 100 ||
      typeof reason !== 'string' ||
      !confidence
    ) {
      return null;
    }
    return {
      relevancyScore: score,
      relevancyReason: reason.trim(),
      confidence,
    };
  }

  private toConfidence(value: unknown): Confidence | null {
    return CONFIDENCE_LEVELS.find((level) => level === value) ?? null;
  }

  private failure(
    itemId: string,
    version: string,
    error: string,
  ): RelevancyResult {
    return {
      itemId,
      relevancyScore: null,
      relevancyReason: '',
      confidence: 'low',
      scoringVersion: version,
      scoringModel: this.llmClient.modelName,
      scoredAt: new Date().toISOString(),
      error,
    };
  }
}
