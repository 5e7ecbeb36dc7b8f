import { Injectable, Logger } from '@nestjs/common';
import { RERANK_TITLE_MIN_SIMILARITY } from '../config/ranking.constants';
import {
  CandidateItem,
  ExternalJudgment,
  ExternalRankResult,
  ParsedRanking,
} from '../types/ranking.types';
import { titleSimilarity } from '../utils/similarity.util';

export interface JudgmentDropSummary {
  unknownId: number;
  duplicate: number;
  titleMismatch: number;
}

export interface ReconciledJudgments {
  accepted: ExternalJudgment[];
  dropped: JudgmentDropSummary;
}

@Injectable()
export class RerankValidationService {
  private readonly logger = new Logger(RerankValidationService.name);

  /**
   * Turns a model-proposed order into a permutation of the candidate ids:
   * foreign ids are dropped, the first occurrence of a duplicate wins, and
   * candidates the model skipped are appended in their original order.
   */
  repairRankedIds(
    rankedIds: string[],
    candidateIds: string[],
  ): string[] | null {
    if (rankedIds.length === 0 || candidateIds.length === 0) {
      return null;
    }

    const allowed = new Set(candidateIds);
    const seen = new Set<string>();
    const out: string[] = [];

    for (const id of rankedIds) {
      if (!allowed.has(id) || seen.has(id)) {
        continue;
      }
      seen.add(id);
      out.push(id);
    }

    for (const id of candidateIds) {
      if (!seen.has(id)) {
        seen.add(id);
        out.push(id);
      }
    }
    return out;
  }

  reconcileJudgments(
    judgments: ExternalJudgment[],
    candidates: CandidateItem[],
  ): ReconciledJudgments {
    const byId = new Map(candidates.map((c) => [c.id, c]));
    const seen = new Set<string>();
    const accepted: ExternalJudgment[] = [];
    const dropped: JudgmentDropSummary = {
      unknownId: 0,
      duplicate: 0,
      titleMismatch: 0,
    };

    for (const judgment of judgments) {
      const candidate = byId.get(judgment.itemId);
      if (!candidate) {
        dropped.unknownId += 1;
        continue;
      }
      if (seen.has(judgment.itemId)) {
        dropped.duplicate += 1;
        continue;
      }
      seen.add(judgment.itemId);

      if (
        judgment.title &&
        candidate.title &&
        titleSimilarity(judgment.title, candidate.title) <
          RERANK_TITLE_MIN_SIMILARITY
      ) {
        dropped.titleMismatch += 1;
        continue;
      }
      accepted.push(judgment);
    }

    const droppedTotal =
      dropped.unknownId + dropped.duplicate + dropped.titleMismatch;
    if (droppedTotal > 0) {
      this.logger.warn(
        `dropped ${droppedTotal} judgments (unknown=${dropped.unknownId}, duplicate=${dropped.duplicate}, title_mismatch=${dropped.titleMismatch})`,
      );
    }
    return { accepted, dropped };
  }

  buildRankResults(
    parsed: ParsedRanking,
    candidates: CandidateItem[],
  ): ExternalRankResult[] | null {
    const order = this.repairRankedIds(
      parsed.rankedIds,
      candidates.map((c) => c.id),
    );
    if (!order) {
      return null;
    }

    const { accepted } = this.reconcileJudgments(parsed.judgments, candidates);
    const judgmentById = new Map(accepted.map((j) => [j.itemId, j]));

    return order.map((itemId, index) => {
      const judgment = judgmentById.get(itemId);
      return {
        itemId,
        modelScore: judgment?.modelScore ?? null,
        modelRank: index + 1,
        modelReason: judgment?.modelReason ?? '',
        modelWhy: judgment?.modelWhy ?? '',
        modelFindings: judgment?.modelFindings ?? [],
      };
    });
  }
}
