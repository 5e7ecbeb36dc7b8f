import { Inject, Module, OnModuleDestroy } from '@nestjs/common';
import { SCORING_DB_PATH } from './config/ranking.constants';
import { openScoringDb, SCORING_DB, ScoringDb } from './db/scoring-db';
import { RankingController } from './ranking.controller';
import { AiRerankerService } from './services/ai-reranker.service';
import { BlendingService } from './services/blending.service';
import { CalibrationService } from './services/calibration.service';
import { CandidateStoreService } from './services/candidate-store.service';
import { EvaluationMetricsService } from './services/evaluation-metrics.service';
import { HeuristicScoringService } from './services/heuristic-scoring.service';
import { LlmClientService } from './services/llm-client.service';
import { RankingEngineService } from './services/ranking-engine.service';
import { RelevancyScoringService } from './services/relevancy-scoring.service';
import { RerankCacheService } from './services/rerank-cache.service';
import { RerankParserService } from './services/rerank-parser.service';
import { RerankValidationService } from './services/rerank-validation.service';

@Module({
  controllers: [RankingController],
  providers: [
    {
      provide: SCORING_DB,
      useFactory: (): ScoringDb => openScoringDb(SCORING_DB_PATH),
    },
    RankingEngineService,
    CandidateStoreService,
    HeuristicScoringService,
    AiRerankerService,
    RelevancyScoringService,
    RerankParserService,
    RerankValidationService,
    RerankCacheService,
    LlmClientService,
    BlendingService,
    CalibrationService,
    EvaluationMetricsService,
  ],
  exports: [RankingEngineService, CalibrationService, EvaluationMetricsService],
})
export class RankingModule implements OnModuleDestroy {
  constructor(@Inject(SCORING_DB) private readonly db: ScoringDb) {}

  onModuleDestroy(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
