export type RelevancySource =
  | 'centralized'
  | 'scoring_event'
  | 'event_eval_json'
  | 'legacy_column'
  | 'relevancy_scoring';

export type ScoringMethod = 'relevancy_only' | 'blended_legacy';

export type CalibrationScale = '0_100' | '0_3';

export type Confidence = 'low' | 'medium' | 'high';

export interface TimeWindow {
  start: Date;
  end: Date;
}

export interface CandidateItem {
  id: string;
  title: string;
  textSnippet: string;
  source: string;
  venue?: string;
  url?: string;
  publishedAt: Date | null;
  heuristicScore: number;
  heuristicReason?: string;
  relevancyScore?: number | null;
  relevancySource?: RelevancySource;
  relevancyReason?: string;
}

export interface ExternalRankResult {
  itemId: string;
  modelScore: number | null;
  modelRank: number;
  modelReason: string;
  modelWhy: string;
  modelFindings: string[];
}

export interface ExternalJudgment {
  itemId: string;
  title?: string;
  modelScore: number | null;
  modelRank: number | null;
  modelReason: string;
  modelWhy: string;
  modelFindings: string[];
}

export type ParseStrategy = 'direct' | 'fenced' | 'bracket' | 'repaired' | 'regex';

export interface ParsedRanking {
  rankedIds: string[];
  judgments: ExternalJudgment[];
  strategy: ParseStrategy;
}

export interface CacheEntry {
  itemId: string;
  runId: string | null;
  scoringVersion: string;
  modelScore: number | null;
  modelRank: number | null;
  modelReason: string;
  modelWhy: string;
  modelFindings: string[];
  modelName: string;
  createdAt: string;
}

export interface CachePutEntry {
  itemId?: string | null;
  modelScore: number | null;
  modelRank?: number | null;
  modelReason?: string;
  modelWhy?: string;
  modelFindings?: string[];
}

export interface CachePutResult {
  success: boolean;
  storedCount: number;
  error?: string;
}

export interface RerankOutcome {
  results: Map<string, ExternalRankResult>;
  order: string[] | null;
  cacheHits: number;
  called: boolean;
  fallback: boolean;
  error?: string;
}

export interface RelevancyResult {
  itemId: string;
  relevancyScore: number | null;
  relevancyReason: string;
  confidence: Confidence;
  scoringVersion: string;
  scoringModel: string;
  scoredAt: string;
  error?: string;
}

export interface BlendConfig {
  heuristicWeight: number;
  modelWeight: number;
  demotionThreshold: number;
  heuristicMax: number;
}

export interface BlendedItem extends CandidateItem {
  modelScore: number | null;
  modelRank: number | null;
  modelReason: string;
  modelWhy: string;
  modelFindings: string[];
  totalScore: number;
  rawRelevancyScore: number | null;
  relevancyScore: number | null;
  rankPosition: number;
  scoringError?: string;
}

export interface ScoreBands {
  high_80_plus: number;
  moderate_65_79: number;
  exploratory_below_65: number;
}

export interface RankingDebugEntry {
  rank: number;
  itemId: string;
  title: string;
  relevancyScore: number | null;
  totalScore: number;
  heuristicScore: number;
  modelScore: number | null;
  publishedAt: string | null;
}

export interface RankingDebug {
  rankingMethod: ScoringMethod;
  topCandidates: RankingDebugEntry[];
  rankingWarnings: string[];
  totalCandidates: number;
  totalWithRelevancy: number;
  relevancyDistribution: ScoreBands;
}

export interface ScoringErrorRecord {
  itemId: string;
  error: string;
}

export interface DataQuality {
  externalRankingFallback: boolean;
  externalRankingError: string | null;
  externalCacheHits: number;
  unscoredCount: number;
  scoringErrors: ScoringErrorRecord[];
  rankingWarnings: string[];
  calibrated: boolean;
}

export interface RankingResult {
  mustReads: BlendedItem[];
  honorableMentions: BlendedItem[];
  ranked: BlendedItem[];
  totalCandidates: number;
  scoringMethod: ScoringMethod;
  minRelevancyScore: number | null;
  dataQuality: DataQuality;
  debug?: RankingDebug;
}

export interface RankingOptions {
  runId?: string;
  topN?: number;
  honorableMentions?: number;
  minRelevancyScore?: number | null;
  debug?: boolean;
  useExternalRanking?: boolean;
  useRelevancyScoring?: boolean;
  blend?: Partial<BlendConfig>;
}

export interface CalibrationFitStats {
  n_samples: number;
  n_thresholds: number;
  output_scale: CalibrationScale;
  x_min: number;
  x_max: number;
  y_min: number;
  y_max: number;
}

export interface CalibrationArtifact {
  version: string;
  x_thresholds: number[];
  y_values: number[];
  fit_stats: Partial<CalibrationFitStats>;
}

export interface EvaluationItem {
  id?: string;
  title?: string;
  source?: string;
  modelScore: number | null;
  humanRating?: number | null;
  relevanceLabel?: number | null;
  modelReason?: string;
}

export interface SpearmanResult {
  rho: number | null;
  n: number;
}

export interface NdcgResult {
  ndcg: number | null;
  dcg: number | null;
  idcg: number | null;
  k: number;
  nItems: number;
}

export interface RecallResult {
  recall: number | null;
  hits: number;
  totalRelevant: number;
  k: number;
}

export interface EvaluationSummary {
  spearmanRho: number | null;
  spearmanN: number;
  ndcg: Record<string, number | null>;
  recall: Record<string, number | null>;
  recallAt5Hits: number;
  recallAt5TotalRelevant: number;
}

export interface Disagreement {
  id: string | null;
  title: string;
  humanRating: number;
  modelScore: number;
  modelScoreScaled: number;
  absoluteError: number;
  modelReason: string;
  relevanceLabel: number | null;
}

export interface ClassificationAccuracy {
  accuracy: number | null;
  n: number;
  correct: number;
  confusionMatrix: number[][];
}
