import path from 'node:path';
import { BlendConfig } from '../types/ranking.types';

function numberEnv(name: string, fallback: number): number {
  const parsed = Number(process.env[name] ?? fallback);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export const SERVICE_NAME = 'research-digest-ranker';

const dataDir = process.env.DATA_DIR ?? path.join(process.cwd(), 'data');
export const SCORING_DB_PATH =
  process.env.SCORING_DB_PATH ?? path.join(dataDir, 'db', 'scoring.db');
export const CALIBRATION_PATH =
  process.env.CALIBRATION_PATH ??
  path.join(dataDir, 'calibration', 'relevancy_calibration.json');

export const RERANK_VERSION = (process.env.RERANK_VERSION ?? 'v1').trim();
export const RELEVANCY_SCORING_VERSION = (
  process.env.RELEVANCY_SCORING_VERSION ?? 'relevancy-v3'
).trim();

export const RERANK_ENABLED = process.env.RERANK_ENABLED !== '0';
export const RERANK_MAX_ITEMS = Math.max(
  1,
  Math.floor(numberEnv('RERANK_MAX_ITEMS', 30)),
);
export const RERANK_TIMEOUT_SEC = Math.max(
  1,
  numberEnv('RERANK_TIMEOUT_SEC', 90),
);
export const RERANK_TITLE_MIN_SIMILARITY = clamp(
  numberEnv('RERANK_TITLE_MIN_SIMILARITY', 0.8),
  0,
  1,
);
export const MAX_TEXT_SNIPPET = Math.max(
  100,
  Math.floor(numberEnv('MAX_TEXT_SNIPPET', 1200)),
);
export const PROMPT_SNIPPET_CHARS = 400;

export const RELEVANCY_SCORING_ENABLED =
  process.env.RELEVANCY_SCORING_ENABLED === '1';
export const RELEVANCY_MAX_ATTEMPTS = Math.max(
  1,
  Math.floor(numberEnv('RELEVANCY_MAX_ATTEMPTS', 2)),
);
export const RELEVANCY_CONCURRENCY = Math.max(
  1,
  Math.floor(numberEnv('RELEVANCY_CONCURRENCY', 4)),
);
export const RELEVANCY_INPUT_MAX_CHARS = 2000;

// Domain-tuned blend constants; flagged for recalibration through the evaluation metrics.
export const DEFAULT_BLEND_CONFIG: BlendConfig = {
  heuristicWeight: clamp(numberEnv('BLEND_HEURISTIC_WEIGHT', 0.4), 0, 1),
  modelWeight: clamp(numberEnv('BLEND_MODEL_WEIGHT', 0.6), 0, 1),
  demotionThreshold: clamp(numberEnv('BLEND_DEMOTION_THRESHOLD', 10), 0, 100),
  heuristicMax: Math.max(1, numberEnv('HEURISTIC_SCORE_MAX', 600)),
};

export const TOP_N = Math.max(1, Math.floor(numberEnv('TOP_N', 5)));
export const HIGH_RELEVANCE_THRESHOLD = clamp(
  numberEnv('HIGH_RELEVANCE_THRESHOLD', 80),
  0,
  100,
);
export const MODERATE_RELEVANCE_THRESHOLD = 65;
export const ANOMALY_WINDOW_EXTRA = Math.max(
  0,
  Math.floor(numberEnv('ANOMALY_WINDOW_EXTRA', 5)),
);
export const DEBUG_TOP_CANDIDATES = Math.max(
  1,
  Math.floor(numberEnv('DEBUG_TOP_CANDIDATES', 20)),
);

export const CALIBRATION_MIN_SAMPLES = 5;
export const CALIBRATION_ARTIFACT_VERSION = '1.0';
export const HUMAN_RATING_MAX = 3;

export const NO_SUMMARY_PLACEHOLDER = 'No summary available.';

export const PRIORITY_KEYWORDS = [
  'screening',
  'biomarker',
  'early detection',
  'ctdna',
  'cell-free dna',
  'methylation',
  'liquid biopsy',
  'diagnostic',
  'detection method',
  'sensitivity',
  'specificity',
];

export const PRIORITY_SOURCES: Record<string, number> = {
  'nature cancer': 100,
  science: 90,
  'the lancet': 80,
  bmj: 70,
  'biorxiv (all)': 60,
  'medrxiv (all)': 60,
};

export const SOURCE_BASELINE_SCORE = 10;
