import {
  CALIBRATION_ARTIFACT_VERSION,
  CALIBRATION_MIN_SAMPLES,
  HUMAN_RATING_MAX,
} from '../config/ranking.constants';
import {
  CalibrationArtifact,
  CalibrationFitStats,
  CalibrationScale,
} from '../types/ranking.types';

export class CalibrationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CalibrationError';
  }
}

export interface CalibrationMappingRow {
  raw: number;
  calibrated: number;
}

interface PoolBlock {
  xs: number[];
  sum: number;
  weight: number;
}

/**
 * Monotone non-decreasing map from raw model scores (0-100) to the human
 * rating scale, fitted with pool-adjacent-violators and applied by linear
 * interpolation between breakpoints.
 */
export class IsotonicCalibrator {
  private xThresholds: number[] = [];
  private yValues: number[] = [];
  private fitStats: CalibrationFitStats | null = null;
  private outputScale: CalibrationScale = '0_100';

  get isFitted(): boolean {
    return this.xThresholds.length > 0;
  }

  fit(
    modelScores: number[],
    humanRatings: number[],
    outputScale: CalibrationScale = '0_100',
  ): this {
    if (modelScores.length !== humanRatings.length) {
      throw new CalibrationError(
        `length mismatch: ${modelScores.length} scores vs ${humanRatings.length} ratings`,
      );
    }
    if (modelScores.length < CALIBRATION_MIN_SAMPLES) {
      throw new CalibrationError(
        `need at least ${CALIBRATION_MIN_SAMPLES} samples, got ${modelScores.length}`,
      );
    }
    if (![...modelScores, ...humanRatings].every(Number.isFinite)) {
      throw new CalibrationError('scores and ratings must be finite numbers');
    }

    const scale = outputScale === '0_100' ? 100 / HUMAN_RATING_MAX : 1;
    const pairs = modelScores
      .map((score, i) => ({
        x: this.clamp(score, 0, 100),
        y: (humanRatings[i] ?? 0) * scale,
      }))
      .sort((a, b) => a.x - b.x);

    const blocks = this.poolAdjacentViolators(this.groupTies(pairs));
    const points = this.collapse(blocks);

    const first = points[0];
    const last = points[points.length - 1];
    if (first && first.x > 0) {
      points.unshift({ x: 0, y: first.y });
    }
    if (last && last.x < 100) {
      points.push({ x: 100, y: last.y });
    }

    this.xThresholds = points.map((p) => p.x);
    this.yValues = points.map((p) => p.y);
    this.outputScale = outputScale;
    this.fitStats = {
      n_samples: modelScores.length,
      n_thresholds: this.xThresholds.length,
      output_scale: outputScale,
      x_min: Math.min(...pairs.map((p) => p.x)),
      x_max: Math.max(...pairs.map((p) => p.x)),
      y_min: Math.min(...pairs.map((p) => p.y)),
      y_max: Math.max(...pairs.map((p) => p.y)),
    };
    return this;
  }

  transform(score: number): number {
    if (!this.isFitted) {
      throw new CalibrationError('calibrator is not fitted');
    }
    if (!Number.isFinite(score)) {
      throw new CalibrationError(`score must be finite, got ${score}`);
    }

    const xs = this.xThresholds;
    const ys = this.yValues;
    const s = this.clamp(score, 0, 100);
    const lastIndex = xs.length - 1;

    if (s <= (xs[0] ?? 0)) {
      return this.clampOutput(ys[0] ?? 0);
    }
    if (s >= (xs[lastIndex] ?? 100)) {
      return this.clampOutput(ys[lastIndex] ?? 0);
    }

    for (let i = 0; i < lastIndex; i += 1) {
      const x0 = xs[i] ?? 0;
      const x1 = xs[i + 1] ?? 0;
      if (s < x0 || s > x1) {
        continue;
      }
      const y0 = ys[i] ?? 0;
      const y1 = ys[i + 1] ?? 0;
      if (x1 === x0) {
        return this.clampOutput(y0);
      }
      return this.clampOutput(y0 + ((s - x0) / (x1 - x0)) * (y1 - y0));
    }
    return this.clampOutput(ys[lastIndex] ?? 0);
  }

  transformBatch(scores: number[]): number[] {
    return scores.map((score) => this.transform(score));
  }

  getMappingTable(step = 10): CalibrationMappingRow[] {
    if (!(step > 0)) {
      throw new CalibrationError(`step must be positive, got ${step}`);
    }
    const rows: CalibrationMappingRow[] = [];
    for (let raw = 0; raw <= 100; raw += step) {
      rows.push({ raw, calibrated: this.transform(raw) });
    }
    return rows;
  }

  getFitStats(): CalibrationFitStats | null {
    return this.fitStats ? { ...this.fitStats } : null;
  }

  getScale(): CalibrationScale {
    return this.outputScale;
  }

  toArtifact(): CalibrationArtifact {
    if (!this.isFitted) {
      throw new CalibrationError('calibrator is not fitted');
    }
    return {
      version: CALIBRATION_ARTIFACT_VERSION,
      x_thresholds: [...this.xThresholds],
      y_values: [...this.yValues],
      fit_stats: this.fitStats ? { ...this.fitStats } : {},
    };
  }

  static fromArtifact(doc: unknown): IsotonicCalibrator {
    if (!doc || typeof doc !== 'object' || Array.isArray(doc)) {
      throw new CalibrationError('calibration artifact must be an object');
    }
    const xs = 'x_thresholds' in doc ? doc.x_thresholds : undefined;
    const ys = 'y_values' in doc ? doc.y_values : undefined;
    const x = IsotonicCalibrator.numberList(xs, 'x_thresholds');
    const y = IsotonicCalibrator.numberList(ys, 'y_values');

    if (x.length === 0 || x.length !== y.length) {
      throw new CalibrationError(
        'x_thresholds and y_values must be non-empty and of equal length',
      );
    }
    for (let i = 1; i < x.length; i += 1) {
      if ((x[i] ?? 0) < (x[i - 1] ?? 0) || (y[i] ?? 0) < (y[i - 1] ?? 0)) {
        throw new CalibrationError('calibration curve must be non-decreasing');
      }
    }

    const rawStats = 'fit_stats' in doc ? doc.fit_stats : undefined;
    const calibrator = new IsotonicCalibrator();
    calibrator.xThresholds = x;
    calibrator.yValues = y;
    calibrator.fitStats = IsotonicCalibrator.readFitStats(rawStats);
    calibrator.outputScale = calibrator.fitStats?.output_scale ?? '0_100';
    return calibrator;
  }

  private groupTies(pairs: { x: number; y: number }[]): PoolBlock[] {
    const blocks: PoolBlock[] = [];
    for (const pair of pairs) {
      const tail = blocks[blocks.length - 1];
      if (tail && tail.xs[tail.xs.length - 1] === pair.x) {
        tail.sum += pair.y;
        tail.weight += 1;
        continue;
      }
      blocks.push({ xs: [pair.x], sum: pair.y, weight: 1 });
    }
    return blocks;
  }

  // Each pass merges every adjacent violating pair; at most 2n passes run.
  private poolAdjacentViolators(input: PoolBlock[]): PoolBlock[] {
    let blocks = input;
    const maxPasses = 2 * input.length;

    for (let pass = 0; pass < maxPasses; pass += 1) {
      const merged: PoolBlock[] = [];
      let changed = false;
      for (const block of blocks) {
        const tail = merged[merged.length - 1];
        if (tail && tail.sum / tail.weight > block.sum / block.weight) {
          tail.xs.push(...block.xs);
          tail.sum += block.sum;
          tail.weight += block.weight;
          changed = true;
          continue;
        }
        merged.push({ xs: [...block.xs], sum: block.sum, weight: block.weight });
      }
      blocks = merged;
      if (!changed) {
        break;
      }
    }
    return blocks;
  }

  // One breakpoint per value change, at the first x reaching that value.
  private collapse(blocks: PoolBlock[]): { x: number; y: number }[] {
    const points: { x: number; y: number }[] = [];
    for (const block of blocks) {
      const y = block.sum / block.weight;
      const x = block.xs[0];
      if (x === undefined || points[points.length - 1]?.y === y) {
        continue;
      }
      points.push({ x, y });
    }
    return points;
  }

  private clampOutput(value: number): number {
    const max = this.outputScale === '0_100' ? 100 : HUMAN_RATING_MAX;
    return this.clamp(value, 0, max);
  }

  private clamp(value: number, min: number, max: number): number {
    return Math.max(min, Math.min(max, value));
  }

  private static numberList(value: unknown, field: string): number[] {
    if (
      !Array.isArray(value) ||
      !value.every((v): v is number => typeof v === 'number' && Number.isFinite(v))
    ) {
      throw new CalibrationError(`${field} must be an array of finite numbers`);
    }
    return [...value];
  }

  private static readFitStats(value: unknown): CalibrationFitStats | null {
    if (!value || typeof value !== 'object' || Array.isArray(value)) {
      return null;
    }
    const stats: Record<string, unknown> = { ...value };
    const scale = stats.output_scale;
    const numeric = [
      stats.n_samples,
      stats.n_thresholds,
      stats.x_min,
      stats.x_max,
      stats.y_min,
      stats.y_max,
    ];
    if (
      (scale !== '0_100' && scale !== '0_3') ||
      !numeric.every((v) => typeof v === 'number')
    ) {
      return null;
    }
    return {
      n_samples: Number(stats.n_samples),
      n_thresholds: Number(stats.n_thresholds),
      output_scale: scale,
      x_min: Number(stats.x_min),
      x_max: Number(stats.x_max),
      y_min: Number(stats.y_min),
      y_max: Number(stats.y_max),
    };
  }
}
