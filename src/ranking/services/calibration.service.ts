import { Injectable, Logger } from '@nestjs/common';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import {
  CalibrationError,
  IsotonicCalibrator,
} from '../calibration/isotonic-calibrator';
import { CALIBRATION_PATH } from '../config/ranking.constants';
import { CalibrationScale } from '../types/ranking.types';

export interface CalibrationSample {
  modelScore: number | null;
  humanRating?: number | null;
}

export interface CalibrationCheck {
  ok: boolean;
  violations: string[];
}

const MONOTONIC_TOLERANCE = 0.001;

@Injectable()
export class CalibrationService {
  private readonly logger = new Logger(CalibrationService.name);
  private active: IsotonicCalibrator | null = null;
  private activeLoaded = false;

  fitFromItems(
    items: CalibrationSample[],
    outputScale: CalibrationScale = '0_100',
  ): IsotonicCalibrator {
    const scores: number[] = [];
    const ratings: number[] = [];
    for (const item of items) {
      if (
        typeof item.modelScore === 'number' &&
        typeof item.humanRating === 'number'
      ) {
        scores.push(item.modelScore);
        ratings.push(item.humanRating);
      }
    }

    const calibrator = new IsotonicCalibrator().fit(
      scores,
      ratings,
      outputScale,
    );
    this.logger.log(
      `calibration fitted: samples=${scores.length} thresholds=${calibrator.getFitStats()?.n_thresholds ?? 0}`,
    );
    return calibrator;
  }

  async save(
    calibrator: IsotonicCalibrator,
    filePath: string = CALIBRATION_PATH,
  ): Promise<void> {
    await this.safeWriteJson(filePath, calibrator.toArtifact());
  }

  /** Reads a saved curve without refitting; null when no file exists. */
  async load(
    filePath: string = CALIBRATION_PATH,
  ): Promise<IsotonicCalibrator | null> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (this.isMissingFile(error)) {
        return null;
      }
      throw error;
    }

    let doc: unknown;
    try {
      doc = JSON.parse(raw);
    } catch {
      throw new CalibrationError(`calibration file is not valid JSON: ${filePath}`);
    }
    return IsotonicCalibrator.fromArtifact(doc);
  }

  async getActive(): Promise<IsotonicCalibrator | null> {
    if (this.activeLoaded) {
      return this.active;
    }
    try {
      this.active = await this.load();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`calibration unavailable: ${message}`);
      this.active = null;
    }
    this.activeLoaded = true;
    return this.active;
  }

  setActive(calibrator: IsotonicCalibrator | null): void {
    this.active = calibrator;
    this.activeLoaded = true;
  }

  applyToItems<T extends { relevancyScore?: number | null }>(
    items: T[],
    calibrator: IsotonicCalibrator,
  ): Array<T & { rawRelevancyScore: number | null }> {
    return items.map((item) => {
      const raw =
        typeof item.relevancyScore === 'number' ? item.relevancyScore : null;
      return {
        ...item,
        rawRelevancyScore: raw,
        relevancyScore: raw === null ? null : calibrator.transform(raw),
      };
    });
  }

  validateMonotonicity(
    calibrator: IsotonicCalibrator,
    step = 1,
  ): CalibrationCheck {
    const rows = calibrator.getMappingTable(step);
    const violations: string[] = [];
    for (let i = 1; i < rows.length; i += 1) {
      const prev = rows[i - 1];
      const current = rows[i];
      if (prev && current && current.calibrated < prev.calibrated - MONOTONIC_TOLERANCE) {
        violations.push(
          `f(${current.raw})=${current.calibrated.toFixed(3)} < f(${prev.raw})=${prev.calibrated.toFixed(3)}`,
        );
      }
    }
    return { ok: violations.length === 0, violations };
  }

  validateBounds(calibrator: IsotonicCalibrator, step = 1): CalibrationCheck {
    const max = calibrator.getScale() === '0_100' ? 100 : 3;
    const violations = calibrator
      .getMappingTable(step)
      .filter((row) => row.calibrated < 0 || row.calibrated > max)
      .map((row) => `f(${row.raw})=${row.calibrated.toFixed(3)} outside [0, ${max}]`);
    return { ok: violations.length === 0, violations };
  }

  private isMissingFile(error: unknown): boolean {
    return (
      error instanceof Error && 'code' in error && error.code === 'ENOENT'
    );
  }

  private async safeWriteJson(
    filePath: string,
    payload: unknown,
  ): Promise<void> {
    const dir = path.dirname(filePath);
    const base = path.basename(filePath);
    const tmpPath = path.join(dir, `.${base}.${process.pid}.${Date.now()}.tmp`);

    await fs.mkdir(dir, { recursive: true });
    try {
      await fs.writeFile(
        tmpPath,
        `${JSON.stringify(payload, null, 2)}\n`,
        'utf-8',
      );
      await fs.rename(tmpPath, filePath);
    } catch (error) {
      await fs.unlink(tmpPath).catch(() => undefined);
      throw error;
    }
  }
}
