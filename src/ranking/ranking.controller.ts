import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Post,
  Query,
} from '@nestjs/common';
import {
  CalibrationError,
  CalibrationMappingRow,
  IsotonicCalibrator,
} from './calibration/isotonic-calibrator';
import { SERVICE_NAME } from './config/ranking.constants';
import {
  CalibrationSample,
  CalibrationService,
} from './services/calibration.service';
import {
  EvaluationMetricsService,
  SourceBreakdown,
  SourceCategory,
} from './services/evaluation-metrics.service';
import { RankingEngineService } from './services/ranking-engine.service';
import {
  CalibrationFitStats,
  CalibrationScale,
  EvaluationItem,
  EvaluationSummary,
  RankingResult,
  TimeWindow,
} from './types/ranking.types';

const DAY_MS = 24 * 60 * 60 * 1000;
const DEFAULT_WINDOW_DAYS = 7;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export interface CalibrationView {
  scale: CalibrationScale;
  fitStats: CalibrationFitStats | null;
  mapping: CalibrationMappingRow[];
}

export interface EvaluationResponse {
  summary: EvaluationSummary;
  bySource?: Partial<Record<SourceCategory, SourceBreakdown>>;
}

@Controller()
export class RankingController {
  constructor(
    private readonly rankingEngine: RankingEngineService,
    private readonly calibrationService: CalibrationService,
    private readonly evaluationService: EvaluationMetricsService,
  ) {}

  @Get('health')
  getHealth(): { status: string; service: string } {
    return {
      status: 'ok',
      service: SERVICE_NAME,
    };
  }

  @Get('ranking')
  async getRanking(
    @Query('start') startRaw?: string,
    @Query('end') endRaw?: string,
    @Query('topN') topNRaw?: string,
    @Query('mentions') mentionsRaw?: string,
    @Query('minScore') minScoreRaw?: string,
    @Query('debug') debugRaw?: string,
    @Query('runId') runId?: string,
  ): Promise<RankingResult> {
    const window = this.parseWindow(startRaw, endRaw);
    return this.rankingEngine.rankWindow(window, {
      topN: this.parsePositiveInt(topNRaw, 'topN'),
      honorableMentions: this.parseCount(mentionsRaw, 'mentions'),
      minRelevancyScore: this.parseScore(minScoreRaw, 'minScore'),
      debug: this.parseBoolean(debugRaw, 'debug'),
      ...(runId ? { runId } : {}),
    });
  }

  @Get('calibration')
  async getCalibration(): Promise<CalibrationView | { message: string }> {
    const calibrator = await this.calibrationService.getActive();
    if (!calibrator) {
      return { message: 'calibration not fitted yet' };
    }
    return {
      scale: calibrator.getScale(),
      fitStats: calibrator.getFitStats(),
      mapping: calibrator.getMappingTable(),
    };
  }

  @Post('calibration/fit')
  async fitCalibration(
    @Body('items') itemsRaw?: unknown,
    @Body('outputScale') scaleRaw?: unknown,
  ): Promise<CalibrationView> {
    const samples: CalibrationSample[] = this.parseItems(itemsRaw).map(
      (item) => ({ modelScore: item.modelScore, humanRating: item.humanRating }),
    );
    const scale = this.parseScale(scaleRaw);

    let calibrator: IsotonicCalibrator;
    try {
      calibrator = this.calibrationService.fitFromItems(samples, scale);
    } catch (error) {
      if (error instanceof CalibrationError) {
        throw new BadRequestException(error.message);
      }
      throw error;
    }

    const violations = [
      ...this.calibrationService.validateMonotonicity(calibrator).violations,
      ...this.calibrationService.validateBounds(calibrator).violations,
    ];
    if (violations.length > 0) {
      throw new BadRequestException(
        `calibration rejected: ${violations.slice(0, 3).join('; ')}`,
      );
    }

    await this.calibrationService.save(calibrator);
    this.calibrationService.setActive(calibrator);
    return {
      scale: calibrator.getScale(),
      fitStats: calibrator.getFitStats(),
      mapping: calibrator.getMappingTable(),
    };
  }

  @Post('evaluation')
  evaluate(
    @Body('items') itemsRaw?: unknown,
    @Body('bySource') bySourceRaw?: unknown,
  ): EvaluationResponse {
    const items = this.parseItems(itemsRaw);
    const summary = this.evaluationService.computeAll(items);
    if (!this.parseBoolean(bySourceRaw, 'bySource')) {
      return { summary };
    }
    return { summary, bySource: this.evaluationService.computeBySource(items) };
  }

  private parseWindow(startRaw?: string, endRaw?: string): TimeWindow {
    const end = this.parseDay(endRaw, 'end') ?? this.today();
    const start =
      this.parseDay(startRaw, 'start') ??
      new Date(end.getTime() - (DEFAULT_WINDOW_DAYS - 1) * DAY_MS);
    if (start.getTime() > end.getTime()) {
      throw new BadRequestException('start must not be after end');
    }
    return { start, end };
  }

  private parseDay(value: string | undefined, fieldName: string): Date | null {
    if (value == null || value === '') {
      return null;
    }
    const trimmed = value.trim();
    const parsed = new Date(`${trimmed}T00:00:00.000Z`);
    if (!DATE_PATTERN.test(trimmed) || Number.isNaN(parsed.getTime())) {
      throw new BadRequestException(`${fieldName} must be a YYYY-MM-DD date`);
    }
    return parsed;
  }

  private today(): Date {
    const now = new Date();
    return new Date(
      Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()),
    );
  }

  private parsePositiveInt(value: unknown, fieldName: string): number | undefined {
    if (value == null || value === '') {
      return undefined;
    }

    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed <= 0) {
      throw new BadRequestException(`${fieldName} must be a positive number`);
    }
    return Math.floor(parsed);
  }

  private parseCount(value: unknown, fieldName: string): number | undefined {
    if (value == null || value === '') {
      return undefined;
    }

    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed < 0) {
      throw new BadRequestException(`${fieldName} must be zero or more`);
    }
    return Math.floor(parsed);
  }

  private parseScore(value: unknown, fieldName: string): number | null {
    if (value == null || value === '') {
      return null;
    }

    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed < 0 || parsed > 100) {
      throw new BadRequestException(`${fieldName} must be between 0 and 100`);
    }
    return parsed;
  }

  private parseBoolean(value: unknown, fieldName: string): boolean {
    if (value == null || value === '') {
      return false;
    }
    if (typeof value === 'boolean') {
      return value;
    }
    if (typeof value === 'number') {
      if (value === 1) {
        return true;
      }
      if (value === 0) {
        return false;
      }
    }
    if (typeof value === 'string') {
      const lowered = value.trim().toLowerCase();
      if (['1', 'true', 'yes', 'y'].includes(lowered)) {
        return true;
      }
      if (['0', 'false', 'no', 'n'].includes(lowered)) {
        return false;
      }
    }

    throw new BadRequestException(`${fieldName} must be a boolean value`);
  }

  private parseScale(value: unknown): CalibrationScale {
    if (value == null || value === '') {
      return '0_100';
    }
    if (value === '0_100' || value === '0_3') {
      return value;
    }
    throw new BadRequestException('outputScale must be 0_100 or 0_3');
  }

  private parseItems(value: unknown): EvaluationItem[] {
    if (!Array.isArray(value)) {
      throw new BadRequestException('items must be an array');
    }

    return value.map((raw: unknown, index) => {
      if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
        throw new BadRequestException(`items[${index}] must be an object`);
      }
      const record: Record<string, unknown> = { ...raw };
      const item: EvaluationItem = {
        modelScore: this.optionalNumber(record.modelScore, `items[${index}].modelScore`),
        humanRating: this.optionalNumber(record.humanRating, `items[${index}].humanRating`),
        relevanceLabel: this.optionalNumber(
          record.relevanceLabel,
          `items[${index}].relevanceLabel`,
        ),
      };
      for (const key of ['id', 'title', 'source', 'modelReason'] as const) {
        const text = record[key];
        if (typeof text === 'string') {
          item[key] = text;
        }
      }
      return item;
    });
  }

  private optionalNumber(value: unknown, fieldName: string): number | null {
    if (value == null || value === '') {
      return null;
    }
    const parsed = typeof value === 'string' ? Number(value) : value;
    if (typeof parsed !== 'number' || !Number.isFinite(parsed)) {
      throw new BadRequestException(`${fieldName} must be a number`);
    }
    return parsed;
  }
}
