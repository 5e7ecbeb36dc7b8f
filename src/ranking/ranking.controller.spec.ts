import { BadRequestException, Logger } from '@nestjs/common';
import { RankingController } from './ranking.controller';
import { CalibrationService } from './services/calibration.service';
import { EvaluationMetricsService } from './services/evaluation-metrics.service';

describe('RankingController', () => {
  let engine: { rankWindow: jest.Mock };
  let calibration: CalibrationService;
  let controller: RankingController;

  beforeEach(() => {
    engine = { rankWindow: jest.fn().mockResolvedValue({ ranked: [] }) };
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    calibration = new CalibrationService();
    calibration.setActive(null);
    jest.spyOn(calibration, 'save').mockResolvedValue(undefined);
    controller = new RankingController(
      engine as never,
      calibration,
      new EvaluationMetricsService(),
    );
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('parses ranking query values', async () => {
    await controller.getRanking(
      '2026-02-01',
      '2026-02-07',
      '3.7',
      '2',
      '65',
      'true',
      'run-1',
    );

    expect(engine.rankWindow).toHaveBeenCalledWith(
      {
        start: new Date('2026-02-01T00:00:00.000Z'),
        end: new Date('2026-02-07T00:00:00.000Z'),
      },
      {
        topN: 3,
        honorableMentions: 2,
        minRelevancyScore: 65,
        debug: true,
        runId: 'run-1',
      },
    );
  });

  it('defaults the window to the seven days ending at end', async () => {
    await controller.getRanking(undefined, '2026-02-07');

    expect(engine.rankWindow).toHaveBeenCalledWith(
      {
        start: new Date('2026-02-01T00:00:00.000Z'),
        end: new Date('2026-02-07T00:00:00.000Z'),
      },
      {
        topN: undefined,
        honorableMentions: undefined,
        minRelevancyScore: null,
        debug: false,
      },
    );
  });

  it('rejects malformed ranking queries', async () => {
    await expect(controller.getRanking('02/01/2026')).rejects.toBeInstanceOf(
      BadRequestException,
    );
    await expect(
      controller.getRanking('2026-02-08', '2026-02-07'),
    ).rejects.toBeInstanceOf(BadRequestException);
    await expect(
      controller.getRanking(undefined, undefined, '0'),
    ).rejects.toBeInstanceOf(BadRequestException);
    await expect(
      controller.getRanking(undefined, undefined, undefined, undefined, '140'),
    ).rejects.toBeInstanceOf(BadRequestException);
    expect(engine.rankWindow).not.toHaveBeenCalled();
  });

  it('reports a missing calibration', async () => {
    await expect(controller.getCalibration()).resolves.toEqual({
      message: 'calibration not fitted yet',
    });
  });

  it('fits, saves and activates a calibration curve', async () => {
    const items = [10, 20, 30, 40, 50].map((modelScore, i) => ({
      modelScore,
      humanRating: [0, 1, 1, 2, 3][i],
    }));

    const view = await controller.fitCalibration(items, '0_3');

    expect(view.scale).toBe('0_3');
    expect(view.fitStats).toMatchObject({ n_samples: 5, output_scale: '0_3' });
    expect(view.mapping[0]).toEqual({ raw: 0, calibrated: 0 });
    expect(view.mapping[10]).toEqual({ raw: 100, calibrated: 3 });
    expect(calibration.save).toHaveBeenCalledTimes(1);
    await expect(controller.getCalibration()).resolves.toMatchObject({
      scale: '0_3',
    });
  });

  it('turns calibration errors into bad requests', async () => {
    await expect(
      controller.fitCalibration([{ modelScore: 10, humanRating: 1 }]),
    ).rejects.toBeInstanceOf(BadRequestException);
    await expect(
      controller.fitCalibration([{ modelScore: 10 }], 'percent'),
    ).rejects.toBeInstanceOf(BadRequestException);
    expect(calibration.save).not.toHaveBeenCalled();
  });

  it('computes evaluation metrics with an optional source breakdown', () => {
    const items = [
      { id: 'a', source: 'bioRxiv', modelScore: 90, humanRating: 3 },
      { id: 'b', source: 'PubMed', modelScore: 60, humanRating: 2 },
      { id: 'c', source: 'bioRxiv', modelScore: '30', humanRating: 1 },
    ];

    const plain = controller.evaluate(items);
    const split = controller.evaluate(items, 'yes');

    expect(plain.summary.spearmanN).toBe(3);
    expect(plain.summary.spearmanRho).toBeCloseTo(1);
    expect(plain.bySource).toBeUndefined();
    expect(split.bySource?.preprint?.count).toBe(2);
    expect(split.bySource?.pubmed?.count).toBe(1);
  });

  it('rejects evaluation bodies that are not item lists', () => {
    expect(() => controller.evaluate({ items: 'nope' })).toThrow(
      BadRequestException,
    );
    expect(() => controller.evaluate([{ modelScore: 'high' }])).toThrow(
      'items[0].modelScore must be a number',
    );
  });
});
