import { Logger } from '@nestjs/common';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { CalibrationError } from '../calibration/isotonic-calibrator';
import { CalibrationService } from './calibration.service';

const SAMPLES = [
  { modelScore: 10, humanRating: 0 },
  { modelScore: 20, humanRating: 1 },
  { modelScore: 30, humanRating: 1 },
  { modelScore: 40, humanRating: 2 },
  { modelScore: 50, humanRating: 3 },
  { modelScore: 60, humanRating: null },
  { modelScore: null, humanRating: 2 },
];

describe('CalibrationService', () => {
  let service: CalibrationService;
  let tmpDir: string;

  beforeEach(async () => {
    service = new CalibrationService();
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'calibration-'));
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('fits only on items that carry both a score and a rating', () => {
    const calibrator = service.fitFromItems(SAMPLES);

    expect(calibrator.getFitStats()?.n_samples).toBe(5);
  });

  it('saves and reloads the same curve without refitting', async () => {
    const filePath = path.join(tmpDir, 'nested', 'curve.json');
    const calibrator = service.fitFromItems(SAMPLES);

    await service.save(calibrator, filePath);
    const loaded = await service.load(filePath);

    expect(loaded?.transformBatch([0, 15, 35, 55, 100])).toEqual(
      calibrator.transformBatch([0, 15, 35, 55, 100]),
    );
    const stored: unknown = JSON.parse(await fs.readFile(filePath, 'utf-8'));
    expect(stored).toMatchObject({ version: '1.0' });
  });

  it('returns null when no curve was saved', async () => {
    await expect(
      service.load(path.join(tmpDir, 'missing.json')),
    ).resolves.toBeNull();
  });

  it('raises on a malformed curve file', async () => {
    const filePath = path.join(tmpDir, 'broken.json');
    await fs.writeFile(filePath, '{"x_thresholds": [0, 1', 'utf-8');

    await expect(service.load(filePath)).rejects.toBeInstanceOf(
      CalibrationError,
    );
  });

  it('unlinks the temp file when the rename fails', async () => {
    jest.spyOn(fs, 'mkdir').mockResolvedValue(undefined);
    jest.spyOn(fs, 'writeFile').mockResolvedValue(undefined);
    jest.spyOn(fs, 'rename').mockRejectedValue(new Error('EXDEV'));
    const unlinkSpy = jest.spyOn(fs, 'unlink').mockResolvedValue(undefined);

    await expect(
      service.save(service.fitFromItems(SAMPLES), '/tmp/curve.json'),
    ).rejects.toThrow('EXDEV');
    expect(unlinkSpy).toHaveBeenCalledTimes(1);
  });

  it('replaces relevancy with the calibrated value and keeps the raw one', () => {
    const calibrator = service.fitFromItems(SAMPLES);
    const [scored, unscored] = service.applyToItems(
      [
        { id: 'a', relevancyScore: 15 },
        { id: 'b', relevancyScore: null },
      ],
      calibrator,
    );

    expect(scored?.rawRelevancyScore).toBe(15);
    expect(scored?.relevancyScore).toBeCloseTo(100 / 6);
    expect(unscored).toEqual({
      id: 'b',
      relevancyScore: null,
      rawRelevancyScore: null,
    });
  });

  it('reports a fitted curve as monotone and in bounds', () => {
    const calibrator = service.fitFromItems(SAMPLES);

    expect(service.validateMonotonicity(calibrator)).toEqual({
      ok: true,
      violations: [],
    });
    expect(service.validateBounds(calibrator)).toEqual({
      ok: true,
      violations: [],
    });
  });

  it('treats a broken active curve as absent', async () => {
    jest.spyOn(service, 'load').mockRejectedValue(
      new CalibrationError('bad curve'),
    );

    await expect(service.getActive()).resolves.toBeNull();
  });
});
