import { Logger } from '@nestjs/common';
import Database from 'better-sqlite3';
import { openScoringDb, ScoringDb } from '../db/scoring-db';
import { RerankCacheService, RunScoreCache } from './rerank-cache.service';

describe('RerankCacheService', () => {
  let db: ScoringDb;
  let service: RerankCacheService;

  beforeEach(() => {
    db = openScoringDb(':memory:');
    service = new RerankCacheService(db);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    db.close();
    jest.restoreAllMocks();
  });

  it('stores and reads back entries for a version', () => {
    const result = service.put(
      [
        {
          itemId: 'p1',
          modelScore: 82,
          modelRank: 1,
          modelReason: 'strong cohort',
          modelFindings: ['auc 0.91'],
        },
        { itemId: null, modelScore: 40 },
      ],
      'gpt-4o-mini',
      'v1',
      'run-1',
    );

    expect(result).toEqual({ success: true, storedCount: 1 });

    const entry = service.get(['p1'], 'v1').get('p1');
    expect(entry).toMatchObject({
      itemId: 'p1',
      runId: 'run-1',
      scoringVersion: 'v1',
      modelScore: 82,
      modelRank: 1,
      modelReason: 'strong cohort',
      modelWhy: '',
      modelFindings: ['auc 0.91'],
      modelName: 'gpt-4o-mini',
    });
  });

  it('is idempotent for repeated writes of the same key', () => {
    const entries = [{ itemId: 'p1', modelScore: 70 }];
    service.put(entries, 'model', 'v1');
    service.put(entries, 'model', 'v1');

    const count = db
      .prepare('SELECT COUNT(*) AS n FROM rerank_cache')
      .get();
    expect(count).toEqual({ n: 1 });
    expect(service.get(['p1'], 'v1').get('p1')?.modelScore).toBe(70);
  });

  it('never returns entries written under another version', () => {
    service.put([{ itemId: 'p1', modelScore: 70 }], 'model', 'v1');

    expect(service.get(['p1'], 'v2').size).toBe(0);
  });

  it('treats malformed findings as empty', () => {
    db.prepare(
      `INSERT INTO rerank_cache (item_id, scoring_version, model_findings, created_at)
       VALUES ('p2', 'v1', '{not json', '2026-01-01T00:00:00.000Z')`,
    ).run();

    const entry = service.get(['p2'], 'v1').get('p2');
    expect(entry?.modelFindings).toEqual([]);
    expect(entry?.modelScore).toBeNull();
  });

  it('returns an empty map when the table is missing', () => {
    const bare = new Database(':memory:');
    const bareService = new RerankCacheService(bare);

    expect(bareService.get(['p1'], 'v1').size).toBe(0);
    bare.close();
  });

  it('reports a failed write instead of throwing', () => {
    const bare = new Database(':memory:');
    const bareService = new RerankCacheService(bare);

    const result = bareService.put(
      [{ itemId: 'p1', modelScore: 1 }],
      'model',
      'v1',
    );
    expect(result.success).toBe(false);
    expect(result.storedCount).toBe(0);
    expect(result.error).toContain('no such table');
    bare.close();
  });

  it('prunes rows of versions that are not kept', () => {
    service.put([{ itemId: 'p1', modelScore: 1 }], 'model', 'v1');
    service.put([{ itemId: 'p1', modelScore: 2 }], 'model', 'v2');

    expect(service.prune(['v2'])).toBe(1);
    expect(service.get(['p1'], 'v1').size).toBe(0);
    expect(service.get(['p1'], 'v2').get('p1')?.modelScore).toBe(2);
  });
});

describe('RunScoreCache', () => {
  it('keys entries by run and item', () => {
    const cache = new RunScoreCache<number>();
    cache.set('run-a', 'p1', 10);

    expect(cache.get('run-a', 'p1')).toBe(10);
    expect(cache.get('run-b', 'p1')).toBeUndefined();
    expect(cache.has('run-a', 'p1')).toBe(true);
    expect(cache.size).toBe(1);
  });
});
