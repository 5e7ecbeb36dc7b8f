import { Inject, Injectable, Logger } from '@nestjs/common';
import { SCORING_DB, ScoringDb, tableColumns } from '../db/scoring-db';
import {
  CacheEntry,
  CachePutEntry,
  CachePutResult,
} from '../types/ranking.types';

const CACHE_TABLE = 'rerank_cache';
const READ_CHUNK = 500;
const OPTIONAL_COLUMNS = [
  'run_id',
  'model',
  'model_score',
  'model_rank',
  'model_reason',
  'model_why',
  'model_findings',
  'created_at',
];

/**
 * Persistent per-item model results keyed by (item id, scoring version).
 * Read failures degrade to cache misses.
 */
@Injectable()
export class RerankCacheService {
  private readonly logger = new Logger(RerankCacheService.name);

  constructor(@Inject(SCORING_DB) private readonly db: ScoringDb) {}

  get(itemIds: string[], version: string): Map<string, CacheEntry> {
    const out = new Map<string, CacheEntry>();
    const ids = [...new Set(itemIds.filter(Boolean))];
    if (ids.length === 0) {
      return out;
    }

    try {
      const columns = tableColumns(this.db, CACHE_TABLE);
      if (!columns.has('item_id') || !columns.has('scoring_version')) {
        this.logger.warn(`${CACHE_TABLE} unavailable; treating as miss`);
        return out;
      }
      const selected = [
        'item_id',
        'scoring_version',
        ...OPTIONAL_COLUMNS.filter((c) => columns.has(c)),
      ].join(', ');

      for (let i = 0; i < ids.length; i += READ_CHUNK) {
        const chunk = ids.slice(i, i + READ_CHUNK);
        const placeholders = chunk.map(() => '?').join(', ');
        const rows: unknown[] = this.db
          .prepare(
            `SELECT ${selected} FROM ${CACHE_TABLE} WHERE scoring_version = ? AND item_id IN (${placeholders})`,
          )
          .all(version, ...chunk);

        for (const row of rows) {
          const entry = this.toEntry(row);
          if (entry) {
            out.set(entry.itemId, entry);
          }
        }
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`cache read failed; treating as miss: ${message}`);
      return new Map();
    }
    return out;
  }

  put(
    entries: CachePutEntry[],
    modelName: string,
    version: string,
    runId?: string | null,
  ): CachePutResult {
    const rows = entries.filter(
      (e): e is CachePutEntry & { itemId: string } =>
        typeof e.itemId === 'string' && e.itemId.length > 0,
    );
    if (rows.length === 0) {
      return { success: true, storedCount: 0 };
    }

    try {
      const createdAt = new Date().toISOString();
      const insert = this.db.prepare(
        `INSERT OR REPLACE INTO ${CACHE_TABLE}
          (item_id, scoring_version, run_id, model, model_score, model_rank,
           model_reason, model_why, model_findings, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      );
      const writeAll = this.db.transaction((batch: typeof rows) => {
        for (const entry of batch) {
          insert.run(
            entry.itemId,
            version,
            runId ?? null,
            modelName,
            entry.modelScore,
            entry.modelRank ?? null,
            entry.modelReason ?? '',
            entry.modelWhy ?? '',
            JSON.stringify(entry.modelFindings ?? []),
            createdAt,
          );
        }
      });
      writeAll(rows);
      return { success: true, storedCount: rows.length };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`cache write failed: ${message}`);
      return { success: false, storedCount: 0, error: message };
    }
  }

  /** Deletes every row whose scoring version is not listed. */
  prune(keepVersions: string[]): number {
    if (keepVersions.length === 0) {
      return 0;
    }
    const placeholders = keepVersions.map(() => '?').join(', ');
    const result = this.db
      .prepare(
        `DELETE FROM ${CACHE_TABLE} WHERE scoring_version NOT IN (${placeholders})`,
      )
      .run(...keepVersions);
    return result.changes;
  }

  private toEntry(row: unknown): CacheEntry | null {
    const record = this.asRecord(row);
    if (!record || typeof record.item_id !== 'string') {
      return null;
    }
    return {
      itemId: record.item_id,
      runId: typeof record.run_id === 'string' ? record.run_id : null,
      scoringVersion:
        typeof record.scoring_version === 'string'
          ? record.scoring_version
          : '',
      modelScore:
        typeof record.model_score === 'number' ? record.model_score : null,
      modelRank:
        typeof record.model_rank === 'number' ? record.model_rank : null,
      modelReason:
        typeof record.model_reason === 'string' ? record.model_reason : '',
      modelWhy: typeof record.model_why === 'string' ? record.model_why : '',
      modelFindings: this.parseFindings(record.model_findings),
      modelName: typeof record.model === 'string' ? record.model : '',
      createdAt:
        typeof record.created_at === 'string' ? record.created_at : '',
    };
  }

  private parseFindings(value: unknown): string[] {
    if (typeof value !== 'string' || !value) {
      return [];
    }
    try {
      const parsed: unknown = JSON.parse(value);
      return Array.isArray(parsed)
        ? parsed.filter((v): v is string => typeof v === 'string')
        : [];
    } catch {
      return [];
    }
  }

  private asRecord(value: unknown): Record<string, unknown> | null {
    if (!value || typeof value !== 'object' || Array.isArray(value)) {
      return null;
    }
    return value as Record<string, unknown>;
  }
}

/** In-memory memo of results within a single ranking pass. */
export class RunScoreCache<T> {
  private readonly entries = new Map<string, T>();

  get(runId: string, itemId: string): T | undefined {
    return this.entries.get(this.key(runId, itemId));
  }

  set(runId: string, itemId: string, value: T): void {
    this.entries.set(this.key(runId, itemId), value);
  }

  has(runId: string, itemId: string): boolean {
    return this.entries.has(this.key(runId, itemId));
  }

  get size(): number {
    return this.entries.size;
  }

  private key(runId: string, itemId: string): string {
    return `${runId}\u0000${itemId}`;
  }
}
