import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  MAX_TEXT_SNIPPET,
  NO_SUMMARY_PLACEHOLDER,
} from '../config/ranking.constants';
import { SCORING_DB, ScoringDb, tableColumns } from '../db/scoring-db';
import {
  CandidateItem,
  RelevancySource,
  TimeWindow,
} from '../types/ranking.types';
import { formatDateYYYYMMDD, parseDate } from '../utils/date.util';
import { cleanText, truncate } from '../utils/text.util';
import { HeuristicScoringService } from './heuristic-scoring.service';

const PUBLICATIONS = 'publications';
const EVENTS = 'scoring_events';
const OPTIONAL_COLUMNS = [
  'source',
  'venue',
  'url',
  'summary',
  'raw_text',
  'final_relevancy_score',
  'final_relevancy_reason',
  'latest_relevancy_score',
];
const EVENT_CHUNK = 500;

interface LegacyEvent {
  score: number | null;
  evalScore: number | null;
  reason: string;
}

/** Read-only view of stored publications inside a date window. */
@Injectable()
export class CandidateStoreService {
  private readonly logger = new Logger(CandidateStoreService.name);

  constructor(
    @Inject(SCORING_DB) private readonly db: ScoringDb,
    private readonly heuristic: HeuristicScoringService,
  ) {}

  listCandidates(window: TimeWindow, now: Date = new Date()): CandidateItem[] {
    const columns = tableColumns(this.db, PUBLICATIONS);
    const idColumn = columns.has('id')
      ? 'id'
      : columns.has('publication_id')
        ? 'publication_id'
        : null;
    if (!idColumn || !columns.has('title') || !columns.has('published_date')) {
      this.logger.warn(`${PUBLICATIONS} table unavailable; no candidates`);
      return [];
    }

    const selected = [
      `${idColumn} AS item_id`,
      'title',
      'published_date',
      ...OPTIONAL_COLUMNS.filter((c) => columns.has(c)),
    ].join(', ');
    const rows: unknown[] = this.db
      .prepare(
        `SELECT ${selected} FROM ${PUBLICATIONS}
         WHERE substr(published_date, 1, 10) BETWEEN ? AND ?
         ORDER BY published_date DESC, ${idColumn} ASC`,
      )
      .all(formatDateYYYYMMDD(window.start), formatDateYYYYMMDD(window.end));

    const records = rows
      .map((row) => this.asRecord(row))
      .filter((r): r is Record<string, unknown> => r !== null);
    const events = this.loadLatestEvents(
      records.map((r) => this.toStr(r.item_id)).filter(Boolean),
    );

    const out: CandidateItem[] = [];
    for (const record of records) {
      const id = this.toStr(record.item_id);
      if (!id) {
        continue;
      }
      const title = cleanText(this.toStr(record.title));
      const source = this.toStr(record.source);
      const venue = this.toStr(record.venue);
      const url = this.toStr(record.url);
      const publishedAt = parseDate(record.published_date);
      const textSnippet = this.snippet(record);
      const scored = this.heuristic.scoreCandidate(
        { title, textSnippet, source, venue, publishedAt },
        now,
      );
      const relevancy = this.pickRelevancy(record, events.get(id));

      out.push({
        id,
        title,
        textSnippet,
        source,
        ...(venue ? { venue } : {}),
        ...(url ? { url } : {}),
        publishedAt,
        heuristicScore: scored.score,
        heuristicReason: scored.reason,
        relevancyScore: relevancy?.score ?? null,
        ...(relevancy
          ? {
              relevancySource: relevancy.source,
              relevancyReason: relevancy.reason,
            }
          : {}),
      });
    }

    this.logger.log(
      `stage candidates done: window=${formatDateYYYYMMDD(window.start)}..${formatDateYYYYMMDD(window.end)} items=${out.length}`,
    );
    return out;
  }

  private pickRelevancy(
    record: Record<string, unknown>,
    event: LegacyEvent | undefined,
  ): { score: number; source: RelevancySource; reason: string } | null {
    const reason = this.toStr(record.final_relevancy_reason);
    const centralized = this.toScore(record.final_relevancy_score);
    if (centralized !== null) {
      return { score: centralized, source: 'centralized', reason };
    }
    if (event?.score != null) {
      return { score: event.score, source: 'scoring_event', reason: event.reason };
    }
    if (event?.evalScore != null) {
      return {
        score: event.evalScore,
        source: 'event_eval_json',
        reason: event.reason,
      };
    }
    const legacy = this.toScore(record.latest_relevancy_score);
    if (legacy !== null) {
      return { score: legacy, source: 'legacy_column', reason };
    }
    return null;
  }

  // Rows come back oldest first, so later events overwrite earlier ones.
  private loadLatestEvents(ids: string[]): Map<string, LegacyEvent> {
    const out = new Map<string, LegacyEvent>();
    const columns = tableColumns(this.db, EVENTS);
    if (ids.length === 0 || !columns.has('publication_id')) {
      return out;
    }

    const selected = [
      'publication_id',
      ...['final_relevancy_score', 'final_relevancy_reason', 'eval_json'].filter(
        (c) => columns.has(c),
      ),
    ].join(', ');
    const order = columns.has('created_at') ? 'created_at ASC, rowid ASC' : 'rowid ASC';

    for (let i = 0; i < ids.length; i += EVENT_CHUNK) {
      const chunk = ids.slice(i, i + EVENT_CHUNK);
      const rows: unknown[] = this.db
        .prepare(
          `SELECT ${selected} FROM ${EVENTS}
           WHERE publication_id IN (${chunk.map(() => '?').join(', ')})
           ORDER BY ${order}`,
        )
        .all(...chunk);

      for (const row of rows) {
        const record = this.asRecord(row);
        const id = this.toStr(record?.publication_id);
        if (!record || !id) {
          continue;
        }
        out.set(id, {
          score: this.toScore(record.final_relevancy_score),
          evalScore: this.scoreFromEvalJson(record.eval_json),
          reason: this.toStr(record.final_relevancy_reason),
        });
      }
    }
    return out;
  }

  private scoreFromEvalJson(value: unknown): number | null {
    if (typeof value !== 'string' || !value.trim()) {
      return null;
    }
    try {
      const parsed = this.asRecord(JSON.parse(value));
      return this.toScore(
        parsed?.final_relevancy_score ?? parsed?.relevancy_score,
      );
    } catch {
      return null;
    }
  }

  private snippet(record: Record<string, unknown>): string {
    const summary = cleanText(this.toStr(record.summary));
    const text =
      summary && summary !== NO_SUMMARY_PLACEHOLDER
        ? summary
        : cleanText(this.toStr(record.raw_text));
    return truncate(text, MAX_TEXT_SNIPPET);
  }

  private toScore(value: unknown): number | null {
    const num = typeof value === 'string' && value.trim() ? Number(value) : value;
    if (typeof num !== 'number' || !Number.isFinite(num)) {
      return null;
    }
    return Math.max(0, Math.min(100, num));
  }

  private toStr(value: unknown): string {
    if (typeof value === 'string') {
      return value.trim();
    }
    if (typeof value === 'number' && Number.isFinite(value)) {
      return String(value);
    }
    return '';
  }

  private asRecord(value: unknown): Record<string, unknown> | null {
    if (!value || typeof value !== 'object' || Array.isArray(value)) {
      return null;
    }
    return value as Record<string, unknown>;
  }
}
