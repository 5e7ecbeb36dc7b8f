import { Injectable, Logger } from '@nestjs/common';
import {
  ExternalJudgment,
  ParseStrategy,
  ParsedRanking,
} from '../types/ranking.types';
import { safePreview } from '../utils/secret.util';

const MAX_REPAIR_ATTEMPTS = 50;
const MAX_FINDINGS = 3;
const JUDGMENT_LIST_KEYS = ['rankings', 'results', 'items'];

interface DecodeAttempt {
  value: unknown;
  strategy: ParseStrategy;
}

interface CutPoint {
  end: number;
  closers: string;
}

interface BracketScan {
  complete: boolean;
  block: string;
  cuts: CutPoint[];
}

/**
 * Recovers a ranking from untrusted model output: fenced, prefixed,
 * truncated or otherwise malformed JSON.
 */
@Injectable()
export class RerankParserService {
  private readonly logger = new Logger(RerankParserService.name);

  parseRanking(
    text: string | null | undefined,
    expectedCount = 0,
  ): ParsedRanking | null {
    const trimmed = (text ?? '').trim();
    if (!trimmed) {
      return null;
    }

    let parsed: ParsedRanking | null = null;
    for (const attempt of this.decodeAttempts(trimmed)) {
      parsed = this.interpret(attempt.value, attempt.strategy);
      if (parsed) {
        break;
      }
    }
    parsed = parsed ?? this.regexExtract(trimmed);

    if (!parsed) {
      this.logger.warn(
        `ranking response not recoverable: ${safePreview(trimmed)}`,
      );
      return null;
    }

    if (expectedCount > 0 && parsed.rankedIds.length < expectedCount) {
      this.logger.warn(
        `ranking under-filled: ${parsed.rankedIds.length}/${expectedCount} ids (${parsed.strategy})`,
      );
    }
    return parsed;
  }

  /** First JSON object recoverable from the text, or null. */
  decodeObject(text: string | null | undefined): Record<string, unknown> | null {
    const trimmed = (text ?? '').trim();
    if (!trimmed) {
      return null;
    }
    for (const attempt of this.decodeAttempts(trimmed)) {
      const record = this.asRecord(attempt.value);
      if (record) {
        return record;
      }
    }
    return null;
  }

  private *decodeAttempts(text: string): Generator<DecodeAttempt> {
    const direct = this.tryJsonParse(text);
    if (direct !== undefined) {
      yield { value: direct, strategy: 'direct' };
    }

    const unfenced = this.stripCodeFence(text);
    if (unfenced !== text) {
      const fenced = this.tryJsonParse(unfenced);
      if (fenced !== undefined) {
        yield { value: fenced, strategy: 'fenced' };
      }
    }

    for (const start of this.openerPositions(unfenced)) {
      const scan = this.scanFrom(unfenced, start);
      if (scan.complete) {
        const block = this.tryJsonParse(scan.block);
        if (block !== undefined) {
          yield { value: block, strategy: 'bracket' };
        }
        continue;
      }
      const repaired = this.repairTruncated(unfenced, start, scan.cuts);
      if (repaired !== undefined) {
        yield { value: repaired, strategy: 'repaired' };
      }
    }
  }

  private interpret(
    value: unknown,
    strategy: ParseStrategy,
  ): ParsedRanking | null {
    if (Array.isArray(value)) {
      return this.fromArray(value, strategy);
    }

    const record = this.asRecord(value);
    if (!record) {
      return null;
    }

    let judgments: ExternalJudgment[] = [];
    for (const key of JUDGMENT_LIST_KEYS) {
      const list = record[key];
      if (Array.isArray(list)) {
        judgments = this.toJudgments(list);
        if (judgments.length > 0) {
          break;
        }
      }
    }

    const rankedIds = Array.isArray(record.ranked_ids)
      ? this.toIdList(record.ranked_ids)
      : this.orderJudgments(judgments);
    if (rankedIds.length === 0) {
      return null;
    }
    return { rankedIds, judgments, strategy };
  }

  private fromArray(
    list: unknown[],
    strategy: ParseStrategy,
  ): ParsedRanking | null {
    if (list.length > 0 && list.every((v) => typeof v === 'string')) {
      const rankedIds = this.toIdList(list);
      return rankedIds.length > 0 ? { rankedIds, judgments: [], strategy } : null;
    }

    const judgments = this.toJudgments(list);
    const rankedIds = this.orderJudgments(judgments);
    if (rankedIds.length === 0) {
      return null;
    }
    return { rankedIds, judgments, strategy };
  }

  private toJudgments(list: unknown[]): ExternalJudgment[] {
    const out: ExternalJudgment[] = [];
    for (const entry of list) {
      const row = this.asRecord(entry);
      if (!row) {
        continue;
      }
      const itemId = this.toId(row.pub_id ?? row.item_id ?? row.id);
      if (!itemId) {
        continue;
      }
      const title = typeof row.title === 'string' ? row.title : undefined;
      out.push({
        itemId,
        ...(title !== undefined ? { title } : {}),
        modelScore: this.toScore(row.llm_score ?? row.model_score ?? row.score),
        modelRank: this.toRank(row.llm_rank ?? row.model_rank ?? row.rank),
        modelReason: this.toText(
          row.llm_reason ?? row.model_reason ?? row.reason,
        ),
        modelWhy: this.toText(
          row.llm_why_it_matters ?? row.llm_why ?? row.model_why,
        ),
        modelFindings: this.toFindings(
          row.llm_key_findings ?? row.llm_findings ?? row.model_findings,
        ),
      });
    }
    return out;
  }

  private orderJudgments(judgments: ExternalJudgment[]): string[] {
    const ranked = judgments.every((j) => j.modelRank !== null)
      ? [...judgments].sort(
          (a, b) => (a.modelRank ?? 0) - (b.modelRank ?? 0),
        )
      : judgments;
    return ranked.map((j) => j.itemId);
  }

  private regexExtract(text: string): ParsedRanking | null {
    const arrayMatch = /"?ranked_ids"?\s*:\s*\[([^\]]*)/.exec(text);
    if (arrayMatch) {
      const ids = this.quotedTokens(arrayMatch[1] ?? '');
      if (ids.length > 0) {
        return { rankedIds: ids, judgments: [], strategy: 'regex' };
      }
    }

    const ids: string[] = [];
    const pairRe = /"(?:pub_id|item_id|id)"\s*:\s*"([^"\\]+)"/g;
    let match: RegExpExecArray | null;
    while ((match = pairRe.exec(text)) !== null) {
      const id = (match[1] ?? '').trim();
      if (id && !ids.includes(id)) {
        ids.push(id);
      }
    }
    return ids.length > 0
      ? { rankedIds: ids, judgments: [], strategy: 'regex' }
      : null;
  }

  private quotedTokens(body: string): string[] {
    const out: string[] = [];
    const tokenRe = /"([^"\\]+)"/g;
    let match: RegExpExecArray | null;
    while ((match = tokenRe.exec(body)) !== null) {
      const token = (match[1] ?? '').trim();
      if (token) {
        out.push(token);
      }
    }
    return out;
  }

  private stripCodeFence(text: string): string {
    return text
      .replace(/^```[\w-]*[ \t]*\r?\n?/, '')
      .replace(/\r?\n?```\s*$/, '')
      .trim();
  }

  private openerPositions(text: string): number[] {
    return [text.indexOf('{'), text.indexOf('[')]
      .filter((pos) => pos !== -1)
      .sort((a, b) => a - b);
  }

  private scanFrom(text: string, start: number): BracketScan {
    const stack: string[] = [];
    const cuts: CutPoint[] = [];
    let inString = false;
    let escaped = false;

    for (let i = start; i < text.length; i += 1) {
      const ch = text[i];
      if (inString) {
        if (escaped) {
          escaped = false;
        } else if (ch === '\\') {
          escaped = true;
        } else if (ch === '"') {
          inString = false;
          cuts.push({ end: i + 1, closers: this.closersFor(stack) });
        }
        continue;
      }

      if (ch === '"') {
        inString = true;
      } else if (ch === '{' || ch === '[') {
        stack.push(ch === '{' ? '}' : ']');
        cuts.push({ end: i + 1, closers: this.closersFor(stack) });
      } else if (ch === '}' || ch === ']') {
        if (stack.pop() !== ch) {
          return { complete: false, block: text.slice(start, i), cuts };
        }
        if (stack.length === 0) {
          return { complete: true, block: text.slice(start, i + 1), cuts: [] };
        }
        cuts.push({ end: i + 1, closers: this.closersFor(stack) });
      } else if (ch === ',') {
        cuts.push({ end: i, closers: this.closersFor(stack) });
      }
    }

    // A trailing number or literal may still be complete.
    if (!inString && cuts[cuts.length - 1]?.end !== text.length) {
      cuts.push({ end: text.length, closers: this.closersFor(stack) });
    }
    return { complete: false, block: text.slice(start), cuts };
  }

  // Walks back from the latest cut so the longest valid prefix wins.
  private repairTruncated(
    text: string,
    start: number,
    cuts: CutPoint[],
  ): unknown {
    let tries = 0;
    for (let i = cuts.length - 1; i >= 0 && tries < MAX_REPAIR_ATTEMPTS; i -= 1) {
      const cut = cuts[i];
      if (!cut) {
        continue;
      }
      tries += 1;
      const prefix = text.slice(start, cut.end).replace(/[,:\s]+$/, '');
      const value = this.tryJsonParse(`${prefix}${cut.closers}`);
      if (value !== undefined) {
        return value;
      }
    }
    return undefined;
  }

  private closersFor(stack: string[]): string {
    return [...stack].reverse().join('');
  }

  private toIdList(list: unknown[]): string[] {
    return list
      .map((v) => this.toId(v))
      .filter((id): id is string => id !== null);
  }

  private toId(value: unknown): string | null {
    if (typeof value === 'number' && Number.isFinite(value)) {
      return String(value);
    }
    if (typeof value !== 'string') {
      return null;
    }
    const id = value.trim();
    return id || null;
  }

  private toScore(value: unknown): number | null {
    const num =
      typeof value === 'string' && value.trim() ? Number(value) : value;
    if (typeof num !== 'number' || !Number.isFinite(num)) {
      return null;
    }
    return Math.max(0, Math.min(100, num));
  }

  private toRank(value: unknown): number | null {
    const num =
      typeof value === 'string' && value.trim() ? Number(value) : value;
    if (typeof num !== 'number' || !Number.isInteger(num) || num < 1) {
      return null;
    }
    return num;
  }

  private toText(value: unknown): string {
    return typeof value === 'string' ? value.trim() : '';
  }

  private toFindings(value: unknown): string[] {
    if (!Array.isArray(value)) {
      return [];
    }
    return value
      .filter((v): v is string => typeof v === 'string')
      .map((v) => v.trim())
      .filter(Boolean)
      .slice(0, MAX_FINDINGS);
  }

  private tryJsonParse(value: string): unknown {
    try {
      const parsed: unknown = JSON.parse(value);
      return parsed;
    } catch {
      return undefined;
    }
  }

  private asRecord(value: unknown): Record<string, unknown> | null {
    if (!value || typeof value !== 'object' || Array.isArray(value)) {
      return null;
    }
    return value as Record<string, unknown>;
  }
}
