import { Injectable, Logger } from '@nestjs/common';
import { safePreview, sanitizeSecret } from '../utils/secret.util';

const RETRYABLE_STATUS = new Set([429, 500, 502, 503, 504]);

export type AiProvider = 'openai' | 'gemini';

export interface GenerateTextOptions {
  timeoutMs?: number;
  jsonMode?: boolean;
  maxOutputTokens?: number;
}

interface FetchResult {
  ok: boolean;
  status: number;
  raw: string;
  json: Record<string, unknown> | null;
}

/**
 * Thin chat-completion client. Returns the model's raw text and leaves
 * decoding to the caller; every failure path resolves to null.
 */
@Injectable()
export class LlmClientService {
  private readonly logger = new Logger(LlmClientService.name);
  private readonly unavailableLogged = new Set<string>();

  get provider(): AiProvider {
    return (process.env.AI_PROVIDER ?? 'openai').toLowerCase() === 'gemini'
      ? 'gemini'
      : 'openai';
  }

  get modelName(): string {
    return this.provider === 'gemini'
      ? (process.env.GEMINI_MODEL ?? 'gemini-2.0-flash')
      : (process.env.OPENAI_MODEL ?? 'gpt-4o-mini');
  }

  isConfigured(): boolean {
    const key =
      this.provider === 'gemini'
        ? process.env.GEMINI_API_KEY
        : process.env.OPENAI_API_KEY;
    return sanitizeSecret(key).length > 0;
  }

  async generateText(
    systemPrompt: string,
    userPrompt: string,
    options: GenerateTextOptions = {},
  ): Promise<string | null> {
    if (this.provider === 'gemini') {
      return this.geminiGenerate(systemPrompt, userPrompt, options);
    }
    return this.openaiGenerate(systemPrompt, userPrompt, options);
  }

  private async geminiGenerate(
    systemPrompt: string,
    userPrompt: string,
    options: GenerateTextOptions,
  ): Promise<string | null> {
    const apiKey = sanitizeSecret(process.env.GEMINI_API_KEY);
    if (!apiKey) {
      this.logUnavailable('GEMINI_API_KEY not configured');
      return null;
    }

    const base =
      process.env.GEMINI_API_BASE ??
      'https://generativelanguage.googleapis.com/v1beta';
    const retries = Number(process.env.GEMINI_MAX_RETRIES ?? 2);
    const backoffSec = Number(process.env.GEMINI_RETRY_BACKOFF_SEC ?? 1.5);
    const timeoutMs =
      options.timeoutMs ?? Number(process.env.GEMINI_TIMEOUT_SEC ?? 60) * 1000;

    const url = `${base}/models/${this.modelName}:generateContent`;
    const payload = {
      contents: [{ role: 'user', parts: [{ text: userPrompt }] }],
      systemInstruction: { parts: [{ text: systemPrompt }] },
      generationConfig: {
        temperature: 0.2,
        maxOutputTokens: options.maxOutputTokens ?? 4000,
        ...(options.jsonMode ? { responseMimeType: 'application/json' } : {}),
      },
    };

    for (let attempt = 1; attempt <= retries + 1; attempt += 1) {
      const response = await this.safeFetchJson(url, {
        method: 'POST',
        headers: {
          'x-goog-api-key': apiKey,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(payload),
        timeoutMs,
      });

      if (!response.ok) {
        if (RETRYABLE_STATUS.has(response.status) && attempt <= retries) {
          await this.sleep(backoffSec * 1000 * 2 ** (attempt - 1));
          continue;
        }
        this.logUnavailable(
          'gemini_generate_failed',
          `${response.status} ${safePreview(response.raw, 180)}`,
        );
        return null;
      }

      const text = this.extractGeminiText(response.json);
      return text || null;
    }
    return null;
  }

  private async openaiGenerate(
    systemPrompt: string,
    userPrompt: string,
    options: GenerateTextOptions,
  ): Promise<string | null> {
    const apiKey = sanitizeSecret(process.env.OPENAI_API_KEY);
    if (!apiKey) {
      this.logUnavailable('OPENAI_API_KEY not configured');
      return null;
    }

    const base = process.env.OPENAI_API_BASE ?? 'https://api.openai.com/v1';
    const retries = Number(process.env.OPENAI_MAX_RETRIES ?? 2);
    const timeoutMs =
      options.timeoutMs ?? Number(process.env.OPENAI_TIMEOUT_SEC ?? 60) * 1000;

    const payload = {
      model: this.modelName,
      ...(options.jsonMode ? { response_format: { type: 'json_object' } } : {}),
      ...(options.maxOutputTokens ? { max_tokens: options.maxOutputTokens } : {}),
      messages: [
        { role: 'system', content: systemPrompt },
        { role: 'user', content: userPrompt },
      ],
      temperature: 0.2,
    };

    for (let attempt = 1; attempt <= retries + 1; attempt += 1) {
      const response = await this.safeFetchJson(`${base}/chat/completions`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(payload),
        timeoutMs,
      });

      if (!response.ok) {
        if (RETRYABLE_STATUS.has(response.status) && attempt <= retries) {
          await this.sleep(1200 * 2 ** (attempt - 1));
          continue;
        }
        this.logUnavailable(
          'openai_generate_failed',
          `${response.status} ${safePreview(response.raw, 180)}`,
        );
        return null;
      }

      const choices: unknown = response.json?.choices;
      const first = this.asRecord(Array.isArray(choices) ? choices[0] : null);
      const message = this.asRecord(first?.message);
      const content =
        typeof message?.content === 'string' ? message.content : '';
      return content || null;
    }
    return null;
  }

  private extractGeminiText(json: unknown): string {
    const root = this.asRecord(json);
    const candidates: unknown = root?.candidates;
    const firstCandidate = this.asRecord(
      Array.isArray(candidates) ? candidates[0] : null,
    );
    const content = this.asRecord(firstCandidate?.content);
    const parts: unknown = content?.parts;
    if (!Array.isArray(parts)) {
      return '';
    }
    return parts
      .map((part: unknown) => this.asRecord(part))
      .map((part) => (typeof part?.text === 'string' ? part.text : ''))
      .join('');
  }

  private asRecord(value: unknown): Record<string, unknown> | null {
    if (!value || typeof value !== 'object' || Array.isArray(value)) {
      return null;
    }
    return value as Record<string, unknown>;
  }

  private async safeFetchJson(
    url: string,
    params: {
      method: 'POST' | 'GET';
      headers: Record<string, string>;
      body?: string;
      timeoutMs: number;
    },
  ): Promise<FetchResult> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), params.timeoutMs);

    try {
      const res = await fetch(url, {
        method: params.method,
        headers: params.headers,
        body: params.body,
        signal: controller.signal,
      });
      const raw = await res.text();
      let json: Record<string, unknown> | null = null;
      try {
        json = this.asRecord(JSON.parse(raw));
      } catch {
        json = null;
      }
      return { ok: res.ok, status: res.status, raw, json };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { ok: false, status: 0, raw: message, json: null };
    } finally {
      clearTimeout(timeout);
    }
  }

  private logUnavailable(reason: string, detail?: string): void {
    if (this.unavailableLogged.has(reason)) {
      return;
    }
    this.unavailableLogged.add(reason);
    if (detail) {
      this.logger.warn(`AI unavailable: ${reason} (${detail})`);
      return;
    }
    this.logger.warn(`AI unavailable: ${reason}`);
  }

  private async sleep(ms: number): Promise<void> {
    await new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}
