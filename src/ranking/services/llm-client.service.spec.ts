import { Logger } from '@nestjs/common';
import { LlmClientService } from './llm-client.service';

const ENV_KEYS = [
  'AI_PROVIDER',
  'OPENAI_API_KEY',
  'GEMINI_API_KEY',
  'OPENAI_MAX_RETRIES',
];

describe('LlmClientService', () => {
  const saved: Record<string, string | undefined> = {};
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
    warnSpy = jest
      .spyOn(Logger.prototype, 'warn')
      .mockImplementation(() => undefined);
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = saved[key];
      if (value == null) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    jest.restoreAllMocks();
  });

  it('deduplicates unavailable logs by reason key', async () => {
    process.env.AI_PROVIDER = 'gemini';
    const service = new LlmClientService();

    await expect(service.generateText('system', 'user')).resolves.toBeNull();
    await expect(service.generateText('system', 'user')).resolves.toBeNull();
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy).toHaveBeenCalledWith(
      'AI unavailable: GEMINI_API_KEY not configured',
    );
  });

  it('returns the raw completion text with a sanitized key', async () => {
    process.env.OPENAI_API_KEY = ' test-secret\n';
    const fetchSpy = jest.spyOn(global, 'fetch').mockResolvedValue(
      new Response(
        JSON.stringify({
          choices: [{ message: { content: '```json\n{"ranked_ids": []}\n```' } }],
        }),
        { status: 200 },
      ),
    );
    const service = new LlmClientService();

    const text = await service.generateText('system', 'user', {
      timeoutMs: 1000,
    });

    expect(text).toBe('```json\n{"ranked_ids": []}\n```');
    const init = fetchSpy.mock.calls[0]?.[1];
    expect(init?.headers).toEqual({
      Authorization: 'Bearer test-secret',
      'Content-Type': 'application/json',
    });
  });

  it('gives up without retrying on a non-retryable status', async () => {
    process.env.OPENAI_API_KEY = 'test-secret';
    const fetchSpy = jest
      .spyOn(global, 'fetch')
      .mockResolvedValue(new Response('bad request', { status: 400 }));
    const service = new LlmClientService();

    await expect(service.generateText('system', 'user')).resolves.toBeNull();
    expect(fetchSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy).toHaveBeenCalledWith(
      'AI unavailable: openai_generate_failed (400 bad request)',
    );
  });

  it('treats a network error as unavailable', async () => {
    process.env.OPENAI_API_KEY = 'test-secret';
    process.env.OPENAI_MAX_RETRIES = '0';
    jest.spyOn(global, 'fetch').mockRejectedValue(new Error('socket hang up'));
    const service = new LlmClientService();

    await expect(service.generateText('system', 'user')).resolves.toBeNull();
  });

  it('reports whether the active provider has a key', () => {
    const service = new LlmClientService();
    expect(service.isConfigured()).toBe(false);

    process.env.OPENAI_API_KEY = 'test-secret';
    expect(service.isConfigured()).toBe(true);
    expect(service.modelName).toBe(process.env.OPENAI_MODEL ?? 'gpt-4o-mini');
  });
});
