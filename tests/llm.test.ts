import { describe, it, expect, vi, beforeEach } from 'vitest';

const { generateTextMock, createGoogleMock } = vi.hoisted(() => ({
  generateTextMock: vi.fn(),
  createGoogleMock: vi.fn((_options: { apiKey?: string }) => (modelId: string) => ({ modelId })),
}));

vi.mock('ai', async (importOriginal) => {
  const actual = await importOriginal<typeof import('ai')>();
  return { ...actual, generateText: generateTextMock };
});

vi.mock('@ai-sdk/google', () => ({
  createGoogleGenerativeAI: createGoogleMock,
}));

import { APICallError, LoadAPIKeyError, RetryError } from 'ai';
import { GeminiClient, toModelCallError, SAMPLING } from '../src/llm.js';
import { ModelCallError } from '../src/errors.js';

function apiError(statusCode: number, message = 'upstream said no') {
  return new APICallError({
    message,
    url: 'https://example.test/v1/models',
    requestBodyValues: {},
    statusCode,
  });
}

const request = {
  prompt: 'Write a script',
  model: 'gemini-1.5-flash',
  temperature: 0.3,
  maxTokens: 1024,
};

describe('GeminiClient', () => {
  beforeEach(() => {
    generateTextMock.mockReset();
    createGoogleMock.mockClear();
  });

  it('should pass the request and sampling settings to generateText', async () => {
    generateTextMock.mockResolvedValue({
      text: '```powershell\nGet-Date\n```',
      usage: { promptTokens: 12, completionTokens: 5, totalTokens: 17 },
    });

    const client = new GeminiClient({ apiKey: 'test-secret', maxRetries: 1 });
    const result = await client.generate(request);

    expect(createGoogleMock).toHaveBeenCalledWith({ apiKey: 'test-secret' });
    expect(generateTextMock).toHaveBeenCalledWith(expect.objectContaining({
      model: { modelId: 'gemini-1.5-flash' },
      prompt: 'Write a script',
      temperature: 0.3,
      maxTokens: 1024,
      topP: SAMPLING.topP,
      topK: SAMPLING.topK,
      maxRetries: 1,
    }));
    expect(result.text).toBe('```powershell\nGet-Date\n```');
    expect(result.usage).toEqual({ promptTokens: 12, completionTokens: 5, totalTokens: 17 });
    expect(result.durationMs).toBeGreaterThanOrEqual(0);
  });

  it('should classify API failures', async () => {
    generateTextMock.mockRejectedValue(apiError(429));
    const client = new GeminiClient({ apiKey: 'test-secret' });

    await expect(client.generate(request)).rejects.toMatchObject({
      name: 'ModelCallError',
      kind: 'rate_limit',
      status: 429,
    });
  });

  it('should time out a slow request', async () => {
    generateTextMock.mockImplementation(({ abortSignal }: { abortSignal: AbortSignal }) =>
      new Promise((_, reject) => {
        abortSignal.addEventListener('abort', () => reject(new Error('aborted')));
      })
    );
    const client = new GeminiClient({ apiKey: 'test-secret', timeoutMs: 5 });

    await expect(client.generate(request)).rejects.toMatchObject({
      kind: 'timeout',
      message: 'Model request timed out after 5ms',
    });
  });

  it('should honour a caller abort', async () => {
    generateTextMock.mockImplementation(({ abortSignal }: { abortSignal: AbortSignal }) =>
      new Promise((_, reject) => {
        if (abortSignal.aborted) reject(abortSignal.reason);
        abortSignal.addEventListener('abort', () => reject(abortSignal.reason));
      })
    );
    const controller = new AbortController();
    controller.abort();
    const client = new GeminiClient({ apiKey: 'test-secret' });

    await expect(client.generate({ ...request, signal: controller.signal })).rejects.toMatchObject({
      kind: 'aborted',
      message: 'Model request was cancelled',
    });
  });
});

describe('toModelCallError', () => {
  it('should map auth statuses', () => {
    expect(toModelCallError(apiError(401)).kind).toBe('auth');
    expect(toModelCallError(apiError(403)).kind).toBe('auth');
  });

  it('should keep the status and message of other API errors', () => {
    const err = toModelCallError(apiError(500, 'Internal error'));
    expect(err.kind).toBe('upstream');
    expect(err.status).toBe(500);
    expect(err.message).toBe('Model API error 500: Internal error');
  });

  it('should unwrap retry errors', () => {
    const retry = new RetryError({
      message: 'Failed after 3 attempts',
      reason: 'maxRetriesExceeded',
      errors: [apiError(503), apiError(429)],
    });
    expect(toModelCallError(retry).kind).toBe('rate_limit');
  });

  it('should treat a missing key as an auth failure', () => {
    expect(toModelCallError(new LoadAPIKeyError({ message: 'missing key' })).kind).toBe('auth');
  });

  it('should tell a timeout from a cancellation', () => {
    const timedOut = Object.assign(new Error('signal timed out'), { name: 'TimeoutError' });
    const cancelled = Object.assign(new Error('This operation was aborted'), { name: 'AbortError' });

    expect(toModelCallError(timedOut)).toMatchObject({ kind: 'timeout', message: 'Model request timed out' });
    expect(toModelCallError(cancelled)).toMatchObject({ kind: 'aborted', message: 'Model request was cancelled' });
  });

  it('should fall back to a network failure', () => {
    const err = toModelCallError(new Error('socket hang up'));
    expect(err.kind).toBe('network');
    expect(err.message).toBe('Model request failed: socket hang up');
    expect(toModelCallError('boom').message).toBe('Model request failed: boom');
  });

  it('should pass a ModelCallError through', () => {
    const original = new ModelCallError('empty_response', 'nothing');
    expect(toModelCallError(original)).toBe(original);
  });
});
