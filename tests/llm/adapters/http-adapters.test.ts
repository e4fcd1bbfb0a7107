/**
 * Unit Tests for the REST-based LLM adapters (OpenAI-compatible, Gemini, Ollama)
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { AxiosError, AxiosHeaders, type AxiosInstance } from 'axios';
import { OpenAICompatibleAdapter } from '../../../lib/src/llm/adapters/openai-compatible.js';
import { GeminiAdapter } from '../../../lib/src/llm/adapters/gemini.js';
import { OllamaAdapter } from '../../../lib/src/llm/adapters/ollama.js';
import { mapHttpError, parseRetryAfter } from '../../../lib/src/llm/adapters/http.js';
import {
  AuthenticationError,
  ContentFilteredError,
  InvalidResponseError,
  NetworkError,
  RateLimitError,
  ServerError,
  TimeoutError,
} from '../../../lib/src/llm/errors.js';
import {
  GeminiConfigSchema,
  GroqConfigSchema,
  OllamaConfigSchema,
  OpenAIConfigSchema,
} from '../../../lib/src/llm/types.js';
import { silentLogger } from '../../fixtures/logger.js';

// =============================================================================
// Mock Setup
// =============================================================================

function createMockHttpClient() {
  const post = vi.fn();
  return { post, client: { post } as unknown as AxiosInstance };
}

function httpError(status: number, data: unknown = {}, headers: Record<string, string> = {}) {
  return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', undefined, undefined, {
    status,
    statusText: 'error',
    data,
    headers,
    config: { headers: new AxiosHeaders() },
  });
}

const messages = [
  { role: 'system' as const, content: 'Luôn trả lời bằng tiếng Việt.' },
  { role: 'user' as const, content: 'Thời hiệu khởi kiện là bao lâu?' },
];

// =============================================================================
// OpenAI-compatible
// =============================================================================

describe('OpenAICompatibleAdapter', () => {
  let http: ReturnType<typeof createMockHttpClient>;

  beforeEach(() => {
    http = createMockHttpClient();
  });

  const createGroq = () =>
    new OpenAICompatibleAdapter(
      GroqConfigSchema.parse({
        provider: 'groq',
        model: 'llama-3.3-70b-versatile',
        apiKey: 'test-api-key',
      }),
      { httpClient: http.client, logger: silentLogger, retry: { maxRetries: 0 } }
    );

  it('should post chat completions and map the response', async () => {
    http.post.mockResolvedValue({
      data: {
        model: 'llama-3.3-70b-versatile',
        choices: [{ message: { content: 'Hai năm.' }, finish_reason: 'stop' }],
        usage: { prompt_tokens: 12, completion_tokens: 3 },
      },
    });

    const response = await createGroq().complete(messages);

    expect(http.post).toHaveBeenCalledWith('/chat/completions', {
      model: 'llama-3.3-70b-versatile',
      messages: [
        { role: 'system', content: 'Luôn trả lời bằng tiếng Việt.' },
        { role: 'user', content: 'Thời hiệu khởi kiện là bao lâu?' },
      ],
      temperature: 0.3,
      max_tokens: 2048,
    });
    expect(response).toEqual({
      content: 'Hai năm.',
      model: 'llama-3.3-70b-versatile',
      usage: { inputTokens: 12, outputTokens: 3 },
      finishReason: 'stop',
    });
  });

  it('should request JSON output when asked', async () => {
    http.post.mockResolvedValue({
      data: {
        model: 'gpt-4o-mini',
        choices: [{ message: { content: '{"keywords":[]}' }, finish_reason: 'stop' }],
      },
    });
    const adapter = new OpenAICompatibleAdapter(
      OpenAIConfigSchema.parse({ provider: 'openai', model: 'gpt-4o-mini', apiKey: 'test-api-key' }),
      { httpClient: http.client, logger: silentLogger }
    );

    await adapter.sendMessage('Trích xuất từ khóa', { responseFormat: 'json' });

    expect(http.post).toHaveBeenCalledWith(
      '/chat/completions',
      expect.objectContaining({ response_format: { type: 'json_object' } })
    );
  });

  it('should raise ContentFilteredError on content_filter', async () => {
    http.post.mockResolvedValue({
      data: {
        model: 'llama-3.3-70b-versatile',
        choices: [{ message: { content: null }, finish_reason: 'content_filter' }],
      },
    });

    await expect(createGroq().complete(messages)).rejects.toBeInstanceOf(ContentFilteredError);
  });

  it('should raise InvalidResponseError on a malformed body', async () => {
    http.post.mockResolvedValue({ data: { choices: [] } });

    await expect(createGroq().complete(messages)).rejects.toBeInstanceOf(InvalidResponseError);
  });

  it('should map HTTP failures', async () => {
    http.post.mockRejectedValue(httpError(401, { error: { message: 'Invalid API Key' } }));

    await expect(createGroq().complete(messages)).rejects.toThrow(
      'Authentication failed: Invalid API Key'
    );
  });
});

// =============================================================================
// Gemini
// =============================================================================

describe('GeminiAdapter', () => {
  let http: ReturnType<typeof createMockHttpClient>;

  beforeEach(() => {
    http = createMockHttpClient();
  });

  const createGemini = () =>
    new GeminiAdapter(
      GeminiConfigSchema.parse({
        provider: 'google_gemini',
        model: 'gemini-1.5-flash',
        apiKey: 'test-api-key',
      }),
      { httpClient: http.client, logger: silentLogger, retry: { maxRetries: 0 } }
    );

  it('should send system instruction and model roles', async () => {
    http.post.mockResolvedValue({
      data: {
        candidates: [{ content: { parts: [{ text: 'Hai ' }, { text: 'năm.' }] }, finishReason: 'STOP' }],
        usageMetadata: { promptTokenCount: 8, candidatesTokenCount: 2 },
      },
    });

    const response = await createGemini().complete([
      ...messages,
      { role: 'assistant', content: 'Bạn hỏi về lĩnh vực nào?' },
      { role: 'user', content: 'Dân sự.' },
    ]);

    expect(http.post).toHaveBeenCalledWith('/models/gemini-1.5-flash:generateContent', {
      contents: [
        { role: 'user', parts: [{ text: 'Thời hiệu khởi kiện là bao lâu?' }] },
        { role: 'model', parts: [{ text: 'Bạn hỏi về lĩnh vực nào?' }] },
        { role: 'user', parts: [{ text: 'Dân sự.' }] },
      ],
      generationConfig: { temperature: 0.3, maxOutputTokens: 2048 },
      systemInstruction: { parts: [{ text: 'Luôn trả lời bằng tiếng Việt.' }] },
    });
    expect(response).toEqual({
      content: 'Hai năm.',
      model: 'gemini-1.5-flash',
      usage: { inputTokens: 8, outputTokens: 2 },
      finishReason: 'STOP',
    });
  });

  it('should raise ContentFilteredError when the prompt is blocked', async () => {
    http.post.mockResolvedValue({ data: { promptFeedback: { blockReason: 'SAFETY' } } });

    await expect(createGemini().complete(messages)).rejects.toThrow('Response blocked: SAFETY');
  });
});

// =============================================================================
// Ollama
// =============================================================================

describe('OllamaAdapter', () => {
  it('should call /api/chat without streaming', async () => {
    const http = createMockHttpClient();
    http.post.mockResolvedValue({
      data: {
        model: 'qwen2.5:7b',
        message: { role: 'assistant', content: '{"keywords":["thời hiệu"]}' },
        done_reason: 'stop',
        prompt_eval_count: 20,
        eval_count: 6,
      },
    });
    const adapter = new OllamaAdapter(
      OllamaConfigSchema.parse({ provider: 'ollama', model: 'qwen2.5:7b' }),
      { httpClient: http.client, logger: silentLogger }
    );

    const response = await adapter.sendMessage('Trích xuất từ khóa', {
      responseFormat: 'json',
      temperature: 0,
    });

    expect(http.post).toHaveBeenCalledWith('/api/chat', {
      model: 'qwen2.5:7b',
      messages: [{ role: 'user', content: 'Trích xuất từ khóa' }],
      stream: false,
      options: { temperature: 0, num_predict: 2048 },
      format: 'json',
    });
    expect(response.content).toBe('{"keywords":["thời hiệu"]}');
    expect(response.usage).toEqual({ inputTokens: 20, outputTokens: 6 });
  });
});

// =============================================================================
// HTTP helpers
// =============================================================================

describe('mapHttpError', () => {
  it('should map 429 with retry-after', () => {
    const error = mapHttpError(httpError(429, {}, { 'retry-after': '3' }), 'groq');

    expect(error).toBeInstanceOf(RateLimitError);
    expect(error.retryAfterMs).toBe(3000);
  });

  it('should map 5xx to ServerError', () => {
    expect(mapHttpError(httpError(502), 'openai')).toBeInstanceOf(ServerError);
  });

  it('should map 403 to AuthenticationError', () => {
    expect(mapHttpError(httpError(403), 'openai')).toBeInstanceOf(AuthenticationError);
  });

  it('should map timeouts and missing responses', () => {
    expect(mapHttpError(new AxiosError('timeout', 'ECONNABORTED'), 'ollama')).toBeInstanceOf(
      TimeoutError
    );
    expect(mapHttpError(new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED'), 'ollama')).toBeInstanceOf(
      NetworkError
    );
  });
});

describe('parseRetryAfter', () => {
  it('should convert seconds to milliseconds', () => {
    expect(parseRetryAfter('2')).toBe(2000);
    expect(parseRetryAfter(1.5)).toBe(1500);
  });

  it('should ignore unusable values', () => {
    expect(parseRetryAfter(undefined)).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
    expect(parseRetryAfter('-1')).toBeUndefined();
  });
});
