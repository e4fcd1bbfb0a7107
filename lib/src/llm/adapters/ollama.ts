/**
 * Ollama Adapter
 *
 * Local models through `/api/chat` with streaming disabled.
 */

import type { AxiosInstance } from 'axios';
import { z } from 'zod';

import { LLMAdapter, type LLMAdapterOptions, type ResolvedCompletionOptions } from '../adapter.js';
import type { LLMMessage, LLMResponse, OllamaConfig } from '../types.js';
import { createHttpClient, mapHttpError, parseResponseBody } from './http.js';

const OllamaChatResponseSchema = z.object({
  model: z.string().min(1),
  message: z.object({ content: z.string() }),
  done_reason: z.string().optional(),
  prompt_eval_count: z.number().int().nonnegative().default(0),
  eval_count: z.number().int().nonnegative().default(0),
});

export interface OllamaAdapterOptions extends LLMAdapterOptions {
  httpClient?: AxiosInstance | undefined;
}

export class OllamaAdapter extends LLMAdapter<OllamaConfig> {
  private readonly http: AxiosInstance;

  constructor(config: OllamaConfig, options: OllamaAdapterOptions = {}) {
    super(config, options);
    this.http =
      options.httpClient ??
      createHttpClient({ baseURL: config.baseUrl, timeoutMs: config.timeoutMs });
  }

  protected async sendRequest(
    messages: LLMMessage[],
    options: ResolvedCompletionOptions
  ): Promise<LLMResponse> {
    const body: Record<string, unknown> = {
      model: this.config.model,
      messages: messages.map((m) => ({ role: m.role, content: m.content })),
      stream: false,
      options: {
        temperature: options.temperature,
        num_predict: options.maxTokens,
        ...(options.stopSequences && { stop: options.stopSequences }),
      },
    };
    if (options.responseFormat === 'json') {
      body['format'] = 'json';
    }

    let data: unknown;
    try {
      ({ data } = await this.http.post<unknown>('/api/chat', body));
    } catch (error) {
      throw mapHttpError(error, this.config.provider);
    }

    const parsed = parseResponseBody(OllamaChatResponseSchema, data, this.config.provider);

    return {
      content: parsed.message.content,
      model: parsed.model,
      usage: {
        inputTokens: parsed.prompt_eval_count,
        outputTokens: parsed.eval_count,
      },
      finishReason: parsed.done_reason,
    };
  }
}
