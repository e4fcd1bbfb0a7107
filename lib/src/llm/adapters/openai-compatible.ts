/**
 * OpenAI-compatible chat completions adapter, used for OpenAI and Groq.
 */

import type { AxiosInstance } from 'axios';
import { z } from 'zod';

import { LLMAdapter, type LLMAdapterOptions, type ResolvedCompletionOptions } from '../adapter.js';
import type { GroqConfig, LLMMessage, LLMResponse, OpenAIConfig } from '../types.js';
import { ContentFilteredError } from '../errors.js';
import { createHttpClient, mapHttpError, parseResponseBody } from './http.js';

const ChatCompletionResponseSchema = z.object({
  model: z.string().min(1),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
        finish_reason: z.string().nullable().optional(),
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().int().nonnegative(),
      completion_tokens: z.number().int().nonnegative(),
    })
    .optional(),
});

export interface OpenAICompatibleAdapterOptions extends LLMAdapterOptions {
  /** Preconfigured HTTP client; tests inject a stub here */
  httpClient?: AxiosInstance | undefined;
}

export class OpenAICompatibleAdapter extends LLMAdapter<OpenAIConfig | GroqConfig> {
  private readonly http: AxiosInstance;

  constructor(
    config: OpenAIConfig | GroqConfig,
    options: OpenAICompatibleAdapterOptions = {}
  ) {
    super(config, options);

    const headers: Record<string, string> = {
      Authorization: `Bearer ${config.apiKey}`,
    };
    if (config.provider === 'openai' && config.organization) {
      headers['OpenAI-Organization'] = config.organization;
    }

    this.http =
      options.httpClient ??
      createHttpClient({ baseURL: config.baseUrl, timeoutMs: config.timeoutMs, headers });
  }

  protected async sendRequest(
    messages: LLMMessage[],
    options: ResolvedCompletionOptions
  ): Promise<LLMResponse> {
    const body: Record<string, unknown> = {
      model: this.config.model,
      messages: messages.map((m) => ({ role: m.role, content: m.content })),
      temperature: options.temperature,
      max_tokens: options.maxTokens,
    };
    if (options.stopSequences !== undefined) {
      body['stop'] = options.stopSequences;
    }
    if (options.responseFormat === 'json') {
      body['response_format'] = { type: 'json_object' };
    }

    let data: unknown;
    try {
      ({ data } = await this.http.post<unknown>('/chat/completions', body));
    } catch (error) {
      throw mapHttpError(error, this.config.provider);
    }

    const parsed = parseResponseBody(ChatCompletionResponseSchema, data, this.config.provider);
    const [choice] = parsed.choices;
    if (choice?.finish_reason === 'content_filter') {
      throw new ContentFilteredError('Response blocked by content filter', this.config.provider);
    }

    return {
      content: choice?.message.content ?? '',
      model: parsed.model,
      usage: {
        inputTokens: parsed.usage?.prompt_tokens ?? 0,
        outputTokens: parsed.usage?.completion_tokens ?? 0,
      },
      finishReason: choice?.finish_reason ?? undefined,
    };
  }
}
