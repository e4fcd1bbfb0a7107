/**
 * Google Gemini Adapter
 *
 * Calls the `models/{model}:generateContent` REST endpoint. Gemini names the
 * assistant role `model` and takes the system prompt as `systemInstruction`.
 */

import type { AxiosInstance } from 'axios';
import { z } from 'zod';

import { LLMAdapter, type LLMAdapterOptions, type ResolvedCompletionOptions } from '../adapter.js';
import type { GeminiConfig, LLMMessage, LLMResponse } from '../types.js';
import { ContentFilteredError } from '../errors.js';
import { createHttpClient, mapHttpError, parseResponseBody } from './http.js';

const GenerateContentResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({ parts: z.array(z.object({ text: z.string().optional() })) })
          .optional(),
        finishReason: z.string().optional(),
      })
    )
    .default([]),
  promptFeedback: z.object({ blockReason: z.string().optional() }).optional(),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().int().nonnegative().default(0),
      candidatesTokenCount: z.number().int().nonnegative().default(0),
    })
    .optional(),
  modelVersion: z.string().optional(),
});

export interface GeminiAdapterOptions extends LLMAdapterOptions {
  httpClient?: AxiosInstance | undefined;
}

export class GeminiAdapter extends LLMAdapter<GeminiConfig> {
  private readonly http: AxiosInstance;

  constructor(config: GeminiConfig, options: GeminiAdapterOptions = {}) {
    super(config, options);
    this.http =
      options.httpClient ??
      createHttpClient({
        baseURL: config.baseUrl,
        timeoutMs: config.timeoutMs,
        headers: { 'x-goog-api-key': config.apiKey },
      });
  }

  protected async sendRequest(
    messages: LLMMessage[],
    options: ResolvedCompletionOptions
  ): Promise<LLMResponse> {
    const [systemMessage, conversationMessages] = this.extractSystemMessage(messages);

    const body: Record<string, unknown> = {
      contents: conversationMessages.map((m) => ({
        role: m.role === 'assistant' ? 'model' : 'user',
        parts: [{ text: m.content }],
      })),
      generationConfig: {
        temperature: options.temperature,
        maxOutputTokens: options.maxTokens,
        ...(options.stopSequences && { stopSequences: options.stopSequences }),
        ...(options.responseFormat === 'json' && {
          responseMimeType: 'application/json',
        }),
      },
    };
    if (systemMessage !== undefined) {
      body['systemInstruction'] = { parts: [{ text: systemMessage }] };
    }

    let data: unknown;
    try {
      ({ data } = await this.http.post<unknown>(
        `/models/${encodeURIComponent(this.config.model)}:generateContent`,
        body
      ));
    } catch (error) {
      throw mapHttpError(error, this.config.provider);
    }

    const parsed = parseResponseBody(GenerateContentResponseSchema, data, this.config.provider);
    const [candidate] = parsed.candidates;

    if (parsed.promptFeedback?.blockReason || candidate?.finishReason === 'SAFETY') {
      throw new ContentFilteredError(
        `Response blocked: ${parsed.promptFeedback?.blockReason ?? 'SAFETY'}`,
        this.config.provider
      );
    }

    return {
      content: (candidate?.content?.parts ?? []).map((p) => p.text ?? '').join(''),
      model: parsed.modelVersion ?? this.config.model,
      usage: {
        inputTokens: parsed.usageMetadata?.promptTokenCount ?? 0,
        outputTokens: parsed.usageMetadata?.candidatesTokenCount ?? 0,
      },
      finishReason: candidate?.finishReason,
    };
  }
}
