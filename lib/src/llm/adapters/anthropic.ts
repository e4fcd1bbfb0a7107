/**
 * Anthropic LLM Adapter
 *
 * Claude models through the official SDK. The SDK's own retries are
 * disabled; retries go through the shared backoff in `LLMAdapter`.
 */

import Anthropic from '@anthropic-ai/sdk';
import type {
  ContentBlock,
  MessageCreateParamsNonStreaming,
  MessageParam,
  TextBlock,
} from '@anthropic-ai/sdk/resources/messages';

import { LLMAdapter, type LLMAdapterOptions, type ResolvedCompletionOptions } from '../adapter.js';
import {
  type AnthropicConfig,
  type LLMMessage,
  type LLMResponse,
  LLMProvider,
} from '../types.js';
import {
  LLMError,
  RateLimitError,
  AuthenticationError,
  InvalidRequestError,
  ModelNotFoundError,
  TimeoutError,
  ServerError,
  NetworkError,
} from '../errors.js';
import { parseRetryAfter } from './http.js';

export class AnthropicAdapter extends LLMAdapter<AnthropicConfig> {
  private readonly client: Anthropic;

  constructor(config: AnthropicConfig, options?: LLMAdapterOptions) {
    super(config, options);

    this.client = new Anthropic({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      maxRetries: 0,
    });
  }

  protected async sendRequest(
    messages: LLMMessage[],
    options: ResolvedCompletionOptions
  ): Promise<LLMResponse> {
    const [systemMessage, conversationMessages] = this.extractSystemMessage(messages);

    const params: MessageCreateParamsNonStreaming = {
      model: this.config.model,
      max_tokens: options.maxTokens,
      temperature: options.temperature,
      messages: this.convertMessages(conversationMessages),
    };
    if (systemMessage !== undefined) {
      params.system = systemMessage;
    }
    if (options.stopSequences !== undefined) {
      params.stop_sequences = options.stopSequences;
    }

    try {
      const response = await this.client.messages.create(params);

      return {
        content: this.extractTextContent(response.content),
        model: response.model,
        usage: {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
        },
        finishReason: response.stop_reason ?? undefined,
      };
    } catch (error) {
      throw this.handleError(error);
    }
  }

  // ===========================================================================
  // Private Helper Methods
  // ===========================================================================

  private convertMessages(messages: LLMMessage[]): MessageParam[] {
    return messages.flatMap((msg): MessageParam[] =>
      msg.role === 'user' || msg.role === 'assistant'
        ? [{ role: msg.role, content: msg.content }]
        : []
    );
  }

  private extractTextContent(content: ContentBlock[]): string {
    return content
      .filter((block): block is TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('');
  }

  /**
   * Map SDK errors onto the LLMError hierarchy by HTTP status
   */
  private handleError(error: unknown): LLMError {
    const provider = LLMProvider.ANTHROPIC;

    // Connection errors subclass APIError, so they are checked first
    if (error instanceof Anthropic.APIConnectionTimeoutError) {
      return new TimeoutError(`Request timeout: ${error.message}`, provider, 1000, error);
    }
    if (error instanceof Anthropic.APIConnectionError) {
      return new NetworkError(`Connection error: ${error.message}`, provider, 2000, error);
    }

    if (error instanceof Anthropic.APIError) {
      const { status, message } = error;

      if (status === 401 || status === 403) {
        return new AuthenticationError(`Authentication failed: ${message}`, provider, error);
      }
      if (status === 429) {
        return new RateLimitError(
          `Rate limit exceeded: ${message}`,
          provider,
          parseRetryAfter(error.headers?.['retry-after']),
          error
        );
      }
      if (status === 400) {
        return new InvalidRequestError(`Invalid request: ${message}`, provider, error);
      }
      if (status === 404) {
        return new ModelNotFoundError(`Model not found: ${message}`, provider, error);
      }
      if (status !== undefined && status >= 500) {
        return new ServerError(`Server error: ${message}`, provider, 5000, error);
      }
    }

    return LLMError.fromError(error, provider);
  }
}
