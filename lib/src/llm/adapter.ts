/**
 * LLM Adapter Base Class
 *
 * Every provider adapter implements `sendRequest`; the base class validates
 * messages, merges per-request options with the configured defaults and
 * wraps each request in retry logic.
 */

import {
  type LLMProviderConfig,
  type LLMMessage,
  type LLMResponse,
  type LLMCompletionOptions,
  type LLMProvider,
  type RetryConfig,
  type RetryEventHandler,
  LLMMessageSchema,
} from './types.js';
import { InvalidRequestError } from './errors.js';
import { withRetry } from './retry.js';
import { type Logger, getGlobalLogger } from '../logging/index.js';

/**
 * Runtime collaborators that are not part of the validated configuration
 */
export interface LLMAdapterOptions {
  /** Retry configuration for transient failures */
  retry?: Partial<RetryConfig> | undefined;
  /** Event handler for retry events */
  onRetryEvent?: RetryEventHandler | undefined;
  logger?: Logger | undefined;
}

/**
 * Request options after defaults are applied
 */
export type ResolvedCompletionOptions = Required<
  Pick<LLMCompletionOptions, 'temperature' | 'maxTokens' | 'responseFormat'>
> &
  Pick<LLMCompletionOptions, 'stopSequences'>;

export abstract class LLMAdapter<
  TConfig extends LLMProviderConfig = LLMProviderConfig,
> {
  protected readonly config: TConfig;
  protected readonly logger: Logger;
  private readonly retry: Partial<RetryConfig> | undefined;
  private readonly onRetryEvent: RetryEventHandler | undefined;

  constructor(config: TConfig, options: LLMAdapterOptions = {}) {
    this.config = config;
    this.retry = options.retry;
    this.logger = (options.logger ?? getGlobalLogger()).child(
      `llm:${config.provider}`
    );
    this.onRetryEvent =
      options.onRetryEvent ??
      ((event) => {
        if (event.type === 'retrying') {
          this.logger.warn('Retrying LLM request', {
            attempt: event.attemptNumber,
            delayMs: event.nextDelayMs,
            code: event.error?.code,
          });
        }
      });
  }

  // ===========================================================================
  // Abstract Methods
  // ===========================================================================

  /**
   * Send one request to the provider.
   *
   * @throws {LLMError} mapped from the provider's failure
   */
  protected abstract sendRequest(
    messages: LLMMessage[],
    options: ResolvedCompletionOptions
  ): Promise<LLMResponse>;

  // ===========================================================================
  // Public Methods
  // ===========================================================================

  get provider(): LLMProvider {
    return this.config.provider;
  }

  get model(): string {
    return this.config.model;
  }

  getConfig(): Readonly<TConfig> {
    return { ...this.config };
  }

  /**
   * Multi-turn completion.
   *
   * @throws {LLMError} once retries are exhausted
   */
  async complete(
    messages: LLMMessage[],
    options?: LLMCompletionOptions
  ): Promise<LLMResponse> {
    this.validateMessages(messages);
    const resolved = this.mergeOptions(options);

    return withRetry(() => this.sendRequest(messages, resolved), {
      provider: this.config.provider,
      config: this.retry,
      onRetryEvent: this.onRetryEvent,
    });
  }

  /**
   * Single-turn completion of one user prompt
   */
  async sendMessage(
    prompt: string,
    options?: LLMCompletionOptions
  ): Promise<LLMResponse> {
    return this.complete([{ role: 'user', content: prompt }], options);
  }

  // ===========================================================================
  // Protected Helper Methods
  // ===========================================================================

  protected mergeOptions(options?: LLMCompletionOptions): ResolvedCompletionOptions {
    return {
      temperature: options?.temperature ?? this.config.temperature,
      maxTokens: options?.maxTokens ?? this.config.maxTokens,
      responseFormat: options?.responseFormat ?? 'text',
      stopSequences: options?.stopSequences,
    };
  }

  /**
   * Split out the system prompt; providers that take it separately use this.
   * Several system messages are joined with a blank line.
   */
  protected extractSystemMessage(
    messages: LLMMessage[]
  ): [string | undefined, LLMMessage[]] {
    const systemParts = messages
      .filter((m) => m.role === 'system')
      .map((m) => m.content);
    const otherMessages = messages.filter((m) => m.role !== 'system');

    return [
      systemParts.length > 0 ? systemParts.join('\n\n') : undefined,
      otherMessages,
    ];
  }

  /**
   * @throws {InvalidRequestError} on empty input or malformed messages
   */
  protected validateMessages(messages: LLMMessage[]): void {
    if (messages.length === 0) {
      throw new InvalidRequestError(
        'Messages array must not be empty',
        this.config.provider
      );
    }

    for (const message of messages) {
      const parsed = LLMMessageSchema.safeParse(message);
      if (!parsed.success) {
        throw new InvalidRequestError(
          `Invalid message: ${parsed.error.errors.map((e) => e.message).join(', ')}`,
          this.config.provider
        );
      }
    }

    if (!messages.some((m) => m.role !== 'system')) {
      throw new InvalidRequestError(
        'Messages must contain at least one user or assistant message',
        this.config.provider
      );
    }
  }
}
