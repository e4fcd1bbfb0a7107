/**
 * Retry Utilities for LLM Adapters
 *
 * Exponential backoff with jitter for rate limits, timeouts and 5xx
 * responses. Non-retryable errors are rethrown immediately.
 */

import {
  type LLMErrorInfo,
  type LLMProvider,
  type RetryConfig,
  type RetryEvent,
  type RetryEventHandler,
  LLMErrorCode,
  RetryConfigSchema,
} from './types.js';
import { isLLMError, LLMError } from './errors.js';

// ============================================================================
// Retry Utilities
// ============================================================================

/**
 * Delay before retry number `attemptNumber` (1-based). A retry-after from
 * the provider wins over the computed backoff, capped at `maxDelayMs`.
 */
export function calculateRetryDelay(
  attemptNumber: number,
  config: RetryConfig,
  errorRetryAfterMs?: number
): number {
  if (errorRetryAfterMs !== undefined && errorRetryAfterMs > 0) {
    return Math.min(errorRetryAfterMs, config.maxDelayMs);
  }

  const exponentialDelay =
    config.initialDelayMs * Math.pow(config.backoffMultiplier, attemptNumber - 1);
  let delay = Math.min(exponentialDelay, config.maxDelayMs);

  if (config.jitter) {
    const jitterRange = delay * config.jitterFactor;
    delay = Math.max(0, delay + (Math.random() - 0.5) * jitterRange);
  }

  return Math.round(delay);
}

export function shouldRetry(error: unknown, config: RetryConfig): boolean {
  if (!isLLMError(error) || !error.retryable) {
    return false;
  }

  return config.retryableErrorCodes.some((code) => code === error.code);
}

export function mergeRetryConfig(config?: Partial<RetryConfig>): RetryConfig {
  return RetryConfigSchema.parse(config ?? {});
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function createRetryEvent(
  type: RetryEvent['type'],
  attemptNumber: number,
  maxRetries: number,
  error?: LLMErrorInfo,
  nextDelayMs?: number
): RetryEvent {
  return {
    type,
    attemptNumber,
    maxRetries,
    error,
    nextDelayMs,
    timestamp: new Date(),
  };
}

// ============================================================================
// withRetry Function
// ============================================================================

export interface WithRetryOptions {
  /** Provider reported on errors that are not already LLMErrors */
  provider: LLMProvider;
  config?: Partial<RetryConfig> | undefined;
  /** Event handler for retry events (useful for logging) */
  onRetryEvent?: RetryEventHandler | undefined;
  /** Abort signal to stop retrying */
  abortSignal?: AbortSignal | undefined;
}

/**
 * Run `fn`, retrying retryable LLM errors with exponential backoff.
 *
 * @throws {LLMError} the last error once retries are exhausted
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: WithRetryOptions
): Promise<T> {
  const config = mergeRetryConfig(options.config);
  const { onRetryEvent, abortSignal, provider } = options;
  const emit = (event: RetryEvent): void => onRetryEvent?.(event);

  for (let attempt = 1; ; attempt++) {
    if (abortSignal?.aborted) {
      throw new LLMError({
        code: LLMErrorCode.UNKNOWN,
        message: 'Operation aborted',
        provider,
        retryable: false,
      });
    }

    emit(createRetryEvent('attempt_start', attempt, config.maxRetries));

    try {
      const result = await fn();
      emit(createRetryEvent('attempt_succeeded', attempt, config.maxRetries));
      return result;
    } catch (error) {
      const llmError = LLMError.fromError(error, provider);
      emit(
        createRetryEvent('attempt_failed', attempt, config.maxRetries, llmError.info)
      );

      const isLastAttempt = attempt > config.maxRetries;
      if (isLastAttempt || !shouldRetry(llmError, config)) {
        if (isLastAttempt) {
          emit(
            createRetryEvent(
              'max_retries_exceeded',
              attempt,
              config.maxRetries,
              llmError.info
            )
          );
        }
        throw llmError;
      }

      const delayMs = calculateRetryDelay(attempt, config, llmError.retryAfterMs);
      emit(
        createRetryEvent('retrying', attempt, config.maxRetries, llmError.info, delayMs)
      );
      await sleep(delayMs);
    }
  }
}
