/**
 * LLM Error Types
 *
 * Provider failures are normalized into LLMError subclasses so retry logic
 * and the pipeline can branch on `code` and `retryable` without knowing
 * which SDK or HTTP API produced them.
 */

import { type LLMProvider, type LLMErrorInfo, LLMErrorCode } from './types.js';

// =============================================================================
// Base LLM Error Class
// =============================================================================

export class LLMError extends Error {
  readonly info: LLMErrorInfo;

  constructor(info: LLMErrorInfo) {
    super(info.message);
    this.name = 'LLMError';
    this.info = info;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  get code(): LLMErrorCode {
    return this.info.code;
  }

  get provider(): LLMProvider {
    return this.info.provider;
  }

  get retryable(): boolean {
    return this.info.retryable;
  }

  get retryAfterMs(): number | undefined {
    return this.info.retryAfterMs;
  }

  static fromError(error: unknown, provider: LLMProvider): LLMError {
    if (error instanceof LLMError) {
      return error;
    }

    return new LLMError({
      code: LLMErrorCode.UNKNOWN,
      message: error instanceof Error ? error.message : 'Unknown error',
      provider,
      retryable: false,
      originalError: error,
    });
  }
}

// =============================================================================
// Specific Error Classes
// =============================================================================

/**
 * Rate limit exceeded. Retryable; honours the provider's retry-after.
 */
export class RateLimitError extends LLMError {
  constructor(
    message: string,
    provider: LLMProvider,
    retryAfterMs?: number,
    originalError?: unknown
  ) {
    super({
      code: LLMErrorCode.RATE_LIMIT,
      message,
      provider,
      retryable: true,
      retryAfterMs: retryAfterMs ?? 60000,
      originalError,
    });
    this.name = 'RateLimitError';
  }
}

/**
 * Invalid or missing API key. Not retryable.
 */
export class AuthenticationError extends LLMError {
  constructor(message: string, provider: LLMProvider, originalError?: unknown) {
    super({
      code: LLMErrorCode.AUTH_ERROR,
      message,
      provider,
      retryable: false,
      originalError,
    });
    this.name = 'AuthenticationError';
  }
}

export class InvalidRequestError extends LLMError {
  constructor(message: string, provider: LLMProvider, originalError?: unknown) {
    super({
      code: LLMErrorCode.INVALID_REQUEST,
      message,
      provider,
      retryable: false,
      originalError,
    });
    this.name = 'InvalidRequestError';
  }
}

export class ModelNotFoundError extends LLMError {
  constructor(message: string, provider: LLMProvider, originalError?: unknown) {
    super({
      code: LLMErrorCode.MODEL_NOT_FOUND,
      message,
      provider,
      retryable: false,
      originalError,
    });
    this.name = 'ModelNotFoundError';
  }
}

/**
 * The provider refused to answer (safety filter, blocked prompt).
 */
export class ContentFilteredError extends LLMError {
  constructor(message: string, provider: LLMProvider, originalError?: unknown) {
    super({
      code: LLMErrorCode.CONTENT_FILTERED,
      message,
      provider,
      retryable: false,
      originalError,
    });
    this.name = 'ContentFilteredError';
  }
}

export class TimeoutError extends LLMError {
  constructor(
    message: string,
    provider: LLMProvider,
    retryAfterMs = 1000,
    originalError?: unknown
  ) {
    super({
      code: LLMErrorCode.TIMEOUT,
      message,
      provider,
      retryable: true,
      retryAfterMs,
      originalError,
    });
    this.name = 'TimeoutError';
  }
}

export class ServerError extends LLMError {
  constructor(
    message: string,
    provider: LLMProvider,
    retryAfterMs = 5000,
    originalError?: unknown
  ) {
    super({
      code: LLMErrorCode.SERVER_ERROR,
      message,
      provider,
      retryable: true,
      retryAfterMs,
      originalError,
    });
    this.name = 'ServerError';
  }
}

export class NetworkError extends LLMError {
  constructor(
    message: string,
    provider: LLMProvider,
    retryAfterMs = 2000,
    originalError?: unknown
  ) {
    super({
      code: LLMErrorCode.NETWORK_ERROR,
      message,
      provider,
      retryable: true,
      retryAfterMs,
      originalError,
    });
    this.name = 'NetworkError';
  }
}

/**
 * The provider answered 2xx with a body that does not match its API shape.
 */
export class InvalidResponseError extends LLMError {
  constructor(message: string, provider: LLMProvider, originalError?: unknown) {
    super({
      code: LLMErrorCode.INVALID_RESPONSE,
      message,
      provider,
      retryable: false,
      originalError,
    });
    this.name = 'InvalidResponseError';
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isLLMError(error: unknown): error is LLMError {
  return error instanceof LLMError;
}
