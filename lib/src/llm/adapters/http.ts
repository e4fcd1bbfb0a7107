/**
 * Shared HTTP plumbing for the REST-based adapters (OpenAI-compatible,
 * Gemini, Ollama): axios client creation and status-code error mapping.
 */

import axios, { type AxiosInstance } from 'axios';
import type { ZodType, ZodTypeDef } from 'zod';

import type { LLMProvider } from '../types.js';
import {
  LLMError,
  RateLimitError,
  AuthenticationError,
  InvalidRequestError,
  ModelNotFoundError,
  TimeoutError,
  ServerError,
  NetworkError,
  InvalidResponseError,
} from '../errors.js';

export function createHttpClient(options: {
  baseURL: string;
  timeoutMs: number;
  headers?: Record<string, string>;
}): AxiosInstance {
  return axios.create({
    baseURL: options.baseURL,
    timeout: options.timeoutMs,
    headers: { 'Content-Type': 'application/json', ...options.headers },
  });
}

/**
 * Parse a `retry-after` header given in seconds
 */
export function parseRetryAfter(value: unknown): number | undefined {
  if (typeof value !== 'string' && typeof value !== 'number') {
    return undefined;
  }
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

function describeBody(data: unknown): string {
  if (typeof data === 'string') {
    return data;
  }
  if (typeof data === 'object' && data !== null && 'error' in data) {
    const { error } = data;
    if (typeof error === 'string') {
      return error;
    }
    if (typeof error === 'object' && error !== null && 'message' in error) {
      return String(error.message);
    }
  }
  return '';
}

/**
 * Map an axios failure onto the LLMError hierarchy
 */
export function mapHttpError(error: unknown, provider: LLMProvider): LLMError {
  if (error instanceof LLMError) {
    return error;
  }

  if (!axios.isAxiosError(error)) {
    return LLMError.fromError(error, provider);
  }

  const status = error.response?.status;
  const detail = describeBody(error.response?.data) || error.message;

  if (status === 401 || status === 403) {
    return new AuthenticationError(`Authentication failed: ${detail}`, provider, error);
  }
  if (status === 429) {
    return new RateLimitError(
      `Rate limit exceeded: ${detail}`,
      provider,
      parseRetryAfter(error.response?.headers['retry-after']),
      error
    );
  }
  if (status === 400 || status === 422) {
    return new InvalidRequestError(`Invalid request: ${detail}`, provider, error);
  }
  if (status === 404) {
    return new ModelNotFoundError(`Model not found: ${detail}`, provider, error);
  }
  if (status !== undefined && status >= 500) {
    return new ServerError(`Server error: ${detail}`, provider, 5000, error);
  }
  if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
    return new TimeoutError(`Request timeout: ${error.message}`, provider, 1000, error);
  }
  if (!error.response) {
    return new NetworkError(`Connection error: ${error.message}`, provider, 2000, error);
  }

  return LLMError.fromError(error, provider);
}

/**
 * Validate a provider response body
 *
 * @throws {InvalidResponseError} when the body does not match `schema`
 */
export function parseResponseBody<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  data: unknown,
  provider: LLMProvider
): T {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new InvalidResponseError(
      `Unexpected response body: ${parsed.error.errors
        .map((e) => `${e.path.join('.')}: ${e.message}`)
        .join(', ')}`,
      provider
    );
  }
  return parsed.data;
}
