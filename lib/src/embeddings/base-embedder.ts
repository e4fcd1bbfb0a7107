/**
 * BaseEmbedder
 *
 * Shared behaviour of the HTTP embedding providers: batching in
 * `batchSize` slices, dimension checks, optional caching and conversion of
 * every failure into an empty vector.
 */

import axios, { type AxiosInstance } from 'axios';
import type { ZodType, ZodTypeDef } from 'zod';

import {
  type EmbeddingProvider,
  type EmbeddingProviderConfig,
  type EmbeddingProviderName,
  EmbeddingError,
  EmbeddingErrorCode,
  isValidEmbedding,
  normalizeVector,
} from './types.js';
import { EmbeddingCache, generateCacheKey } from './cache.js';
import { createHttpClient } from '../llm/adapters/http.js';
import { type Logger, getGlobalLogger } from '../logging/index.js';

const PROBE_TEXT = 'kiểm tra kết nối';

export interface EmbedderOptions {
  logger?: Logger | undefined;
  /** Preconfigured HTTP client; tests inject a stub here */
  httpClient?: AxiosInstance | undefined;
  /** Shared cache; by default each embedder owns one when caching is enabled */
  cache?: EmbeddingCache | undefined;
}

export interface EmbedderHttpSettings {
  baseURL: string;
  headers?: Record<string, string>;
}

export abstract class BaseEmbedder<
  TConfig extends EmbeddingProviderConfig = EmbeddingProviderConfig,
> implements EmbeddingProvider
{
  protected readonly config: TConfig;
  protected readonly logger: Logger;
  protected readonly http: AxiosInstance;
  private readonly cache: EmbeddingCache | undefined;
  private initialized = false;

  constructor(config: TConfig, http: EmbedderHttpSettings, options: EmbedderOptions = {}) {
    this.config = config;
    this.logger = (options.logger ?? getGlobalLogger()).child(`embeddings:${config.provider}`);
    this.http =
      options.httpClient ??
      createHttpClient({ ...http, timeoutMs: config.timeoutMs });
    this.cache =
      options.cache ??
      (config.enableCache ? new EmbeddingCache({ maxSize: config.maxCacheSize }) : undefined);
  }

  // ===========================================================================
  // Abstract Methods
  // ===========================================================================

  /**
   * One provider request for a batch of texts, in input order
   *
   * @throws {EmbeddingError} on request or response failure
   */
  protected abstract requestEmbeddings(texts: string[]): Promise<number[][]>;

  /** Model identifier used in cache keys */
  protected abstract get modelName(): string;

  // ===========================================================================
  // Public Methods
  // ===========================================================================

  get name(): EmbeddingProviderName {
    return this.config.provider;
  }

  get dimensions(): number {
    return this.config.dimensions;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  async initialize(): Promise<boolean> {
    const [probe] = await this.embedBatch([PROBE_TEXT]);
    this.initialized = probe !== undefined && probe.length > 0;

    if (this.initialized) {
      this.logger.info('Embedding provider ready', {
        model: this.modelName,
        dimensions: this.config.dimensions,
      });
    } else {
      this.logger.warn('Embedding provider probe failed', { model: this.modelName });
    }
    return this.initialized;
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.batchEmbed([text]);
    return vector ?? [];
  }

  async batchEmbed(texts: string[]): Promise<number[][]> {
    const results: number[][] = texts.map(() => []);
    const pending: Array<{ index: number; text: string }> = [];

    texts.forEach((text, index) => {
      if (text.trim().length === 0) {
        this.logger.warn('Skipping empty text', { index, code: EmbeddingErrorCode.EMPTY_INPUT });
        return;
      }
      const cached = this.cache?.get(generateCacheKey(this.modelName, text));
      if (cached) {
        results[index] = cached;
        return;
      }
      pending.push({ index, text });
    });

    for (let start = 0; start < pending.length; start += this.config.batchSize) {
      const batch = pending.slice(start, start + this.config.batchSize);
      const vectors = await this.embedBatch(batch.map((item) => item.text));

      batch.forEach((item, i) => {
        const vector = vectors[i];
        if (vector !== undefined && vector.length > 0) {
          results[item.index] = vector;
          this.cache?.set(generateCacheKey(this.modelName, item.text), vector);
        }
      });
    }

    return results;
  }

  // ===========================================================================
  // Protected Helper Methods
  // ===========================================================================

  /**
   * POST a JSON body and validate the response
   *
   * @throws {EmbeddingError}
   */
  protected async postJson<T>(
    url: string,
    body: unknown,
    schema: ZodType<T, ZodTypeDef, unknown>
  ): Promise<T> {
    let data: unknown;
    try {
      ({ data } = await this.http.post<unknown>(url, body));
    } catch (error) {
      throw toRequestError(error);
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new EmbeddingError(
        `Unexpected embedding response: ${parsed.error.errors
          .map((e) => `${e.path.join('.')}: ${e.message}`)
          .join(', ')}`,
        EmbeddingErrorCode.INVALID_RESPONSE
      );
    }
    return parsed.data;
  }

  // ===========================================================================
  // Private Helper Methods
  // ===========================================================================

  private async embedBatch(texts: string[]): Promise<number[][]> {
    try {
      const vectors = await this.requestEmbeddings(texts);
      if (vectors.length !== texts.length) {
        throw new EmbeddingError(
          `Expected ${texts.length} embeddings, received ${vectors.length}`,
          EmbeddingErrorCode.INVALID_RESPONSE
        );
      }
      return vectors.map((vector, index) => this.checkVector(vector, index));
    } catch (error) {
      const embeddingError = EmbeddingError.fromError(error, EmbeddingErrorCode.REQUEST_FAILED);
      this.logger.error('Embedding request failed', embeddingError, {
        model: this.modelName,
        count: texts.length,
      });
      return texts.map(() => []);
    }
  }

  private checkVector(vector: number[], index: number): number[] {
    if (!isValidEmbedding(vector, this.config.dimensions)) {
      this.logger.error('Embedding has unexpected dimensions', {
        index,
        expected: this.config.dimensions,
        actual: vector.length,
        code: EmbeddingErrorCode.DIMENSION_MISMATCH,
      });
      return [];
    }
    return this.config.normalize ? normalizeVector(vector) : vector;
  }
}

function toRequestError(error: unknown): EmbeddingError {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    return new EmbeddingError(
      status !== undefined
        ? `Embedding request failed with status ${status}`
        : `Embedding request failed: ${error.message}`,
      EmbeddingErrorCode.REQUEST_FAILED,
      { cause: error }
    );
  }
  return EmbeddingError.fromError(error, EmbeddingErrorCode.REQUEST_FAILED);
}
