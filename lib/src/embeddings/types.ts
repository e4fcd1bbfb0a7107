/**
 * Embedding Types and Schemas
 *
 * Provider configurations for the query embedding step. Every provider
 * turns text into a fixed-length vector whose length matches the vector
 * store's collections; an empty vector means no embedding was produced.
 */

import { z } from 'zod';

// =============================================================================
// Provider Names
// =============================================================================

/**
 * Supported embedding providers. `api`, `docker` and `ec2` are deployments
 * of the same HTTP embedding service.
 */
export const EmbeddingProviderName = {
  API: 'api',
  DOCKER: 'docker',
  EC2: 'ec2',
  OPENAI: 'openai_embedding',
  GOOGLE_GEMINI: 'google_gemini_embedding',
  OLLAMA: 'ollama_embedding',
} as const;

export type EmbeddingProviderName =
  (typeof EmbeddingProviderName)[keyof typeof EmbeddingProviderName];

export const EmbeddingProviderNameSchema = z.enum([
  'api',
  'docker',
  'ec2',
  'openai_embedding',
  'google_gemini_embedding',
  'ollama_embedding',
]);

// =============================================================================
// Provider Configuration
// =============================================================================

/**
 * Settings shared by every embedding provider
 */
export const EmbeddingBaseConfigSchema = z.object({
  /**
   * Expected vector length; must equal the collection's vector size.
   * @default 1024
   */
  dimensions: z.number().int().positive().default(1024),

  /**
   * Texts per provider request. Batches are sent sequentially.
   * @default 32
   */
  batchSize: z.number().int().positive().max(2048).default(32),

  /**
   * HTTP timeout for a single request in milliseconds
   * @default 15000
   */
  timeoutMs: z.number().int().positive().default(15000),

  /**
   * Scale vectors to unit length before returning them
   * @default false
   */
  normalize: z.boolean().default(false),

  /**
   * Keep recent query embeddings in memory
   * @default true
   */
  enableCache: z.boolean().default(true),

  /**
   * Maximum number of cached embeddings
   * @default 1000
   */
  maxCacheSize: z.number().int().positive().default(1000),
});

/**
 * HTTP embedding service: POST `{ texts }` returns `{ embeddings }`
 */
export const ServiceEmbeddingConfigSchema = EmbeddingBaseConfigSchema.extend({
  provider: z.enum(['api', 'docker', 'ec2']),
  /** Full URL of the embed endpoint */
  serviceUrl: z.string().url(),
  /** Sent as a bearer token when set */
  apiKey: z.string().min(1).optional(),
  /** Model name forwarded to the service, which may host several */
  model: z.string().min(1).optional(),
});

export type ServiceEmbeddingConfig = z.infer<typeof ServiceEmbeddingConfigSchema>;

export const OpenAIEmbeddingConfigSchema = EmbeddingBaseConfigSchema.extend({
  provider: z.literal('openai_embedding'),
  apiKey: z.string().min(1),
  model: z.string().min(1).default('text-embedding-3-small'),
  baseUrl: z.string().url().default('https://api.openai.com/v1'),
});

export type OpenAIEmbeddingConfig = z.infer<typeof OpenAIEmbeddingConfigSchema>;

export const GeminiEmbeddingConfigSchema = EmbeddingBaseConfigSchema.extend({
  provider: z.literal('google_gemini_embedding'),
  apiKey: z.string().min(1),
  model: z.string().min(1).default('text-embedding-004'),
  baseUrl: z
    .string()
    .url()
    .default('https://generativelanguage.googleapis.com/v1beta'),
  /** Gemini task type; queries are embedded for retrieval */
  taskType: z.string().default('RETRIEVAL_QUERY'),
});

export type GeminiEmbeddingConfig = z.infer<typeof GeminiEmbeddingConfigSchema>;

export const OllamaEmbeddingConfigSchema = EmbeddingBaseConfigSchema.extend({
  provider: z.literal('ollama_embedding'),
  model: z.string().min(1).default('bge-m3'),
  baseUrl: z.string().url().default('http://localhost:11434'),
});

export type OllamaEmbeddingConfig = z.infer<typeof OllamaEmbeddingConfigSchema>;

export const EmbeddingProviderConfigSchema = z.discriminatedUnion('provider', [
  ServiceEmbeddingConfigSchema,
  OpenAIEmbeddingConfigSchema,
  GeminiEmbeddingConfigSchema,
  OllamaEmbeddingConfigSchema,
]);

export type EmbeddingProviderConfig = z.infer<typeof EmbeddingProviderConfigSchema>;
export type EmbeddingProviderConfigInput = z.input<typeof EmbeddingProviderConfigSchema>;

// =============================================================================
// Capability Interface
// =============================================================================

/**
 * Text to vector capability consumed by the query pipeline.
 *
 * Failures never throw: `embed` returns `[]`, and `batchEmbed` returns `[]`
 * in the slot of every text that could not be embedded. Output order and
 * length always match the input.
 */
export interface EmbeddingProvider {
  readonly name: EmbeddingProviderName;
  readonly dimensions: number;
  embed(text: string): Promise<number[]>;
  batchEmbed(texts: string[]): Promise<number[][]>;
  /** Whether the last `initialize` probe succeeded */
  isInitialized(): boolean;
  /** Probe the provider once; resolves false instead of throwing */
  initialize(): Promise<boolean>;
}

// =============================================================================
// Error Types
// =============================================================================

export const EmbeddingErrorCode = {
  /** Input text is empty */
  EMPTY_INPUT: 'EMPTY_INPUT',
  /** Provider request failed */
  REQUEST_FAILED: 'REQUEST_FAILED',
  /** Provider answered with an unexpected body */
  INVALID_RESPONSE: 'INVALID_RESPONSE',
  /** Vector length differs from the configured dimensions */
  DIMENSION_MISMATCH: 'DIMENSION_MISMATCH',
  UNKNOWN: 'UNKNOWN',
} as const;

export type EmbeddingErrorCode =
  (typeof EmbeddingErrorCode)[keyof typeof EmbeddingErrorCode];

export class EmbeddingError extends Error {
  readonly code: EmbeddingErrorCode;
  override readonly cause: Error | undefined;

  constructor(message: string, code: EmbeddingErrorCode, options?: { cause?: Error }) {
    super(message);
    this.name = 'EmbeddingError';
    this.code = code;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EmbeddingError);
    }
  }

  static fromError(error: unknown, code?: EmbeddingErrorCode): EmbeddingError {
    if (error instanceof EmbeddingError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    const cause = error instanceof Error ? error : undefined;

    return new EmbeddingError(message, code ?? EmbeddingErrorCode.UNKNOWN, { cause });
  }
}

export function isEmbeddingError(error: unknown): error is EmbeddingError {
  return error instanceof EmbeddingError;
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Normalize a vector to unit length (L2 normalization)
 */
export function normalizeVector(vector: number[]): number[] {
  const magnitude = Math.sqrt(vector.reduce((sum, val) => sum + val * val, 0));

  if (magnitude === 0) {
    return vector;
  }

  return vector.map((val) => val / magnitude);
}

/**
 * Validate a provider vector: finite numbers of the expected length
 */
export function isValidEmbedding(vector: readonly number[], dimensions: number): boolean {
  return vector.length === dimensions && vector.every((v) => Number.isFinite(v));
}
