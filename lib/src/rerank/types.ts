/**
 * Rerank Types
 *
 * The optional Reranker capability: (query, passages) → passages ordered by
 * descending relevance score.
 */

import { z } from 'zod';

// =============================================================================
// Passages
// =============================================================================

export interface RerankPassageMeta {
  documentId: string;
  title: string;
  chunkId: string;
  source: string | null;
}

/**
 * A retrieved document as sent to a reranker; `id` is the record id
 */
export interface RerankPassage {
  id: string;
  text: string;
  meta: RerankPassageMeta;
}

export interface RerankedPassage extends RerankPassage {
  score: number;
}

export interface Reranker {
  readonly name: RerankProviderName;
  /**
   * @throws {RerankError} when no score could be obtained
   */
  rerank(query: string, passages: RerankPassage[]): Promise<RerankedPassage[]>;
}

// =============================================================================
// Configuration
// =============================================================================

export const RerankProviderName = {
  NONE: 'none',
  LLM: 'llm',
  HTTP: 'http',
} as const;

export type RerankProviderName = (typeof RerankProviderName)[keyof typeof RerankProviderName];

export const DEFAULT_RERANK_PROMPT =
  'On a scale of 1 to 10, how relevant is the following document to the query?\n\n' +
  'Query: {query}\n\nDocument: {document}\n\nRelevance Score (1-10):';

export const NoRerankConfigSchema = z.object({
  provider: z.literal('none'),
});

export const LLMRerankConfigSchema = z.object({
  provider: z.literal('llm'),
  /** Prompt with `{query}` and `{document}` placeholders */
  prompt: z.string().min(1).default(DEFAULT_RERANK_PROMPT),
  /** Score used when the reply carries no number from 1 to 10 */
  defaultScore: z.number().min(1).max(10).default(5),
});

export const HttpRerankConfigSchema = z.object({
  provider: z.literal('http'),
  /** Base URL of a Cohere-compatible API; `/rerank` is appended */
  url: z.string().url().default('https://api.cohere.com/v2'),
  apiKey: z.string().min(1),
  model: z.string().min(1).default('rerank-multilingual-v3.0'),
  /** Return only the best N passages */
  topN: z.number().int().positive().optional(),
  timeoutMs: z.number().int().positive().default(30000),
});

export const RerankConfigSchema = z.discriminatedUnion('provider', [
  NoRerankConfigSchema,
  LLMRerankConfigSchema,
  HttpRerankConfigSchema,
]);

export type LLMRerankConfig = z.infer<typeof LLMRerankConfigSchema>;
export type HttpRerankConfig = z.infer<typeof HttpRerankConfigSchema>;
export type RerankConfig = z.infer<typeof RerankConfigSchema>;
export type RerankConfigInput = z.input<typeof RerankConfigSchema>;

// =============================================================================
// Errors
// =============================================================================

export const RerankErrorCode = {
  REQUEST_FAILED: 'REQUEST_FAILED',
  INVALID_RESPONSE: 'INVALID_RESPONSE',
  ALL_SCORES_FAILED: 'ALL_SCORES_FAILED',
} as const;

export type RerankErrorCode = (typeof RerankErrorCode)[keyof typeof RerankErrorCode];

export class RerankError extends Error {
  readonly code: RerankErrorCode;
  override readonly cause: Error | undefined;

  constructor(message: string, code: RerankErrorCode, options?: { cause?: Error | undefined }) {
    super(message);
    this.name = 'RerankError';
    this.code = code;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RerankError);
    }
  }
}

export function isRerankError(error: unknown): error is RerankError {
  return error instanceof RerankError;
}
