/**
 * Query Store Types
 *
 * Persisted record of a submitted query and the key-value store interface
 * that holds it.
 */

import { z } from 'zod';

import { ConversationTurnSchema } from '../llm/index.js';

// =============================================================================
// Query Record
// =============================================================================

export const QuerySchema = z.object({
  /** Generated at submission */
  queryId: z.string().min(1),
  /** Response cache fingerprint of the query text */
  cacheKey: z.string().nullable().default(null),
  queryText: z.string(),
  conversationHistory: z.array(ConversationTurnSchema).default([]),
  /** Provider override requested by the caller */
  llmProviderName: z.string().nullable().default(null),
  isComplete: z.boolean().default(false),
  answerText: z.string().nullable().default(null),
  /** Record ids of the documents the answer was grounded on */
  sources: z.array(z.string()).default([]),
  /** Epoch seconds when the answer was produced */
  timestamp: z.number().int().nonnegative().nullable().default(null),
  /** Epoch seconds at submission */
  createTime: z.number().int().nonnegative(),
});

export type Query = z.infer<typeof QuerySchema>;
export type QueryInput = z.input<typeof QuerySchema>;

// =============================================================================
// Store Interface
// =============================================================================

export interface QueryStore {
  getItem(queryId: string): Promise<Query | null>;
  /** Insert or replace */
  putItem(query: Query): Promise<void>;
  /**
   * @throws {QueryStoreError} NOT_FOUND when no record has this id
   */
  updateItem(queryId: string, query: Query): Promise<void>;
  close(): Promise<void>;
}

// =============================================================================
// Configuration
// =============================================================================

export const QueryStoreBackend = {
  MEMORY: 'memory',
  POSTGRES: 'postgres',
} as const;

export type QueryStoreBackend = (typeof QueryStoreBackend)[keyof typeof QueryStoreBackend];

export const QueryStoreConfigSchema = z
  .object({
    backend: z.enum(['memory', 'postgres']).default('memory'),
    /** PostgreSQL connection string; required for the postgres backend */
    databaseUrl: z.string().min(1).optional(),
    /** Maximum number of connections in pool */
    maxConnections: z.coerce.number().int().positive().default(10),
    /** Connection timeout in milliseconds */
    connectionTimeout: z.coerce.number().int().positive().default(10000),
    /** Create the table on startup */
    ensureSchema: z.boolean().default(true),
  })
  .superRefine((config, ctx) => {
    if (config.backend === 'postgres' && !config.databaseUrl) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['databaseUrl'],
        message: 'DATABASE_URL is required for the postgres query store',
      });
    }
  });

export type QueryStoreConfig = z.infer<typeof QueryStoreConfigSchema>;
export type QueryStoreConfigInput = z.input<typeof QueryStoreConfigSchema>;

// =============================================================================
// Errors
// =============================================================================

export const QueryStoreErrorCode = {
  NOT_FOUND: 'NOT_FOUND',
  INVALID_RECORD: 'INVALID_RECORD',
  REQUEST_FAILED: 'REQUEST_FAILED',
} as const;

export type QueryStoreErrorCode = (typeof QueryStoreErrorCode)[keyof typeof QueryStoreErrorCode];

export class QueryStoreError extends Error {
  readonly code: QueryStoreErrorCode;
  override readonly cause: Error | undefined;

  constructor(message: string, code: QueryStoreErrorCode, options?: { cause?: Error | undefined }) {
    super(message);
    this.name = 'QueryStoreError';
    this.code = code;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, QueryStoreError);
    }
  }
}

export function isQueryStoreError(error: unknown): error is QueryStoreError {
  return error instanceof QueryStoreError;
}

/**
 * @throws {QueryStoreError} INVALID_RECORD
 */
export function parseQuery(value: unknown): Query {
  const result = QuerySchema.safeParse(value);
  if (!result.success) {
    throw new QueryStoreError(
      `Invalid query record: ${result.error.errors
        .map((e) => `${e.path.join('.')}: ${e.message}`)
        .join(', ')}`,
      QueryStoreErrorCode.INVALID_RECORD,
      { cause: result.error }
    );
  }
  return result.data;
}
