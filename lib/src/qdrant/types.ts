/**
 * Vector Store Types
 *
 * The VectorStore capability consumed by the query pipeline, the stored
 * payload shape of legal records and the errors raised by the Qdrant store.
 */

import { randomUUID } from 'node:crypto';

import { z } from 'zod';

import type { QdrantDistance } from './config.js';

// =============================================================================
// Error Types
// =============================================================================

export const VectorStoreErrorCode = {
  /** Connection to Qdrant failed */
  CONNECTION_ERROR: 'CONNECTION_ERROR',
  /** Collection not found */
  COLLECTION_NOT_FOUND: 'COLLECTION_NOT_FOUND',
  /** Invalid vector dimensions */
  DIMENSION_MISMATCH: 'DIMENSION_MISMATCH',
  /** Search request failed */
  SEARCH_FAILED: 'SEARCH_FAILED',
  /** Upsert request failed */
  UPSERT_FAILED: 'UPSERT_FAILED',
  UNKNOWN: 'UNKNOWN',
} as const;

export type VectorStoreErrorCode =
  (typeof VectorStoreErrorCode)[keyof typeof VectorStoreErrorCode];

export class VectorStoreError extends Error {
  readonly code: VectorStoreErrorCode;
  override readonly cause: Error | undefined;

  constructor(message: string, code: VectorStoreErrorCode, options?: { cause?: Error }) {
    super(message);
    this.name = 'VectorStoreError';
    this.code = code;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, VectorStoreError);
    }
  }

  static fromError(error: unknown, code?: VectorStoreErrorCode): VectorStoreError {
    if (error instanceof VectorStoreError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    const cause = error instanceof Error ? error : undefined;

    return new VectorStoreError(
      message,
      code ?? VectorStoreErrorCode.UNKNOWN,
      cause ? { cause } : undefined
    );
  }
}

export function isVectorStoreError(error: unknown): error is VectorStoreError {
  return error instanceof VectorStoreError;
}

// =============================================================================
// Payload Schema
// =============================================================================

/**
 * Payload stored with each point. Field names are the stored snake_case keys;
 * fields other than `record_id` may be absent on older records.
 */
export const LegalRecordPayloadSchema = z.object({
  record_id: z.string().min(1),
  document_id: z.string().default(''),
  title: z.string().default(''),
  content: z.string().default(''),
  chunk_id: z.string().default(''),
  source: z.string().nullable().default(null),
});

export type LegalRecordPayload = z.infer<typeof LegalRecordPayloadSchema>;
export type LegalRecordPayloadInput = z.input<typeof LegalRecordPayloadSchema>;

// =============================================================================
// Retrieved Documents
// =============================================================================

/**
 * One vector-store hit
 */
export interface RetrievedDocument {
  recordId: string;
  documentId: string;
  title: string;
  content: string;
  chunkId: string;
  /** Legal basis; reconstructed from `chunkId` when null or empty */
  source: string | null;
  similarityScore: number;
}

export function toRetrievedDocument(
  payload: LegalRecordPayload,
  similarityScore: number
): RetrievedDocument {
  return {
    recordId: payload.record_id,
    documentId: payload.document_id,
    title: payload.title,
    content: payload.content,
    chunkId: payload.chunk_id,
    source: payload.source,
    similarityScore,
  };
}

// =============================================================================
// Operation Options
// =============================================================================

export const SearchOptionsSchema = z.object({
  /** Maximum number of hits */
  limit: z.number().int().positive().default(6),
  /** Full-text terms; a hit must match at least one in `content` */
  keywords: z.array(z.string()).optional(),
  /** Minimum similarity score */
  scoreThreshold: z.number().optional(),
});

export type SearchOptions = z.input<typeof SearchOptionsSchema>;

export interface EnsureCollectionOptions {
  vectorSize: number;
  distance: QdrantDistance;
  onDiskPayload?: boolean;
}

export interface EnsureCollectionResult {
  created: boolean;
  /** Dimension of the existing collection when it differs from the request */
  dimensionMismatch?: { expected: number; actual: number };
}

export interface DocumentPoint {
  vector: number[];
  payload: LegalRecordPayloadInput;
}

export const UpsertOptionsSchema = z.object({
  /** Points per request */
  batchSize: z.number().int().positive().default(100),
  /** Wait for the write to be applied */
  wait: z.boolean().default(true),
});

export type UpsertOptions = z.input<typeof UpsertOptionsSchema>;

export interface UpsertResult {
  upserted: number;
  /** Ids assigned to the points, in input order */
  pointIds: string[];
}

// =============================================================================
// VectorStore Capability
// =============================================================================

export interface VectorStore {
  /**
   * Hits ordered by descending similarity
   */
  search(collection: string, vector: number[], options?: SearchOptions): Promise<RetrievedDocument[]>;
  collectionExists(collection: string): Promise<boolean>;
  ensureCollection(
    collection: string,
    options: EnsureCollectionOptions
  ): Promise<EnsureCollectionResult>;
  pointExists(collection: string, id: string): Promise<boolean>;
  /**
   * Whether a stored point is at least `threshold` similar to `vector`
   */
  isDuplicate(collection: string, vector: number[], threshold?: number): Promise<boolean>;
  upsertDocuments(
    collection: string,
    points: DocumentPoint[],
    options?: UpsertOptions
  ): Promise<UpsertResult>;
}

export function generatePointId(): string {
  return randomUUID();
}
