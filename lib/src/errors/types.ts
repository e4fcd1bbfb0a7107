/**
 * Error taxonomy for the query pipeline.
 *
 * Only ConfigurationError leaves the orchestrator. Provider failures become
 * TransientProviderError values that the pipeline converts into fallbacks,
 * and DataError marks stored records that could not be interpreted.
 */

// =============================================================================
// Error Codes
// =============================================================================

export const RAGErrorCode = {
  /** No usable LLM or embedding provider, or invalid configuration */
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  /** External capability failed */
  TRANSIENT_PROVIDER_ERROR: 'TRANSIENT_PROVIDER_ERROR',
  /** External capability exceeded its timeout */
  TIMEOUT: 'TIMEOUT',
  /** Stored data could not be interpreted */
  DATA_ERROR: 'DATA_ERROR',
  /** Caller aborted the query */
  CANCELLED: 'CANCELLED',
  UNKNOWN: 'UNKNOWN',
} as const;

export type RAGErrorCode = (typeof RAGErrorCode)[keyof typeof RAGErrorCode];

/**
 * External collaborators the pipeline calls
 */
export const Capability = {
  EMBEDDING: 'embedding',
  VECTOR_STORE: 'vector_store',
  LLM: 'llm',
  RERANKER: 'reranker',
  KEYWORD_EXTRACTION: 'keyword_extraction',
  INTENT_DETECTION: 'intent_detection',
  QUERY_STORE: 'query_store',
} as const;

export type Capability = (typeof Capability)[keyof typeof Capability];

export interface RAGErrorOptions {
  cause?: Error;
  metadata?: Record<string, unknown>;
}

// =============================================================================
// Error Classes
// =============================================================================

export class RAGError extends Error {
  readonly code: RAGErrorCode;
  override readonly cause: Error | undefined;
  readonly metadata: Record<string, unknown> | undefined;

  constructor(message: string, code: RAGErrorCode, options?: RAGErrorOptions) {
    super(message);
    this.name = 'RAGError';
    this.code = code;
    this.cause = options?.cause;
    this.metadata = options?.metadata;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  static fromError(
    error: unknown,
    code?: RAGErrorCode,
    metadata?: Record<string, unknown>
  ): RAGError {
    if (error instanceof RAGError) {
      return error;
    }

    return new RAGError(toMessage(error), code ?? RAGErrorCode.UNKNOWN, {
      cause: error instanceof Error ? error : undefined,
      metadata,
    });
  }
}

/**
 * Raised when no usable provider can be resolved or configuration does not
 * validate. Fatal for the request.
 */
export class ConfigurationError extends RAGError {
  readonly issues: readonly string[];

  constructor(
    message: string,
    options?: RAGErrorOptions & { issues?: readonly string[] }
  ) {
    super(message, RAGErrorCode.CONFIGURATION_ERROR, options);
    this.name = 'ConfigurationError';
    this.issues = options?.issues ?? [];
  }
}

/**
 * A capability call failed or timed out. Always recovered by the caller.
 */
export class TransientProviderError extends RAGError {
  readonly capability: Capability;
  readonly timedOut: boolean;

  constructor(
    message: string,
    capability: Capability,
    options?: RAGErrorOptions & { timedOut?: boolean }
  ) {
    super(
      message,
      options?.timedOut ? RAGErrorCode.TIMEOUT : RAGErrorCode.TRANSIENT_PROVIDER_ERROR,
      options
    );
    this.name = 'TransientProviderError';
    this.capability = capability;
    this.timedOut = options?.timedOut ?? false;
  }

  static fromCapabilityError(
    error: unknown,
    capability: Capability
  ): TransientProviderError {
    if (error instanceof TransientProviderError) {
      return error;
    }
    return new TransientProviderError(toMessage(error), capability, {
      cause: error instanceof Error ? error : undefined,
    });
  }
}

/**
 * A stored record (chunk id, payload) could not be interpreted.
 */
export class DataError extends RAGError {
  constructor(message: string, options?: RAGErrorOptions) {
    super(message, RAGErrorCode.DATA_ERROR, options);
    this.name = 'DataError';
  }
}

/**
 * The caller's abort signal fired. Work already started still completes
 * and populates the cache and query store.
 */
export class QueryCancelledError extends RAGError {
  constructor(message = 'Query was cancelled by the caller', options?: RAGErrorOptions) {
    super(message, RAGErrorCode.CANCELLED, options);
    this.name = 'QueryCancelledError';
  }
}

// =============================================================================
// Validation Warnings
// =============================================================================

export const ValidationWarningCode = {
  CITATION_MISSING: 'CITATION_MISSING',
  RERANK_FAILED: 'RERANK_FAILED',
  RERANK_UNAVAILABLE: 'RERANK_UNAVAILABLE',
  KEYWORD_EXTRACTION_FAILED: 'KEYWORD_EXTRACTION_FAILED',
  PROVIDER_FALLBACK: 'PROVIDER_FALLBACK',
  CONTEXT_TRUNCATED: 'CONTEXT_TRUNCATED',
  RETRIEVAL_FAILED: 'RETRIEVAL_FAILED',
  PARAPHRASE_FAILED: 'PARAPHRASE_FAILED',
  PERSISTENCE_FAILED: 'PERSISTENCE_FAILED',
} as const;

export type ValidationWarningCode =
  (typeof ValidationWarningCode)[keyof typeof ValidationWarningCode];

/**
 * Non-fatal condition recorded in response metadata.
 */
export interface ValidationWarning {
  code: ValidationWarningCode;
  message: string;
}

// =============================================================================
// Type Guards
// =============================================================================

export function isRAGError(error: unknown): error is RAGError {
  return error instanceof RAGError;
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

export function isTransientProviderError(
  error: unknown
): error is TransientProviderError {
  return error instanceof TransientProviderError;
}

export function toMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
