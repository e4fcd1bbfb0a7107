/**
 * RAG Pipeline Types
 *
 * Requests, responses and configuration of the query pipeline.
 */

import { z } from 'zod';

import { ConversationTurnSchema, type LLMProvider } from '../llm/index.js';
import { DEFAULT_CITATION_PATTERN } from '../citations/index.js';
import type { ValidationWarning } from '../errors/index.js';

// =============================================================================
// Fixed Messages
// =============================================================================

export const EMBEDDING_ERROR_MESSAGE = 'An error occurred while creating embedding.';
export const GENERATION_ERROR_MESSAGE = 'An error occurred while generating the answer.';
export const NO_RESULTS_MESSAGE = 'Không tìm thấy dữ liệu liên quan.';
export const IRRELEVANT_QUERY_MESSAGE =
  'Xin lỗi, tôi chỉ có thể trả lời các câu hỏi liên quan đến pháp luật.';

// =============================================================================
// Pipeline States
// =============================================================================

export const PipelineState = {
  START: 'START',
  EMBEDDING: 'EMBEDDING',
  RETRIEVING: 'RETRIEVING',
  RETRY_WITH_PARAPHRASE: 'RETRY_WITH_PARAPHRASE',
  RERANKING: 'RERANKING',
  ASSEMBLING: 'ASSEMBLING',
  GENERATING: 'GENERATING',
  VALIDATING: 'VALIDATING',
  DONE: 'DONE',
  FAILED: 'FAILED',
} as const;

export type PipelineState = (typeof PipelineState)[keyof typeof PipelineState];

export type TerminalState = typeof PipelineState.DONE | typeof PipelineState.FAILED;

/**
 * How a query ended. Every outcome carries a well-formed response.
 */
export const AnswerOutcome = {
  ANSWERED: 'answered',
  NO_RESULTS: 'no_results',
  EMBEDDING_FAILED: 'embedding_failed',
  GENERATION_FAILED: 'generation_failed',
  /** Classified as unrelated to law; no retrieval */
  IRRELEVANT: 'irrelevant',
  /** Answered from the conversation history; no retrieval */
  ANSWERED_FROM_HISTORY: 'answered_from_history',
} as const;

export type AnswerOutcome = (typeof AnswerOutcome)[keyof typeof AnswerOutcome];

// =============================================================================
// Configuration
// =============================================================================

export const RetrievalMode = {
  /** QA collection and document collection, searched independently */
  DUAL: 'dual',
  /** QA collection only */
  SINGLE: 'single',
} as const;

export type RetrievalMode = (typeof RetrievalMode)[keyof typeof RetrievalMode];

export const RetrievalConfigSchema = z.object({
  mode: z.enum(['dual', 'single']).default('dual'),
  qaCollection: z.string().min(1).default('legal_qa'),
  docCollection: z.string().min(1).default('legal_doc'),
  /** Hits from the QA collection in dual mode */
  qaTopK: z.coerce.number().int().positive().default(3),
  /** Hits from the document collection in dual mode */
  docTopK: z.coerce.number().int().positive().default(6),
  /** Hits in single mode */
  topK: z.coerce.number().int().positive().default(6),
  /** Minimum similarity score */
  scoreThreshold: z.coerce.number().optional(),
});

export type RetrievalConfig = z.infer<typeof RetrievalConfigSchema>;

/**
 * Upper bound per capability call, in milliseconds
 */
export const PipelineTimeoutsSchema = z.object({
  embeddingMs: z.number().int().positive().default(15000),
  vectorSearchMs: z.number().int().positive().default(15000),
  rerankMs: z.number().int().positive().default(30000),
  llmMs: z.number().int().positive().default(60000),
  queryStoreMs: z.number().int().positive().default(10000),
});

export type PipelineTimeouts = z.infer<typeof PipelineTimeoutsSchema>;

export const PipelineConfigSchema = z.object({
  retrieval: RetrievalConfigSchema.default({}),

  /** Context length budget in characters */
  maxContextChars: z.coerce.number().int().positive().default(8000),

  /** Keyword-boosted search for every query unless the request overrides it */
  enableKeywords: z.boolean().default(false),

  /** Maximum keywords taken from the extraction reply */
  keywordTopK: z.number().int().positive().default(10),

  /** Extraction requests before the keyword path is abandoned */
  keywordMaxAttempts: z.number().int().positive().default(2),

  /** Classify queries first; irrelevant and history-answerable ones skip retrieval */
  enableIntentDetection: z.boolean().default(false),

  /** Classification requests before the query is treated as a legal question */
  intentMaxAttempts: z.number().int().positive().default(2),

  /** Paraphrase and search again once when the first retrieval finds nothing */
  enableParaphraseRetry: z.boolean().default(true),

  /** Pattern a generated answer must match at least once */
  citationPattern: z.string().min(1).default(DEFAULT_CITATION_PATTERN),

  /** Append the `References:` line to answers */
  appendReferences: z.boolean().default(true),

  timeouts: PipelineTimeoutsSchema.default({}),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

export function createDefaultPipelineConfig(overrides?: PipelineConfigInput): PipelineConfig {
  return PipelineConfigSchema.parse(overrides ?? {});
}

// =============================================================================
// Request
// =============================================================================

export const QueryRequestSchema = z.object({
  /** Raw user input; multi-line text is one query */
  queryText: z.string().refine((text) => text.trim() !== '', 'queryText must not be empty'),
  conversationHistory: z.array(ConversationTurnSchema).default([]),
  /** Provider override; unknown names fall back to the default */
  llmProviderName: z.string().nullable().default(null),
  /** Rerank retrieved documents before assembly */
  rerank: z.boolean().default(false),
  /** Overrides `enableKeywords` for this query */
  useKeywords: z.boolean().optional(),
});

export type QueryRequest = z.infer<typeof QueryRequestSchema>;
export type QueryRequestInput = z.input<typeof QueryRequestSchema>;

// =============================================================================
// Response
// =============================================================================

export interface QueryResponse {
  queryText: string;
  /** Generated answer, or the fixed message of a degraded outcome */
  responseText: string;
  /** Record ids of the documents in the context, in final order */
  sources: string[];
  /** Epoch seconds */
  timestamp: number;
}

/**
 * Wire shape of a response
 */
export interface SerializedQueryResponse {
  query_text: string;
  response_text: string;
  sources: string[];
  timestamp: number;
}

export function serializeQueryResponse(response: QueryResponse): SerializedQueryResponse {
  return {
    query_text: response.queryText,
    response_text: response.responseText,
    sources: [...response.sources],
    timestamp: response.timestamp,
  };
}

export interface QueryMetadata {
  outcome: AnswerOutcome;
  /** States visited, START through DONE or FAILED */
  states: PipelineState[];
  /** Provider that generated the answer; null on a cache hit */
  llmProvider: LLMProvider | null;
  rerankApplied: boolean;
  keywordSearchUsed: boolean;
  /** Rephrased query when the paraphrase retry ran */
  paraphrasedQuery: string | null;
  /** Null when no answer was generated */
  citationValid: boolean | null;
  cacheHit: boolean;
  warnings: ValidationWarning[];
  /** Milliseconds spent per state */
  timings: Partial<Record<PipelineState, number>>;
}

export interface PipelineResult {
  response: QueryResponse;
  metadata: QueryMetadata;
}

/**
 * Result of one submitted query
 */
export interface SubmitQueryResult extends PipelineResult {
  queryId: string;
}
