/**
 * RAG Pipeline Module
 */

export {
  EMBEDDING_ERROR_MESSAGE,
  GENERATION_ERROR_MESSAGE,
  NO_RESULTS_MESSAGE,
  IRRELEVANT_QUERY_MESSAGE,
  PipelineState,
  type TerminalState,
  AnswerOutcome,
  RetrievalMode,
  RetrievalConfigSchema,
  type RetrievalConfig,
  PipelineTimeoutsSchema,
  type PipelineTimeouts,
  PipelineConfigSchema,
  type PipelineConfig,
  type PipelineConfigInput,
  createDefaultPipelineConfig,
  QueryRequestSchema,
  type QueryRequest,
  type QueryRequestInput,
  type QueryResponse,
  type SerializedQueryResponse,
  serializeQueryResponse,
  type QueryMetadata,
  type PipelineResult,
  type SubmitQueryResult,
} from './types.js';

export {
  DEFAULT_SYSTEM_PROMPT,
  DEFAULT_USER_PROMPT,
  DEFAULT_PARAPHRASE_PROMPT,
  DEFAULT_KEYWORD_PROMPT,
  DEFAULT_INTENT_PROMPT,
  PromptTemplateSchema,
  type PromptTemplate,
  type PromptTemplateInput,
  DEFAULT_PROMPT_TEMPLATE,
  fillTemplate,
} from './prompts.js';

export {
  CONTEXT_SEPARATOR,
  ContextAssemblerConfigSchema,
  type ContextAssemblerConfig,
  type ContextAssemblerConfigInput,
  type AssembledContext,
  hasContent,
  formatDocumentBlock,
  ContextAssembler,
} from './context-assembler.js';

export {
  KeywordExtractorConfigSchema,
  type KeywordExtractorConfig,
  type KeywordExtractorConfigInput,
  parseKeywordReply,
  KeywordExtractor,
} from './keyword-extractor.js';

export {
  Intention,
  type IntentionResult,
  IntentionDetectorConfigSchema,
  type IntentionDetectorConfig,
  type IntentionDetectorConfigInput,
  parseIntentionReply,
  formatHistory,
  IntentionDetector,
} from './intention-detector.js';

export { type PromptInput, PromptBuilder } from './prompt-builder.js';

export {
  LatencyThresholdsSchema,
  type LatencyThresholds,
  type LatencyThresholdsInput,
  DEFAULT_LATENCY_THRESHOLDS,
  type PipelineSummary,
  type PipelineTrackerOptions,
  PipelineTracker,
} from './pipeline-tracker.js';

export {
  ResponseCacheConfigSchema,
  type ResponseCacheConfig,
  type ResponseCacheConfigInput,
  type ResponseCacheEventType,
  type CacheEntry,
  type ResponseCacheStats,
  fingerprintQuery,
  ResponseCache,
} from './response-cache.js';

export {
  type QueryOrchestratorDependencies,
  dedupeByRecordId,
  QueryOrchestrator,
  parseQueryRequest,
} from './query-orchestrator.js';

export {
  type RAGQueryServiceDependencies,
  type SubmitQueryOptions,
  type HealthStatus,
  RAGQueryService,
} from './query-service.js';

export { type CreateQueryServiceOptions, createQueryServiceFromConfig } from './bootstrap.js';
