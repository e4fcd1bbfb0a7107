/**
 * RAG Query Service
 *
 * Entry point for callers: optionally classifies the query, consults the
 * response cache, runs the orchestrator on a miss, persists the completed
 * query once and reports readiness.
 *
 * @example
 * ```typescript
 * const service = new RAGQueryService({ embedder, vectorStore, llm, queryStore });
 * await service.initialize();
 *
 * const { queryId, response } = await service.submitQuery({
 *   queryText: 'Thời hiệu khởi kiện tranh chấp hợp đồng là bao lâu?',
 * });
 * console.log(serializeQueryResponse(response));
 * ```
 */

import { randomUUID } from 'node:crypto';

import {
  type PipelineConfigInput,
  type PipelineResult,
  type QueryMetadata,
  type QueryRequest,
  type QueryRequestInput,
  type SubmitQueryResult,
  AnswerOutcome,
  PipelineState,
} from './types.js';
import {
  type QueryOrchestratorDependencies,
  QueryOrchestrator,
  parseQueryRequest,
} from './query-orchestrator.js';
import { type ResponseCacheStats, ResponseCache, fingerprintQuery } from './response-cache.js';
import { Intention, IntentionDetector } from './intention-detector.js';
import { PromptTemplateSchema } from './prompts.js';
import type { EmbeddingProvider } from '../embeddings/index.js';
import type { LLMProvider, LLMProviderRegistry, ResolvedLLMProvider } from '../llm/index.js';
import type { VectorStore } from '../qdrant/index.js';
import type { Query, QueryStore } from '../store/index.js';
import {
  Capability,
  ConfigurationError,
  QueryCancelledError,
  type ValidationWarning,
  ValidationWarningCode,
  callCapability,
} from '../errors/index.js';
import { type Logger, getGlobalLogger } from '../logging/index.js';

// =============================================================================
// Dependencies
// =============================================================================

export interface RAGQueryServiceDependencies
  extends Omit<QueryOrchestratorDependencies, 'embedder' | 'vectorStore' | 'llm'> {
  embedder: EmbeddingProvider;
  vectorStore: Pick<VectorStore, 'search' | 'collectionExists'>;
  llm: Pick<LLMProviderRegistry, 'resolve' | 'listProviders' | 'isReady' | 'defaultProvider'>;
  queryStore: QueryStore;
  /** Null disables caching */
  cache?: ResponseCache | null | undefined;
  /** Query id generator */
  generateId?: (() => string) | undefined;
}

export interface SubmitQueryOptions {
  /**
   * Abort before the query starts rejects immediately; abort while it runs
   * lets the pipeline finish (cache and store are still written) and then
   * rejects.
   */
  signal?: AbortSignal | undefined;
}

export interface HealthStatus {
  /** Embedding, vector store and default LLM provider all available */
  ready: boolean;
  embedding: boolean;
  vectorStore: boolean;
  llm: boolean;
  defaultLlmProvider: LLMProvider;
  llmProviders: LLMProvider[];
  reranker: string | null;
  cache: ResponseCacheStats | null;
}

// =============================================================================
// RAGQueryService Class
// =============================================================================

export class RAGQueryService {
  private readonly orchestrator: QueryOrchestrator;
  private readonly embedder: EmbeddingProvider;
  private readonly vectorStore: Pick<VectorStore, 'search' | 'collectionExists'>;
  private readonly llm: RAGQueryServiceDependencies['llm'];
  private readonly queryStore: QueryStore;
  private readonly cache: ResponseCache | null;
  /** Null when intention detection is disabled */
  private readonly intentionDetector: IntentionDetector | null;
  private readonly rerankerName: string | null;
  private readonly logger: Logger;
  private readonly clock: () => number;
  private readonly generateId: () => string;

  private vectorStoreReady = false;
  private initialized = false;

  /**
   * @throws {ConfigurationError} if the pipeline configuration is invalid
   */
  constructor(deps: RAGQueryServiceDependencies, config?: PipelineConfigInput) {
    this.logger = (deps.logger ?? getGlobalLogger()).child('RAGQueryService');
    this.orchestrator = new QueryOrchestrator({ ...deps, logger: this.logger }, config);
    this.embedder = deps.embedder;
    this.vectorStore = deps.vectorStore;
    this.llm = deps.llm;
    this.queryStore = deps.queryStore;
    this.cache = deps.cache === undefined ? new ResponseCache() : deps.cache;
    this.rerankerName = deps.reranker?.name ?? null;
    this.clock = deps.clock ?? Date.now;
    this.generateId = deps.generateId ?? randomUUID;

    const pipeline = this.orchestrator.getConfig();
    this.intentionDetector = pipeline.enableIntentDetection
      ? new IntentionDetector(
          {
            prompt: PromptTemplateSchema.parse(deps.promptTemplate ?? {}).intentPrompt,
            maxAttempts: pipeline.intentMaxAttempts,
            timeoutMs: pipeline.timeouts.llmMs,
          },
          this.logger
        )
      : null;
  }

  // ===========================================================================
  // Initialization
  // ===========================================================================

  /**
   * Probe the embedding provider and the collections. A failed probe is
   * reported by `getHealth`; only a missing default LLM provider throws.
   *
   * @throws {ConfigurationError} if the default LLM provider is not configured
   */
  async initialize(): Promise<HealthStatus> {
    if (!this.llm.isReady()) {
      const error = new ConfigurationError(
        `Default LLM provider '${this.llm.defaultProvider}' is not configured`,
        { metadata: { available: this.llm.listProviders() } }
      );
      this.logger.error('Query service cannot start', error);
      throw error;
    }

    const embedderReady = await this.embedder.initialize();
    if (!embedderReady) {
      this.logger.warn('Embedding provider is not available', { provider: this.embedder.name });
    }

    const { retrieval, timeouts } = this.orchestrator.getConfig();
    const collections =
      retrieval.mode === 'dual'
        ? [retrieval.qaCollection, retrieval.docCollection]
        : [retrieval.qaCollection];
    const checks = await Promise.all(
      collections.map(async (collection) => {
        const result = await callCapability(() => this.vectorStore.collectionExists(collection), {
          capability: Capability.VECTOR_STORE,
          timeoutMs: timeouts.vectorSearchMs,
        });
        if (!result.ok || !result.value) {
          this.logger.warn('Collection is not available', {
            collection,
            reason: result.ok ? 'missing' : result.error.message,
          });
          return false;
        }
        return true;
      })
    );
    this.vectorStoreReady = checks.every(Boolean);
    this.initialized = true;

    const health = this.getHealth();
    this.logger.info('Query service initialized', {
      ready: health.ready,
      embedding: health.embedding,
      vectorStore: health.vectorStore,
      llmProviders: health.llmProviders,
    });
    return health;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  getHealth(): HealthStatus {
    const embedding = this.embedder.isInitialized();
    const llm = this.llm.isReady();
    return {
      ready: embedding && this.vectorStoreReady && llm,
      embedding,
      vectorStore: this.vectorStoreReady,
      llm,
      defaultLlmProvider: this.llm.defaultProvider,
      llmProviders: this.llm.listProviders(),
      reranker: this.rerankerName,
      cache: this.cache?.getStats() ?? null,
    };
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  /**
   * Answer a query. Degraded outcomes resolve with a fixed message.
   *
   * @throws {ConfigurationError} if no LLM provider can be resolved
   * @throws {QueryCancelledError} if `options.signal` is aborted
   */
  async submitQuery(
    input: QueryRequestInput,
    options: SubmitQueryOptions = {}
  ): Promise<SubmitQueryResult> {
    const { signal } = options;
    if (signal?.aborted) {
      throw new QueryCancelledError();
    }

    const request = parseQueryRequest(input);
    const queryId = this.generateId();
    const createTime = this.nowSeconds();
    const fingerprint = fingerprintQuery(request.queryText);
    const cacheable = this.cache !== null && request.conversationHistory.length === 0;

    const direct = await this.answerDirectly(request);
    const cached = direct === null && cacheable ? this.cache?.get(fingerprint) : undefined;
    let result: PipelineResult;
    if (direct) {
      result = direct;
    } else if (cached) {
      this.logger.info('Query served from cache', { queryId });
      result = { response: cached, metadata: cacheHitMetadata() };
    } else {
      result = await this.orchestrator.run(request, queryId);
      if (cacheable && result.metadata.outcome === AnswerOutcome.ANSWERED) {
        this.cache?.set(fingerprint, result.response);
      }
    }

    await this.persist(
      {
        queryId,
        cacheKey: fingerprint,
        queryText: request.queryText,
        conversationHistory: request.conversationHistory,
        llmProviderName: request.llmProviderName,
        isComplete: true,
        answerText: result.response.responseText,
        sources: result.response.sources,
        timestamp: result.response.timestamp,
        createTime,
      },
      result.metadata
    );

    if (signal?.aborted) {
      this.logger.info('Query completed after cancellation', { queryId });
      throw new QueryCancelledError();
    }
    return { queryId, ...result };
  }

  /**
   * Stored query by id, or null when unknown.
   *
   * @throws {TransientProviderError} if the store cannot be read
   */
  async getQuery(queryId: string): Promise<Query | null> {
    const result = await callCapability(() => this.queryStore.getItem(queryId), {
      capability: Capability.QUERY_STORE,
      timeoutMs: this.orchestrator.getConfig().timeouts.queryStoreMs,
    });
    if (!result.ok) {
      this.logger.error('Reading query failed', result.error, { queryId });
      throw result.error;
    }
    return result.value;
  }

  /**
   * Release the query store
   */
  async close(): Promise<void> {
    await this.queryStore.close();
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  /**
   * Reply without retrieval when the query is unrelated to law or answered
   * by the conversation; null when the pipeline should run.
   *
   * @throws {ConfigurationError} if no LLM provider can be resolved
   */
  private async answerDirectly(request: QueryRequest): Promise<PipelineResult | null> {
    if (this.intentionDetector === null) {
      return null;
    }

    let resolved: ResolvedLLMProvider;
    try {
      resolved = this.llm.resolve(request.llmProviderName);
    } catch (error) {
      this.logger.error('No usable LLM provider', error);
      throw error;
    }

    const { intention, responseText } = await this.intentionDetector.detect(
      request.queryText,
      request.conversationHistory,
      resolved.adapter
    );

    let outcome: AnswerOutcome;
    switch (intention) {
      case Intention.RAG:
        return null;
      case Intention.IRRELEVANT:
        outcome = AnswerOutcome.IRRELEVANT;
        break;
      case Intention.HISTORY:
        outcome = AnswerOutcome.ANSWERED_FROM_HISTORY;
        break;
      default: {
        const unreachable: never = intention;
        return unreachable;
      }
    }

    this.logger.info('Query answered without retrieval', { intention });
    return {
      response: {
        queryText: request.queryText,
        responseText,
        sources: [],
        timestamp: this.nowSeconds(),
      },
      metadata: {
        outcome,
        states: [PipelineState.START, PipelineState.DONE],
        llmProvider: resolved.provider,
        rerankApplied: false,
        keywordSearchUsed: false,
        paraphrasedQuery: null,
        citationValid: null,
        cacheHit: false,
        warnings: resolved.fellBack ? [fallbackWarning(request, resolved.provider)] : [],
        timings: {},
      },
    };
  }

  /**
   * One write per query; a failure is recorded as a warning
   */
  private async persist(query: Query, metadata: QueryMetadata): Promise<void> {
    const result = await callCapability(() => this.queryStore.putItem(query), {
      capability: Capability.QUERY_STORE,
      timeoutMs: this.orchestrator.getConfig().timeouts.queryStoreMs,
    });
    if (!result.ok) {
      this.logger.error('Persisting query failed', result.error, { queryId: query.queryId });
      metadata.warnings.push({
        code: ValidationWarningCode.PERSISTENCE_FAILED,
        message: `Query ${query.queryId} was not stored: ${result.error.message}`,
      });
    }
  }

  private nowSeconds(): number {
    return Math.floor(this.clock() / 1000);
  }
}

function fallbackWarning(request: QueryRequest, provider: LLMProvider): ValidationWarning {
  return {
    code: ValidationWarningCode.PROVIDER_FALLBACK,
    message: `LLM provider '${request.llmProviderName ?? ''}' is unavailable, used '${provider}'`,
  };
}

function cacheHitMetadata(): QueryMetadata {
  return {
    outcome: AnswerOutcome.ANSWERED,
    states: [PipelineState.START, PipelineState.DONE],
    llmProvider: null,
    rerankApplied: false,
    keywordSearchUsed: false,
    paraphrasedQuery: null,
    citationValid: null,
    cacheHit: true,
    warnings: [],
    timings: {},
  };
}
