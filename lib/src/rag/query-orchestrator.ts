/**
 * Query Orchestrator
 *
 * Drives one query through the pipeline:
 *
 *   START → EMBEDDING → RETRIEVING → (RETRY_WITH_PARAPHRASE)? → (RERANKING)?
 *         → ASSEMBLING → GENERATING → VALIDATING → DONE | FAILED
 *
 * Every capability call is timed and its failure converted into a fallback;
 * the only error that leaves `run` is a ConfigurationError raised when no
 * LLM provider can be resolved.
 */

import { randomUUID } from 'node:crypto';

import {
  type PipelineConfig,
  type PipelineConfigInput,
  type PipelineResult,
  type QueryRequest,
  type QueryRequestInput,
  type QueryResponse,
  type QueryMetadata,
  AnswerOutcome,
  EMBEDDING_ERROR_MESSAGE,
  GENERATION_ERROR_MESSAGE,
  NO_RESULTS_MESSAGE,
  PipelineConfigSchema,
  PipelineState,
  QueryRequestSchema,
} from './types.js';
import { ContextAssembler } from './context-assembler.js';
import { KeywordExtractor } from './keyword-extractor.js';
import { PromptBuilder } from './prompt-builder.js';
import type { PromptTemplateInput } from './prompts.js';
import { PipelineTracker } from './pipeline-tracker.js';
import type { EmbeddingProvider } from '../embeddings/index.js';
import type { LLMAdapter, LLMProviderRegistry, ResolvedLLMProvider } from '../llm/index.js';
import type { RetrievedDocument, VectorStore } from '../qdrant/index.js';
import { type Reranker, fromRerankPassages, toRerankPassages } from '../rerank/index.js';
import {
  appendReferences,
  compileCitationPattern,
  resolveDocumentSources,
  validateCitation,
} from '../citations/index.js';
import {
  type ValidationWarning,
  Capability,
  ConfigurationError,
  ValidationWarningCode,
  callCapability,
} from '../errors/index.js';
import { type Logger, getGlobalLogger } from '../logging/index.js';

// =============================================================================
// Dependencies
// =============================================================================

export interface QueryOrchestratorDependencies {
  embedder: Pick<EmbeddingProvider, 'embed'>;
  vectorStore: Pick<VectorStore, 'search'>;
  llm: Pick<LLMProviderRegistry, 'resolve'>;
  /** Absent when reranking is not configured */
  reranker?: Reranker | null | undefined;
  promptTemplate?: PromptTemplateInput | undefined;
  logger?: Logger | undefined;
  /** Clock in epoch milliseconds */
  clock?: (() => number) | undefined;
}

interface CollectionPlan {
  collection: string;
  topK: number;
}

interface RetrievalResult {
  documents: RetrievedDocument[];
  keywordSearchUsed: boolean;
}

/**
 * Mutable state of one run
 */
interface RunContext {
  requestId: string;
  request: QueryRequest;
  tracker: PipelineTracker;
  logger: Logger;
  warnings: ValidationWarning[];
  llm: LLMAdapter;
  metadata: Omit<QueryMetadata, 'outcome' | 'states' | 'timings' | 'warnings'>;
}

/**
 * Drop repeated record ids; the first occurrence wins
 */
export function dedupeByRecordId(documents: readonly RetrievedDocument[]): RetrievedDocument[] {
  const seen = new Set<string>();
  return documents.filter((doc) => {
    if (seen.has(doc.recordId)) {
      return false;
    }
    seen.add(doc.recordId);
    return true;
  });
}

// =============================================================================
// QueryOrchestrator Class
// =============================================================================

export class QueryOrchestrator {
  private readonly config: PipelineConfig;
  private readonly embedder: Pick<EmbeddingProvider, 'embed'>;
  private readonly vectorStore: Pick<VectorStore, 'search'>;
  private readonly llm: Pick<LLMProviderRegistry, 'resolve'>;
  private readonly reranker: Reranker | null;
  private readonly assembler: ContextAssembler;
  private readonly keywordExtractor: KeywordExtractor;
  private readonly promptBuilder: PromptBuilder;
  private readonly citationPattern: RegExp;
  private readonly logger: Logger;
  private readonly clock: () => number;

  /**
   * @throws {ConfigurationError} if the configuration or citation pattern is invalid
   */
  constructor(deps: QueryOrchestratorDependencies, config?: PipelineConfigInput) {
    const parsed = PipelineConfigSchema.safeParse(config ?? {});
    if (!parsed.success) {
      const issues = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
      throw new ConfigurationError(`Invalid pipeline configuration: ${issues.join(', ')}`, {
        issues,
      });
    }
    this.config = parsed.data;
    this.citationPattern = compileCitationPattern(this.config.citationPattern);

    this.embedder = deps.embedder;
    this.vectorStore = deps.vectorStore;
    this.llm = deps.llm;
    this.reranker = deps.reranker ?? null;
    this.logger = (deps.logger ?? getGlobalLogger()).child('QueryOrchestrator');
    this.clock = deps.clock ?? Date.now;

    this.assembler = new ContextAssembler({ maxChars: this.config.maxContextChars }, this.logger);
    this.promptBuilder = new PromptBuilder(deps.promptTemplate);
    this.keywordExtractor = new KeywordExtractor(
      {
        prompt: this.promptBuilder.getTemplate().keywordPrompt,
        topK: this.config.keywordTopK,
        maxAttempts: this.config.keywordMaxAttempts,
        timeoutMs: this.config.timeouts.llmMs,
      },
      this.logger
    );
  }

  getConfig(): Readonly<PipelineConfig> {
    return this.config;
  }

  /**
   * Answer one query.
   *
   * @throws {ConfigurationError} if no LLM provider can be resolved
   */
  async run(input: QueryRequestInput, requestId: string = randomUUID()): Promise<PipelineResult> {
    const request = parseQueryRequest(input);
    const logger = this.logger.withContext({ requestId });
    const tracker = new PipelineTracker(requestId, { logger });

    let resolved: ResolvedLLMProvider;
    try {
      resolved = this.llm.resolve(request.llmProviderName);
    } catch (error) {
      logger.error('No usable LLM provider', error);
      tracker.complete(PipelineState.FAILED);
      throw error;
    }

    const ctx: RunContext = {
      requestId,
      request,
      tracker,
      logger,
      warnings: [],
      llm: resolved.adapter,
      metadata: {
        llmProvider: resolved.provider,
        rerankApplied: false,
        keywordSearchUsed: false,
        paraphrasedQuery: null,
        citationValid: null,
        cacheHit: false,
      },
    };
    if (resolved.fellBack) {
      this.warn(
        ctx,
        ValidationWarningCode.PROVIDER_FALLBACK,
        `LLM provider '${request.llmProviderName ?? ''}' is unavailable, used '${resolved.provider}'`
      );
    }

    logger.info('Query started', {
      provider: resolved.provider,
      queryLength: request.queryText.length,
      historyTurns: request.conversationHistory.length,
      rerank: request.rerank,
    });

    // Embedding
    tracker.transition(PipelineState.EMBEDDING);
    const vector = await this.embed(ctx, request.queryText);
    if (vector.length === 0) {
      return this.finish(ctx, AnswerOutcome.EMBEDDING_FAILED, EMBEDDING_ERROR_MESSAGE, []);
    }

    // Retrieval
    tracker.transition(PipelineState.RETRIEVING);
    const useKeywords = request.useKeywords ?? this.config.enableKeywords;
    const retrieval = await this.retrieve(ctx, request.queryText, vector, useKeywords);
    ctx.metadata.keywordSearchUsed = retrieval.keywordSearchUsed;
    let documents = retrieval.documents;

    if (documents.length === 0 && this.config.enableParaphraseRetry) {
      tracker.transition(PipelineState.RETRY_WITH_PARAPHRASE);
      documents = await this.retryWithParaphrase(ctx);
    }

    if (documents.length === 0) {
      logger.info('No documents retrieved');
      return this.finish(ctx, AnswerOutcome.NO_RESULTS, NO_RESULTS_MESSAGE, []);
    }

    documents = resolveDocumentSources(dedupeByRecordId(documents), logger);

    // Reranking
    if (request.rerank) {
      documents = await this.rerank(ctx, documents);
    }

    // Assembly
    tracker.transition(PipelineState.ASSEMBLING);
    const assembled = this.assembler.assemble(documents);
    if (assembled.truncated) {
      this.warn(
        ctx,
        ValidationWarningCode.CONTEXT_TRUNCATED,
        `Context cut from ${assembled.originalLength} to ${this.config.maxContextChars} characters`
      );
    }
    const sources = assembled.documents.map((doc) => doc.recordId);
    if (sources.length === 0) {
      logger.info('No retrieved document has content');
      return this.finish(ctx, AnswerOutcome.NO_RESULTS, NO_RESULTS_MESSAGE, []);
    }

    // Generation
    tracker.transition(PipelineState.GENERATING);
    const messages = this.promptBuilder.build({
      queryText: request.queryText,
      context: assembled.context,
      conversationHistory: request.conversationHistory,
    });
    const generated = await callCapability(() => ctx.llm.complete(messages), {
      capability: Capability.LLM,
      timeoutMs: this.config.timeouts.llmMs,
    });
    const answer = generated.ok ? generated.value.content.trim() : '';
    if (!generated.ok || answer === '') {
      logger.error('Answer generation failed', generated.ok ? undefined : generated.error, {
        provider: ctx.metadata.llmProvider,
        reason: generated.ok ? 'empty reply' : generated.error.message,
      });
      return this.finish(
        ctx,
        AnswerOutcome.GENERATION_FAILED,
        this.withReferences(GENERATION_ERROR_MESSAGE, sources),
        sources
      );
    }

    // Validation
    tracker.transition(PipelineState.VALIDATING);
    const citationValid = validateCitation(answer, this.citationPattern);
    ctx.metadata.citationValid = citationValid;
    if (!citationValid) {
      this.warn(ctx, ValidationWarningCode.CITATION_MISSING, 'Answer carries no citation marker');
    }

    return this.finish(ctx, AnswerOutcome.ANSWERED, this.withReferences(answer, sources), sources);
  }

  private withReferences(text: string, sources: readonly string[]): string {
    return this.config.appendReferences ? appendReferences(text, sources) : text;
  }

  // ===========================================================================
  // Pipeline Steps
  // ===========================================================================

  private async embed(ctx: RunContext, text: string): Promise<number[]> {
    const result = await callCapability(() => this.embedder.embed(text), {
      capability: Capability.EMBEDDING,
      timeoutMs: this.config.timeouts.embeddingMs,
    });
    if (!result.ok) {
      ctx.logger.error('Embedding failed', result.error);
      return [];
    }
    if (result.value.length === 0) {
      ctx.logger.error('Embedding provider returned no vector');
    }
    return result.value;
  }

  private collectionPlan(): CollectionPlan[] {
    const { retrieval } = this.config;
    switch (retrieval.mode) {
      case 'dual':
        return [
          { collection: retrieval.qaCollection, topK: retrieval.qaTopK },
          { collection: retrieval.docCollection, topK: retrieval.docTopK },
        ];
      case 'single':
        return [{ collection: retrieval.qaCollection, topK: retrieval.topK }];
      default: {
        const unreachable: never = retrieval.mode;
        throw new ConfigurationError(`Unsupported retrieval mode: ${String(unreachable)}`);
      }
    }
  }

  /**
   * Plain vector search per collection, then optionally keyword-boosted
   * search merged in front of it. QA results precede document results.
   */
  private async retrieve(
    ctx: RunContext,
    queryText: string,
    vector: number[],
    useKeywords: boolean
  ): Promise<RetrievalResult> {
    const plan = this.collectionPlan();
    const plain = await Promise.all(
      plan.map(async (p) => (await this.search(ctx, p, vector)) ?? [])
    );

    if (!useKeywords) {
      return { documents: dedupeByRecordId(plain.flat()), keywordSearchUsed: false };
    }

    const keywords = await this.keywordExtractor.extract(queryText, ctx.llm);
    if (keywords.length === 0) {
      this.warn(
        ctx,
        ValidationWarningCode.KEYWORD_EXTRACTION_FAILED,
        'No keywords extracted, using plain vector search'
      );
      return { documents: dedupeByRecordId(plain.flat()), keywordSearchUsed: false };
    }

    const boosted = await Promise.all(plan.map((p) => this.search(ctx, p, vector, keywords)));
    let keywordSearchUsed = false;
    const merged = plan.flatMap((p, i) => {
      const plainHits = plain[i] ?? [];
      const keywordHits = boosted[i];
      if (!keywordHits) {
        return plainHits;
      }
      keywordSearchUsed = true;
      return dedupeByRecordId([...keywordHits, ...plainHits]).slice(0, p.topK);
    });

    ctx.logger.debug('Keyword-boosted retrieval', { keywords, hits: merged.length });
    return { documents: dedupeByRecordId(merged), keywordSearchUsed };
  }

  /**
   * @returns null when the search failed
   */
  private async search(
    ctx: RunContext,
    plan: CollectionPlan,
    vector: number[],
    keywords?: string[]
  ): Promise<RetrievedDocument[] | null> {
    const result = await callCapability(
      () =>
        this.vectorStore.search(plan.collection, vector, {
          limit: plan.topK,
          ...(keywords && { keywords }),
          ...(this.config.retrieval.scoreThreshold !== undefined && {
            scoreThreshold: this.config.retrieval.scoreThreshold,
          }),
        }),
      { capability: Capability.VECTOR_STORE, timeoutMs: this.config.timeouts.vectorSearchMs }
    );
    if (!result.ok) {
      this.warn(
        ctx,
        ValidationWarningCode.RETRIEVAL_FAILED,
        `Search in '${plan.collection}' failed: ${result.error.message}`
      );
      return null;
    }
    return result.value;
  }

  private async retryWithParaphrase(ctx: RunContext): Promise<RetrievedDocument[]> {
    const prompt = this.promptBuilder.buildParaphrasePrompt(ctx.request.queryText);
    const result = await callCapability(() => ctx.llm.sendMessage(prompt), {
      capability: Capability.LLM,
      timeoutMs: this.config.timeouts.llmMs,
    });
    const paraphrase = result.ok ? result.value.content.trim() : '';
    if (paraphrase === '') {
      this.warn(
        ctx,
        ValidationWarningCode.PARAPHRASE_FAILED,
        result.ok ? 'Paraphrase reply was empty' : `Paraphrase failed: ${result.error.message}`
      );
      return [];
    }

    ctx.metadata.paraphrasedQuery = paraphrase;
    ctx.logger.info('Retrying retrieval with paraphrased query', { paraphrase });

    const vector = await this.embed(ctx, paraphrase);
    if (vector.length === 0) {
      return [];
    }
    const plan = this.collectionPlan();
    const hits = await Promise.all(
      plan.map(async (p) => (await this.search(ctx, p, vector)) ?? [])
    );
    return dedupeByRecordId(hits.flat());
  }

  /**
   * Reorder by the reranker; any failure keeps the retrieval order.
   */
  private async rerank(
    ctx: RunContext,
    documents: RetrievedDocument[]
  ): Promise<RetrievedDocument[]> {
    const reranker = this.reranker;
    if (!reranker) {
      this.warn(
        ctx,
        ValidationWarningCode.RERANK_UNAVAILABLE,
        'Reranking requested but not configured'
      );
      return documents;
    }

    ctx.tracker.transition(PipelineState.RERANKING);
    const passages = toRerankPassages(documents);
    if (passages.length === 0) {
      return documents;
    }

    const result = await callCapability(() => reranker.rerank(ctx.request.queryText, passages), {
      capability: Capability.RERANKER,
      timeoutMs: this.config.timeouts.rerankMs,
    });
    if (!result.ok) {
      this.warn(ctx, ValidationWarningCode.RERANK_FAILED, `Rerank failed: ${result.error.message}`);
      return documents;
    }

    const reranked = fromRerankPassages(result.value, documents, ctx.logger);
    if (reranked.length === 0) {
      this.warn(ctx, ValidationWarningCode.RERANK_FAILED, 'Reranker returned no known passages');
      return documents;
    }

    ctx.metadata.rerankApplied = true;
    ctx.logger.debug('Documents reranked', {
      reranker: reranker.name,
      order: reranked.map((doc) => doc.recordId),
    });
    return reranked;
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private warn(ctx: RunContext, code: ValidationWarningCode, message: string): void {
    ctx.warnings.push({ code, message });
    ctx.logger.warn(message, { code });
  }

  private finish(
    ctx: RunContext,
    outcome: AnswerOutcome,
    responseText: string,
    sources: string[]
  ): PipelineResult {
    const terminal =
      outcome === AnswerOutcome.ANSWERED || outcome === AnswerOutcome.NO_RESULTS
        ? PipelineState.DONE
        : PipelineState.FAILED;
    const summary = ctx.tracker.complete(terminal);

    const response: QueryResponse = {
      queryText: ctx.request.queryText,
      responseText,
      sources,
      timestamp: Math.floor(this.clock() / 1000),
    };
    return {
      response,
      metadata: {
        ...ctx.metadata,
        outcome,
        states: summary.states,
        timings: summary.timings,
        warnings: ctx.warnings,
      },
    };
  }
}

/**
 * @throws {ConfigurationError} if the request does not validate
 */
export function parseQueryRequest(input: unknown): QueryRequest {
  const result = QueryRequestSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigurationError(`Invalid query request: ${issues.join(', ')}`, { issues });
  }
  return result.data;
}
