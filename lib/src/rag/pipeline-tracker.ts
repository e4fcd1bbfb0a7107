/**
 * Pipeline Tracker
 *
 * Records the state transitions of one query and the time spent in each
 * state, and logs a summary when the query reaches DONE or FAILED.
 *
 * @example
 * ```typescript
 * const tracker = new PipelineTracker('q-123');
 *
 * tracker.transition(PipelineState.EMBEDDING);
 * const vector = await embedder.embed(query);
 *
 * tracker.transition(PipelineState.RETRIEVING);
 * const docs = await vectorStore.search('legal_qa', vector);
 *
 * const summary = tracker.complete(PipelineState.DONE);
 * // { states: ['START', 'EMBEDDING', 'RETRIEVING', 'DONE'], timings: {...}, totalMs: 412 }
 * ```
 */

import { z } from 'zod';

import { PipelineState, type TerminalState } from './types.js';
import { type Logger, getGlobalLogger } from '../logging/index.js';

// =============================================================================
// Types & Schemas
// =============================================================================

export const LatencyThresholdsSchema = z.object({
  /** Warn if embedding takes longer than this (ms) */
  embeddingWarnMs: z.number().default(1000),
  /** Warn if retrieval takes longer than this (ms) */
  retrievalWarnMs: z.number().default(2000),
  /** Warn if generation takes longer than this (ms) */
  generationWarnMs: z.number().default(20000),
  /** Warn if the whole query takes longer than this (ms) */
  totalWarnMs: z.number().default(30000),
  /** Error if the whole query takes longer than this (ms) */
  totalErrorMs: z.number().default(60000),
});

export type LatencyThresholds = z.infer<typeof LatencyThresholdsSchema>;
export type LatencyThresholdsInput = z.input<typeof LatencyThresholdsSchema>;

export const DEFAULT_LATENCY_THRESHOLDS: LatencyThresholds = LatencyThresholdsSchema.parse({});

export interface PipelineSummary {
  requestId: string;
  /** Visited states in order, ending with DONE or FAILED */
  states: PipelineState[];
  /** Milliseconds per state; a state entered twice accumulates */
  timings: Partial<Record<PipelineState, number>>;
  totalMs: number;
}

export interface PipelineTrackerOptions {
  logger?: Logger | undefined;
  thresholds?: LatencyThresholdsInput | undefined;
  /** Monotonic clock in milliseconds */
  now?: (() => number) | undefined;
  /** Context attached to the summary log entry */
  metadata?: Record<string, unknown> | undefined;
}

// =============================================================================
// PipelineTracker Class
// =============================================================================

export class PipelineTracker {
  private readonly logger: Logger;
  private readonly thresholds: LatencyThresholds;
  private readonly now: () => number;
  private readonly metadata: Record<string, unknown>;
  private readonly startTime: number;
  private readonly visited: PipelineState[] = [PipelineState.START];
  private readonly timings: Partial<Record<PipelineState, number>> = {};
  private stateStartedAt: number;
  private summary: PipelineSummary | undefined;

  constructor(
    private readonly requestId: string,
    options: PipelineTrackerOptions = {}
  ) {
    this.logger = (options.logger ?? getGlobalLogger()).child('PipelineTracker');
    this.thresholds = LatencyThresholdsSchema.parse(options.thresholds ?? {});
    this.now = options.now ?? (() => performance.now());
    this.metadata = { ...options.metadata };
    this.startTime = this.now();
    this.stateStartedAt = this.startTime;
  }

  get current(): PipelineState {
    return this.visited[this.visited.length - 1] ?? PipelineState.START;
  }

  get states(): readonly PipelineState[] {
    return this.visited;
  }

  /**
   * Leave the current state and enter `state`. Ignored once completed.
   */
  transition(state: PipelineState): void {
    if (this.summary) {
      this.logger.warn('Transition after completion ignored', {
        requestId: this.requestId,
        state,
      });
      return;
    }
    const from = this.closeCurrentState();
    this.visited.push(state);
    this.logger.trace('State transition', { requestId: this.requestId, from, to: state });
  }

  /**
   * Enter the terminal state and log the summary. Repeated calls return
   * the first summary.
   */
  complete(state: TerminalState): PipelineSummary {
    if (this.summary) {
      return this.summary;
    }
    this.closeCurrentState();
    this.visited.push(state);

    const summary: PipelineSummary = {
      requestId: this.requestId,
      states: [...this.visited],
      timings: { ...this.timings },
      totalMs: round(this.now() - this.startTime),
    };
    this.summary = summary;
    this.logSummary(summary);
    return summary;
  }

  getElapsedMs(): number {
    return this.now() - this.startTime;
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private closeCurrentState(): PipelineState {
    const state = this.current;
    const now = this.now();
    const duration = now - this.stateStartedAt;
    this.timings[state] = round((this.timings[state] ?? 0) + duration);
    this.stateStartedAt = now;

    if (duration > this.warnThreshold(state)) {
      this.logger.warn(`State ${state} was slow`, {
        requestId: this.requestId,
        state,
        durationMs: round(duration),
      });
    }
    return state;
  }

  private warnThreshold(state: PipelineState): number {
    switch (state) {
      case PipelineState.EMBEDDING:
        return this.thresholds.embeddingWarnMs;
      case PipelineState.RETRIEVING:
      case PipelineState.RETRY_WITH_PARAPHRASE:
        return this.thresholds.retrievalWarnMs;
      case PipelineState.GENERATING:
        return this.thresholds.generationWarnMs;
      default:
        return Number.POSITIVE_INFINITY;
    }
  }

  private logSummary(summary: PipelineSummary): void {
    const context = {
      requestId: summary.requestId,
      totalMs: summary.totalMs,
      states: summary.states.join(' → '),
      timings: summary.timings,
      ...this.metadata,
    };
    const outcome = summary.states[summary.states.length - 1] ?? PipelineState.DONE;
    const verb = outcome === PipelineState.DONE ? 'completed' : 'failed';
    const message = `Query pipeline ${verb} in ${summary.totalMs.toFixed(0)}ms`;

    if (summary.totalMs > this.thresholds.totalErrorMs) {
      this.logger.error(message, context);
    } else if (summary.totalMs > this.thresholds.totalWarnMs) {
      this.logger.warn(message, context);
    } else {
      this.logger.info(message, context);
    }
  }
}

function round(ms: number): number {
  return Math.round(ms * 100) / 100;
}
