/**
 * Intention Detector
 *
 * Classifies a query before retrieval. Queries unrelated to law and
 * queries the conversation already answers get a direct reply; everything
 * else, including every failure, goes through the RAG pipeline.
 */

import { z } from 'zod';

import { DEFAULT_INTENT_PROMPT, fillTemplate } from './prompts.js';
import { IRRELEVANT_QUERY_MESSAGE } from './types.js';
import type { ConversationTurn, LLMAdapter } from '../llm/index.js';
import { Capability, callCapability } from '../errors/index.js';
import { type Logger, getGlobalLogger } from '../logging/index.js';

export const Intention = {
  /** Not a legal question */
  IRRELEVANT: 'irrelevant',
  /** Answerable from the conversation history */
  HISTORY: 'history',
  /** Needs retrieval */
  RAG: 'rag',
} as const;

export type Intention = (typeof Intention)[keyof typeof Intention];

export interface IntentionResult {
  intention: Intention;
  /** Direct reply; empty for `rag` */
  responseText: string;
}

export const IntentionDetectorConfigSchema = z.object({
  prompt: z.string().min(1).default(DEFAULT_INTENT_PROMPT),
  maxAttempts: z.number().int().positive().default(2),
  timeoutMs: z.number().int().positive().default(60000),
});

export type IntentionDetectorConfig = z.infer<typeof IntentionDetectorConfigSchema>;
export type IntentionDetectorConfigInput = z.input<typeof IntentionDetectorConfigSchema>;

const IntentionSchema = z.enum(['irrelevant', 'history', 'rag']);

const IntentionReplySchema = z.object({
  intention: z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .pipe(IntentionSchema),
  response: z.string().default(''),
});

const JSON_OBJECT = /\{[\s\S]*\}/;
const SURROUNDING_QUOTES = /^['"]|['"]$/g;

function ragResult(): IntentionResult {
  return { intention: Intention.RAG, responseText: '' };
}

/**
 * Intention from a `{"intention", "response"}` object or from a bare label
 * such as `rag` or `'history'`.
 *
 * @returns null when the reply names no known intention
 */
export function parseIntentionReply(reply: string): IntentionResult | null {
  const label = IntentionSchema.safeParse(
    reply.trim().replace(SURROUNDING_QUOTES, '').toLowerCase()
  );
  if (label.success) {
    return { intention: label.data, responseText: '' };
  }

  const json = JSON_OBJECT.exec(reply)?.[0];
  if (json === undefined) {
    return null;
  }

  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch {
    return null;
  }

  const parsed = IntentionReplySchema.safeParse(value);
  if (!parsed.success) {
    return null;
  }
  return { intention: parsed.data.intention, responseText: parsed.data.response.trim() };
}

export function formatHistory(history: readonly ConversationTurn[]): string {
  if (history.length === 0) {
    return 'No prior conversation.';
  }
  return history
    .map((turn) => `${turn.role === 'user' ? 'User' : 'Assistant'}: ${turn.content}`)
    .join('\n');
}

export class IntentionDetector {
  private readonly config: IntentionDetectorConfig;
  private readonly logger: Logger;

  constructor(config?: IntentionDetectorConfigInput, logger?: Logger) {
    this.config = IntentionDetectorConfigSchema.parse(config ?? {});
    this.logger = (logger ?? getGlobalLogger()).child('IntentionDetector');
  }

  /**
   * Classify `queryText`. Falls back to `rag` once every attempt failed.
   */
  async detect(
    queryText: string,
    history: readonly ConversationTurn[],
    llm: Pick<LLMAdapter, 'sendMessage'>
  ): Promise<IntentionResult> {
    const prompt = fillTemplate(this.config.prompt, {
      query: queryText,
      history: formatHistory(history),
    });

    for (let attempt = 1; attempt <= this.config.maxAttempts; attempt++) {
      const result = await callCapability(
        () => llm.sendMessage(prompt, { temperature: 0, responseFormat: 'json' }),
        { capability: Capability.INTENT_DETECTION, timeoutMs: this.config.timeoutMs }
      );

      if (!result.ok) {
        this.logger.warn('Intention request failed', { attempt, reason: result.error.message });
        continue;
      }

      const parsed = parseIntentionReply(result.value.content);
      if (parsed === null) {
        this.logger.warn('Unrecognized intention reply', { attempt });
        continue;
      }

      this.logger.debug('Intention detected', { attempt, intention: parsed.intention });
      return this.withReply(parsed);
    }

    this.logger.error('Intention detection failed, treating query as a legal question', {
      attempts: this.config.maxAttempts,
    });
    return ragResult();
  }

  private withReply(result: IntentionResult): IntentionResult {
    switch (result.intention) {
      case Intention.RAG:
        return ragResult();
      case Intention.IRRELEVANT:
        return {
          intention: Intention.IRRELEVANT,
          responseText: result.responseText || IRRELEVANT_QUERY_MESSAGE,
        };
      case Intention.HISTORY:
        if (result.responseText === '') {
          this.logger.warn('History intention came without a reply, retrieving instead');
          return ragResult();
        }
        return result;
      default: {
        const unreachable: never = result.intention;
        return unreachable;
      }
    }
  }
}
