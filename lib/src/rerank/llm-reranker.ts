/**
 * LLM Reranker
 *
 * Asks the model for a 1-10 relevance score per passage, one request each.
 */

import {
  type LLMRerankConfig,
  type RerankPassage,
  type RerankedPassage,
  type Reranker,
  RerankError,
  RerankErrorCode,
  RerankProviderName,
} from './types.js';
import { sortByScore } from './mapping.js';
import type { LLMAdapter } from '../llm/index.js';
import { toMessage } from '../errors/index.js';
import { type Logger, getGlobalLogger } from '../logging/index.js';

const SCORE_PATTERN = /\b([1-9]|10)\b/;

/**
 * First integer from 1 to 10 in the reply
 */
export function parseRelevanceScore(reply: string): number | undefined {
  const match = SCORE_PATTERN.exec(reply)?.[1];
  return match !== undefined ? parseInt(match, 10) : undefined;
}

export class LLMReranker implements Reranker {
  readonly name = RerankProviderName.LLM;
  private readonly logger: Logger;

  constructor(
    private readonly llm: Pick<LLMAdapter, 'sendMessage'>,
    private readonly config: LLMRerankConfig,
    logger?: Logger
  ) {
    this.logger = (logger ?? getGlobalLogger()).child('LLMReranker');
  }

  /**
   * A passage whose request fails or whose reply has no score gets
   * `defaultScore`.
   *
   * @throws {RerankError} if every request failed
   */
  async rerank(query: string, passages: RerankPassage[]): Promise<RerankedPassage[]> {
    const scored: RerankedPassage[] = [];
    let failures = 0;
    let lastError: unknown;

    for (const passage of passages) {
      const prompt = this.config.prompt
        .replaceAll('{query}', () => query)
        .replaceAll('{document}', () => passage.text);
      try {
        const { content } = await this.llm.sendMessage(prompt, { temperature: 0 });
        const score = parseRelevanceScore(content);
        if (score === undefined) {
          this.logger.debug('No score in relevance reply', { id: passage.id, reply: content });
        }
        scored.push({ ...passage, score: score ?? this.config.defaultScore });
      } catch (error) {
        failures += 1;
        lastError = error;
        this.logger.warn('Relevance scoring failed', { id: passage.id, reason: toMessage(error) });
        scored.push({ ...passage, score: this.config.defaultScore });
      }
    }

    if (passages.length > 0 && failures === passages.length) {
      throw new RerankError(
        `Relevance scoring failed for all ${passages.length} passages: ${toMessage(lastError)}`,
        RerankErrorCode.ALL_SCORES_FAILED,
        { cause: lastError instanceof Error ? lastError : undefined }
      );
    }

    return sortByScore(scored);
  }
}
