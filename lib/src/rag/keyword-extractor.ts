/**
 * Keyword Extractor
 *
 * Asks the LLM for legal search terms used to filter the keyword-boosted
 * search. Failures yield no keywords; the caller falls back to plain
 * vector search.
 */

import { z } from 'zod';

import { DEFAULT_KEYWORD_PROMPT, fillTemplate } from './prompts.js';
import type { LLMAdapter } from '../llm/index.js';
import { Capability, callCapability } from '../errors/index.js';
import { type Logger, getGlobalLogger } from '../logging/index.js';

export const KeywordExtractorConfigSchema = z.object({
  prompt: z.string().min(1).default(DEFAULT_KEYWORD_PROMPT),
  topK: z.number().int().positive().default(10),
  maxAttempts: z.number().int().positive().default(2),
  timeoutMs: z.number().int().positive().default(60000),
});

export type KeywordExtractorConfig = z.infer<typeof KeywordExtractorConfigSchema>;
export type KeywordExtractorConfigInput = z.input<typeof KeywordExtractorConfigSchema>;

const KeywordReplySchema = z.object({
  keywords: z.array(z.unknown()),
});

const JSON_OBJECT = /\{[\s\S]*\}/;

/**
 * Keywords from a reply that holds a `{"keywords": [...]}` object, possibly
 * wrapped in prose or a code fence. Non-string and blank entries are
 * dropped, duplicates removed.
 *
 * @returns null when the reply carries no such object
 */
export function parseKeywordReply(reply: string): string[] | null {
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

  const parsed = KeywordReplySchema.safeParse(value);
  if (!parsed.success) {
    return null;
  }

  const keywords = parsed.data.keywords
    .filter((k): k is string => typeof k === 'string')
    .map((k) => k.trim())
    .filter((k) => k !== '');
  return Array.from(new Set(keywords));
}

export class KeywordExtractor {
  private readonly config: KeywordExtractorConfig;
  private readonly logger: Logger;

  constructor(config?: KeywordExtractorConfigInput, logger?: Logger) {
    this.config = KeywordExtractorConfigSchema.parse(config ?? {});
    this.logger = (logger ?? getGlobalLogger()).child('KeywordExtractor');
  }

  /**
   * Up to `topK` keywords; an empty list when every attempt failed
   */
  async extract(queryText: string, llm: Pick<LLMAdapter, 'sendMessage'>): Promise<string[]> {
    if (queryText.trim() === '') {
      return [];
    }
    const prompt = fillTemplate(this.config.prompt, { query: queryText, topK: this.config.topK });

    for (let attempt = 1; attempt <= this.config.maxAttempts; attempt++) {
      const result = await callCapability(
        () => llm.sendMessage(prompt, { temperature: 0, responseFormat: 'json' }),
        { capability: Capability.KEYWORD_EXTRACTION, timeoutMs: this.config.timeoutMs }
      );

      if (!result.ok) {
        this.logger.warn('Keyword extraction request failed', {
          attempt,
          reason: result.error.message,
        });
        continue;
      }

      const keywords = parseKeywordReply(result.value.content);
      if (keywords && keywords.length > 0) {
        const selected = keywords.slice(0, this.config.topK);
        this.logger.debug('Keywords extracted', { attempt, keywords: selected });
        return selected;
      }
      this.logger.warn('Keyword reply carried no keywords', { attempt });
    }

    return [];
  }
}
