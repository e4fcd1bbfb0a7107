/**
 * HTTP Reranker
 *
 * Cohere-compatible `/rerank` endpoint:
 * `{ model, query, documents, top_n? }` → `{ results: [{ index, relevance_score }] }`.
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';

import {
  type HttpRerankConfig,
  type RerankPassage,
  type RerankedPassage,
  type Reranker,
  RerankError,
  RerankErrorCode,
  RerankProviderName,
} from './types.js';
import { sortByScore } from './mapping.js';
import { createHttpClient } from '../llm/adapters/http.js';
import { type Logger, getGlobalLogger } from '../logging/index.js';

const RerankResponseSchema = z.object({
  results: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      relevance_score: z.number(),
    })
  ),
});

export interface HttpRerankerOptions {
  httpClient?: AxiosInstance | undefined;
  logger?: Logger | undefined;
}

export class HttpReranker implements Reranker {
  readonly name = RerankProviderName.HTTP;
  private readonly http: AxiosInstance;
  private readonly logger: Logger;

  constructor(
    private readonly config: HttpRerankConfig,
    options: HttpRerankerOptions = {}
  ) {
    this.http =
      options.httpClient ??
      createHttpClient({
        baseURL: config.url,
        timeoutMs: config.timeoutMs,
        headers: { Authorization: `Bearer ${config.apiKey}` },
      });
    this.logger = (options.logger ?? getGlobalLogger()).child('HttpReranker');
  }

  /**
   * @throws {RerankError} on a failed request or an unexpected body
   */
  async rerank(query: string, passages: RerankPassage[]): Promise<RerankedPassage[]> {
    if (passages.length === 0) {
      return [];
    }

    const body: Record<string, unknown> = {
      model: this.config.model,
      query,
      documents: passages.map((p) => p.text),
    };
    if (this.config.topN !== undefined) {
      body['top_n'] = this.config.topN;
    }

    let data: unknown;
    try {
      ({ data } = await this.http.post<unknown>('/rerank', body));
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      throw new RerankError(
        status !== undefined
          ? `Rerank request failed with status ${status}`
          : `Rerank request failed: ${error instanceof Error ? error.message : String(error)}`,
        RerankErrorCode.REQUEST_FAILED,
        { cause: error instanceof Error ? error : undefined }
      );
    }

    const parsed = RerankResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new RerankError('Unexpected rerank response body', RerankErrorCode.INVALID_RESPONSE, {
        cause: parsed.error,
      });
    }

    const reranked: RerankedPassage[] = [];
    for (const result of parsed.data.results) {
      const passage = passages[result.index];
      if (!passage) {
        this.logger.warn('Rerank result index out of range', { index: result.index });
        continue;
      }
      reranked.push({ ...passage, score: result.relevance_score });
    }
    return sortByScore(reranked);
  }
}
