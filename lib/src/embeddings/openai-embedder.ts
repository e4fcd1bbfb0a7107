/**
 * OpenAI `/embeddings` client
 */

import { z } from 'zod';

import { BaseEmbedder, type EmbedderOptions } from './base-embedder.js';
import type { OpenAIEmbeddingConfig } from './types.js';

const OpenAIEmbeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      embedding: z.array(z.number()),
    })
  ),
});

export class OpenAIEmbedder extends BaseEmbedder<OpenAIEmbeddingConfig> {
  constructor(config: OpenAIEmbeddingConfig, options?: EmbedderOptions) {
    super(
      config,
      { baseURL: config.baseUrl, headers: { Authorization: `Bearer ${config.apiKey}` } },
      options
    );
  }

  protected get modelName(): string {
    return this.config.model;
  }

  protected async requestEmbeddings(texts: string[]): Promise<number[][]> {
    const { data } = await this.postJson(
      '/embeddings',
      { model: this.config.model, input: texts, dimensions: this.config.dimensions },
      OpenAIEmbeddingResponseSchema
    );
    // Items carry their input index; the API does not promise order
    return [...data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
  }
}
