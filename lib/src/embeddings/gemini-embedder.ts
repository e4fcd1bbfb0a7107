/**
 * Google Gemini `batchEmbedContents` client
 */

import { z } from 'zod';

import { BaseEmbedder, type EmbedderOptions } from './base-embedder.js';
import type { GeminiEmbeddingConfig } from './types.js';

const BatchEmbedResponseSchema = z.object({
  embeddings: z.array(z.object({ values: z.array(z.number()) })),
});

export class GeminiEmbedder extends BaseEmbedder<GeminiEmbeddingConfig> {
  constructor(config: GeminiEmbeddingConfig, options?: EmbedderOptions) {
    super(
      config,
      { baseURL: config.baseUrl, headers: { 'x-goog-api-key': config.apiKey } },
      options
    );
  }

  protected get modelName(): string {
    return this.config.model;
  }

  protected async requestEmbeddings(texts: string[]): Promise<number[][]> {
    const model = `models/${this.config.model}`;
    const { embeddings } = await this.postJson(
      `/${model}:batchEmbedContents`,
      {
        requests: texts.map((text) => ({
          model,
          content: { parts: [{ text }] },
          taskType: this.config.taskType,
          outputDimensionality: this.config.dimensions,
        })),
      },
      BatchEmbedResponseSchema
    );
    return embeddings.map((e) => e.values);
  }
}
