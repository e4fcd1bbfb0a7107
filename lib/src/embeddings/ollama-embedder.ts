/**
 * Ollama `/api/embed` client
 */

import { z } from 'zod';

import { BaseEmbedder, type EmbedderOptions } from './base-embedder.js';
import type { OllamaEmbeddingConfig } from './types.js';

const OllamaEmbedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

export class OllamaEmbedder extends BaseEmbedder<OllamaEmbeddingConfig> {
  constructor(config: OllamaEmbeddingConfig, options?: EmbedderOptions) {
    super(config, { baseURL: config.baseUrl }, options);
  }

  protected get modelName(): string {
    return this.config.model;
  }

  protected async requestEmbeddings(texts: string[]): Promise<number[][]> {
    const { embeddings } = await this.postJson(
      '/api/embed',
      { model: this.config.model, input: texts },
      OllamaEmbedResponseSchema
    );
    return embeddings;
  }
}
