/**
 * Client for the HTTP embedding service (api, docker and ec2 deployments).
 *
 * Protocol: POST `{ texts, model? }` to the configured URL, response
 * `{ embeddings: number[][] }` in input order.
 */

import { z } from 'zod';

import { BaseEmbedder, type EmbedderOptions } from './base-embedder.js';
import type { ServiceEmbeddingConfig } from './types.js';

const ServiceResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

export class ServiceEmbedder extends BaseEmbedder<ServiceEmbeddingConfig> {
  constructor(config: ServiceEmbeddingConfig, options?: EmbedderOptions) {
    super(
      config,
      {
        baseURL: config.serviceUrl,
        headers: config.apiKey ? { Authorization: `Bearer ${config.apiKey}` } : {},
      },
      options
    );
  }

  protected get modelName(): string {
    return this.config.model ?? this.config.provider;
  }

  protected async requestEmbeddings(texts: string[]): Promise<number[][]> {
    const body = this.config.model ? { texts, model: this.config.model } : { texts };
    const { embeddings } = await this.postJson('', body, ServiceResponseSchema);
    return embeddings;
  }
}
