/**
 * Application Configuration
 *
 * One validated object holding every collaborator's settings. Built once at
 * startup and passed to `createQueryServiceFromConfig`.
 */

import { z } from 'zod';

import { LLMSettingsSchema } from '../llm/index.js';
import { EmbeddingProviderConfigSchema } from '../embeddings/index.js';
import { QdrantConfigSchema } from '../qdrant/index.js';
import { RerankConfigSchema } from '../rerank/index.js';
import { QueryStoreConfigSchema } from '../store/index.js';
import { LoggerConfigSchema } from '../logging/index.js';
import { PipelineConfigSchema } from '../rag/types.js';

export const CacheSettingsSchema = z.object({
  /** Cache answered queries without conversation history */
  enabled: z.boolean().default(true),
  /** Maximum number of cached responses */
  maxSize: z.number().int().positive().default(100),
  /** Entry lifetime in seconds */
  ttlSeconds: z.number().int().nonnegative().default(1800),
});

export type CacheSettings = z.infer<typeof CacheSettingsSchema>;

export const AppConfigSchema = z.object({
  llm: LLMSettingsSchema,
  embedding: EmbeddingProviderConfigSchema,
  qdrant: QdrantConfigSchema.default({}),
  rerank: RerankConfigSchema.default({ provider: 'none' }),
  queryStore: QueryStoreConfigSchema.default({}),
  pipeline: PipelineConfigSchema.default({}),
  cache: CacheSettingsSchema.default({}),
  logging: LoggerConfigSchema.default({}),
  /** JSON file of prompt overrides */
  promptFile: z.string().min(1).optional(),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type AppConfigInput = z.input<typeof AppConfigSchema>;
