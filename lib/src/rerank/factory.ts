/**
 * Reranker factory. `none` disables reranking.
 */

import type { AxiosInstance } from 'axios';

import {
  type RerankConfig,
  type RerankConfigInput,
  type Reranker,
  RerankConfigSchema,
} from './types.js';
import { LLMReranker } from './llm-reranker.js';
import { HttpReranker } from './http-reranker.js';
import type { LLMAdapter } from '../llm/index.js';
import { ConfigurationError } from '../errors/index.js';
import type { Logger } from '../logging/index.js';

export interface RerankerDependencies {
  /** Required by the `llm` reranker */
  llm?: Pick<LLMAdapter, 'sendMessage'> | undefined;
  httpClient?: AxiosInstance | undefined;
  logger?: Logger | undefined;
}

/**
 * @throws {ConfigurationError} listing every schema violation
 */
export function parseRerankConfig(config: unknown): RerankConfig {
  const parsed = RerankConfigSchema.safeParse(config);
  if (!parsed.success) {
    const issues = parsed.error.errors.map(
      (e) => `${e.path.join('.') || 'provider'}: ${e.message}`
    );
    throw new ConfigurationError(`Invalid rerank configuration: ${issues.join(', ')}`, {
      issues,
    });
  }
  return parsed.data;
}

/**
 * @throws {ConfigurationError} on an invalid configuration or a missing LLM
 */
export function createReranker(
  config: RerankConfigInput,
  deps: RerankerDependencies = {}
): Reranker | null {
  const validated = parseRerankConfig(config);
  switch (validated.provider) {
    case 'none':
      return null;
    case 'llm':
      if (!deps.llm) {
        throw new ConfigurationError('The llm reranker needs an LLM provider');
      }
      return new LLMReranker(deps.llm, validated, deps.logger);
    case 'http':
      return new HttpReranker(validated, { httpClient: deps.httpClient, logger: deps.logger });
    default: {
      const unreachable: never = validated;
      throw new ConfigurationError(`Unsupported rerank provider: ${String(unreachable)}`);
    }
  }
}
