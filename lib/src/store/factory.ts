/**
 * QueryStore factory
 */

import {
  type QueryStore,
  type QueryStoreConfig,
  type QueryStoreConfigInput,
  QueryStoreConfigSchema,
} from './types.js';
import { InMemoryQueryStore } from './memory-store.js';
import { PostgresQueryStore, createPostgresPool } from './postgres-store.js';
import { ConfigurationError } from '../errors/index.js';
import type { Logger } from '../logging/index.js';

/**
 * @throws {ConfigurationError} listing every schema violation
 */
export function parseQueryStoreConfig(config: unknown): QueryStoreConfig {
  const result = QueryStoreConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigurationError(`Invalid query store configuration: ${issues.join(', ')}`, {
      issues,
    });
  }
  return result.data;
}

/**
 * Build the configured store; the postgres backend creates its table when
 * `ensureSchema` is set and ends its pool if that fails.
 */
export async function createQueryStore(
  config: QueryStoreConfigInput,
  logger?: Logger
): Promise<QueryStore> {
  const validated = parseQueryStoreConfig(config);
  switch (validated.backend) {
    case 'memory':
      return new InMemoryQueryStore();
    case 'postgres': {
      const store = new PostgresQueryStore(createPostgresPool(validated), logger);
      if (validated.ensureSchema) {
        try {
          await store.ensureSchema();
        } catch (error) {
          await store.close();
          throw error;
        }
      }
      return store;
    }
    default: {
      const unreachable: never = validated.backend;
      throw new ConfigurationError(`Unsupported query store backend: ${String(unreachable)}`);
    }
  }
}
