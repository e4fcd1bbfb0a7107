/**
 * Query Store Module
 */

export {
  QuerySchema,
  type Query,
  type QueryInput,
  type QueryStore,
  QueryStoreBackend,
  QueryStoreConfigSchema,
  type QueryStoreConfig,
  type QueryStoreConfigInput,
  QueryStoreErrorCode,
  QueryStoreError,
  isQueryStoreError,
  parseQuery,
} from './types.js';

export { InMemoryQueryStore } from './memory-store.js';

export {
  PostgresQueryStore,
  type PgPool,
  type QueryRow,
  SCHEMA_FILE,
  rowToQuery,
  createPostgresPool,
} from './postgres-store.js';

export { parseQueryStoreConfig, createQueryStore } from './factory.js';
