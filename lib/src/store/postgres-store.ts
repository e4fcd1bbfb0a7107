/**
 * PostgreSQL QueryStore
 *
 * One row per query in `rag_queries`; conversation history and sources are
 * JSONB columns, timestamps are BIGINT epoch seconds.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';

import pg from 'pg';

import {
  type Query,
  type QueryStore,
  type QueryStoreConfig,
  QueryStoreError,
  QueryStoreErrorCode,
  parseQuery,
} from './types.js';
import { type Logger, getGlobalLogger } from '../logging/index.js';

const { Pool } = pg;

export type PgPool = Pick<pg.Pool, 'query' | 'end'>;

/** Schema file shipped beside the sources in `lib/sql` */
export const SCHEMA_FILE = fileURLToPath(new URL('../../sql/001_rag_queries.sql', import.meta.url));

/**
 * Row as returned by pg; BIGINT columns arrive as strings
 */
export interface QueryRow {
  query_id: string;
  cache_key: string | null;
  query_text: string;
  conversation_history: unknown;
  llm_provider_name: string | null;
  is_complete: boolean;
  answer_text: string | null;
  sources: unknown;
  timestamp: string | number | null;
  create_time: string | number;
}

/**
 * Converts a database row to a Query (snake_case to camelCase)
 *
 * @throws {QueryStoreError} INVALID_RECORD if the row does not validate
 */
export function rowToQuery(row: QueryRow): Query {
  return parseQuery({
    queryId: row.query_id,
    cacheKey: row.cache_key,
    queryText: row.query_text,
    conversationHistory: row.conversation_history,
    llmProviderName: row.llm_provider_name,
    isComplete: row.is_complete,
    answerText: row.answer_text,
    sources: row.sources,
    timestamp: row.timestamp === null ? null : Number(row.timestamp),
    createTime: Number(row.create_time),
  });
}

function queryValues(query: Query): unknown[] {
  return [
    query.queryId,
    query.cacheKey,
    query.queryText,
    JSON.stringify(query.conversationHistory),
    query.llmProviderName,
    query.isComplete,
    query.answerText,
    JSON.stringify(query.sources),
    query.timestamp,
    query.createTime,
  ];
}

export function createPostgresPool(config: QueryStoreConfig): pg.Pool {
  return new Pool({
    connectionString: config.databaseUrl,
    max: config.maxConnections,
    connectionTimeoutMillis: config.connectionTimeout,
  });
}

export class PostgresQueryStore implements QueryStore {
  private readonly logger: Logger;

  constructor(
    private readonly pool: PgPool,
    logger?: Logger
  ) {
    this.logger = (logger ?? getGlobalLogger()).child('PostgresQueryStore');
  }

  /**
   * Create the table and its indexes if they do not exist
   */
  async ensureSchema(schemaFile: string = SCHEMA_FILE): Promise<void> {
    const sql = await readFile(schemaFile, 'utf-8');
    await this.run(sql, []);
    this.logger.info('Query store schema ready');
  }

  async getItem(queryId: string): Promise<Query | null> {
    const result = await this.run<QueryRow>('SELECT * FROM rag_queries WHERE query_id = $1', [
      queryId,
    ]);
    const row = result.rows[0];
    return row ? rowToQuery(row) : null;
  }

  async putItem(query: Query): Promise<void> {
    const record = parseQuery(query);
    await this.run(
      `
      INSERT INTO rag_queries (
        query_id, cache_key, query_text, conversation_history, llm_provider_name,
        is_complete, answer_text, sources, timestamp, create_time
      )
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
      ON CONFLICT (query_id) DO UPDATE SET
        cache_key = EXCLUDED.cache_key,
        query_text = EXCLUDED.query_text,
        conversation_history = EXCLUDED.conversation_history,
        llm_provider_name = EXCLUDED.llm_provider_name,
        is_complete = EXCLUDED.is_complete,
        answer_text = EXCLUDED.answer_text,
        sources = EXCLUDED.sources,
        timestamp = EXCLUDED.timestamp,
        create_time = EXCLUDED.create_time
    `,
      queryValues(record)
    );
  }

  async updateItem(queryId: string, query: Query): Promise<void> {
    const record = parseQuery({ ...query, queryId });
    const result = await this.run(
      `
      UPDATE rag_queries SET
        cache_key = $2,
        query_text = $3,
        conversation_history = $4,
        llm_provider_name = $5,
        is_complete = $6,
        answer_text = $7,
        sources = $8,
        timestamp = $9,
        create_time = $10
      WHERE query_id = $1
    `,
      queryValues(record)
    );
    if (result.rowCount === 0) {
      throw new QueryStoreError(`Query ${queryId} not found`, QueryStoreErrorCode.NOT_FOUND);
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async run<R extends pg.QueryResultRow = pg.QueryResultRow>(
    text: string,
    values: unknown[]
  ): Promise<pg.QueryResult<R>> {
    try {
      return await this.pool.query<R>(text, values);
    } catch (error) {
      throw new QueryStoreError(
        `Query store request failed: ${error instanceof Error ? error.message : String(error)}`,
        QueryStoreErrorCode.REQUEST_FAILED,
        { cause: error instanceof Error ? error : undefined }
      );
    }
  }
}
