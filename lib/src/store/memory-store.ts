/**
 * In-memory QueryStore. Records are copied on the way in and out.
 */

import {
  type Query,
  type QueryStore,
  QueryStoreError,
  QueryStoreErrorCode,
  parseQuery,
} from './types.js';

export class InMemoryQueryStore implements QueryStore {
  private readonly items = new Map<string, Query>();

  async getItem(queryId: string): Promise<Query | null> {
    const item = this.items.get(queryId);
    return item ? structuredClone(item) : null;
  }

  async putItem(query: Query): Promise<void> {
    const record = parseQuery(structuredClone(query));
    this.items.set(record.queryId, record);
  }

  async updateItem(queryId: string, query: Query): Promise<void> {
    if (!this.items.has(queryId)) {
      throw new QueryStoreError(`Query ${queryId} not found`, QueryStoreErrorCode.NOT_FOUND);
    }
    const record = parseQuery({ ...structuredClone(query), queryId });
    this.items.set(queryId, record);
  }

  get size(): number {
    return this.items.size;
  }

  async close(): Promise<void> {
    this.items.clear();
  }
}
