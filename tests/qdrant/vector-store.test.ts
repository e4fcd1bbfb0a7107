/**
 * Unit Tests for QdrantVectorStore
 *
 * The Qdrant client is a stub; no server is contacted.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  QdrantVectorStore,
  VectorStoreError,
  VectorStoreErrorCode,
  type QdrantClientLike,
} from '../../lib/src/qdrant/index.js';
import { createCapturingLogger, silentLogger } from '../fixtures/logger.js';

// =============================================================================
// Mock Setup
// =============================================================================

function createMockClient() {
  const mocks = {
    search: vi.fn(),
    scroll: vi.fn(),
    collectionExists: vi.fn(),
    getCollection: vi.fn(),
    createCollection: vi.fn().mockResolvedValue(true),
    createPayloadIndex: vi.fn().mockResolvedValue({ status: 'completed' }),
    upsert: vi.fn().mockResolvedValue({ status: 'completed' }),
  };
  return { mocks, client: mocks as unknown as QdrantClientLike };
}

// =============================================================================
// Test Fixtures
// =============================================================================

const hit = (id: string, score: number, payload: Record<string, unknown> | null) => ({
  id,
  version: 1,
  score,
  payload,
});

const qaPayload = {
  record_id: 'QA_750F0D91',
  document_id: 'ND01',
  title: 'Hỏi đáp về thời hiệu',
  content: 'Thời hiệu khởi kiện là hai năm.',
  chunk_id: 'ND01_art012_cl_03',
  source: null,
};

describe('QdrantVectorStore', () => {
  let client: ReturnType<typeof createMockClient>;
  let store: QdrantVectorStore;

  beforeEach(() => {
    client = createMockClient();
    store = new QdrantVectorStore(client.client, silentLogger);
  });

  // ===========================================================================
  // search
  // ===========================================================================

  describe('search', () => {
    it('should map payloads to retrieved documents in hit order', async () => {
      client.mocks.search.mockResolvedValue([
        hit('p1', 0.91, qaPayload),
        hit('p2', 0.8, { record_id: 'DOC_1', content: 'Nội dung', source: 'Điều 5 văn bản ND02' }),
      ]);

      const docs = await store.search('legal_qa', [0.1, 0.2], { limit: 3 });

      expect(docs).toEqual([
        {
          recordId: 'QA_750F0D91',
          documentId: 'ND01',
          title: 'Hỏi đáp về thời hiệu',
          content: 'Thời hiệu khởi kiện là hai năm.',
          chunkId: 'ND01_art012_cl_03',
          source: null,
          similarityScore: 0.91,
        },
        {
          recordId: 'DOC_1',
          documentId: '',
          title: '',
          content: 'Nội dung',
          chunkId: '',
          source: 'Điều 5 văn bản ND02',
          similarityScore: 0.8,
        },
      ]);
      expect(client.mocks.search).toHaveBeenCalledWith('legal_qa', {
        vector: [0.1, 0.2],
        limit: 3,
        with_payload: true,
      });
    });

    it('should default the limit to 6', async () => {
      client.mocks.search.mockResolvedValue([]);

      await store.search('legal_doc', [1]);

      expect(client.mocks.search).toHaveBeenCalledWith('legal_doc', {
        vector: [1],
        limit: 6,
        with_payload: true,
      });
    });

    it('should add a full-text should filter for keywords', async () => {
      client.mocks.search.mockResolvedValue([]);

      await store.search('legal_doc', [1], {
        limit: 6,
        keywords: ['thời hiệu', 'khởi kiện'],
        scoreThreshold: 0.5,
      });

      expect(client.mocks.search).toHaveBeenCalledWith('legal_doc', {
        vector: [1],
        limit: 6,
        with_payload: true,
        score_threshold: 0.5,
        filter: {
          should: [
            { key: 'content', match: { text: 'thời hiệu' } },
            { key: 'content', match: { text: 'khởi kiện' } },
          ],
        },
      });
    });

    it('should not filter when the keyword list is empty', async () => {
      client.mocks.search.mockResolvedValue([]);

      await store.search('legal_doc', [1], { keywords: [] });

      expect(client.mocks.search.mock.calls[0]?.[1]).not.toHaveProperty('filter');
    });

    it('should skip hits with invalid payloads and log a warning', async () => {
      const { logger, entries } = createCapturingLogger();
      store = new QdrantVectorStore(client.client, logger);
      client.mocks.search.mockResolvedValue([
        hit('p1', 0.9, { content: 'thiếu record_id' }),
        hit('p2', 0.8, null),
        hit('p3', 0.7, qaPayload),
      ]);

      const docs = await store.search('legal_qa', [1]);

      expect(docs.map((d) => d.recordId)).toEqual(['QA_750F0D91']);
      expect(
        entries.filter((e) => e.message === 'Skipping point with invalid payload')
      ).toHaveLength(2);
      expect(entries).toContainEqual(
        expect.objectContaining({
          level: 'WARN',
          source: 'QdrantVectorStore',
          context: expect.objectContaining({
            pointId: 'p1',
            code: 'DATA_ERROR',
            error: 'Invalid payload on point p1',
          }),
        })
      );
    });

    it('should wrap client failures in VectorStoreError', async () => {
      client.mocks.search.mockRejectedValue(new Error('connect ECONNREFUSED'));

      const error = await store.search('legal_qa', [1]).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(VectorStoreError);
      expect(error).toMatchObject({
        code: VectorStoreErrorCode.SEARCH_FAILED,
        message: 'connect ECONNREFUSED',
      });
    });
  });

  // ===========================================================================
  // Existence and duplicate checks
  // ===========================================================================

  describe('isDuplicate', () => {
    it('should compare the top score with the threshold', async () => {
      client.mocks.search.mockResolvedValue([hit('p1', 0.99995, null)]);

      await expect(store.isDuplicate('legal_doc', [1])).resolves.toBe(true);
      await expect(store.isDuplicate('legal_doc', [1], 0.99999)).resolves.toBe(false);
      expect(client.mocks.search).toHaveBeenCalledWith('legal_doc', {
        vector: [1],
        limit: 1,
        with_payload: false,
      });
    });

    it('should return false for an empty collection', async () => {
      client.mocks.search.mockResolvedValue([]);

      await expect(store.isDuplicate('legal_doc', [1])).resolves.toBe(false);
    });
  });

  describe('pointExists', () => {
    it('should look up the record id in the payload', async () => {
      client.mocks.scroll.mockResolvedValue({ points: [{ id: 'p1' }], next_page_offset: null });

      await expect(store.pointExists('legal_qa', 'QA_750F0D91')).resolves.toBe(true);
      expect(client.mocks.scroll).toHaveBeenCalledWith('legal_qa', {
        filter: { must: [{ key: 'record_id', match: { value: 'QA_750F0D91' } }] },
        limit: 1,
        with_payload: false,
        with_vector: false,
      });
    });

    it('should return false when nothing matches', async () => {
      client.mocks.scroll.mockResolvedValue({ points: [], next_page_offset: null });

      await expect(store.pointExists('legal_qa', 'QA_MISSING')).resolves.toBe(false);
    });
  });

  describe('collectionExists', () => {
    it('should return the exists flag', async () => {
      client.mocks.collectionExists.mockResolvedValue({ exists: true });

      await expect(store.collectionExists('legal_qa')).resolves.toBe(true);
    });

    it('should raise CONNECTION_ERROR on failure', async () => {
      client.mocks.collectionExists.mockRejectedValue(new Error('timeout'));

      await expect(store.collectionExists('legal_qa')).rejects.toMatchObject({
        code: VectorStoreErrorCode.CONNECTION_ERROR,
      });
    });
  });

  // ===========================================================================
  // ensureCollection
  // ===========================================================================

  describe('ensureCollection', () => {
    it('should create the collection and its payload indexes', async () => {
      client.mocks.collectionExists.mockResolvedValue({ exists: false });

      const result = await store.ensureCollection('legal_doc', {
        vectorSize: 1024,
        distance: 'Cosine',
      });

      expect(result).toEqual({ created: true });
      expect(client.mocks.createCollection).toHaveBeenCalledWith('legal_doc', {
        vectors: { size: 1024, distance: 'Cosine' },
        on_disk_payload: true,
      });
      expect(client.mocks.createPayloadIndex).toHaveBeenCalledWith('legal_doc', {
        field_name: 'content',
        field_schema: 'text',
        wait: true,
      });
      expect(client.mocks.createPayloadIndex).toHaveBeenCalledWith('legal_doc', {
        field_name: 'record_id',
        field_schema: 'keyword',
        wait: true,
      });
    });

    it('should leave an existing collection untouched', async () => {
      client.mocks.collectionExists.mockResolvedValue({ exists: true });
      client.mocks.getCollection.mockResolvedValue({
        config: { params: { vectors: { size: 1024, distance: 'Cosine' } } },
      });

      const first = await store.ensureCollection('legal_doc', { vectorSize: 1024, distance: 'Cosine' });
      const second = await store.ensureCollection('legal_doc', { vectorSize: 1024, distance: 'Cosine' });

      expect(first).toEqual({ created: false });
      expect(second).toEqual({ created: false });
      expect(client.mocks.createCollection).not.toHaveBeenCalled();
    });

    it('should report a dimension mismatch', async () => {
      const { logger, entries } = createCapturingLogger();
      store = new QdrantVectorStore(client.client, logger);
      client.mocks.collectionExists.mockResolvedValue({ exists: true });
      client.mocks.getCollection.mockResolvedValue({
        config: { params: { vectors: { size: 768, distance: 'Cosine' } } },
      });

      const result = await store.ensureCollection('legal_doc', {
        vectorSize: 1024,
        distance: 'Cosine',
      });

      expect(result).toEqual({
        created: false,
        dimensionMismatch: { expected: 1024, actual: 768 },
      });
      expect(entries).toContainEqual(
        expect.objectContaining({
          level: 'ERROR',
          message: 'Collection exists with a different vector size',
        })
      );
    });
  });

  // ===========================================================================
  // upsertDocuments
  // ===========================================================================

  describe('upsertDocuments', () => {
    const point = (recordId: string) => ({
      vector: [0.1, 0.2],
      payload: { record_id: recordId, content: `Nội dung ${recordId}` },
    });

    it('should write points in batches with generated UUIDs', async () => {
      const result = await store.upsertDocuments(
        'legal_doc',
        [point('A'), point('B'), point('C')],
        { batchSize: 2 }
      );

      expect(result.upserted).toBe(3);
      expect(result.pointIds).toHaveLength(3);
      for (const id of result.pointIds) {
        expect(id).toMatch(/^[0-9a-f-]{36}$/);
      }
      expect(client.mocks.upsert).toHaveBeenCalledTimes(2);
      expect(client.mocks.upsert.mock.calls[0]?.[1]).toEqual({
        wait: true,
        points: [
          {
            id: result.pointIds[0],
            vector: [0.1, 0.2],
            payload: {
              record_id: 'A',
              document_id: '',
              title: '',
              content: 'Nội dung A',
              chunk_id: '',
              source: null,
            },
          },
          expect.objectContaining({ id: result.pointIds[1] }),
        ],
      });
    });

    it('should reject an invalid payload before writing', async () => {
      await expect(
        store.upsertDocuments('legal_doc', [point('A'), { vector: [1], payload: { record_id: '' } }])
      ).rejects.toMatchObject({ code: VectorStoreErrorCode.UPSERT_FAILED });
      expect(client.mocks.upsert).not.toHaveBeenCalled();
    });

    it('should reject an empty vector', async () => {
      await expect(
        store.upsertDocuments('legal_doc', [{ vector: [], payload: { record_id: 'A' } }])
      ).rejects.toMatchObject({ code: VectorStoreErrorCode.DIMENSION_MISMATCH });
    });

    it('should report how many points were written before a failure', async () => {
      client.mocks.upsert
        .mockResolvedValueOnce({ status: 'completed' })
        .mockRejectedValueOnce(new Error('503'));

      await expect(
        store.upsertDocuments('legal_doc', [point('A'), point('B')], { batchSize: 1 })
      ).rejects.toThrow('Upsert failed after 1 of 2 points');
    });
  });
});
