/**
 * Conversion between retrieved documents and rerank passages.
 */

import type { RerankPassage, RerankedPassage } from './types.js';
import type { RetrievedDocument } from '../qdrant/index.js';
import { type Logger, getGlobalLogger } from '../logging/index.js';

/**
 * Documents without content are not sent to the reranker.
 */
export function toRerankPassages(documents: readonly RetrievedDocument[]): RerankPassage[] {
  return documents
    .filter((doc) => doc.content.trim() !== '')
    .map((doc) => ({
      id: doc.recordId,
      text: doc.content,
      meta: {
        documentId: doc.documentId,
        title: doc.title,
        chunkId: doc.chunkId,
        source: doc.source,
      },
    }));
}

/**
 * Map reranked passages back onto the original documents, in reranked
 * order, with `similarityScore` set to the rerank score. Ids the originals do
 * not contain are dropped.
 */
export function fromRerankPassages(
  reranked: readonly RerankedPassage[],
  originals: readonly RetrievedDocument[],
  logger?: Logger
): RetrievedDocument[] {
  const byId = new Map(originals.map((doc) => [doc.recordId, doc]));
  const seen = new Set<string>();
  const documents: RetrievedDocument[] = [];

  for (const passage of reranked) {
    const original = byId.get(passage.id);
    if (!original) {
      (logger ?? getGlobalLogger()).warn('Dropping reranked passage with unknown id', {
        id: passage.id,
      });
      continue;
    }
    if (seen.has(passage.id)) {
      continue;
    }
    seen.add(passage.id);
    documents.push({ ...original, similarityScore: passage.score });
  }

  return documents;
}

/**
 * Stable sort by descending score
 */
export function sortByScore<T extends { score: number }>(items: readonly T[]): T[] {
  return items
    .map((item, index) => ({ item, index }))
    .sort((a, b) => b.item.score - a.item.score || a.index - b.index)
    .map(({ item }) => item);
}
