/**
 * Source Reconstruction
 *
 * Turns a structured chunk id into the legal basis shown to the model and
 * the reader: `ND01_art012_cl_03_pt_a` → "khoản 3, Điều 12, điểm a văn bản ND01".
 */

import { type ChunkIdentifier, UNKNOWN_SOURCE } from './types.js';
import type { RetrievedDocument } from '../qdrant/index.js';
import { RAGErrorCode } from '../errors/index.js';
import { type Logger, getGlobalLogger } from '../logging/index.js';

const ARTICLE_PATTERN = /art(\d+)/iu;
const CLAUSE_PATTERN = /cl_(\d+)/iu;
/** Label segments may be joined by `_`, up to the next marker */
const POINT_PATTERN = /pt_([\p{L}\p{N}]+(?:_(?!art\d|cl_\d|ch\d|pt_)[\p{L}\p{N}]+)*)/iu;

/**
 * Parse the markers of a chunk id. Markers may appear in any order; the
 * chapter marker is ignored.
 *
 * @returns null when there is no base document token
 */
export function parseChunkIdentifier(chunkId: string): ChunkIdentifier | null {
  const base = chunkId.split('_')[0]?.trim() ?? '';
  if (base === '') {
    return null;
  }

  const identifier: ChunkIdentifier = { base };

  const article = ARTICLE_PATTERN.exec(chunkId)?.[1];
  if (article !== undefined) {
    identifier.article = parseInt(article, 10);
  }
  const clause = CLAUSE_PATTERN.exec(chunkId)?.[1];
  if (clause !== undefined) {
    identifier.clause = parseInt(clause, 10);
  }
  const point = POINT_PATTERN.exec(chunkId)?.[1];
  if (point !== undefined) {
    identifier.point = point;
  }

  return identifier;
}

export function formatChunkIdentifier(identifier: ChunkIdentifier): string {
  const parts: string[] = [];
  if (identifier.clause !== undefined) {
    parts.push(`khoản ${identifier.clause}`);
  }
  if (identifier.article !== undefined) {
    parts.push(`Điều ${identifier.article}`);
  }
  if (identifier.point !== undefined) {
    parts.push(`điểm ${identifier.point}`);
  }

  return parts.length > 0
    ? `${parts.join(', ')} văn bản ${identifier.base}`
    : `văn bản ${identifier.base}`;
}

/**
 * Human-readable legal basis for a chunk id. Never throws; an id without a
 * base document token yields "Unknown Source".
 */
export function reconstructSource(chunkId: string, logger?: Logger): string {
  const identifier = parseChunkIdentifier(chunkId);
  if (!identifier) {
    (logger ?? getGlobalLogger()).warn(`Cannot reconstruct source from chunk id '${chunkId}'`, {
      chunkId,
      code: RAGErrorCode.DATA_ERROR,
    });
    return UNKNOWN_SOURCE;
  }
  return formatChunkIdentifier(identifier);
}

/**
 * Fill in `source` for documents that have none. Returns new objects; the
 * input is not modified.
 */
export function resolveDocumentSources(
  documents: readonly RetrievedDocument[],
  logger?: Logger
): RetrievedDocument[] {
  return documents.map((doc) =>
    doc.source ? doc : { ...doc, source: reconstructSource(doc.chunkId, logger) }
  );
}
