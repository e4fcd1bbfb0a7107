/**
 * Citations Module
 *
 * Legal source reconstruction from chunk ids and citation validation.
 */

export {
  type ChunkIdentifier,
  UNKNOWN_SOURCE,
  DEFAULT_CITATION_PATTERN,
  REFERENCES_LABEL,
} from './types.js';

export {
  parseChunkIdentifier,
  formatChunkIdentifier,
  reconstructSource,
  resolveDocumentSources,
} from './source-reconstructor.js';

export {
  compileCitationPattern,
  extractCitations,
  validateCitation,
  formatCitationMarker,
  formatReferences,
  appendReferences,
} from './citation-validator.js';
