/**
 * Citation checks on generated answers and the references trailer.
 */

import { DEFAULT_CITATION_PATTERN, REFERENCES_LABEL } from './types.js';
import { ConfigurationError, toMessage } from '../errors/index.js';

/**
 * @throws {ConfigurationError} if the pattern is not a valid regular expression
 */
export function compileCitationPattern(
  pattern: string | RegExp = DEFAULT_CITATION_PATTERN
): RegExp {
  if (pattern instanceof RegExp) {
    const flags = pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`;
    return new RegExp(pattern.source, flags);
  }
  try {
    return new RegExp(pattern, 'gu');
  } catch (error) {
    throw new ConfigurationError(`Invalid citation pattern '${pattern}': ${toMessage(error)}`, {
      cause: error instanceof Error ? error : undefined,
    });
  }
}

/**
 * Citation markers found in the text, in order of appearance
 */
export function extractCitations(
  text: string,
  pattern: string | RegExp = DEFAULT_CITATION_PATTERN
): string[] {
  return Array.from(text.matchAll(compileCitationPattern(pattern)), (match) => match[0]);
}

/**
 * Whether the text carries at least one citation marker
 */
export function validateCitation(
  text: string,
  pattern: string | RegExp = DEFAULT_CITATION_PATTERN
): boolean {
  return extractCitations(text, pattern).length > 0;
}

export function formatCitationMarker(recordId: string): string {
  return `[Mã tài liệu: ${recordId}]`;
}

/**
 * `References: [id1], [id2]`, or an empty string without record ids
 */
export function formatReferences(recordIds: readonly string[]): string {
  if (recordIds.length === 0) {
    return '';
  }
  return `${REFERENCES_LABEL} ${recordIds.map((id) => `[${id}]`).join(', ')}`;
}

export function appendReferences(text: string, recordIds: readonly string[]): string {
  const references = formatReferences(recordIds);
  return references ? `${text}\n\n${references}` : text;
}
