/**
 * Citation Types
 */

/**
 * Parsed form of a structured legal chunk id such as `ND01_ch02_art012_cl_03_pt_a`
 */
export interface ChunkIdentifier {
  /** Document token before the first underscore */
  base: string;
  /** Điều */
  article?: number;
  /** Khoản */
  clause?: number;
  /** Điểm */
  point?: string;
}

export const UNKNOWN_SOURCE = 'Unknown Source';

/**
 * Citation marker the answer is asked to carry, e.g. `[Mã tài liệu: QA_750F0D91]`
 */
export const DEFAULT_CITATION_PATTERN = String.raw`\[Mã tài liệu:\s*[\w-]+\]`;

export const REFERENCES_LABEL = 'References:';
