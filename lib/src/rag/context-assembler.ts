/**
 * Context Assembler
 *
 * Renders retrieved documents as the context block of the generation prompt.
 */

import { z } from 'zod';

import type { RetrievedDocument } from '../qdrant/index.js';
import { UNKNOWN_SOURCE } from '../citations/index.js';
import { type Logger, getGlobalLogger } from '../logging/index.js';

export const CONTEXT_SEPARATOR = '\n\n---------------------------\n\n';

const MISSING_FIELD = 'N/A';

export const ContextAssemblerConfigSchema = z.object({
  /** Budget in characters (code points); longer context is cut */
  maxChars: z.number().int().positive().default(8000),
  separator: z.string().default(CONTEXT_SEPARATOR),
});

export type ContextAssemblerConfig = z.infer<typeof ContextAssemblerConfigSchema>;
export type ContextAssemblerConfigInput = z.input<typeof ContextAssemblerConfigSchema>;

export interface AssembledContext {
  context: string;
  /** Documents with content, in input order; the citation-eligible set */
  documents: RetrievedDocument[];
  truncated: boolean;
  /** Length before truncation */
  originalLength: number;
}

export function hasContent(doc: RetrievedDocument): boolean {
  return doc.content.trim() !== '';
}

export function formatDocumentBlock(doc: RetrievedDocument): string {
  return (
    `Document ID: ${doc.documentId || MISSING_FIELD}\n` +
    `Cơ sở pháp lý: ${doc.source || UNKNOWN_SOURCE}\n` +
    `Mô tả: ${doc.title || MISSING_FIELD}\n` +
    `Nội dung: ${doc.content}\n` +
    `Record ID: ${doc.recordId}\n` +
    `Chunk ID: ${doc.chunkId || MISSING_FIELD}\n`
  );
}

export class ContextAssembler {
  private readonly config: ContextAssemblerConfig;
  private readonly logger: Logger;

  constructor(config?: ContextAssemblerConfigInput, logger?: Logger) {
    this.config = ContextAssemblerConfigSchema.parse(config ?? {});
    this.logger = (logger ?? getGlobalLogger()).child('ContextAssembler');
  }

  /**
   * Join one block per document with content. Context over the budget is
   * cut at the budget boundary.
   */
  assemble(documents: readonly RetrievedDocument[]): AssembledContext {
    const eligible = documents.filter(hasContent);
    const full = eligible.map(formatDocumentBlock).join(this.config.separator);

    const codePoints = Array.from(full);
    if (codePoints.length <= this.config.maxChars) {
      return {
        context: full,
        documents: eligible,
        truncated: false,
        originalLength: codePoints.length,
      };
    }

    this.logger.warn('Context exceeds the character budget, truncating', {
      length: codePoints.length,
      maxChars: this.config.maxChars,
      documents: eligible.length,
    });
    return {
      context: codePoints.slice(0, this.config.maxChars).join(''),
      documents: eligible,
      truncated: true,
      originalLength: codePoints.length,
    };
  }
}
