/**
 * Document Kind Types
 *
 * Each template id names a document kind. A kind may refine a normalized
 * extraction with a pure post-processing step that sees the document text.
 */

import type { ExtractionResult } from '../extraction';
import type { Template } from '../templates/types';

export const DOCUMENT_KINDS = [
  'utilities_energy',
  'utilities_water',
  'tax_at_guides',
  'law_enforcement_fines',
  'fallback_general',
] as const;

export type DocumentKind = (typeof DOCUMENT_KINDS)[number];

export const FALLBACK_KIND: DocumentKind = 'fallback_general';

/**
 * What a post-processing step may read about the source document.
 */
export interface DocumentContext {
  docId: number;
  /** OCR text, already truncated to the configured maximum */
  content: string;
  /** Document creation date as stored, `YYYY-MM-DD` */
  created: string | null;
  template: Template;
}

export type PostProcess = (extraction: ExtractionResult, context: DocumentContext) => ExtractionResult;

export interface DocumentProcessor {
  kind: DocumentKind;
  description: string;
  postProcess?: PostProcess;
}
