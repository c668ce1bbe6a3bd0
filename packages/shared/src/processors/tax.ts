/**
 * Tax authority payment guides and notices.
 */

import {
  createExtractedField,
  getField,
  hasValue,
  withField,
  type ExtractionResult,
} from '../extraction';
import type { DocumentContext, DocumentProcessor } from './types';

/** Checked in order; the first tax whose keyword appears in the text wins */
export const TAX_KEYWORDS: ReadonlyArray<{ taxType: string; keywords: readonly string[] }> = [
  { taxType: 'DMR', keywords: ['dmr', 'declaração mensal'] },
  { taxType: 'IUC', keywords: ['iuc', 'imposto único de circulação'] },
  { taxType: 'IRS', keywords: ['irs', 'imposto sobre o rendimento'] },
  { taxType: 'IMT', keywords: ['imt', 'imposto municipal sobre transmissões'] },
  { taxType: 'IMI', keywords: ['imi', 'imposto municipal sobre imóveis'] },
  { taxType: 'IVA', keywords: ['iva', 'imposto sobre o valor acrescentado'] },
];

export const DETECTED_TAX_TYPE_CONFIDENCE = 0.7;

export function detectTaxType(content: string): string | null {
  const lowered = content.toLowerCase();
  const match = TAX_KEYWORDS.find(({ keywords }) => keywords.some((keyword) => lowered.includes(keyword)));
  return match ? match.taxType : null;
}

function fillTaxType(extraction: ExtractionResult, context: DocumentContext): ExtractionResult {
  const field = getField(extraction, 'tax_type');
  // Only fills a tax_type slot the model returned empty.
  if (!field || hasValue(field)) {
    return extraction;
  }

  const taxType = detectTaxType(context.content);
  if (!taxType) {
    return extraction;
  }

  return withField(
    extraction,
    createExtractedField({
      ...field,
      normalizedValue: taxType,
      confidence: DETECTED_TAX_TYPE_CONFIDENCE,
      extractionNotes: 'Detected from document text',
    })
  );
}

export const taxProcessor: DocumentProcessor = {
  kind: 'tax_at_guides',
  description: 'Tax authority documents (IRS, DMR, IUC)',
  postProcess: fillTaxType,
};
