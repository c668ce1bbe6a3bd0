/**
 * Document Kind Dispatch
 *
 * Closed table from template id to kind-specific processing. Template ids
 * outside the table are handled as the general kind.
 */

import {
  getField,
  hasValue,
  normalizeExtraction,
  type ExtractionResult,
} from '../extraction';
import { REQUIRED_FIELD_MIN_CONFIDENCE } from '../confidence';
import type { Template } from '../templates/types';
import { finesProcessor } from './fines';
import { generalProcessor } from './general';
import { taxProcessor } from './tax';
import {
  DOCUMENT_KINDS,
  FALLBACK_KIND,
  type DocumentContext,
  type DocumentKind,
  type DocumentProcessor,
} from './types';
import { energyProcessor, waterProcessor } from './utilities';

export * from './types';
export { detectTaxType, TAX_KEYWORDS } from './tax';
export { extractPlate, DEFAULT_DUE_DATE_DAYS } from './fines';

const PROCESSORS: Record<DocumentKind, DocumentProcessor> = {
  utilities_energy: energyProcessor,
  utilities_water: waterProcessor,
  tax_at_guides: taxProcessor,
  law_enforcement_fines: finesProcessor,
  fallback_general: generalProcessor,
};

const DOCUMENT_KIND_SET: ReadonlySet<string> = new Set<string>(DOCUMENT_KINDS);

export function isDocumentKind(value: string): value is DocumentKind {
  return DOCUMENT_KIND_SET.has(value);
}

export function documentKindFor(templateId: string): DocumentKind {
  return isDocumentKind(templateId) ? templateId : FALLBACK_KIND;
}

export function getProcessor(templateId: string): DocumentProcessor {
  return PROCESSORS[documentKindFor(templateId)];
}

/**
 * Normalize every field, then apply the kind's post-processing.
 */
export function processExtraction(
  extraction: ExtractionResult,
  context: DocumentContext
): ExtractionResult {
  const processor = getProcessor(context.template.id);
  const normalized = normalizeExtraction(extraction);
  return processor.postProcess ? processor.postProcess(normalized, context) : normalized;
}

/**
 * Problems with required fields: missing, or below the minimum confidence.
 */
export function validateExtraction(extraction: ExtractionResult, template: Template): string[] {
  const errors: string[] = [];
  for (const fieldDef of template.extraction.fields) {
    if (!fieldDef.required) {
      continue;
    }
    const field = getField(extraction, fieldDef.name);
    if (!field || !hasValue(field)) {
      errors.push(`Required field '${fieldDef.name}' is missing`);
    } else if (field.confidence < REQUIRED_FIELD_MIN_CONFIDENCE) {
      errors.push(
        `Required field '${fieldDef.name}' has low confidence (${field.confidence.toFixed(2)})`
      );
    }
  }
  return errors;
}
