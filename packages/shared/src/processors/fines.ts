/**
 * Traffic fines. Payment deadlines are strict, so a missing due date is
 * derived from the issue date.
 */

import {
  createExtractedField,
  getField,
  hasValue,
  withField,
  type ExtractionResult,
} from '../extraction';
import { calculateDueDate } from '../normalization';
import type { DocumentContext, DocumentProcessor } from './types';

export const DEFAULT_DUE_DATE_DAYS = 15;
export const DERIVED_DUE_DATE_CONFIDENCE = 0.9;
export const DETECTED_PLATE_CONFIDENCE = 0.8;

/**
 * Portuguese plate layouts, most specific first. The all-letter layout needs
 * separators so that ordinary six-letter words do not match.
 */
const PLATE_PATTERNS: readonly RegExp[] = [
  /\b([A-Z]{2}[-\s][A-Z]{2}[-\s][A-Z]{2})\b/,
  /\b([A-Z]{2}[-\s]?\d{2}[-\s]?[A-Z]{2})\b/,
  /\b(\d{2}[-\s]?[A-Z]{2}[-\s]?\d{2})\b/,
  /\b([A-Z]{2}[-\s]?\d{2}[-\s]?\d{2})\b/,
];

export function extractPlate(content: string): string | null {
  const upper = content.toUpperCase();
  for (const pattern of PLATE_PATTERNS) {
    const match = pattern.exec(upper);
    if (!match) {
      continue;
    }
    const plate = match[1].replace(/\s/g, '-');
    if (!plate.includes('-') && plate.length === 6) {
      return `${plate.slice(0, 2)}-${plate.slice(2, 4)}-${plate.slice(4)}`;
    }
    return plate;
  }
  return null;
}

function deriveDueDate(extraction: ExtractionResult, context: DocumentContext): ExtractionResult {
  const issue = getField(extraction, 'issue_date');
  if (!issue || !issue.normalizedValue) {
    return extraction;
  }

  const existing = getField(extraction, 'due_date');
  if (existing && hasValue(existing)) {
    return extraction;
  }

  const days = context.template.autoDueDateDays ?? DEFAULT_DUE_DATE_DAYS;
  const dueDate = calculateDueDate(issue.normalizedValue, days);
  if (!dueDate) {
    return extraction;
  }

  return withField(
    extraction,
    createExtractedField({
      name: 'due_date',
      rawValue: existing?.rawValue ?? null,
      normalizedValue: dueDate,
      confidence: DERIVED_DUE_DATE_CONFIDENCE,
      fieldType: 'date',
      extractionNotes: `Auto-calculated: ${days} days from issue date`,
    })
  );
}

function detectPlate(extraction: ExtractionResult, context: DocumentContext): ExtractionResult {
  const existing = getField(extraction, 'plate');
  if (existing && hasValue(existing)) {
    return extraction;
  }

  const plate = extractPlate(context.content);
  if (!plate) {
    return extraction;
  }

  return withField(
    extraction,
    createExtractedField({
      name: 'plate',
      rawValue: plate,
      normalizedValue: plate,
      confidence: DETECTED_PLATE_CONFIDENCE,
      fieldType: 'string',
      extractionNotes: 'Detected from document text',
    })
  );
}

export const finesProcessor: DocumentProcessor = {
  kind: 'law_enforcement_fines',
  description: 'Traffic fines. High priority.',
  postProcess: (extraction, context) => detectPlate(deriveDueDate(extraction, context), context),
};
