/**
 * Title formatting for reconciled documents.
 */

import { bestValue, fieldList, type ExtractionResult } from './extraction';
import { normalizeDate } from './normalization';

const PLACEHOLDER = /\{(\w+)\}/g;

/** Rendered in place of a placeholder with no value */
export const MISSING_VALUE = '-';

/**
 * Fill `{field}` placeholders, collapse whitespace, and render any
 * placeholder without a value as "-".
 *
 * @example
 * formatTitle('{issue_date} | {ref} | {amount} EUR', { issue_date: '2025-01-15', ref: 'INV-001', amount: '123.45' })
 * // '2025-01-15 | INV-001 | 123.45 EUR'
 */
export function formatTitle(format: string, values: Readonly<Record<string, string>>): string {
  const filled = format.replace(PLACEHOLDER, (placeholder, key: string) =>
    Object.hasOwn(values, key) && values[key] ? values[key] : placeholder
  );
  return filled.replace(/\s+/g, ' ').trim().replace(PLACEHOLDER, MISSING_VALUE);
}

/**
 * Title values from an extraction; the document's creation date stands in
 * for a missing issue date.
 */
export function titleValues(
  extraction: ExtractionResult,
  documentCreated: Date | string | null = null
): Record<string, string> {
  const values: Record<string, string> = {};
  for (const field of fieldList(extraction)) {
    const value = bestValue(field);
    if (value) {
      values[field.name] = value;
    }
  }

  if (!values.issue_date && documentCreated) {
    const created = normalizeDate(documentCreated);
    if (created) {
      values.issue_date = created;
    }
  }

  return values;
}

export function formatExtractionTitle(
  format: string,
  extraction: ExtractionResult,
  documentCreated: Date | string | null = null
): string {
  return formatTitle(format, titleValues(extraction, documentCreated));
}
