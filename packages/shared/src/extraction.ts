/**
 * Extraction Model
 *
 * Value objects produced by the LLM client and consumed by scoring and merge.
 * Every transform returns a new object; inputs are never mutated.
 */

import {
  normalizeAmount,
  normalizeDate,
  normalizeNumber,
  normalizeText,
} from './normalization';

export const FIELD_TYPES = ['string', 'date', 'amount', 'number', 'integer'] as const;
export type FieldType = (typeof FIELD_TYPES)[number];

/** Confidence at or above which a single field counts as confident */
export const FIELD_CONFIDENCE_THRESHOLD = 0.7;

export interface ExtractedField {
  readonly name: string;
  readonly rawValue: string | null;
  readonly normalizedValue: string | null;
  readonly confidence: number;
  readonly fieldType: FieldType;
  readonly extractionNotes: string | null;
}

export interface ExtractedFieldInit {
  name: string;
  rawValue?: string | null;
  normalizedValue?: string | null;
  confidence?: number;
  fieldType?: FieldType;
  extractionNotes?: string | null;
}

export function clampConfidence(value: number): number {
  if (Number.isNaN(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}

const FIELD_TYPE_SET: ReadonlySet<string> = new Set<string>(FIELD_TYPES);

export function isFieldType(value: unknown): value is FieldType {
  return typeof value === 'string' && FIELD_TYPE_SET.has(value);
}

export function createExtractedField(init: ExtractedFieldInit): ExtractedField {
  return Object.freeze({
    name: init.name,
    rawValue: init.rawValue ?? null,
    normalizedValue: init.normalizedValue ?? null,
    confidence: clampConfidence(init.confidence ?? 0),
    fieldType: init.fieldType ?? 'string',
    extractionNotes: init.extractionNotes ?? null,
  });
}

export function hasValue(field: ExtractedField): boolean {
  return Boolean(field.normalizedValue) || Boolean(field.rawValue);
}

export function bestValue(field: ExtractedField): string | null {
  return field.normalizedValue || field.rawValue || null;
}

export function isConfident(field: ExtractedField): boolean {
  return field.confidence >= FIELD_CONFIDENCE_THRESHOLD;
}

// ============================================================================
// Extraction result
// ============================================================================

export interface ExtractionResult {
  readonly templateId: string;
  readonly templateConfidence: number;
  readonly fields: Readonly<Record<string, ExtractedField>>;
  readonly processingNotes: readonly string[];
  readonly processingTimeMs: number;
}

export interface ExtractionResultInit {
  templateId: string;
  templateConfidence?: number;
  fields?: Iterable<ExtractedField> | Record<string, ExtractedField>;
  processingNotes?: readonly string[];
  processingTimeMs?: number;
}

function isIterable<T>(value: Iterable<T> | object): value is Iterable<T> {
  return Symbol.iterator in value;
}

function indexFields(
  fields: Iterable<ExtractedField> | Record<string, ExtractedField>
): Readonly<Record<string, ExtractedField>> {
  const indexed: Record<string, ExtractedField> = {};
  const list = isIterable(fields) ? Array.from(fields) : Object.values(fields);
  for (const field of list) {
    indexed[field.name] = field;
  }
  return Object.freeze(indexed);
}

export function createExtractionResult(init: ExtractionResultInit): ExtractionResult {
  return Object.freeze({
    templateId: init.templateId,
    templateConfidence: clampConfidence(init.templateConfidence ?? 0),
    fields: indexFields(init.fields ?? []),
    processingNotes: Object.freeze([...(init.processingNotes ?? [])]),
    processingTimeMs: init.processingTimeMs ?? 0,
  });
}

export function getField(result: ExtractionResult, name: string): ExtractedField | undefined {
  return Object.hasOwn(result.fields, name) ? result.fields[name] : undefined;
}

export function getFieldValue(result: ExtractionResult, name: string): string | null {
  const field = getField(result, name);
  return field ? bestValue(field) : null;
}

export function fieldList(result: ExtractionResult): ExtractedField[] {
  return Object.values(result.fields);
}

export function extractedCount(result: ExtractionResult): number {
  return fieldList(result).filter(hasValue).length;
}

export function confidentFields(result: ExtractionResult): ExtractedField[] {
  return fieldList(result).filter((field) => hasValue(field) && isConfident(field));
}

/**
 * Average of the template confidence and the mean confidence of fields with a value.
 */
export function overallConfidence(result: ExtractionResult): number {
  const valued = fieldList(result).filter(hasValue);
  if (valued.length === 0) {
    return result.templateConfidence;
  }
  const fieldMean = valued.reduce((sum, field) => sum + field.confidence, 0) / valued.length;
  return (result.templateConfidence + fieldMean) / 2;
}

export function withField(result: ExtractionResult, field: ExtractedField): ExtractionResult {
  return createExtractionResult({
    ...result,
    fields: { ...result.fields, [field.name]: field },
  });
}

export function withNote(result: ExtractionResult, note: string): ExtractionResult {
  return createExtractionResult({
    ...result,
    processingNotes: [...result.processingNotes, note],
  });
}

// ============================================================================
// Normalization pass
// ============================================================================

function truncateInteger(value: string): string {
  const whole = value.split('.')[0];
  return whole === '' || whole === '-' || whole === '-0' ? '0' : whole;
}

/**
 * Normalized form of a raw value for the given field type.
 */
export function normalizeFieldValue(rawValue: string, fieldType: FieldType): string | null {
  switch (fieldType) {
    case 'date':
      return normalizeDate(rawValue);
    case 'amount':
      return normalizeAmount(rawValue);
    case 'number':
      return normalizeNumber(rawValue);
    case 'integer': {
      const number = normalizeNumber(rawValue);
      return number === null ? null : truncateInteger(number);
    }
    case 'string':
      return normalizeText(rawValue);
  }
}

export function normalizeField(field: ExtractedField): ExtractedField {
  if (field.rawValue === null) {
    return field;
  }
  return createExtractedField({
    ...field,
    normalizedValue: normalizeFieldValue(field.rawValue, field.fieldType),
  });
}

/**
 * Populate `normalizedValue` on every field with a raw value.
 */
export function normalizeExtraction(result: ExtractionResult): ExtractionResult {
  return createExtractionResult({
    ...result,
    fields: fieldList(result).map(normalizeField),
  });
}

// ============================================================================
// Serialization
// ============================================================================

export interface SerializedExtraction {
  template_id: string;
  template_confidence: number;
  overall_confidence: number;
  fields: Record<
    string,
    {
      raw: string | null;
      normalized: string | null;
      confidence: number;
      type: FieldType;
      notes: string | null;
    }
  >;
  processing_notes: string[];
  processing_time_ms: number;
}

export function toSerializable(result: ExtractionResult): SerializedExtraction {
  const fields: SerializedExtraction['fields'] = {};
  for (const field of fieldList(result)) {
    fields[field.name] = {
      raw: field.rawValue,
      normalized: field.normalizedValue,
      confidence: field.confidence,
      type: field.fieldType,
      notes: field.extractionNotes,
    };
  }
  return {
    template_id: result.templateId,
    template_confidence: result.templateConfidence,
    overall_confidence: overallConfidence(result),
    fields,
    processing_notes: [...result.processingNotes],
    processing_time_ms: result.processingTimeMs,
  };
}

// ============================================================================
// Classification
// ============================================================================

export interface ClassificationResult {
  templateId: string;
  confidence: number;
  reasoning: string;
  model: string | null;
  requestId: string | null;
  processingTimeMs: number;
}
