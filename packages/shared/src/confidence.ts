/**
 * Confidence Scoring
 *
 * Weighted multi-factor score for an extraction against its template.
 * Pure: the same extraction and template always give the same score.
 */

import {
  bestValue,
  clampConfidence,
  fieldList,
  getField,
  hasValue,
  type ExtractionResult,
} from './extraction';
import type { TemplateRequirements } from './templates/types';

export const CONFIDENCE_FACTORS = [
  'template_match',
  'required_fields',
  'completeness',
  'format_valid',
  'consistency',
] as const;

export type ConfidenceFactor = (typeof CONFIDENCE_FACTORS)[number];

export const FACTOR_WEIGHTS: Readonly<Record<ConfidenceFactor, number>> = {
  template_match: 0.2,
  required_fields: 0.3,
  completeness: 0.2,
  format_valid: 0.2,
  consistency: 0.1,
};

/** Factors below this are called out in the explanation */
export const LOW_FACTOR_THRESHOLD = 0.7;

/** Required fields below this confidence do not count as present */
export const REQUIRED_FIELD_MIN_CONFIDENCE = 0.5;

export const DEFAULT_AUTO_APPLY_THRESHOLD = 0.7;
export const DEFAULT_SUGGESTION_THRESHOLD = 0.9;

export interface ConfidenceScore {
  readonly overall: number;
  readonly fieldScores: Readonly<Record<string, number>>;
  readonly factorScores: Readonly<Record<ConfidenceFactor, number>>;
  readonly explanation: string;
}

function ratio(numerator: number, denominator: number): number {
  return denominator === 0 ? 1 : numerator / denominator;
}

function requiredFieldsScore(extraction: ExtractionResult, template: TemplateRequirements): number {
  const required = template.extraction.fields.filter((field) => field.required);
  const present = required.filter((fieldDef) => {
    const field = getField(extraction, fieldDef.name);
    return field !== undefined && hasValue(field) && field.confidence >= REQUIRED_FIELD_MIN_CONFIDENCE;
  });
  return ratio(present.length, required.length);
}

function completenessScore(extraction: ExtractionResult, template: TemplateRequirements): number {
  const defined = template.extraction.fields;
  const present = defined.filter((fieldDef) => {
    const field = getField(extraction, fieldDef.name);
    return field !== undefined && hasValue(field);
  });
  return ratio(present.length, defined.length);
}

function formatValidityScore(extraction: ExtractionResult): number {
  const valued = fieldList(extraction).filter(hasValue);
  if (valued.length === 0) {
    return 1;
  }
  const total = valued.reduce((sum, field) => sum + (field.normalizedValue ? 1 : 0.5), 0);
  return total / valued.length;
}

const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function parseFloatStrict(value: string): number | null {
  const trimmed = value.trim();
  return FLOAT_PATTERN.test(trimmed) ? Number(trimmed) : null;
}

function valuedPair(
  extraction: ExtractionResult,
  first: string,
  second: string
): [string, string] | null {
  const a = getField(extraction, first);
  const b = getField(extraction, second);
  if (!a || !b || !hasValue(a) || !hasValue(b)) {
    return null;
  }
  const valueA = bestValue(a);
  const valueB = bestValue(b);
  return valueA !== null && valueB !== null ? [valueA, valueB] : null;
}

/**
 * Cross-field checks: gross ≥ net, due date ≥ issue date.
 * A check is applicable only when both of its fields carry values.
 */
function consistencyScore(extraction: ExtractionResult): number {
  let applicable = 0;
  let passed = 0;

  const totals = valuedPair(extraction, 'total_gross', 'total_net');
  if (totals) {
    const gross = parseFloatStrict(totals[0]);
    const net = parseFloatStrict(totals[1]);
    if (gross !== null && net !== null) {
      applicable += 1;
      if (gross >= net) {
        passed += 1;
      }
    }
  }

  const dates = valuedPair(extraction, 'due_date', 'issue_date');
  if (dates) {
    applicable += 1;
    if (dates[0] >= dates[1]) {
      passed += 1;
    }
  }

  return ratio(passed, applicable);
}

function explain(factorScores: Record<ConfidenceFactor, number>): string {
  const low = CONFIDENCE_FACTORS.filter((factor) => factorScores[factor] < LOW_FACTOR_THRESHOLD);
  if (low.length === 0) {
    return 'All factors good';
  }
  const parts = low.map((factor) => `${factor}: ${Math.round(factorScores[factor] * 100)}%`);
  return `Low scores: ${parts.join(', ')}`;
}

/**
 * Score an (already normalized) extraction against its template.
 */
export function scoreExtraction(
  extraction: ExtractionResult,
  template: TemplateRequirements
): ConfidenceScore {
  const factorScores: Record<ConfidenceFactor, number> = {
    template_match: clampConfidence(extraction.templateConfidence),
    required_fields: requiredFieldsScore(extraction, template),
    completeness: completenessScore(extraction, template),
    format_valid: formatValidityScore(extraction),
    consistency: consistencyScore(extraction),
  };

  const weighted = CONFIDENCE_FACTORS.reduce(
    (sum, factor) => sum + factorScores[factor] * FACTOR_WEIGHTS[factor],
    0
  );

  const fieldScores: Record<string, number> = {};
  for (const field of fieldList(extraction)) {
    if (hasValue(field)) {
      fieldScores[field.name] = field.confidence;
    }
  }

  return Object.freeze({
    overall: clampConfidence(weighted),
    fieldScores: Object.freeze(fieldScores),
    factorScores: Object.freeze(factorScores),
    explanation: explain(factorScores),
  });
}

export function isConfidentForAutoApply(
  score: ConfidenceScore,
  threshold = DEFAULT_AUTO_APPLY_THRESHOLD
): boolean {
  return score.overall >= threshold;
}

export function isConfidentForSuggestion(
  score: ConfidenceScore,
  threshold = DEFAULT_SUGGESTION_THRESHOLD
): boolean {
  return score.overall >= threshold;
}
