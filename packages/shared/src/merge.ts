/**
 * Merge Strategy
 *
 * Reconciles AI-extracted values with the values already stored on a
 * document. The store is authoritative: the AI only fills empty fields above
 * the auto-apply threshold, and a differing value is at most proposed for
 * review (above the suggestion threshold), never applied directly.
 *
 * All operations are pure and total.
 */

import { bestValue, getField, type ExtractionResult } from './extraction';
import { logger } from './logger';
import { isEmptyValue, valuesMatch } from './normalization';
import type { FieldMapping } from './templates/types';
import { DEFAULT_AUTO_APPLY_THRESHOLD, DEFAULT_SUGGESTION_THRESHOLD } from './confidence';

export type FieldValue = string | number | boolean | null;

export type MergeDecision = 'KEEP_EXISTING' | 'USE_AI' | 'NEEDS_REVIEW' | 'SKIP';

export interface FieldMergeResult {
  readonly fieldName: string;
  readonly existingValue: FieldValue;
  readonly aiValue: FieldValue;
  readonly aiConfidence: number;
  readonly decision: MergeDecision;
  readonly finalValue: FieldValue;
  readonly reason: string;
}

export type ChangeSource = 'ai' | 'rule';

/**
 * A change derived from a merge, in the shape it is persisted and reviewed in.
 */
export interface ProposedChange {
  field_name: string;
  current_value: FieldValue;
  proposed_value: FieldValue;
  confidence: number;
  source: ChangeSource;
  reason: string;
}

export interface MergeResult {
  readonly fieldResults: readonly FieldMergeResult[];
  readonly autoApplyChanges: readonly ProposedChange[];
  readonly reviewChanges: readonly ProposedChange[];
  readonly keptExisting: readonly string[];
}

/** Placeholder-title policy used by {@link MergeStrategy.mergeTitle} */
export interface TitlePolicy {
  /** Lower-case prefixes of auto-generated titles */
  prefixes: readonly string[];
  /** Titles shorter than this are treated as placeholders */
  minLength: number;
}

export const DEFAULT_TITLE_POLICY: TitlePolicy = {
  prefixes: ['document', 'scan'],
  minLength: 10,
};

export interface MergeStrategyOptions {
  autoApplyThreshold?: number;
  suggestionThreshold?: number;
  titlePolicy?: TitlePolicy;
}

/** Store field name used for title changes */
export const TITLE_FIELD = 'title';

export function isChange(result: FieldMergeResult): boolean {
  return result.decision === 'USE_AI' || result.decision === 'NEEDS_REVIEW';
}

export function isAutoApply(result: FieldMergeResult): boolean {
  return result.decision === 'USE_AI';
}

export function hasChanges(result: MergeResult): boolean {
  return result.autoApplyChanges.length > 0 || result.reviewChanges.length > 0;
}

export function needsReview(result: MergeResult): boolean {
  return result.reviewChanges.length > 0;
}

/** The change fills an empty store field */
export function isFill(change: ProposedChange): boolean {
  return isEmptyValue(change.current_value);
}

/** The change replaces a value the store already has */
export function isOverwrite(change: ProposedChange): boolean {
  return !isEmptyValue(change.current_value) && !isEmptyValue(change.proposed_value);
}

export function toProposedChange(
  result: FieldMergeResult,
  source: ChangeSource = 'ai'
): ProposedChange {
  return {
    field_name: result.fieldName,
    current_value: result.existingValue,
    proposed_value: result.aiValue,
    confidence: result.aiConfidence,
    source,
    reason: result.reason,
  };
}

function percent(confidence: number): string {
  return `${Math.round(confidence * 100)}%`;
}

export class MergeStrategy {
  readonly autoApplyThreshold: number;
  readonly suggestionThreshold: number;
  readonly titlePolicy: TitlePolicy;

  constructor(options: MergeStrategyOptions = {}) {
    this.autoApplyThreshold = options.autoApplyThreshold ?? DEFAULT_AUTO_APPLY_THRESHOLD;
    this.suggestionThreshold = options.suggestionThreshold ?? DEFAULT_SUGGESTION_THRESHOLD;
    this.titlePolicy = options.titlePolicy ?? DEFAULT_TITLE_POLICY;
  }

  mergeField(
    fieldName: string,
    existingValue: FieldValue,
    aiValue: FieldValue,
    aiConfidence: number
  ): FieldMergeResult {
    const base = { fieldName, existingValue, aiValue, aiConfidence };
    const existingEmpty = isEmptyValue(existingValue);
    const aiEmpty = isEmptyValue(aiValue);

    if (existingEmpty && aiEmpty) {
      return { ...base, decision: 'SKIP', finalValue: null, reason: 'No value from either source' };
    }

    if (aiEmpty) {
      return {
        ...base,
        decision: 'KEEP_EXISTING',
        finalValue: existingValue,
        reason: 'AI did not extract this field',
      };
    }

    if (existingEmpty) {
      if (aiConfidence >= this.autoApplyThreshold) {
        return {
          ...base,
          decision: 'USE_AI',
          finalValue: aiValue,
          reason: `Filling empty field (confidence: ${percent(aiConfidence)})`,
        };
      }
      return {
        ...base,
        decision: 'NEEDS_REVIEW',
        finalValue: existingValue,
        reason: `Low confidence (${percent(aiConfidence)}), needs review`,
      };
    }

    if (valuesMatch(existingValue, aiValue)) {
      return {
        ...base,
        decision: 'KEEP_EXISTING',
        finalValue: existingValue,
        reason: 'AI agrees with existing value',
      };
    }

    if (aiConfidence >= this.suggestionThreshold) {
      return {
        ...base,
        decision: 'NEEDS_REVIEW',
        finalValue: existingValue,
        reason: `AI suggests different value (confidence: ${percent(aiConfidence)})`,
      };
    }

    return {
      ...base,
      decision: 'KEEP_EXISTING',
      finalValue: existingValue,
      reason: `AI confidence too low to suggest change (${percent(aiConfidence)})`,
    };
  }

  /** The same policy with another auto-apply threshold */
  withAutoApplyThreshold(threshold: number): MergeStrategy {
    return new MergeStrategy({
      autoApplyThreshold: threshold,
      suggestionThreshold: this.suggestionThreshold,
      titlePolicy: this.titlePolicy,
    });
  }

  isDefaultTitle(title: string): boolean {
    const lowered = title.toLowerCase();
    return (
      title.length < this.titlePolicy.minLength ||
      this.titlePolicy.prefixes.some((prefix) => lowered.startsWith(prefix.toLowerCase()))
    );
  }

  /**
   * Titles are nearly always set, often to a scanner placeholder. Only a
   * placeholder is replaced automatically; any other difference goes to review.
   */
  mergeTitle(existingTitle: string, proposedTitle: string, confidence: number): FieldMergeResult {
    const base = {
      fieldName: TITLE_FIELD,
      existingValue: existingTitle,
      aiValue: proposedTitle,
      aiConfidence: confidence,
    };

    if (this.isDefaultTitle(existingTitle) && confidence >= this.autoApplyThreshold) {
      return {
        ...base,
        decision: 'USE_AI',
        finalValue: proposedTitle,
        reason: 'Replacing default/auto-generated title',
      };
    }

    if (valuesMatch(existingTitle, proposedTitle)) {
      return {
        ...base,
        decision: 'KEEP_EXISTING',
        finalValue: existingTitle,
        reason: 'Title already matches',
      };
    }

    return {
      ...base,
      decision: 'NEEDS_REVIEW',
      finalValue: existingTitle,
      reason: 'Title change requires review',
    };
  }

  /**
   * Merge every mapped field present in the extraction.
   *
   * @param existingFields - current store values keyed by store field name
   * @param fieldMapping - extracted field name to store field name, in merge order
   * @param confidence - overall extraction confidence, reported with the summary
   */
  mergeDocument(
    existingFields: Readonly<Record<string, FieldValue>>,
    extraction: ExtractionResult,
    fieldMapping: FieldMapping,
    confidence: number
  ): MergeResult {
    const fieldResults: FieldMergeResult[] = [];
    const autoApplyChanges: ProposedChange[] = [];
    const reviewChanges: ProposedChange[] = [];
    const keptExisting: string[] = [];

    for (const [extractedName, storeName] of fieldMapping) {
      const field = getField(extraction, extractedName);
      if (!field) {
        continue;
      }

      const existing = Object.hasOwn(existingFields, storeName) ? existingFields[storeName] : null;
      const result = this.mergeField(storeName, existing, bestValue(field), field.confidence);
      fieldResults.push(result);

      switch (result.decision) {
        case 'USE_AI':
          autoApplyChanges.push(toProposedChange(result));
          break;
        case 'NEEDS_REVIEW':
          reviewChanges.push(toProposedChange(result));
          break;
        case 'KEEP_EXISTING':
          keptExisting.push(storeName);
          break;
        case 'SKIP':
          break;
      }
    }

    logger.debug('Merge complete', {
      templateId: extraction.templateId,
      confidence: Math.round(confidence * 100) / 100,
      autoApply: autoApplyChanges.length,
      review: reviewChanges.length,
      kept: keptExisting.length,
    });

    return { fieldResults, autoApplyChanges, reviewChanges, keptExisting };
  }
}
