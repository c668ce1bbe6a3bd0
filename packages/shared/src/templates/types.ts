/**
 * Document Template Types
 *
 * A template describes one kind of document: which fields the specialist
 * model extracts, which of them are required, how they map onto store
 * custom fields, and how the resulting title is formatted.
 */

import type { FieldType } from '../extraction';

export interface TemplateField {
  name: string;
  type: FieldType;
  required: boolean;
  description: string;
}

export interface TemplateExtraction {
  /** Free-text extraction rules appended to the specialist prompt */
  rules: string;
  fields: TemplateField[];
}

/**
 * Extracted-field name to store custom-field name, iterated in insertion order.
 */
export type FieldMapping = ReadonlyMap<string, string>;

export interface Template {
  id: string;
  description: string;

  /** Correspondent name to assign when the document has none */
  correspondentHint: string | null;
  correspondentIds: number[];

  /** Document type name to assign on auto-apply */
  documentType: string | null;

  extraction: TemplateExtraction;
  fieldMapping: FieldMapping;

  /** `{field}` placeholders; missing values render as "-" */
  titleFormat: string | null;

  tagsAdd: string[];

  /** Days after the issue date used to derive a missing due date */
  autoDueDateDays: number | null;
  /** Auto-apply threshold for this template, in place of the configured one */
  minConfidence: number | null;
}

/**
 * The subset of a template the confidence scorer reads.
 */
export interface TemplateRequirements {
  extraction: {
    fields: ReadonlyArray<Pick<TemplateField, 'name' | 'required'>>;
  };
}

export interface BasePrompts {
  gatekeeper: string;
  specialist: string;
}

export interface TemplatesConfig {
  basePrompts: BasePrompts;
  templates: Template[];
}
