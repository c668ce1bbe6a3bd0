/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for the templates file and review payloads.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020, { type SchemaObject, type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { logger } from './logger';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
  verbose: true,
});
addFormats(ajv);

const CONTRACT_DIRS = [
  // Relative to shared package sources
  path.join(__dirname, '../../../docs/contracts'),
  // Relative to compiled output
  path.join(__dirname, '../../../../docs/contracts'),
  // Relative to project root (containers)
  path.join(process.cwd(), 'docs/contracts'),
];

const schemaCache = new Map<string, SchemaObject>();

function loadSchema(schemaName: string): SchemaObject {
  const cached = schemaCache.get(schemaName);
  if (cached !== undefined) {
    return cached;
  }

  for (const dir of CONTRACT_DIRS) {
    const schemaPath = path.join(dir, schemaName);
    if (fs.existsSync(schemaPath)) {
      const schema: SchemaObject = JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
      schemaCache.set(schemaName, schema);
      return schema;
    }
  }

  // Permissive schema when the contracts directory is not shipped
  logger.warn(`Schema file not found: ${schemaName}, using permissive validation`);
  const permissive: SchemaObject = { type: 'object' };
  schemaCache.set(schemaName, permissive);
  return permissive;
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

function describeErrors(validate: ValidateFunction): string[] {
  return (validate.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message}`);
}

// ============================================================================
// Templates file
// ============================================================================

export interface RawTemplateField {
  name: string;
  type: 'string' | 'date' | 'amount' | 'number' | 'integer';
  required?: boolean;
  description?: string;
}

export interface RawTemplate {
  id: string;
  description: string;
  correspondent_hint?: string | null;
  correspondent_ids?: number[];
  document_type?: string | null;
  extraction: {
    rules?: string;
    fields: RawTemplateField[];
  };
  field_mapping?: Record<string, string>;
  title_format?: string | null;
  tags_add?: string[];
  auto_due_date_days?: number | null;
  min_confidence?: number;
}

export interface RawTemplatesFile {
  base_prompts: {
    gatekeeper: string;
    specialist: string;
  };
  field_mapping?: Record<string, string>;
  templates: RawTemplate[];
}

let templatesValidator: ValidateFunction<RawTemplatesFile> | null = null;

function getTemplatesValidator(): ValidateFunction<RawTemplatesFile> {
  if (!templatesValidator) {
    templatesValidator = ajv.compile<RawTemplatesFile>(loadSchema('templates.schema.json'));
  }
  return templatesValidator;
}

/**
 * Type guard for a parsed templates file, checked against templates.schema.json
 */
export function isTemplatesFile(data: unknown): data is RawTemplatesFile {
  return getTemplatesValidator()(data);
}

/**
 * Validate a parsed templates file, reporting schema errors
 */
export function validateTemplatesFile(data: unknown): ValidationResult {
  const validate = getTemplatesValidator();
  if (!validate(data)) {
    const errors = describeErrors(validate);
    logger.warn('Templates file validation failed', { errors });
    return { valid: false, errors };
  }
  return { valid: true };
}

// ============================================================================
// Review decisions
// ============================================================================

export interface RejectReviewBody {
  reason?: string;
}

let rejectBodyValidator: ValidateFunction<RejectReviewBody> | null = null;

export function isRejectReviewBody(data: unknown): data is RejectReviewBody {
  if (!rejectBodyValidator) {
    rejectBodyValidator = ajv.compile<RejectReviewBody>(loadSchema('reject_review.schema.json'));
  }
  return rejectBodyValidator(data);
}

export interface ReconcileTagBody {
  tag: string;
  dry_run?: boolean;
}

let reconcileTagValidator: ValidateFunction<ReconcileTagBody> | null = null;

export function isReconcileTagBody(data: unknown): data is ReconcileTagBody {
  if (!reconcileTagValidator) {
    reconcileTagValidator = ajv.compile<ReconcileTagBody>(loadSchema('reconcile_tag.schema.json'));
  }
  return reconcileTagValidator(data);
}

export const schemas = {
  get templates() {
    return loadSchema('templates.schema.json');
  },
  get rejectReview() {
    return loadSchema('reject_review.schema.json');
  },
  get reconcileTag() {
    return loadSchema('reconcile_tag.schema.json');
  },
};
