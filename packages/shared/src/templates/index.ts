/**
 * Document Templates
 *
 * Templates live in a JSON file (config/templates.json by default),
 * validated against docs/contracts/templates.schema.json on load.
 */

import fs from 'fs';
import path from 'path';
import { config, DEFAULT_FIELD_MAPPING } from '../config';
import { ConfigurationError } from '../errors';
import { logger } from '../logger';
import { validateTemplatesFile, isTemplatesFile, type RawTemplate } from '../schemas';
import type { FieldMapping, Template, TemplateField, TemplatesConfig } from './types';

export type {
  BasePrompts,
  FieldMapping,
  Template,
  TemplateExtraction,
  TemplateField,
  TemplateRequirements,
  TemplatesConfig,
} from './types';

export {
  CLASSIFICATION_PREVIEW_LENGTH,
  buildClassificationSchema,
  buildClassificationSystemPrompt,
  buildClassificationUserPrompt,
} from './classification';

export {
  buildExtractionSchema,
  buildExtractionSystemPrompt,
  buildExtractionUserPrompt,
} from './extraction-prompt';

export const FALLBACK_TEMPLATE_ID = 'fallback_general';

/**
 * Explicit template mappings first, in file order, then the defaults for
 * template fields the template did not map itself.
 */
export function resolveFieldMapping(
  explicit: Readonly<Record<string, string>> | undefined,
  fields: readonly TemplateField[],
  defaults: FieldMapping = DEFAULT_FIELD_MAPPING
): FieldMapping {
  const mapping = new Map<string, string>(Object.entries(explicit ?? {}));
  for (const field of fields) {
    const storeName = defaults.get(field.name);
    if (!mapping.has(field.name) && storeName !== undefined) {
      mapping.set(field.name, storeName);
    }
  }
  return mapping;
}

function toTemplate(raw: RawTemplate, defaults: FieldMapping): Template {
  const fields: TemplateField[] = raw.extraction.fields.map((field) => ({
    name: field.name,
    type: field.type,
    required: field.required ?? false,
    description: field.description ?? '',
  }));

  return {
    id: raw.id,
    description: raw.description,
    correspondentHint: raw.correspondent_hint ?? null,
    correspondentIds: raw.correspondent_ids ?? [],
    documentType: raw.document_type ?? null,
    extraction: { rules: raw.extraction.rules ?? '', fields },
    fieldMapping: resolveFieldMapping(raw.field_mapping, fields, defaults),
    titleFormat: raw.title_format ?? null,
    tagsAdd: raw.tags_add ?? [],
    autoDueDateDays: raw.auto_due_date_days ?? null,
    minConfidence: raw.min_confidence ?? null,
  };
}

/**
 * Build a TemplatesConfig from parsed JSON.
 *
 * @throws ConfigurationError when the data does not match the schema or ids repeat
 */
export function parseTemplatesConfig(
  data: unknown,
  defaults: FieldMapping = DEFAULT_FIELD_MAPPING
): TemplatesConfig {
  const validation = validateTemplatesFile(data);
  if (!validation.valid || !isTemplatesFile(data)) {
    throw new ConfigurationError('Invalid templates configuration', {
      errors: validation.errors ?? [],
    });
  }

  const fileDefaults = data.field_mapping
    ? new Map([...defaults, ...Object.entries(data.field_mapping)])
    : defaults;

  const seen = new Set<string>();
  for (const template of data.templates) {
    if (seen.has(template.id)) {
      throw new ConfigurationError(`Duplicate template id: ${template.id}`);
    }
    seen.add(template.id);
  }

  return {
    basePrompts: {
      gatekeeper: data.base_prompts.gatekeeper,
      specialist: data.base_prompts.specialist,
    },
    templates: data.templates.map((template) => toTemplate(template, fileDefaults)),
  };
}

function candidatePaths(explicitPath?: string): string[] {
  if (explicitPath) {
    return [explicitPath];
  }
  if (config.templatesPath) {
    return [config.templatesPath];
  }
  return [
    // Relative to shared package sources
    path.join(__dirname, '../../../../config/templates.json'),
    // Relative to compiled output
    path.join(__dirname, '../../../../../config/templates.json'),
    // Relative to project root (containers)
    path.join(process.cwd(), 'config/templates.json'),
  ];
}

/**
 * Load and validate the templates file.
 *
 * @throws ConfigurationError when no file is found or it is invalid
 */
export function loadTemplatesConfig(filePath?: string): TemplatesConfig {
  const candidates = candidatePaths(filePath);
  const found = candidates.find((candidate) => fs.existsSync(candidate));
  if (!found) {
    throw new ConfigurationError('Templates file not found', { searched: candidates });
  }

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(found, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Templates file is not valid JSON: ${found}`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const templatesConfig = parseTemplatesConfig(data);
  logger.info('Templates loaded', {
    path: found,
    templates: templatesConfig.templates.map((template) => template.id),
  });
  return templatesConfig;
}

export function getTemplateById(
  templatesConfig: TemplatesConfig,
  templateId: string
): Template | undefined {
  return templatesConfig.templates.find((template) => template.id === templateId);
}

export function getTemplateIds(templatesConfig: TemplatesConfig): string[] {
  return templatesConfig.templates.map((template) => template.id);
}

/**
 * Template configured for a correspondent, by id first and then by name hint.
 */
export function findTemplateForCorrespondent(
  templatesConfig: TemplatesConfig,
  correspondentId: number | null,
  correspondentName: string | null = null
): Template | undefined {
  if (correspondentId !== null) {
    const byId = templatesConfig.templates.find((template) =>
      template.correspondentIds.includes(correspondentId)
    );
    if (byId) {
      return byId;
    }
  }

  if (correspondentName) {
    const lowered = correspondentName.toLowerCase();
    return templatesConfig.templates.find(
      (template) =>
        template.correspondentHint !== null &&
        lowered.includes(template.correspondentHint.toLowerCase())
    );
  }

  return undefined;
}
