/**
 * Specialist extraction prompt and response schema, built per template.
 */

import type { Template } from './types';

export function buildExtractionSystemPrompt(basePrompt: string, template: Template): string {
  const fieldLines = template.extraction.fields.map(
    (field) =>
      `- ${field.name} (${field.type}): ${field.description || 'No description'}` +
      (field.required ? ' [REQUIRED]' : '')
  );

  return [
    basePrompt.trim(),
    '',
    `Template: ${template.id} - ${template.description}`,
    '',
    'Extraction Rules:',
    template.extraction.rules.trim(),
    '',
    'Fields to extract:',
    ...fieldLines,
  ].join('\n');
}

export function buildExtractionUserPrompt(content: string, maxChars: number): string {
  return `Document content:
${content.slice(0, maxChars)}

Extract the requested fields and return JSON with:
- fields: object mapping field names to extracted values (null when absent)
- confidence: object mapping field names to confidence scores (0.0 to 1.0)
- notes: any extraction notes or issues (empty string when none)`;
}

/**
 * JSON Schema for the extraction response (OpenAI Structured Outputs).
 * Strict mode needs every property listed as required, so absent values are null.
 */
export function buildExtractionSchema(template: Template) {
  const names = template.extraction.fields.map((field) => field.name);
  const valueProperties: Record<string, { type: readonly ['string', 'null']; description: string }> = {};
  const confidenceProperties: Record<string, { type: 'number' }> = {};

  for (const field of template.extraction.fields) {
    valueProperties[field.name] = {
      type: ['string', 'null'],
      description: field.description || field.name,
    };
    confidenceProperties[field.name] = { type: 'number' };
  }

  return {
    name: `extract_${template.id}`.replace(/[^a-zA-Z0-9_-]/g, '_').slice(0, 64),
    strict: true,
    schema: {
      type: 'object',
      additionalProperties: false,
      required: ['fields', 'confidence', 'notes'],
      properties: {
        fields: {
          type: 'object',
          additionalProperties: false,
          required: names,
          properties: valueProperties,
        },
        confidence: {
          type: 'object',
          additionalProperties: false,
          required: names,
          properties: confidenceProperties,
        },
        notes: { type: 'string' },
      },
    },
  };
}
