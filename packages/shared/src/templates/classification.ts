/**
 * Document Classification
 *
 * Gatekeeper step: a cheap model picks the template before the specialist
 * model extracts fields.
 */

import type { Template } from './types';

/** Characters of OCR text shown to the gatekeeper */
export const CLASSIFICATION_PREVIEW_LENGTH = 3000;

export const CLASSIFICATION_USER_PROMPT_TEMPLATE = `Classify this document based on the preview:

DOCUMENT PREVIEW:
{{preview}}

Return the template id, your confidence (0-1) and a short reasoning.`;

/**
 * Gatekeeper system prompt: the base prompt followed by one line per template.
 */
export function buildClassificationSystemPrompt(
  basePrompt: string,
  templates: readonly Template[]
): string {
  const lines = templates.map((template) => `- ${template.id}: ${template.description}`);
  return `${basePrompt.trim()}\n\nAvailable templates:\n${lines.join('\n')}`;
}

export function buildClassificationUserPrompt(content: string): string {
  return CLASSIFICATION_USER_PROMPT_TEMPLATE.replace(
    '{{preview}}',
    content.slice(0, CLASSIFICATION_PREVIEW_LENGTH)
  );
}

/**
 * JSON Schema for the classification response (OpenAI Structured Outputs),
 * restricted to the configured template ids.
 */
export function buildClassificationSchema(templateIds: readonly string[]) {
  return {
    name: 'document_classification',
    strict: true,
    schema: {
      type: 'object',
      additionalProperties: false,
      required: ['template_id', 'confidence', 'reasoning'],
      properties: {
        template_id: {
          type: 'string',
          enum: [...templateIds],
          description: 'Id of the template that best matches the document',
        },
        confidence: {
          type: 'number',
          description: 'Confidence score from 0 to 1',
        },
        reasoning: {
          type: 'string',
          description: 'Brief explanation for the classification',
        },
      },
    },
  };
}
