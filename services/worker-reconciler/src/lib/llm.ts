/**
 * LLM Integration (Two-Step Extraction)
 *
 * 1. Classification: the gatekeeper model picks a template id
 * 2. Extraction: the specialist model fills that template's fields
 */

import OpenAI from 'openai';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import {
  logger,
  config,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  buildClassificationSchema,
  buildClassificationSystemPrompt,
  buildClassificationUserPrompt,
  buildExtractionSchema,
  buildExtractionSystemPrompt,
  buildExtractionUserPrompt,
  createExtractedField,
  createExtractionResult,
  getTemplateById,
  getTemplateIds,
  ClassificationError,
  ExtractionError,
  LlmApiError,
  LlmRateLimitError,
  FALLBACK_TEMPLATE_ID,
  type ClassificationResult,
  type ExtractedField,
  type ExtractionResult,
  type Template,
  type TemplatesConfig,
} from '@docmerge/shared';
import { isRecord, parseJsonContent } from './json-response';

/** Confidence assumed for a field or classification the model did not score */
export const DEFAULT_MODEL_CONFIDENCE = 0.5;

/** Tokens allowed for the classification answer */
const CLASSIFICATION_MAX_TOKENS = 256;

/** Characters of content sent to the specialist per output token */
const CONTENT_CHARS_PER_TOKEN = 10;

export interface ClassifiedExtraction {
  classification: ClassificationResult;
  extraction: ExtractionResult;
}

/**
 * Classification and field extraction as the pipeline consumes them.
 */
export interface ExtractionClient {
  classifyDocument(content: string): Promise<ClassificationResult>;
  extractMetadata(content: string, template: Template): Promise<ExtractionResult>;
  /**
   * Classify, then extract with the classified template. When the document
   * cannot be placed, `correspondentTemplate` is used ahead of the fallback.
   */
  classifyAndExtract(content: string, correspondentTemplate?: Template): Promise<ClassifiedExtraction>;
}

/** The part of a chat completion this client reads */
export interface ChatCompletionResponse {
  id?: string;
  choices: Array<{ message: { content: string | null } }>;
  usage?: { total_tokens?: number } | null;
}

export type CreateChatCompletion = (
  params: ChatCompletionCreateParamsNonStreaming
) => Promise<ChatCompletionResponse>;

type LlmStage = 'classify' | 'extract';

export interface OpenAiExtractionClientOptions {
  templates: TemplatesConfig;
  gatekeeperModel?: string;
  specialistModel?: string;
  maxTokens?: number;
  /** Defaults to the OpenAI SDK built from config */
  createCompletion?: CreateChatCompletion;
}

function defaultCreateCompletion(): CreateChatCompletion {
  const openai = new OpenAI({
    apiKey: process.env.OPENAI_API_KEY || config.openaiApiKey,
    timeout: config.llmRequestTimeoutMs,
  });
  return (params) => openai.chat.completions.create(params);
}

function retryAfterSeconds(error: InstanceType<typeof OpenAI.APIError>): number | null {
  const header = error.headers?.['retry-after'];
  if (!header) {
    return null;
  }
  const seconds = parseInt(header, 10);
  return Number.isNaN(seconds) ? null : seconds;
}

/**
 * SDK failures as the error types callers handle.
 */
export function toLlmError(error: unknown): Error {
  if (error instanceof LlmApiError || error instanceof ExtractionError) {
    return error;
  }
  if (error instanceof OpenAI.RateLimitError) {
    return new LlmRateLimitError(retryAfterSeconds(error));
  }
  if (error instanceof OpenAI.APIError) {
    return new LlmApiError(`LLM API error: ${error.message}`, error.type ?? null, {
      status: error.status ?? null,
    });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new LlmApiError(`LLM request failed: ${message}`);
}

function toFieldValue(value: unknown): string | null {
  if (typeof value === 'string') {
    return value || null;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return value ? String(value) : null;
  }
  return null;
}

function toConfidence(value: unknown): number {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isNaN(parsed) ? DEFAULT_MODEL_CONFIDENCE : parsed;
  }
  return DEFAULT_MODEL_CONFIDENCE;
}

/**
 * Template fields from a parsed extraction payload; fields the template does
 * not define are ignored.
 */
export function fieldsFromPayload(
  payload: Record<string, unknown>,
  template: Template
): ExtractedField[] {
  const values = isRecord(payload.fields) ? payload.fields : {};
  const confidences = isRecord(payload.confidence) ? payload.confidence : {};

  return template.extraction.fields.map((fieldDef) =>
    createExtractedField({
      name: fieldDef.name,
      rawValue: toFieldValue(values[fieldDef.name]),
      confidence: toConfidence(confidences[fieldDef.name]),
      fieldType: fieldDef.type,
    })
  );
}

export class OpenAiExtractionClient implements ExtractionClient {
  private readonly templates: TemplatesConfig;
  private readonly gatekeeperModel: string;
  private readonly specialistModel: string;
  private readonly maxTokens: number;
  private readonly createCompletion: CreateChatCompletion;

  constructor(options: OpenAiExtractionClientOptions) {
    this.templates = options.templates;
    this.gatekeeperModel = options.gatekeeperModel ?? config.llmModelGatekeeper;
    this.specialistModel = options.specialistModel ?? config.llmModelSpecialist;
    this.maxTokens = options.maxTokens ?? config.llmMaxTokens;
    this.createCompletion = options.createCompletion ?? defaultCreateCompletion();
  }

  private async complete(
    stage: LlmStage,
    params: ChatCompletionCreateParamsNonStreaming
  ): Promise<{ content: string; requestId: string | null }> {
    const startTime = Date.now();
    const labels = { model: params.model, stage };

    try {
      const response = await this.createCompletion(params);
      const duration = (Date.now() - startTime) / 1000;
      llmRequestDurationHistogram.observe(labels, duration);
      llmRequestsCounter.inc({ ...labels, status: 'success' });

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new LlmApiError('Empty response from LLM API', 'empty_response');
      }

      logger.debug('LLM response received', {
        ...labels,
        request_id: response.id,
        duration_seconds: duration,
        tokens_used: response.usage?.total_tokens,
      });

      return { content, requestId: response.id ?? null };
    } catch (error) {
      llmRequestDurationHistogram.observe(labels, (Date.now() - startTime) / 1000);
      llmRequestsCounter.inc({ ...labels, status: 'error' });
      throw toLlmError(error);
    }
  }

  async classifyDocument(content: string): Promise<ClassificationResult> {
    const startTime = Date.now();
    const templateIds = getTemplateIds(this.templates);

    const { content: responseText, requestId } = await this.complete('classify', {
      model: this.gatekeeperModel,
      max_tokens: CLASSIFICATION_MAX_TOKENS,
      messages: [
        {
          role: 'system',
          content: buildClassificationSystemPrompt(
            this.templates.basePrompts.gatekeeper,
            this.templates.templates
          ),
        },
        { role: 'user', content: buildClassificationUserPrompt(content) },
      ],
      response_format: {
        type: 'json_schema',
        json_schema: buildClassificationSchema(templateIds),
      },
    });

    let payload: unknown;
    try {
      payload = parseJsonContent(responseText);
    } catch (error) {
      throw new ClassificationError(
        `Failed to parse classification response: ${error instanceof Error ? error.message : String(error)}`,
        null,
        responseText
      );
    }

    const returnedId = isRecord(payload)
      ? toFieldValue(payload.template_id) ?? toFieldValue(payload.selected_id)
      : null;
    if (!isRecord(payload) || !returnedId) {
      throw new ClassificationError('No template_id in classification response', null, responseText);
    }

    let templateId = returnedId;
    if (!templateIds.includes(templateId)) {
      logger.warn('Unknown template id, using fallback', {
        returned_id: returnedId,
        valid_ids: templateIds,
      });
      templateId = FALLBACK_TEMPLATE_ID;
    }

    const result: ClassificationResult = {
      templateId,
      confidence: toConfidence(payload.confidence),
      reasoning: typeof payload.reasoning === 'string' ? payload.reasoning : '',
      model: this.gatekeeperModel,
      requestId,
      processingTimeMs: Date.now() - startTime,
    };

    logger.info('Document classified', {
      template_id: result.templateId,
      confidence: result.confidence,
      reasoning: result.reasoning,
      elapsed_ms: result.processingTimeMs,
    });

    return result;
  }

  async extractMetadata(content: string, template: Template): Promise<ExtractionResult> {
    const startTime = Date.now();

    const { content: responseText } = await this.complete('extract', {
      model: this.specialistModel,
      max_tokens: this.maxTokens,
      temperature: 0,
      messages: [
        {
          role: 'system',
          content: buildExtractionSystemPrompt(this.templates.basePrompts.specialist, template),
        },
        {
          role: 'user',
          content: buildExtractionUserPrompt(content, this.maxTokens * CONTENT_CHARS_PER_TOKEN),
        },
      ],
      response_format: {
        type: 'json_schema',
        json_schema: buildExtractionSchema(template),
      },
    });

    let payload: unknown;
    try {
      payload = parseJsonContent(responseText);
    } catch (error) {
      throw new ExtractionError(
        `Failed to parse extraction response: ${error instanceof Error ? error.message : String(error)}`,
        template.id,
        responseText
      );
    }
    if (!isRecord(payload)) {
      throw new ExtractionError('Extraction response is not an object', template.id, responseText);
    }

    const notes = typeof payload.notes === 'string' && payload.notes.trim() ? [payload.notes.trim()] : [];
    const extraction = createExtractionResult({
      templateId: template.id,
      templateConfidence: 0.9,
      fields: fieldsFromPayload(payload, template),
      processingNotes: notes,
      processingTimeMs: Date.now() - startTime,
    });

    logger.info('Metadata extracted', {
      template_id: template.id,
      fields_extracted: Object.values(extraction.fields).filter((field) => field.rawValue !== null).length,
      elapsed_ms: extraction.processingTimeMs,
    });

    return extraction;
  }

  async classifyAndExtract(
    content: string,
    correspondentTemplate?: Template
  ): Promise<ClassifiedExtraction> {
    const classification = await this.classifyDocument(content);

    const template =
      (classification.templateId === FALLBACK_TEMPLATE_ID ? correspondentTemplate : undefined) ??
      getTemplateById(this.templates, classification.templateId) ??
      getTemplateById(this.templates, FALLBACK_TEMPLATE_ID);
    if (!template) {
      throw new ExtractionError(
        `Template not found and no fallback: ${classification.templateId}`,
        classification.templateId
      );
    }

    const extracted = await this.extractMetadata(content, template);
    const extraction = createExtractionResult({
      ...extracted,
      templateConfidence: classification.confidence,
    });

    return { classification, extraction };
  }
}
