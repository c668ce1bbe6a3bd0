/**
 * Document Pipeline
 *
 * fetch -> classify/extract -> normalize -> score -> merge -> apply or review
 *
 * The store stays authoritative: only USE_AI decisions are written directly,
 * everything else goes through the review queue.
 */

import {
  logger,
  config,
  emptyPatch,
  formatExtractionTitle,
  findTemplateForCorrespondent,
  getTemplateById,
  hasTag,
  isEmptyPatch,
  processExtraction,
  scoreExtraction,
  toProposedChange,
  validateExtraction,
  withNote,
  isChange,
  isAutoApply,
  confidenceHistogram,
  documentsProcessedCounter,
  mergeDecisionsCounter,
  processingDurationHistogram,
  MergeStrategy,
  ProcessingError,
  ReviewQueue,
  FALLBACK_TEMPLATE_ID,
  TITLE_FIELD,
  type ClassificationResult,
  type ConfidenceScore,
  type DocumentSnapshot,
  type DocumentStore,
  type ExtractionResult,
  type FieldMergeResult,
  type ProposedChange,
  type ReviewTags,
  type Template,
  type TemplatesConfig,
} from '@docmerge/shared';
import type { ExtractionClient } from './llm';

export interface ProcessingResult {
  docId: number;
  success: boolean;
  templateId: string | null;
  classification: ClassificationResult | null;
  extraction: ExtractionResult | null;
  confidence: ConfidenceScore | null;
  /** Every change the merge produced, applied or not */
  proposedChanges: ProposedChange[];
  appliedChanges: ProposedChange[];
  reviewRequired: boolean;
  skippedReason: string | null;
  errorMessage: string | null;
  processingTimeMs: number;
}

export interface BatchSummary {
  total: number;
  successful: number;
  failed: number;
  skipped: number;
  reviewRequired: number;
}

export interface ProcessOptions {
  dryRun?: boolean;
}

export interface DocumentPipelineDeps {
  store: DocumentStore;
  llm: ExtractionClient;
  templates: TemplatesConfig;
  reviewQueue: ReviewQueue;
  mergeStrategy?: MergeStrategy;
  tags?: ReviewTags;
  maxContentLength?: number;
}

function emptyResult(docId: number, startTime: number): ProcessingResult {
  return {
    docId,
    success: false,
    templateId: null,
    classification: null,
    extraction: null,
    confidence: null,
    proposedChanges: [],
    appliedChanges: [],
    reviewRequired: false,
    skippedReason: null,
    errorMessage: null,
    processingTimeMs: Date.now() - startTime,
  };
}

export function summarizeResults(results: readonly ProcessingResult[]): BatchSummary {
  return {
    total: results.length,
    successful: results.filter((result) => result.success).length,
    failed: results.filter((result) => !result.success).length,
    skipped: results.filter((result) => result.skippedReason !== null).length,
    reviewRequired: results.filter((result) => result.reviewRequired).length,
  };
}

export class DocumentPipeline {
  private readonly store: DocumentStore;
  private readonly llm: ExtractionClient;
  private readonly templates: TemplatesConfig;
  private readonly reviewQueue: ReviewQueue;
  private readonly mergeStrategy: MergeStrategy;
  private readonly tags: ReviewTags;
  private readonly maxContentLength: number;

  constructor(deps: DocumentPipelineDeps) {
    this.store = deps.store;
    this.llm = deps.llm;
    this.templates = deps.templates;
    this.reviewQueue = deps.reviewQueue;
    this.mergeStrategy =
      deps.mergeStrategy ??
      new MergeStrategy({
        autoApplyThreshold: config.confidenceThreshold,
        suggestionThreshold: config.reviewThreshold,
        titlePolicy: { prefixes: config.defaultTitlePrefixes, minLength: config.defaultTitleMinLength },
      });
    this.tags = deps.tags ?? config.reviewTags;
    this.maxContentLength = deps.maxContentLength ?? config.maxContentLength;
  }

  private resolveTemplate(docId: number, templateId: string): Template {
    const template =
      getTemplateById(this.templates, templateId) ??
      getTemplateById(this.templates, FALLBACK_TEMPLATE_ID);
    if (!template) {
      throw new ProcessingError(`No template found for ${templateId}`, docId, 'classify');
    }
    return template;
  }

  async processDocument(docId: number, options: ProcessOptions = {}): Promise<ProcessingResult> {
    const dryRun = options.dryRun ?? false;
    const startTime = Date.now();
    logger.info('Processing document', { documentId: docId, dryRun });

    try {
      const snapshot = await this.store.getDocumentSnapshot(docId);

      if (hasTag(snapshot, this.tags.processed)) {
        logger.info('Document already processed, skipping', { documentId: docId });
        documentsProcessedCounter.inc({ template_id: 'none', status: 'skipped' });
        return { ...emptyResult(docId, startTime), success: true, skippedReason: 'Already processed' };
      }

      const content = snapshot.content.slice(0, this.maxContentLength);
      if (!content.trim()) {
        logger.warn('Document has no content, skipping', { documentId: docId });
        documentsProcessedCounter.inc({ template_id: 'none', status: 'skipped' });
        return {
          ...emptyResult(docId, startTime),
          skippedReason: 'No content',
          errorMessage: 'Document has no OCR content',
        };
      }

      const { classification, extraction: raw } = await this.llm.classifyAndExtract(
        content,
        findTemplateForCorrespondent(this.templates, snapshot.correspondentId, snapshot.correspondentName)
      );
      const template = this.resolveTemplate(docId, raw.templateId);

      let extraction = processExtraction(raw, {
        docId,
        content,
        created: snapshot.created,
        template,
      });
      for (const problem of validateExtraction(extraction, template)) {
        extraction = withNote(extraction, problem);
      }

      const confidence = scoreExtraction(extraction, template);
      confidenceHistogram.observe({ template_id: template.id }, confidence.overall);
      logger.info('Extraction scored', {
        documentId: docId,
        template_id: template.id,
        overall_confidence: Math.round(confidence.overall * 100) / 100,
        explanation: confidence.explanation,
      });

      const strategy =
        template.minConfidence === null
          ? this.mergeStrategy
          : this.mergeStrategy.withAutoApplyThreshold(template.minConfidence);
      const merge = strategy.mergeDocument(
        snapshot.customFields,
        extraction,
        template.fieldMapping,
        confidence.overall
      );

      const titleMerge = template.titleFormat
        ? strategy.mergeTitle(
            snapshot.title,
            formatExtractionTitle(template.titleFormat, extraction, snapshot.created),
            confidence.overall
          )
        : null;

      const decisions: FieldMergeResult[] = titleMerge
        ? [...merge.fieldResults, titleMerge]
        : [...merge.fieldResults];
      for (const decision of decisions) {
        mergeDecisionsCounter.inc({ decision: decision.decision });
      }

      const autoChanges = [...merge.autoApplyChanges];
      const reviewChanges = [...merge.reviewChanges];
      if (titleMerge && isAutoApply(titleMerge)) {
        autoChanges.push(toProposedChange(titleMerge));
      } else if (titleMerge && isChange(titleMerge)) {
        reviewChanges.push(toProposedChange(titleMerge));
      }

      let appliedChanges: ProposedChange[] = [];
      if (dryRun) {
        logger.info('Dry run complete', {
          documentId: docId,
          auto_apply: autoChanges.length,
          needs_review: reviewChanges.length,
        });
      } else {
        if (autoChanges.length > 0) {
          appliedChanges = await this.applyAutoChanges(docId, snapshot, autoChanges, template);
        }
        if (reviewChanges.length > 0) {
          await this.reviewQueue.submitForReview(docId, reviewChanges, {
            templateId: template.id,
            confidence: confidence.overall,
          });
        } else if (appliedChanges.length > 0) {
          await this.reviewQueue.markProcessed(docId);
        }
      }

      const processingTimeMs = Date.now() - startTime;
      processingDurationHistogram.observe({ template_id: template.id }, processingTimeMs / 1000);
      documentsProcessedCounter.inc({ template_id: template.id, status: 'success' });

      logger.info('Document processed', {
        documentId: docId,
        template_id: template.id,
        confidence: Math.round(confidence.overall * 100) / 100,
        auto_applied: appliedChanges.length,
        needs_review: reviewChanges.length > 0,
        elapsed_ms: processingTimeMs,
      });

      return {
        docId,
        success: true,
        templateId: template.id,
        classification,
        extraction,
        confidence,
        proposedChanges: [...autoChanges, ...reviewChanges],
        appliedChanges,
        reviewRequired: reviewChanges.length > 0,
        skippedReason: null,
        errorMessage: null,
        processingTimeMs,
      };
    } catch (error) {
      if (error instanceof ProcessingError) {
        throw error;
      }
      logger.error('Processing failed', error, { documentId: docId });
      documentsProcessedCounter.inc({ template_id: 'none', status: 'error' });
      return {
        ...emptyResult(docId, startTime),
        errorMessage: error instanceof Error ? error.message : String(error),
      };
    }
  }

  /**
   * One patch with every auto-applied change plus the template's document
   * type, correspondent hint and tags. Returns the changes actually written.
   */
  private async applyAutoChanges(
    docId: number,
    snapshot: DocumentSnapshot,
    changes: readonly ProposedChange[],
    template: Template
  ): Promise<ProposedChange[]> {
    const patch = emptyPatch();
    const applied: ProposedChange[] = [];

    for (const change of changes) {
      if (change.field_name === TITLE_FIELD) {
        if (typeof change.proposed_value === 'string') {
          patch.title = change.proposed_value;
          applied.push(change);
        }
        continue;
      }
      const field = await this.store.getCustomFieldByName(change.field_name);
      if (!field) {
        logger.warn('Custom field not found', { documentId: docId, field: change.field_name });
        continue;
      }
      patch.customFields.set(field.id, change.proposed_value);
      applied.push(change);
    }

    if (template.documentType) {
      const documentType = await this.store.getDocumentTypeByName(template.documentType);
      if (documentType && snapshot.documentTypeId !== documentType.id) {
        patch.documentTypeId = documentType.id;
      }
    }

    if (template.correspondentHint && snapshot.correspondentId === null) {
      const correspondent = await this.store.getCorrespondentByName(template.correspondentHint);
      if (correspondent) {
        patch.correspondentId = correspondent.id;
      }
    }

    for (const tagName of template.tagsAdd) {
      const tag = await this.store.getTagByName(tagName);
      if (tag && !snapshot.tagIds.includes(tag.id)) {
        patch.tagsAdd.push(tag.id);
      }
    }

    if (!isEmptyPatch(patch)) {
      await this.store.patchDocument(docId, patch, snapshot);
      logger.info('Applied changes', { documentId: docId, count: applied.length });
    }

    return applied;
  }

  async processBatch(docIds: readonly number[], options: ProcessOptions = {}): Promise<ProcessingResult[]> {
    logger.info('Starting batch processing', { batch_size: docIds.length, dryRun: options.dryRun ?? false });

    const results: ProcessingResult[] = [];
    for (const [index, docId] of docIds.entries()) {
      logger.info(`Processing ${index + 1}/${docIds.length}`, { documentId: docId });
      const startTime = Date.now();
      try {
        results.push(await this.processDocument(docId, options));
      } catch (error) {
        logger.error('Failed to process document', error, { documentId: docId });
        results.push({
          ...emptyResult(docId, startTime),
          errorMessage: error instanceof Error ? error.message : String(error),
        });
      }
    }

    logger.info('Batch processing complete', { ...summarizeResults(results) });
    return results;
  }

  async processByTag(tagName: string, options: ProcessOptions = {}): Promise<ProcessingResult[]> {
    const docIds = await this.store.getDocumentsByTag(tagName);
    logger.info('Documents found by tag', { tag: tagName, count: docIds.length });
    return this.processBatch(docIds, options);
  }

  async processByCorrespondent(
    correspondentName: string,
    options: ProcessOptions = {}
  ): Promise<ProcessingResult[]> {
    const docIds = await this.store.getDocumentsByCorrespondent(correspondentName);
    logger.info('Documents found by correspondent', { correspondent: correspondentName, count: docIds.length });
    return this.processBatch(docIds, options);
  }
}
