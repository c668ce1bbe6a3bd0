/**
 * Test Helpers
 *
 * Template and extraction builders plus in-memory stand-ins for the
 * document store, the review repository and the LLM client.
 */

import {
  createExtractedField,
  createExtractionResult,
  type ClassificationResult,
  type CustomFieldDefinition,
  type DocumentPatch,
  type DocumentSnapshot,
  type DocumentStore,
  type ExtractedField,
  type ExtractionResult,
  type FieldType,
  type FieldValue,
  type NamedEntity,
  type ReviewRecord,
  type ReviewRepository,
  type ReviewStatus,
  type SaveReviewInput,
  type Template,
  type TemplatesConfig,
} from '@docmerge/shared';
import type {
  ClassifiedExtraction,
  ExtractionClient,
} from '../../services/worker-reconciler/src/lib/llm';

export const TEST_TAGS = {
  needsReview: 'ai-review-needed',
  approved: 'ai-approved',
  rejected: 'ai-rejected',
  processed: 'ai-processed',
};

/**
 * Invoice-like template: issue_date and total_gross required, invoice_number optional.
 */
export function makeTemplate(overrides: Partial<Template> = {}): Template {
  return {
    id: 'test_template',
    description: 'Test template',
    correspondentHint: null,
    correspondentIds: [],
    documentType: null,
    extraction: {
      rules: 'Extract test fields',
      fields: [
        { name: 'issue_date', type: 'date', required: true, description: '' },
        { name: 'total_gross', type: 'amount', required: true, description: '' },
        { name: 'invoice_number', type: 'string', required: false, description: '' },
      ],
    },
    fieldMapping: new Map([
      ['issue_date', 'Issue Date'],
      ['total_gross', 'Total Gross'],
      ['invoice_number', 'Invoice Number'],
    ]),
    titleFormat: '{issue_date} | {invoice_number} | {total_gross} EUR',
    tagsAdd: [],
    autoDueDateDays: null,
    minConfidence: 0.7,
    ...overrides,
  };
}

export function makeTemplatesConfig(templates: Template[]): TemplatesConfig {
  return {
    basePrompts: { gatekeeper: 'Test gatekeeper prompt', specialist: 'Test specialist prompt' },
    templates,
  };
}

export function makeField(
  name: string,
  rawValue: string | null,
  confidence: number,
  fieldType: FieldType = 'string',
  normalizedValue: string | null = null
): ExtractedField {
  return createExtractedField({ name, rawValue, normalizedValue, confidence, fieldType });
}

export function makeExtraction(
  fields: ExtractedField[],
  templateId = 'test_template',
  templateConfidence = 0.95
): ExtractionResult {
  return createExtractionResult({ templateId, templateConfidence, fields });
}

export function makeSnapshot(overrides: Partial<DocumentSnapshot> = {}): DocumentSnapshot {
  return {
    id: 1,
    title: 'Scan_2025-01-15',
    content: 'Invoice INV-001 issued 15/01/2025. Total 123,45 EUR',
    created: '2025-01-15',
    added: null,
    modified: null,
    originalFileName: null,
    correspondentId: null,
    correspondentName: null,
    documentTypeId: null,
    documentTypeName: null,
    tagIds: [],
    tagNames: [],
    customFields: {},
    customFieldIds: {},
    ...overrides,
  };
}

function findByName<T extends NamedEntity>(items: readonly T[], name: string): T | null {
  const lowered = name.toLowerCase();
  return items.find((item) => item.name.toLowerCase() === lowered) ?? null;
}

/**
 * Document store kept in memory. Patches are recorded and applied to the
 * stored snapshots; adding an unknown tag creates it.
 */
export class InMemoryDocumentStore implements DocumentStore {
  readonly documents = new Map<number, DocumentSnapshot>();
  readonly patches: Array<{ docId: number; patch: DocumentPatch }> = [];
  tags: NamedEntity[] = [];
  customFields: CustomFieldDefinition[] = [];
  correspondents: NamedEntity[] = [];
  documentTypes: NamedEntity[] = [];

  addDocument(snapshot: DocumentSnapshot): void {
    this.documents.set(snapshot.id, structuredClone(snapshot));
  }

  document(docId: number): DocumentSnapshot {
    const snapshot = this.documents.get(docId);
    if (!snapshot) {
      throw new Error(`Document ${docId} not found`);
    }
    return snapshot;
  }

  async getDocumentSnapshot(docId: number): Promise<DocumentSnapshot> {
    return structuredClone(this.document(docId));
  }

  async getDocumentsByTag(tagName: string): Promise<number[]> {
    const lowered = tagName.toLowerCase();
    return [...this.documents.values()]
      .filter((doc) => doc.tagNames.some((name) => name.toLowerCase() === lowered))
      .map((doc) => doc.id);
  }

  async getDocumentsByCorrespondent(correspondentName: string): Promise<number[]> {
    return [...this.documents.values()]
      .filter((doc) => doc.correspondentName === correspondentName)
      .map((doc) => doc.id);
  }

  async patchDocument(docId: number, patch: DocumentPatch): Promise<void> {
    this.patches.push({ docId, patch });
    const doc = this.document(docId);

    if (patch.title !== undefined) {
      doc.title = patch.title;
    }
    if (patch.correspondentId !== undefined) {
      doc.correspondentId = patch.correspondentId;
    }
    if (patch.documentTypeId !== undefined) {
      doc.documentTypeId = patch.documentTypeId;
    }
    for (const tagId of patch.tagsAdd) {
      const tag = this.tags.find((item) => item.id === tagId);
      if (tag && !doc.tagIds.includes(tagId)) {
        doc.tagIds.push(tagId);
        doc.tagNames.push(tag.name);
      }
    }
    for (const tagId of patch.tagsRemove) {
      const index = doc.tagIds.indexOf(tagId);
      if (index !== -1) {
        doc.tagIds.splice(index, 1);
        doc.tagNames.splice(index, 1);
      }
    }
    patch.customFields.forEach((value: FieldValue, fieldId: number) => {
      const field = this.customFields.find((item) => item.id === fieldId);
      if (field) {
        doc.customFields[field.name] = value;
        doc.customFieldIds[field.name] = field.id;
      }
    });
  }

  async getTagByName(name: string): Promise<NamedEntity | null> {
    return findByName(this.tags, name);
  }

  async addTagToDocument(docId: number, tagName: string): Promise<void> {
    let tag = findByName(this.tags, tagName);
    if (!tag) {
      tag = { id: this.tags.length + 100, name: tagName };
      this.tags.push(tag);
    }
    const doc = this.document(docId);
    if (!doc.tagIds.includes(tag.id)) {
      doc.tagIds.push(tag.id);
      doc.tagNames.push(tag.name);
    }
  }

  async removeTagFromDocument(docId: number, tagName: string): Promise<void> {
    const tag = findByName(this.tags, tagName);
    const doc = this.document(docId);
    const index = tag ? doc.tagIds.indexOf(tag.id) : -1;
    if (index !== -1) {
      doc.tagIds.splice(index, 1);
      doc.tagNames.splice(index, 1);
    }
  }

  async getCustomFieldByName(name: string): Promise<CustomFieldDefinition | null> {
    return findByName(this.customFields, name);
  }

  async getCorrespondentByName(name: string): Promise<NamedEntity | null> {
    return findByName(this.correspondents, name);
  }

  async getDocumentTypeByName(name: string): Promise<NamedEntity | null> {
    return findByName(this.documentTypes, name);
  }
}

export class InMemoryReviewRepository implements ReviewRepository {
  readonly records = new Map<number, ReviewRecord>();

  async save(input: SaveReviewInput): Promise<void> {
    const now = new Date('2025-01-15T10:00:00Z');
    this.records.set(input.docId, {
      docId: input.docId,
      templateId: input.templateId ?? null,
      confidence: input.confidence ?? null,
      changes: [...input.changes],
      status: 'pending',
      correlationId: input.correlationId ?? null,
      decisionReason: null,
      createdAt: now,
      updatedAt: now,
    });
  }

  async getPending(docId: number): Promise<ReviewRecord | null> {
    const record = this.records.get(docId);
    return record && record.status === 'pending' ? record : null;
  }

  async listPending(): Promise<ReviewRecord[]> {
    return [...this.records.values()].filter((record) => record.status === 'pending');
  }

  async resolve(
    docId: number,
    status: Exclude<ReviewStatus, 'pending'>,
    reason: string | null = null
  ): Promise<void> {
    const record = this.records.get(docId);
    if (record && record.status === 'pending') {
      this.records.set(docId, { ...record, status, decisionReason: reason });
    }
  }
}

/**
 * LLM client returning a fixed classification and extraction.
 */
export class FakeExtractionClient implements ExtractionClient {
  calls = 0;
  readonly correspondentTemplates: Array<Template | undefined> = [];

  constructor(private readonly response: ClassifiedExtraction | Error) {}

  async classifyDocument(): Promise<ClassificationResult> {
    return (await this.classifyAndExtract()).classification;
  }

  async extractMetadata(): Promise<ExtractionResult> {
    return (await this.classifyAndExtract()).extraction;
  }

  async classifyAndExtract(_content = '', correspondentTemplate?: Template): Promise<ClassifiedExtraction> {
    this.calls += 1;
    this.correspondentTemplates.push(correspondentTemplate);
    if (this.response instanceof Error) {
      throw this.response;
    }
    return this.response;
  }
}

export function makeClassification(templateId: string, confidence = 0.95): ClassificationResult {
  return {
    templateId,
    confidence,
    reasoning: 'test',
    model: 'test-model',
    requestId: 'req_test',
    processingTimeMs: 1,
  };
}
