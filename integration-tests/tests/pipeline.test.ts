/**
 * Document pipeline tests against in-memory store, repository and LLM client
 */

import { MergeStrategy, ProcessingError, ReviewQueue } from '@docmerge/shared';
import { DocumentPipeline, summarizeResults } from '../../services/worker-reconciler/src/lib/pipeline';
import {
  makeClassification,
  makeExtraction,
  makeField,
  makeSnapshot,
  makeTemplate,
  makeTemplatesConfig,
  FakeExtractionClient,
  InMemoryDocumentStore,
  InMemoryReviewRepository,
  TEST_TAGS,
} from './helpers';

const template = makeTemplate({ documentType: 'Invoice', correspondentHint: 'ACME', tagsAdd: ['invoices'] });

function confidentExtraction() {
  return {
    classification: makeClassification('test_template'),
    extraction: makeExtraction([
      makeField('issue_date', '15/01/2025', 0.95, 'date'),
      makeField('total_gross', '123,45', 0.95, 'amount'),
      makeField('invoice_number', 'INV-001', 0.95, 'string'),
    ]),
  };
}

function setup(llm: FakeExtractionClient, templates = makeTemplatesConfig([template])) {
  const store = new InMemoryDocumentStore();
  store.customFields = [
    { id: 1, name: 'Issue Date', dataType: 'date' },
    { id: 2, name: 'Total Gross', dataType: 'monetary' },
    { id: 3, name: 'Invoice Number', dataType: 'string' },
  ];
  store.tags = [{ id: 10, name: 'invoices' }];
  store.documentTypes = [{ id: 5, name: 'Invoice' }];
  store.correspondents = [{ id: 7, name: 'ACME' }];

  const repository = new InMemoryReviewRepository();
  const reviewQueue = new ReviewQueue(store, repository, TEST_TAGS);
  const pipeline = new DocumentPipeline({
    store,
    llm,
    templates,
    reviewQueue,
    mergeStrategy: new MergeStrategy(),
    tags: TEST_TAGS,
    maxContentLength: 25000,
  });

  return { store, repository, pipeline };
}

describe('DocumentPipeline.processDocument', () => {
  it('should apply confident fills in a single patch and mark the document processed', async () => {
    const { store, repository, pipeline } = setup(new FakeExtractionClient(confidentExtraction()));
    store.addDocument(makeSnapshot());

    const result = await pipeline.processDocument(1);

    expect(result.success).toBe(true);
    expect(result.templateId).toBe('test_template');
    expect(result.reviewRequired).toBe(false);
    expect(result.confidence?.overall).toBeCloseTo(0.99, 10);
    expect(result.appliedChanges.map((change) => change.field_name)).toEqual([
      'Issue Date',
      'Total Gross',
      'Invoice Number',
      'title',
    ]);

    expect(store.patches).toHaveLength(1);
    const doc = store.document(1);
    expect(doc.title).toBe('2025-01-15 | INV-001 | 123.45 EUR');
    expect(doc.customFields).toEqual({
      'Issue Date': '2025-01-15',
      'Total Gross': '123.45',
      'Invoice Number': 'INV-001',
    });
    expect(doc.documentTypeId).toBe(5);
    expect(doc.correspondentId).toBe(7);
    expect(doc.tagNames).toEqual(['invoices', TEST_TAGS.processed]);
    expect(repository.records.size).toBe(0);
  });

  it('should send confident disagreements and title changes to review', async () => {
    const { store, repository, pipeline } = setup(new FakeExtractionClient(confidentExtraction()));
    store.addDocument(
      makeSnapshot({
        title: 'Energy invoice for January',
        customFields: { 'Total Gross': '100.00' },
        customFieldIds: { 'Total Gross': 2 },
      })
    );

    const result = await pipeline.processDocument(1);

    expect(result.success).toBe(true);
    expect(result.reviewRequired).toBe(true);
    expect(result.appliedChanges.map((change) => change.field_name)).toEqual(['Issue Date', 'Invoice Number']);

    const doc = store.document(1);
    expect(doc.customFields['Total Gross']).toBe('100.00');
    expect(doc.title).toBe('Energy invoice for January');
    expect(doc.tagNames).toContain(TEST_TAGS.needsReview);
    expect(doc.tagNames).not.toContain(TEST_TAGS.processed);

    const record = repository.records.get(1);
    expect(record?.status).toBe('pending');
    expect(record?.templateId).toBe('test_template');
    expect(record?.changes.map((change) => [change.field_name, change.current_value, change.proposed_value])).toEqual([
      ['Total Gross', '100.00', '123.45'],
      ['title', 'Energy invoice for January', '2025-01-15 | INV-001 | 123.45 EUR'],
    ]);
  });

  it('should queue a low-confidence extraction for review without writing', async () => {
    const { store, repository, pipeline } = setup(
      new FakeExtractionClient({
        classification: makeClassification('test_template'),
        extraction: makeExtraction([
          makeField('issue_date', '2025-01-15', 0.3, 'date'),
          makeField('total_gross', null, 0.1, 'amount'),
        ]),
      })
    );
    store.addDocument(makeSnapshot());

    const result = await pipeline.processDocument(1);

    expect(result.confidence?.overall).toBeCloseTo(0.5566667, 6);
    expect(result.extraction?.processingNotes).toEqual([
      "Required field 'issue_date' has low confidence (0.30)",
      "Required field 'total_gross' is missing",
    ]);
    expect(result.appliedChanges).toEqual([]);
    expect(store.patches).toHaveLength(0);
    expect(repository.records.get(1)?.changes.map((change) => change.field_name)).toEqual(['Issue Date', 'title']);
    expect(repository.records.get(1)?.changes[1].proposed_value).toBe('2025-01-15 | - | - EUR');
  });

  it('should hold fills for review below the template minimum confidence', async () => {
    const strict = makeTemplate({ documentType: 'Invoice', tagsAdd: ['invoices'], minConfidence: 0.96 });
    const { store, repository, pipeline } = setup(
      new FakeExtractionClient(confidentExtraction()),
      makeTemplatesConfig([strict])
    );
    store.addDocument(makeSnapshot());

    const result = await pipeline.processDocument(1);

    expect(result.reviewRequired).toBe(true);
    expect(result.appliedChanges.map((change) => change.field_name)).toEqual(['title']);
    expect(store.document(1).title).toBe('2025-01-15 | INV-001 | 123.45 EUR');
    expect(store.document(1).customFields).toEqual({});
    expect(repository.records.get(1)?.changes.map((change) => change.field_name)).toEqual([
      'Issue Date',
      'Total Gross',
      'Invoice Number',
    ]);
  });

  it('should hand the correspondent template to the extraction client', async () => {
    const llm = new FakeExtractionClient(confidentExtraction());
    const { store, pipeline } = setup(llm);
    store.addDocument(makeSnapshot({ id: 1, correspondentId: 7, correspondentName: 'ACME Energia' }));
    store.addDocument(makeSnapshot({ id: 2 }));

    await pipeline.processDocument(1, { dryRun: true });
    await pipeline.processDocument(2, { dryRun: true });

    expect(llm.correspondentTemplates.map((hint) => hint?.id)).toEqual(['test_template', undefined]);
  });

  it('should compute changes without writing on a dry run', async () => {
    const { store, repository, pipeline } = setup(new FakeExtractionClient(confidentExtraction()));
    store.addDocument(makeSnapshot());

    const result = await pipeline.processDocument(1, { dryRun: true });

    expect(result.success).toBe(true);
    expect(result.proposedChanges).toHaveLength(4);
    expect(result.appliedChanges).toEqual([]);
    expect(store.patches).toHaveLength(0);
    expect(store.document(1).tagNames).toEqual([]);
    expect(repository.records.size).toBe(0);
  });

  it('should skip documents already processed', async () => {
    const llm = new FakeExtractionClient(confidentExtraction());
    const { store, pipeline } = setup(llm);
    store.tags.push({ id: 50, name: TEST_TAGS.processed });
    store.addDocument(makeSnapshot({ tagIds: [50], tagNames: [TEST_TAGS.processed] }));

    const result = await pipeline.processDocument(1);

    expect(result.success).toBe(true);
    expect(result.skippedReason).toBe('Already processed');
    expect(llm.calls).toBe(0);
  });

  it('should skip documents without OCR content', async () => {
    const llm = new FakeExtractionClient(confidentExtraction());
    const { store, pipeline } = setup(llm);
    store.addDocument(makeSnapshot({ content: '  \n ' }));

    const result = await pipeline.processDocument(1);

    expect(result.success).toBe(false);
    expect(result.skippedReason).toBe('No content');
    expect(result.errorMessage).toBe('Document has no OCR content');
    expect(llm.calls).toBe(0);
  });

  it('should report LLM failures in the result', async () => {
    const { store, pipeline } = setup(new FakeExtractionClient(new Error('model unavailable')));
    store.addDocument(makeSnapshot());

    const result = await pipeline.processDocument(1);

    expect(result.success).toBe(false);
    expect(result.skippedReason).toBeNull();
    expect(result.errorMessage).toBe('model unavailable');
  });

  it('should throw when no template or fallback matches', async () => {
    const { store, pipeline } = setup(
      new FakeExtractionClient({
        classification: makeClassification('unknown'),
        extraction: makeExtraction([], 'unknown'),
      })
    );
    store.addDocument(makeSnapshot());

    await expect(pipeline.processDocument(1)).rejects.toThrow(ProcessingError);
    await expect(pipeline.processDocument(1)).rejects.toThrow('No template found for unknown');
  });

  it('should use the fallback template for unknown ids', async () => {
    const fallback = makeTemplate({ id: 'fallback_general', titleFormat: null });
    const { store, pipeline } = setup(
      new FakeExtractionClient({
        classification: makeClassification('unknown'),
        extraction: makeExtraction([makeField('invoice_number', 'INV-9', 0.9)], 'unknown'),
      }),
      makeTemplatesConfig([template, fallback])
    );
    store.addDocument(makeSnapshot());

    const result = await pipeline.processDocument(1);

    expect(result.templateId).toBe('fallback_general');
    expect(result.appliedChanges.map((change) => change.field_name)).toEqual(['Invoice Number']);
    expect(store.document(1).title).toBe('Scan_2025-01-15');
  });
});

describe('DocumentPipeline batches', () => {
  it('should process every document with a tag and keep going after failures', async () => {
    const { store, pipeline } = setup(
      new FakeExtractionClient({
        classification: makeClassification('unknown'),
        extraction: makeExtraction([], 'unknown'),
      })
    );
    store.tags.push({ id: 50, name: TEST_TAGS.processed });
    store.addDocument(makeSnapshot({ id: 1, tagNames: ['inbox'] }));
    store.addDocument(makeSnapshot({ id: 2, tagIds: [50], tagNames: ['inbox', TEST_TAGS.processed] }));
    store.addDocument(makeSnapshot({ id: 3 }));

    const results = await pipeline.processByTag('inbox');

    expect(results.map((result) => result.docId)).toEqual([1, 2]);
    expect(results[0].errorMessage).toBe('No template found for unknown');
    expect(summarizeResults(results)).toEqual({
      total: 2,
      successful: 1,
      failed: 1,
      skipped: 1,
      reviewRequired: 0,
    });
  });

  it('should process every document of a correspondent', async () => {
    const { store, pipeline } = setup(new FakeExtractionClient(confidentExtraction()));
    store.addDocument(makeSnapshot({ id: 1, correspondentId: 7, correspondentName: 'ACME' }));
    store.addDocument(makeSnapshot({ id: 2, correspondentName: 'Other' }));

    const results = await pipeline.processByCorrespondent('ACME', { dryRun: true });

    expect(results).toHaveLength(1);
    expect(results[0].success).toBe(true);
    expect(store.patches).toHaveLength(0);
  });
});
