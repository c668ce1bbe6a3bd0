/**
 * Review workflow tests
 */

import {
  parseStoredChanges,
  ReviewNotPendingError,
  ReviewQueue,
  ReviewWorkflowError,
  type ProposedChange,
} from '@docmerge/shared';
import { makeSnapshot, InMemoryDocumentStore, InMemoryReviewRepository, TEST_TAGS } from './helpers';

function change(fieldName: string, current: string | null, proposed: string | null): ProposedChange {
  return {
    field_name: fieldName,
    current_value: current,
    proposed_value: proposed,
    confidence: 0.95,
    source: 'ai',
    reason: 'test',
  };
}

const CHANGES = [
  change('Total Gross', '100.00', '123.45'),
  change('title', 'Energy invoice for January', 'New Title'),
  change('Unknown Field', null, 'x'),
];

function setup() {
  const store = new InMemoryDocumentStore();
  store.customFields = [{ id: 2, name: 'Total Gross', dataType: 'monetary' }];
  store.addDocument(
    makeSnapshot({
      title: 'Energy invoice for January',
      customFields: { 'Total Gross': '100.00' },
      customFieldIds: { 'Total Gross': 2 },
    })
  );
  const repository = new InMemoryReviewRepository();
  const queue = new ReviewQueue(store, repository, TEST_TAGS);
  return { store, repository, queue };
}

describe('ReviewQueue', () => {
  it('should tag the document and store the changes on submit', async () => {
    const { store, repository, queue } = setup();
    await store.addTagToDocument(1, TEST_TAGS.processed);

    await queue.submitForReview(1, CHANGES, { templateId: 'test_template', confidence: 0.6 });

    expect(store.document(1).tagNames).toEqual([TEST_TAGS.needsReview]);
    const record = repository.records.get(1);
    expect(record?.status).toBe('pending');
    expect(record?.templateId).toBe('test_template');
    expect(record?.confidence).toBe(0.6);
    expect(record?.changes).toEqual(CHANGES);
    expect(typeof record?.correlationId).toBe('string');
  });

  it('should list pending reviews and their changes', async () => {
    const { queue } = setup();
    await queue.submitForReview(1, CHANGES);

    expect((await queue.getPendingReviews()).map((record) => record.docId)).toEqual([1]);
    expect(await queue.getProposedChanges(1)).toEqual(CHANGES);
    expect(await queue.getPendingReview(2)).toBeNull();
    expect(await queue.getProposedChanges(2)).toEqual([]);
  });

  it('should apply stored changes on approval', async () => {
    const { store, repository, queue } = setup();
    await queue.submitForReview(1, CHANGES);

    const outcome = await queue.approveReview(1);

    expect(outcome.dryRun).toBe(false);
    expect(outcome.applied.map((applied) => applied.field_name)).toEqual(['Total Gross', 'title']);
    expect(outcome.skipped).toEqual(['Unknown Field']);

    const doc = store.document(1);
    expect(doc.title).toBe('New Title');
    expect(doc.customFields['Total Gross']).toBe('123.45');
    expect(doc.tagNames).toEqual([TEST_TAGS.approved]);
    expect(repository.records.get(1)?.status).toBe('approved');
    expect(await queue.getPendingReviews()).toEqual([]);
  });

  it('should report without writing on a dry-run approval', async () => {
    const { store, repository, queue } = setup();
    await queue.submitForReview(1, CHANGES);

    const outcome = await queue.approveReview(1, true);

    expect(outcome.dryRun).toBe(true);
    expect(outcome.applied).toHaveLength(2);
    expect(store.patches).toHaveLength(0);
    expect(store.document(1).tagNames).toEqual([TEST_TAGS.needsReview]);
    expect(repository.records.get(1)?.status).toBe('pending');
  });

  it('should skip a title change without a string value', async () => {
    const { queue } = setup();
    await queue.submitForReview(1, [change('title', 'Energy invoice for January', null)]);

    const outcome = await queue.approveReview(1);

    expect(outcome.applied).toEqual([]);
    expect(outcome.skipped).toEqual(['title']);
  });

  it('should discard changes on rejection', async () => {
    const { store, repository, queue } = setup();
    await queue.submitForReview(1, CHANGES);

    const outcome = await queue.rejectReview(1, 'wrong amount');

    expect(outcome).toEqual({ docId: 1, discarded: 3, reason: 'wrong amount' });
    expect(store.document(1).customFields['Total Gross']).toBe('100.00');
    expect(store.document(1).tagNames).toEqual([TEST_TAGS.rejected]);
    expect(repository.records.get(1)?.status).toBe('rejected');
    expect(repository.records.get(1)?.decisionReason).toBe('wrong amount');
  });

  it('should refuse decisions on documents not pending review', async () => {
    const { queue } = setup();

    await expect(queue.approveReview(1)).rejects.toThrow(ReviewNotPendingError);
    await expect(queue.rejectReview(1)).rejects.toThrow('Document 1 is not pending review');
  });

  it('should wrap store failures', async () => {
    const { store, queue } = setup();
    await queue.submitForReview(1, CHANGES);
    jest.spyOn(store, 'getDocumentSnapshot').mockRejectedValue(new Error('store down'));

    const approval = queue.approveReview(1);

    await expect(approval).rejects.toThrow(ReviewWorkflowError);
    await expect(approval).rejects.toThrow('Failed to approve review: store down');
  });

  it('should replace other workflow tags when marking processed', async () => {
    const { store, queue } = setup();
    await queue.submitForReview(1, CHANGES);

    await queue.markProcessed(1);

    expect(store.document(1).tagNames).toEqual([TEST_TAGS.processed]);
  });
});

describe('parseStoredChanges', () => {
  it('should keep well-formed changes and drop the rest', () => {
    const stored = [
      CHANGES[0],
      { field_name: 'Total Gross', proposed_value: '1.00' },
      { ...CHANGES[1], source: 'human' },
      'not a change',
      null,
    ];

    expect(parseStoredChanges(stored)).toEqual([CHANGES[0]]);
    expect(parseStoredChanges({ changes: [] })).toEqual([]);
  });
});
