/**
 * Review Queue
 *
 * Tag-driven review workflow. A document waiting for a decision carries the
 * needs-review tag and has its proposed changes stored in the repository;
 * approval applies them and rejection discards them.
 */

import { config, type ReviewTags } from '../config';
import { getCorrelationId } from '../context';
import { ReviewNotPendingError, ReviewWorkflowError } from '../errors';
import { logger } from '../logger';
import { TITLE_FIELD, type ProposedChange } from '../merge';
import { reviewActionsCounter } from '../metrics';
import { emptyPatch, hasTag, isEmptyPatch, type DocumentStore } from '../store/types';
import type { ReviewRecord, ReviewRepository } from './repository';

export interface SubmitReviewOptions {
  templateId?: string | null;
  confidence?: number | null;
}

export interface ApproveOutcome {
  docId: number;
  dryRun: boolean;
  applied: ProposedChange[];
  /** Field names with no matching custom field in the store */
  skipped: string[];
}

export interface RejectOutcome {
  docId: number;
  discarded: number;
  reason: string | null;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ReviewQueue {
  constructor(
    private readonly store: DocumentStore,
    private readonly repository: ReviewRepository,
    private readonly tags: ReviewTags = config.reviewTags
  ) {}

  private async wrap<T>(action: string, docId: number, fn: () => Promise<T>): Promise<T> {
    try {
      const result = await fn();
      reviewActionsCounter.inc({ action });
      return result;
    } catch (error) {
      if (error instanceof ReviewWorkflowError) {
        throw error;
      }
      logger.error(`Review ${action} failed`, error, { documentId: docId });
      throw new ReviewWorkflowError(`Failed to ${action} review: ${errorMessage(error)}`, docId);
    }
  }

  private async setWorkflowTag(docId: number, tag: string): Promise<void> {
    const others = Object.values(this.tags).filter((name) => name !== tag);
    await this.store.addTagToDocument(docId, tag);
    for (const name of others) {
      await this.store.removeTagFromDocument(docId, name);
    }
  }

  private async requirePending(docId: number) {
    const snapshot = await this.store.getDocumentSnapshot(docId);
    if (!hasTag(snapshot, this.tags.needsReview)) {
      throw new ReviewNotPendingError(docId);
    }
    return snapshot;
  }

  async submitForReview(
    docId: number,
    changes: readonly ProposedChange[],
    options: SubmitReviewOptions = {}
  ): Promise<void> {
    await this.wrap('submit', docId, async () => {
      await this.setWorkflowTag(docId, this.tags.needsReview);
      await this.repository.save({
        docId,
        changes: [...changes],
        templateId: options.templateId ?? null,
        confidence: options.confidence ?? null,
        correlationId: getCorrelationId(),
      });
      logger.info('Document submitted for review', { documentId: docId, changes: changes.length });
    });
  }

  async getPendingReviews(): Promise<ReviewRecord[]> {
    return this.repository.listPending();
  }

  async getPendingReview(docId: number): Promise<ReviewRecord | null> {
    return this.repository.getPending(docId);
  }

  async getProposedChanges(docId: number): Promise<ProposedChange[]> {
    const record = await this.repository.getPending(docId);
    return record?.changes ?? [];
  }

  /**
   * Apply the stored changes: the title directly, everything else as a
   * custom field resolved by name.
   */
  async approveReview(docId: number, dryRun = false): Promise<ApproveOutcome> {
    return this.wrap(dryRun ? 'approve_dry_run' : 'approve', docId, async () => {
      const snapshot = await this.requirePending(docId);
      const changes = await this.getProposedChanges(docId);

      const patch = emptyPatch();
      const applied: ProposedChange[] = [];
      const skipped: string[] = [];

      for (const change of changes) {
        if (change.field_name === TITLE_FIELD) {
          if (typeof change.proposed_value === 'string') {
            patch.title = change.proposed_value;
            applied.push(change);
          } else {
            skipped.push(change.field_name);
          }
          continue;
        }

        const field = await this.store.getCustomFieldByName(change.field_name);
        if (!field) {
          logger.warn('Custom field not found, change skipped', {
            documentId: docId,
            field: change.field_name,
          });
          skipped.push(change.field_name);
          continue;
        }
        patch.customFields.set(field.id, change.proposed_value);
        applied.push(change);
      }

      if (dryRun) {
        logger.info('Dry run: review approval not applied', { documentId: docId, changes: applied.length });
        return { docId, dryRun, applied, skipped };
      }

      if (!isEmptyPatch(patch)) {
        await this.store.patchDocument(docId, patch, snapshot);
      }
      await this.store.removeTagFromDocument(docId, this.tags.needsReview);
      await this.store.addTagToDocument(docId, this.tags.approved);
      await this.repository.resolve(docId, 'approved');

      logger.info('Review approved', { documentId: docId, applied: applied.length, skipped: skipped.length });
      return { docId, dryRun, applied, skipped };
    });
  }

  async rejectReview(docId: number, reason: string | null = null): Promise<RejectOutcome> {
    return this.wrap('reject', docId, async () => {
      await this.requirePending(docId);
      const changes = await this.getProposedChanges(docId);

      await this.store.removeTagFromDocument(docId, this.tags.needsReview);
      await this.store.addTagToDocument(docId, this.tags.rejected);
      await this.repository.resolve(docId, 'rejected', reason);

      logger.info('Review rejected', { documentId: docId, discarded: changes.length, reason });
      return { docId, discarded: changes.length, reason };
    });
  }

  async markProcessed(docId: number): Promise<void> {
    await this.wrap('mark_processed', docId, async () => {
      await this.setWorkflowTag(docId, this.tags.processed);
      logger.debug('Document marked processed', { documentId: docId });
    });
  }
}
