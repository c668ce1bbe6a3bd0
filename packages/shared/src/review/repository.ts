/**
 * Review Change Repository
 *
 * Persists the proposed changes awaiting a human decision, one row per
 * document, in the proposed_changes table.
 */

import { Pool } from 'pg';
import { config } from '../config';
import { dbQueryDurationHistogram } from '../metrics';
import type { FieldValue, ProposedChange } from '../merge';

export type ReviewStatus = 'pending' | 'approved' | 'rejected';

export interface ReviewRecord {
  docId: number;
  templateId: string | null;
  confidence: number | null;
  changes: ProposedChange[];
  status: ReviewStatus;
  correlationId: string | null;
  decisionReason: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface SaveReviewInput {
  docId: number;
  changes: ProposedChange[];
  templateId?: string | null;
  confidence?: number | null;
  correlationId?: string | null;
}

export interface ReviewRepository {
  save(input: SaveReviewInput): Promise<void>;
  /** Pending changes for a document, or null when none are stored */
  getPending(docId: number): Promise<ReviewRecord | null>;
  listPending(): Promise<ReviewRecord[]>;
  /** Close the pending record with a decision */
  resolve(docId: number, status: Exclude<ReviewStatus, 'pending'>, reason?: string | null): Promise<void>;
}

function isFieldValue(value: unknown): value is FieldValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}

export function isProposedChange(value: unknown): value is ProposedChange {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const record: Record<string, unknown> = { ...value };
  return (
    typeof record.field_name === 'string' &&
    isFieldValue(record.current_value) &&
    isFieldValue(record.proposed_value) &&
    typeof record.confidence === 'number' &&
    (record.source === 'ai' || record.source === 'rule') &&
    typeof record.reason === 'string'
  );
}

/**
 * Proposed changes from a stored JSON value; malformed entries are dropped.
 */
export function parseStoredChanges(value: unknown): ProposedChange[] {
  return Array.isArray(value) ? value.filter(isProposedChange) : [];
}

interface ReviewRow {
  doc_id: number;
  template_id: string | null;
  confidence: string | null;
  changes: unknown;
  status: ReviewStatus;
  correlation_id: string | null;
  decision_reason: string | null;
  created_at: Date;
  updated_at: Date;
}

function toRecord(row: ReviewRow): ReviewRecord {
  return {
    docId: row.doc_id,
    templateId: row.template_id,
    confidence: row.confidence === null ? null : Number(row.confidence),
    changes: parseStoredChanges(row.changes),
    status: row.status,
    correlationId: row.correlation_id,
    decisionReason: row.decision_reason,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

const SELECT_COLUMNS = `doc_id, template_id, confidence, changes, status, correlation_id,
  decision_reason, created_at, updated_at`;

export class PgReviewRepository implements ReviewRepository {
  constructor(
    private readonly pool: Pool = new Pool({
      connectionString: process.env.DATABASE_URL || config.databaseUrl,
      max: 10,
      idleTimeoutMillis: 30000,
    })
  ) {}

  private async timed<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const end = dbQueryDurationHistogram.startTimer({ operation });
    try {
      return await fn();
    } finally {
      end();
    }
  }

  async save(input: SaveReviewInput): Promise<void> {
    await this.timed('review_save', () =>
      this.pool.query(
        `INSERT INTO proposed_changes (doc_id, template_id, confidence, changes, status, correlation_id)
         VALUES ($1, $2, $3, $4::jsonb, 'pending', $5)
         ON CONFLICT (doc_id) DO UPDATE SET
           template_id = EXCLUDED.template_id,
           confidence = EXCLUDED.confidence,
           changes = EXCLUDED.changes,
           status = 'pending',
           correlation_id = EXCLUDED.correlation_id,
           decision_reason = NULL,
           updated_at = NOW()`,
        [
          input.docId,
          input.templateId ?? null,
          input.confidence ?? null,
          JSON.stringify(input.changes),
          input.correlationId ?? null,
        ]
      )
    );
  }

  async getPending(docId: number): Promise<ReviewRecord | null> {
    const result = await this.timed('review_get', () =>
      this.pool.query<ReviewRow>(
        `SELECT ${SELECT_COLUMNS} FROM proposed_changes WHERE doc_id = $1 AND status = 'pending'`,
        [docId]
      )
    );
    return result.rows.length > 0 ? toRecord(result.rows[0]) : null;
  }

  async listPending(): Promise<ReviewRecord[]> {
    const result = await this.timed('review_list', () =>
      this.pool.query<ReviewRow>(
        `SELECT ${SELECT_COLUMNS} FROM proposed_changes WHERE status = 'pending' ORDER BY created_at`
      )
    );
    return result.rows.map(toRecord);
  }

  async resolve(
    docId: number,
    status: Exclude<ReviewStatus, 'pending'>,
    reason: string | null = null
  ): Promise<void> {
    await this.timed('review_resolve', () =>
      this.pool.query(
        `UPDATE proposed_changes
         SET status = $2, decision_reason = $3, updated_at = NOW()
         WHERE doc_id = $1 AND status = 'pending'`,
        [docId, status, reason]
      )
    );
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
