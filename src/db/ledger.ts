/**
 * Sync status ledger: the four `sync_*` columns embedded in every
 * syncable table, and the bulk transitions the export coordinator drives.
 */

import type { Db } from './connection.js';
import { SyncStatus, type LedgerRow, type LedgerState, type SyncableRecord } from '../types.js';

/** Position of a record in pending order. */
export interface PendingCursor {
  createdAt: string;
  id: number;
}

export type LedgerStatus = LedgerState['status'];

export interface LedgerListFilter {
  /** Omit for every record. */
  status?: LedgerStatus;
  limit?: number;
  offset?: number;
}

/** SQL condition selecting each ledger status; unknown codes count as pending. */
const STATUS_CONDITIONS: Record<LedgerStatus, string> = {
  pending: `sync_status NOT IN (${SyncStatus.Synced}, ${SyncStatus.Failed})`,
  synced: `sync_status = ${SyncStatus.Synced}`,
  failed: `sync_status = ${SyncStatus.Failed}`,
};

export interface LedgerCounts {
  pending: number;
  failed: number;
  synced: number;
}

/** The ledger operations the export coordinator drives, for one record type. */
export interface RecordLedger<T extends SyncableRecord> {
  readonly table: string;
  transitionToSynced(ids: number[]): number;
  transitionToFailed(ids: number[], errorMessage: string): number;
  selectPending(limit: number, after?: PendingCursor): T[];
  selectSynced(limit: number): T[];
  countByStatus(): LedgerCounts;
  list(filter?: LedgerListFilter): T[];
}

export class SyncLedger<T extends SyncableRecord, R extends LedgerRow> implements RecordLedger<T> {
  constructor(
    private readonly db: Db,
    readonly table: string,
    private readonly mapRow: (row: R) => T,
  ) {}

  /**
   * Mark records as accepted by the backend. Clears any stored error.
   * No-op on empty input.
   */
  transitionToSynced(ids: number[]): number {
    if (ids.length === 0) return 0;
    const now = new Date().toISOString();
    const placeholders = ids.map(() => '?').join(',');

    const result = this.db
      .prepare(
        `UPDATE ${this.table}
         SET sync_status = ?, sync_error = NULL, last_sync_at = ?
         WHERE id IN (${placeholders})`,
      )
      .run(SyncStatus.Synced, now, ...ids);
    return result.changes;
  }

  /**
   * Mark records as failed: store the error and count the attempt.
   * Retry timing is left to the next export invocation.
   */
  transitionToFailed(ids: number[], errorMessage: string): number {
    if (ids.length === 0) return 0;
    const now = new Date().toISOString();
    const placeholders = ids.map(() => '?').join(',');

    const result = this.db
      .prepare(
        `UPDATE ${this.table}
         SET sync_status = ?, sync_error = ?, sync_attempts = sync_attempts + 1, last_sync_at = ?
         WHERE id IN (${placeholders})`,
      )
      .run(SyncStatus.Failed, errorMessage, now, ...ids);
    return result.changes;
  }

  /**
   * Records not yet synced, oldest first. With a cursor, only records
   * strictly after that position are returned.
   */
  selectPending(limit: number, after?: PendingCursor): T[] {
    if (limit <= 0) return [];

    let sql = `SELECT * FROM ${this.table} WHERE sync_status != ?`;
    const bindings: unknown[] = [SyncStatus.Synced];

    if (after) {
      sql += ' AND (created_at > ? OR (created_at = ? AND id > ?))';
      bindings.push(after.createdAt, after.createdAt, after.id);
    }

    sql += ' ORDER BY created_at ASC, id ASC LIMIT ?';
    bindings.push(limit);

    const rows = this.db.prepare(sql).all(...bindings) as R[];
    return rows.map((row) => this.mapRow(row));
  }

  /**
   * Records the backend already accepted but that are still stored locally,
   * left behind when cleanup did not finish.
   */
  selectSynced(limit: number): T[] {
    if (limit <= 0) return [];
    const rows = this.db
      .prepare(
        `SELECT * FROM ${this.table} WHERE sync_status = ? ORDER BY created_at ASC, id ASC LIMIT ?`,
      )
      .all(SyncStatus.Synced, limit) as R[];
    return rows.map((row) => this.mapRow(row));
  }

  /** Records in creation order, optionally only those in one ledger status. */
  list(filter: LedgerListFilter = {}): T[] {
    const where = filter.status ? `WHERE ${STATUS_CONDITIONS[filter.status]}` : '';
    const rows = this.db
      .prepare(`SELECT * FROM ${this.table} ${where} ORDER BY created_at ASC, id ASC LIMIT ? OFFSET ?`)
      .all(filter.limit ?? 50, filter.offset ?? 0) as R[];
    return rows.map((row) => this.mapRow(row));
  }

  countByStatus(): LedgerCounts {
    const rows = this.db
      .prepare(`SELECT sync_status, COUNT(*) as total FROM ${this.table} GROUP BY sync_status`)
      .all() as Array<{ sync_status: number; total: number }>;

    const counts: LedgerCounts = { pending: 0, failed: 0, synced: 0 };
    for (const row of rows) {
      if (row.sync_status === SyncStatus.Synced) counts.synced += row.total;
      else if (row.sync_status === SyncStatus.Failed) counts.failed += row.total;
      else counts.pending += row.total;
    }
    return counts;
  }
}

/** Cursor pointing at the last record of a chunk. */
export function cursorAfter(records: SyncableRecord[]): PendingCursor | undefined {
  const last = records[records.length - 1];
  return last ? { createdAt: last.created_at, id: last.id } : undefined;
}
