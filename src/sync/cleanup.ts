/**
 * Removal of records the backend has accepted, and of records the user
 * deletes. Rows go in one transaction; attachment files follow, best-effort.
 */

import type { Db } from '../db/connection.js';
import type { ParcelStore } from '../db/parcels.js';
import type { TaxpayerStore } from '../db/taxpayers.js';
import type { EntityKind } from '../types.js';
import { defaultLogger, type Logger } from '../log.js';
import { deleteAttachment } from './attachments.js';
import { LocalStorageError, toError } from './errors.js';

export interface PurgeTarget {
  id: number;
  attachments: string[];
}

export interface PurgeResult {
  rowsDeleted: number;
  filesDeleted: number;
  /** Attachment paths that could not be removed. */
  filesFailed: string[];
}

export class RecordPurger {
  constructor(
    private readonly db: Db,
    private readonly taxpayers: TaxpayerStore,
    private readonly parcels: ParcelStore,
    private readonly logger: Logger = defaultLogger,
  ) {}

  /**
   * Delete the given records and their attachment files. Parcels lose their
   * buildings and owner first. A row deletion failure rolls the whole batch
   * back and throws LocalStorageError; a file that cannot be removed is only
   * logged.
   */
  async purge(kind: EntityKind, targets: PurgeTarget[]): Promise<PurgeResult> {
    if (targets.length === 0) return { rowsDeleted: 0, filesDeleted: 0, filesFailed: [] };
    const ids = targets.map((t) => t.id);

    let rowsDeleted: number;
    try {
      const deleteRows = this.db.transaction((): number => {
        switch (kind) {
          case 'taxpayer':
            return this.taxpayers.deleteRows(ids);
          case 'parcel':
            return this.parcels.deleteRows(ids);
        }
      });
      rowsDeleted = deleteRows();
    } catch (error) {
      const cause = toError(error);
      throw new LocalStorageError(`Failed to delete ${kind} rows: ${cause.message}`, cause);
    }

    let filesDeleted = 0;
    const filesFailed: string[] = [];
    for (const path of targets.flatMap((t) => t.attachments)) {
      const result = await deleteAttachment(path);
      if (result.ok) {
        if (result.value) filesDeleted++;
        continue;
      }
      filesFailed.push(path);
      this.logger('warn', result.error.message, { kind, code: result.error.code });
    }

    return { rowsDeleted, filesDeleted, filesFailed };
  }
}
