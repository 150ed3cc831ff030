/**
 * Chunked export coordinator.
 *
 * Walks pending records oldest first, one bounded chunk per request. Each
 * chunk ends in exactly one outcome: accepted (marked Synced, then purged
 * from the device) or rejected (marked Failed and kept for the next
 * session). Only an authentication failure or a local storage failure ends
 * the session early.
 */

import { cursorAfter, type PendingCursor, type RecordLedger } from '../db/ledger.js';
import type { ParcelStore } from '../db/parcels.js';
import type { TaxpayerStore } from '../db/taxpayers.js';
import {
  DEFAULT_CHUNK_SIZE,
  type EntityKind,
  type Parcel,
  type SyncableRecord,
  type Taxpayer,
} from '../types.js';
import { defaultLogger, type Logger } from '../log.js';
import { authenticate, type CredentialStore } from './auth.js';
import type { BackendClient } from './client.js';
import type { FailurePolicy } from './config.js';
import { AuthenticationError, LocalStorageError, SyncBusyError, SyncError, toError } from './errors.js';
import type { RecordPurger } from './cleanup.js';
import { parcelToPayload, taxpayerToPayload } from './serialize.js';
import { transferChunk, type ChunkItem } from './transfer.js';

/** How one kind of record is read from the store and put on the wire. */
export interface ExportSource<T extends SyncableRecord> {
  kind: EntityKind;
  ledger: RecordLedger<T>;
  toItem(record: T): ChunkItem;
}

export function taxpayerSource(store: TaxpayerStore): ExportSource<Taxpayer> {
  return {
    kind: 'taxpayer',
    ledger: store.ledger,
    toItem: (taxpayer) => ({
      localId: taxpayer.id,
      payload: taxpayerToPayload(taxpayer),
      attachments: taxpayer.attachments,
    }),
  };
}

export function parcelSource(store: ParcelStore): ExportSource<Parcel> {
  return {
    kind: 'parcel',
    ledger: store.ledger,
    toItem: (parcel) => ({
      localId: parcel.id,
      payload: parcelToPayload({
        parcel,
        buildings: store.getBuildings(parcel.id),
        owner: store.getOwner(parcel.id),
      }),
      attachments: parcel.attachments,
    }),
  };
}

export type ExportOutcome = 'nothing_to_export' | 'synced' | 'partial' | 'failed';

export interface ExportSummary {
  kind: EntityKind;
  syncedCount: number;
  failedCount: number;
  chunks: number;
  outcome: ExportOutcome;
  /** Message of the last failed chunk, if any. */
  lastError?: string;
  /** Whether the session stopped early under the `halt` policy. */
  halted: boolean;
}

export interface ExportOptions {
  /** Upper bound on the number of chunks sent this session. */
  maxChunks?: number;
  failurePolicy?: FailurePolicy;
}

export interface ExportCoordinatorDeps {
  client: BackendClient;
  credentials: CredentialStore;
  purger: RecordPurger;
  logger?: Logger;
}

/** Batch size used when sweeping rows left Synced by an interrupted cleanup. */
const SWEEP_BATCH = 100;

export function exportOutcome(chunks: number, syncedCount: number, failedCount: number): ExportOutcome {
  if (chunks === 0) return 'nothing_to_export';
  if (failedCount === 0) return 'synced';
  if (syncedCount === 0) return 'failed';
  return 'partial';
}

export class ExportCoordinator<T extends SyncableRecord> {
  private readonly logger: Logger;
  private running = false;

  constructor(
    private readonly source: ExportSource<T>,
    private readonly deps: ExportCoordinatorDeps,
  ) {
    this.logger = deps.logger ?? defaultLogger;
  }

  get kind(): EntityKind {
    return this.source.kind;
  }

  /**
   * Run one export session. A second call while a session is in flight is
   * rejected with SyncBusyError, so no record rides in two chunks at once.
   */
  async exportAll(chunkSize: number = DEFAULT_CHUNK_SIZE, options: ExportOptions = {}): Promise<ExportSummary> {
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
    }
    if (this.running) {
      throw new SyncBusyError(`export:${this.source.kind}`, 'this process');
    }
    this.running = true;
    try {
      return await this.runSession(chunkSize, options);
    } finally {
      this.running = false;
    }
  }

  private async runSession(chunkSize: number, options: ExportOptions): Promise<ExportSummary> {
    const { kind, ledger } = this.source;
    const policy = options.failurePolicy ?? 'continue';

    const auth = await authenticate(this.deps.client, this.deps.credentials);
    if (!auth.ok) {
      this.logger('error', `Export of ${kind} records aborted: ${auth.error.message}`, {
        reason: auth.error.reason,
      });
      throw auth.error;
    }
    const token = auth.value;

    let syncedCount = 0;
    let failedCount = 0;
    let chunks = 0;
    let lastError: string | undefined;
    let halted = false;
    let cursor: PendingCursor | undefined;

    try {
      await this.sweepSynced();

      while (options.maxChunks === undefined || chunks < options.maxChunks) {
        const after = cursor;
        const records = this.storage('select pending records', () => ledger.selectPending(chunkSize, after));
        if (records.length === 0) break;

        chunks++;
        cursor = cursorAfter(records);
        const ids = records.map((r) => r.id);
        const items = this.storage('read chunk', () => records.map((r) => this.source.toItem(r)));

        const result = await transferChunk(this.deps.client, kind, items, token);

        if (result.ok) {
          this.storage('mark chunk synced', () => ledger.transitionToSynced(ids));
          syncedCount += records.length;
          if (result.value.missing.length > 0) {
            this.logger('warn', `Chunk ${chunks}: ${result.value.missing.length} attachment(s) missing on disk`, {
              kind,
              paths: result.value.missing,
            });
          }
          await this.deps.purger.purge(
            kind,
            items.map((item) => ({ id: item.localId, attachments: item.attachments })),
          );
          this.logger('info', `Exported ${kind} chunk ${chunks} (${records.length} records)`);
        } else {
          const error = result.error;
          this.storage('mark chunk failed', () => ledger.transitionToFailed(ids, error.message));
          failedCount += records.length;
          lastError = error.message;
          this.logger('warn', `Export of ${kind} chunk ${chunks} failed: ${error.message}`, {
            code: error.code,
            records: records.length,
          });

          if (error instanceof AuthenticationError) {
            throw error.withProgress({ syncedCount, failedCount, chunks });
          }
          if (policy === 'halt') {
            halted = true;
            break;
          }
        }

        if (records.length < chunkSize) break;
      }
    } finally {
      this.deps.credentials.setSessionToken(null);
    }

    const summary: ExportSummary = {
      kind,
      syncedCount,
      failedCount,
      chunks,
      outcome: exportOutcome(chunks, syncedCount, failedCount),
      lastError,
      halted,
    };
    this.logger('info', `Export of ${kind} records finished: ${summary.outcome}`, {
      synced: syncedCount,
      failed: failedCount,
      chunks,
    });
    return summary;
  }

  /** Purge rows the backend accepted in an earlier session whose cleanup never completed. */
  private async sweepSynced(): Promise<void> {
    for (;;) {
      const leftovers = this.storage('select synced records', () =>
        this.source.ledger.selectSynced(SWEEP_BATCH),
      );
      if (leftovers.length === 0) return;
      const items = this.storage('read synced records', () => leftovers.map((r) => this.source.toItem(r)));
      await this.deps.purger.purge(
        this.source.kind,
        items.map((item) => ({ id: item.localId, attachments: item.attachments })),
      );
      this.logger('info', `Purged ${leftovers.length} ${this.source.kind} record(s) left from an earlier export`);
    }
  }

  private storage<R>(operation: string, fn: () => R): R {
    try {
      return fn();
    } catch (error) {
      if (error instanceof SyncError) throw error;
      const cause = toError(error);
      throw new LocalStorageError(`Failed to ${operation}: ${cause.message}`, cause);
    }
  }
}
