/**
 * Entry point for collaborators: record submission, export sessions,
 * reference resynchronization and status, with every sync operation
 * passing through the single-flight gate.
 */

import type { Db } from '../db/connection.js';
import type { LedgerCounts, LedgerListFilter } from '../db/ledger.js';
import { ParcelStore, type InsertParcelParams } from '../db/parcels.js';
import { ReferenceStore } from '../db/reference.js';
import { TaxpayerStore, type InsertTaxpayerParams } from '../db/taxpayers.js';
import type { EntityKind, Parcel, ParcelBundle, ReferenceTable, SyncableRecord, Taxpayer } from '../types.js';
import { defaultLogger, type Logger } from '../log.js';
import { InMemoryCredentialStore, SharedCredentialStore, type CredentialStore } from './auth.js';
import { BackendClient } from './client.js';
import { RecordPurger, type PurgeResult } from './cleanup.js';
import type { SyncSettings } from './config.js';
import {
  ExportCoordinator,
  parcelSource,
  taxpayerSource,
  type ExportOptions,
  type ExportSummary,
} from './export.js';
import { SyncGate } from './lock.js';
import { ReferenceResynchronizer, type ReferenceSyncResult } from './reference.js';

export interface FieldSyncServiceOptions {
  db: Db;
  settings: SyncSettings;
  /** Defaults to an in-memory store holding `settings.credentials`. */
  credentials?: CredentialStore;
  fetch?: typeof globalThis.fetch;
  logger?: Logger;
  /** Defaults to a gate over `db`. */
  gate?: SyncGate;
}

export interface ExportRequest extends ExportOptions {
  chunkSize?: number;
}

export interface SyncStatusReport {
  taxpayer: LedgerCounts;
  parcel: LedgerCounts;
  referenceRows: Record<ReferenceTable, number>;
  /** Sync operations running in this process. */
  running: string[];
}

export class FieldSyncService {
  readonly taxpayers: TaxpayerStore;
  readonly parcels: ParcelStore;
  readonly reference: ReferenceStore;
  readonly gate: SyncGate;

  private readonly purger: RecordPurger;
  private readonly taxpayerExport: ExportCoordinator<Taxpayer>;
  private readonly parcelExport: ExportCoordinator<Parcel>;
  private readonly resynchronizer: ReferenceResynchronizer;
  private readonly settings: SyncSettings;

  constructor(options: FieldSyncServiceOptions) {
    const { db, settings } = options;
    const logger = options.logger ?? defaultLogger;
    // Taxpayer and parcel exports may overlap; the token stays until both end
    const credentials = new SharedCredentialStore(
      options.credentials ?? new InMemoryCredentialStore(settings.credentials),
    );
    const client = new BackendClient({
      baseUrl: settings.baseUrl,
      requestTimeoutMs: settings.requestTimeoutMs,
      fetch: options.fetch,
    });

    this.settings = settings;
    this.taxpayers = new TaxpayerStore(db);
    this.parcels = new ParcelStore(db);
    this.reference = new ReferenceStore(db);
    this.gate = options.gate ?? new SyncGate(db);
    this.purger = new RecordPurger(db, this.taxpayers, this.parcels, logger);

    const deps = { client, credentials, purger: this.purger, logger };
    this.taxpayerExport = new ExportCoordinator(taxpayerSource(this.taxpayers), deps);
    this.parcelExport = new ExportCoordinator(parcelSource(this.parcels), deps);
    this.resynchronizer = new ReferenceResynchronizer({ client, credentials, store: this.reference, logger });
  }

  submitTaxpayer(params: InsertTaxpayerParams): Taxpayer {
    return this.taxpayers.insert(params);
  }

  submitParcel(params: InsertParcelParams): ParcelBundle {
    return this.parcels.insert(params);
  }

  /**
   * Delete one record at the user's request, with its dependents and
   * attachment files. Refused while an export of that kind is running.
   * Resolves to null when the record does not exist.
   */
  deleteRecord(kind: EntityKind, id: number): Promise<PurgeResult | null> {
    return this.gate.run({ type: 'export', kind }, async () => {
      const record = kind === 'taxpayer' ? this.taxpayers.getById(id) : this.parcels.getById(id);
      if (!record) return null;
      return this.purger.purge(kind, [{ id: record.id, attachments: record.attachments }]);
    });
  }

  /** Run one export session for `kind`. Throws SyncBusyError if one is already running. */
  exportRecords(kind: EntityKind, request: ExportRequest = {}): Promise<ExportSummary> {
    const coordinator = kind === 'taxpayer' ? this.taxpayerExport : this.parcelExport;
    const chunkSize = request.chunkSize ?? this.settings.chunkSize;
    const options: ExportOptions = {
      maxChunks: request.maxChunks,
      failurePolicy: request.failurePolicy ?? this.settings.failurePolicy,
    };
    return this.gate.run({ type: 'export', kind }, () => coordinator.exportAll(chunkSize, options));
  }

  /** Replace the lookup tables. Throws SyncBusyError while any export is running. */
  synchronizeReferenceData(): Promise<ReferenceSyncResult> {
    return this.gate.run({ type: 'reference' }, () => this.resynchronizer.synchronizeReferenceData());
  }

  /** Stored records of one kind with their ledger state, oldest first. */
  listRecords(kind: EntityKind, filter: LedgerListFilter = {}): SyncableRecord[] {
    return kind === 'taxpayer' ? this.taxpayers.ledger.list(filter) : this.parcels.ledger.list(filter);
  }

  status(): SyncStatusReport {
    return {
      taxpayer: this.taxpayers.ledger.countByStatus(),
      parcel: this.parcels.ledger.countByStatus(),
      referenceRows: this.reference.counts(),
      running: this.gate.heldNames(),
    };
  }
}
