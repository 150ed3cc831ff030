/**
 * Reference data resynchronization: replace every lookup table with the
 * backend's authoritative rows, keeping the server-assigned ids.
 */

import type { ReferenceStore } from '../db/reference.js';
import type { ReferenceTable } from '../types.js';
import { defaultLogger, type Logger } from '../log.js';
import { authenticate, type CredentialStore } from './auth.js';
import type { BackendClient } from './client.js';
import { toError } from './errors.js';
import { parseReferenceResponse } from './serialize.js';

const REFERENCE_PATH = '/reftypes/all';

export interface ReferenceSyncResult {
  success: boolean;
  message: string;
  countsByTable?: Record<ReferenceTable, number>;
  /** Rows dropped while validating the response. */
  skippedRows?: number;
  /** Domain rows pointing at ids the new tables no longer hold, by table. */
  danglingReferences?: Record<string, number>;
}

export interface ReferenceResynchronizerDeps {
  client: BackendClient;
  credentials: CredentialStore;
  store: ReferenceStore;
  logger?: Logger;
}

export class ReferenceResynchronizer {
  private readonly logger: Logger;

  constructor(private readonly deps: ReferenceResynchronizerDeps) {
    this.logger = deps.logger ?? defaultLogger;
  }

  /**
   * Fetch, validate and install the lookup tables. Never throws: a failure
   * before the replacement commits leaves the local tables untouched and
   * comes back as `success: false`. A failed dangling-reference check after
   * the commit is logged and leaves `danglingReferences` unset.
   */
  async synchronizeReferenceData(): Promise<ReferenceSyncResult> {
    const { client, credentials, store } = this.deps;

    const auth = await authenticate(client, credentials);
    if (!auth.ok) {
      return this.failed(`Authentication failed: ${auth.error.message}`);
    }

    try {
      const sent = await client.get(REFERENCE_PATH, auth.value);
      if (!sent.ok) return this.failed(sent.error.message);
      if (!sent.value.ok) {
        return this.failed(`Reference fetch failed with HTTP ${sent.value.status}`);
      }

      const parsed = parseReferenceResponse(sent.value.body);
      if (!parsed.ok) return this.failed(parsed.error.message);

      let countsByTable: Record<ReferenceTable, number>;
      try {
        countsByTable = store.replaceAll(parsed.value.data);
      } catch (error) {
        return this.failed(`Failed to replace reference tables: ${toError(error).message}`);
      }

      const { skipped } = parsed.value;
      if (skipped > 0) {
        this.logger('warn', `Skipped ${skipped} invalid reference row(s)`);
      }

      // The tables are already replaced; a failed check only loses the report
      let danglingReferences: Record<string, number> | undefined;
      try {
        danglingReferences = store.danglingReferences();
      } catch (error) {
        this.logger('warn', `Could not check for dangling references: ${toError(error).message}`);
      }
      const dangling = Object.values(danglingReferences ?? {}).reduce((sum, n) => sum + n, 0);
      if (dangling > 0) {
        this.logger('warn', `${dangling} record(s) reference lookup ids that no longer exist`, danglingReferences);
      }

      this.logger('info', 'Reference tables synchronized', countsByTable);
      return {
        success: true,
        message: 'Reference tables synchronized',
        countsByTable,
        skippedRows: skipped,
        danglingReferences,
      };
    } finally {
      credentials.setSessionToken(null);
    }
  }

  private failed(message: string): ReferenceSyncResult {
    this.logger('error', `Reference synchronization failed: ${message}`);
    return { success: false, message };
  }
}
