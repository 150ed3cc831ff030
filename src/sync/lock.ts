/**
 * Single-flight gate for sync operations.
 *
 * One export session per entity kind, one reference resynchronization, and
 * the reference resync excludes every export. The in-process part is a set
 * of held lock names; the cross-process part is the `sync_lock` table so
 * several server processes can share one database file.
 */

import type { Db } from '../db/connection.js';
import type { EntityKind } from '../types.js';
import { SyncBusyError } from './errors.js';

export type SyncOperation = { type: 'export'; kind: EntityKind } | { type: 'reference' };

/** Default lock TTL in seconds. */
const LOCK_TTL_SECONDS = 90;

const REFERENCE_LOCK = 'reference';

export function lockName(operation: SyncOperation): string {
  switch (operation.type) {
    case 'export':
      return `export:${operation.kind}`;
    case 'reference':
      return REFERENCE_LOCK;
  }
}

/** Two lock names conflict when they are equal or either one is the reference lock. */
export function locksConflict(a: string, b: string): boolean {
  return a === b || a === REFERENCE_LOCK || b === REFERENCE_LOCK;
}

/** Check if a process with the given PID is alive. */
function isPidAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return error instanceof Error && 'code' in error && error.code === 'EPERM';
  }
}

export interface SyncGateOptions {
  /** Seconds before an unrefreshed cross-process lock may be taken over. */
  ttlSeconds?: number;
  /** Identity written to `sync_lock.holder_pid`. */
  pid?: number;
}

type AcquireOutcome = 'acquired' | 'busy_local' | 'busy_remote';

export class SyncGate {
  private readonly held = new Set<string>();
  private readonly ttlSeconds: number;
  private readonly pid: number;

  constructor(
    private readonly db: Db,
    options: SyncGateOptions = {},
  ) {
    this.ttlSeconds = options.ttlSeconds ?? LOCK_TTL_SECONDS;
    this.pid = options.pid ?? process.pid;
  }

  /** Lock names currently held by this gate. */
  heldNames(): string[] {
    return [...this.held];
  }

  /** Whether `operation` could start right now in this process. */
  isBlocked(operation: SyncOperation): boolean {
    const name = lockName(operation);
    return [...this.held].some((h) => locksConflict(h, name));
  }

  /**
   * Try to take the lock for `operation`. Rejected when this process holds a
   * conflicting lock, or when another live process holds an unexpired one.
   * Expired rows and rows left by dead processes are taken over.
   */
  tryAcquire(operation: SyncOperation): AcquireOutcome {
    if (this.isBlocked(operation)) return 'busy_local';

    const name = lockName(operation);
    const now = new Date().toISOString();
    const expiresAt = new Date(Date.now() + this.ttlSeconds * 1000).toISOString();

    const acquire = this.db.transaction((): boolean => {
      const rows = this.db
        .prepare('SELECT lock_name, holder_pid, expires_at FROM sync_lock')
        .all() as Array<{ lock_name: string; holder_pid: number; expires_at: string }>;

      for (const row of rows) {
        if (!locksConflict(row.lock_name, name)) continue;

        // Our own pid with no matching in-process hold is a leftover from a crashed run
        const stale =
          row.holder_pid === this.pid || row.expires_at < now || !isPidAlive(row.holder_pid);
        if (!stale) return false;

        this.db.prepare('DELETE FROM sync_lock WHERE lock_name = ?').run(row.lock_name);
      }

      this.db
        .prepare(
          'INSERT INTO sync_lock (lock_name, holder_pid, acquired_at, expires_at) VALUES (?, ?, ?, ?)',
        )
        .run(name, this.pid, now, expiresAt);
      return true;
    });

    if (!acquire()) return 'busy_remote';
    this.held.add(name);
    return 'acquired';
  }

  /** Push the expiry of a held lock forward. */
  refresh(operation: SyncOperation): void {
    const name = lockName(operation);
    if (!this.held.has(name) || !this.db.open) return;
    const expiresAt = new Date(Date.now() + this.ttlSeconds * 1000).toISOString();
    this.db
      .prepare('UPDATE sync_lock SET expires_at = ? WHERE lock_name = ? AND holder_pid = ?')
      .run(expiresAt, name, this.pid);
  }

  /** Release a lock. Only the holder's row is removed. */
  release(operation: SyncOperation): void {
    const name = lockName(operation);
    this.held.delete(name);
    if (!this.db.open) return;
    this.db
      .prepare('DELETE FROM sync_lock WHERE lock_name = ? AND holder_pid = ?')
      .run(name, this.pid);
  }

  /**
   * Run `fn` while holding the lock for `operation`, refreshing it until
   * `fn` settles. Throws SyncBusyError without calling `fn` when the lock
   * is taken.
   */
  async run<T>(operation: SyncOperation, fn: () => Promise<T>): Promise<T> {
    const outcome = this.tryAcquire(operation);
    if (outcome !== 'acquired') {
      throw new SyncBusyError(
        lockName(operation),
        outcome === 'busy_local' ? 'this process' : 'another process',
      );
    }

    const heartbeat = setInterval(() => this.refresh(operation), (this.ttlSeconds * 1000) / 3);
    heartbeat.unref();
    try {
      return await fn();
    } finally {
      clearInterval(heartbeat);
      this.release(operation);
    }
  }
}
