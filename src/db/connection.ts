import Database from 'better-sqlite3';
import { mkdirSync, existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { homedir } from 'node:os';
import { initSchema } from './schema.js';

export type Db = Database.Database;

const DEFAULT_DB_DIR = resolve(homedir(), '.fieldsync-mcp');
export const DEFAULT_DB_PATH = resolve(DEFAULT_DB_DIR, 'fieldsync.db');

/**
 * Open the SQLite record store and bring its schema up to date.
 * The caller owns the returned handle and passes it to every store and
 * service that needs it; pass ':memory:' for an isolated in-memory DB.
 */
export function openDb(dbPath: string = DEFAULT_DB_PATH): Db {
  if (dbPath !== ':memory:') {
    const dir = dirname(dbPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(dbPath);

  // WAL keeps reads responsive while an export transaction is open
  db.pragma('journal_mode = WAL');
  // Parent/child cascades (parcel -> buildings, owner) rely on this
  db.pragma('foreign_keys = ON');
  // NORMAL is safe with WAL; only the last transaction can be lost on OS crash
  db.pragma('synchronous = NORMAL');
  // Wait up to 5s on SQLITE_BUSY (several server processes may share the file)
  db.pragma('busy_timeout = 5000');
  db.pragma('temp_store = MEMORY');

  initSchema(db);

  return db;
}

/**
 * Close the database connection (for clean shutdown).
 */
export function closeDb(db: Db): void {
  if (db.open) {
    db.close();
  }
}

/** Whether foreign-key enforcement is currently on for this connection. */
export function foreignKeysEnabled(db: Db): boolean {
  return db.pragma('foreign_keys', { simple: true }) === 1;
}
