import type { Db } from './connection.js';
import { foreignKeysEnabled } from './connection.js';
import {
  REFERENCE_TABLES,
  mapReferenceTables,
  type ReferenceData,
  type ReferenceRow,
  type ReferenceTable,
} from '../types.js';

/** Row reported by `PRAGMA foreign_key_check`. */
interface ForeignKeyViolation {
  table: string;
  rowid: number;
  parent: string;
  fkid: number;
}

/** Local store for the shared lookup tables. */
export class ReferenceStore {
  constructor(private readonly db: Db) {}

  list(table: ReferenceTable): ReferenceRow[] {
    return this.db
      .prepare(`SELECT id, libelle FROM ${table} ORDER BY id`)
      .all() as ReferenceRow[];
  }

  counts(): Record<ReferenceTable, number> {
    return mapReferenceTables((table) => {
      const row = this.db.prepare(`SELECT COUNT(*) as total FROM ${table}`).get() as {
        total: number;
      };
      return row.total;
    });
  }

  /**
   * Replace every reference table with the given rows, keeping the ids
   * exactly as provided.
   *
   * Foreign-key enforcement is switched off around the transaction (SQLite
   * ignores that pragma inside one) because the delete phase leaves domain
   * rows pointing at ids that only come back in the insert phase. Any error
   * rolls the whole replacement back; enforcement is restored either way.
   */
  replaceAll(data: ReferenceData): Record<ReferenceTable, number> {
    if (this.db.inTransaction) {
      throw new Error('Reference tables cannot be replaced inside an open transaction');
    }

    const restoreForeignKeys = foreignKeysEnabled(this.db);
    this.db.pragma('foreign_keys = OFF');

    try {
      const replace = this.db.transaction(() => {
        for (const table of REFERENCE_TABLES) {
          this.db.prepare(`DELETE FROM ${table}`).run();
        }

        return mapReferenceTables((table) => {
          const insert = this.db.prepare(`INSERT INTO ${table} (id, libelle) VALUES (?, ?)`);
          for (const row of data[table]) {
            insert.run(row.id, row.libelle);
          }
          return data[table].length;
        });
      });
      return replace();
    } finally {
      if (restoreForeignKeys) {
        this.db.pragma('foreign_keys = ON');
      }
    }
  }

  /**
   * Count domain rows whose reference ids have no matching lookup row,
   * grouped by referencing table.
   */
  danglingReferences(): Record<string, number> {
    const violations = this.db.pragma('foreign_key_check') as ForeignKeyViolation[];
    const byTable: Record<string, number> = {};
    for (const violation of violations) {
      if (!(REFERENCE_TABLES as readonly string[]).includes(violation.parent)) continue;
      byTable[violation.table] = (byTable[violation.table] ?? 0) + 1;
    }
    return byTable;
  }
}
