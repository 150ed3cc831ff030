import type Database from 'better-sqlite3';
import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { REFERENCE_TABLES, type ReferenceData } from '../types.js';

const SEED_PATH = new URL('../../data/reference-seed.json', import.meta.url);

/** Bumped whenever a startup step must run once per database. */
const SCHEMA_VERSION = 1;

/** The four ledger columns every syncable table carries. */
const LEDGER_COLUMNS: Array<[name: string, ddl: string]> = [
  ['sync_status', 'sync_status INTEGER NOT NULL DEFAULT 0'],
  ['sync_error', 'sync_error TEXT'],
  ['sync_attempts', 'sync_attempts INTEGER NOT NULL DEFAULT 0'],
  ['last_sync_at', 'last_sync_at TEXT'],
];

/**
 * Initialize the database schema.
 * Creates tables and indexes if they don't exist, migrates older stores,
 * and seeds the reference tables of a brand-new database.
 */
export function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS ref_type_activite (
      id INTEGER PRIMARY KEY,
      libelle TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS ref_zone_type (
      id INTEGER PRIMARY KEY,
      libelle TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS ref_commune (
      id INTEGER PRIMARY KEY,
      libelle TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS ref_quartier (
      id INTEGER PRIMARY KEY,
      libelle TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS ref_avenue (
      id INTEGER PRIMARY KEY,
      libelle TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS contribuables (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      nif TEXT,
      type_nif TEXT,
      type_contribuable TEXT NOT NULL,
      nom TEXT,
      post_nom TEXT,
      prenom TEXT,
      raison_sociale TEXT,
      telephone1 TEXT NOT NULL,
      telephone2 TEXT,
      email TEXT,
      commune_id INTEGER,
      quartier_id INTEGER,
      avenue_id INTEGER,
      rue TEXT,
      numero_parcelle TEXT,
      origine_fiche TEXT NOT NULL,
      activite_id INTEGER,
      zone_id INTEGER,
      statut INTEGER,
      gps_latitude REAL,
      gps_longitude REAL,
      piece_identite_url TEXT,
      date_inscription TEXT,
      cree_par TEXT NOT NULL,
      forme_juridique TEXT,
      numero_rccm TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      sync_status INTEGER NOT NULL DEFAULT 0,
      sync_error TEXT,
      sync_attempts INTEGER NOT NULL DEFAULT 0,
      last_sync_at TEXT,

      FOREIGN KEY (activite_id) REFERENCES ref_type_activite (id),
      FOREIGN KEY (zone_id) REFERENCES ref_zone_type (id),
      FOREIGN KEY (commune_id) REFERENCES ref_commune (id),
      FOREIGN KEY (quartier_id) REFERENCES ref_quartier (id),
      FOREIGN KEY (avenue_id) REFERENCES ref_avenue (id)
    );

    CREATE TABLE IF NOT EXISTS parcelles (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      code_parcelle TEXT,
      reference_cadastrale TEXT,
      commune_id INTEGER,
      quartier_id INTEGER,
      avenue_id INTEGER,
      rue TEXT,
      numero_adresse TEXT,
      numero_parcelle TEXT,
      superficie_m2 REAL,
      gps_lat REAL,
      gps_lon REAL,
      statut_parcelle TEXT NOT NULL,
      source_donnee TEXT,
      photo_urls TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      sync_status INTEGER NOT NULL DEFAULT 0,
      sync_error TEXT,
      sync_attempts INTEGER NOT NULL DEFAULT 0,
      last_sync_at TEXT,

      FOREIGN KEY (commune_id) REFERENCES ref_commune (id),
      FOREIGN KEY (quartier_id) REFERENCES ref_quartier (id),
      FOREIGN KEY (avenue_id) REFERENCES ref_avenue (id)
    );

    CREATE TABLE IF NOT EXISTS personnes (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      type_personne TEXT NOT NULL,
      nom_raison_sociale TEXT,
      nif TEXT,
      contact TEXT,
      adresse_postale TEXT,
      parcelle_id INTEGER NOT NULL UNIQUE,
      created_at TEXT NOT NULL,

      FOREIGN KEY (parcelle_id) REFERENCES parcelles (id) ON DELETE CASCADE
    );

    CREATE TABLE IF NOT EXISTS batiments (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      parcelle_id INTEGER NOT NULL,
      type_batiment TEXT NOT NULL,
      nombre_etages INTEGER,
      annee_construction INTEGER,
      surface_batie_m2 REAL,
      usage_principal TEXT NOT NULL,
      statut_batiment TEXT NOT NULL,
      created_at TEXT NOT NULL,

      FOREIGN KEY (parcelle_id) REFERENCES parcelles (id) ON DELETE CASCADE
    );

    CREATE INDEX IF NOT EXISTS idx_batiments_parcelle ON batiments(parcelle_id);

    CREATE TABLE IF NOT EXISTS sync_lock (
      lock_name TEXT PRIMARY KEY,
      holder_pid INTEGER NOT NULL,
      acquired_at TEXT NOT NULL,
      expires_at TEXT NOT NULL
    );
  `);

  migrateSchema(db);

  // Pending selection scans by status, then walks (created_at, id)
  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_contribuables_pending ON contribuables(sync_status, created_at, id);
    CREATE INDEX IF NOT EXISTS idx_parcelles_pending ON parcelles(sync_status, created_at, id);
  `);

  const version = db.pragma('user_version', { simple: true });
  if (typeof version === 'number' && version < SCHEMA_VERSION) {
    seedReferenceData(db);
    db.pragma(`user_version = ${SCHEMA_VERSION}`);
  }
}

/**
 * Run schema migrations for existing databases.
 * Each migration checks if it's needed before applying.
 */
function migrateSchema(db: Database.Database): void {
  // Migration 1: stores created before the export ledger existed
  for (const table of ['contribuables', 'parcelles']) {
    const columns = db.prepare(`PRAGMA table_info(${table})`).all() as Array<{
      name: string;
    }>;
    const columnNames = new Set(columns.map((c) => c.name));

    for (const [name, ddl] of LEDGER_COLUMNS) {
      if (!columnNames.has(name)) {
        db.exec(`ALTER TABLE ${table} ADD COLUMN ${ddl}`);
      }
    }

    // Migration 2: parcels gained site photos
    if (table === 'parcelles' && !columnNames.has('photo_urls')) {
      db.exec('ALTER TABLE parcelles ADD COLUMN photo_urls TEXT');
    }
  }
}

const SeedSchema = z.record(
  z.enum(REFERENCE_TABLES),
  z.array(z.object({ id: z.number().int(), libelle: z.string() })),
);

/** Read the bundled lookup rows shipped with the client. */
export function loadReferenceSeed(): Partial<ReferenceData> {
  return SeedSchema.parse(JSON.parse(readFileSync(SEED_PATH, 'utf-8')));
}

/**
 * Fill empty reference tables from the bundled seed so records can be
 * captured before the first resynchronization. Tables that already hold
 * rows are left alone.
 */
function seedReferenceData(db: Database.Database): void {
  const seed = loadReferenceSeed();

  const apply = db.transaction(() => {
    for (const table of REFERENCE_TABLES) {
      const rows = seed[table] ?? [];
      const existing = db.prepare(`SELECT 1 FROM ${table} LIMIT 1`).get();
      if (existing || rows.length === 0) continue;

      const insert = db.prepare(`INSERT INTO ${table} (id, libelle) VALUES (?, ?)`);
      for (const row of rows) {
        insert.run(row.id, row.libelle);
      }
    }
  });
  apply();
}
