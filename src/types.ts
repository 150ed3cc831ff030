// === Ledger ===

/** Values stored in the `sync_status` column. */
export const SyncStatus = {
  Pending: 0,
  Synced: 1,
  Failed: 2,
} as const;

export type SyncStatus = (typeof SyncStatus)[keyof typeof SyncStatus];

/**
 * Sync progress of one record, decoded from its ledger columns.
 * Synced records never carry an error.
 */
export type LedgerState =
  | { status: 'pending'; attempts: number }
  | { status: 'synced'; lastSyncAt: string }
  | { status: 'failed'; error: string; attempts: number; lastSyncAt: string };

/** Ledger columns as stored in SQLite. */
export interface LedgerRow {
  sync_status: number;
  sync_error: string | null;
  sync_attempts: number;
  last_sync_at: string | null;
}

// === Entity kinds ===

export const ENTITY_KINDS = ['taxpayer', 'parcel'] as const;

export type EntityKind = (typeof ENTITY_KINDS)[number];

// === Taxpayer enums ===

export const TAX_ID_TYPES = ['DGI', 'PROVISOIRE'] as const;
export type TaxIdType = (typeof TAX_ID_TYPES)[number];

export const TAXPAYER_TYPES = ['PHYSIQUE', 'MORALE', 'INFORMEL'] as const;
export type TaxpayerType = (typeof TAXPAYER_TYPES)[number];

export const RECORD_ORIGINS = ['RECENSEMENT', 'BUREAU', 'IMPORT'] as const;
export type RecordOrigin = (typeof RECORD_ORIGINS)[number];

export const LEGAL_FORMS = ['SARL', 'SA', 'SNC', 'GIE'] as const;
export type LegalForm = (typeof LEGAL_FORMS)[number];

// === Parcel enums ===

export const PARCEL_STATUSES = ['active', 'fusionnée', 'subdivisée', 'archivée'] as const;
export type ParcelStatus = (typeof PARCEL_STATUSES)[number];

export const BUILDING_TYPES = ['maison', 'immeuble', 'entrepôt', 'commerce', 'bureau', 'autre'] as const;
export type BuildingType = (typeof BUILDING_TYPES)[number];

export const BUILDING_USAGES = ['résidentiel', 'commercial', 'mixte', 'autre'] as const;
export type BuildingUsage = (typeof BUILDING_USAGES)[number];

export const BUILDING_STATUSES = ['en service', 'en ruine', 'en chantier', 'autre'] as const;
export type BuildingStatus = (typeof BUILDING_STATUSES)[number];

export const OWNER_TYPES = ['physique', 'morale'] as const;
export type OwnerType = (typeof OWNER_TYPES)[number];

// === Records ===

/** Fields every syncable record carries. */
export interface SyncableRecord {
  id: number;
  created_at: string;
  updated_at: string;
  ledger: LedgerState;
}

export interface Taxpayer extends SyncableRecord {
  nif: string | null;
  type_nif: TaxIdType | null;
  type_contribuable: TaxpayerType;
  nom: string | null;
  post_nom: string | null;
  prenom: string | null;
  raison_sociale: string | null;
  telephone1: string;
  telephone2: string | null;
  email: string | null;
  commune_id: number | null;
  quartier_id: number | null;
  avenue_id: number | null;
  rue: string | null;
  numero_parcelle: string | null;
  origine_fiche: RecordOrigin;
  activite_id: number | null;
  zone_id: number | null;
  statut: number | null;
  gps_latitude: number | null;
  gps_longitude: number | null;
  /** Identity-document photos on local disk. */
  attachments: string[];
  date_inscription: string | null;
  cree_par: string;
  forme_juridique: LegalForm | null;
  numero_rccm: string | null;
}

/** Row shape as stored in SQLite (attachments is a JSON string) */
export interface TaxpayerRow extends LedgerRow {
  id: number;
  nif: string | null;
  type_nif: string | null;
  type_contribuable: string;
  nom: string | null;
  post_nom: string | null;
  prenom: string | null;
  raison_sociale: string | null;
  telephone1: string;
  telephone2: string | null;
  email: string | null;
  commune_id: number | null;
  quartier_id: number | null;
  avenue_id: number | null;
  rue: string | null;
  numero_parcelle: string | null;
  origine_fiche: string;
  activite_id: number | null;
  zone_id: number | null;
  statut: number | null;
  gps_latitude: number | null;
  gps_longitude: number | null;
  piece_identite_url: string | null;
  date_inscription: string | null;
  cree_par: string;
  forme_juridique: string | null;
  numero_rccm: string | null;
  created_at: string;
  updated_at: string;
}

export interface Parcel extends SyncableRecord {
  code_parcelle: string | null;
  reference_cadastrale: string | null;
  commune_id: number | null;
  quartier_id: number | null;
  avenue_id: number | null;
  rue: string | null;
  numero_adresse: string | null;
  numero_parcelle: string | null;
  superficie_m2: number | null;
  gps_lat: number | null;
  gps_lon: number | null;
  statut_parcelle: ParcelStatus;
  source_donnee: string | null;
  /** Site photos on local disk. */
  attachments: string[];
}

export interface ParcelRow extends LedgerRow {
  id: number;
  code_parcelle: string | null;
  reference_cadastrale: string | null;
  commune_id: number | null;
  quartier_id: number | null;
  avenue_id: number | null;
  rue: string | null;
  numero_adresse: string | null;
  numero_parcelle: string | null;
  superficie_m2: number | null;
  gps_lat: number | null;
  gps_lon: number | null;
  statut_parcelle: string;
  source_donnee: string | null;
  photo_urls: string | null;
  created_at: string;
  updated_at: string;
}

export interface Building {
  id: number;
  parcelle_id: number;
  type_batiment: BuildingType;
  nombre_etages: number | null;
  annee_construction: number | null;
  surface_batie_m2: number | null;
  usage_principal: BuildingUsage;
  statut_batiment: BuildingStatus;
}

export interface BuildingRow {
  id: number;
  parcelle_id: number;
  type_batiment: string;
  nombre_etages: number | null;
  annee_construction: number | null;
  surface_batie_m2: number | null;
  usage_principal: string;
  statut_batiment: string;
  created_at: string;
}

export interface Owner {
  id: number;
  parcelle_id: number;
  type_personne: OwnerType;
  nom_raison_sociale: string | null;
  nif: string | null;
  contact: string | null;
  adresse_postale: string | null;
}

export interface OwnerRow {
  id: number;
  parcelle_id: number;
  type_personne: string;
  nom_raison_sociale: string | null;
  nif: string | null;
  contact: string | null;
  adresse_postale: string | null;
  created_at: string;
}

/** A parcel together with the rows it owns. */
export interface ParcelBundle {
  parcel: Parcel;
  buildings: Building[];
  owner: Owner | null;
}

// === Reference tables ===

export const REFERENCE_TABLES = [
  'ref_type_activite',
  'ref_zone_type',
  'ref_commune',
  'ref_quartier',
  'ref_avenue',
] as const;

export type ReferenceTable = (typeof REFERENCE_TABLES)[number];

export interface ReferenceRow {
  id: number;
  libelle: string;
}

export type ReferenceData = Record<ReferenceTable, ReferenceRow[]>;

/** Build a per-table record by calling `fn` once for each reference table. */
export function mapReferenceTables<T>(fn: (table: ReferenceTable) => T): Record<ReferenceTable, T> {
  return {
    ref_type_activite: fn('ref_type_activite'),
    ref_zone_type: fn('ref_zone_type'),
    ref_commune: fn('ref_commune'),
    ref_quartier: fn('ref_quartier'),
    ref_avenue: fn('ref_avenue'),
  };
}

// === Constants ===

/** Default number of records sent per export request */
export const DEFAULT_CHUNK_SIZE = 20;

/** Default per-request I/O timeout */
export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

// === Helpers ===

/** Decode ledger columns into a tagged state. */
export function rowToLedger(row: LedgerRow): LedgerState {
  switch (row.sync_status) {
    case SyncStatus.Synced:
      return { status: 'synced', lastSyncAt: row.last_sync_at ?? '' };
    case SyncStatus.Failed:
      return {
        status: 'failed',
        error: row.sync_error ?? 'unknown error',
        attempts: row.sync_attempts,
        lastSyncAt: row.last_sync_at ?? '',
      };
    default:
      return { status: 'pending', attempts: row.sync_attempts };
  }
}

/**
 * Parse a stored attachment list. Older rows hold a single bare path
 * instead of a JSON array.
 */
export function parseAttachments(raw: string | null): string[] {
  if (!raw) return [];
  if (!raw.startsWith('[')) return [raw];
  try {
    const parsed: unknown = JSON.parse(raw);
    if (Array.isArray(parsed)) {
      return parsed.filter((p): p is string => typeof p === 'string' && p.length > 0);
    }
    return [];
  } catch {
    return [raw];
  }
}

export function serializeAttachments(paths: string[]): string | null {
  return paths.length > 0 ? JSON.stringify(paths) : null;
}

function pick<T extends string>(values: readonly T[], raw: string | null, fallback: T): T {
  return values.find((v) => v === raw) ?? fallback;
}

function pickOptional<T extends string>(values: readonly T[], raw: string | null): T | null {
  return values.find((v) => v === raw) ?? null;
}

export function rowToTaxpayer(row: TaxpayerRow): Taxpayer {
  const { piece_identite_url, sync_status, sync_error, sync_attempts, last_sync_at, ...rest } = row;
  return {
    ...rest,
    type_nif: pickOptional(TAX_ID_TYPES, row.type_nif),
    type_contribuable: pick(TAXPAYER_TYPES, row.type_contribuable, 'PHYSIQUE'),
    origine_fiche: pick(RECORD_ORIGINS, row.origine_fiche, 'BUREAU'),
    forme_juridique: pickOptional(LEGAL_FORMS, row.forme_juridique),
    attachments: parseAttachments(piece_identite_url),
    ledger: rowToLedger({ sync_status, sync_error, sync_attempts, last_sync_at }),
  };
}

export function rowToParcel(row: ParcelRow): Parcel {
  const { photo_urls, sync_status, sync_error, sync_attempts, last_sync_at, ...rest } = row;
  return {
    ...rest,
    statut_parcelle: pick(PARCEL_STATUSES, row.statut_parcelle, 'active'),
    attachments: parseAttachments(photo_urls),
    ledger: rowToLedger({ sync_status, sync_error, sync_attempts, last_sync_at }),
  };
}

export function rowToBuilding(row: BuildingRow): Building {
  const { created_at: _createdAt, ...rest } = row;
  return {
    ...rest,
    type_batiment: pick(BUILDING_TYPES, row.type_batiment, 'autre'),
    usage_principal: pick(BUILDING_USAGES, row.usage_principal, 'autre'),
    statut_batiment: pick(BUILDING_STATUSES, row.statut_batiment, 'autre'),
  };
}

export function rowToOwner(row: OwnerRow): Owner {
  const { created_at: _createdAt, ...rest } = row;
  return {
    ...rest,
    type_personne: pick(OWNER_TYPES, row.type_personne, 'physique'),
  };
}
