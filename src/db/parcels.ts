import type { Db } from './connection.js';
import { SyncLedger } from './ledger.js';
import {
  rowToBuilding,
  rowToOwner,
  rowToParcel,
  serializeAttachments,
  type Building,
  type BuildingRow,
  type BuildingStatus,
  type BuildingType,
  type BuildingUsage,
  type Owner,
  type OwnerRow,
  type OwnerType,
  type Parcel,
  type ParcelBundle,
  type ParcelRow,
  type ParcelStatus,
} from '../types.js';

export interface InsertBuildingParams {
  buildingType: BuildingType;
  usage: BuildingUsage;
  status: BuildingStatus;
  floors?: number | null;
  yearBuilt?: number | null;
  builtAreaM2?: number | null;
}

export interface InsertOwnerParams {
  ownerType: OwnerType;
  name?: string | null;
  taxId?: string | null;
  contact?: string | null;
  postalAddress?: string | null;
}

export interface InsertParcelParams {
  status?: ParcelStatus;
  code?: string | null;
  cadastralReference?: string | null;
  communeId?: number | null;
  quartierId?: number | null;
  avenueId?: number | null;
  street?: string | null;
  addressNumber?: string | null;
  parcelNumber?: string | null;
  areaM2?: number | null;
  latitude?: number | null;
  longitude?: number | null;
  dataSource?: string | null;
  attachments?: string[];
  buildings?: InsertBuildingParams[];
  owner?: InsertOwnerParams | null;
  /** Overrides the creation timestamp (imports and tests). */
  createdAt?: string;
}

/**
 * Local store for parcels (`parcelles`) and the rows they own:
 * buildings (one-to-many) and the owner (one-to-one).
 */
export class ParcelStore {
  readonly ledger: SyncLedger<Parcel, ParcelRow>;

  constructor(private readonly db: Db) {
    this.ledger = new SyncLedger(db, 'parcelles', rowToParcel);
  }

  /** Save a parcel with its buildings and owner in one transaction. */
  insert(params: InsertParcelParams): ParcelBundle {
    const now = new Date().toISOString();
    const createdAt = params.createdAt ?? now;

    const insertAll = this.db.transaction((): number => {
      const result = this.db
        .prepare(
          `INSERT INTO parcelles (
            code_parcelle, reference_cadastrale, commune_id, quartier_id, avenue_id,
            rue, numero_adresse, numero_parcelle, superficie_m2, gps_lat, gps_lon,
            statut_parcelle, source_donnee, photo_urls, created_at, updated_at
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          params.code ?? null,
          params.cadastralReference ?? null,
          params.communeId ?? null,
          params.quartierId ?? null,
          params.avenueId ?? null,
          params.street ?? null,
          params.addressNumber ?? null,
          params.parcelNumber ?? null,
          params.areaM2 ?? null,
          params.latitude ?? null,
          params.longitude ?? null,
          params.status ?? 'active',
          params.dataSource ?? null,
          serializeAttachments(params.attachments ?? []),
          createdAt,
          now,
        );
      const parcelId = Number(result.lastInsertRowid);

      const insertBuilding = this.db.prepare(
        `INSERT INTO batiments (
          parcelle_id, type_batiment, nombre_etages, annee_construction,
          surface_batie_m2, usage_principal, statut_batiment, created_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      );
      for (const building of params.buildings ?? []) {
        insertBuilding.run(
          parcelId,
          building.buildingType,
          building.floors ?? null,
          building.yearBuilt ?? null,
          building.builtAreaM2 ?? null,
          building.usage,
          building.status,
          now,
        );
      }

      if (params.owner) {
        this.db
          .prepare(
            `INSERT INTO personnes (
              type_personne, nom_raison_sociale, nif, contact, adresse_postale, parcelle_id, created_at
            ) VALUES (?, ?, ?, ?, ?, ?, ?)`,
          )
          .run(
            params.owner.ownerType,
            params.owner.name ?? null,
            params.owner.taxId ?? null,
            params.owner.contact ?? null,
            params.owner.postalAddress ?? null,
            parcelId,
            now,
          );
      }

      return parcelId;
    });

    const parcelId = insertAll();
    const bundle = this.getBundle(parcelId);
    if (!bundle) {
      throw new Error(`Parcel ${parcelId} vanished after insert`);
    }
    return bundle;
  }

  getById(id: number): Parcel | null {
    const row = this.db
      .prepare('SELECT * FROM parcelles WHERE id = ?')
      .get(id) as ParcelRow | undefined;
    return row ? rowToParcel(row) : null;
  }

  getBundle(id: number): ParcelBundle | null {
    const parcel = this.getById(id);
    if (!parcel) return null;
    return {
      parcel,
      buildings: this.getBuildings(id),
      owner: this.getOwner(id),
    };
  }

  getBuildings(parcelId: number): Building[] {
    const rows = this.db
      .prepare('SELECT * FROM batiments WHERE parcelle_id = ? ORDER BY id')
      .all(parcelId) as BuildingRow[];
    return rows.map(rowToBuilding);
  }

  getOwner(parcelId: number): Owner | null {
    const row = this.db
      .prepare('SELECT * FROM personnes WHERE parcelle_id = ?')
      .get(parcelId) as OwnerRow | undefined;
    return row ? rowToOwner(row) : null;
  }

  count(): number {
    const row = this.db.prepare('SELECT COUNT(*) as total FROM parcelles').get() as {
      total: number;
    };
    return row.total;
  }

  countDependents(parcelIds: number[]): { buildings: number; owners: number } {
    if (parcelIds.length === 0) return { buildings: 0, owners: 0 };
    const placeholders = parcelIds.map(() => '?').join(',');
    const buildings = this.db
      .prepare(`SELECT COUNT(*) as total FROM batiments WHERE parcelle_id IN (${placeholders})`)
      .get(...parcelIds) as { total: number };
    const owners = this.db
      .prepare(`SELECT COUNT(*) as total FROM personnes WHERE parcelle_id IN (${placeholders})`)
      .get(...parcelIds) as { total: number };
    return { buildings: buildings.total, owners: owners.total };
  }

  /**
   * Remove parcels by id. Buildings and owners are deleted first, in that
   * order, instead of leaning on ON DELETE CASCADE alone.
   */
  deleteRows(ids: number[]): number {
    if (ids.length === 0) return 0;
    const placeholders = ids.map(() => '?').join(',');

    this.db.prepare(`DELETE FROM batiments WHERE parcelle_id IN (${placeholders})`).run(...ids);
    this.db.prepare(`DELETE FROM personnes WHERE parcelle_id IN (${placeholders})`).run(...ids);
    const result = this.db
      .prepare(`DELETE FROM parcelles WHERE id IN (${placeholders})`)
      .run(...ids);
    return result.changes;
  }
}
