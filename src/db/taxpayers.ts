import type { Db } from './connection.js';
import { SyncLedger } from './ledger.js';
import {
  rowToTaxpayer,
  serializeAttachments,
  type LegalForm,
  type RecordOrigin,
  type TaxIdType,
  type Taxpayer,
  type TaxpayerRow,
  type TaxpayerType,
} from '../types.js';

export interface InsertTaxpayerParams {
  taxpayerType: TaxpayerType;
  phone1: string;
  origin: RecordOrigin;
  createdBy: string;
  taxId?: string | null;
  taxIdType?: TaxIdType | null;
  lastName?: string | null;
  middleName?: string | null;
  firstName?: string | null;
  companyName?: string | null;
  phone2?: string | null;
  email?: string | null;
  communeId?: number | null;
  quartierId?: number | null;
  avenueId?: number | null;
  street?: string | null;
  parcelNumber?: string | null;
  activityId?: number | null;
  zoneId?: number | null;
  status?: number | null;
  latitude?: number | null;
  longitude?: number | null;
  attachments?: string[];
  registeredAt?: string | null;
  legalForm?: LegalForm | null;
  tradeRegisterNumber?: string | null;
  /** Overrides the creation timestamp (imports and tests). */
  createdAt?: string;
}

/** Local store for taxpayer records (`contribuables`). */
export class TaxpayerStore {
  readonly ledger: SyncLedger<Taxpayer, TaxpayerRow>;

  constructor(private readonly db: Db) {
    this.ledger = new SyncLedger(db, 'contribuables', rowToTaxpayer);
  }

  /** Save a record submitted by the capture form. It starts Pending. */
  insert(params: InsertTaxpayerParams): Taxpayer {
    const now = new Date().toISOString();
    const createdAt = params.createdAt ?? now;

    const result = this.db
      .prepare(
        `INSERT INTO contribuables (
          nif, type_nif, type_contribuable, nom, post_nom, prenom, raison_sociale,
          telephone1, telephone2, email, commune_id, quartier_id, avenue_id, rue,
          numero_parcelle, origine_fiche, activite_id, zone_id, statut,
          gps_latitude, gps_longitude, piece_identite_url, date_inscription,
          cree_par, forme_juridique, numero_rccm, created_at, updated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        params.taxId ?? null,
        params.taxIdType ?? null,
        params.taxpayerType,
        params.lastName ?? null,
        params.middleName ?? null,
        params.firstName ?? null,
        params.companyName ?? null,
        params.phone1,
        params.phone2 ?? null,
        params.email ?? null,
        params.communeId ?? null,
        params.quartierId ?? null,
        params.avenueId ?? null,
        params.street ?? null,
        params.parcelNumber ?? null,
        params.origin,
        params.activityId ?? null,
        params.zoneId ?? null,
        params.status ?? null,
        params.latitude ?? null,
        params.longitude ?? null,
        serializeAttachments(params.attachments ?? []),
        params.registeredAt ?? createdAt,
        params.createdBy,
        params.legalForm ?? null,
        params.tradeRegisterNumber ?? null,
        createdAt,
        now,
      );

    const id = Number(result.lastInsertRowid);
    const taxpayer = this.getById(id);
    if (!taxpayer) {
      throw new Error(`Taxpayer ${id} vanished after insert`);
    }
    return taxpayer;
  }

  getById(id: number): Taxpayer | null {
    const row = this.db
      .prepare('SELECT * FROM contribuables WHERE id = ?')
      .get(id) as TaxpayerRow | undefined;
    return row ? rowToTaxpayer(row) : null;
  }

  count(): number {
    const row = this.db.prepare('SELECT COUNT(*) as total FROM contribuables').get() as {
      total: number;
    };
    return row.total;
  }

  /** Remove rows by id. Attachment files are the caller's concern. */
  deleteRows(ids: number[]): number {
    if (ids.length === 0) return 0;
    const placeholders = ids.map(() => '?').join(',');
    const result = this.db
      .prepare(`DELETE FROM contribuables WHERE id IN (${placeholders})`)
      .run(...ids);
    return result.changes;
  }
}
