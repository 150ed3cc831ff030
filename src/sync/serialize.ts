/**
 * Wire mapping between local records and the backend's JSON payloads.
 *
 * Outgoing payloads use the backend's camelCase field names, drop null
 * fields, and pass reference foreign keys as the server-assigned ids the
 * lookup tables were synchronized with. Every payload carries `localId` so
 * the backend can link file parts to their record.
 */

import { z } from 'zod';
import {
  mapReferenceTables,
  type Building,
  type Owner,
  type ParcelBundle,
  type ReferenceData,
  type ReferenceRow,
  type ReferenceTable,
  type Taxpayer,
} from '../types.js';
import { TransferError } from './errors.js';
import { Err, Ok, type Result } from './result.js';

export type PayloadValue = string | number | Payload[];
export type Payload = { [key: string]: PayloadValue };

/** Copy the entries whose value is present. */
function compact(fields: Record<string, PayloadValue | null | undefined>): Payload {
  const payload: Payload = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== null && value !== undefined) payload[key] = value;
  }
  return payload;
}

export function taxpayerToPayload(taxpayer: Taxpayer): Payload {
  return compact({
    localId: taxpayer.id,
    nif: taxpayer.nif,
    typeNif: taxpayer.type_nif,
    typeContribuable: taxpayer.type_contribuable,
    nom: taxpayer.nom,
    postNom: taxpayer.post_nom,
    prenom: taxpayer.prenom,
    raisonSociale: taxpayer.raison_sociale,
    telephone1: taxpayer.telephone1,
    telephone2: taxpayer.telephone2,
    email: taxpayer.email,
    rue: taxpayer.rue,
    numeroParcelle: taxpayer.numero_parcelle,
    origineFiche: taxpayer.origine_fiche,
    statut: taxpayer.statut,
    gpsLatitude: taxpayer.gps_latitude,
    gpsLongitude: taxpayer.gps_longitude,
    dateInscription: taxpayer.date_inscription,
    dateMaj: taxpayer.updated_at,
    formeJuridique: taxpayer.forme_juridique,
    numeroRccm: taxpayer.numero_rccm,
    refTypeActivite: taxpayer.activite_id,
    refZoneType: taxpayer.zone_id,
    refAvenue: taxpayer.avenue_id,
    refQuartier: taxpayer.quartier_id,
    refCommune: taxpayer.commune_id,
  });
}

export function buildingToPayload(building: Building): Payload {
  return compact({
    typeBatiment: building.type_batiment,
    nombreEtages: building.nombre_etages,
    anneeConstruction: building.annee_construction,
    surfaceBatieM2: building.surface_batie_m2,
    usagePrincipal: building.usage_principal,
    statutBatiment: building.statut_batiment,
  });
}

export function ownerToPayload(owner: Owner): Payload {
  return compact({
    typePersonne: owner.type_personne,
    nomRaisonSociale: owner.nom_raison_sociale,
    nif: owner.nif,
    contact: owner.contact,
    adressePostale: owner.adresse_postale,
  });
}

/** A parcel with its buildings and owner embedded. */
export function parcelToPayload({ parcel, buildings, owner }: ParcelBundle): Payload {
  return compact({
    localId: parcel.id,
    statutParcelle: parcel.statut_parcelle,
    codeParcelle: parcel.code_parcelle,
    referenceCadastrale: parcel.reference_cadastrale,
    numeroAdresse: parcel.numero_adresse,
    rue: parcel.rue,
    numeroParcelle: parcel.numero_parcelle,
    superficieM2: parcel.superficie_m2,
    gpsLat: parcel.gps_lat,
    gpsLon: parcel.gps_lon,
    sourceDonnee: parcel.source_donnee,
    commune: parcel.commune_id,
    quartier: parcel.quartier_id,
    rueAvenue: parcel.avenue_id,
    batiments: buildings.map(buildingToPayload),
    personnes: owner ? [ownerToPayload(owner)] : [],
  });
}

// === Reference response ===

/** Response key holding each lookup table. */
const REFERENCE_RESPONSE_KEYS: Record<ReferenceTable, string> = {
  ref_type_activite: 'typeActivites',
  ref_zone_type: 'zoneTypes',
  ref_commune: 'communes',
  ref_quartier: 'quartiers',
  ref_avenue: 'avenues',
};

const ReferenceResponseSchema = z.record(z.unknown());

const ReferenceItemSchema = z.object({
  id: z.union([z.number(), z.string()]),
  libelle: z.union([z.string(), z.number()]),
});

export interface ParsedReferenceData {
  data: ReferenceData;
  /** Rows dropped for a missing or non-integer id, or a blank label. */
  skipped: number;
}

function parseReferenceId(raw: number | string): number | null {
  if (typeof raw === 'number') return Number.isInteger(raw) ? raw : null;
  const text = raw.trim();
  return /^-?\d+$/.test(text) ? parseInt(text, 10) : null;
}

function parseReferenceList(value: unknown): { rows: ReferenceRow[]; skipped: number } {
  if (!Array.isArray(value)) return { rows: [], skipped: 0 };

  const rows: ReferenceRow[] = [];
  let skipped = 0;
  for (const item of value) {
    const parsed = ReferenceItemSchema.safeParse(item);
    if (!parsed.success) {
      skipped++;
      continue;
    }
    const id = parseReferenceId(parsed.data.id);
    const libelle = String(parsed.data.libelle).trim();
    if (id === null || libelle.length === 0) {
      skipped++;
      continue;
    }
    rows.push({ id, libelle });
  }
  return { rows, skipped };
}

/**
 * Parse the `/reftypes/all` body. A list that is missing or not an array
 * becomes empty; a body that is not a JSON object is rejected.
 */
export function parseReferenceResponse(body: string): Result<ParsedReferenceData, TransferError> {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    return Err(
      new TransferError('Reference response is not valid JSON', {
        cause: error instanceof Error ? error : undefined,
      }),
    );
  }

  const response = ReferenceResponseSchema.safeParse(json);
  if (!response.success) {
    return Err(new TransferError('Invalid reference response format'));
  }

  let skipped = 0;
  const data = mapReferenceTables((table) => {
    const list = parseReferenceList(response.data[REFERENCE_RESPONSE_KEYS[table]]);
    skipped += list.skipped;
    return list.rows;
  });
  return Ok({ data, skipped });
}
