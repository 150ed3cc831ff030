import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createdAt, setupTestDb, teardownTestDb } from './helpers.js';
import type { Db } from '../db/connection.js';
import { TaxpayerStore } from '../db/taxpayers.js';
import { ParcelStore } from '../db/parcels.js';
import { parcelToPayload, taxpayerToPayload } from '../sync/index.js';

let db: Db;

beforeEach(() => {
  db = setupTestDb();
});

afterEach(() => {
  teardownTestDb(db);
});

describe('taxpayerToPayload', () => {
  it('should drop empty fields and name foreign keys for the backend', () => {
    const taxpayer = new TaxpayerStore(db).insert({
      taxpayerType: 'MORALE',
      phone1: '+243 81 555 0100',
      origin: 'BUREAU',
      createdBy: 'agent-7',
      companyName: 'Boulangerie du Centre',
      legalForm: 'SARL',
      communeId: 2,
      activityId: 3,
      latitude: -4.3217,
      createdAt: createdAt(5),
    });

    expect(taxpayerToPayload(taxpayer)).toEqual({
      localId: taxpayer.id,
      typeContribuable: 'MORALE',
      raisonSociale: 'Boulangerie du Centre',
      telephone1: '+243 81 555 0100',
      origineFiche: 'BUREAU',
      gpsLatitude: -4.3217,
      dateInscription: createdAt(5),
      dateMaj: taxpayer.updated_at,
      formeJuridique: 'SARL',
      refTypeActivite: 3,
      refCommune: 2,
    });
  });
});

describe('parcelToPayload', () => {
  it('should embed buildings and the owner', () => {
    const store = new ParcelStore(db);
    const { parcel } = store.insert({
      code: 'P-0042',
      areaM2: 250.5,
      communeId: 1,
      buildings: [
        { buildingType: 'maison', usage: 'résidentiel', status: 'en service', floors: 2 },
        { buildingType: 'commerce', usage: 'commercial', status: 'en chantier' },
      ],
      owner: { ownerType: 'physique', name: 'Mbala Jean', contact: '+243 99 000 0001' },
    });

    const bundle = store.getBundle(parcel.id);
    expect(bundle).not.toBeNull();
    if (!bundle) return;

    expect(parcelToPayload(bundle)).toEqual({
      localId: parcel.id,
      statutParcelle: 'active',
      codeParcelle: 'P-0042',
      superficieM2: 250.5,
      commune: 1,
      batiments: [
        { typeBatiment: 'maison', nombreEtages: 2, usagePrincipal: 'résidentiel', statutBatiment: 'en service' },
        { typeBatiment: 'commerce', usagePrincipal: 'commercial', statutBatiment: 'en chantier' },
      ],
      personnes: [{ typePersonne: 'physique', nomRaisonSociale: 'Mbala Jean', contact: '+243 99 000 0001' }],
    });
  });

  it('should send empty lists for a bare parcel', () => {
    const bundle = new ParcelStore(db).insert({});
    const payload = parcelToPayload(bundle);

    expect(payload.batiments).toEqual([]);
    expect(payload.personnes).toEqual([]);
  });
});
