import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  FakeBackend,
  captureLogger,
  insertTaxpayers,
  setupTestDb,
  teardownTestDb,
  testSettings,
  type LogEntry,
} from './helpers.js';
import { foreignKeysEnabled, type Db } from '../db/connection.js';
import { FieldSyncService, parseReferenceResponse } from '../sync/index.js';

const REFS = '/reftypes/all';

let db: Db;
let backend: FakeBackend;
let service: FieldSyncService;
let logs: LogEntry[];

const SEED_COUNTS = {
  ref_type_activite: 15,
  ref_zone_type: 7,
  ref_commune: 24,
  ref_quartier: 10,
  ref_avenue: 10,
};

function refs(body: Record<string, unknown>): () => Response {
  return () => Response.json(body);
}

beforeEach(() => {
  db = setupTestDb();
  backend = new FakeBackend();
  const captured = captureLogger();
  logs = captured.entries;
  service = new FieldSyncService({
    db,
    settings: testSettings(),
    fetch: backend.fetch,
    logger: captured.logger,
  });
});

afterEach(() => {
  teardownTestDb(db);
});

describe('synchronizeReferenceData', () => {
  it('should replace every table and keep the server ids', async () => {
    backend.on(
      'GET',
      REFS,
      refs({
        zoneTypes: [{ id: 40, libelle: 'Urbaine' }],
        avenues: [
          { id: 501, libelle: 'Av. du Commerce' },
          { id: 502, libelle: 'Av. Lumumba' },
        ],
        quartiers: [{ id: 301, libelle: 'Matonge' }],
        communes: [{ id: 101, libelle: 'Gombe' }],
        typeActivites: [{ id: 7, libelle: 'Commerce de détail' }],
      }),
    );

    const result = await service.synchronizeReferenceData();

    expect(result.success).toBe(true);
    expect(result.countsByTable).toEqual({
      ref_type_activite: 1,
      ref_zone_type: 1,
      ref_commune: 1,
      ref_quartier: 1,
      ref_avenue: 2,
    });
    expect(service.reference.list('ref_avenue')).toEqual([
      { id: 501, libelle: 'Av. du Commerce' },
      { id: 502, libelle: 'Av. Lumumba' },
    ]);
    expect(backend.requestsTo('GET', REFS)[0].headers.get('authorization')).toBe('Bearer test-token');
    expect(foreignKeysEnabled(db)).toBe(true);
  });

  it('should keep existing records pointing at the same ids', async () => {
    const [taxpayer] = insertTaxpayers(service.taxpayers, 1);
    backend.on('GET', REFS, refs({ communes: [{ id: 1, libelle: 'Gombe (renamed)' }] }));

    const result = await service.synchronizeReferenceData();

    expect(result.success).toBe(true);
    expect(result.danglingReferences).toEqual({});
    const row = db
      .prepare(
        'SELECT c.libelle FROM contribuables t JOIN ref_commune c ON c.id = t.commune_id WHERE t.id = ?',
      )
      .get(taxpayer.id);
    expect(row).toEqual({ libelle: 'Gombe (renamed)' });
  });

  it('should warn about records whose lookup id disappeared', async () => {
    const [taxpayer] = insertTaxpayers(service.taxpayers, 1);
    backend.on('GET', REFS, refs({ communes: [{ id: 2, libelle: 'Kinshasa' }] }));

    const result = await service.synchronizeReferenceData();

    expect(result.success).toBe(true);
    expect(result.danglingReferences).toEqual({ contribuables: 1 });
    expect(service.taxpayers.getById(taxpayer.id)?.commune_id).toBe(1);
    expect(logs).toContainEqual({
      level: 'warn',
      message: '1 record(s) reference lookup ids that no longer exist',
      meta: { contribuables: 1 },
    });
  });

  it('should skip invalid rows and trim labels', async () => {
    backend.on(
      'GET',
      REFS,
      refs({
        quartiers: [
          { id: '7', libelle: '  Kintambo  ' },
          { id: null, libelle: 'no id' },
          { id: 3.5, libelle: 'fractional id' },
          { id: 4, libelle: '   ' },
          'junk',
          { libelle: 'missing id' },
        ],
      }),
    );

    const result = await service.synchronizeReferenceData();

    expect(result.success).toBe(true);
    expect(result.skippedRows).toBe(5);
    expect(service.reference.list('ref_quartier')).toEqual([{ id: 7, libelle: 'Kintambo' }]);
  });

  it('should roll everything back when an insert fails', async () => {
    backend.on(
      'GET',
      REFS,
      refs({
        zoneTypes: [{ id: 1, libelle: 'Urbaine' }],
        communes: [
          { id: 1, libelle: 'Gombe' },
          { id: 1, libelle: 'Duplicate' },
        ],
      }),
    );
    const before = service.reference.list('ref_commune');

    const result = await service.synchronizeReferenceData();

    expect(result.success).toBe(false);
    expect(result.message).toMatch(/^Failed to replace reference tables: UNIQUE constraint failed/);
    expect(service.reference.counts()).toEqual(SEED_COUNTS);
    expect(service.reference.list('ref_commune')).toEqual(before);
    expect(foreignKeysEnabled(db)).toBe(true);
  });

  it('should leave the tables untouched when the response is not an object', async () => {
    backend.on('GET', REFS, () => Response.json([1, 2, 3]));

    const result = await service.synchronizeReferenceData();

    expect(result).toEqual({ success: false, message: 'Invalid reference response format' });
    expect(service.reference.counts()).toEqual(SEED_COUNTS);
  });

  it('should report an HTTP error from the reference endpoint', async () => {
    backend.on('GET', REFS, () => new Response('down', { status: 500 }));

    const result = await service.synchronizeReferenceData();

    expect(result).toEqual({ success: false, message: 'Reference fetch failed with HTTP 500' });
  });

  it('should not fetch anything when login fails', async () => {
    backend.on('POST', '/auth/login', () => new Response('', { status: 401 }));

    const result = await service.synchronizeReferenceData();

    expect(result).toEqual({ success: false, message: 'Authentication failed: Invalid credentials' });
    expect(backend.requestsTo('GET', REFS)).toHaveLength(0);
  });
});

describe('parseReferenceResponse', () => {
  it('should treat missing or non-list keys as empty tables', () => {
    const parsed = parseReferenceResponse('{"communes":"oops"}');

    expect(parsed.ok).toBe(true);
    if (!parsed.ok) return;
    expect(parsed.value.data.ref_commune).toEqual([]);
    expect(parsed.value.data.ref_avenue).toEqual([]);
    expect(parsed.value.skipped).toBe(0);
  });

  it('should reject a body that is not JSON', () => {
    const parsed = parseReferenceResponse('<html>');

    expect(parsed.ok).toBe(false);
    if (parsed.ok) return;
    expect(parsed.error.message).toBe('Reference response is not valid JSON');
  });
});

describe('dangling reference check', () => {
  it('should still report success when the check itself fails', async () => {
    backend.on('GET', REFS, refs({ communes: [{ id: 1, libelle: 'Gombe' }] }));
    vi.spyOn(service.reference, 'danglingReferences').mockImplementation(() => {
      throw new Error('disk I/O error');
    });

    const result = await service.synchronizeReferenceData();

    expect(result.success).toBe(true);
    expect(result.danglingReferences).toBeUndefined();
    expect(service.reference.list('ref_commune')).toEqual([{ id: 1, libelle: 'Gombe' }]);
    expect(logs).toContainEqual({
      level: 'warn',
      message: 'Could not check for dangling references: disk I/O error',
      meta: undefined,
    });
  });
});
