import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import {
  captureLogger,
  insertTaxpayers,
  makeTempDir,
  removeTempDir,
  setupTestDb,
  teardownTestDb,
  testSettings,
  writeAttachment,
  type LogEntry,
} from './helpers.js';
import type { Db } from '../db/connection.js';
import { FieldSyncService, RecordPurger, deleteAttachment } from '../sync/index.js';
import { AttachmentCleanupError } from '../sync/errors.js';

let db: Db;
let dir: string;
let service: FieldSyncService;
let logs: LogEntry[];
let purger: RecordPurger;

beforeEach(() => {
  db = setupTestDb();
  dir = makeTempDir();
  const captured = captureLogger();
  logs = captured.entries;
  service = new FieldSyncService({ db, settings: testSettings(), logger: captured.logger });
  purger = new RecordPurger(db, service.taxpayers, service.parcels, captured.logger);
});

afterEach(() => {
  teardownTestDb(db);
  removeTempDir(dir);
});

describe('deleteAttachment', () => {
  it('should report whether a file was removed', async () => {
    const path = writeAttachment(dir, 'a.jpg');

    expect(await deleteAttachment(path)).toEqual({ ok: true, value: true });
    expect(await deleteAttachment(path)).toEqual({ ok: true, value: false });
  });

  it('should return an error for a path it cannot remove', async () => {
    const folder = join(dir, 'folder');
    mkdirSync(folder);

    const result = await deleteAttachment(folder);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(AttachmentCleanupError);
    expect(result.error.path).toBe(folder);
  });
});

describe('RecordPurger', () => {
  it('should delete rows and their files', async () => {
    const first = writeAttachment(dir, 'first.jpg');
    const second = writeAttachment(dir, 'second.jpg');
    const records = insertTaxpayers(service.taxpayers, 2, (i) => (i === 0 ? [first, second] : []));

    const result = await purger.purge(
      'taxpayer',
      records.map((r) => ({ id: r.id, attachments: r.attachments })),
    );

    expect(result).toEqual({ rowsDeleted: 2, filesDeleted: 2, filesFailed: [] });
    expect(service.taxpayers.count()).toBe(0);
    expect(existsSync(first)).toBe(false);
    expect(existsSync(second)).toBe(false);
  });

  it('should finish the row deletion when a file cannot be removed', async () => {
    const stuck = join(dir, 'stuck');
    mkdirSync(stuck);
    const photo = writeAttachment(dir, 'photo.jpg');
    const [record] = insertTaxpayers(service.taxpayers, 1, () => [stuck, photo]);

    const result = await purger.purge('taxpayer', [{ id: record.id, attachments: record.attachments }]);

    expect(result).toEqual({ rowsDeleted: 1, filesDeleted: 1, filesFailed: [stuck] });
    expect(service.taxpayers.getById(record.id)).toBeNull();
    expect(existsSync(photo)).toBe(false);
    expect(logs).toHaveLength(1);
    expect(logs[0]).toMatchObject({ level: 'warn', meta: { kind: 'taxpayer', code: 'ATTACHMENT_CLEANUP' } });
  });

  it('should do nothing for an empty batch', async () => {
    expect(await purger.purge('parcel', [])).toEqual({ rowsDeleted: 0, filesDeleted: 0, filesFailed: [] });
  });
});

describe('deleteRecord', () => {
  it('should remove a parcel with its dependents and photos', async () => {
    const photo = writeAttachment(dir, 'site.jpg');
    const bundle = service.parcels.insert({
      attachments: [photo],
      buildings: [{ buildingType: 'entrepôt', usage: 'commercial', status: 'en ruine' }],
      owner: { ownerType: 'morale', name: 'SA Exemple' },
    });

    const result = await service.deleteRecord('parcel', bundle.parcel.id);

    expect(result).toEqual({ rowsDeleted: 1, filesDeleted: 1, filesFailed: [] });
    expect(service.parcels.getById(bundle.parcel.id)).toBeNull();
    expect(service.parcels.countDependents([bundle.parcel.id])).toEqual({ buildings: 0, owners: 0 });
    expect(existsSync(photo)).toBe(false);
  });

  it('should return null for an unknown record', async () => {
    expect(await service.deleteRecord('taxpayer', 404)).toBeNull();
  });
});
