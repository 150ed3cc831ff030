import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { BASE_URL, FakeBackend, makeTempDir, removeTempDir, writeAttachment } from './helpers.js';
import {
  AuthenticationError,
  BackendClient,
  TransferError,
  buildChunkForm,
  filePartName,
  transferChunk,
  type ChunkItem,
} from '../sync/index.js';

let dir: string;
let backend: FakeBackend;

beforeEach(() => {
  dir = makeTempDir();
  backend = new FakeBackend();
});

afterEach(() => {
  removeTempDir(dir);
});

function client(requestTimeoutMs = 1000): BackendClient {
  return new BackendClient({ baseUrl: `${BASE_URL}/`, requestTimeoutMs, fetch: backend.fetch });
}

describe('buildChunkForm', () => {
  it('should name file parts after the record they belong to', async () => {
    const front = writeAttachment(dir, 'front.jpg');
    const back = writeAttachment(dir, 'back.jpg');
    const missing = join(dir, 'deleted.jpg');
    const items: ChunkItem[] = [
      { localId: 7, payload: { localId: 7 }, attachments: [front, back] },
      { localId: 9, payload: { localId: 9 }, attachments: [missing] },
    ];

    const built = await buildChunkForm(items);

    expect(built.ok).toBe(true);
    if (!built.ok) return;
    const { form, attached } = built.value;
    expect(form.get('data')).toBe('[{"localId":7},{"localId":9}]');
    expect(form.getAll(filePartName(7))).toHaveLength(2);
    expect(form.getAll(filePartName(9))).toHaveLength(0);
    expect(attached).toEqual([front, back]);
    expect(built.value.missing).toEqual([missing]);

    const part = form.get('files_7');
    if (part === null || typeof part === 'string') throw new Error('expected a file part');
    expect(part.name).toBe('front.jpg');
    expect(await part.text()).toBe('photo:front.jpg');
  });

  it('should fail the chunk when an attachment cannot be read', async () => {
    const items: ChunkItem[] = [{ localId: 1, payload: { localId: 1 }, attachments: [dir] }];

    const built = await buildChunkForm(items);

    expect(built.ok).toBe(false);
    if (built.ok) return;
    expect(built.error).toBeInstanceOf(TransferError);
    expect(built.error.message).toContain(`Failed to read attachment ${dir}`);
  });
});

describe('transferChunk', () => {
  const items: ChunkItem[] = [{ localId: 1, payload: { localId: 1, nom: 'Ilunga' }, attachments: [] }];

  it('should accept any 2xx as delivery of the whole chunk', async () => {
    backend.on('POST', '/contribuables/batch', () => new Response(null, { status: 204 }));

    const result = await transferChunk(client(), 'taxpayer', items, 'test-token');

    expect(result.ok).toBe(true);
    const [request] = backend.requestsTo('POST', '/contribuables/batch');
    expect(request.headers.get('authorization')).toBe('Bearer test-token');
  });

  it('should post parcels to the parcel endpoint', async () => {
    backend.on('POST', '/parcelles/batch', () => new Response('ok'));

    const result = await transferChunk(client(), 'parcel', items, 'test-token');

    expect(result.ok).toBe(true);
    expect(backend.requestsTo('POST', '/parcelles/batch')).toHaveLength(1);
  });

  it('should report other statuses as a transfer failure', async () => {
    backend.on('POST', '/contribuables/batch', () => new Response('  invalid nif  ', { status: 422 }));

    const result = await transferChunk(client(), 'taxpayer', items, 'test-token');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(TransferError);
    expect(result.error.message).toBe('Export failed with HTTP 422: invalid nif');
    expect(result.error instanceof TransferError && result.error.status).toBe(422);
  });

  it('should report a rejected token as an expired session', async () => {
    backend.on('POST', '/contribuables/batch', () => new Response('', { status: 403 }));

    const result = await transferChunk(client(), 'taxpayer', items, 'test-token');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(AuthenticationError);
    expect(result.error instanceof AuthenticationError && result.error.reason).toBe('expired');
  });

  it('should turn connectivity loss into a transfer failure', async () => {
    backend.on('POST', '/contribuables/batch', () => Promise.reject(new TypeError('fetch failed')));

    const result = await transferChunk(client(), 'taxpayer', items, 'test-token');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('POST /contribuables/batch failed: fetch failed');
    expect(result.error instanceof TransferError && result.error.status).toBeUndefined();
  });

  it('should give up on a request that outlives the timeout', async () => {
    backend.on('POST', '/contribuables/batch', () => new Promise<Response>(() => {}));

    const result = await transferChunk(client(50), 'taxpayer', items, 'test-token');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('POST /contribuables/batch timed out after 50ms');
  });
});
