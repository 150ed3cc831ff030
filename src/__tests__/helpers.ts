import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { openDb, closeDb, type Db } from '../db/connection.js';
import type { TaxpayerStore } from '../db/taxpayers.js';
import type { Taxpayer } from '../types.js';
import type { LogLevel, Logger } from '../log.js';
import type { SyncSettings } from '../sync/index.js';

export const BASE_URL = 'http://backend.test/api';

/**
 * Open a fresh in-memory database for testing.
 * Call in beforeEach() to get full test isolation.
 */
export function setupTestDb(): Db {
  return openDb(':memory:');
}

/** Close the database after tests. */
export function teardownTestDb(db: Db): void {
  closeDb(db);
}

export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'fieldsync-test-'));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/** Write a small fake photo and return its path. */
export function writeAttachment(dir: string, name: string, content = `photo:${name}`): string {
  const path = join(dir, name);
  writeFileSync(path, content);
  return path;
}

export function testSettings(overrides: Partial<SyncSettings> = {}): SyncSettings {
  return {
    baseUrl: BASE_URL,
    chunkSize: 20,
    failurePolicy: 'continue',
    requestTimeoutMs: 1000,
    credentials: { email: 'agent@example.test', password: 'test-secret' },
    ...overrides,
  };
}

/** Timestamp `seconds` after a fixed origin, so creation order is explicit. */
export function createdAt(seconds: number): string {
  return new Date(Date.UTC(2026, 0, 1, 0, 0, seconds)).toISOString();
}

/** Insert `count` minimal taxpayers, oldest first. */
export function insertTaxpayers(
  store: TaxpayerStore,
  count: number,
  attachments: (index: number) => string[] = () => [],
): Taxpayer[] {
  const inserted: Taxpayer[] = [];
  for (let i = 0; i < count; i++) {
    inserted.push(
      store.insert({
        taxpayerType: 'PHYSIQUE',
        phone1: `+243 81 000 ${String(i).padStart(4, '0')}`,
        origin: 'RECENSEMENT',
        createdBy: 'agent-1',
        lastName: `Nom${i}`,
        communeId: 1,
        attachments: attachments(i),
        createdAt: createdAt(i),
      }),
    );
  }
  return inserted;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  meta?: Record<string, unknown>;
}

/** Logger that keeps every entry for assertions. */
export function captureLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return {
    entries,
    logger: (level, message, meta) => {
      entries.push({ level, message, meta });
    },
  };
}

// === Fake backend ===

export interface RecordedRequest {
  method: string;
  /** Path below the API base, e.g. "/auth/login". */
  path: string;
  headers: Headers;
  body: FormData | string | null;
}

type Handler = (request: RecordedRequest) => Response | Promise<Response>;

/**
 * In-process stand-in for the census backend, used as the client's `fetch`.
 * Unrouted requests get a 404. The request's abort signal is honoured so
 * timeouts can be exercised with handlers that never answer.
 */
export class FakeBackend {
  readonly requests: RecordedRequest[] = [];
  private readonly handlers = new Map<string, Handler>();

  constructor(private readonly basePath = '/api') {
    this.on('POST', '/auth/login', () => Response.json({ token: 'test-token' }));
  }

  on(method: string, path: string, handler: Handler): this {
    this.handlers.set(`${method} ${path}`, handler);
    return this;
  }

  requestsTo(method: string, path: string): RecordedRequest[] {
    return this.requests.filter((r) => r.method === method && r.path === path);
  }

  readonly fetch: typeof globalThis.fetch = (input, init) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const pathname = new URL(url).pathname;
    const path = pathname.startsWith(this.basePath) ? pathname.slice(this.basePath.length) : pathname;
    const rawBody = init?.body;
    const request: RecordedRequest = {
      method: init?.method ?? 'GET',
      path,
      headers: new Headers(init?.headers),
      body: rawBody instanceof FormData || typeof rawBody === 'string' ? rawBody : null,
    };
    this.requests.push(request);

    const handler = this.handlers.get(`${request.method} ${path}`);
    const signal = init?.signal;

    return new Promise<Response>((resolve, reject) => {
      if (signal) {
        if (signal.aborted) {
          reject(signal.reason);
          return;
        }
        signal.addEventListener('abort', () => reject(signal.reason), { once: true });
      }
      if (!handler) {
        resolve(new Response('not found', { status: 404 }));
        return;
      }
      Promise.resolve(handler(request)).then(resolve, reject);
    });
  };
}

/** Parse the `data` part of a recorded export request. */
export function chunkPayloads(request: RecordedRequest): Array<Record<string, unknown>> {
  if (!(request.body instanceof FormData)) {
    throw new Error(`Expected a multipart body for ${request.path}`);
  }
  const data = request.body.get('data');
  if (typeof data !== 'string') {
    throw new Error('Missing data part');
  }
  return JSON.parse(data) as Array<Record<string, unknown>>;
}

/** A promise with its resolver exposed. */
export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
