import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { makeTempDir, removeTempDir } from './helpers.js';
import {
  DEFAULT_BASE_URL,
  credentialsFromEnv,
  loadConfigFile,
  parseCliArgs,
  resolveSettings,
} from '../sync/index.js';

describe('resolveSettings', () => {
  it('should fall back to defaults', () => {
    expect(resolveSettings()).toEqual({
      baseUrl: DEFAULT_BASE_URL,
      chunkSize: 20,
      failurePolicy: 'continue',
      requestTimeoutMs: 60_000,
      credentials: null,
    });
  });

  it('should let later layers win', () => {
    const settings = resolveSettings(
      { baseUrl: 'https://census.example.test/api/', chunkSize: 50 },
      { chunkSize: 10, failurePolicy: 'halt' },
    );

    expect(settings.baseUrl).toBe('https://census.example.test/api');
    expect(settings.chunkSize).toBe(10);
    expect(settings.failurePolicy).toBe('halt');
  });

  it('should reject a non-positive chunk size', () => {
    expect(() => resolveSettings({ chunkSize: 0 })).toThrow();
  });
});

describe('parseCliArgs', () => {
  it('should read every flag', () => {
    const options = parseCliArgs([
      '--db-path',
      '/data/census.db',
      '--config',
      '/etc/fieldsync.json',
      '--base-url',
      'https://census.example.test/api',
      '--chunk-size',
      '25',
      '--failure-policy',
      'halt',
      '--timeout',
      '30',
    ]);

    expect(options).toEqual({
      dbPath: '/data/census.db',
      configPath: '/etc/fieldsync.json',
      help: false,
      overrides: {
        baseUrl: 'https://census.example.test/api',
        chunkSize: 25,
        failurePolicy: 'halt',
        requestTimeoutMs: 30_000,
      },
    });
  });

  it('should recognise --help', () => {
    expect(parseCliArgs(['--help']).help).toBe(true);
  });

  it('should reject an unknown failure policy', () => {
    expect(() => parseCliArgs(['--failure-policy', 'retry'])).toThrow('Unknown failure policy "retry"');
  });
});

describe('loadConfigFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it('should load a valid file', () => {
    const path = join(dir, 'config.json');
    writeFileSync(
      path,
      JSON.stringify({
        baseUrl: 'https://census.example.test/api',
        credentials: { email: 'agent@example.test', password: 'test-secret' },
      }),
    );

    expect(loadConfigFile(path)).toEqual({
      baseUrl: 'https://census.example.test/api',
      credentials: { email: 'agent@example.test', password: 'test-secret' },
    });
  });

  it('should report a missing file', () => {
    const path = join(dir, 'absent.json');
    expect(() => loadConfigFile(path)).toThrow(`Config file not found: ${path}`);
  });

  it('should report an invalid file', () => {
    const path = join(dir, 'bad.json');
    writeFileSync(path, JSON.stringify({ failurePolicy: 'sometimes' }));
    expect(() => loadConfigFile(path)).toThrow(/^Invalid config:/);
  });
});

describe('credentialsFromEnv', () => {
  it('should need both variables', () => {
    expect(credentialsFromEnv({ FIELDSYNC_EMAIL: 'agent@example.test' })).toBeUndefined();
    expect(
      credentialsFromEnv({ FIELDSYNC_EMAIL: 'agent@example.test', FIELDSYNC_PASSWORD: 'test-secret' }),
    ).toEqual({ email: 'agent@example.test', password: 'test-secret' });
  });
});
