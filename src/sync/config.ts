/**
 * Sync settings: where the backend lives, how exports are chunked, and
 * which credentials open a session. Layered from a JSON config file,
 * environment variables and CLI flags (flags win).
 */

import { z } from 'zod';
import { readFileSync, existsSync } from 'node:fs';
import { DEFAULT_CHUNK_SIZE, DEFAULT_REQUEST_TIMEOUT_MS } from '../types.js';

export const FAILURE_POLICIES = ['continue', 'halt'] as const;

/** What the coordinator does after a chunk fails: move on, or end the session. */
export type FailurePolicy = (typeof FAILURE_POLICIES)[number];

export const DEFAULT_BASE_URL = 'http://localhost:8080/api';

export interface Credentials {
  email: string;
  password: string;
}

export interface SyncSettings {
  baseUrl: string;
  chunkSize: number;
  failurePolicy: FailurePolicy;
  requestTimeoutMs: number;
  credentials: Credentials | null;
}

const CredentialsSchema = z.object({
  email: z.string().min(1),
  password: z.string().min(1),
});

/** Zod schema for the config file and for flag overrides. */
const SettingsOverridesSchema = z.object({
  baseUrl: z.string().url().optional(),
  chunkSize: z.number().int().positive().optional(),
  failurePolicy: z.enum(FAILURE_POLICIES).optional(),
  requestTimeoutMs: z.number().int().positive().optional(),
  credentials: CredentialsSchema.optional(),
});

export type SettingsOverrides = z.infer<typeof SettingsOverridesSchema>;

/** Load sync settings overrides from a JSON file. */
export function loadConfigFile(path: string): SettingsOverrides {
  if (!existsSync(path)) {
    throw new Error(`Config file not found: ${path}`);
  }

  try {
    const content = readFileSync(path, 'utf-8');
    const data: unknown = JSON.parse(content);
    return SettingsOverridesSchema.parse(data);
  } catch (error) {
    throw new Error(`Invalid config: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/** Credentials from FIELDSYNC_EMAIL / FIELDSYNC_PASSWORD, when both are set. */
export function credentialsFromEnv(env: NodeJS.ProcessEnv): Credentials | undefined {
  const email = env.FIELDSYNC_EMAIL;
  const password = env.FIELDSYNC_PASSWORD;
  if (!email || !password) return undefined;
  return { email, password };
}

/**
 * Merge layers into final settings. Later layers override earlier ones;
 * missing values fall back to the defaults.
 */
export function resolveSettings(...layers: SettingsOverrides[]): SyncSettings {
  const settings: SyncSettings = {
    baseUrl: DEFAULT_BASE_URL,
    chunkSize: DEFAULT_CHUNK_SIZE,
    failurePolicy: 'continue',
    requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
    credentials: null,
  };

  for (const layer of layers) {
    const parsed = SettingsOverridesSchema.parse(layer);
    if (parsed.baseUrl !== undefined) settings.baseUrl = parsed.baseUrl.replace(/\/+$/, '');
    if (parsed.chunkSize !== undefined) settings.chunkSize = parsed.chunkSize;
    if (parsed.failurePolicy !== undefined) settings.failurePolicy = parsed.failurePolicy;
    if (parsed.requestTimeoutMs !== undefined) settings.requestTimeoutMs = parsed.requestTimeoutMs;
    if (parsed.credentials !== undefined) settings.credentials = parsed.credentials;
  }

  return settings;
}

/** Command-line options accepted by the server entry point. */
export interface CliOptions {
  dbPath?: string;
  configPath?: string;
  help: boolean;
  overrides: SettingsOverrides;
}

/** Parse CLI arguments. Unknown flags are ignored. */
export function parseCliArgs(args: string[]): CliOptions {
  const options: CliOptions = { help: false, overrides: {} };

  for (let i = 0; i < args.length; i++) {
    const next = args[i + 1];
    if (args[i] === '--db-path' && next) {
      options.dbPath = next;
      i++;
    } else if (args[i] === '--config' && next) {
      options.configPath = next;
      i++;
    } else if (args[i] === '--base-url' && next) {
      options.overrides.baseUrl = next;
      i++;
    } else if (args[i] === '--chunk-size' && next) {
      options.overrides.chunkSize = parseInt(next, 10);
      i++;
    } else if (args[i] === '--failure-policy' && next) {
      const policy = FAILURE_POLICIES.find((p) => p === next);
      if (!policy) {
        throw new Error(`Unknown failure policy "${next}" (expected ${FAILURE_POLICIES.join(' or ')})`);
      }
      options.overrides.failurePolicy = policy;
      i++;
    } else if (args[i] === '--timeout' && next) {
      options.overrides.requestTimeoutMs = parseInt(next, 10) * 1000;
      i++;
    } else if (args[i] === '--help') {
      options.help = true;
    }
  }

  return options;
}
