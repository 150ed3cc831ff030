/**
 * Session authentication against the backend login endpoint.
 */

import { z } from 'zod';
import type { BackendClient } from './client.js';
import type { Credentials } from './config.js';
import { AuthenticationError } from './errors.js';
import { Err, Ok, type Result } from './result.js';

const LOGIN_PATH = '/auth/login';

/** Response fields that may carry the bearer token, in lookup order. */
const TOKEN_FIELDS = ['token', 'access_token', 'jwt', 'accessToken'] as const;

const LoginBodySchema = z.record(z.unknown());

/**
 * Where login credentials come from and where the session token goes.
 * Storage and encryption of the secrets are the implementer's concern.
 */
export interface CredentialStore {
  getCredentials(): Promise<Credentials | null>;
  /** Receives the session token, or null when the session ends. */
  setSessionToken(token: string | null): void;
}

/** Credentials held in memory for the lifetime of the process. */
export class InMemoryCredentialStore implements CredentialStore {
  private sessionToken: string | null = null;

  constructor(private credentials: Credentials | null = null) {}

  async getCredentials(): Promise<Credentials | null> {
    return this.credentials;
  }

  setCredentials(credentials: Credentials | null): void {
    this.credentials = credentials;
  }

  setSessionToken(token: string | null): void {
    this.sessionToken = token;
  }

  getSessionToken(): string | null {
    return this.sessionToken;
  }
}

/**
 * Lets several sessions share one credential store. Each successful login
 * opens a session and each `setSessionToken(null)` closes one; the wrapped
 * store only hears the null once the last open session has ended.
 */
export class SharedCredentialStore implements CredentialStore {
  private openSessions = 0;

  constructor(private readonly inner: CredentialStore) {}

  getCredentials(): Promise<Credentials | null> {
    return this.inner.getCredentials();
  }

  setSessionToken(token: string | null): void {
    if (token !== null) {
      this.openSessions++;
      this.inner.setSessionToken(token);
      return;
    }
    if (this.openSessions > 0) this.openSessions--;
    if (this.openSessions === 0) this.inner.setSessionToken(null);
  }

  /** Sessions that logged in and have not ended yet. */
  get activeSessions(): number {
    return this.openSessions;
  }
}

/**
 * Read the token out of a login response body: a JSON object carrying one
 * of the known token fields, a JSON string, or the bare token text.
 */
export function extractToken(body: string): string | null {
  const text = body.trim();
  if (text.length === 0) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return text.startsWith('{') ? null : text;
  }

  if (typeof parsed === 'string') return parsed.length > 0 ? parsed : null;

  const object = LoginBodySchema.safeParse(parsed);
  if (!object.success) return null;

  for (const field of TOKEN_FIELDS) {
    const value = object.data[field];
    if (typeof value === 'string' && value.length > 0) return value;
    if (typeof value === 'number') return String(value);
  }
  return null;
}

/** Log in with the stored credentials and return the session bearer token. */
export async function authenticate(
  client: BackendClient,
  store: CredentialStore,
): Promise<Result<string, AuthenticationError>> {
  const credentials = await store.getCredentials();
  if (!credentials || !credentials.email || !credentials.password) {
    return Err(new AuthenticationError('No stored credentials to log in with', 'no_credentials'));
  }

  const sent = await client.postJson(LOGIN_PATH, {
    email: credentials.email,
    password: credentials.password,
  });
  if (!sent.ok) {
    return Err(
      new AuthenticationError(`Unable to reach the server: ${sent.error.message}`, 'network', {
        cause: sent.error,
      }),
    );
  }

  const response = sent.value;
  if (response.status === 401 || response.status === 403) {
    return Err(new AuthenticationError('Invalid credentials', 'invalid_credentials'));
  }
  if (response.status >= 500) {
    return Err(new AuthenticationError(`Server error (${response.status})`, 'server'));
  }
  if (!response.ok) {
    return Err(
      new AuthenticationError(
        `Login failed with status ${response.status}: ${response.body}`,
        'invalid_response',
      ),
    );
  }

  const token = extractToken(response.body);
  if (!token) {
    return Err(new AuthenticationError('Token not found in login response', 'invalid_response'));
  }

  store.setSessionToken(token);
  return Ok(token);
}
