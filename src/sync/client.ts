import { Err, Ok, type Result } from './result.js';
import { TransferError, toError } from './errors.js';
import { DEFAULT_REQUEST_TIMEOUT_MS } from '../types.js';

/** `AbortSignal.timeout` rejects with a DOMException named TimeoutError. */
function isTimeout(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'TimeoutError';
}

/** Configuration for the backend HTTP client */
export interface BackendClientConfig {
  /** Base URL of the backend API (e.g. "https://census.example.org/api") */
  baseUrl: string;
  /** Per-request I/O timeout */
  requestTimeoutMs?: number;
  /** Optional custom fetch implementation (useful for testing) */
  fetch?: typeof globalThis.fetch;
}

/** A response the backend actually sent, whatever its status. */
export interface BackendResponse {
  status: number;
  ok: boolean;
  body: string;
}

interface SendOptions {
  method: 'GET' | 'POST';
  body?: string | FormData;
  json?: boolean;
  token?: string;
}

/**
 * Thin HTTP client for the census backend.
 *
 * Returns every answered request as `Ok`, leaving status handling to the
 * caller. Connectivity loss and timeouts come back as `TransferError`.
 */
export class BackendClient {
  readonly baseUrl: string;
  private readonly requestTimeoutMs: number;
  private readonly _fetch: typeof globalThis.fetch;

  constructor(config: BackendClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.requestTimeoutMs = config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this._fetch = config.fetch ?? globalThis.fetch.bind(globalThis);
  }

  postJson(path: string, payload: unknown, token?: string): Promise<Result<BackendResponse, TransferError>> {
    return this.send(path, { method: 'POST', body: JSON.stringify(payload), json: true, token });
  }

  /** The multipart boundary header is left to fetch. */
  postMultipart(path: string, form: FormData, token: string): Promise<Result<BackendResponse, TransferError>> {
    return this.send(path, { method: 'POST', body: form, token });
  }

  get(path: string, token?: string): Promise<Result<BackendResponse, TransferError>> {
    return this.send(path, { method: 'GET', token });
  }

  private async send(path: string, options: SendOptions): Promise<Result<BackendResponse, TransferError>> {
    const url = `${this.baseUrl}${path}`;
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (options.json) headers['Content-Type'] = 'application/json';
    if (options.token) headers.Authorization = `Bearer ${options.token}`;

    try {
      const response = await this._fetch(url, {
        method: options.method,
        headers,
        body: options.body,
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
      const body = await response.text();
      return Ok({ status: response.status, ok: response.ok, body });
    } catch (error) {
      const cause = toError(error);
      if (isTimeout(error)) {
        return Err(
          new TransferError(`${options.method} ${path} timed out after ${this.requestTimeoutMs}ms`, { cause }),
        );
      }
      return Err(new TransferError(`${options.method} ${path} failed: ${cause.message}`, { cause }));
    }
  }
}
