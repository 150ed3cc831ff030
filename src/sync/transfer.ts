/**
 * One export request per chunk: a multipart body whose `data` part is the
 * JSON array of payloads, followed by one `files_<localId>` part per
 * attachment that still exists on disk.
 */

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import type { EntityKind } from '../types.js';
import type { BackendClient } from './client.js';
import { AuthenticationError, TransferError, toError } from './errors.js';
import { isMissingFile } from './attachments.js';
import { Err, Ok, type Result } from './result.js';
import type { Payload } from './serialize.js';

export const EXPORT_PATHS: Record<EntityKind, string> = {
  taxpayer: '/contribuables/batch',
  parcel: '/parcelles/batch',
};

/** One record of a chunk, ready to send. */
export interface ChunkItem {
  localId: number;
  payload: Payload;
  attachments: string[];
}

export interface ChunkForm {
  form: FormData;
  /** Attachment paths that were attached as file parts. */
  attached: string[];
  /** Attachment paths that no longer exist and were left out. */
  missing: string[];
}

export function filePartName(localId: number): string {
  return `files_${localId}`;
}

/** Assemble the multipart body for a chunk. */
export async function buildChunkForm(items: ChunkItem[]): Promise<Result<ChunkForm, TransferError>> {
  const form = new FormData();
  const attached: string[] = [];
  const missing: string[] = [];

  try {
    form.append('data', JSON.stringify(items.map((item) => item.payload)));
  } catch (error) {
    return Err(new TransferError('Failed to serialize chunk payload', { cause: toError(error) }));
  }

  for (const item of items) {
    for (const path of item.attachments) {
      try {
        const content = await readFile(path);
        form.append(filePartName(item.localId), new Blob([new Uint8Array(content)]), basename(path));
        attached.push(path);
      } catch (error) {
        const cause = toError(error);
        if (isMissingFile(cause)) {
          missing.push(path);
          continue;
        }
        return Err(new TransferError(`Failed to read attachment ${path}: ${cause.message}`, { cause }));
      }
    }
  }

  return Ok({ form, attached, missing });
}

/**
 * Send one chunk. Any 2xx means the backend accepted every record in it.
 * A 401/403 means the session credential is no longer valid.
 */
export async function transferChunk(
  client: BackendClient,
  kind: EntityKind,
  items: ChunkItem[],
  token: string,
): Promise<Result<ChunkForm, TransferError | AuthenticationError>> {
  const built = await buildChunkForm(items);
  if (!built.ok) return built;

  const sent = await client.postMultipart(EXPORT_PATHS[kind], built.value.form, token);
  if (!sent.ok) return sent;

  const response = sent.value;
  if (response.status === 401 || response.status === 403) {
    return Err(new AuthenticationError(`Session rejected by the server (${response.status})`, 'expired'));
  }
  if (!response.ok) {
    const detail = response.body.trim();
    return Err(
      new TransferError(
        `Export failed with HTTP ${response.status}${detail ? `: ${detail.slice(0, 500)}` : ''}`,
        { status: response.status },
      ),
    );
  }

  return Ok(built.value);
}
