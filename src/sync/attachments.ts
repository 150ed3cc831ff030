import { unlink } from 'node:fs/promises';
import { AttachmentCleanupError, toError } from './errors.js';
import { Err, Ok, type Result } from './result.js';

/** Whether a filesystem error means the path does not exist. */
export function isMissingFile(error: Error): boolean {
  return 'code' in error && error.code === 'ENOENT';
}

/**
 * Remove one attachment file from disk.
 * `Ok(true)` when the file was removed, `Ok(false)` when it was already gone.
 */
export async function deleteAttachment(path: string): Promise<Result<boolean, AttachmentCleanupError>> {
  try {
    await unlink(path);
    return Ok(true);
  } catch (error) {
    const cause = toError(error);
    if (isMissingFile(cause)) return Ok(false);
    return Err(new AttachmentCleanupError(path, cause));
  }
}
