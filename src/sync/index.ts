/**
 * Sync layer: chunked record export, post-export cleanup and reference
 * table resynchronization against the census backend.
 */

export { FieldSyncService } from './service.js';
export type { FieldSyncServiceOptions, ExportRequest, SyncStatusReport } from './service.js';
export {
  ExportCoordinator,
  taxpayerSource,
  parcelSource,
  exportOutcome,
} from './export.js';
export type { ExportSource, ExportSummary, ExportOutcome, ExportOptions } from './export.js';
export { ReferenceResynchronizer } from './reference.js';
export type { ReferenceSyncResult } from './reference.js';
export { RecordPurger } from './cleanup.js';
export type { PurgeResult, PurgeTarget } from './cleanup.js';
export { deleteAttachment } from './attachments.js';
export { transferChunk, buildChunkForm, filePartName, EXPORT_PATHS } from './transfer.js';
export type { ChunkItem, ChunkForm } from './transfer.js';
export {
  taxpayerToPayload,
  parcelToPayload,
  buildingToPayload,
  ownerToPayload,
  parseReferenceResponse,
} from './serialize.js';
export type { Payload, ParsedReferenceData } from './serialize.js';
export { BackendClient } from './client.js';
export type { BackendClientConfig, BackendResponse } from './client.js';
export { authenticate, extractToken, InMemoryCredentialStore, SharedCredentialStore } from './auth.js';
export type { CredentialStore } from './auth.js';
export { SyncGate, lockName, locksConflict } from './lock.js';
export type { SyncOperation } from './lock.js';
export {
  loadConfigFile,
  resolveSettings,
  credentialsFromEnv,
  parseCliArgs,
  FAILURE_POLICIES,
  DEFAULT_BASE_URL,
} from './config.js';
export type { SyncSettings, SettingsOverrides, FailurePolicy, Credentials, CliOptions } from './config.js';
export {
  SyncError,
  AuthenticationError,
  TransferError,
  LocalStorageError,
  AttachmentCleanupError,
  SyncBusyError,
} from './errors.js';
export type { AuthFailureReason, SessionProgress } from './errors.js';
export { Ok, Err } from './result.js';
export type { Result } from './result.js';
