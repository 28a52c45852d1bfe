/**
 * Export Module - Dataset publication
 *
 * Uploads Parquet segments to a dataset store and commits the manifest
 * once the upload is durable. Raw dumps are kept on a backup revision.
 */

// Publisher
export { DatasetPublisher, artifactId, categoryPath } from './publisher.js';
export type { DatasetPublisherOptions, PublishRequest, PublishResult } from './publisher.js';

// Raw backups
export { RawBackup } from './backup.js';
export type { RawBackupOptions } from './backup.js';

// Stores
export {
  HuggingFaceCliStore,
  LocalDatasetStore,
  LOCAL_REVISIONS_DIR,
  commandFailure,
  globToRegExp,
} from './store.js';
export type {
  DatasetStore,
  UploadOptions,
  StoreDownloadOptions,
  HuggingFaceCliStoreOptions,
} from './store.js';
