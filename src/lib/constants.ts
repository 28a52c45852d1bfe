/**
 * Centralized constants for the mirror pipeline
 *
 * Magic numbers and configuration defaults shared across modules.
 */

// ============================================================================
// Retry Configuration
// ============================================================================

/** Default maximum number of attempts for network operations */
export const DEFAULT_MAX_ATTEMPTS = 3;

/** Default delay before the first retry in milliseconds */
export const DEFAULT_RETRY_DELAY_MS = 2000;

/** Upper bound for a single backoff delay */
export const DEFAULT_MAX_RETRY_DELAY_MS = 60_000;

// ============================================================================
// Timeouts
// ============================================================================

/** Timeout for HEAD requests used for change detection */
export const HEAD_TIMEOUT_MS = 10_000;

/** Time allowed for a GET request to answer with headers */
export const CONNECT_TIMEOUT_MS = 30_000;

/** Longest wait for the next chunk of a download body */
export const READ_IDLE_TIMEOUT_MS = 60_000;

// ============================================================================
// Columnar Batches
// ============================================================================

/** Default row threshold for flushing a batch into a segment */
export const DEFAULT_BATCH_ROWS = 250_000;

/** Default estimated-byte threshold for flushing a batch (256MB) */
export const DEFAULT_BATCH_BYTES = 256 * 1024 * 1024;

// ============================================================================
// Files and Paths
// ============================================================================

/** Default manifest file name */
export const MANIFEST_FILE = 'ol_sync_manifest.json';

/** Where the manifest is mirrored inside the dataset repository */
export const MANIFEST_REPO_PATH = `metadata/${MANIFEST_FILE}`;

/** Dataset branch holding copies of the raw dumps */
export const RAW_BACKUP_REVISION = 'backup/raw';

/** Default dataset repository */
export const DEFAULT_DATASET_ID = 'openlibrary/ol_dump';

/** Base URL of the Open Library bulk exports */
export const DEFAULT_BASE_URL = 'https://openlibrary.org/data';

/** Size of chunks read from local dump files (1MB) */
export const READ_CHUNK_SIZE = 1024 * 1024;
