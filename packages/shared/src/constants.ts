// Gmail API limits
/** Maximum sub-requests per Gmail batch call */
export const GMAIL_MAX_BATCH_SIZE = 100;
/** Maximum page size accepted by users.messages.list */
export const GMAIL_LIST_PAGE_SIZE = 500;
export const GMAIL_DEFAULT_API_BASE_URL = 'https://gmail.googleapis.com';
/** Default timeout for a single Gmail HTTP request (batch or single-item) */
export const GMAIL_REQUEST_TIMEOUT_MS = 30_000;

// Batching and rate limiting
export const DEFAULT_BATCH_SIZE = GMAIL_MAX_BATCH_SIZE;
/** Sustained request rate per upstream target */
export const DEFAULT_RATE_PER_SECOND = 10;
export const DEFAULT_BURST_SIZE = 50;
/** Rate-limit tokens charged per item in a batch */
export const DEFAULT_COST_PER_ITEM = 1;

// Per-item retry on the sequential fallback path
export const DEFAULT_MAX_ITEM_RETRIES = 3;
export const DEFAULT_RETRY_BASE_DELAY_MS = 500;
export const DEFAULT_RETRY_MAX_DELAY_MS = 10_000;
export const DEFAULT_RETRY_JITTER_MS = 100;

// Circuit breaker
export const DEFAULT_BREAKER_FAILURE_THRESHOLD = 5;
export const DEFAULT_BREAKER_RECOVERY_TIMEOUT_MS = 60_000;
export const DEFAULT_BREAKER_SUCCESS_THRESHOLD = 2;
export const DEFAULT_BREAKER_HALF_OPEN_MAX_CALLS = 1;

// Orchestration
/** Persist progress after this many newly acknowledged items */
export const DEFAULT_CHECKPOINT_EVERY = 50;
/** Also persist after this long since the last write (0 = off) */
export const DEFAULT_CHECKPOINT_INTERVAL_MS = 0;
/**
 * How many times a run waits out an open circuit before giving up with an
 * interrupted (resumable) checkpoint. 0 = interrupt on the first open.
 */
export const DEFAULT_MAX_CIRCUIT_PAUSES = 0;
/** A run whose breaker opens more often than this is marked failed */
export const DEFAULT_MAX_REOPEN_CYCLES = 3;
/** Upper bound on the number of IDs enumerated for one run */
export const DEFAULT_MAX_ITEMS = 10_000;

// Stores
export const DEFAULT_STATE_DIR = 'data/sync';
export const DEFAULT_OUTPUT_DIR = 'data/messages';
export const CHECKPOINTS_DIR_NAME = 'checkpoints';
export const DEAD_LETTER_DIR_NAME = 'dead-letters';
export const DEFAULT_KEEP_COMPLETED = 10;
export const DEFAULT_KEEP_FAILED = 10;
