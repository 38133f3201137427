import type { ErrorCategory } from './errors.js';
import type {
  CreateCheckpointOptions,
  SyncCheckpoint,
  SyncOperation,
  SyncState,
} from './sync.js';

export interface DeadLetterEntry {
  itemId: string;
  operation: SyncOperation;
  errorCategory: ErrorCategory;
  errorMessage: string;
  attemptCount: number;
  firstSeenAt: Date;
  lastSeenAt: Date;
  /** Run that last recorded this failure */
  syncId?: string;
}

export interface RecordDeadLetterInput {
  itemId: string;
  operation: SyncOperation;
  errorCategory: ErrorCategory;
  errorMessage: string;
  syncId?: string;
}

export interface DeadLetterFilter {
  itemId?: string;
  operation?: SyncOperation;
  errorCategory?: ErrorCategory;
  syncId?: string;
  limit?: number;
}

export interface DeadLetterStats {
  total: number;
  byOperation: Partial<Record<SyncOperation, number>>;
  byCategory: Partial<Record<ErrorCategory, number>>;
}

/**
 * Durable record of items that exhausted their retries.
 * Entries are keyed by (itemId, operation) and only leave the queue
 * through clear() or purge().
 */
export interface DeadLetterQueue {
  record(input: RecordDeadLetterInput): Promise<DeadLetterEntry>;
  listEntries(filter?: DeadLetterFilter): Promise<DeadLetterEntry[]>;
  count(filter?: DeadLetterFilter): Promise<number>;
  /** Removes the item's entries (all operations unless one is given). Returns the number removed. */
  clear(itemId: string, operation?: SyncOperation): Promise<number>;
  purge(filter?: DeadLetterFilter): Promise<number>;
  stats(): Promise<DeadLetterStats>;
}

export interface CheckpointListFilter {
  state?: SyncState;
  query?: string;
}

export interface CheckpointRetention {
  keepCompleted: number;
  keepFailed: number;
}

/**
 * Durable, atomically written progress record for sync runs.
 * Mutators return the persisted checkpoint and reject terminal ones.
 */
export interface CheckpointStore {
  create(query: string, totalItems: number, options?: CreateCheckpointOptions): Promise<SyncCheckpoint>;
  load(syncId: string): Promise<SyncCheckpoint | null>;
  markInProgress(checkpoint: SyncCheckpoint, totalItems?: number): Promise<SyncCheckpoint>;
  updateProgress(
    checkpoint: SyncCheckpoint,
    processedDelta: number,
    lastItemId?: string,
    failedIds?: readonly string[],
  ): Promise<SyncCheckpoint>;
  markCompleted(checkpoint: SyncCheckpoint): Promise<SyncCheckpoint>;
  markFailed(checkpoint: SyncCheckpoint, error: string): Promise<SyncCheckpoint>;
  markInterrupted(checkpoint: SyncCheckpoint): Promise<SyncCheckpoint>;
  /** Newest in_progress or interrupted checkpoint for the query */
  getLatestResumable(query: string): Promise<SyncCheckpoint | null>;
  list(filter?: CheckpointListFilter): Promise<SyncCheckpoint[]>;
  delete(syncId: string): Promise<boolean>;
  cleanup(retention: CheckpointRetention): Promise<number>;
}
