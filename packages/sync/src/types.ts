import type {
  ErrorClassifier,
  ItemFailure,
  SyncOperation,
} from '@mailsync/shared';

export type {
  BatchTransport,
  ItemEnumerator,
  ItemOutcome,
  ListItemsOptions,
} from '@mailsync/shared';

export interface SinkContext {
  syncId: string;
  outputLocation?: string;
}

/**
 * Receives each successfully processed item. A sink that throws turns the
 * item into a permanent `sink_error` failure.
 */
export type ItemSink = (
  itemId: string,
  payload: unknown,
  operation: SyncOperation,
  context: SinkContext,
) => void | Promise<void>;

export interface BatchResult {
  requested: number;
  successful: number;
  failed: number;
  failures: Map<string, ItemFailure>;
  /** Items never settled because the upstream became unavailable, in request order */
  unattempted: string[];
  /** The circuit opened or a systemic failure outlasted the retries */
  aborted: boolean;
  batchCalls: number;
  sequentialCalls: number;
}

export interface BatchHooks {
  /** Throwing here fails the item with category `sink_error` */
  onSuccess?: (itemId: string, payload: unknown) => void | Promise<void>;
  onFailure?: (itemId: string, failure: ItemFailure) => void | Promise<void>;
  /** Called once per settled item after onSuccess/onFailure; errors propagate */
  onSettled?: (itemId: string, failure?: ItemFailure) => void | Promise<void>;
}

export interface BatchClientOptions {
  /** Items per upstream batch call (Gmail allows at most 100) */
  maxBatchSize: number;
  /** Rate-limit tokens charged per item */
  costPerItem: number;
  /** Retries per item on the sequential path */
  maxItemRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  retryJitterMs: number;
  classify: ErrorClassifier;
}

export interface SyncOrchestratorOptions {
  /** Persist progress after this many newly acknowledged items */
  checkpointEvery: number;
  /** Also persist when this much time has passed since the last write (0 = off) */
  checkpointIntervalMs: number;
  /** Times a run waits out an open circuit before interrupting */
  maxCircuitPauses: number;
  /** Circuit openings tolerated in one run before it is marked failed */
  maxReopenCycles: number;
  /** Upper bound on enumerated items */
  maxItems: number;
}

export interface SyncRunOptions {
  /** Continue the newest in_progress/interrupted checkpoint for the query */
  resume?: boolean;
  operation?: SyncOperation;
  outputLocation?: string;
  metadata?: Record<string, unknown>;
  /** Stops the run before the next chunk; the checkpoint is left interrupted */
  signal?: AbortSignal;
}
