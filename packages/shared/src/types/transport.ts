import type { SyncOperation } from './sync.js';

/** Result of one item inside a batch call */
export type ItemOutcome =
  | { ok: true; payload: unknown }
  | { ok: false; error: unknown };

export interface ListItemsOptions {
  /** Stop enumerating after this many IDs */
  maxItems?: number;
  signal?: AbortSignal;
}

/**
 * Produces the bounded, ordered list of item IDs a run will process.
 * The order must be stable for cursor-based resume to skip the right prefix.
 */
export interface ItemEnumerator {
  listItemIds(query: string, options?: ListItemsOptions): Promise<string[]>;
}

/**
 * Upstream calls for one operation. executeBatch returns an outcome per ID it
 * got a response for; IDs missing from the map are treated as unanswered.
 * A thrown error means the whole call failed.
 */
export interface BatchTransport {
  executeBatch(operation: SyncOperation, itemIds: readonly string[]): Promise<Map<string, ItemOutcome>>;
  executeOne(operation: SyncOperation, itemId: string): Promise<unknown>;
}
