export type SyncState = 'pending' | 'in_progress' | 'completed' | 'failed' | 'interrupted';

export type SyncOperation = 'fetch' | 'trash' | 'delete' | 'mark_read';

export const SYNC_OPERATIONS: readonly SyncOperation[] = ['fetch', 'trash', 'delete', 'mark_read'];

export const TERMINAL_SYNC_STATES: readonly SyncState[] = ['completed', 'failed'];

export const RESUMABLE_SYNC_STATES: readonly SyncState[] = ['in_progress', 'interrupted'];

export interface SyncCheckpoint {
  syncId: string;
  /** Selection criteria for the item set (a Gmail search query) */
  query: string;
  state: SyncState;
  totalItems: number;
  /** Items acknowledged at or before lastItemId */
  processedItems: number;
  /** Resume cursor in enumeration order */
  lastItemId?: string;
  /** Items routed to the dead-letter queue during this run */
  failedItemIds: string[];
  outputLocation?: string;
  metadata: Record<string, unknown>;
  errorMessage?: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateCheckpointOptions {
  outputLocation?: string;
  metadata?: Record<string, unknown>;
}

export function isTerminalState(state: SyncState): boolean {
  return TERMINAL_SYNC_STATES.includes(state);
}

export function isResumableState(state: SyncState): boolean {
  return RESUMABLE_SYNC_STATES.includes(state);
}

export type CircuitState = 'closed' | 'open' | 'half_open';
