import type { CreateCheckpointOptions, SyncCheckpoint, SyncState } from '../types/sync.js';
import { CheckpointStateError } from './errors.js';
import { capErrorMessage } from './logger.js';

/**
 * Pure checkpoint transitions shared by every CheckpointStore backend.
 * Each returns a new checkpoint; the caller persists it atomically.
 */

export type CheckpointTransition = 'in_progress' | 'progress' | 'completed' | 'interrupted' | 'failed';

/** States each transition may start from */
export const CHECKPOINT_TRANSITIONS: Record<CheckpointTransition, readonly SyncState[]> = {
  in_progress: ['pending', 'in_progress', 'interrupted'],
  progress: ['in_progress'],
  completed: ['pending', 'in_progress'],
  interrupted: ['pending', 'in_progress', 'interrupted'],
  failed: ['pending', 'in_progress', 'interrupted'],
};

/** Next updatedAt: now, but always strictly after the previous write. */
export function nextUpdatedAt(previous: Date, now = new Date()): Date {
  return new Date(Math.max(now.getTime(), previous.getTime() + 1));
}

export function assertTransition(checkpoint: SyncCheckpoint, action: CheckpointTransition): void {
  if (!CHECKPOINT_TRANSITIONS[action].includes(checkpoint.state)) {
    throw new CheckpointStateError(checkpoint.syncId, checkpoint.state, action === 'progress' ? 'update progress of' : `mark ${action}`);
  }
}

export function newCheckpoint(
  syncId: string,
  query: string,
  totalItems: number,
  options: CreateCheckpointOptions = {},
  now = new Date(),
): SyncCheckpoint {
  if (!Number.isInteger(totalItems) || totalItems < 0) {
    throw new RangeError(`totalItems must be a non-negative integer, got ${totalItems}`);
  }
  return {
    syncId,
    query,
    state: 'pending',
    totalItems,
    processedItems: 0,
    failedItemIds: [],
    outputLocation: options.outputLocation,
    metadata: { ...options.metadata },
    createdAt: now,
    updatedAt: now,
  };
}

export function toInProgress(checkpoint: SyncCheckpoint, totalItems?: number): SyncCheckpoint {
  assertTransition(checkpoint, 'in_progress');
  return {
    ...checkpoint,
    state: 'in_progress',
    totalItems: Math.max(checkpoint.totalItems, totalItems ?? 0),
    updatedAt: nextUpdatedAt(checkpoint.updatedAt),
  };
}

export function withProgress(
  checkpoint: SyncCheckpoint,
  processedDelta: number,
  lastItemId?: string,
  failedIds: readonly string[] = [],
): SyncCheckpoint {
  if (!Number.isInteger(processedDelta) || processedDelta < 0) {
    throw new RangeError(`processedDelta must be a non-negative integer, got ${processedDelta}`);
  }
  assertTransition(checkpoint, 'progress');

  const processedItems = checkpoint.processedItems + processedDelta;
  const failed = new Set(checkpoint.failedItemIds);
  for (const id of failedIds) failed.add(id);

  return {
    ...checkpoint,
    processedItems,
    totalItems: Math.max(checkpoint.totalItems, processedItems),
    lastItemId: lastItemId ?? checkpoint.lastItemId,
    failedItemIds: [...failed],
    updatedAt: nextUpdatedAt(checkpoint.updatedAt),
  };
}

export function toCompleted(checkpoint: SyncCheckpoint): SyncCheckpoint {
  assertTransition(checkpoint, 'completed');
  return { ...checkpoint, state: 'completed', updatedAt: nextUpdatedAt(checkpoint.updatedAt) };
}

export function toInterrupted(checkpoint: SyncCheckpoint): SyncCheckpoint {
  assertTransition(checkpoint, 'interrupted');
  return { ...checkpoint, state: 'interrupted', updatedAt: nextUpdatedAt(checkpoint.updatedAt) };
}

export function toFailed(checkpoint: SyncCheckpoint, error: string): SyncCheckpoint {
  assertTransition(checkpoint, 'failed');
  return {
    ...checkpoint,
    state: 'failed',
    errorMessage: capErrorMessage(error),
    updatedAt: nextUpdatedAt(checkpoint.updatedAt),
  };
}

/**
 * IDs of checkpoints a retention policy removes: all but the newest
 * `keepCompleted` completed and `keepFailed` failed runs. Resumable
 * checkpoints are never selected.
 */
export function selectForCleanup(
  checkpoints: readonly SyncCheckpoint[],
  keepCompleted: number,
  keepFailed: number,
): string[] {
  const newestFirst = [...checkpoints].sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime());
  const completed = newestFirst.filter((cp) => cp.state === 'completed');
  const failed = newestFirst.filter((cp) => cp.state === 'failed');
  return [
    ...completed.slice(Math.max(0, keepCompleted)),
    ...failed.slice(Math.max(0, keepFailed)),
  ].map((cp) => cp.syncId);
}
