import type {
  DeadLetterEntry,
  DeadLetterFilter,
  DeadLetterStats,
  RecordDeadLetterInput,
} from '../types/stores.js';
import { capErrorMessage } from './logger.js';

export function deadLetterKey(itemId: string, operation: string): string {
  return `${operation}:${itemId}`;
}

/**
 * Fold a new failure into the existing entry for (itemId, operation):
 * the first failure creates it, later ones bump attemptCount and refresh
 * the error details.
 */
export function mergeDeadLetter(
  existing: DeadLetterEntry | undefined,
  input: RecordDeadLetterInput,
  now = new Date(),
): DeadLetterEntry {
  const errorMessage = capErrorMessage(input.errorMessage);
  if (!existing) {
    return {
      itemId: input.itemId,
      operation: input.operation,
      errorCategory: input.errorCategory,
      errorMessage,
      attemptCount: 1,
      firstSeenAt: now,
      lastSeenAt: now,
      syncId: input.syncId,
    };
  }
  return {
    ...existing,
    errorCategory: input.errorCategory,
    errorMessage,
    attemptCount: existing.attemptCount + 1,
    lastSeenAt: now,
    syncId: input.syncId ?? existing.syncId,
  };
}

export function matchesDeadLetterFilter(entry: DeadLetterEntry, filter: DeadLetterFilter = {}): boolean {
  if (filter.itemId !== undefined && entry.itemId !== filter.itemId) return false;
  if (filter.operation !== undefined && entry.operation !== filter.operation) return false;
  if (filter.errorCategory !== undefined && entry.errorCategory !== filter.errorCategory) return false;
  if (filter.syncId !== undefined && entry.syncId !== filter.syncId) return false;
  return true;
}

/** Filtered entries, newest lastSeenAt first, truncated to filter.limit. */
export function selectDeadLetters(
  entries: Iterable<DeadLetterEntry>,
  filter: DeadLetterFilter = {},
): DeadLetterEntry[] {
  const selected = [...entries]
    .filter((entry) => matchesDeadLetterFilter(entry, filter))
    .sort((a, b) => b.lastSeenAt.getTime() - a.lastSeenAt.getTime());
  return filter.limit !== undefined ? selected.slice(0, Math.max(0, filter.limit)) : selected;
}

export function summarizeDeadLetters(entries: Iterable<DeadLetterEntry>): DeadLetterStats {
  const stats: DeadLetterStats = { total: 0, byOperation: {}, byCategory: {} };
  for (const entry of entries) {
    stats.total++;
    stats.byOperation[entry.operation] = (stats.byOperation[entry.operation] ?? 0) + 1;
    stats.byCategory[entry.errorCategory] = (stats.byCategory[entry.errorCategory] ?? 0) + 1;
  }
  return stats;
}
