/**
 * Mock implementations for external services and dependencies.
 * These mocks let sync tests run without a filesystem, database or network.
 */

import { randomUUID } from 'node:crypto';
import { type Logger, type LogContext } from '../utils/logger.js';
import type {
  CheckpointListFilter,
  CheckpointRetention,
  CheckpointStore,
  CreateCheckpointOptions,
  DeadLetterEntry,
  DeadLetterFilter,
  DeadLetterQueue,
  DeadLetterStats,
  RecordDeadLetterInput,
  SyncCheckpoint,
  SyncOperation,
} from '../types/index.js';
import { CheckpointNotFoundError } from '../utils/errors.js';
import {
  newCheckpoint,
  selectForCleanup,
  toCompleted,
  toFailed,
  toInProgress,
  toInterrupted,
  withProgress,
} from '../utils/checkpoint.js';
import {
  deadLetterKey,
  matchesDeadLetterFilter,
  mergeDeadLetter,
  selectDeadLetters,
  summarizeDeadLetters,
} from '../utils/dead-letter.js';

/**
 * Create a mock logger that captures log calls for assertions.
 * Useful for testing that components log the expected messages.
 */
export interface CapturedLog {
  level: 'debug' | 'info' | 'warn' | 'error' | 'fatal';
  message: string;
  data?: Record<string, unknown>;
  error?: Error | unknown;
}

export interface MockLogger extends Logger {
  logs: CapturedLog[];
  hasLog(level: CapturedLog['level'], messagePattern: string | RegExp): boolean;
}

/** Children share the parent's `logs` array and inherit its context. */
export function createMockLogger(logs: CapturedLog[] = [], context: LogContext = {}): MockLogger {
  const capture = (entry: CapturedLog) => logs.push(entry);

  return {
    logs,

    debug(msg: string, data?: Record<string, unknown>): void {
      capture({ level: 'debug', message: msg, data: { ...context, ...data } });
    },

    info(msg: string, data?: Record<string, unknown>): void {
      capture({ level: 'info', message: msg, data: { ...context, ...data } });
    },

    warn(msg: string, data?: Record<string, unknown>): void {
      capture({ level: 'warn', message: msg, data: { ...context, ...data } });
    },

    error(msg: string, error?: Error | unknown, data?: Record<string, unknown>): void {
      capture({ level: 'error', message: msg, error, data: { ...context, ...data } });
    },

    fatal(msg: string, error?: Error | unknown, data?: Record<string, unknown>): void {
      capture({ level: 'fatal', message: msg, error, data: { ...context, ...data } });
    },

    child(childContext: LogContext): MockLogger {
      return createMockLogger(logs, { ...context, ...childContext });
    },

    hasLog(level: CapturedLog['level'], messagePattern: string | RegExp): boolean {
      return logs.some(log => {
        if (log.level !== level) return false;
        if (typeof messagePattern === 'string') {
          return log.message.includes(messagePattern);
        }
        return messagePattern.test(log.message);
      });
    },
  };
}

/**
 * In-memory CheckpointStore with the same transition rules as the durable
 * backends. `writes` records every persisted checkpoint in order.
 */
export interface InMemoryCheckpointStore extends CheckpointStore {
  writes: SyncCheckpoint[];
  /** Make the next N mutating calls reject with the given error */
  failNextWrites(count: number, error?: Error): void;
}

export function createInMemoryCheckpointStore(): InMemoryCheckpointStore {
  const checkpoints = new Map<string, SyncCheckpoint>();
  const writes: SyncCheckpoint[] = [];
  let failuresLeft = 0;
  let failure = new Error('checkpoint write failed');

  const persist = (checkpoint: SyncCheckpoint): SyncCheckpoint => {
    if (failuresLeft > 0) {
      failuresLeft--;
      throw failure;
    }
    checkpoints.set(checkpoint.syncId, checkpoint);
    writes.push(checkpoint);
    return { ...checkpoint, failedItemIds: [...checkpoint.failedItemIds] };
  };

  const current = (checkpoint: SyncCheckpoint): SyncCheckpoint => {
    const stored = checkpoints.get(checkpoint.syncId);
    if (!stored) throw new CheckpointNotFoundError(checkpoint.syncId);
    return stored;
  };

  return {
    writes,

    failNextWrites(count: number, error?: Error): void {
      failuresLeft = count;
      if (error) failure = error;
    },

    async create(query: string, totalItems: number, options?: CreateCheckpointOptions) {
      return persist(newCheckpoint(randomUUID(), query, totalItems, options));
    },

    async load(syncId: string) {
      return checkpoints.get(syncId) ?? null;
    },

    async markInProgress(checkpoint: SyncCheckpoint, totalItems?: number) {
      return persist(toInProgress(current(checkpoint), totalItems));
    },

    async updateProgress(checkpoint, processedDelta, lastItemId, failedIds) {
      return persist(withProgress(current(checkpoint), processedDelta, lastItemId, failedIds));
    },

    async markCompleted(checkpoint: SyncCheckpoint) {
      return persist(toCompleted(current(checkpoint)));
    },

    async markFailed(checkpoint: SyncCheckpoint, error: string) {
      return persist(toFailed(current(checkpoint), error));
    },

    async markInterrupted(checkpoint: SyncCheckpoint) {
      return persist(toInterrupted(current(checkpoint)));
    },

    async getLatestResumable(query: string) {
      const resumable = [...checkpoints.values()]
        .filter((cp) => cp.query === query && (cp.state === 'in_progress' || cp.state === 'interrupted'))
        .sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime());
      return resumable[0] ?? null;
    },

    async list(filter: CheckpointListFilter = {}) {
      return [...checkpoints.values()]
        .filter((cp) => (filter.state === undefined || cp.state === filter.state)
          && (filter.query === undefined || cp.query === filter.query))
        .sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime());
    },

    async delete(syncId: string) {
      return checkpoints.delete(syncId);
    },

    async cleanup(retention: CheckpointRetention) {
      const ids = selectForCleanup([...checkpoints.values()], retention.keepCompleted, retention.keepFailed);
      for (const id of ids) checkpoints.delete(id);
      return ids.length;
    },
  };
}

export interface InMemoryDeadLetterQueue extends DeadLetterQueue {
  entries: Map<string, DeadLetterEntry>;
}

export function createInMemoryDeadLetterQueue(): InMemoryDeadLetterQueue {
  const entries = new Map<string, DeadLetterEntry>();

  return {
    entries,

    async record(input: RecordDeadLetterInput) {
      const key = deadLetterKey(input.itemId, input.operation);
      const entry = mergeDeadLetter(entries.get(key), input);
      entries.set(key, entry);
      return entry;
    },

    async listEntries(filter?: DeadLetterFilter) {
      return selectDeadLetters(entries.values(), filter);
    },

    async count(filter?: DeadLetterFilter) {
      return selectDeadLetters(entries.values(), { ...filter, limit: undefined }).length;
    },

    async clear(itemId: string, operation?: SyncOperation) {
      let removed = 0;
      for (const [key, entry] of entries) {
        if (entry.itemId === itemId && (operation === undefined || entry.operation === operation)) {
          entries.delete(key);
          removed++;
        }
      }
      return removed;
    },

    async purge(filter?: DeadLetterFilter) {
      let removed = 0;
      for (const [key, entry] of entries) {
        if (matchesDeadLetterFilter(entry, filter)) {
          entries.delete(key);
          removed++;
        }
      }
      return removed;
    },

    async stats(): Promise<DeadLetterStats> {
      return summarizeDeadLetters(entries.values());
    },
  };
}
