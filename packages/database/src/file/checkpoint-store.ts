import { randomUUID } from 'node:crypto';
import { readdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import {
  CheckpointNotFoundError,
  errorMessage,
  isResumableState,
  newCheckpoint,
  nullLogger,
  selectForCleanup,
  toCompleted,
  toFailed,
  toInProgress,
  toInterrupted,
  withProgress,
  type CheckpointListFilter,
  type CheckpointRetention,
  type CheckpointStore,
  type CreateCheckpointOptions,
  type Logger,
  type SyncCheckpoint,
} from '@mailsync/shared';
import { KeyedMutex, isNotFound, readJson, writeJsonAtomic } from './json-file.js';
import { parseCheckpoint } from './schemas.js';

const CHECKPOINT_EXTENSION = '.json';
const SYNC_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * One JSON document per run at `<directory>/<syncId>.json`, replaced
 * atomically on every mutation. Mutations of the same run are serialized
 * in-process; the file on disk is the source of truth for each transition.
 */
export class FileCheckpointStore implements CheckpointStore {
  private readonly mutex = new KeyedMutex();
  private readonly log: Logger;

  constructor(
    private readonly directory: string,
    logger: Logger = nullLogger,
  ) {
    this.log = logger.child({ component: 'file-checkpoint-store' });
  }

  async create(query: string, totalItems: number, options?: CreateCheckpointOptions): Promise<SyncCheckpoint> {
    const checkpoint = newCheckpoint(randomUUID(), query, totalItems, options);
    await this.mutex.run(checkpoint.syncId, () => this.write(checkpoint));
    this.log.info('checkpoint_created', { syncId: checkpoint.syncId, totalItems });
    return checkpoint;
  }

  async load(syncId: string): Promise<SyncCheckpoint | null> {
    const raw = await readJson(this.pathFor(syncId));
    return raw === null ? null : parseCheckpoint(raw);
  }

  markInProgress(checkpoint: SyncCheckpoint, totalItems?: number): Promise<SyncCheckpoint> {
    return this.mutate(checkpoint, (current) => toInProgress(current, totalItems));
  }

  async updateProgress(
    checkpoint: SyncCheckpoint,
    processedDelta: number,
    lastItemId?: string,
    failedIds?: readonly string[],
  ): Promise<SyncCheckpoint> {
    const updated = await this.mutate(checkpoint, (current) =>
      withProgress(current, processedDelta, lastItemId, failedIds),
    );
    this.log.debug('checkpoint_saved', {
      syncId: updated.syncId,
      processedItems: updated.processedItems,
      lastItemId: updated.lastItemId,
    });
    return updated;
  }

  markCompleted(checkpoint: SyncCheckpoint): Promise<SyncCheckpoint> {
    return this.mutate(checkpoint, toCompleted);
  }

  markFailed(checkpoint: SyncCheckpoint, error: string): Promise<SyncCheckpoint> {
    return this.mutate(checkpoint, (current) => toFailed(current, error));
  }

  markInterrupted(checkpoint: SyncCheckpoint): Promise<SyncCheckpoint> {
    return this.mutate(checkpoint, toInterrupted);
  }

  async getLatestResumable(query: string): Promise<SyncCheckpoint | null> {
    const candidates = (await this.readAll()).filter(
      (cp) => cp.query === query && isResumableState(cp.state),
    );
    return candidates[0] ?? null;
  }

  async list(filter: CheckpointListFilter = {}): Promise<SyncCheckpoint[]> {
    return (await this.readAll()).filter(
      (cp) =>
        (filter.state === undefined || cp.state === filter.state) &&
        (filter.query === undefined || cp.query === filter.query),
    );
  }

  async delete(syncId: string): Promise<boolean> {
    return this.mutex.run(syncId, async () => {
      const path = this.pathFor(syncId);
      const existed = (await readJson(path)) !== null;
      await rm(path, { force: true });
      return existed;
    });
  }

  async cleanup(retention: CheckpointRetention): Promise<number> {
    const ids = selectForCleanup(await this.readAll(), retention.keepCompleted, retention.keepFailed);
    let removed = 0;
    for (const syncId of ids) {
      if (await this.delete(syncId)) removed++;
    }
    this.log.info('checkpoints_cleaned_up', { removed, keepCompleted: retention.keepCompleted, keepFailed: retention.keepFailed });
    return removed;
  }

  private mutate(
    checkpoint: SyncCheckpoint,
    apply: (current: SyncCheckpoint) => SyncCheckpoint,
  ): Promise<SyncCheckpoint> {
    return this.mutex.run(checkpoint.syncId, async () => {
      const current = await this.load(checkpoint.syncId);
      if (!current) throw new CheckpointNotFoundError(checkpoint.syncId);
      const next = apply(current);
      await this.write(next);
      return next;
    });
  }

  private async write(checkpoint: SyncCheckpoint): Promise<void> {
    await writeJsonAtomic(this.pathFor(checkpoint.syncId), checkpoint);
  }

  /** Every readable checkpoint, newest updatedAt first. Unreadable files are skipped. */
  private async readAll(): Promise<SyncCheckpoint[]> {
    let names: string[];
    try {
      names = await readdir(this.directory);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }

    const checkpoints: SyncCheckpoint[] = [];
    for (const name of names) {
      if (!name.endsWith(CHECKPOINT_EXTENSION)) continue;
      const syncId = name.slice(0, -CHECKPOINT_EXTENSION.length);
      try {
        const checkpoint = await this.load(syncId);
        if (checkpoint) checkpoints.push(checkpoint);
      } catch (error) {
        this.log.warn('checkpoint_unreadable', { file: name, error: errorMessage(error) });
      }
    }
    return checkpoints.sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime());
  }

  private pathFor(syncId: string): string {
    if (!SYNC_ID_PATTERN.test(syncId)) {
      throw new RangeError(`Invalid syncId: ${syncId}`);
    }
    return join(this.directory, syncId + CHECKPOINT_EXTENSION);
  }
}
