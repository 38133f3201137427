import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CheckpointNotFoundError, CheckpointStateError } from '@mailsync/shared';
import { createMockLogger } from '@mailsync/shared/testing';
import { FileCheckpointStore } from '../src/file/checkpoint-store.js';

describe('FileCheckpointStore', () => {
  let directory: string;
  let store: FileCheckpointStore;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'checkpoints-'));
    store = new FileCheckpointStore(directory);
  });

  afterEach(async () => {
    vi.useRealTimers();
    await rm(directory, { recursive: true, force: true });
  });

  /** Pin the wall clock so updatedAt ordering does not depend on test speed */
  function setClock(minute: number): void {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date(Date.UTC(2024, 0, 1, 0, minute)));
  }

  it('persists a created checkpoint as <syncId>.json', async () => {
    const checkpoint = await store.create('in:inbox', 250, { outputLocation: 'out', metadata: { operation: 'fetch' } });

    expect(await readdir(directory)).toEqual([`${checkpoint.syncId}.json`]);
    const raw = JSON.parse(await readFile(join(directory, `${checkpoint.syncId}.json`), 'utf8'));
    expect(raw).toMatchObject({ query: 'in:inbox', state: 'pending', totalItems: 250, outputLocation: 'out' });
    expect(await store.load(checkpoint.syncId)).toEqual(checkpoint);
  });

  it('records progress and survives a new store instance', async () => {
    let checkpoint = await store.create('in:inbox', 10);
    checkpoint = await store.markInProgress(checkpoint);
    checkpoint = await store.updateProgress(checkpoint, 4, 'msg-0004', ['msg-0002']);

    const reopened = new FileCheckpointStore(directory);
    expect(await reopened.load(checkpoint.syncId)).toMatchObject({
      state: 'in_progress',
      processedItems: 4,
      lastItemId: 'msg-0004',
      failedItemIds: ['msg-0002'],
    });
  });

  it('strictly advances updatedAt on every write', async () => {
    const created = await store.create('q', 3);
    const started = await store.markInProgress(created);
    const progressed = await store.updateProgress(started, 1, 'a');

    expect(started.updatedAt.getTime()).toBeGreaterThan(created.updatedAt.getTime());
    expect(progressed.updatedAt.getTime()).toBeGreaterThan(started.updatedAt.getTime());
  });

  it('serializes concurrent updates to the same run', async () => {
    const checkpoint = await store.markInProgress(await store.create('q', 100));

    await Promise.all(
      Array.from({ length: 10 }, (_, i) => store.updateProgress(checkpoint, 1, `msg-${i}`)),
    );

    expect((await store.load(checkpoint.syncId))?.processedItems).toBe(10);
  });

  it('ignores a stray temp file left by an interrupted write', async () => {
    const checkpoint = await store.updateProgress(await store.markInProgress(await store.create('q', 10)), 5, 'msg-5');
    await writeFile(join(directory, `${checkpoint.syncId}.json.stale-writer.tmp`), '{"syncId": "torn', 'utf8');

    expect(await store.load(checkpoint.syncId)).toEqual(checkpoint);
    expect(await store.list()).toEqual([checkpoint]);
  });

  it('rejects mutations of terminal checkpoints', async () => {
    const completed = await store.markCompleted(await store.markInProgress(await store.create('q', 0)));

    await expect(store.updateProgress(completed, 1)).rejects.toBeInstanceOf(CheckpointStateError);
    await expect(store.markInterrupted(completed)).rejects.toBeInstanceOf(CheckpointStateError);
    expect((await store.load(completed.syncId))?.state).toBe('completed');
  });

  it('throws CheckpointNotFoundError for unknown runs', async () => {
    const checkpoint = await store.create('q', 1);
    await store.delete(checkpoint.syncId);

    await expect(store.markInProgress(checkpoint)).rejects.toBeInstanceOf(CheckpointNotFoundError);
  });

  it('finds the newest resumable checkpoint for a query', async () => {
    setClock(0);
    const older = await store.markInterrupted(await store.markInProgress(await store.create('in:inbox', 5)));
    setClock(1);
    const newer = await store.markInProgress(await store.create('in:inbox', 5));
    setClock(2);
    await store.markInProgress(await store.create('label:work', 5));
    await store.markCompleted(await store.markInProgress(await store.create('in:inbox', 5)));

    const latest = await store.getLatestResumable('in:inbox');

    expect(latest?.syncId).toBe(newer.syncId);
    expect(latest?.syncId).not.toBe(older.syncId);
    expect(await store.getLatestResumable('is:starred')).toBeNull();
  });

  it('skips unreadable checkpoint files with a warning', async () => {
    const logger = createMockLogger();
    store = new FileCheckpointStore(directory, logger);
    const good = await store.create('q', 1);
    await writeFile(join(directory, 'corrupt.json'), 'not json', 'utf8');

    expect((await store.list()).map((cp) => cp.syncId)).toEqual([good.syncId]);
    expect(logger.hasLog('warn', 'checkpoint_unreadable')).toBe(true);
  });

  it('lists by state and query', async () => {
    const a = await store.markInProgress(await store.create('q1', 1));
    await store.create('q2', 1);

    expect((await store.list({ state: 'in_progress' })).map((cp) => cp.syncId)).toEqual([a.syncId]);
    expect(await store.list({ query: 'q3' })).toEqual([]);
  });

  it('cleanup keeps the newest terminal checkpoints and every resumable one', async () => {
    const finish = async (minute: number) => {
      setClock(minute);
      return store.markCompleted(await store.markInProgress(await store.create('q', 0)));
    };
    await finish(0);
    await finish(1);
    const newest = await finish(2);
    const resumable = await store.markInterrupted(await store.markInProgress(await store.create('q', 3)));

    const removed = await store.cleanup({ keepCompleted: 1, keepFailed: 0 });

    expect(removed).toBe(2);
    expect((await store.list()).map((cp) => cp.syncId).sort()).toEqual([newest.syncId, resumable.syncId].sort());
  });

  it('rejects syncIds that are not plain file names', async () => {
    await expect(store.load('../escape')).rejects.toBeInstanceOf(RangeError);
  });
});
