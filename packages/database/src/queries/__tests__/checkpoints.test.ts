/**
 * Postgres checkpoint and dead-letter stores against a mocked pg pool.
 * Verifies the guarded single-statement writes and row mapping.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

const mockQueryFn = vi.fn(async (_sql: string, _params?: unknown[]) => ({ rows: [] as unknown[], rowCount: 0 }));

// Mock the pg module to prevent real database connections
vi.mock('pg', () => ({
  default: {
    Pool: class MockPool {
      query = mockQueryFn;

      async end() {}
    },
  },
}));

import { CheckpointNotFoundError, CheckpointStateError } from '@mailsync/shared';
import { createMockCheckpoint } from '@mailsync/shared/testing';
import { PgCheckpointStore } from '../checkpoints.js';
import { PgDeadLetterQueue } from '../dead-letters.js';

const createdAt = new Date('2024-01-01T00:00:00.000Z');

function checkpointRow(overrides: Record<string, unknown> = {}) {
  return {
    sync_id: '7f9c2ba4-e88f-4d2a-9b1c-0c5d2a6f1e11',
    query: 'in:inbox',
    state: 'in_progress',
    total_items: 250,
    processed_items: 50,
    last_item_id: 'msg-0050',
    failed_item_ids: [],
    output_location: null,
    metadata: { operation: 'fetch' },
    error_message: null,
    created_at: createdAt,
    updated_at: createdAt,
    ...overrides,
  };
}

function lastCall(): { sql: string; params: unknown[] } {
  const call = mockQueryFn.mock.calls[mockQueryFn.mock.calls.length - 1];
  return { sql: call?.[0] ?? '', params: call?.[1] ?? [] };
}

describe('PgCheckpointStore', () => {
  const store = new PgCheckpointStore();

  beforeEach(() => {
    mockQueryFn.mockReset();
    mockQueryFn.mockResolvedValue({ rows: [], rowCount: 0 });
  });

  it('maps a row to a checkpoint', async () => {
    mockQueryFn.mockResolvedValueOnce({ rows: [checkpointRow()], rowCount: 1 });

    const checkpoint = await store.load('7f9c2ba4-e88f-4d2a-9b1c-0c5d2a6f1e11');

    expect(checkpoint).toEqual({
      syncId: '7f9c2ba4-e88f-4d2a-9b1c-0c5d2a6f1e11',
      query: 'in:inbox',
      state: 'in_progress',
      totalItems: 250,
      processedItems: 50,
      lastItemId: 'msg-0050',
      failedItemIds: [],
      outputLocation: undefined,
      metadata: { operation: 'fetch' },
      errorMessage: undefined,
      createdAt,
      updatedAt: createdAt,
    });
  });

  it('creates checkpoints in the pending state', async () => {
    mockQueryFn.mockResolvedValueOnce({ rows: [checkpointRow({ state: 'pending', processed_items: 0, last_item_id: null })], rowCount: 1 });

    const checkpoint = await store.create('in:inbox', 250, { metadata: { operation: 'fetch' } });

    const { sql, params } = lastCall();
    expect(sql).toContain('INSERT INTO sync_checkpoints');
    expect(params.slice(1)).toEqual(['in:inbox', 250, null, '{"operation":"fetch"}']);
    expect(checkpoint.state).toBe('pending');
  });

  it('updates progress with one guarded statement', async () => {
    mockQueryFn.mockResolvedValueOnce({ rows: [checkpointRow({ processed_items: 100, last_item_id: 'msg-0100' })], rowCount: 1 });

    const updated = await store.updateProgress(
      createMockCheckpoint({ syncId: '7f9c2ba4-e88f-4d2a-9b1c-0c5d2a6f1e11' }),
      50,
      'msg-0100',
      ['msg-0037'],
    );

    expect(mockQueryFn).toHaveBeenCalledTimes(1);
    const { sql, params } = lastCall();
    expect(sql).toContain('UPDATE sync_checkpoints');
    expect(sql).toContain('state = ANY($2::text[])');
    expect(sql).toContain("GREATEST(NOW(), updated_at + INTERVAL '1 millisecond')");
    expect(params).toEqual(['7f9c2ba4-e88f-4d2a-9b1c-0c5d2a6f1e11', ['in_progress'], 50, 'msg-0100', ['msg-0037']]);
    expect(updated.processedItems).toBe(100);
  });

  it('raises CheckpointStateError when the guard rejects a terminal checkpoint', async () => {
    mockQueryFn
      .mockResolvedValueOnce({ rows: [], rowCount: 0 })
      .mockResolvedValueOnce({ rows: [checkpointRow({ state: 'completed' })], rowCount: 1 });

    await expect(
      store.markInterrupted(createMockCheckpoint({ syncId: '7f9c2ba4-e88f-4d2a-9b1c-0c5d2a6f1e11' })),
    ).rejects.toBeInstanceOf(CheckpointStateError);
  });

  it('raises CheckpointNotFoundError when the row is missing', async () => {
    await expect(
      store.markCompleted(createMockCheckpoint({ syncId: '0b6e9d3a-5c1f-4e8b-a2d7-9f4c3b2a1e00' })),
    ).rejects.toBeInstanceOf(CheckpointNotFoundError);
    expect(mockQueryFn).toHaveBeenCalledTimes(2);
  });

  it('treats a sync id that is not a uuid as missing without querying', async () => {
    expect(await store.load('sync-1')).toBeNull();
    expect(await store.delete('not-a-uuid')).toBe(false);
    await expect(store.markCompleted(createMockCheckpoint({ syncId: 'sync-1' }))).rejects.toBeInstanceOf(
      CheckpointNotFoundError,
    );
    expect(mockQueryFn).not.toHaveBeenCalled();
  });

  it('deletes a checkpoint by id', async () => {
    mockQueryFn.mockResolvedValueOnce({ rows: [], rowCount: 1 });

    expect(await store.delete('7F9C2BA4-E88F-4D2A-9B1C-0C5D2A6F1E11')).toBe(true);
    expect(lastCall().params).toEqual(['7F9C2BA4-E88F-4D2A-9B1C-0C5D2A6F1E11']);
  });

  it('stores the error message when marking failed', async () => {
    mockQueryFn.mockResolvedValueOnce({ rows: [checkpointRow({ state: 'failed', error_message: 'quota' })], rowCount: 1 });

    const failed = await store.markFailed(createMockCheckpoint({ syncId: '7f9c2ba4-e88f-4d2a-9b1c-0c5d2a6f1e11' }), 'quota');

    expect(lastCall().params).toEqual([expect.any(String), ['pending', 'in_progress', 'interrupted'], 'quota']);
    expect(failed.errorMessage).toBe('quota');
  });

  it('builds list filters as parameters', async () => {
    await store.list({ state: 'interrupted', query: 'in:inbox' });

    const { sql, params } = lastCall();
    expect(sql).toContain('WHERE state = $1 AND query = $2');
    expect(params).toEqual(['interrupted', 'in:inbox']);
  });

  it('returns the number of rows removed by cleanup', async () => {
    mockQueryFn.mockResolvedValueOnce({ rows: [], rowCount: 3 });

    expect(await store.cleanup({ keepCompleted: 5, keepFailed: 2 })).toBe(3);
    expect(lastCall().params).toEqual([5, 2]);
  });
});

describe('PgDeadLetterQueue', () => {
  const dlq = new PgDeadLetterQueue();

  beforeEach(() => {
    mockQueryFn.mockReset();
    mockQueryFn.mockResolvedValue({ rows: [], rowCount: 0 });
  });

  it('upserts on (item_id, operation)', async () => {
    mockQueryFn.mockResolvedValueOnce({
      rows: [{
        item_id: 'msg-0037',
        operation: 'fetch',
        error_category: 'invalid_request',
        error_message: 'Invalid id value',
        attempt_count: 2,
        first_seen_at: createdAt,
        last_seen_at: createdAt,
        sync_id: null,
      }],
      rowCount: 1,
    });

    const entry = await dlq.record({
      itemId: 'msg-0037',
      operation: 'fetch',
      errorCategory: 'invalid_request',
      errorMessage: 'Invalid id value',
    });

    const { sql, params } = lastCall();
    expect(sql).toContain('ON CONFLICT (item_id, operation) DO UPDATE');
    expect(sql).toContain('attempt_count = sync_dead_letters.attempt_count + 1');
    expect(params).toEqual(['msg-0037', 'fetch', 'invalid_request', 'Invalid id value', null]);
    expect(entry).toMatchObject({ itemId: 'msg-0037', attemptCount: 2, syncId: undefined });
  });

  it('filters, orders and limits listings', async () => {
    await dlq.listEntries({ operation: 'trash', limit: 10 });

    const { sql, params } = lastCall();
    expect(sql).toBe('SELECT * FROM sync_dead_letters WHERE operation = $1 ORDER BY last_seen_at DESC LIMIT $2');
    expect(params).toEqual(['trash', 10]);
  });

  it('clears a single item', async () => {
    mockQueryFn.mockResolvedValueOnce({ rows: [], rowCount: 2 });

    expect(await dlq.clear('msg-0001')).toBe(2);
    expect(lastCall()).toEqual({ sql: 'DELETE FROM sync_dead_letters WHERE item_id = $1', params: ['msg-0001'] });
  });

  it('aggregates stats', async () => {
    mockQueryFn.mockResolvedValueOnce({
      rows: [
        { operation: 'fetch', error_category: 'not_found', count: '3' },
        { operation: 'fetch', error_category: 'forbidden', count: '1' },
        { operation: 'trash', error_category: 'not_found', count: '2' },
      ],
      rowCount: 3,
    });

    expect(await dlq.stats()).toEqual({
      total: 6,
      byOperation: { fetch: 4, trash: 2 },
      byCategory: { not_found: 5, forbidden: 1 },
    });
  });
});
