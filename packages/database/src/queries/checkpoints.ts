import { randomUUID } from 'node:crypto';
import {
  CHECKPOINT_TRANSITIONS,
  CheckpointNotFoundError,
  CheckpointStateError,
  assertTransition,
  capErrorMessage,
  nullLogger,
  type CheckpointListFilter,
  type CheckpointRetention,
  type CheckpointStore,
  type CheckpointTransition,
  type CreateCheckpointOptions,
  type Logger,
  type SyncCheckpoint,
  type SyncState,
} from '@mailsync/shared';
import { query } from '../client.js';

// sync_id is a uuid column; anything else can only be a miss
const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

interface SyncCheckpointRow {
  sync_id: string;
  query: string;
  state: SyncState;
  total_items: number;
  processed_items: number;
  last_item_id: string | null;
  failed_item_ids: string[];
  output_location: string | null;
  metadata: Record<string, unknown> | null;
  error_message: string | null;
  created_at: Date;
  updated_at: Date;
}

function mapRowToCheckpoint(row: SyncCheckpointRow): SyncCheckpoint {
  return {
    syncId: row.sync_id,
    query: row.query,
    state: row.state,
    totalItems: row.total_items,
    processedItems: row.processed_items,
    lastItemId: row.last_item_id ?? undefined,
    failedItemIds: row.failed_item_ids,
    outputLocation: row.output_location ?? undefined,
    metadata: row.metadata ?? {},
    errorMessage: row.error_message ?? undefined,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

// updated_at must strictly advance even if two writes land in the same clock tick
const TOUCH_UPDATED_AT = `updated_at = GREATEST(NOW(), updated_at + INTERVAL '1 millisecond')`;

/**
 * Postgres-backed CheckpointStore. Every mutation is a single guarded
 * `UPDATE ... RETURNING`, so a checkpoint is never observed half-written and
 * terminal rows cannot be modified.
 */
export class PgCheckpointStore implements CheckpointStore {
  private readonly log: Logger;

  constructor(logger: Logger = nullLogger) {
    this.log = logger.child({ component: 'pg-checkpoint-store' });
  }

  async create(queryText: string, totalItems: number, options: CreateCheckpointOptions = {}): Promise<SyncCheckpoint> {
    if (!Number.isInteger(totalItems) || totalItems < 0) {
      throw new RangeError(`totalItems must be a non-negative integer, got ${totalItems}`);
    }
    const result = await query<SyncCheckpointRow>(
      `INSERT INTO sync_checkpoints (sync_id, query, state, total_items, output_location, metadata)
       VALUES ($1, $2, 'pending', $3, $4, $5)
       RETURNING *`,
      [randomUUID(), queryText, totalItems, options.outputLocation ?? null, JSON.stringify(options.metadata ?? {})],
    );
    const checkpoint = mapRowToCheckpoint(result.rows[0]!);
    this.log.info('checkpoint_created', { syncId: checkpoint.syncId, totalItems });
    return checkpoint;
  }

  async load(syncId: string): Promise<SyncCheckpoint | null> {
    if (!UUID_PATTERN.test(syncId)) return null;
    const result = await query<SyncCheckpointRow>(
      `SELECT * FROM sync_checkpoints WHERE sync_id = $1`,
      [syncId],
    );
    const row = result.rows[0];
    return row ? mapRowToCheckpoint(row) : null;
  }

  async markInProgress(checkpoint: SyncCheckpoint, totalItems?: number): Promise<SyncCheckpoint> {
    return this.transition(
      checkpoint,
      'in_progress',
      `state = 'in_progress', total_items = GREATEST(total_items, $3)`,
      [totalItems ?? 0],
    );
  }

  async updateProgress(
    checkpoint: SyncCheckpoint,
    processedDelta: number,
    lastItemId?: string,
    failedIds: readonly string[] = [],
  ): Promise<SyncCheckpoint> {
    if (!Number.isInteger(processedDelta) || processedDelta < 0) {
      throw new RangeError(`processedDelta must be a non-negative integer, got ${processedDelta}`);
    }
    const updated = await this.transition(
      checkpoint,
      'progress',
      `processed_items = processed_items + $3,
       total_items = GREATEST(total_items, processed_items + $3),
       last_item_id = COALESCE($4, last_item_id),
       failed_item_ids = ARRAY(
         SELECT id FROM unnest(failed_item_ids || $5::text[]) WITH ORDINALITY AS f(id, n)
         GROUP BY id ORDER BY MIN(n)
       )`,
      [processedDelta, lastItemId ?? null, [...failedIds]],
    );
    this.log.debug('checkpoint_saved', {
      syncId: updated.syncId,
      processedItems: updated.processedItems,
      lastItemId: updated.lastItemId,
    });
    return updated;
  }

  async markCompleted(checkpoint: SyncCheckpoint): Promise<SyncCheckpoint> {
    return this.transition(checkpoint, 'completed', `state = 'completed'`, []);
  }

  async markFailed(checkpoint: SyncCheckpoint, error: string): Promise<SyncCheckpoint> {
    return this.transition(checkpoint, 'failed', `state = 'failed', error_message = $3`, [capErrorMessage(error)]);
  }

  async markInterrupted(checkpoint: SyncCheckpoint): Promise<SyncCheckpoint> {
    return this.transition(checkpoint, 'interrupted', `state = 'interrupted'`, []);
  }

  async getLatestResumable(queryText: string): Promise<SyncCheckpoint | null> {
    const result = await query<SyncCheckpointRow>(
      `SELECT * FROM sync_checkpoints
       WHERE query = $1 AND state IN ('in_progress', 'interrupted')
       ORDER BY updated_at DESC
       LIMIT 1`,
      [queryText],
    );
    const row = result.rows[0];
    return row ? mapRowToCheckpoint(row) : null;
  }

  async list(filter: CheckpointListFilter = {}): Promise<SyncCheckpoint[]> {
    const conditions: string[] = [];
    const values: unknown[] = [];

    if (filter.state) {
      values.push(filter.state);
      conditions.push(`state = $${values.length}`);
    }
    if (filter.query !== undefined) {
      values.push(filter.query);
      conditions.push(`query = $${values.length}`);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const result = await query<SyncCheckpointRow>(
      `SELECT * FROM sync_checkpoints ${where} ORDER BY updated_at DESC`,
      values,
    );
    return result.rows.map(mapRowToCheckpoint);
  }

  async delete(syncId: string): Promise<boolean> {
    if (!UUID_PATTERN.test(syncId)) return false;
    const result = await query(`DELETE FROM sync_checkpoints WHERE sync_id = $1`, [syncId]);
    return (result.rowCount ?? 0) > 0;
  }

  async cleanup(retention: CheckpointRetention): Promise<number> {
    const result = await query(
      `DELETE FROM sync_checkpoints
       WHERE sync_id IN (
         SELECT sync_id FROM (
           SELECT sync_id, state,
                  ROW_NUMBER() OVER (PARTITION BY state ORDER BY updated_at DESC) AS rn
           FROM sync_checkpoints
           WHERE state IN ('completed', 'failed')
         ) ranked
         WHERE (state = 'completed' AND rn > $1) OR (state = 'failed' AND rn > $2)
       )`,
      [Math.max(0, retention.keepCompleted), Math.max(0, retention.keepFailed)],
    );
    const removed = result.rowCount ?? 0;
    this.log.info('checkpoints_cleaned_up', { removed, ...retention });
    return removed;
  }

  /**
   * Apply `assignments` only if the row is in a state the transition allows.
   * $1 is the syncId, $2 the allowed states; extra params start at $3.
   */
  private async transition(
    checkpoint: SyncCheckpoint,
    action: CheckpointTransition,
    assignments: string,
    params: unknown[],
  ): Promise<SyncCheckpoint> {
    if (!UUID_PATTERN.test(checkpoint.syncId)) throw new CheckpointNotFoundError(checkpoint.syncId);
    const result = await query<SyncCheckpointRow>(
      `UPDATE sync_checkpoints
       SET ${assignments}, ${TOUCH_UPDATED_AT}
       WHERE sync_id = $1 AND state = ANY($2::text[])
       RETURNING *`,
      [checkpoint.syncId, [...CHECKPOINT_TRANSITIONS[action]], ...params],
    );

    const row = result.rows[0];
    if (row) return mapRowToCheckpoint(row);

    const current = await this.load(checkpoint.syncId);
    if (!current) throw new CheckpointNotFoundError(checkpoint.syncId);
    assertTransition(current, action);
    // State changed between the UPDATE and the SELECT
    throw new CheckpointStateError(current.syncId, current.state, action);
  }
}
