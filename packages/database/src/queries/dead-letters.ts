import {
  capErrorMessage,
  nullLogger,
  type DeadLetterEntry,
  type DeadLetterFilter,
  type DeadLetterQueue,
  type DeadLetterStats,
  type ErrorCategory,
  type Logger,
  type RecordDeadLetterInput,
  type SyncOperation,
} from '@mailsync/shared';
import { query } from '../client.js';

interface DeadLetterRow {
  item_id: string;
  operation: SyncOperation;
  error_category: ErrorCategory;
  error_message: string;
  attempt_count: number;
  first_seen_at: Date;
  last_seen_at: Date;
  sync_id: string | null;
}

function mapRowToDeadLetter(row: DeadLetterRow): DeadLetterEntry {
  return {
    itemId: row.item_id,
    operation: row.operation,
    errorCategory: row.error_category,
    errorMessage: row.error_message,
    attemptCount: row.attempt_count,
    firstSeenAt: row.first_seen_at,
    lastSeenAt: row.last_seen_at,
    syncId: row.sync_id ?? undefined,
  };
}

function buildWhere(filter: DeadLetterFilter = {}): { where: string; values: unknown[] } {
  const conditions: string[] = [];
  const values: unknown[] = [];
  const add = (column: string, value: unknown) => {
    values.push(value);
    conditions.push(`${column} = $${values.length}`);
  };

  if (filter.itemId !== undefined) add('item_id', filter.itemId);
  if (filter.operation !== undefined) add('operation', filter.operation);
  if (filter.errorCategory !== undefined) add('error_category', filter.errorCategory);
  if (filter.syncId !== undefined) add('sync_id', filter.syncId);

  return {
    where: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '',
    values,
  };
}

/**
 * Postgres-backed dead-letter queue keyed by (item_id, operation).
 */
export class PgDeadLetterQueue implements DeadLetterQueue {
  private readonly log: Logger;

  constructor(logger: Logger = nullLogger) {
    this.log = logger.child({ component: 'pg-dead-letter-queue' });
  }

  async record(input: RecordDeadLetterInput): Promise<DeadLetterEntry> {
    const result = await query<DeadLetterRow>(
      `INSERT INTO sync_dead_letters (item_id, operation, error_category, error_message, sync_id)
       VALUES ($1, $2, $3, $4, $5)
       ON CONFLICT (item_id, operation) DO UPDATE SET
         attempt_count = sync_dead_letters.attempt_count + 1,
         error_category = EXCLUDED.error_category,
         error_message = EXCLUDED.error_message,
         sync_id = COALESCE(EXCLUDED.sync_id, sync_dead_letters.sync_id),
         last_seen_at = NOW()
       RETURNING *`,
      [input.itemId, input.operation, input.errorCategory, capErrorMessage(input.errorMessage), input.syncId ?? null],
    );
    const entry = mapRowToDeadLetter(result.rows[0]!);
    this.log.warn('dead_letter_recorded', {
      itemId: entry.itemId,
      operation: entry.operation,
      errorCategory: entry.errorCategory,
      attemptCount: entry.attemptCount,
    });
    return entry;
  }

  async listEntries(filter: DeadLetterFilter = {}): Promise<DeadLetterEntry[]> {
    const { where, values } = buildWhere(filter);
    let sql = `SELECT * FROM sync_dead_letters ${where} ORDER BY last_seen_at DESC`;
    if (filter.limit !== undefined) {
      values.push(Math.max(0, filter.limit));
      sql += ` LIMIT $${values.length}`;
    }
    const result = await query<DeadLetterRow>(sql, values);
    return result.rows.map(mapRowToDeadLetter);
  }

  async count(filter: DeadLetterFilter = {}): Promise<number> {
    const { where, values } = buildWhere(filter);
    const result = await query<{ count: string }>(
      `SELECT COUNT(*) AS count FROM sync_dead_letters ${where}`,
      values,
    );
    return parseInt(result.rows[0]?.count ?? '0', 10);
  }

  async clear(itemId: string, operation?: SyncOperation): Promise<number> {
    return this.purge({ itemId, operation });
  }

  async purge(filter: DeadLetterFilter = {}): Promise<number> {
    const { where, values } = buildWhere(filter);
    const result = await query(`DELETE FROM sync_dead_letters ${where}`, values);
    const removed = result.rowCount ?? 0;
    this.log.info('dead_letters_purged', { removed });
    return removed;
  }

  async stats(): Promise<DeadLetterStats> {
    const result = await query<{ operation: SyncOperation; error_category: ErrorCategory; count: string }>(
      `SELECT operation, error_category, COUNT(*) AS count
       FROM sync_dead_letters
       GROUP BY operation, error_category`,
    );

    const stats: DeadLetterStats = { total: 0, byOperation: {}, byCategory: {} };
    for (const row of result.rows) {
      const count = parseInt(row.count, 10);
      stats.total += count;
      stats.byOperation[row.operation] = (stats.byOperation[row.operation] ?? 0) + count;
      stats.byCategory[row.error_category] = (stats.byCategory[row.error_category] ?? 0) + count;
    }
    return stats;
  }
}
