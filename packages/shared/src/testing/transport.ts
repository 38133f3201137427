import type {
  BatchTransport,
  ItemEnumerator,
  ItemOutcome,
  ListItemsOptions,
} from '../types/transport.js';
import type { SyncOperation } from '../types/sync.js';

/**
 * Decides the error (if any) for one call on an item. `attempt` counts every
 * call that reached the item, batch part or single request, starting at 1.
 */
export type FakeItemError = (itemId: string, attempt: number) => unknown;

/**
 * In-process BatchTransport. Succeeds with `{ id, operation }` unless told
 * otherwise, and records every call for assertions.
 */
export class FakeBatchTransport implements BatchTransport {
  readonly batchCalls: string[][] = [];
  readonly singleCalls: string[] = [];
  /** Error for an item on a given attempt (undefined = success) */
  itemError: FakeItemError = () => undefined;
  /** Error for a whole batch call, by 1-based call number (undefined = success) */
  batchError: (call: number) => unknown = () => undefined;
  /** Items whose batch part is left out of the response */
  readonly missingParts = new Set<string>();
  /** Every call (batch or single) fails with this error while the count lasts */
  private outage: { remaining: number; error: unknown } | null = null;
  private readonly attempts = new Map<string, number>();

  failNextCalls(count: number, error: unknown): void {
    this.outage = { remaining: count, error };
  }

  attemptsFor(itemId: string): number {
    return this.attempts.get(itemId) ?? 0;
  }

  async executeBatch(operation: SyncOperation, itemIds: readonly string[]): Promise<Map<string, ItemOutcome>> {
    this.batchCalls.push([...itemIds]);
    this.takeOutage();
    const batchError = this.batchError(this.batchCalls.length);
    if (batchError !== undefined) throw batchError;

    const outcomes = new Map<string, ItemOutcome>();
    for (const itemId of itemIds) {
      if (this.missingParts.has(itemId)) continue;
      const error = this.itemError(itemId, this.nextAttempt(itemId));
      outcomes.set(itemId, error === undefined ? { ok: true, payload: { id: itemId, operation } } : { ok: false, error });
    }
    return outcomes;
  }

  async executeOne(operation: SyncOperation, itemId: string): Promise<unknown> {
    this.singleCalls.push(itemId);
    this.takeOutage();
    const error = this.itemError(itemId, this.nextAttempt(itemId));
    if (error !== undefined) throw error;
    return { id: itemId, operation };
  }

  private nextAttempt(itemId: string): number {
    const attempt = (this.attempts.get(itemId) ?? 0) + 1;
    this.attempts.set(itemId, attempt);
    return attempt;
  }

  private takeOutage(): void {
    if (!this.outage || this.outage.remaining <= 0) return;
    this.outage.remaining--;
    throw this.outage.error;
  }
}

/** Enumerator over a fixed ID list that honors maxItems. */
export function createStaticEnumerator(ids: readonly string[]): ItemEnumerator & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    async listItemIds(query: string, options: ListItemsOptions = {}) {
      calls.push(query);
      return ids.slice(0, options.maxItems ?? ids.length);
    },
  };
}
