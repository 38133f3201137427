import {
  CircuitOpenError,
  DEFAULT_BATCH_SIZE,
  DEFAULT_COST_PER_ITEM,
  DEFAULT_MAX_ITEM_RETRIES,
  DEFAULT_RETRY_BASE_DELAY_MS,
  DEFAULT_RETRY_JITTER_MS,
  DEFAULT_RETRY_MAX_DELAY_MS,
  GMAIL_MAX_BATCH_SIZE,
  defaultErrorClassifier,
  errorMessage,
  nullLogger,
  withRetry,
  type CircuitBreaker,
  type ItemFailure,
  type Logger,
  type SyncOperation,
  type TokenBucketRateLimiter,
} from '@mailsync/shared';
import type {
  BatchClientOptions,
  BatchHooks,
  BatchResult,
  BatchTransport,
  ItemOutcome,
} from './types.js';

export interface BatchClientDeps {
  transport: BatchTransport;
  rateLimiter: TokenBucketRateLimiter;
  circuitBreaker: CircuitBreaker;
}

const DEFAULT_OPTIONS: BatchClientOptions = {
  maxBatchSize: DEFAULT_BATCH_SIZE,
  costPerItem: DEFAULT_COST_PER_ITEM,
  maxItemRetries: DEFAULT_MAX_ITEM_RETRIES,
  retryBaseDelayMs: DEFAULT_RETRY_BASE_DELAY_MS,
  retryMaxDelayMs: DEFAULT_RETRY_MAX_DELAY_MS,
  retryJitterMs: DEFAULT_RETRY_JITTER_MS,
  classify: defaultErrorClassifier,
};

export function emptyBatchResult(requested = 0): BatchResult {
  return {
    requested,
    successful: 0,
    failed: 0,
    failures: new Map(),
    unattempted: [],
    aborted: false,
    batchCalls: 0,
    sequentialCalls: 0,
  };
}

/**
 * Sends item IDs to the upstream in bounded batch calls and reports a
 * per-item outcome.
 *
 * Every call is rate limited and guarded by the circuit breaker. Items the
 * batch call could not settle (the call failed, a part is missing, or the
 * part carries a retryable error) are retried one by one with backoff, and
 * both paths classify errors with the same classifier.
 */
export class BatchClient {
  readonly options: BatchClientOptions;
  private readonly transport: BatchTransport;
  private readonly limiter: TokenBucketRateLimiter;
  private readonly breaker: CircuitBreaker;
  private readonly log: Logger;

  constructor(deps: BatchClientDeps, options: Partial<BatchClientOptions> = {}, logger: Logger = nullLogger) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    const { maxBatchSize, costPerItem, maxItemRetries } = this.options;
    if (!Number.isInteger(maxBatchSize) || maxBatchSize < 1 || maxBatchSize > GMAIL_MAX_BATCH_SIZE) {
      throw new RangeError(`maxBatchSize must be between 1 and ${GMAIL_MAX_BATCH_SIZE}, got ${maxBatchSize}`);
    }
    if (!(costPerItem > 0)) throw new RangeError(`costPerItem must be positive, got ${costPerItem}`);
    if (!Number.isInteger(maxItemRetries) || maxItemRetries < 0) {
      throw new RangeError(`maxItemRetries must be a non-negative integer, got ${maxItemRetries}`);
    }

    this.transport = deps.transport;
    this.limiter = deps.rateLimiter;
    this.breaker = deps.circuitBreaker;
    this.log = logger.child({ component: 'batch-client' });
  }

  get circuitBreaker(): CircuitBreaker {
    return this.breaker;
  }

  async execute(itemIds: readonly string[], operation: SyncOperation, hooks: BatchHooks = {}): Promise<BatchResult> {
    const result = emptyBatchResult(itemIds.length);

    for (let offset = 0; offset < itemIds.length; offset += this.options.maxBatchSize) {
      const chunk = itemIds.slice(offset, offset + this.options.maxBatchSize);
      const aborted = await this.runChunk(chunk, operation, hooks, result);
      if (aborted) {
        result.unattempted.push(...itemIds.slice(offset + chunk.length));
        break;
      }
    }

    return result;
  }

  /** Returns true when the chunk was cut short and the caller should stop. */
  private async runChunk(
    chunk: readonly string[],
    operation: SyncOperation,
    hooks: BatchHooks,
    result: BatchResult,
  ): Promise<boolean> {
    await this.limiter.acquire(chunk.length * this.options.costPerItem);

    let outcomes: Map<string, ItemOutcome>;
    try {
      outcomes = await this.breaker.execute(() => {
        result.batchCalls++;
        return this.transport.executeBatch(operation, chunk);
      });
    } catch (error) {
      if (error instanceof CircuitOpenError) {
        this.log.warn('batch_chunk_rejected', { operation, itemIds: chunk, retryAfterMs: error.retryAfterMs });
        return this.abort(chunk, result);
      }
      const classified = this.options.classify(error);
      this.log.warn('batch_chunk_failed', {
        operation,
        itemIds: chunk,
        kind: classified.kind,
        category: classified.category,
        error: errorMessage(error),
      });
      return this.runSequential(chunk, operation, hooks, result, 1);
    }

    const retry: string[] = [];
    for (const itemId of chunk) {
      const outcome = outcomes.get(itemId);
      if (!outcome) {
        retry.push(itemId);
      } else if (outcome.ok) {
        await this.succeed(itemId, outcome.payload, 1, hooks, result);
      } else {
        const classified = this.options.classify(outcome.error);
        if (classified.kind === 'permanent') {
          await this.fail(itemId, { ...classified, attempts: 1 }, hooks, result);
        } else {
          retry.push(itemId);
        }
      }
    }

    if (retry.length > 0) {
      this.log.info('batch_items_retrying', { operation, count: retry.length, itemIds: retry });
      return this.runSequential(retry, operation, hooks, result, 1);
    }
    return false;
  }

  private async runSequential(
    itemIds: readonly string[],
    operation: SyncOperation,
    hooks: BatchHooks,
    result: BatchResult,
    priorAttempts: number,
  ): Promise<boolean> {
    for (const [index, itemId] of itemIds.entries()) {
      let attempts = priorAttempts;
      let payload: unknown;

      try {
        payload = await withRetry(
          () =>
            this.breaker.execute(() => {
              attempts++;
              result.sequentialCalls++;
              return this.transport.executeOne(operation, itemId);
            }),
          {
            maxRetries: this.options.maxItemRetries,
            baseDelayMs: this.options.retryBaseDelayMs,
            maxDelayMs: this.options.retryMaxDelayMs,
            jitterMs: this.options.retryJitterMs,
            beforeAttempt: () => this.limiter.acquire(this.options.costPerItem),
            isRetryable: (error) =>
              !(error instanceof CircuitOpenError) && this.options.classify(error).kind !== 'permanent',
            onRetry: (error, attempt, delayMs) =>
              this.log.debug('item_retry', { operation, itemId, attempt, delayMs, error: error.message }),
          },
        );
      } catch (error) {
        const classified = this.options.classify(error);
        if (error instanceof CircuitOpenError || classified.kind === 'systemic') {
          this.log.warn('sequential_fallback_aborted', {
            operation,
            itemId,
            category: classified.category,
            unattempted: itemIds.length - index,
          });
          return this.abort(itemIds.slice(index), result);
        }
        await this.fail(itemId, { ...classified, attempts }, hooks, result);
        continue;
      }

      await this.succeed(itemId, payload, attempts, hooks, result);
    }
    return false;
  }

  private async succeed(
    itemId: string,
    payload: unknown,
    attempts: number,
    hooks: BatchHooks,
    result: BatchResult,
  ): Promise<void> {
    try {
      await hooks.onSuccess?.(itemId, payload);
    } catch (error) {
      await this.fail(
        itemId,
        { kind: 'permanent', category: 'sink_error', message: errorMessage(error), attempts },
        hooks,
        result,
      );
      return;
    }
    result.successful++;
    await hooks.onSettled?.(itemId);
  }

  private async fail(itemId: string, failure: ItemFailure, hooks: BatchHooks, result: BatchResult): Promise<void> {
    result.failed++;
    result.failures.set(itemId, failure);
    this.log.warn('item_failed', {
      itemId,
      kind: failure.kind,
      category: failure.category,
      attempts: failure.attempts,
      error: failure.message,
    });
    await hooks.onFailure?.(itemId, failure);
    await hooks.onSettled?.(itemId, failure);
  }

  private abort(itemIds: readonly string[], result: BatchResult): true {
    result.unattempted.push(...itemIds);
    result.aborted = true;
    return true;
  }
}
