import {
  DEFAULT_CHECKPOINT_EVERY,
  DEFAULT_CHECKPOINT_INTERVAL_MS,
  DEFAULT_MAX_CIRCUIT_PAUSES,
  DEFAULT_MAX_ITEMS,
  DEFAULT_MAX_REOPEN_CYCLES,
  SYNC_OPERATIONS,
  errorMessage,
  isTerminalState,
  nullLogger,
  sleep,
  type CheckpointStore,
  type DeadLetterQueue,
  type ItemFailure,
  type Logger,
  type SyncCheckpoint,
  type SyncOperation,
} from '@mailsync/shared';
import type { BatchClient } from './batch-client.js';
import { AcknowledgementCursor } from './cursor.js';
import type {
  BatchHooks,
  ItemEnumerator,
  ItemSink,
  SyncOrchestratorOptions,
  SyncRunOptions,
} from './types.js';

export interface SyncOrchestratorDeps {
  enumerator: ItemEnumerator;
  batchClient: BatchClient;
  checkpoints: CheckpointStore;
  deadLetters: DeadLetterQueue;
  /** Receives successful payloads; omitted for operations with nothing to keep */
  sink?: ItemSink;
}

const DEFAULT_OPTIONS: SyncOrchestratorOptions = {
  checkpointEvery: DEFAULT_CHECKPOINT_EVERY,
  checkpointIntervalMs: DEFAULT_CHECKPOINT_INTERVAL_MS,
  maxCircuitPauses: DEFAULT_MAX_CIRCUIT_PAUSES,
  maxReopenCycles: DEFAULT_MAX_REOPEN_CYCLES,
  maxItems: DEFAULT_MAX_ITEMS,
};

function operationOf(checkpoint: SyncCheckpoint): SyncOperation | undefined {
  const value = checkpoint.metadata.operation;
  return SYNC_OPERATIONS.find((operation) => operation === value);
}

/**
 * Progress of one run: the acknowledgement cursor plus whatever has not
 * been written to the checkpoint store yet.
 */
class RunState {
  checkpoint: SyncCheckpoint;
  /** Items this run still has to settle, in enumeration order */
  readonly pending: readonly string[];
  readonly cursor: AcknowledgementCursor;
  readonly failed = new Set<string>();
  unflushed: string[] = [];
  lastFlushAt = Date.now();

  constructor(checkpoint: SyncCheckpoint, pending: readonly string[]) {
    this.checkpoint = checkpoint;
    this.pending = pending;
    this.cursor = new AcknowledgementCursor(pending);
  }
}

/**
 * Drives one sync run: enumerate, resume from the last checkpoint, push
 * chunks through the BatchClient, route failures to the dead-letter queue
 * and persist progress until the run reaches a terminal or interrupted state.
 */
export class SyncOrchestrator {
  readonly options: SyncOrchestratorOptions;
  private readonly enumerator: ItemEnumerator;
  private readonly batchClient: BatchClient;
  private readonly checkpoints: CheckpointStore;
  private readonly deadLetters: DeadLetterQueue;
  private readonly sink?: ItemSink;
  private readonly log: Logger;

  constructor(deps: SyncOrchestratorDeps, options: Partial<SyncOrchestratorOptions> = {}, logger: Logger = nullLogger) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    if (!Number.isInteger(this.options.checkpointEvery) || this.options.checkpointEvery < 1) {
      throw new RangeError(`checkpointEvery must be a positive integer, got ${this.options.checkpointEvery}`);
    }
    this.enumerator = deps.enumerator;
    this.batchClient = deps.batchClient;
    this.checkpoints = deps.checkpoints;
    this.deadLetters = deps.deadLetters;
    this.sink = deps.sink;
    this.log = logger.child({ component: 'sync-orchestrator' });
  }

  /**
   * Run (or resume) a sync for `query`. Resolves with the final checkpoint:
   * completed, failed, or interrupted when the run can be resumed later.
   * Store, enumerator and dead-letter errors mark the run failed and rethrow.
   */
  async run(query: string, options: SyncRunOptions = {}): Promise<SyncCheckpoint> {
    const requested = options.operation ?? 'fetch';
    let log = this.log.child({ query, operation: requested });
    let state: RunState | undefined;

    try {
      const resumable = options.resume ? await this.findResumable(query, requested, log) : null;
      const ids = await this.enumerator.listItemIds(query, { maxItems: this.options.maxItems, signal: options.signal });
      log.info('sync_items_enumerated', { count: ids.length, resume: Boolean(resumable) });

      if (resumable) {
        const start = this.resumePosition(resumable, ids);
        if (start === null) {
          log.warn('resume_cursor_missing', { syncId: resumable.syncId, lastItemId: resumable.lastItemId });
          await this.checkpoints.markFailed(
            resumable,
            `Resume cursor ${resumable.lastItemId ?? ''} is no longer in the result set; started a fresh run`,
          );
        } else {
          const pending = ids.slice(start);
          const checkpoint = await this.checkpoints.markInProgress(resumable, resumable.processedItems + pending.length);
          state = new RunState(checkpoint, pending);
          log = log.child({ syncId: checkpoint.syncId });
          log.info('sync_resumed', {
            skipped: start,
            remaining: pending.length,
            processedItems: checkpoint.processedItems,
          });
        }
      }

      if (!state) {
        const created = await this.checkpoints.create(query, ids.length, {
          outputLocation: options.outputLocation,
          metadata: { ...options.metadata, operation: requested },
        });
        state = new RunState(await this.checkpoints.markInProgress(created), ids);
        log = log.child({ syncId: created.syncId });
        log.info('sync_started', { totalItems: ids.length });
      }

      return await this.process(state, options, log);
    } catch (error) {
      if (state && !isTerminalState(state.checkpoint.state)) {
        try {
          state.checkpoint = await this.checkpoints.markFailed(state.checkpoint, errorMessage(error));
        } catch (markError) {
          log.error('checkpoint_mark_failed_error', markError, { syncId: state.checkpoint.syncId });
        }
      }
      log.error('sync_failed', error);
      throw error;
    }
  }

  private async findResumable(query: string, operation: SyncOperation, log: Logger): Promise<SyncCheckpoint | null> {
    const checkpoint = await this.checkpoints.getLatestResumable(query);
    if (!checkpoint) {
      log.info('resume_not_found');
      return null;
    }
    const previous = operationOf(checkpoint);
    if (previous !== undefined && previous !== operation) {
      log.warn('resume_operation_mismatch', { syncId: checkpoint.syncId, checkpointOperation: previous });
      return null;
    }
    return checkpoint;
  }

  /** Index of the first item after the cursor, or null when the cursor is gone. */
  private resumePosition(checkpoint: SyncCheckpoint, ids: readonly string[]): number | null {
    if (checkpoint.lastItemId === undefined) return 0;
    const index = ids.indexOf(checkpoint.lastItemId);
    return index === -1 ? null : index + 1;
  }

  private async process(state: RunState, options: SyncRunOptions, log: Logger): Promise<SyncCheckpoint> {
    const operation = operationOf(state.checkpoint) ?? options.operation ?? 'fetch';
    const breaker = this.batchClient.circuitBreaker;
    const opensAtStart = breaker.openCount;
    const batchSize = this.batchClient.options.maxBatchSize;
    let remaining = [...state.pending];
    let pauses = 0;

    const hooks = this.hooksFor(state, operation, log);

    while (remaining.length > 0) {
      if (options.signal?.aborted) {
        log.info('sync_interrupt_requested', { remaining: remaining.length });
        return this.finish(state, 'interrupted', log);
      }

      const chunk = remaining.slice(0, batchSize);
      const result = await this.batchClient.execute(chunk, operation, hooks);
      remaining = [...result.unattempted, ...remaining.slice(chunk.length)];

      log.info('sync_chunk_processed', {
        requested: result.requested,
        successful: result.successful,
        failed: result.failed,
        unattempted: result.unattempted.length,
        batchCalls: result.batchCalls,
        sequentialCalls: result.sequentialCalls,
      });

      if (!result.aborted) continue;

      const opened = breaker.openCount - opensAtStart;
      if (opened > this.options.maxReopenCycles) {
        return this.finish(state, 'failed', log, `Circuit '${breaker.name}' opened ${opened} times during the run`);
      }
      if (breaker.state === 'open' && pauses < this.options.maxCircuitPauses) {
        pauses++;
        const waitMs = breaker.retryAfterMs;
        log.warn('sync_paused_for_circuit', { waitMs, pause: pauses, maxPauses: this.options.maxCircuitPauses });
        await this.flush(state, log);
        await sleep(waitMs, options.signal);
        continue;
      }

      log.warn('sync_upstream_unavailable', { circuitState: breaker.state, remaining: remaining.length });
      return this.finish(state, 'interrupted', log);
    }

    return this.finish(state, 'completed', log);
  }

  private hooksFor(state: RunState, operation: SyncOperation, log: Logger): BatchHooks {
    const sink = this.sink;
    const context = { syncId: state.checkpoint.syncId, outputLocation: state.checkpoint.outputLocation };

    return {
      onSuccess: sink ? (itemId, payload) => sink(itemId, payload, operation, context) : undefined,
      onFailure: async (itemId: string, failure: ItemFailure) => {
        state.failed.add(itemId);
        const entry = await this.deadLetters.record({
          itemId,
          operation,
          errorCategory: failure.category,
          errorMessage: failure.message,
          syncId: state.checkpoint.syncId,
        });
        log.warn('dead_letter_recorded', {
          itemId,
          category: failure.category,
          attemptCount: entry.attemptCount,
        });
      },
      onSettled: async (itemId: string) => {
        state.unflushed.push(...state.cursor.acknowledge(itemId));
        if (state.cursor.done) return;
        const due =
          state.unflushed.length >= this.options.checkpointEvery ||
          (this.options.checkpointIntervalMs > 0 &&
            state.unflushed.length > 0 &&
            Date.now() - state.lastFlushAt >= this.options.checkpointIntervalMs);
        if (due) await this.flush(state, log);
      },
    };
  }

  /** Persist the acknowledged prefix that has not been written yet. */
  private async flush(state: RunState, log: Logger): Promise<void> {
    if (state.unflushed.length === 0) return;
    const covered = state.unflushed;
    state.checkpoint = await this.checkpoints.updateProgress(
      state.checkpoint,
      covered.length,
      state.cursor.lastAcknowledged,
      covered.filter((id) => state.failed.has(id)),
    );
    state.unflushed = [];
    state.lastFlushAt = Date.now();
    log.debug('checkpoint_saved', {
      processedItems: state.checkpoint.processedItems,
      lastItemId: state.checkpoint.lastItemId,
    });
  }

  private async finish(
    state: RunState,
    outcome: 'completed' | 'interrupted' | 'failed',
    log: Logger,
    reason?: string,
  ): Promise<SyncCheckpoint> {
    await this.flush(state, log);

    if (outcome === 'completed') {
      state.checkpoint = await this.checkpoints.markCompleted(state.checkpoint);
    } else if (outcome === 'interrupted') {
      state.checkpoint = await this.checkpoints.markInterrupted(state.checkpoint);
    } else {
      state.checkpoint = await this.checkpoints.markFailed(state.checkpoint, reason ?? 'Sync failed');
    }

    const { processedItems, totalItems, failedItemIds, syncId } = state.checkpoint;
    const summary = { syncId, processedItems, totalItems, failed: failedItemIds.length };
    if (outcome === 'completed') log.info('sync_completed', summary);
    else if (outcome === 'interrupted') log.warn('sync_interrupted', { ...summary, lastItemId: state.checkpoint.lastItemId });
    else log.error('sync_run_failed', undefined, { ...summary, reason });

    return state.checkpoint;
  }
}
