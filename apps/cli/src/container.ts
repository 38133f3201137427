import { join } from 'node:path';
import {
  CHECKPOINTS_DIR_NAME,
  CircuitBreaker,
  ConfigError,
  DEAD_LETTER_DIR_NAME,
  TokenBucketRateLimiter,
  isSystemicFailure,
  type BatchTransport,
  type CheckpointStore,
  type DeadLetterQueue,
  type ItemEnumerator,
  type Logger,
  type SyncOperation,
} from '@mailsync/shared';
import {
  FileCheckpointStore,
  FileDeadLetterQueue,
  PgCheckpointStore,
  PgDeadLetterQueue,
  closePool,
  ensureSchema,
} from '@mailsync/database';
import { GmailClient } from '@mailsync/gmail';
import { BatchClient, SyncOrchestrator, type SyncConfig } from '@mailsync/sync';
import { createFileSink } from './sink.js';

export interface SyncStores {
  checkpoints: CheckpointStore;
  deadLetters: DeadLetterQueue;
  close(): Promise<void>;
}

/** Open the configured checkpoint and dead-letter backend. */
export async function openStores(config: SyncConfig, logger: Logger): Promise<SyncStores> {
  if (config.store.kind === 'postgres') {
    await ensureSchema();
    logger.info('stores_opened', { kind: 'postgres' });
    return {
      checkpoints: new PgCheckpointStore(logger),
      deadLetters: new PgDeadLetterQueue(logger),
      close: closePool,
    };
  }

  const { stateDir } = config.store;
  logger.info('stores_opened', { kind: 'file', stateDir });
  return {
    checkpoints: new FileCheckpointStore(join(stateDir, CHECKPOINTS_DIR_NAME), logger),
    deadLetters: new FileDeadLetterQueue(join(stateDir, DEAD_LETTER_DIR_NAME), logger),
    close: async () => {},
  };
}

/** Where item IDs come from and where operations go; Gmail unless given. */
export interface Upstream {
  enumerator: ItemEnumerator;
  transport: BatchTransport;
}

export interface SyncPipeline {
  orchestrator: SyncOrchestrator;
  /** Release the rate limiter's timers */
  close(): void;
}

export function createGmailUpstream(config: SyncConfig, logger: Logger): Upstream {
  const { accessToken } = config.gmail;
  if (!accessToken) {
    throw new ConfigError(['GMAIL_ACCESS_TOKEN: required for sync']);
  }
  const client = new GmailClient(
    {
      getAccessToken: () => accessToken,
      baseUrl: config.gmail.baseUrl,
      userId: config.gmail.userId,
      timeoutMs: config.gmail.timeoutMs,
      maxItems: config.orchestrator.maxItems,
    },
    logger,
  );
  return { enumerator: client, transport: client };
}

/**
 * Wire limiter, breaker, BatchClient and orchestrator for one operation.
 * Only `fetch` keeps payloads, so the file sink is attached for it alone.
 */
export function createPipeline(
  config: SyncConfig,
  stores: SyncStores,
  operation: SyncOperation,
  logger: Logger,
  upstream: Upstream = createGmailUpstream(config, logger),
): SyncPipeline {
  const rateLimiter = new TokenBucketRateLimiter(config.rateLimit, logger);
  const circuitBreaker = new CircuitBreaker({ ...config.circuitBreaker, isFailure: isSystemicFailure() }, logger);
  const batchClient = new BatchClient(
    { transport: upstream.transport, rateLimiter, circuitBreaker },
    config.batch,
    logger,
  );
  const orchestrator = new SyncOrchestrator(
    {
      enumerator: upstream.enumerator,
      batchClient,
      checkpoints: stores.checkpoints,
      deadLetters: stores.deadLetters,
      sink: operation === 'fetch' ? createFileSink(config.outputDir) : undefined,
    },
    config.orchestrator,
    logger,
  );
  return { orchestrator, close: () => rateLimiter.destroy() };
}
