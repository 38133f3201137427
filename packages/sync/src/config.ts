import { z } from 'zod';
import {
  ConfigError,
  DEFAULT_BATCH_SIZE,
  DEFAULT_BREAKER_FAILURE_THRESHOLD,
  DEFAULT_BREAKER_HALF_OPEN_MAX_CALLS,
  DEFAULT_BREAKER_RECOVERY_TIMEOUT_MS,
  DEFAULT_BREAKER_SUCCESS_THRESHOLD,
  DEFAULT_BURST_SIZE,
  DEFAULT_CHECKPOINT_EVERY,
  DEFAULT_CHECKPOINT_INTERVAL_MS,
  DEFAULT_COST_PER_ITEM,
  DEFAULT_MAX_CIRCUIT_PAUSES,
  DEFAULT_MAX_ITEMS,
  DEFAULT_MAX_ITEM_RETRIES,
  DEFAULT_MAX_REOPEN_CYCLES,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_RATE_PER_SECOND,
  DEFAULT_RETRY_BASE_DELAY_MS,
  DEFAULT_RETRY_JITTER_MS,
  DEFAULT_RETRY_MAX_DELAY_MS,
  DEFAULT_STATE_DIR,
  GMAIL_DEFAULT_API_BASE_URL,
  GMAIL_MAX_BATCH_SIZE,
  GMAIL_REQUEST_TIMEOUT_MS,
  type CircuitBreakerOptions,
  type RateLimiterConfig,
} from '@mailsync/shared';
import type { BatchClientOptions, SyncOrchestratorOptions } from './types.js';

/** Unset and empty variables both fall back to the default */
const blankToUndefined = (value: unknown) => (value === '' ? undefined : value);

const int = (fallback: number, min: number, max = Number.MAX_SAFE_INTEGER) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).max(max).default(fallback));

const positive = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().positive().default(fallback));

const text = (fallback: string) => z.preprocess(blankToUndefined, z.string().min(1).default(fallback));

const envSchema = z.object({
  SYNC_BATCH_SIZE: int(DEFAULT_BATCH_SIZE, 1, GMAIL_MAX_BATCH_SIZE),
  SYNC_RATE_PER_SECOND: positive(DEFAULT_RATE_PER_SECOND),
  SYNC_BURST_SIZE: int(DEFAULT_BURST_SIZE, 1),
  SYNC_COST_PER_ITEM: positive(DEFAULT_COST_PER_ITEM),
  SYNC_CHECKPOINT_EVERY: int(DEFAULT_CHECKPOINT_EVERY, 1),
  SYNC_CHECKPOINT_INTERVAL_MS: int(DEFAULT_CHECKPOINT_INTERVAL_MS, 0),
  SYNC_MAX_ITEM_RETRIES: int(DEFAULT_MAX_ITEM_RETRIES, 0),
  SYNC_RETRY_BASE_DELAY_MS: int(DEFAULT_RETRY_BASE_DELAY_MS, 0),
  SYNC_RETRY_MAX_DELAY_MS: int(DEFAULT_RETRY_MAX_DELAY_MS, 0),
  SYNC_RETRY_JITTER_MS: int(DEFAULT_RETRY_JITTER_MS, 0),
  SYNC_BREAKER_FAILURE_THRESHOLD: int(DEFAULT_BREAKER_FAILURE_THRESHOLD, 1),
  SYNC_BREAKER_RECOVERY_TIMEOUT_MS: int(DEFAULT_BREAKER_RECOVERY_TIMEOUT_MS, 0),
  SYNC_BREAKER_SUCCESS_THRESHOLD: int(DEFAULT_BREAKER_SUCCESS_THRESHOLD, 1),
  SYNC_BREAKER_HALF_OPEN_MAX_CALLS: int(DEFAULT_BREAKER_HALF_OPEN_MAX_CALLS, 1),
  SYNC_MAX_CIRCUIT_PAUSES: int(DEFAULT_MAX_CIRCUIT_PAUSES, 0),
  SYNC_MAX_REOPEN_CYCLES: int(DEFAULT_MAX_REOPEN_CYCLES, 0),
  SYNC_MAX_ITEMS: int(DEFAULT_MAX_ITEMS, 1),
  SYNC_STORE: z.preprocess(blankToUndefined, z.enum(['file', 'postgres']).default('file')),
  SYNC_STATE_DIR: text(DEFAULT_STATE_DIR),
  SYNC_OUTPUT_DIR: text(DEFAULT_OUTPUT_DIR),
  GMAIL_ACCESS_TOKEN: z.preprocess(blankToUndefined, z.string().optional()),
  GMAIL_USER_ID: text('me'),
  GMAIL_API_BASE_URL: z.preprocess(blankToUndefined, z.string().url().default(GMAIL_DEFAULT_API_BASE_URL)),
  GMAIL_REQUEST_TIMEOUT_MS: int(GMAIL_REQUEST_TIMEOUT_MS, 1),
});

export type SyncEnv = z.infer<typeof envSchema>;

export interface SyncConfig {
  batch: BatchClientOptionsConfig;
  rateLimit: RateLimiterConfig;
  circuitBreaker: Omit<CircuitBreakerOptions, 'isFailure'>;
  orchestrator: SyncOrchestratorOptions;
  store: {
    kind: 'file' | 'postgres';
    /** Root directory of the file backend */
    stateDir: string;
  };
  outputDir: string;
  gmail: {
    accessToken?: string;
    userId: string;
    baseUrl: string;
    timeoutMs: number;
  };
}

/** BatchClient options that come from the environment (the classifier does not) */
export type BatchClientOptionsConfig = Omit<BatchClientOptions, 'classify'>;

/**
 * Validate sync settings from environment variables. Every invalid variable
 * is reported at once in a ConfigError.
 */
export function loadSyncConfig(env: NodeJS.ProcessEnv = process.env): SyncConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  const e = parsed.data;

  if (e.SYNC_RETRY_MAX_DELAY_MS < e.SYNC_RETRY_BASE_DELAY_MS) {
    throw new ConfigError([
      `SYNC_RETRY_MAX_DELAY_MS: must be at least SYNC_RETRY_BASE_DELAY_MS (${e.SYNC_RETRY_BASE_DELAY_MS})`,
    ]);
  }

  return {
    batch: {
      maxBatchSize: e.SYNC_BATCH_SIZE,
      costPerItem: e.SYNC_COST_PER_ITEM,
      maxItemRetries: e.SYNC_MAX_ITEM_RETRIES,
      retryBaseDelayMs: e.SYNC_RETRY_BASE_DELAY_MS,
      retryMaxDelayMs: e.SYNC_RETRY_MAX_DELAY_MS,
      retryJitterMs: e.SYNC_RETRY_JITTER_MS,
    },
    rateLimit: {
      name: 'gmail',
      ratePerSecond: e.SYNC_RATE_PER_SECOND,
      burstSize: e.SYNC_BURST_SIZE,
    },
    circuitBreaker: {
      name: 'gmail',
      failureThreshold: e.SYNC_BREAKER_FAILURE_THRESHOLD,
      recoveryTimeoutMs: e.SYNC_BREAKER_RECOVERY_TIMEOUT_MS,
      successThreshold: e.SYNC_BREAKER_SUCCESS_THRESHOLD,
      halfOpenMaxCalls: e.SYNC_BREAKER_HALF_OPEN_MAX_CALLS,
    },
    orchestrator: {
      checkpointEvery: e.SYNC_CHECKPOINT_EVERY,
      checkpointIntervalMs: e.SYNC_CHECKPOINT_INTERVAL_MS,
      maxCircuitPauses: e.SYNC_MAX_CIRCUIT_PAUSES,
      maxReopenCycles: e.SYNC_MAX_REOPEN_CYCLES,
      maxItems: e.SYNC_MAX_ITEMS,
    },
    store: {
      kind: e.SYNC_STORE,
      stateDir: e.SYNC_STATE_DIR,
    },
    outputDir: e.SYNC_OUTPUT_DIR,
    gmail: {
      accessToken: e.GMAIL_ACCESS_TOKEN,
      userId: e.GMAIL_USER_ID,
      baseUrl: e.GMAIL_API_BASE_URL,
      timeoutMs: e.GMAIL_REQUEST_TIMEOUT_MS,
    },
  };
}
