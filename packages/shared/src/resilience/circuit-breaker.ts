import type { CircuitState } from '../types/sync.js';
import { nullLogger, type Logger } from '../utils/logger.js';
import { CircuitOpenError, errorMessage } from '../utils/errors.js';

export interface CircuitBreakerOptions {
  name?: string;
  /** Consecutive counted failures that open the circuit */
  failureThreshold: number;
  /** How long the circuit stays open before admitting trial calls */
  recoveryTimeoutMs: number;
  /** Trial successes needed in half-open to close the circuit */
  successThreshold: number;
  /** Trial calls allowed in flight while half-open (default: 1) */
  halfOpenMaxCalls?: number;
  /** Decides whether an error counts against the upstream (default: every error) */
  isFailure?: (error: unknown) => boolean;
}

export interface CircuitBreakerStats {
  name: string;
  state: CircuitState;
  failureCount: number;
  successCount: number;
  openCount: number;
  openedAt: Date | null;
  retryAfterMs: number;
}

/**
 * Three-state circuit breaker (closed → open → half_open → closed).
 *
 * State changes happen synchronously before and after the awaited call, so a
 * breaker can be shared between concurrent callers on one event loop.
 */
export class CircuitBreaker {
  readonly name: string;
  private readonly failureThreshold: number;
  private readonly recoveryTimeoutMs: number;
  private readonly successThreshold: number;
  private readonly halfOpenMaxCalls: number;
  private readonly isFailure: (error: unknown) => boolean;
  private readonly log: Logger;

  private currentState: CircuitState = 'closed';
  private failureCount = 0;
  private successCount = 0;
  private halfOpenInFlight = 0;
  private openedAt: number | null = null;
  private timesOpened = 0;
  /** Bumped on every state change; a call only counts toward the state it started in. */
  private epoch = 0;

  constructor(options: CircuitBreakerOptions, logger: Logger = nullLogger) {
    if (options.failureThreshold < 1) throw new RangeError('failureThreshold must be at least 1');
    if (options.successThreshold < 1) throw new RangeError('successThreshold must be at least 1');
    if (options.recoveryTimeoutMs < 0) throw new RangeError('recoveryTimeoutMs must not be negative');

    this.name = options.name ?? 'default';
    this.failureThreshold = options.failureThreshold;
    this.recoveryTimeoutMs = options.recoveryTimeoutMs;
    this.successThreshold = options.successThreshold;
    this.halfOpenMaxCalls = Math.max(1, options.halfOpenMaxCalls ?? 1);
    this.isFailure = options.isFailure ?? (() => true);
    this.log = logger.child({ component: 'circuit-breaker', breaker: this.name });
  }

  get state(): CircuitState {
    this.maybeHalfOpen();
    return this.currentState;
  }

  /** Number of times the circuit has opened since construction or reset(). */
  get openCount(): number {
    return this.timesOpened;
  }

  /** Milliseconds until an open circuit admits a trial call (0 unless open). */
  get retryAfterMs(): number {
    this.maybeHalfOpen();
    if (this.currentState !== 'open' || this.openedAt === null) return 0;
    return Math.max(0, this.openedAt + this.recoveryTimeoutMs - Date.now());
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    this.maybeHalfOpen();

    if (this.currentState === 'open') {
      throw new CircuitOpenError(this.name, this.retryAfterMs);
    }

    const trial = this.currentState === 'half_open';
    if (trial) {
      if (this.halfOpenInFlight >= this.halfOpenMaxCalls) {
        throw new CircuitOpenError(this.name, 0);
      }
      this.halfOpenInFlight++;
    }

    const startedIn = this.epoch;
    try {
      const result = await fn();
      if (this.epoch === startedIn) this.recordSuccess();
      return result;
    } catch (error) {
      if (this.epoch === startedIn) this.recordError(error);
      throw error;
    } finally {
      if (trial && this.epoch === startedIn) this.halfOpenInFlight--;
    }
  }

  getStats(): CircuitBreakerStats {
    return {
      name: this.name,
      state: this.state,
      failureCount: this.failureCount,
      successCount: this.successCount,
      openCount: this.timesOpened,
      openedAt: this.openedAt === null ? null : new Date(this.openedAt),
      retryAfterMs: this.retryAfterMs,
    };
  }

  /** Force the circuit closed and clear every counter. */
  reset(): void {
    this.currentState = 'closed';
    this.failureCount = 0;
    this.successCount = 0;
    this.halfOpenInFlight = 0;
    this.openedAt = null;
    this.timesOpened = 0;
    this.epoch++;
  }

  private maybeHalfOpen(): void {
    if (this.currentState !== 'open' || this.openedAt === null) return;
    if (Date.now() - this.openedAt < this.recoveryTimeoutMs) return;

    this.currentState = 'half_open';
    this.successCount = 0;
    this.halfOpenInFlight = 0;
    this.epoch++;
    this.log.info('circuit_half_open');
  }

  private recordSuccess(): void {
    if (this.currentState === 'half_open') {
      this.successCount++;
      if (this.successCount >= this.successThreshold) {
        this.currentState = 'closed';
        this.failureCount = 0;
        this.successCount = 0;
        this.openedAt = null;
        this.epoch++;
        this.log.info('circuit_closed');
      }
      return;
    }
    if (this.currentState === 'closed') {
      this.failureCount = 0;
    }
  }

  private recordError(error: unknown): void {
    if (!this.isFailure(error)) return;

    if (this.currentState === 'half_open') {
      this.open(error);
      return;
    }
    this.failureCount++;
    if (this.failureCount >= this.failureThreshold) {
      this.open(error);
    }
  }

  private open(error: unknown): void {
    this.currentState = 'open';
    this.openedAt = Date.now();
    this.successCount = 0;
    this.timesOpened++;
    this.epoch++;
    this.log.warn('circuit_opened', {
      failureCount: this.failureCount,
      openCount: this.timesOpened,
      recoveryTimeoutMs: this.recoveryTimeoutMs,
      lastError: errorMessage(error),
    });
  }
}
