import { nullLogger, type Logger } from '../utils/logger.js';
import { RateLimiterDestroyedError } from '../utils/errors.js';

export interface RateLimiterConfig {
  /** Tokens added per second (continuous refill) */
  ratePerSecond: number;
  /** Bucket capacity; also the largest burst admitted without waiting */
  burstSize: number;
  /** Name used in log entries */
  name?: string;
}

export interface RateLimiterStats {
  name: string;
  available: number;
  queueDepth: number;
  /** Tokens handed out since construction */
  tokensGranted: number;
  /** acquire() calls that had to queue */
  waits: number;
  totalWaitMs: number;
}

interface QueuedAcquire {
  /** Tokens still owed to this caller */
  remaining: number;
  enqueuedAt: number;
  resolve: (waitedMs: number) => void;
  reject: (reason: Error) => void;
}

/**
 * Token-bucket rate limiter with FIFO queuing.
 *
 * Tokens refill continuously at `ratePerSecond` up to `burstSize`. Callers are
 * admitted strictly in arrival order: a later, cheaper request never overtakes
 * an earlier one waiting for more tokens. A cost above capacity is granted in
 * bucket-sized slices while the caller stays at the head of the queue, so no
 * window of W seconds ever hands out more than `ratePerSecond * W + burstSize`.
 *
 * One instance is meant to be shared by everything calling the same upstream.
 */
export class TokenBucketRateLimiter {
  private tokens: number;
  private lastRefill: number;
  private readonly queue: QueuedAcquire[] = [];
  private drainTimer: ReturnType<typeof setTimeout> | null = null;
  private destroyed = false;
  private tokensGranted = 0;
  private waits = 0;
  private totalWaitMs = 0;
  private readonly name: string;
  private readonly log: Logger;

  constructor(
    private readonly config: RateLimiterConfig,
    logger: Logger = nullLogger,
  ) {
    if (!(config.ratePerSecond > 0)) {
      throw new RangeError(`ratePerSecond must be positive, got ${config.ratePerSecond}`);
    }
    if (!(config.burstSize >= 1)) {
      throw new RangeError(`burstSize must be at least 1, got ${config.burstSize}`);
    }
    this.name = config.name ?? 'default';
    this.tokens = config.burstSize;
    this.lastRefill = Date.now();
    this.log = logger.child({ component: 'rate-limiter', limiter: this.name });
  }

  /**
   * Wait until `cost` tokens can be deducted, then deduct them.
   * Resolves with the number of milliseconds spent waiting.
   */
  acquire(cost = 1): Promise<number> {
    this.assertCost(cost);
    if (this.destroyed) {
      return Promise.reject(new RateLimiterDestroyedError());
    }

    if (this.queue.length === 0 && cost <= this.config.burstSize && this.take(cost)) {
      return Promise.resolve(0);
    }

    return new Promise<number>((resolve, reject) => {
      this.queue.push({ remaining: cost, enqueuedAt: Date.now(), resolve, reject });
      this.waits++;
      if (this.queue.length === 1) {
        this.log.debug('rate_limit_wait', { cost, available: this.tokens });
      }
      this.drain();
    });
  }

  /**
   * Deduct `cost` tokens only if that is possible right now and nobody is queued.
   * Always false for a cost above `burstSize`.
   */
  tryAcquire(cost = 1): boolean {
    this.assertCost(cost);
    if (this.destroyed || this.queue.length > 0) return false;
    return this.take(cost);
  }

  /** Tokens currently in the bucket. */
  get available(): number {
    this.refill();
    return this.tokens;
  }

  /** Number of acquire() calls waiting for tokens. */
  get queueDepth(): number {
    return this.queue.length;
  }

  getStats(): RateLimiterStats {
    return {
      name: this.name,
      available: this.available,
      queueDepth: this.queue.length,
      tokensGranted: this.tokensGranted,
      waits: this.waits,
      totalWaitMs: this.totalWaitMs,
    };
  }

  /** Stop the drain timer and reject every queued caller (graceful shutdown / tests). */
  destroy(): void {
    this.destroyed = true;
    if (this.drainTimer) {
      clearTimeout(this.drainTimer);
      this.drainTimer = null;
    }
    for (const waiter of this.queue.splice(0)) {
      waiter.reject(new RateLimiterDestroyedError());
    }
  }

  private assertCost(cost: number): void {
    if (!Number.isFinite(cost) || cost <= 0) {
      throw new RangeError(`cost must be a positive number, got ${cost}`);
    }
  }

  private refill(): void {
    const now = Date.now();
    const elapsed = now - this.lastRefill;
    if (elapsed <= 0) return;
    this.tokens = Math.min(
      this.config.burstSize,
      this.tokens + (elapsed * this.config.ratePerSecond) / 1000,
    );
    this.lastRefill = now;
  }

  /** The next slice the head of the queue waits for. */
  private nextSlice(waiter: QueuedAcquire): number {
    return Math.min(waiter.remaining, this.config.burstSize);
  }

  private take(cost: number): boolean {
    this.refill();
    if (this.tokens < cost) return false;
    this.tokens -= cost;
    this.tokensGranted += cost;
    return true;
  }

  private scheduleDrain(): void {
    if (this.drainTimer || this.queue.length === 0) return;
    const head = this.queue[0];
    if (!head) return;

    this.refill();
    const deficit = this.nextSlice(head) - this.tokens;
    const delayMs = Math.max(1, Math.ceil((deficit * 1000) / this.config.ratePerSecond));

    this.drainTimer = setTimeout(() => {
      this.drainTimer = null;
      this.drain();
    }, delayMs);
  }

  private drain(): void {
    let head = this.queue[0];
    while (head) {
      const slice = this.nextSlice(head);
      if (!this.take(slice)) break;
      head.remaining -= slice;
      if (head.remaining > 0) continue;
      this.queue.shift();
      const waitedMs = Date.now() - head.enqueuedAt;
      this.totalWaitMs += waitedMs;
      head.resolve(waitedMs);
      head = this.queue[0];
    }
    this.scheduleDrain();
  }
}
