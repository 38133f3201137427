import type {
  ErrorCategory,
  ErrorClassification,
  ErrorClassifier,
  ErrorKind,
} from '../types/errors.js';

/**
 * Non-2xx response from the upstream API.
 */
export class UpstreamHttpError extends Error {
  public readonly status: number;
  /** Machine-readable reason reported by the upstream (e.g. 'rateLimitExceeded') */
  public readonly reason?: string;

  constructor(status: number, message: string, reason?: string) {
    super(message);
    this.name = 'UpstreamHttpError';
    this.status = status;
    this.reason = reason;
  }
}

/**
 * A response (or one part of a batch response) that could not be decoded.
 */
export class MalformedResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedResponseError';
  }
}

/**
 * Base class for errors that carry their own classification.
 */
export class ClassifiedError extends Error {
  public readonly kind: ErrorKind;
  public readonly category: ErrorCategory;

  constructor(kind: ErrorKind, category: ErrorCategory, message: string) {
    super(message);
    this.name = 'ClassifiedError';
    this.kind = kind;
    this.category = category;
  }
}

export class TransientItemError extends ClassifiedError {
  constructor(message: string, category: ErrorCategory = 'unknown') {
    super('transient', category, message);
    this.name = 'TransientItemError';
  }
}

export class PermanentItemError extends ClassifiedError {
  constructor(message: string, category: ErrorCategory = 'invalid_request') {
    super('permanent', category, message);
    this.name = 'PermanentItemError';
  }
}

export class SystemicError extends ClassifiedError {
  constructor(message: string, category: ErrorCategory = 'server_error') {
    super('systemic', category, message);
    this.name = 'SystemicError';
  }
}

/**
 * Thrown by the circuit breaker instead of calling the upstream.
 */
export class CircuitOpenError extends Error {
  public readonly breaker: string;
  /** Time left until the breaker admits a trial call */
  public readonly retryAfterMs: number;

  constructor(breaker: string, retryAfterMs: number) {
    super(`Circuit '${breaker}' is open, retry after ${retryAfterMs}ms`);
    this.name = 'CircuitOpenError';
    this.breaker = breaker;
    this.retryAfterMs = retryAfterMs;
  }
}

export class RateLimiterDestroyedError extends Error {
  constructor() {
    super('Rate limiter destroyed');
    this.name = 'RateLimiterDestroyedError';
  }
}

/**
 * Mutation attempted on a checkpoint whose state does not allow it
 * (e.g. updating a completed run).
 */
export class CheckpointStateError extends Error {
  public readonly syncId: string;
  public readonly state: string;

  constructor(syncId: string, state: string, action: string) {
    super(`Cannot ${action} checkpoint ${syncId} in state '${state}'`);
    this.name = 'CheckpointStateError';
    this.syncId = syncId;
    this.state = state;
  }
}

export class CheckpointNotFoundError extends Error {
  public readonly syncId: string;

  constructor(syncId: string) {
    super(`Checkpoint not found: ${syncId}`);
    this.name = 'CheckpointNotFoundError';
    this.syncId = syncId;
  }
}

export class ConfigError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

const NETWORK_ERROR_PATTERNS = [
  'econnreset',
  'econnrefused',
  'enotfound',
  'enetunreach',
  'ehostunreach',
  'epipe',
  'socket hang up',
  'network error',
  'fetch failed',
];

const QUOTA_REASONS = ['quotaexceeded', 'dailylimitexceeded', 'ratelimitexceeded', 'userratelimitexceeded'];

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function classification(kind: ErrorKind, category: ErrorCategory, error: unknown): ErrorClassification {
  return { kind, category, message: errorMessage(error) };
}

function classifyHttpStatus(error: UpstreamHttpError): ErrorClassification {
  const { status } = error;
  const reason = (error.reason ?? '').toLowerCase();

  if (status === 401) return classification('systemic', 'auth', error);
  if (status === 403) {
    const quota =
      QUOTA_REASONS.includes(reason) || error.message.toLowerCase().includes('quota');
    return quota
      ? classification('systemic', 'quota_exceeded', error)
      : classification('permanent', 'forbidden', error);
  }
  if (status === 404 || status === 410) return classification('permanent', 'not_found', error);
  if (status === 408) return classification('systemic', 'timeout', error);
  if (status === 429) return classification('systemic', 'rate_limit', error);
  if (status >= 500) return classification('systemic', 'server_error', error);
  if (status >= 400) return classification('permanent', 'invalid_request', error);

  return classification('transient', 'unknown', error);
}

/**
 * Default classifier for Gmail-style REST errors.
 *
 * Systemic errors (auth, quota, 429, 5xx, network, timeouts) are the only ones
 * that should trip a circuit breaker. Unknown errors are treated as transient
 * so they get a bounded number of retries before being dead-lettered.
 */
export const defaultErrorClassifier: ErrorClassifier = (error) => {
  if (error instanceof ClassifiedError) {
    return classification(error.kind, error.category, error);
  }
  if (error instanceof CircuitOpenError) {
    return classification('systemic', 'circuit_open', error);
  }
  if (error instanceof UpstreamHttpError) {
    return classifyHttpStatus(error);
  }
  if (error instanceof MalformedResponseError) {
    return classification('transient', 'malformed_response', error);
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    const name = error.name.toLowerCase();
    const code = 'code' in error && typeof error.code === 'string' ? error.code.toLowerCase() : '';

    if (
      name.includes('timeout') ||
      name === 'aborterror' ||
      code === 'etimedout' ||
      message.includes('timed out') ||
      message.includes('timeout')
    ) {
      return classification('systemic', 'timeout', error);
    }

    if (NETWORK_ERROR_PATTERNS.some((pattern) => message.includes(pattern) || code === pattern)) {
      return classification('systemic', 'network', error);
    }

    if (error instanceof SyntaxError) {
      return classification('transient', 'malformed_response', error);
    }
  }

  return classification('transient', 'unknown', error);
};

/**
 * Circuit-breaker failure predicate derived from a classifier:
 * only systemic errors count against the upstream.
 */
export function isSystemicFailure(classify: ErrorClassifier = defaultErrorClassifier) {
  return (error: unknown): boolean => classify(error).kind === 'systemic';
}
