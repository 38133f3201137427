/**
 * How the pipeline reacts to an error:
 * - transient: retry this item a bounded number of times
 * - systemic: the upstream is unhealthy; counts toward the circuit breaker
 * - permanent: this item will never succeed; dead-letter it
 */
export type ErrorKind = 'transient' | 'systemic' | 'permanent';

export type ErrorCategory =
  | 'not_found'
  | 'invalid_request'
  | 'forbidden'
  | 'auth'
  | 'quota_exceeded'
  | 'rate_limit'
  | 'server_error'
  | 'network'
  | 'timeout'
  | 'malformed_response'
  | 'circuit_open'
  | 'sink_error'
  | 'unknown';

export const ERROR_CATEGORIES: readonly ErrorCategory[] = [
  'not_found',
  'invalid_request',
  'forbidden',
  'auth',
  'quota_exceeded',
  'rate_limit',
  'server_error',
  'network',
  'timeout',
  'malformed_response',
  'circuit_open',
  'sink_error',
  'unknown',
];

export interface ErrorClassification {
  kind: ErrorKind;
  category: ErrorCategory;
  message: string;
}

export type ErrorClassifier = (error: unknown) => ErrorClassification;

export interface ItemFailure {
  kind: ErrorKind;
  category: ErrorCategory;
  message: string;
  /** Upstream calls made for this item before giving up */
  attempts: number;
}
