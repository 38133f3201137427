import { describe, it, expect } from 'vitest';
import {
  CircuitOpenError,
  MalformedResponseError,
  PermanentItemError,
  TransientItemError,
  UpstreamHttpError,
  defaultErrorClassifier,
  isSystemicFailure,
} from '../src/utils/errors.js';

describe('defaultErrorClassifier', () => {
  it.each([
    [401, undefined, 'systemic', 'auth'],
    [403, 'rateLimitExceeded', 'systemic', 'quota_exceeded'],
    [403, 'dailyLimitExceeded', 'systemic', 'quota_exceeded'],
    [403, 'insufficientPermissions', 'permanent', 'forbidden'],
    [404, 'notFound', 'permanent', 'not_found'],
    [400, 'invalidArgument', 'permanent', 'invalid_request'],
    [422, undefined, 'permanent', 'invalid_request'],
    [429, 'rateLimitExceeded', 'systemic', 'rate_limit'],
    [500, 'backendError', 'systemic', 'server_error'],
    [503, undefined, 'systemic', 'server_error'],
  ] as const)('classifies HTTP %i (%s) as %s/%s', (status, reason, kind, category) => {
    const result = defaultErrorClassifier(new UpstreamHttpError(status, `HTTP ${status}`, reason));
    expect(result).toEqual({ kind, category, message: `HTTP ${status}` });
  });

  it('treats a 403 whose message mentions quota as systemic', () => {
    const error = new UpstreamHttpError(403, 'Quota exceeded for quota metric');
    expect(defaultErrorClassifier(error).category).toBe('quota_exceeded');
  });

  it('classifies network and timeout errors as systemic', () => {
    expect(defaultErrorClassifier(new TypeError('fetch failed'))).toMatchObject({ kind: 'systemic', category: 'network' });
    expect(defaultErrorClassifier(Object.assign(new Error('socket closed'), { code: 'ECONNRESET' }))).toMatchObject({
      kind: 'systemic',
      category: 'network',
    });
    expect(defaultErrorClassifier(new Error('Request timed out after 30000ms'))).toMatchObject({
      kind: 'systemic',
      category: 'timeout',
    });
  });

  it('honours explicitly classified errors', () => {
    expect(defaultErrorClassifier(new PermanentItemError('bad payload'))).toEqual({
      kind: 'permanent',
      category: 'invalid_request',
      message: 'bad payload',
    });
    expect(defaultErrorClassifier(new TransientItemError('try later'))).toMatchObject({ kind: 'transient', category: 'unknown' });
  });

  it('classifies malformed responses as transient', () => {
    expect(defaultErrorClassifier(new MalformedResponseError('missing part'))).toMatchObject({
      kind: 'transient',
      category: 'malformed_response',
    });
  });

  it('classifies an open circuit as systemic', () => {
    expect(defaultErrorClassifier(new CircuitOpenError('gmail', 500))).toMatchObject({
      kind: 'systemic',
      category: 'circuit_open',
    });
  });

  it('defaults unknown values to transient', () => {
    expect(defaultErrorClassifier('weird')).toEqual({ kind: 'transient', category: 'unknown', message: 'weird' });
  });
});

describe('isSystemicFailure', () => {
  it('counts only systemic errors', () => {
    const isFailure = isSystemicFailure();
    expect(isFailure(new UpstreamHttpError(503, 'unavailable'))).toBe(true);
    expect(isFailure(new UpstreamHttpError(404, 'gone'))).toBe(false);
    expect(isFailure(new TransientItemError('retry me'))).toBe(false);
  });
});
