/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import {
  AuthError,
  AuthErrorCategory,
  AuthErrorFactory,
  AuthErrorType,
  CancelledError,
  CsrfMismatchError,
  DeniedError,
  InvalidScopeError,
  NetworkError,
  TimeoutError,
  computeBackoffDelay,
} from './oauth-errors.js';

describe('AuthError', () => {
  it('should classify transient errors as retryable', () => {
    const network = new NetworkError('socket hang up', { provider: 'github' });
    const timeout = new TimeoutError('Loopback sign-in', 300000);

    expect(network.name).toBe('NetworkError');
    expect(network.category).toBe(AuthErrorCategory.TRANSIENT);
    expect(network.isRetryable).toBe(true);
    expect(network.provider).toBe('github');
    expect(timeout.message).toBe('Loopback sign-in timed out after 300000ms');
    expect(timeout.isRetryable).toBe(true);
  });

  it('should classify user, security and configuration errors', () => {
    expect(new DeniedError().category).toBe(
      AuthErrorCategory.USER_ACTION_REQUIRED,
    );
    expect(new DeniedError().isRetryable).toBe(false);
    expect(new CsrfMismatchError().category).toBe(AuthErrorCategory.SECURITY);
    expect(new InvalidScopeError('a,b', 'bad').category).toBe(
      AuthErrorCategory.CONFIGURATION,
    );
  });

  it('should record the scope and reason of an invalid scope', () => {
    const error = new InvalidScopeError('repo;user', 'separator');

    expect(error.message).toBe('Invalid scope "repo;user": separator');
    expect(error.technicalDetails).toEqual({
      scope: 'repo;user',
      reason: 'separator',
    });
  });

  it('should produce a sanitized log entry', () => {
    const error = new NetworkError('Refresh failed', {
      provider: 'google',
      cause: new Error('ECONNRESET'),
      technicalDetails: { status: 503 },
    });

    expect(error.toLogEntry()).toEqual({
      name: 'NetworkError',
      type: AuthErrorType.NETWORK,
      category: AuthErrorCategory.TRANSIENT,
      provider: 'google',
      isRetryable: true,
      message: 'Refresh failed',
      technicalDetails: { status: 503 },
      cause: { name: 'Error', message: 'ECONNRESET' },
    });
  });
});

describe('AuthErrorFactory.fromUnknown', () => {
  it('should pass AuthErrors through unchanged', () => {
    const error = new DeniedError();

    expect(AuthErrorFactory.fromUnknown(error, 'Refresh')).toBe(error);
  });

  it('should map aborts to CancelledError', () => {
    const abort = new Error('This operation was aborted');
    abort.name = 'AbortError';

    const error = AuthErrorFactory.fromUnknown(abort, 'Device poll');

    expect(error).toBeInstanceOf(CancelledError);
    expect(error.message).toBe('Device poll: This operation was aborted');
    expect(error.cause).toBe(abort);
  });

  it('should map transport failures to NetworkError', () => {
    const failure = new TypeError('fetch failed', {
      cause: Object.assign(new Error('connect ECONNREFUSED'), {
        code: 'ECONNREFUSED',
      }),
    });

    const error = AuthErrorFactory.fromUnknown(failure, 'Refresh', 'github');

    expect(error).toBeInstanceOf(NetworkError);
    expect(error.message).toBe('Refresh: fetch failed');
    expect(error.provider).toBe('github');
  });

  it('should recognise transient codes on the error itself', () => {
    const failure = Object.assign(new Error('read failed'), {
      code: 'ETIMEDOUT',
    });

    expect(AuthErrorFactory.fromUnknown(failure).isRetryable).toBe(true);
  });

  it('should keep anything else as an unknown system error', () => {
    const error = AuthErrorFactory.fromUnknown('boom');

    expect(error).toBeInstanceOf(AuthError);
    expect(error.type).toBe(AuthErrorType.UNKNOWN);
    expect(error.category).toBe(AuthErrorCategory.SYSTEM);
    expect(error.message).toBe('boom');
    expect(error.isRetryable).toBe(false);
  });
});

describe('computeBackoffDelay', () => {
  const config = {
    baseDelayMs: 1000,
    backoffMultiplier: 2,
    maxDelayMs: 30000,
    jitter: false,
  };

  it('should grow exponentially up to the cap', () => {
    expect(
      [1, 2, 3, 4, 5, 6].map((attempt) => computeBackoffDelay(attempt, config)),
    ).toEqual([1000, 2000, 4000, 8000, 16000, 30000]);
  });

  it('should scale jittered delays to 50-100%', () => {
    const jittered = { ...config, jitter: true };

    expect(computeBackoffDelay(3, jittered, () => 0)).toBe(2000);
    expect(computeBackoffDelay(3, jittered, () => 0.5)).toBe(3000);
    expect(computeBackoffDelay(3, jittered, () => 1)).toBe(4000);
  });
});
