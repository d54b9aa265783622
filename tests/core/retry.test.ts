/**
 * Model Relay - Retry Logic & Timeout Unit Tests
 */

import { describe, it, expect, vi } from 'vitest';
import {
  withRetry,
  withTimeout,
  isRetryableError,
  calculateDelay,
  RETRYABLE_ERROR_CODES,
} from '../../src/core/retry.js';
import { AuthError, ProviderError, TimeoutError } from '../../src/core/errors.js';

const FAST = { baseDelay: 1, maxDelay: 1, jitter: false };

describe('isRetryableError', () => {
  it('should return true for retryable system error codes', () => {
    for (const code of RETRYABLE_ERROR_CODES) {
      expect(isRetryableError(Object.assign(new Error('test'), { code }))).toBe(true);
    }
  });

  it('should look at the cause for a system error code', () => {
    const error = new TypeError('fetch failed', { cause: Object.assign(new Error('x'), { code: 'ECONNREFUSED' }) });
    expect(isRetryableError(error)).toBe(true);
  });

  it('should follow the relay retryable flag', () => {
    expect(isRetryableError(new ProviderError('503', 'aliyun', 'upstream'))).toBe(true);
    expect(isRetryableError(new ProviderError('401', 'aliyun', 'authentication'))).toBe(false);
    expect(isRetryableError(new AuthError('no'))).toBe(false);
  });

  it('should not retry plain errors', () => {
    expect(isRetryableError(new Error('Connection timeout'))).toBe(false);
  });

  it('should return false for non-Error values', () => {
    expect(isRetryableError('string error')).toBe(false);
    expect(isRetryableError(null)).toBe(false);
  });

  it('should use custom shouldRetry function', () => {
    const error = new Error('custom error');
    const shouldRetry = vi.fn().mockReturnValue(true);

    expect(isRetryableError(error, { shouldRetry })).toBe(true);
    expect(shouldRetry).toHaveBeenCalledWith(error);
  });
});

describe('calculateDelay', () => {
  it('should calculate exponential delay', () => {
    const options = { baseDelay: 1000, backoffMultiplier: 2, jitter: false };

    expect(calculateDelay(0, options)).toBe(1000);
    expect(calculateDelay(1, options)).toBe(2000);
    expect(calculateDelay(2, options)).toBe(4000);
  });

  it('should cap at maxDelay', () => {
    expect(calculateDelay(10, { baseDelay: 1000, maxDelay: 5000, jitter: false })).toBe(5000);
  });

  it('should keep jittered delays within half to one and a half of the base', () => {
    for (let i = 0; i < 20; i++) {
      const delay = calculateDelay(0, { baseDelay: 1000, maxDelay: 30000, jitter: true });
      expect(delay).toBeGreaterThanOrEqual(500);
      expect(delay).toBeLessThanOrEqual(1500);
    }
  });
});

describe('withRetry', () => {
  it('should return the first successful result', async () => {
    const fn = vi.fn().mockResolvedValue('ok');

    await expect(withRetry(fn, FAST)).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(fn).toHaveBeenCalledWith(0);
  });

  it('should retry transient failures and pass the attempt number', async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new ProviderError('503', 'deepseek', 'upstream'))
      .mockRejectedValueOnce(new TimeoutError('slow', 10))
      .mockResolvedValue('done');
    const onRetry = vi.fn();

    await expect(withRetry(fn, { ...FAST, maxRetries: 3, onRetry })).resolves.toBe('done');
    expect(fn.mock.calls).toEqual([[0], [1], [2]]);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls[0][0]).toMatchObject({ attempt: 1, maxRetries: 3, delay: 1 });
  });

  it('should not retry permanent failures', async () => {
    const error = new ProviderError('bad request', 'gemini', 'malformed_request');
    const fn = vi.fn().mockRejectedValue(error);

    await expect(withRetry(fn, FAST)).rejects.toBe(error);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should give up after maxRetries + 1 attempts', async () => {
    const error = new ProviderError('down', 'ollama', 'network');
    const fn = vi.fn().mockRejectedValue(error);

    await expect(withRetry(fn, { ...FAST, maxRetries: 2 })).rejects.toBe(error);
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should wrap non-Error rejections', async () => {
    const fn = vi.fn().mockRejectedValue('text');

    await expect(withRetry(fn, FAST)).rejects.toThrow('text');
  });
});

describe('withTimeout', () => {
  it('should resolve when the function is faster than the timeout', async () => {
    await expect(withTimeout(async () => 'fast', 1000)).resolves.toBe('fast');
  });

  it('should reject with TimeoutError and abort the controller', async () => {
    const controller = new AbortController();
    const never = () => new Promise<string>(() => undefined);

    const promise = withTimeout(never, 10, 'Provider call timed out', controller);

    await expect(promise).rejects.toBeInstanceOf(TimeoutError);
    await expect(promise).rejects.toThrow('Provider call timed out');
    expect(controller.signal.aborted).toBe(true);
  });

  it('should pass through the function error', async () => {
    const error = new Error('boom');

    await expect(withTimeout(() => Promise.reject(error), 1000)).rejects.toBe(error);
  });
});
