import { afterEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_CONFIG, loadConfigFromEnv } from '../src/config';
import { CancelledError, NetworkFailureError } from '../src/services/cache/errors';
import { backoffDelay, isRetryable, sleep, withRetry, type RetryPolicy } from '../src/utils/backoff';

const MIB = 1024 * 1024;

describe('loadConfigFromEnv', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the defaults for an empty environment', () => {
    expect(loadConfigFromEnv({})).toEqual(DEFAULT_CONFIG);
  });

  it('reads overrides', () => {
    const config = loadConfigFromEnv({
      RADAR_CACHE_DIR: ' /var/cache/radar ',
      RADAR_CACHE_BUDGET_MB: '64',
      RADAR_CACHE_RING_SIZE: '2',
      RADAR_CACHE_MAX_DOWNLOADS: '4',
    });
    expect(config).toMatchObject({
      cacheDir: '/var/cache/radar',
      budgetBytes: 64 * MIB,
      ringCapacity: 2,
      maxConcurrentDownloads: 4,
    });
  });

  it('warns about and ignores invalid values', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const config = loadConfigFromEnv({ RADAR_CACHE_RING_SIZE: '5', RADAR_CACHE_BUDGET_MB: '-1' });

    expect(config.ringCapacity).toBe(DEFAULT_CONFIG.ringCapacity);
    expect(config.budgetBytes).toBe(512 * MIB);
    expect(warn).toHaveBeenCalledWith('[Config] Ignoring invalid RADAR_CACHE_RING_SIZE="5", using 3');
    expect(warn).toHaveBeenCalledTimes(2);
  });
});

describe('backoff', () => {
  const policy: RetryPolicy = { maxAttempts: 4, baseDelayMs: 100, maxDelayMs: 300, factor: 2 };

  it('grows the delay up to the cap', () => {
    expect([1, 2, 3, 4].map((n) => backoffDelay(policy, n))).toEqual([100, 200, 300, 300]);
  });

  it('retries network failures but not missing objects', () => {
    expect(isRetryable(new NetworkFailureError('reset'))).toBe(true);
    expect(isRetryable(new NetworkFailureError('throttled', 429))).toBe(true);
    expect(isRetryable(new NetworkFailureError('gone', 404))).toBe(false);
    expect(isRetryable(new TypeError('fetch failed'))).toBe(true);
    expect(isRetryable(new Error('other'))).toBe(false);
  });

  it('retries until success', async () => {
    const noDelay = { ...policy, baseDelayMs: 0 };
    const onRetry = vi.fn();
    let calls = 0;
    const result = await withRetry(async (attempt) => {
      calls++;
      if (attempt < 3) throw new NetworkFailureError('reset');
      return 'ok';
    }, noDelay, { onRetry });

    expect(result).toBe('ok');
    expect(calls).toBe(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
  });

  it('stops at a non-retryable error', async () => {
    let calls = 0;
    const run = withRetry(async () => {
      calls++;
      throw new NetworkFailureError('gone', 404);
    }, policy);
    await expect(run).rejects.toThrow('gone');
    expect(calls).toBe(1);
  });

  it('cancels a pending sleep', async () => {
    const controller = new AbortController();
    const pending = sleep(60_000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(CancelledError);
    await expect(sleep(10, controller.signal)).rejects.toBeInstanceOf(CancelledError);
  });
});
