import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { calculateDelayWithJitter, retryWithBackoff } from '../src/core/retry-manager';

describe('calculateDelayWithJitter', () => {
  it('should double the ceiling per attempt', () => {
    expect(calculateDelayWithJitter(0, 100, 10_000, () => 0.5)).toBe(50);
    expect(calculateDelayWithJitter(3, 100, 10_000, () => 0.5)).toBe(400);
  });

  it('should cap the ceiling at maxDelayMs', () => {
    expect(calculateDelayWithJitter(10, 100, 10_000, () => 0.5)).toBe(5_000);
  });
});

describe('retryWithBackoff', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const options = { maxRetries: 2, initialDelayMs: 10, maxDelayMs: 100, timeoutMs: 1_000, random: () => 0 };

  it('should return the first successful result', async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error('broker down')).mockResolvedValueOnce('connected');

    const result = await retryWithBackoff<string>(fn, options);

    expect(result).toMatchObject({ success: true, data: 'connected', attempts: 2 });
  });

  it('should report the last error after the final attempt', async () => {
    const fn = vi.fn(async () => {
      throw new Error('connection refused');
    });

    const result = await retryWithBackoff(fn, options);

    expect(fn).toHaveBeenCalledTimes(3);
    expect(result).toMatchObject({ success: false, error: 'connection refused', attempts: 3 });
  });

  it('should give up on an attempt that outlives the timeout', async () => {
    const never = () => new Promise<void>(() => undefined);

    const result = await retryWithBackoff(never, { ...options, maxRetries: 0, timeoutMs: 20 });

    expect(result).toMatchObject({ success: false, error: 'Operation timed out after 20ms', attempts: 1 });
  });
});
