/**
 * Async Utilities Unit Tests
 */

import { describe, it, expect } from '@jest/globals';
import { TimeoutError } from '@regionguard/types';
import { withTimeout, sleep, mapConcurrent } from '../../src/async';

describe('withTimeout', () => {
  it('resolves when the promise settles before the timeout', async () => {
    await expect(withTimeout(Promise.resolve('ok'), 1000)).resolves.toBe('ok');
  });

  it('rejects with TimeoutError naming the operation', async () => {
    const never = new Promise<string>(() => undefined);
    const result = withTimeout(never, 10, 'probe api@us-east-1');

    await expect(result).rejects.toBeInstanceOf(TimeoutError);
    await expect(withTimeout(never, 10, 'probe api@us-east-1')).rejects.toThrow(/probe api@us-east-1/);
  });

  it('passes through the original rejection', async () => {
    await expect(withTimeout(Promise.reject(new Error('boom')), 1000)).rejects.toThrow('boom');
  });

  it('rejects a negative timeout', async () => {
    await expect(withTimeout(Promise.resolve(1), -1)).rejects.toThrow(TypeError);
  });
});

describe('sleep', () => {
  it('resolves after the delay', async () => {
    const start = Date.now();
    await sleep(15);
    expect(Date.now() - start).toBeGreaterThanOrEqual(10);
  });
});

describe('mapConcurrent', () => {
  it('keeps input order in the results', async () => {
    const results = await mapConcurrent([30, 5, 15], async (ms, index) => {
      await sleep(ms);
      return index;
    }, 3);
    expect(results).toEqual([0, 1, 2]);
  });

  it('never exceeds the concurrency limit', async () => {
    let active = 0;
    let peak = 0;
    await mapConcurrent([1, 2, 3, 4, 5, 6], async () => {
      active++;
      peak = Math.max(peak, active);
      await sleep(5);
      active--;
    }, 2);
    expect(peak).toBe(2);
  });

  it('returns an empty array for no items', async () => {
    await expect(mapConcurrent([], async () => 1, 4)).resolves.toEqual([]);
  });
});
