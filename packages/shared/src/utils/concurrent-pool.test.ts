import { describe, expect, test, vi } from 'vitest';

import { ConcurrentPool, type PoolOutcome } from './concurrent-pool';

describe('ConcurrentPool', () => {
  describe('runSettled', () => {
    test('returns outcomes in input order', async () => {
      const outcomes = await ConcurrentPool.runSettled(
        [30, 10, 20],
        2,
        async (delay, index) => {
          await new Promise((resolve) => setTimeout(resolve, delay));
          return index * 10;
        },
      );

      expect(outcomes).toEqual([
        { status: 'fulfilled', index: 0, value: 0 },
        { status: 'fulfilled', index: 1, value: 10 },
        { status: 'fulfilled', index: 2, value: 20 },
      ]);
    });

    test('accepts synchronous tasks', async () => {
      const outcomes = await ConcurrentPool.runSettled([1, 2], 4, (n) => n + 1);

      expect(outcomes.map((o) => o.status)).toEqual(['fulfilled', 'fulfilled']);
    });

    test('isolates a failing item from the rest', async () => {
      const failure = new Error('page 1 failed');

      const outcomes = await ConcurrentPool.runSettled([0, 1, 2], 2, (n) => {
        if (n === 1) throw failure;
        return n;
      });

      expect(outcomes[0]).toEqual({ status: 'fulfilled', index: 0, value: 0 });
      expect(outcomes[1]).toEqual({
        status: 'rejected',
        index: 1,
        reason: failure,
      });
      expect(outcomes[2]).toEqual({ status: 'fulfilled', index: 2, value: 2 });
    });

    test('never runs more tasks than the concurrency limit', async () => {
      let active = 0;
      let peak = 0;

      await ConcurrentPool.runSettled(
        Array.from({ length: 8 }, (_, i) => i),
        3,
        async (item) => {
          active++;
          peak = Math.max(peak, active);
          await new Promise((resolve) => setTimeout(resolve, 5));
          active--;
          return item;
        },
      );

      expect(peak).toBe(3);
    });

    test('reports every settled item to the callback', async () => {
      const onItemSettled = vi.fn<(outcome: PoolOutcome<number>) => void>();

      await ConcurrentPool.runSettled([1, 2, 3], 2, (n) => n, onItemSettled);

      expect(onItemSettled).toHaveBeenCalledTimes(3);
    });

    test('returns an empty array for empty input', async () => {
      const outcomes = await ConcurrentPool.runSettled([], 3, (n: number) => n);

      expect(outcomes).toEqual([]);
    });

    test('rejects a non-positive concurrency', async () => {
      await expect(
        ConcurrentPool.runSettled([1], 0, (n) => n),
      ).rejects.toThrow('concurrency must be a positive integer, got 0');
    });
  });
});
