import { describe, expect, test } from 'vitest';

import { Stats } from './stats';

describe('Stats', () => {
  describe('percentile', () => {
    const values = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10];

    test('uses the floor(n * p) rank', () => {
      expect(Stats.percentile(values, 0.6)).toBe(7);
      expect(Stats.percentile(values, 0.75)).toBe(8);
      expect(Stats.percentile(values, 0.9)).toBe(10);
    });

    test('clamps p = 1 to the last element', () => {
      expect(Stats.percentile(values, 1)).toBe(10);
    });

    test('throws on empty input', () => {
      expect(() => Stats.percentile([], 0.5)).toThrow(
        'percentile of an empty array',
      );
    });
  });

  test('median picks the upper middle element', () => {
    expect(Stats.median([1, 2, 3, 4])).toBe(3);
    expect(Stats.median([5])).toBe(5);
  });

  test('sorted does not mutate its input', () => {
    const input = [3, 1, 2];

    expect(Stats.sorted(input)).toEqual([1, 2, 3]);
    expect(input).toEqual([3, 1, 2]);
  });

  test('mean and variance', () => {
    expect(Stats.mean([2, 4, 6])).toBe(4);
    expect(Stats.variance([2, 4, 6])).toBeCloseTo(8 / 3);
    expect(Stats.mean([])).toBe(0);
    expect(Stats.variance([])).toBe(0);
  });

  test('clamp', () => {
    expect(Stats.clamp(1.4)).toBe(1);
    expect(Stats.clamp(-0.2)).toBe(0);
    expect(Stats.clamp(7, 0, 5)).toBe(5);
  });
});
