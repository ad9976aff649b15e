import { describe, expect, test } from 'vitest';

import { word } from '../__fixtures__/pages';
import { LineGrouper } from '../lines/line-grouper';
import { PageStatistics } from './page-statistics';

describe('PageStatistics', () => {
  test('avgWordWidthRatio', () => {
    const words = [word(0, 0, 20, 10), word(50, 0, 110, 10)];

    expect(PageStatistics.avgWordWidthRatio(words, 400)).toBe(0.1);
    expect(PageStatistics.avgWordWidthRatio([], 400)).toBe(0);
  });

  test('lineDensityVariance is the variance of words per line', () => {
    const lines = new LineGrouper(5).group([
      word(0, 0, 10, 10),
      word(20, 0, 30, 10),
      word(40, 0, 50, 10),
      word(0, 40, 10, 50),
    ]);

    expect(PageStatistics.lineDensityVariance(lines)).toBe(1);
    expect(PageStatistics.lineDensityVariance([])).toBe(0);
  });

  test('columnBalance compares the narrowest and widest column', () => {
    expect(
      PageStatistics.columnBalance([
        { xStart: 0, xEnd: 200 },
        { xStart: 200, xEnd: 600 },
      ]),
    ).toBe(0.5);
    expect(PageStatistics.columnBalance([{ xStart: 0, xEnd: 600 }])).toBe(1);
  });
});
