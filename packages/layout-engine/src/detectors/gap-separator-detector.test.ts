import { beforeEach, describe, expect, test } from 'vitest';

import { gapSplitWords, mockLogger, word } from '../__fixtures__/pages';
import { LayoutConfigurationError } from '../errors';
import { GapSeparatorDetector } from './gap-separator-detector';

describe('GapSeparatorDetector', () => {
  let logger: ReturnType<typeof mockLogger>;
  let detector: GapSeparatorDetector;

  beforeEach(() => {
    logger = mockLogger();
    detector = new GapSeparatorDetector(logger);
  });

  test('returns the whole page without words', () => {
    expect(detector.detect([], 612)).toEqual([{ xStart: 0, xEnd: 612 }]);
  });

  test('returns the whole page when words only overlap', () => {
    const analysis = detector.analyze(
      [word(0, 0, 100, 10), word(50, 0, 150, 10)],
      600,
    );

    expect(analysis.boundaries).toEqual([{ xStart: 0, xEnd: 600 }]);
    expect(analysis.stats).toBeNull();
    expect(analysis.threshold).toBeNull();
  });

  test('splits at one dominant gap with the aggressive tier', () => {
    const analysis = detector.analyze(gapSplitWords(), 600);

    expect(analysis.stats).toEqual({
      count: 49,
      median: 5,
      p60: 5,
      p75: 5,
      p90: 5,
      max: 200,
    });
    expect(analysis.threshold).toEqual({ tier: 'aggressive', value: 12 });
    expect(analysis.separators).toEqual([300]);
    expect(analysis.boundaries).toEqual([
      { xStart: 0, xEnd: 300 },
      { xStart: 300, xEnd: 600 },
    ]);
  });

  test('keeps only gaps at the p90 in uniformly spaced text', () => {
    const words = [
      word(0, 0, 10, 10),
      word(35, 0, 45, 10),
      word(75, 0, 85, 10),
      word(120, 0, 130, 10),
    ];

    const analysis = detector.analyze(words, 300);

    expect(analysis.threshold).toEqual({ tier: 'strict', value: 35 });
    expect(analysis.boundaries).toEqual([
      { xStart: 0, xEnd: 102.5 },
      { xStart: 102.5, xEnd: 300 },
    ]);
  });

  test('uses the p75 between the two extremes', () => {
    const words = [
      word(0, 0, 90, 10),
      word(100, 0, 190, 10),
      word(200, 0, 290, 10),
      word(315, 0, 400, 10),
    ];

    const analysis = detector.analyze(words, 500);

    expect(analysis.threshold).toEqual({ tier: 'standard', value: 25 });
    expect(analysis.boundaries).toEqual([
      { xStart: 0, xEnd: 302.5 },
      { xStart: 302.5, xEnd: 500 },
    ]);
  });

  test('retries with the fallback threshold when the first tier finds nothing', () => {
    const words = [
      word(0, 0, 100, 10),
      word(112, 0, 200, 10),
      word(212, 0, 300, 10),
      word(312, 0, 400, 10),
    ];

    const analysis = detector.analyze(words, 400);

    expect(analysis.threshold).toEqual({ tier: 'fallback', value: 12 });
    expect(analysis.boundaries).toEqual([
      { xStart: 0, xEnd: 106 },
      { xStart: 106, xEnd: 206 },
      { xStart: 206, xEnd: 306 },
      { xStart: 306, xEnd: 400 },
    ]);
    expect(logger.debug).toHaveBeenCalledWith(
      '[GapSeparatorDetector] strict threshold 30.0 -> 0 separator(s)',
    );
    expect(logger.debug).toHaveBeenCalledWith(
      '[GapSeparatorDetector] fallback threshold 12.0 -> 3 separator(s)',
    );
  });

  test('non-adaptive mode uses minGapWidth as the threshold', () => {
    const fixed = new GapSeparatorDetector(logger, { adaptive: false });
    const words = [
      word(0, 0, 90, 10),
      word(100, 0, 190, 10),
      word(200, 0, 290, 10),
      word(315, 0, 400, 10),
    ];

    const analysis = fixed.analyze(words, 500);

    expect(analysis.threshold).toEqual({ tier: 'fixed', value: 20 });
    expect(analysis.separators).toEqual([302.5]);
  });

  test('merges separators closer than minColumnWidth', () => {
    const words = [
      word(0, 0, 90, 10),
      word(110, 0, 140, 10),
      word(160, 0, 400, 10),
    ];

    const analysis = detector.analyze(words, 500);

    expect(analysis.separators).toEqual([100, 150]);
    expect(analysis.boundaries).toEqual([
      { xStart: 0, xEnd: 100 },
      { xStart: 100, xEnd: 500 },
    ]);
  });

  test('folds a narrow last column into its neighbor', () => {
    const boundaries = detector.detect(
      [word(0, 0, 200, 10), word(260, 0, 280, 10)],
      300,
    );

    expect(boundaries).toEqual([{ xStart: 0, xEnd: 300 }]);
  });

  test('drops a separator that would close a narrow first column', () => {
    const boundaries = detector.detect(
      [word(0, 0, 40, 10), word(60, 0, 300, 10)],
      400,
    );

    expect(boundaries).toEqual([{ xStart: 0, xEnd: 400 }]);
  });

  test('ignores separators beyond the page width', () => {
    const boundaries = detector.detect(
      [word(0, 0, 200, 10), word(300, 0, 400, 10)],
      240,
    );

    expect(boundaries).toEqual([{ xStart: 0, xEnd: 240 }]);
  });

  test('accepts a custom strategy list', () => {
    const never = new GapSeparatorDetector(logger, undefined, [
      () => ({ tier: 'fixed', value: 1000 }),
    ]);

    expect(never.detect(gapSplitWords(), 600)).toEqual([
      { xStart: 0, xEnd: 600 },
    ]);
  });

  test('logs gap statistics', () => {
    detector.detect(gapSplitWords(), 600);

    expect(logger.debug).toHaveBeenCalledWith(
      '[GapSeparatorDetector] Gap stats: n=49, median=5.0, p60=5.0, p75=5.0, p90=5.0, max=200.0',
    );
  });

  test('rejects a non-positive minColumnWidth', () => {
    expect(
      () => new GapSeparatorDetector(logger, { minColumnWidth: 0 }),
    ).toThrow(
      LayoutConfigurationError,
    );
    expect(() => new GapSeparatorDetector(logger, { minGapWidth: -5 })).toThrow(
      /minGapWidth/,
    );
  });
});
