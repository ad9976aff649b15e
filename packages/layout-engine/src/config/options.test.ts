import { describe, expect, test } from 'vitest';

import { LayoutConfigurationError } from '../errors';
import {
  COLUMN_SEGMENTER,
  GAP_SEPARATOR,
  LAYOUT_ENGINE,
  PAGE_DEFAULTS,
} from './constants';
import {
  densityHistogramOptionsSchema,
  layoutEngineOptionsSchema,
  parseOptions,
} from './options';

describe('parseOptions', () => {
  test('fills every default', () => {
    const options = parseOptions(
      'LayoutEngine',
      layoutEngineOptionsSchema,
      undefined,
    );

    expect(options.concurrency).toBe(LAYOUT_ENGINE.CONCURRENCY);
    expect(options.page.defaultWidth).toBe(PAGE_DEFAULTS.WIDTH);
    expect(options.gap.minColumnWidth).toBe(GAP_SEPARATOR.MIN_COLUMN_WIDTH);
    expect(options.histogram.smoothing).toBe('moving-average');
    expect(options.gutter.stableRunLength).toBeUndefined();
    expect(options.segmenter.minWordsPerColumn).toBe(
      COLUMN_SEGMENTER.MIN_WORDS_PER_COLUMN,
    );
  });

  test('keeps given values', () => {
    const options = parseOptions('LayoutEngine', layoutEngineOptionsSchema, {
      gap: { adaptive: false },
      concurrency: 2,
    });

    expect(options.gap.adaptive).toBe(false);
    expect(options.concurrency).toBe(2);
  });

  test('rejects an even smoothing window', () => {
    expect(() =>
      parseOptions('DensityHistogramAnalyzer', densityHistogramOptionsSchema, {
        smoothingWindow: 4,
      }),
    ).toThrow(
      'Invalid DensityHistogramAnalyzer options: smoothingWindow: must be an odd number of bins',
    );
  });

  test('rejects unknown keys', () => {
    const result = layoutEngineOptionsSchema.safeParse({ pages: 3 });

    expect(result.success).toBe(false);
  });

  test('throws LayoutConfigurationError with every issue', () => {
    try {
      parseOptions('LayoutEngine', layoutEngineOptionsSchema, {
        concurrency: 0,
        page: { defaultWidth: -1 },
      });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(LayoutConfigurationError);
      if (error instanceof LayoutConfigurationError) {
        expect(error.issues).toHaveLength(2);
      }
    }
  });
});
