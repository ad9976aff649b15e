import type { LoggerMethods } from '@pagecols/logger';
import type { Word } from '@pagecols/model';

import { Stats } from '@pagecols/shared';

import { DENSITY_HISTOGRAM } from '../config/constants';
import {
  type DensityHistogramOptions,
  type ResolvedDensityHistogramOptions,
  densityHistogramOptionsSchema,
  parseOptions,
} from '../config/options';
import { WordGeometry } from '../geometry/word-geometry';
import { type Smoother, createSmoother } from './smoothers';

/**
 * Peak and valley structure of the horizontal word density.
 */
export interface DensityProfile {
  /** Smoothed density per bin, normalized to [0, 1] */
  histogram: number[];
  binWidth: number;

  /** Bin indices of the retained peaks, ascending */
  peaks: number[];

  /** Bin index of the lowest point between each pair of adjacent peaks */
  valleys: number[];

  /**
   * Lowest valley value. Near 0 means columns separated by empty space,
   * 1.0 when there are fewer than two peaks.
   */
  valleyDepthRatio: number;
}

/**
 * DensityHistogramAnalyzer
 *
 * Histogram of word centers across the page width. The result only
 * corroborates the gap and gutter signals; it never decides a layout alone.
 */
export class DensityHistogramAnalyzer {
  private readonly options: ResolvedDensityHistogramOptions;
  private readonly smoother: Smoother;

  constructor(
    private readonly logger: LoggerMethods,
    options?: DensityHistogramOptions,
  ) {
    this.options = parseOptions(
      'DensityHistogramAnalyzer',
      densityHistogramOptionsSchema,
      options,
    );
    this.smoother = createSmoother(this.options);
  }

  /**
   * @param expectedColumns - Column count suggested by the gap detector; lowers
   *   the peak threshold and the minimum peak distance when above 1
   */
  analyze(
    words: readonly Word[],
    pageWidth: number,
    expectedColumns = 1,
  ): DensityProfile {
    const { binWidth } = this.options;
    const binCount = Math.max(1, Math.ceil(pageWidth / binWidth));

    const counts = new Array<number>(binCount).fill(0);
    for (const word of words) {
      const bin = Math.floor(WordGeometry.xCenter(word) / binWidth);
      counts[Math.min(binCount - 1, Math.max(0, bin))] += 1;
    }

    const smoothed = this.smoother.smooth(counts);
    const max = smoothed.reduce((acc, value) => Math.max(acc, value), 0);
    const histogram = max > 0 ? smoothed.map((value) => value / max) : smoothed;

    const peaks = DensityHistogramAnalyzer.findPeaks(
      histogram,
      expectedColumns,
    );
    const valleys = DensityHistogramAnalyzer.findValleys(histogram, peaks);
    const valleyDepthRatio =
      valleys.length > 0
        ? valleys.reduce((acc, bin) => Math.min(acc, histogram[bin]), 1)
        : 1;

    this.logger.debug(
      `[DensityHistogramAnalyzer] ${this.smoother.name}: ${peaks.length} peak(s), ${valleys.length} valley(s), depth ratio ${valleyDepthRatio.toFixed(3)}`,
    );

    return { histogram, binWidth, peaks, valleys, valleyDepthRatio };
  }

  /**
   * Strict local maxima above the adaptive threshold. Of two peaks closer than
   * the minimum distance the higher one is kept.
   */
  static findPeaks(
    histogram: readonly number[],
    expectedColumns: number,
  ): number[] {
    const columns = Math.max(1, expectedColumns);
    const factor =
      columns > 1
        ? DENSITY_HISTOGRAM.MULTI_COLUMN_PEAK_FACTOR
        : DENSITY_HISTOGRAM.SINGLE_COLUMN_PEAK_FACTOR;
    const threshold = Stats.mean(histogram) * factor;
    const minDistance = Math.max(
      1,
      Math.round(
        histogram.length / (DENSITY_HISTOGRAM.PEAK_DISTANCE_DIVISOR * columns),
      ),
    );

    const peaks: number[] = [];
    for (let i = 0; i < histogram.length; i++) {
      const value = histogram[i];
      const prev = i > 0 ? histogram[i - 1] : -Infinity;
      const next = i < histogram.length - 1 ? histogram[i + 1] : -Infinity;
      if (value <= 0 || value < threshold || value <= prev || value <= next) {
        continue;
      }

      const last = peaks[peaks.length - 1];
      if (last === undefined || i - last >= minDistance) {
        peaks.push(i);
      } else if (value > histogram[last]) {
        peaks[peaks.length - 1] = i;
      }
    }
    return peaks;
  }

  static findValleys(
    histogram: readonly number[],
    peaks: readonly number[],
  ): number[] {
    const valleys: number[] = [];
    for (let p = 0; p < peaks.length - 1; p++) {
      let minBin = peaks[p];
      for (let bin = peaks[p]; bin <= peaks[p + 1]; bin++) {
        if (histogram[bin] < histogram[minBin]) minBin = bin;
      }
      valleys.push(minBin);
    }
    return valleys;
  }
}
