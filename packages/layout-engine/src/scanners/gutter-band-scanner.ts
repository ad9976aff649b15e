import type { LoggerMethods } from '@pagecols/logger';
import type { GutterMetrics, Word } from '@pagecols/model';

import {
  type GutterBandScannerOptions,
  type ResolvedGutterBandScannerOptions,
  gutterBandScannerOptionsSchema,
  parseOptions,
} from '../config/options';
import { MovingAverageSmoother } from '../analyzers/smoothers';
import { WordGeometry } from '../geometry/word-geometry';

const NO_GUTTER: GutterMetrics = Object.freeze({
  coverage: 0,
  headerFraction: 0,
  gutterX: null,
});

/**
 * GutterBandScanner
 *
 * Measures whether a vertical gutter near the middle of the page persists
 * from top to bottom.
 *
 * ## Algorithm
 *
 * 1. Binned, smoothed density of all word centers; the gutter center is the
 *    middle of the lowest-density run within `bins * searchFraction` of the
 *    horizontal midpoint
 * 2. The gutter is discarded when either side holds fewer than
 *    `minSideWordFraction` of the words (a lone column is not split)
 * 3. The page is cut into `bandCount` horizontal bands. For each band the
 *    density of the words intersecting it is normalized by `max(1, localMax)`
 *    and its minimum is read within `gutterWindowBins` of the gutter center.
 *    A band at or below `zeroDensityMax` is gutter-clear, unless one of its
 *    word boxes crosses the gutter
 * 4. Bands without words are neither clear nor blocked; they only break a run
 *
 * `coverage` is clear bands over all bands. `headerFraction` is the index of
 * the first band of the first run of `stableRunLength` clear bands, over the
 * band count.
 */
export class GutterBandScanner {
  private readonly options: ResolvedGutterBandScannerOptions;
  private readonly smoother: MovingAverageSmoother;

  constructor(
    private readonly logger: LoggerMethods,
    options?: GutterBandScannerOptions,
  ) {
    this.options = parseOptions(
      'GutterBandScanner',
      gutterBandScannerOptionsSchema,
      options,
    );
    this.smoother = new MovingAverageSmoother(this.options.smoothingWindow);
  }

  get stableRunLength(): number {
    return (
      this.options.stableRunLength ??
      Math.max(4, Math.floor(this.options.bandCount / 12))
    );
  }

  scan(
    words: readonly Word[],
    pageWidth: number,
    pageHeight: number,
  ): GutterMetrics {
    if (words.length === 0) return NO_GUTTER;

    const { bins, bandCount, gutterWindowBins, zeroDensityMax } = this.options;
    const centers = words.map((word) => WordGeometry.xCenter(word));
    const binOf = (x: number): number =>
      Math.min(bins - 1, Math.max(0, Math.floor((x * bins) / pageWidth)));

    const globalDensity = this.density(centers.map(binOf));
    const centerBin = this.locateGutter(globalDensity);
    const gutterX = ((centerBin + 0.5) * pageWidth) / bins;

    if (!this.hasWordsOnBothSides(centers, gutterX)) {
      this.logger.debug(
        `[GutterBandScanner] Gutter at ${gutterX.toFixed(1)} has words on one side only`,
      );
      return NO_GUTTER;
    }

    const windowStart = Math.max(0, centerBin - gutterWindowBins);
    const windowEnd = Math.min(bins, centerBin + gutterWindowBins + 1);
    const bandHeight = pageHeight / bandCount;
    const runLength = this.stableRunLength;

    let clearBands = 0;
    let run = 0;
    let stableStart: number | null = null;

    for (let band = 0; band < bandCount; band++) {
      const top = band * bandHeight;
      const bottom = Math.min(pageHeight, top + bandHeight);

      const bandBins: number[] = [];
      let crossed = false;
      for (let i = 0; i < words.length; i++) {
        const word = words[i];
        if (word.y1 > top && word.y0 < bottom) {
          bandBins.push(binOf(centers[i]));
          if (word.x0 < gutterX && word.x1 > gutterX) crossed = true;
        }
      }
      if (bandBins.length === 0) {
        run = 0;
        continue;
      }

      const density = this.density(bandBins);
      let minimum = Infinity;
      for (let bin = windowStart; bin < windowEnd; bin++) {
        minimum = Math.min(minimum, density[bin]);
      }

      if (!crossed && minimum <= zeroDensityMax) {
        clearBands++;
        run++;
        if (stableStart === null && run >= runLength) {
          stableStart = band - runLength + 1;
        }
      } else {
        run = 0;
      }
    }

    const metrics: GutterMetrics = Object.freeze({
      coverage: clearBands / bandCount,
      headerFraction: stableStart === null ? 0 : stableStart / bandCount,
      gutterX,
    });

    this.logger.debug(
      `[GutterBandScanner] gutter=${gutterX.toFixed(1)} coverage=${metrics.coverage.toFixed(3)} header=${metrics.headerFraction.toFixed(3)}`,
    );
    return metrics;
  }

  /**
   * Smoothed counts of the given bin indices, divided by `max(1, peak)`.
   */
  private density(binIndices: readonly number[]): number[] {
    const counts = new Array<number>(this.options.bins).fill(0);
    for (const bin of binIndices) counts[bin] += 1;
    const smoothed = this.smoother.smooth(counts);
    const divisor = Math.max(
      1,
      smoothed.reduce((acc, value) => Math.max(acc, value), 0),
    );
    return smoothed.map((value) => value / divisor);
  }

  private locateGutter(density: readonly number[]): number {
    const { bins, searchFraction } = this.options;
    const mid = Math.floor(bins / 2);
    const half = Math.max(1, Math.floor(bins * searchFraction));
    const start = Math.max(0, mid - half);
    const end = Math.min(bins, mid + half);

    let first = start;
    for (let bin = start; bin < end; bin++) {
      if (density[bin] < density[first]) first = bin;
    }
    let last = first;
    while (last + 1 < end && density[last + 1] === density[first]) last++;

    return Math.floor((first + last) / 2);
  }

  private hasWordsOnBothSides(
    centers: readonly number[],
    gutterX: number,
  ): boolean {
    let left = 0;
    let right = 0;
    for (const x of centers) {
      if (x < gutterX) left++;
      else if (x > gutterX) right++;
    }
    const required = centers.length * this.options.minSideWordFraction;
    return left >= required && right >= required;
  }
}
