import type { LoggerMethods } from '@pagecols/logger';
import type { ColumnBoundary, Word } from '@pagecols/model';

import { Stats } from '@pagecols/shared';

import {
  type GapSeparatorOptions,
  type ResolvedGapSeparatorOptions,
  gapSeparatorOptionsSchema,
  parseOptions,
} from '../config/options';
import {
  GAP_THRESHOLD_STRATEGIES,
  type GapStatistics,
  type GapThreshold,
  type GapThresholdStrategy,
} from './gap-threshold-strategies';

interface Gap {
  /** Right edge of the left interval */
  left: number;
  /** Left edge of the right interval */
  right: number;
  width: number;
}

/**
 * Full result of a gap analysis, for diagnostics and tests.
 */
export interface GapAnalysis {
  boundaries: ColumnBoundary[];
  stats: GapStatistics | null;
  /** Threshold that produced the separators, `null` when none did */
  threshold: GapThreshold | null;
  separators: number[];
}

/**
 * GapSeparatorDetector
 *
 * Derives column boundaries from horizontal gaps between word intervals.
 *
 * ## Algorithm
 *
 * 1. Sort `(x0, x1)` intervals by left edge, keep positive gaps between
 *    consecutive intervals
 * 2. Try the threshold strategies in order; every gap at or above the
 *    threshold becomes a separator at its midpoint
 * 3. Merge separators closer than `minColumnWidth` (first one wins)
 * 4. Cut the page left to right, skipping cuts that would leave a column
 *    narrower than `minColumnWidth`, and extend the last column to the page
 *    edge
 */
export class GapSeparatorDetector {
  private readonly options: ResolvedGapSeparatorOptions;

  constructor(
    private readonly logger: LoggerMethods,
    options?: GapSeparatorOptions,
    private readonly strategies: readonly GapThresholdStrategy[] =
      GAP_THRESHOLD_STRATEGIES,
  ) {
    this.options = parseOptions(
      'GapSeparatorDetector',
      gapSeparatorOptionsSchema,
      options,
    );
  }

  /**
   * Column boundaries covering `[0, pageWidth]`.
   */
  detect(words: readonly Word[], pageWidth: number): ColumnBoundary[] {
    return this.analyze(words, pageWidth).boundaries;
  }

  analyze(words: readonly Word[], pageWidth: number): GapAnalysis {
    const whole: ColumnBoundary[] = [{ xStart: 0, xEnd: pageWidth }];

    const gaps = GapSeparatorDetector.collectGaps(words);
    if (gaps.length === 0) {
      return {
        boundaries: whole,
        stats: null,
        threshold: null,
        separators: [],
      };
    }

    const stats = GapSeparatorDetector.computeStatistics(gaps);
    let threshold: GapThreshold | null = null;
    let separators: number[] = [];

    for (const strategy of this.strategies) {
      const candidate = strategy(stats, this.options);
      if (!candidate) continue;

      const found = GapSeparatorDetector.separatorsAt(gaps, candidate.value);
      this.logger.debug(
        `[GapSeparatorDetector] ${candidate.tier} threshold ${candidate.value.toFixed(1)} -> ${found.length} separator(s)`,
      );
      if (found.length > 0) {
        threshold = candidate;
        separators = found;
        break;
      }
    }

    this.logger.debug(
      `[GapSeparatorDetector] Gap stats: n=${stats.count}, median=${stats.median.toFixed(1)}, p60=${stats.p60.toFixed(1)}, p75=${stats.p75.toFixed(1)}, p90=${stats.p90.toFixed(1)}, max=${stats.max.toFixed(1)}`,
    );

    if (separators.length === 0) {
      return { boundaries: whole, stats, threshold: null, separators };
    }

    const boundaries = this.buildBoundaries(separators, pageWidth);
    return { boundaries, stats, threshold, separators };
  }

  private static collectGaps(words: readonly Word[]): Gap[] {
    const intervals = words
      .map((word) => [word.x0, word.x1] as const)
      .sort((a, b) => a[0] - b[0]);

    const gaps: Gap[] = [];
    for (let i = 0; i < intervals.length - 1; i++) {
      const left = intervals[i][1];
      const right = intervals[i + 1][0];
      const width = right - left;
      if (width > 0) {
        gaps.push({ left, right, width });
      }
    }
    return gaps;
  }

  private static computeStatistics(gaps: readonly Gap[]): GapStatistics {
    const sorted = Stats.sorted(gaps.map((gap) => gap.width));
    return {
      count: sorted.length,
      median: Stats.median(sorted),
      p60: Stats.percentile(sorted, 0.6),
      p75: Stats.percentile(sorted, 0.75),
      p90: Stats.percentile(sorted, 0.9),
      max: sorted[sorted.length - 1],
    };
  }

  private static separatorsAt(
    gaps: readonly Gap[],
    threshold: number,
  ): number[] {
    return gaps
      .filter((gap) => gap.width >= threshold)
      .map((gap) => (gap.left + gap.right) / 2);
  }

  private buildBoundaries(
    separators: readonly number[],
    pageWidth: number,
  ): ColumnBoundary[] {
    const { minColumnWidth } = this.options;

    // Separators off the page (words past the reported width) cannot cut it
    const onPage = Stats.sorted(separators).filter(
      (x) => x > 0 && x < pageWidth,
    );

    const merged: number[] = [];
    for (const separator of onPage) {
      const last = merged[merged.length - 1];
      if (last === undefined || separator - last >= minColumnWidth) {
        merged.push(separator);
      }
    }

    const boundaries: ColumnBoundary[] = [];
    let xStart = 0;
    for (const separator of merged) {
      if (separator - xStart >= minColumnWidth) {
        boundaries.push({ xStart, xEnd: separator });
        xStart = separator;
      }
    }

    if (pageWidth - xStart >= minColumnWidth) {
      boundaries.push({ xStart, xEnd: pageWidth });
    } else if (boundaries.length > 0) {
      const last = boundaries[boundaries.length - 1];
      boundaries[boundaries.length - 1] = {
        xStart: last.xStart,
        xEnd: pageWidth,
      };
    } else {
      boundaries.push({ xStart: 0, xEnd: pageWidth });
    }

    this.logger.debug(
      `[GapSeparatorDetector] ${boundaries.length} column(s): ${boundaries
        .map((b) => `${b.xStart.toFixed(1)}-${b.xEnd.toFixed(1)}`)
        .join(', ')}`,
    );
    return boundaries;
  }
}
