import type { LoggerMethods } from '@pagecols/logger';
import type {
  ColumnBoundary,
  DetectionMethod,
  GutterMetrics,
  Layout,
  Page,
} from '@pagecols/model';

import { LayoutType } from '@pagecols/model';
import { Stats } from '@pagecols/shared';

import {
  type ClassifierOptions,
  type ResolvedClassifierOptions,
  classifierOptionsSchema,
  parseOptions,
} from '../config/options';
import type {
  DensityHistogramAnalyzer,
  DensityProfile,
} from '../analyzers/density-histogram-analyzer';
import type { GapSeparatorDetector } from '../detectors/gap-separator-detector';
import { PageStatistics } from '../features/page-statistics';
import type {
  FullWidthLineDetector,
  FullWidthLineReport,
} from '../lines/full-width-line-detector';
import type { LineGrouper, TextLine } from '../lines/line-grouper';
import type { GutterBandScanner } from '../scanners/gutter-band-scanner';
import type { YOverlapScorer } from '../scorers/y-overlap-scorer';
import { LayoutFactory } from './layout-factory';
import type { SideBySideLinePartitioner } from './side-by-side-line-partitioner';

/**
 * Signal components the classifier fuses.
 */
export interface LayoutClassifierComponents {
  gapDetector: GapSeparatorDetector;
  histogramAnalyzer: DensityHistogramAnalyzer;
  gutterScanner: GutterBandScanner;
  yOverlapScorer: YOverlapScorer;
  lineGrouper: LineGrouper;
  fullWidthDetector: FullWidthLineDetector;
  partitioner: SideBySideLinePartitioner;
}

/**
 * Everything measured on a page before the decision.
 */
export interface LayoutSignals {
  gapBoundaries: ColumnBoundary[];
  gutter: GutterMetrics;
  density: DensityProfile;
  meanYOverlap: number;
  lines: TextLine[];
  lineReport: FullWidthLineReport;
}

interface Decision {
  type: LayoutType;
  boundaries: ColumnBoundary[];
  confidence: number;
  compositeScore: number | null;
  detectionMethod: DetectionMethod;
}

/**
 * LayoutClassifier
 *
 * Fuses the page signals into a layout type and column boundaries.
 *
 * ## Decision
 *
 * 1. The gap detector sees one column and the gutter is weak
 *    (`coverage < coverageThreshold`): single column
 * 2. The gutter persists (`coverage >= coverageThreshold`): hybrid when there
 *    are full-width lines or a header above the columns, multi otherwise.
 *    Boundaries come from the gap detector, or a split at the gutter center
 *    when it found a single column
 * 3. Otherwise a weighted composite of valley depth, vertical overlap and
 *    full-width lines picks hybrid or multi, and the side-by-side line
 *    partition supplies the boundaries. Without a partition the page is
 *    reported as a single column.
 */
export class LayoutClassifier {
  private readonly options: ResolvedClassifierOptions;

  constructor(
    private readonly logger: LoggerMethods,
    private readonly components: LayoutClassifierComponents,
    options?: ClassifierOptions,
  ) {
    this.options = parseOptions(
      'LayoutClassifier',
      classifierOptionsSchema,
      options,
    );
  }

  classify(page: Page): Layout {
    const signals = this.measure(page);
    return this.decide(page, signals);
  }

  measure(page: Page): LayoutSignals {
    const {
      gapDetector,
      histogramAnalyzer,
      gutterScanner,
      yOverlapScorer,
      lineGrouper,
      fullWidthDetector,
    } = this.components;

    const gapBoundaries = gapDetector.detect(page.words, page.width);
    const lines = lineGrouper.group(page.words);

    return {
      gapBoundaries,
      gutter: gutterScanner.scan(page.words, page.width, page.height),
      density: histogramAnalyzer.analyze(
        page.words,
        page.width,
        gapBoundaries.length,
      ),
      meanYOverlap: yOverlapScorer.score(page.words),
      lines,
      lineReport: fullWidthDetector.detect(lines, page.width),
    };
  }

  decide(page: Page, signals: LayoutSignals): Layout {
    const decision = this.resolve(page, signals);
    const { gutter, density, lineReport } = signals;

    const layout = LayoutFactory.create(
      page,
      decision.type,
      decision.boundaries,
      decision.confidence,
      {
        totalWords: page.words.length,
        gapColumnCount: signals.gapBoundaries.length,
        coverage: gutter.coverage,
        headerFraction: gutter.headerFraction,
        gutterX: gutter.gutterX,
        valleyDepthRatio: density.valleyDepthRatio,
        peakCount: density.peaks.length,
        valleyCount: density.valleys.length,
        meanYOverlap: signals.meanYOverlap,
        lineCount: lineReport.lineCount,
        fullWidthLineCount: lineReport.fullWidthLineCount,
        fullWidthLineRatio: lineReport.fullWidthLineRatio,
        hasHorizontal: lineReport.hasHorizontal,
        compositeScore: decision.compositeScore,
        detectionMethod: decision.detectionMethod,
        avgWordWidthRatio: PageStatistics.avgWordWidthRatio(
          page.words,
          page.width,
        ),
        lineDensityVariance: PageStatistics.lineDensityVariance(signals.lines),
        columnBalance: PageStatistics.columnBalance(decision.boundaries),
      },
    );

    this.logger.debug(
      `[LayoutClassifier] Page ${page.pageIndex}: ${layout.typeName}, ${layout.numColumns} column(s), confidence ${layout.confidence.toFixed(2)} via ${decision.detectionMethod}`,
    );
    return layout;
  }

  /**
   * Weighted fallback score in [0, 1].
   */
  compositeScore(
    valleyDepthRatio: number,
    meanYOverlap: number,
    hasHorizontal: boolean,
  ): number {
    const o = this.options;
    return (
      o.valleyWeight * Stats.clamp(valleyDepthRatio / o.valleyThreshold) +
      o.yOverlapWeight * Stats.clamp(meanYOverlap * o.yOverlapScale) +
      o.horizontalWeight * (hasHorizontal ? 1 : 0)
    );
  }

  private resolve(page: Page, signals: LayoutSignals): Decision {
    const o = this.options;
    const whole: ColumnBoundary[] = [{ xStart: 0, xEnd: page.width }];
    const { gapBoundaries, gutter, lineReport } = signals;

    if (gapBoundaries.length === 1 && gutter.coverage < o.coverageThreshold) {
      return {
        type: LayoutType.SINGLE,
        boundaries: whole,
        confidence: o.singleConfidence,
        compositeScore: null,
        detectionMethod: 'none',
      };
    }

    if (gutter.coverage >= o.coverageThreshold) {
      const type =
        lineReport.hasHorizontal ||
        gutter.headerFraction > o.headerFractionThreshold
          ? LayoutType.HYBRID
          : LayoutType.MULTI;

      if (gapBoundaries.length > 1) {
        return {
          type,
          boundaries: gapBoundaries,
          confidence: o.gutterConfidence,
          compositeScore: null,
          detectionMethod: 'gap',
        };
      }
      if (
        gutter.gutterX !== null &&
        gutter.gutterX > 0 &&
        gutter.gutterX < page.width
      ) {
        return {
          type,
          boundaries: [
            { xStart: 0, xEnd: gutter.gutterX },
            { xStart: gutter.gutterX, xEnd: page.width },
          ],
          confidence: o.gutterConfidence,
          compositeScore: null,
          detectionMethod: 'gutter',
        };
      }
      this.logger.warn(
        `[LayoutClassifier] Page ${page.pageIndex}: gutter coverage ${gutter.coverage.toFixed(2)} without a gutter position`,
      );
      return {
        type: LayoutType.SINGLE,
        boundaries: whole,
        confidence: o.singleConfidence,
        compositeScore: null,
        detectionMethod: 'none',
      };
    }

    const score = this.compositeScore(
      signals.density.valleyDepthRatio,
      signals.meanYOverlap,
      lineReport.hasHorizontal,
    );
    const confidence =
      o.fallbackBaseConfidence +
      Math.min(
        o.fallbackConfidenceSpan,
        o.fallbackConfidenceSlope * Math.abs(score - 0.5),
      );

    const partition = this.components.partitioner.partition(
      signals.lines,
      page.words.length,
      page.width,
    );
    if (!partition) {
      this.logger.debug(
        `[LayoutClassifier] Page ${page.pageIndex}: no side-by-side partition, reporting a single column`,
      );
      return {
        type: LayoutType.SINGLE,
        boundaries: whole,
        confidence,
        compositeScore: score,
        detectionMethod: 'none',
      };
    }

    return {
      type: score > o.compositeThreshold ? LayoutType.HYBRID : LayoutType.MULTI,
      boundaries: partition.boundaries,
      confidence,
      compositeScore: score,
      detectionMethod: 'y-overlap',
    };
  }
}
