import type {
  ColumnBoundary,
  Layout,
  LayoutMetrics,
  Page,
} from '@pagecols/model';

import { LAYOUT_TYPE_NAMES, LayoutType } from '@pagecols/model';

/**
 * Builds frozen Layout values.
 */
export class LayoutFactory {
  static create(
    page: Pick<Page, 'width' | 'height'>,
    type: LayoutType,
    boundaries: readonly ColumnBoundary[],
    confidence: number,
    metrics: LayoutMetrics,
  ): Layout {
    return Object.freeze({
      type,
      typeName: LAYOUT_TYPE_NAMES[type],
      numColumns: boundaries.length,
      columnBoundaries: Object.freeze(
        boundaries.map((b) =>
          Object.freeze({ xStart: b.xStart, xEnd: b.xEnd }),
        ),
      ),
      confidence,
      pageWidth: page.width,
      pageHeight: page.height,
      metrics: Object.freeze({ ...metrics }),
    });
  }

  /**
   * Single column over the whole page with confidence 0. Used for pages that
   * cannot be analyzed.
   */
  static defaultLayout(page: Page, error?: string): Layout {
    const metrics: LayoutMetrics = {
      totalWords: page.words.length,
      gapColumnCount: 1,
      coverage: 0,
      headerFraction: 0,
      gutterX: null,
      valleyDepthRatio: 1,
      peakCount: 0,
      valleyCount: 0,
      meanYOverlap: 0,
      lineCount: 0,
      fullWidthLineCount: 0,
      fullWidthLineRatio: 0,
      hasHorizontal: false,
      compositeScore: null,
      detectionMethod: 'none',
      avgWordWidthRatio: 0,
      lineDensityVariance: 0,
      columnBalance: 1,
      ...(error === undefined ? {} : { error }),
    };
    return LayoutFactory.create(
      page,
      LayoutType.SINGLE,
      [{ xStart: 0, xEnd: page.width }],
      0,
      metrics,
    );
  }
}
