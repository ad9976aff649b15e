import type { ColumnBoundary, Word } from '@pagecols/model';

import { Stats } from '@pagecols/shared';

import { WordGeometry } from '../geometry/word-geometry';
import type { TextLine } from '../lines/line-grouper';

/**
 * Secondary page features recorded in the layout metrics. They do not
 * take part in the decision.
 */
export class PageStatistics {
  /**
   * Mean word width over page width, 0 without words.
   */
  static avgWordWidthRatio(words: readonly Word[], pageWidth: number): number {
    if (words.length === 0 || pageWidth <= 0) return 0;
    const widths = words.map((word) => WordGeometry.width(word));
    return Stats.mean(widths) / pageWidth;
  }

  /**
   * Population variance of the word count per line.
   */
  static lineDensityVariance(lines: readonly TextLine[]): number {
    return Stats.variance(lines.map((line) => line.words.length));
  }

  /**
   * Narrowest over widest column, 1 for a single column.
   */
  static columnBalance(boundaries: readonly ColumnBoundary[]): number {
    if (boundaries.length <= 1) return 1;
    const widths = boundaries.map((b) => WordGeometry.boundaryWidth(b));
    const widest = Math.max(...widths);
    return widest > 0 ? Math.min(...widths) / widest : 1;
  }
}
