import type { LoggerMethods } from '@pagecols/logger';

import {
  type LineOptions,
  type ResolvedLineOptions,
  lineOptionsSchema,
  parseOptions,
} from '../config/options';
import { LineGrouper, type TextLine } from './line-grouper';

export interface FullWidthLineReport {
  lineCount: number;
  fullWidthLineCount: number;
  /** Full-width lines over all lines, 0 without lines */
  fullWidthLineRatio: number;
  hasHorizontal: boolean;
}

/**
 * FullWidthLineDetector
 *
 * Counts lines spanning at least `fullWidthFraction` of the page. Such lines
 * cross any gutter, so enough of them (`horizontalLinesMin`) mark headers or
 * section titles breaking a column layout.
 */
export class FullWidthLineDetector {
  private readonly options: ResolvedLineOptions;

  constructor(
    private readonly logger: LoggerMethods,
    options?: LineOptions,
  ) {
    this.options = parseOptions(
      'FullWidthLineDetector',
      lineOptionsSchema,
      options,
    );
  }

  isFullWidth(line: TextLine, pageWidth: number): boolean {
    return LineGrouper.span(line) >= pageWidth * this.options.fullWidthFraction;
  }

  detect(lines: readonly TextLine[], pageWidth: number): FullWidthLineReport {
    const fullWidthLineCount = lines.filter((line) =>
      this.isFullWidth(line, pageWidth),
    ).length;
    const hasHorizontal = fullWidthLineCount >= this.options.horizontalLinesMin;

    this.logger.debug(
      `[FullWidthLineDetector] ${fullWidthLineCount}/${lines.length} full-width line(s), hasHorizontal=${hasHorizontal}`,
    );

    return {
      lineCount: lines.length,
      fullWidthLineCount,
      fullWidthLineRatio:
        lines.length > 0 ? fullWidthLineCount / lines.length : 0,
      hasHorizontal,
    };
  }
}
