import type { LoggerMethods } from '@pagecols/logger';
import type { ColumnBoundary } from '@pagecols/model';

import { SIDE_BY_SIDE } from '../config/constants';
import type { FullWidthLineDetector } from '../lines/full-width-line-detector';
import type { TextLine } from '../lines/line-grouper';

/**
 * Two-column split found by the line partition.
 */
export interface SideBySidePartition {
  boundaries: [ColumnBoundary, ColumnBoundary];
  leftLineCount: number;
  rightLineCount: number;
  spanningLineCount: number;
  /** Shared part of the two sides' vertical ranges, in percent */
  overlapPct: number;
  /** Left plus right lines over all lines */
  columnRatio: number;
}

type LineSide = 'left' | 'right' | 'spanning';

/**
 * SideBySideLinePartitioner
 *
 * Sorts text lines into left, right and spanning lines around the page
 * midpoint and accepts a two-column split when both sides run next to each
 * other for a large part of the page:
 *
 * - at least `MIN_LINES_PER_SIDE` lines on each side
 * - the sides' vertical ranges overlap by more than `MIN_OVERLAP_PCT`
 * - side lines outnumber spanning lines by an overlap-dependent ratio
 * - the boundary falls between 10% and 90% of the page width
 */
export class SideBySideLinePartitioner {
  constructor(
    private readonly logger: LoggerMethods,
    private readonly fullWidthDetector: FullWidthLineDetector,
  ) {}

  partition(
    lines: readonly TextLine[],
    wordCount: number,
    pageWidth: number,
  ): SideBySidePartition | null {
    if (
      wordCount < SIDE_BY_SIDE.MIN_WORDS ||
      lines.length < SIDE_BY_SIDE.MIN_LINES
    ) {
      return null;
    }

    const left: TextLine[] = [];
    const right: TextLine[] = [];
    let spanningLineCount = 0;
    for (const line of lines) {
      const side = this.sideOf(line, pageWidth);
      if (side === 'left') left.push(line);
      else if (side === 'right') right.push(line);
      else spanningLineCount++;
    }

    if (
      left.length < SIDE_BY_SIDE.MIN_LINES_PER_SIDE ||
      right.length < SIDE_BY_SIDE.MIN_LINES_PER_SIDE
    ) {
      this.logger.debug(
        `[SideBySideLinePartitioner] Too few side lines: ${left.length} left, ${right.length} right`,
      );
      return null;
    }

    const leftTop = Math.min(...left.map((line) => line.anchorY));
    const leftBottom = Math.max(...left.map((line) => line.anchorY));
    const rightTop = Math.min(...right.map((line) => line.anchorY));
    const rightBottom = Math.max(...right.map((line) => line.anchorY));
    if (leftBottom < rightTop || rightBottom < leftTop) {
      return null;
    }

    const shared =
      Math.min(leftBottom, rightBottom) - Math.max(leftTop, rightTop);
    const total =
      Math.max(leftBottom, rightBottom) - Math.min(leftTop, rightTop);
    const overlapPct = total > 0 ? (shared / total) * 100 : 0;

    const columnLines = left.length + right.length;
    const columnRatio = columnLines / (columnLines + spanningLineCount);

    if (
      overlapPct <= SIDE_BY_SIDE.MIN_OVERLAP_PCT ||
      columnRatio <= SideBySideLinePartitioner.columnRatioThreshold(overlapPct)
    ) {
      this.logger.debug(
        `[SideBySideLinePartitioner] Rejected: overlap ${overlapPct.toFixed(1)}%, column ratio ${columnRatio.toFixed(2)}`,
      );
      return null;
    }

    const leftEdge = Math.max(...left.map((line) => line.x1));
    const rightEdge = Math.min(...right.map((line) => line.x0));
    const boundary = (leftEdge + rightEdge) / 2;
    if (
      boundary <= pageWidth * SIDE_BY_SIDE.BOUNDARY_MIN_FRACTION ||
      boundary >= pageWidth * SIDE_BY_SIDE.BOUNDARY_MAX_FRACTION
    ) {
      this.logger.debug(
        `[SideBySideLinePartitioner] Boundary ${boundary.toFixed(1)} outside the usable range`,
      );
      return null;
    }

    return {
      boundaries: [
        { xStart: 0, xEnd: boundary },
        { xStart: boundary, xEnd: pageWidth },
      ],
      leftLineCount: left.length,
      rightLineCount: right.length,
      spanningLineCount,
      overlapPct,
      columnRatio,
    };
  }

  private sideOf(line: TextLine, pageWidth: number): LineSide {
    const midX = pageWidth / 2;
    if (this.fullWidthDetector.isFullWidth(line, pageWidth)) return 'spanning';
    if (line.x0 < midX * SIDE_BY_SIDE.LEFT_START_FACTOR) {
      return line.x1 < midX * SIDE_BY_SIDE.LEFT_END_FACTOR
        ? 'left'
        : 'spanning';
    }
    if (line.x0 > midX * SIDE_BY_SIDE.RIGHT_START_FACTOR) return 'right';
    return 'spanning';
  }

  /**
   * Required share of side lines; the stronger the overlap, the lower.
   */
  static columnRatioThreshold(overlapPct: number): number {
    if (overlapPct > SIDE_BY_SIDE.STRONG_OVERLAP_PCT) {
      return SIDE_BY_SIDE.STRONG_COLUMN_RATIO;
    }
    if (overlapPct > SIDE_BY_SIDE.MODERATE_OVERLAP_PCT) {
      return SIDE_BY_SIDE.MODERATE_COLUMN_RATIO;
    }
    return SIDE_BY_SIDE.WEAK_COLUMN_RATIO;
  }
}
