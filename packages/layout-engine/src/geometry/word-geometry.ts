import type { ColumnBoundary, Word } from '@pagecols/model';

/**
 * WordGeometry - box arithmetic on normalized words and boundaries
 */
export class WordGeometry {
  static xCenter(word: Word): number {
    return (word.x0 + word.x1) / 2;
  }

  static yCenter(word: Word): number {
    return (word.y0 + word.y1) / 2;
  }

  static width(word: Word): number {
    return word.x1 - word.x0;
  }

  static height(word: Word): number {
    return word.y1 - word.y0;
  }

  static boundaryCenter(boundary: ColumnBoundary): number {
    return (boundary.xStart + boundary.xEnd) / 2;
  }

  static boundaryWidth(boundary: ColumnBoundary): number {
    return boundary.xEnd - boundary.xStart;
  }

  /**
   * Share of the word's width that lies inside `boundary`, in [0, 1].
   *
   * A zero-width word counts as fully inside when its x position falls in
   * `[xStart, xEnd)`.
   */
  static horizontalOverlapRatio(word: Word, boundary: ColumnBoundary): number {
    const width = WordGeometry.width(word);
    if (width === 0) {
      return word.x0 >= boundary.xStart && word.x0 < boundary.xEnd ? 1 : 0;
    }
    const intersection =
      Math.min(word.x1, boundary.xEnd) - Math.max(word.x0, boundary.xStart);
    return intersection > 0 ? intersection / width : 0;
  }

  /**
   * Vertical overlap of two words divided by the smaller height.
   *
   * @returns Ratio in [0, 1], or `null` when either word has no height
   */
  static verticalOverlapRatio(a: Word, b: Word): number | null {
    const minHeight = Math.min(WordGeometry.height(a), WordGeometry.height(b));
    if (minHeight <= 0) return null;
    const overlap = Math.max(
      0,
      Math.min(a.y1, b.y1) - Math.max(a.y0, b.y0),
    );
    return overlap / minHeight;
  }
}
