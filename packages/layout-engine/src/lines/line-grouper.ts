import type { Word } from '@pagecols/model';

import { WordGeometry } from '../geometry/word-geometry';

/**
 * Words sharing a baseline, ordered left to right.
 */
export interface TextLine {
  /** Vertical center of the word that opened the line */
  anchorY: number;
  words: Word[];
  x0: number;
  x1: number;
}

/**
 * LineGrouper - groups words into text lines by vertical center
 *
 * A word joins the first line whose anchor is within `yTolerance` of its
 * center; otherwise it opens a new line. Anchors do not move.
 */
export class LineGrouper {
  constructor(private readonly yTolerance: number) {}

  group(words: readonly Word[]): TextLine[] {
    const lines: TextLine[] = [];

    for (const word of words) {
      const center = WordGeometry.yCenter(word);
      const line = lines.find(
        (candidate) => Math.abs(center - candidate.anchorY) <= this.yTolerance,
      );
      if (line) {
        line.words.push(word);
        line.x0 = Math.min(line.x0, word.x0);
        line.x1 = Math.max(line.x1, word.x1);
      } else {
        lines.push({
          anchorY: center,
          words: [word],
          x0: word.x0,
          x1: word.x1,
        });
      }
    }

    lines.sort((a, b) => a.anchorY - b.anchorY);
    for (const line of lines) {
      line.words.sort((a, b) => a.x0 - b.x0);
    }
    return lines;
  }

  static span(line: TextLine): number {
    return line.x1 - line.x0;
  }
}
