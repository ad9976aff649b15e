import type { Word, WordInput } from './word';

/**
 * Page-scoped input of the layout engine.
 *
 * `width` and `height` are inferred from the word extents when omitted.
 */
export interface PageInput {
  /** Words in extraction order */
  words: readonly WordInput[];

  /** Page width in points */
  width?: number;

  /** Page height in points */
  height?: number;

  /** Zero-based index of the page inside its document */
  pageIndex?: number;
}

/**
 * Page after input normalization.
 */
export interface Page {
  readonly pageIndex: number;
  readonly width: number;
  readonly height: number;
  readonly words: readonly Word[];
}
