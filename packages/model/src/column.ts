import type { ColumnBoundary, Layout } from './layout';
import type { Word } from './word';

/**
 * Words of one column, ordered top to bottom.
 */
export interface Column {
  /** Left-to-right index, 0-based and contiguous on a page */
  readonly id: number;
  readonly boundary: ColumnBoundary;
  readonly words: readonly Word[];
}

/**
 * Layout and column assignment of one page.
 */
export interface PageLayoutResult {
  readonly pageIndex: number;
  readonly layout: Layout;
  readonly columns: readonly Column[];
}

/**
 * Column structure shared by the pages of a document.
 */
export interface GlobalColumnStructure {
  /** Most frequent column count across pages */
  readonly numColumns: number;

  /** Boundaries averaged over the pages with `numColumns` columns */
  readonly columnBoundaries: readonly ColumnBoundary[];

  /** Number of pages that voted for `numColumns` */
  readonly pageVotes: number;
}

/**
 * Result of analyzing every page of a document.
 */
export interface DocumentLayoutResult {
  /** Ordered by page index */
  readonly pages: readonly PageLayoutResult[];
  readonly globalStructure: GlobalColumnStructure;
}
