/**
 * Page layout classes.
 *
 * - SINGLE: one column of text flowing top to bottom
 * - MULTI: two or more clean columns separated by a continuous gutter
 * - HYBRID: column structure interrupted by full-width headers or sections
 */
export enum LayoutType {
  SINGLE = 1,
  MULTI = 2,
  HYBRID = 3,
}

export const LAYOUT_TYPE_NAMES = {
  [LayoutType.SINGLE]: 'single-column',
  [LayoutType.MULTI]: 'multi-column',
  [LayoutType.HYBRID]: 'hybrid/complex',
} as const satisfies Record<LayoutType, string>;

export type LayoutTypeName = (typeof LAYOUT_TYPE_NAMES)[LayoutType];

/**
 * Horizontal extent of one column, `xStart < xEnd`.
 */
export interface ColumnBoundary {
  readonly xStart: number;
  readonly xEnd: number;
}

/**
 * Which signal produced the reported column boundaries.
 *
 * - `none`: single column, nothing split the page
 * - `gap`: horizontal gaps between word boxes
 * - `gutter`: split at the gutter center found by the band scan
 * - `y-overlap`: side-by-side line partition
 */
export type DetectionMethod = 'none' | 'gap' | 'gutter' | 'y-overlap';

/**
 * Gutter continuity measured over horizontal bands of the page.
 */
export interface GutterMetrics {
  /** Fraction of bands whose gutter region is empty, in [0, 1] */
  readonly coverage: number;

  /**
   * Fraction of the page height above the first stable run of clear bands,
   * 0 when no such run exists
   */
  readonly headerFraction: number;

  /** X position of the gutter center, `null` when no gutter was found */
  readonly gutterX: number | null;
}

/**
 * Diagnostic values recorded while classifying a page.
 */
export interface LayoutMetrics {
  readonly totalWords: number;
  readonly gapColumnCount: number;
  readonly coverage: number;
  readonly headerFraction: number;
  readonly gutterX: number | null;
  readonly valleyDepthRatio: number;
  readonly peakCount: number;
  readonly valleyCount: number;
  readonly meanYOverlap: number;
  readonly lineCount: number;
  readonly fullWidthLineCount: number;
  readonly fullWidthLineRatio: number;
  readonly hasHorizontal: boolean;

  /** Weighted fallback score, `null` when the gutter scan was decisive */
  readonly compositeScore: number | null;

  readonly detectionMethod: DetectionMethod;

  /** Mean word width divided by page width */
  readonly avgWordWidthRatio: number;

  /** Variance of the number of words per line */
  readonly lineDensityVariance: number;

  /** Narrowest column width divided by widest column width */
  readonly columnBalance: number;

  /** Set when the page was resolved to the default layout */
  readonly error?: string;
}

/**
 * Layout classification of one page. Frozen on creation.
 */
export interface Layout {
  readonly type: LayoutType;
  readonly typeName: LayoutTypeName;
  readonly numColumns: number;

  /** Left-to-right, gap-free partition of `[0, pageWidth]` */
  readonly columnBoundaries: readonly ColumnBoundary[];

  /** Confidence in [0, 1] */
  readonly confidence: number;

  readonly pageWidth: number;
  readonly pageHeight: number;
  readonly metrics: LayoutMetrics;
}
