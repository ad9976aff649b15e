/**
 * Default thresholds of the layout engine.
 *
 * The classifier thresholds and weights are empirical. Keep them as
 * configuration; changing a default needs labelled pages to back it.
 */

/**
 * Page geometry fallbacks
 */
export const PAGE_DEFAULTS = {
  /** US Letter width used when no width can be inferred */
  WIDTH: 612,

  /** US Letter height used when no height can be inferred */
  HEIGHT: 792,

  /** Added to max(x1) / max(y1) when inferring page extents */
  EXTENT_MARGIN: 10,
} as const;

/**
 * Configuration constants for GapSeparatorDetector
 */
export const GAP_SEPARATOR = {
  /** Minimum gap width (points) to split columns */
  MIN_GAP_WIDTH: 20,

  /** Minimum width (points) of a valid column */
  MIN_COLUMN_WIDTH: 80,

  /** Derive the gap threshold from the page's gap statistics */
  ADAPTIVE: true,

  /** max gap above this multiple of the median selects the aggressive tier */
  DOMINANT_GAP_RATIO: 3,

  /** max gap below this multiple of the median selects the strict tier */
  UNIFORM_GAP_RATIO: 2,

  /** minGapWidth multiplier of the aggressive tier */
  AGGRESSIVE_FACTOR: 0.6,

  /** minGapWidth multiplier of the strict tier */
  STRICT_FACTOR: 1.5,

  /** minGapWidth multiplier of the fallback tier */
  FALLBACK_FACTOR: 0.5,
} as const;

/**
 * Configuration constants for DensityHistogramAnalyzer
 */
export const DENSITY_HISTOGRAM = {
  /** Histogram bin width in points */
  BIN_WIDTH: 5,

  /** Moving-average window in bins (odd) */
  SMOOTHING_WINDOW: 5,

  /** Gaussian kernel sigma in bins */
  GAUSSIAN_SIGMA: 2,

  /** Peak threshold over mean density when several columns are expected */
  MULTI_COLUMN_PEAK_FACTOR: 0.5,

  /** Peak threshold relative to mean density for a single expected column */
  SINGLE_COLUMN_PEAK_FACTOR: 0.8,

  /** Minimum peak distance is bins / (this * expected columns) */
  PEAK_DISTANCE_DIVISOR: 4,
} as const;

/**
 * Configuration constants for GutterBandScanner
 */
export const GUTTER_BAND_SCANNER = {
  /** Number of horizontal bands */
  BAND_COUNT: 60,

  /** Number of x bins of the density histograms */
  BINS: 400,

  /** Moving-average window in bins */
  SMOOTHING_WINDOW: 7,

  /** Gutter search half-window around the midpoint, as a fraction of bins */
  SEARCH_FRACTION: 0.125,

  /** Half-width (bins) of the window read around the gutter in each band */
  GUTTER_WINDOW_BINS: 10,

  /** Normalized density at or below which a band is gutter-clear */
  ZERO_DENSITY_MAX: 0.05,

  /** Minimum share of words on each side for the gutter to count */
  MIN_SIDE_WORD_FRACTION: 0.1,
} as const;

/**
 * Configuration constants for YOverlapScorer
 */
export const Y_OVERLAP = {
  /** Full pair enumeration up to this many pairs */
  MAX_PAIRS: 10000,

  /** Words kept by the subsample above the pair budget */
  SAMPLE_SIZE: 200,
} as const;

/**
 * Configuration constants for LineGrouper and FullWidthLineDetector
 */
export const LINES = {
  /** Maximum distance (points) between vertical centers of one line */
  Y_TOLERANCE: 5,

  /** A line spanning this fraction of the page width is full-width */
  FULL_WIDTH_FRACTION: 0.75,

  /** Full-width lines needed for hasHorizontal */
  HORIZONTAL_LINES_MIN: 3,
} as const;

/**
 * Configuration constants for SideBySideLinePartitioner
 */
export const SIDE_BY_SIDE = {
  MIN_WORDS: 10,
  MIN_LINES: 3,

  /** Lines needed on each side of the midpoint */
  MIN_LINES_PER_SIDE: 3,

  /** A left line starts before midX * this */
  LEFT_START_FACTOR: 0.6,

  /** A left line ends before midX * this */
  LEFT_END_FACTOR: 1.3,

  /** A right line starts after midX * this */
  RIGHT_START_FACTOR: 0.7,

  /** Minimum y-range overlap of the two sides, in percent */
  MIN_OVERLAP_PCT: 20,

  /** Column-line ratio thresholds by overlap strength */
  STRONG_OVERLAP_PCT: 60,
  MODERATE_OVERLAP_PCT: 40,
  STRONG_COLUMN_RATIO: 0.35,
  MODERATE_COLUMN_RATIO: 0.4,
  WEAK_COLUMN_RATIO: 0.45,

  /** The boundary must fall inside [min, max] * pageWidth */
  BOUNDARY_MIN_FRACTION: 0.1,
  BOUNDARY_MAX_FRACTION: 0.9,
} as const;

/**
 * Configuration constants for LayoutClassifier
 */
export const LAYOUT_CLASSIFIER = {
  /** Gutter coverage from which a split persists through the page */
  COVERAGE_THRESHOLD: 0.7,

  /**
   * Header fraction above which a gutter-backed layout is hybrid.
   * Sits right at a frequent value in sampled pages; review with data.
   */
  HEADER_FRACTION_THRESHOLD: 0.05,

  /** Composite score above which the fallback path says hybrid */
  COMPOSITE_THRESHOLD: 0.35,

  /** Valley depth ratio that maps to a full valley term */
  VALLEY_THRESHOLD: 0.3,

  /** Multiplier applied to the mean y-overlap before clamping */
  Y_OVERLAP_SCALE: 5,

  VALLEY_WEIGHT: 0.4,
  Y_OVERLAP_WEIGHT: 0.35,
  HORIZONTAL_WEIGHT: 0.25,

  SINGLE_CONFIDENCE: 0.9,
  GUTTER_CONFIDENCE: 0.92,

  /** Fallback confidence = BASE + min(SPAN, SLOPE * |score - 0.5|) */
  FALLBACK_BASE_CONFIDENCE: 0.7,
  FALLBACK_CONFIDENCE_SPAN: 0.25,
  FALLBACK_CONFIDENCE_SLOPE: 0.4,
} as const;

/**
 * Configuration constants for ColumnSegmenter
 */
export const COLUMN_SEGMENTER = {
  /** Share of a word's width that must fall inside a column */
  OVERLAP_THRESHOLD: 0.5,

  MIN_WORDS_PER_COLUMN: 10,

  /** Scale the minimum with the page's word count */
  DYNAMIC_MIN_WORDS: false,

  /** Share of page words required per column when dynamic */
  DYNAMIC_MIN_WORDS_RATIO: 0.04,
} as const;

/**
 * Configuration constants for LayoutEngine
 */
export const LAYOUT_ENGINE = {
  /** Pages analyzed at the same time by analyzeDocument */
  CONCURRENCY: 4,
} as const;
