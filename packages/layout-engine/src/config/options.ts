import { z } from 'zod';

import { LayoutConfigurationError } from '../errors/layout-configuration-error';
import {
  COLUMN_SEGMENTER,
  DENSITY_HISTOGRAM,
  GAP_SEPARATOR,
  GUTTER_BAND_SCANNER,
  LAYOUT_CLASSIFIER,
  LAYOUT_ENGINE,
  LINES,
  PAGE_DEFAULTS,
  Y_OVERLAP,
} from './constants';

const positive = z.number().finite().positive();
const nonNegative = z.number().finite().min(0);
const fraction = z.number().finite().min(0).max(1);
const positiveInt = z.number().int().positive();
const oddWindow = positiveInt.refine((n) => n % 2 === 1, {
  message: 'must be an odd number of bins',
});

export const pageOptionsSchema = z
  .object({
    defaultWidth: positive.default(PAGE_DEFAULTS.WIDTH),
    defaultHeight: positive.default(PAGE_DEFAULTS.HEIGHT),
    extentMargin: nonNegative.default(PAGE_DEFAULTS.EXTENT_MARGIN),
  })
  .strict();

export const gapSeparatorOptionsSchema = z
  .object({
    minGapWidth: positive.default(GAP_SEPARATOR.MIN_GAP_WIDTH),
    minColumnWidth: positive.default(GAP_SEPARATOR.MIN_COLUMN_WIDTH),
    adaptive: z.boolean().default(GAP_SEPARATOR.ADAPTIVE),
  })
  .strict();

export const densityHistogramOptionsSchema = z
  .object({
    binWidth: positive.default(DENSITY_HISTOGRAM.BIN_WIDTH),
    smoothing: z
      .enum(['moving-average', 'gaussian'])
      .default('moving-average'),
    smoothingWindow: oddWindow.default(DENSITY_HISTOGRAM.SMOOTHING_WINDOW),
    gaussianSigma: positive.default(DENSITY_HISTOGRAM.GAUSSIAN_SIGMA),
  })
  .strict();

export const gutterBandScannerOptionsSchema = z
  .object({
    bandCount: z
      .number()
      .int()
      .min(1, { message: 'bandCount must be at least 1' })
      .default(GUTTER_BAND_SCANNER.BAND_COUNT),
    bins: z.number().int().min(8).default(GUTTER_BAND_SCANNER.BINS),
    smoothingWindow: oddWindow.default(GUTTER_BAND_SCANNER.SMOOTHING_WINDOW),
    searchFraction: z
      .number()
      .finite()
      .positive()
      .max(0.5)
      .default(GUTTER_BAND_SCANNER.SEARCH_FRACTION),
    gutterWindowBins: z
      .number()
      .int()
      .min(0)
      .default(GUTTER_BAND_SCANNER.GUTTER_WINDOW_BINS),
    zeroDensityMax: fraction.default(GUTTER_BAND_SCANNER.ZERO_DENSITY_MAX),
    /** Defaults to max(4, floor(bandCount / 12)) */
    stableRunLength: positiveInt.optional(),
    minSideWordFraction: z
      .number()
      .finite()
      .min(0)
      .max(0.5)
      .default(GUTTER_BAND_SCANNER.MIN_SIDE_WORD_FRACTION),
  })
  .strict();

export const yOverlapOptionsSchema = z
  .object({
    maxPairs: positiveInt.default(Y_OVERLAP.MAX_PAIRS),
    sampleSize: z.number().int().min(2).default(Y_OVERLAP.SAMPLE_SIZE),
  })
  .strict();

export const lineOptionsSchema = z
  .object({
    yTolerance: nonNegative.default(LINES.Y_TOLERANCE),
    fullWidthFraction: z
      .number()
      .finite()
      .positive()
      .max(1)
      .default(LINES.FULL_WIDTH_FRACTION),
    horizontalLinesMin: positiveInt.default(LINES.HORIZONTAL_LINES_MIN),
  })
  .strict();

export const classifierOptionsSchema = z
  .object({
    coverageThreshold: fraction.default(LAYOUT_CLASSIFIER.COVERAGE_THRESHOLD),
    headerFractionThreshold: fraction.default(
      LAYOUT_CLASSIFIER.HEADER_FRACTION_THRESHOLD,
    ),
    compositeThreshold: fraction.default(
      LAYOUT_CLASSIFIER.COMPOSITE_THRESHOLD,
    ),
    valleyThreshold: positive.default(LAYOUT_CLASSIFIER.VALLEY_THRESHOLD),
    yOverlapScale: positive.default(LAYOUT_CLASSIFIER.Y_OVERLAP_SCALE),
    valleyWeight: fraction.default(LAYOUT_CLASSIFIER.VALLEY_WEIGHT),
    yOverlapWeight: fraction.default(LAYOUT_CLASSIFIER.Y_OVERLAP_WEIGHT),
    horizontalWeight: fraction.default(LAYOUT_CLASSIFIER.HORIZONTAL_WEIGHT),
    singleConfidence: fraction.default(LAYOUT_CLASSIFIER.SINGLE_CONFIDENCE),
    gutterConfidence: fraction.default(LAYOUT_CLASSIFIER.GUTTER_CONFIDENCE),
    fallbackBaseConfidence: fraction.default(
      LAYOUT_CLASSIFIER.FALLBACK_BASE_CONFIDENCE,
    ),
    fallbackConfidenceSpan: fraction.default(
      LAYOUT_CLASSIFIER.FALLBACK_CONFIDENCE_SPAN,
    ),
    fallbackConfidenceSlope: nonNegative.default(
      LAYOUT_CLASSIFIER.FALLBACK_CONFIDENCE_SLOPE,
    ),
  })
  .strict();

export const columnSegmenterOptionsSchema = z
  .object({
    overlapThreshold: z
      .number()
      .finite()
      .positive()
      .max(1)
      .default(COLUMN_SEGMENTER.OVERLAP_THRESHOLD),
    minWordsPerColumn: z
      .number()
      .int()
      .min(0)
      .default(COLUMN_SEGMENTER.MIN_WORDS_PER_COLUMN),
    dynamicMinWords: z.boolean().default(COLUMN_SEGMENTER.DYNAMIC_MIN_WORDS),
    dynamicMinWordsRatio: fraction.default(
      COLUMN_SEGMENTER.DYNAMIC_MIN_WORDS_RATIO,
    ),
  })
  .strict();

export const layoutEngineOptionsSchema = z
  .object({
    page: pageOptionsSchema.default({}),
    gap: gapSeparatorOptionsSchema.default({}),
    histogram: densityHistogramOptionsSchema.default({}),
    gutter: gutterBandScannerOptionsSchema.default({}),
    yOverlap: yOverlapOptionsSchema.default({}),
    lines: lineOptionsSchema.default({}),
    classifier: classifierOptionsSchema.default({}),
    segmenter: columnSegmenterOptionsSchema.default({}),
    concurrency: positiveInt.default(LAYOUT_ENGINE.CONCURRENCY),
  })
  .strict();

export type PageOptions = z.input<typeof pageOptionsSchema>;
export type ResolvedPageOptions = z.output<typeof pageOptionsSchema>;
export type GapSeparatorOptions = z.input<typeof gapSeparatorOptionsSchema>;
export type ResolvedGapSeparatorOptions = z.output<
  typeof gapSeparatorOptionsSchema
>;
export type DensityHistogramOptions = z.input<
  typeof densityHistogramOptionsSchema
>;
export type ResolvedDensityHistogramOptions = z.output<
  typeof densityHistogramOptionsSchema
>;
export type GutterBandScannerOptions = z.input<
  typeof gutterBandScannerOptionsSchema
>;
export type ResolvedGutterBandScannerOptions = z.output<
  typeof gutterBandScannerOptionsSchema
>;
export type YOverlapOptions = z.input<typeof yOverlapOptionsSchema>;
export type ResolvedYOverlapOptions = z.output<typeof yOverlapOptionsSchema>;
export type LineOptions = z.input<typeof lineOptionsSchema>;
export type ResolvedLineOptions = z.output<typeof lineOptionsSchema>;
export type ClassifierOptions = z.input<typeof classifierOptionsSchema>;
export type ResolvedClassifierOptions = z.output<
  typeof classifierOptionsSchema
>;
export type ColumnSegmenterOptions = z.input<
  typeof columnSegmenterOptionsSchema
>;
export type ResolvedColumnSegmenterOptions = z.output<
  typeof columnSegmenterOptionsSchema
>;
export type LayoutEngineOptions = z.input<typeof layoutEngineOptionsSchema>;
export type ResolvedLayoutEngineOptions = z.output<
  typeof layoutEngineOptionsSchema
>;

/**
 * Validate `options` against `schema` and fill in defaults.
 *
 * @param component - Name used in the error message
 * @throws LayoutConfigurationError when an option is outside its domain
 */
export function parseOptions<TSchema extends z.ZodTypeAny>(
  component: string,
  schema: TSchema,
  options: z.input<TSchema> | undefined,
): z.output<TSchema> {
  const result = schema.safeParse(options ?? {});
  if (!result.success) {
    throw LayoutConfigurationError.fromZodError(component, result.error);
  }
  return result.data;
}
