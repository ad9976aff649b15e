export {
  LayoutEngine,
  type AnalyzeDocumentOptions,
} from './layout-engine';

export {
  DensityHistogramAnalyzer,
  type DensityProfile,
} from './analyzers/density-histogram-analyzer';
export {
  GaussianSmoother,
  MovingAverageSmoother,
  createSmoother,
  type Smoother,
} from './analyzers/smoothers';
export {
  LayoutClassifier,
  type LayoutClassifierComponents,
  type LayoutSignals,
} from './classifiers/layout-classifier';
export { LayoutFactory } from './classifiers/layout-factory';
export {
  SideBySideLinePartitioner,
  type SideBySidePartition,
} from './classifiers/side-by-side-line-partitioner';
export {
  GapSeparatorDetector,
  type GapAnalysis,
} from './detectors/gap-separator-detector';
export {
  GAP_THRESHOLD_STRATEGIES,
  fallbackThreshold,
  primaryThreshold,
  type GapStatistics,
  type GapThreshold,
  type GapThresholdStrategy,
  type GapThresholdTier,
} from './detectors/gap-threshold-strategies';
export { PageStatistics } from './features/page-statistics';
export { WordGeometry } from './geometry/word-geometry';
export { PageNormalizer, wordInputSchema } from './input/page-normalizer';
export {
  FullWidthLineDetector,
  type FullWidthLineReport,
} from './lines/full-width-line-detector';
export { LineGrouper, type TextLine } from './lines/line-grouper';
export { GutterBandScanner } from './scanners/gutter-band-scanner';
export { YOverlapScorer } from './scorers/y-overlap-scorer';
export { ColumnSegmenter } from './segmenters/column-segmenter';

export {
  LayoutConfigurationError,
  LayoutInputError,
  type LayoutInputErrorReason,
} from './errors';

export * from './config/constants';
export {
  layoutEngineOptionsSchema,
  type ClassifierOptions,
  type ColumnSegmenterOptions,
  type DensityHistogramOptions,
  type GapSeparatorOptions,
  type GutterBandScannerOptions,
  type LayoutEngineOptions,
  type LineOptions,
  type PageOptions,
  type YOverlapOptions,
} from './config/options';
