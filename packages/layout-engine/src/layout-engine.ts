import type { LoggerMethods } from '@pagecols/logger';
import type {
  Column,
  DocumentLayoutResult,
  GlobalColumnStructure,
  Layout,
  Page,
  PageInput,
  PageLayoutResult,
} from '@pagecols/model';

import { LayoutType } from '@pagecols/model';
import { ConcurrentPool } from '@pagecols/shared';

import { DensityHistogramAnalyzer } from './analyzers/density-histogram-analyzer';
import { LayoutClassifier } from './classifiers/layout-classifier';
import { LayoutFactory } from './classifiers/layout-factory';
import { SideBySideLinePartitioner } from './classifiers/side-by-side-line-partitioner';
import {
  type LayoutEngineOptions,
  type ResolvedLayoutEngineOptions,
  layoutEngineOptionsSchema,
  parseOptions,
} from './config/options';
import { GapSeparatorDetector } from './detectors/gap-separator-detector';
import { LayoutConfigurationError, LayoutInputError } from './errors';
import { PageStatistics } from './features/page-statistics';
import { PageNormalizer } from './input/page-normalizer';
import { FullWidthLineDetector } from './lines/full-width-line-detector';
import { LineGrouper } from './lines/line-grouper';
import { GutterBandScanner } from './scanners/gutter-band-scanner';
import { ColumnSegmenter } from './segmenters/column-segmenter';
import { YOverlapScorer } from './scorers/y-overlap-scorer';

/**
 * Options of a single analyzeDocument call
 */
export interface AnalyzeDocumentOptions {
  /**
   * Pages analyzed at the same time. Defaults to the engine's `concurrency`.
   */
  concurrency?: number;

  /**
   * Replace every page's boundaries with the document-wide column structure
   * and re-segment its words (default: false)
   */
  useGlobalStructure?: boolean;

  /**
   * Abort signal for cancellation support.
   * Checked before each page and once all pages settled.
   */
  abortSignal?: AbortSignal;

  /**
   * Called once per page as soon as its layout is known, in completion order
   */
  onPageAnalyzed?: (result: PageLayoutResult) => void;
}

/**
 * LayoutEngine
 *
 * Entry point of the package. Classifies page layouts and splits the words
 * of each page into columns.
 *
 * ## Page analysis
 *
 * 1. Normalize the page input (frozen words, page extents)
 * 2. Classify: gap detection, gutter scan, density histogram, vertical
 *    overlap and line structure fused by LayoutClassifier
 * 3. Segment the words into the layout's columns
 *
 * A page that cannot be analyzed (no words, degenerate width, malformed
 * words) gets the default single-column layout with confidence 0 and
 * `metrics.error` set. Input problems never reach the caller.
 *
 * @example
 * ```typescript
 * import { LayoutEngine } from '@pagecols/layout-engine';
 * import { Logger } from '@pagecols/logger';
 *
 * const engine = new LayoutEngine(Logger.console('info'), {
 *   gap: { minColumnWidth: 100 },
 * });
 *
 * const { layout, columns } = engine.analyzePage({ words, width: 612 });
 *
 * const document = await engine.analyzeDocument(pages, {
 *   concurrency: 8,
 *   useGlobalStructure: true,
 * });
 * ```
 */
export class LayoutEngine {
  private readonly options: ResolvedLayoutEngineOptions;
  private readonly normalizer: PageNormalizer;
  private readonly classifier: LayoutClassifier;
  private readonly segmenter: ColumnSegmenter;

  /**
   * @throws LayoutConfigurationError when an option is outside its domain
   */
  constructor(
    private readonly logger: LoggerMethods,
    options?: LayoutEngineOptions,
  ) {
    this.options = parseOptions(
      'LayoutEngine',
      layoutEngineOptionsSchema,
      options,
    );
    const o = this.options;

    const fullWidthDetector = new FullWidthLineDetector(logger, o.lines);
    this.normalizer = new PageNormalizer(logger, o.page);
    this.classifier = new LayoutClassifier(
      logger,
      {
        gapDetector: new GapSeparatorDetector(logger, o.gap),
        histogramAnalyzer: new DensityHistogramAnalyzer(logger, o.histogram),
        gutterScanner: new GutterBandScanner(logger, o.gutter),
        yOverlapScorer: new YOverlapScorer(logger, o.yOverlap),
        lineGrouper: new LineGrouper(o.lines.yTolerance),
        fullWidthDetector,
        partitioner: new SideBySideLinePartitioner(logger, fullWidthDetector),
      },
      o.classifier,
    );
    this.segmenter = new ColumnSegmenter(logger, o.segmenter);
  }

  /**
   * Classify one page and assign its words to columns.
   */
  analyzePage(
    input: PageInput,
    pageIndex = input.pageIndex ?? 0,
  ): PageLayoutResult {
    let page: Page;
    try {
      page = this.normalizer.normalize(input, pageIndex);
    } catch (error) {
      if (!(error instanceof LayoutInputError)) throw error;
      this.logger.warn(`[LayoutEngine] ${error.message}, using default layout`);
      return this.fallbackResult(input, pageIndex, error.message);
    }

    const layout = this.classifier.classify(page);
    return this.buildResult(page, layout);
  }

  /**
   * Analyze every page of a document.
   *
   * Pages run through a bounded pool; results keep the input order. A page
   * that fails is resolved to its default layout and does not stop the
   * others.
   *
   * @throws {Error} with name 'AbortError' if aborted
   * @throws LayoutConfigurationError when `concurrency` is not a positive integer
   */
  async analyzeDocument(
    pages: readonly PageInput[],
    options: AnalyzeDocumentOptions = {},
  ): Promise<DocumentLayoutResult> {
    const concurrency = options.concurrency ?? this.options.concurrency;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new LayoutConfigurationError(
        `Invalid LayoutEngine options: concurrency: must be a positive integer, got ${concurrency}`,
        [`concurrency: must be a positive integer, got ${concurrency}`],
      );
    }

    this.checkAborted(options.abortSignal);
    this.logger.info(
      `[LayoutEngine] Analyzing ${pages.length} page(s) with concurrency ${concurrency}`,
    );

    const outcomes = await ConcurrentPool.runSettled(
      pages,
      concurrency,
      (input, index) => {
        this.checkAborted(options.abortSignal);
        return this.analyzePage(input, input.pageIndex ?? index);
      },
      (outcome) => {
        if (outcome.status === 'fulfilled') {
          options.onPageAnalyzed?.(outcome.value);
        }
      },
    );

    this.checkAborted(options.abortSignal);

    const results = outcomes.map((outcome) => {
      if (outcome.status === 'fulfilled') return outcome.value;

      const input = pages[outcome.index];
      const pageIndex = input.pageIndex ?? outcome.index;
      const message = LayoutConfigurationError.getErrorMessage(outcome.reason);
      this.logger.error(
        `[LayoutEngine] Page ${pageIndex} failed, using default layout:`,
        outcome.reason,
      );
      const fallback = this.fallbackResult(input, pageIndex, message);
      options.onPageAnalyzed?.(fallback);
      return fallback;
    });

    const globalStructure = this.segmenter.detectGlobalColumnStructure(
      results.map((result) => result.layout),
      this.normalizer.defaultWidth,
    );
    this.logger.info(
      `[LayoutEngine] Document structure: ${globalStructure.numColumns} column(s), ${globalStructure.pageVotes}/${results.length} page(s) agree`,
    );

    const finalPages = options.useGlobalStructure
      ? results.map((result) => this.resegment(result, globalStructure))
      : results;

    return Object.freeze({
      pages: Object.freeze(finalPages),
      globalStructure,
    });
  }

  /**
   * Replace a page's layout with the document structure, scaled to the
   * page's width, and split its words again.
   */
  private resegment(
    result: PageLayoutResult,
    structure: GlobalColumnStructure,
  ): PageLayoutResult {
    const { layout } = result;
    const boundaries = structure.columnBoundaries;
    const scale = layout.pageWidth / boundaries[boundaries.length - 1].xEnd;
    const scaled = boundaries.map((b) => ({
      xStart: b.xStart * scale,
      xEnd: b.xEnd * scale,
    }));

    let type = layout.type;
    if (structure.numColumns === 1) type = LayoutType.SINGLE;
    else if (type === LayoutType.SINGLE) type = LayoutType.MULTI;

    const globalLayout = LayoutFactory.create(
      { width: layout.pageWidth, height: layout.pageHeight },
      type,
      scaled,
      layout.confidence,
      {
        ...layout.metrics,
        columnBalance: PageStatistics.columnBalance(scaled),
      },
    );
    const words = result.columns.flatMap((column) => column.words);
    return this.buildResult(
      { pageIndex: result.pageIndex, words },
      globalLayout,
    );
  }

  private fallbackResult(
    input: PageInput,
    pageIndex: number,
    message: string,
  ): PageLayoutResult {
    const page = this.normalizer.fallback(input, pageIndex);
    const layout = LayoutFactory.defaultLayout(page, message);
    return this.buildResult(page, layout);
  }

  private buildResult(
    page: Pick<Page, 'pageIndex' | 'words'>,
    layout: Layout,
  ): PageLayoutResult {
    const columns: Column[] = this.segmenter.segmentPage(
      page.words,
      layout.columnBoundaries,
      page.pageIndex,
    );
    return Object.freeze({
      pageIndex: page.pageIndex,
      layout,
      columns: Object.freeze(columns),
    });
  }

  private checkAborted(signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
      const error = new Error('Layout analysis was aborted');
      error.name = 'AbortError';
      throw error;
    }
  }
}
