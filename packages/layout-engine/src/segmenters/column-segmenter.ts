import type { LoggerMethods } from '@pagecols/logger';
import type {
  Column,
  ColumnBoundary,
  GlobalColumnStructure,
  Layout,
  Page,
  Word,
} from '@pagecols/model';

import { PAGE_DEFAULTS } from '../config/constants';
import {
  type ColumnSegmenterOptions,
  type ResolvedColumnSegmenterOptions,
  columnSegmenterOptionsSchema,
  parseOptions,
} from '../config/options';
import { WordGeometry } from '../geometry/word-geometry';

interface WorkingColumn {
  boundary: ColumnBoundary;
  words: Word[];
}

type BoundaryLayout = Pick<Layout, 'numColumns' | 'columnBoundaries'>;

/**
 * ColumnSegmenter
 *
 * Assigns every word of a page to exactly one column.
 *
 * 1. A word goes to the first column holding at least `overlapThreshold` of
 *    its width; words no column claims go to the column with the nearest
 *    center
 * 2. Words of each column are stably sorted by top edge
 * 3. Columns below the minimum word count are dissolved into the nearest
 *    remaining column, unless every column is below it
 * 4. Remaining columns are numbered left to right from 0
 */
export class ColumnSegmenter {
  private readonly options: ResolvedColumnSegmenterOptions;

  constructor(
    private readonly logger: LoggerMethods,
    options?: ColumnSegmenterOptions,
  ) {
    this.options = parseOptions(
      'ColumnSegmenter',
      columnSegmenterOptionsSchema,
      options,
    );
  }

  /**
   * Minimum words for a column to survive on a page with `wordCount` words.
   */
  minWordsFor(wordCount: number): number {
    const { minWordsPerColumn, dynamicMinWords, dynamicMinWordsRatio } =
      this.options;
    if (!dynamicMinWords) return minWordsPerColumn;
    return Math.max(
      minWordsPerColumn,
      Math.floor(wordCount * dynamicMinWordsRatio),
    );
  }

  segmentPage(
    words: readonly Word[],
    boundaries: readonly ColumnBoundary[],
    pageIndex = 0,
  ): Column[] {
    if (boundaries.length === 0) {
      throw new RangeError('segmentPage needs at least one column boundary');
    }

    const columns: WorkingColumn[] = boundaries.map((boundary) => ({
      boundary,
      words: [],
    }));

    const deferred: Word[] = [];
    for (const word of words) {
      const column = columns.find(
        (candidate) =>
          WordGeometry.horizontalOverlapRatio(word, candidate.boundary) >=
          this.options.overlapThreshold,
      );
      if (column) column.words.push(word);
      else deferred.push(word);
    }
    for (const word of deferred) {
      const x = WordGeometry.xCenter(word);
      ColumnSegmenter.nearest(columns, x).words.push(word);
    }

    const minWords = this.minWordsFor(words.length);
    const valid = columns.filter((column) => column.words.length >= minWords);
    const invalid = columns.filter((column) => column.words.length < minWords);

    let survivors = columns;
    if (valid.length > 0 && invalid.length > 0) {
      for (const column of invalid) {
        const target = ColumnSegmenter.nearest(
          valid,
          WordGeometry.boundaryCenter(column.boundary),
        );
        target.words.push(...column.words);
      }
      survivors = valid;
      this.logger.debug(
        `[ColumnSegmenter] Page ${pageIndex}: dissolved ${invalid.length} column(s) below ${minWords} words`,
      );
    }

    if (deferred.length > 0) {
      this.logger.debug(
        `[ColumnSegmenter] Page ${pageIndex}: ${deferred.length} word(s) placed by nearest column`,
      );
    }

    return survivors.map((column, id) =>
      Object.freeze({
        id,
        boundary: column.boundary,
        words: Object.freeze(
          // Array.prototype.sort is stable
          [...column.words].sort((a, b) => a.y0 - b.y0),
        ),
      }),
    );
  }

  /**
   * Segment every page with its own layout.
   */
  segmentDocument(
    pages: readonly Page[],
    layouts: readonly BoundaryLayout[],
  ): Column[][] {
    if (pages.length !== layouts.length) {
      throw new RangeError(
        `segmentDocument got ${pages.length} page(s) but ${layouts.length} layout(s)`,
      );
    }
    return pages.map((page, i) =>
      this.segmentPage(page.words, layouts[i].columnBoundaries, page.pageIndex),
    );
  }

  /**
   * Most common column count over the layouts (first seen wins a tie) with
   * the boundaries of the pages that have it averaged per column.
   */
  detectGlobalColumnStructure(
    layouts: readonly BoundaryLayout[],
    defaultWidth: number = PAGE_DEFAULTS.WIDTH,
  ): GlobalColumnStructure {
    if (layouts.length === 0) {
      return Object.freeze({
        numColumns: 1,
        columnBoundaries: Object.freeze([
          Object.freeze({ xStart: 0, xEnd: defaultWidth }),
        ]),
        pageVotes: 0,
      });
    }

    const groups = new Map<number, BoundaryLayout[]>();
    for (const layout of layouts) {
      const group = groups.get(layout.numColumns);
      if (group) group.push(layout);
      else groups.set(layout.numColumns, [layout]);
    }

    let numColumns = layouts[0].numColumns;
    let members: BoundaryLayout[] = [];
    for (const [count, group] of groups) {
      if (group.length > members.length) {
        numColumns = count;
        members = group;
      }
    }

    const columnBoundaries: ColumnBoundary[] = [];
    for (let col = 0; col < numColumns; col++) {
      let xStart = 0;
      let xEnd = 0;
      for (const layout of members) {
        xStart += layout.columnBoundaries[col].xStart;
        xEnd += layout.columnBoundaries[col].xEnd;
      }
      columnBoundaries.push(
        Object.freeze({
          xStart: xStart / members.length,
          xEnd: xEnd / members.length,
        }),
      );
    }

    this.logger.debug(
      `[ColumnSegmenter] Global structure: ${numColumns} column(s) on ${members.length}/${layouts.length} page(s)`,
    );

    return Object.freeze({
      numColumns,
      columnBoundaries: Object.freeze(columnBoundaries),
      pageVotes: members.length,
    });
  }

  private static nearest<T extends WorkingColumn>(
    columns: readonly T[],
    x: number,
  ): T {
    let best = columns[0];
    let bestDistance = Infinity;
    for (const column of columns) {
      const distance = Math.abs(
        WordGeometry.boundaryCenter(column.boundary) - x,
      );
      if (distance < bestDistance) {
        best = column;
        bestDistance = distance;
      }
    }
    return best;
  }
}
