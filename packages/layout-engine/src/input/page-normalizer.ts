import type { LoggerMethods } from '@pagecols/logger';
import type { Page, PageInput, Word, WordInput } from '@pagecols/model';

import { z } from 'zod';

import {
  type PageOptions,
  type ResolvedPageOptions,
  pageOptionsSchema,
  parseOptions,
} from '../config/options';
import { LayoutInputError } from '../errors/layout-input-error';

const coordinate = z.number().finite();

/** Zod schema of the word extraction contract */
export const wordInputSchema = z.object({
  text: z.string(),
  bbox: z.tuple([coordinate, coordinate, coordinate, coordinate]),
  fontSize: z.number().finite().nullable().optional(),
  isBold: z.boolean().optional(),
});

const wordListSchema = z.array(z.unknown());

/**
 * PageNormalizer
 *
 * Turns extraction output into frozen `Word` values and resolves the page
 * extents. Inverted boxes are reordered per axis; missing font attributes get
 * explicit defaults (`fontSize: null`, `isBold: false`). Records that fail
 * the word schema are dropped one by one with a warning; the rest of the page
 * is kept.
 */
export class PageNormalizer {
  private readonly options: ResolvedPageOptions;

  constructor(
    private readonly logger: LoggerMethods,
    options?: PageOptions,
  ) {
    this.options = parseOptions('PageNormalizer', pageOptionsSchema, options);
  }

  get defaultWidth(): number {
    return this.options.defaultWidth;
  }

  /**
   * Normalize a page for classification.
   *
   * @throws LayoutInputError when the word list is not a list, the page has
   *   no valid words or its width is degenerate
   */
  normalize(input: PageInput, pageIndex = input.pageIndex ?? 0): Page {
    const parsed = wordListSchema.safeParse(input.words);
    if (!parsed.success) {
      throw new LayoutInputError(
        'malformed-input',
        `Page ${pageIndex}: word list is not an array`,
        { cause: parsed.error },
      );
    }

    const words = this.parseWords(parsed.data, pageIndex, true);
    if (words.length === 0) {
      throw new LayoutInputError(
        'empty-page',
        `Page ${pageIndex}: no words to analyze`,
      );
    }

    if (input.width !== undefined && !PageNormalizer.isExtent(input.width)) {
      throw new LayoutInputError(
        'degenerate-width',
        `Page ${pageIndex}: degenerate page width ${input.width}`,
      );
    }

    const width = input.width ?? this.inferWidth(words);
    if (!PageNormalizer.isExtent(width)) {
      throw new LayoutInputError(
        'degenerate-width',
        `Page ${pageIndex}: inferred page width ${width} is degenerate`,
      );
    }

    return Object.freeze({
      pageIndex,
      width,
      height: this.resolveHeight(input.height, words),
      words: Object.freeze(words),
    });
  }

  /**
   * Lenient variant used to build the default layout of a rejected page.
   * Never throws: a word list that is not a list becomes empty, malformed
   * records are dropped silently (normalize already reported them), a
   * degenerate width is replaced by the inferred or default width.
   */
  fallback(input: PageInput, pageIndex = input.pageIndex ?? 0): Page {
    const parsed = wordListSchema.safeParse(input.words);
    const words = parsed.success
      ? this.parseWords(parsed.data, pageIndex, false)
      : [];

    let width: number;
    if (input.width !== undefined && PageNormalizer.isExtent(input.width)) {
      width = input.width;
    } else if (words.length > 0) {
      width = this.inferWidth(words);
    } else {
      width = this.options.defaultWidth;
    }
    if (!PageNormalizer.isExtent(width)) {
      width = this.options.defaultWidth;
    }

    return Object.freeze({
      pageIndex,
      width,
      height: this.resolveHeight(input.height, words),
      words: Object.freeze(words),
    });
  }

  /**
   * Frozen word from an extraction record.
   */
  static toWord(input: z.infer<typeof wordInputSchema> | WordInput): Word {
    const [ax, ay, bx, by] = input.bbox;
    return Object.freeze({
      text: input.text,
      x0: Math.min(ax, bx),
      y0: Math.min(ay, by),
      x1: Math.max(ax, bx),
      y1: Math.max(ay, by),
      fontSize: input.fontSize ?? null,
      isBold: input.isBold ?? false,
    });
  }

  private parseWords(
    records: readonly unknown[],
    pageIndex: number,
    report: boolean,
  ): Word[] {
    const words: Word[] = [];
    records.forEach((record, index) => {
      const parsed = wordInputSchema.safeParse(record);
      if (parsed.success) {
        words.push(PageNormalizer.toWord(parsed.data));
        return;
      }
      if (report) {
        const issue = parsed.error.issues[0];
        const path = [index, ...issue.path].join('.');
        this.logger.warn(
          `[PageNormalizer] Page ${pageIndex}: dropped malformed word at ${path}: ${issue.message}`,
        );
      }
    });
    return words;
  }

  private inferWidth(words: readonly Word[]): number {
    return (
      words.reduce((max, w) => Math.max(max, w.x1), -Infinity) +
      this.options.extentMargin
    );
  }

  private resolveHeight(
    height: number | undefined,
    words: readonly Word[],
  ): number {
    if (height !== undefined && PageNormalizer.isExtent(height)) {
      return height;
    }
    if (height !== undefined) {
      this.logger.debug(
        `[PageNormalizer] Ignoring degenerate page height ${height}`,
      );
    }
    if (words.length === 0) return this.options.defaultHeight;
    const inferred =
      words.reduce((max, w) => Math.max(max, w.y1), -Infinity) +
      this.options.extentMargin;
    return PageNormalizer.isExtent(inferred)
      ? inferred
      : this.options.defaultHeight;
  }

  private static isExtent(value: number): boolean {
    return Number.isFinite(value) && value > 0;
  }
}
