import type { PageInput } from '@pagecols/model';

import { beforeEach, describe, expect, test } from 'vitest';

import { mockLogger, wordInput } from '../__fixtures__/pages';
import { LayoutInputError } from '../errors';
import { PageNormalizer } from './page-normalizer';

function inputError(fn: () => unknown): LayoutInputError {
  try {
    fn();
  } catch (error) {
    if (error instanceof LayoutInputError) return error;
    throw error;
  }
  throw new Error('Expected a LayoutInputError');
}

describe('PageNormalizer', () => {
  let logger: ReturnType<typeof mockLogger>;
  let normalizer: PageNormalizer;

  beforeEach(() => {
    logger = mockLogger();
    normalizer = new PageNormalizer(logger);
  });

  test('toWord reorders inverted boxes and fills font defaults', () => {
    const word = PageNormalizer.toWord({ text: 'ab', bbox: [100, 50, 20, 10] });

    expect(word).toEqual({
      text: 'ab',
      x0: 20,
      y0: 10,
      x1: 100,
      y1: 50,
      fontSize: null,
      isBold: false,
    });
    expect(Object.isFrozen(word)).toBe(true);
  });

  test('toWord keeps font attributes', () => {
    const word = PageNormalizer.toWord({
      text: 'H',
      bbox: [0, 0, 10, 12],
      fontSize: 12,
      isBold: true,
    });

    expect(word.fontSize).toBe(12);
    expect(word.isBold).toBe(true);
  });

  describe('normalize', () => {
    test('infers missing extents from the words', () => {
      const page = normalizer.normalize({
        words: [wordInput(10, 20, 90, 40), wordInput(100, 20, 190, 700)],
        pageIndex: 5,
      });

      expect(page.pageIndex).toBe(5);
      expect(page.width).toBe(200);
      expect(page.height).toBe(710);
      expect(page.words).toHaveLength(2);
      expect(Object.isFrozen(page.words)).toBe(true);
    });

    test('prefers the explicit page index argument', () => {
      const page = normalizer.normalize(
        { words: [wordInput(0, 0, 10, 10)], pageIndex: 5 },
        2,
      );

      expect(page.pageIndex).toBe(2);
    });

    test('replaces a degenerate height', () => {
      const page = normalizer.normalize({
        words: [wordInput(0, 0, 10, 90)],
        width: 100,
        height: -5,
      });

      expect(page.height).toBe(100);
      expect(logger.debug).toHaveBeenCalledWith(
        '[PageNormalizer] Ignoring degenerate page height -5',
      );
    });

    test('rejects an empty page', () => {
      const error = inputError(() =>
        normalizer.normalize({ words: [], width: 600 }, 3),
      );

      expect(error.reason).toBe('empty-page');
      expect(error.message).toBe('Page 3: no words to analyze');
    });

    test('rejects a degenerate width', () => {
      const error = inputError(() =>
        normalizer.normalize({
          words: [wordInput(0, 0, 10, 10)],
          width: Number.NaN,
        }),
      );

      expect(error.reason).toBe('degenerate-width');
      expect(error.message).toBe('Page 0: degenerate page width NaN');
    });

    test('rejects a degenerate inferred width', () => {
      const error = inputError(() =>
        normalizer.normalize({ words: [wordInput(-80, 0, -50, 10)] }),
      );

      expect(error.reason).toBe('degenerate-width');
      expect(error.message).toBe(
        'Page 0: inferred page width -40 is degenerate',
      );
    });

    test('drops records with non-finite coordinates and keeps the rest', () => {
      const page = normalizer.normalize({
        words: [
          wordInput(0, 0, 10, 10, 'kept'),
          wordInput(0, Infinity, 10, 10),
          wordInput(20, 0, 30, 10, 'also kept'),
        ],
        width: 100,
      });

      expect(page.words.map((w) => w.text)).toEqual(['kept', 'also kept']);
      expect(logger.warn).toHaveBeenCalledTimes(1);
      expect(logger.warn).toHaveBeenCalledWith(
        expect.stringMatching(
          /^\[PageNormalizer\] Page 0: dropped malformed word at 1\.bbox\.1: /,
        ),
      );
    });

    test('rejects a page whose only words are malformed', () => {
      const error = inputError(() =>
        normalizer.normalize({ words: [wordInput(0, Number.NaN, 10, 10)] }, 4),
      );

      expect(error.reason).toBe('empty-page');
      expect(error.message).toBe('Page 4: no words to analyze');
    });

    test('rejects a word list that is not an array', () => {
      const input: PageInput = JSON.parse('{"words":{"text":"a"}}');

      const error = inputError(() => normalizer.normalize(input));

      expect(error.reason).toBe('malformed-input');
      expect(error.message).toBe('Page 0: word list is not an array');
    });
  });

  describe('fallback', () => {
    test('drops malformed words silently and uses the default extents', () => {
      const page = normalizer.fallback({
        words: [wordInput(0, Number.NaN, 1, 1)],
      });

      expect(page.words).toEqual([]);
      expect(page.width).toBe(612);
      expect(page.height).toBe(792);
      expect(logger.warn).not.toHaveBeenCalled();
    });

    test('treats a word list that is not an array as empty', () => {
      const input: PageInput = JSON.parse('{"words":7,"width":300}');

      expect(normalizer.fallback(input)).toMatchObject({
        words: [],
        width: 300,
      });
    });

    test('replaces a degenerate width with the inferred one', () => {
      const page = normalizer.fallback({
        words: [wordInput(0, 0, 290, 10)],
        width: 0,
        height: 400,
      });

      expect(page.width).toBe(300);
      expect(page.height).toBe(400);
    });

    test('uses configured defaults', () => {
      const custom = new PageNormalizer(logger, {
        defaultWidth: 595,
        defaultHeight: 842,
      });

      expect(custom.defaultWidth).toBe(595);
      expect(custom.fallback({ words: [] })).toMatchObject({
        width: 595,
        height: 842,
      });
    });
  });
});
