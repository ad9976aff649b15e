import { beforeEach, describe, expect, test } from 'vitest';

import type { PageInput, Word } from '@pagecols/model';

import {
  headedTwoColumnPage,
  mockLogger,
  narrowSingleColumnPage,
  twoColumnPage,
  word,
} from '../__fixtures__/pages';
import { PageNormalizer } from '../input/page-normalizer';
import { GutterBandScanner } from './gutter-band-scanner';

const toWords = (input: PageInput): Word[] =>
  input.words.map((w) => PageNormalizer.toWord(w));

/**
 * 400x400 page in four bands: one word at x 45-55 and one at x 345-355 per
 * band, plus a row of 20 words across x 100-300 in `blockedBand`.
 */
function bandedWords(blockedBand: number, emptyBands: number[] = []): Word[] {
  const words: Word[] = [];
  for (let band = 0; band < 4; band++) {
    if (emptyBands.includes(band)) continue;
    const y0 = band * 100 + 10;
    words.push(word(45, y0, 55, y0 + 10), word(345, y0, 355, y0 + 10));
    if (band === blockedBand) {
      for (let j = 0; j < 20; j++) {
        words.push(word(102 + j * 10, y0, 108 + j * 10, y0 + 10));
      }
    }
  }
  return words;
}

const smallGrid = {
  bandCount: 4,
  bins: 40,
  smoothingWindow: 1,
  searchFraction: 0.25,
  gutterWindowBins: 0,
  stableRunLength: 2,
};

describe('GutterBandScanner', () => {
  let logger: ReturnType<typeof mockLogger>;
  let scanner: GutterBandScanner;

  beforeEach(() => {
    logger = mockLogger();
    scanner = new GutterBandScanner(logger);
  });

  test('finds a gutter running through a two-column page', () => {
    const metrics = scanner.scan(toWords(twoColumnPage()), 600, 800);

    expect(metrics.gutterX).toBe(299.25);
    expect(metrics.coverage).toBeCloseTo(59 / 60);
    expect(metrics.headerFraction).toBe(0);
  });

  test('measures the header above the first stable run', () => {
    const metrics = scanner.scan(toWords(headedTwoColumnPage()), 600, 800);

    expect(metrics.gutterX).toBe(260.25);
    // the title crosses the gutter in bands 0 and 1
    expect(metrics.coverage).toBeCloseTo(55 / 60);
    expect(metrics.headerFraction).toBeCloseTo(4 / 60);
  });

  test('rejects a gutter with all words on one side', () => {
    const metrics = scanner.scan(toWords(narrowSingleColumnPage()), 600, 800);

    expect(metrics).toEqual({ coverage: 0, headerFraction: 0, gutterX: null });
  });

  test('returns no gutter without words', () => {
    expect(scanner.scan([], 600, 800)).toEqual({
      coverage: 0,
      headerFraction: 0,
      gutterX: null,
    });
  });

  test('a band with words across the gutter is not clear', () => {
    const small = new GutterBandScanner(logger, smallGrid);

    const metrics = small.scan(bandedWords(0), 400, 400);

    expect(metrics.gutterX).toBe(195);
    expect(metrics.coverage).toBe(0.75);
    expect(metrics.headerFraction).toBe(0.25);
  });

  test('a word box crossing the gutter blocks its band', () => {
    const small = new GutterBandScanner(logger, smallGrid);
    const words = [...bandedWords(-1), word(100, 10, 200, 20)];

    const metrics = small.scan(words, 400, 400);

    expect(metrics.gutterX).toBe(125);
    expect(metrics.coverage).toBe(0.75);
    expect(metrics.headerFraction).toBe(0.25);
  });

  test('empty bands break a run without counting as clear', () => {
    const small = new GutterBandScanner(logger, smallGrid);

    const metrics = small.scan(bandedWords(0, [1]), 400, 400);

    expect(metrics.coverage).toBe(0.5);
    expect(metrics.headerFraction).toBe(0.5);
  });

  test('reports no header when no run is long enough', () => {
    const small = new GutterBandScanner(logger, {
      ...smallGrid,
      stableRunLength: 3,
    });

    const metrics = small.scan(bandedWords(2), 400, 400);

    expect(metrics.coverage).toBe(0.75);
    expect(metrics.headerFraction).toBe(0);
  });

  test('derives the stable run length from the band count', () => {
    const runLength = (bandCount: number): number =>
      new GutterBandScanner(logger, { bandCount }).stableRunLength;

    expect(scanner.stableRunLength).toBe(5);
    expect(runLength(24)).toBe(4);
    expect(runLength(120)).toBe(10);
  });

  test('rejects bandCount below 1', () => {
    expect(() => new GutterBandScanner(logger, { bandCount: 0 })).toThrow(
      'Invalid GutterBandScanner options: bandCount: bandCount must be at least 1',
    );
  });
});
