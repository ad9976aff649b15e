import type { PageInput, Word, WordInput } from '@pagecols/model';

import { vi } from 'vitest';

import { PageNormalizer } from '../input/page-normalizer';

export const mockLogger = () => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
});

export function wordInput(
  x0: number,
  y0: number,
  x1: number,
  y1: number,
  text = 'w',
): WordInput {
  return { text, bbox: [x0, y0, x1, y1] };
}

export function word(
  x0: number,
  y0: number,
  x1: number,
  y1: number,
  text = 'w',
): Word {
  return PageNormalizer.toWord(wordInput(x0, y0, x1, y1, text));
}

/**
 * 10 lines of 4 words inside x 50-250, 5pt between words, on a 600x800 page.
 */
export function narrowSingleColumnPage(): PageInput {
  const words: WordInput[] = [];
  for (let line = 0; line < 10; line++) {
    const y0 = 100 + line * 20;
    for (const [x0, x1] of [
      [50, 95],
      [100, 145],
      [150, 195],
      [200, 250],
    ]) {
      words.push(wordInput(x0, y0, x1, y0 + 10, `a${line}`));
    }
  }
  return { words, width: 600, height: 800 };
}

/**
 * Two columns of 3-word lines: left at x 50-250 from `startY`, right at
 * x 350-550 offset 15pt lower. Lines are 30pt apart and 10pt tall.
 */
export function twoColumnWords(startY: number, lineCount: number): WordInput[] {
  const words: WordInput[] = [];
  for (let line = 0; line < lineCount; line++) {
    const leftY = startY + line * 30;
    const rightY = leftY + 15;
    for (const [x0, x1] of [
      [50, 110],
      [120, 180],
      [190, 250],
    ]) {
      words.push(wordInput(x0, leftY, x1, leftY + 10, `l${line}`));
    }
    for (const [x0, x1] of [
      [350, 410],
      [420, 480],
      [490, 550],
    ]) {
      words.push(wordInput(x0, rightY, x1, rightY + 10, `r${line}`));
    }
  }
  return words;
}

/**
 * 26 line pairs from y = 10, 156 words on a 600x800 page.
 */
export function twoColumnPage(): PageInput {
  return { words: twoColumnWords(10, 26), width: 600, height: 800 };
}

/**
 * Full-width title at y 10-20 above 24 line pairs starting at y = 60.
 */
export function headedTwoColumnPage(): PageInput {
  const header = [
    wordInput(20, 10, 120, 20, 'title'),
    wordInput(130, 10, 230, 20, 'title'),
    wordInput(240, 10, 360, 20, 'title'),
    wordInput(370, 10, 580, 20, 'title'),
  ];
  return {
    words: [...header, ...twoColumnWords(60, 24)],
    width: 600,
    height: 800,
  };
}

/**
 * 50 words 3pt wide with 5pt gaps, split by one 200pt gap centered at 300.
 */
export function gapSplitWords(): Word[] {
  const words: Word[] = [];
  for (let i = 0; i < 25; i++) {
    const x0 = 5 + i * 8;
    words.push(word(x0, 100, x0 + 3, 110));
  }
  for (let i = 0; i < 25; i++) {
    const x0 = 400 + i * 8;
    words.push(word(x0, 100, x0 + 3, 110));
  }
  return words;
}

/**
 * 45 lines of prose across x 50-550 on a 600x792 page. Word spaces shift by
 * 9pt per line, so no vertical river runs through the text.
 */
export function proseSingleColumnPage(): PageInput {
  const words: WordInput[] = [];
  for (let line = 0; line < 45; line++) {
    const y0 = 40 + line * 16;
    const shift = (line * 9) % 40;
    words.push(wordInput(50, y0, 70 + shift, y0 + 10, `p${line}`));
    let x0 = 74 + shift;
    while (x0 + 36 < 550) {
      words.push(wordInput(x0, y0, x0 + 36, y0 + 10, `p${line}`));
      x0 += 40;
    }
    if (x0 < 550) words.push(wordInput(x0, y0, 550, y0 + 10, `p${line}`));
  }
  return { words, width: 600, height: 792 };
}

/**
 * Narrow sidebar at x 30-150 beside a main column at x 200-570, 20 lines.
 */
export function sidebarPage(): PageInput {
  const words: WordInput[] = [];
  for (let line = 0; line < 20; line++) {
    const y0 = 50 + line * 24;
    words.push(
      wordInput(30, y0, 85, y0 + 10, `s${line}`),
      wordInput(90, y0, 150, y0 + 10, `s${line}`),
    );
    for (let x0 = 200; x0 < 570; x0 += 74) {
      words.push(wordInput(x0, y0 + 6, x0 + 70, y0 + 16, `m${line}`));
    }
  }
  return { words, width: 600, height: 800 };
}

/**
 * Three 160pt columns of 2-word lines, 18 lines each.
 */
export function threeColumnPage(): PageInput {
  const words: WordInput[] = [];
  for (let line = 0; line < 18; line++) {
    const y0 = 40 + line * 30;
    for (const start of [30, 230, 430]) {
      words.push(
        wordInput(start, y0, start + 70, y0 + 10, `c${start}`),
        wordInput(start + 80, y0, start + 140, y0 + 10, `c${start}`),
      );
    }
  }
  return { words, width: 600, height: 800 };
}

/**
 * Five scattered words.
 */
export function sparsePage(): PageInput {
  return {
    words: [
      wordInput(40, 60, 90, 70),
      wordInput(420, 60, 500, 70),
      wordInput(250, 300, 330, 312),
      wordInput(60, 700, 120, 710),
      wordInput(480, 720, 560, 730),
    ],
    width: 600,
    height: 800,
  };
}
