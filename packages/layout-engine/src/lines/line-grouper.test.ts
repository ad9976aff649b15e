import { describe, expect, test } from 'vitest';

import { word } from '../__fixtures__/pages';
import { LineGrouper } from './line-grouper';

describe('LineGrouper', () => {
  const grouper = new LineGrouper(5);

  test('groups words by vertical center and sorts lines and words', () => {
    const b = word(100, 12, 150, 22, 'b');
    const c = word(0, 25, 40, 35, 'c');
    const a = word(0, 10, 40, 20, 'a');

    const lines = grouper.group([b, c, a]);

    expect(lines).toHaveLength(2);
    expect(lines[0].anchorY).toBe(17);
    expect(lines[0].words.map((w) => w.text)).toEqual(['a', 'b']);
    expect(lines[0].x0).toBe(0);
    expect(lines[0].x1).toBe(150);
    expect(lines[1].words.map((w) => w.text)).toEqual(['c']);
  });

  test('keeps the anchor of the word that opened the line', () => {
    const lines = grouper.group([
      word(0, 5, 10, 15),
      word(20, 9, 30, 19),
      word(40, 13, 50, 23),
    ]);

    expect(lines.map((line) => line.words.length)).toEqual([2, 1]);
    expect(lines.map((line) => line.anchorY)).toEqual([10, 18]);
  });

  test('returns no lines without words', () => {
    expect(grouper.group([])).toEqual([]);
  });

  test('span is the horizontal extent of the line', () => {
    const [line] = grouper.group([word(30, 0, 60, 10), word(100, 0, 220, 10)]);

    expect(LineGrouper.span(line)).toBe(190);
  });
});
