import type { LoggerMethods } from '@pagecols/logger';
import type { Word } from '@pagecols/model';

import {
  type ResolvedYOverlapOptions,
  type YOverlapOptions,
  parseOptions,
  yOverlapOptionsSchema,
} from '../config/options';
import { WordGeometry } from '../geometry/word-geometry';

/**
 * YOverlapScorer
 *
 * Mean vertical overlap over unordered word pairs, each pair normalized by
 * the smaller height. Many words sharing a vertical position points at
 * side-by-side content.
 *
 * Enumerates every pair while `n(n-1)/2 <= maxPairs`; above that, scores an
 * evenly strided subsample of `sampleSize` words so the result stays
 * deterministic.
 */
export class YOverlapScorer {
  private readonly options: ResolvedYOverlapOptions;

  constructor(
    private readonly logger: LoggerMethods,
    options?: YOverlapOptions,
  ) {
    this.options = parseOptions(
      'YOverlapScorer',
      yOverlapOptionsSchema,
      options,
    );
  }

  score(words: readonly Word[]): number {
    const n = words.length;
    if (n < 2) return 0;

    const pairCount = (n * (n - 1)) / 2;
    const sample =
      pairCount <= this.options.maxPairs
        ? words
        : YOverlapScorer.stridedSample(words, this.options.sampleSize);

    if (sample !== words) {
      this.logger.debug(
        `[YOverlapScorer] ${pairCount} pairs over budget, sampling ${sample.length} of ${n} words`,
      );
    }

    let total = 0;
    let counted = 0;
    for (let i = 0; i < sample.length; i++) {
      for (let j = i + 1; j < sample.length; j++) {
        const ratio = WordGeometry.verticalOverlapRatio(sample[i], sample[j]);
        if (ratio === null) continue;
        total += ratio;
        counted++;
      }
    }

    return counted > 0 ? total / counted : 0;
  }

  /**
   * Every `n / size`-th word, starting with the first.
   */
  static stridedSample<T>(items: readonly T[], size: number): T[] {
    if (items.length <= size) return [...items];
    const result: T[] = [];
    for (let i = 0; i < size; i++) {
      result.push(items[Math.floor((i * items.length) / size)]);
    }
    return result;
  }
}
