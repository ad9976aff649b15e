import type { ResolvedGapSeparatorOptions } from '../config/options';

import { GAP_SEPARATOR } from '../config/constants';

/**
 * Summary of the positive gaps between consecutive word intervals.
 */
export interface GapStatistics {
  count: number;
  median: number;
  p60: number;
  p75: number;
  p90: number;
  max: number;
}

/**
 * Threshold tiers, in the order they can be tried.
 *
 * - `aggressive`: one dominant gap (max > 3 x median), favors narrow columns
 * - `strict`: uniformly spaced text (max < 2 x median), guards against noise
 * - `standard`: everything in between
 * - `fixed`: non-adaptive mode, `minGapWidth` as is
 * - `fallback`: second pass when the first tier found no separator
 */
export type GapThresholdTier =
  | 'aggressive'
  | 'strict'
  | 'standard'
  | 'fixed'
  | 'fallback';

export interface GapThreshold {
  tier: GapThresholdTier;
  value: number;
}

/**
 * A pure threshold generator. Returns `null` when it does not apply to the
 * page's gap statistics.
 */
export type GapThresholdStrategy = (
  stats: GapStatistics,
  options: ResolvedGapSeparatorOptions,
) => GapThreshold | null;

export const primaryThreshold: GapThresholdStrategy = (stats, options) => {
  const { minGapWidth } = options;

  if (!options.adaptive) {
    return { tier: 'fixed', value: minGapWidth };
  }
  if (stats.max > stats.median * GAP_SEPARATOR.DOMINANT_GAP_RATIO) {
    return {
      tier: 'aggressive',
      value: Math.max(minGapWidth * GAP_SEPARATOR.AGGRESSIVE_FACTOR, stats.p60),
    };
  }
  if (stats.max < stats.median * GAP_SEPARATOR.UNIFORM_GAP_RATIO) {
    return {
      tier: 'strict',
      value: Math.max(minGapWidth * GAP_SEPARATOR.STRICT_FACTOR, stats.p90),
    };
  }
  return { tier: 'standard', value: Math.max(minGapWidth, stats.p75) };
};

export const fallbackThreshold: GapThresholdStrategy = (stats, options) => {
  const floor = options.minGapWidth * GAP_SEPARATOR.FALLBACK_FACTOR;
  if (stats.max <= floor) return null;
  return { tier: 'fallback', value: Math.max(floor, stats.p60) };
};

/** Evaluated in order until one yields at least one separator */
export const GAP_THRESHOLD_STRATEGIES: readonly GapThresholdStrategy[] = [
  primaryThreshold,
  fallbackThreshold,
];
