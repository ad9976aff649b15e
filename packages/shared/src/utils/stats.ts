/**
 * Numeric helpers shared by the layout signals.
 *
 * Percentiles use the nearest-rank convention `sorted[floor(n * p)]`
 * (clamped to the last element), which is what the gap thresholds are tuned
 * against.
 */
export class Stats {
  /**
   * Ascending copy of `values`.
   */
  static sorted(values: readonly number[]): number[] {
    return [...values].sort((a, b) => a - b);
  }

  /**
   * Nearest-rank percentile of an already sorted array.
   *
   * @param sortedValues - Ascending values, must not be empty
   * @param p - Fraction in [0, 1]
   */
  static percentile(sortedValues: readonly number[], p: number): number {
    if (sortedValues.length === 0) {
      throw new RangeError('percentile of an empty array');
    }
    const index = Math.min(
      sortedValues.length - 1,
      Math.max(0, Math.floor(sortedValues.length * p)),
    );
    return sortedValues[index];
  }

  /**
   * Upper median (`sorted[floor(n / 2)]`) of an already sorted array.
   */
  static median(sortedValues: readonly number[]): number {
    return Stats.percentile(sortedValues, 0.5);
  }

  /**
   * Arithmetic mean, 0 for an empty array.
   */
  static mean(values: readonly number[]): number {
    if (values.length === 0) return 0;
    let sum = 0;
    for (const value of values) sum += value;
    return sum / values.length;
  }

  /**
   * Population variance, 0 for an empty array.
   */
  static variance(values: readonly number[]): number {
    if (values.length === 0) return 0;
    const mean = Stats.mean(values);
    let sum = 0;
    for (const value of values) sum += (value - mean) ** 2;
    return sum / values.length;
  }

  static clamp(value: number, min = 0, max = 1): number {
    return Math.min(max, Math.max(min, value));
  }
}
