/**
 * Outcome of one pooled task.
 */
export type PoolOutcome<R> =
  | { status: 'fulfilled'; index: number; value: R }
  | { status: 'rejected'; index: number; reason: unknown };

/**
 * ConcurrentPool - bounded worker pool for per-page work.
 *
 * Keeps up to N workers busy; a worker that finishes takes the next item
 * right away. Results keep the input order regardless of completion order.
 */
export class ConcurrentPool {
  /**
   * Process every item and settle each one independently.
   *
   * A rejected task is reported in its slot and does not stop the others,
   * so one bad page never aborts a document.
   *
   * @param items - Items to process
   * @param concurrency - Maximum number of workers, at least 1
   * @param processFn - Task run for each item (sync or async)
   * @param onItemSettled - Called once per item as soon as it settles
   * @returns One outcome per item, in input order
   */
  static async runSettled<T, R>(
    items: readonly T[],
    concurrency: number,
    processFn: (item: T, index: number) => R | Promise<R>,
    onItemSettled?: (outcome: PoolOutcome<R>) => void,
  ): Promise<PoolOutcome<R>[]> {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(
        `concurrency must be a positive integer, got ${concurrency}`,
      );
    }

    const outcomes: PoolOutcome<R>[] = new Array(items.length);
    let nextIndex = 0;

    async function worker(): Promise<void> {
      while (nextIndex < items.length) {
        const index = nextIndex++;
        let outcome: PoolOutcome<R>;
        try {
          const value = await processFn(items[index], index);
          outcome = { status: 'fulfilled', index, value };
        } catch (reason) {
          outcome = { status: 'rejected', index, reason };
        }
        outcomes[index] = outcome;
        onItemSettled?.(outcome);
      }
    }

    const workers = Array.from(
      { length: Math.min(concurrency, items.length) },
      () => worker(),
    );
    await Promise.all(workers);
    return outcomes;
  }
}
