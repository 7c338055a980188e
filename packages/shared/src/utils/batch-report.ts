import type { Result } from './result';

/**
 * Outcome of one item in a batch
 */
export interface BatchItemOutcome<I, T, E> {
  item: I;
  result: Result<T, E>;
}

/**
 * Per-item results of a batch, split by outcome
 */
export interface BatchReport<I, T, E> {
  succeeded: { item: I; value: T }[];
  failed: { item: I; error: E }[];
}

/**
 * BatchReport helpers
 *
 * Items are processed one after another; a failing item never stops the
 * batch. Whether the batch as a whole counts as a success is left to the
 * caller.
 */
export class BatchReporter {
  /**
   * Sequentially applies `processFn` to every item and collects the results.
   *
   * @example
   * ```typescript
   * const report = await BatchReporter.run(files, (file) => watermark(file));
   * // report.succeeded / report.failed
   * ```
   */
  static async run<I, T, E>(
    items: readonly I[],
    processFn: (item: I, index: number) => Promise<Result<T, E>>,
  ): Promise<BatchReport<I, T, E>> {
    const outcomes: BatchItemOutcome<I, T, E>[] = [];
    for (const [index, item] of items.entries()) {
      outcomes.push({ item, result: await processFn(item, index) });
    }
    return this.collect(outcomes);
  }

  /**
   * Splits outcomes into successes and failures, keeping input order.
   */
  static collect<I, T, E>(
    outcomes: readonly BatchItemOutcome<I, T, E>[],
  ): BatchReport<I, T, E> {
    const report: BatchReport<I, T, E> = { succeeded: [], failed: [] };
    for (const { item, result } of outcomes) {
      if (result.ok) {
        report.succeeded.push({ item, value: result.value });
      } else {
        report.failed.push({ item, error: result.error });
      }
    }
    return report;
  }

  /**
   * True when at least one item succeeded.
   */
  static hasAnySuccess<I, T, E>(report: BatchReport<I, T, E>): boolean {
    return report.succeeded.length > 0;
  }
}
