/**
 * Work-item executors. Both share one contract: dispatch items in order,
 * check `shouldStop` before each dispatch, and let in-flight items finish.
 */

export interface ExecutionReport {
  dispatched: number;
  stoppedEarly: boolean;
}

export interface Executor {
  readonly concurrency: number;
  run<T>(items: readonly T[], task: (item: T) => Promise<void>, shouldStop: () => boolean): Promise<ExecutionReport>;
}

export class SequentialExecutor implements Executor {
  readonly concurrency = 1;

  async run<T>(
    items: readonly T[],
    task: (item: T) => Promise<void>,
    shouldStop: () => boolean
  ): Promise<ExecutionReport> {
    let dispatched = 0;
    for (const item of items) {
      if (shouldStop()) {
        return { dispatched, stoppedEarly: true };
      }
      dispatched++;
      await task(item);
    }
    return { dispatched, stoppedEarly: false };
  }
}

/**
 * Runs at most `concurrency` items at once. Workers pull from a shared
 * cursor, so dispatch order still follows the item order.
 */
export class BoundedExecutor implements Executor {
  constructor(readonly concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
    }
  }

  async run<T>(
    items: readonly T[],
    task: (item: T) => Promise<void>,
    shouldStop: () => boolean
  ): Promise<ExecutionReport> {
    let cursor = 0;
    let stoppedEarly = false;
    const failures: unknown[] = [];

    const worker = async (): Promise<void> => {
      while (cursor < items.length && failures.length === 0) {
        if (shouldStop()) {
          stoppedEarly = true;
          return;
        }
        const item = items[cursor++];
        try {
          await task(item);
        } catch (error) {
          failures.push(error);
        }
      }
    };

    const workers = Array.from({ length: Math.min(this.concurrency, items.length) }, () => worker());
    await Promise.all(workers);

    if (failures.length > 0) {
      throw failures[0];
    }
    return { dispatched: cursor, stoppedEarly };
  }
}

export function createExecutor(concurrency: number): Executor {
  return concurrency > 1 ? new BoundedExecutor(concurrency) : new SequentialExecutor();
}
