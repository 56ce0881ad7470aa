// src/utils/concurrency.ts

export type Limiter = <T>(fn: () => Promise<T>) => Promise<T>;

/**
 * Limit how many thunks run at once. Queued thunks start in FIFO order as
 * running ones settle.
 */
export function pLimit(concurrency: number): Limiter {
  if (!((Number.isInteger(concurrency) || concurrency === Infinity) && concurrency > 0)) {
    throw new TypeError('Expected `concurrency` to be a number from 1 and up');
  }

  const queue: Array<() => void> = [];
  let activeCount = 0;

  const next = () => {
    activeCount--;
    queue.shift()?.();
  };

  return <T>(fn: () => Promise<T>): Promise<T> => {
    const execute = async (): Promise<T> => {
      activeCount++;
      try {
        return await fn();
      } finally {
        next();
      }
    };

    if (activeCount < concurrency) {
      return execute();
    }
    return new Promise<T>((resolve, reject) => {
      queue.push(() => {
        execute().then(resolve, reject);
      });
    });
  };
}
