/**
 * Bounded concurrency
 * Tasks may be submitted all at once; at most `maxConcurrent` run at a time
 * and the rest wait in FIFO order.
 */

export type Limiter = <T>(task: () => Promise<T>) => Promise<T>;

export function createLimiter(maxConcurrent: number): Limiter {
  if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
    throw new Error(`maxConcurrent must be a positive integer, got ${maxConcurrent}`);
  }

  let active = 0;
  const queue: Array<() => void> = [];

  const release = () => {
    active--;
    const next = queue.shift();
    if (next) next();
  };

  return <T>(task: () => Promise<T>): Promise<T> =>
    new Promise<T>((resolve, reject) => {
      const start = () => {
        active++;
        void Promise.resolve()
          .then(task)
          .then(resolve, reject)
          .finally(release);
      };
      if (active < maxConcurrent) {
        start();
      } else {
        queue.push(start);
      }
    });
}
