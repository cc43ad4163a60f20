/**
 * Concurrency gate for batch resolution: `resolveHosts` pushes every input
 * through `mapLimit`, so at most `concurrency` host lookups run at
 * once. In-house rather than `p-limit`, whose current majors are ESM-only
 * and do not load under Jest's CommonJS runtime.
 */
export type Limiter = <T>(task: () => Promise<T>) => Promise<T>;

function assertConcurrency(concurrency: number): void {
  if (!Number.isInteger(concurrency) && concurrency !== Infinity) {
    throw new TypeError('Expected `concurrency` to be a number');
  }
  if (concurrency < 1) {
    throw new TypeError('Expected `concurrency` to be >= 1');
  }
}

export default function pLimit(concurrency: number): Limiter {
  assertConcurrency(concurrency);

  const waiting: Array<() => void> = [];
  let running = 0;

  const release = () => {
    running--;
    waiting.shift()?.();
  };

  return <T>(task: () => Promise<T>): Promise<T> =>
    new Promise<T>((resolve, reject) => {
      const start = () => {
        running++;
        task().then(resolve, reject).finally(release);
      };
      if (running < concurrency) start();
      else waiting.push(start);
    });
}

/**
 * Map `items` through `fn` with at most `concurrency` calls in flight.
 * Results keep the input order. A bad `concurrency` rejects the returned
 * promise rather than throwing.
 */
export async function mapLimit<I, O>(
  items: readonly I[],
  concurrency: number,
  fn: (item: I, index: number) => Promise<O>,
): Promise<O[]> {
  const limit = pLimit(concurrency);
  return Promise.all(items.map((item, i) => limit(() => fn(item, i))));
}
