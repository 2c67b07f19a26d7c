// server/utils/pLimit.ts
export type Limiter = <T>(fn: () => Promise<T>) => Promise<T>;

/** Runs at most `n` of the wrapped tasks at once; the rest wait in FIFO order. */
export function pLimit(n: number): Limiter {
  const queue: Array<() => void> = [];
  let active = 0;
  const next = () => {
    active--;
    const run = queue.shift();
    if (run) run();
  };
  return <T>(fn: () => Promise<T>) =>
    new Promise<T>((resolve, reject) => {
      const run = () => {
        active++;
        fn().then(
          (v) => {
            resolve(v);
            next();
          },
          (e: unknown) => {
            reject(e);
            next();
          },
        );
      };
      if (active < n) run();
      else queue.push(run);
    });
}
