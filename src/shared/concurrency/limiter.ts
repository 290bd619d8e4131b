export class LimiterCancelledError extends Error {
  constructor() {
    super("Task cancelled before it started");
    this.name = "LimiterCancelledError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type Limiter = <T>(task: () => Promise<T>) => Promise<T>;

/**
 * Runs at most `concurrency` tasks at once, in submission order.
 * Once `signal` aborts, queued tasks are rejected with LimiterCancelledError
 * instead of starting; tasks already running are left to finish.
 *
 *   const limit = createLimiter(4, controller.signal);
 *   await Promise.allSettled(slots.map((s) => limit(() => fetchSlot(s))));
 */
export const createLimiter = (concurrency: number, signal?: AbortSignal): Limiter => {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error("concurrency must be an integer >= 1");
  }

  let active = 0;
  const queue: Array<() => void> = [];

  const next = () => {
    if (active >= concurrency) return;
    const fn = queue.shift();
    if (!fn) return;
    active += 1;
    fn();
  };

  return async <T>(task: () => Promise<T>): Promise<T> => {
    return new Promise<T>((resolve, reject) => {
      queue.push(async () => {
        try {
          if (signal?.aborted) throw new LimiterCancelledError();
          resolve(await task());
        } catch (err) {
          reject(err);
        } finally {
          active -= 1;
          next();
        }
      });
      next();
    });
  };
};
