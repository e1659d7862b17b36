export type ConcurrencyLimiter = <T>(fn: () => Promise<T>) => Promise<T>;

/**
 * Creates a limiter that runs at most `maxConcurrency` async operations at once.
 * Waiters are woken in FIFO order.
 */
export function createConcurrencyLimiter(maxConcurrency: number): ConcurrencyLimiter {
  const limit = Math.max(1, Math.floor(maxConcurrency));
  let active = 0;
  const waiting: Array<() => void> = [];

  const acquire = async (): Promise<void> => {
    if (active < limit) {
      active++;
      return;
    }

    await new Promise<void>((resolve) => {
      waiting.push(() => {
        active++;
        resolve();
      });
    });
  };

  const release = (): void => {
    active--;
    waiting.shift()?.();
  };

  return async function runLimited<T>(fn: () => Promise<T>): Promise<T> {
    await acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  };
}

/**
 * Works a LIFO queue of directories with up to `maxDirectoryConcurrency` workers in flight.
 * Workers may push more directories onto `queue`; resolves once the queue is empty and idle.
 */
export function runDirectoryQueue<T>(params: {
  queue: T[];
  maxDirectoryConcurrency: number;
  runOneDirectory: (directory: T) => Promise<void>;
}): Promise<void> {
  const { queue, runOneDirectory } = params;
  const maxInFlight = Math.max(1, Math.floor(params.maxDirectoryConcurrency));

  return new Promise<void>((resolve, reject) => {
    let inFlight = 0;
    let settled = false;

    const schedule = (): void => {
      if (settled) return;

      while (inFlight < maxInFlight) {
        const directory = queue.pop();
        if (directory === undefined) break;

        inFlight++;
        void runOneDirectory(directory).then(
          () => {
            inFlight--;
            schedule();
          },
          (error: unknown) => {
            settled = true;
            reject(error);
          }
        );
      }

      if (inFlight === 0 && queue.length === 0) {
        settled = true;
        resolve();
      }
    };

    schedule();
  });
}
