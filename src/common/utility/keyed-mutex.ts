import { TransientFailureError } from '../errors/insights.errors';

type Release = () => void;

/**
 * Per-key FIFO lock. Callers for the same key run one at a time in arrival
 * order; different keys never wait on each other.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(
    key: string,
    waitTimeoutMs: number,
    task: () => Promise<T>,
  ): Promise<T> {
    const release = await this.acquire(key, waitTimeoutMs);
    try {
      return await task();
    } finally {
      release();
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  private async acquire(key: string, waitTimeoutMs: number): Promise<Release> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: Release = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    const unlock: Release = () => {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), waitTimeoutMs);
    });

    try {
      const outcome = await Promise.race([previous.then(() => 'acquired' as const), timedOut]);
      if (outcome === 'timeout') {
        // Stay in the queue so later waiters keep their order, but give the slot up at once.
        void previous.then(unlock);
        throw new TransientFailureError(
          `Another acquisition for '${key}' is still running; retry later`,
        );
      }
      return unlock;
    } finally {
      clearTimeout(timer);
    }
  }
}
