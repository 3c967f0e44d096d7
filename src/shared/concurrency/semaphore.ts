/**
 * Counting semaphore for async code.
 *
 * Waiters are served in FIFO order. `acquire` resolves with a release
 * function; calling it more than once has no further effect.
 */
export class Semaphore {
  private available: number;
  private readonly waiters: Array<() => void> = [];

  constructor(readonly permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new Error(`Semaphore needs at least one permit, got ${permits}`);
    }
    this.available = permits;
  }

  get inUse(): number {
    return this.permits - this.available;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  acquire(): Promise<() => void> {
    return new Promise((resolve) => {
      const grant = () => resolve(this.createRelease());

      if (this.available > 0) {
        this.available--;
        grant();
      } else {
        this.waiters.push(grant);
      }
    });
  }

  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  private createRelease(): () => void {
    let released = false;

    return () => {
      if (released) return;
      released = true;

      const next = this.waiters.shift();
      if (next) {
        // Hand the permit straight to the next waiter
        next();
      } else {
        this.available++;
      }
    };
  }
}
