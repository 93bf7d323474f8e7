/**
 * Counting semaphore bounding how many async tasks run at once.
 * Waiters are released in FIFO order.
 */
export class Semaphore {
  private inFlight = 0;
  private readonly queue: Array<() => void> = [];

  constructor(private readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Semaphore limit must be a positive integer, got ${limit}`);
    }
  }

  async acquire(): Promise<() => void> {
    if (this.inFlight < this.limit) {
      this.inFlight += 1;
      return this.releaser();
    }

    return new Promise((resolve) => {
      this.queue.push(() => {
        this.inFlight += 1;
        resolve(this.releaser());
      });
    });
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  get pending(): number {
    return this.queue.length;
  }

  get active(): number {
    return this.inFlight;
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      this.release();
    };
  }

  private release(): void {
    this.inFlight -= 1;
    const next = this.queue.shift();
    if (next) {
      next();
    }
  }
}
