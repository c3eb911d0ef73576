export type Release = () => void;

export const DEFAULT_MAX_CONCURRENCY = 3;

/**
 * Process-wide permit pool for external calls.
 *
 * Waiters are served in FIFO order. A permit is handed directly from the
 * releasing holder to the next waiter, so `active` never exceeds `size`.
 */
export class Limiter {
  readonly size: number;
  private inUse = 0;
  private readonly waiters: Array<(release: Release) => void> = [];

  constructor(size: number = DEFAULT_MAX_CONCURRENCY) {
    if (!Number.isInteger(size) || size < 1) {
      throw new Error(`Limiter size must be a positive integer, got ${size}`);
    }
    this.size = size;
  }

  get active(): number {
    return this.inUse;
  }

  get pending(): number {
    return this.waiters.length;
  }

  acquire(): Promise<Release> {
    if (this.inUse < this.size) {
      this.inUse += 1;
      return Promise.resolve(this.createRelease());
    }

    return new Promise<Release>((resolve) => {
      this.waiters.push(resolve);
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

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this.waiters.shift();
      if (next) {
        next(this.createRelease());
      } else {
        this.inUse -= 1;
      }
    };
  }
}

let processLimiter: Limiter | undefined;

/** Pool used by every runner that was not handed a limiter explicitly. */
export function defaultLimiter(): Limiter {
  processLimiter ??= new Limiter();
  return processLimiter;
}
