/**
 * Counting semaphore for capping in-flight async work against
 * the embedding service and vector stores.
 */
export class Semaphore {
  private active = 0;
  private readonly waiters: Array<() => void> = [];
  private readonly max: number;

  constructor(maxConcurrent: number) {
    this.max = Math.max(1, Math.floor(maxConcurrent));
  }

  get available(): number {
    return this.max - this.active;
  }

  get pending(): number {
    return this.waiters.length;
  }

  async acquire(): Promise<() => void> {
    if (this.active < this.max) {
      this.active++;
      return this.releaser();
    }
    await new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
    // The releasing task handed its slot over, so `active` is unchanged.
    return this.releaser();
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) {
        next();
      } else {
        this.active--;
      }
    };
  }
}

/** Map over `items` with at most `maxConcurrent` calls of `fn` in flight; output order matches input. */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  maxConcurrent: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const semaphore = new Semaphore(maxConcurrent);
  return Promise.all(items.map((item, index) => semaphore.run(() => fn(item, index))));
}
