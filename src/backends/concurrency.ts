export class Semaphore {
  private available: number;
  private queue: Array<() => void> = [];
  private readonly capacity: number;

  constructor(limit: number) {
    this.available = Math.max(1, Math.floor(limit || 1));
    this.capacity = this.available;
  }

  async acquire(): Promise<() => void> {
    if (this.available > 0) {
      this.available -= 1;
      return () => this.release();
    }
    // the releasing holder hands its slot straight to the next waiter
    await new Promise<void>((resolve) => this.queue.push(resolve));
    return () => this.release();
  }

  private release() {
    const next = this.queue.shift();
    if (next) {
      next();
      return;
    }
    this.available = Math.min(this.capacity, this.available + 1);
  }
}

/** One single-slot semaphore per key; callers on the same key run in turn. */
export class KeyedMutex {
  private readonly locks = new Map<string, Semaphore>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    let lock = this.locks.get(key);
    if (!lock) {
      lock = new Semaphore(1);
      this.locks.set(key, lock);
    }
    const release = await lock.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
