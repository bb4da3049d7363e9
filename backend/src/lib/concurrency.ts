/**
 * Runs `worker` over `items` with at most `maxConcurrency` in flight.
 * Results keep the order of `items`.
 */
export const runWithConcurrency = async <T, R>(
  items: readonly T[],
  maxConcurrency: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> => {
  const results = new Array<R>(items.length);
  const queue = items.map((item, index) => ({ item, index }));
  const running: Promise<void>[] = [];

  const enqueue = (): void => {
    const next = queue.shift();
    if (next === undefined) return;

    const task: Promise<void> = worker(next.item, next.index)
      .then((result) => {
        results[next.index] = result;
      })
      .finally(() => {
        const idx = running.indexOf(task);
        if (idx !== -1) running.splice(idx, 1);
      });
    running.push(task);
  };

  const initial = Math.min(Math.max(1, maxConcurrency), queue.length);
  for (let i = 0; i < initial; i += 1) {
    enqueue();
  }

  while (queue.length > 0) {
    await Promise.race(running);
    enqueue();
  }

  await Promise.all(running);
  return results;
};

export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}

/** Counting semaphore; a ceiling below one is treated as one. */
export class Semaphore {
  private available: number;
  private readonly waiters: Array<() => void> = [];

  constructor(readonly permits: number) {
    this.available = Math.max(1, permits);
  }

  get inUse(): number {
    return Math.max(1, this.permits) - this.available;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  async run<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.available > 0) {
      this.available -= 1;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      // The permit passes straight to the next waiter.
      next();
      return;
    }
    this.available += 1;
  }
}

/** One {@link Mutex} per key, dropped once nobody holds or waits on it. */
export class KeyedMutex {
  private readonly locks = new Map<string, { mutex: Mutex; holders: number }>();

  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    let entry = this.locks.get(key);
    if (!entry) {
      entry = { mutex: new Mutex(), holders: 0 };
      this.locks.set(key, entry);
    }
    entry.holders += 1;
    const held = entry;
    try {
      return await held.mutex.runExclusive(fn);
    } finally {
      held.holders -= 1;
      if (held.holders === 0) {
        this.locks.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.locks.has(key);
  }
}
