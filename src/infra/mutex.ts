/** Simple mutex used to provide coarse grained synchronisation. */
export class AsyncMutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(operation: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    const release = this.enqueue();
    try {
      await previous;
      return await operation();
    } finally {
      release();
    }
  }

  private enqueue(): () => void {
    let release!: () => void;
    const wait = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = this.tail.then(() => wait);
    return release;
  }
}

/**
 * Family of mutexes indexed by key. Operations sharing a key run one after the
 * other in submission order; different keys never wait on each other. Idle
 * keys are forgotten so the map only holds sites with work in flight.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, operation: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release!: () => void;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    try {
      await previous;
      return await operation();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
