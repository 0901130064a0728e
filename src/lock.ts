/**
 * Per-key async mutex. Work queued under the same key runs one at a time in
 * arrival order; work under different keys never waits on each other.
 */
export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  get size(): number {
    return this.tails.size;
  }
}

export type GuardedResult<T> = { ran: true; value: T } | { ran: false };

/**
 * Drops an invocation while a previous one is still in flight. Used for the
 * poll cycle and the scheduler tick; a missed run is picked up next time.
 */
export class NonReentrant {
  private running = false;

  constructor(private readonly name: string) {}

  get busy(): boolean {
    return this.running;
  }

  async run<T>(fn: () => Promise<T>): Promise<GuardedResult<T>> {
    if (this.running) {
      console.warn(`[${this.name}] previous run still in progress; skipping`);
      return { ran: false };
    }
    this.running = true;
    try {
      return { ran: true, value: await fn() };
    } finally {
      this.running = false;
    }
  }
}
