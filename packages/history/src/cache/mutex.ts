/**
 * Serializes async critical sections within one process.
 */
export class Mutex {
  private locked = false;
  private queue: Array<() => void> = [];

  async acquire(): Promise<() => void> {
    while (this.locked) {
      await new Promise<void>((resolve) => {
        this.queue.push(resolve);
      });
    }
    this.locked = true;
    return () => this.release();
  }

  private release(): void {
    const next = this.queue.shift();
    this.locked = false;
    if (next) {
      next();
    }
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }
}
