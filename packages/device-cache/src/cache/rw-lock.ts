type Waiter = { kind: "read" | "write"; grant: () => void };

/**
 * Async reader/writer lock. Readers share the lock; a writer holds it alone.
 * Waiters are served in arrival order, so a queued writer is not starved by
 * readers that arrive after it.
 */
export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private readonly queue: Waiter[] = [];

  async withRead<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire("read");
    try {
      return await fn();
    } finally {
      this.readers -= 1;
      this.drain();
    }
  }

  async withWrite<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire("write");
    try {
      return await fn();
    } finally {
      this.writing = false;
      this.drain();
    }
  }

  private acquire(kind: Waiter["kind"]): Promise<void> {
    return new Promise<void>((resolve) => {
      this.queue.push({ kind, grant: resolve });
      this.drain();
    });
  }

  private drain(): void {
    while (this.queue.length > 0 && !this.writing) {
      const next = this.queue[0];
      if (next.kind === "write") {
        if (this.readers > 0) return;
        this.queue.shift();
        this.writing = true;
        next.grant();
        return;
      }
      this.queue.shift();
      this.readers += 1;
      next.grant();
    }
  }
}
