type Release = () => void;

/**
 * Async read-write lock. Readers share the lock; a writer holds it alone.
 * Queued writers take priority over newly arriving readers.
 */
export class RWLock {
  private readers = 0;
  private writer = false;
  private readQueue: Array<() => void> = [];
  private writeQueue: Array<() => void> = [];

  async readLock(): Promise<Release> {
    await new Promise<void>((resolve) => {
      const attempt = () => {
        if (!this.writer && this.writeQueue.length === 0) {
          this.readers++;
          resolve();
        } else {
          this.readQueue.push(attempt);
        }
      };
      attempt();
    });
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.readers--;
      if (this.readers === 0) this.wakeWriter();
    };
  }

  async writeLock(): Promise<Release> {
    await new Promise<void>((resolve) => {
      const attempt = () => {
        if (!this.writer && this.readers === 0) {
          this.writer = true;
          resolve();
        } else {
          this.writeQueue.push(attempt);
        }
      };
      attempt();
    });
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.writer = false;
      if (this.writeQueue.length > 0) {
        this.wakeWriter();
      } else {
        const waiting = this.readQueue.splice(0);
        for (const next of waiting) next();
      }
    };
  }

  async withRead<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.readLock();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  async withWrite<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.writeLock();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private wakeWriter() {
    const next = this.writeQueue.shift();
    if (next) next();
  }
}
