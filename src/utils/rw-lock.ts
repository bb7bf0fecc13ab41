/**
 * Async reader/writer lock.
 *
 * Readers share the lock; a writer holds it alone. Waiters are granted in
 * arrival order, so a queued writer blocks readers that arrive after it.
 */

type Release = () => void;

interface Waiter {
  mode: 'read' | 'write';
  grant: () => void;
}

export class ReadWriteLock {
  private activeReaders = 0;
  private writerActive = false;
  private readonly waiters: Waiter[] = [];

  /** Number of readers currently holding the lock. */
  get readers(): number {
    return this.activeReaders;
  }

  /** True while a writer holds the lock. */
  get writing(): boolean {
    return this.writerActive;
  }

  acquireRead(): Promise<Release> {
    if (!this.writerActive && this.waiters.length === 0) {
      this.activeReaders++;
      return Promise.resolve(this.readRelease());
    }
    return new Promise((resolve) => {
      this.waiters.push({
        mode: 'read',
        grant: () => {
          this.activeReaders++;
          resolve(this.readRelease());
        },
      });
    });
  }

  acquireWrite(): Promise<Release> {
    if (!this.writerActive && this.activeReaders === 0 && this.waiters.length === 0) {
      this.writerActive = true;
      return Promise.resolve(this.writeRelease());
    }
    return new Promise((resolve) => {
      this.waiters.push({
        mode: 'write',
        grant: () => {
          this.writerActive = true;
          resolve(this.writeRelease());
        },
      });
    });
  }

  /**
   * Run fn under the shared lock.
   */
  async withRead<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireRead();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /**
   * Run fn under the exclusive lock.
   */
  async withWrite<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireWrite();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private readRelease(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.activeReaders--;
      this.drain();
    };
  }

  private writeRelease(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.writerActive = false;
      this.drain();
    };
  }

  private drain(): void {
    if (this.writerActive) return;

    while (this.waiters.length > 0) {
      const next = this.waiters[0];
      if (next.mode === 'write') {
        if (this.activeReaders > 0) return;
        this.waiters.shift();
        next.grant();
        return;
      }
      this.waiters.shift();
      next.grant();
    }
  }
}
