/**
 * Async reader/writer lock.
 *
 * Readers share the lock; a writer holds it alone. Waiters are granted in
 * arrival order, so a reader that arrives behind a queued writer waits for
 * that writer instead of starving it.
 */

export type ReleaseLock = () => void;

type LockMode = 'read' | 'write';

interface Waiter {
  mode: LockMode;
  grant: () => void;
}

export class ReadWriteLock {
  private activeReaders = 0;
  private writerActive = false;
  private waiting: Waiter[] = [];

  acquireRead(): Promise<ReleaseLock> {
    if (!this.writerActive && this.waiting.length === 0) {
      this.activeReaders++;
      return Promise.resolve(this.createRelease('read'));
    }
    return this.enqueue('read');
  }

  acquireWrite(): Promise<ReleaseLock> {
    if (!this.writerActive && this.activeReaders === 0 && this.waiting.length === 0) {
      this.writerActive = true;
      return Promise.resolve(this.createRelease('write'));
    }
    return this.enqueue('write');
  }

  async withRead<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquireRead();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  async withWrite<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquireWrite();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  get readers(): number {
    return this.activeReaders;
  }

  get isWriteLocked(): boolean {
    return this.writerActive;
  }

  get pending(): number {
    return this.waiting.length;
  }

  private enqueue(mode: LockMode): Promise<ReleaseLock> {
    return new Promise<ReleaseLock>((resolve) => {
      this.waiting.push({
        mode,
        grant: () => resolve(this.createRelease(mode)),
      });
    });
  }

  /** Release functions are idempotent; a second call is ignored. */
  private createRelease(mode: LockMode): ReleaseLock {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      if (mode === 'read') {
        this.activeReaders--;
      } else {
        this.writerActive = false;
      }
      this.drain();
    };
  }

  private drain(): void {
    while (this.waiting.length > 0) {
      const next = this.waiting[0];

      if (next.mode === 'write') {
        if (this.writerActive || this.activeReaders > 0) return;
        this.waiting.shift();
        this.writerActive = true;
        next.grant();
        return;
      }

      if (this.writerActive) return;
      this.waiting.shift();
      this.activeReaders++;
      next.grant();
    }
  }
}
