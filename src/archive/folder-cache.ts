import type { Year } from '../core/types.js';
import { ValidationError } from '../core/errors.js';

export interface CacheLock {
  release(): void;
}

/**
 * Years whose archive folder is known to exist for the lifetime of one run.
 *
 * Only grows, and only under the lock: `add()` takes the handle from
 * `acquire()`, held across the whole check-list-create-record sequence.
 * Waiters are served in FIFO order.
 */
export class FolderCache {
  private readonly years = new Set<Year>();
  private tail: Promise<void> = Promise.resolve();
  private holder: CacheLock | null = null;

  async acquire(): Promise<CacheLock> {
    const previous = this.tail;
    let unlock: () => void = () => {};
    const held = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    this.tail = previous.then(() => held);

    await previous;

    let released = false;
    const lock: CacheLock = {
      release: () => {
        if (released) return;
        released = true;
        if (this.holder === lock) this.holder = null;
        unlock();
      },
    };
    this.holder = lock;
    return lock;
  }

  has(year: Year): boolean {
    return this.years.has(year);
  }

  /** Records a year whose folder the holder of `lock` has seen or created. */
  add(year: Year, lock: CacheLock): void {
    if (lock !== this.holder) {
      throw new ValidationError('Folder cache can only be updated while holding its lock');
    }
    this.years.add(year);
  }

  get size(): number {
    return this.years.size;
  }

  list(): Year[] {
    return [...this.years].sort((a, b) => a - b);
  }
}
