/**
 * Compare-and-swap lock on one slot of a shared Int32Array
 */

const UNLOCKED = 0;
const LOCKED = 1;

export class SpinLock {
  constructor(
    private readonly slots: Int32Array,
    private readonly slot: number
  ) {}

  /**
   * Take the lock if it is free, without spinning
   */
  tryAcquire(): boolean {
    return Atomics.compareExchange(this.slots, this.slot, UNLOCKED, LOCKED) === UNLOCKED;
  }

  /**
   * Acquire the lock, spinning while another thread holds it.
   * Holders only keep it for O(1) bookkeeping.
   */
  acquire(): () => void {
    while (!this.tryAcquire()) {
      // spin
    }
    return () => this.release();
  }

  private release(): void {
    Atomics.store(this.slots, this.slot, UNLOCKED);
  }

  /**
   * Execute a function with the lock held. Not reentrant.
   */
  withLock<T>(fn: () => T): T {
    const release = this.acquire();
    try {
      return fn();
    } finally {
      release();
    }
  }

  /**
   * Check if the lock is currently held
   */
  isLocked(): boolean {
    return Atomics.load(this.slots, this.slot) === LOCKED;
  }
}
