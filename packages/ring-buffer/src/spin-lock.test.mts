import { describe, it, expect } from 'vitest';

import { SpinLock } from './spin-lock.mjs';

describe('SpinLock', () => {
  const createLock = () => {
    const slots = new Int32Array(new SharedArrayBuffer(8));
    return { slots, lock: new SpinLock(slots, 1) };
  };

  it('should start unlocked', () => {
    const { lock } = createLock();
    expect(lock.isLocked()).toBe(false);
  });

  it('should only be acquired once until released', () => {
    const { lock, slots } = createLock();

    const release = lock.acquire();
    expect(lock.isLocked()).toBe(true);
    expect(slots[1]).toBe(1);
    expect(lock.tryAcquire()).toBe(false);

    release();
    expect(lock.isLocked()).toBe(false);
    expect(lock.tryAcquire()).toBe(true);
  });

  it('should leave other slots alone', () => {
    const { lock, slots } = createLock();
    slots[0] = 42;
    lock.withLock(() => undefined);
    expect(slots[0]).toBe(42);
  });

  it('should return the value of the locked function', () => {
    const { lock } = createLock();
    expect(lock.withLock(() => 7)).toBe(7);
    expect(lock.isLocked()).toBe(false);
  });

  it('should hold the lock while the function runs', () => {
    const { lock } = createLock();
    const heldInside = lock.withLock(() => lock.isLocked());
    expect(heldInside).toBe(true);
  });

  it('should release the lock when the function throws', () => {
    const { lock } = createLock();
    expect(() =>
      lock.withLock(() => {
        throw new Error('inside');
      })
    ).toThrow('inside');
    expect(lock.isLocked()).toBe(false);
  });

  it('should see a lock taken through another view of the same memory', () => {
    const { slots, lock } = createLock();
    const other = new SpinLock(new Int32Array(slots.buffer), 1);

    const release = lock.acquire();
    expect(other.tryAcquire()).toBe(false);
    release();
    expect(other.tryAcquire()).toBe(true);
  });
});
