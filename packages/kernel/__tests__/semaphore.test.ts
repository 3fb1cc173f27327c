import { describe, expect, it } from 'vitest';

import { Semaphore } from '../semaphore';

describe('Semaphore', () => {
  it('hands out at most maxPermits', () => {
    const semaphore = new Semaphore(2);

    expect(semaphore.tryAcquire()).toBe(true);
    expect(semaphore.tryAcquire()).toBe(true);
    expect(semaphore.tryAcquire()).toBe(false);
    expect(semaphore.inUse).toBe(2);
    expect(semaphore.available).toBe(0);
  });

  it('makes a permit available again on release', () => {
    const semaphore = new Semaphore(1);
    semaphore.tryAcquire();
    semaphore.release();

    expect(semaphore.available).toBe(1);
    expect(semaphore.tryAcquire()).toBe(true);
  });

  it('throws when released more than acquired', () => {
    const semaphore = new Semaphore(1);
    expect(() => semaphore.release()).toThrow('released more times than acquired');
  });

  it('rejects a non-positive size', () => {
    expect(() => new Semaphore(0)).toThrow('maxPermits');
  });
});
