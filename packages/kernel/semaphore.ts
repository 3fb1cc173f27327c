/**
 * Counting semaphore used as a concurrency cap.
 *
 * Callers that cannot get a permit do not wait: they leave their work queued
 * and retry once a permit is released.
 */
export class Semaphore {
  private permits: number;
  private readonly maxPermits: number;

  constructor(maxPermits: number) {
    if (!Number.isInteger(maxPermits) || maxPermits < 1) {
      throw new Error('maxPermits must be an integer >= 1');
    }
    this.maxPermits = maxPermits;
    this.permits = maxPermits;
  }

  /**
   * Try to acquire a permit without waiting.
   * @returns true if a permit was acquired, false if none available
   */
  tryAcquire(): boolean {
    if (this.permits > 0) {
      this.permits--;
      return true;
    }
    return false;
  }

  release(): void {
    if (this.permits >= this.maxPermits) {
      throw new Error('Semaphore released more times than acquired');
    }
    this.permits++;
  }

  /** Current available permits */
  get available(): number { return this.permits; }

  /** Permits currently held */
  get inUse(): number { return this.maxPermits - this.permits; }

  get max(): number { return this.maxPermits; }
}
