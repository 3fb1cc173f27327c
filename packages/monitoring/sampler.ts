import { isLevelAtLeast, LogLevel } from './types';

/**
 * Probabilistic admission of low-severity events.
 *
 * WARNING and above are always admitted and never consume a random draw.
 * Trace decisions hash the trace id, so every span of one trace shares the
 * same outcome across processes using the same rate.
 */
export class Sampler {
  private readonly rate: number;

  constructor(
    sampleRate: number,
    private readonly random: () => number = Math.random
  ) {
    if (!(sampleRate >= 0 && sampleRate <= 1)) {
      throw new RangeError('sampleRate must be within [0, 1]');
    }
    this.rate = sampleRate;
  }

  get sampleRate(): number {
    return this.rate;
  }

  admit(level: LogLevel): boolean {
    if (isLevelAtLeast(level, LogLevel.WARNING)) return true;
    if (this.rate >= 1) return true;
    if (this.rate <= 0) return false;
    return this.random() < this.rate;
  }

  /**
   * Decide for a whole trace.
   * @param failed - spans that ended in error are always kept
   */
  admitTrace(traceId: string, failed = false): boolean {
    if (failed) return true;
    if (this.rate >= 1) return true;
    if (this.rate <= 0) return false;
    return traceBucket(traceId) < this.rate;
  }
}

/**
 * Map a trace id onto [0, 1) using its last 8 hex digits,
 * falling back to FNV-1a for ids that are not hex.
 */
export function traceBucket(traceId: string): number {
  const tail = traceId.slice(-8);
  if (/^[0-9a-f]{8}$/i.test(tail)) {
    return parseInt(tail, 16) / 0x100000000;
  }
  let hash = 0x811c9dc5;
  for (let i = 0; i < traceId.length; i++) {
    hash ^= traceId.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash / 0x100000000;
}
