import { randomBytes, randomUUID } from 'crypto';
import { performance } from 'perf_hooks';

/**
* Clock & Identifier Source
*
* Wall-clock time is used for event timestamps; monotonic time for every
* duration and timeout so that clock adjustments never produce negative spans
* or stuck circuits.
*/

// ============================================================================
// Clock
// ============================================================================

export interface Clock {
  /** Wall-clock time in epoch milliseconds */
  now(): number;
  /** Monotonic time in milliseconds, only meaningful as a difference */
  monotonic(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  monotonic: () => performance.now(),
};

// ============================================================================
// Identifiers
// ============================================================================

/** 128-bit trace identifier, 32 lowercase hex characters */
export function newTraceId(): string {
  return randomBytes(16).toString('hex');
}

/** 64-bit span identifier, 16 lowercase hex characters */
export function newSpanId(): string {
  return randomBytes(8).toString('hex');
}

export function newEventId(): string {
  return randomUUID();
}
