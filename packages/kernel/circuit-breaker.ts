import { systemClock, type Clock } from './clock';
import { getLogger } from './logger';

/**
* Circuit Breaker
*
* Gate in front of the remote sink. Synchronous: callers ask `allowRequest()`
* before each attempt and report the result with `recordSuccess()` or
* `recordFailure()`. All time arithmetic uses the monotonic clock.
*/

const logger = getLogger('circuit-breaker');

// ============================================================================
// Types and Interfaces
// ============================================================================

export enum CircuitState {
  CLOSED = 'closed',
  OPEN = 'open',
  HALF_OPEN = 'half_open',
}

export interface CircuitBreakerOptions {
  /** Consecutive failures that open the circuit */
  failureThreshold: number;
  /** Time the circuit stays open before one trial request is allowed */
  recoveryTimeoutMs: number;
}

export interface CircuitSnapshot {
  state: CircuitState;
  consecutiveFailures: number;
  /** Monotonic time the circuit last opened; undefined while closed */
  openedAt?: number | undefined;
}

export type CircuitStateListener = (from: CircuitState, to: CircuitState, snapshot: CircuitSnapshot) => void;

const DEFAULT_CIRCUIT_OPTIONS: CircuitBreakerOptions = {
  failureThreshold: 5,
  recoveryTimeoutMs: 30000,
};

// ============================================================================
// Circuit Breaker
// ============================================================================

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private consecutiveFailures = 0;
  private openedAt: number | undefined;
  /** Monotonic time the current uninterrupted open period began */
  private openSince: number | undefined;
  private trialInFlight = false;
  private readonly opts: CircuitBreakerOptions;
  private readonly listeners: CircuitStateListener[] = [];

  constructor(
    private readonly name: string,
    options: Partial<CircuitBreakerOptions> = {},
    private readonly clock: Clock = systemClock
  ) {
    this.opts = { ...DEFAULT_CIRCUIT_OPTIONS, ...options };
    if (!Number.isInteger(this.opts.failureThreshold) || this.opts.failureThreshold < 1) {
      throw new Error('failureThreshold must be an integer >= 1');
    }
    if (!(this.opts.recoveryTimeoutMs > 0)) {
      throw new Error('recoveryTimeoutMs must be > 0');
    }
  }

  /**
  * Ask whether a request may go out now.
  *
  * In OPEN, once the recovery timeout has elapsed this transitions to
  * HALF_OPEN and grants exactly one trial; every other caller is refused
  * until that trial reports back.
  */
  allowRequest(): boolean {
    switch (this.state) {
      case CircuitState.CLOSED:
        return true;
      case CircuitState.OPEN: {
        const elapsed = this.clock.monotonic() - (this.openedAt ?? 0);
        if (elapsed < this.opts.recoveryTimeoutMs) {
          return false;
        }
        this.transition(CircuitState.HALF_OPEN);
        this.trialInFlight = true;
        return true;
      }
      case CircuitState.HALF_OPEN:
        if (this.trialInFlight) {
          return false;
        }
        this.trialInFlight = true;
        return true;
    }
  }

  recordSuccess(): void {
    this.consecutiveFailures = 0;
    this.trialInFlight = false;
    if (this.state !== CircuitState.CLOSED) {
      this.openedAt = undefined;
      this.openSince = undefined;
      this.transition(CircuitState.CLOSED);
    }
  }

  recordFailure(): void {
    this.consecutiveFailures++;

    if (this.state === CircuitState.HALF_OPEN) {
      this.trialInFlight = false;
      this.openedAt = this.clock.monotonic();
      this.transition(CircuitState.OPEN);
      return;
    }

    if (this.state === CircuitState.CLOSED && this.consecutiveFailures >= this.opts.failureThreshold) {
      const now = this.clock.monotonic();
      this.openedAt = now;
      this.openSince = now;
      this.transition(CircuitState.OPEN);
    }
  }

  /**
  * How long the circuit has been continuously unavailable (open or probing).
  * 0 while closed.
  */
  unavailableForMs(): number {
    if (this.openSince === undefined) return 0;
    return this.clock.monotonic() - this.openSince;
  }

  getState(): CircuitState {
    return this.state;
  }

  snapshot(): CircuitSnapshot {
    return {
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      openedAt: this.openedAt,
    };
  }

  /**
  * Subscribe to state transitions
  * @returns Function that removes the listener
  */
  onStateChange(listener: CircuitStateListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }

  private transition(to: CircuitState): void {
    const from = this.state;
    this.state = to;
    const snapshot = this.snapshot();
    logger.info(`Circuit ${this.name} ${from} -> ${to}`, {
      consecutiveFailures: this.consecutiveFailures,
    });
    for (const listener of this.listeners) {
      try {
        listener(from, to, snapshot);
      } catch (err) {
        logger.error(`Circuit ${this.name} state listener failed`, err);
      }
    }
  }
}
