import { systemClock, type Clock } from '@kernel/clock';
import { CircuitState, type CircuitBreaker } from '@kernel/circuit-breaker';
import { getLogger } from '@kernel/logger';
import {
  AbortError,
  DEFAULT_BACKOFF,
  TimeoutError,
  calculateDelay,
  sleep,
  withTimeout,
  type BackoffOptions,
} from '@kernel/retry';
import { DeliveryError, getErrorMessage } from '@errors';

import { createEvent, isSelfReport, SELF_REPORT_TAG } from './events';
import type { LocalSink } from './sinks/local-sink';
import type { SinkResult, TelemetrySink } from './sinks/telemetry-sink';
import {
  EventType,
  LogLevel,
  ServiceComponent,
  type Batch,
  type DeliveryOutcome,
  type TelemetryEvent,
} from './types';

const logger = getLogger('telemetry-delivery');

// ============================================================================
// Types and Interfaces
// ============================================================================

export interface DeliveryOptions {
  /** Retries after the first attempt for transient failures */
  maxRetries: number;
  backoff: BackoffOptions;
  /** Deadline for a single transport call */
  requestTimeoutMs: number;
  /** Short-circuited batches kept for a later attempt */
  retryBufferSize: number;
  /** Open-circuit duration after which batches go to the local sink */
  fallbackAfterMs: number;
}

export interface DeliveryDependencies {
  /** Remote backend; undefined routes everything to the local sink */
  remote?: TelemetrySink | undefined;
  local: LocalSink;
  breaker: CircuitBreaker;
  options?: Partial<DeliveryOptions> | undefined;
  clock?: Clock | undefined;
  /** Jitter source for backoff */
  random?: (() => number) | undefined;
  /** Receives events describing dropped or partially rejected batches */
  onSelfReport?: ((event: TelemetryEvent) => void) | undefined;
}

export interface DeliveryStats {
  delivered: number;
  partial: number;
  failed: number;
  shortCircuited: number;
  fallback: number;
  droppedItems: number;
  retryBuffered: number;
  retryBufferEvicted: number;
  /** Items sent to the local sink because shutdown cut their delivery short */
  interruptedItems: number;
}

const DEFAULT_OPTIONS: DeliveryOptions = {
  maxRetries: 3,
  backoff: DEFAULT_BACKOFF,
  requestTimeoutMs: 10000,
  retryBufferSize: 10,
  fallbackAfterMs: 300000,
};

// ============================================================================
// Pipeline
// ============================================================================

/**
 * Moves sealed batches to the backend.
 *
 * Every attempt is gated by the circuit breaker. Transient failures are
 * retried with jittered exponential backoff; permanent failures and
 * exhausted retries drop the batch and emit a self-report event instead.
 */
export class DeliveryPipeline {
  private readonly retryBuffer: Batch[] = [];
  private readonly shutdownController = new AbortController();
  private readonly options: DeliveryOptions;
  private readonly clock: Clock;
  private readonly random: () => number;
  private readonly counters: DeliveryStats = {
    delivered: 0,
    partial: 0,
    failed: 0,
    shortCircuited: 0,
    fallback: 0,
    droppedItems: 0,
    retryBuffered: 0,
    retryBufferEvicted: 0,
    interruptedItems: 0,
  };

  constructor(private readonly deps: DeliveryDependencies) {
    this.options = { ...DEFAULT_OPTIONS, ...deps.options };
    this.clock = deps.clock ?? systemClock;
    this.random = deps.random ?? Math.random;
  }

  get hasRemote(): boolean {
    return this.deps.remote !== undefined;
  }

  /**
   * Deliver one batch. Never rejects.
   */
  async deliver(batch: Batch): Promise<DeliveryOutcome> {
    const remote = this.deps.remote;
    if (!remote) {
      return this.toLocal(batch, 'no remote sink configured');
    }

    const { breaker } = this.deps;
    let attempts = 0;
    for (;;) {
      if (!breaker.allowRequest()) {
        if (breaker.unavailableForMs() >= this.options.fallbackAfterMs) {
          return this.toLocal(batch, 'backend unavailable past give-up threshold', attempts);
        }
        if (this.bufferForRetry(batch)) {
          this.counters.shortCircuited++;
          return this.outcome('short_circuited', batch, attempts, { error: 'circuit open' });
        }
        return this.outcome('fallback', batch, attempts, { error: 'circuit open during shutdown' });
      }

      attempts++;
      const result = await this.attempt(remote, batch);

      if (result.outcome === 'success') {
        breaker.recordSuccess();
        this.counters.delivered++;
        return this.outcome('success', batch, attempts);
      }

      if (result.outcome === 'partial') {
        breaker.recordSuccess();
        this.counters.partial++;
        this.selfReport(batch, LogLevel.WARNING, 'Telemetry backend rejected part of a batch', {
          rejected_items: result.rejectedItems,
          reason: result.message ?? null,
        });
        return this.outcome('partial', batch, attempts, {
          rejectedItems: result.rejectedItems,
          error: result.message,
        });
      }

      breaker.recordFailure();

      if (!result.retryable || attempts > this.options.maxRetries) {
        return this.drop(batch, attempts, result);
      }

      const delay = Math.min(
        Math.max(calculateDelay(attempts, this.options.backoff, this.random), result.retryAfterMs ?? 0),
        this.options.backoff.maxDelayMs
      );
      logger.warn('Telemetry delivery failed, retrying', {
        batchId: batch.batchId,
        attempt: attempts,
        maxRetries: this.options.maxRetries,
        delayMs: delay,
        statusCode: result.statusCode,
        error: result.message,
      });

      try {
        await sleep(delay, this.shutdownController.signal);
      } catch (err) {
        if (!(err instanceof AbortError)) throw err;
        this.bufferForRetry(batch);
        return this.outcome('fallback', batch, attempts, { error: 'retry interrupted by shutdown' });
      }
    }
  }

  /**
   * Cancel pending backoff sleeps. In-flight transport calls are left to
   * finish or time out.
   */
  abortPendingRetries(): void {
    this.shutdownController.abort();
  }

  /**
   * Remove and return all batches waiting in the retry buffer, oldest first
   */
  takeRetryBuffer(): Batch[] {
    return this.retryBuffer.splice(0, this.retryBuffer.length);
  }

  get retryBufferLength(): number {
    return this.retryBuffer.length;
  }

  /**
   * Write batches straight to the local sink (shutdown leftovers)
   */
  dumpToLocal(batches: readonly Batch[]): number {
    let items = 0;
    for (const batch of batches) {
      this.deps.local.write(batch.items);
      items += batch.items.length;
    }
    return items;
  }

  stats(): DeliveryStats {
    return { ...this.counters };
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async attempt(remote: TelemetrySink, batch: Batch): Promise<SinkResult> {
    try {
      return await withTimeout(signal => remote.send(batch, signal), this.options.requestTimeoutMs);
    } catch (err) {
      if (err instanceof TimeoutError) {
        return { outcome: 'failure', retryable: true, message: err.message };
      }
      if (err instanceof DeliveryError) {
        return { outcome: 'failure', retryable: err.retryable, statusCode: err.statusCode, message: err.message };
      }
      return { outcome: 'failure', retryable: true, message: getErrorMessage(err) };
    }
  }

  private toLocal(batch: Batch, reason: string, attempts = 0): DeliveryOutcome {
    this.deps.local.write(batch.items);
    this.counters.fallback++;
    logger.debug('Batch routed to local sink', { batchId: batch.batchId, reason });
    return this.outcome('fallback', batch, attempts, { error: reason });
  }

  private drop(
    batch: Batch,
    attempts: number,
    result: Extract<SinkResult, { outcome: 'failure' }>
  ): DeliveryOutcome {
    this.counters.failed++;
    this.counters.droppedItems += batch.items.length;
    logger.error('Telemetry batch dropped', undefined, {
      batchId: batch.batchId,
      items: batch.items.length,
      attempts,
      retryable: result.retryable,
      statusCode: result.statusCode,
      error: result.message,
    });
    this.selfReport(batch, LogLevel.ERROR, 'Telemetry delivery failed: batch dropped', {
      attempts,
      retryable: result.retryable,
      status_code: result.statusCode ?? null,
      error: result.message,
    });
    return this.outcome('failure', batch, attempts, { error: result.message });
  }

  /**
   * Hold a batch for a later attempt. Once pending retries are aborted
   * nothing drains the buffer again, so the batch goes to the local sink.
   * @returns false when the batch went to the local sink
   */
  private bufferForRetry(batch: Batch): boolean {
    if (this.shutdownController.signal.aborted) {
      this.deps.local.write(batch.items);
      this.counters.fallback++;
      this.counters.interruptedItems += batch.items.length;
      logger.debug('Batch routed to local sink', { batchId: batch.batchId, reason: 'shutdown in progress' });
      return false;
    }
    this.retryBuffer.push(batch);
    this.counters.retryBuffered++;
    if (this.retryBuffer.length > this.options.retryBufferSize) {
      const evicted = this.retryBuffer.shift();
      this.counters.retryBufferEvicted++;
      if (evicted) {
        this.counters.droppedItems += evicted.items.length;
        logger.warn('Retry buffer full, oldest batch dropped', {
          batchId: evicted.batchId,
          items: evicted.items.length,
        });
      }
    }
    return true;
  }

  private selfReport(
    batch: Batch,
    level: LogLevel,
    message: string,
    details: Record<string, string | number | boolean | null>
  ): void {
    const onSelfReport = this.deps.onSelfReport;
    if (!onSelfReport) return;
    // Reports about batches of reports would feed back forever
    const onlySelfReports = batch.items.every(item => item.kind === 'event' && isSelfReport(item.event));
    if (onlySelfReports) return;

    const event = createEvent({
      level,
      component: ServiceComponent.TELEMETRY,
      eventType: EventType.EXCEPTION,
      message,
      data: { batch_id: batch.batchId, item_count: batch.items.length, ...details },
      tags: [SELF_REPORT_TAG, 'delivery'],
    }, this.clock);

    try {
      onSelfReport(event);
    } catch (err) {
      logger.error('Self-report handler failed', err);
    }
  }

  private outcome(
    status: DeliveryOutcome['status'],
    batch: Batch,
    attempts: number,
    extra: { error?: string | undefined; rejectedItems?: number | undefined } = {}
  ): DeliveryOutcome {
    return {
      status,
      batchId: batch.batchId,
      itemCount: batch.items.length,
      attempts,
      ...extra,
    };
  }
}
