import { randomUUID } from 'crypto';

import { systemClock, type Clock } from '@kernel/clock';
import { getLogger } from '@kernel/logger';
import { Semaphore } from '@kernel/semaphore';

import type { DeliveryPipeline } from './delivery';
import type { Batch, BatchItem, DeliveryOutcome } from './types';

const logger = getLogger('telemetry-batching');

// ============================================================================
// Types and Interfaces
// ============================================================================

export interface BatchEngineOptions {
  /** Items per batch; reaching it seals the batch immediately */
  batchSize: number;
  /** Time since the last flush after which the timer seals a non-empty batch */
  flushIntervalMs: number;
  /** Bound on unsent items (open batch plus batches waiting for a slot) */
  maxQueueSize: number;
  /** Deliveries allowed in flight at once */
  maxConcurrentDeliveries: number;
}

export interface BatchEngineStats {
  pendingItems: number;
  readyBatches: number;
  inFlight: number;
  droppedItems: number;
  /** Batches sealed so far */
  flushes: number;
  /** Batches whose delivery finished, whatever the outcome */
  completedBatches: number;
}

export interface ShutdownReport {
  /** Every sealed batch finished delivery within the drain timeout */
  drained: boolean;
  /** Items handed to the local sink because they could not be delivered */
  fallbackItems: number;
}

interface QueuedBatch {
  batch: Batch;
  done: Promise<DeliveryOutcome>;
  resolve: (outcome: DeliveryOutcome) => void;
}

// ============================================================================
// Engine
// ============================================================================

/**
 * Accumulates items from any number of producers and hands sealed batches
 * to the delivery pipeline.
 *
 * `enqueue` is synchronous and O(1) amortized; it never waits on delivery.
 * A batch is sealed when it reaches `batchSize`, when a timer tick finds
 * `flushIntervalMs` passed since the last flush, or on explicit `flush()`.
 * Item order inside a batch is enqueue order; batches may complete out of
 * order.
 */
export class BatchEngine {
  private current: BatchItem[] = [];
  private readonly ready: QueuedBatch[] = [];
  private readonly inFlight = new Set<Promise<DeliveryOutcome>>();
  private readonly slots: Semaphore;
  private readonly options: BatchEngineOptions;
  private readonly clock: Clock;
  private timer: ReturnType<typeof setInterval> | undefined;
  private lastFlushAt: number;
  private readyItems = 0;
  private droppedItems = 0;
  private flushes = 0;
  private completedBatches = 0;
  private closed = false;
  private shutdownPromise: Promise<ShutdownReport> | undefined;

  constructor(
    private readonly pipeline: DeliveryPipeline,
    options: BatchEngineOptions,
    clock: Clock = systemClock
  ) {
    if (!Number.isInteger(options.batchSize) || options.batchSize < 1) {
      throw new Error('batchSize must be an integer >= 1');
    }
    if (!(options.flushIntervalMs > 0)) {
      throw new Error('flushIntervalMs must be > 0');
    }
    if (options.maxQueueSize < options.batchSize) {
      throw new Error('maxQueueSize must be >= batchSize');
    }
    this.options = options;
    this.clock = clock;
    this.slots = new Semaphore(options.maxConcurrentDeliveries);
    this.lastFlushAt = clock.monotonic();
  }

  /**
   * Start the periodic flush timer. The timer does not keep the process alive.
   */
  start(): void {
    if (this.timer || this.closed) return;
    this.timer = setInterval(() => this.tick(), this.options.flushIntervalMs);
    this.timer.unref();
  }

  /**
   * Add one item. After shutdown, items go straight to the local sink.
   */
  enqueue(item: BatchItem): void {
    if (this.closed) {
      this.pipeline.dumpToLocal([this.makeBatch([item])]);
      return;
    }

    while (this.pendingItems >= this.options.maxQueueSize) {
      this.dropOldest();
    }

    this.current.push(item);

    if (this.current.length >= this.options.batchSize) {
      this.seal();
      this.drain();
    }
  }

  /**
   * Timer callback: requeue short-circuited batches, seal the open batch
   * when `flushIntervalMs` has passed since the last flush, start deliveries.
   */
  tick(): void {
    this.requeueRetries();

    if (
      this.current.length > 0 &&
      this.clock.monotonic() - this.lastFlushAt >= this.options.flushIntervalMs
    ) {
      this.seal();
    }
    this.drain();
  }

  /**
   * Seal the open batch and wait for every delivery started so far.
   * Resolves with their outcomes; never rejects.
   */
  async flush(): Promise<DeliveryOutcome[]> {
    this.seal();
    this.drain();
    const waiting = [...this.ready.map(entry => entry.done), ...this.inFlight];
    return Promise.all(waiting);
  }

  /**
   * Stop accepting work and drain.
   *
   * Order: stop the timer, cancel pending backoff sleeps, seal and start a
   * final attempt for every batch, wait up to `drainTimeoutMs` for deliveries
   * in flight, then write whatever is left to the local sink. Idempotent.
   */
  shutdown(drainTimeoutMs: number): Promise<ShutdownReport> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.runShutdown(drainTimeoutMs);
    }
    return this.shutdownPromise;
  }

  stats(): BatchEngineStats {
    return {
      pendingItems: this.pendingItems,
      readyBatches: this.ready.length,
      inFlight: this.inFlight.size,
      droppedItems: this.droppedItems,
      flushes: this.flushes,
      completedBatches: this.completedBatches,
    };
  }

  get isClosed(): boolean {
    return this.closed;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private get pendingItems(): number {
    return this.current.length + this.readyItems;
  }

  private async runShutdown(drainTimeoutMs: number): Promise<ShutdownReport> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    const interruptedBefore = this.pipeline.stats().interruptedItems;
    this.pipeline.abortPendingRetries();

    this.requeueRetries();
    this.seal();
    this.closed = true;
    this.drain();

    const waiting = [...this.ready.map(entry => entry.done), ...this.inFlight];
    const drained = await waitAtMost(Promise.all(waiting), drainTimeoutMs);

    const leftovers = this.ready.splice(0, this.ready.length);
    this.readyItems = 0;
    // batches that failed their final attempt came back to the retry buffer
    const retryLeftovers = this.pipeline.takeRetryBuffer();
    const dumped = this.pipeline.dumpToLocal([
      ...leftovers.map(entry => entry.batch),
      ...retryLeftovers,
    ]);
    const fallbackItems = dumped + this.pipeline.stats().interruptedItems - interruptedBefore;
    for (const entry of leftovers) {
      entry.resolve({
        status: 'fallback',
        batchId: entry.batch.batchId,
        itemCount: entry.batch.items.length,
        attempts: 0,
        error: 'undelivered at shutdown',
      });
    }

    if (fallbackItems > 0 || !drained) {
      logger.warn('Telemetry shutdown left undelivered items', {
        fallbackItems,
        stillInFlight: this.inFlight.size,
        drainTimeoutMs,
      });
    }

    return { drained: drained && fallbackItems === 0, fallbackItems };
  }

  private requeueRetries(): void {
    const retries = this.pipeline.takeRetryBuffer();
    if (retries.length === 0) return;
    this.ready.unshift(...retries.map(batch => this.queued(batch)));
    this.readyItems += retries.reduce((sum, batch) => sum + batch.items.length, 0);
    while (this.pendingItems > this.options.maxQueueSize) {
      this.dropOldest();
    }
  }

  private seal(): void {
    if (this.current.length === 0) return;
    const batch = this.makeBatch(this.current);
    this.current = [];
    this.lastFlushAt = this.clock.monotonic();
    this.flushes++;
    this.ready.push(this.queued(batch));
    this.readyItems += batch.items.length;
  }

  private drain(): void {
    while (this.ready.length > 0 && this.slots.tryAcquire()) {
      const entry = this.ready.shift();
      if (!entry) {
        this.slots.release();
        break;
      }
      this.readyItems -= entry.batch.items.length;
      this.startDelivery(entry);
    }
  }

  private startDelivery(entry: QueuedBatch): void {
    const delivery: Promise<DeliveryOutcome> = this.pipeline
      .deliver(entry.batch)
      .catch((err: unknown) => {
        logger.error('Delivery pipeline rejected unexpectedly', err, { batchId: entry.batch.batchId });
        const failed: DeliveryOutcome = {
          status: 'failure',
          batchId: entry.batch.batchId,
          itemCount: entry.batch.items.length,
          attempts: 0,
          error: err instanceof Error ? err.message : String(err),
        };
        return failed;
      })
      .then(outcome => {
        this.inFlight.delete(delivery);
        this.slots.release();
        this.completedBatches++;
        entry.resolve(outcome);
        this.drain();
        return outcome;
      });
    this.inFlight.add(delivery);
  }

  /**
   * Drop the oldest unsent item: the head of the oldest waiting batch, or of
   * the open batch when nothing is waiting.
   */
  private dropOldest(): void {
    const head = this.ready[0];
    if (head) {
      const remaining = head.batch.items.slice(1);
      this.readyItems--;
      if (remaining.length === 0) {
        this.ready.shift();
        head.resolve({
          status: 'failure',
          batchId: head.batch.batchId,
          itemCount: 0,
          attempts: 0,
          error: 'dropped on queue overflow',
        });
      } else {
        head.batch = { ...head.batch, items: Object.freeze(remaining) };
      }
    } else if (this.current.length > 0) {
      this.current.shift();
    } else {
      return;
    }

    this.droppedItems++;
    if (this.droppedItems === 1 || this.droppedItems % 100 === 0) {
      logger.warn('Telemetry queue full, dropping oldest items', {
        droppedItems: this.droppedItems,
        maxQueueSize: this.options.maxQueueSize,
      });
    }
  }

  private makeBatch(items: readonly BatchItem[]): Batch {
    return Object.freeze({
      batchId: randomUUID(),
      items: Object.freeze([...items]),
      createdAt: this.clock.now(),
    });
  }

  private queued(batch: Batch): QueuedBatch {
    let resolve: (outcome: DeliveryOutcome) => void = () => undefined;
    const done = new Promise<DeliveryOutcome>(r => { resolve = r; });
    return { batch, done, resolve };
  }
}

/**
 * Wait for `work` but give up after `ms`
 * @returns true when `work` settled in time
 */
async function waitAtMost(work: Promise<unknown>, ms: number): Promise<boolean> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<boolean>(resolve => {
    timeoutId = setTimeout(() => resolve(false), ms);
    timeoutId.unref();
  });
  try {
    return await Promise.race([work.then(() => true), timeout]);
  } finally {
    clearTimeout(timeoutId);
  }
}
