import { getLogger } from '@kernel/logger';

import type { Batch, BatchItem } from '../types';
import { itemToWire, type WireEnvelope, type WireEvent } from '../wire';
import type { SinkResult, TelemetrySink } from './telemetry-sink';

const logger = getLogger('telemetry-local');

export type LocalSinkMode = 'console' | 'memory';

export interface LocalSinkOptions {
  mode: LocalSinkMode;
  /** Ring buffer capacity in records */
  capacity: number;
  envelope?: WireEnvelope | undefined;
}

function echo(record: WireEvent): void {
  const metadata = {
    component: record.component,
    eventType: record.event_type,
    eventId: record.event_id,
    data: record.data,
    tags: record.tags,
  };
  switch (record.level) {
    case 'debug':
      logger.debug(record.message, metadata);
      break;
    case 'warning':
      logger.warn(record.message, metadata);
      break;
    case 'error':
      logger.error(record.message, undefined, metadata);
      break;
    case 'critical':
      logger.fatal(record.message, undefined, metadata);
      break;
    default:
      logger.info(record.message, metadata);
  }
}

/**
 * Last-resort destination used when no backend is configured or the backend
 * has been unreachable past the give-up threshold.
 *
 * Keeps the most recent records in a ring buffer and, in console mode, also
 * writes each one as a structured log line. Never fails.
 */
export class LocalSink implements TelemetrySink {
  readonly name = 'local';
  private readonly buffer: WireEvent[] = [];
  private evicted = 0;

  constructor(private readonly options: LocalSinkOptions) {
    if (!Number.isInteger(options.capacity) || options.capacity < 1) {
      throw new Error('LocalSink capacity must be an integer >= 1');
    }
  }

  async send(batch: Batch): Promise<SinkResult> {
    this.write(batch.items);
    return { outcome: 'success' };
  }

  /**
   * Synchronous variant used at shutdown and for post-shutdown producers
   */
  write(items: readonly BatchItem[]): void {
    for (const item of items) {
      let record: WireEvent;
      try {
        record = itemToWire(item, this.options.envelope);
      } catch (err) {
        logger.error('Failed to encode telemetry item for local sink', err, { kind: item.kind });
        continue;
      }

      this.buffer.push(record);
      if (this.buffer.length > this.options.capacity) {
        this.buffer.shift();
        this.evicted++;
      }

      if (this.options.mode === 'console') {
        echo(record);
      }
    }
  }

  /** Buffered records, oldest first */
  records(): readonly WireEvent[] {
    return [...this.buffer];
  }

  get size(): number {
    return this.buffer.length;
  }

  /** Records pushed out of the ring buffer so far */
  get evictedCount(): number {
    return this.evicted;
  }

  clear(): void {
    this.buffer.length = 0;
  }
}
