import type { Batch } from '../types';

/**
 * Result of one delivery attempt.
 *
 * `partial` means the backend took the batch but refused some items; the
 * batch is not retried.
 */
export type SinkResult =
  | { outcome: 'success' }
  | { outcome: 'partial'; rejectedItems: number; message?: string | undefined }
  | {
      outcome: 'failure';
      retryable: boolean;
      message: string;
      statusCode?: number | undefined;
      /** Server-requested minimum wait before the next attempt */
      retryAfterMs?: number | undefined;
    };

/**
 * Transport to a telemetry backend.
 *
 * Implementations must not mutate the batch. A rejection with a
 * DeliveryError keeps its `retryable` flag; any other rejection is treated
 * as a retryable failure.
 */
export interface TelemetrySink {
  readonly name: string;
  send(batch: Batch, signal?: AbortSignal): Promise<SinkResult>;
  /** Release connections; called once at shutdown */
  close?(): Promise<void>;
}
