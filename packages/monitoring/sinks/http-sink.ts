import fetch from 'node-fetch';

import { getErrorMessage } from '@errors';
import { getLogger } from '@kernel/logger';
import { isRetryableStatus, parseRetryAfter } from '@kernel/retry';

import type { Batch } from '../types';
import { itemToWire, type WireEnvelope } from '../wire';
import type { SinkResult, TelemetrySink } from './telemetry-sink';

const logger = getLogger('telemetry-http');

export interface HttpSinkOptions {
  /** Base URL; batches are posted to `${endpoint}/events` */
  endpoint: string;
  apiKey: string;
  projectId?: string | undefined;
  envelope?: WireEnvelope | undefined;
}

/**
 * Reference transport: POSTs each batch as a JSON array of wire records.
 *
 * 2xx is success, except 207 or a body reporting `rejected > 0`, which is a
 * partial success. 408, 429 and 5xx are retryable; any other status is a
 * permanent failure.
 */
export class HttpSink implements TelemetrySink {
  readonly name = 'http';
  private readonly url: string;
  private readonly headers: Record<string, string>;

  constructor(private readonly options: HttpSinkOptions) {
    this.url = `${options.endpoint.replace(/\/+$/, '')}/events`;
    this.headers = {
      'Authorization': `Bearer ${options.apiKey}`,
      'Content-Type': 'application/json',
      'Accept': 'application/json',
    };
    if (options.projectId) this.headers['X-Project-Id'] = options.projectId;
    if (options.envelope?.service) this.headers['X-Service-Name'] = options.envelope.service;
    if (options.envelope?.environment) this.headers['X-Environment'] = options.envelope.environment;
  }

  async send(batch: Batch, signal?: AbortSignal): Promise<SinkResult> {
    const body = JSON.stringify(batch.items.map(item => itemToWire(item, this.options.envelope)));

    let response: Awaited<ReturnType<typeof fetch>>;
    try {
      response = await fetch(this.url, {
        method: 'POST',
        headers: this.headers,
        body,
        signal,
      });
    } catch (err) {
      return { outcome: 'failure', retryable: true, message: `Transport error: ${getErrorMessage(err)}` };
    }

    if (response.ok) {
      const rejected = await readRejectedCount(response.status, () => response.text());
      if (rejected > 0 || response.status === 207) {
        logger.warn('Backend rejected part of a batch', { batchId: batch.batchId, rejected });
        return {
          outcome: 'partial',
          rejectedItems: rejected,
          message: `${rejected} of ${batch.items.length} items rejected`,
        };
      }
      return { outcome: 'success' };
    }

    const retryable = isRetryableStatus(response.status);
    const retryAfterMs = parseRetryAfter(response.headers.get('retry-after'));
    // Drain the body so the socket is released
    await response.text().catch(() => '');

    return {
      outcome: 'failure',
      retryable,
      statusCode: response.status,
      message: `Backend responded ${response.status} ${response.statusText}`,
      ...(retryAfterMs > 0 && { retryAfterMs }),
    };
  }
}

async function readRejectedCount(status: number, readBody: () => Promise<string>): Promise<number> {
  if (status === 204) return 0;
  let text: string;
  try {
    text = await readBody();
  } catch {
    return 0;
  }
  if (!text) return 0;
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    // non-JSON acknowledgement
    return 0;
  }
  if (typeof parsed === 'object' && parsed !== null && 'rejected' in parsed) {
    const rejected = parsed.rejected;
    return typeof rejected === 'number' && Number.isFinite(rejected) ? Math.max(0, Math.floor(rejected)) : 0;
  }
  return 0;
}
