import { beforeEach, describe, expect, it, vi } from 'vitest';
import fetch, { Response } from 'node-fetch';

import { HttpSink } from '../sinks/http-sink';
import { createTestBatch, eventItem } from '../../../test/factories';

vi.mock('node-fetch', async importOriginal => {
  const actual = await importOriginal<typeof import('node-fetch')>();
  return { ...actual, default: vi.fn() };
});

const fetchMock = vi.mocked(fetch);

function sink(): HttpSink {
  return new HttpSink({
    endpoint: 'https://telemetry.test/api/',
    apiKey: 'test-secret',
    projectId: 'proj-1',
    envelope: { service: 'checkout', environment: 'test' },
  });
}

describe('HttpSink', () => {
  beforeEach(() => {
    fetchMock.mockReset();
  });

  it('posts the batch as a JSON array of wire records', async () => {
    fetchMock.mockResolvedValue(new Response('', { status: 200 }));
    const batch = createTestBatch([eventItem({ message: 'hello' }), eventItem({ message: 'world' })]);

    const result = await sink().send(batch);

    expect(result).toEqual({ outcome: 'success' });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const call = fetchMock.mock.calls[0];
    if (!call) throw new Error('fetch was not called');
    const [url, init] = call;
    expect(url).toBe('https://telemetry.test/api/events');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({
      'Authorization': 'Bearer test-secret',
      'Content-Type': 'application/json',
      'Accept': 'application/json',
      'X-Project-Id': 'proj-1',
      'X-Service-Name': 'checkout',
      'X-Environment': 'test',
    });
    const body: unknown = JSON.parse(String(init?.body));
    expect(body).toEqual([
      expect.objectContaining({ message: 'hello', service: 'checkout', level: 'info' }),
      expect.objectContaining({ message: 'world', service: 'checkout', level: 'info' }),
    ]);
  });

  it('reports partial acceptance from the response body', async () => {
    fetchMock.mockResolvedValue(new Response(JSON.stringify({ accepted: 1, rejected: 1 }), { status: 200 }));

    const result = await sink().send(createTestBatch([eventItem(), eventItem()]));

    expect(result).toEqual({ outcome: 'partial', rejectedItems: 1, message: '1 of 2 items rejected' });
  });

  it('treats 207 as partial even without a count', async () => {
    fetchMock.mockResolvedValue(new Response('not json', { status: 207 }));

    const result = await sink().send(createTestBatch());

    expect(result).toEqual({ outcome: 'partial', rejectedItems: 0, message: '0 of 1 items rejected' });
  });

  it('marks server errors retryable and honours Retry-After', async () => {
    fetchMock.mockResolvedValue(new Response('busy', {
      status: 429,
      statusText: 'Too Many Requests',
      headers: { 'Retry-After': '2' },
    }));

    const result = await sink().send(createTestBatch());

    expect(result).toEqual({
      outcome: 'failure',
      retryable: true,
      statusCode: 429,
      message: 'Backend responded 429 Too Many Requests',
      retryAfterMs: 2000,
    });
  });

  it('marks client errors permanent', async () => {
    fetchMock.mockResolvedValue(new Response('', { status: 401, statusText: 'Unauthorized' }));

    const result = await sink().send(createTestBatch());

    expect(result).toEqual({
      outcome: 'failure',
      retryable: false,
      statusCode: 401,
      message: 'Backend responded 401 Unauthorized',
    });
  });

  it('turns transport errors into retryable failures', async () => {
    fetchMock.mockRejectedValue(new Error('getaddrinfo ENOTFOUND telemetry.test'));

    const result = await sink().send(createTestBatch());

    expect(result).toEqual({
      outcome: 'failure',
      retryable: true,
      message: 'Transport error: getaddrinfo ENOTFOUND telemetry.test',
    });
  });
});
