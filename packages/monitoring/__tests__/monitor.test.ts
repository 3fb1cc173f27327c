import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import type { TelemetryConfigInput } from '@config';
import { executionContextStorage } from '@kernel/execution-context';

import { initMonitor } from '../init';
import type { Monitor, MonitorDependencies } from '../monitor';
import type { HealthStatus, MetricSample, Span, TelemetryEvent } from '../types';
import { ManualClock } from '../../../test/utils/fake-clock';
import { FakeSink, permanentFailure } from '../../../test/utils/fake-sink';

const BASE_CONFIG = {
  serviceName: 'checkout',
  environment: 'test',
  enableMetadata: false,
  localSinkMode: 'memory',
  batchSize: 50,
} satisfies TelemetryConfigInput;

function events(sink: FakeSink): TelemetryEvent[] {
  return sink.batches.flatMap(batch =>
    batch.items.flatMap(item => (item.kind === 'event' ? [item.event] : []))
  );
}

function metrics(sink: FakeSink): MetricSample[] {
  return sink.batches.flatMap(batch =>
    batch.items.flatMap(item => (item.kind === 'metric' ? [item.metric] : []))
  );
}

function healthItems(sink: FakeSink): HealthStatus[] {
  return sink.batches.flatMap(batch =>
    batch.items.flatMap(item => (item.kind === 'health' ? [item.health] : []))
  );
}

describe('Monitor', () => {
  let clock: ManualClock;
  let sink: FakeSink;
  let monitor: Monitor;

  function start(config: Partial<TelemetryConfigInput> = {}, deps: MonitorDependencies = {}): Monitor {
    monitor = initMonitor({ ...BASE_CONFIG, ...config }, { clock, remoteSink: sink, startTimer: false, ...deps });
    return monitor;
  }

  beforeEach(() => {
    clock = new ManualClock();
    sink = new FakeSink();
  });

  afterEach(async () => {
    await monitor.shutdown();
  });

  describe('without a remote backend', () => {
    it('keeps every event in the local sink and flushes cleanly', async () => {
      start({ batchSize: 10 }, { remoteSink: undefined });

      for (let i = 0; i < 100; i++) {
        monitor.info(`event ${i}`);
      }

      await expect(monitor.flush()).resolves.toBe(true);
      expect(monitor.localSink.size).toBe(100);
      expect(monitor.localSink.records()[0]).toMatchObject({
        message: 'event 0',
        level: 'info',
        service: 'checkout',
        environment: 'test',
      });
      expect(monitor.getTelemetryStatus().remoteConfigured).toBe(false);
    });
  });

  describe('events', () => {
    it('sends events with default tags and redacted data', async () => {
      start({ defaultTags: ['team-payments'] });

      monitor.warning('Card declined', 'api_gateway', 'request', {
        user: 'user-42',
        password: 'test-secret',
        card: { number_last4: '4242', api_key: 'test-secret' },
      }, ['billing']);
      await monitor.flush();

      const [event] = events(sink);
      expect(event).toMatchObject({
        level: 'WARNING',
        component: 'api_gateway',
        eventType: 'request',
        message: 'Card declined',
        tags: ['team-payments', 'billing'],
        data: {
          user: 'user-42',
          password: '***REDACTED***',
          card: { number_last4: '4242', api_key: '***REDACTED***' },
        },
      });
      expect(event?.timestamp).toBe(clock.now());
    });

    it('drops events below the minimum level', async () => {
      start({ minLogLevel: 'WARNING' });

      monitor.debug('noise');
      monitor.info('chatter');
      monitor.error('broken');
      await monitor.flush();

      expect(events(sink).map(event => event.message)).toEqual(['broken']);
      expect(monitor.getTelemetryStatus().filteredOut).toBe(2);
    });

    it('applies component and event type filters from the log config', async () => {
      start();

      const updated = monitor.updateLogConfig({ excludeComponents: ['database'], includeEventTypes: ['request', 'system'] });
      monitor.info('query', 'database', 'request');
      monitor.info('login', 'api_gateway', 'authentication');
      monitor.info('ping', 'api_gateway', 'request');
      await monitor.flush();

      expect(updated.serviceName).toBe('checkout');
      expect(monitor.getLogConfig()).toBe(updated);
      expect(events(sink).map(event => event.message)).toEqual(['ping']);
    });

    it('samples low-severity events but keeps warnings', async () => {
      start({ sampleRate: 0.5 }, { random: () => 0.9 });

      monitor.info('sampled away');
      monitor.warning('kept');
      await monitor.flush();

      expect(events(sink).map(event => event.message)).toEqual(['kept']);
      expect(monitor.getTelemetryStatus().sampledOut).toBe(1);
    });

    it('flushes immediately on critical events', () => {
      start();

      monitor.info('before');
      monitor.critical('database unreachable', 'database');

      expect(sink.calls).toBe(1);
      expect(sink.messages()).toEqual(['before', 'database unreachable']);
    });

    it('reports api calls with a duration metric', async () => {
      start();

      monitor.recordApiCall({
        apiName: 'payments',
        statusCode: 503,
        durationMs: 120,
        component: 'api_gateway',
        request: { path: '/charge' },
        response: { body: 'unavailable' },
      });
      await monitor.flush();

      expect(events(sink)[0]).toMatchObject({
        level: 'ERROR',
        eventType: 'request',
        message: 'API call to payments failed with status 503',
        data: { api_name: 'payments', status_code: 503, duration_ms: 120, success: false, request: { path: '/charge' } },
      });
      expect(events(sink)[0]?.data['response']).toBeUndefined();
      expect(metrics(sink)).toEqual([
        expect.objectContaining({
          name: 'api_call_duration_ms',
          value: 120,
          unit: 'ms',
          tags: { api_name: 'payments', status_code: '503', success: 'false', component: 'api_gateway' },
        }),
      ]);
    });

    it('reports performance and validation results', async () => {
      start();

      monitor.recordPerformance({ operation: 'render', durationMs: 12.5, component: 'agent_core' });
      monitor.recordValidation({ modelName: 'Order', success: false, error: 'missing id' });
      await monitor.flush();

      expect(events(sink).map(event => [event.message, event.eventType, event.level])).toEqual([
        ['Performance: render took 12.50ms', 'metric', 'INFO'],
        ['Model validation failed: Order', 'validation', 'ERROR'],
      ]);
      expect(events(sink)[1]?.data).toEqual({ model_name: 'Order', success: false, error: 'missing id' });
      expect(metrics(sink).map(metric => metric.name)).toEqual(['operation_duration_ms']);
    });
  });

  describe('metrics', () => {
    it('registers unknown metrics as gauges', async () => {
      start();
      monitor.registerMetric({ name: 'jobs_total', description: 'Jobs run', unit: 'jobs', metricType: 'counter' });

      monitor.recordMetric('queue_depth', 7, { queue: 'orders', shard: 3 }, 'items');
      monitor.recordMetric('jobs_total', 1);
      monitor.recordMetric('queue_depth', Number.NaN);
      await monitor.flush();

      expect(monitor.getMetrics({ metricType: 'gauge' })).toEqual([
        { name: 'queue_depth', description: 'Auto-registered metric: queue_depth', unit: 'items', metricType: 'gauge' },
      ]);
      expect(monitor.getMetrics({ namePrefix: 'jobs' }).map(metric => metric.name)).toEqual(['jobs_total']);
      expect(metrics(sink)).toEqual([
        { name: 'queue_depth', value: 7, unit: 'items', tags: { queue: 'orders', shard: '3' }, timestamp: clock.now() },
        { name: 'jobs_total', value: 1, unit: 'jobs', tags: {}, timestamp: clock.now() },
      ]);
    });

    it('raises alerts from recorded values', async () => {
      start();
      monitor.createAlert({
        alertId: 'cpu-high',
        name: 'CPU high',
        component: 'infrastructure',
        condition: 'cpu_usage_percent > 90',
        severity: 'ERROR',
        notificationChannels: ['pager'],
        tags: ['capacity'],
      });

      monitor.recordMetric('cpu_usage_percent', 95);
      await monitor.flush();

      const [instance] = monitor.getAlertInstances({ alertId: 'cpu-high' });
      expect(instance?.status).toBe('active');
      expect(events(sink)).toEqual([
        expect.objectContaining({
          level: 'ERROR',
          component: 'infrastructure',
          eventType: 'alert',
          message: 'CPU high: cpu_usage_percent > 90 (value 95)',
          tags: ['alert', 'capacity'],
          data: {
            alert_id: 'cpu-high',
            alert_name: 'CPU high',
            instance_id: instance?.instanceId,
            condition: 'cpu_usage_percent > 90',
            value: 95,
            notification_channels: ['pager'],
          },
        }),
      ]);
    });
  });

  describe('health', () => {
    it('stores snapshots and sends them with resource metrics', async () => {
      start();

      monitor.recordHealthStatus({
        serviceId: 'db-1',
        status: 'degraded',
        checks: { replica: false },
        resourceUsage: {
          cpuPercent: 35,
          memoryPercent: 60,
          memoryRss: 2048,
          heapUsed: 1024,
          heapTotal: 1536,
          timestamp: clock.now(),
        },
      });
      await monitor.flush();

      expect(monitor.getHealthStatus('db-1')).toMatchObject({ status: 'degraded', checks: { replica: false }, timestamp: clock.now() });
      expect(monitor.getHealthStatus()).toHaveLength(1);
      expect(monitor.getHealthStatus('unknown')).toBeUndefined();
      expect(healthItems(sink).map(health => health.serviceId)).toEqual(['db-1']);
      expect(metrics(sink).map(metric => [metric.name, metric.value, metric.tags['service_id']])).toEqual([
        ['cpu_usage_percent', 35, 'db-1'],
        ['memory_usage_percent', 60, 'db-1'],
        ['memory_rss_bytes', 2048, 'db-1'],
      ]);
    });

    it('captures the state of this process', () => {
      start();

      const status = monitor.captureHealthStatus({ version: '1.2.3' });

      expect(status).toMatchObject({ serviceId: 'checkout', serviceName: 'checkout', status: 'healthy', version: '1.2.3' });
      expect(status.uptimeSeconds).toBeGreaterThanOrEqual(0);
      expect(status.resourceUsage?.memoryRss).toBeGreaterThan(0);
      expect(monitor.getHealthStatus('checkout')).toBe(status);
    });
  });

  describe('spans', () => {
    it('links events to the active span and emits the span when it ends', async () => {
      start();

      const headers = monitor.withSpan('load order', 'database', span => {
        monitor.info('inside', 'database');
        clock.advance(40);
        span.attributes['rows'] = 3;
        return monitor.injectTraceHeaders();
      });
      await monitor.flush();

      const [inside, performance, spanEvent] = events(sink);
      expect(performance).toMatchObject({
        message: 'Performance: load order took 40.00ms',
        eventType: 'metric',
        data: { operation: 'load order', duration_ms: 40, success: true },
      });
      expect(inside?.traceId).toBe(spanEvent?.traceId);
      expect(inside?.spanId).toBe(spanEvent?.spanId);
      expect(headers).toEqual({ 'x-trace-id': spanEvent?.traceId, 'x-parent-span-id': spanEvent?.spanId });
      expect(spanEvent).toMatchObject({
        level: 'INFO',
        eventType: 'span',
        message: 'Span load order ok',
        tags: ['span'],
        data: {
          name: 'load order',
          parent_span_id: null,
          duration_ms: 40,
          status: 'ok',
          attributes: { rows: 3 },
          error_message: null,
        },
      });
    });

    it('records a failed operation when the span function throws', async () => {
      start();

      expect(() => monitor.withSpan('charge card', 'api_gateway', () => {
        clock.advance(15);
        throw new TypeError('card rejected');
      })).toThrow('card rejected');
      await monitor.flush();

      expect(events(sink).find(event => event.eventType === 'metric')).toMatchObject({
        message: 'Performance: charge card took 15.00ms',
        data: {
          operation: 'charge card',
          duration_ms: 15,
          success: false,
          error: 'card rejected',
          error_type: 'TypeError',
        },
      });
      expect(metrics(sink)).toEqual([
        expect.objectContaining({
          name: 'operation_duration_ms',
          value: 15,
          tags: { operation: 'charge card', success: 'false', component: 'api_gateway' },
        }),
      ]);
    });

    it('times async operations whether they resolve or reject', async () => {
      start();

      await monitor.withSpan('fetch rates', 'api_gateway', async () => {
        clock.advance(30);
        return 1.1;
      });
      await expect(monitor.withSpan('fetch fees', 'api_gateway', async () => {
        clock.advance(5);
        throw new Error('upstream down');
      })).rejects.toThrow('upstream down');
      await monitor.flush();

      expect(metrics(sink).map(metric => [metric.tags['operation'], metric.value, metric.tags['success']])).toEqual([
        ['fetch rates', 30, 'true'],
        ['fetch fees', 5, 'false'],
      ]);
    });

    it('links later events of a task to a span it started at top level', async () => {
      start();

      const span = await executionContextStorage.exit(() => new Promise<Span>(resolve => {
        setImmediate(() => {
          const job = monitor.startSpan('nightly job', 'system');
          const step = monitor.startSpan('step', 'system');
          monitor.info('inside step');
          monitor.endSpan(step);
          monitor.endSpan(job);
          resolve(step);
        });
      }));
      await monitor.flush();

      const [inside, stepEvent, jobEvent] = events(sink);
      expect(inside).toMatchObject({ message: 'inside step', traceId: span.traceId, spanId: span.spanId });
      expect(stepEvent?.data['parent_span_id']).toBe(jobEvent?.spanId);
      expect(jobEvent?.traceId).toBe(span.traceId);
    });

    it('continues a trace taken from incoming headers', async () => {
      start();
      const parent = monitor.extractTraceParent({ 'x-trace-id': 'trace-abc', 'x-parent-span-id': 'span-def' });

      const span = monitor.startSpan('handle', 'api_gateway', { parent });
      expect(monitor.endSpan(span, { error: new Error('boom') })).toBe(true);
      expect(monitor.endSpan(span)).toBe(false);
      await monitor.flush();

      expect(events(sink)).toEqual([
        expect.objectContaining({
          level: 'ERROR',
          traceId: 'trace-abc',
          message: 'Span handle error',
          data: expect.objectContaining({ parent_span_id: 'span-def', error_message: 'boom' }),
        }),
      ]);
    });
  });

  describe('delivery health', () => {
    it('reports dropped batches as events of its own', async () => {
      start();
      sink.fallback = permanentFailure(401);

      monitor.info('lost');
      await expect(monitor.flush()).resolves.toBe(false);

      sink.fallback = { outcome: 'success' };
      await expect(monitor.flush()).resolves.toBe(true);

      const report = events(sink).at(-1);
      expect(report).toMatchObject({
        level: 'ERROR',
        component: 'telemetry',
        message: 'Telemetry delivery failed: batch dropped',
        tags: ['telemetry.self', 'delivery'],
      });
      expect(monitor.getTelemetryStatus().delivery).toMatchObject({ failed: 1, delivered: 1, droppedItems: 1 });
    });
  });

  describe('shutdown', () => {
    it('drains, closes the transport and routes later events locally', async () => {
      start();
      monitor.info('last words');

      const first = monitor.shutdown();
      expect(monitor.shutdown()).toBe(first);
      await expect(first).resolves.toEqual({ drained: true, fallbackItems: 0 });

      expect(sink.messages()).toEqual(['last words']);
      expect(sink.closed).toBe(true);

      monitor.info('too late');
      expect(monitor.localSink.records().map(record => record.message)).toEqual(['too late']);
      expect(monitor.getTelemetryStatus().closed).toBe(true);
    });
  });
});
