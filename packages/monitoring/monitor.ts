import { hasRemoteSink, type TelemetryConfig } from '@config';
import { getErrorMessage } from '@errors';
import { CircuitBreaker, type CircuitSnapshot } from '@kernel/circuit-breaker';
import { systemClock, type Clock } from '@kernel/clock';
import { getLogger } from '@kernel/logger';
import { DEFAULT_REDACT_KEYS, sanitizeRecord } from '@kernel/redaction';

import {
  AlertRegistry,
  type AlertConfig,
  type AlertConfigInput,
  type AlertFilter,
  type AlertInstance,
  type AlertInstanceFilter,
  type AlertUpdate,
} from './alerting';
import { BatchEngine, type BatchEngineStats, type ShutdownReport } from './batch-engine';
import { toTagValues } from './coerce';
import { DeliveryPipeline, type DeliveryStats } from './delivery';
import { createEvent } from './events';
import { collectHostMetadata, ResourceSampler } from './resource';
import { Sampler } from './sampler';
import { HttpSink } from './sinks/http-sink';
import { LocalSink } from './sinks/local-sink';
import type { TelemetrySink } from './sinks/telemetry-sink';
import {
  extractTraceParent,
  injectTraceHeaders,
  isPromiseLike,
  TraceContextManager,
  type EndSpanOptions,
  type HeaderBag,
  type StartSpanOptions,
} from './trace-context';
import {
  EventType,
  isLevelAtLeast,
  LogLevel,
  ServiceComponent,
  type HealthState,
  type HealthStatus,
  type MetricDefinition,
  type MetricSample,
  type MetricType,
  type Span,
  type SpanParent,
} from './types';
import type { WireEnvelope } from './wire';

const logger = getLogger('telemetry-monitor');

// ============================================================================
// Types and Interfaces
// ============================================================================

export type EventData = Record<string, unknown>;

/**
 * Admission filter applied before sampling
 */
export interface LogConfig {
  readonly serviceName: string;
  readonly environment: string;
  readonly minLevel: LogLevel;
  /** When set, only these components are admitted */
  readonly includeComponents?: readonly ServiceComponent[] | undefined;
  readonly excludeComponents: readonly ServiceComponent[];
  /** When set, only these event types are admitted */
  readonly includeEventTypes?: readonly EventType[] | undefined;
  readonly excludeEventTypes: readonly EventType[];
}

export type LogConfigUpdate = Partial<Omit<LogConfig, 'serviceName' | 'environment'>>;

export interface MonitorDependencies {
  clock?: Clock | undefined;
  /** Random source for sampling and backoff jitter */
  random?: (() => number) | undefined;
  /** Replaces the HTTP sink built from the configuration */
  remoteSink?: TelemetrySink | undefined;
  localSink?: LocalSink | undefined;
  /** Start the periodic flush timer (default true) */
  startTimer?: boolean | undefined;
}

export interface ApiCallRecord {
  apiName: string;
  statusCode: number;
  durationMs: number;
  component: ServiceComponent;
  request?: EventData | undefined;
  response?: EventData | undefined;
  error?: string | undefined;
}

export interface PerformanceRecord {
  operation: string;
  durationMs: number;
  component: ServiceComponent;
  success?: boolean | undefined;
  details?: EventData | undefined;
}

export interface ValidationRecord {
  modelName: string;
  success: boolean;
  component?: ServiceComponent | undefined;
  data?: EventData | undefined;
  error?: string | undefined;
}

export type HealthStatusInput = Omit<HealthStatus, 'checks' | 'timestamp'> & {
  checks?: Readonly<Record<string, boolean>> | undefined;
  timestamp?: number | undefined;
};

export interface CaptureHealthOptions {
  serviceId?: string | undefined;
  status?: HealthState | undefined;
  message?: string | undefined;
  version?: string | undefined;
  checks?: Readonly<Record<string, boolean>> | undefined;
}

export interface MetricFilter {
  metricType?: MetricType | undefined;
  namePrefix?: string | undefined;
}

export interface TelemetryStatus {
  serviceName: string;
  environment: string;
  remoteConfigured: boolean;
  closed: boolean;
  circuit: CircuitSnapshot;
  queue: BatchEngineStats;
  delivery: DeliveryStats;
  localSink: { size: number; evicted: number };
  sampledOut: number;
  filteredOut: number;
}

// ============================================================================
// Monitor
// ============================================================================

/**
 * Public entry point of the telemetry client.
 *
 * Producer calls (`log` and friends, metrics, health, spans) are synchronous,
 * never throw and never wait on I/O: they filter, sample, sanitize and
 * enqueue. Delivery happens on the batch engine's own path.
 */
export class Monitor {
  readonly config: TelemetryConfig;

  private readonly clock: Clock;
  private readonly sampler: Sampler;
  private readonly traces: TraceContextManager;
  private readonly local: LocalSink;
  private readonly remote: TelemetrySink | undefined;
  private readonly breaker: CircuitBreaker;
  private readonly pipeline: DeliveryPipeline;
  private readonly engine: BatchEngine;
  private readonly alerts: AlertRegistry;
  private readonly resources: ResourceSampler;
  private readonly metrics = new Map<string, MetricDefinition>();
  private readonly health = new Map<string, HealthStatus>();
  private readonly redactKeys: readonly string[];
  private logConfig: LogConfig;
  private sampledOut = 0;
  private filteredOut = 0;
  private shutdownPromise: Promise<ShutdownReport> | undefined;

  constructor(config: TelemetryConfig, deps: MonitorDependencies = {}) {
    this.config = config;
    this.clock = deps.clock ?? systemClock;
    this.redactKeys = config.redactKeys ?? DEFAULT_REDACT_KEYS;
    this.logConfig = Object.freeze({
      serviceName: config.serviceName,
      environment: config.environment,
      minLevel: config.minLogLevel,
      excludeComponents: [],
      excludeEventTypes: [],
    });

    const envelope: WireEnvelope = {
      service: config.serviceName,
      environment: config.environment,
      resource: config.enableMetadata
        ? collectHostMetadata(config.additionalMetadata)
        : { ...config.additionalMetadata },
    };

    this.sampler = new Sampler(config.sampleRate, deps.random);
    this.traces = new TraceContextManager(this.clock, span => this.emitSpan(span));
    this.local = deps.localSink ?? new LocalSink({
      mode: config.localSinkMode,
      capacity: config.localBufferSize,
      envelope,
    });
    this.remote = deps.remoteSink ?? createRemoteSink(config, envelope);
    this.breaker = new CircuitBreaker('telemetry-backend', {
      failureThreshold: config.failureThreshold,
      recoveryTimeoutMs: config.recoveryTimeoutSeconds * 1000,
    }, this.clock);

    this.pipeline = new DeliveryPipeline({
      remote: this.remote,
      local: this.local,
      breaker: this.breaker,
      clock: this.clock,
      random: deps.random,
      options: {
        maxRetries: config.maxRetries,
        backoff: {
          initialDelayMs: config.initialBackoffMs,
          maxDelayMs: config.maxBackoffMs,
          backoffMultiplier: 2,
        },
        requestTimeoutMs: config.requestTimeoutSeconds * 1000,
        retryBufferSize: config.retryBufferSize,
        fallbackAfterMs: config.fallbackAfterSeconds * 1000,
      },
      onSelfReport: event => this.engine.enqueue({ kind: 'event', event }),
    });

    this.engine = new BatchEngine(this.pipeline, {
      batchSize: config.batchSize,
      flushIntervalMs: config.flushIntervalSeconds * 1000,
      maxQueueSize: config.maxQueueSize,
      maxConcurrentDeliveries: config.maxConcurrentDeliveries,
    }, this.clock);

    this.alerts = new AlertRegistry(this.clock);
    this.alerts.on('triggered', (instance: AlertInstance, alert: AlertConfig) => {
      this.log(instance.severity, instance.message, instance.component, EventType.ALERT, {
        alert_id: alert.alertId,
        alert_name: alert.name,
        instance_id: instance.instanceId,
        condition: alert.condition,
        value: instance.value,
        notification_channels: [...alert.notificationChannels],
      }, ['alert', ...alert.tags]);
    });

    this.resources = new ResourceSampler(() => this.clock.now());

    if (deps.startTimer !== false) {
      this.engine.start();
    }

    logger.info('Telemetry monitor started', {
      serviceName: config.serviceName,
      environment: config.environment,
      remote: this.remote?.name ?? 'none',
      batchSize: config.batchSize,
      sampleRate: config.sampleRate,
    });
  }

  // ==========================================================================
  // Events
  // ==========================================================================

  log(
    level: LogLevel,
    message: string,
    component: ServiceComponent = ServiceComponent.SYSTEM,
    eventType: EventType = EventType.SYSTEM,
    data?: EventData,
    tags?: readonly string[]
  ): void {
    try {
      if (!this.passesFilter(level, component, eventType)) {
        this.filteredOut++;
        return;
      }
      if (!this.sampler.admit(level)) {
        this.sampledOut++;
        return;
      }

      const parent = this.traces.currentParent();
      const event = createEvent({
        level,
        component,
        eventType,
        message,
        data: sanitizeRecord(data, { denyList: this.redactKeys }),
        tags: [...this.config.defaultTags, ...(tags ?? [])],
        traceId: parent?.traceId,
        spanId: parent?.spanId,
      }, this.clock);
      this.engine.enqueue({ kind: 'event', event });

      if (level === LogLevel.CRITICAL) {
        void this.engine.flush();
      }
    } catch (err) {
      logger.error('Failed to record telemetry event', err, { component, eventType });
    }
  }

  debug(message: string, component?: ServiceComponent, eventType?: EventType, data?: EventData, tags?: readonly string[]): void {
    this.log(LogLevel.DEBUG, message, component, eventType, data, tags);
  }

  info(message: string, component?: ServiceComponent, eventType?: EventType, data?: EventData, tags?: readonly string[]): void {
    this.log(LogLevel.INFO, message, component, eventType, data, tags);
  }

  warning(message: string, component?: ServiceComponent, eventType?: EventType, data?: EventData, tags?: readonly string[]): void {
    this.log(LogLevel.WARNING, message, component, eventType, data, tags);
  }

  error(message: string, component?: ServiceComponent, eventType?: EventType, data?: EventData, tags?: readonly string[]): void {
    this.log(LogLevel.ERROR, message, component, eventType, data, tags);
  }

  /**
   * Log at CRITICAL and flush right away
   */
  critical(message: string, component?: ServiceComponent, eventType?: EventType, data?: EventData, tags?: readonly string[]): void {
    this.log(LogLevel.CRITICAL, message, component, eventType, data, tags);
  }

  recordApiCall(call: ApiCallRecord): void {
    const success = call.statusCode >= 200 && call.statusCode < 300;
    const data: EventData = {
      api_name: call.apiName,
      status_code: call.statusCode,
      duration_ms: call.durationMs,
      success,
    };
    if (call.request) data['request'] = call.request;
    // failed responses only in debug mode
    if (call.response && (success || this.logConfig.minLevel === LogLevel.DEBUG)) {
      data['response'] = call.response;
    }
    if (call.error) data['error'] = call.error;

    this.log(
      success ? LogLevel.INFO : LogLevel.ERROR,
      `API call to ${call.apiName} ${success ? 'succeeded' : 'failed'} with status ${call.statusCode}`,
      call.component,
      EventType.REQUEST,
      data
    );
    this.recordMetric('api_call_duration_ms', call.durationMs, {
      api_name: call.apiName,
      status_code: String(call.statusCode),
      success: String(success),
      component: call.component,
    }, 'ms');
  }

  recordPerformance(record: PerformanceRecord): void {
    const success = record.success ?? true;
    this.log(
      LogLevel.INFO,
      `Performance: ${record.operation} took ${record.durationMs.toFixed(2)}ms`,
      record.component,
      EventType.METRIC,
      { ...record.details, operation: record.operation, duration_ms: record.durationMs, success }
    );
    this.recordMetric('operation_duration_ms', record.durationMs, {
      operation: record.operation,
      success: String(success),
      component: record.component,
    }, 'ms');
  }

  recordValidation(record: ValidationRecord): void {
    const data: EventData = { ...record.data, model_name: record.modelName, success: record.success };
    if (record.error) data['error'] = record.error;
    this.log(
      record.success ? LogLevel.INFO : LogLevel.ERROR,
      `Model validation ${record.success ? 'succeeded' : 'failed'}: ${record.modelName}`,
      record.component ?? ServiceComponent.SYSTEM,
      EventType.VALIDATION,
      data
    );
  }

  // ==========================================================================
  // Spans
  // ==========================================================================

  startSpan(name: string, component: ServiceComponent, options?: StartSpanOptions): Span {
    return this.traces.startSpan(name, component, options);
  }

  /**
   * Close a span and emit it. Closing twice is a no-op.
   * @returns false when the span was already closed
   */
  endSpan(span: Span, options?: EndSpanOptions): boolean {
    try {
      return this.traces.endSpan(span, options);
    } catch (err) {
      logger.error('Failed to end span', err, { spanId: span.spanId });
      return false;
    }
  }

  /**
   * Run `fn` inside a span and record its duration as `operation_duration_ms`.
   * A throw or rejection is recorded with `success: false` and re-thrown.
   */
  withSpan<T>(name: string, component: ServiceComponent, fn: (span: Span) => T, options?: StartSpanOptions): T {
    const started = this.clock.monotonic();
    const finish = (error?: unknown): void => {
      const record: PerformanceRecord = {
        operation: name,
        durationMs: Math.max(0, this.clock.monotonic() - started),
        component,
      };
      if (error !== undefined) {
        record.success = false;
        record.details = {
          error: getErrorMessage(error),
          error_type: error instanceof Error ? error.name : typeof error,
        };
      }
      this.recordPerformance(record);
    };

    return this.traces.withSpan(name, component, span => {
      let result: T;
      try {
        result = fn(span);
      } catch (err) {
        finish(err);
        throw err;
      }
      if (isPromiseLike(result)) {
        void result.then(
          () => { finish(); },
          (err: unknown) => { finish(err); }
        );
        return result;
      }
      finish();
      return result;
    }, options);
  }

  runInContext<T>(fn: () => T, parent?: SpanParent): T {
    return this.traces.runInContext(fn, parent);
  }

  currentSpan(): Span | undefined {
    return this.traces.currentSpan();
  }

  /**
   * Propagation headers for the active span of the current context
   */
  injectTraceHeaders(): Record<string, string> {
    return injectTraceHeaders(this.traces.currentParent());
  }

  extractTraceParent(headers: HeaderBag): SpanParent | undefined {
    return extractTraceParent(headers);
  }

  // ==========================================================================
  // Metrics
  // ==========================================================================

  registerMetric(definition: MetricDefinition): MetricDefinition {
    const registered = Object.freeze({ ...definition });
    this.metrics.set(definition.name, registered);
    return registered;
  }

  getMetrics(filter: MetricFilter = {}): MetricDefinition[] {
    return [...this.metrics.values()].filter(metric =>
      (filter.metricType === undefined || metric.metricType === filter.metricType) &&
      (filter.namePrefix === undefined || metric.name.startsWith(filter.namePrefix))
    );
  }

  /**
   * Queue one metric sample and evaluate alerts watching it.
   * Unknown names are registered as gauges. Metrics are never sampled.
   */
  recordMetric(name: string, value: number, tags?: Record<string, unknown>, unit?: string): void {
    try {
      if (!Number.isFinite(value)) {
        logger.warn('Ignoring non-finite metric value', { name, value: String(value) });
        return;
      }
      const definition = this.metrics.get(name) ?? this.registerMetric({
        name,
        description: `Auto-registered metric: ${name}`,
        unit: unit ?? 'unspecified',
        metricType: 'gauge',
      });
      const resolvedUnit = unit ?? (definition.unit === 'unspecified' ? undefined : definition.unit);

      const sample: MetricSample = Object.freeze({
        name,
        value,
        tags: Object.freeze(toTagValues(tags)),
        timestamp: this.clock.now(),
        ...(resolvedUnit !== undefined && { unit: resolvedUnit }),
      });
      this.engine.enqueue({ kind: 'metric', metric: sample });
      this.alerts.evaluateMetric(name, value);
    } catch (err) {
      logger.error('Failed to record metric', err, { name });
    }
  }

  // ==========================================================================
  // Health
  // ==========================================================================

  recordHealthStatus(input: HealthStatusInput): void {
    try {
      this.storeHealth(toHealthStatus(input, this.clock));
    } catch (err) {
      logger.error('Failed to record health status', err, { serviceId: input.serviceId });
    }
  }

  /**
   * Build a snapshot of this process (uptime and live resource usage) and
   * record it
   */
  captureHealthStatus(options: CaptureHealthOptions = {}): HealthStatus {
    const status = toHealthStatus({
      serviceId: options.serviceId ?? this.config.serviceName,
      serviceName: this.config.serviceName,
      status: options.status ?? 'healthy',
      message: options.message,
      version: options.version,
      uptimeSeconds: Math.round(process.uptime()),
      resourceUsage: this.resources.sample(),
      checks: options.checks,
    }, this.clock);
    try {
      this.storeHealth(status);
    } catch (err) {
      logger.error('Failed to record health status', err, { serviceId: status.serviceId });
    }
    return status;
  }

  /** Latest snapshot of every service */
  getHealthStatus(): HealthStatus[];
  /** Latest snapshot of one service */
  getHealthStatus(serviceId: string): HealthStatus | undefined;
  getHealthStatus(serviceId?: string): HealthStatus[] | HealthStatus | undefined {
    if (serviceId === undefined) return [...this.health.values()];
    return this.health.get(serviceId);
  }

  // ==========================================================================
  // Alerts
  // ==========================================================================

  createAlert(input: AlertConfigInput): AlertConfig {
    return this.alerts.createAlert(input);
  }

  updateAlert(alertId: string, updates: AlertUpdate): AlertConfig {
    return this.alerts.updateAlert(alertId, updates);
  }

  deleteAlert(alertId: string): boolean {
    return this.alerts.deleteAlert(alertId);
  }

  getAlerts(filter?: AlertFilter): AlertConfig[] {
    return this.alerts.getAlerts(filter);
  }

  triggerAlert(
    alertId: string,
    value: number,
    message?: string,
    metadata?: Record<string, string | number | boolean>
  ): AlertInstance | undefined {
    return this.alerts.triggerAlert(alertId, value, message, metadata);
  }

  getAlertInstances(filter?: AlertInstanceFilter): AlertInstance[] {
    return this.alerts.getAlertInstances(filter);
  }

  acknowledgeAlert(instanceId: string, acknowledgedBy: string): AlertInstance {
    return this.alerts.acknowledgeAlert(instanceId, acknowledgedBy);
  }

  resolveAlert(instanceId: string, resolutionMessage?: string): AlertInstance {
    return this.alerts.resolveAlert(instanceId, resolutionMessage);
  }

  /** Subscribe to alert lifecycle events (`triggered`, `acknowledged`, `resolved`) */
  get alertEvents(): AlertRegistry {
    return this.alerts;
  }

  // ==========================================================================
  // Log configuration
  // ==========================================================================

  getLogConfig(): LogConfig {
    return this.logConfig;
  }

  updateLogConfig(update: LogConfigUpdate): LogConfig {
    this.logConfig = Object.freeze({ ...this.logConfig, ...update });
    logger.info('Log configuration updated', {
      minLevel: this.logConfig.minLevel,
      includeComponents: this.logConfig.includeComponents,
      excludeComponents: this.logConfig.excludeComponents,
    });
    return this.logConfig;
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Seal the open batch and wait for every delivery started so far.
   * Never rejects.
   * @returns true when nothing was lost (delivered, partially accepted or
   * written to the local sink)
   */
  async flush(): Promise<boolean> {
    const outcomes = await this.engine.flush();
    return outcomes.every(outcome =>
      outcome.status === 'success' || outcome.status === 'partial' || outcome.status === 'fallback'
    );
  }

  /**
   * Final flush, bounded drain, then release the transport. Idempotent;
   * producer calls made afterwards go to the local sink.
   */
  shutdown(): Promise<ShutdownReport> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.runShutdown();
    }
    return this.shutdownPromise;
  }

  getTelemetryStatus(): TelemetryStatus {
    return {
      serviceName: this.config.serviceName,
      environment: this.config.environment,
      remoteConfigured: this.remote !== undefined,
      closed: this.engine.isClosed,
      circuit: this.breaker.snapshot(),
      queue: this.engine.stats(),
      delivery: this.pipeline.stats(),
      localSink: { size: this.local.size, evicted: this.local.evictedCount },
      sampledOut: this.sampledOut,
      filteredOut: this.filteredOut,
    };
  }

  /** Records held by the local sink, oldest first */
  get localSink(): LocalSink {
    return this.local;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async runShutdown(): Promise<ShutdownReport> {
    const report = await this.engine.shutdown(this.config.drainTimeoutSeconds * 1000);
    if (this.remote?.close) {
      try {
        await this.remote.close();
      } catch (err) {
        logger.error('Failed to close telemetry sink', err, { sink: this.remote.name });
      }
    }
    logger.info('Telemetry monitor stopped', {
      drained: report.drained,
      fallbackItems: report.fallbackItems,
    });
    return report;
  }

  private storeHealth(status: HealthStatus): void {
    this.health.set(status.serviceId, status);
    this.engine.enqueue({ kind: 'health', health: status });

    const usage = status.resourceUsage;
    if (usage) {
      const tags = { service_id: status.serviceId };
      this.recordMetric('cpu_usage_percent', usage.cpuPercent, tags, 'percent');
      this.recordMetric('memory_usage_percent', usage.memoryPercent, tags, 'percent');
      this.recordMetric('memory_rss_bytes', usage.memoryRss, tags, 'bytes');
    }
  }

  private passesFilter(level: LogLevel, component: ServiceComponent, eventType: EventType): boolean {
    const filter = this.logConfig;
    if (!isLevelAtLeast(level, filter.minLevel)) return false;
    if (filter.includeComponents && !filter.includeComponents.includes(component)) return false;
    if (filter.excludeComponents.includes(component)) return false;
    if (filter.includeEventTypes && !filter.includeEventTypes.includes(eventType)) return false;
    if (filter.excludeEventTypes.includes(eventType)) return false;
    return true;
  }

  private emitSpan(span: Readonly<Span>): void {
    const failed = span.status === 'error';
    const level = failed ? LogLevel.ERROR : LogLevel.INFO;
    if (!this.passesFilter(level, span.component, EventType.SPAN)) {
      this.filteredOut++;
      return;
    }
    if (!this.sampler.admitTrace(span.traceId, failed)) {
      this.sampledOut++;
      return;
    }

    const event = createEvent({
      level,
      component: span.component,
      eventType: EventType.SPAN,
      message: `Span ${span.name} ${span.status}`,
      data: {
        name: span.name,
        parent_span_id: span.parentSpanId ?? null,
        start_time: new Date(span.startTime).toISOString(),
        end_time: span.endTime !== undefined ? new Date(span.endTime).toISOString() : null,
        duration_ms: span.durationMs ?? null,
        status: span.status,
        attributes: sanitizeRecord(span.attributes, { denyList: this.redactKeys }),
        error_message: span.errorMessage ?? null,
      },
      tags: [...this.config.defaultTags, 'span'],
      traceId: span.traceId,
      spanId: span.spanId,
    }, this.clock);
    this.engine.enqueue({ kind: 'event', event });
  }
}

function toHealthStatus(input: HealthStatusInput, clock: Clock): HealthStatus {
  return Object.freeze({
    ...input,
    checks: Object.freeze({ ...input.checks }),
    timestamp: input.timestamp ?? clock.now(),
  });
}

function createRemoteSink(config: TelemetryConfig, envelope: WireEnvelope): TelemetrySink | undefined {
  if (config.apiKey !== undefined && config.endpoint === undefined) {
    logger.warn('Write token set without an endpoint, telemetry stays in the local sink', {
      projectId: config.projectId,
    });
    return undefined;
  }
  if (!hasRemoteSink(config) || config.endpoint === undefined || config.apiKey === undefined) {
    return undefined;
  }
  return new HttpSink({
    endpoint: config.endpoint,
    apiKey: config.apiKey,
    projectId: config.projectId,
    envelope,
  });
}
