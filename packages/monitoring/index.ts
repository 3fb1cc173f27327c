/**
 * Monitoring Package
 *
 * Telemetry client: events, metrics, health snapshots and spans, batched and
 * delivered to a remote backend with a local fallback.
 */

// Lifecycle
export {
  initMonitor,
  createMonitorFromEnv,
  shutdownMonitor,
  registerShutdownHandlers,
} from './init';

// Facade
export { Monitor } from './monitor';
export type {
  EventData,
  LogConfig,
  LogConfigUpdate,
  MonitorDependencies,
  ApiCallRecord,
  PerformanceRecord,
  ValidationRecord,
  HealthStatusInput,
  CaptureHealthOptions,
  MetricFilter,
  TelemetryStatus,
} from './monitor';

// Types
export {
  LogLevel,
  ServiceComponent,
  EventType,
  levelRank,
  isLevelAtLeast,
} from './types';
export type {
  TelemetryData,
  TelemetryEvent,
  MetricSample,
  MetricType,
  MetricDefinition,
  SpanStatus,
  Span,
  SpanParent,
  HealthState,
  ResourceUsage,
  HealthStatus,
  BatchItem,
  Batch,
  DeliveryStatus,
  DeliveryOutcome,
} from './types';

// Tracing
export {
  TraceContextManager,
  extractTraceParent,
  injectTraceHeaders,
  TRACE_ID_HEADER,
  PARENT_SPAN_ID_HEADER,
} from './trace-context';
export type { StartSpanOptions, EndSpanOptions, SpanEndListener, HeaderBag } from './trace-context';

// Sampling
export { Sampler, traceBucket } from './sampler';

// Batching & delivery
export { BatchEngine } from './batch-engine';
export type { BatchEngineOptions, BatchEngineStats, ShutdownReport } from './batch-engine';
export { DeliveryPipeline } from './delivery';
export type { DeliveryOptions, DeliveryDependencies, DeliveryStats } from './delivery';

// Sinks
export { HttpSink } from './sinks/http-sink';
export type { HttpSinkOptions } from './sinks/http-sink';
export { LocalSink } from './sinks/local-sink';
export type { LocalSinkMode, LocalSinkOptions } from './sinks/local-sink';
export type { SinkResult, TelemetrySink } from './sinks/telemetry-sink';

// Wire format
export {
  wireEventSchema,
  eventToWire,
  metricToWire,
  healthToWire,
  itemToWire,
  parseWireEvent,
} from './wire';
export type { WireEvent, WireEnvelope } from './wire';

// Events
export { createEvent, isSelfReport, SELF_REPORT_TAG } from './events';
export type { EventInit } from './events';

// Alerting
export {
  AlertRegistry,
  alertConfigSchema,
  alertUpdateSchema,
  parseCondition,
  evaluateCondition,
} from './alerting';
export type {
  AlertOperator,
  ParsedCondition,
  AlertConfigInput,
  AlertUpdate,
  AlertConfig,
  AlertInstanceStatus,
  AlertInstance,
  AlertFilter,
  AlertInstanceFilter,
} from './alerting';

// Resources
export { ResourceSampler, collectHostMetadata } from './resource';

// Coercion
export { toAttributeValue, toAttributes, toTagValues, uniqueTags } from './coerce';
export type { AttributeValue } from './coerce';
