/**
 * Shared telemetry types
 */

import { LOG_LEVELS, type ConfiguredLogLevel } from '@config';
import type { SanitizedData } from '@kernel/redaction';

// ============================================================================
// Levels & classification
// ============================================================================

export type LogLevel = ConfiguredLogLevel;

export const LogLevel = {
  DEBUG: 'DEBUG',
  INFO: 'INFO',
  WARNING: 'WARNING',
  ERROR: 'ERROR',
  CRITICAL: 'CRITICAL',
} as const satisfies Record<LogLevel, LogLevel>;

/** Numeric rank for ordering comparisons */
export function levelRank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

export function isLevelAtLeast(level: LogLevel, threshold: LogLevel): boolean {
  return levelRank(level) >= levelRank(threshold);
}

/** Well-known components; any other non-empty string is accepted */
export const ServiceComponent = {
  AGENT_CORE: 'agent_core',
  MODEL_SERVICE: 'model_service',
  TOOL_SERVICE: 'tool_service',
  API_GATEWAY: 'api_gateway',
  INFRASTRUCTURE: 'infrastructure',
  DATABASE: 'database',
  MESSAGING: 'messaging',
  SYSTEM: 'system',
  TELEMETRY: 'telemetry',
} as const;

// `string & {}` keeps editor completion for the well-known names
export type ServiceComponent = typeof ServiceComponent[keyof typeof ServiceComponent] | (string & {});

export const EventType = {
  REQUEST: 'request',
  RESPONSE: 'response',
  EXCEPTION: 'exception',
  METRIC: 'metric',
  LIFECYCLE: 'lifecycle',
  VALIDATION: 'validation',
  AUTHENTICATION: 'authentication',
  SYSTEM: 'system',
  SPAN: 'span',
  HEALTH: 'health',
  ALERT: 'alert',
} as const;

export type EventType = typeof EventType[keyof typeof EventType] | (string & {});

// ============================================================================
// Data model
// ============================================================================

export type TelemetryData = Readonly<Record<string, SanitizedData>>;

export interface TelemetryEvent {
  readonly eventId: string;
  /** Epoch milliseconds */
  readonly timestamp: number;
  readonly level: LogLevel;
  readonly component: ServiceComponent;
  readonly eventType: EventType;
  readonly message: string;
  readonly data: TelemetryData;
  /** Unique, insertion ordered */
  readonly tags: readonly string[];
  readonly traceId?: string | undefined;
  readonly spanId?: string | undefined;
}

export interface MetricSample {
  readonly name: string;
  readonly value: number;
  readonly unit?: string | undefined;
  readonly tags: Readonly<Record<string, string>>;
  readonly timestamp: number;
}

export type MetricType = 'counter' | 'gauge' | 'histogram' | 'summary';

export interface MetricDefinition {
  name: string;
  description: string;
  unit: string;
  metricType: MetricType;
}

export type SpanStatus = 'open' | 'ok' | 'error';

export interface Span {
  readonly spanId: string;
  readonly traceId: string;
  readonly parentSpanId?: string | undefined;
  readonly name: string;
  readonly component: ServiceComponent;
  /** Epoch milliseconds */
  readonly startTime: number;
  endTime?: number | undefined;
  durationMs?: number | undefined;
  status: SpanStatus;
  readonly attributes: Record<string, string | number | boolean | null>;
  errorMessage?: string | undefined;
}

/** Propagation token: the trace and span a new span should hang under */
export interface SpanParent {
  traceId: string;
  spanId: string;
}

export type HealthState = 'healthy' | 'degraded' | 'unhealthy';

export interface ResourceUsage {
  cpuPercent: number;
  memoryPercent: number;
  memoryRss: number;
  heapUsed: number;
  heapTotal: number;
  eventLoopLagMs?: number | undefined;
  timestamp: number;
}

export interface HealthStatus {
  readonly serviceId: string;
  readonly serviceName?: string | undefined;
  readonly status: HealthState;
  readonly message?: string | undefined;
  readonly version?: string | undefined;
  readonly uptimeSeconds?: number | undefined;
  readonly resourceUsage?: ResourceUsage | undefined;
  readonly checks: Readonly<Record<string, boolean>>;
  readonly timestamp: number;
}

export type BatchItem =
  | { readonly kind: 'event'; readonly event: TelemetryEvent }
  | { readonly kind: 'metric'; readonly metric: MetricSample }
  | { readonly kind: 'health'; readonly health: HealthStatus };

export interface Batch {
  readonly batchId: string;
  readonly items: readonly BatchItem[];
  /** Epoch milliseconds */
  readonly createdAt: number;
}

// ============================================================================
// Delivery
// ============================================================================

export type DeliveryStatus = 'success' | 'partial' | 'failure' | 'short_circuited' | 'fallback';

export interface DeliveryOutcome {
  status: DeliveryStatus;
  batchId: string;
  itemCount: number;
  /** Transport attempts made (0 when short-circuited or routed locally) */
  attempts: number;
  rejectedItems?: number | undefined;
  error?: string | undefined;
}
