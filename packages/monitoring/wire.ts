/**
 * Wire format shared with the backend.
 *
 * One JSON record per batch item. Events map field for field; metric samples
 * and health snapshots travel as records of event type `metric` / `health`
 * whose `data` carries the typed payload.
 */

import { z } from 'zod';

import { LOG_LEVELS } from '@config';
import { newEventId } from '@kernel/clock';
import type { SanitizedData } from '@kernel/redaction';
import { ValidationError } from '@errors';

import {
  EventType,
  LogLevel,
  ServiceComponent,
  type BatchItem,
  type HealthState,
  type HealthStatus,
  type MetricSample,
  type TelemetryEvent,
} from './types';

// ============================================================================
// Schemas
// ============================================================================

const jsonValueSchema: z.ZodType<SanitizedData> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema),
  ])
);

const wireLevelSchema = z
  .string()
  .transform(value => value.toUpperCase())
  .pipe(z.enum(LOG_LEVELS));

export const wireEventSchema = z.object({
  event_id: z.string().min(1),
  timestamp: z.string().datetime({ offset: true }),
  level: wireLevelSchema,
  component: z.string().min(1),
  event_type: z.string().min(1),
  message: z.string(),
  data: z.record(z.string(), jsonValueSchema).default({}),
  tags: z.array(z.string()).default([]),
  trace_id: z.string().min(1).optional(),
  span_id: z.string().min(1).optional(),
});

export interface WireEvent {
  event_id: string;
  timestamp: string;
  level: string;
  component: string;
  event_type: string;
  message: string;
  data: Record<string, SanitizedData>;
  tags: string[];
  trace_id?: string;
  span_id?: string;
  service?: string;
  environment?: string;
  resource?: Record<string, string>;
}

/** Client-level fields added to every record */
export interface WireEnvelope {
  service?: string | undefined;
  environment?: string | undefined;
  resource?: Record<string, string> | undefined;
}

// ============================================================================
// Encoding
// ============================================================================

export function eventToWire(event: TelemetryEvent, envelope: WireEnvelope = {}): WireEvent {
  const record: WireEvent = {
    event_id: event.eventId,
    timestamp: new Date(event.timestamp).toISOString(),
    level: event.level.toLowerCase(),
    component: event.component,
    event_type: event.eventType,
    message: event.message,
    data: { ...event.data },
    tags: [...event.tags],
  };
  if (event.traceId !== undefined) record.trace_id = event.traceId;
  if (event.spanId !== undefined) record.span_id = event.spanId;
  return withEnvelope(record, envelope);
}

export function metricToWire(metric: MetricSample, envelope: WireEnvelope = {}): WireEvent {
  const data: Record<string, SanitizedData> = {
    name: metric.name,
    value: metric.value,
    tags: { ...metric.tags },
  };
  if (metric.unit !== undefined) data['unit'] = metric.unit;

  return withEnvelope({
    event_id: newEventId(),
    timestamp: new Date(metric.timestamp).toISOString(),
    level: LogLevel.INFO.toLowerCase(),
    component: metric.tags['component'] ?? ServiceComponent.SYSTEM,
    event_type: EventType.METRIC,
    message: `metric ${metric.name}`,
    data,
    tags: [],
  }, envelope);
}

const HEALTH_LEVELS: Record<HealthState, LogLevel> = {
  healthy: LogLevel.INFO,
  degraded: LogLevel.WARNING,
  unhealthy: LogLevel.ERROR,
};

export function healthToWire(health: HealthStatus, envelope: WireEnvelope = {}): WireEvent {
  const data: Record<string, SanitizedData> = {
    service_id: health.serviceId,
    status: health.status,
    checks: { ...health.checks },
  };
  if (health.serviceName !== undefined) data['service_name'] = health.serviceName;
  if (health.message !== undefined) data['message'] = health.message;
  if (health.version !== undefined) data['version'] = health.version;
  if (health.uptimeSeconds !== undefined) data['uptime_seconds'] = health.uptimeSeconds;
  if (health.resourceUsage) {
    const usage = health.resourceUsage;
    const resource: Record<string, SanitizedData> = {
      cpu_percent: usage.cpuPercent,
      memory_percent: usage.memoryPercent,
      memory_rss: usage.memoryRss,
      heap_used: usage.heapUsed,
      heap_total: usage.heapTotal,
    };
    if (usage.eventLoopLagMs !== undefined) resource['event_loop_lag_ms'] = usage.eventLoopLagMs;
    data['resource_usage'] = resource;
  }

  return withEnvelope({
    event_id: newEventId(),
    timestamp: new Date(health.timestamp).toISOString(),
    level: HEALTH_LEVELS[health.status].toLowerCase(),
    component: ServiceComponent.SYSTEM,
    event_type: EventType.HEALTH,
    message: `Health status for ${health.serviceId}: ${health.status}`,
    data,
    tags: ['health', health.status],
  }, envelope);
}

export function itemToWire(item: BatchItem, envelope: WireEnvelope = {}): WireEvent {
  switch (item.kind) {
    case 'event':
      return eventToWire(item.event, envelope);
    case 'metric':
      return metricToWire(item.metric, envelope);
    case 'health':
      return healthToWire(item.health, envelope);
  }
}

function withEnvelope(record: WireEvent, envelope: WireEnvelope): WireEvent {
  if (envelope.service !== undefined) record.service = envelope.service;
  if (envelope.environment !== undefined) record.environment = envelope.environment;
  if (envelope.resource !== undefined && Object.keys(envelope.resource).length > 0) {
    record.resource = { ...envelope.resource };
  }
  return record;
}

// ============================================================================
// Decoding
// ============================================================================

/**
 * Rebuild an event from its wire record. Fields added by the backend or the
 * client envelope are ignored.
 * @throws ValidationError when the record is malformed
 */
export function parseWireEvent(raw: unknown): TelemetryEvent {
  const result = wireEventSchema.safeParse(raw);
  if (!result.success) {
    throw ValidationError.fromZodIssues(result.error.issues);
  }
  const wire = result.data;
  const event: TelemetryEvent = {
    eventId: wire.event_id,
    timestamp: Date.parse(wire.timestamp),
    level: wire.level,
    component: wire.component,
    eventType: wire.event_type,
    message: wire.message,
    data: Object.freeze({ ...wire.data }),
    tags: Object.freeze([...new Set(wire.tags)]),
    ...(wire.trace_id !== undefined && { traceId: wire.trace_id }),
    ...(wire.span_id !== undefined && { spanId: wire.span_id }),
  };
  return Object.freeze(event);
}
