import { newEventId, type Clock } from '@kernel/clock';

import { uniqueTags } from './coerce';
import type { EventType, LogLevel, ServiceComponent, TelemetryData, TelemetryEvent } from './types';

/** Tag carried by events the client emits about its own delivery health */
export const SELF_REPORT_TAG = 'telemetry.self';

export interface EventInit {
  level: LogLevel;
  component: ServiceComponent;
  eventType: EventType;
  message: string;
  data?: TelemetryData | undefined;
  tags?: readonly string[] | undefined;
  traceId?: string | undefined;
  spanId?: string | undefined;
}

/**
 * Build an immutable event stamped with a fresh id and the clock's time
 */
export function createEvent(init: EventInit, clock: Clock): TelemetryEvent {
  const event: TelemetryEvent = {
    eventId: newEventId(),
    timestamp: clock.now(),
    level: init.level,
    component: init.component,
    eventType: init.eventType,
    message: init.message,
    data: Object.freeze({ ...init.data }),
    tags: Object.freeze(uniqueTags(init.tags)),
    ...(init.traceId !== undefined && { traceId: init.traceId }),
    ...(init.spanId !== undefined && { spanId: init.spanId }),
  };
  return Object.freeze(event);
}

export function isSelfReport(event: TelemetryEvent): boolean {
  return event.tags.includes(SELF_REPORT_TAG);
}
