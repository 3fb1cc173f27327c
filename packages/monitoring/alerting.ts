import { EventEmitter } from 'events';
import { randomBytes } from 'crypto';

import { z } from 'zod';

import { logLevelSchema } from '@config';
import { systemClock, type Clock } from '@kernel/clock';
import { getLogger } from '@kernel/logger';
import { ConflictError, NotFoundError, ValidationError } from '@errors';

import type { LogLevel, ServiceComponent } from './types';

/**
* Alert registry
* In-memory alert definitions plus the instances they raise. Conditions of
* the form `<metric> <op> <threshold>` are evaluated against recorded
* metric values.
*/

const logger = getLogger('alerting');

// ============================================================================
// Types
// ============================================================================

export type AlertOperator = '>' | '>=' | '<' | '<=' | '==';

export interface ParsedCondition {
  metric: string;
  operator: AlertOperator;
  threshold: number;
}

export const alertConfigSchema = z.object({
  alertId: z.string().min(1).optional(),
  name: z.string().min(1),
  description: z.string().default(''),
  component: z.string().min(1),
  condition: z.string().min(1),
  severity: logLevelSchema.default('WARNING'),
  notificationChannels: z.array(z.string().min(1)).default([]),
  cooldownSeconds: z.number().finite().min(0).default(300),
  enabled: z.boolean().default(true),
  tags: z.array(z.string()).default([]),
}).strict();

export const alertUpdateSchema = alertConfigSchema
  .omit({ alertId: true })
  .partial()
  .strict();

export type AlertConfigInput = z.input<typeof alertConfigSchema>;
export type AlertUpdate = z.input<typeof alertUpdateSchema>;

export interface AlertConfig {
  readonly alertId: string;
  readonly name: string;
  readonly description: string;
  readonly component: ServiceComponent;
  readonly condition: string;
  readonly severity: LogLevel;
  readonly notificationChannels: readonly string[];
  readonly cooldownSeconds: number;
  readonly enabled: boolean;
  readonly tags: readonly string[];
  readonly createdAt: number;
  readonly updatedAt: number;
}

export type AlertInstanceStatus = 'active' | 'acknowledged' | 'resolved';

export interface AlertInstance {
  readonly instanceId: string;
  readonly alertId: string;
  readonly triggeredAt: number;
  readonly resolvedAt?: number | undefined;
  readonly status: AlertInstanceStatus;
  readonly value: number;
  readonly message: string;
  readonly component: ServiceComponent;
  readonly severity: LogLevel;
  readonly metadata: Readonly<Record<string, string | number | boolean>>;
  readonly acknowledgedBy?: string | undefined;
  readonly acknowledgedAt?: number | undefined;
  readonly resolutionMessage?: string | undefined;
}

export interface AlertFilter {
  component?: ServiceComponent;
  severity?: LogLevel;
  enabled?: boolean;
  tag?: string;
}

export interface AlertInstanceFilter {
  alertId?: string;
  status?: AlertInstanceStatus;
  component?: ServiceComponent;
  severity?: LogLevel;
}

// ============================================================================
// Conditions
// ============================================================================

const CONDITION_PATTERN = /^\s*([A-Za-z_][\w.:-]*)\s*(>=|<=|==|>|<)\s*(-?\d+(?:\.\d+)?(?:e[+-]?\d+)?)\s*$/i;

function isOperator(value: string): value is AlertOperator {
  return value === '>' || value === '>=' || value === '<' || value === '<=' || value === '==';
}

/**
* Parse `<metric> <op> <threshold>`.
* @returns undefined for free-form conditions that are evaluated elsewhere
*/
export function parseCondition(condition: string): ParsedCondition | undefined {
  const match = CONDITION_PATTERN.exec(condition);
  if (!match) return undefined;
  const [, metric, operator, threshold] = match;
  if (!metric || !operator || !threshold || !isOperator(operator)) return undefined;
  return { metric, operator, threshold: Number(threshold) };
}

export function evaluateCondition(value: number, condition: ParsedCondition): boolean {
  switch (condition.operator) {
    case '>':
      return value > condition.threshold;
    case '>=':
      return value >= condition.threshold;
    case '<':
      return value < condition.threshold;
    case '<=':
      return value <= condition.threshold;
    case '==':
      return value === condition.threshold;
  }
}

// ============================================================================
// Registry
// ============================================================================

const MAX_INSTANCES = 1000;

/**
 * Emits `triggered` (instance, alert), `acknowledged` (instance) and
 * `resolved` (instance).
 */
export class AlertRegistry extends EventEmitter {
  private readonly alerts = new Map<string, AlertConfig>();
  private readonly instances = new Map<string, AlertInstance>();
  /** alertId -> last trigger time, for cooldown */
  private readonly lastTriggered = new Map<string, number>();

  constructor(private readonly clock: Clock = systemClock) {
    super();
    this.setMaxListeners(50);
  }

  /**
  * @throws ValidationError for malformed input
  * @throws ConflictError when the alert id is taken
  */
  createAlert(input: AlertConfigInput): AlertConfig {
    const parsed = alertConfigSchema.safeParse(input);
    if (!parsed.success) {
      throw ValidationError.fromZodIssues(parsed.error.issues);
    }
    const alertId = parsed.data.alertId ?? `alert_${randomBytes(8).toString('hex')}`;
    if (this.alerts.has(alertId)) {
      throw new ConflictError(`Alert already exists: ${alertId}`, { alertId });
    }

    const now = this.clock.now();
    const alert: AlertConfig = Object.freeze({
      ...parsed.data,
      alertId,
      notificationChannels: Object.freeze([...parsed.data.notificationChannels]),
      tags: Object.freeze([...parsed.data.tags]),
      createdAt: now,
      updatedAt: now,
    });
    this.alerts.set(alertId, alert);
    logger.info('Alert created', { alertId, name: alert.name, condition: alert.condition });
    return alert;
  }

  /**
  * @throws NotFoundError for unknown ids
  * @throws ValidationError for malformed updates
  */
  updateAlert(alertId: string, updates: AlertUpdate): AlertConfig {
    const existing = this.alerts.get(alertId);
    if (!existing) {
      throw NotFoundError.alert(alertId);
    }
    const parsed = alertUpdateSchema.safeParse(updates);
    if (!parsed.success) {
      throw ValidationError.fromZodIssues(parsed.error.issues);
    }

    const patch = parsed.data;
    const updated: AlertConfig = Object.freeze({
      alertId,
      name: patch.name ?? existing.name,
      description: patch.description ?? existing.description,
      component: patch.component ?? existing.component,
      condition: patch.condition ?? existing.condition,
      severity: patch.severity ?? existing.severity,
      notificationChannels: Object.freeze([...(patch.notificationChannels ?? existing.notificationChannels)]),
      cooldownSeconds: patch.cooldownSeconds ?? existing.cooldownSeconds,
      enabled: patch.enabled ?? existing.enabled,
      tags: Object.freeze([...(patch.tags ?? existing.tags)]),
      createdAt: existing.createdAt,
      updatedAt: this.clock.now(),
    });
    this.alerts.set(alertId, updated);
    return updated;
  }

  /**
  * @returns false when no alert has this id
  */
  deleteAlert(alertId: string): boolean {
    const deleted = this.alerts.delete(alertId);
    this.lastTriggered.delete(alertId);
    return deleted;
  }

  getAlert(alertId: string): AlertConfig | undefined {
    return this.alerts.get(alertId);
  }

  getAlerts(filter: AlertFilter = {}): AlertConfig[] {
    return [...this.alerts.values()].filter(alert =>
      (filter.component === undefined || alert.component === filter.component) &&
      (filter.severity === undefined || alert.severity === filter.severity) &&
      (filter.enabled === undefined || alert.enabled === filter.enabled) &&
      (filter.tag === undefined || alert.tags.includes(filter.tag))
    );
  }

  /**
  * Raise an instance of an alert, honouring `enabled` and the cooldown.
  * @returns the new instance, or undefined when suppressed
  * @throws NotFoundError for unknown ids
  */
  triggerAlert(
    alertId: string,
    value: number,
    message?: string,
    metadata: Record<string, string | number | boolean> = {}
  ): AlertInstance | undefined {
    const alert = this.alerts.get(alertId);
    if (!alert) {
      throw NotFoundError.alert(alertId);
    }
    if (!alert.enabled) return undefined;

    const now = this.clock.now();
    const last = this.lastTriggered.get(alertId);
    if (last !== undefined && now - last < alert.cooldownSeconds * 1000) {
      return undefined;
    }

    const instance: AlertInstance = Object.freeze({
      instanceId: `alertinst_${randomBytes(8).toString('hex')}`,
      alertId,
      triggeredAt: now,
      status: 'active',
      value,
      message: message ?? `${alert.name}: ${alert.condition} (value ${value})`,
      component: alert.component,
      severity: alert.severity,
      metadata: Object.freeze({ ...metadata }),
    });

    this.lastTriggered.set(alertId, now);
    this.instances.set(instance.instanceId, instance);
    this.evictResolved();
    this.emit('triggered', instance, alert);
    return instance;
  }

  /**
  * Evaluate every enabled alert whose condition names this metric
  * @returns instances raised by this value
  */
  evaluateMetric(name: string, value: number): AlertInstance[] {
    const raised: AlertInstance[] = [];
    for (const alert of this.alerts.values()) {
      if (!alert.enabled) continue;
      const condition = parseCondition(alert.condition);
      if (!condition || condition.metric !== name) continue;
      if (!evaluateCondition(value, condition)) continue;
      const instance = this.triggerAlert(alert.alertId, value, undefined, {
        metric: name,
        threshold: condition.threshold,
      });
      if (instance) raised.push(instance);
    }
    return raised;
  }

  getAlertInstances(filter: AlertInstanceFilter = {}): AlertInstance[] {
    return [...this.instances.values()].filter(instance =>
      (filter.alertId === undefined || instance.alertId === filter.alertId) &&
      (filter.status === undefined || instance.status === filter.status) &&
      (filter.component === undefined || instance.component === filter.component) &&
      (filter.severity === undefined || instance.severity === filter.severity)
    );
  }

  /**
  * @throws NotFoundError for unknown instance ids
  */
  acknowledgeAlert(instanceId: string, acknowledgedBy: string): AlertInstance {
    const instance = this.requireInstance(instanceId);
    if (instance.status !== 'active') return instance;
    const updated: AlertInstance = Object.freeze({
      ...instance,
      status: 'acknowledged',
      acknowledgedBy,
      acknowledgedAt: this.clock.now(),
    });
    this.instances.set(instanceId, updated);
    this.emit('acknowledged', updated);
    return updated;
  }

  /**
  * @throws NotFoundError for unknown instance ids
  */
  resolveAlert(instanceId: string, resolutionMessage?: string): AlertInstance {
    const instance = this.requireInstance(instanceId);
    if (instance.status === 'resolved') return instance;
    const updated: AlertInstance = Object.freeze({
      ...instance,
      status: 'resolved',
      resolvedAt: this.clock.now(),
      resolutionMessage,
    });
    this.instances.set(instanceId, updated);
    this.emit('resolved', updated);
    return updated;
  }

  private requireInstance(instanceId: string): AlertInstance {
    const instance = this.instances.get(instanceId);
    if (!instance) {
      throw NotFoundError.alertInstance(instanceId);
    }
    return instance;
  }

  /** Keep the instance history bounded; resolved instances go first */
  private evictResolved(): void {
    if (this.instances.size <= MAX_INSTANCES) return;
    for (const [id, instance] of this.instances) {
      if (this.instances.size <= MAX_INSTANCES) return;
      if (instance.status === 'resolved') this.instances.delete(id);
    }
    for (const id of this.instances.keys()) {
      if (this.instances.size <= MAX_INSTANCES) return;
      this.instances.delete(id);
    }
  }
}
