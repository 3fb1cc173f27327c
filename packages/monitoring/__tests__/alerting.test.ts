import { beforeEach, describe, expect, it, vi } from 'vitest';

import { ConflictError, NotFoundError, ValidationError } from '@errors';

import { AlertRegistry, evaluateCondition, parseCondition, type AlertInstance } from '../alerting';
import { ManualClock } from '../../../test/utils/fake-clock';

describe('parseCondition', () => {
  it('parses metric comparisons', () => {
    expect(parseCondition('cpu_usage_percent > 90')).toEqual({ metric: 'cpu_usage_percent', operator: '>', threshold: 90 });
    expect(parseCondition('error.rate>=0.05')).toEqual({ metric: 'error.rate', operator: '>=', threshold: 0.05 });
    expect(parseCondition('queue_depth == -1')).toEqual({ metric: 'queue_depth', operator: '==', threshold: -1 });
  });

  it('returns undefined for free-form conditions', () => {
    expect(parseCondition('error rate is high')).toBeUndefined();
    expect(parseCondition('latency > fast')).toBeUndefined();
  });

  it('evaluates each operator', () => {
    expect(evaluateCondition(5, { metric: 'm', operator: '<', threshold: 6 })).toBe(true);
    expect(evaluateCondition(6, { metric: 'm', operator: '<=', threshold: 6 })).toBe(true);
    expect(evaluateCondition(6, { metric: 'm', operator: '>', threshold: 6 })).toBe(false);
  });
});

describe('AlertRegistry', () => {
  let clock: ManualClock;
  let registry: AlertRegistry;

  beforeEach(() => {
    clock = new ManualClock();
    registry = new AlertRegistry(clock);
  });

  function createCpuAlert(cooldownSeconds = 60): void {
    registry.createAlert({
      alertId: 'cpu-high',
      name: 'CPU high',
      component: 'infrastructure',
      condition: 'cpu_usage_percent > 90',
      severity: 'ERROR',
      cooldownSeconds,
      tags: ['capacity'],
    });
  }

  it('creates alerts with defaults', () => {
    const alert = registry.createAlert({ name: 'Errors', component: 'api_gateway', condition: 'errors > 0' });

    expect(alert.alertId).toMatch(/^alert_[0-9a-f]{16}$/);
    expect(alert).toMatchObject({
      description: '',
      severity: 'WARNING',
      notificationChannels: [],
      cooldownSeconds: 300,
      enabled: true,
      createdAt: clock.now(),
    });
    expect(Object.isFrozen(alert)).toBe(true);
  });

  it('rejects malformed and duplicate alerts', () => {
    createCpuAlert();

    expect(() => registry.createAlert({ name: '', component: 'system', condition: 'x > 1' })).toThrow(ValidationError);
    expect(() => createCpuAlert()).toThrow(ConflictError);
  });

  it('raises an instance when a metric crosses the threshold', () => {
    createCpuAlert();
    const triggered = vi.fn();
    registry.on('triggered', triggered);

    expect(registry.evaluateMetric('cpu_usage_percent', 85)).toEqual([]);
    const [instance] = registry.evaluateMetric('cpu_usage_percent', 97.5);

    expect(instance).toMatchObject({
      alertId: 'cpu-high',
      status: 'active',
      value: 97.5,
      severity: 'ERROR',
      component: 'infrastructure',
      message: 'CPU high: cpu_usage_percent > 90 (value 97.5)',
      metadata: { metric: 'cpu_usage_percent', threshold: 90 },
    });
    expect(triggered).toHaveBeenCalledWith(instance, registry.getAlert('cpu-high'));
  });

  it('ignores metrics the condition does not name', () => {
    createCpuAlert();

    expect(registry.evaluateMetric('memory_usage_percent', 99)).toEqual([]);
  });

  it('suppresses repeats inside the cooldown window', () => {
    createCpuAlert(60);

    expect(registry.triggerAlert('cpu-high', 95)).toBeDefined();
    clock.advance(59_000);
    expect(registry.triggerAlert('cpu-high', 96)).toBeUndefined();
    clock.advance(1_000);
    expect(registry.triggerAlert('cpu-high', 97)).toBeDefined();
    expect(registry.getAlertInstances({ alertId: 'cpu-high' })).toHaveLength(2);
  });

  it('does not trigger disabled alerts', () => {
    createCpuAlert();
    registry.updateAlert('cpu-high', { enabled: false });

    expect(registry.triggerAlert('cpu-high', 99)).toBeUndefined();
    expect(registry.evaluateMetric('cpu_usage_percent', 99)).toEqual([]);
  });

  it('updates only the given fields', () => {
    createCpuAlert();
    clock.advance(5_000);

    const updated = registry.updateAlert('cpu-high', { condition: 'cpu_usage_percent > 80', notificationChannels: ['pager'] });

    expect(updated).toMatchObject({
      name: 'CPU high',
      condition: 'cpu_usage_percent > 80',
      notificationChannels: ['pager'],
      tags: ['capacity'],
      updatedAt: clock.now(),
    });
    expect(updated.createdAt).toBe(clock.now() - 5_000);
    expect(() => registry.updateAlert('missing', { enabled: false })).toThrow(NotFoundError);
    expect(() => registry.updateAlert('cpu-high', { cooldownSeconds: -1 })).toThrow(ValidationError);
  });

  it('filters alerts', () => {
    createCpuAlert();
    registry.createAlert({ alertId: 'db', name: 'DB', component: 'database', condition: 'db_errors > 0', enabled: false });

    expect(registry.getAlerts({ component: 'database' }).map(alert => alert.alertId)).toEqual(['db']);
    expect(registry.getAlerts({ enabled: true }).map(alert => alert.alertId)).toEqual(['cpu-high']);
    expect(registry.getAlerts({ tag: 'capacity' }).map(alert => alert.alertId)).toEqual(['cpu-high']);
  });

  it('deletes alerts', () => {
    createCpuAlert();

    expect(registry.deleteAlert('cpu-high')).toBe(true);
    expect(registry.deleteAlert('cpu-high')).toBe(false);
    expect(() => registry.triggerAlert('cpu-high', 1)).toThrow(NotFoundError);
  });

  it('moves instances through acknowledge and resolve', () => {
    createCpuAlert();
    const events: Array<[string, AlertInstance]> = [];
    registry.on('acknowledged', (instance: AlertInstance) => events.push(['acknowledged', instance]));
    registry.on('resolved', (instance: AlertInstance) => events.push(['resolved', instance]));
    const raised = registry.triggerAlert('cpu-high', 95);
    if (!raised) throw new Error('expected an instance');

    clock.advance(1_000);
    const acknowledged = registry.acknowledgeAlert(raised.instanceId, 'oncall');
    clock.advance(1_000);
    const resolved = registry.resolveAlert(raised.instanceId, 'scaled out');

    expect(acknowledged).toMatchObject({ status: 'acknowledged', acknowledgedBy: 'oncall', acknowledgedAt: raised.triggeredAt + 1_000 });
    expect(resolved).toMatchObject({ status: 'resolved', resolutionMessage: 'scaled out', resolvedAt: raised.triggeredAt + 2_000 });
    expect(registry.acknowledgeAlert(raised.instanceId, 'late')).toBe(resolved);
    expect(events.map(([name]) => name)).toEqual(['acknowledged', 'resolved']);
    expect(registry.getAlertInstances({ status: 'resolved' })).toEqual([resolved]);
    expect(() => registry.resolveAlert('alertinst_missing')).toThrow(NotFoundError);
  });
});
