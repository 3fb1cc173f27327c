/**
 * Monitor Lifecycle
 *
 * There is no process-wide monitor: callers create one, pass the handle to
 * whatever needs it and shut it down when the process stops.
 */

import {
  loadTelemetryConfig,
  parseTelemetryConfig,
  type TelemetryConfigInput,
} from '@config';
import { getLogger } from '@kernel/logger';

import type { ShutdownReport } from './batch-engine';
import { Monitor, type MonitorDependencies } from './monitor';

const logger = getLogger('monitoring-init');

/**
 * Validate the configuration and start a monitor
 * @throws ConfigurationError when the configuration is invalid
 */
export function initMonitor(config: TelemetryConfigInput, deps?: MonitorDependencies): Monitor {
  return new Monitor(parseTelemetryConfig(config), deps);
}

/**
 * Start a monitor configured from TELEMETRY_* environment variables, with
 * explicit overrides taking precedence.
 * Without a write token and endpoint the monitor runs on the local sink.
 * @throws ConfigurationError
 */
export function createMonitorFromEnv(
  overrides: Partial<TelemetryConfigInput> = {},
  deps?: MonitorDependencies
): Monitor {
  return new Monitor(loadTelemetryConfig(overrides), deps);
}

/**
 * Stop a monitor. Never rejects.
 */
export async function shutdownMonitor(monitor: Monitor): Promise<ShutdownReport> {
  try {
    return await monitor.shutdown();
  } catch (error) {
    logger.error('Telemetry shutdown failed', error);
    return { drained: false, fallbackItems: 0 };
  }
}

/**
 * Shut the monitor down on SIGTERM and SIGINT.
 * @returns Function that removes the handlers
 */
export function registerShutdownHandlers(
  monitor: Monitor,
  signals: readonly NodeJS.Signals[] = ['SIGTERM', 'SIGINT']
): () => void {
  const handler = (signal: NodeJS.Signals): void => {
    logger.info(`Received ${signal}, flushing telemetry`);
    void shutdownMonitor(monitor);
  };
  for (const signal of signals) {
    process.once(signal, handler);
  }
  return () => {
    for (const signal of signals) {
      process.removeListener(signal, handler);
    }
  };
}
