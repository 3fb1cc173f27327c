/**
 * Centralized Configuration
 *
 * @module @config
 */

export {
  getEnvVar,
  parseIntEnv,
  parseFloatEnv,
  parseBoolEnv,
  parseArrayEnv,
} from './env';

export {
  LOG_LEVELS,
  logLevelSchema,
  telemetryConfigSchema,
} from './schema';
export type { TelemetryConfig, TelemetryConfigInput, ConfiguredLogLevel } from './schema';

export {
  TELEMETRY_ENV,
  readTelemetryEnv,
  parseTelemetryConfig,
  loadTelemetryConfig,
  hasRemoteSink,
} from './telemetry';
