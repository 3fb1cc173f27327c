/**
 * Telemetry configuration loading.
 *
 * Precedence: explicit options > TELEMETRY_* environment variables > schema
 * defaults.
 */

import { ConfigurationError } from '@errors';
import { getLogger } from '@kernel/logger';

import { getEnvVar, parseArrayEnv, parseBoolEnv, parseFloatEnv, parseIntEnv } from './env';
import {
  logLevelSchema,
  telemetryConfigSchema,
  type ConfiguredLogLevel,
  type TelemetryConfig,
  type TelemetryConfigInput,
} from './schema';

const logger = getLogger('config');

/** Environment variables read by {@link readTelemetryEnv} */
export const TELEMETRY_ENV = {
  writeToken: 'TELEMETRY_WRITE_TOKEN',
  projectId: 'TELEMETRY_PROJECT_ID',
  endpoint: 'TELEMETRY_ENDPOINT',
  serviceName: 'TELEMETRY_SERVICE_NAME',
  environment: 'TELEMETRY_ENVIRONMENT',
  minLogLevel: 'TELEMETRY_MIN_LOG_LEVEL',
  batchSize: 'TELEMETRY_BATCH_SIZE',
  flushIntervalSeconds: 'TELEMETRY_FLUSH_INTERVAL_SECONDS',
  sampleRate: 'TELEMETRY_SAMPLE_RATE',
  maxRetries: 'TELEMETRY_MAX_RETRIES',
  enableMetadata: 'TELEMETRY_ENABLE_METADATA',
  defaultTags: 'TELEMETRY_DEFAULT_TAGS',
} as const;

function readLogLevelEnv(name: string): ConfiguredLogLevel | undefined {
  const value = getEnvVar(name);
  if (value === undefined) return undefined;
  const parsed = logLevelSchema.safeParse(value.toUpperCase());
  if (!parsed.success) {
    logger.warn('Ignoring unknown log level', { name, value });
    return undefined;
  }
  return parsed.data;
}

/**
 * Read telemetry options from the environment.
 * Only variables that are set appear in the result.
 */
export function readTelemetryEnv(): Partial<TelemetryConfigInput> {
  const env: Partial<TelemetryConfigInput> = {};

  const apiKey = getEnvVar(TELEMETRY_ENV.writeToken);
  if (apiKey !== undefined) env.apiKey = apiKey;
  const projectId = getEnvVar(TELEMETRY_ENV.projectId);
  if (projectId !== undefined) env.projectId = projectId;
  const endpoint = getEnvVar(TELEMETRY_ENV.endpoint);
  if (endpoint !== undefined) env.endpoint = endpoint;

  const serviceName = getEnvVar(TELEMETRY_ENV.serviceName) ?? getEnvVar('SERVICE_NAME');
  if (serviceName !== undefined) env.serviceName = serviceName;
  const environment = getEnvVar(TELEMETRY_ENV.environment) ?? getEnvVar('ENVIRONMENT');
  if (environment !== undefined) env.environment = environment;

  const minLogLevel = readLogLevelEnv(TELEMETRY_ENV.minLogLevel);
  if (minLogLevel !== undefined) env.minLogLevel = minLogLevel;
  const batchSize = parseIntEnv(TELEMETRY_ENV.batchSize);
  if (batchSize !== undefined) env.batchSize = batchSize;
  const flushIntervalSeconds = parseFloatEnv(TELEMETRY_ENV.flushIntervalSeconds);
  if (flushIntervalSeconds !== undefined) env.flushIntervalSeconds = flushIntervalSeconds;
  const sampleRate = parseFloatEnv(TELEMETRY_ENV.sampleRate);
  if (sampleRate !== undefined) env.sampleRate = sampleRate;
  const maxRetries = parseIntEnv(TELEMETRY_ENV.maxRetries);
  if (maxRetries !== undefined) env.maxRetries = maxRetries;
  const enableMetadata = parseBoolEnv(TELEMETRY_ENV.enableMetadata);
  if (enableMetadata !== undefined) env.enableMetadata = enableMetadata;
  const defaultTags = parseArrayEnv(TELEMETRY_ENV.defaultTags);
  if (defaultTags !== undefined) env.defaultTags = defaultTags;

  return env;
}

/**
 * Validate options and apply defaults.
 * @throws ConfigurationError listing every invalid option
 */
export function parseTelemetryConfig(input: TelemetryConfigInput): TelemetryConfig {
  const result = telemetryConfigSchema.safeParse(input);
  if (!result.success) {
    throw ConfigurationError.fromZodIssues(result.error.issues);
  }
  return result.data;
}

/**
 * Build the configuration from the environment plus explicit options
 * @throws ConfigurationError
 */
export function loadTelemetryConfig(overrides: Partial<TelemetryConfigInput> = {}): TelemetryConfig {
  const merged = { ...readTelemetryEnv(), ...overrides };
  if (merged.serviceName === undefined) {
    throw new ConfigurationError(
      `Invalid telemetry configuration: serviceName is required (set it or ${TELEMETRY_ENV.serviceName})`,
    );
  }
  return parseTelemetryConfig({ ...merged, serviceName: merged.serviceName });
}

/**
 * Whether the configuration names a remote backend
 */
export function hasRemoteSink(config: TelemetryConfig): boolean {
  return config.endpoint !== undefined && config.apiKey !== undefined;
}
