/**
 * Telemetry Configuration Schema
 *
 * Zod schema for every option the telemetry client recognizes. Parsing
 * applies defaults; failures become a ConfigurationError at construction.
 *
 * @module @config/schema
 */

import { z } from 'zod';

// ============================================================================
// Reusable validators
// ============================================================================

/** Ordered severity levels of telemetry events */
export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL'] as const;

export const logLevelSchema = z.enum(LOG_LEVELS);

const positiveSeconds = z.number().finite().positive();
const positiveInt = z.number().int().positive();

// ============================================================================
// Telemetry schema
// ============================================================================

export const telemetryConfigSchema = z.object({
  // -- Identity --
  serviceName: z.string().min(1, { message: 'serviceName is required' }),
  environment: z.string().min(1).default('development'),

  // -- Remote sink --
  apiKey: z.string().min(1).optional(),
  projectId: z.string().min(1).optional(),
  endpoint: z.string().url().optional(),
  requestTimeoutSeconds: positiveSeconds.default(10),

  // -- Admission --
  minLogLevel: logLevelSchema.default('INFO'),
  sampleRate: z.number().min(0).max(1).default(1),
  redactKeys: z.array(z.string().min(1)).optional(),
  defaultTags: z.array(z.string().min(1)).default([]),
  enableMetadata: z.boolean().default(true),
  additionalMetadata: z.record(z.string(), z.string()).default({}),

  // -- Batching --
  batchSize: positiveInt.default(50),
  flushIntervalSeconds: positiveSeconds.default(5),
  maxQueueSize: positiveInt.default(1000),
  maxConcurrentDeliveries: positiveInt.default(2),

  // -- Delivery --
  maxRetries: z.number().int().min(0).default(3),
  initialBackoffMs: z.number().int().min(0).default(500),
  maxBackoffMs: z.number().int().min(0).default(30000),
  retryBufferSize: positiveInt.default(10),

  // -- Circuit breaker --
  failureThreshold: positiveInt.default(5),
  recoveryTimeoutSeconds: positiveSeconds.default(30),
  fallbackAfterSeconds: positiveSeconds.default(300),

  // -- Lifecycle --
  drainTimeoutSeconds: positiveSeconds.default(10),

  // -- Local sink --
  localSinkMode: z.enum(['console', 'memory']).default('console'),
  localBufferSize: positiveInt.default(1000),
}).strict().superRefine((config, ctx) => {
  if (config.maxBackoffMs < config.initialBackoffMs) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['maxBackoffMs'],
      message: 'maxBackoffMs must be >= initialBackoffMs',
    });
  }
  if (config.batchSize > config.maxQueueSize) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['batchSize'],
      message: 'batchSize must not exceed maxQueueSize',
    });
  }
});

/** Options as accepted from callers (defaults optional) */
export type TelemetryConfigInput = z.input<typeof telemetryConfigSchema>;

/** Fully-resolved configuration */
export type TelemetryConfig = z.output<typeof telemetryConfigSchema>;

export type ConfiguredLogLevel = z.infer<typeof logLevelSchema>;
