/**
* Unified Error Handling Package
*
* Error classes and machine-readable codes shared by every telemetry package.
*
* Producer-facing calls (logging, metrics, spans) never surface these to the
* caller; they are thrown from configuration and management APIs and used
* internally by the delivery pipeline to classify failures.
*/

// ============================================================================
// Error Code Constants
// ============================================================================

export const ErrorCodes = {
  // Validation / configuration
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',

  // Resources
  NOT_FOUND: 'NOT_FOUND',
  ALERT_NOT_FOUND: 'ALERT_NOT_FOUND',
  ALERT_INSTANCE_NOT_FOUND: 'ALERT_INSTANCE_NOT_FOUND',
  CONFLICT: 'CONFLICT',

  // Delivery
  DELIVERY_FAILED: 'DELIVERY_FAILED',
  TRANSPORT_ERROR: 'TRANSPORT_ERROR',

  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

export interface SerializedError {
  error: string;
  code: ErrorCode;
  details?: unknown;
}

// ============================================================================
// Base Application Error Class
// ============================================================================

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: unknown;

  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.INTERNAL_ERROR,
    details?: unknown,
    options?: { cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = this.constructor.name;
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): SerializedError {
    return {
      error: this.message,
      code: this.code,
      ...(this.details !== undefined && { details: this.details }),
    };
  }
}

// ============================================================================
// Specific Error Classes
// ============================================================================

export interface ValidationIssue {
  path: PropertyKey[];
  message: string;
  code: string;
}

export class ValidationError extends AppError {
  constructor(
    message: string = 'Validation failed',
    details?: unknown,
    code: ErrorCode = ErrorCodes.VALIDATION_ERROR
  ) {
    super(message, code, details);
  }

  static fromZodIssues(issues: ReadonlyArray<ValidationIssue>): ValidationError {
    return new ValidationError('Validation failed', mapIssues(issues));
  }
}

/**
* Invalid telemetry configuration. Raised synchronously at construction time.
*/
export class ConfigurationError extends ValidationError {
  constructor(message: string = 'Invalid telemetry configuration', details?: unknown) {
    super(message, details, ErrorCodes.CONFIGURATION_ERROR);
  }

  static fromZodIssues(issues: ReadonlyArray<ValidationIssue>): ConfigurationError {
    const mapped = mapIssues(issues);
    const summary = mapped
      .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    return new ConfigurationError(`Invalid telemetry configuration: ${summary}`, mapped);
  }
}

function mapIssues(issues: ReadonlyArray<ValidationIssue>): Array<{ path: string[]; message: string; code: string }> {
  return issues.map(issue => ({
    path: issue.path.map(segment => String(segment)),
    message: issue.message,
    code: issue.code,
  }));
}

export class NotFoundError extends AppError {
  constructor(
    resource: string = 'Resource',
    id?: string,
    code: ErrorCode = ErrorCodes.NOT_FOUND
  ) {
    super(id ? `${resource} not found: ${id}` : `${resource} not found`, code, id ? { id } : undefined);
  }

  static alert(alertId: string): NotFoundError {
    return new NotFoundError('Alert', alertId, ErrorCodes.ALERT_NOT_FOUND);
  }

  static alertInstance(instanceId: string): NotFoundError {
    return new NotFoundError('Alert instance', instanceId, ErrorCodes.ALERT_INSTANCE_NOT_FOUND);
  }
}

export class ConflictError extends AppError {
  constructor(message: string = 'Resource conflict', details?: unknown) {
    super(message, ErrorCodes.CONFLICT, details);
  }
}

/**
* Failure reported by a sink or raised while talking to it.
* `retryable` separates transient failures (timeouts, 5xx, 429) from
* permanent ones (malformed payload, rejected credentials).
*/
export class DeliveryError extends AppError {
  public readonly retryable: boolean;
  public readonly statusCode: number | undefined;

  constructor(
    message: string,
    options: { retryable: boolean; statusCode?: number | undefined; code?: ErrorCode; cause?: unknown }
  ) {
    super(
      message,
      options.code ?? (options.retryable ? ErrorCodes.TRANSPORT_ERROR : ErrorCodes.DELIVERY_FAILED),
      options.statusCode !== undefined ? { statusCode: options.statusCode } : undefined,
      { cause: options.cause }
    );
    this.retryable = options.retryable;
    this.statusCode = options.statusCode;
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
* Get a printable message from any thrown value
*/
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
