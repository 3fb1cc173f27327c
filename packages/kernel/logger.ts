import { getActiveSpanRef, getExecutionContext } from './execution-context';
import { sanitizeRecord } from './redaction';

/**
* Structured Logger
*
* Internal diagnostics for the telemetry client. Entries are JSON lines on
* stderr by default so that a host CLI's stdout is never polluted. The active
* trace and span of the current execution context are attached to every entry.
*/

// ============================================================================
// Type Definitions
// ============================================================================

/** Available log levels */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/** Levels accepted in LOG_LEVEL; `silent` turns the logger off */
export type LogThreshold = LogLevel | 'silent';

export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  service: string;
  contextId?: string | undefined;
  traceId?: string | undefined;
  spanId?: string | undefined;
  errorMessage?: string | undefined;
  errorStack?: string | undefined;
  metadata?: Record<string, unknown> | undefined;
}

export type LogHandler = (entry: LogEntry) => void;

// ============================================================================
// Handlers
// ============================================================================

let handlers: LogHandler[] = [];

/**
* Default console handler.
* Writes one JSON object per line to stderr.
*/
export function consoleHandler(entry: LogEntry): void {
  const { level, message, service, contextId, traceId, spanId, errorMessage, errorStack, metadata } = entry;

  const logOutput: Record<string, unknown> = {
    timestamp: entry.timestamp,
    level: level.toUpperCase(),
    service,
    message,
  };

  if (contextId) logOutput['contextId'] = contextId;
  if (traceId) logOutput['traceId'] = traceId;
  if (spanId) logOutput['spanId'] = spanId;
  if (errorMessage) logOutput['error'] = errorMessage;
  if (errorStack && getConfiguredLogLevel() === 'debug') logOutput['stack'] = errorStack;
  if (metadata && Object.keys(metadata).length > 0) {
    logOutput['metadata'] = sanitizeRecord(metadata);
  }

  console.error(JSON.stringify(logOutput));
}

/**
* Add a log handler
* @returns Function that removes the handler again
*/
export function addLogHandler(handler: LogHandler): () => void {
  handlers = [...handlers, handler];
  return () => {
    handlers = handlers.filter(h => h !== handler);
  };
}

/**
* Remove all log handlers, including the console handler
*/
export function clearLogHandlers(): void {
  handlers = [];
}

/**
* Restore the default console handler as the only handler
*/
export function resetLogHandlers(): void {
  handlers = [consoleHandler];
}

resetLogHandlers();

// ============================================================================
// Log Level Configuration
// ============================================================================

const LEVEL_ORDER: readonly LogThreshold[] = ['debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLogThreshold(value: string): value is LogThreshold {
  return LEVEL_ORDER.some(level => level === value);
}

/**
* Get configured log level from LOG_LEVEL.
* Defaults to 'info' in production, 'debug' elsewhere.
*/
export function getConfiguredLogLevel(): LogThreshold {
  const envLevel = process.env['LOG_LEVEL']?.toLowerCase();
  if (envLevel && isLogThreshold(envLevel)) {
    return envLevel;
  }
  return process.env['NODE_ENV'] === 'production' ? 'info' : 'debug';
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(getConfiguredLogLevel());
}

// ============================================================================
// Logger Class
// ============================================================================

/**
* Logger instance bound to a service name and optional static context
*/
export class Logger {
  private readonly context: Record<string, unknown>;

  constructor(
    private readonly service: string,
    context?: Record<string, unknown>
  ) {
    this.context = context ?? {};
  }

  private emit(level: LogLevel, message: string, metadata?: Record<string, unknown>, err?: unknown): void {
    if (!shouldLog(level)) return;

    const ctx = getExecutionContext();
    const span = getActiveSpanRef();
    const merged = { ...this.context, ...metadata };

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: `[${this.service}] ${message}`,
      service: this.service,
      metadata: Object.keys(merged).length > 0 ? merged : undefined,
    };

    if (ctx) entry.contextId = ctx.contextId;
    if (span) {
      entry.traceId = span.traceId;
      entry.spanId = span.spanId;
    }
    if (err instanceof Error) {
      entry.errorMessage = err.message;
      entry.errorStack = err.stack;
    } else if (err !== undefined) {
      entry.errorMessage = String(err);
    }

    for (const handler of handlers) {
      try {
        handler(entry);
      } catch (handlerError) {
        // A broken handler must not break the caller; report on the raw console
        console.error('[logger] handler failed:', handlerError instanceof Error ? handlerError.message : String(handlerError));
      }
    }
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.emit('debug', message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.emit('info', message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.emit('warn', message, metadata);
  }

  /**
  * Log at error level
  * @param err - Optional error; its message and stack are attached
  */
  error(message: string, err?: unknown, metadata?: Record<string, unknown>): void {
    this.emit('error', message, metadata, err);
  }

  fatal(message: string, err?: unknown, metadata?: Record<string, unknown>): void {
    this.emit('fatal', message, metadata, err);
  }

  /**
  * Create a child logger with additional context
  */
  child(additionalContext: Record<string, unknown>): Logger {
    return new Logger(this.service, { ...this.context, ...additionalContext });
  }
}

/**
* Get logger for a service or component name
*/
export function getLogger(service: string, context?: Record<string, unknown>): Logger {
  return new Logger(service, context);
}
