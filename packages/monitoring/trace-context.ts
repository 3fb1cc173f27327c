import {
  ensureExecutionContext,
  getExecutionContext,
  getOtelSpanRef,
  runInContext as runInExecutionContext,
  type SpanRef,
} from '@kernel/execution-context';
import { newSpanId, newTraceId, systemClock, type Clock } from '@kernel/clock';
import { getLogger } from '@kernel/logger';
import { getErrorMessage } from '@errors';

import { toAttributes } from './coerce';
import type { ServiceComponent, Span, SpanParent } from './types';

const logger = getLogger('trace-context');

// ============================================================================
// Propagation
// ============================================================================

export const TRACE_ID_HEADER = 'x-trace-id';
export const PARENT_SPAN_ID_HEADER = 'x-parent-span-id';

export type HeaderBag = Record<string, string | readonly string[] | undefined>;

const HEADER_ID_PATTERN = /^[A-Za-z0-9-]{1,64}$/;

/**
 * Read the propagation token from inbound headers.
 * Header names are matched case-insensitively; repeated headers use the
 * first value. Missing or malformed ids mean "start a new trace".
 */
export function extractTraceParent(headers: HeaderBag): SpanParent | undefined {
  let traceId: string | undefined;
  let spanId: string | undefined;

  for (const [name, raw] of Object.entries(headers)) {
    const value = typeof raw === 'string' ? raw : raw?.[0];
    if (value === undefined) continue;
    const lower = name.toLowerCase();
    if (lower === TRACE_ID_HEADER && traceId === undefined) traceId = value.trim();
    if (lower === PARENT_SPAN_ID_HEADER && spanId === undefined) spanId = value.trim();
  }

  if (!traceId || !spanId) return undefined;
  if (!HEADER_ID_PATTERN.test(traceId) || !HEADER_ID_PATTERN.test(spanId)) {
    logger.debug('Ignoring malformed trace headers', { traceId, spanId });
    return undefined;
  }
  return { traceId, spanId };
}

/**
 * Headers to attach to an outbound call so the callee joins this trace
 */
export function injectTraceHeaders(parent: SpanParent | undefined): Record<string, string> {
  if (!parent) return {};
  return {
    [TRACE_ID_HEADER]: parent.traceId,
    [PARENT_SPAN_ID_HEADER]: parent.spanId,
  };
}

// ============================================================================
// Manager
// ============================================================================

export interface StartSpanOptions {
  /** Explicit parent; overrides the active span of the current context */
  parent?: SpanParent | undefined;
  attributes?: Record<string, unknown> | undefined;
}

export interface EndSpanOptions {
  status?: 'ok' | 'error' | undefined;
  /** Marks the span failed and records the message */
  error?: unknown;
  attributes?: Record<string, unknown> | undefined;
}

export type SpanEndListener = (span: Readonly<Span>) => void;

/**
 * Creates, nests and closes spans.
 *
 * The active-span stack belongs to the current execution context, so
 * concurrent tasks each see only their own spans. A span started outside
 * any context enters a fresh one for the calling task, so spans opened
 * later from the same task nest under it.
 */
export class TraceContextManager {
  private readonly startedAt = new WeakMap<SpanRef, number>();

  constructor(
    private readonly clock: Clock = systemClock,
    private readonly onSpanEnd?: SpanEndListener
  ) {}

  startSpan(name: string, component: ServiceComponent, options: StartSpanOptions = {}): Span {
    const parent = options.parent ?? this.activeRef() ?? getOtelSpanRef();

    const span: Span = {
      spanId: newSpanId(),
      traceId: parent?.traceId ?? newTraceId(),
      parentSpanId: parent?.spanId,
      name,
      component,
      startTime: this.clock.now(),
      status: 'open',
      attributes: toAttributes(options.attributes),
    };

    this.startedAt.set(span, this.clock.monotonic());
    ensureExecutionContext().stack.push(span);
    return span;
  }

  /**
   * Close a span.
   * @returns false when the span was already closed (no-op)
   */
  endSpan(span: Span, options: EndSpanOptions = {}): boolean {
    if (span.endTime !== undefined || Object.isFrozen(span)) {
      return false;
    }

    const started = this.startedAt.get(span);
    const failed = options.error !== undefined || options.status === 'error';

    span.endTime = this.clock.now();
    span.durationMs = started !== undefined
      ? Math.max(0, this.clock.monotonic() - started)
      : Math.max(0, span.endTime - span.startTime);
    span.status = failed ? 'error' : 'ok';
    if (options.error !== undefined) {
      span.errorMessage = getErrorMessage(options.error);
      span.attributes['error_type'] = options.error instanceof Error ? options.error.name : typeof options.error;
    }
    Object.assign(span.attributes, toAttributes(options.attributes));

    this.removeFromStack(span);
    this.startedAt.delete(span);
    Object.freeze(span.attributes);
    Object.freeze(span);

    if (this.onSpanEnd) {
      try {
        this.onSpanEnd(span);
      } catch (err) {
        logger.error('Span end listener failed', err, { spanId: span.spanId });
      }
    }
    return true;
  }

  /**
   * Innermost open span of the current context
   */
  currentSpan(): Span | undefined {
    const ref = this.activeRef();
    if (!ref || !this.startedAt.has(ref)) return undefined;
    return this.isSpan(ref) ? ref : undefined;
  }

  /**
   * Propagation token of the current context: its active span, or the
   * parent the context was started with
   */
  currentParent(): SpanParent | undefined {
    const ref = this.activeRef();
    return ref ? { traceId: ref.traceId, spanId: ref.spanId } : undefined;
  }

  /**
   * Run `fn` in a fresh execution context.
   * Spans opened inside are invisible to the caller and to sibling tasks.
   */
  runInContext<T>(fn: () => T, parent?: SpanParent): T {
    return runInExecutionContext(fn, parent);
  }

  /**
   * Run `fn` inside a new span that is closed when `fn` returns, throws or
   * settles. Errors are recorded on the span and re-thrown.
   */
  withSpan<T>(
    name: string,
    component: ServiceComponent,
    fn: (span: Span) => T,
    options: StartSpanOptions = {}
  ): T {
    return runInExecutionContext(() => {
      const span = this.startSpan(name, component, options);
      let result: T;
      try {
        result = fn(span);
      } catch (err) {
        this.endSpan(span, { error: err });
        throw err;
      }
      if (isPromiseLike(result)) {
        // Keep the caller's promise type; the span closes when it settles
        void result.then(
          () => { this.endSpan(span); },
          (err: unknown) => { this.endSpan(span, { error: err }); }
        );
        return result;
      }
      this.endSpan(span);
      return result;
    });
  }

  /**
   * Top of the context stack, discarding spans that were closed from
   * another context
   */
  private activeRef(): SpanRef | undefined {
    const stack = getExecutionContext()?.stack;
    while (stack && stack.length > 0) {
      const top = stack[stack.length - 1];
      if (top && this.isSpan(top) && top.endTime !== undefined) {
        stack.pop();
        continue;
      }
      return top;
    }
    return undefined;
  }

  private isSpan(ref: SpanRef): ref is Span {
    return 'name' in ref && 'startTime' in ref;
  }

  private removeFromStack(span: Span): void {
    const stack = getExecutionContext()?.stack;
    if (!stack) return;

    const index = stack.lastIndexOf(span);
    if (index === -1) return;

    if (index !== stack.length - 1) {
      logger.warn('Span ended out of order', {
        spanId: span.spanId,
        name: span.name,
        openAbove: stack.length - 1 - index,
      });
    }
    stack.splice(index, 1);
  }
}

export function isPromiseLike<T>(value: T): value is T & PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}
