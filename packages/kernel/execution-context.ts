import { randomUUID } from 'crypto';

import { AsyncLocalStorage } from 'async_hooks';
import { context as otelContext, trace } from '@opentelemetry/api';

/**
* Execution Context Module
*
* Each logical task (request handler, job, background loop) runs inside its
* own execution context. The context carries the stack of spans that are
* active for that task, so concurrent tasks never observe each other's spans.
*/

export interface SpanRef {
  traceId: string;
  spanId: string;
}

export interface ExecutionContext {
  contextId: string;
  /** Active spans, innermost last */
  stack: SpanRef[];
  startTime: number;
}

const asyncLocalStorage = new AsyncLocalStorage<ExecutionContext>();

/**
* Storage instance for the execution context
* Exported for advanced use cases
*/
export const executionContextStorage = asyncLocalStorage;

/**
* Get current execution context
* @returns Current context or undefined when called outside of one
*/
export function getExecutionContext(): ExecutionContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
* Run a function in a new execution context.
*
* The new context starts with a copy of the caller's span stack (or the
* given parent), so spans opened inside never leak back to the caller.
*/
export function runInContext<T>(fn: () => T, parent?: SpanRef): T {
  const current = asyncLocalStorage.getStore();
  const stack = parent ? [parent] : [...(current?.stack ?? [])];
  const ctx: ExecutionContext = {
    contextId: randomUUID(),
    stack,
    startTime: Date.now(),
  };
  return asyncLocalStorage.run(ctx, fn);
}

/**
* Current execution context, entering a fresh one when there is none.
*
* The new context is bound to the rest of the current synchronous run and
* to the async work it starts, so later calls from the same task share it
* while other tasks keep their own.
*/
export function ensureExecutionContext(): ExecutionContext {
  const current = asyncLocalStorage.getStore();
  if (current) return current;
  const ctx: ExecutionContext = {
    contextId: randomUUID(),
    stack: [],
    startTime: Date.now(),
  };
  asyncLocalStorage.enterWith(ctx);
  return ctx;
}

/**
* Innermost active span of the current context
*/
export function getActiveSpanRef(): SpanRef | undefined {
  const stack = asyncLocalStorage.getStore()?.stack;
  if (!stack || stack.length === 0) return undefined;
  return stack[stack.length - 1];
}

/**
* Trace/span IDs of the active OpenTelemetry span, when a host application
* registered a tracer provider. Returns undefined otherwise.
*/
export function getOtelSpanRef(): SpanRef | undefined {
  try {
    const activeSpan = trace.getSpan(otelContext.active());
    if (!activeSpan) return undefined;
    const spanCtx = activeSpan.spanContext();
    if (!trace.isSpanContextValid(spanCtx)) return undefined;
    return { traceId: spanCtx.traceId, spanId: spanCtx.spanId };
  } catch {
    // OTel API present but no usable context manager
    return undefined;
  }
}
