/**
 * Trace Context Module
 *
 * AsyncLocalStorage-based context so every log line written while handling one
 * mention (or one reminder firing) carries the same traceId without threading it
 * through every call.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

/**
 * Trace context for one unit of work.
 */
export interface TraceContext {
  /** Root trace ID - the triggering chat message ID, or a generated job ID */
  traceId: string;
  /** What started the work ("turn", "reminder", "recovery") */
  origin: string;
  /** Current span ID */
  spanId: string;
}

const asyncLocalStorage = new AsyncLocalStorage<TraceContext>();

/**
 * Run a function with trace context.
 * All descendant async operations inherit this context automatically.
 */
export function withTraceContext<T>(context: TraceContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Get the current trace context (if any).
 */
export function getTraceContext(): TraceContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
 * Create a new trace context. When no ID is given a random one is generated.
 */
export function createTraceContext(origin: string, id?: string): TraceContext {
  return {
    traceId: id ?? randomUUID(),
    origin,
    spanId: randomUUID().slice(0, 8),
  };
}
