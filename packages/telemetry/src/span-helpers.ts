/**
 * Span helper utilities for span creation with error handling.
 *
 * Wraps OpenTelemetry's tracer.startActiveSpan with automatic:
 * - Attribute setting
 * - Error recording + status propagation
 * - Span ending (even on error)
 *
 * When no tracer provider is registered the function still runs with a
 * no-op span.
 */

import { type Span, SpanStatusCode, trace } from "@opentelemetry/api";
import type { SpanAttributes } from "./types.js";

const TRACER_NAME = "lazymod";

function setAttributes(span: Span, attributes: SpanAttributes): void {
  for (const [key, value] of Object.entries(attributes)) {
    span.setAttribute(key, value);
  }
}

function recordFailure(span: Span, error: unknown): void {
  if (error instanceof Error) {
    span.recordException(error);
  }
  span.setStatus({
    code: SpanStatusCode.ERROR,
    message: error instanceof Error ? error.message : String(error),
  });
}

/**
 * Execute an async function within a named OTel span.
 *
 * @param name - Span name (e.g., "lazymod.module.evaluate")
 * @param attributes - Key-value pairs to set on the span
 * @param fn - Async function to execute within the span
 * @throws Re-throws any error from fn after recording it on the span
 */
export async function withSpan<T>(
  name: string,
  attributes: SpanAttributes,
  fn: () => Promise<T>,
): Promise<T> {
  const tracer = trace.getTracer(TRACER_NAME);
  return tracer.startActiveSpan(name, async (span) => {
    try {
      setAttributes(span, attributes);
      const result = await fn();
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      recordFailure(span, error);
      throw error;
    } finally {
      span.end();
    }
  });
}

/**
 * Synchronous counterpart of {@link withSpan}. The span is ended before
 * this returns, so `fn` must not hand back work that is still running.
 */
export function withSpanSync<T>(name: string, attributes: SpanAttributes, fn: () => T): T {
  const tracer = trace.getTracer(TRACER_NAME);
  return tracer.startActiveSpan(name, (span) => {
    try {
      setAttributes(span, attributes);
      const result = fn();
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      recordFailure(span, error);
      throw error;
    } finally {
      span.end();
    }
  });
}
