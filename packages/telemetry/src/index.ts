/**
 * @lazymod/telemetry: OpenTelemetry tracing and metrics helpers.
 *
 * Public API:
 * - withSpan() / withSpanSync(): span creation helpers
 * - getModuleEvaluations() / getEvaluationLatency(): OTel metrics
 */

export { SpanStatusCode, trace } from "@opentelemetry/api";
export { getEvaluationLatency, getModuleEvaluations } from "./metrics.js";
export { withSpan, withSpanSync } from "./span-helpers.js";
export type { SpanAttributes, SpanAttributeValue } from "./types.js";
