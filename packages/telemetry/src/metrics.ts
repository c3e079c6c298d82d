/**
 * OTel metrics for module evaluation.
 *
 * Lazily initialized; instruments are only created on first access.
 * When no meter provider is registered, these return no-op instruments.
 */

import type { Counter, Histogram } from "@opentelemetry/api";
import { metrics } from "@opentelemetry/api";

const METER_NAME = "lazymod";

let _moduleEvaluations: Counter | undefined;
let _evaluationLatency: Histogram | undefined;

/**
 * Counter of module definition evaluations, tagged with mode and outcome.
 */
export function getModuleEvaluations(): Counter {
  if (_moduleEvaluations === undefined) {
    _moduleEvaluations = metrics.getMeter(METER_NAME).createCounter("lazymod.module.evaluations", {
      description: "Total module definition evaluations",
    });
  }
  return _moduleEvaluations;
}

/**
 * Histogram of module evaluation time in milliseconds.
 */
export function getEvaluationLatency(): Histogram {
  if (_evaluationLatency === undefined) {
    _evaluationLatency = metrics
      .getMeter(METER_NAME)
      .createHistogram("lazymod.module.evaluation_ms", {
        description: "Module evaluation latency in milliseconds",
        unit: "ms",
      });
  }
  return _evaluationLatency;
}
