import type { FailurePolicy, LogLevel } from "./types.js";

export const DEFAULT_REGISTRY_NAME = "default";

export const DEFAULT_FAILURE_POLICY: FailurePolicy = "cache";

export const DEFAULT_LOG_LEVEL: LogLevel = "warn";

export const EVALUATE_SPAN_NAME = "lazymod.module.evaluate";

export const LOG_TAG = "ModuleRegistry";
