export const PACKAGE_NAME = "@lazymod/registry" as const;

// Config
export { resolveRegistryConfig } from "./config.js";
// Constants
export {
  DEFAULT_FAILURE_POLICY,
  DEFAULT_LOG_LEVEL,
  DEFAULT_REGISTRY_NAME,
  EVALUATE_SPAN_NAME,
} from "./constants.js";
// Loaders
export { importDefault, importModule } from "./loaders.js";
// Logging
export { createConsoleLogger } from "./logger.js";
// Registry
export { createModuleRegistry, ModuleRegistry } from "./registry.js";
// Type guards
export { isPromiseLike } from "./type-guards.js";
// Types
export type {
  EvaluationOutcome,
  FailurePolicy,
  LogLevel,
  ModuleDefinition,
  ModuleDefinitions,
  ModuleLocator,
  ModuleName,
  ModuleRegistryConfig,
  ModuleStatus,
  RegistryLogger,
  ResolutionFailure,
  ResolutionMode,
  ResolutionState,
  ResolvedRegistryConfig,
} from "./types.js";
