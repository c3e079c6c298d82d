import type { CircularResolutionError, DefinitionEvaluationError } from "@lazymod/errors";

/** Unique key into the registry. */
export type ModuleName = string;

/**
 * Zero-argument factory producing a module's exported value.
 *
 * Returning a promise-like value marks the definition as asynchronous;
 * such modules can only be produced through `importAsync`.
 */
export type ModuleDefinition<T = unknown> = () => T | PromiseLike<T>;

/**
 * Cached failure of a module. Definition errors are wrapped; a circular
 * request surfacing from inside the definition is kept as-is.
 */
export type ResolutionFailure = DefinitionEvaluationError | CircularResolutionError;

/** Settled result of one evaluation, shared by every waiter. */
export type EvaluationOutcome =
  | { readonly ok: true; readonly value: unknown }
  | { readonly ok: false; readonly error: ResolutionFailure };

/**
 * Per-module resolution state. A module with no record is unregistered.
 *
 * `evaluating` only exists while `importSync` runs the factory and is
 * never observable from outside that call stack.
 */
export type ResolutionState =
  | { readonly status: "registered" }
  | { readonly status: "evaluating" }
  | { readonly status: "pending"; readonly outcome: Promise<EvaluationOutcome> }
  | { readonly status: "resolved"; readonly value: unknown }
  | { readonly status: "failed"; readonly error: ResolutionFailure };

/** Public view of a module's state. */
export type ModuleStatus = ResolutionState["status"] | "unregistered";

/** Which entry point started an evaluation. */
export type ResolutionMode = "sync" | "async";

/** Internal registry entry */
export interface ModuleRecord {
  readonly definition: ModuleDefinition;
  state: ResolutionState;
}

/** What happens to a module whose definition failed. */
export type FailurePolicy = "cache" | "evict";

export type LogLevel = "silent" | "warn" | "debug";

/** Sink for registry diagnostics. */
export interface RegistryLogger {
  debug(message: string): void;
  warn(message: string, error?: unknown): void;
}

/**
 * Fallback lookup consulted when a name has no registered definition.
 * Returning undefined means the module cannot be located. Errors thrown by
 * the locator propagate to the importing caller as-is and nothing is
 * registered.
 */
export type ModuleLocator = (name: ModuleName) => ModuleDefinition | undefined;

/** Bootstrap input: a name-to-definition map or `[name, definition]` pairs. */
export type ModuleDefinitions =
  | Readonly<Record<ModuleName, ModuleDefinition>>
  | Iterable<readonly [ModuleName, ModuleDefinition]>;

/** Configuration for ModuleRegistry */
export interface ModuleRegistryConfig {
  /** Registry label used in log lines and span attributes (default: "default") */
  readonly name?: string;
  /** Failed modules stay failed ("cache") or return to registered ("evict") (default: "cache") */
  readonly failurePolicy?: FailurePolicy;
  /** Threshold for the built-in console logger (default: "warn") */
  readonly logLevel?: LogLevel;
  /** Replaces the built-in console logger; logLevel is then ignored */
  readonly logger?: RegistryLogger;
  /** Consulted when an imported name is not registered */
  readonly locate?: ModuleLocator;
  /** Definitions registered at construction */
  readonly modules?: ModuleDefinitions;
}

/** Config after validation and defaulting */
export interface ResolvedRegistryConfig {
  readonly name: string;
  readonly failurePolicy: FailurePolicy;
  readonly logger: RegistryLogger;
  readonly locate: ModuleLocator | undefined;
}
