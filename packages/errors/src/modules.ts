import { ConflictError } from "./bases/conflict-error.js";
import { ExternalError } from "./bases/external-error.js";
import { NotFoundError } from "./bases/not-found-error.js";
import { ValidationError } from "./bases/validation-error.js";
import { getErrorMessage } from "./utils.js";

// ============================================================================
// REGISTRATION
// ============================================================================

/**
 * Thrown when a different definition is registered under a name that
 * already has one.
 */
export class DuplicateRegistrationError extends ConflictError<"MODULE_DUPLICATE_REGISTRATION"> {
  readonly moduleName: string;

  constructor(moduleName: string) {
    super({
      code: "MODULE_DUPLICATE_REGISTRATION",
      message: `Module '${moduleName}' is already registered with a different definition`,
      metadata: { moduleName },
    });
    this.moduleName = moduleName;
  }
}

/**
 * Thrown when a module is imported that was never registered and could
 * not be located.
 */
export class UnregisteredModuleError extends NotFoundError<"MODULE_NOT_REGISTERED"> {
  readonly moduleName: string;

  constructor(moduleName: string) {
    super({
      code: "MODULE_NOT_REGISTERED",
      message: `Module '${moduleName}' is not registered`,
      metadata: { moduleName },
    });
    this.moduleName = moduleName;
  }
}

// ============================================================================
// RESOLUTION
// ============================================================================

/**
 * Thrown when a module definition requests its own module while it is
 * still being evaluated.
 *
 * `chain` lists the modules under evaluation, outermost first, ending
 * with the re-entered name.
 */
export class CircularResolutionError extends ConflictError<"MODULE_CIRCULAR_RESOLUTION"> {
  readonly moduleName: string;
  readonly chain: readonly string[];

  constructor(moduleName: string, chain: readonly string[]) {
    const path = [...chain, moduleName].join(" -> ");
    super({
      code: "MODULE_CIRCULAR_RESOLUTION",
      message: `Circular resolution of module '${moduleName}': ${path}`,
      metadata: { moduleName, chain: path },
    });
    this.moduleName = moduleName;
    this.chain = [...chain, moduleName];
  }
}

/**
 * Thrown when a module cannot be produced synchronously because its
 * evaluation is in flight on the async path.
 */
export class ModuleNotReadyError extends ConflictError<"MODULE_NOT_READY"> {
  readonly moduleName: string;

  constructor(moduleName: string, reason: string) {
    super({
      code: "MODULE_NOT_READY",
      message: `Module '${moduleName}' is not ready: ${reason}`,
      metadata: { moduleName },
    });
    this.moduleName = moduleName;
  }
}

/**
 * Wraps whatever a module definition threw or rejected with.
 * The original value is kept as `cause` when it is an Error.
 */
export class DefinitionEvaluationError extends ExternalError<"MODULE_EVALUATION_FAILED"> {
  readonly moduleName: string;

  constructor(moduleName: string, cause: unknown) {
    super({
      code: "MODULE_EVALUATION_FAILED",
      message: `Module '${moduleName}' failed to evaluate: ${getErrorMessage(cause)}`,
      metadata: { moduleName },
      ...(cause instanceof Error ? { cause } : {}),
    });
    this.moduleName = moduleName;
  }
}

// ============================================================================
// CONFIGURATION
// ============================================================================

/**
 * Thrown when a registry is constructed with invalid options.
 */
export class RegistryConfigurationError extends ValidationError<"MODULE_REGISTRY_CONFIG_INVALID"> {
  readonly validationErrors: readonly string[];

  constructor(validationErrors: readonly string[]) {
    super({
      code: "MODULE_REGISTRY_CONFIG_INVALID",
      message: `Invalid module registry configuration: ${validationErrors.join("; ")}`,
      issues: validationErrors.map((message) => ({
        field: "config",
        message,
        code: "CONFIG_ISSUE",
      })),
    });
    this.validationErrors = validationErrors;
  }
}
