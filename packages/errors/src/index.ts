/**
 * @lazymod/errors
 *
 * Error taxonomy for the lazymod module registry.
 *
 * Every error carries a `.code` from the catalog that discriminates the
 * specific condition. Use `error.code === "XXX"` for fine-grained matching,
 * or `instanceof BaseType` for category matching.
 */

export const PACKAGE_NAME = "@lazymod/errors" as const;

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { type ErrorJSON, isError, isLazymodError, LazymodError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "./catalog.js";

export {
  getAllErrorCodes,
  getErrorMessage,
  isValidErrorCode,
  validateCatalog,
} from "./utils.js";

// ============================================================================
// BASE ERROR TYPES
// ============================================================================

export {
  ConflictError,
  ExternalError,
  NotFoundError,
  ValidationError,
} from "./bases/index.js";

export type {
  ConflictCodes,
  ExternalCodes,
  LazymodErrorOptions,
  NotFoundCodes,
  ValidationCodes,
  ValidationIssue,
} from "./types.js";

// ============================================================================
// TYPE GUARDS
// ============================================================================

export {
  hasCode,
  isConflictError,
  isExpectedError,
  isExternalError,
  isNotFoundError,
  isValidationError,
} from "./guards.js";

// ============================================================================
// MODULE REGISTRY ERRORS
// ============================================================================

export {
  CircularResolutionError,
  DefinitionEvaluationError,
  DuplicateRegistrationError,
  ModuleNotReadyError,
  RegistryConfigurationError,
  UnregisteredModuleError,
} from "./modules.js";
