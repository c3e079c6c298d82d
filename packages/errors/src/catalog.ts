/**
 * Error Catalog - Single Source of Truth
 *
 * Each error code maps to an HTTP status, a gRPC canonical code and one of
 * the base error types. Domain errors look their fields up here instead of
 * hard-coding them.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType =
  | "ValidationError"
  | "NotFoundError"
  | "ConflictError"
  | "ExternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // MODULE ERRORS - Registry and resolution
  // ============================================================================
  MODULE_DUPLICATE_REGISTRATION: {
    domain: "module",
    httpStatus: 409,
    grpcCode: "ALREADY_EXISTS" as const,
    baseType: "ConflictError" as const,
    isExpected: true,
    title: "Duplicate module registration",
    description: "A different definition is already registered under this module name",
  },
  MODULE_NOT_REGISTERED: {
    domain: "module",
    httpStatus: 404,
    grpcCode: "NOT_FOUND" as const,
    baseType: "NotFoundError" as const,
    isExpected: true,
    title: "Module not registered",
    description: "No definition is registered or locatable for this module name",
  },
  MODULE_CIRCULAR_RESOLUTION: {
    domain: "module",
    httpStatus: 409,
    grpcCode: "FAILED_PRECONDITION" as const,
    baseType: "ConflictError" as const,
    isExpected: true,
    title: "Circular module resolution",
    description: "A module definition requested itself while being evaluated",
  },
  MODULE_NOT_READY: {
    domain: "module",
    httpStatus: 409,
    grpcCode: "FAILED_PRECONDITION" as const,
    baseType: "ConflictError" as const,
    isExpected: true,
    title: "Module not ready",
    description: "The module is still being evaluated asynchronously",
  },
  MODULE_EVALUATION_FAILED: {
    domain: "module",
    httpStatus: 502,
    grpcCode: "INTERNAL" as const,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Module evaluation failed",
    description: "The module definition threw or rejected while producing its value",
  },
  MODULE_REGISTRY_CONFIG_INVALID: {
    domain: "module",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid registry configuration",
    description: "The module registry configuration failed validation",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * gRPC canonical status codes used in the catalog
 */
export type GrpcStatusCode = ErrorCatalogEntry["grpcCode"];

/**
 * HTTP status codes used in the catalog
 */
export type HttpStatusCode = ErrorCatalogEntry["httpStatus"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
