/**
 * Type infrastructure for the error system.
 *
 * Provides construction options and per-base code aliases.
 */

import type { BaseErrorType, CodesForBase, ErrorCode } from "./catalog.js";

/**
 * Structured validation issue (field-level detail)
 */
export interface ValidationIssue {
  field: string;
  message: string;
  code: string;
  value?: unknown;
}

/**
 * Options for constructing a base error type.
 * The code determines httpStatus, grpcCode, domain, and isExpected via catalog lookup.
 */
export interface LazymodErrorOptions<C extends ErrorCode> {
  code: C;
  message: string;
  metadata?: Record<string, string> | undefined;
  traceId?: string | undefined;
  cause?: Error | undefined;
}

export type { BaseErrorType, CodesForBase };

export type ValidationCodes = CodesForBase<"ValidationError">;
export type NotFoundCodes = CodesForBase<"NotFoundError">;
export type ConflictCodes = CodesForBase<"ConflictError">;
export type ExternalCodes = CodesForBase<"ExternalError">;
