import { LazymodError } from "../base.js";
import type { CodesForBase, ErrorDomain, GrpcStatusCode, HttpStatusCode } from "../catalog.js";
import type { LazymodErrorOptions, ValidationIssue } from "../types.js";
import { catalogFields } from "./fields.js";

type ValidationCode = CodesForBase<"ValidationError">;

/**
 * Errors caused by invalid input or configuration.
 * HTTP 400. The `.code` field discriminates the specific error.
 */
export class ValidationError<C extends ValidationCode = ValidationCode> extends LazymodError {
  readonly _tag = "ValidationError" as const;
  override readonly code: C;
  override readonly httpStatus: HttpStatusCode;
  override readonly grpcCode: GrpcStatusCode;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  /** Structured validation issues */
  readonly issues: readonly ValidationIssue[];

  constructor(options: LazymodErrorOptions<C> & { issues?: readonly ValidationIssue[] }) {
    super(
      options.message,
      options.metadata,
      options.traceId,
      ...(options.cause ? [{ cause: options.cause }] : []),
    );
    this.code = options.code;
    this.issues = options.issues ?? [];
    const fields = catalogFields(options.code);
    this.httpStatus = fields.httpStatus;
    this.grpcCode = fields.grpcCode;
    this.domain = fields.domain;
    this.isExpected = fields.isExpected;
  }
}
