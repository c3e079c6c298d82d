import { LazymodError } from "../base.js";
import type { CodesForBase, ErrorDomain, GrpcStatusCode, HttpStatusCode } from "../catalog.js";
import type { LazymodErrorOptions } from "../types.js";
import { catalogFields } from "./fields.js";

type ExternalCode = CodesForBase<"ExternalError">;

/**
 * Errors caused by failures in code the registry calls out to. HTTP 502.
 * The `.code` field discriminates the specific error.
 */
export class ExternalError<C extends ExternalCode = ExternalCode> extends LazymodError {
  readonly _tag = "ExternalError" as const;
  override readonly code: C;
  override readonly httpStatus: HttpStatusCode;
  override readonly grpcCode: GrpcStatusCode;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  constructor(options: LazymodErrorOptions<C>) {
    super(
      options.message,
      options.metadata,
      options.traceId,
      ...(options.cause ? [{ cause: options.cause }] : []),
    );
    this.code = options.code;
    const fields = catalogFields(options.code);
    this.httpStatus = fields.httpStatus;
    this.grpcCode = fields.grpcCode;
    this.domain = fields.domain;
    this.isExpected = fields.isExpected;
  }
}
