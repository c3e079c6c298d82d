import type { ErrorCode, ErrorDomain, GrpcStatusCode, HttpStatusCode } from "./catalog.js";

/**
 * JSON shape produced by {@link LazymodError.toJSON}.
 */
export interface ErrorJSON {
  readonly _tag: string;
  readonly name: string;
  readonly code: ErrorCode;
  readonly message: string;
  readonly domain: ErrorDomain;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly isExpected: boolean;
  readonly timestamp: string;
  readonly metadata?: Record<string, string>;
  readonly traceId?: string;
  readonly cause?: string;
  readonly stack?: string;
}

/**
 * Abstract root of the lazymod error hierarchy.
 *
 * Concrete classes fill in `code` and the catalog-derived fields; the
 * base only carries what every error shares (metadata, trace id, timestamp).
 */
export abstract class LazymodError extends Error {
  abstract readonly _tag: string;
  abstract readonly code: ErrorCode;
  abstract readonly httpStatus: HttpStatusCode;
  abstract readonly grpcCode: GrpcStatusCode;
  abstract readonly domain: ErrorDomain;
  abstract readonly isExpected: boolean;

  readonly metadata: Record<string, string> | undefined;
  readonly traceId: string | undefined;
  readonly timestamp: Date;

  constructor(
    message: string,
    metadata?: Record<string, string>,
    traceId?: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = new.target.name;
    this.metadata = metadata;
    this.traceId = traceId;
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      httpStatus: this.httpStatus,
      grpcCode: this.grpcCode,
      isExpected: this.isExpected,
      timestamp: this.timestamp.toISOString(),
      ...(this.metadata ? { metadata: this.metadata } : {}),
      ...(this.traceId ? { traceId: this.traceId } : {}),
      ...(this.cause instanceof Error ? { cause: this.cause.message } : {}),
      ...(this.stack ? { stack: this.stack } : {}),
    };
  }

  override toString(): string {
    const meta = this.metadata ? ` ${JSON.stringify(this.metadata)}` : "";
    const trace = this.traceId ? ` [trace: ${this.traceId}]` : "";
    return `${this.name} [${this.code}]: ${this.message}${meta}${trace}`;
  }
}

/**
 * Check whether a value is any lazymod error.
 */
export function isLazymodError(error: unknown): error is LazymodError {
  return error instanceof LazymodError;
}

/**
 * Check whether a value is an Error instance.
 */
export function isError(error: unknown): error is Error {
  return error instanceof Error;
}
