import type { ZodIssue } from "zod";

/**
 * Base class for every error the client raises. Callers can branch on the
 * concrete subclass (or on `name`) to decide how to handle a failure.
 */
export class OuraError extends Error {
  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "OuraError";
  }
}

/** Malformed call-time input, rejected before any I/O. */
export class InvalidArgumentError extends OuraError {
  public constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

/** The transport could not complete the round trip. The original error is kept as `cause`. */
export class RequestFailedError extends OuraError {
  public constructor(message: string, cause: unknown) {
    super(message, { cause });
    this.name = "RequestFailedError";
  }
}

/**
 * The round trip completed but the body was unusable: not JSON, or JSON that
 * does not match the expected shape.
 */
export class BadResponseError extends OuraError {
  public readonly issues: ZodIssue[];

  public constructor(message: string, options: { cause?: unknown; issues?: ZodIssue[] } = {}) {
    super(message, { cause: options.cause });
    this.name = "BadResponseError";
    this.issues = options.issues ?? [];
  }
}

export class ApiError extends OuraError {
  public readonly statusCode: number;
  public readonly reason: string;

  public constructor(statusCode: number, reason: string) {
    super(`${statusCode}: ${reason}`);
    this.name = "ApiError";
    this.statusCode = statusCode;
    this.reason = reason;
  }
}

export class InvalidDateRangeError extends OuraError {
  public readonly start: string | undefined;
  public readonly end: string | undefined;

  public constructor(message: string, start: string | undefined, end: string | undefined) {
    super(message);
    this.name = "InvalidDateRangeError";
    this.start = start;
    this.end = end;
  }
}
