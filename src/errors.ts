// ---------------------------------------------------------------------------
// Barte SDK – Custom Error Classes
// ---------------------------------------------------------------------------
// Every failure the SDK raises is a BarteError. Subclasses separate
// "server said no" (RemoteApiError) from "server said yes but the answer
// did not match the expected shape" (DecodingError).
// ---------------------------------------------------------------------------

/** Machine-readable error codes emitted by the SDK. */
export type BarteErrorCode =
  | "configuration_error" // invalid apiKey / environment
  | "authentication_error" // 401
  | "forbidden_error" // 403
  | "invalid_request_error" // 400/422, or rejected locally before sending
  | "not_found_error" // 404
  | "rate_limit_error" // 429
  | "api_error" // 5xx
  | "connection_error" // fetch rejected (DNS, socket, TLS)
  | "decoding_error" // response did not match the entity schema
  | "uninitialized_client_error"
  | "unknown_error";

/**
 * Base error class for all Barte SDK errors.
 *
 * @example
 * ```ts
 * try {
 *   await barte.charges.retrieve("chr_123");
 * } catch (err) {
 *   if (err instanceof RemoteApiError && err.code === "not_found_error") {
 *     // ...
 *   }
 * }
 * ```
 */
export class BarteError extends Error {
  /** Machine-readable error classification. */
  public readonly code: BarteErrorCode;

  constructor(message: string, code: BarteErrorCode) {
    super(message);
    this.name = "BarteError";
    this.code = code;

    // Keeps `instanceof` working for subclasses when compiled to ES5.
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /** Human-readable representation for logging/debugging. */
  override toString(): string {
    return `[${this.name}: ${this.code}] ${this.message}`;
  }

  /** Serialise to a plain object for structured logging. */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
    };
  }
}

/** Invalid client configuration. Raised at construction, never retried. */
export class ConfigurationError extends BarteError {
  constructor(message: string) {
    super(message, "configuration_error");
    this.name = "ConfigurationError";
  }
}

/**
 * Non-2xx response from the Barte API.
 *
 * `body` holds the response payload verbatim: parsed JSON when the server
 * sent JSON, otherwise the raw text (or `undefined` for an empty body).
 */
export class RemoteApiError extends BarteError {
  /** HTTP status code returned by the API. */
  public readonly statusCode: number;
  public readonly body: unknown;

  constructor(statusCode: number, body: unknown, message?: string) {
    super(
      message ?? "Barte API request failed",
      errorCodeFromStatus(statusCode),
    );
    this.name = "RemoteApiError";
    this.statusCode = statusCode;
    this.body = body;
  }

  override toString(): string {
    return `${super.toString()} (HTTP ${this.statusCode})`;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), statusCode: this.statusCode, body: this.body };
  }
}

/** A single schema violation, as reported by the decoder. */
export interface DecodingIssue {
  /** Dotted path to the offending field, e.g. `customer.name`. */
  readonly field: string;
  readonly message: string;
}

/** Response JSON did not match the expected entity shape. */
export class DecodingError extends BarteError {
  /** Entity that was being decoded (e.g. `Charge`). */
  public readonly entity: string;
  /** Path of the first offending field; empty for the root value. */
  public readonly field: string;
  public readonly issues: readonly DecodingIssue[];

  constructor(entity: string, issues: readonly DecodingIssue[]) {
    const first = issues[0] ?? { field: "", message: "Invalid value" };
    const where = first.field === "" ? "" : ` at "${first.field}"`;
    super(
      `Could not decode ${entity}${where}: ${first.message}`,
      "decoding_error",
    );
    this.name = "DecodingError";
    this.entity = entity;
    this.field = first.field;
    this.issues = issues;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      entity: this.entity,
      field: this.field,
      issues: this.issues,
    };
  }
}

/** An entity convenience method ran with no client bound or registered. */
export class UninitializedClientError extends BarteError {
  constructor(
    message = "No active Barte client. Construct a BarteClient before calling entity methods.",
  ) {
    super(message, "uninitialized_client_error");
    this.name = "UninitializedClientError";
  }
}

/** `fetch()` itself rejected; no HTTP response was received. */
export class ConnectionError extends BarteError {
  public override readonly cause: unknown;

  constructor(message: string, cause: unknown) {
    super(message, "connection_error");
    this.name = "ConnectionError";
    this.cause = cause;
  }
}

/** Request parameters rejected locally, before anything was sent. */
export class RequestValidationError extends BarteError {
  constructor(message: string) {
    super(message, "invalid_request_error");
    this.name = "RequestValidationError";
  }
}

/**
 * Derive a machine-readable error code from an HTTP status code.
 */
export function errorCodeFromStatus(status: number): BarteErrorCode {
  if (status === 401) return "authentication_error";
  if (status === 403) return "forbidden_error";
  if (status === 400 || status === 422) return "invalid_request_error";
  if (status === 404) return "not_found_error";
  if (status === 429) return "rate_limit_error";
  if (status >= 500) return "api_error";
  return "unknown_error";
}
