/**
 * Error hierarchy for the ScoutAPM client.
 *
 * Every error carries a `kind` tag so the tool layer can label failures
 * without instanceof chains. HTTP-derived errors also keep the status code
 * and the parsed response body when one was available.
 */

export type ScoutErrorKind =
  | "invalid_argument"
  | "configuration"
  | "authentication"
  | "not_found"
  | "api"
  | "ssl"
  | "request";

export interface ScoutErrorDetails {
  statusCode?: number;
  responseData?: unknown;
}

export class ScoutError extends Error {
  readonly kind: ScoutErrorKind;
  readonly statusCode?: number;
  readonly responseData?: unknown;

  constructor(kind: ScoutErrorKind, message: string, details: ScoutErrorDetails = {}) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
    this.statusCode = details.statusCode;
    this.responseData = details.responseData;
  }
}

/** Bad input caught before any request is made. */
export class InvalidArgumentError extends ScoutError {
  constructor(message: string) {
    super("invalid_argument", message);
  }
}

/** A timestamp that is not ISO 8601. */
export class ParseError extends InvalidArgumentError {}

export class ConfigurationError extends ScoutError {
  constructor(message: string) {
    super("configuration", message);
  }
}

export class AuthenticationError extends ScoutError {
  constructor(message = "Authentication failed - check your API key") {
    super("authentication", message, { statusCode: 401 });
  }
}

export class APIError extends ScoutError {
  constructor(
    message: string,
    details: ScoutErrorDetails = {},
    kind: "api" | "not_found" = "api"
  ) {
    super(kind, message, details);
  }
}

export class NotFoundError extends APIError {
  constructor(responseData?: unknown) {
    super("Resource not found", { statusCode: 404, responseData }, "not_found");
  }
}

export class SSLError extends ScoutError {
  constructor(message: string) {
    super("ssl", message);
  }
}

export class RequestError extends ScoutError {
  constructor(message: string) {
    super("request", message);
  }
}

const KIND_LABELS: Record<ScoutErrorKind, string> = {
  invalid_argument: "Invalid argument",
  configuration: "Configuration error",
  authentication: "Authentication error",
  not_found: "Not found",
  api: "API error",
  ssl: "SSL error",
  request: "Request error",
};

export function describeError(err: unknown): string {
  if (err instanceof ScoutError) {
    const status = err.statusCode !== undefined ? ` (HTTP ${err.statusCode})` : "";
    return `${KIND_LABELS[err.kind]}${status}: ${err.message}`;
  }
  if (err instanceof Error) return `Error: ${err.message}`;
  return `Error: ${String(err)}`;
}
