/* eslint-disable no-redeclare */
import { TaggedError } from "better-result";

/**
 * Error codes the Hetzner Cloud API reports in `error.code`
 */
export const ErrorCode = {
  ServiceError: "service_error",
  RateLimitExceeded: "rate_limit_exceeded",
  UnknownError: "unknown_error",
  NotFound: "not_found",
  InvalidInput: "invalid_input",
  Forbidden: "forbidden",
  Unauthorized: "unauthorized",
  JSONError: "json_error",
  Locked: "locked",
  Conflict: "conflict",
  ResourceLimitExceeded: "resource_limit_exceeded",
  ResourceUnavailable: "resource_unavailable",
  UniquenessError: "uniqueness_error",
  Protected: "protected",
  Maintenance: "maintenance",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

// Local pre-flight errors, raised before any request is sent
export const ValidationError = TaggedError("ValidationError")<{
  message: string;
}>();

export type ValidationError = InstanceType<typeof ValidationError>;

// Request construction, serialization and network errors
export const TransportError = TaggedError("TransportError")<{
  message: string;
  cause?: unknown;
}>();

export type TransportError = InstanceType<typeof TransportError>;

// Client deadline elapsed
export const TimeoutError = TaggedError("TimeoutError")<{
  message: string;
}>();

export type TimeoutError = InstanceType<typeof TimeoutError>;

// Errors reported by the API with a non-2xx status
export const ApiError = TaggedError("ApiError")<{
  message: string;
  /** Provider error code, not narrowed to ErrorCode since the API may add codes */
  code: string;
  statusCode: number;
  details?: unknown;
  httpResponse: Response;
}>();

export type ApiError = InstanceType<typeof ApiError>;

// Union type for every error a client call can produce
export type ClientError = ValidationError | TransportError | TimeoutError | ApiError;

/**
 * Check whether an error is an ApiError carrying the given code
 */
export function isErrorCode(error: unknown, code: ErrorCode): error is ApiError {
  return ApiError.is(error) && error.code === code;
}

/**
 * Short human readable description, e.g. for CLI output
 */
export function describeError(error: ClientError): string {
  switch (error._tag) {
    case "ApiError":
      return `${error.message} (${error.code}, HTTP ${error.statusCode})`;
    case "TimeoutError":
    case "TransportError":
    case "ValidationError":
    default:
      return error.message;
  }
}
