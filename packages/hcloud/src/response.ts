import { Result } from "better-result";
import { ErrorCode, TransportError, isErrorCode, type ClientError } from "@hcloud-ts/errors";

export interface Pagination {
  page: number;
  perPage: number;
  previousPage: number | null;
  nextPage: number | null;
  lastPage: number | null;
  totalEntries: number | null;
}

export interface Meta {
  pagination?: Pagination;
}

/**
 * Raw HTTP response plus the parsed `meta` block of its body
 */
export interface ApiResponse {
  httpResponse: Response;
  meta: Meta;
}

export interface Decoded<T> {
  body: T;
  response: ApiResponse;
  /** "METHOD /path" of the call that produced the body */
  request: string;
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Response of a call the API answered with `not_found`, or null for any
 * other error. Used by the get-style methods, which report a missing
 * resource as an absent value rather than as an error.
 */
export function notFoundResponse(error: ClientError): ApiResponse | null {
  if (!isErrorCode(error, ErrorCode.NotFound)) return null;
  return { httpResponse: error.httpResponse, meta: {} };
}

/**
 * Convert a decoded body into its domain form. A body whose shape does not
 * match what the converter expects becomes a TransportError.
 */
export function decodeResult<T, U>(
  result: Result<Decoded<T>, ClientError>,
  convert: (decoded: Decoded<T>) => U
): Result<U, ClientError> {
  if (result.isErr()) {
    return Result.err(result.error);
  }
  const decoded = result.unwrap();
  return Result.try({
    try: () => convert(decoded),
    catch: (cause) =>
      new TransportError({
        message: `unexpected response body for ${decoded.request}: ${describeCause(cause)}`,
        cause,
      }),
  });
}
