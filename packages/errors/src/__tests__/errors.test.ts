import { describe, it, expect } from "vitest";
import {
  ApiError,
  ErrorCode,
  TimeoutError,
  TransportError,
  ValidationError,
  describeError,
  isErrorCode,
} from "../index";

function notFoundResponse(): Response {
  return new Response(null, { status: 404 });
}

describe("Error Types", () => {
  describe("ApiError", () => {
    it("creates error with correct properties", () => {
      const httpResponse = notFoundResponse();
      const error = new ApiError({
        message: "server not found",
        code: ErrorCode.NotFound,
        statusCode: 404,
        httpResponse,
      });

      expect(error.message).toBe("server not found");
      expect(error.code).toBe("not_found");
      expect(error.statusCode).toBe(404);
      expect(error.details).toBeUndefined();
      expect(error.httpResponse).toBe(httpResponse);
      expect(error._tag).toBe("ApiError");
    });

    it("type guard works correctly", () => {
      const error = new ApiError({
        message: "test",
        code: ErrorCode.Forbidden,
        statusCode: 403,
        httpResponse: new Response(null, { status: 403 }),
      });

      expect(ApiError.is(error)).toBe(true);
      expect(ApiError.is(new Error("test"))).toBe(false);
      expect(ApiError.is(null)).toBe(false);
    });
  });

  describe("TransportError", () => {
    it("creates error with message and cause", () => {
      const cause = new TypeError("fetch failed");
      const error = new TransportError({ message: "request failed", cause });

      expect(error.message).toBe("request failed");
      expect(error.cause).toBe(cause);
      expect(error._tag).toBe("TransportError");
    });
  });

  describe("ValidationError", () => {
    it("creates error with message", () => {
      const error = new ValidationError({ message: "missing name" });

      expect(error.message).toBe("missing name");
      expect(error._tag).toBe("ValidationError");
      expect(ValidationError.is(error)).toBe(true);
      expect(TransportError.is(error)).toBe(false);
    });
  });

  describe("TimeoutError", () => {
    it("creates error with message", () => {
      const error = new TimeoutError({ message: "request timed out after 50ms" });

      expect(error.message).toBe("request timed out after 50ms");
      expect(error._tag).toBe("TimeoutError");
    });
  });
});

describe("isErrorCode", () => {
  it("matches an ApiError with the same code", () => {
    const error = new ApiError({
      message: "not found",
      code: "not_found",
      statusCode: 404,
      httpResponse: notFoundResponse(),
    });

    expect(isErrorCode(error, ErrorCode.NotFound)).toBe(true);
    expect(isErrorCode(error, ErrorCode.Locked)).toBe(false);
  });

  it("rejects other error types", () => {
    expect(isErrorCode(new ValidationError({ message: "not_found" }), ErrorCode.NotFound)).toBe(false);
    expect(isErrorCode(undefined, ErrorCode.NotFound)).toBe(false);
  });
});

describe("describeError", () => {
  it("includes code and status for ApiError", () => {
    const error = new ApiError({
      message: "server is locked",
      code: ErrorCode.Locked,
      statusCode: 423,
      httpResponse: new Response(null, { status: 423 }),
    });

    expect(describeError(error)).toBe("server is locked (locked, HTTP 423)");
  });

  it("returns the message for local errors", () => {
    expect(describeError(new ValidationError({ message: "missing image" }))).toBe("missing image");
  });
});
