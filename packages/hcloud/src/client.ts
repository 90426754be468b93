/**
 * Hetzner Cloud API transport
 * Builds requests, sends them with fetch and maps responses to Results
 */

import { Result } from "better-result";
import {
  ApiError,
  ErrorCode,
  TimeoutError,
  TransportError,
  type ClientError,
} from "@hcloud-ts/errors";
import { createLogger, generateRequestId, type Logger } from "@hcloud-ts/logger";
import { metaFromSchema } from "./converters";
import { describeCause, type ApiResponse, type Decoded } from "./response";
import type { SchemaError, SchemaMeta } from "./schema";
import { ActionClient } from "./action";
import { DatacenterClient } from "./datacenter";
import { ImageClient } from "./image";
import { LocationClient } from "./location";
import { ServerClient } from "./server";
import { ServerTypeClient } from "./server-type";
import { SSHKeyClient } from "./ssh-key";

export const VERSION = "0.1.0";
export const DEFAULT_ENDPOINT = "https://api.hetzner.cloud/v1";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface ClientConfig {
  /** API token, sent as a bearer token */
  token: string;
  /** API base URL (default: https://api.hetzner.cloud/v1) */
  endpoint?: string;
  /** Application name prepended to the User-Agent */
  applicationName?: string;
  applicationVersion?: string;
  /** Per-request deadline in milliseconds (default: none) */
  timeoutMs?: number;
  /** fetch implementation (default: global fetch) */
  fetch?: FetchFn;
  /** Logger for request tracing (default: JSON logger at warn level) */
  logger?: Logger;
}

export interface PreparedRequest {
  method: HttpMethod;
  path: string;
  url: string;
  headers: Record<string, string>;
  body?: string;
}

export interface RequestOptions {
  /** Aborts the underlying fetch */
  signal?: AbortSignal;
}

type SendError = TransportError | TimeoutError | ApiError;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Extract `{"error": {"code", "message", "details"}}` from an error body
 */
function parseErrorBody(text: string): SchemaError | null {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    return null;
  }
  if (!isRecord(data) || !isRecord(data.error)) return null;
  const { code, message, details } = data.error;
  if (typeof code !== "string" || typeof message !== "string") return null;
  return { code, message, details };
}

/**
 * Hetzner Cloud API client
 *
 * @example
 * ```ts
 * const client = new Client({ token: process.env.HCLOUD_TOKEN ?? "" });
 * const result = await client.server.get(42);
 * if (result.isOk() && result.unwrap().server === null) {
 *   console.log("server 42 does not exist");
 * }
 * ```
 */
export class Client {
  readonly endpoint: string;
  readonly action: ActionClient;
  readonly datacenter: DatacenterClient;
  readonly image: ImageClient;
  readonly location: LocationClient;
  readonly server: ServerClient;
  readonly serverType: ServerTypeClient;
  readonly sshKey: SSHKeyClient;

  private readonly token: string;
  private readonly userAgent: string;
  private readonly timeoutMs: number | undefined;
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;

  constructor(config: ClientConfig) {
    this.token = config.token;
    this.endpoint = (config.endpoint ?? DEFAULT_ENDPOINT).replace(/\/+$/, "");
    this.userAgent = config.applicationName
      ? `${config.applicationName}${config.applicationVersion ? `/${config.applicationVersion}` : ""} hcloud-ts/${VERSION}`
      : `hcloud-ts/${VERSION}`;
    this.timeoutMs = config.timeoutMs;
    this.fetchFn = config.fetch ?? ((url, init) => fetch(url, init));
    this.logger = config.logger ?? createLogger({ component: "hcloud" }, { level: "warn" });

    this.action = new ActionClient(this);
    this.datacenter = new DatacenterClient(this);
    this.image = new ImageClient(this);
    this.location = new LocationClient(this);
    this.server = new ServerClient(this);
    this.serverType = new ServerTypeClient(this);
    this.sshKey = new SSHKeyClient(this);
  }

  /**
   * Build a request for the given path. Serialization failures are
   * reported here, before anything is sent.
   */
  newRequest(method: HttpMethod, path: string, body?: unknown): Result<PreparedRequest, TransportError> {
    const headers: Record<string, string> = {
      Accept: "application/json",
      Authorization: `Bearer ${this.token}`,
      "User-Agent": this.userAgent,
    };

    let serialized: string | undefined;
    if (body !== undefined) {
      try {
        serialized = JSON.stringify(body);
      } catch (cause) {
        return Result.err(
          new TransportError({
            message: `cannot serialize request body for ${method} ${path}: ${describeCause(cause)}`,
            cause,
          })
        );
      }
      headers["Content-Type"] = "application/json";
    }

    return Result.ok({
      method,
      path,
      url: `${this.endpoint}${path}`,
      headers,
      body: serialized,
    });
  }

  /**
   * Send a request and decode its JSON body as T
   */
  async do<T>(request: PreparedRequest, options: RequestOptions = {}): Promise<Result<Decoded<T>, SendError>> {
    const sent = await this.send(request, options);
    if (sent.isErr()) {
      return Result.err(sent.error);
    }
    const { httpResponse, text } = sent.unwrap();

    let payload: T & { meta?: SchemaMeta };
    try {
      payload = JSON.parse(text);
    } catch (cause) {
      return Result.err(
        new TransportError({
          message: `invalid JSON in response to ${request.method} ${request.path}: ${describeCause(cause)}`,
          cause,
        })
      );
    }
    if (!isRecord(payload)) {
      return Result.err(
        new TransportError({
          message: `unexpected response body for ${request.method} ${request.path}: expected a JSON object`,
        })
      );
    }

    return Result.ok({
      body: payload,
      response: { httpResponse, meta: metaFromSchema(payload.meta) },
      request: `${request.method} ${request.path}`,
    });
  }

  /**
   * Send a request whose success body is not needed (e.g. DELETE)
   */
  async doEmpty(request: PreparedRequest, options: RequestOptions = {}): Promise<Result<ApiResponse, SendError>> {
    const sent = await this.send(request, options);
    if (sent.isErr()) {
      return Result.err(sent.error);
    }
    return Result.ok({ httpResponse: sent.unwrap().httpResponse, meta: {} });
  }

  /**
   * newRequest + do
   */
  async request<T>(
    method: HttpMethod,
    path: string,
    body: unknown,
    options: RequestOptions = {}
  ): Promise<Result<Decoded<T>, ClientError>> {
    const prepared = this.newRequest(method, path, body);
    if (prepared.isErr()) {
      return Result.err(prepared.error);
    }
    return this.do<T>(prepared.unwrap(), options);
  }

  /**
   * newRequest + doEmpty
   */
  async requestEmpty(
    method: HttpMethod,
    path: string,
    options: RequestOptions = {}
  ): Promise<Result<ApiResponse, ClientError>> {
    const prepared = this.newRequest(method, path);
    if (prepared.isErr()) {
      return Result.err(prepared.error);
    }
    return this.doEmpty(prepared.unwrap(), options);
  }

  private async send(
    request: PreparedRequest,
    options: RequestOptions
  ): Promise<Result<{ httpResponse: Response; text: string }, SendError>> {
    if (options.signal?.aborted) {
      return Result.err(
        new TransportError({
          message: `${request.method} ${request.path} aborted before it was sent`,
          cause: options.signal.reason,
        })
      );
    }

    const log = this.logger.child({ requestId: generateRequestId() });
    const controller = new AbortController();
    const onAbort = () => controller.abort(options.signal?.reason);
    let timedOut = false;
    let timeoutId: ReturnType<typeof setTimeout> | undefined;

    options.signal?.addEventListener("abort", onAbort, { once: true });
    if (this.timeoutMs !== undefined) {
      timeoutId = setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, this.timeoutMs);
    }

    const startedAt = Date.now();
    log.debug("request", { method: request.method, path: request.path });

    try {
      const exchanged = await Result.tryPromise({
        try: async () => {
          const httpResponse = await this.fetchFn(request.url, {
            method: request.method,
            headers: request.headers,
            body: request.body,
            signal: controller.signal,
          });
          const text = await httpResponse.text();
          return { httpResponse, text };
        },
        catch: (cause): TransportError | TimeoutError =>
          timedOut
            ? new TimeoutError({
                message: `${request.method} ${request.path} timed out after ${this.timeoutMs}ms`,
              })
            : new TransportError({
                message: `${request.method} ${request.path} failed: ${describeCause(cause)}`,
                cause,
              }),
      });

      if (exchanged.isErr()) {
        log.debug("request failed", { method: request.method, path: request.path, error: exchanged.error.message });
        return Result.err(exchanged.error);
      }

      const { httpResponse, text } = exchanged.unwrap();
      log.debug("response", {
        method: request.method,
        path: request.path,
        status: httpResponse.status,
        durationMs: Date.now() - startedAt,
      });

      if (!httpResponse.ok) {
        const error = this.errorFromResponse(httpResponse, text);
        log.debug("api error", { code: error.code, status: error.statusCode });
        return Result.err(error);
      }

      return Result.ok({ httpResponse, text });
    } finally {
      if (timeoutId) {
        clearTimeout(timeoutId);
      }
      options.signal?.removeEventListener("abort", onAbort);
    }
  }

  private errorFromResponse(httpResponse: Response, text: string): ApiError {
    const parsed = parseErrorBody(text);
    if (!parsed) {
      return new ApiError({
        message: `server responded with status code ${httpResponse.status}`,
        code: ErrorCode.UnknownError,
        statusCode: httpResponse.status,
        httpResponse,
      });
    }
    return new ApiError({
      message: parsed.message,
      code: parsed.code,
      statusCode: httpResponse.status,
      details: parsed.details,
      httpResponse,
    });
  }
}
