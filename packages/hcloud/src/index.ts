/**
 * @hcloud-ts/client
 *
 * A TypeScript client for the Hetzner Cloud API
 */

// Re-export error and logger types for convenience
export {
  ApiError,
  ErrorCode,
  TimeoutError,
  TransportError,
  ValidationError,
  describeError,
  isErrorCode,
} from "@hcloud-ts/errors";
export type { ClientError } from "@hcloud-ts/errors";
export type { Logger, LogLevel } from "@hcloud-ts/logger";

// Client
export { Client, DEFAULT_ENDPOINT, VERSION } from "./client";
export type { ClientConfig, FetchFn, HttpMethod, PreparedRequest, RequestOptions } from "./client";
export { clientFromEnv, configFromEnv } from "./config";
export type { Env } from "./config";

// Responses and pagination
export type { ApiResponse, Decoded, Meta, Pagination } from "./response";
export { DEFAULT_PER_PAGE, fetchAll, listQuery } from "./pagination";
export type { ListOpts, Page } from "./pagination";

// Models
export type * from "./models";
export type * from "./schema";

// Resources
export { ActionClient } from "./action";
export type { ActionListOpts, ActionLookup, ActionPage } from "./action";
export { DatacenterClient } from "./datacenter";
export type { DatacenterListOpts, DatacenterLookup, DatacenterPage } from "./datacenter";
export { ImageClient } from "./image";
export type { ImageListOpts, ImageLookup, ImagePage, ImageResult, ImageUpdateOpts } from "./image";
export { LocationClient } from "./location";
export type { LocationListOpts, LocationLookup, LocationPage } from "./location";
export { ServerClient } from "./server";
export type {
  ServerActionResult,
  ServerChangeTypeOpts,
  ServerCreateImageOpts,
  ServerCreateImageResult,
  ServerCreateOpts,
  ServerCreateResult,
  ServerEnableRescueOpts,
  ServerListOpts,
  ServerLookup,
  ServerPage,
  ServerPasswordActionResult,
  ServerRebuildOpts,
  ServerResult,
  ServerUpdateOpts,
} from "./server";
export { ServerTypeClient } from "./server-type";
export type { ServerTypeListOpts, ServerTypeLookup, ServerTypePage } from "./server-type";
export { SSHKeyClient } from "./ssh-key";
export type {
  SSHKeyCreateOpts,
  SSHKeyListOpts,
  SSHKeyLookup,
  SSHKeyPage,
  SSHKeyResult,
  SSHKeyUpdateOpts,
} from "./ssh-key";
