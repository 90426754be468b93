/**
 * Servers API: CRUD plus the lifecycle actions under /servers/{id}/actions.
 * Action methods return the Action as the API reports it; completion is
 * not awaited.
 */

import { Result } from "better-result";
import { ValidationError, type ClientError } from "@hcloud-ts/errors";
import type { Client, RequestOptions } from "./client";
import { actionFromSchema, idOrNameToSchema, imageFromSchema, serverFromSchema } from "./converters";
import type { Action, IdOrName, Image, RescueType, Server, ServerRef, ServerStatus, SSHKey } from "./models";
import { DEFAULT_PER_PAGE, fetchAll, listQuery, type ListOpts } from "./pagination";
import { decodeResult, notFoundResponse, type ApiResponse, type Decoded } from "./response";
import type {
  SchemaServerActionChangeTypeRequest,
  SchemaServerActionCreateImageRequest,
  SchemaServerActionCreateImageResponse,
  SchemaServerActionEnableRescueRequest,
  SchemaServerActionEnableRescueResponse,
  SchemaServerActionRebuildRequest,
  SchemaServerActionRebuildResponse,
  SchemaServerActionResetPasswordResponse,
  SchemaServerActionResponse,
  SchemaServerCreateRequest,
  SchemaServerCreateResponse,
  SchemaServerGetResponse,
  SchemaServerListResponse,
  SchemaServerUpdateRequest,
  SchemaServerUpdateResponse,
} from "./schema";
import { validateId, validateName, validateRef } from "./validation";

export interface ServerListOpts extends ListOpts {
  name?: string;
  status?: ServerStatus;
}

export interface ServerCreateOpts {
  name: string;
  serverType?: IdOrName;
  image?: IdOrName;
  sshKeys?: Array<Pick<SSHKey, "id">>;
  /** Mutually exclusive with datacenter */
  location?: IdOrName;
  datacenter?: IdOrName;
  userData?: string;
  startAfterCreate?: boolean;
}

export interface ServerUpdateOpts {
  name?: string;
}

export interface ServerCreateImageOpts {
  type?: Extract<Image["type"], "snapshot" | "backup">;
  description?: string;
}

export interface ServerEnableRescueOpts {
  type?: RescueType;
  sshKeys?: Array<Pick<SSHKey, "id">>;
}

export interface ServerRebuildOpts {
  image?: IdOrName;
}

export interface ServerChangeTypeOpts {
  serverType?: IdOrName;
  upgradeDisk: boolean;
}

export interface ServerLookup {
  /** null when the server does not exist */
  server: Server | null;
  response: ApiResponse;
}

export interface ServerResult {
  server: Server;
  response: ApiResponse;
}

export interface ServerPage {
  servers: Server[];
  response: ApiResponse;
}

export interface ServerCreateResult {
  server: Server;
  /** Pending create action, when the API returned one */
  action: Action | null;
  /** Only set when no SSH keys were given */
  rootPassword: string | null;
  response: ApiResponse;
}

export interface ServerActionResult {
  action: Action;
  response: ApiResponse;
}

export interface ServerPasswordActionResult {
  action: Action;
  rootPassword: string | null;
  response: ApiResponse;
}

export interface ServerCreateImageResult {
  action: Action;
  image: Image;
  response: ApiResponse;
}

function sshKeyIds(keys: Array<Pick<SSHKey, "id">>): number[] {
  return keys.map((key) => key.id);
}

/**
 * Client for the servers API
 */
export class ServerClient {
  constructor(private readonly client: Client) {}

  async get(id: number, options: RequestOptions = {}): Promise<Result<ServerLookup, ClientError>> {
    const valid = validateId(id);
    if (valid.isErr()) {
      return Result.err(valid.error);
    }

    const result = await this.client.request<SchemaServerGetResponse>("GET", `/servers/${id}`, undefined, options);
    if (result.isErr()) {
      const absent = notFoundResponse(result.error);
      return absent ? Result.ok({ server: null, response: absent }) : Result.err(result.error);
    }

    return decodeResult(result, ({ body, response }) => ({
      server: serverFromSchema(body.server),
      response,
    }));
  }

  async getByName(name: string, options: RequestOptions = {}): Promise<Result<ServerLookup, ClientError>> {
    const valid = validateName(name);
    if (valid.isErr()) {
      return Result.err(valid.error);
    }
    const result = await this.list({ name }, options);
    return result.map(({ servers, response }) => ({ server: servers[0] ?? null, response }));
  }

  /**
   * Fetch a single page of servers
   */
  async list(opts: ServerListOpts = {}, options: RequestOptions = {}): Promise<Result<ServerPage, ClientError>> {
    const path = `/servers${listQuery(opts, { name: opts.name, status: opts.status })}`;
    const result = await this.client.request<SchemaServerListResponse>("GET", path, undefined, options);
    return decodeResult(result, ({ body, response }) => ({
      servers: body.servers.map(serverFromSchema),
      response,
    }));
  }

  async all(options: RequestOptions = {}): Promise<Result<Server[], ClientError>> {
    return fetchAll(async (page) => {
      const result = await this.list({ page, perPage: DEFAULT_PER_PAGE }, options);
      return result.map(({ servers, response }) => ({ items: servers, response }));
    });
  }

  async create(opts: ServerCreateOpts, options: RequestOptions = {}): Promise<Result<ServerCreateResult, ClientError>> {
    const name = validateName(opts.name);
    if (name.isErr()) {
      return Result.err(name.error);
    }
    const serverType = validateRef(opts.serverType, "server type");
    if (serverType.isErr()) {
      return Result.err(serverType.error);
    }
    const image = validateRef(opts.image, "image");
    if (image.isErr()) {
      return Result.err(image.error);
    }
    if (opts.location && opts.datacenter) {
      return Result.err(
        new ValidationError({ message: "location and datacenter are mutually exclusive" })
      );
    }

    const body: SchemaServerCreateRequest = {
      name: opts.name,
      server_type: idOrNameToSchema(serverType.unwrap()),
      image: idOrNameToSchema(image.unwrap()),
    };
    if (opts.sshKeys?.length) body.ssh_keys = sshKeyIds(opts.sshKeys);
    if (opts.location) body.location = idOrNameToSchema(opts.location);
    if (opts.datacenter) body.datacenter = idOrNameToSchema(opts.datacenter);
    if (opts.userData !== undefined) body.user_data = opts.userData;
    if (opts.startAfterCreate !== undefined) body.start_after_create = opts.startAfterCreate;

    const result = await this.client.request<SchemaServerCreateResponse>("POST", "/servers", body, options);
    return decodeResult(result, ({ body: created, response }) => ({
      server: serverFromSchema(created.server),
      action: created.action ? actionFromSchema(created.action) : null,
      rootPassword: created.root_password ?? null,
      response,
    }));
  }

  async update(
    server: ServerRef,
    opts: ServerUpdateOpts,
    options: RequestOptions = {}
  ): Promise<Result<ServerResult, ClientError>> {
    const valid = validateId(server.id);
    if (valid.isErr()) {
      return Result.err(valid.error);
    }

    const body: SchemaServerUpdateRequest = {};
    if (opts.name !== undefined) body.name = opts.name;

    const result = await this.client.request<SchemaServerUpdateResponse>("PUT", `/servers/${server.id}`, body, options);
    return decodeResult(result, ({ body: updated, response }) => ({
      server: serverFromSchema(updated.server),
      response,
    }));
  }

  async delete(id: number, options: RequestOptions = {}): Promise<Result<ApiResponse, ClientError>> {
    const valid = validateId(id);
    if (valid.isErr()) {
      return Result.err(valid.error);
    }
    return this.client.requestEmpty("DELETE", `/servers/${id}`, options);
  }

  // ==========================================================================
  // Power actions
  // ==========================================================================

  async poweron(server: ServerRef, options: RequestOptions = {}): Promise<Result<ServerActionResult, ClientError>> {
    return this.simpleAction(server, "poweron", options);
  }

  async poweroff(server: ServerRef, options: RequestOptions = {}): Promise<Result<ServerActionResult, ClientError>> {
    return this.simpleAction(server, "poweroff", options);
  }

  async reboot(server: ServerRef, options: RequestOptions = {}): Promise<Result<ServerActionResult, ClientError>> {
    return this.simpleAction(server, "reboot", options);
  }

  async reset(server: ServerRef, options: RequestOptions = {}): Promise<Result<ServerActionResult, ClientError>> {
    return this.simpleAction(server, "reset", options);
  }

  /**
   * ACPI shutdown; the server may ignore it
   */
  async shutdown(server: ServerRef, options: RequestOptions = {}): Promise<Result<ServerActionResult, ClientError>> {
    return this.simpleAction(server, "shutdown", options);
  }

  // ==========================================================================
  // Password / rescue
  // ==========================================================================

  async resetPassword(
    server: ServerRef,
    options: RequestOptions = {}
  ): Promise<Result<ServerPasswordActionResult, ClientError>> {
    const result = await this.postAction<SchemaServerActionResetPasswordResponse>(
      server,
      "reset_password",
      undefined,
      options
    );
    return decodeResult(result, ({ body, response }) => ({
      action: actionFromSchema(body.action),
      rootPassword: body.root_password ?? null,
      response,
    }));
  }

  async enableRescue(
    server: ServerRef,
    opts: ServerEnableRescueOpts = {},
    options: RequestOptions = {}
  ): Promise<Result<ServerPasswordActionResult, ClientError>> {
    const body: SchemaServerActionEnableRescueRequest = {};
    if (opts.type !== undefined) body.type = opts.type;
    if (opts.sshKeys?.length) body.ssh_keys = sshKeyIds(opts.sshKeys);

    const result = await this.postAction<SchemaServerActionEnableRescueResponse>(
      server,
      "enable_rescue",
      body,
      options
    );
    return decodeResult(result, ({ body: rescued, response }) => ({
      action: actionFromSchema(rescued.action),
      rootPassword: rescued.root_password ?? null,
      response,
    }));
  }

  async disableRescue(
    server: ServerRef,
    options: RequestOptions = {}
  ): Promise<Result<ServerActionResult, ClientError>> {
    return this.simpleAction(server, "disable_rescue", options);
  }

  // ==========================================================================
  // Images / rebuild / type
  // ==========================================================================

  /**
   * Create an image from the server's disk. Without options the API picks
   * a snapshot with a generated description.
   */
  async createImage(
    server: ServerRef,
    opts: ServerCreateImageOpts | null = null,
    options: RequestOptions = {}
  ): Promise<Result<ServerCreateImageResult, ClientError>> {
    const body: SchemaServerActionCreateImageRequest = {};
    if (opts?.type !== undefined) body.type = opts.type;
    if (opts?.description !== undefined) body.description = opts.description;

    const result = await this.postAction<SchemaServerActionCreateImageResponse>(
      server,
      "create_image",
      body,
      options
    );
    return decodeResult(result, ({ body: created, response }) => ({
      action: actionFromSchema(created.action),
      image: imageFromSchema(created.image),
      response,
    }));
  }

  async rebuild(
    server: ServerRef,
    opts: ServerRebuildOpts,
    options: RequestOptions = {}
  ): Promise<Result<ServerPasswordActionResult, ClientError>> {
    const image = validateRef(opts.image, "image");
    if (image.isErr()) {
      return Result.err(image.error);
    }

    const body: SchemaServerActionRebuildRequest = { image: idOrNameToSchema(image.unwrap()) };
    const result = await this.postAction<SchemaServerActionRebuildResponse>(server, "rebuild", body, options);
    return decodeResult(result, ({ body: rebuilt, response }) => ({
      action: actionFromSchema(rebuilt.action),
      rootPassword: rebuilt.root_password ?? null,
      response,
    }));
  }

  /**
   * Change the server type. The server has to be powered off.
   */
  async changeType(
    server: ServerRef,
    opts: ServerChangeTypeOpts,
    options: RequestOptions = {}
  ): Promise<Result<ServerActionResult, ClientError>> {
    const serverType = validateRef(opts.serverType, "server type");
    if (serverType.isErr()) {
      return Result.err(serverType.error);
    }

    const body: SchemaServerActionChangeTypeRequest = {
      server_type: idOrNameToSchema(serverType.unwrap()),
      upgrade_disk: opts.upgradeDisk,
    };
    const result = await this.postAction<SchemaServerActionResponse>(server, "change_type", body, options);
    return decodeResult(result, ({ body: changed, response }) => ({
      action: actionFromSchema(changed.action),
      response,
    }));
  }

  private async simpleAction(
    server: ServerRef,
    action: string,
    options: RequestOptions
  ): Promise<Result<ServerActionResult, ClientError>> {
    const result = await this.postAction<SchemaServerActionResponse>(server, action, undefined, options);
    return decodeResult(result, ({ body, response }) => ({
      action: actionFromSchema(body.action),
      response,
    }));
  }

  private async postAction<T>(
    server: ServerRef,
    action: string,
    body: unknown,
    options: RequestOptions
  ): Promise<Result<Decoded<T>, ClientError>> {
    const valid = validateId(server.id);
    if (valid.isErr()) {
      return Result.err(valid.error);
    }
    return this.client.request<T>("POST", `/servers/${server.id}/actions/${action}`, body, options);
  }
}
