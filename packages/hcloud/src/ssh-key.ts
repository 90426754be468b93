import { Result } from "better-result";
import type { ClientError } from "@hcloud-ts/errors";
import type { Client, RequestOptions } from "./client";
import { decodeResult, notFoundResponse, type ApiResponse } from "./response";
import { sshKeyFromSchema } from "./converters";
import type { SSHKey } from "./models";
import { DEFAULT_PER_PAGE, fetchAll, listQuery, type ListOpts } from "./pagination";
import type {
  SchemaSSHKeyCreateRequest,
  SchemaSSHKeyCreateResponse,
  SchemaSSHKeyGetResponse,
  SchemaSSHKeyListResponse,
  SchemaSSHKeyUpdateRequest,
  SchemaSSHKeyUpdateResponse,
} from "./schema";
import { validateId, validateName } from "./validation";

export interface SSHKeyListOpts extends ListOpts {
  name?: string;
}

export interface SSHKeyCreateOpts {
  name: string;
  publicKey: string;
}

export interface SSHKeyUpdateOpts {
  name?: string;
}

export interface SSHKeyResult {
  sshKey: SSHKey;
  response: ApiResponse;
}

export interface SSHKeyLookup {
  /** null when the key does not exist */
  sshKey: SSHKey | null;
  response: ApiResponse;
}

export interface SSHKeyPage {
  sshKeys: SSHKey[];
  response: ApiResponse;
}

/**
 * Client for the SSH keys API
 */
export class SSHKeyClient {
  constructor(private readonly client: Client) {}

  async get(id: number, options: RequestOptions = {}): Promise<Result<SSHKeyLookup, ClientError>> {
    const valid = validateId(id);
    if (valid.isErr()) {
      return Result.err(valid.error);
    }

    const result = await this.client.request<SchemaSSHKeyGetResponse>("GET", `/ssh_keys/${id}`, undefined, options);
    if (result.isErr()) {
      const absent = notFoundResponse(result.error);
      return absent ? Result.ok({ sshKey: null, response: absent }) : Result.err(result.error);
    }

    return decodeResult(result, ({ body, response }) => ({
      sshKey: sshKeyFromSchema(body.ssh_key),
      response,
    }));
  }

  /**
   * Look up a key by its exact name
   */
  async getByName(name: string, options: RequestOptions = {}): Promise<Result<SSHKeyLookup, ClientError>> {
    const valid = validateName(name);
    if (valid.isErr()) {
      return Result.err(valid.error);
    }
    const result = await this.list({ name }, options);
    return result.map(({ sshKeys, response }) => ({ sshKey: sshKeys[0] ?? null, response }));
  }

  /**
   * Fetch a single page of keys
   */
  async list(opts: SSHKeyListOpts = {}, options: RequestOptions = {}): Promise<Result<SSHKeyPage, ClientError>> {
    const path = `/ssh_keys${listQuery(opts, { name: opts.name })}`;
    const result = await this.client.request<SchemaSSHKeyListResponse>("GET", path, undefined, options);
    return decodeResult(result, ({ body, response }) => ({
      sshKeys: body.ssh_keys.map(sshKeyFromSchema),
      response,
    }));
  }

  async all(options: RequestOptions = {}): Promise<Result<SSHKey[], ClientError>> {
    return fetchAll(async (page) => {
      const result = await this.list({ page, perPage: DEFAULT_PER_PAGE }, options);
      return result.map(({ sshKeys, response }) => ({ items: sshKeys, response }));
    });
  }

  async create(opts: SSHKeyCreateOpts, options: RequestOptions = {}): Promise<Result<SSHKeyResult, ClientError>> {
    const name = validateName(opts.name);
    if (name.isErr()) {
      return Result.err(name.error);
    }
    const publicKey = validateName(opts.publicKey, "public key");
    if (publicKey.isErr()) {
      return Result.err(publicKey.error);
    }

    const body: SchemaSSHKeyCreateRequest = {
      name: opts.name,
      public_key: opts.publicKey,
    };
    const result = await this.client.request<SchemaSSHKeyCreateResponse>("POST", "/ssh_keys", body, options);
    return decodeResult(result, ({ body: created, response }) => ({
      sshKey: sshKeyFromSchema(created.ssh_key),
      response,
    }));
  }

  async update(
    sshKey: Pick<SSHKey, "id">,
    opts: SSHKeyUpdateOpts,
    options: RequestOptions = {}
  ): Promise<Result<SSHKeyResult, ClientError>> {
    const valid = validateId(sshKey.id);
    if (valid.isErr()) {
      return Result.err(valid.error);
    }

    const body: SchemaSSHKeyUpdateRequest = {};
    if (opts.name !== undefined) body.name = opts.name;

    const result = await this.client.request<SchemaSSHKeyUpdateResponse>(
      "PUT",
      `/ssh_keys/${sshKey.id}`,
      body,
      options
    );
    return decodeResult(result, ({ body: updated, response }) => ({
      sshKey: sshKeyFromSchema(updated.ssh_key),
      response,
    }));
  }

  async delete(id: number, options: RequestOptions = {}): Promise<Result<ApiResponse, ClientError>> {
    const valid = validateId(id);
    if (valid.isErr()) {
      return Result.err(valid.error);
    }
    return this.client.requestEmpty("DELETE", `/ssh_keys/${id}`, options);
  }
}
