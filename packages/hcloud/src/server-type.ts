import { Result } from "better-result";
import type { ClientError } from "@hcloud-ts/errors";
import type { Client, RequestOptions } from "./client";
import { serverTypeFromSchema } from "./converters";
import type { ServerType } from "./models";
import { DEFAULT_PER_PAGE, fetchAll, listQuery, type ListOpts } from "./pagination";
import { decodeResult, notFoundResponse, type ApiResponse } from "./response";
import type { SchemaServerTypeGetResponse, SchemaServerTypeListResponse } from "./schema";
import { validateId, validateName } from "./validation";

export interface ServerTypeListOpts extends ListOpts {
  name?: string;
}

export interface ServerTypeLookup {
  serverType: ServerType | null;
  response: ApiResponse;
}

export interface ServerTypePage {
  serverTypes: ServerType[];
  response: ApiResponse;
}

/**
 * Client for the server types API (read only)
 */
export class ServerTypeClient {
  constructor(private readonly client: Client) {}

  async get(id: number, options: RequestOptions = {}): Promise<Result<ServerTypeLookup, ClientError>> {
    const valid = validateId(id);
    if (valid.isErr()) {
      return Result.err(valid.error);
    }

    const result = await this.client.request<SchemaServerTypeGetResponse>(
      "GET",
      `/server_types/${id}`,
      undefined,
      options
    );
    if (result.isErr()) {
      const absent = notFoundResponse(result.error);
      return absent ? Result.ok({ serverType: null, response: absent }) : Result.err(result.error);
    }

    return decodeResult(result, ({ body, response }) => ({
      serverType: serverTypeFromSchema(body.server_type),
      response,
    }));
  }

  async getByName(name: string, options: RequestOptions = {}): Promise<Result<ServerTypeLookup, ClientError>> {
    const valid = validateName(name);
    if (valid.isErr()) {
      return Result.err(valid.error);
    }
    const result = await this.list({ name }, options);
    return result.map(({ serverTypes, response }) => ({ serverType: serverTypes[0] ?? null, response }));
  }

  async list(opts: ServerTypeListOpts = {}, options: RequestOptions = {}): Promise<Result<ServerTypePage, ClientError>> {
    const path = `/server_types${listQuery(opts, { name: opts.name })}`;
    const result = await this.client.request<SchemaServerTypeListResponse>("GET", path, undefined, options);
    return decodeResult(result, ({ body, response }) => ({
      serverTypes: body.server_types.map(serverTypeFromSchema),
      response,
    }));
  }

  async all(options: RequestOptions = {}): Promise<Result<ServerType[], ClientError>> {
    return fetchAll(async (page) => {
      const result = await this.list({ page, perPage: DEFAULT_PER_PAGE }, options);
      return result.map(({ serverTypes, response }) => ({ items: serverTypes, response }));
    });
  }
}
