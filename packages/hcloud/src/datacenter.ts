import { Result } from "better-result";
import type { ClientError } from "@hcloud-ts/errors";
import type { Client, RequestOptions } from "./client";
import { datacenterFromSchema } from "./converters";
import type { Datacenter } from "./models";
import { DEFAULT_PER_PAGE, fetchAll, listQuery, type ListOpts } from "./pagination";
import { decodeResult, notFoundResponse, type ApiResponse } from "./response";
import type { SchemaDatacenterGetResponse, SchemaDatacenterListResponse } from "./schema";
import { validateId, validateName } from "./validation";

export interface DatacenterListOpts extends ListOpts {
  name?: string;
}

export interface DatacenterLookup {
  datacenter: Datacenter | null;
  response: ApiResponse;
}

export interface DatacenterPage {
  datacenters: Datacenter[];
  response: ApiResponse;
}

export class DatacenterClient {
  constructor(private readonly client: Client) {}

  async get(id: number, options: RequestOptions = {}): Promise<Result<DatacenterLookup, ClientError>> {
    const valid = validateId(id);
    if (valid.isErr()) {
      return Result.err(valid.error);
    }

    const result = await this.client.request<SchemaDatacenterGetResponse>(
      "GET",
      `/datacenters/${id}`,
      undefined,
      options
    );
    if (result.isErr()) {
      const absent = notFoundResponse(result.error);
      return absent ? Result.ok({ datacenter: null, response: absent }) : Result.err(result.error);
    }

    return decodeResult(result, ({ body, response }) => ({
      datacenter: datacenterFromSchema(body.datacenter),
      response,
    }));
  }

  async getByName(name: string, options: RequestOptions = {}): Promise<Result<DatacenterLookup, ClientError>> {
    const valid = validateName(name);
    if (valid.isErr()) {
      return Result.err(valid.error);
    }
    const result = await this.list({ name }, options);
    return result.map(({ datacenters, response }) => ({ datacenter: datacenters[0] ?? null, response }));
  }

  async list(opts: DatacenterListOpts = {}, options: RequestOptions = {}): Promise<Result<DatacenterPage, ClientError>> {
    const path = `/datacenters${listQuery(opts, { name: opts.name })}`;
    const result = await this.client.request<SchemaDatacenterListResponse>("GET", path, undefined, options);
    return decodeResult(result, ({ body, response }) => ({
      datacenters: body.datacenters.map(datacenterFromSchema),
      response,
    }));
  }

  async all(options: RequestOptions = {}): Promise<Result<Datacenter[], ClientError>> {
    return fetchAll(async (page) => {
      const result = await this.list({ page, perPage: DEFAULT_PER_PAGE }, options);
      return result.map(({ datacenters, response }) => ({ items: datacenters, response }));
    });
  }
}
