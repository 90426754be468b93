import { Result } from "better-result";
import type { ClientError } from "@hcloud-ts/errors";
import type { Client, RequestOptions } from "./client";
import { locationFromSchema } from "./converters";
import type { Location } from "./models";
import { DEFAULT_PER_PAGE, fetchAll, listQuery, type ListOpts } from "./pagination";
import { decodeResult, notFoundResponse, type ApiResponse } from "./response";
import type { SchemaLocationGetResponse, SchemaLocationListResponse } from "./schema";
import { validateId, validateName } from "./validation";

export interface LocationListOpts extends ListOpts {
  name?: string;
}

export interface LocationLookup {
  location: Location | null;
  response: ApiResponse;
}

export interface LocationPage {
  locations: Location[];
  response: ApiResponse;
}

export class LocationClient {
  constructor(private readonly client: Client) {}

  async get(id: number, options: RequestOptions = {}): Promise<Result<LocationLookup, ClientError>> {
    const valid = validateId(id);
    if (valid.isErr()) {
      return Result.err(valid.error);
    }

    const result = await this.client.request<SchemaLocationGetResponse>("GET", `/locations/${id}`, undefined, options);
    if (result.isErr()) {
      const absent = notFoundResponse(result.error);
      return absent ? Result.ok({ location: null, response: absent }) : Result.err(result.error);
    }

    return decodeResult(result, ({ body, response }) => ({
      location: locationFromSchema(body.location),
      response,
    }));
  }

  async getByName(name: string, options: RequestOptions = {}): Promise<Result<LocationLookup, ClientError>> {
    const valid = validateName(name);
    if (valid.isErr()) {
      return Result.err(valid.error);
    }
    const result = await this.list({ name }, options);
    return result.map(({ locations, response }) => ({ location: locations[0] ?? null, response }));
  }

  async list(opts: LocationListOpts = {}, options: RequestOptions = {}): Promise<Result<LocationPage, ClientError>> {
    const path = `/locations${listQuery(opts, { name: opts.name })}`;
    const result = await this.client.request<SchemaLocationListResponse>("GET", path, undefined, options);
    return decodeResult(result, ({ body, response }) => ({
      locations: body.locations.map(locationFromSchema),
      response,
    }));
  }

  async all(options: RequestOptions = {}): Promise<Result<Location[], ClientError>> {
    return fetchAll(async (page) => {
      const result = await this.list({ page, perPage: DEFAULT_PER_PAGE }, options);
      return result.map(({ locations, response }) => ({ items: locations, response }));
    });
  }
}
