import { Result } from "better-result";
import type { ClientError } from "@hcloud-ts/errors";
import type { Client, RequestOptions } from "./client";
import { actionFromSchema } from "./converters";
import type { Action, ActionStatus } from "./models";
import { DEFAULT_PER_PAGE, fetchAll, listQuery, type ListOpts } from "./pagination";
import { decodeResult, notFoundResponse, type ApiResponse } from "./response";
import type { SchemaActionGetResponse, SchemaActionListResponse } from "./schema";
import { validateId } from "./validation";

export interface ActionListOpts extends ListOpts {
  status?: ActionStatus;
  /** e.g. "id:desc" or "started" */
  sort?: string;
}

export interface ActionLookup {
  action: Action | null;
  response: ApiResponse;
}

export interface ActionPage {
  actions: Action[];
  response: ApiResponse;
}

/**
 * Client for the actions API
 */
export class ActionClient {
  constructor(private readonly client: Client) {}

  async get(id: number, options: RequestOptions = {}): Promise<Result<ActionLookup, ClientError>> {
    const valid = validateId(id);
    if (valid.isErr()) {
      return Result.err(valid.error);
    }

    const result = await this.client.request<SchemaActionGetResponse>("GET", `/actions/${id}`, undefined, options);
    if (result.isErr()) {
      const absent = notFoundResponse(result.error);
      return absent ? Result.ok({ action: null, response: absent }) : Result.err(result.error);
    }

    return decodeResult(result, ({ body, response }) => ({
      action: actionFromSchema(body.action),
      response,
    }));
  }

  async list(opts: ActionListOpts = {}, options: RequestOptions = {}): Promise<Result<ActionPage, ClientError>> {
    const path = `/actions${listQuery(opts, { status: opts.status, sort: opts.sort })}`;
    const result = await this.client.request<SchemaActionListResponse>("GET", path, undefined, options);
    return decodeResult(result, ({ body, response }) => ({
      actions: body.actions.map(actionFromSchema),
      response,
    }));
  }

  async all(options: RequestOptions = {}): Promise<Result<Action[], ClientError>> {
    return fetchAll(async (page) => {
      const result = await this.list({ page, perPage: DEFAULT_PER_PAGE }, options);
      return result.map(({ actions, response }) => ({ items: actions, response }));
    });
  }
}
