import { Result } from "better-result";
import { ValidationError, type ClientError } from "@hcloud-ts/errors";
import type { Client, RequestOptions } from "./client";
import { imageFromSchema } from "./converters";
import type { Image, ImageType } from "./models";
import { DEFAULT_PER_PAGE, fetchAll, listQuery, type ListOpts } from "./pagination";
import { decodeResult, notFoundResponse, type ApiResponse } from "./response";
import type {
  SchemaImageGetResponse,
  SchemaImageListResponse,
  SchemaImageUpdateRequest,
  SchemaImageUpdateResponse,
} from "./schema";
import { validateId, validateName } from "./validation";

export interface ImageListOpts extends ListOpts {
  name?: string;
  type?: ImageType;
}

export interface ImageUpdateOpts {
  description?: string;
  /** Only "snapshot" is accepted, to convert a backup into a snapshot */
  type?: ImageType;
}

export interface ImageResult {
  image: Image;
  response: ApiResponse;
}

export interface ImageLookup {
  image: Image | null;
  response: ApiResponse;
}

export interface ImagePage {
  images: Image[];
  response: ApiResponse;
}

/**
 * Client for the images API
 */
export class ImageClient {
  constructor(private readonly client: Client) {}

  async get(id: number, options: RequestOptions = {}): Promise<Result<ImageLookup, ClientError>> {
    const valid = validateId(id);
    if (valid.isErr()) {
      return Result.err(valid.error);
    }

    const result = await this.client.request<SchemaImageGetResponse>("GET", `/images/${id}`, undefined, options);
    if (result.isErr()) {
      const absent = notFoundResponse(result.error);
      return absent ? Result.ok({ image: null, response: absent }) : Result.err(result.error);
    }

    return decodeResult(result, ({ body, response }) => ({
      image: imageFromSchema(body.image),
      response,
    }));
  }

  async getByName(name: string, options: RequestOptions = {}): Promise<Result<ImageLookup, ClientError>> {
    const valid = validateName(name);
    if (valid.isErr()) {
      return Result.err(valid.error);
    }
    const result = await this.list({ name }, options);
    return result.map(({ images, response }) => ({ image: images[0] ?? null, response }));
  }

  async list(opts: ImageListOpts = {}, options: RequestOptions = {}): Promise<Result<ImagePage, ClientError>> {
    const path = `/images${listQuery(opts, { name: opts.name, type: opts.type })}`;
    const result = await this.client.request<SchemaImageListResponse>("GET", path, undefined, options);
    return decodeResult(result, ({ body, response }) => ({
      images: body.images.map(imageFromSchema),
      response,
    }));
  }

  async all(options: RequestOptions = {}): Promise<Result<Image[], ClientError>> {
    return fetchAll(async (page) => {
      const result = await this.list({ page, perPage: DEFAULT_PER_PAGE }, options);
      return result.map(({ images, response }) => ({ items: images, response }));
    });
  }

  async update(
    image: Pick<Image, "id">,
    opts: ImageUpdateOpts,
    options: RequestOptions = {}
  ): Promise<Result<ImageResult, ClientError>> {
    const valid = validateId(image.id);
    if (valid.isErr()) {
      return Result.err(valid.error);
    }
    if (opts.type !== undefined && opts.type !== "snapshot") {
      return Result.err(new ValidationError({ message: `invalid image type: ${opts.type}` }));
    }

    const body: SchemaImageUpdateRequest = {};
    if (opts.description !== undefined) body.description = opts.description;
    if (opts.type !== undefined) body.type = opts.type;

    const result = await this.client.request<SchemaImageUpdateResponse>("PUT", `/images/${image.id}`, body, options);
    return decodeResult(result, ({ body: updated, response }) => ({
      image: imageFromSchema(updated.image),
      response,
    }));
  }

  async delete(id: number, options: RequestOptions = {}): Promise<Result<ApiResponse, ClientError>> {
    const valid = validateId(id);
    if (valid.isErr()) {
      return Result.err(valid.error);
    }
    return this.client.requestEmpty("DELETE", `/images/${id}`, options);
  }
}
