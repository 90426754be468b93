import { Result } from "better-result";
import type { ApiResponse, Pagination } from "./response";

/** Page size used by every `all()` call */
export const DEFAULT_PER_PAGE = 50;

export interface ListOpts {
  page?: number;
  perPage?: number;
}

export interface Page<T> {
  items: T[];
  response: ApiResponse;
}

/**
 * Build the query string for a list call. Unset, zero and empty values
 * are left out.
 */
export function listQuery(
  opts: ListOpts,
  filters: Record<string, string | undefined> = {}
): string {
  const params = new URLSearchParams();
  if (opts.page !== undefined && opts.page > 0) {
    params.set("page", String(opts.page));
  }
  if (opts.perPage !== undefined && opts.perPage > 0) {
    params.set("per_page", String(opts.perPage));
  }
  for (const [key, value] of Object.entries(filters)) {
    if (value !== undefined && value !== "") {
      params.set(key, value);
    }
  }
  const query = params.toString();
  return query ? `?${query}` : "";
}

function nextPage(pagination: Pagination | undefined): number | null {
  if (!pagination) return null;
  if (pagination.lastPage !== null && pagination.page >= pagination.lastPage) return null;
  const next = pagination.nextPage ?? (pagination.lastPage !== null ? pagination.page + 1 : null);
  return next !== null && next > pagination.page ? next : null;
}

/**
 * Fetch pages 1, 2, 3, … until the last one and concatenate their items
 * in page order. The first failing page aborts the whole run and its error
 * is returned; items collected so far are dropped.
 *
 * @example
 * ```ts
 * const keys = await fetchAll((page) =>
 *   client.sshKey.list({ page, perPage: DEFAULT_PER_PAGE }).then((r) =>
 *     r.map(({ sshKeys, response }) => ({ items: sshKeys, response }))
 *   )
 * );
 * ```
 */
export async function fetchAll<T, E>(
  fetchPage: (page: number) => Promise<Result<Page<T>, E>>
): Promise<Result<T[], E>> {
  const items: T[] = [];
  let page: number | null = 1;

  while (page !== null) {
    const result = await fetchPage(page);
    if (result.isErr()) {
      return Result.err(result.error);
    }
    const current = result.unwrap();
    items.push(...current.items);
    page = nextPage(current.response.meta.pagination);
  }

  return Result.ok(items);
}
