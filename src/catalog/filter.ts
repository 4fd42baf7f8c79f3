// Catalog narrowing: deployment scope, free-text query, offset/limit paging

import type { DiscoveryResource, PaginationState } from "../types/x402.js";

/** Restrict the catalog to resources under the configured path fragment */
export function filterByDomain(
  items: readonly DiscoveryResource[],
  pathFilter: string,
): readonly DiscoveryResource[] {
  if (pathFilter === "") return items;
  const fragment = pathFilter.toLowerCase();
  return items.filter((item) => item.resource.toLowerCase().includes(fragment));
}

/** Case-insensitive substring match on the resource URL, order preserved */
export function filterByQuery(
  items: readonly DiscoveryResource[],
  query: string | undefined,
): readonly DiscoveryResource[] {
  if (!query) return items;
  const needle = query.toLowerCase();
  return items.filter((item) => item.resource.toLowerCase().includes(needle));
}

/**
 * Slice a page out of the filtered list.
 * A negative limit means no limit; offset is clamped to [0, total].
 * limit and offset are echoed back as supplied.
 */
export function paginate<T>(
  items: readonly T[],
  limit?: number,
  offset?: number,
): { page: T[]; pagination: PaginationState } {
  const total = items.length;
  const start = offset !== undefined && offset > 0 ? Math.min(offset, total) : 0;

  let end = total;
  if (limit !== undefined && limit >= 0) {
    end = Math.min(start + limit, total);
  }

  const pagination: PaginationState = { total };
  if (limit !== undefined) pagination.limit = limit;
  if (offset !== undefined) pagination.offset = offset;

  return { page: items.slice(start, end), pagination };
}

export interface CatalogSearch {
  query?: string;
  limit?: number;
  offset?: number;
}

export interface CatalogPage {
  items: DiscoveryResource[];
  pagination: PaginationState;
  /** Version of the first filtered item, 1 when nothing matched */
  x402Version: number;
}

/** domain filter -> query filter -> paginate */
export function selectPage(
  items: readonly DiscoveryResource[],
  pathFilter: string,
  search: CatalogSearch,
): CatalogPage {
  const filtered = filterByQuery(filterByDomain(items, pathFilter), search.query);
  const { page, pagination } = paginate(filtered, search.limit, search.offset);
  return {
    items: page,
    pagination,
    x402Version: filtered[0]?.x402Version ?? 1,
  };
}
