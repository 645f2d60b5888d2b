import type { Paging } from "@todolist/types";

export const DEFAULT_PAGE = 1;
export const DEFAULT_LIMIT = 10;
export const MAX_LIMIT = 100;

export type PagingQuery = Pick<Paging, "page" | "limit">;

// page 0 -> 1; limit 0 or >= 100 -> 10. Idempotent.
export function normalizePaging({ page, limit }: PagingQuery): PagingQuery {
  return {
    page: page === 0 ? DEFAULT_PAGE : page,
    limit: limit === 0 || limit >= MAX_LIMIT ? DEFAULT_LIMIT : limit,
  };
}

export function pagingOffset({ page, limit }: PagingQuery): number {
  return (page - 1) * limit;
}
