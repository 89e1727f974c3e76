// backend/services/shared/src/http/pagination.ts
import { z } from "zod";

export type PageRequest = { page: number; size: number };

export type PagedResult<T> = {
  items: T[];
  page: number;
  pageSize: number;
  totalCount: number;
  totalPages: number;
};

/** Anything that can count a collection and hand back a window of it. */
export interface PageSource<T> {
  count(): Promise<number>;
  list(skip: number, take: number): Promise<T[]>;
}

export function totalPagesFor(totalCount: number, pageSize: number): number {
  if (!Number.isInteger(pageSize) || pageSize < 1) {
    throw new RangeError(`pageSize must be a positive integer, got ${pageSize}`);
  }
  if (!Number.isInteger(totalCount) || totalCount < 0) {
    throw new RangeError(`totalCount must be a non-negative integer, got ${totalCount}`);
  }
  return Math.ceil(totalCount / pageSize);
}

export function offsetFor({ page, size }: PageRequest): number {
  return (page - 1) * size;
}

/**
 * totalCount is the size of the whole collection, never of the returned slice.
 * A page past the end yields no items but keeps the real totals.
 */
export async function paginate<T>(
  source: PageSource<T>,
  request: PageRequest
): Promise<PagedResult<T>> {
  const totalCount = await source.count();
  const items = await source.list(offsetFor(request), request.size);
  return {
    items,
    page: request.page,
    pageSize: request.size,
    totalCount,
    totalPages: totalPagesFor(totalCount, request.size),
  };
}

export async function mapPage<T, V>(
  result: PagedResult<T>,
  project: (item: T) => Promise<V> | V
): Promise<PagedResult<V>> {
  const items: V[] = [];
  for (const item of result.items) items.push(await project(item));
  return { ...result, items };
}

export type PageQueryOptions = { defaultSize: number; maxSize: number };

/** `?page=&size=` with page ≥ 1 and 1 ≤ size ≤ maxSize. */
export function pageQuerySchema({ defaultSize, maxSize }: PageQueryOptions) {
  return z.object({
    page: z.coerce.number().int().min(1).default(1),
    size: z.coerce.number().int().min(1).max(maxSize).default(defaultSize),
  });
}
