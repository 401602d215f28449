import type { Pagination } from './types';

export const DEFAULT_PAGE_SIZE = 10;

export interface PageWindow {
  page: number;
  size: number;
  offset: number;
}

/**
 * Clamp a requested page: pages below 1 become 1, sizes below 1 become
 * {@link DEFAULT_PAGE_SIZE}.
 */
export function pageWindow(page: number, size: number): PageWindow {
  const current = Number.isFinite(page) && page >= 1 ? Math.trunc(page) : 1;
  const perPage = Number.isFinite(size) && size >= 1 ? Math.trunc(size) : DEFAULT_PAGE_SIZE;
  return { page: current, size: perPage, offset: (current - 1) * perPage };
}

export function buildPagination(page: number, size: number, total: number): Pagination {
  const totalPages = total > 0 ? Math.ceil(total / size) : 1;
  return {
    currentPage: page,
    perPage: size,
    total,
    totalPages,
    nextPage: page < totalPages ? page + 1 : null,
    previousPage: page > 1 ? page - 1 : null,
  };
}
