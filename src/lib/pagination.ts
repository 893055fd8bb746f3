import type { FastifyRequest } from 'fastify';
import { serverConfig } from '../config/index.js';
import { AppError } from './errors.js';

/** TMDb refuses pages past this. */
export const MAX_PROVIDER_PAGE = 500;

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

/** What a service returns for one page; links are added at the edge. */
export interface PageResult<T> {
  count: number;
  page: number;
  hasNext: boolean;
  results: T[];
}

export interface PaginatedResponse<T> {
  count: number;
  next: string | null;
  previous: string | null;
  results: T[];
}

export function pageLink(request: FastifyRequest, page: number): string {
  const url = new URL(request.url, serverConfig.publicUrl);
  url.searchParams.set('page', String(page));
  return url.toString();
}

export function paginate<T>(request: FastifyRequest, result: PageResult<T>): PaginatedResponse<T> {
  return {
    count: result.count,
    next: result.hasNext ? pageLink(request, result.page + 1) : null,
    previous: result.page > 1 ? pageLink(request, result.page - 1) : null,
    results: result.results,
  };
}

export function offsetFor(page: number, pageSize: number): number {
  return (page - 1) * pageSize;
}

export function hasNextLocalPage(page: number, pageSize: number, count: number): boolean {
  return page * pageSize < count;
}

/** Page 1 always exists, even for an empty list. */
export function assertLocalPage(page: number, pageSize: number, count: number): void {
  const lastPage = Math.max(1, Math.ceil(count / pageSize));
  if (page > lastPage) {
    throw new AppError('NOT_FOUND', 'Invalid page.', { page, lastPage });
  }
}
