/**
 * Response envelopes
 *
 *   resource      the object itself
 *   full list     { data, total }
 *   page          { data, meta: { total, page, pageSize, hasMore, offset } }
 *   acknowledged  { success, message? }
 *   error         { error: { code, message, details? } }
 */

import type { Context } from "hono";

export type ErrorStatus = 400 | 401 | 403 | 404 | 408 | 409 | 413 | 429 | 500 | 503;

export interface ListBody<T> {
  data: T[];
  total: number;
}

export interface PageBody<T> {
  data: T[];
  meta: {
    total: number;
    page: number;
    pageSize: number;
    hasMore: boolean;
    offset: number;
  };
}

export interface ErrorBody {
  error: { code: string; message: string; details?: unknown };
}

export function listResponse<T>(c: Context, items: T[]) {
  const body: ListBody<T> = { data: items, total: items.length };
  return c.json(body);
}

/**
 * One offset/limit window over `total` rows
 */
export function paginatedResponse<T>(c: Context, items: T[], total: number, offset: number, limit: number) {
  const body: PageBody<T> = {
    data: items,
    meta: {
      total,
      page: Math.floor(offset / limit) + 1,
      pageSize: limit,
      hasMore: offset + items.length < total,
      offset,
    },
  };
  return c.json(body);
}

export function operationResponse(c: Context, message?: string) {
  return c.json(message === undefined ? { success: true } : { success: true, message });
}

export function errorResponse(c: Context, code: string, message: string, status: ErrorStatus = 400, details?: unknown) {
  const body: ErrorBody = { error: details === undefined ? { code, message } : { code, message, details } };
  return c.json(body, status);
}
