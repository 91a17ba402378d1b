/**
 * limit/offset query parameters for list endpoints
 *
 * Anything that is not a whole number falls back to the default; limits are
 * clamped into [minLimit, maxLimit] and negative offsets become 0.
 */

export interface PaginationConfig {
  defaultLimit?: number;
  maxLimit?: number;
  minLimit?: number;
}

export interface PaginationParams {
  limit: number;
  offset: number;
}

function wholeNumber(value: string | undefined): number | undefined {
  if (value === undefined || !/^\s*-?\d+\s*$/.test(value)) return undefined;
  return Number(value);
}

/**
 * @example
 * const { limit, offset } = parsePagination(c.req.query("limit"), c.req.query("offset"));
 */
export function parsePagination(
  limitParam: string | undefined,
  offsetParam: string | undefined,
  { defaultLimit = 50, maxLimit = 100, minLimit = 1 }: PaginationConfig = {}
): PaginationParams {
  const limit = wholeNumber(limitParam);
  const offset = wholeNumber(offsetParam);

  return {
    limit: limit === undefined ? defaultLimit : Math.min(Math.max(limit, minLimit), maxLimit),
    offset: offset === undefined || offset < 0 ? 0 : offset,
  };
}
