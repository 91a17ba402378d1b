/**
 * API Middleware and Helpers
 *
 * - APIError and the definitions-based apiError() factory
 * - Request validation (ids, JSON bodies)
 * - The one place errors become responses
 */

import type { Context } from "hono";
import { z } from "zod";
import {
  CsrfRejectedError,
  ForbiddenError,
  InvalidScopesError,
  RateLimitedError,
  UnauthenticatedError,
} from "../auth/errors";
import { createLogger } from "../logging";
import { ApiError, errorFromCode, type ErrorDefinition } from "./error-codes";
import { errorResponse, type ErrorStatus } from "./responses";
import { TimeoutError } from "./timeout";

const log = createLogger("api");

// ==================== Error Class ====================

/**
 * API Error with code and status
 */
export class APIError extends Error {
  constructor(
    public code: string,
    message: string,
    public status: ErrorStatus = 400,
    public details?: unknown
  ) {
    super(message);
    this.name = "APIError";
  }
}

/**
 * Build a throwable APIError from a predefined definition
 */
export function apiError(error: ErrorDefinition, customMessage?: string, details?: unknown): APIError {
  return new APIError(error.code, customMessage ?? error.message, error.status, details);
}

// ==================== Validation Helpers ====================

/**
 * Nanoid format: URL-safe alphabet (A-Za-z0-9_-)
 * Ids are minted at length 12; 8-21 is accepted
 */
const NANOID_PATTERN = /^[A-Za-z0-9_-]{8,21}$/;

/**
 * Validate required ID from URL params
 */
export function validateId(id: string | undefined, name = "ID"): string {
  const trimmed = id?.trim();
  if (!trimmed) {
    throw apiError(ApiError.INVALID_ID, `${name} is required`);
  }

  if (!NANOID_PATTERN.test(trimmed)) {
    throw apiError(
      ApiError.INVALID_ID,
      `${name} must be 8-21 characters using only letters, numbers, underscore, or hyphen`
    );
  }

  return trimmed;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
      return `${path}${issue.message}`;
    })
    .join("; ");
}

/**
 * Validate request body with Zod schema
 */
export async function validateBody<T extends z.ZodTypeAny>(c: Context, schema: T): Promise<z.output<T>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw apiError(ApiError.INVALID_JSON);
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    throw apiError(ApiError.VALIDATION_ERROR, formatIssues(result.error));
  }
  return result.data;
}

// ==================== Error Handling ====================

/**
 * Translate any thrown error into the error envelope.
 * Authentication failures never say which check failed.
 */
export function errorHandler(err: Error, c: Context) {
  if (err instanceof UnauthenticatedError) {
    return errorFromCode(c, ApiError.UNAUTHENTICATED);
  }

  if (err instanceof ForbiddenError) {
    return errorResponse(c, err.code, err.message, err.statusCode);
  }

  if (err instanceof CsrfRejectedError) {
    return errorResponse(c, err.code, err.message, err.statusCode);
  }

  if (err instanceof RateLimitedError) {
    c.header("Retry-After", String(err.retryAfterSeconds));
    return errorResponse(c, err.code, err.message, err.statusCode, { retryAfter: err.retryAfterSeconds });
  }

  if (err instanceof InvalidScopesError) {
    return errorResponse(c, err.code, err.message, err.statusCode, { scopes: err.scopes });
  }

  if (err instanceof TimeoutError) {
    log.warn("Request timed out", { operation: err.operation, timeoutMs: err.timeoutMs, path: c.req.path });
    return errorFromCode(c, ApiError.REQUEST_TIMEOUT);
  }

  if (err instanceof APIError) {
    return errorResponse(c, err.code, err.message, err.status, err.details);
  }

  if (err instanceof z.ZodError) {
    return errorFromCode(c, ApiError.VALIDATION_ERROR, formatIssues(err));
  }

  log.error("Unhandled error", { method: c.req.method, path: c.req.path, error: err });
  return errorFromCode(c, ApiError.INTERNAL_ERROR);
}

/**
 * 404 handler for unmatched routes
 */
export function notFoundHandler(c: Context) {
  return errorResponse(c, "NOT_FOUND", `API endpoint not found: ${c.req.method} ${c.req.path}`, 404);
}
