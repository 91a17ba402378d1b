/**
 * Error catalogue: every code the API answers with, its status and default
 * message. GET /api/docs/errors publishes this list.
 *
 *   throw apiError(ApiError.NOT_FOUND, "Board not found");
 */

import type { Context } from "hono";
import { errorResponse, type ErrorStatus } from "./responses";

export interface ErrorDefinition {
  code: string;
  status: ErrorStatus;
  message: string;
}

function define<C extends string, S extends ErrorStatus>(code: C, status: S, message: string) {
  return { code, status, message };
}

export const ApiError = {
  // Malformed or rejected input
  INVALID_JSON: define("INVALID_JSON", 400, "Invalid JSON in request body"),
  VALIDATION_ERROR: define("VALIDATION_ERROR", 400, "Validation failed"),
  INVALID_ID: define("INVALID_ID", 400, "Invalid identifier"),
  INVALID_SCOPES: define("INVALID_SCOPES", 400, "Requested scopes are not permitted"),
  INVALID_PASSWORD: define("INVALID_PASSWORD", 400, "Current password is incorrect"),
  SELF_ACTION: define("SELF_ACTION", 400, "Administrators cannot change their own account status"),

  // Gate rejections; the 401 message never says which check failed
  UNAUTHENTICATED: define("UNAUTHENTICATED", 401, "Invalid credentials"),
  FORBIDDEN: define("FORBIDDEN", 403, "Access denied"),
  CSRF_REJECTED: define("CSRF_REJECTED", 403, "CSRF token missing or invalid"),
  RATE_LIMITED: define("RATE_LIMITED", 429, "Too many requests. Please try again later."),

  NOT_FOUND: define("NOT_FOUND", 404, "Resource not found"),
  REQUEST_TIMEOUT: define("REQUEST_TIMEOUT", 408, "Request timed out"),
  ALREADY_EXISTS: define("ALREADY_EXISTS", 409, "Resource already exists"),
  LAST_OWNER: define("LAST_OWNER", 409, "A group must keep at least one owner"),
  PAYLOAD_TOO_LARGE: define("PAYLOAD_TOO_LARGE", 413, "Request body too large"),

  INTERNAL_ERROR: define("INTERNAL_ERROR", 500, "Internal server error"),
  SERVICE_UNAVAILABLE: define("SERVICE_UNAVAILABLE", 503, "Service temporarily unavailable"),
} satisfies Record<string, ErrorDefinition>;

export interface ErrorCodeDoc extends ErrorDefinition {
  category: "client" | "server";
}

/**
 * Respond with a catalogued error, optionally replacing its message
 */
export function errorFromCode(c: Context, error: ErrorDefinition, message?: string, details?: unknown) {
  return errorResponse(c, error.code, message ?? error.message, error.status, details);
}

export function listErrorCodes(): ErrorCodeDoc[] {
  return Object.values(ApiError).map(({ code, status, message }) => ({
    code,
    status,
    message,
    category: status >= 500 ? "server" : "client",
  }));
}
