/**
 * Body Size Limit Middleware
 *
 * Every request body here is a small JSON or form document, so one limit
 * covers the API. Content-Length gives fast rejection; bodies without it
 * are measured after reading.
 */

import type { Context, Next } from "hono";
import { createLogger } from "../logging";
import { ApiError } from "./error-codes";
import { apiError } from "./middleware";

const log = createLogger("body-limit");

/** 64KB: the largest legitimate body is a group or board description */
export const DEFAULT_BODY_LIMIT = 64 * 1024;

const BODY_METHODS = new Set(["POST", "PUT", "PATCH", "DELETE"]);

function tooLarge(maxSize: number) {
  return apiError(ApiError.PAYLOAD_TOO_LARGE, `Request body too large. Max: ${Math.round(maxSize / 1024)}KB`, {
    maxSize,
  });
}

/**
 * @throws APIError PAYLOAD_TOO_LARGE
 */
export function bodyLimit(maxSize = DEFAULT_BODY_LIMIT) {
  return async (c: Context, next: Next) => {
    if (!BODY_METHODS.has(c.req.method)) {
      return next();
    }

    const contentLength = Number.parseInt(c.req.header("Content-Length") ?? "", 10);
    if (!Number.isNaN(contentLength)) {
      if (contentLength > maxSize) {
        log.warn("Body size exceeds limit", { path: c.req.path, bodySize: contentLength, maxSize });
        throw tooLarge(maxSize);
      }
      return next();
    }

    // No declared length: read once, measure, and hand the text on
    const body = await c.req.text();
    if (Buffer.byteLength(body) > maxSize) {
      log.warn("Body size exceeds limit", { path: c.req.path, bodySize: Buffer.byteLength(body), maxSize });
      throw tooLarge(maxSize);
    }

    await next();
  };
}
