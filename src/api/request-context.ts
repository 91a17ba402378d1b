/**
 * Per-request context carried through async calls
 *
 * Each request gets an id (the client's X-Request-ID when it is well formed)
 * that every log line written while serving it carries, and that comes back
 * on the response together with the time taken.
 */

import { AsyncLocalStorage } from "node:async_hooks";
import type { MiddlewareHandler } from "hono";
import { nanoid } from "nanoid";
import { withCorrelationId } from "../logging";

export const REQUEST_ID_HEADER = "X-Request-ID";
export const RESPONSE_TIME_HEADER = "X-Response-Time";

const CLIENT_REQUEST_ID = /^[\w.-]{1,64}$/;

export interface RequestContext {
  requestId: string;
  method: string;
  path: string;
  /** performance.now() at arrival */
  startedAt: number;
}

const storage = new AsyncLocalStorage<RequestContext>();

export function getRequestContext(): RequestContext | undefined {
  return storage.getStore();
}

function chooseRequestId(supplied: string | undefined): string {
  return supplied !== undefined && CLIENT_REQUEST_ID.test(supplied) ? supplied : `req-${nanoid(12)}`;
}

export function requestContext(): MiddlewareHandler {
  return (c, next) => {
    const context: RequestContext = {
      requestId: chooseRequestId(c.req.header(REQUEST_ID_HEADER)),
      method: c.req.method,
      path: c.req.path,
      startedAt: performance.now(),
    };

    return storage.run(context, () =>
      withCorrelationId(context.requestId, async () => {
        try {
          await next();
        } finally {
          c.header(REQUEST_ID_HEADER, context.requestId);
          c.header(RESPONSE_TIME_HEADER, `${(performance.now() - context.startedAt).toFixed(2)}ms`);
        }
      })
    );
  };
}
