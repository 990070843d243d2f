/**
 * Request context middleware.
 *
 * Propagates or generates the X-Request-Id header and binds a child
 * logger carrying it, so every log line of a request can be joined.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";

export const REQUEST_ID_HEADER = "X-Request-Id";

export function requestContextMiddleware(logger: Logger): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const requestId = c.req.header(REQUEST_ID_HEADER) ?? randomUUID();

    c.set("requestId", requestId);
    c.set("logger", logger.child({ requestId }));

    await next();

    c.header(REQUEST_ID_HEADER, requestId);
  };
}
