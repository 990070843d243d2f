/**
 * Request logging middleware.
 *
 * One structured line per request: method, path, status, duration and
 * request id. Server errors log at `error`, client errors at `warn`.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  readonly tenantId?: string | undefined;
}

export function loggerMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    const entry: RequestLogEntry = {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
      tenantId: c.get("auth")?.tenantId,
    };

    const logger = c.get("logger");
    const message = `${entry.method} ${entry.path} ${String(entry.status)}`;
    if (entry.status >= 500) {
      logger.error(entry, message);
    } else if (entry.status >= 400) {
      logger.warn(entry, message);
    } else {
      logger.info(entry, message);
    }
  };
}
