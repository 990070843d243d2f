/**
 * Middleware barrel: re-exports all middleware.
 */

export { createErrorHandler } from "./error-handler.js";
export type { ErrorHandlerDeps } from "./error-handler.js";
export { requestContextMiddleware, REQUEST_ID_HEADER } from "./request-context.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { parseBody, parseQuery } from "./validate.js";
export {
  idempotencyMiddleware,
  InMemoryIdempotencyStore,
  IDEMPOTENCY_HEADER,
  REPLAY_HEADER,
} from "./idempotency.js";
export type { IdempotencyStore, CachedResponse } from "./idempotency.js";
export {
  authMiddleware,
  unsecuredAuthMiddleware,
  requirePermission,
  assertSubjectAccess,
  subjectFilter,
  TENANT_HEADER,
  ACTOR_HEADER,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
export { tenantMiddleware } from "./tenant.js";
