/**
 * Idempotency middleware.
 *
 * Caches POST mutation responses by tenant and Idempotency-Key header.
 * If the same tenant sends the same key again within the TTL, the cached
 * response is returned instead of re-executing the handler. Keys never
 * match across tenants.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

// =============================================================================
// Idempotency Store Interface
// =============================================================================

export interface CachedResponse {
  readonly status: number;
  readonly body: string;
  readonly headers: Record<string, string>;
  readonly cachedAt: number;
}

export interface IdempotencyStore {
  get(tenantId: string, key: string): CachedResponse | undefined;
  set(tenantId: string, key: string, response: CachedResponse): void;
}

// =============================================================================
// In-Memory Store
// =============================================================================

export class InMemoryIdempotencyStore implements IdempotencyStore {
  private readonly _cache = new Map<string, CachedResponse>();
  private readonly _ttlMs: number;
  private readonly _now: () => number;

  constructor(ttlMs: number = 86400000, now: () => number = Date.now) {
    this._ttlMs = ttlMs;
    this._now = now;
  }

  get(tenantId: string, key: string): CachedResponse | undefined {
    const cacheKey = this._cacheKey(tenantId, key);
    const entry = this._cache.get(cacheKey);
    if (entry === undefined) {
      return undefined;
    }

    if (this._now() - entry.cachedAt > this._ttlMs) {
      this._cache.delete(cacheKey);
      return undefined;
    }

    return entry;
  }

  set(tenantId: string, key: string, response: CachedResponse): void {
    this._cache.set(this._cacheKey(tenantId, key), response);
  }

  get size(): number {
    return this._cache.size;
  }

  clear(): void {
    this._cache.clear();
  }

  private _cacheKey(tenantId: string, key: string): string {
    return JSON.stringify([tenantId, key]);
  }
}

// =============================================================================
// Middleware
// =============================================================================

export const IDEMPOTENCY_HEADER = "Idempotency-Key";
export const REPLAY_HEADER = "X-Idempotent-Replay";

/**
 * Must run AFTER an auth middleware.
 */
export function idempotencyMiddleware(
  store: IdempotencyStore,
  now: () => number = Date.now,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    if (c.req.method !== "POST") {
      return next();
    }

    const idempotencyKey = c.req.header(IDEMPOTENCY_HEADER);
    if (idempotencyKey === undefined) {
      return next();
    }

    const tenantId = c.get("auth").tenantId;
    const cached = store.get(tenantId, idempotencyKey);
    if (cached !== undefined) {
      const headers = new Headers(cached.headers);
      headers.set(REPLAY_HEADER, "true");
      return new Response(cached.body, { status: cached.status, headers });
    }

    await next();

    if (c.res.status < 400) {
      const clonedRes = c.res.clone();
      const body = await clonedRes.text();
      const headers: Record<string, string> = {};
      clonedRes.headers.forEach((value, key) => {
        headers[key] = value;
      });

      store.set(tenantId, idempotencyKey, {
        status: clonedRes.status,
        body,
        headers,
        cachedAt: now(),
      });
    }
  };
}
