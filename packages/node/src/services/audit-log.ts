/**
 * Append-only audit log for recording who-did-what-when.
 *
 * Every entry is chained to its predecessor:
 *
 *   entry[0].hash = sha256(canonicalize(entry[0] content) + "genesis")
 *   entry[n].hash = sha256(canonicalize(entry[n] content) + entry[n-1].hash)
 *
 * Content is canonicalized with RFC 8785 (JCS). Editing any entry breaks
 * the chain from that point on, which verify() reports.
 *
 * In-memory only: survives as long as the process.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";

// =============================================================================
// Types
// =============================================================================

export const GENESIS_HASH = "genesis";

export type AuditCategory = "mutation" | "integrity";

export interface AuditLogInput {
  readonly tenantId: string;
  readonly action: string;
  readonly resourceType: string;
  readonly resourceId: string;
  readonly actor: string;
  readonly category?: AuditCategory | undefined;
  readonly detail?: string | undefined;
}

export interface AuditLogEntry {
  readonly sequence: number;
  readonly timestamp: string;
  readonly tenantId: string;
  readonly action: string;
  readonly resourceType: string;
  readonly resourceId: string;
  readonly actor: string;
  readonly category: AuditCategory;
  readonly detail?: string | undefined;
  readonly previousHash: string;
  readonly hash: string;
}

export interface AuditLogQuery {
  readonly tenantId?: string | undefined;
  readonly action?: string | undefined;
  readonly resourceType?: string | undefined;
  readonly resourceId?: string | undefined;
  readonly category?: AuditCategory | undefined;
  readonly limit?: number | undefined;
}

export type AuditChainResult =
  | { readonly valid: true; readonly length: number }
  | { readonly valid: false; readonly brokenAt: number; readonly reason: string };

// =============================================================================
// Hashing
// =============================================================================

function canonicalContent(entry: Omit<AuditLogEntry, "hash" | "previousHash">): string {
  return canonicalize({
    sequence: entry.sequence,
    timestamp: entry.timestamp,
    tenantId: entry.tenantId,
    action: entry.action,
    resourceType: entry.resourceType,
    resourceId: entry.resourceId,
    actor: entry.actor,
    category: entry.category,
    detail: entry.detail ?? null,
  });
}

export function computeAuditHash(
  entry: Omit<AuditLogEntry, "hash" | "previousHash">,
  previousHash: string,
): string {
  return createHash("sha256")
    .update(canonicalContent(entry) + previousHash)
    .digest("hex");
}

// =============================================================================
// AuditLog
// =============================================================================

export class AuditLog {
  private readonly _entries: AuditLogEntry[] = [];
  private readonly _clock: () => Date;

  constructor(clock: () => Date = () => new Date()) {
    this._clock = clock;
  }

  /**
   * Append an entry to the audit log.
   */
  append(input: AuditLogInput): AuditLogEntry {
    const last = this._entries[this._entries.length - 1];
    const previousHash = last === undefined ? GENESIS_HASH : last.hash;
    const content = {
      sequence: this._entries.length + 1,
      timestamp: this._clock().toISOString(),
      tenantId: input.tenantId,
      action: input.action,
      resourceType: input.resourceType,
      resourceId: input.resourceId,
      actor: input.actor,
      category: input.category ?? "mutation",
      detail: input.detail,
    };
    const entry: AuditLogEntry = {
      ...content,
      previousHash,
      hash: computeAuditHash(content, previousHash),
    };
    this._entries.push(entry);
    return entry;
  }

  /**
   * Query audit log entries with optional filters.
   *
   * Returns newest-first.
   */
  query(filter?: AuditLogQuery): readonly AuditLogEntry[] {
    let results: AuditLogEntry[] = this._entries;

    if (filter?.tenantId !== undefined) {
      results = results.filter((e) => e.tenantId === filter.tenantId);
    }
    if (filter?.action !== undefined) {
      results = results.filter((e) => e.action === filter.action);
    }
    if (filter?.resourceType !== undefined) {
      results = results.filter((e) => e.resourceType === filter.resourceType);
    }
    if (filter?.resourceId !== undefined) {
      results = results.filter((e) => e.resourceId === filter.resourceId);
    }
    if (filter?.category !== undefined) {
      results = results.filter((e) => e.category === filter.category);
    }

    results = [...results].reverse();

    if (filter?.limit !== undefined && filter.limit > 0) {
      results = results.slice(0, filter.limit);
    }

    return results;
  }

  /**
   * Recompute the chain over `entries` (default: this log) and report
   * the first broken link.
   */
  verify(entries: readonly AuditLogEntry[] = this._entries): AuditChainResult {
    let previousHash = GENESIS_HASH;

    for (const entry of entries) {
      if (entry.previousHash !== previousHash) {
        return {
          valid: false,
          brokenAt: entry.sequence,
          reason: `previousHash mismatch at entry ${String(entry.sequence)}`,
        };
      }
      const { hash, previousHash: _linked, ...content } = entry;
      if (computeAuditHash(content, previousHash) !== hash) {
        return {
          valid: false,
          brokenAt: entry.sequence,
          reason: `Hash mismatch at entry ${String(entry.sequence)}`,
        };
      }
      previousHash = hash;
    }

    return { valid: true, length: entries.length };
  }

  /** Entries in append order. */
  entries(): readonly AuditLogEntry[] {
    return [...this._entries];
  }

  get size(): number {
    return this._entries.length;
  }
}
