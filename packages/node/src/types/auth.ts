/**
 * Authentication and authorization types.
 *
 * Callers authenticate with an API key (X-Api-Key). In unsecured mode the
 * tenant and actor come from headers instead.
 *
 * Roles:
 * - teacher: runs the class economy, reviews claims
 * - system:  external producers (payroll, billing runs)
 * - student: acts on their own subject id only
 */

// =============================================================================
// Roles & Permissions
// =============================================================================

export const ROLES = ["teacher", "system", "student"] as const;

export type Role = (typeof ROLES)[number];

/**
 * - read:   view entries, balances, policies, enrollments, claims
 * - file:   buy coverage, file claims, move money between own buckets
 * - write:  post ledger entries, drive premium billing
 * - review: define policies, decide claims, void entries, read the audit log
 */
export type Permission = "read" | "file" | "write" | "review";

/** Which permissions each role grants */
export const ROLE_PERMISSIONS: Record<Role, readonly Permission[]> = {
  teacher: ["read", "file", "write", "review"],
  system: ["read", "write"],
  student: ["read", "file"],
};

/**
 * Check whether a role has a specific permission.
 */
export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission);
}

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved authentication context, set by the auth middleware.
 */
export interface AuthContext {
  readonly type: "api-key" | "unsecured";
  /** The acting user; recorded as reviewer, voider and audit actor */
  readonly actorId: string;
  readonly role: Role;
  readonly tenantId: string;
}

// =============================================================================
// API Key Record
// =============================================================================

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
  readonly tenantId: string;
  readonly actorId: string;
}
