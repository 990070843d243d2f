/**
 * Tenant Types
 *
 * A tenant is the isolation boundary of the economy: one teacher's class.
 * Every stored entity carries its tenant ID, and every operation receives
 * the caller's scope as an explicit argument.
 *
 * Rules:
 * - There is no ambient "current tenant"
 * - A TenantScope can only be built through TenantScope.of()
 * - Plain strings are not assignable to TenantScope
 */

/**
 * The tenant a caller is acting in.
 *
 * The private constructor makes the type nominal: a structurally similar
 * object literal does not type-check where a scope is expected.
 */
export class TenantScope {
  private constructor(public readonly tenantId: string) {}

  /**
   * Build a scope for the given tenant ID.
   *
   * @throws {TypeError} if the ID is empty or only whitespace
   */
  static of(tenantId: string): TenantScope {
    if (typeof tenantId !== "string" || tenantId.trim() === "") {
      throw new TypeError("Tenant ID must be a non-empty string");
    }
    return new TenantScope(tenantId);
  }

  /** Whether an entity belongs to this scope. */
  owns(entity: TenantScoped): boolean {
    return entity.tenantId === this.tenantId;
  }

  toString(): string {
    return `tenant:${this.tenantId}`;
  }
}

/**
 * Anything persisted by the economy core.
 */
export interface TenantScoped {
  readonly tenantId: string;
}
