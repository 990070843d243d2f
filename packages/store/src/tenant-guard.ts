/**
 * Tenant Guard: the first check on every read and write.
 *
 * Every stored entity carries a tenant ID; every operation carries the
 * caller's TenantScope. The guard compares the two and throws before any
 * other validation runs. It has no side effects beyond throwing.
 *
 * A guard failure is an integrity error (a bug or tampering), never a
 * business-rule failure: callers must not retry it.
 */

import type { TenantScope, TenantScoped } from "@classbank/types";
import { StoreError } from "./types.js";

export type TenantGuardErrorCode = "CROSS_TENANT_VIOLATION" | "TENANT_MISMATCH";

export class TenantGuardError extends Error {
  public readonly code: TenantGuardErrorCode;
  public readonly scopeTenantId: string;
  public readonly entityTenantId: string;

  constructor(
    code: TenantGuardErrorCode,
    message: string,
    scopeTenantId: string,
    entityTenantId: string,
  ) {
    super(message);
    this.name = "TenantGuardError";
    this.code = code;
    this.scopeTenantId = scopeTenantId;
    this.entityTenantId = entityTenantId;
  }
}

/**
 * Describes an entity in guard error messages, e.g. "claim 'c-1'".
 */
export interface EntityLabel {
  readonly type: string;
  readonly id: string;
}

function label(entity: EntityLabel): string {
  return `${entity.type} '${entity.id}'`;
}

/**
 * Check that a stored entity belongs to the caller's tenant.
 *
 * @throws {TenantGuardError} CROSS_TENANT_VIOLATION
 */
export function guardRead<T extends TenantScoped>(
  scope: TenantScope,
  entity: T,
  what: EntityLabel,
): T {
  if (!scope.owns(entity)) {
    throw new TenantGuardError(
      "CROSS_TENANT_VIOLATION",
      `${label(what)} is not visible from ${scope.toString()}`,
      scope.tenantId,
      entity.tenantId,
    );
  }
  return entity;
}

/**
 * Resolve a possibly-missing entity within a scope.
 *
 * Absence is reported through `notFound` (the caller's own not-found
 * error); presence in another tenant is a guard violation.
 */
export function requireScoped<T extends TenantScoped>(
  scope: TenantScope,
  entity: T | undefined,
  what: EntityLabel,
  notFound: () => Error,
): T {
  if (entity === undefined) {
    throw notFound();
  }
  return guardRead(scope, entity, what);
}

/**
 * Check that an entity about to be written is tagged with the caller's
 * tenant.
 *
 * @throws {TenantGuardError} TENANT_MISMATCH
 */
export function guardWrite<T extends TenantScoped>(
  scope: TenantScope,
  entity: T,
  what: EntityLabel,
): T {
  if (!scope.owns(entity)) {
    throw new TenantGuardError(
      "TENANT_MISMATCH",
      `Cannot write ${label(what)} tagged '${entity.tenantId}' from ${scope.toString()}`,
      scope.tenantId,
      entity.tenantId,
    );
  }
  return entity;
}

/**
 * Check that every entity in a relation shares the caller's tenant.
 *
 * @throws {TenantGuardError} CROSS_TENANT_VIOLATION naming the first
 * entity that does not
 */
export function guardRelation(
  scope: TenantScope,
  related: readonly (readonly [TenantScoped, EntityLabel])[],
): void {
  for (const [entity, what] of related) {
    guardRead(scope, entity, what);
  }
}

export function isTenantGuardError(err: unknown): err is TenantGuardError {
  return err instanceof TenantGuardError;
}

/**
 * Integrity errors: guard violations and store constraint failures.
 */
export function isIntegrityError(err: unknown): err is TenantGuardError | StoreError {
  return err instanceof TenantGuardError || err instanceof StoreError;
}
