/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces a consistent
 * error envelope response. Known domain error codes map to HTTP statuses
 * through STATUS_MAP; anything else is a 500 with a generic message.
 *
 * Integrity errors (tenant guard violations, constraint conflicts) are
 * logged at `error`, appended to the audit log, and answered with 409
 * and `details: { category: "integrity", retryable: false }`.
 */

import type { Context, ErrorHandler } from "hono";
import { isIntegrityFailure } from "@classbank/insurance";
import type { AppEnv } from "../types/api-contract.js";
import type { AuthContext } from "../types/auth.js";
import { createErrorEnvelope, RequestError } from "../types/error.js";
import type { AuditLog } from "../services/audit-log.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 422 | 500;

const STATUS_MAP: Readonly<Record<string, ErrorStatus>> = {
  // Ledger
  INVALID_AMOUNT: 400,
  INVALID_ENTRY: 400,
  ENTRY_NOT_FOUND: 404,
  ALREADY_VOIDED: 409,
  INSUFFICIENT_FUNDS: 422,

  // Policies
  POLICY_NOT_FOUND: 404,
  POLICY_LOCKED: 409,
  INVALID_POLICY: 400,

  // Enrollments
  ENROLLMENT_NOT_FOUND: 404,
  POLICY_INACTIVE: 422,
  ALREADY_ENROLLED: 409,
  REPURCHASE_BLOCKED: 422,
  ENROLLMENT_CANCELLED: 409,
  AUTOPAY_DISABLED: 422,

  // Claims
  CLAIM_NOT_FOUND: 404,
  CLAIM_NOT_PENDING: 409,
  INVALID_CLAIM: 400,
  TRANSACTION_NOT_FOUND: 404,
  INVALID_TRANSITION: 409,
};

function errorCode(err: Error): string | undefined {
  return "code" in err && typeof err.code === "string" ? err.code : undefined;
}

// =============================================================================
// Handler
// =============================================================================

export interface ErrorHandlerDeps {
  readonly auditLog: AuditLog;
}

/**
 * Create the global error handler. Registered as Hono's onError handler.
 */
export function createErrorHandler(deps: ErrorHandlerDeps): ErrorHandler<AppEnv> {
  return (err: Error, c: Context<AppEnv>): Response => {
    const logger = c.get("logger");
    const auth: AuthContext | undefined = c.get("auth");
    const code = errorCode(err);

    if (err instanceof RequestError) {
      return c.json(createErrorEnvelope(err.code, err.message, err.details), err.status);
    }

    if (isIntegrityFailure(err)) {
      const integrityCode = code ?? "INTEGRITY_VIOLATION";
      logger.error(
        { err, code: integrityCode, tenantId: auth?.tenantId, actorId: auth?.actorId },
        "integrity violation",
      );
      deps.auditLog.append({
        tenantId: auth?.tenantId ?? "unknown",
        action: integrityCode,
        resourceType: "request",
        resourceId: `${c.req.method} ${c.req.path}`,
        actor: auth?.actorId ?? "unknown",
        category: "integrity",
        detail: err.message,
      });
      return c.json(
        createErrorEnvelope(integrityCode, err.message, {
          category: "integrity",
          retryable: false,
        }),
        409,
      );
    }

    const status = code === undefined ? 500 : STATUS_MAP[code] ?? 500;
    if (status === 500) {
      logger.error({ err }, "unhandled error");
      return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
    }

    return c.json(createErrorEnvelope(code ?? "INTERNAL_ERROR", err.message), status);
  };
}
