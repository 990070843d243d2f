/**
 * Integrity logging for engine operations.
 *
 * Tenant Guard violations and store constraint failures are logged at
 * `error` by the engine that raised them, so in-process callers leave
 * the same trace as HTTP ones. The error is rethrown unchanged.
 */

import type { Logger } from "pino";
import type { TenantScope } from "@classbank/types";
import { isIntegrityError } from "@classbank/store";

export type IntegrityPredicate = (err: unknown) => boolean;

export async function withIntegrityLog<T>(
  logger: Logger,
  scope: TenantScope,
  operation: string,
  run: () => Promise<T>,
  isIntegrity: IntegrityPredicate = isIntegrityError,
): Promise<T> {
  try {
    return await run();
  } catch (err) {
    if (isIntegrity(err)) {
      logger.error(
        { err, code: errorCode(err), tenantId: scope.tenantId, operation },
        "integrity violation",
      );
    }
    throw err;
  }
}

function errorCode(err: unknown): string | undefined {
  return err instanceof Error && "code" in err && typeof err.code === "string"
    ? err.code
    : undefined;
}
