/**
 * Route barrel: re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createLedgerRoutes } from "./ledger.js";
export { createPolicyRoutes } from "./policies.js";
export { createEnrollmentRoutes } from "./enrollments.js";
export { createClaimRoutes } from "./claims.js";
export { createAuditRoutes } from "./audit.js";
