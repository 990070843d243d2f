/**
 * Type barrel: re-exports all public types from @classbank/node.
 */

// DTOs
export {
  AmountSchema,
  BucketSchema,
  EntryKindSchema,
  AppendEntrySchema,
  ListEntriesQuerySchema,
  BalanceQuerySchema,
  TransferSchema,
  DefinePolicySchema,
  UpdatePolicySchema,
  ListPoliciesQuerySchema,
  EnrollSchema,
  ListEnrollmentsQuerySchema,
  FileClaimSchema,
  DecideClaimSchema,
  ListClaimsQuerySchema,
  AuditQuerySchema,
} from "./dto.js";
export type {
  AppendEntryDto,
  ListEntriesQuery,
  BalanceQuery,
  TransferDto,
  DefinePolicyDto,
  UpdatePolicyDto,
  EnrollDto,
  ListEnrollmentsQuery,
  FileClaimDto,
  DecideClaimDto,
  ListClaimsQuery,
  AuditQueryDto,
} from "./dto.js";

// Error
export { createErrorEnvelope, RequestError } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Auth
export { ROLES, ROLE_PERMISSIONS, hasPermission } from "./auth.js";
export type { Role, Permission, AuthContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
