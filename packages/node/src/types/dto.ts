/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation.
 */

import { z } from "zod";
import { MAX_POLICY_DAYS } from "@classbank/insurance";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AmountSchema = z.string().trim().min(1).max(32);

export const BucketSchema = z.enum(["checking", "savings"]);

export const EntryKindSchema = z.enum([
  "deposit",
  "withdrawal",
  "payroll",
  "bonus",
  "purchase",
  "fee",
  "rent",
  "transfer",
  "insurance_premium",
  "insurance_payout",
  "adjustment",
]);

const IdSchema = z.string().trim().min(1).max(128);

/** Query-string booleans: "true" / "false" */
const QueryFlagSchema = z
  .enum(["true", "false"])
  .transform((v) => v === "true")
  .optional();

// =============================================================================
// Ledger DTOs
// =============================================================================

export const AppendEntrySchema = z.object({
  subjectId: IdSchema,
  amount: AmountSchema,
  bucket: BucketSchema,
  kind: EntryKindSchema,
  description: z.string().max(1024).optional(),
  availableAt: z.string().min(1).optional(),
  correlationId: IdSchema.optional(),
});

export type AppendEntryDto = z.infer<typeof AppendEntrySchema>;

export const ListEntriesQuerySchema = z.object({
  subjectId: IdSchema.optional(),
  bucket: BucketSchema.optional(),
  kind: EntryKindSchema.optional(),
  includeVoided: QueryFlagSchema,
  from: z.string().min(1).optional(),
  to: z.string().min(1).optional(),
});

export type ListEntriesQuery = z.infer<typeof ListEntriesQuerySchema>;

export const BalanceQuerySchema = z.object({
  bucket: BucketSchema.default("checking"),
  availableOnly: QueryFlagSchema,
});

export type BalanceQuery = z.infer<typeof BalanceQuerySchema>;

export const TransferSchema = z.object({
  subjectId: IdSchema,
  from: BucketSchema,
  to: BucketSchema,
  amount: AmountSchema,
});

export type TransferDto = z.infer<typeof TransferSchema>;

// =============================================================================
// Policy DTOs
// =============================================================================

/** A day count on a policy; negatives are reported at claim time. */
const DaysSchema = z.number().int().min(-MAX_POLICY_DAYS).max(MAX_POLICY_DAYS);

const RepurchaseSchema = z.discriminatedUnion("mode", [
  z.object({ mode: z.literal("allowed") }),
  z.object({ mode: z.literal("cooldown"), waitDays: DaysSchema.min(0) }),
  z.object({ mode: z.literal("never") }),
]);

const BundleSchema = z.object({
  policyIds: z.array(IdSchema).min(1),
  discountPercent: z.number().min(0).max(100),
  discountAmount: AmountSchema.default("0"),
});

const policyFields = {
  code: z.string().max(64).optional(),
  title: z.string().trim().min(1).max(256),
  description: z.string().max(2048).optional(),
  premium: AmountSchema,
  chargeFrequency: z.enum(["weekly", "monthly"]).optional(),
  autopay: z.boolean().optional(),
  waitingPeriodDays: DaysSchema.optional(),
  claimTimeLimitDays: DaysSchema.min(0).optional(),
  maxClaimsCount: z.number().int().min(0).nullable().optional(),
  maxClaimsPeriod: z.enum(["month", "semester", "year"]).optional(),
  maxClaimAmount: AmountSchema.nullable().optional(),
  maxPayoutPerPeriod: AmountSchema.nullable().optional(),
  claimKind: z.enum(["monetary", "in_kind"]).optional(),
  repurchase: RepurchaseSchema.optional(),
  autoCancelNonpayDays: DaysSchema.min(1).optional(),
  bundle: BundleSchema.nullable().optional(),
};

export const DefinePolicySchema = z.object(policyFields);

export type DefinePolicyDto = z.infer<typeof DefinePolicySchema>;

export const UpdatePolicySchema = z.object(policyFields).partial();

export type UpdatePolicyDto = z.infer<typeof UpdatePolicySchema>;

export const ListPoliciesQuerySchema = z.object({
  activeOnly: QueryFlagSchema,
});

// =============================================================================
// Enrollment DTOs
// =============================================================================

export const EnrollSchema = z.object({
  subjectId: IdSchema,
  policyId: IdSchema,
});

export type EnrollDto = z.infer<typeof EnrollSchema>;

export const ListEnrollmentsQuerySchema = z.object({
  subjectId: IdSchema.optional(),
  policyId: IdSchema.optional(),
  status: z.enum(["active", "suspended", "cancelled"]).optional(),
});

export type ListEnrollmentsQuery = z.infer<typeof ListEnrollmentsQuerySchema>;

// =============================================================================
// Claim DTOs
// =============================================================================

export const FileClaimSchema = z.object({
  subjectId: IdSchema,
  enrollmentId: IdSchema,
  incidentDate: z.string().min(1),
  description: z.string().min(1).max(2048),
  comments: z.string().max(2048).optional(),
  ledgerEntryId: IdSchema.optional(),
  requestedAmount: AmountSchema.optional(),
  item: z.string().max(256).optional(),
});

export type FileClaimDto = z.infer<typeof FileClaimSchema>;

export const DecideClaimSchema = z.object({
  outcome: z.enum(["approve", "reject"]),
  approvedAmount: AmountSchema.optional(),
  notes: z.string().max(2048).optional(),
  rejectionReason: z.string().max(2048).optional(),
});

export type DecideClaimDto = z.infer<typeof DecideClaimSchema>;

export const ListClaimsQuerySchema = z.object({
  subjectId: IdSchema.optional(),
  policyId: IdSchema.optional(),
  enrollmentId: IdSchema.optional(),
  status: z.enum(["pending", "approved", "rejected", "paid"]).optional(),
});

export type ListClaimsQuery = z.infer<typeof ListClaimsQuerySchema>;

// =============================================================================
// Audit DTOs
// =============================================================================

export const AuditQuerySchema = z.object({
  action: z.string().optional(),
  resourceType: z.string().optional(),
  resourceId: z.string().optional(),
  category: z.enum(["mutation", "integrity"]).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

export type AuditQueryDto = z.infer<typeof AuditQuerySchema>;
