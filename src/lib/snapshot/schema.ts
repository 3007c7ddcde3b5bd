/**
 * Input Snapshot — zod Schemas
 *
 * Shape validation for snapshots read from JSON files by the CLI.
 * Field-level business validation belongs to ingestion; this only guards
 * against files that are not snapshots at all.
 */

import { z } from "zod";
import type { InputSnapshot } from "./types";
import { PAYROLL_FUNCTIONS } from "./types";

const MonthKeySchema = z.string().regex(/^\d{4}-(0[1-9]|1[0-2])$/, "Month must be in YYYY-MM format");
const Amount = z.number().finite().nonnegative();

export const RawMonthlyRowSchema = z.object({
  month: MonthKeySchema,
  revenue: Amount,
  cogs: Amount,
  opex_sales_marketing: Amount.optional(),
  opex_rnd: Amount.optional(),
  opex_gna: Amount.optional(),
  opex_other: Amount.optional(),
});

export const PayrollRecordSchema = z.object({
  month: MonthKeySchema,
  function: z.enum(PAYROLL_FUNCTIONS),
  headcount: z.number().int().nonnegative(),
  fully_loaded_cost: Amount.nullable().optional(),
});

export const VendorRecordSchema = z.object({
  month: MonthKeySchema,
  vendor: z.string().min(1),
  category: z.string().min(1),
  amount: Amount,
});

export const SegmentRecordSchema = z.object({
  month: MonthKeySchema,
  segment: z.string().min(1),
  revenue: Amount,
});

export const CompanyContextSchema = z.object({
  company_name: z.string().optional(),
  industry: z.string().optional(),
  company_size: z.string().optional(),
  revenue_range: z.string().optional(),
  employee_count_range: z.string().optional(),
  business_model: z.string().optional(),
  growth_stage: z.string().optional(),
  geographic_presence: z.string().optional(),
  key_challenges: z.string().optional(),
  strategic_priorities: z.string().optional(),
  additional_context: z.string().optional(),
});

export const InputSnapshotSchema = z.object({
  gl: z.array(RawMonthlyRowSchema),
  payroll: z.array(PayrollRecordSchema).optional(),
  vendors: z.array(VendorRecordSchema).optional(),
  segments: z.array(SegmentRecordSchema).optional(),
  context: CompanyContextSchema.optional(),
});

export type SnapshotParseResult =
  | { ok: true; snapshot: InputSnapshot }
  | { ok: false; issues: string[] };

/**
 * Validate an untrusted value as an InputSnapshot.
 */
export function parseInputSnapshot(input: unknown): SnapshotParseResult {
  const parsed = InputSnapshotSchema.safeParse(input);
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
    };
  }
  return { ok: true, snapshot: parsed.data };
}
