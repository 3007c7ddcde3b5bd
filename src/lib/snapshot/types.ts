/**
 * Input Snapshot — Types
 *
 * The immutable bundle of records a single analysis run consumes.
 * Produced by ingestion; every optional dataset may be absent.
 */

import type { MonthKey, RawMonthlyRow } from "@/lib/pnl/types";

export const PAYROLL_FUNCTIONS = ["Sales", "Marketing", "R&D", "G&A", "Ops"] as const;

export type PayrollFunction = (typeof PAYROLL_FUNCTIONS)[number];

export interface PayrollRecord {
  month: MonthKey;
  function: PayrollFunction;
  headcount: number;
  fully_loaded_cost?: number | null;
}

export interface VendorRecord {
  month: MonthKey;
  vendor: string;
  category: string;
  amount: number;
}

export interface SegmentRecord {
  month: MonthKey;
  segment: string;
  revenue: number;
}

/**
 * Free-text company signals. Passed through to narratives and assumptions,
 * never used in arithmetic.
 */
export interface CompanyContext {
  company_name?: string;
  industry?: string;
  company_size?: string;
  revenue_range?: string;
  employee_count_range?: string;
  business_model?: string;
  growth_stage?: string;
  geographic_presence?: string;
  key_challenges?: string;
  strategic_priorities?: string;
  additional_context?: string;
}

export interface OptionalDatasets {
  payroll?: readonly PayrollRecord[];
  vendors?: readonly VendorRecord[];
  segments?: readonly SegmentRecord[];
}

export interface InputSnapshot extends OptionalDatasets {
  gl: readonly RawMonthlyRow[];
  context?: CompanyContext;
}
