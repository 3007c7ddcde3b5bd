/**
 * Input Snapshot — Public API
 */

export type {
  PayrollFunction,
  PayrollRecord,
  VendorRecord,
  SegmentRecord,
  CompanyContext,
  OptionalDatasets,
  InputSnapshot,
} from "./types";
export { PAYROLL_FUNCTIONS } from "./types";
export { InputSnapshotSchema, parseInputSnapshot } from "./schema";
export type { SnapshotParseResult } from "./schema";
