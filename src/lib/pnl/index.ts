/**
 * P&L — Public API
 */

export type { MonthKey, OpexCategory, RawMonthlyRow, MonthlyFinancials, PnLSeries } from "./types";
export { OPEX_CATEGORIES } from "./types";
export { reconstructPnl, deriveMonthlyFinancials, DuplicateMonthError } from "./reconstruct";
export {
  monthOrdinal,
  monthFromOrdinal,
  enumerateMonthRange,
  compareMonths,
  distinctMonths,
  trailingMonths,
} from "./months";
