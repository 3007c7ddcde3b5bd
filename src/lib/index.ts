/**
 * margin-lens — Public API
 *
 * Deterministic P&L diagnostics and initiative sizing/ranking.
 */

export * from "./pipeline";
export * from "./pnl";
export * from "./diagnostics";
export * from "./initiatives";
export * from "./configEngine";
export * from "./snapshot";
export { hashOutputs, canonicalJson } from "./utils/canonicalHash";
