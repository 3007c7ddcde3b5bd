/**
 * Initiative Sizing — Constants
 *
 * Confidence bounds, fallback widening, and per-category fallback profiles.
 */

import type { InitiativeCategory } from "../types";
import type { CategoryProfile } from "./types";

export const CONFIDENCE_FLOOR = 0.2;
export const CONFIDENCE_CEILING = 0.9;

/** Fallback ranges are widened by this factor on both ends. */
export const FALLBACK_WIDENING = 1.5;

/** Share of a strategy's base confidence (above the floor) a fallback keeps. */
export const FALLBACK_CONFIDENCE_RETENTION = 0.25;

/** Confidence multiplier for each diagnostic the GL history is too short to run. */
export const UNAVAILABLE_DIAGNOSTIC_FACTOR = 0.9;

/** Months of history each strategy annualizes from. */
export const TRAILING_WINDOW_MONTHS = 12;

export const CATEGORY_PROFILES: Record<InitiativeCategory, CategoryProfile> = {
  Vendor: {
    fallback_low_pct: 0.005,
    fallback_high_pct: 0.015,
    implementation_pct: 0.001,
    time_to_value_weeks: 8,
    risk_level: "Low",
    base_confidence: 0.5,
  },
  Headcount: {
    fallback_low_pct: 0.01,
    fallback_high_pct: 0.025,
    implementation_pct: 0.0025,
    time_to_value_weeks: 24,
    risk_level: "High",
    base_confidence: 0.5,
  },
  Pricing: {
    fallback_low_pct: 0.01,
    fallback_high_pct: 0.03,
    implementation_pct: 0.0025,
    time_to_value_weeks: 12,
    risk_level: "Med",
    base_confidence: 0.5,
  },
  Process: {
    fallback_low_pct: 0.005,
    fallback_high_pct: 0.015,
    implementation_pct: 0.002,
    time_to_value_weeks: 16,
    risk_level: "Med",
    base_confidence: 0.4,
  },
  Other: {
    fallback_low_pct: 0.003,
    fallback_high_pct: 0.01,
    implementation_pct: 0.001,
    time_to_value_weeks: 16,
    risk_level: "Med",
    base_confidence: 0.4,
  },
};
