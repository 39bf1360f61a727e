/**
 * Policy Module - Constants and Types
 *
 * Off-time bounds, the working-time sweet spot and the adjustment factors
 * used to pick the next OFF duration.
 */
import type { PerformanceSummary } from "../telemetry/index.js";
import type { WeatherSnapshot } from "../weather/index.js";

// =============================================================================
// Off-Time Bounds
// =============================================================================

/** Lower bound for any applied OFF duration (5 minutes) */
export const MIN_OFF_TIME_SEC = 300;

/** Upper bound for any applied OFF duration (24 hours) */
export const MAX_OFF_TIME_SEC = 86_400;

/** OFF duration used before any cycle has adapted it (7 minutes) */
export const BASE_OFF_TIME_SEC = 420;

/** Reset value for the heavy-load regime (5 minutes) */
export const HEAVY_LOAD_BASELINE_SEC = 300;

// =============================================================================
// Working-Time Bands
// =============================================================================

/** Below this the pump had too little water to move */
export const SHORT_RUN_THRESHOLD_SEC = 8;

/** Upper edge of the sweet spot (inclusive) */
export const OPTIMAL_RUN_THRESHOLD_SEC = 15;

/** Above this the pump is under heavy load */
export const HEAVY_LOAD_THRESHOLD_SEC = 30;

// =============================================================================
// Adjustment Factors
// =============================================================================

export const REGIME_FACTORS = {
  insufficient: 2.0,
  optimal: 1.0,
  excessive: 0.7,
} as const;

/** Rain factors for the multiplicative regimes */
export const RAIN_FACTORS = {
  light: 0.7,
  heavy: 0.5,
} as const;

/** Gentler rain factors for the heavy-load reset */
export const HEAVY_LOAD_RAIN_FACTORS = {
  light: 0.9,
  heavy: 0.8,
} as const;

// =============================================================================
// Decision Types
// =============================================================================

/**
 * Adjustment regime chosen for a cycle.
 */
export type OffTimeRegime =
  | "manual_override"
  | "insufficient"
  | "optimal"
  | "excessive"
  | "heavy_load";

/**
 * Everything the policy looks at.
 */
export type OffTimeInput = Readonly<{
  summary: PerformanceSummary;
  currentOffTimeSec: number;
  manualOverrideSec: number | null;
  weather: WeatherSnapshot | null;
}>;

/**
 * The next OFF duration and how it was reached.
 */
export type OffTimeDecision = Readonly<{
  regime: OffTimeRegime;
  /** Value before clamping and truncation (may be fractional) */
  rawOffTimeSec: number;
  /** Value to apply and persist (whole seconds) */
  offTimeSec: number;
  /** Rain factor applied, 1 when none */
  weatherFactor: number;
  /** Human readable explanation for logs */
  reason: string;
}>;
