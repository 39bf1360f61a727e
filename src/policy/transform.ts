/**
 * Policy Module - Pure Transformations
 *
 * Maps a cycle's performance, the current off-time, the manual override
 * and the weather to the next OFF duration. Total: every input has a
 * defined output and nothing here throws.
 */
import { classifyRain } from "../weather/index.js";
import type { RainIntensity, WeatherSnapshot } from "../weather/index.js";
import type { OffTimeDecision, OffTimeInput, OffTimeRegime } from "./schema.js";
import {
  HEAVY_LOAD_BASELINE_SEC,
  HEAVY_LOAD_RAIN_FACTORS,
  HEAVY_LOAD_THRESHOLD_SEC,
  MAX_OFF_TIME_SEC,
  MIN_OFF_TIME_SEC,
  OPTIMAL_RUN_THRESHOLD_SEC,
  RAIN_FACTORS,
  REGIME_FACTORS,
  SHORT_RUN_THRESHOLD_SEC,
} from "./schema.js";

type WorkingTimeRegime = Exclude<OffTimeRegime, "manual_override">;

/**
 * Clamp to the global bounds and truncate to whole seconds.
 * NaN falls back to the lower bound.
 */
export function clampOffTime(seconds: number): number {
  if (Number.isNaN(seconds)) {
    return MIN_OFF_TIME_SEC;
  }
  const bounded = Math.max(
    MIN_OFF_TIME_SEC,
    Math.min(MAX_OFF_TIME_SEC, seconds),
  );
  return Math.trunc(bounded);
}

/**
 * Pick the regime from working time alone.
 *
 * - `< 8`       insufficient
 * - `[8, 15]`   optimal
 * - `(15, 30]`  excessive
 * - `> 30`      heavy_load
 */
export function selectRegime(workingTimeSec: number): WorkingTimeRegime {
  if (workingTimeSec < SHORT_RUN_THRESHOLD_SEC) {
    return "insufficient";
  }
  if (workingTimeSec <= OPTIMAL_RUN_THRESHOLD_SEC) {
    return "optimal";
  }
  if (workingTimeSec <= HEAVY_LOAD_THRESHOLD_SEC) {
    return "excessive";
  }
  return "heavy_load";
}

const REGIME_LABELS: Record<WorkingTimeRegime, string> = {
  insufficient: "insufficient working time",
  optimal: "optimal working time - maintaining interval",
  excessive: "excessive working time",
  heavy_load: "HEAVY LOAD - returning to 5-minute baseline",
};

function describeRain(
  intensity: RainIntensity,
  weather: WeatherSnapshot | null,
): string {
  if (intensity === "none" || weather === null) {
    return "";
  }
  return `, ${intensity} rain (${weather.rainRateMmPerHr}mm/h)`;
}

/**
 * Rain factor for a regime. 1 when dry.
 */
export function rainFactorFor(
  regime: WorkingTimeRegime,
  intensity: RainIntensity,
): number {
  if (intensity === "none") {
    return 1;
  }
  return regime === "heavy_load"
    ? HEAVY_LOAD_RAIN_FACTORS[intensity]
    : RAIN_FACTORS[intensity];
}

/**
 * Decide the next OFF duration.
 *
 * A manual override wins outright and is returned verbatim. Otherwise the
 * working-time regime scales the current off-time (or resets it under
 * heavy load), rain shortens it, and the result is clamped and truncated.
 */
export function decideNextOffTime(input: OffTimeInput): OffTimeDecision {
  const { summary, currentOffTimeSec, manualOverrideSec, weather } = input;

  if (manualOverrideSec !== null) {
    return {
      regime: "manual_override",
      rawOffTimeSec: manualOverrideSec,
      offTimeSec: manualOverrideSec,
      weatherFactor: 1,
      reason: `manual override (${manualOverrideSec}s)`,
    };
  }

  const workingTimeSec = summary.workingTimeSec;
  const regime = selectRegime(workingTimeSec);
  const intensity = classifyRain(weather);
  const weatherFactor = rainFactorFor(regime, intensity);

  const base =
    regime === "heavy_load"
      ? HEAVY_LOAD_BASELINE_SEC
      : currentOffTimeSec * REGIME_FACTORS[regime];

  const rawOffTimeSec = base * weatherFactor;

  return {
    regime,
    rawOffTimeSec,
    offTimeSec: clampOffTime(rawOffTimeSec),
    weatherFactor,
    reason: `${REGIME_LABELS[regime]} (${workingTimeSec.toFixed(1)}s)${describeRain(intensity, weather)}`,
  };
}
