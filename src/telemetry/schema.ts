/**
 * Telemetry Module - Schemas and Types
 *
 * Defines the data shapes for power meter readings and per-cycle
 * performance summaries.
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import { z } from "zod";

// =============================================================================
// Thresholds
// =============================================================================

/** Power above which the pump is moving water (W) */
export const WORKING_POWER_THRESHOLD_W = 200;

/** Power below which the pump is considered idle (W) - informational */
export const IDLE_POWER_THRESHOLD_W = 100;

/** Working time above which a cycle counts as "worked" in the cycle log (s) */
export const MIN_WORKING_TIME_SEC = 3;

// =============================================================================
// Power Meter API Response
// =============================================================================

/**
 * getPowerMeterData response. The plug reports numbers as strings.
 */
export const PowerMeterResponseSchema = z.object({
  rslt: z.string(),
  pmom: z.coerce.number().nonnegative().default(0).describe("Power (W)"),
  imad: z.coerce.number().nonnegative().default(0).describe("Current (A)"),
  volt: z.coerce.number().nonnegative().default(0).describe("Voltage (V)"),
});

export type PowerMeterResponse = z.infer<typeof PowerMeterResponseSchema>;

// =============================================================================
// Readings and Samples
// =============================================================================

/**
 * Instantaneous power meter reading.
 */
export type PowerReading = Readonly<{
  powerW: number;
  currentA: number;
  voltageV: number;
}>;

/**
 * A reading stamped with the time it was taken.
 */
export type PowerSample = PowerReading &
  Readonly<{
    /** Epoch ms */
    timestamp: number;
  }>;

// =============================================================================
// Performance Summary
// =============================================================================

/**
 * One ON phase reduced to a few numbers.
 */
export type PerformanceSummary = Readonly<{
  /** Seconds credited as working (sample interval per working sample) */
  workingTimeSec: number;
  /** Length of the ON phase in seconds */
  totalTimeSec: number;
  avgPowerW: number;
  maxPowerW: number;
  minPowerW: number;
  sampleCount: number;
}>;
