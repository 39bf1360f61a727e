/**
 * Telemetry Module - Public API
 *
 * Exports only what's needed by other modules.
 */

// Types
export type {
  PerformanceSummary,
  PowerReading,
  PowerSample,
} from "./schema.js";
export type { TelemetryError } from "./errors.js";
export type { ReadPower } from "./service.js";

// Constants
export {
  IDLE_POWER_THRESHOLD_W,
  MIN_WORKING_TIME_SEC,
  WORKING_POWER_THRESHOLD_W,
} from "./schema.js";

// Error utilities
export { formatTelemetryError } from "./errors.js";

// Service functions (side effects)
export { measurePerformance, readPowerMeter, samplePower } from "./service.js";

// Pure transformations
export {
  emptySummary,
  isWorkingSample,
  summarizePerformance,
} from "./transform.js";
