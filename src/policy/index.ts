/**
 * Policy Module - Public API
 *
 * Exports only what's needed by other modules.
 */

// Types
export type {
  OffTimeDecision,
  OffTimeInput,
  OffTimeRegime,
} from "./schema.js";

// Constants
export {
  BASE_OFF_TIME_SEC,
  HEAVY_LOAD_BASELINE_SEC,
  HEAVY_LOAD_THRESHOLD_SEC,
  MAX_OFF_TIME_SEC,
  MIN_OFF_TIME_SEC,
  OPTIMAL_RUN_THRESHOLD_SEC,
  SHORT_RUN_THRESHOLD_SEC,
} from "./schema.js";

// Service functions
export { nextOffTime } from "./service.js";

// Pure transformations
export {
  clampOffTime,
  decideNextOffTime,
  rainFactorFor,
  selectRegime,
} from "./transform.js";
