/**
 * Weather Module - Public API
 *
 * Exports only what's needed by other modules.
 */

// Types
export type {
  RainIntensity,
  WeatherConfig,
  WeatherSnapshot,
} from "./schema.js";
export type { WeatherError } from "./errors.js";

export { HEAVY_RAIN_THRESHOLD_MM_PER_HR } from "./schema.js";

// Error utilities
export { formatWeatherError } from "./errors.js";

// Service functions (side effects)
export { fetchCurrentConditions } from "./service.js";

// Pure transformations
export {
  buildWeatherUrl,
  classifyRain,
  isHeavyRain,
  isRaining,
  parseWeatherResponse,
} from "./transform.js";
