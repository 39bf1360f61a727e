/**
 * Weather Module - Pure Transformations
 *
 * No side effects, no I/O - just data in, data out.
 */
import type {
  OpenWeatherResponse,
  RainIntensity,
  WeatherConfig,
  WeatherSnapshot,
} from "./schema.js";
import { HEAVY_RAIN_THRESHOLD_MM_PER_HR } from "./schema.js";

/**
 * Build the current-conditions URL.
 */
export function buildWeatherUrl(config: WeatherConfig): string {
  const url = new URL(`${config.baseUrl.replace(/\/+$/, "")}/weather`);
  url.searchParams.set("q", config.location);
  url.searchParams.set("appid", config.apiKey);
  return url.toString();
}

/**
 * Reduce an OpenWeatherMap response to a snapshot.
 */
export function parseWeatherResponse(
  response: OpenWeatherResponse,
): WeatherSnapshot | null {
  const [primary] = response.weather;
  if (!primary) {
    return null;
  }

  return {
    condition: primary.main.toLowerCase(),
    rainRateMmPerHr: response.rain?.["1h"] ?? 0,
    description: primary.description,
  };
}

/**
 * Rain is present when the condition mentions it or any rain is measured.
 */
export function isRaining(weather: WeatherSnapshot): boolean {
  return (
    weather.condition.toLowerCase().includes("rain") ||
    weather.rainRateMmPerHr > 0
  );
}

/**
 * Heavy rain: raining with a rate strictly above the heavy threshold.
 */
export function isHeavyRain(weather: WeatherSnapshot): boolean {
  return (
    isRaining(weather) &&
    weather.rainRateMmPerHr > HEAVY_RAIN_THRESHOLD_MM_PER_HR
  );
}

/**
 * Classify rain for the off-time policy. Absent weather counts as dry.
 */
export function classifyRain(weather: WeatherSnapshot | null): RainIntensity {
  if (weather === null || !isRaining(weather)) {
    return "none";
  }
  return isHeavyRain(weather) ? "heavy" : "light";
}
