/**
 * Weather Module - Service Layer
 *
 * Side effects happen here: HTTP calls to OpenWeatherMap.
 * Uses Result types for explicit error handling.
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import type { WeatherError } from "./errors.js";
import {
  fetchFailed,
  invalidResponse,
  networkError,
  notConfigured,
} from "./errors.js";
import type { WeatherConfig, WeatherSnapshot } from "./schema.js";
import { OpenWeatherResponseSchema } from "./schema.js";
import { buildWeatherUrl, parseWeatherResponse } from "./transform.js";

const log = createLogger("weather");

/**
 * Fetch current conditions for the configured location.
 *
 * @param config - Weather configuration, or null when weather is disabled
 * @returns Result with the snapshot or error
 */
export async function fetchCurrentConditions(
  config: WeatherConfig | null,
): Promise<Result<WeatherSnapshot, WeatherError>> {
  if (!config) {
    return err(notConfigured("WEATHER_API_KEY or WEATHER_LOCATION missing"));
  }

  const url = buildWeatherUrl(config);
  log.debug({ location: config.location }, "Fetching weather...");

  try {
    const response = await fetch(url, {
      method: "GET",
      signal: AbortSignal.timeout(config.timeoutMs),
    });

    if (response.status !== 200) {
      return err(fetchFailed(response.statusText, response.status));
    }

    const data: unknown = await response.json();
    const parsed = OpenWeatherResponseSchema.safeParse(data);

    if (!parsed.success) {
      return err(invalidResponse("Invalid weather response format", data));
    }

    const snapshot = parseWeatherResponse(parsed.data);
    if (!snapshot) {
      return err(invalidResponse("No weather entry in response", data));
    }

    log.info(
      {
        condition: snapshot.condition,
        rainRateMmPerHr: snapshot.rainRateMmPerHr,
      },
      `Weather: ${snapshot.description}, Rain: ${snapshot.rainRateMmPerHr}mm/h`,
    );

    return ok(snapshot);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));

    if (cause.name === "TimeoutError" || cause.name === "AbortError") {
      return err(networkError("Request timed out", cause));
    }

    return err(networkError("Failed to reach weather service", cause));
  }
}
