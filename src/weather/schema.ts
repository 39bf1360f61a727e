/**
 * Weather Module - Schemas and Types
 *
 * Defines the data shapes for OpenWeatherMap current conditions.
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import { z } from "zod";

// =============================================================================
// Weather Configuration
// =============================================================================

export const WeatherConfigSchema = z.object({
  baseUrl: z.string().url().describe("OpenWeatherMap API base URL"),
  apiKey: z.string().min(1).describe("OpenWeatherMap API key"),
  location: z.string().min(1).describe("Location query"),
  timeoutMs: z.number().positive().describe("HTTP request timeout in ms"),
});

export type WeatherConfig = z.infer<typeof WeatherConfigSchema>;

// =============================================================================
// Rain Thresholds
// =============================================================================

/** Rain rate above which rain counts as heavy (mm/h) */
export const HEAVY_RAIN_THRESHOLD_MM_PER_HR = 2.5;

// =============================================================================
// OpenWeatherMap API Response
// =============================================================================

/**
 * Subset of the /weather response the controller uses.
 */
export const OpenWeatherResponseSchema = z.object({
  weather: z
    .array(
      z.object({
        main: z.string(),
        description: z.string(),
      }),
    )
    .min(1),
  rain: z
    .object({
      "1h": z.number().nonnegative().optional(),
    })
    .optional(),
});

export type OpenWeatherResponse = z.infer<typeof OpenWeatherResponseSchema>;

// =============================================================================
// Weather Snapshot
// =============================================================================

/**
 * Current conditions, refreshed once per cycle.
 */
export type WeatherSnapshot = Readonly<{
  /** Lower-cased main condition, e.g. "rain", "clouds" */
  condition: string;
  /** Rain over the last hour (mm/h), 0 when not reported */
  rainRateMmPerHr: number;
  /** Human readable description, e.g. "light rain" */
  description: string;
}>;

/**
 * How wet it is, as far as the off-time policy cares.
 */
export type RainIntensity = "none" | "light" | "heavy";
