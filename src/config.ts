/**
 * Typed configuration - all config lives in the environment, parsed with Zod at startup.
 * App crashes immediately on invalid config - fail fast.
 *
 * Sump Pump Controller configuration covering:
 * - Runtime settings (logging, optional status API)
 * - Relay / power meter device
 * - Cycle timing
 * - Weather lookups
 * - Healthcheck notifications
 * - State, override and cycle log file locations
 */
import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";

/**
 * Custom boolean parser for environment variables.
 * z.coerce.boolean() doesn't work with string "false" (it's truthy).
 */
const envBoolean = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((val) =>
      val === undefined ? defaultValue : val.toLowerCase() === "true",
    );

/**
 * Parse optional string - empty string becomes undefined
 */
const optionalString = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== "" ? val.trim() : undefined));

/**
 * Parse optional URL - empty string becomes undefined
 */
const optionalUrl = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== "" ? val.trim() : undefined))
  .pipe(z.string().url().optional());

const ConfigSchema = z.object({
  // ==========================================================================
  // Runtime
  // ==========================================================================
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  APP_NAME: z
    .string()
    .default("SumpPumpController")
    .describe("Application name"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),

  // ==========================================================================
  // Relay / Power Meter Device
  // ==========================================================================
  RELAY_HOST: optionalString.describe(
    "Host or IP of the relay plug with built-in power meter",
  ),
  RELAY_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .default(10_000)
    .describe("Per-request timeout for relay and power meter calls (ms)"),
  RELAY_MAX_ATTEMPTS: z.coerce
    .number()
    .int()
    .positive()
    .default(3)
    .describe("Attempts per relay ON/OFF command"),
  RELAY_RETRY_DELAY_MS: z.coerce
    .number()
    .nonnegative()
    .default(2000)
    .describe("Fixed delay between relay command attempts (ms)"),

  // ==========================================================================
  // Cycle Timing
  // ==========================================================================
  PUMP_ON_SECONDS: z.coerce
    .number()
    .positive()
    .default(45)
    .describe("Fixed pump ON duration per cycle"),
  SAMPLE_INTERVAL_MS: z.coerce
    .number()
    .positive()
    .default(500)
    .describe("Power sampling interval during the ON phase (ms)"),
  STARTUP_DELAY_SECONDS: z.coerce
    .number()
    .nonnegative()
    .default(60)
    .describe("Grace period before the first cycle"),
  OVERRIDE_POLL_SECONDS: z.coerce
    .number()
    .positive()
    .default(30)
    .describe("Override channel poll interval during the OFF phase"),
  CYCLE_FAILURE_COOLDOWN_SECONDS: z.coerce
    .number()
    .nonnegative()
    .default(300)
    .describe("Pause before retrying a cycle whose pump ON failed"),
  ERROR_PAUSE_SECONDS: z.coerce
    .number()
    .nonnegative()
    .default(60)
    .describe("Pause after an unexpected error in the controller loop"),

  // ==========================================================================
  // Weather (OpenWeatherMap)
  // ==========================================================================
  WEATHER_API_KEY: optionalString.describe("OpenWeatherMap API key"),
  WEATHER_LOCATION: optionalString.describe("Location query, e.g. 'Leeds,GB'"),
  WEATHER_BASE_URL: z
    .string()
    .url()
    .default("https://api.openweathermap.org/data/2.5")
    .describe("OpenWeatherMap API base URL"),

  // ==========================================================================
  // Healthcheck Notifications
  // ==========================================================================
  HEALTHCHECK_URL: optionalUrl.describe("Healthcheck ping endpoint"),

  // ==========================================================================
  // Storage
  // ==========================================================================
  STATE_DIR: z
    .string()
    .default(homedir())
    .describe("Directory holding state, override and cycle log files"),
  STATE_FILE: z
    .string()
    .default("sump_config.json")
    .describe("Persisted controller state file name"),
  OVERRIDE_FILE: z
    .string()
    .default("pump_override.txt")
    .describe("One-shot override command file name"),
  CYCLE_LOG_FILE: z
    .string()
    .default("sump_cycles.csv")
    .describe("Per-cycle CSV log file name"),

  // ==========================================================================
  // Status API
  // ==========================================================================
  API_ENABLED: envBoolean(false).describe("Serve the HTTP status API"),
  PORT: z.coerce.number().default(8084).describe("HTTP server port"),
});

// Parse at startup - crashes immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config = parsed.data;

// Type export for use elsewhere
export type Config = z.infer<typeof ConfigSchema>;

// Placeholder shipped in old sample configs
const PLACEHOLDER_WEATHER_KEY = "your_api_key";

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * Relay device configuration.
 * Returns null if no relay host is configured.
 */
export function getRelayConfig(): Readonly<{
  host: string;
  timeoutMs: number;
}> | null {
  if (!config.RELAY_HOST) {
    return null;
  }

  return {
    host: config.RELAY_HOST,
    timeoutMs: config.RELAY_TIMEOUT_MS,
  };
}

/**
 * Weather lookup configuration.
 * Returns null when the API key or location is missing (weather is optional).
 *
 * Overrides come from the persisted state file, which may carry operator-supplied
 * connection parameters; they win over the environment.
 */
export function getWeatherConfig(
  overrides: Readonly<{ apiKey?: string; location?: string }> = {},
): Readonly<{
  baseUrl: string;
  apiKey: string;
  location: string;
  timeoutMs: number;
}> | null {
  const apiKey = overrides.apiKey ?? config.WEATHER_API_KEY;
  const location = overrides.location ?? config.WEATHER_LOCATION;

  if (!apiKey || apiKey === PLACEHOLDER_WEATHER_KEY || !location) {
    return null;
  }

  return {
    baseUrl: config.WEATHER_BASE_URL,
    apiKey,
    location,
    timeoutMs: config.RELAY_TIMEOUT_MS,
  };
}

/**
 * Healthcheck ping configuration.
 * Returns null if no URL is configured.
 */
export function getHealthcheckConfig(
  overrideUrl?: string,
): Readonly<{ url: string; timeoutMs: number }> | null {
  const url = overrideUrl ?? config.HEALTHCHECK_URL;
  if (!url) {
    return null;
  }

  return { url, timeoutMs: config.RELAY_TIMEOUT_MS };
}

/**
 * Status API configuration.
 * Returns null if the API is disabled.
 */
export function getApiConfig(): Readonly<{ port: number }> | null {
  if (!config.API_ENABLED) {
    return null;
  }

  return { port: config.PORT };
}

/**
 * Cycle timing in milliseconds.
 */
export function getControllerTiming(): Readonly<{
  startupDelayMs: number;
  onDurationMs: number;
  sampleIntervalMs: number;
  overridePollMs: number;
  cycleFailureCooldownMs: number;
  errorPauseMs: number;
  relayRetry: Readonly<{ maxAttempts: number; delayMs: number }>;
}> {
  return {
    startupDelayMs: config.STARTUP_DELAY_SECONDS * 1000,
    onDurationMs: config.PUMP_ON_SECONDS * 1000,
    sampleIntervalMs: config.SAMPLE_INTERVAL_MS,
    overridePollMs: config.OVERRIDE_POLL_SECONDS * 1000,
    cycleFailureCooldownMs: config.CYCLE_FAILURE_COOLDOWN_SECONDS * 1000,
    errorPauseMs: config.ERROR_PAUSE_SECONDS * 1000,
    relayRetry: {
      maxAttempts: config.RELAY_MAX_ATTEMPTS,
      delayMs: config.RELAY_RETRY_DELAY_MS,
    },
  };
}

/**
 * Absolute paths of the files the controller reads and writes.
 */
export const storagePaths = {
  stateFile: join(config.STATE_DIR, config.STATE_FILE),
  overrideFile: join(config.STATE_DIR, config.OVERRIDE_FILE),
  cycleLogFile: join(config.STATE_DIR, config.CYCLE_LOG_FILE),
} as const;
