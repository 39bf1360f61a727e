/**
 * Weather Module - Error Types
 *
 * Typed error unions for weather lookups.
 * Errors are values, not exceptions.
 */

/**
 * Errors that can occur while fetching weather.
 */
export type WeatherError =
  | { readonly type: "NOT_CONFIGURED"; readonly message: string }
  | {
      readonly type: "FETCH_FAILED";
      readonly message: string;
      readonly statusCode: number;
    }
  | {
      readonly type: "INVALID_RESPONSE";
      readonly message: string;
      readonly responseData?: unknown;
    }
  | {
      readonly type: "NETWORK_ERROR";
      readonly message: string;
      readonly cause?: Error;
    };

/**
 * Create a NOT_CONFIGURED error.
 */
export function notConfigured(message: string): WeatherError {
  return { type: "NOT_CONFIGURED", message };
}

/**
 * Create a FETCH_FAILED error.
 */
export function fetchFailed(message: string, statusCode: number): WeatherError {
  return { type: "FETCH_FAILED", message, statusCode };
}

/**
 * Create an INVALID_RESPONSE error.
 */
export function invalidResponse(
  message: string,
  responseData?: unknown,
): WeatherError {
  return { type: "INVALID_RESPONSE", message, responseData };
}

/**
 * Create a NETWORK_ERROR.
 */
export function networkError(message: string, cause?: Error): WeatherError {
  if (cause) {
    return { type: "NETWORK_ERROR", message, cause };
  }
  return { type: "NETWORK_ERROR", message };
}

/**
 * Format a WeatherError for logging.
 */
export function formatWeatherError(error: WeatherError): string {
  switch (error.type) {
    case "NOT_CONFIGURED":
      return `Weather not configured: ${error.message}`;
    case "FETCH_FAILED":
      return `Fetch failed (${error.statusCode}): ${error.message}`;
    case "INVALID_RESPONSE":
      return `Invalid response: ${error.message}`;
    case "NETWORK_ERROR":
      return `Network error: ${error.message}`;
  }
}
