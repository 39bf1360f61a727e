/**
 * Telemetry Module - Error Types
 *
 * Typed error unions for power meter reads.
 * Errors are values, not exceptions.
 */

/**
 * Errors that can occur while reading the power meter.
 */
export type TelemetryError =
  | {
      readonly type: "READ_FAILED";
      readonly message: string;
      readonly statusCode?: number;
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
 * Create a READ_FAILED error.
 */
export function readFailed(
  message: string,
  statusCode?: number,
): TelemetryError {
  return statusCode !== undefined
    ? { type: "READ_FAILED", message, statusCode }
    : { type: "READ_FAILED", message };
}

/**
 * Create an INVALID_RESPONSE error.
 */
export function invalidResponse(
  message: string,
  responseData?: unknown,
): TelemetryError {
  return { type: "INVALID_RESPONSE", message, responseData };
}

/**
 * Create a NETWORK_ERROR.
 */
export function networkError(message: string, cause?: Error): TelemetryError {
  if (cause) {
    return { type: "NETWORK_ERROR", message, cause };
  }
  return { type: "NETWORK_ERROR", message };
}

/**
 * Format a TelemetryError for logging.
 */
export function formatTelemetryError(error: TelemetryError): string {
  switch (error.type) {
    case "READ_FAILED":
      return `Read failed: ${error.message}`;
    case "INVALID_RESPONSE":
      return `Invalid response: ${error.message}`;
    case "NETWORK_ERROR":
      return `Network error: ${error.message}`;
  }
}
