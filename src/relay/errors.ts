/**
 * Relay Module - Error Types
 *
 * Typed error unions for relay operations.
 * Errors are values, not exceptions.
 */
import type { RelayAction } from "./schema.js";

/**
 * Errors that can occur while switching the relay.
 */
export type RelayError =
  | {
      readonly type: "COMMAND_REJECTED";
      readonly action: RelayAction;
      readonly message: string;
    }
  | {
      readonly type: "HTTP_ERROR";
      readonly action: RelayAction;
      readonly statusCode: number;
      readonly message: string;
    }
  | {
      readonly type: "TIMEOUT";
      readonly action: RelayAction;
      readonly message: string;
    }
  | {
      readonly type: "NETWORK_ERROR";
      readonly action: RelayAction;
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "INVALID_RESPONSE";
      readonly action: RelayAction;
      readonly message: string;
      readonly responseData?: unknown;
    };

/**
 * Create a COMMAND_REJECTED error.
 */
export function commandRejected(
  action: RelayAction,
  message: string,
): RelayError {
  return { type: "COMMAND_REJECTED", action, message };
}

/**
 * Create an HTTP_ERROR.
 */
export function httpError(
  action: RelayAction,
  statusCode: number,
  message: string,
): RelayError {
  return { type: "HTTP_ERROR", action, statusCode, message };
}

/**
 * Create a TIMEOUT error.
 */
export function timeout(action: RelayAction, message: string): RelayError {
  return { type: "TIMEOUT", action, message };
}

/**
 * Create a NETWORK_ERROR.
 */
export function networkError(
  action: RelayAction,
  message: string,
  cause?: Error,
): RelayError {
  if (cause) {
    return { type: "NETWORK_ERROR", action, message, cause };
  }
  return { type: "NETWORK_ERROR", action, message };
}

/**
 * Create an INVALID_RESPONSE error.
 */
export function invalidResponse(
  action: RelayAction,
  message: string,
  responseData?: unknown,
): RelayError {
  return { type: "INVALID_RESPONSE", action, message, responseData };
}

/**
 * Format a RelayError for logging.
 */
export function formatRelayError(error: RelayError): string {
  const action = error.action.toUpperCase();
  switch (error.type) {
    case "COMMAND_REJECTED":
      return `Relay ${action} rejected: ${error.message}`;
    case "HTTP_ERROR":
      return `Relay ${action} HTTP ${error.statusCode}: ${error.message}`;
    case "TIMEOUT":
      return `Relay ${action} timed out: ${error.message}`;
    case "NETWORK_ERROR":
      return `Relay ${action} network error: ${error.message}`;
    case "INVALID_RESPONSE":
      return `Relay ${action} invalid response: ${error.message}`;
  }
}
