/**
 * Relay Module - Service Layer
 *
 * Side effects happen here: HTTP calls to the relay plug.
 * Uses Result types for explicit error handling.
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import type { RelayError } from "./errors.js";
import {
  commandRejected,
  httpError,
  invalidResponse,
  networkError,
  timeout,
} from "./errors.js";
import type {
  RelayAction,
  RelayCommandRequest,
  RelayConfig,
} from "./schema.js";
import { RelayResponseSchema } from "./schema.js";

const log = createLogger("relay");

/**
 * Switch the relay ON or OFF.
 *
 * The command is idempotent, so callers may retry it freely.
 *
 * @param action - "on" or "off"
 * @param config - Relay configuration
 * @returns Result with the confirmed action or error
 */
export async function setRelayState(
  action: RelayAction,
  config: RelayConfig,
): Promise<Result<RelayAction, RelayError>> {
  const url = `http://${config.host}/setRelayStatus`;
  const body: RelayCommandRequest = { data: action };

  log.debug(
    { action: action.toUpperCase(), host: config.host },
    "Switching relay...",
  );

  try {
    const response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(config.timeoutMs),
    });

    if (response.status !== 200) {
      return err(httpError(action, response.status, response.statusText));
    }

    const data: unknown = await response.json();
    const parsed = RelayResponseSchema.safeParse(data);

    if (!parsed.success) {
      return err(invalidResponse(action, "Unexpected relay response", data));
    }

    if (parsed.data.rslt !== "OK") {
      return err(commandRejected(action, `rslt=${parsed.data.rslt}`));
    }

    log.info(
      { action: action.toUpperCase() },
      `Pump ${action.toUpperCase()} - Success`,
    );
    return ok(action);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));

    if (cause.name === "TimeoutError" || cause.name === "AbortError") {
      return err(timeout(action, `No response within ${config.timeoutMs}ms`));
    }

    return err(networkError(action, "Failed to reach relay", cause));
  }
}
