/**
 * Notifications Module - Service Layer
 *
 * Healthcheck pings. Delivery is best-effort: the controller never waits
 * for a ping and a failed ping is only logged.
 */
import { type Result, err, ok } from "neverthrow";

import type { Notifier } from "../controller/schema.js";
import { createLogger } from "../logger.js";
import { networkError, notConfigured, sendFailed } from "./errors.js";
import type { NotificationError } from "./errors.js";
import type { HealthcheckConfig, Notification } from "./schema.js";
import { formatNotificationMessage } from "./transform.js";

const log = createLogger("notifications");

// =============================================================================
// Core Send Function
// =============================================================================

/**
 * POST a message to the healthcheck endpoint.
 *
 * @param message - Plain text body
 * @param config - Healthcheck configuration, or null when not configured
 * @returns Result with void on success or error
 */
export async function sendHealthCheck(
  message: string,
  config: HealthcheckConfig | null,
): Promise<Result<void, NotificationError>> {
  if (!config) {
    return err(notConfigured("HEALTHCHECK_URL not configured"));
  }

  try {
    const response = await fetch(config.url, {
      method: "POST",
      headers: { "Content-Type": "text/plain; charset=utf-8" },
      body: message,
      signal: AbortSignal.timeout(config.timeoutMs),
    });

    if (!response.ok) {
      const errorText = await response.text().catch(() => "Unknown error");
      return err(
        sendFailed(
          `Healthcheck returned ${response.status}: ${errorText}`,
          response.status,
        ),
      );
    }

    log.info(`Health check: ${message}`);
    return ok(undefined);
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown error";
    return err(
      networkError(message, error instanceof Error ? error : undefined),
    );
  }
}

// =============================================================================
// Fire-and-Forget Notifier
// =============================================================================

/**
 * Notifier that pings the healthcheck endpoint without blocking the caller.
 */
export function createHealthcheckNotifier(
  config: HealthcheckConfig | null,
): Notifier {
  return {
    notify: (notification: Notification) => {
      const message = formatNotificationMessage(notification);

      sendHealthCheck(message, config)
        .then((result) => {
          if (result.isErr() && result.error.type !== "NOT_CONFIGURED") {
            log.error(
              { error: result.error.message, notification: notification.type },
              "Health check error",
            );
          }
        })
        .catch((error: unknown) => {
          log.error({ error }, "Failed to send health check");
        });
    },
  };
}
