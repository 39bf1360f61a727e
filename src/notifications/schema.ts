/**
 * Notifications Module - Schemas and Types
 *
 * Healthcheck ping configuration and the controller events that are
 * reported through it.
 */
import { z } from "zod";

// =============================================================================
// Healthcheck Configuration
// =============================================================================

export const HealthcheckConfigSchema = z.object({
  url: z.string().url().describe("Healthcheck ping endpoint"),
  timeoutMs: z.number().positive().describe("HTTP request timeout in ms"),
});

export type HealthcheckConfig = z.infer<typeof HealthcheckConfigSchema>;

// =============================================================================
// Notification Types
// =============================================================================

/**
 * Notification type discriminator.
 */
export type NotificationType =
  | "cycle_started"
  | "cycle_completed"
  | "pump_failed"
  | "controller_error";

/**
 * Pump switched ON, measurement running.
 */
export type CycleStartedNotification = Readonly<{
  type: "cycle_started";
  cycle: number;
}>;

/**
 * Cycle finished and the next wait is known.
 */
export type CycleCompletedNotification = Readonly<{
  type: "cycle_completed";
  cycle: number;
  workingTimeSec: number;
  nextOffTimeSec: number;
}>;

/**
 * Relay did not confirm a command after all retries.
 */
export type PumpFailedNotification = Readonly<{
  type: "pump_failed";
  cycle: number;
  action: "ON" | "OFF";
}>;

/**
 * Unexpected error in the controller loop.
 */
export type ControllerErrorNotification = Readonly<{
  type: "controller_error";
  message: string;
}>;

/**
 * Union of all notification types.
 */
export type Notification =
  | CycleStartedNotification
  | CycleCompletedNotification
  | PumpFailedNotification
  | ControllerErrorNotification;
