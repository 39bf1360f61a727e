/**
 * Notifications Module - Pure Transformations
 *
 * Message formatting for healthcheck pings.
 * No side effects, no I/O - just data in, data out.
 */
import type { Notification } from "./schema.js";

/**
 * Format a cycle-start message.
 */
export function formatCycleStartedMessage(cycle: number): string {
  return `Cycle ${cycle}: Pump ON - monitoring performance`;
}

/**
 * Format a cycle-complete message, e.g. "Cycle 3: Working 12.5s, Next: 7.0min".
 */
export function formatCycleCompletedMessage(
  cycle: number,
  workingTimeSec: number,
  nextOffTimeSec: number,
): string {
  return `Cycle ${cycle}: Working ${workingTimeSec.toFixed(1)}s, Next: ${(nextOffTimeSec / 60).toFixed(1)}min`;
}

/**
 * Format a relay failure message.
 */
export function formatPumpFailedMessage(
  cycle: number,
  action: "ON" | "OFF",
): string {
  return `ERROR Cycle ${cycle}: Failed ${action}`;
}

/**
 * Format a controller error message.
 */
export function formatControllerErrorMessage(message: string): string {
  return `ERROR: ${message}`;
}

/**
 * Format any notification into a message string.
 */
export function formatNotificationMessage(notification: Notification): string {
  switch (notification.type) {
    case "cycle_started":
      return formatCycleStartedMessage(notification.cycle);
    case "cycle_completed":
      return formatCycleCompletedMessage(
        notification.cycle,
        notification.workingTimeSec,
        notification.nextOffTimeSec,
      );
    case "pump_failed":
      return formatPumpFailedMessage(notification.cycle, notification.action);
    case "controller_error":
      return formatControllerErrorMessage(notification.message);
  }
}
