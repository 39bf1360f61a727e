/**
 * Notifications Module - Public API
 *
 * Exports types, service functions, and transformations for the notifications module.
 */

// Types
export type {
  ControllerErrorNotification,
  CycleCompletedNotification,
  CycleStartedNotification,
  HealthcheckConfig,
  Notification,
  NotificationType,
  PumpFailedNotification,
} from "./schema.js";

// Error types
export type { NotificationError } from "./errors.js";

export { networkError, notConfigured, sendFailed } from "./errors.js";

// Service functions
export { createHealthcheckNotifier, sendHealthCheck } from "./service.js";

// Pure transformations (for testing and external use)
export {
  formatControllerErrorMessage,
  formatCycleCompletedMessage,
  formatCycleStartedMessage,
  formatNotificationMessage,
  formatPumpFailedMessage,
} from "./transform.js";
