/**
 * Controller Module - Pure Transformations
 *
 * Display and scheduling helpers for the cycle state machine.
 */
import type { RelayEndState } from "../cycle-log/index.js";
import { formatLocalDate, formatLocalTime } from "../cycle-log/index.js";

/**
 * Human-readable OFF duration: hours from one hour up, otherwise minutes.
 *
 * @example
 * formatWaitDuration(420)  // "7.0 minutes"
 * formatWaitDuration(5400) // "1.5 hours"
 */
export function formatWaitDuration(offTimeSec: number): string {
  if (offTimeSec >= 3600) {
    return `${(offTimeSec / 3600).toFixed(1)} hours`;
  }
  return `${(offTimeSec / 60).toFixed(1)} minutes`;
}

/**
 * Epoch ms at which the next cycle is due.
 */
export function computeNextCycleTime(
  completedAt: number,
  offTimeSec: number,
): number {
  return completedAt + offTimeSec * 1000;
}

/**
 * Local "HH:MM:SS on YYYY-MM-DD" for log lines.
 */
export function formatNextCycleTime(epochMs: number): string {
  const date = new Date(epochMs);
  return `${formatLocalTime(date)} on ${formatLocalDate(date)}`;
}

/**
 * Relay state recorded in the cycle log. An unconfirmed OFF means the
 * pump may still be running.
 */
export function relayEndState(pumpOffConfirmed: boolean): RelayEndState {
  return pumpOffConfirmed ? "OFF" : "ON";
}
