/**
 * Commands Module - Pure Transformations
 *
 * Parsing, formatting and applying override commands.
 * No side effects, no I/O - just data in, data out.
 */
import { type Result, err, ok } from "neverthrow";

import type { ControllerState } from "../controller/schema.js";
import { clampOffTime } from "../policy/index.js";
import { type CommandError, invalidCommand } from "./errors.js";
import type { OverrideCommand, OverrideEffect } from "./schema.js";

const WAIT_PATTERN = /^wait\s+(\d+)$/;

/**
 * Parse command text as written to the command slot or given on the CLI.
 * Case and surrounding whitespace are ignored.
 */
export function parseOverrideCommand(
  text: string,
): Result<OverrideCommand, CommandError> {
  const normalized = text.trim().toLowerCase();

  switch (normalized) {
    case "stop":
      return ok({ command: "stop" });
    case "normal":
      return ok({ command: "normal" });
    case "pump_now":
      return ok({ command: "pump_now" });
  }

  const match = WAIT_PATTERN.exec(normalized);
  if (match) {
    const minutes = Number(match[1]);
    if (minutes <= 0) {
      return err(
        invalidCommand(text, "wait needs a positive number of minutes"),
      );
    }
    return ok({ command: "wait", minutes });
  }

  if (normalized.startsWith("wait")) {
    return err(invalidCommand(text, "usage: wait <minutes>"));
  }

  return err(invalidCommand(text, "unknown command"));
}

/**
 * Format a command as written to the command slot.
 */
export function formatOverrideCommand(command: OverrideCommand): string {
  return command.command === "wait"
    ? `wait ${command.minutes}`
    : command.command;
}

/**
 * Apply a command to controller state.
 *
 * - `stop`     requests termination, state unchanged
 * - `normal`   clears the manual override
 * - `wait m`   sets the manual override to m minutes, held to the global bounds
 * - `pump_now` ends the current wait early, state unchanged
 */
export function applyOverrideCommand(
  state: ControllerState,
  command: OverrideCommand,
): OverrideEffect {
  switch (command.command) {
    case "stop":
      return {
        state,
        stopRequested: true,
        pumpNow: false,
        description: "System stop requested",
      };
    case "normal":
      return {
        state: { ...state, manualOverrideSec: null },
        stopRequested: false,
        pumpNow: false,
        description: "Returned to normal operation",
      };
    case "wait": {
      const overrideSec = clampOffTime(command.minutes * 60);
      return {
        state: { ...state, manualOverrideSec: overrideSec },
        stopRequested: false,
        pumpNow: false,
        description: `Set wait time to ${command.minutes} minutes (${overrideSec}s)`,
      };
    }
    case "pump_now":
      return {
        state,
        stopRequested: false,
        pumpNow: true,
        description: "Immediate pump requested",
      };
  }
}
