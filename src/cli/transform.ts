/**
 * CLI Module - Pure Transformations
 */
import { type Result, err, ok } from "neverthrow";

import {
  formatCommandError,
  parseOverrideCommand,
} from "../commands/index.js";
import type { CliCommand, CliError } from "./schema.js";

/**
 * Create an INVALID_ARGUMENTS error.
 */
export function invalidArguments(message: string): CliError {
  return { type: "INVALID_ARGUMENTS", message };
}

/**
 * Map positional arguments to a process mode.
 *
 * @example
 * parseCliArgs([])              // ok({ mode: "run" })
 * parseCliArgs(["wait", "90"])  // ok({ mode: "deposit", command: { command: "wait", minutes: 90 } })
 */
export function parseCliArgs(
  args: ReadonlyArray<string>,
): Result<CliCommand, CliError> {
  if (args.length === 0) {
    return ok({ mode: "run" });
  }

  const text = args.join(" ");
  if (text.trim().toLowerCase() === "test") {
    return ok({ mode: "test" });
  }

  return parseOverrideCommand(text)
    .map((command): CliCommand => ({ mode: "deposit", command }))
    .mapErr((error) => invalidArguments(formatCommandError(error)));
}
