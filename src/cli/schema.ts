/**
 * CLI Module - Schemas and Types
 *
 * What the process was asked to do by its positional arguments.
 */
import type { OverrideCommand } from "../commands/index.js";

/**
 * Process mode selected on the command line.
 *
 * - `run`     no arguments, run the controller until stopped
 * - `test`    run exactly one cycle and exit
 * - `deposit` hand a command to the running controller and exit
 */
export type CliCommand =
  | Readonly<{ mode: "run" }>
  | Readonly<{ mode: "test" }>
  | Readonly<{ mode: "deposit"; command: OverrideCommand }>;

export type CliMode = CliCommand["mode"];

/**
 * Invalid command line.
 */
export type CliError = Readonly<{
  type: "INVALID_ARGUMENTS";
  message: string;
}>;

export const CLI_USAGE =
  "usage: sump-pump [stop | normal | pump_now | wait <minutes> | test]";
