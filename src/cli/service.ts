/**
 * CLI Module - Service Layer
 *
 * Command line parsing with commander. Positional arguments only.
 */
import { Command, CommanderError } from "commander";
import { type Result, err } from "neverthrow";

import { createLogger } from "../logger.js";
import type { CliCommand, CliError } from "./schema.js";
import { CLI_USAGE } from "./schema.js";
import { invalidArguments, parseCliArgs } from "./transform.js";

const log = createLogger("cli");

function createProgram(): Command {
  return new Command()
    .name("sump-pump")
    .description("Adaptive sump pump controller")
    .argument(
      "[command...]",
      "stop | normal | pump_now | wait <minutes> | test (none: run)",
    )
    .helpOption(false)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => log.debug(text.trim()),
      writeErr: (text) => log.debug(text.trim()),
    });
}

/**
 * Parse user arguments (process.argv without the node and script paths).
 */
export function readCliCommand(
  argv: ReadonlyArray<string>,
): Result<CliCommand, CliError> {
  const program = createProgram();

  try {
    program.parse([...argv], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return err(invalidArguments(`${error.message} (${CLI_USAGE})`));
    }
    throw error;
  }

  return parseCliArgs(program.args);
}
