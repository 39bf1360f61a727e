/**
 * CLI Module - Public API
 */

// Types
export type { CliCommand, CliError, CliMode } from "./schema.js";

export { CLI_USAGE } from "./schema.js";

// Service functions
export { readCliCommand } from "./service.js";

// Pure transformations
export { invalidArguments, parseCliArgs } from "./transform.js";
