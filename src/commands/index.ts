/**
 * Commands Module - Public API
 *
 * Exports only what's needed by other modules.
 */

// Types
export type {
  OverrideCommand,
  OverrideCommandName,
  OverrideEffect,
} from "./schema.js";
export type { CommandError } from "./errors.js";

export { OverrideCommandSchema } from "./schema.js";

// Error utilities
export { formatCommandError } from "./errors.js";

// Service functions (side effects)
export {
  createFileCommandChannel,
  depositCommand,
  takeCommand,
} from "./service.js";

// Pure transformations
export {
  applyOverrideCommand,
  formatOverrideCommand,
  parseOverrideCommand,
} from "./transform.js";
