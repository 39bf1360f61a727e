/**
 * Relay Module - Public API
 *
 * Exports only what's needed by other modules.
 */

// Types
export type { RelayAction, RelayConfig } from "./schema.js";
export type { RelayError } from "./errors.js";

// Error utilities
export { formatRelayError } from "./errors.js";

// Service functions (side effects)
export { setRelayState } from "./service.js";
