/**
 * Store Module - Public API
 *
 * Exports only what's needed by other modules.
 */

// Types
export type {
  ConnectionSettings,
  LoadedState,
  PersistedDocument,
} from "./schema.js";
export type { StoreError } from "./errors.js";

// Error utilities
export { formatStoreError } from "./errors.js";

// Service functions (side effects)
export {
  createFileStateStore,
  loadState,
  readStateFile,
  saveState,
} from "./service.js";

// Pure transformations
export {
  defaultLoadedState,
  fromPersisted,
  normalizeOverride,
  toPersisted,
} from "./transform.js";
