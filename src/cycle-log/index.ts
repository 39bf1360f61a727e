/**
 * Cycle Log Module - Public API
 */

// Types
export type { CycleLogEntry, CycleLogRow, RelayEndState } from "./schema.js";
export type { CycleLogError } from "./errors.js";

export { CYCLE_LOG_COLUMNS, NOMINAL_VOLTAGE_V } from "./schema.js";

// Error utilities
export { formatCycleLogError } from "./errors.js";

// Service functions (side effects)
export { appendCycleLog, createCsvCycleLog } from "./service.js";

// Pure transformations
export {
  buildCycleLogRow,
  escapeCsvField,
  formatCsvLine,
  formatLocalDate,
  formatLocalTime,
} from "./transform.js";
