/**
 * Store Module - Schemas and Types
 *
 * Shape of the persisted controller state file. Keys are snake_case so
 * files written by earlier controller versions (and the admin menu) load
 * unchanged.
 */
import { z } from "zod";

import type { ControllerState } from "../controller/schema.js";

// =============================================================================
// Persisted File
// =============================================================================

const optionalSetting = z
  .string()
  .nullable()
  .optional()
  .transform((val) => (val && val.trim() !== "" ? val.trim() : undefined));

export const PersistedStateSchema = z.object({
  current_off_time: z.number().finite().optional(),
  manual_override: z.number().finite().nullable().optional(),
  cycle_count: z.number().int().nonnegative().optional(),
  healthcheck_url: optionalSetting,
  weather_api_key: optionalSetting,
  location: optionalSetting,
  last_updated: z.string().optional(),
});

/** Parsed (input) form of the file */
export type PersistedStateInput = z.input<typeof PersistedStateSchema>;

/** File after validation */
export type PersistedState = z.output<typeof PersistedStateSchema>;

// =============================================================================
// Connection Settings
// =============================================================================

/**
 * Operator-supplied connection parameters kept alongside the state.
 */
export type ConnectionSettings = Readonly<{
  healthcheckUrl?: string;
  weatherApiKey?: string;
  location?: string;
}>;

/**
 * Everything read back from the state file.
 */
export type LoadedState = Readonly<{
  state: ControllerState;
  connection: ConnectionSettings;
}>;

/**
 * On-disk document written after every cycle and applied override.
 */
export type PersistedDocument = Readonly<{
  current_off_time: number;
  manual_override: number | null;
  cycle_count: number;
  healthcheck_url: string;
  weather_api_key: string;
  location: string;
  last_updated: string;
}>;
