/**
 * Store Module - Pure Transformations
 *
 * Conversion between the in-memory controller state and the file document.
 */
import type { ControllerState } from "../controller/schema.js";
import { INITIAL_CONTROLLER_STATE } from "../controller/schema.js";
import { BASE_OFF_TIME_SEC, clampOffTime } from "../policy/index.js";
import type {
  ConnectionSettings,
  LoadedState,
  PersistedDocument,
  PersistedState,
} from "./schema.js";

/**
 * State used when there is no usable file.
 */
export function defaultLoadedState(): LoadedState {
  return { state: INITIAL_CONTROLLER_STATE, connection: {} };
}

/**
 * Normalize a stored override. Zero or negative means "no override";
 * anything else is held to the global bounds.
 */
export function normalizeOverride(
  value: number | null | undefined,
): number | null {
  if (value === null || value === undefined || value <= 0) {
    return null;
  }
  return clampOffTime(value);
}

/**
 * Build controller state and connection settings from a validated file.
 * Off-time and override are clamped into bounds.
 */
export function fromPersisted(file: PersistedState): LoadedState {
  const connection: ConnectionSettings = {
    ...(file.healthcheck_url !== undefined
      ? { healthcheckUrl: file.healthcheck_url }
      : {}),
    ...(file.weather_api_key !== undefined
      ? { weatherApiKey: file.weather_api_key }
      : {}),
    ...(file.location !== undefined ? { location: file.location } : {}),
  };

  return {
    state: {
      ...INITIAL_CONTROLLER_STATE,
      currentOffTimeSec: clampOffTime(
        file.current_off_time ?? BASE_OFF_TIME_SEC,
      ),
      manualOverrideSec: normalizeOverride(file.manual_override),
      cycleCount: file.cycle_count ?? 0,
    },
    connection,
  };
}

/**
 * Build the file document for a state snapshot.
 */
export function toPersisted(
  state: ControllerState,
  connection: ConnectionSettings,
  now: Date,
): PersistedDocument {
  return {
    current_off_time: state.currentOffTimeSec,
    manual_override: state.manualOverrideSec,
    cycle_count: state.cycleCount,
    healthcheck_url: connection.healthcheckUrl ?? "",
    weather_api_key: connection.weatherApiKey ?? "",
    location: connection.location ?? "",
    last_updated: now.toISOString(),
  };
}
