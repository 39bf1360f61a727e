/**
 * Controller Module - Public API
 *
 * Exports only what's needed by other modules.
 */

// Types
export type {
  CommandChannel,
  CompletedCycle,
  ControllerDeps,
  ControllerPhase,
  ControllerSnapshot,
  ControllerState,
  ControllerTiming,
  CycleLogWriter,
  CycleOutcome,
  Notifier,
  PumpController,
  PumpStatus,
  RelayClient,
  StateStore,
  TelemetryClient,
  WaitOutcome,
  WeatherClient,
} from "./schema.js";

export { INITIAL_CONTROLLER_STATE } from "./schema.js";

// Service functions
export { createPumpController } from "./service.js";

// Pure transformations
export {
  computeNextCycleTime,
  formatNextCycleTime,
  formatWaitDuration,
  relayEndState,
} from "./transform.js";
