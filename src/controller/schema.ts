/**
 * Controller Module - Schemas and Types
 *
 * Controller state, phases, cycle outcomes and the collaborator contracts
 * the cycle state machine is wired with.
 */
import type { Result } from "neverthrow";

import type { Clock } from "../clock.js";
import type { CommandError, OverrideCommand } from "../commands/index.js";
import type { CycleLogEntry, CycleLogError } from "../cycle-log/index.js";
import type { Notification } from "../notifications/index.js";
import type { OffTimeDecision } from "../policy/schema.js";
import { BASE_OFF_TIME_SEC } from "../policy/schema.js";
import type { RelayAction, RelayError } from "../relay/index.js";
import type { RetryPolicy } from "../retry/index.js";
import type { StoreError } from "../store/index.js";
import type { PerformanceSummary, ReadPower } from "../telemetry/index.js";
import type { WeatherError, WeatherSnapshot } from "../weather/index.js";

// =============================================================================
// Controller State
// =============================================================================

/**
 * Last confirmed relay position.
 */
export type PumpStatus = "unknown" | "on" | "off";

/**
 * Durable controller state. Owned by the cycle state machine and
 * persisted after every cycle and every applied override.
 */
export type ControllerState = Readonly<{
  cycleCount: number;
  /** Within [MIN_OFF_TIME_SEC, MAX_OFF_TIME_SEC] */
  currentOffTimeSec: number;
  manualOverrideSec: number | null;
  pumpStatus: PumpStatus;
  /** Epoch ms of the next scheduled cycle */
  nextCycleTime: number | null;
}>;

/**
 * Initial controller state.
 */
export const INITIAL_CONTROLLER_STATE: ControllerState = {
  cycleCount: 0,
  currentOffTimeSec: BASE_OFF_TIME_SEC,
  manualOverrideSec: null,
  pumpStatus: "unknown",
  nextCycleTime: null,
};

// =============================================================================
// Phases
// =============================================================================

export type ControllerPhase =
  | "IDLE"
  | "STARTUP_DELAY"
  | "ON_PHASE"
  | "MEASURING"
  | "OFF_PHASE_WAIT"
  | "STOPPING"
  | "TERMINATED";

// =============================================================================
// Collaborators
// =============================================================================

export type RelayClient = Readonly<{
  setState: (action: RelayAction) => Promise<Result<RelayAction, RelayError>>;
}>;

export type TelemetryClient = Readonly<{
  readPower: ReadPower;
}>;

export type WeatherClient = Readonly<{
  currentConditions: () => Promise<Result<WeatherSnapshot, WeatherError>>;
}>;

/**
 * Fire-and-forget: notify() returns immediately and never throws.
 */
export type Notifier = Readonly<{
  notify: (notification: Notification) => void;
}>;

export type CycleLogWriter = Readonly<{
  append: (entry: CycleLogEntry) => Promise<Result<void, CycleLogError>>;
}>;

export type StateStore = Readonly<{
  save: (state: ControllerState) => Promise<Result<void, StoreError>>;
}>;

/**
 * Single-slot command channel. take() empties the slot.
 */
export type CommandChannel = Readonly<{
  take: () => Promise<Result<OverrideCommand | null, CommandError>>;
}>;

/**
 * Cycle timing in milliseconds.
 */
export type ControllerTiming = Readonly<{
  startupDelayMs: number;
  onDurationMs: number;
  sampleIntervalMs: number;
  overridePollMs: number;
  cycleFailureCooldownMs: number;
  errorPauseMs: number;
  relayRetry: RetryPolicy;
}>;

export type ControllerDeps = Readonly<{
  relay: RelayClient;
  telemetry: TelemetryClient;
  weather: WeatherClient;
  notifier: Notifier;
  cycleLog: CycleLogWriter;
  stateStore: StateStore;
  commands: CommandChannel;
  clock: Clock;
  timing: ControllerTiming;
}>;

// =============================================================================
// Outcomes
// =============================================================================

/**
 * Result of one ON → measure → OFF → compute cycle.
 */
export type CycleOutcome =
  | Readonly<{
      type: "COMPLETED";
      cycle: number;
      summary: PerformanceSummary;
      decision: OffTimeDecision;
      /** False when the relay never confirmed OFF */
      pumpOffConfirmed: boolean;
    }>
  | Readonly<{
      type: "FAILED";
      cycle: number;
      reason: "PUMP_ON_FAILED";
    }>;

/**
 * How an OFF-phase wait ended.
 */
export type WaitOutcome = "ELAPSED" | "PUMP_NOW" | "STOPPED";

/**
 * Last completed cycle, for status reporting.
 */
export type CompletedCycle = Readonly<{
  cycle: number;
  completedAt: number;
  summary: PerformanceSummary;
  decision: OffTimeDecision;
}>;

/**
 * Read-only view of the controller.
 */
export type ControllerSnapshot = Readonly<{
  phase: ControllerPhase;
  running: boolean;
  state: ControllerState;
  weather: WeatherSnapshot | null;
  lastCycle: CompletedCycle | null;
}>;

/**
 * Cycle state machine handle.
 */
export type PumpController = Readonly<{
  /** Startup delay, then cycles until a stop is requested */
  run: () => Promise<void>;
  /** One cycle with no OFF-phase wait */
  runOnce: () => Promise<CycleOutcome>;
  runCycle: () => Promise<CycleOutcome>;
  waitOffPhase: (offTimeSec: number) => Promise<WaitOutcome>;
  /** Cooperative stop, observed at the next yield point */
  requestStop: () => void;
  getState: () => ControllerState;
  getSnapshot: () => ControllerSnapshot;
}>;
