/**
 * Controller Module - Service Layer
 *
 * The cycle state machine: ON phase, measurement, OFF phase wait with
 * override polling, and the outer loop that keeps it alive through
 * relay failures and unexpected errors.
 */
import {
  applyOverrideCommand,
  formatCommandError,
  formatOverrideCommand,
} from "../commands/index.js";
import { formatCycleLogError } from "../cycle-log/index.js";
import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import { nextOffTime } from "../policy/index.js";
import { type RelayAction, formatRelayError } from "../relay/index.js";
import { withRetry } from "../retry/index.js";
import { formatStoreError } from "../store/index.js";
import { measurePerformance } from "../telemetry/index.js";
import { formatWeatherError, type WeatherSnapshot } from "../weather/index.js";
import type {
  CompletedCycle,
  ControllerDeps,
  ControllerPhase,
  ControllerSnapshot,
  ControllerState,
  CycleOutcome,
  PumpController,
  WaitOutcome,
} from "./schema.js";
import {
  computeNextCycleTime,
  formatNextCycleTime,
  formatWaitDuration,
  relayEndState,
} from "./transform.js";

const log = createLogger("controller");

/**
 * Create a pump controller around its collaborators.
 *
 * @param deps - Relay, telemetry, weather, persistence, clock and timing
 * @param initialState - State loaded at startup
 */
export function createPumpController(
  deps: ControllerDeps,
  initialState: ControllerState,
): PumpController {
  const { clock, timing } = deps;

  let state: ControllerState = initialState;
  let phase: ControllerPhase = "IDLE";
  let running = false;
  let stopRequested = false;
  let weather: WeatherSnapshot | null = null;
  let lastCycle: CompletedCycle | null = null;

  function enterPhase(next: ControllerPhase): void {
    if (phase !== next) {
      log.debug({ from: phase, to: next }, `Phase ${phase} → ${next}`);
      phase = next;
    }
  }

  async function persist(): Promise<void> {
    const result = await deps.stateStore.save(state);
    if (result.isErr()) {
      log.error(
        { error: formatStoreError(result.error) },
        "Failed to save state",
      );
    }
  }

  // ===========================================================================
  // Collaborator Calls
  // ===========================================================================

  async function refreshWeather(): Promise<void> {
    const result = await deps.weather.currentConditions();

    if (result.isOk()) {
      weather = result.value;
      return;
    }

    if (result.error.type === "NOT_CONFIGURED") {
      log.debug("Weather not configured");
      return;
    }

    log.warn(
      { error: formatWeatherError(result.error), stale: weather !== null },
      "Weather unavailable - keeping previous conditions",
    );
  }

  /**
   * Switch the pump with the relay retry policy.
   *
   * @returns true once the relay confirms
   */
  async function switchPump(action: RelayAction): Promise<boolean> {
    const label = action === "on" ? "ON" : "OFF";

    const result = await withRetry(
      () => deps.relay.setState(action),
      timing.relayRetry,
      clock.sleep,
      (attempt, error) => {
        log.warn(
          { attempt, error: formatRelayError(error) },
          `Pump ${label} attempt ${attempt} failed`,
        );
      },
    );

    if (result.isErr()) {
      log.error(
        {
          attempts: result.error.attempts,
          error: formatRelayError(result.error.lastError),
        },
        `Failed to turn pump ${label}`,
      );
      return false;
    }

    state = { ...state, pumpStatus: action };
    log.info(`Pump ${label}`);
    return true;
  }

  // ===========================================================================
  // Cycle
  // ===========================================================================

  async function runCycle(): Promise<CycleOutcome> {
    const cycle = state.cycleCount + 1;
    const startTime = Date.now();

    await refreshWeather();

    log.info({ cycle }, `--- Cycle ${cycle} ---`);
    logOperationStart(log, "cycle", { cycle });

    enterPhase("ON_PHASE");
    if (!(await switchPump("on"))) {
      deps.notifier.notify({ type: "pump_failed", cycle, action: "ON" });
      logOperationFailed(log, "cycle", "pump did not confirm ON", { cycle });
      return { type: "FAILED", cycle, reason: "PUMP_ON_FAILED" };
    }

    deps.notifier.notify({ type: "cycle_started", cycle });

    enterPhase("MEASURING");
    const summary = await measurePerformance(
      deps.telemetry.readPower,
      clock,
      timing.onDurationMs,
      timing.sampleIntervalMs,
    );

    // Measurements stand even when OFF is not confirmed
    const pumpOffConfirmed = await switchPump("off");
    if (!pumpOffConfirmed) {
      deps.notifier.notify({ type: "pump_failed", cycle, action: "OFF" });
    }

    const decision = nextOffTime({
      summary,
      currentOffTimeSec: state.currentOffTimeSec,
      manualOverrideSec: state.manualOverrideSec,
      weather,
    });

    const completedAt = clock.now();
    state = {
      ...state,
      cycleCount: cycle,
      currentOffTimeSec: decision.offTimeSec,
      nextCycleTime: computeNextCycleTime(completedAt, decision.offTimeSec),
    };
    lastCycle = { cycle, completedAt, summary, decision };

    await persist();

    const logged = await deps.cycleLog.append({
      completedAt: new Date(completedAt),
      summary,
      nextOffTimeSec: decision.offTimeSec,
      relayState: relayEndState(pumpOffConfirmed),
      cycleCount: cycle,
      weatherDescription: weather?.description ?? "unknown",
    });
    if (logged.isErr()) {
      log.error(
        { error: formatCycleLogError(logged.error) },
        "Failed to write cycle log",
      );
    }

    deps.notifier.notify({
      type: "cycle_completed",
      cycle,
      workingTimeSec: summary.workingTimeSec,
      nextOffTimeSec: decision.offTimeSec,
    });

    logOperationComplete(log, "cycle", startTime, {
      cycle,
      regime: decision.regime,
      nextOffTimeSec: decision.offTimeSec,
    });

    return {
      type: "COMPLETED",
      cycle,
      summary,
      decision,
      pumpOffConfirmed,
    };
  }

  // ===========================================================================
  // Waiting
  // ===========================================================================

  /**
   * Take and apply a pending override command.
   *
   * @returns how the wait should end, or null to keep waiting
   */
  async function pollCommands(): Promise<WaitOutcome | null> {
    const taken = await deps.commands.take();

    if (taken.isErr()) {
      log.warn(
        { error: formatCommandError(taken.error) },
        "Override command discarded",
      );
      return null;
    }

    if (taken.value === null) {
      return null;
    }

    const effect = applyOverrideCommand(state, taken.value);
    log.info(
      { command: formatOverrideCommand(taken.value) },
      `Override: ${effect.description}`,
    );

    state = effect.state;
    await persist();

    if (effect.stopRequested) {
      stopRequested = true;
      return "STOPPED";
    }
    if (effect.pumpNow) {
      return "PUMP_NOW";
    }
    return null;
  }

  async function waitOffPhase(offTimeSec: number): Promise<WaitOutcome> {
    enterPhase("OFF_PHASE_WAIT");

    const deadline = clock.now() + offTimeSec * 1000;
    log.info(`Pump OFF for ${formatWaitDuration(offTimeSec)}`);
    log.info(`Next cycle: ${formatNextCycleTime(deadline)}`);

    for (;;) {
      if (stopRequested) {
        return "STOPPED";
      }

      const remaining = deadline - clock.now();
      if (remaining <= 0) {
        return "ELAPSED";
      }

      await clock.sleep(Math.min(timing.overridePollMs, remaining));

      const outcome = await pollCommands();
      if (outcome !== null) {
        if (outcome === "PUMP_NOW") {
          log.info("Override: Immediate pump cycle requested");
        }
        return outcome;
      }
    }
  }

  /**
   * Sleep in poll-sized steps so a stop request ends the pause early.
   *
   * @returns false when interrupted by a stop request
   */
  async function pause(ms: number): Promise<boolean> {
    const deadline = clock.now() + ms;

    for (;;) {
      if (stopRequested) {
        return false;
      }
      const remaining = deadline - clock.now();
      if (remaining <= 0) {
        return true;
      }
      await clock.sleep(Math.min(timing.overridePollMs, remaining));
    }
  }

  // ===========================================================================
  // Main Loop
  // ===========================================================================

  async function shutdown(): Promise<void> {
    enterPhase("STOPPING");
    log.info("Turning pump OFF before shutdown...");

    try {
      const confirmed = await switchPump("off");
      log.info(
        { confirmed },
        confirmed ? "Pump OFF confirmed" : "Pump OFF not confirmed",
      );
    } catch (error) {
      log.warn({ error }, "Pump OFF at shutdown failed");
    }

    enterPhase("TERMINATED");
    running = false;
    log.info("Controller stopped");
  }

  async function run(): Promise<void> {
    running = true;

    enterPhase("STARTUP_DELAY");
    log.info(
      `Waiting ${timing.startupDelayMs / 1000} seconds for system startup...`,
    );
    await pause(timing.startupDelayMs);

    while (!stopRequested) {
      try {
        const outcome = await runCycle();

        if (outcome.type === "FAILED") {
          log.error(
            { cycle: outcome.cycle },
            `Cycle failed, retrying in ${formatWaitDuration(timing.cycleFailureCooldownMs / 1000)}`,
          );
          enterPhase("OFF_PHASE_WAIT");
          await pause(timing.cycleFailureCooldownMs);
          continue;
        }

        await waitOffPhase(outcome.decision.offTimeSec);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        log.error({ error: message }, `Cycle error: ${message}`);
        deps.notifier.notify({ type: "controller_error", message });
        enterPhase("OFF_PHASE_WAIT");
        await pause(timing.errorPauseMs);
      }
    }

    await shutdown();
  }

  async function runOnce(): Promise<CycleOutcome> {
    running = true;
    try {
      return await runCycle();
    } finally {
      enterPhase("TERMINATED");
      running = false;
    }
  }

  return {
    run,
    runOnce,
    runCycle,
    waitOffPhase,
    requestStop: () => {
      if (!stopRequested) {
        log.info("Stop requested");
      }
      stopRequested = true;
    },
    getState: () => state,
    getSnapshot: (): ControllerSnapshot => ({
      phase,
      running,
      state,
      weather,
      lastCycle,
    }),
  };
}
