#!/usr/bin/env node
/**
 * Sump Pump Controller - Application Entry Point
 *
 * - `sump-pump`                 run the controller until SIGINT/SIGTERM or `stop`
 * - `sump-pump test`            run one cycle and exit
 * - `sump-pump stop|normal|pump_now|wait <minutes>`
 *                               hand a command to the running controller and exit
 *
 * With API_ENABLED=true the status API is served next to the controller.
 */
import { serve } from "@hono/node-server";

import { createApp } from "./api/app.js";
import { CLI_USAGE, type CliCommand, readCliCommand } from "./cli/index.js";
import { systemClock } from "./clock.js";
import { createFileCommandChannel, depositCommand } from "./commands/index.js";
import {
  config,
  getApiConfig,
  getControllerTiming,
  getHealthcheckConfig,
  getRelayConfig,
  getWeatherConfig,
  storagePaths,
} from "./config.js";
import {
  type ControllerDeps,
  createPumpController,
} from "./controller/index.js";
import { createCsvCycleLog } from "./cycle-log/index.js";
import { createLogger } from "./logger.js";
import { createHealthcheckNotifier } from "./notifications/index.js";
import {
  HEAVY_LOAD_THRESHOLD_SEC,
  OPTIMAL_RUN_THRESHOLD_SEC,
  SHORT_RUN_THRESHOLD_SEC,
} from "./policy/index.js";
import { type RelayConfig, setRelayState } from "./relay/index.js";
import {
  type ConnectionSettings,
  createFileStateStore,
  loadState,
} from "./store/index.js";
import {
  IDLE_POWER_THRESHOLD_W,
  WORKING_POWER_THRESHOLD_W,
  readPowerMeter,
} from "./telemetry/index.js";
import { fetchCurrentConditions } from "./weather/index.js";

const log = createLogger("cli");

// =============================================================================
// Wiring
// =============================================================================

/**
 * Bind the device, weather, notification and file collaborators.
 * Connection settings from the state file win over the environment.
 */
function createControllerDeps(
  relayConfig: RelayConfig,
  connection: ConnectionSettings,
): ControllerDeps {
  const weatherConfig = getWeatherConfig({
    apiKey: connection.weatherApiKey,
    location: connection.location,
  });
  const healthcheckConfig = getHealthcheckConfig(connection.healthcheckUrl);

  log.info(
    weatherConfig
      ? { location: weatherConfig.location }
      : { reason: "WEATHER_API_KEY or WEATHER_LOCATION missing" },
    `Weather adjustments: ${weatherConfig ? "ENABLED" : "DISABLED"}`,
  );
  log.info(
    `Health check notifications: ${healthcheckConfig ? "ENABLED" : "DISABLED"}`,
  );

  return {
    relay: { setState: (action) => setRelayState(action, relayConfig) },
    telemetry: { readPower: () => readPowerMeter(relayConfig) },
    weather: {
      currentConditions: () => fetchCurrentConditions(weatherConfig),
    },
    notifier: createHealthcheckNotifier(healthcheckConfig),
    cycleLog: createCsvCycleLog(storagePaths.cycleLogFile),
    stateStore: createFileStateStore(storagePaths.stateFile, connection),
    commands: createFileCommandChannel(storagePaths.overrideFile),
    clock: systemClock,
    timing: getControllerTiming(),
  };
}

// =============================================================================
// Modes
// =============================================================================

function printBanner(): void {
  console.log("");
  console.log("========================================");
  console.log("  ADAPTIVE SUMP PUMP CONTROLLER");
  console.log("========================================");
  console.log("");
}

async function runController(mode: "run" | "test"): Promise<number> {
  printBanner();

  const relayConfig = getRelayConfig();
  if (!relayConfig) {
    log.fatal("RELAY_HOST is not configured");
    return 1;
  }

  const timing = getControllerTiming();

  // Non-sensitive values only
  log.info(
    {
      env: config.NODE_ENV,
      mode,
      relayHost: relayConfig.host,
      stateDir: config.STATE_DIR,
      pumpOnSeconds: config.PUMP_ON_SECONDS,
    },
    "Configuration loaded",
  );
  log.info(
    `Sweet spot: ${SHORT_RUN_THRESHOLD_SEC}-${OPTIMAL_RUN_THRESHOLD_SEC}s working time per cycle, heavy load above ${HEAVY_LOAD_THRESHOLD_SEC}s`,
  );
  log.info(
    `Power thresholds: Working>${WORKING_POWER_THRESHOLD_W}W, Idle<${IDLE_POWER_THRESHOLD_W}W`,
  );

  const loaded = await loadState(storagePaths.stateFile);
  const controller = createPumpController(
    createControllerDeps(relayConfig, loaded.connection),
    loaded.state,
  );

  if (mode === "test") {
    log.info("Running a single test cycle");
    const outcome = await controller.runOnce();
    log.info(
      { outcome: outcome.type, cycle: outcome.cycle },
      "Test cycle done",
    );
    return 0;
  }

  const apiConfig = getApiConfig();
  const server = apiConfig
    ? serve({
        port: apiConfig.port,
        hostname: "0.0.0.0",
        fetch: createApp({
          getSnapshot: controller.getSnapshot,
          depositCommand: (command) =>
            depositCommand(storagePaths.overrideFile, command),
        }).fetch,
      })
    : null;

  if (apiConfig) {
    log.info(
      { port: apiConfig.port },
      `🚀 Status API on port ${apiConfig.port}`,
    );
  }

  const requestStop = (signal: string) => {
    log.info({ signal }, `${signal} received. Stopping after current step...`);
    controller.requestStop();
  };
  process.on("SIGTERM", () => requestStop("SIGTERM"));
  process.on("SIGINT", () => requestStop("SIGINT"));

  log.info(
    { startupDelaySec: timing.startupDelayMs / 1000 },
    `🧠 ${config.APP_NAME} starting`,
  );

  await controller.run();
  server?.close();

  log.info("Shutdown complete");
  return 0;
}

async function main(argv: ReadonlyArray<string>): Promise<number> {
  const parsed = readCliCommand(argv);

  if (parsed.isErr()) {
    console.error(parsed.error.message);
    console.error(CLI_USAGE);
    return 1;
  }

  const command: CliCommand = parsed.value;

  switch (command.mode) {
    case "deposit": {
      const result = await depositCommand(
        storagePaths.overrideFile,
        command.command,
      );
      if (result.isErr()) {
        console.error(result.error.message);
        return 1;
      }
      return 0;
    }
    case "test":
    case "run":
      return runController(command.mode);
  }
}

main(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    log.fatal({ error }, "Unhandled startup fault");
    process.exit(1);
  });
