/**
 * Telemetry Module - Service Layer
 *
 * Side effects happen here: power meter HTTP polls and the timed
 * sampling loop that runs during the ON phase.
 */
import { type Result, err, ok } from "neverthrow";

import type { Clock } from "../clock.js";
import { createLogger } from "../logger.js";
import type { RelayConfig } from "../relay/index.js";
import type { TelemetryError } from "./errors.js";
import {
  formatTelemetryError,
  invalidResponse,
  networkError,
  readFailed,
} from "./errors.js";
import type {
  PerformanceSummary,
  PowerReading,
  PowerSample,
} from "./schema.js";
import { PowerMeterResponseSchema } from "./schema.js";
import {
  isWorkingSample,
  summarizePerformance,
  toPowerReading,
} from "./transform.js";

const log = createLogger("telemetry");

/**
 * Reads the current power draw, or reports why it could not.
 */
export type ReadPower = () => Promise<Result<PowerReading, TelemetryError>>;

// =============================================================================
// Power Meter API
// =============================================================================

/**
 * Read instantaneous power, current and voltage from the relay plug.
 *
 * @param config - Relay configuration (the meter lives on the same device)
 * @returns Result with the reading or error
 */
export async function readPowerMeter(
  config: RelayConfig,
): Promise<Result<PowerReading, TelemetryError>> {
  const url = `http://${config.host}/getPowerMeterData`;

  try {
    const response = await fetch(url, {
      method: "GET",
      signal: AbortSignal.timeout(config.timeoutMs),
    });

    if (response.status !== 200) {
      return err(
        readFailed(
          `HTTP ${response.status}: ${response.statusText}`,
          response.status,
        ),
      );
    }

    const data: unknown = await response.json();
    const parsed = PowerMeterResponseSchema.safeParse(data);

    if (!parsed.success) {
      return err(invalidResponse("Invalid power meter response", data));
    }

    if (parsed.data.rslt !== "OK") {
      return err(readFailed(`Power meter returned rslt=${parsed.data.rslt}`));
    }

    return ok(toPowerReading(parsed.data));
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));

    if (cause.name === "TimeoutError" || cause.name === "AbortError") {
      return err(networkError("Request timed out", cause));
    }

    return err(networkError("Failed to reach power meter", cause));
  }
}

// =============================================================================
// ON Phase Sampling
// =============================================================================

/**
 * Poll the power meter every `intervalMs` until `durationMs` of wall-clock
 * time has passed.
 *
 * A failed poll yields nothing for that tick; the sequence keeps going
 * for the full duration.
 */
export async function* samplePower(
  readPower: ReadPower,
  clock: Clock,
  durationMs: number,
  intervalMs: number,
): AsyncGenerator<PowerSample, void, undefined> {
  const start = clock.now();

  while (clock.now() - start < durationMs) {
    const result = await readPower();

    if (result.isOk()) {
      const sample: PowerSample = { ...result.value, timestamp: clock.now() };
      log.debug(
        { powerW: sample.powerW, working: isWorkingSample(sample) },
        `Power: ${sample.powerW.toFixed(1)}W`,
      );
      yield sample;
    } else {
      log.warn(
        { error: formatTelemetryError(result.error) },
        "Power poll failed - skipping sample",
      );
    }

    await clock.sleep(intervalMs);
  }
}

/**
 * Sample an entire ON phase and reduce it to a performance summary.
 *
 * @param readPower - Power meter reader
 * @param clock - Time source
 * @param durationMs - ON phase length
 * @param intervalMs - Sampling interval
 */
export async function measurePerformance(
  readPower: ReadPower,
  clock: Clock,
  durationMs: number,
  intervalMs: number,
): Promise<PerformanceSummary> {
  log.info(
    { durationSec: durationMs / 1000 },
    `Monitoring pump performance for ${durationMs / 1000}s...`,
  );

  const samples: PowerSample[] = [];
  const sampler = samplePower(readPower, clock, durationMs, intervalMs);
  for await (const sample of sampler) {
    samples.push(sample);
  }

  const summary = summarizePerformance(
    samples,
    durationMs / 1000,
    intervalMs / 1000,
  );

  log.info(
    {
      workingTimeSec: summary.workingTimeSec,
      avgPowerW: summary.avgPowerW,
      maxPowerW: summary.maxPowerW,
      samples: summary.sampleCount,
    },
    `Performance: ${summary.workingTimeSec.toFixed(1)}s working, Avg: ${summary.avgPowerW.toFixed(1)}W, Max: ${summary.maxPowerW.toFixed(1)}W`,
  );

  return summary;
}
