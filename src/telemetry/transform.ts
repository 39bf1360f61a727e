/**
 * Telemetry Module - Pure Transformations
 *
 * Sample classification and reduction of an ON phase into a summary.
 * No side effects, no I/O - just data in, data out.
 */
import type {
  PerformanceSummary,
  PowerMeterResponse,
  PowerReading,
  PowerSample,
} from "./schema.js";
import { WORKING_POWER_THRESHOLD_W } from "./schema.js";

/**
 * Map a validated power meter response to a reading.
 */
export function toPowerReading(response: PowerMeterResponse): PowerReading {
  return {
    powerW: response.pmom,
    currentA: response.imad,
    voltageV: response.volt,
  };
}

/**
 * Whether the pump was moving water when the sample was taken.
 * Strictly greater than the threshold.
 */
export function isWorkingSample(sample: PowerReading): boolean {
  return sample.powerW > WORKING_POWER_THRESHOLD_W;
}

/**
 * Summary for an ON phase in which no sample was collected.
 */
export function emptySummary(totalTimeSec: number): PerformanceSummary {
  return {
    workingTimeSec: 0,
    totalTimeSec,
    avgPowerW: 0,
    maxPowerW: 0,
    minPowerW: 0,
    sampleCount: 0,
  };
}

/**
 * Reduce the samples of one ON phase into a performance summary.
 *
 * Each working sample is credited the full sample interval. Power
 * statistics cover every sample, idle ones included.
 *
 * @param samples - Samples collected during the ON phase
 * @param totalTimeSec - Length of the ON phase
 * @param intervalSec - Sampling interval
 */
export function summarizePerformance(
  samples: ReadonlyArray<PowerSample>,
  totalTimeSec: number,
  intervalSec: number,
): PerformanceSummary {
  if (samples.length === 0) {
    return emptySummary(totalTimeSec);
  }

  let workingSamples = 0;
  let total = 0;
  let max = Number.NEGATIVE_INFINITY;
  let min = Number.POSITIVE_INFINITY;

  for (const sample of samples) {
    if (isWorkingSample(sample)) {
      workingSamples += 1;
    }
    total += sample.powerW;
    max = Math.max(max, sample.powerW);
    min = Math.min(min, sample.powerW);
  }

  return {
    workingTimeSec: workingSamples * intervalSec,
    totalTimeSec,
    avgPowerW: total / samples.length,
    maxPowerW: max,
    minPowerW: min,
    sampleCount: samples.length,
  };
}
