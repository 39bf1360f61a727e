/**
 * Policy Module - Service Layer
 *
 * Wraps the pure decision with the log line every regime must emit.
 */
import { createLogger } from "../logger.js";
import type { OffTimeDecision, OffTimeInput } from "./schema.js";
import { decideNextOffTime } from "./transform.js";

const log = createLogger("policy");

/**
 * Compute the next OFF duration and log the regime and result.
 */
export function nextOffTime(input: OffTimeInput): OffTimeDecision {
  const decision = decideNextOffTime(input);

  log.info(
    {
      regime: decision.regime,
      workingTimeSec: input.summary.workingTimeSec,
      currentOffTimeSec: input.currentOffTimeSec,
      rawOffTimeSec: decision.rawOffTimeSec,
      offTimeSec: decision.offTimeSec,
      weatherFactor: decision.weatherFactor,
    },
    `Off time: ${decision.reason} → ${decision.rawOffTimeSec.toFixed(1)}s (applied ${decision.offTimeSec}s)`,
  );

  return decision;
}
