/**
 * Status API routes.
 *
 * - GET  /api/health   - liveness
 * - GET  /api/version  - app version
 * - GET  /api/status   - controller phase, state, weather and last cycle
 * - POST /api/override - deposit an override command for the controller
 */
import { Hono } from "hono";
import type { Result } from "neverthrow";

import {
  type CommandError,
  type OverrideCommand,
  OverrideCommandSchema,
  formatCommandError,
  formatOverrideCommand,
} from "../commands/index.js";
import type { ControllerSnapshot } from "../controller/index.js";
import { createLogger } from "../logger.js";

const log = createLogger("api");

export const APP_VERSION = "1.0.0";

/**
 * What the routes need from the running process.
 */
export type RouteDeps = Readonly<{
  getSnapshot: () => ControllerSnapshot;
  depositCommand: (
    command: OverrideCommand,
  ) => Promise<Result<void, CommandError>>;
}>;

/**
 * JSON body of GET /api/status.
 */
export function toStatusResponse(snapshot: ControllerSnapshot) {
  const { state, lastCycle } = snapshot;

  return {
    phase: snapshot.phase,
    running: snapshot.running,
    pumpStatus: state.pumpStatus,
    cycleCount: state.cycleCount,
    currentOffTimeSec: state.currentOffTimeSec,
    manualOverrideSec: state.manualOverrideSec,
    nextCycleTime:
      state.nextCycleTime === null
        ? null
        : new Date(state.nextCycleTime).toISOString(),
    weather: snapshot.weather,
    lastCycle:
      lastCycle === null
        ? null
        : {
            cycle: lastCycle.cycle,
            completedAt: new Date(lastCycle.completedAt).toISOString(),
            workingTimeSec: lastCycle.summary.workingTimeSec,
            avgPowerW: lastCycle.summary.avgPowerW,
            maxPowerW: lastCycle.summary.maxPowerW,
            regime: lastCycle.decision.regime,
            nextOffTimeSec: lastCycle.decision.offTimeSec,
          },
  };
}

export function createRoutes(deps: RouteDeps): Hono {
  const routes = new Hono();

  // ===========================================================================
  // Health Check
  // ===========================================================================

  routes.get("/api/health", (c) => {
    const requestId = c.get("requestId");
    log.debug({ requestId }, "Health check");

    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      requestId,
      version: APP_VERSION,
    });
  });

  routes.get("/api/version", (c) => c.json({ version: APP_VERSION }));

  // ===========================================================================
  // Controller Status
  // ===========================================================================

  routes.get("/api/status", (c) =>
    c.json(toStatusResponse(deps.getSnapshot())),
  );

  // ===========================================================================
  // Overrides
  // ===========================================================================

  /**
   * Same single-slot channel the CLI writes to; the controller picks the
   * command up on its next OFF phase poll.
   */
  routes.post("/api/override", async (c) => {
    const requestId = c.get("requestId");

    const body: unknown = await c.req.json().catch(() => null);
    const parsed = OverrideCommandSchema.safeParse(body);

    if (!parsed.success) {
      log.warn({ requestId }, "Rejected override request");
      return c.json(
        {
          error: "Invalid override command",
          issues: parsed.error.issues.map((issue) => issue.message),
          requestId,
        },
        400,
      );
    }

    const result = await deps.depositCommand(parsed.data);

    if (result.isErr()) {
      const message = formatCommandError(result.error);
      log.error({ requestId, error: message }, "Override deposit failed");
      return c.json({ error: message, requestId }, 500);
    }

    return c.json(
      { accepted: true, command: formatOverrideCommand(parsed.data) },
      202,
    );
  });

  return routes;
}
