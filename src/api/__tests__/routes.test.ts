/**
 * API Routes Integration Tests
 *
 * Exercises the status API through Hono's app.request() with a fake
 * controller snapshot and a mocked command deposit.
 */
import { beforeEach, describe, expect, test, vi } from "vitest";

vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
}));

import { err, ok } from "neverthrow";

import { writeFailed } from "../../commands/errors.js";
import {
  INITIAL_CONTROLLER_STATE,
  type ControllerSnapshot,
} from "../../controller/index.js";
import { createApp } from "../app.js";
import type { RouteDeps } from "../routes.js";

const COMPLETED_AT = Date.UTC(2024, 2, 1, 10, 0, 0);
const NEXT_CYCLE_AT = Date.UTC(2024, 2, 1, 10, 7, 0);

const runningSnapshot: ControllerSnapshot = {
  phase: "OFF_PHASE_WAIT",
  running: true,
  state: {
    cycleCount: 12,
    currentOffTimeSec: 420,
    manualOverrideSec: null,
    pumpStatus: "off",
    nextCycleTime: NEXT_CYCLE_AT,
  },
  weather: { condition: "rain", rainRateMmPerHr: 1.2, description: "light rain" },
  lastCycle: {
    cycle: 12,
    completedAt: COMPLETED_AT,
    summary: {
      workingTimeSec: 12.5,
      totalTimeSec: 45,
      avgPowerW: 310.4,
      maxPowerW: 402,
      minPowerW: 3,
      sampleCount: 90,
    },
    decision: {
      regime: "optimal",
      rawOffTimeSec: 420,
      offTimeSec: 420,
      weatherFactor: 1,
      reason: "working time within the optimal range",
    },
  },
};

function createTestApp(snapshot: ControllerSnapshot = runningSnapshot) {
  const depositCommand = vi.fn<RouteDeps["depositCommand"]>(async () =>
    ok(undefined),
  );
  const getSnapshot = vi.fn(() => snapshot);
  const app = createApp({ getSnapshot, depositCommand });
  return { app, depositCommand, getSnapshot };
}

function postOverride(
  app: ReturnType<typeof createApp>,
  body: string,
): Response | Promise<Response> {
  return app.request("/api/override", {
    method: "POST",
    headers: { "content-type": "application/json" },
    body,
  });
}

describe("API Routes", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe("GET /api/health", () => {
    test("reports ok with version and request id", async () => {
      const { app } = createTestApp();

      const res = await app.request("/api/health", {
        headers: { "x-request-id": "req-123" },
      });
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(res.headers.get("x-request-id")).toBe("req-123");
      expect(body.status).toBe("ok");
      expect(body.version).toBe("1.0.0");
      expect(body.requestId).toBe("req-123");
      expect(typeof body.timestamp).toBe("string");
    });

    test("generates a request id when none is sent", async () => {
      const { app } = createTestApp();

      const res = await app.request("/api/health");
      const body = await res.json();

      expect(body.requestId).toMatch(/^[0-9a-f-]{36}$/);
      expect(res.headers.get("x-request-id")).toBe(body.requestId);
    });
  });

  describe("GET /api/version", () => {
    test("returns the app version", async () => {
      const { app } = createTestApp();

      const res = await app.request("/api/version");

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ version: "1.0.0" });
    });
  });

  describe("GET /api/status", () => {
    test("maps the controller snapshot", async () => {
      const { app } = createTestApp();

      const res = await app.request("/api/status");

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        phase: "OFF_PHASE_WAIT",
        running: true,
        pumpStatus: "off",
        cycleCount: 12,
        currentOffTimeSec: 420,
        manualOverrideSec: null,
        nextCycleTime: "2024-03-01T10:07:00.000Z",
        weather: {
          condition: "rain",
          rainRateMmPerHr: 1.2,
          description: "light rain",
        },
        lastCycle: {
          cycle: 12,
          completedAt: "2024-03-01T10:00:00.000Z",
          workingTimeSec: 12.5,
          avgPowerW: 310.4,
          maxPowerW: 402,
          regime: "optimal",
          nextOffTimeSec: 420,
        },
      });
    });

    test("reports nulls before the first cycle", async () => {
      const { app } = createTestApp({
        phase: "IDLE",
        running: false,
        state: INITIAL_CONTROLLER_STATE,
        weather: null,
        lastCycle: null,
      });

      const res = await app.request("/api/status");
      const body = await res.json();

      expect(body.phase).toBe("IDLE");
      expect(body.pumpStatus).toBe("unknown");
      expect(body.nextCycleTime).toBeNull();
      expect(body.weather).toBeNull();
      expect(body.lastCycle).toBeNull();
    });

    test("answers 500 through the error handler when the snapshot throws", async () => {
      const { app, getSnapshot } = createTestApp();
      getSnapshot.mockImplementation(() => {
        throw new Error("snapshot unavailable");
      });

      const res = await app.request("/api/status", {
        headers: { "x-request-id": "req-err" },
      });

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({
        error: "snapshot unavailable",
        requestId: "req-err",
      });
    });
  });

  describe("POST /api/override", () => {
    test("deposits a wait command", async () => {
      // Arrange
      const { app, depositCommand } = createTestApp();

      // Act
      const res = await postOverride(
        app,
        JSON.stringify({ command: "wait", minutes: 30 }),
      );

      // Assert
      expect(res.status).toBe(202);
      expect(await res.json()).toEqual({ accepted: true, command: "wait 30" });
      expect(depositCommand).toHaveBeenCalledWith({
        command: "wait",
        minutes: 30,
      });
    });

    test("deposits a stop command", async () => {
      const { app, depositCommand } = createTestApp();

      const res = await postOverride(app, JSON.stringify({ command: "stop" }));

      expect(res.status).toBe(202);
      expect(await res.json()).toEqual({ accepted: true, command: "stop" });
      expect(depositCommand).toHaveBeenCalledWith({ command: "stop" });
    });

    test("rejects a non-positive wait", async () => {
      const { app, depositCommand } = createTestApp();

      const res = await postOverride(
        app,
        JSON.stringify({ command: "wait", minutes: 0 }),
      );
      const body = await res.json();

      expect(res.status).toBe(400);
      expect(body.error).toBe("Invalid override command");
      expect(body.issues).toEqual(["Number must be greater than 0"]);
      expect(depositCommand).not.toHaveBeenCalled();
    });

    test("rejects an unknown command", async () => {
      const { app, depositCommand } = createTestApp();

      const res = await postOverride(
        app,
        JSON.stringify({ command: "restart" }),
      );

      expect(res.status).toBe(400);
      expect(depositCommand).not.toHaveBeenCalled();
    });

    test("rejects a body that is not JSON", async () => {
      const { app, depositCommand } = createTestApp();

      const res = await postOverride(app, "wait 30");
      const body = await res.json();

      expect(res.status).toBe(400);
      expect(body.error).toBe("Invalid override command");
      expect(depositCommand).not.toHaveBeenCalled();
    });

    test("answers 500 when the command cannot be written", async () => {
      const { app, depositCommand } = createTestApp();
      depositCommand.mockResolvedValueOnce(err(writeFailed("disk full")));

      const res = await postOverride(
        app,
        JSON.stringify({ command: "pump_now" }),
      );
      const body = await res.json();

      expect(res.status).toBe(500);
      expect(body.error).toBe("Cannot write command: disk full");
    });
  });
});
