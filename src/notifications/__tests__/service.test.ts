/**
 * Notifications Service Tests
 *
 * Healthcheck pings with a stubbed fetch.
 */
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

const { logError } = vi.hoisted(() => ({ logError: vi.fn() }));

vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: logError,
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
}));

import { createHealthcheckNotifier, sendHealthCheck } from "../service.js";

const healthcheckConfig = {
  url: "https://hc.test/ping/test-check",
  timeoutMs: 10_000,
};

describe("Notifications Service", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe("sendHealthCheck", () => {
    test("posts the message as plain text", async () => {
      // Arrange
      const fetchMock = vi.fn().mockResolvedValue({ ok: true, status: 200 });
      vi.stubGlobal("fetch", fetchMock);

      // Act
      const result = await sendHealthCheck(
        "Cycle 1: Pump ON - monitoring performance",
        healthcheckConfig,
      );

      // Assert
      expect(result.isOk()).toBe(true);
      expect(fetchMock).toHaveBeenCalledWith(
        "https://hc.test/ping/test-check",
        expect.objectContaining({
          method: "POST",
          body: "Cycle 1: Pump ON - monitoring performance",
        }),
      );
    });

    test("returns NOT_CONFIGURED without a URL", async () => {
      // Arrange
      const fetchMock = vi.fn();
      vi.stubGlobal("fetch", fetchMock);

      // Act
      const result = await sendHealthCheck("hello", null);

      // Assert
      expect(result._unsafeUnwrapErr().type).toBe("NOT_CONFIGURED");
      expect(fetchMock).not.toHaveBeenCalled();
    });

    test("returns SEND_FAILED with the response text", async () => {
      // Arrange
      vi.stubGlobal(
        "fetch",
        vi.fn().mockResolvedValue({
          ok: false,
          status: 404,
          text: () => Promise.resolve("check not found"),
        }),
      );

      // Act
      const result = await sendHealthCheck("hello", healthcheckConfig);

      // Assert
      expect(result._unsafeUnwrapErr()).toEqual({
        type: "SEND_FAILED",
        message: "Healthcheck returned 404: check not found",
        statusCode: 404,
      });
    });

    test("returns NETWORK_ERROR when the endpoint is unreachable", async () => {
      // Arrange
      vi.stubGlobal(
        "fetch",
        vi.fn().mockRejectedValue(new TypeError("fetch failed")),
      );

      // Act
      const result = await sendHealthCheck("hello", healthcheckConfig);

      // Assert
      const error = result._unsafeUnwrapErr();
      expect(error.type).toBe("NETWORK_ERROR");
      expect(error.message).toBe("fetch failed");
    });
  });

  describe("createHealthcheckNotifier", () => {
    test("sends the formatted message without blocking", () => {
      // Arrange
      const fetchMock = vi.fn().mockResolvedValue({ ok: true, status: 200 });
      vi.stubGlobal("fetch", fetchMock);
      const notifier = createHealthcheckNotifier(healthcheckConfig);

      // Act
      const returned = notifier.notify({
        type: "pump_failed",
        cycle: 2,
        action: "OFF",
      });

      // Assert
      expect(returned).toBeUndefined();
      expect(fetchMock).toHaveBeenCalledWith(
        "https://hc.test/ping/test-check",
        expect.objectContaining({ body: "ERROR Cycle 2: Failed OFF" }),
      );
    });

    test("logs delivery failures instead of throwing", async () => {
      // Arrange
      vi.stubGlobal(
        "fetch",
        vi.fn().mockRejectedValue(new TypeError("fetch failed")),
      );
      const notifier = createHealthcheckNotifier(healthcheckConfig);

      // Act
      notifier.notify({ type: "cycle_started", cycle: 1 });

      // Assert
      await vi.waitFor(() => {
        expect(logError).toHaveBeenCalledWith(
          { error: "fetch failed", notification: "cycle_started" },
          "Health check error",
        );
      });
    });

    test("stays quiet when no URL is configured", async () => {
      // Arrange
      const notifier = createHealthcheckNotifier(null);

      // Act
      notifier.notify({ type: "cycle_started", cycle: 1 });
      await Promise.resolve();
      await Promise.resolve();

      // Assert
      expect(logError).not.toHaveBeenCalled();
    });
  });
});
