/**
 * Relay Service Tests
 *
 * Relay plug HTTP API with a stubbed fetch.
 */
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

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

import { formatRelayError } from "../errors.js";
import { setRelayState } from "../service.js";

const relayConfig = { host: "192.168.1.50", timeoutMs: 10_000 };

function relayResponse(status: number, body: unknown) {
  return {
    status,
    statusText: status === 200 ? "OK" : "Internal Server Error",
    json: () => Promise.resolve(body),
  };
}

describe("Relay Service", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe("setRelayState", () => {
    test("posts the action and returns it when the relay confirms", async () => {
      // Arrange
      const fetchMock = vi
        .fn()
        .mockResolvedValue(relayResponse(200, { rslt: "OK" }));
      vi.stubGlobal("fetch", fetchMock);

      // Act
      const result = await setRelayState("on", relayConfig);

      // Assert
      expect(result._unsafeUnwrap()).toBe("on");
      expect(fetchMock).toHaveBeenCalledWith(
        "http://192.168.1.50/setRelayStatus",
        expect.objectContaining({
          method: "POST",
          body: JSON.stringify({ data: "on" }),
        }),
      );
    });

    test("returns COMMAND_REJECTED when rslt is not OK", async () => {
      // Arrange
      vi.stubGlobal(
        "fetch",
        vi.fn().mockResolvedValue(relayResponse(200, { rslt: "FAIL" })),
      );

      // Act
      const result = await setRelayState("off", relayConfig);

      // Assert
      const error = result._unsafeUnwrapErr();
      expect(error.type).toBe("COMMAND_REJECTED");
      expect(formatRelayError(error)).toBe("Relay OFF rejected: rslt=FAIL");
    });

    test("returns HTTP_ERROR on a non-200 status", async () => {
      // Arrange
      vi.stubGlobal(
        "fetch",
        vi.fn().mockResolvedValue(relayResponse(500, { rslt: "OK" })),
      );

      // Act
      const result = await setRelayState("on", relayConfig);

      // Assert
      expect(result._unsafeUnwrapErr()).toEqual({
        type: "HTTP_ERROR",
        action: "on",
        statusCode: 500,
        message: "Internal Server Error",
      });
    });

    test("returns INVALID_RESPONSE when rslt is missing", async () => {
      // Arrange
      vi.stubGlobal(
        "fetch",
        vi.fn().mockResolvedValue(relayResponse(200, { status: "done" })),
      );

      // Act
      const result = await setRelayState("on", relayConfig);

      // Assert
      expect(result._unsafeUnwrapErr().type).toBe("INVALID_RESPONSE");
    });

    test("returns TIMEOUT when the request is aborted", async () => {
      // Arrange
      const abort = new Error("The operation was aborted due to timeout");
      abort.name = "TimeoutError";
      vi.stubGlobal("fetch", vi.fn().mockRejectedValue(abort));

      // Act
      const result = await setRelayState("on", relayConfig);

      // Assert
      expect(result._unsafeUnwrapErr()).toEqual({
        type: "TIMEOUT",
        action: "on",
        message: "No response within 10000ms",
      });
    });

    test("returns NETWORK_ERROR when the relay is unreachable", async () => {
      // Arrange
      vi.stubGlobal(
        "fetch",
        vi.fn().mockRejectedValue(new TypeError("fetch failed")),
      );

      // Act
      const result = await setRelayState("off", relayConfig);

      // Assert
      const error = result._unsafeUnwrapErr();
      expect(error.type).toBe("NETWORK_ERROR");
      expect(formatRelayError(error)).toBe(
        "Relay OFF network error: Failed to reach relay",
      );
    });
  });
});
