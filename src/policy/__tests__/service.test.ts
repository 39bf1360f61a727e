/**
 * Policy Service Tests
 */
import { describe, expect, test, vi } from "vitest";

const { info } = vi.hoisted(() => ({ info: vi.fn() }));

vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info,
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
}));

import { nextOffTime } from "../service.js";

describe("nextOffTime", () => {
  test("logs the regime with raw and applied values", () => {
    // Act
    const decision = nextOffTime({
      summary: {
        workingTimeSec: 20,
        totalTimeSec: 45,
        avgPowerW: 300,
        maxPowerW: 450,
        minPowerW: 60,
        sampleCount: 90,
      },
      currentOffTimeSec: 1000,
      manualOverrideSec: null,
      weather: null,
    });

    // Assert
    expect(decision.offTimeSec).toBe(700);
    expect(info).toHaveBeenCalledWith(
      expect.objectContaining({
        regime: "excessive",
        rawOffTimeSec: 700,
        offTimeSec: 700,
      }),
      "Off time: excessive working time (20.0s) → 700.0s (applied 700s)",
    );
  });
});
