/**
 * Notifications Transform Tests
 */
import { describe, expect, test } from "vitest";

import { formatNotificationMessage } from "../transform.js";

describe("formatNotificationMessage", () => {
  test("cycle started", () => {
    expect(formatNotificationMessage({ type: "cycle_started", cycle: 4 })).toBe(
      "Cycle 4: Pump ON - monitoring performance",
    );
  });

  test("cycle completed reports working time and next wait in minutes", () => {
    expect(
      formatNotificationMessage({
        type: "cycle_completed",
        cycle: 3,
        workingTimeSec: 12.5,
        nextOffTimeSec: 420,
      }),
    ).toBe("Cycle 3: Working 12.5s, Next: 7.0min");
  });

  test("pump failures name the action", () => {
    expect(
      formatNotificationMessage({ type: "pump_failed", cycle: 9, action: "ON" }),
    ).toBe("ERROR Cycle 9: Failed ON");
    expect(
      formatNotificationMessage({
        type: "pump_failed",
        cycle: 9,
        action: "OFF",
      }),
    ).toBe("ERROR Cycle 9: Failed OFF");
  });

  test("controller errors carry the message", () => {
    expect(
      formatNotificationMessage({
        type: "controller_error",
        message: "disk full",
      }),
    ).toBe("ERROR: disk full");
  });
});
