/**
 * Commands Transform Tests
 */
import { describe, expect, test } from "vitest";

import { INITIAL_CONTROLLER_STATE } from "../../controller/schema.js";
import {
  applyOverrideCommand,
  formatOverrideCommand,
  parseOverrideCommand,
} from "../transform.js";

describe("parseOverrideCommand", () => {
  test.each([
    ["stop", { command: "stop" }],
    ["normal", { command: "normal" }],
    ["pump_now", { command: "pump_now" }],
    ["  STOP\n", { command: "stop" }],
    ["wait 90", { command: "wait", minutes: 90 }],
    ["wait   5", { command: "wait", minutes: 5 }],
  ] as const)("parses %j", (text, expected) => {
    expect(parseOverrideCommand(text)._unsafeUnwrap()).toEqual(expected);
  });

  test("rejects a zero wait", () => {
    expect(parseOverrideCommand("wait 0")._unsafeUnwrapErr()).toEqual({
      type: "INVALID_COMMAND",
      text: "wait 0",
      message: "wait needs a positive number of minutes",
    });
  });

  test.each(["wait", "wait soon", "wait -5", "wait 1.5"])(
    "rejects malformed wait %j",
    (text) => {
      expect(parseOverrideCommand(text)._unsafeUnwrapErr().message).toBe(
        "usage: wait <minutes>",
      );
    },
  );

  test("rejects unknown commands", () => {
    expect(parseOverrideCommand("reboot")._unsafeUnwrapErr().message).toBe(
      "unknown command",
    );
  });
});

describe("formatOverrideCommand", () => {
  test("writes the text form read back by the parser", () => {
    expect(formatOverrideCommand({ command: "wait", minutes: 30 })).toBe(
      "wait 30",
    );
    expect(formatOverrideCommand({ command: "pump_now" })).toBe("pump_now");
  });
});

describe("applyOverrideCommand", () => {
  const state = {
    ...INITIAL_CONTROLLER_STATE,
    currentOffTimeSec: 900,
    manualOverrideSec: 1200,
  };

  test("stop requests termination and leaves state unchanged", () => {
    const effect = applyOverrideCommand(state, { command: "stop" });

    expect(effect.stopRequested).toBe(true);
    expect(effect.pumpNow).toBe(false);
    expect(effect.state).toBe(state);
    expect(effect.description).toBe("System stop requested");
  });

  test("normal clears the override", () => {
    const effect = applyOverrideCommand(state, { command: "normal" });

    expect(effect.state.manualOverrideSec).toBeNull();
    expect(effect.state.currentOffTimeSec).toBe(900);
  });

  test("wait sets the override in seconds", () => {
    const effect = applyOverrideCommand(state, {
      command: "wait",
      minutes: 30,
    });

    expect(effect.state.manualOverrideSec).toBe(1800);
    expect(effect.description).toBe("Set wait time to 30 minutes (1800s)");
  });

  test("wait is held to the global bounds", () => {
    expect(
      applyOverrideCommand(state, { command: "wait", minutes: 2 }).state
        .manualOverrideSec,
    ).toBe(300);
    expect(
      applyOverrideCommand(state, { command: "wait", minutes: 2000 }).state
        .manualOverrideSec,
    ).toBe(86_400);
  });

  test("pump_now only ends the wait", () => {
    const effect = applyOverrideCommand(state, { command: "pump_now" });

    expect(effect.pumpNow).toBe(true);
    expect(effect.stopRequested).toBe(false);
    expect(effect.state).toBe(state);
  });
});
