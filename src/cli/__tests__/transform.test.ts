/**
 * CLI Transform Tests
 */
import { describe, expect, test } from "vitest";

import { parseCliArgs } from "../transform.js";

describe("parseCliArgs", () => {
  test("no arguments runs the controller", () => {
    expect(parseCliArgs([])._unsafeUnwrap()).toEqual({ mode: "run" });
  });

  test("test runs one cycle", () => {
    expect(parseCliArgs(["test"])._unsafeUnwrap()).toEqual({ mode: "test" });
  });

  test.each([
    [["stop"], { command: "stop" }],
    [["normal"], { command: "normal" }],
    [["pump_now"], { command: "pump_now" }],
    [["wait", "90"], { command: "wait", minutes: 90 }],
  ] as const)("%j deposits a command", (args, command) => {
    expect(parseCliArgs(args)._unsafeUnwrap()).toEqual({
      mode: "deposit",
      command,
    });
  });

  test("rejects unknown commands", () => {
    expect(parseCliArgs(["restart"])._unsafeUnwrapErr()).toEqual({
      type: "INVALID_ARGUMENTS",
      message: 'Invalid command "restart": unknown command',
    });
  });

  test("rejects a wait without minutes", () => {
    expect(parseCliArgs(["wait"])._unsafeUnwrapErr().message).toBe(
      'Invalid command "wait": usage: wait <minutes>',
    );
  });
});
