/**
 * Cycle Log Transform Tests
 */
import { describe, expect, test } from "vitest";

import type { CycleLogEntry } from "../schema.js";
import {
  buildCycleLogRow,
  escapeCsvField,
  formatCsvLine,
  formatRowLine,
} from "../transform.js";

const completedAt = new Date(2026, 2, 4, 5, 6, 7);

function entry(overrides: Partial<CycleLogEntry> = {}): CycleLogEntry {
  return {
    completedAt,
    summary: {
      workingTimeSec: 12.5,
      totalTimeSec: 45,
      avgPowerW: 312.34,
      maxPowerW: 512.6,
      minPowerW: 40,
      sampleCount: 90,
    },
    nextOffTimeSec: 840,
    relayState: "OFF",
    cycleCount: 7,
    weatherDescription: "light rain",
    ...overrides,
  };
}

describe("buildCycleLogRow", () => {
  test("formats every column", () => {
    expect(buildCycleLogRow(entry())).toEqual({
      Timestamp: completedAt.toISOString(),
      Date: "2026-03-04",
      Time: "05:06:07",
      Event: "CYCLE_COMPLETE",
      Power_W: "312.3",
      Current_A: "1.30",
      Voltage_V: "240",
      Relay_State: "OFF",
      Pump_Working: "YES",
      Runtime_Sec: "12.5",
      Daily_Cycles: "7",
      Daily_Runtime_Sec: "12.5",
      Notes: "Next wait: 14min, Weather: light rain, Max power: 513W",
    });
  });

  test("marks the pump as not working at or below 3s", () => {
    const row = buildCycleLogRow(
      entry({
        summary: {
          workingTimeSec: 3,
          totalTimeSec: 45,
          avgPowerW: 0,
          maxPowerW: 0,
          minPowerW: 0,
          sampleCount: 0,
        },
      }),
    );

    expect(row.Pump_Working).toBe("NO");
    expect(row.Power_W).toBe("0.0");
    expect(row.Current_A).toBe("0.00");
  });

  test("rounds the next wait down to whole minutes", () => {
    expect(buildCycleLogRow(entry({ nextOffTimeSec: 359 })).Notes).toBe(
      "Next wait: 5min, Weather: light rain, Max power: 513W",
    );
  });
});

describe("escapeCsvField", () => {
  test("leaves plain fields alone", () => {
    expect(escapeCsvField("CYCLE_COMPLETE")).toBe("CYCLE_COMPLETE");
  });

  test("quotes fields with commas, quotes or newlines", () => {
    expect(escapeCsvField("a,b")).toBe('"a,b"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField("two\nlines")).toBe('"two\nlines"');
  });
});

describe("formatRowLine", () => {
  test("writes columns in header order with CRLF", () => {
    expect(formatRowLine(buildCycleLogRow(entry()))).toBe(
      `${completedAt.toISOString()},2026-03-04,05:06:07,CYCLE_COMPLETE,312.3,1.30,240,OFF,YES,12.5,7,12.5,"Next wait: 14min, Weather: light rain, Max power: 513W"\r\n`,
    );
  });

  test("formatCsvLine joins with commas", () => {
    expect(formatCsvLine(["a", "b", "c"])).toBe("a,b,c\r\n");
  });
});
