/**
 * Cycle Log Module - Pure Transformations
 *
 * Row building and CSV formatting.
 * No side effects, no I/O - just data in, data out.
 */
import { MIN_WORKING_TIME_SEC } from "../telemetry/index.js";
import type { CycleLogEntry, CycleLogRow } from "./schema.js";
import { CYCLE_LOG_COLUMNS, NOMINAL_VOLTAGE_V } from "./schema.js";

const pad = (value: number): string => value.toString().padStart(2, "0");

/**
 * Local calendar date as YYYY-MM-DD.
 */
export function formatLocalDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/**
 * Local wall-clock time as HH:MM:SS.
 */
export function formatLocalTime(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Build the row for a completed cycle.
 */
export function buildCycleLogRow(entry: CycleLogEntry): CycleLogRow {
  const { summary } = entry;
  const runtime = summary.workingTimeSec.toFixed(1);

  return {
    Timestamp: entry.completedAt.toISOString(),
    Date: formatLocalDate(entry.completedAt),
    Time: formatLocalTime(entry.completedAt),
    Event: "CYCLE_COMPLETE",
    Power_W: summary.avgPowerW.toFixed(1),
    Current_A: (summary.avgPowerW / NOMINAL_VOLTAGE_V).toFixed(2),
    Voltage_V: String(NOMINAL_VOLTAGE_V),
    Relay_State: entry.relayState,
    Pump_Working: summary.workingTimeSec > MIN_WORKING_TIME_SEC ? "YES" : "NO",
    Runtime_Sec: runtime,
    Daily_Cycles: String(entry.cycleCount),
    Daily_Runtime_Sec: runtime,
    Notes: `Next wait: ${Math.floor(entry.nextOffTimeSec / 60)}min, Weather: ${entry.weatherDescription}, Max power: ${summary.maxPowerW.toFixed(0)}W`,
  };
}

/**
 * Quote a field when it contains a comma, quote or line break.
 */
export function escapeCsvField(value: string): string {
  if (!/[",\r\n]/.test(value)) {
    return value;
  }
  return `"${value.replace(/"/g, '""')}"`;
}

/**
 * Join fields into one CSV line (with trailing newline).
 */
export function formatCsvLine(values: ReadonlyArray<string>): string {
  return `${values.map(escapeCsvField).join(",")}\r\n`;
}

/**
 * Header line for a new log file.
 */
export function formatHeaderLine(): string {
  return formatCsvLine(CYCLE_LOG_COLUMNS);
}

/**
 * Row as a CSV line in column order.
 */
export function formatRowLine(row: CycleLogRow): string {
  return formatCsvLine(CYCLE_LOG_COLUMNS.map((column) => row[column]));
}
