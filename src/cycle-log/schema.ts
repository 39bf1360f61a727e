/**
 * Cycle Log Module - Schemas and Types
 *
 * Column layout of the per-cycle CSV log.
 */
import type { PerformanceSummary } from "../telemetry/index.js";

/**
 * Header row, in column order.
 */
export const CYCLE_LOG_COLUMNS = [
  "Timestamp",
  "Date",
  "Time",
  "Event",
  "Power_W",
  "Current_A",
  "Voltage_V",
  "Relay_State",
  "Pump_Working",
  "Runtime_Sec",
  "Daily_Cycles",
  "Daily_Runtime_Sec",
  "Notes",
] as const;

export type CycleLogColumn = (typeof CYCLE_LOG_COLUMNS)[number];

/**
 * One formatted row, keyed by column.
 */
export type CycleLogRow = Readonly<Record<CycleLogColumn, string>>;

/** Mains voltage assumed when deriving current from power */
export const NOMINAL_VOLTAGE_V = 240;

/**
 * Relay state at the end of a cycle.
 */
export type RelayEndState = "ON" | "OFF" | "UNKNOWN";

/**
 * Everything needed to write one row.
 */
export type CycleLogEntry = Readonly<{
  completedAt: Date;
  summary: PerformanceSummary;
  nextOffTimeSec: number;
  relayState: RelayEndState;
  cycleCount: number;
  weatherDescription: string;
}>;
