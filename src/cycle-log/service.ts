/**
 * Cycle Log Module - Service Layer
 *
 * Appends one row per completed cycle. The header goes in only when the
 * file is first created.
 */
import { appendFile, mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { type Result, err, ok } from "neverthrow";

import type { CycleLogWriter } from "../controller/schema.js";
import { toError } from "../fs-utils.js";
import { createLogger } from "../logger.js";
import type { CycleLogError } from "./errors.js";
import { writeFailed } from "./errors.js";
import type { CycleLogEntry } from "./schema.js";
import {
  buildCycleLogRow,
  formatHeaderLine,
  formatRowLine,
} from "./transform.js";

const log = createLogger("cycle-log");

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "EEXIST";
}

/**
 * Append a cycle row, creating the file with a header if needed.
 */
export async function appendCycleLog(
  path: string,
  entry: CycleLogEntry,
): Promise<Result<void, CycleLogError>> {
  const line = formatRowLine(buildCycleLogRow(entry));

  try {
    await mkdir(dirname(path), { recursive: true });
    try {
      // "wx" fails when the file already exists
      await writeFile(path, formatHeaderLine() + line, {
        encoding: "utf8",
        flag: "wx",
      });
    } catch (error) {
      if (!isAlreadyExists(error)) {
        throw error;
      }
      await appendFile(path, line, "utf8");
    }
  } catch (error) {
    const cause = toError(error);
    return err(writeFailed(path, cause.message, cause));
  }

  log.info(
    {
      workingTimeSec: entry.summary.workingTimeSec,
      nextOffTimeSec: entry.nextOffTimeSec,
    },
    `Data logged: ${entry.summary.workingTimeSec.toFixed(1)}s working, ${Math.floor(entry.nextOffTimeSec / 60)}min wait`,
  );
  return ok(undefined);
}

/**
 * Cycle log writer bound to one CSV file.
 */
export function createCsvCycleLog(path: string): CycleLogWriter {
  return {
    append: (entry) => appendCycleLog(path, entry),
  };
}
