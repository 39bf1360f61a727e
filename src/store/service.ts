/**
 * Store Module - Service Layer
 *
 * Reads and writes the controller state file.
 * Loading never fails: a missing or broken file falls back to defaults.
 */
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { type Result, err, ok } from "neverthrow";

import type { ControllerState, StateStore } from "../controller/schema.js";
import { isFileNotFound, toError } from "../fs-utils.js";
import { createLogger } from "../logger.js";
import type { StoreError } from "./errors.js";
import {
  formatStoreError,
  malformed,
  readFailed,
  writeFailed,
} from "./errors.js";
import type { ConnectionSettings, LoadedState } from "./schema.js";
import { PersistedStateSchema } from "./schema.js";
import { defaultLoadedState, fromPersisted, toPersisted } from "./transform.js";

const log = createLogger("store");

// =============================================================================
// Reading
// =============================================================================

/**
 * Read and validate the state file.
 *
 * @returns ok(null) when the file does not exist
 */
export async function readStateFile(
  path: string,
): Promise<Result<LoadedState | null, StoreError>> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    if (isFileNotFound(error)) {
      return ok(null);
    }
    const cause = toError(error);
    return err(readFailed(path, cause.message, cause));
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    return err(malformed(path, toError(error).message));
  }

  const parsed = PersistedStateSchema.safeParse(data);
  if (!parsed.success) {
    return err(
      malformed(
        path,
        parsed.error.issues
          .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
          .join("; "),
      ),
    );
  }

  return ok(fromPersisted(parsed.data));
}

/**
 * Load controller state, falling back to defaults on any problem.
 */
export async function loadState(path: string): Promise<LoadedState> {
  const result = await readStateFile(path);

  if (result.isErr()) {
    log.warn(
      { error: formatStoreError(result.error) },
      "State file unusable - starting from defaults",
    );
    return defaultLoadedState();
  }

  if (result.value === null) {
    log.info({ path }, "No state file - starting from defaults");
    return defaultLoadedState();
  }

  const { state } = result.value;
  log.info(
    {
      currentOffTimeSec: state.currentOffTimeSec,
      manualOverrideSec: state.manualOverrideSec,
      cycleCount: state.cycleCount,
    },
    `Config loaded: off_time=${state.currentOffTimeSec}s`,
  );
  return result.value;
}

// =============================================================================
// Writing
// =============================================================================

/**
 * Write the state file. Writes to a temporary file first and renames it
 * over the target so a crash never leaves a half-written file.
 */
export async function saveState(
  path: string,
  state: ControllerState,
  connection: ConnectionSettings,
  now: Date = new Date(),
): Promise<Result<void, StoreError>> {
  const document = toPersisted(state, connection, now);
  const tempPath = `${path}.tmp`;

  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(
      tempPath,
      `${JSON.stringify(document, null, 2)}\n`,
      "utf8",
    );
    await rename(tempPath, path);
  } catch (error) {
    const cause = toError(error);
    return err(writeFailed(path, cause.message, cause));
  }

  log.debug({ path, cycleCount: state.cycleCount }, "State saved");
  return ok(undefined);
}

/**
 * State store bound to one file and the connection settings read from it.
 */
export function createFileStateStore(
  path: string,
  connection: ConnectionSettings,
): StateStore {
  return {
    save: (state) => saveState(path, state, connection),
  };
}
