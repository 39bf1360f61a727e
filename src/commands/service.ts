/**
 * Commands Module - Service Layer
 *
 * The command slot is a single file: the CLI (or API) deposits a command,
 * the running controller takes it on its next poll and deletes it.
 * A second deposit before the poll overwrites the first.
 */
import { mkdir, readFile, unlink, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { type Result, err, ok } from "neverthrow";

import type { CommandChannel } from "../controller/schema.js";
import { isFileNotFound, toError } from "../fs-utils.js";
import { createLogger } from "../logger.js";
import type { CommandError } from "./errors.js";
import { readFailed, writeFailed } from "./errors.js";
import type { OverrideCommand } from "./schema.js";
import { formatOverrideCommand, parseOverrideCommand } from "./transform.js";

const log = createLogger("commands");

/**
 * Deposit a command into the slot, replacing any unread one.
 */
export async function depositCommand(
  path: string,
  command: OverrideCommand,
): Promise<Result<void, CommandError>> {
  const text = formatOverrideCommand(command);

  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, text, "utf8");
  } catch (error) {
    const cause = toError(error);
    return err(writeFailed(cause.message, cause));
  }

  log.info({ command: text, path }, `Override command '${text}' created`);
  return ok(undefined);
}

/**
 * Take the pending command, if any. Reading is destructive: the slot is
 * emptied before the text is parsed, so a bad command is dropped too.
 *
 * @returns ok(null) when the slot is empty
 */
export async function takeCommand(
  path: string,
): Promise<Result<OverrideCommand | null, CommandError>> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
    await unlink(path);
  } catch (error) {
    if (isFileNotFound(error)) {
      return ok(null);
    }
    const cause = toError(error);
    return err(readFailed(cause.message, cause));
  }

  return parseOverrideCommand(text);
}

/**
 * Command channel bound to one slot file.
 */
export function createFileCommandChannel(path: string): CommandChannel {
  return {
    take: () => takeCommand(path),
  };
}
