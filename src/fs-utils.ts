/**
 * Small helpers for node:fs error values.
 */

/**
 * Whether an fs error means the file does not exist.
 */
export function isFileNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Normalize a caught value to an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
