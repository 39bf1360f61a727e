/**
 * Cycle Log Module - Error Types
 */

/**
 * Errors that can occur while appending to the cycle log.
 */
export type CycleLogError = {
  readonly type: "WRITE_FAILED";
  readonly path: string;
  readonly message: string;
  readonly cause?: Error;
};

/**
 * Create a WRITE_FAILED error.
 */
export function writeFailed(
  path: string,
  message: string,
  cause?: Error,
): CycleLogError {
  if (cause) {
    return { type: "WRITE_FAILED", path, message, cause };
  }
  return { type: "WRITE_FAILED", path, message };
}

/**
 * Format a CycleLogError for logging.
 */
export function formatCycleLogError(error: CycleLogError): string {
  return `Cannot write cycle log ${error.path}: ${error.message}`;
}
