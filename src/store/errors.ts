/**
 * Store Module - Error Types
 *
 * Typed error unions for state file access.
 * Errors are values, not exceptions.
 */

/**
 * Errors that can occur while reading or writing the state file.
 */
export type StoreError =
  | {
      readonly type: "READ_FAILED";
      readonly path: string;
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "MALFORMED";
      readonly path: string;
      readonly message: string;
    }
  | {
      readonly type: "WRITE_FAILED";
      readonly path: string;
      readonly message: string;
      readonly cause?: Error;
    };

/**
 * Create a READ_FAILED error.
 */
export function readFailed(
  path: string,
  message: string,
  cause?: Error,
): StoreError {
  if (cause) {
    return { type: "READ_FAILED", path, message, cause };
  }
  return { type: "READ_FAILED", path, message };
}

/**
 * Create a MALFORMED error.
 */
export function malformed(path: string, message: string): StoreError {
  return { type: "MALFORMED", path, message };
}

/**
 * Create a WRITE_FAILED error.
 */
export function writeFailed(
  path: string,
  message: string,
  cause?: Error,
): StoreError {
  if (cause) {
    return { type: "WRITE_FAILED", path, message, cause };
  }
  return { type: "WRITE_FAILED", path, message };
}

/**
 * Format a StoreError for logging.
 */
export function formatStoreError(error: StoreError): string {
  switch (error.type) {
    case "READ_FAILED":
      return `Cannot read ${error.path}: ${error.message}`;
    case "MALFORMED":
      return `Malformed state file ${error.path}: ${error.message}`;
    case "WRITE_FAILED":
      return `Cannot write ${error.path}: ${error.message}`;
  }
}
