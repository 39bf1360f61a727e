/**
 * Commands Module - Error Types
 *
 * Typed error unions for the override command slot.
 * Errors are values, not exceptions.
 */

/**
 * Errors that can occur while depositing or taking a command.
 */
export type CommandError =
  | {
      readonly type: "INVALID_COMMAND";
      readonly text: string;
      readonly message: string;
    }
  | {
      readonly type: "READ_FAILED";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "WRITE_FAILED";
      readonly message: string;
      readonly cause?: Error;
    };

/**
 * Create an INVALID_COMMAND error.
 */
export function invalidCommand(text: string, message: string): CommandError {
  return { type: "INVALID_COMMAND", text, message };
}

/**
 * Create a READ_FAILED error.
 */
export function readFailed(message: string, cause?: Error): CommandError {
  if (cause) {
    return { type: "READ_FAILED", message, cause };
  }
  return { type: "READ_FAILED", message };
}

/**
 * Create a WRITE_FAILED error.
 */
export function writeFailed(message: string, cause?: Error): CommandError {
  if (cause) {
    return { type: "WRITE_FAILED", message, cause };
  }
  return { type: "WRITE_FAILED", message };
}

/**
 * Format a CommandError for logging.
 */
export function formatCommandError(error: CommandError): string {
  switch (error.type) {
    case "INVALID_COMMAND":
      return `Invalid command "${error.text}": ${error.message}`;
    case "READ_FAILED":
      return `Cannot read command: ${error.message}`;
    case "WRITE_FAILED":
      return `Cannot write command: ${error.message}`;
  }
}
