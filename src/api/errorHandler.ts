/**
 * Global error boundary for the status API.
 * Every unhandled error is logged with its request ID and answered with JSON.
 */
import type { ErrorHandler } from "hono";

import { config } from "../config.js";
import { createLogger } from "../logger.js";

const log = createLogger("api");

export const errorHandler: ErrorHandler = (err, c) => {
  const requestId = c.get("requestId") ?? "unknown";

  log.error(
    {
      operation: "unhandledError",
      requestId,
      error: err.message,
      stack: err.stack,
      path: c.req.path,
      method: c.req.method,
    },
    "❌ Unhandled error",
  );

  const message =
    config.NODE_ENV === "production" ? "Internal server error" : err.message;

  return c.json({ error: message, requestId }, 500);
};
