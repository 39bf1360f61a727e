/**
 * Retry Module - Service Layer
 *
 * Wraps an operation that returns a Result and retries it on error.
 * Errors stay values - nothing here throws.
 */
import { type Result, err, ok } from "neverthrow";

import type { RetryExhaustedError, RetryPolicy, Sleep } from "./schema.js";

/**
 * Default sleep backed by setTimeout.
 */
export const sleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Run an operation up to `policy.maxAttempts` times.
 *
 * @param operation - Called once per attempt with the 1-based attempt number
 * @param policy - Attempt count and fixed delay
 * @param wait - Sleep used between attempts
 * @param onAttemptFailed - Called after each failed attempt (for logging)
 * @returns First successful result, or RETRY_EXHAUSTED with the last error
 */
export async function withRetry<T, E>(
  operation: (attempt: number) => Promise<Result<T, E>>,
  policy: RetryPolicy,
  wait: Sleep = sleep,
  onAttemptFailed?: (attempt: number, error: E) => void,
): Promise<Result<T, RetryExhaustedError<E>>> {
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));

  let attempt = 1;
  for (;;) {
    const result = await operation(attempt);
    if (result.isOk()) {
      return ok(result.value);
    }

    onAttemptFailed?.(attempt, result.error);

    if (attempt >= maxAttempts) {
      return err({
        type: "RETRY_EXHAUSTED",
        attempts: attempt,
        lastError: result.error,
      });
    }

    await wait(policy.delayMs);
    attempt += 1;
  }
}
