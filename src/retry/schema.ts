/**
 * Retry Module - Types
 *
 * Bounded retry policy applied at the point of use for transient failures.
 */

/**
 * Fixed-attempt, fixed-delay retry policy.
 */
export type RetryPolicy = Readonly<{
  /** Total attempts including the first one */
  maxAttempts: number;
  /** Delay between attempts in ms (none after the last attempt) */
  delayMs: number;
}>;

/**
 * Suspends the caller for the given number of milliseconds.
 */
export type Sleep = (ms: number) => Promise<void>;

/**
 * Error returned once every attempt has failed.
 */
export type RetryExhaustedError<E> = Readonly<{
  type: "RETRY_EXHAUSTED";
  attempts: number;
  lastError: E;
}>;
