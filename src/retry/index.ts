/**
 * Retry Module - Public API
 */
export type { RetryExhaustedError, RetryPolicy, Sleep } from "./schema.js";
export { sleep, withRetry } from "./service.js";
