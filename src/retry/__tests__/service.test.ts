/**
 * Bounded Retry Tests
 */
import { err, ok } from "neverthrow";
import { describe, expect, test, vi } from "vitest";

import { withRetry } from "../service.js";

const policy = { maxAttempts: 3, delayMs: 2000 };

describe("withRetry", () => {
  test("returns the first success without sleeping", async () => {
    // Arrange
    const operation = vi.fn().mockResolvedValue(ok("on"));
    const wait = vi.fn().mockResolvedValue(undefined);

    // Act
    const result = await withRetry(operation, policy, wait);

    // Assert
    expect(result._unsafeUnwrap()).toBe("on");
    expect(operation).toHaveBeenCalledTimes(1);
    expect(wait).not.toHaveBeenCalled();
  });

  test("retries after a failure and succeeds on a later attempt", async () => {
    // Arrange
    const operation = vi
      .fn()
      .mockResolvedValueOnce(err("timeout"))
      .mockResolvedValueOnce(ok("on"));
    const wait = vi.fn().mockResolvedValue(undefined);

    // Act
    const result = await withRetry(operation, policy, wait);

    // Assert
    expect(result._unsafeUnwrap()).toBe("on");
    expect(operation).toHaveBeenCalledTimes(2);
    expect(operation).toHaveBeenNthCalledWith(2, 2);
    expect(wait).toHaveBeenCalledTimes(1);
    expect(wait).toHaveBeenCalledWith(2000);
  });

  test("gives up after maxAttempts with the last error", async () => {
    // Arrange
    const operation = vi
      .fn()
      .mockResolvedValueOnce(err("first"))
      .mockResolvedValueOnce(err("second"))
      .mockResolvedValueOnce(err("third"));
    const wait = vi.fn().mockResolvedValue(undefined);
    const onAttemptFailed = vi.fn();

    // Act
    const result = await withRetry(operation, policy, wait, onAttemptFailed);

    // Assert
    expect(result._unsafeUnwrapErr()).toEqual({
      type: "RETRY_EXHAUSTED",
      attempts: 3,
      lastError: "third",
    });
    expect(operation).toHaveBeenCalledTimes(3);
    // No delay after the final attempt
    expect(wait).toHaveBeenCalledTimes(2);
    expect(onAttemptFailed.mock.calls).toEqual([
      [1, "first"],
      [2, "second"],
      [3, "third"],
    ]);
  });

  test("always makes at least one attempt", async () => {
    // Arrange
    const operation = vi.fn().mockResolvedValue(err("down"));
    const wait = vi.fn().mockResolvedValue(undefined);

    // Act
    const result = await withRetry(
      operation,
      { maxAttempts: 0, delayMs: 10 },
      wait,
    );

    // Assert
    expect(result._unsafeUnwrapErr().attempts).toBe(1);
    expect(operation).toHaveBeenCalledTimes(1);
  });
});
