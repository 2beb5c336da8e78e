import { describe, expect, it, vi } from "vitest";
import { TransientError, ValidationError } from "./errors.js";
import { RetryPolicy } from "./retry.js";

describe("RetryPolicy", () => {
  it("doubles the delay from the base value up to the cap", () => {
    const policy = new RetryPolicy({ maxAttempts: 6, baseDelayMs: 100, maxDelayMs: 500 });

    expect([1, 2, 3, 4, 5].map((a) => policy.delayFor(a))).toEqual([100, 200, 400, 500, 500]);
  });

  it("retries retryable errors and sleeps between attempts", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const policy = new RetryPolicy({ maxAttempts: 4, baseDelayMs: 10, maxDelayMs: 1000 }, sleep);
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new TransientError("flaky"))
      .mockRejectedValueOnce(new TransientError("flaky"))
      .mockResolvedValue("ok");

    await expect(policy.execute(fn, { operation: "test" })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([10, 20]);
  });

  it("rethrows the last error after maxAttempts", async () => {
    const policy = new RetryPolicy({ maxAttempts: 2, baseDelayMs: 0, maxDelayMs: 0 }, async () => {});
    const fn = vi.fn(async () => {
      throw new TransientError("still down");
    });

    await expect(policy.execute(fn, { operation: "test" })).rejects.toThrow("still down");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("does not retry errors that are not retryable", async () => {
    const policy = new RetryPolicy({ maxAttempts: 5, baseDelayMs: 0, maxDelayMs: 0 }, async () => {});
    const fn = vi.fn(async () => {
      throw new ValidationError("bad");
    });

    await expect(policy.execute(fn, { operation: "test" })).rejects.toBeInstanceOf(ValidationError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("rejects a non-positive attempt count", () => {
    expect(() => new RetryPolicy({ maxAttempts: 0, baseDelayMs: 1, maxDelayMs: 1 })).toThrow(
      RangeError,
    );
  });
});
