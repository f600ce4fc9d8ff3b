import { describe, expect, it } from "vitest";
import {
  InvalidRetryStrategyError,
  parseRetryStrategy,
  RETRY_STRATEGIES,
  RetryStrategy,
  shouldRetry,
} from "./retry.js";

describe("shouldRetry", () => {
  describe("none", () => {
    it("never retries", () => {
      expect(shouldRetry(RetryStrategy.None, 0, false)).toBe(false);
      expect(shouldRetry(RetryStrategy.None, 2, false)).toBe(false);
      expect(shouldRetry(RetryStrategy.None, -1, true)).toBe(false);
    });
  });

  describe("if-timeout", () => {
    it("retries after a timeout", () => {
      expect(shouldRetry(RetryStrategy.IfTimeout, -1, true)).toBe(true);
    });

    it("does not retry a plain failure", () => {
      expect(shouldRetry(RetryStrategy.IfTimeout, 7, false)).toBe(false);
    });

    it("does not retry the abort sentinel without a timeout", () => {
      expect(shouldRetry(RetryStrategy.IfTimeout, -1, false)).toBe(false);
    });

    it("does not retry success", () => {
      expect(shouldRetry(RetryStrategy.IfTimeout, 0, false)).toBe(false);
    });
  });

  describe("if-timeout-or-failed", () => {
    it("retries after a timeout", () => {
      expect(shouldRetry(RetryStrategy.IfTimeoutOrFailed, -1, true)).toBe(true);
    });

    it("retries non-zero exit codes", () => {
      expect(shouldRetry(RetryStrategy.IfTimeoutOrFailed, 7, false)).toBe(true);
      expect(shouldRetry(RetryStrategy.IfTimeoutOrFailed, 1, false)).toBe(true);
    });

    it("treats the abort sentinel as a failure", () => {
      expect(shouldRetry(RetryStrategy.IfTimeoutOrFailed, -1, false)).toBe(true);
    });

    it("does not retry success", () => {
      expect(shouldRetry(RetryStrategy.IfTimeoutOrFailed, 0, false)).toBe(false);
    });
  });
});

describe("parseRetryStrategy", () => {
  it("accepts every strategy name", () => {
    for (const name of RETRY_STRATEGIES) {
      expect(parseRetryStrategy(name)).toBe(name);
    }
  });

  it("ignores case and surrounding whitespace", () => {
    expect(parseRetryStrategy("  If-Timeout-Or-Failed ")).toBe("if-timeout-or-failed");
  });

  it("rejects unknown names", () => {
    expect(() => parseRetryStrategy("always")).toThrow(InvalidRetryStrategyError);
    expect(() => parseRetryStrategy("always")).toThrow(
      'Unknown retry strategy "always". Expected one of: none, if-timeout, if-timeout-or-failed',
    );
  });
});
