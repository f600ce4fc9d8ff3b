/**
 * Retry strategies for shell commands.
 *
 * A strategy decides whether a finished attempt is worth running again.
 * The loop that applies it lives in {@link ShellRunner}; this module only
 * holds the decision table so it can be tested on its own.
 */

/**
 * Named retry strategies.
 *
 * @example
 * ```typescript
 * await runner.run("git fetch", { retryStrategy: RetryStrategy.IfTimeoutOrFailed });
 * ```
 */
export const RetryStrategy = {
  /** Never retry */
  None: "none",
  /** Retry only when the last attempt timed out */
  IfTimeout: "if-timeout",
  /** Retry when the last attempt timed out or exited with a non-zero code */
  IfTimeoutOrFailed: "if-timeout-or-failed",
} as const;

export type RetryStrategy = (typeof RetryStrategy)[keyof typeof RetryStrategy];

/**
 * All strategy names, in declaration order.
 */
export const RETRY_STRATEGIES: readonly RetryStrategy[] = Object.values(RetryStrategy);

/**
 * Strategy used when the caller does not name one.
 */
export const DEFAULT_RETRY_STRATEGY: RetryStrategy = RetryStrategy.IfTimeout;

/**
 * Thrown when a retry strategy name cannot be parsed.
 */
export class InvalidRetryStrategyError extends Error {
  public readonly value: string;

  constructor(value: string) {
    super(`Unknown retry strategy "${value}". Expected one of: ${RETRY_STRATEGIES.join(", ")}`);
    this.name = "InvalidRetryStrategyError";
    this.value = value;
  }
}

export function isRetryStrategy(value: string): value is RetryStrategy {
  return RETRY_STRATEGIES.some((strategy) => strategy === value);
}

/**
 * Parses a strategy name, ignoring case and surrounding whitespace.
 *
 * @throws InvalidRetryStrategyError if the name is not a known strategy
 */
export function parseRetryStrategy(value: string): RetryStrategy {
  const normalized = value.trim().toLowerCase();
  if (!isRetryStrategy(normalized)) {
    throw new InvalidRetryStrategyError(value);
  }
  return normalized;
}

/**
 * Decides whether another attempt should run.
 *
 * The `-1` abort sentinel counts as a failure for `if-timeout-or-failed`,
 * but only the timeout flag triggers `if-timeout`.
 *
 * @param strategy - Strategy in effect for the request
 * @param exitCode - Exit code of the last attempt
 * @param timedOut - Whether the last attempt hit its deadline
 */
export function shouldRetry(strategy: RetryStrategy, exitCode: number, timedOut: boolean): boolean {
  switch (strategy) {
    case RetryStrategy.None:
      return false;
    case RetryStrategy.IfTimeout:
      return timedOut;
    case RetryStrategy.IfTimeoutOrFailed:
      return timedOut || exitCode !== 0;
  }
}
