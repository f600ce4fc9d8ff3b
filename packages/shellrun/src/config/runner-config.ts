import { z } from "zod";
import { DEFAULT_TIMEOUT_MS } from "../core/constants.js";
import {
  DEFAULT_RETRY_STRATEGY,
  InvalidRetryStrategyError,
  parseRetryStrategy,
  type RetryStrategy,
} from "../core/retry.js";

const retryStrategySchema = z.string().transform((value, ctx) => {
  try {
    return parseRetryStrategy(value);
  } catch (error) {
    if (!(error instanceof InvalidRetryStrategyError)) throw error;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: error.message });
    return z.NEVER;
  }
});

/**
 * Runner defaults that can come from a config file or the environment.
 */
export const runnerConfigSchema = z.object({
  timeoutMs: z
    .union([z.number(), z.string().trim()])
    .pipe(z.coerce.number().int().positive())
    .optional(),
  retryStrategy: retryStrategySchema.optional(),
});

export type RunnerConfigInput = z.input<typeof runnerConfigSchema>;

export interface RunnerConfig {
  timeoutMs: number;
  retryStrategy: RetryStrategy;
}

export const DEFAULT_RUNNER_CONFIG: RunnerConfig = {
  timeoutMs: DEFAULT_TIMEOUT_MS,
  retryStrategy: DEFAULT_RETRY_STRATEGY,
};

/**
 * Raised when runner configuration values fail validation.
 */
export class RunnerConfigError extends Error {
  constructor(
    message: string,
    public readonly source?: string,
  ) {
    super(source ? `${source}: ${message}` : message);
    this.name = "RunnerConfigError";
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")} ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Validates a partial configuration and applies defaults.
 *
 * @param input - Partial configuration (optional)
 * @param source - Where the values came from, for error messages
 * @throws RunnerConfigError if a value is invalid
 */
export function resolveRunnerConfig(input: RunnerConfigInput = {}, source?: string): RunnerConfig {
  const parsed = runnerConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new RunnerConfigError(describeIssues(parsed.error), source);
  }

  return {
    timeoutMs: parsed.data.timeoutMs ?? DEFAULT_RUNNER_CONFIG.timeoutMs,
    retryStrategy: parsed.data.retryStrategy ?? DEFAULT_RUNNER_CONFIG.retryStrategy,
  };
}

/**
 * Reads `SHELLRUN_TIMEOUT_MS` and `SHELLRUN_RETRY`. Unset or blank variables
 * are left out so later layers can fill them.
 *
 * @throws RunnerConfigError if a variable is set to an invalid value
 */
export function runnerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): RunnerConfigInput {
  const input: RunnerConfigInput = {};
  const timeout = env.SHELLRUN_TIMEOUT_MS?.trim();
  const retry = env.SHELLRUN_RETRY?.trim();

  if (timeout) input.timeoutMs = timeout;
  if (retry) input.retryStrategy = retry;

  const parsed = runnerConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new RunnerConfigError(describeIssues(parsed.error), "environment");
  }
  return input;
}
