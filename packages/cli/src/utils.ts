import chalk from "chalk";
import { InvalidArgumentError } from "commander";
import { InvalidRetryStrategyError, parseRetryStrategy, type RetryStrategy } from "shellrun";
import { type CLILogLevel, LOG_LEVELS } from "./constants.js";
import type { CLIEnvironment } from "./environment.js";

/**
 * Parses --timeout: whole milliseconds, at least 1.
 */
export function parseTimeoutOption(value: string): number {
  const timeoutMs = Number(value.trim());
  if (value.trim() === "" || !Number.isInteger(timeoutMs) || timeoutMs < 1) {
    throw new InvalidArgumentError("Timeout must be a whole number of milliseconds, at least 1.");
  }
  return timeoutMs;
}

/**
 * Parses --retry through the library's strategy parser.
 */
export function parseRetryOption(value: string): RetryStrategy {
  try {
    return parseRetryStrategy(value);
  } catch (error) {
    if (error instanceof InvalidRetryStrategyError) {
      throw new InvalidArgumentError(error.message);
    }
    throw error;
  }
}

/**
 * Parses and validates the --log-level option value.
 */
export function parseLogLevelOption(value: string): CLILogLevel {
  const normalized = value.toLowerCase();
  const level = LOG_LEVELS.find((candidate) => candidate === normalized);
  if (!level) {
    throw new InvalidArgumentError(`Log level must be one of: ${LOG_LEVELS.join(", ")}`);
  }
  return level;
}

/**
 * Maps a runner exit code onto one a process can report. The `-1` abort
 * sentinel and anything else outside 0-255 become 1.
 */
export function toProcessExitCode(exitCode: number): number {
  return Number.isInteger(exitCode) && exitCode >= 0 && exitCode <= 255 ? exitCode : 1;
}

/**
 * Executes a command action with error handling.
 * Catches errors, writes to stderr, and sets exit code 1 on failure.
 */
export async function executeAction(
  action: () => Promise<void>,
  env: CLIEnvironment,
): Promise<void> {
  try {
    await action();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    env.stderr.write(`${chalk.red.bold("Error:")} ${message}\n`);
    env.setExitCode(1);
  }
}
