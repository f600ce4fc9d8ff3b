/**
 * Run command: executes one shell command with timeout and retries.
 *
 * @example
 * ```bash
 * shellrun run git fetch --all
 * shellrun run --cwd ~/src/app --timeout 60000 --retry if-timeout-or-failed -- make test
 * ```
 */

import type { Command } from "commander";
import {
  ConsoleWriter,
  type RetryStrategy,
  resolveRunnerConfig,
  runnerConfigFromEnv,
} from "shellrun";
import { COMMANDS, OPTION_DESCRIPTIONS, OPTION_FLAGS } from "./constants.js";
import type { RunConfig } from "./config.js";
import type { CLIEnvironment } from "./environment.js";
import { resolveWorkingDirectory } from "./paths.js";
import { executeAction, parseRetryOption, parseTimeoutOption, toProcessExitCode } from "./utils.js";

export interface RunCommandOptions {
  cwd?: string;
  timeout?: number;
  retry?: RetryStrategy;
  quiet?: boolean;
}

/**
 * Runs `commandParts` joined by spaces and reports its exit code as the
 * process exit code.
 *
 * Priority for timeout and retry strategy: flags > config file > environment > defaults.
 */
export async function executeRun(
  commandParts: string[],
  options: RunCommandOptions,
  env: CLIEnvironment,
  config: RunConfig = {},
): Promise<void> {
  const command = commandParts.join(" ");
  const fromEnv = runnerConfigFromEnv(env.variables);
  const settings = resolveRunnerConfig({
    timeoutMs: options.timeout ?? config.timeout ?? fromEnv.timeoutMs,
    retryStrategy: options.retry ?? config.retry ?? fromEnv.retryStrategy,
  });
  const directory = resolveWorkingDirectory(env.cwd(), options.cwd ?? config.cwd);

  const runner = env.createRunner({
    logger: env.createLogger("shellrun:run"),
    console: new ConsoleWriter(env.stderr),
    defaultTimeoutMs: settings.timeoutMs,
    defaultRetryStrategy: settings.retryStrategy,
    onOutput: options.quiet ? undefined : (chunk) => env.stdout.write(chunk),
    onErrors: options.quiet ? undefined : (chunk) => env.stderr.write(chunk),
  });

  const exitCode = await runner.runInDirectory(directory, command);
  env.setExitCode(toProcessExitCode(exitCode));
}

/**
 * Register the run command with the CLI program.
 */
export function registerRunCommand(program: Command, env: CLIEnvironment, config?: RunConfig): void {
  program
    .command(COMMANDS.run)
    .description("Run a shell command with a timeout, retrying per the chosen strategy")
    .argument("<command...>", "Command line to hand to the shell")
    .option(OPTION_FLAGS.cwd, OPTION_DESCRIPTIONS.cwd)
    .option(OPTION_FLAGS.timeout, OPTION_DESCRIPTIONS.timeout, parseTimeoutOption)
    .option(OPTION_FLAGS.retry, OPTION_DESCRIPTIONS.retry, parseRetryOption)
    .option(OPTION_FLAGS.quiet, OPTION_DESCRIPTIONS.quiet)
    .passThroughOptions()
    .action((commandParts: string[], options: RunCommandOptions) =>
      executeAction(() => executeRun(commandParts, options, env, config), env),
    );
}
