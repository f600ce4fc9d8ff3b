/**
 * Shell command runner with timeouts and retries.
 *
 * @module runner/shell-runner
 */

import { EOL } from "node:os";
import { ConsoleWriter, type UserConsole } from "../console/console-writer.js";
import {
  ABORTED_EXIT_CODE,
  DEFAULT_TIMEOUT_MS,
  LAUNCH_FAILURE_EXIT_CODE,
  MAX_ATTEMPTS,
  MAX_TIMER_DELAY_MS,
} from "../core/constants.js";
import { defaultLastOutput, type LastOutputCell } from "../core/last-output.js";
import {
  type OutputCallback,
  type OutputSink,
  TextBuffer,
  teeSink,
  toSink,
} from "../core/output-sink.js";
import { DEFAULT_RETRY_STRATEGY, type RetryStrategy, shouldRetry } from "../core/retry.js";
import { defaultTimeoutPolicy, type TimeoutEscalationPolicy } from "../core/timeout-policy.js";
import { defaultLogger, type RunnerLogger } from "../logging/logger.js";
import { buildShellInvocation, detectShellFamily, type ShellFamily } from "../platform/shell.js";
import { ProcessCancelledError, ProcessExecutionError } from "../process/errors.js";
import { NodeProcessExecutor } from "../process/node-executor.js";
import type { ProcessExecutor } from "../process/types.js";
import { formatTimeSpan } from "../utils/timespan.js";
import { isQuietOnTimeout } from "./probe.js";

/**
 * How a single attempt ended, before it is reduced to an exit code.
 */
export type AttemptOutcome =
  | { kind: "completed"; exitCode: number; durationMs: number }
  | { kind: "timed_out"; message: string }
  | { kind: "fault"; error: ProcessExecutionError }
  | { kind: "aborted"; error: Error };

export interface ShellRunnerOptions {
  /** Receives the per-attempt info line, retry debug lines and abort warnings/errors */
  logger?: RunnerLogger;
  /**
   * Shows timeout warnings and abort errors to the user.
   * Defaults to a {@link ConsoleWriter} on stderr; pass `silentConsole` to mute.
   */
  console?: UserConsole;
  executor?: ProcessExecutor;
  timeoutPolicy?: TimeoutEscalationPolicy;
  lastOutput?: LastOutputCell;
  /** Defaults to the family of the host OS */
  shellFamily?: ShellFamily;
  /** @default 600000 (10 minutes) */
  defaultTimeoutMs?: number;
  /** @default "if-timeout" */
  defaultRetryStrategy?: RetryStrategy;
  /** Receives stdout as it arrives, in addition to the {@link ShellRunner.output} buffer */
  onOutput?: OutputSink | OutputCallback;
  /** Receives stderr as it arrives, in addition to the {@link ShellRunner.errors} buffer */
  onErrors?: OutputSink | OutputCallback;
}

export interface RunOptions {
  timeoutMs?: number;
  retryStrategy?: RetryStrategy;
}

/**
 * Runs shell commands through the host's interpreter, keeping the output of
 * the latest attempt.
 *
 * Every run resolves to an exit code; failures never reject. `-1` means the
 * attempt was aborted (timeout or an internal failure, see {@link errors}),
 * `1` may also mean the shell could not be launched at all.
 *
 * One run at a time per instance: the buffers belong to the instance and are
 * cleared when each attempt starts.
 *
 * @example
 * ```typescript
 * const runner = new ShellRunner({ onOutput: (chunk) => process.stdout.write(chunk) });
 *
 * const exitCode = await runner.runInDirectory(repoPath, "git fetch --all", {
 *   timeoutMs: 60_000,
 *   retryStrategy: RetryStrategy.IfTimeoutOrFailed,
 * });
 * if (exitCode !== 0) {
 *   console.error(runner.errors);
 * }
 * ```
 */
export class ShellRunner {
  /** Incremental stdout destination; may be replaced between runs */
  onOutput: OutputSink;
  /** Incremental stderr destination; may be replaced between runs */
  onErrors: OutputSink;

  readonly timeoutPolicy: TimeoutEscalationPolicy;

  private readonly logger: RunnerLogger;
  private readonly console: UserConsole;
  private readonly executor: ProcessExecutor;
  private readonly lastOutput: LastOutputCell;
  private readonly shellFamily: ShellFamily;
  private readonly defaultTimeoutMs: number;
  private readonly defaultRetryStrategy: RetryStrategy;

  private readonly outputBuffer = new TextBuffer();
  private readonly errorBuffer = new TextBuffer();
  private timedOut = false;

  constructor(options: ShellRunnerOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
    this.console = options.console ?? new ConsoleWriter();
    this.executor = options.executor ?? new NodeProcessExecutor();
    this.timeoutPolicy = options.timeoutPolicy ?? defaultTimeoutPolicy;
    this.lastOutput = options.lastOutput ?? defaultLastOutput;
    this.shellFamily = options.shellFamily ?? detectShellFamily();
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.defaultRetryStrategy = options.defaultRetryStrategy ?? DEFAULT_RETRY_STRATEGY;
    this.onOutput = toSink(options.onOutput);
    this.onErrors = toSink(options.onErrors);
  }

  /** Stdout of the latest attempt */
  get output(): string {
    return this.outputBuffer.text;
  }

  /** Stderr of the latest attempt, plus the timeout notice if it timed out */
  get errors(): string {
    return this.errorBuffer.text;
  }

  /** Whether the latest attempt hit its deadline */
  get hasTimeout(): boolean {
    return this.timedOut;
  }

  /**
   * Runs a command in the current working directory.
   */
  run(command: string, options: RunOptions = {}): Promise<number> {
    return this.runInDirectory(process.cwd(), command, options);
  }

  /**
   * Runs a command in `path`.
   */
  runInDirectory(path: string, command: string, options: RunOptions = {}): Promise<number> {
    return this.runWithRetries(
      command,
      path,
      options.timeoutMs ?? this.defaultTimeoutMs,
      options.retryStrategy ?? this.defaultRetryStrategy,
    );
  }

  private async runWithRetries(
    command: string,
    workingDirectory: string,
    timeoutMs: number,
    retryStrategy: RetryStrategy,
  ): Promise<number> {
    let timeout = timeoutMs;
    let exitCode = await this.runOnce(command, workingDirectory, timeout);
    let retriesLeft = MAX_ATTEMPTS - 1;

    while (retriesLeft > 0 && shouldRetry(retryStrategy, exitCode, this.timedOut)) {
      retriesLeft--;
      if (this.timedOut) {
        timeout = this.timeoutPolicy.increase(timeout);
      }
      exitCode = await this.runOnce(command, workingDirectory, timeout);
      this.logger.debug(
        `EXECUTED ${command} in ${workingDirectory} with exitCode ${exitCode} and retryStrategy ${retryStrategy}`,
      );
    }

    return exitCode;
  }

  /**
   * Runs one attempt, without retries.
   *
   * @returns The process exit code, `1` if it could not be launched, or `-1`
   * if the attempt timed out or was aborted
   */
  async runOnce(command: string, workingDirectory: string, timeoutMs: number): Promise<number> {
    this.outputBuffer.clear();
    this.errorBuffer.clear();
    this.timedOut = false;

    const outcome = await this.attempt(command, workingDirectory, timeoutMs);

    switch (outcome.kind) {
      case "completed": {
        this.lastOutput.set(this.output);
        this.logger.info(
          `EXECUTED ${command} in ${workingDirectory} in ${Math.round(outcome.durationMs)}ms with exitCode ${outcome.exitCode}`,
        );
        return outcome.exitCode;
      }

      case "fault":
        return LAUNCH_FAILURE_EXIT_CODE;

      case "timed_out": {
        this.timedOut = true;
        this.errorBuffer.append(`${outcome.message}${EOL}`);
        if (!isQuietOnTimeout(command)) {
          this.console.writeWarning(outcome.message);
        }
        this.logger.warn(outcome.message);
        return ABORTED_EXIT_CODE;
      }

      case "aborted": {
        this.console.writeError(outcome.error.message);
        this.logger.error(outcome.error.message);
        return ABORTED_EXIT_CODE;
      }
    }
  }

  private async attempt(
    command: string,
    workingDirectory: string,
    timeoutMs: number,
  ): Promise<AttemptOutcome> {
    const invocation = buildShellInvocation(command, this.shellFamily);
    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(),
      Math.min(Math.max(timeoutMs, 0), MAX_TIMER_DELAY_MS),
    );
    if (timeoutMs <= 0) {
      controller.abort();
    }

    try {
      const result = await this.executor.execute({
        ...invocation,
        cwd: workingDirectory,
        stdout: teeSink(this.outputBuffer, this.onOutput),
        stderr: teeSink(this.errorBuffer, this.onErrors),
        signal: controller.signal,
      });
      return { kind: "completed", ...result };
    } catch (error) {
      if (error instanceof ProcessCancelledError) {
        return {
          kind: "timed_out",
          message: `Running timeout at ${formatTimeSpan(timeoutMs)} for command ${command} in ${workingDirectory}`,
        };
      }
      if (error instanceof ProcessExecutionError) {
        return { kind: "fault", error };
      }
      return {
        kind: "aborted",
        error: error instanceof Error ? error : new Error(String(error)),
      };
    } finally {
      clearTimeout(timer);
    }
  }
}
