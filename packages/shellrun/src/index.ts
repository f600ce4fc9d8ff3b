// Runner
export type { AttemptOutcome, RunOptions, ShellRunnerOptions } from "./runner/shell-runner.js";
export { ShellRunner } from "./runner/shell-runner.js";
export type { ProbeResult } from "./runner/probe.js";
export { isQuietOnTimeout, probeRemote, REACHABILITY_PROBE_COMMAND } from "./runner/probe.js";

// Retry and timeout policy
export {
  DEFAULT_RETRY_STRATEGY,
  InvalidRetryStrategyError,
  isRetryStrategy,
  parseRetryStrategy,
  RETRY_STRATEGIES,
  RetryStrategy,
  shouldRetry,
} from "./core/retry.js";
export type { TimeoutPolicyOptions } from "./core/timeout-policy.js";
export { defaultTimeoutPolicy, TimeoutEscalationPolicy } from "./core/timeout-policy.js";
export { defaultLastOutput, LastOutputCell } from "./core/last-output.js";
export {
  ABORTED_EXIT_CODE,
  DEFAULT_TIMEOUT_MS,
  LAUNCH_FAILURE_EXIT_CODE,
  LONG_TIMEOUT_MS,
  MAX_ATTEMPTS,
  SHORT_TIMEOUT_MS,
} from "./core/constants.js";

// Output sinks
export type { OutputCallback, OutputSink } from "./core/output-sink.js";
export { noopSink, TextBuffer, teeSink, toSink } from "./core/output-sink.js";

// Process execution
export type { ProcessExecutor, ProcessRequest, ProcessResult } from "./process/types.js";
export { exitCodeFromSignal, NodeProcessExecutor } from "./process/node-executor.js";
export { OutputSinkError, ProcessCancelledError, ProcessExecutionError } from "./process/errors.js";
export type { ShellFamily, ShellInvocation } from "./platform/shell.js";
export { buildShellInvocation, detectShellFamily, isUnixLike } from "./platform/shell.js";

// Configuration
export type { RunnerConfig, RunnerConfigInput } from "./config/runner-config.js";
export {
  DEFAULT_RUNNER_CONFIG,
  RunnerConfigError,
  resolveRunnerConfig,
  runnerConfigFromEnv,
  runnerConfigSchema,
} from "./config/runner-config.js";

// Logging and console
export type { ILogObj, Logger } from "tslog";
export type { LoggerOptions, RunnerLogger } from "./logging/logger.js";
export { createLogger, DEFAULT_LOG_LEVEL, defaultLogger, parseLogLevel } from "./logging/logger.js";
export type { UserConsole } from "./console/console-writer.js";
export { ConsoleWriter, silentConsole, stripAnsi } from "./console/console-writer.js";
export { formatTimeSpan } from "./utils/timespan.js";
