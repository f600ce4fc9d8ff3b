import type { OutputSink } from "../core/output-sink.js";

export interface ProcessRequest {
  /** Executable to launch */
  executable: string;
  /** Arguments, one element per argv entry */
  args: readonly string[];
  /** Pass arguments to the OS untouched (no quoting on Windows) */
  verbatimArguments?: boolean;
  /** Working directory for the child process */
  cwd: string;
  /** Receives stdout chunks as they arrive */
  stdout: OutputSink;
  /** Receives stderr chunks as they arrive */
  stderr: OutputSink;
  /** Cancels the execution when aborted */
  signal: AbortSignal;
}

export interface ProcessResult {
  exitCode: number;
  /** Wall-clock time from launch to completion */
  durationMs: number;
}

/**
 * Runs one external process to completion.
 *
 * Implementations reject with `ProcessCancelledError` when the signal fires
 * first and with `ProcessExecutionError` when the process cannot be run.
 */
export interface ProcessExecutor {
  execute(request: ProcessRequest): Promise<ProcessResult>;
}
