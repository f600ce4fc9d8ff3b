/**
 * Raised by a {@link ProcessExecutor} when its abort signal fires before the
 * process completes. Output received up to that point stays in the sinks.
 */
export class ProcessCancelledError extends Error {
  constructor(message?: string) {
    super(message ?? "Process execution was cancelled");
    this.name = "ProcessCancelledError";
  }
}

/**
 * Raised when a process cannot be run to completion for a reason other than
 * cancellation: the executable is missing, the working directory does not
 * exist, a pipe fails.
 */
export class ProcessExecutionError extends Error {
  public readonly executable: string;

  constructor(executable: string, message: string, options?: { cause?: unknown }) {
    super(`Failed to run ${executable}: ${message}`, options);
    this.name = "ProcessExecutionError";
    this.executable = executable;
  }
}

/**
 * Raised when an output sink throws while receiving a chunk. The process is
 * stopped because its transcript can no longer be delivered.
 */
export class OutputSinkError extends Error {
  public readonly stream: "stdout" | "stderr";

  constructor(stream: "stdout" | "stderr", options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? options.cause.message : String(options?.cause);
    super(`Output sink for ${stream} failed: ${reason}`, options);
    this.name = "OutputSinkError";
    this.stream = stream;
  }
}
