/**
 * Process executor backed by Node.js child_process.
 *
 * @module process/node-executor
 */

import { spawn as nodeSpawn } from "node:child_process";
import { constants } from "node:os";
import { performance } from "node:perf_hooks";
import type { OutputSink } from "../core/output-sink.js";
import { OutputSinkError, ProcessCancelledError, ProcessExecutionError } from "./errors.js";
import type { ProcessExecutor, ProcessRequest, ProcessResult } from "./types.js";

type StreamName = "stdout" | "stderr";

function isKnownSignal(signal: string): signal is keyof typeof constants.signals {
  return Object.hasOwn(constants.signals, signal);
}

/**
 * Maps a terminating signal to the exit code a shell would report (128 + n).
 */
export function exitCodeFromSignal(signal: NodeJS.Signals | null): number {
  if (signal && isKnownSignal(signal)) {
    return 128 + constants.signals[signal];
  }
  return 1;
}

/**
 * Spawns the process directly (no extra shell), pipes stdout and stderr into
 * the request's sinks and resolves once both pipes have closed.
 *
 * On abort the pipes are detached before the child is killed, so nothing it
 * writes afterwards reaches the sinks.
 */
export class NodeProcessExecutor implements ProcessExecutor {
  execute(request: ProcessRequest): Promise<ProcessResult> {
    const { executable, signal } = request;

    if (signal.aborted) {
      return Promise.reject(new ProcessCancelledError());
    }

    return new Promise<ProcessResult>((resolve, reject) => {
      const startedAt = performance.now();
      const child = nodeSpawn(executable, [...request.args], {
        cwd: request.cwd,
        stdio: ["ignore", "pipe", "pipe"],
        windowsVerbatimArguments: request.verbatimArguments,
        windowsHide: true,
      });

      let settled = false;

      const finish = (settle: () => void) => {
        if (settled) return;
        settled = true;
        signal.removeEventListener("abort", onAbort);
        settle();
      };

      const stop = () => {
        child.stdout.removeAllListeners("data");
        child.stderr.removeAllListeners("data");
        child.stdout.destroy();
        child.stderr.destroy();
        child.kill("SIGKILL");
      };

      const forward = (stream: StreamName, sink: OutputSink) => (chunk: string) => {
        if (settled) return;
        try {
          sink.append(chunk);
        } catch (error) {
          finish(() => {
            stop();
            reject(new OutputSinkError(stream, { cause: error }));
          });
        }
      };

      const onAbort = () => {
        finish(() => {
          stop();
          reject(new ProcessCancelledError());
        });
      };

      const onFailure = (error: Error) => {
        finish(() => {
          stop();
          reject(new ProcessExecutionError(executable, error.message, { cause: error }));
        });
      };

      signal.addEventListener("abort", onAbort, { once: true });

      child.stdout.setEncoding("utf8");
      child.stderr.setEncoding("utf8");
      child.stdout.on("data", forward("stdout", request.stdout));
      child.stderr.on("data", forward("stderr", request.stderr));
      child.stdout.on("error", onFailure);
      child.stderr.on("error", onFailure);
      child.on("error", onFailure);

      child.on("close", (code, exitSignal) => {
        finish(() => {
          resolve({
            exitCode: code ?? exitCodeFromSignal(exitSignal),
            durationMs: performance.now() - startedAt,
          });
        });
      });
    });
  }
}
