import { RetryStrategy } from "../core/retry.js";
import type { ShellRunner } from "./shell-runner.js";

/**
 * Command used to check that a repository's remote answers.
 */
export const REACHABILITY_PROBE_COMMAND = "git ls-remote --heads";

/**
 * Whether a timeout of this command should stay out of the console.
 *
 * Only the reachability probe qualifies: it times out routinely against
 * unreachable remotes and its caller reports the result itself. The warning
 * is still logged.
 */
export function isQuietOnTimeout(command: string): boolean {
  return command === REACHABILITY_PROBE_COMMAND;
}

export interface ProbeResult {
  reachable: boolean;
  exitCode: number;
  timedOut: boolean;
}

/**
 * Asks the remote of the repository in `directory` for its heads.
 *
 * Starts from the runner's starting timeout, so it stays short until the
 * timeout policy has seen repeated timeouts.
 */
export async function probeRemote(runner: ShellRunner, directory: string): Promise<ProbeResult> {
  const exitCode = await runner.runInDirectory(directory, REACHABILITY_PROBE_COMMAND, {
    timeoutMs: runner.timeoutPolicy.startingTimeout(),
    retryStrategy: RetryStrategy.IfTimeout,
  });

  return {
    reachable: exitCode === 0,
    exitCode,
    timedOut: runner.hasTimeout,
  };
}
