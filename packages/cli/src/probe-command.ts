import type { Command } from "commander";
import { ConsoleWriter, probeRemote } from "shellrun";
import { COMMANDS, OPTION_DESCRIPTIONS, OPTION_FLAGS } from "./constants.js";
import type { RunConfig } from "./config.js";
import type { CLIEnvironment } from "./environment.js";
import { resolveWorkingDirectory } from "./paths.js";
import { executeAction } from "./utils.js";

export interface ProbeCommandOptions {
  cwd?: string;
}

/**
 * Checks that the remote of the repository in the working directory answers.
 * Prints `reachable` or `unreachable`; exit code 0 or 1.
 */
export async function executeProbe(
  options: ProbeCommandOptions,
  env: CLIEnvironment,
  config: RunConfig = {},
): Promise<void> {
  const directory = resolveWorkingDirectory(env.cwd(), options.cwd ?? config.cwd);
  const runner = env.createRunner({
    logger: env.createLogger("shellrun:probe"),
    console: new ConsoleWriter(env.stderr),
  });

  const result = await probeRemote(runner, directory);

  env.stdout.write(`${result.reachable ? "reachable" : "unreachable"}\n`);
  env.setExitCode(result.reachable ? 0 : 1);
}

export function registerProbeCommand(
  program: Command,
  env: CLIEnvironment,
  config?: RunConfig,
): void {
  program
    .command(COMMANDS.probe)
    .description("Check whether the repository's remote answers")
    .option(OPTION_FLAGS.cwd, OPTION_DESCRIPTIONS.cwd)
    .action((options: ProbeCommandOptions) =>
      executeAction(() => executeProbe(options, env, config), env),
    );
}
