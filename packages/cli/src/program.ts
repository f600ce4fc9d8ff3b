import { Command } from "commander";

import packageJson from "../package.json" with { type: "json" };

import { type CLIConfig, loadConfig } from "./config.js";
import {
  CLI_DESCRIPTION,
  CLI_NAME,
  type CLILogLevel,
  COMMANDS,
  OPTION_DESCRIPTIONS,
  OPTION_FLAGS,
} from "./constants.js";
import type { CLIEnvironment, CLILoggerConfig } from "./environment.js";
import { createDefaultEnvironment } from "./environment.js";
import { registerProbeCommand } from "./probe-command.js";
import { registerRunCommand } from "./run-command.js";
import { parseLogLevelOption } from "./utils.js";

/**
 * Global CLI options that apply to all commands.
 */
interface GlobalOptions {
  logLevel?: CLILogLevel;
}

const COMMAND_NAMES: readonly string[] = Object.values(COMMANDS);

/**
 * The part of `argv` before the command name. Everything after it belongs to
 * the command, and for `run` to the shell.
 */
export function globalArguments(argv: readonly string[]): string[] {
  // argv[0] and argv[1] are the node binary and the script
  const commandIndex = argv.findIndex((arg, index) => index >= 2 && COMMAND_NAMES.includes(arg));
  return commandIndex === -1 ? [...argv] : argv.slice(0, commandIndex);
}

/**
 * Creates and configures the CLI program with the run and probe commands.
 *
 * @param env - CLI environment configuration for I/O and dependencies
 * @param config - Optional CLI configuration loaded from config file
 * @returns Configured Commander program ready for parsing
 */
export function createProgram(env: CLIEnvironment, config?: CLIConfig): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description(CLI_DESCRIPTION)
    .version(packageJson.version)
    .option(OPTION_FLAGS.logLevel, OPTION_DESCRIPTIONS.logLevel, parseLogLevelOption)
    // Lets `run` hand options after the command line to the shell untouched
    .enablePositionalOptions()
    .configureOutput({
      writeOut: (str) => env.stdout.write(str),
      writeErr: (str) => env.stderr.write(str),
    });

  registerRunCommand(program, env, config?.run);
  registerProbeCommand(program, env, config?.run);

  return program;
}

/**
 * Options for runCLI function.
 */
export interface RunCLIOptions {
  /** Environment overrides for testing or customization */
  env?: Partial<CLIEnvironment>;
  /** Config override - if provided, skips loading from file. Use {} to disable config. */
  config?: CLIConfig;
}

/**
 * Main entry point for running the CLI.
 * Creates environment, parses arguments, and executes the appropriate command.
 */
export async function runCLI(opts: RunCLIOptions = {}): Promise<void> {
  // Errors in the config file fail before any command runs
  const config = opts.config !== undefined ? opts.config : loadConfig();
  const envOverrides = opts.env ?? {};
  const argv = envOverrides.argv ?? process.argv;

  // First pass: parse global options only (skip if help requested)
  const preParser = new Command();
  preParser
    .option(OPTION_FLAGS.logLevel, OPTION_DESCRIPTIONS.logLevel, parseLogLevelOption)
    .allowUnknownOption()
    .allowExcessArguments()
    .helpOption(false);

  preParser.parse(globalArguments(argv));
  const globalOpts = preParser.opts<GlobalOptions>();

  // Priority: CLI flags > config file > environment > defaults
  const loggerConfig: CLILoggerConfig = {
    logLevel: globalOpts.logLevel ?? config.global?.["log-level"],
  };

  const env: CLIEnvironment = {
    ...createDefaultEnvironment(loggerConfig),
    ...envOverrides,
  };
  const program = createProgram(env, config);
  await program.parseAsync(env.argv);
}
