import {
  createLogger,
  type ILogObj,
  type Logger,
  type LoggerOptions,
  parseLogLevel,
  ShellRunner,
  type ShellRunnerOptions,
} from "shellrun";

/**
 * Logger configuration for CLI commands.
 */
export interface CLILoggerConfig {
  logLevel?: string;
}

/**
 * Environment abstraction for CLI dependencies and I/O.
 * Allows dependency injection for testing.
 */
export interface CLIEnvironment {
  argv: string[];
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  /** Variables consulted for runner defaults (SHELLRUN_TIMEOUT_MS, SHELLRUN_RETRY) */
  variables: NodeJS.ProcessEnv;
  cwd: () => string;
  setExitCode: (code: number) => void;
  loggerConfig?: CLILoggerConfig;
  createLogger: (name: string) => Logger<ILogObj>;
  createRunner: (options: ShellRunnerOptions) => ShellRunner;
}

/**
 * Creates a logger factory based on CLI configuration.
 * Priority: CLI options > environment variables > defaults
 */
export function createLoggerFactory(config?: CLILoggerConfig): (name: string) => Logger<ILogObj> {
  return (name: string) => {
    const options: LoggerOptions = { name };

    // --log-level takes priority over SHELLRUN_LOG_LEVEL
    const minLevel = parseLogLevel(config?.logLevel);
    if (minLevel !== undefined) {
      options.minLevel = minLevel;
    }

    return createLogger(options);
  };
}

/**
 * Creates the default CLI environment using Node.js process globals.
 */
export function createDefaultEnvironment(loggerConfig?: CLILoggerConfig): CLIEnvironment {
  return {
    argv: process.argv,
    stdout: process.stdout,
    stderr: process.stderr,
    variables: process.env,
    cwd: () => process.cwd(),
    setExitCode: (code: number) => {
      process.exitCode = code;
    },
    loggerConfig,
    createLogger: createLoggerFactory(loggerConfig),
    createRunner: (options) => new ShellRunner(options),
  };
}
