/** CLI program name */
export const CLI_NAME = "shellrun";

/** CLI program description shown in --help */
export const CLI_DESCRIPTION = "Run shell commands with timeouts, retries and live output.";

/** Available CLI commands */
export const COMMANDS = {
  run: "run",
  probe: "probe",
} as const;

/** Valid log level names */
export const LOG_LEVELS = ["silly", "trace", "debug", "info", "warn", "error", "fatal"] as const;
export type CLILogLevel = (typeof LOG_LEVELS)[number];

/** Command-line option flags */
export const OPTION_FLAGS = {
  logLevel: "--log-level <level>",
  cwd: "-C, --cwd <dir>",
  timeout: "-t, --timeout <ms>",
  retry: "-r, --retry <strategy>",
  quiet: "-q, --quiet",
} as const;

/** Human-readable descriptions for command-line options */
export const OPTION_DESCRIPTIONS = {
  logLevel: "Log level: silly, trace, debug, info, warn, error, fatal.",
  cwd: "Directory to run in. Defaults to the current directory.",
  timeout: "Timeout per attempt in milliseconds.",
  retry: "Retry strategy: none, if-timeout, if-timeout-or-failed.",
  quiet: "Do not echo the command's output while it runs.",
} as const;

/** Prefix for messages the CLI writes about itself */
export const SUMMARY_PREFIX = "[shellrun]";
