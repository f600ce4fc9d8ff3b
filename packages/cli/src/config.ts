import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { load as parseToml } from "js-toml";
import {
  InvalidRetryStrategyError,
  parseRetryStrategy,
  RETRY_STRATEGIES,
  type RetryStrategy,
} from "shellrun";
import { type CLILogLevel, LOG_LEVELS } from "./constants.js";
import { expandTildePath } from "./paths.js";

/**
 * Global CLI options that apply to all commands.
 */
export interface GlobalConfig {
  "log-level"?: CLILogLevel;
}

/**
 * Defaults for the run and probe commands.
 */
export interface RunConfig {
  /** Timeout per attempt in milliseconds */
  timeout?: number;
  retry?: RetryStrategy;
  /** Working directory, tilde expanded */
  cwd?: string;
}

export interface CLIConfig {
  global?: GlobalConfig;
  run?: RunConfig;
}

const GLOBAL_CONFIG_KEYS = new Set(["log-level"]);
const RUN_CONFIG_KEYS = new Set(["timeout", "retry", "cwd"]);

/**
 * Returns the default config file path: ~/.shellrun/config.toml
 */
export function getConfigPath(): string {
  return join(homedir(), ".shellrun", "config.toml");
}

/**
 * Configuration validation error.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly path?: string,
  ) {
    super(path ? `${path}: ${message}` : message);
    this.name = "ConfigError";
  }
}

type Table = Record<string, unknown>;

function isTable(value: unknown): value is Table {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isLogLevel(value: string): value is CLILogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Reads a section as a table whose keys all belong to `known`.
 */
function sectionTable(raw: unknown, section: string, known: ReadonlySet<string>): Table {
  if (!isTable(raw)) {
    throw new ConfigError(`[${section}] must be a table`);
  }
  const unknownKey = Object.keys(raw).find((key) => !known.has(key));
  if (unknownKey !== undefined) {
    throw new ConfigError(`[${section}].${unknownKey} is not a valid option`);
  }
  return raw;
}

function readLogLevel(value: unknown): CLILogLevel {
  const level = typeof value === "string" ? value.trim().toLowerCase() : "";
  if (!isLogLevel(level)) {
    throw new ConfigError(`[global].log-level must be one of: ${LOG_LEVELS.join(", ")}`);
  }
  return level;
}

/** Milliseconds per attempt; TOML integers only, at least 1. */
function readTimeout(value: unknown): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    throw new ConfigError("[run].timeout must be a whole number of milliseconds, at least 1");
  }
  return value;
}

function readRetry(value: unknown): RetryStrategy {
  if (typeof value !== "string") {
    throw new ConfigError(`[run].retry must be one of: ${RETRY_STRATEGIES.join(", ")}`);
  }
  try {
    return parseRetryStrategy(value);
  } catch (error) {
    if (error instanceof InvalidRetryStrategyError) {
      throw new ConfigError(`[run].retry: ${error.message}`);
    }
    throw error;
  }
}

function readDirectory(value: unknown): string {
  if (typeof value !== "string" || value.trim() === "") {
    throw new ConfigError("[run].cwd must be a non-empty path");
  }
  return expandTildePath(value);
}

function validateGlobalConfig(raw: unknown): GlobalConfig {
  const table = sectionTable(raw, "global", GLOBAL_CONFIG_KEYS);
  return "log-level" in table ? { "log-level": readLogLevel(table["log-level"]) } : {};
}

function validateRunConfig(raw: unknown): RunConfig {
  const table = sectionTable(raw, "run", RUN_CONFIG_KEYS);
  const result: RunConfig = {};
  if ("timeout" in table) result.timeout = readTimeout(table.timeout);
  if ("retry" in table) result.retry = readRetry(table.retry);
  if ("cwd" in table) result.cwd = readDirectory(table.cwd);
  return result;
}

/**
 * Validates and normalizes a raw TOML object to CLIConfig.
 *
 * @throws ConfigError if validation fails
 */
export function validateConfig(raw: unknown, configPath?: string): CLIConfig {
  if (!isTable(raw)) {
    throw new ConfigError("Config must be a TOML table", configPath);
  }

  const result: CLIConfig = {};

  for (const [key, value] of Object.entries(raw)) {
    try {
      if (key === "global") {
        result.global = validateGlobalConfig(value);
      } else if (key === "run") {
        result.run = validateRunConfig(value);
      } else {
        throw new ConfigError(`[${key}] is not a valid section`);
      }
    } catch (error) {
      if (error instanceof ConfigError) {
        throw new ConfigError(error.message, configPath);
      }
      throw error;
    }
  }

  return result;
}

/**
 * Parses TOML text into a validated config.
 *
 * @throws ConfigError on invalid syntax or unknown fields
 */
export function parseConfig(content: string, configPath?: string): CLIConfig {
  let raw: unknown;
  try {
    raw = parseToml(content);
  } catch (error) {
    throw new ConfigError(
      `Invalid TOML syntax: ${error instanceof Error ? error.message : "Unknown error"}`,
      configPath,
    );
  }

  return validateConfig(raw, configPath);
}

/**
 * Loads configuration from `configPath` (default ~/.shellrun/config.toml).
 * Returns empty config if the file doesn't exist.
 *
 * @throws ConfigError if the file exists but has invalid syntax or unknown fields
 */
export function loadConfig(configPath: string = getConfigPath()): CLIConfig {
  if (!existsSync(configPath)) {
    return {};
  }

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (error) {
    throw new ConfigError(
      `Failed to read config file: ${error instanceof Error ? error.message : "Unknown error"}`,
      configPath,
    );
  }

  return parseConfig(content, configPath);
}
