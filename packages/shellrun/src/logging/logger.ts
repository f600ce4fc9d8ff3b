import { type ILogObj, Logger } from "tslog";

const LEVEL_NAMES = ["silly", "trace", "debug", "info", "warn", "error", "fatal"] as const;

/** Warn: timeouts and aborts show, per-attempt lines do not. */
export const DEFAULT_LOG_LEVEL = 4;

/**
 * Reads a tslog level from a name ("debug") or an id ("2"). Anything else,
 * including ids outside 0-6, gives undefined.
 */
export function parseLogLevel(value?: string): number | undefined {
  const normalized = value?.trim().toLowerCase();
  if (!normalized) {
    return undefined;
  }

  const byName = LEVEL_NAMES.findIndex((name) => name === normalized);
  if (byName >= 0) {
    return byName;
  }

  const id = Number(normalized);
  return Number.isInteger(id) && id >= 0 && id < LEVEL_NAMES.length ? id : undefined;
}

/**
 * The logging calls a runner makes. A tslog `Logger` satisfies it, and so
 * does any recording stand-in used in tests.
 */
export type RunnerLogger = Pick<Logger<ILogObj>, "debug" | "info" | "warn" | "error">;

export interface LoggerOptions {
  /** @default "shellrun" */
  name?: string;
  /** tslog level id; falls back to `SHELLRUN_LOG_LEVEL`, then warn */
  minLevel?: number;
  /** @default "pretty" */
  type?: "pretty" | "json" | "hidden";
  /**
   * Where pretty lines go. Defaults to stderr so that the output of the
   * commands being run keeps stdout to itself.
   */
  stream?: NodeJS.WritableStream;
}

/**
 * Creates the logger runners write their `EXECUTED` lines and timeout
 * warnings to.
 *
 * @example
 * ```typescript
 * const runner = new ShellRunner({ logger: createLogger({ name: "sync", minLevel: 3 }) });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger<ILogObj> {
  const stream = options.stream ?? process.stderr;
  const colored = "isTTY" in stream && stream.isTTY === true;

  return new Logger<ILogObj>({
    name: options.name ?? "shellrun",
    minLevel: options.minLevel ?? parseLogLevel(process.env.SHELLRUN_LOG_LEVEL) ?? DEFAULT_LOG_LEVEL,
    type: options.type ?? "pretty",
    hideLogPositionForProduction: true,
    stylePrettyLogs: colored,
    prettyLogTemplate: "{{hh}}:{{MM}}:{{ss}}.{{ms}}\t{{logLevelName}}\t[{{name}}]\t",
    overwrite: {
      transportFormatted: (logMeta: string, logArgs: unknown[], logErrors: string[]) => {
        const parts = logArgs.map((arg) => (typeof arg === "string" ? arg : JSON.stringify(arg)));
        stream.write(`${logMeta}${[...parts, ...logErrors].join(" ")}\n`);
      },
    },
  });
}

/**
 * Logger used by runners that are not given one.
 */
export const defaultLogger = createLogger();
