import type { RunnerLogger, UserConsole } from "shellrun";

export type LogLevelName = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  level: LogLevelName;
  message: string;
}

function render(args: unknown[]): string {
  return args.map((arg) => (typeof arg === "string" ? arg : JSON.stringify(arg))).join(" ");
}

/**
 * Logger that keeps every entry in memory.
 */
export class RecordingLogger implements RunnerLogger {
  readonly entries: LogEntry[] = [];

  debug(...args: unknown[]): undefined {
    this.entries.push({ level: "debug", message: render(args) });
    return undefined;
  }

  info(...args: unknown[]): undefined {
    this.entries.push({ level: "info", message: render(args) });
    return undefined;
  }

  warn(...args: unknown[]): undefined {
    this.entries.push({ level: "warn", message: render(args) });
    return undefined;
  }

  error(...args: unknown[]): undefined {
    this.entries.push({ level: "error", message: render(args) });
    return undefined;
  }

  messages(level: LogLevelName): string[] {
    return this.entries.filter((entry) => entry.level === level).map((entry) => entry.message);
  }
}

/**
 * Console that keeps warnings and errors instead of printing them.
 */
export class RecordingConsole implements UserConsole {
  readonly warnings: string[] = [];
  readonly errors: string[] = [];

  writeWarning(message: string): void {
    this.warnings.push(message);
  }

  writeError(message: string): void {
    this.errors.push(message);
  }
}
