import chalk from "chalk";

const ANSI_COLOR = new RegExp(`${String.fromCharCode(27)}\\[[\\d;]*m`, "g");

/**
 * Removes the colour codes chalk adds, for comparing console text.
 */
export function stripAnsi(text: string): string {
  return text.replace(ANSI_COLOR, "");
}

/**
 * Messages shown directly to the person running the tool, independent of
 * the log.
 */
export interface UserConsole {
  writeWarning(message: string): void;
  writeError(message: string): void;
}

/**
 * Writes warnings in yellow and errors in red, one line each.
 */
export class ConsoleWriter implements UserConsole {
  constructor(private readonly stream: NodeJS.WritableStream = process.stderr) {}

  writeWarning(message: string): void {
    this.stream.write(`${chalk.yellow(message)}\n`);
  }

  writeError(message: string): void {
    this.stream.write(`${chalk.red(message)}\n`);
  }
}

/**
 * Console that discards everything, for library callers with their own UI.
 */
export const silentConsole: UserConsole = {
  writeWarning() {},
  writeError() {},
};
