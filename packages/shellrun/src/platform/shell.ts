/**
 * Shell interpreter selection per OS family.
 *
 * @module platform/shell
 */

export type ShellFamily = "unix" | "windows";

/**
 * How to hand one command string to an interpreter.
 */
export interface ShellInvocation {
  executable: string;
  args: string[];
  /** Arguments are already quoted for the interpreter and must not be re-quoted */
  verbatimArguments: boolean;
}

interface ShellDefinition {
  executable: string;
  buildArgs(command: string): string[];
  verbatimArguments: boolean;
}

const SHELLS: Record<ShellFamily, ShellDefinition> = {
  // Login shell so profile-provided PATH entries (git, ssh agents) apply
  unix: {
    executable: "/bin/bash",
    buildArgs: (command) => ["-lc", command],
    verbatimArguments: false,
  },
  windows: {
    executable: "cmd",
    buildArgs: (command) => ["/D", "/C", `"${command}"`],
    verbatimArguments: true,
  },
};

export function isUnixLike(platform: NodeJS.Platform = process.platform): boolean {
  return platform !== "win32";
}

export function detectShellFamily(platform: NodeJS.Platform = process.platform): ShellFamily {
  return isUnixLike(platform) ? "unix" : "windows";
}

export function buildShellInvocation(command: string, family: ShellFamily): ShellInvocation {
  const shell = SHELLS[family];
  return {
    executable: shell.executable,
    args: shell.buildArgs(command),
    verbatimArguments: shell.verbatimArguments,
  };
}
