import { homedir } from "node:os";
import { resolve } from "node:path";

/**
 * Expands tilde (~) to the user's home directory in a path string.
 * Only expands tildes at the start of the path.
 *
 * @example
 * expandTildePath("~/work/repo") // "/home/alex/work/repo"
 * expandTildePath("/var/log")    // "/var/log" (unchanged)
 * expandTildePath("./relative")  // "./relative" (unchanged)
 */
export function expandTildePath(path: string): string {
  if (!path.startsWith("~")) {
    return path;
  }
  return path.replace(/^~/, homedir());
}

/**
 * Resolves the directory a command runs in against the caller's directory.
 */
export function resolveWorkingDirectory(base: string, path?: string): string {
  return path ? resolve(base, expandTildePath(path)) : base;
}
