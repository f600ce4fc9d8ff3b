import { mkdtempSync, readFileSync, realpathSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Writable } from "node:stream";
import { FakeProcessExecutor, type FakeStep } from "@shellrun/testing";
import { createLogger, ShellRunner, stripAnsi } from "shellrun";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { CLIConfig } from "./config.js";
import type { CLIEnvironment } from "./environment.js";
import { globalArguments, runCLI } from "./program.js";

/**
 * Helper to create a writable stream that captures output.
 */
function createWritable() {
  let data = "";
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      data += chunk.toString();
      callback();
    },
  });
  return { stream, read: () => data };
}

interface TestCLI {
  env: CLIEnvironment;
  stdout: () => string;
  stderr: () => string;
  exitCode: () => number | undefined;
}

/**
 * Helper to create a minimal CLI environment for testing.
 */
function createEnv(args: string[], overrides: Partial<CLIEnvironment> = {}): TestCLI {
  const stdout = createWritable();
  const stderr = createWritable();
  let exitCode: number | undefined;

  const env: CLIEnvironment = {
    argv: ["node", "shellrun", ...args],
    stdout: stdout.stream,
    stderr: stderr.stream,
    variables: {},
    cwd: () => "/",
    setExitCode: (code) => {
      exitCode = code;
    },
    createLogger: (name: string) => createLogger({ type: "hidden", name }),
    createRunner: (options) => new ShellRunner(options),
    ...overrides,
  };

  return { env, stdout: stdout.read, stderr: stderr.read, exitCode: () => exitCode };
}

async function run(
  args: string[],
  overrides: Partial<CLIEnvironment> = {},
  config: CLIConfig = {},
): Promise<TestCLI> {
  const cli = createEnv(args, overrides);
  await runCLI({ env: cli.env, config });
  return cli;
}

describe("run command", () => {
  let dir: string;

  beforeEach(() => {
    dir = realpathSync(mkdtempSync(join(tmpdir(), "shellrun-cli-")));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function attempts(): number {
    return readFileSync(join(dir, "attempts"), "utf-8").split("\n").filter(Boolean).length;
  }

  it("streams the command's output and exits with its code", async () => {
    const cli = await run(["run", "echo", "hello"]);

    expect(cli.stdout()).toBe("hello\n");
    expect(cli.exitCode()).toBe(0);
  });

  it("passes options after the command line to the shell", async () => {
    const cli = await run(["run", "printf", "%s-%s", "-n", "x"]);

    expect(cli.stdout()).toBe("-n-x");
  });

  it("leaves a --log-level after the command line to the shell", async () => {
    const cli = await run(["run", "echo", "--log-level", "loud"]);

    expect(cli.stdout()).toBe("--log-level loud\n");
    expect(cli.exitCode()).toBe(0);
  });

  it("forwards stderr", async () => {
    const cli = await run(["run", "echo oops >&2; exit 3"]);

    expect(cli.stderr().endsWith("oops\n")).toBe(true);
    expect(cli.exitCode()).toBe(3);
  });

  it("keeps output to itself with --quiet", async () => {
    const cli = await run(["run", "--quiet", "echo", "hidden"]);

    expect(cli.stdout()).toBe("");
    expect(cli.exitCode()).toBe(0);
  });

  it("runs in the directory given by --cwd", async () => {
    const cli = await run(["run", "--cwd", dir, "pwd", "-P"]);

    expect(cli.stdout()).toBe(`${dir}\n`);
  });

  it("resolves --cwd against the caller's directory", async () => {
    const cli = await run(["run", "--cwd", "..", "pwd", "-P"], { cwd: () => join(dir, "sub") });

    expect(cli.stdout()).toBe(`${dir}\n`);
  });

  it("falls back to the configured directory", async () => {
    const cli = await run(["run", "pwd", "-P"], {}, { run: { cwd: dir } });

    expect(cli.stdout()).toBe(`${dir}\n`);
  });

  it("reports a timeout and exits 1", async () => {
    const cli = await run(["run", "--timeout", "50", "--retry", "none", "sleep 5"], {
      cwd: () => dir,
    });

    expect(
      stripAnsi(cli.stderr()).endsWith(`Running timeout at 00:00:00.050 for command sleep 5 in ${dir}\n`),
    ).toBe(true);
    expect(cli.exitCode()).toBe(1);
  });

  it("retries failures when asked to", async () => {
    const cli = await run(["run", "--retry", "if-timeout-or-failed", "echo x >> attempts; exit 2"], {
      cwd: () => dir,
    });

    expect(attempts()).toBe(3);
    expect(cli.exitCode()).toBe(2);
  });

  it("does not retry failures by default", async () => {
    await run(["run", "echo x >> attempts; exit 2"], { cwd: () => dir });

    expect(attempts()).toBe(1);
  });

  it("takes the retry strategy from the environment", async () => {
    await run(["run", "echo x >> attempts; exit 2"], {
      cwd: () => dir,
      variables: { SHELLRUN_RETRY: "if-timeout-or-failed" },
    });

    expect(attempts()).toBe(3);
  });

  it("prefers the config file over the environment", async () => {
    await run(
      ["run", "echo x >> attempts; exit 2"],
      { cwd: () => dir, variables: { SHELLRUN_RETRY: "if-timeout-or-failed" } },
      { run: { retry: "none" } },
    );

    expect(attempts()).toBe(1);
  });

  it("prefers flags over the config file", async () => {
    await run(
      ["run", "--retry", "if-timeout-or-failed", "echo x >> attempts; exit 2"],
      { cwd: () => dir },
      { run: { retry: "none" } },
    );

    expect(attempts()).toBe(3);
  });

  it("fails on invalid environment values", async () => {
    const cli = await run(["run", "echo", "never"], {
      variables: { SHELLRUN_TIMEOUT_MS: "soon" },
    });

    expect(stripAnsi(cli.stderr())).toContain("Error: environment: timeoutMs");
    expect(cli.stdout()).toBe("");
    expect(cli.exitCode()).toBe(1);
  });
});

describe("probe command", () => {
  function probe(steps: FakeStep[]) {
    const executor = new FakeProcessExecutor(steps);
    return {
      executor,
      result: run(["probe", "--cwd", "/srv/repo"], {
        createRunner: (options) => new ShellRunner({ ...options, executor }),
      }),
    };
  }

  it("prints reachable when the remote answers", async () => {
    const { executor, result } = probe([{ type: "exit", exitCode: 0, stdout: "abc\trefs/heads/main\n" }]);
    const cli = await result;

    expect(cli.stdout()).toBe("reachable\n");
    expect(cli.exitCode()).toBe(0);
    expect(executor.commands).toEqual(["git ls-remote --heads"]);
    expect(executor.requests[0]?.cwd).toBe("/srv/repo");
  });

  it("prints unreachable otherwise", async () => {
    const { result } = probe([{ type: "exit", exitCode: 128 }]);
    const cli = await result;

    expect(cli.stdout()).toBe("unreachable\n");
    expect(cli.exitCode()).toBe(1);
  });
});

describe("globalArguments", () => {
  it("stops at the command name", () => {
    expect(
      globalArguments(["node", "shellrun", "--log-level", "debug", "run", "make", "--log-level", "info"]),
    ).toEqual(["node", "shellrun", "--log-level", "debug"]);
  });

  it("keeps everything when no command is named", () => {
    expect(globalArguments(["node", "shellrun", "--log-level", "info"])).toEqual([
      "node",
      "shellrun",
      "--log-level",
      "info",
    ]);
  });

  it("does not treat the script path as a command", () => {
    expect(globalArguments(["node", "run", "probe", "--cwd", "/srv"])).toEqual(["node", "run"]);
  });
});
