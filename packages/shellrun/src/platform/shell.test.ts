import { describe, expect, it } from "vitest";
import { buildShellInvocation, detectShellFamily, isUnixLike } from "./shell.js";

describe("isUnixLike", () => {
  it("treats everything except win32 as unix-like", () => {
    expect(isUnixLike("linux")).toBe(true);
    expect(isUnixLike("darwin")).toBe(true);
    expect(isUnixLike("freebsd")).toBe(true);
    expect(isUnixLike("win32")).toBe(false);
  });
});

describe("detectShellFamily", () => {
  it("maps platforms to families", () => {
    expect(detectShellFamily("linux")).toBe("unix");
    expect(detectShellFamily("win32")).toBe("windows");
  });
});

describe("buildShellInvocation", () => {
  it("runs bash as a login shell on unix", () => {
    expect(buildShellInvocation("git status", "unix")).toEqual({
      executable: "/bin/bash",
      args: ["-lc", "git status"],
      verbatimArguments: false,
    });
  });

  it("quotes the command for cmd on windows", () => {
    expect(buildShellInvocation("git status", "windows")).toEqual({
      executable: "cmd",
      args: ["/D", "/C", '"git status"'],
      verbatimArguments: true,
    });
  });
});
