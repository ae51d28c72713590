/**
 * Tests for facter process execution.
 */

import { afterEach, describe, expect, it, vi } from "vitest";
import { ToolExecutionError, ToolNotFoundError } from "../src/core/errors.js";
import { createFakeExec } from "./fixtures/index.js";

const execaSyncMock = vi.hoisted(() => vi.fn());

vi.mock("execa", () => ({
  execaSync: execaSyncMock,
}));

const { execaExecutor, runTool } = await import("../src/tool/runner.js");

describe("execaExecutor", () => {
  afterEach(() => {
    execaSyncMock.mockReset();
  });

  it("should run facter without rejecting on failure", () => {
    execaSyncMock.mockReturnValue({
      exitCode: 0,
      stdout: "{}",
      stderr: "",
      failed: false,
      timedOut: false,
    });

    execaExecutor("facter", ["--json"], { timeout: 500, cwd: "/srv" });

    expect(execaSyncMock).toHaveBeenCalledWith("facter", ["--json"], {
      cwd: "/srv",
      timeout: 500,
      reject: false,
    });
  });

  it("should copy the process result", () => {
    execaSyncMock.mockReturnValue({
      exitCode: 1,
      stdout: "",
      stderr: "boom",
      failed: true,
      timedOut: false,
    });

    const result = execaExecutor("facter", [], {});

    expect(result).toEqual({
      exitCode: 1,
      stdout: "",
      stderr: "boom",
      failed: true,
      timedOut: false,
    });
  });

  it("should keep the message of a launch failure", () => {
    execaSyncMock.mockReturnValue(
      Object.assign(new Error("spawnSync facter ENOENT"), {
        exitCode: undefined,
        stdout: undefined,
        stderr: undefined,
        failed: true,
        timedOut: false,
      })
    );

    const result = execaExecutor("facter", [], {});

    expect(result.exitCode).toBeUndefined();
    expect(result.stdout).toBe("");
    expect(result.message).toBe("spawnSync facter ENOENT");
  });
});

describe("runTool", () => {
  it("should return output of a successful run", () => {
    const exec = createFakeExec({ stdout: "architecture => x86_64" });

    const output = runTool({ file: "facter", args: ["architecture"] }, {}, exec);

    expect(output).toEqual({
      command: "facter architecture",
      exitCode: 0,
      stdout: "architecture => x86_64",
      stderr: "",
    });
  });

  it("should return a non-zero exit instead of throwing", () => {
    const exec = createFakeExec({ exitCode: 3, stderr: "unknown option" });

    const output = runTool({ file: "facter", args: ["--json"] }, {}, exec);

    expect(output.exitCode).toBe(3);
    expect(output.stderr).toBe("unknown option");
  });

  it("should pass timeout and working directory to the executor", () => {
    const exec = createFakeExec({ stdout: "" });

    runTool({ file: "facter", args: [] }, { timeout: 1000, cwd: "/tmp" }, exec);

    expect(exec).toHaveBeenCalledWith("facter", [], { timeout: 1000, cwd: "/tmp" });
  });

  it("should throw ToolNotFoundError when facter cannot be launched", () => {
    const exec = createFakeExec({ launchError: "spawnSync /nonexistent/facter ENOENT" });

    try {
      runTool({ file: "/nonexistent/facter", args: [] }, {}, exec);
      expect.unreachable();
    } catch (error) {
      if (!(error instanceof ToolNotFoundError)) throw error;
      expect(error).toBeInstanceOf(ToolExecutionError);
      expect(error.message).toBe(
        "Unable to launch facter executable: /nonexistent/facter\n" +
          "Please install facter or pass its location explicitly.\n" +
          "spawnSync /nonexistent/facter ENOENT"
      );
    }
  });

  it("should throw ToolExecutionError on timeout", () => {
    const exec = createFakeExec({ timedOut: true });

    try {
      runTool({ file: "facter", args: ["--json"] }, { timeout: 250 }, exec);
      expect.unreachable();
    } catch (error) {
      if (!(error instanceof ToolExecutionError)) throw error;
      expect(error).not.toBeInstanceOf(ToolNotFoundError);
      expect(error.timedOut).toBe(true);
      expect(error.message).toBe("facter command timed out after 250ms: facter --json");
    }
  });

  it("should throw ToolExecutionError when terminated by a signal", () => {
    const exec = vi.fn(() => ({
      exitCode: undefined,
      stdout: "",
      stderr: "",
      failed: true,
      timedOut: false,
      signal: "SIGKILL",
    }));

    expect(() => runTool({ file: "facter", args: [] }, {}, exec)).toThrow(
      "facter command was terminated by SIGKILL: facter"
    );
  });
});
