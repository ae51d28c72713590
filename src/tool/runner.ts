/**
 * Inventory tool execution.
 */

import { execaSync } from "execa";
import { debug } from "../core/logger.js";
import { ToolExecutionError, ToolNotFoundError } from "../core/errors.js";
import { formatCommand, type ToolInvocation } from "./command.js";

export interface ToolRunOptions {
  timeout?: number;
  cwd?: string;
}

/**
 * Raw outcome of a child process, whether or not it succeeded.
 * `exitCode` is undefined when the process never ran to completion.
 */
export interface ToolResult {
  exitCode: number | undefined;
  stdout: string;
  stderr: string;
  failed: boolean;
  timedOut: boolean;
  signal?: string;
  message?: string;
}

/**
 * Output of a process that ran to completion.
 */
export interface ToolOutput {
  command: string;
  exitCode: number;
  stdout: string;
  stderr: string;
}

export type ToolExecutor = (
  file: string,
  args: readonly string[],
  options: ToolRunOptions
) => ToolResult;

/**
 * Default executor: runs the tool synchronously and never throws on
 * failure, leaving classification to `runTool`.
 */
export const execaExecutor: ToolExecutor = (file, args, options) => {
  const result = execaSync(file, args, {
    cwd: options.cwd,
    timeout: options.timeout,
    reject: false,
  });

  return {
    exitCode: result.exitCode,
    stdout: String(result.stdout ?? ""),
    stderr: String(result.stderr ?? ""),
    failed: result.failed,
    timedOut: result.timedOut,
    signal: result.signal,
    message: result instanceof Error ? result.message : undefined,
  };
};

/**
 * Run one invocation and return its output.
 *
 * A non-zero exit is returned, not thrown: whether that is fatal
 * depends on the decoder. Timeouts, signals and launch failures throw.
 */
export function runTool(
  invocation: ToolInvocation,
  options: ToolRunOptions = {},
  exec: ToolExecutor = execaExecutor
): ToolOutput {
  const command = formatCommand(invocation);
  debug(`Running: ${command}`);

  const result = exec(invocation.file, invocation.args, options);

  if (result.timedOut) {
    throw new ToolExecutionError(
      command,
      { stderr: result.stderr, timedOut: true },
      `facter command timed out after ${options.timeout ?? 0}ms: ${command}`
    );
  }

  if (result.exitCode === undefined) {
    if (result.signal) {
      throw new ToolExecutionError(
        command,
        { stderr: result.stderr },
        `facter command was terminated by ${result.signal}: ${command}`
      );
    }
    throw new ToolNotFoundError(command, invocation.file, result.message ?? "");
  }

  debug(`Exit code ${result.exitCode}: ${command}`);

  return {
    command,
    exitCode: result.exitCode,
    stdout: result.stdout,
    stderr: result.stderr,
  };
}
