/**
 * Custom error classes for fact-source.
 */

export class FactSourceError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = 1
  ) {
    super(message);
    this.name = "FactSourceError";
  }
}

export class FactNotFoundError extends FactSourceError {
  constructor(public readonly fact: string) {
    super(`Fact not found: ${fact}`, 1);
    this.name = "FactNotFoundError";
  }
}

/**
 * Raised when `key => value` output starts with a continuation line.
 */
export class FactParseError extends FactSourceError {
  constructor(public readonly line: string) {
    super(
      `Unable to parse facter output: continuation line before any fact\n` +
        `  ${line}`,
      1
    );
    this.name = "FactParseError";
  }
}

export interface ToolExecutionDetails {
  stderr?: string;
  exitCode?: number;
  timedOut?: boolean;
}

export class ToolExecutionError extends FactSourceError {
  public readonly stderr: string;
  public readonly toolExitCode: number | undefined;
  public readonly timedOut: boolean;

  constructor(
    public readonly command: string,
    details: ToolExecutionDetails = {},
    message?: string
  ) {
    const stderr = details.stderr ?? "";
    super(message ?? `facter command failed: ${command}\n${stderr}`, 1);
    this.name = "ToolExecutionError";
    this.stderr = stderr;
    this.toolExitCode = details.exitCode;
    this.timedOut = details.timedOut ?? false;
  }
}

export class ToolNotFoundError extends ToolExecutionError {
  constructor(command: string, path: string, reason: string = "") {
    super(
      command,
      { stderr: reason },
      `Unable to launch facter executable: ${path}\n` +
        "Please install facter or pass its location explicitly." +
        (reason ? `\n${reason}` : "")
    );
    this.name = "ToolNotFoundError";
  }
}

/**
 * Structured output could not be decoded. Caught by the decoder chain,
 * which moves on to the next strategy.
 */
export class StructuredDecodeError extends FactSourceError {
  constructor(
    public readonly decoder: string,
    reason: string
  ) {
    super(`${decoder} decoding failed: ${reason}`, 1);
    this.name = "StructuredDecodeError";
  }
}
