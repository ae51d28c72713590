/**
 * Output decoding strategies, tried in order by the fact source.
 */

import { StructuredDecodeError, ToolExecutionError } from "../core/errors.js";
import type { FactSet, FactValue, QueryResult } from "../core/types.js";
import { FACTER_FLAGS } from "../tool/command.js";
import type { ToolOutput } from "../tool/runner.js";
import { parseFactText } from "./text-parser.js";

export interface FactDecoder {
  readonly name: string;
  /** Flags this decoder needs on the command line */
  readonly flags: readonly string[];
  /**
   * Decode the output of one run. Throw to reject it; the fact source
   * moves on to the next decoder unless this one was the last.
   */
  decode(output: ToolOutput, key?: string): QueryResult;
}

function isJsonObject(value: unknown): value is FactSet {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Decodes `facter --json` output. Preferred because values keep their
 * types (numbers, booleans, nested objects).
 */
export const jsonDecoder: FactDecoder = {
  name: "json",
  flags: [FACTER_FLAGS.json],
  decode(output, key) {
    if (output.exitCode !== 0) {
      throw new StructuredDecodeError(
        "json",
        `exit code ${output.exitCode}: ${output.stderr.trim()}`
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(output.stdout);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new StructuredDecodeError("json", reason);
    }

    if (!isJsonObject(parsed)) {
      throw new StructuredDecodeError("json", "top-level value is not an object");
    }

    if (key === undefined) {
      return parsed;
    }
    const value: FactValue | undefined = Object.hasOwn(parsed, key)
      ? parsed[key]
      : undefined;
    return value;
  },
};

/**
 * Decodes plain `key => value` output. Always available, so it is the
 * last resort and its failures are final.
 */
export const textDecoder: FactDecoder = {
  name: "text",
  flags: [],
  decode(output, key) {
    if (output.exitCode !== 0) {
      throw new ToolExecutionError(output.command, {
        stderr: output.stderr,
        exitCode: output.exitCode,
      });
    }
    if (key !== undefined) {
      return output.stdout.trim();
    }
    return parseFactText(output.stdout);
  },
};

export const DEFAULT_DECODERS: readonly FactDecoder[] = [jsonDecoder, textDecoder];
