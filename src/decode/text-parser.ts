/**
 * Parser for facter's plain `key => value` output.
 */

import { EOL } from "node:os";
import { FactParseError } from "../core/errors.js";
import type { FactSet } from "../core/types.js";

export const FACT_SEPARATOR = " => ";

/**
 * Yield `[key, value]` pairs from `key => value` text, in the order the
 * keys appear.
 *
 * Lines without the separator continue the previous value and are
 * joined to it with the platform line ending. Empty lines are skipped.
 * An empty key (` => x`) opens nothing: its value is dropped and a
 * continuation line after it is an error.
 *
 * @example
 * [...parseFactLines("foo => bar\nbaz\nqux => 2")]
 * // [["foo", `bar${EOL}baz`], ["qux", "2"]]
 *
 * @throws FactParseError when a continuation line comes before any key
 */
export function* parseFactLines(text: string): Generator<[string, string]> {
  // "" means no key is open
  let currentKey = "";
  let currentValue: string[] = [];

  for (const line of text.split(/\r\n|\r|\n/)) {
    if (line === "") continue;

    const separatorIndex = line.indexOf(FACT_SEPARATOR);
    if (separatorIndex === -1) {
      if (currentKey === "") {
        throw new FactParseError(line);
      }
      currentValue.push(line);
      continue;
    }

    if (currentKey !== "") {
      yield [currentKey, currentValue.join(EOL)];
    }
    currentKey = line.slice(0, separatorIndex);
    currentValue = [line.slice(separatorIndex + FACT_SEPARATOR.length)];
  }

  if (currentKey !== "") {
    yield [currentKey, currentValue.join(EOL)];
  }
}

/**
 * Parse `key => value` text into a fact set. Later duplicates win.
 */
export function parseFactText(text: string): FactSet {
  const facts: FactSet = {};
  for (const [key, value] of parseFactLines(text)) {
    facts[key] = value;
  }
  return facts;
}
