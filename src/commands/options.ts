/**
 * Argument parsers for command options.
 */

import { InvalidArgumentError } from "commander";

export function parseTimeout(value: string): number {
  const timeout = Number(value);
  if (!Number.isInteger(timeout) || timeout <= 0) {
    throw new InvalidArgumentError("Timeout must be a positive integer.");
  }
  return timeout;
}
