/**
 * Option defaults and resolution.
 */

import { FactSourceError } from "./errors.js";
import type { FactSourceOptions, ResolvedFactSourceOptions } from "./types.js";

export const DEFAULT_FACTER_PATH = "facter";

export const DEFAULT_FACT_SOURCE_OPTIONS: FactSourceOptions = {
  facterPath: DEFAULT_FACTER_PATH,
  cacheEnabled: true,
  includeLegacy: false,
  includePuppet: false,
};

/**
 * Merge user options over the defaults and freeze the result.
 * Keys explicitly set to undefined fall back to the default.
 */
export function resolveOptions(
  options: Partial<FactSourceOptions> = {}
): ResolvedFactSourceOptions {
  const resolved: FactSourceOptions = {
    facterPath: options.facterPath ?? DEFAULT_FACT_SOURCE_OPTIONS.facterPath,
    cacheEnabled: options.cacheEnabled ?? DEFAULT_FACT_SOURCE_OPTIONS.cacheEnabled,
    includeLegacy: options.includeLegacy ?? DEFAULT_FACT_SOURCE_OPTIONS.includeLegacy,
    includePuppet: options.includePuppet ?? DEFAULT_FACT_SOURCE_OPTIONS.includePuppet,
  };

  if (resolved.facterPath.trim() === "") {
    throw new FactSourceError("facter path must not be empty");
  }
  if (options.externalDir !== undefined) {
    resolved.externalDir = options.externalDir;
  }
  if (options.timeout !== undefined) {
    if (!Number.isInteger(options.timeout) || options.timeout <= 0) {
      throw new FactSourceError(
        `Invalid timeout: ${options.timeout}\n` +
          "Timeout must be a positive number of milliseconds."
      );
    }
    resolved.timeout = options.timeout;
  }
  if (options.cwd !== undefined) {
    resolved.cwd = options.cwd;
  }

  return Object.freeze(resolved);
}
