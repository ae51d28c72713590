/**
 * Command line construction for the inventory tool.
 */

import type { ResolvedFactSourceOptions } from "../core/types.js";

export const FACTER_FLAGS = {
  json: "--json",
  puppet: "--puppet",
  externalDir: "--external-dir",
  legacy: "--show-legacy",
} as const;

export interface ToolInvocation {
  file: string;
  args: string[];
}

/**
 * Build the invocation for one query.
 *
 * Option flags come first, then any decoder-specific flags, and the
 * requested fact name always goes last.
 */
export function buildInvocation(
  options: ResolvedFactSourceOptions,
  decoderFlags: readonly string[] = [],
  key?: string
): ToolInvocation {
  const args: string[] = [];

  // Loading puppet facts may write into the home directory of the
  // running user even when puppet's own cache is off.
  if (options.includePuppet) {
    args.push(FACTER_FLAGS.puppet);
  }
  if (options.externalDir !== undefined) {
    args.push(FACTER_FLAGS.externalDir, options.externalDir);
  }
  if (options.includeLegacy) {
    args.push(FACTER_FLAGS.legacy);
  }
  args.push(...decoderFlags);
  if (key !== undefined) {
    args.push(key);
  }

  return { file: options.facterPath, args };
}

/**
 * Render an invocation for logs and error messages.
 */
export function formatCommand(invocation: ToolInvocation): string {
  return [invocation.file, ...invocation.args]
    .map((part) => (/[\s"']/.test(part) ? JSON.stringify(part) : part))
    .join(" ");
}
