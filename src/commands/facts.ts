/**
 * The facts command: print all facts, one value, or a subset.
 */

import { FactSourceError } from "../core/errors.js";
import { configureLogger, debug, error as logError, warn } from "../core/logger.js";
import type { FactSet } from "../core/types.js";
import { renderFactsJson, renderFactsText, renderFactValue } from "../render/index.js";
import { FactSource } from "../source/fact-source.js";
import type { ToolExecutor } from "../tool/runner.js";

export interface FactsCommandOptions {
  facterPath: string;
  externalDir?: string;
  puppet: boolean;
  legacy: boolean;
  timeout?: number;
  json: boolean;
  color: boolean;
  quiet: boolean;
  debug: boolean;
}

export interface FactsCommandDeps {
  exec?: ToolExecutor;
  /** Receives everything meant for stdout */
  print?: (text: string) => void;
}

/**
 * Run the command and return the process exit code.
 *
 * Missing facts in a multi-name query are warnings (silenced by
 * --quiet) but still make the exit code 1.
 */
export function runFactsCommand(
  facts: string[],
  options: FactsCommandOptions,
  deps: FactsCommandDeps = {}
): number {
  const print = deps.print ?? ((text: string) => console.log(text));
  configureLogger({ quiet: options.quiet, debug: options.debug });

  try {
    // Several names share one full run; a single name is queried directly.
    const source = new FactSource(
      {
        facterPath: options.facterPath,
        externalDir: options.externalDir,
        includePuppet: options.puppet,
        includeLegacy: options.legacy,
        timeout: options.timeout,
        cacheEnabled: facts.length > 1,
      },
      { exec: deps.exec }
    );
    debug(`Using ${source.toString()}`);

    if (facts.length === 0) {
      const all = source.all;
      print(options.json ? renderFactsJson(all) : renderFactsText(all, { color: options.color }));
      return 0;
    }

    if (facts.length === 1) {
      const value = source.lookup(facts[0], false);
      print(options.json ? JSON.stringify(value, null, 2) : renderFactValue(value));
      return 0;
    }

    const selected: FactSet = {};
    const missing: string[] = [];
    for (const name of facts) {
      if (source.has(name)) {
        selected[name] = source.lookup(name);
      } else {
        missing.push(name);
      }
    }

    print(
      options.json
        ? renderFactsJson(selected)
        : renderFactsText(selected, { color: options.color })
    );
    for (const name of missing) {
      warn(`Fact not found: ${name}`);
    }
    return missing.length > 0 ? 1 : 0;
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Report an error and pick the exit code for it.
 */
export function handleError(error: unknown): number {
  if (error instanceof FactSourceError) {
    logError(`Error: ${error.message}`);
    return error.exitCode;
  }

  if (error instanceof Error) {
    logError(`Unexpected error: ${error.message}`);
    if (process.env.DEBUG) {
      logError(error.stack ?? "");
    }
  } else {
    logError("An unexpected error occurred");
  }

  return 1;
}
