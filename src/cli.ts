#!/usr/bin/env node
/**
 * fact-source CLI entry point.
 */

import { Command } from "commander";
import { parseTimeout, runFactsCommand, type FactsCommandOptions } from "./commands/index.js";
import { getVersion } from "./core/version.js";

const program = new Command();

program
  .name("fact-source")
  .description("Print system facts collected by facter")
  .version(await getVersion())
  .argument("[facts...]", "Fact names to print (all facts when omitted)")
  .option("--facter-path <path>", "facter executable to run", "facter")
  .option("--external-dir <dir>", "Directory of external facts")
  .option("--puppet", "Include puppet facts", false)
  .option("--legacy", "Include legacy facts", false)
  .option("--timeout <ms>", "Kill facter after this many milliseconds", parseTimeout)
  .option("--json", "Output JSON", false)
  .option("--no-color", "Disable colored output")
  .option("-q, --quiet", "Suppress warnings", false)
  .option("--debug", "Print diagnostic messages", false)
  .action((facts: string[], options: FactsCommandOptions) => {
    process.exit(runFactsCommand(facts, options));
  });

program.parse();
