/**
 * fact-source library exports.
 *
 * This module exports the fact source and its building blocks for
 * programmatic use.
 */

// Core types, errors and configuration
export * from "./core/types.js";
export * from "./core/errors.js";
export { DEFAULT_FACT_SOURCE_OPTIONS, DEFAULT_FACTER_PATH, resolveOptions } from "./core/config.js";
export { configureLogger } from "./core/logger.js";

// Fact source
export { FactSource, getFact, type FactSourceDeps } from "./source/fact-source.js";

// Tool invocation
export { buildInvocation, formatCommand, FACTER_FLAGS, type ToolInvocation } from "./tool/command.js";
export {
  execaExecutor,
  runTool,
  type ToolExecutor,
  type ToolOutput,
  type ToolResult,
  type ToolRunOptions,
} from "./tool/runner.js";

// Decoders
export * from "./decode/index.js";

// Renderers
export * from "./render/index.js";
