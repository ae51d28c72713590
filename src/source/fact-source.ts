/**
 * Fact source: a dictionary-like view over facter output with an
 * optional in-memory cache.
 */

import { resolveOptions } from "../core/config.js";
import {
  FactNotFoundError,
  FactSourceError,
  StructuredDecodeError,
  ToolExecutionError,
} from "../core/errors.js";
import { debug } from "../core/logger.js";
import {
  isFactSet,
  type FactMap,
  type FactSet,
  type FactSourceOptions,
  type FactValue,
  type QueryResult,
  type ResolvedFactSourceOptions,
} from "../core/types.js";
import { DEFAULT_DECODERS, type FactDecoder } from "../decode/decoders.js";
import { buildInvocation } from "../tool/command.js";
import { execaExecutor, runTool, type ToolExecutor } from "../tool/runner.js";

export interface FactSourceDeps {
  exec?: ToolExecutor;
  decoders?: readonly FactDecoder[];
}

/**
 * Errors that make a decoder give way to the next one.
 */
function isRecoverable(error: unknown): boolean {
  return error instanceof StructuredDecodeError || error instanceof ToolExecutionError;
}

/**
 * Runs facter and exposes its facts through lookups, views and
 * serialization.
 *
 * Every operation that needs facts runs the tool synchronously. With
 * caching enabled the first full run is kept and serves all later reads
 * until `clearCache()`. Instances are not safe for concurrent use.
 */
export class FactSource implements FactMap {
  readonly options: ResolvedFactSourceOptions;
  private cache: FactSet | null = null;
  private readonly exec: ToolExecutor;
  private readonly decoders: readonly FactDecoder[];

  constructor(options: Partial<FactSourceOptions> = {}, deps: FactSourceDeps = {}) {
    this.options = resolveOptions(options);
    this.exec = deps.exec ?? execaExecutor;
    this.decoders = deps.decoders ?? DEFAULT_DECODERS;
  }

  get cacheEnabled(): boolean {
    return this.options.cacheEnabled;
  }

  /**
   * Whether a fact set is currently held. Never runs the tool.
   */
  get hasCache(): boolean {
    return this.cache !== null;
  }

  // ==========================================================================
  // Invocation
  // ==========================================================================

  /**
   * Run facter once per decoder until one accepts the output.
   *
   * Returns the full fact set when no key is given, otherwise the value
   * of that fact (undefined when structured output lacks it).
   */
  runQuery(key?: string): QueryResult {
    const lastIndex = this.decoders.length - 1;

    for (const [index, decoder] of this.decoders.entries()) {
      try {
        return this.runDecoder(decoder, key);
      } catch (error) {
        if (index === lastIndex || !isRecoverable(error)) {
          throw error;
        }
        const reason = error instanceof Error ? error.message : String(error);
        debug(`${decoder.name} output unavailable, falling back: ${reason}`);
      }
    }

    throw new FactSourceError("No fact decoders configured");
  }

  private runDecoder(decoder: FactDecoder, key?: string): QueryResult {
    const invocation = buildInvocation(this.options, decoder.flags, key);
    const output = runTool(
      invocation,
      { timeout: this.options.timeout, cwd: this.options.cwd },
      this.exec
    );
    return decoder.decode(output, key);
  }

  // ==========================================================================
  // Cache
  // ==========================================================================

  /**
   * Run facter for all facts and hold the result.
   */
  buildCache(): void {
    const result = this.runQuery();
    this.cache = isFactSet(result) ? result : {};
  }

  clearCache(): void {
    this.cache = null;
  }

  /**
   * Build the cache if needed. Returns false without side effects when
   * caching is disabled.
   */
  ensureCache(): boolean {
    if (!this.options.cacheEnabled) {
      return false;
    }
    if (this.cache === null) {
      this.buildCache();
    }
    return true;
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  /**
   * Return the value of a fact.
   * Pass `useCache = false` to query facter directly for this one fact.
   *
   * @throws FactNotFoundError when the fact is not available
   */
  lookup(name: string, useCache: boolean = true): FactValue {
    if (!useCache || !this.ensureCache() || this.cache === null) {
      const value = this.runQuery(name);
      if (value === undefined || value === null || value === "") {
        throw new FactNotFoundError(name);
      }
      return value;
    }

    if (!Object.hasOwn(this.cache, name)) {
      throw new FactNotFoundError(name);
    }
    return this.cache[name];
  }

  /**
   * Like `lookup`, but returns `defaultValue` for a missing fact.
   */
  get(name: string): FactValue | undefined;
  get<T>(name: string, defaultValue: T): FactValue | T;
  get<T>(name: string, defaultValue?: T): FactValue | T | undefined {
    try {
      return this.lookup(name);
    } catch (error) {
      if (error instanceof FactNotFoundError) {
        return defaultValue;
      }
      throw error;
    }
  }

  at(name: string): FactValue {
    return this.lookup(name);
  }

  has(name: string): boolean {
    return Object.hasOwn(this.all, name);
  }

  /**
   * All facts. When cached this is the cached object itself; copy it
   * before mutating.
   */
  get all(): FactSet {
    if (!this.ensureCache() || this.cache === null) {
      const result = this.runQuery();
      return isFactSet(result) ? result : {};
    }
    return this.cache;
  }

  keys(): string[] {
    return Object.keys(this.all);
  }

  values(): FactValue[] {
    return Object.values(this.all);
  }

  entries(): Array<[string, FactValue]> {
    return Object.entries(this.all);
  }

  items(): Array<[string, FactValue]> {
    return this.entries();
  }

  [Symbol.iterator](): Iterator<string> {
    return this.keys()[Symbol.iterator]();
  }

  /**
   * Serialize all facts to JSON text.
   *
   * Returns a string, so `JSON.stringify(source)` or a source nested in
   * another object is encoded twice. Serialize `source.all` instead.
   */
  toJSON(): string {
    return JSON.stringify(this.all);
  }

  toString(): string {
    return (
      `<FactSource path=${JSON.stringify(this.options.facterPath)} ` +
      `cacheEnabled=${this.options.cacheEnabled} ` +
      `cacheActive=${this.cache !== null}>`
    );
  }
}

/**
 * Read a single fact with a fresh, uncached source.
 */
export function getFact<T = undefined>(
  name: string,
  defaultValue?: T,
  options: Partial<FactSourceOptions> = {}
): FactValue | T | undefined {
  const source = new FactSource({ ...options, cacheEnabled: false });
  return source.get(name, defaultValue);
}
