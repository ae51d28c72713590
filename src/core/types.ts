/**
 * Core types for fact-source facts, options and the read interface.
 */

// ============================================================================
// Fact Values
// ============================================================================

export type FactScalar = string | number | boolean | null;

/**
 * A JSON-shaped fact value as emitted by the inventory tool.
 */
export type FactValue = FactScalar | FactValue[] | { [key: string]: FactValue };

/**
 * Complete mapping of fact names to values for one invocation.
 */
export type FactSet = Record<string, FactValue>;

/**
 * Result of a single query: a full fact set, one value, or nothing
 * when a requested fact is missing from structured output.
 */
export type QueryResult = FactSet | FactValue | undefined;

// ============================================================================
// Options
// ============================================================================

export interface FactSourceOptions {
  /** Executable to run. Bare names are resolved through PATH. */
  facterPath: string;
  /** Directory of external facts passed with --external-dir */
  externalDir?: string;
  cacheEnabled: boolean;
  /** Include the legacy fact namespace (--show-legacy) */
  includeLegacy: boolean;
  /** Include puppet-provided facts (--puppet) */
  includePuppet: boolean;
  /**
   * Kill the tool after this many milliseconds. Applies to each run, so
   * a query that falls back from JSON to text can block for about twice
   * this long.
   */
  timeout?: number;
  /** Working directory of the child process */
  cwd?: string;
}

export type ResolvedFactSourceOptions = Readonly<FactSourceOptions>;

// ============================================================================
// Read Interface
// ============================================================================

/**
 * Dictionary-like read surface over a fact set.
 */
export interface FactMap extends Iterable<string> {
  readonly all: FactSet;
  lookup(name: string, useCache?: boolean): FactValue;
  get(name: string): FactValue | undefined;
  get<T>(name: string, defaultValue: T): FactValue | T;
  at(name: string): FactValue;
  has(name: string): boolean;
  keys(): string[];
  values(): FactValue[];
  entries(): Array<[string, FactValue]>;
  items(): Array<[string, FactValue]>;
  toJSON(): string;
}

/**
 * Check whether a query result is a fact set (a plain JSON object).
 */
export function isFactSet(value: QueryResult): value is FactSet {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
