/**
 * Plain `key => value` renderer for the terminal.
 */

import chalk from "chalk";
import type { FactSet, FactValue } from "../core/types.js";
import { FACT_SEPARATOR } from "../decode/text-parser.js";

const colors = {
  key: chalk.cyan,
  separator: chalk.dim,
};

export interface TextRenderOptions {
  color?: boolean;
}

/**
 * Render a single value: strings as-is, everything else as compact JSON.
 */
export function renderFactValue(value: FactValue): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

/**
 * Render facts one per line in the order of the mapping.
 */
export function renderFactsText(facts: FactSet, options: TextRenderOptions = {}): string {
  const color = options.color ?? false;

  return Object.entries(facts)
    .map(([key, value]) => {
      const rendered = renderFactValue(value);
      if (!color) {
        return `${key}${FACT_SEPARATOR}${rendered}`;
      }
      return `${colors.key(key)}${colors.separator(FACT_SEPARATOR)}${rendered}`;
    })
    .join("\n");
}
