/**
 * JSON facts renderer.
 */

import type { FactSet } from "../core/types.js";

/**
 * Render facts as indented JSON output.
 */
export function renderFactsJson(facts: FactSet): string {
  return JSON.stringify(facts, null, 2);
}
