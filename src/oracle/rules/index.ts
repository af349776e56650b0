/**
 * Built-in Fix Rules
 *
 * Registration order is priority order.
 */

import type { FixRule } from "../rules.js";
import { RuleEngine } from "../rules.js";
import { renameSuggestionRule } from "./rename-suggestion.js";
import { deprecatedAliasRule } from "./deprecated-alias.js";
import { missingImportRule } from "./missing-import.js";
import { openClassicalRule } from "./open-classical.js";

export const builtinRules: readonly FixRule[] = [
  renameSuggestionRule,
  deprecatedAliasRule,
  missingImportRule,
  openClassicalRule,
];

/**
 * Engine preloaded with the built-in rules
 */
export function createDefaultEngine(): RuleEngine {
  return new RuleEngine(builtinRules);
}

export { renameSuggestionRule, deprecatedAliasRule, missingImportRule, openClassicalRule };
