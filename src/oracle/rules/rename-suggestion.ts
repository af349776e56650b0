/**
 * Rename Suggestion Rule
 *
 * Handles: unknown identifier 'foo' ... did you mean 'goo'?
 * Renames the occurrence at the diagnostic position to the suggestion.
 */

import type { FixRule, RuleContext, RuleEdit } from "../rules.js";
import { findIdentifierOnLine } from "../rules.js";

/** Opening or closing quote around a name in checker messages */
const Q = "['`‘’]";
const NAME = "([^'`‘’\\s]+)";

const SUGGESTION_PATTERN = new RegExp(
  `unknown (?:identifier|constant) ${Q}${NAME}${Q}[\\s\\S]*?did you mean ${Q}${NAME}${Q}`
);

export function parseSuggestion(message: string): { from: string; to: string } | null {
  const match = SUGGESTION_PATTERN.exec(message);
  if (!match || !match[1] || !match[2] || match[1] === match[2]) return null;
  return { from: match[1], to: match[2] };
}

/**
 * Shared by the rename-style rules: replace `from` with `to` near the diagnostic
 */
export function renameEdit(ctx: RuleContext, from: string, to: string): RuleEdit {
  const at = findIdentifierOnLine(ctx, from);
  return {
    description: `Rename '${from}' to '${to}'`,
    edit: { type: "span", start: at, end: at + from.length, expected: from, replacement: to },
  };
}

export const renameSuggestionRule: FixRule = {
  id: "renameSuggestion",
  description: "Rename an unknown identifier to the checker's suggestion",
  messagePatterns: [/did you mean/],

  matches(ctx) {
    const suggestion = parseSuggestion(ctx.diagnostic.message);
    return suggestion !== null && findIdentifierOnLine(ctx, suggestion.from) !== -1;
  },

  build(ctx) {
    const suggestion = parseSuggestion(ctx.diagnostic.message);
    if (!suggestion) {
      throw new Error("renameSuggestion.build called on a diagnostic it does not match");
    }
    return renameEdit(ctx, suggestion.from, suggestion.to);
  },
};
