/**
 * Deprecated Alias Rule
 *
 * Handles: `Nat.foo` has been deprecated, use `Nat.bar` instead
 *
 * The checker reports deprecations as warnings, which never block a compile.
 * The rule only fires when they are promoted to errors, as under
 * `set_option warningAsError true`.
 */

import type { FixRule } from "../rules.js";
import { findIdentifierOnLine } from "../rules.js";
import { renameEdit } from "./rename-suggestion.js";

const DEPRECATION_PATTERN = /`([^`\s]+)` has been deprecated[,:]?\s*[Uu]se `([^`\s]+)` instead/;

export function parseDeprecation(message: string): { from: string; to: string } | null {
  const match = DEPRECATION_PATTERN.exec(message);
  if (!match || !match[1] || !match[2] || match[1] === match[2]) return null;
  return { from: match[1], to: match[2] };
}

export const deprecatedAliasRule: FixRule = {
  id: "deprecatedAlias",
  description: "Replace a deprecated name with its replacement",
  messagePatterns: [/has been deprecated/],

  matches(ctx) {
    const deprecation = parseDeprecation(ctx.diagnostic.message);
    return deprecation !== null && findIdentifierOnLine(ctx, deprecation.from) !== -1;
  },

  build(ctx) {
    const deprecation = parseDeprecation(ctx.diagnostic.message);
    if (!deprecation) {
      throw new Error("deprecatedAlias.build called on a diagnostic it does not match");
    }
    return renameEdit(ctx, deprecation.from, deprecation.to);
  },
};
