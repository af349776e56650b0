/**
 * Open Classical Rule
 *
 * Classical reasoning principles are used unqualified far more often than
 * they are opened. Adds `open Classical` after the imports.
 */

import type { FixRule } from "../rules.js";
import { insertAfterImports } from "../rules.js";

const UNKNOWN_NAME_PATTERN = /unknown (?:identifier|constant|namespace) ['`‘’]([^'`‘’\s]+)['`’]/;

const CLASSICAL_NAMES: ReadonlySet<string> = new Set([
  "Classical",
  "em",
  "byContradiction",
  "byCases",
  "choice",
  "not_not",
]);

const OPEN_CLASSICAL = /^\s*open\s+(?:[\w.]+\s+)*Classical\b/m;

export const openClassicalRule: FixRule = {
  id: "openClassical",
  description: "Open the Classical namespace for unqualified classical lemmas",
  messagePatterns: [UNKNOWN_NAME_PATTERN],

  matches(ctx) {
    const match = UNKNOWN_NAME_PATTERN.exec(ctx.diagnostic.message);
    return (
      match !== null &&
      match[1] !== undefined &&
      CLASSICAL_NAMES.has(match[1]) &&
      !OPEN_CLASSICAL.test(ctx.content)
    );
  },

  build(ctx) {
    return {
      description: "Add open Classical",
      edit: insertAfterImports(ctx.content, "open Classical"),
    };
  },
};
