/**
 * Missing Import Rule
 *
 * Handles: unknown identifier 'Real.log' when the module declaring it is
 * known and not yet imported.
 */

import type { FixRule } from "../rules.js";
import { insertAfterImports } from "../rules.js";
import importTable from "./imports.json" with { type: "json" };

const UNKNOWN_NAME_PATTERN = /unknown (?:identifier|constant|namespace) ['`‘’]([^'`‘’\s]+)['`’]/;

const KNOWN_MODULES: ReadonlyMap<string, string> = new Map(Object.entries(importTable));

/**
 * Module that declares a name, trying the full name then its dotted prefixes
 */
export function moduleFor(name: string, table: ReadonlyMap<string, string> = KNOWN_MODULES): string | undefined {
  const parts = name.split(".");
  for (let n = parts.length; n > 0; n--) {
    const module = table.get(parts.slice(0, n).join("."));
    if (module) return module;
  }
  return undefined;
}

export function hasImport(content: string, module: string): boolean {
  const escaped = module.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  return new RegExp(`^\\s*import\\s+${escaped}\\s*$`, "m").test(content);
}

function requiredModule(message: string, content: string): string | null {
  const match = UNKNOWN_NAME_PATTERN.exec(message);
  if (!match || !match[1]) return null;
  const module = moduleFor(match[1]);
  if (!module || hasImport(content, module)) return null;
  return module;
}

export const missingImportRule: FixRule = {
  id: "missingImport",
  description: "Import the module that declares an unknown name",
  messagePatterns: [UNKNOWN_NAME_PATTERN],

  matches(ctx) {
    return requiredModule(ctx.diagnostic.message, ctx.content) !== null;
  },

  build(ctx) {
    const module = requiredModule(ctx.diagnostic.message, ctx.content);
    if (!module) {
      throw new Error("missingImport.build called on a diagnostic it does not match");
    }
    return {
      description: `Add import ${module}`,
      edit: insertAfterImports(ctx.content, `import ${module}`),
    };
  },
};
