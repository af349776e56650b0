/**
 * Proof placeholders
 *
 * `sorry` and `admit` let a file compile without proving anything. The checker
 * only warns about them, so a successful compile is not enough to call a
 * buffer finished.
 */

import type { CompileResult, Diagnostic } from "../output/types.js";

export const SORRY_WARNING = /declaration uses 'sorry'/;

const PLACEHOLDER_TOKEN = /(?<![\w.'])(sorry|admit)(?![\w'])/g;

export interface PlaceholderUse {
  token: string;
  /** 1-based */
  line: number;
  /** 0-based */
  column: number;
}

/**
 * Blank out comments and string literals, keeping every offset and newline
 */
export function maskNonCode(content: string): string {
  let out = "";
  let depth = 0;
  let i = 0;

  while (i < content.length) {
    const pair = content.slice(i, i + 2);
    const ch = content.charAt(i);

    if (depth > 0) {
      // block comments nest
      if (pair === "/-" || pair === "-/") {
        depth += pair === "/-" ? 1 : -1;
        out += "  ";
        i += 2;
      } else {
        out += ch === "\n" ? "\n" : " ";
        i++;
      }
      continue;
    }

    if (pair === "/-") {
      depth = 1;
      out += "  ";
      i += 2;
    } else if (pair === "--") {
      const end = content.indexOf("\n", i);
      const stop = end === -1 ? content.length : end;
      out += " ".repeat(stop - i);
      i = stop;
    } else if (ch === '"') {
      let j = i + 1;
      while (j < content.length && content.charAt(j) !== '"') {
        j += content.charAt(j) === "\\" ? 2 : 1;
      }
      j = Math.min(j + 1, content.length);
      out += content.slice(i, j).replace(/[^\n]/g, " ");
      i = j;
    } else {
      out += ch;
      i++;
    }
  }

  return out;
}

/**
 * `sorry` and `admit` tokens in code, ignoring comments and strings
 */
export function findPlaceholders(content: string): PlaceholderUse[] {
  const uses: PlaceholderUse[] = [];
  maskNonCode(content)
    .split("\n")
    .forEach((text, index) => {
      for (const match of text.matchAll(PLACEHOLDER_TOKEN)) {
        uses.push({ token: match[1] ?? match[0], line: index + 1, column: match.index ?? 0 });
      }
    });
  return uses;
}

/**
 * Add a lint diagnostic per placeholder token to a successful compile in
 * which the checker reported no sorry warning. Other results are returned as is.
 */
export function annotatePlaceholders(result: CompileResult, content: string): CompileResult {
  if (!result.success || result.diagnostics.some((d) => SORRY_WARNING.test(d.message))) {
    return result;
  }
  const uses = findPlaceholders(content);
  if (uses.length === 0) return result;

  const lint = uses.map(
    (use): Diagnostic => ({
      severity: "error",
      message: `proof uses '${use.token}'`,
      line: use.line,
      column: use.column,
      kind: "lint",
    })
  );
  return { ...result, diagnostics: [...result.diagnostics, ...lint] };
}

/**
 * Diagnostics that keep a compiling buffer from counting as proved
 */
export function placeholderDiagnostics(result: CompileResult): Diagnostic[] {
  return result.diagnostics.filter((d) => d.kind === "lint" || SORRY_WARNING.test(d.message));
}
