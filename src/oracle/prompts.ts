/**
 * Prompt construction for the generative adapter
 */

import type { Diagnostic, GenerationMode, GenerationRequest } from "../output/types.js";
import { formatDiagnostics } from "../toolchain/parser.js";
import type { TokenCounter } from "./tokens.js";

/** Diagnostics beyond this count are summarized instead of listed */
export const MAX_PROMPT_DIAGNOSTICS = 20;

export const SYSTEM_PROMPTS: Record<GenerationMode, string> = {
  repair: "You are a precise Lean 4 repair agent. You answer with a single JSON object and nothing else.",
  extend:
    "You extend Lean 4 files with thematically consistent new results. You answer with a single JSON object and nothing else.",
  document:
    "You add documentation and comments to Lean 4 files without changing their semantics. You answer with a single JSON object and nothing else.",
};

const RESPONSE_FORMATS: Record<GenerationMode, string> = {
  repair: `Respond with ONE of:
{"kind": "replace", "line": <line of the text>, "original": "<exact text from the file>", "replacement": "<new text>", "confidence": <0..1>}
{"kind": "file", "content": "<complete corrected file>", "confidence": <0..1>}
Prefer "replace" with the smallest "original" that is unique in the file. "original" must be copied verbatim, without line numbers.`,
  extend: `Respond with ONE of:
{"kind": "append", "content": "<new declarations to add at the end of the file>", "confidence": <0..1>}
{"kind": "file", "content": "<complete extended file, starting with the existing content unchanged>", "confidence": <0..1>}`,
  document: `Respond with:
{"kind": "file", "content": "<complete documented file>"}`,
};

/** Excerpts cannot be rebuilt into a whole file, so only span replacements are offered */
const EXCERPT_REPAIR_FORMAT = `Respond with:
{"kind": "replace", "line": <line of the text>, "original": "<exact text from the file>", "replacement": "<new text>", "confidence": <0..1>}
Use the smallest "original" that is unique in the file. "original" must be copied verbatim, without line numbers.`;

export interface ContextWindow {
  text: string;
  /** True when only the lines around the diagnostics are included */
  partial: boolean;
}

/**
 * Choose how much of the file to send: all of it when it fits the token
 * budget, otherwise numbered excerpts around each diagnostic.
 */
export function buildContextWindow(
  content: string,
  diagnostics: readonly Diagnostic[],
  options: { maxTokens: number; contextLines: number; countTokens: TokenCounter }
): ContextWindow {
  if (options.countTokens(content) <= options.maxTokens || diagnostics.length === 0) {
    return { text: content, partial: false };
  }

  const lines = content.split("\n");
  const keep = new Set<number>();
  for (const d of diagnostics) {
    const from = Math.max(1, d.line - options.contextLines);
    const to = Math.min(lines.length, d.line + options.contextLines);
    for (let n = from; n <= to; n++) keep.add(n);
  }

  const out: string[] = [];
  let previous = 0;
  for (const n of [...keep].sort((a, b) => a - b)) {
    if (n !== previous + 1) out.push("...");
    out.push(`${String(n).padStart(5)}| ${lines[n - 1] ?? ""}`);
    previous = n;
  }
  if (previous < lines.length) out.push("...");

  return { text: out.join("\n"), partial: true };
}

function diagnosticsSection(diagnostics: readonly Diagnostic[]): string {
  if (diagnostics.length === 0) return "(no diagnostics available)";
  const listed = formatDiagnostics(diagnostics.slice(0, MAX_PROMPT_DIAGNOSTICS), "File.lean");
  const rest = diagnostics.length - MAX_PROMPT_DIAGNOSTICS;
  return rest > 0 ? `${listed}\n(${rest} more diagnostics omitted)` : listed;
}

/**
 * Build the user prompt for a request
 */
export function buildPrompt(request: GenerationRequest, window: ContextWindow): string {
  const fileSection = window.partial
    ? `Excerpts of the file (line-numbered, "..." marks omitted lines):\n\n${window.text}`
    : `Here is the file:\n\n\`\`\`lean\n${window.text}\n\`\`\``;

  switch (request.mode) {
    case "repair":
      return `The following Lean 4 file fails to compile with these diagnostics:

${diagnosticsSection(request.diagnostics)}

${fileSection}

Propose a single fix that resolves the diagnostics. Add imports if they are needed.

${window.partial ? EXCERPT_REPAIR_FORMAT : RESPONSE_FORMATS.repair}`;

    case "extend":
      return `The following Lean 4 file compiles and develops results in the theme: "${request.theme ?? ""}".
Add a main new result or definition that is not already in the file, together with any lemmas or definitions its proof needs.
Follow the comments in the file and continue its logical order. The result must compile.

${fileSection}

${RESPONSE_FORMATS.extend}`;

    case "document":
      return `Enrich the following Lean 4 file with documentation WITHOUT changing its behavior:
- Add a module docstring \`/-! ... -/\` after the imports summarizing the theme and main results.
- Immediately before each \`def\`, \`lemma\` or \`theorem\`, add a brief \`--\` comment describing it.
- For nontrivial proofs, add a few \`--\` comments inside \`by\` blocks explaining key steps.
- Do NOT rename identifiers, reorder imports, or introduce non-compiling code.

${fileSection}

${RESPONSE_FORMATS.document}`;
  }
}
