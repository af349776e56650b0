/**
 * Deterministic Fix Engine
 *
 * An ordered list of rules, each a pure predicate over (diagnostic, buffer)
 * paired with the edit it produces. Rules are tried in registration order and
 * the first match wins.
 */

import type { Diagnostic, Patch, PatchEdit } from "../output/types.js";
import { contentDigest } from "./applier.js";

// ============================================================================
// Rule Interface
// ============================================================================

export interface RuleContext {
  diagnostic: Diagnostic;
  content: string;
  /** Character offset of the diagnostic position, or -1 when off the buffer */
  offset: number;
}

export interface RuleEdit {
  description: string;
  edit: Extract<PatchEdit, { type: "span" }>;
}

export interface FixRule {
  /** Unique name for this rule (for logging/debugging) */
  readonly id: string;

  /** Human-readable description */
  readonly description: string;

  /** Message patterns this rule handles; a cheap prefilter before matches() */
  readonly messagePatterns: readonly RegExp[];

  /**
   * Check if this rule applies. Must be pure, and false when the buffer
   * already satisfies the rule's target condition.
   */
  matches(ctx: RuleContext): boolean;

  /** Produce the edit. Only called after matches() returned true. */
  build(ctx: RuleContext): RuleEdit;
}

// ============================================================================
// Buffer Helpers
// ============================================================================

/**
 * Offset of a (1-based line, 0-based column) position in a buffer
 */
export function offsetOf(content: string, line: number, column: number): number {
  if (line < 1 || column < 0) return -1;

  let offset = 0;
  for (let current = 1; current < line; current++) {
    const newline = content.indexOf("\n", offset);
    if (newline === -1) return -1;
    offset = newline + 1;
  }

  const lineEnd = content.indexOf("\n", offset);
  const end = lineEnd === -1 ? content.length : lineEnd;
  return offset + column <= end ? offset + column : -1;
}

const IDENTIFIER_CHAR = /[\p{L}\p{N}_.'!?₀-₉]/u;

function isBoundary(content: string, index: number): boolean {
  const ch = content[index];
  return ch === undefined || !IDENTIFIER_CHAR.test(ch);
}

/**
 * Find a whole-identifier occurrence of `name` on the diagnostic's line,
 * preferring the one starting at the diagnostic column.
 */
export function findIdentifierOnLine(ctx: RuleContext, name: string): number {
  if (ctx.offset < 0 || name.length === 0) return -1;

  const lineStart = ctx.content.lastIndexOf("\n", ctx.offset - 1) + 1;
  const newline = ctx.content.indexOf("\n", ctx.offset);
  const lineEnd = newline === -1 ? ctx.content.length : newline;

  const isWhole = (at: number): boolean =>
    ctx.content.startsWith(name, at) &&
    isBoundary(ctx.content, at - 1) &&
    isBoundary(ctx.content, at + name.length);

  if (isWhole(ctx.offset)) return ctx.offset;

  let best = -1;
  for (let at = ctx.content.indexOf(name, lineStart); at !== -1 && at < lineEnd; at = ctx.content.indexOf(name, at + 1)) {
    if (at + name.length > lineEnd || !isWhole(at)) continue;
    if (best === -1 || Math.abs(at - ctx.offset) < Math.abs(best - ctx.offset)) {
      best = at;
    }
  }
  return best;
}

/**
 * Offset just past the leading `import` block (0 when there is none)
 */
export function importBlockEnd(content: string): number {
  let end = 0;
  let offset = 0;
  let inComment = false;

  while (offset <= content.length) {
    const newline = content.indexOf("\n", offset);
    const lineEnd = newline === -1 ? content.length : newline;
    const line = content.slice(offset, lineEnd).trim();

    if (inComment) {
      inComment = !line.includes("-/");
    } else if (line.startsWith("import ")) {
      end = newline === -1 ? content.length : newline + 1;
    } else if (line.startsWith("/-")) {
      inComment = !line.includes("-/", 2);
    } else if (line !== "" && !line.startsWith("--")) {
      break;
    }

    if (newline === -1) break;
    offset = newline + 1;
  }

  return end;
}

/**
 * Build an edit inserting one line right after the import block
 */
export function insertAfterImports(content: string, line: string): RuleEdit["edit"] {
  const at = importBlockEnd(content);
  const needsLeadingNewline = at > 0 && content[at - 1] !== "\n";
  return {
    type: "span",
    start: at,
    end: at,
    expected: "",
    replacement: `${needsLeadingNewline ? "\n" : ""}${line}\n`,
  };
}

// ============================================================================
// Rule Engine
// ============================================================================

export class RuleEngine {
  private readonly rules: FixRule[] = [];

  constructor(rules: readonly FixRule[] = []) {
    for (const rule of rules) {
      this.register(rule);
    }
  }

  /**
   * Append a rule at the lowest priority. Rule ids must be unique.
   */
  register(rule: FixRule): void {
    if (this.rules.some((r) => r.id === rule.id)) {
      throw new Error(`Rule already registered: ${rule.id}`);
    }
    this.rules.push(rule);
  }

  getAll(): readonly FixRule[] {
    return this.rules;
  }

  /**
   * First rule that matches the diagnostic against this buffer, if any
   */
  findRule(diagnostic: Diagnostic, content: string): { rule: FixRule; ctx: RuleContext } | null {
    const ctx: RuleContext = {
      diagnostic,
      content,
      offset: offsetOf(content, diagnostic.line, diagnostic.column),
    };

    for (const rule of this.rules) {
      if (!rule.messagePatterns.some((pattern) => pattern.test(diagnostic.message))) continue;
      if (rule.matches(ctx)) {
        return { rule, ctx };
      }
    }
    return null;
  }

  /**
   * Propose a patch for one diagnostic, or null when no rule applies
   */
  propose(diagnostic: Diagnostic, content: string): Patch | null {
    const found = this.findRule(diagnostic, content);
    if (!found) return null;

    const { rule, ctx } = found;
    const { description, edit } = rule.build(ctx);

    return {
      id: `${rule.id}@${diagnostic.line}:${diagnostic.column}`,
      origin: "deterministic",
      description,
      edit,
      targets: [diagnostic],
      ruleId: rule.id,
      baseDigest: contentDigest(content),
    };
  }
}
