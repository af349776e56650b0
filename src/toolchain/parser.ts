/**
 * Checker output parser
 *
 * Format: file:line:col: severity: message
 * Lines that follow a header and are not themselves headers continue its message.
 */

import { ParseError } from "../oracle/errors.js";
import type { Diagnostic, Severity } from "../output/types.js";

// Pattern: path/to/File.lean:12:4: error: unknown identifier 'foo'
const HEADER_PATTERN =
  /^(.+?):(\d+):(\d+):\s*(error|warning|info|information):\s?(.*)$/;

const SEVERITY_RANK: Record<Severity, number> = {
  error: 0,
  warning: 1,
  info: 2,
};

function toSeverity(keyword: string): Severity {
  if (keyword === "error" || keyword === "warning") return keyword;
  return "info";
}

function finish(lines: string[]): string {
  while (lines.length > 1 && lines[lines.length - 1]?.trim() === "") {
    lines.pop();
  }
  return lines.join("\n").trimEnd();
}

/**
 * Parse checker output into diagnostics, in output order.
 * Throws ParseError on text the grammar does not allow.
 */
export function parseCheckerOutput(output: string): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  const lines = output.replace(/\r\n/g, "\n").split("\n");

  let current: { diagnostic: Omit<Diagnostic, "message">; message: string[] } | null = null;

  const flush = (): void => {
    if (current) {
      diagnostics.push({ ...current.diagnostic, message: finish(current.message) });
      current = null;
    }
  };

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? "";
    const match = HEADER_PATTERN.exec(line);

    if (match) {
      const [, file, lineNum, colNum, severity, message] = match;
      const lineNo = parseInt(lineNum ?? "", 10);
      if (!file || lineNo < 1) {
        throw new ParseError(`Invalid diagnostic location at output line ${i + 1}`, i + 1, line);
      }

      flush();
      current = {
        diagnostic: {
          severity: toSeverity(severity ?? ""),
          line: lineNo,
          column: parseInt(colNum ?? "", 10),
          kind: "source",
          file,
        },
        message: [message ?? ""],
      };
      continue;
    }

    if (current) {
      current.message.push(line);
    } else if (line.trim() !== "") {
      throw new ParseError(
        `Unexpected checker output before the first diagnostic at line ${i + 1}`,
        i + 1,
        line
      );
    }
  }

  flush();
  return diagnostics;
}

/**
 * Order used to pick the diagnostic the fixers target: earliest by location,
 * then by severity.
 */
export function compareDiagnostics(a: Diagnostic, b: Diagnostic): number {
  return (
    a.line - b.line ||
    a.column - b.column ||
    SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity]
  );
}

/**
 * Select the diagnostic to fix first. Errors are preferred, since warnings
 * never keep the file from compiling.
 */
export function selectTarget(diagnostics: readonly Diagnostic[]): Diagnostic | undefined {
  const errors = diagnostics.filter((d) => d.severity === "error");
  const pool = errors.length > 0 ? errors : [...diagnostics];
  return pool.sort(compareDiagnostics)[0];
}

/**
 * Identity of a diagnostic for cycle detection
 */
export function diagnosticKey(d: Diagnostic): string {
  return `${d.severity}\u0000${d.line}\u0000${d.column}\u0000${d.message}`;
}

/**
 * Check if two diagnostic sets are the same multiset of {severity, message, location}
 */
export function sameDiagnostics(
  a: readonly Diagnostic[],
  b: readonly Diagnostic[]
): boolean {
  if (a.length !== b.length) return false;
  const left = a.map(diagnosticKey).sort();
  const right = b.map(diagnosticKey).sort();
  return left.every((key, i) => key === right[i]);
}

/**
 * Format diagnostics for display (same shape as the checker prints them)
 */
export function formatDiagnostics(diagnostics: readonly Diagnostic[], file = "<buffer>"): string {
  return diagnostics
    .map((d) => `${d.file ?? file}:${d.line}:${d.column}: ${d.severity}: ${d.message}`)
    .join("\n");
}
