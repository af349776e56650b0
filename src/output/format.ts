/**
 * Output Formatting
 *
 * Format session reports for human-readable and machine-readable output.
 */

import type {
  CompileResult,
  Diagnostic,
  InnovationResult,
  IterationRecord,
  SessionEvent,
  SessionReport,
} from "./types.js";

function truncate(text: string, max: number): string {
  const firstLine = text.split("\n")[0] ?? "";
  return firstLine.length > max ? `${firstLine.slice(0, max)}...` : firstLine;
}

function errorCount(result: CompileResult | null): number {
  return result ? result.diagnostics.filter((d) => d.severity === "error").length : 0;
}

/**
 * Diagnostics of the last compiled buffer; empty once the file compiles
 */
export function remainingDiagnostics(report: SessionReport): readonly Diagnostic[] {
  if (report.status === "Fixed") return [];
  const last = report.history[report.history.length - 1];
  if (!last) return [];
  return (last.after ?? last.before).diagnostics;
}

function patchLabel(entry: IterationRecord): string {
  if (entry.patch) {
    const origin = entry.patch.origin === "deterministic" ? "rule" : "generated";
    return `[${origin}] ${entry.patch.description}`;
  }
  if (entry.decision === "cycled") return "(cycle detected)";
  return `(no patch) ${entry.failure?.message ?? ""}`.trimEnd();
}

/**
 * Format a session report for human-readable console output
 */
export function formatReportText(report: SessionReport): string {
  const lines: string[] = [];
  const first = report.history[0];
  const remaining = remainingDiagnostics(report);

  lines.push("═".repeat(60));
  lines.push(`REPAIR SESSION: ${report.status}`);
  lines.push("═".repeat(60));
  lines.push("");

  lines.push(`Errors: ${errorCount(first?.before ?? null)} → ${remaining.filter((d) => d.severity === "error").length}`);
  lines.push(`Iterations: ${report.iterations}`);
  lines.push(`Rule fixes: ${report.deterministicFixes}`);
  lines.push(`Generative calls: ${report.generativeCalls}`);
  lines.push("");

  if (report.history.length === 0) {
    lines.push("File already compiles.");
    lines.push("");
  } else {
    lines.push("ITERATIONS:");
    lines.push("");

    for (const entry of report.history) {
      lines.push(`${entry.index}. ${patchLabel(entry)}`);
      const target = entry.patch?.targets[0];
      if (target) {
        lines.push(`   Target: ${target.line}:${target.column} ${truncate(target.message, 60)}`);
      }
      if (entry.after) {
        lines.push(`   Effect: ${errorCount(entry.before)} → ${errorCount(entry.after)} errors`);
      }
      lines.push(`   Decision: ${entry.decision}`);
      lines.push("");
    }
  }

  if (remaining.length > 0) {
    lines.push("─".repeat(60));
    lines.push("REMAINING:");
    lines.push("");

    for (const diag of remaining) {
      lines.push(`• ${diag.severity} @ ${diag.line}:${diag.column}`);
      lines.push(`  ${truncate(diag.message, 70)}`);
    }

    lines.push("");
  }

  lines.push(`Duration: ${report.durationMs}ms`);
  lines.push("═".repeat(60));

  return lines.join("\n");
}

/**
 * Format innovation rounds for console output
 */
export function formatInnovationText(result: InnovationResult): string {
  const lines: string[] = ["INNOVATION:", ""];

  if (result.rounds.length === 0) {
    lines.push("No rounds run.");
  }
  for (const round of result.rounds) {
    const detail = round.outcome === "accepted" ? "" : ` (${round.reason ?? "rejected"})`;
    lines.push(`${round.round}. ${round.outcome}${detail}`);
  }

  return lines.join("\n");
}

function diagnosticJSON(d: Diagnostic) {
  return { severity: d.severity, line: d.line, column: d.column, message: d.message, kind: d.kind };
}

/**
 * Format a session report as JSON for programmatic use
 */
export function formatReportJSON(report: SessionReport, innovation?: InnovationResult): string {
  const output = {
    status: report.status,
    iterations: report.iterations,
    deterministicFixes: report.deterministicFixes,
    generativeCalls: report.generativeCalls,
    durationMs: report.durationMs,
    history: report.history.map((entry) => ({
      index: entry.index,
      decision: entry.decision,
      patch: entry.patch
        ? {
            id: entry.patch.id,
            origin: entry.patch.origin,
            description: entry.patch.description,
            ruleId: entry.patch.ruleId ?? null,
          }
        : null,
      errorsBefore: errorCount(entry.before),
      errorsAfter: entry.after ? errorCount(entry.after) : null,
      failure: entry.failure ? { kind: entry.failure.kind, message: entry.failure.message } : null,
    })),
    remaining: remainingDiagnostics(report).map(diagnosticJSON),
    innovation: innovation
      ? innovation.rounds.map((r) => ({
          round: r.round,
          outcome: r.outcome,
          sessionStatus: r.sessionStatus ?? null,
          reason: r.reason ?? null,
        }))
      : null,
  };

  return JSON.stringify(output, null, 2);
}

/**
 * Format a compact version for agent consumption
 */
export function formatReportCompact(report: SessionReport): string {
  const output = {
    status: report.status,
    iterations: report.iterations,
    fixes: report.history.flatMap((entry) =>
      entry.patch ? [{ iteration: entry.index, origin: entry.patch.origin, fix: entry.patch.description }] : []
    ),
    remaining: remainingDiagnostics(report).map((d) => ({
      line: d.line,
      column: d.column,
      message: truncate(d.message, 100),
    })),
  };

  return JSON.stringify(output, null, 2);
}

/**
 * One-line rendering of a session event for verbose output
 */
export function formatEvent(event: SessionEvent): string {
  const prefix = event.iteration !== undefined ? `[${event.iteration}] ` : "";
  const parts: string[] = [event.type];

  if (event.status) parts.push(event.status);
  if (event.patch) parts.push(`${event.patch.origin}: ${event.patch.description}`);
  if (event.message) parts.push(event.message);

  return `${prefix}${parts.join(" · ")}`;
}
