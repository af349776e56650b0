/**
 * Repair Loop
 *
 * An explicit state machine over SessionState. `transition` runs exactly one
 * iteration (compile → diagnose → fix → apply → recompile) and returns the
 * next state; `runRepairSession` drives it until a terminal status.
 *
 * The history log is the checkpoint: `replayHistory` rebuilds the state at any
 * index, and resuming is re-entering `transition` with that state.
 */

import type {
  CompileResult,
  Diagnostic,
  GenerationBudget,
  IterationDecision,
  IterationFailure,
  IterationRecord,
  Patch,
  SessionReport,
  SessionState,
  SessionStatus,
  TerminalStatus,
} from "../output/types.js";
import type { DiagnosticsCollector } from "../toolchain/collector.js";
import { sameDiagnostics, selectTarget } from "../toolchain/parser.js";
import { applyPatch } from "./applier.js";
import { annotatePlaceholders, placeholderDiagnostics } from "./placeholders.js";
import { GenerationError } from "./errors.js";
import type { GenerativeRepairAdapter } from "./generative.js";
import { silentLogger, type SessionLogger } from "./logger.js";
import type { RuleEngine } from "./rules.js";

export interface RepairDeps {
  collector: DiagnosticsCollector;
  rules: RuleEngine;
  /** Fallback patch source; without one, rule misses end the session */
  generator?: GenerativeRepairAdapter;
  /** Upper bound on recorded iterations */
  maxIterations: number;
  compileTimeoutMs: number;
  budget: GenerationBudget;
  logger?: SessionLogger;
  signal?: AbortSignal;
  /** Treat a buffer that compiles only through `sorry` or `admit` as unfinished (default true) */
  rejectSorry?: boolean;
}

const DECISION_STATUS: Record<IterationDecision, SessionStatus> = {
  continue: "Running",
  fixed: "Fixed",
  cycled: "Cycled",
  failed: "Failed",
  "max-iterations": "MaxIterationsExceeded",
};

export function isTerminal(status: SessionStatus): status is TerminalStatus {
  return status !== "Running";
}

export function initialState(content: string): SessionState {
  return { content, iteration: 0, history: [], status: "Running", pending: null };
}

// ============================================================================
// Transition
// ============================================================================

function record(
  state: SessionState,
  fields: Omit<IterationRecord, "index">,
  next: { content?: string; pending?: CompileResult | null } = {}
): SessionState {
  const entry: IterationRecord = Object.freeze({ index: state.iteration + 1, ...fields });
  return {
    content: next.content ?? state.content,
    iteration: entry.index,
    history: Object.freeze([...state.history, entry]),
    status: DECISION_STATUS[entry.decision],
    pending: next.pending ?? null,
  };
}

async function compile(content: string, deps: RepairDeps, iteration: number): Promise<CompileResult> {
  const compiled = await deps.collector.compile(content, deps.compileTimeoutMs, deps.signal);
  const result = deps.rejectSorry === false ? compiled : annotatePlaceholders(compiled, content);
  (deps.logger ?? silentLogger).log({
    type: "compile",
    iteration,
    diagnostics: result.diagnostics.length,
    message: result.success ? "ok" : `${result.diagnostics.length} diagnostics`,
  });
  return result;
}

/**
 * Diagnostics still to be fixed in a compiled buffer
 */
function outstanding(result: CompileResult, deps: RepairDeps): readonly Diagnostic[] {
  if (!result.success) return result.diagnostics;
  return deps.rejectSorry === false ? [] : placeholderDiagnostics(result);
}

function isDone(result: CompileResult, deps: RepairDeps): boolean {
  return result.success && outstanding(result, deps).length === 0;
}

/**
 * Ask the rule engine first, then the generative adapter
 */
async function obtainPatch(
  target: Diagnostic,
  diagnostics: readonly Diagnostic[],
  content: string,
  deps: RepairDeps,
  iteration: number
): Promise<{ patch: Patch } | { failure: IterationFailure }> {
  const logger = deps.logger ?? silentLogger;

  const deterministic = deps.rules.propose(target, content);
  if (deterministic) {
    logger.log({
      type: "rule_matched",
      iteration,
      message: deterministic.ruleId,
      patch: { id: deterministic.id, origin: deterministic.origin, description: deterministic.description },
    });
    return { patch: deterministic };
  }

  if (!deps.generator) {
    const error = new GenerationError("no rule matched and no generative adapter is configured", "unavailable");
    return { failure: { kind: "no-patch", message: error.message, generation: error } };
  }

  logger.log({ type: "generation_requested", iteration, diagnostics: diagnostics.length });
  const generated = await deps.generator.propose(
    { mode: "repair", diagnostics, content },
    deps.budget,
    deps.signal
  );
  if (!generated.ok) {
    logger.log({ type: "generation_failed", iteration, message: generated.error.message });
    return { failure: { kind: "no-patch", message: generated.error.message, generation: generated.error } };
  }
  return { patch: generated.value };
}

/**
 * Run one iteration. Terminal states are returned unchanged.
 */
export async function transition(state: SessionState, deps: RepairDeps): Promise<SessionState> {
  if (isTerminal(state.status)) return state;

  const logger = deps.logger ?? silentLogger;
  const iteration = state.iteration + 1;
  const setStatus = (next: SessionState): SessionState => {
    if (next.status !== state.status) {
      logger.log({ type: "status_changed", iteration: next.iteration, status: next.status });
    }
    return next;
  };

  if (state.iteration >= deps.maxIterations) {
    return setStatus({ ...state, status: "MaxIterationsExceeded" });
  }

  // 1. Compile, unless the previous iteration already did
  const before = state.pending ?? (await compile(state.content, deps, iteration));

  // 2. Compiles without placeholders: done
  const remaining = outstanding(before, deps);
  if (before.success && remaining.length === 0) {
    return setStatus({ ...state, pending: before, status: "Fixed" });
  }

  // 3. Same diagnostics as the previous iteration: no progress
  const previous = state.history[state.history.length - 1];
  if (previous && sameDiagnostics(before.diagnostics, previous.before.diagnostics)) {
    return setStatus(record(state, { before, patch: null, after: null, decision: "cycled" }));
  }

  // 4. Deterministic rule for the first diagnostic, else generative repair
  const target = selectTarget(remaining);
  if (!target) {
    return setStatus(
      record(state, {
        before,
        patch: null,
        after: null,
        decision: "failed",
        failure: { kind: "no-patch", message: "compile failed without diagnostics" },
      })
    );
  }

  const obtained = await obtainPatch(target, remaining, state.content, deps, iteration);

  // 5. Nothing to apply
  if ("failure" in obtained) {
    return setStatus(
      record(state, { before, patch: null, after: null, decision: "failed", failure: obtained.failure })
    );
  }

  // 6. Apply; a failed apply keeps the current buffer
  const { patch } = obtained;
  const applied = applyPatch(state.content, patch);
  if (!applied.ok) {
    logger.log({ type: "apply_failed", iteration, message: applied.error.message });
    return setStatus(
      record(state, {
        before,
        patch: null,
        after: null,
        decision: "failed",
        failure: { kind: "apply", message: applied.error.message, apply: applied.error, rejected: patch },
      })
    );
  }

  logger.log({
    type: "patch_applied",
    iteration,
    patch: { id: patch.id, origin: patch.origin, description: patch.description },
  });

  // 7. Recompile and decide
  const after = await compile(applied.value, deps, iteration);
  const decision: IterationDecision = isDone(after, deps)
    ? "fixed"
    : iteration >= deps.maxIterations
      ? "max-iterations"
      : "continue";

  return setStatus(
    record(state, { before, patch, after, decision }, { content: applied.value, pending: after })
  );
}

// ============================================================================
// Driving & Replay
// ============================================================================

/**
 * Drive a state until it reaches a terminal status
 */
export async function driveSession(state: SessionState, deps: RepairDeps): Promise<SessionState> {
  let current = state;
  while (!isTerminal(current.status)) {
    current = await transition(current, deps);
  }
  return current;
}

export function countGenerativeCalls(history: readonly IterationRecord[]): number {
  return history.filter(
    (r) =>
      r.patch?.origin === "generative" ||
      r.failure?.rejected?.origin === "generative" ||
      (r.failure?.generation !== undefined && r.failure.generation.reason !== "unavailable")
  ).length;
}

export function toReport(initialContent: string, state: SessionState, startTime: number): SessionReport {
  if (!isTerminal(state.status)) {
    throw new Error("cannot report on a session that is still running");
  }
  return {
    status: state.status,
    iterations: state.iteration,
    history: state.history,
    initialContent,
    finalContent: state.content,
    generativeCalls: countGenerativeCalls(state.history),
    deterministicFixes: state.history.filter((r) => r.patch?.origin === "deterministic").length,
    durationMs: Date.now() - startTime,
  };
}

/**
 * Repair a buffer until it compiles or the loop gives up
 */
export async function runRepairSession(content: string, deps: RepairDeps): Promise<SessionReport> {
  const startTime = Date.now();
  (deps.logger ?? silentLogger).log({ type: "session_start", iteration: 0, status: "Running" });
  const final = await driveSession(initialState(content), deps);
  return toReport(content, final, startTime);
}

/**
 * Rebuild the session state after the first `upTo` recorded iterations
 */
export function replayHistory(
  initialContent: string,
  history: readonly IterationRecord[],
  upTo: number = history.length
): SessionState {
  if (upTo < 0 || upTo > history.length) {
    throw new RangeError(`upTo must be between 0 and ${history.length}`);
  }

  let state = initialState(initialContent);
  for (const entry of history.slice(0, upTo)) {
    let content = state.content;
    if (entry.patch) {
      const applied = applyPatch(content, entry.patch);
      if (!applied.ok) {
        throw new Error(`history does not replay at iteration ${entry.index}: ${applied.error.message}`);
      }
      content = applied.value;
    }
    state = {
      content,
      iteration: entry.index,
      history: history.slice(0, entry.index),
      status: DECISION_STATUS[entry.decision],
      pending: entry.after,
    };
  }
  return state;
}
