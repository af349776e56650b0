/**
 * Core type definitions for the proof-repair engine
 */

import type { ApplyError, GenerationError } from "../oracle/errors.js";

// ============================================================================
// Diagnostics
// ============================================================================

export type Severity = "error" | "warning" | "info";

/**
 * - "source": reported by the checker against the file
 * - "toolchain": synthesized when the checker could not be run to completion
 * - "lint": synthesized for a placeholder proof the checker did not report
 */
export type DiagnosticKind = "source" | "toolchain" | "lint";

export interface CodeSpan {
  endLine: number;
  endColumn: number;
}

export interface Diagnostic {
  severity: Severity;
  message: string;
  /** 1-based */
  line: number;
  /** 0-based, as printed by the checker */
  column: number;
  kind: DiagnosticKind;
  file?: string;
  span?: CodeSpan;
}

export interface CompileResult {
  success: boolean;
  diagnostics: readonly Diagnostic[];
  /** null when the process never exited on its own (timeout, launch failure) */
  exitCode: number | null;
  /** Raw checker output (stdout followed by stderr) */
  output: string;
  durationMs: number;
}

// ============================================================================
// Patches
// ============================================================================

export type PatchOrigin = "deterministic" | "generative";

export type PatchEdit =
  | {
      type: "span";
      /** Half-open character range [start, end) */
      start: number;
      end: number;
      /** Text the range must still hold when the patch is applied */
      expected: string;
      replacement: string;
    }
  | { type: "file"; content: string }
  | { type: "append"; content: string };

export interface PatchMetadata {
  confidence?: number;
  rationale?: string;
  usage?: TokenUsage;
}

export interface Patch {
  id: string;
  origin: PatchOrigin;
  description: string;
  edit: PatchEdit;
  /** Diagnostics this patch is meant to resolve */
  targets: readonly Diagnostic[];
  /** Rule that produced a deterministic patch */
  ruleId?: string;
  /** SHA-256 of the buffer the patch was computed against */
  baseDigest?: string;
  metadata?: PatchMetadata;
}

// ============================================================================
// Results
// ============================================================================

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

// ============================================================================
// Session
// ============================================================================

export type SessionStatus =
  | "Running"
  | "Fixed"
  | "Failed"
  | "MaxIterationsExceeded"
  | "Cycled";

export type TerminalStatus = Exclude<SessionStatus, "Running">;

export type IterationDecision =
  | "continue"
  | "fixed"
  | "cycled"
  | "failed"
  | "max-iterations";

export interface IterationFailure {
  kind: "no-patch" | "apply";
  message: string;
  /** Set when the generative fallback was tried and failed */
  generation?: GenerationError;
  apply?: ApplyError;
  /** Patch that failed to apply */
  rejected?: Patch;
}

export interface IterationRecord {
  /** 1-based */
  readonly index: number;
  readonly before: CompileResult;
  /** Patch applied in this iteration, null when none was */
  readonly patch: Patch | null;
  /** Result of compiling the patched buffer, null when no patch was applied */
  readonly after: CompileResult | null;
  readonly decision: IterationDecision;
  readonly failure?: IterationFailure;
}

export interface SessionState {
  content: string;
  iteration: number;
  history: readonly IterationRecord[];
  status: SessionStatus;
  /** Compile result for `content`, carried over from the previous iteration */
  pending: CompileResult | null;
}

export interface SessionReport {
  status: TerminalStatus;
  iterations: number;
  history: readonly IterationRecord[];
  initialContent: string;
  /** Last successfully applied buffer */
  finalContent: string;
  generativeCalls: number;
  deterministicFixes: number;
  durationMs: number;
}

// ============================================================================
// Generation
// ============================================================================

export type GenerationMode = "repair" | "extend" | "document";

export interface GenerationBudget {
  /** Completion token cap passed to the service */
  maxOutputTokens: number;
  /** Prompt size cap, counted before the request is sent */
  maxPromptTokens: number;
  timeoutMs: number;
}

export interface GenerationRequest {
  mode: GenerationMode;
  diagnostics: readonly Diagnostic[];
  content: string;
  /** Guides extend mode */
  theme?: string;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

// ============================================================================
// Innovation
// ============================================================================

export type InnovationOutcome = "accepted" | "rejected";

export interface InnovationRound {
  round: number;
  outcome: InnovationOutcome;
  /** Status of the repair session run on the extended buffer */
  sessionStatus?: TerminalStatus;
  reason?: string;
  report?: SessionReport;
}

export interface InnovationResult {
  baseline: string;
  rounds: InnovationRound[];
}

// ============================================================================
// Session Logging
// ============================================================================

export type SessionEventType =
  | "session_start"
  | "compile"
  | "rule_matched"
  | "generation_requested"
  | "generation_failed"
  | "patch_applied"
  | "apply_failed"
  | "status_changed"
  | "innovation_round"
  | "documentation";

export interface SessionEvent {
  type: SessionEventType;
  timestamp: number;
  iteration?: number;
  status?: SessionStatus;
  diagnostics?: number;
  patch?: { id: string; origin: PatchOrigin; description: string };
  message?: string;
}

export interface SessionLogSummary {
  totalEvents: number;
  compiles: number;
  rulesMatched: number;
  generationRequests: number;
  generationFailures: number;
  patchesApplied: number;
  applyFailures: number;
}
