/**
 * proof-repair - iterative diagnose → fix → verify loop for Lean 4 files
 */

// Core API
export {
  runRepairSession,
  transition,
  driveSession,
  replayHistory,
  initialState,
  isTerminal,
  toReport,
  type RepairDeps,
} from "./oracle/machine.js";
export { runInnovation, type InnovationDeps, type InnovationOptions } from "./oracle/innovation.js";
export { documentFile, type DocumentDeps, type DocumentResult } from "./oracle/document.js";

// Types
export type {
  Severity,
  Diagnostic,
  CompileResult,
  Patch,
  PatchEdit,
  PatchOrigin,
  Result,
  SessionStatus,
  TerminalStatus,
  SessionState,
  SessionReport,
  IterationRecord,
  IterationDecision,
  IterationFailure,
  GenerationMode,
  GenerationBudget,
  GenerationRequest,
  InnovationRound,
  InnovationResult,
  SessionEvent,
} from "./output/types.js";

// Errors
export {
  RepairError,
  ToolchainError,
  ParseError,
  GenerationError,
  ApplyError,
  ConfigError,
} from "./oracle/errors.js";

// Formatting
export {
  formatReportText,
  formatReportJSON,
  formatReportCompact,
  formatInnovationText,
} from "./output/format.js";

// Diagnostics
export { CheckerCollector, type DiagnosticsCollector } from "./toolchain/collector.js";
export { parseCheckerOutput, selectTarget, sameDiagnostics, formatDiagnostics } from "./toolchain/parser.js";

// Fix rules
export { RuleEngine, type FixRule, type RuleContext } from "./oracle/rules.js";
export { builtinRules, createDefaultEngine } from "./oracle/rules/index.js";

// Patches & generation
export { applyPatch, contentDigest } from "./oracle/applier.js";
export { LlmRepairAdapter, type GenerativeRepairAdapter } from "./oracle/generative.js";
export { AnthropicGenerationClient, type TextGenerationClient } from "./oracle/client.js";

// Logging & configuration
export { createSessionLogger, type SessionLogger } from "./oracle/logger.js";
export { loadConfig, DEFAULT_CONFIG, type RepairConfig } from "./config.js";
export { repairFile, type PipelineResult } from "./session/pipeline.js";
