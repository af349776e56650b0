/**
 * Documentation pass: comment a compiling file, keeping the result only if it
 * still compiles.
 */

import type { GenerationBudget, Patch } from "../output/types.js";
import type { DiagnosticsCollector } from "../toolchain/collector.js";
import { applyPatch } from "./applier.js";
import type { GenerativeRepairAdapter } from "./generative.js";
import { silentLogger, type SessionLogger } from "./logger.js";

export interface DocumentDeps {
  collector: DiagnosticsCollector;
  generator: GenerativeRepairAdapter;
  compileTimeoutMs: number;
  budget: GenerationBudget;
  logger?: SessionLogger;
  signal?: AbortSignal;
}

export interface DocumentResult {
  content: string;
  documented: boolean;
  reason?: string;
  patch?: Patch;
}

export async function documentFile(content: string, deps: DocumentDeps): Promise<DocumentResult> {
  const logger = deps.logger ?? silentLogger;
  const keep = (reason: string): DocumentResult => {
    logger.log({ type: "documentation", message: `kept original: ${reason}` });
    return { content, documented: false, reason };
  };

  const generated = await deps.generator.propose(
    { mode: "document", diagnostics: [], content },
    deps.budget,
    deps.signal
  );
  if (!generated.ok) return keep(generated.error.message);

  const applied = applyPatch(content, generated.value);
  if (!applied.ok) return keep(applied.error.message);

  const result = await deps.collector.compile(applied.value, deps.compileTimeoutMs, deps.signal);
  if (!result.success) {
    return keep(`documented file does not compile (${result.diagnostics.length} diagnostics)`);
  }

  logger.log({ type: "documentation", message: "documented" });
  return { content: applied.value, documented: true, patch: generated.value };
}
