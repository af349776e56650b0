/**
 * Innovation Loop
 *
 * Extends a compiling file one round at a time. Each round asks the generator
 * for new material, then runs a fresh repair session on the extended buffer.
 * A round is kept only when that session reaches Fixed; otherwise the baseline
 * stays exactly as it was before the round.
 */

import type { InnovationRound, InnovationResult, SessionReport } from "../output/types.js";
import { applyPatch } from "./applier.js";
import type { GenerativeRepairAdapter } from "./generative.js";
import { silentLogger } from "./logger.js";
import { runRepairSession, type RepairDeps } from "./machine.js";

export interface InnovationOptions {
  rounds: number;
  theme: string;
}

export interface InnovationDeps extends RepairDeps {
  generator: GenerativeRepairAdapter;
  /** Called with the new baseline after each accepted round */
  onAccepted?: (content: string, round: number) => Promise<void>;
}

export async function runInnovation(
  baseline: string,
  options: InnovationOptions,
  deps: InnovationDeps
): Promise<InnovationResult> {
  const logger = deps.logger ?? silentLogger;
  const rounds: InnovationRound[] = [];
  let current = baseline;

  for (let round = 1; round <= options.rounds; round++) {
    const outcome = await innovate(current, round, options.theme, deps);
    rounds.push(outcome.round);
    logger.log({
      type: "innovation_round",
      iteration: round,
      status: outcome.round.sessionStatus,
      message: outcome.round.outcome === "accepted" ? "accepted" : `rejected: ${outcome.round.reason ?? ""}`,
    });

    if (outcome.content !== undefined) {
      current = outcome.content;
      await deps.onAccepted?.(current, round);
    }
  }

  return { baseline: current, rounds };
}

async function innovate(
  baseline: string,
  round: number,
  theme: string,
  deps: InnovationDeps
): Promise<{ round: InnovationRound; content?: string }> {
  const rejected = (reason: string, report?: SessionReport) => ({
    round: { round, outcome: "rejected" as const, reason, sessionStatus: report?.status, report },
  });

  const generated = await deps.generator.propose(
    { mode: "extend", diagnostics: [], content: baseline, theme },
    deps.budget,
    deps.signal
  );
  if (!generated.ok) return rejected(generated.error.message);

  const extended = applyPatch(baseline, generated.value);
  if (!extended.ok) return rejected(extended.error.message);

  const report = await runRepairSession(extended.value, deps);
  if (report.status !== "Fixed") {
    return rejected(`repair session ended ${report.status}`, report);
  }

  return {
    round: { round, outcome: "accepted", sessionStatus: report.status, report },
    content: report.finalContent,
  };
}
