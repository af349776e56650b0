/**
 * File pipeline
 *
 * Wires configuration to the core and runs the full sequence on one file:
 * repair session, innovation rounds, documentation pass, then write-back and
 * snapshots. Shared by the CLI and the MCP server.
 */

import path from "path";
import type { RepairConfig } from "../config.js";
import { generationBudget } from "../config.js";
import { AnthropicGenerationClient } from "../oracle/client.js";
import { documentFile, type DocumentResult } from "../oracle/document.js";
import { LlmRepairAdapter, type GenerativeRepairAdapter } from "../oracle/generative.js";
import { runInnovation } from "../oracle/innovation.js";
import type { SessionLogger } from "../oracle/logger.js";
import { runRepairSession, type RepairDeps } from "../oracle/machine.js";
import { createDefaultEngine } from "../oracle/rules/index.js";
import { releaseEncoder } from "../oracle/tokens.js";
import type { InnovationResult, SessionReport, TerminalStatus } from "../output/types.js";
import { CheckerCollector, type DiagnosticsCollector } from "../toolchain/collector.js";
import { findProject } from "../toolchain/project.js";
import { RunWorkspace } from "./workspace.js";

export interface PipelineOverrides {
  collector?: DiagnosticsCollector;
  /** null disables generation even when an API key is configured */
  generator?: GenerativeRepairAdapter | null;
  logger?: SessionLogger;
  signal?: AbortSignal;
  now?: Date;
}

export interface PipelineResult {
  report: SessionReport;
  innovation?: InnovationResult;
  documentation?: DocumentResult;
  finalContent: string;
  /** Whether the target file was rewritten */
  written: boolean;
  runDir: string;
}

export const EXIT_FIXED = 0;
export const EXIT_NOT_FIXED = 1;
export const EXIT_ERROR = 2;

export function exitCodeFor(status: TerminalStatus): number {
  return status === "Fixed" ? EXIT_FIXED : EXIT_NOT_FIXED;
}

export function createGenerator(config: RepairConfig): GenerativeRepairAdapter | undefined {
  if (!config.apiKey) return undefined;
  const client = new AnthropicGenerationClient(config.apiKey, config.generation.model);
  return new LlmRepairAdapter(client, { contextLines: config.generation.contextLines });
}

export function createRepairDeps(
  target: string,
  config: RepairConfig,
  overrides: PipelineOverrides = {}
): RepairDeps {
  const generator = overrides.generator === null ? undefined : (overrides.generator ?? createGenerator(config));
  return {
    collector: overrides.collector ?? new CheckerCollector({ target }),
    rules: createDefaultEngine(),
    generator,
    maxIterations: config.maxIterations,
    compileTimeoutMs: config.compileTimeoutMs,
    budget: generationBudget(config),
    logger: overrides.logger,
    signal: overrides.signal,
    rejectSorry: config.rejectSorry,
  };
}

/**
 * Repair `target` in place, then extend and document it when configured
 */
export async function repairFile(
  target: string,
  config: RepairConfig,
  overrides: PipelineOverrides = {}
): Promise<PipelineResult> {
  const resolved = path.resolve(target);
  const root = findProject(resolved).root;
  const workspace = RunWorkspace.create(root, resolved, { now: overrides.now, snapshots: config.snapshots });
  const deps = createRepairDeps(resolved, config, overrides);

  try {
    const initial = workspace.readTarget();
    workspace.snapshot("iter000", initial);

    const report = await runRepairSession(initial, deps);
    workspace.snapshotSession(report, "iter");
    let finalContent = report.finalContent;

    let innovation: InnovationResult | undefined;
    let documentation: DocumentResult | undefined;
    const { generator } = deps;

    if (report.status === "Fixed" && generator) {
      if (config.innovation.rounds > 0) {
        innovation = await runInnovation(finalContent, config.innovation, {
          ...deps,
          generator,
          onAccepted: async (content, round) => {
            workspace.snapshot(`innov${String(round).padStart(3, "0")}`, content);
          },
        });
        finalContent = innovation.baseline;
      }

      if (config.document) {
        documentation = await documentFile(finalContent, { ...deps, generator });
        if (documentation.documented) {
          finalContent = documentation.content;
          workspace.snapshot("docs", finalContent);
        }
      }
    }

    const written = workspace.writeTarget(finalContent);
    return { report, innovation, documentation, finalContent, written, runDir: workspace.runDir };
  } finally {
    // the encoder holds native memory; the next run loads it again
    releaseEncoder();
  }
}
