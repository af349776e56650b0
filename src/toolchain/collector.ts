/**
 * Diagnostics Collector
 *
 * Compiles a buffer with the external checker and turns its output into
 * structured diagnostics. The buffer is checked from a private temp copy, so
 * the target file on disk is never touched.
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { ToolchainError } from "../oracle/errors.js";
import type { CompileResult, Diagnostic } from "../output/types.js";
import { parseCheckerOutput } from "./parser.js";
import { checkerCommands, findProject, type CheckerProject } from "./project.js";
import { runProcess, type ProcessOutcome, type ProcessRunner } from "./process.js";

export interface DiagnosticsCollector {
  compile(fileContent: string, timeoutMs: number, signal?: AbortSignal): Promise<CompileResult>;
}

export interface CheckerCollectorOptions {
  /** Path of the file being repaired; used for project discovery and naming */
  target: string;
  project?: CheckerProject;
  runner?: ProcessRunner;
}

/**
 * Build the synthetic diagnostic reported when the checker itself failed
 */
export function toolchainDiagnostic(error: ToolchainError): Diagnostic {
  return {
    severity: "error",
    message: `${error.name}: ${error.message}`,
    line: 1,
    column: 0,
    kind: "toolchain",
  };
}

function toolchainFailure(error: ToolchainError, output: string, startTime: number): CompileResult {
  return {
    success: false,
    diagnostics: [toolchainDiagnostic(error)],
    exitCode: null,
    output,
    durationMs: Date.now() - startTime,
  };
}

/**
 * Map a finished process to a compile result.
 * Exit code 0 means success regardless of warnings.
 */
export function interpretOutcome(
  outcome: ProcessOutcome,
  timeoutMs: number,
  startTime: number
): CompileResult {
  switch (outcome.kind) {
    case "timeout":
      return toolchainFailure(
        new ToolchainError(`checker timed out after ${timeoutMs}ms`, "timeout"),
        outcome.stdout + outcome.stderr,
        startTime
      );
    case "aborted":
      return toolchainFailure(new ToolchainError("checker run was aborted", "aborted"), "", startTime);
    case "output-overflow":
      return toolchainFailure(
        new ToolchainError(`checker output exceeded ${outcome.limitBytes} bytes`, "output-overflow"),
        "",
        startTime
      );
    case "launch-failed":
      return toolchainFailure(
        new ToolchainError(`could not launch checker: ${outcome.message}`, "launch"),
        "",
        startTime
      );
    case "exited": {
      const output = outcome.stdout + outcome.stderr;
      const diagnostics = parseCheckerOutput(output);
      const success = outcome.exitCode === 0;

      if (!success && diagnostics.length === 0) {
        return toolchainFailure(
          new ToolchainError(`checker exited with code ${outcome.exitCode} without diagnostics`, "no-output"),
          output,
          startTime
        );
      }

      return {
        success,
        diagnostics,
        exitCode: outcome.exitCode,
        output,
        durationMs: Date.now() - startTime,
      };
    }
  }
}

/**
 * Collector backed by the `lean` / `lake env lean` executables
 */
export class CheckerCollector implements DiagnosticsCollector {
  private readonly target: string;
  private readonly project: CheckerProject;
  private readonly runner: ProcessRunner;

  constructor(options: CheckerCollectorOptions) {
    this.target = path.resolve(options.target);
    this.project = options.project ?? findProject(this.target);
    this.runner = options.runner ?? runProcess;
  }

  async compile(fileContent: string, timeoutMs: number, signal?: AbortSignal): Promise<CompileResult> {
    const startTime = Date.now();
    const scratchDir = fs.mkdtempSync(path.join(os.tmpdir(), "proof-repair-"));
    const scratchFile = path.join(scratchDir, path.basename(this.target));

    try {
      fs.writeFileSync(scratchFile, fileContent, "utf-8");

      let outcome: ProcessOutcome = {
        kind: "launch-failed",
        code: "ENOENT",
        message: "no checker command available",
      };
      for (const { command, args } of checkerCommands(this.project, scratchFile)) {
        outcome = await this.runner(command, args, { cwd: this.project.root, timeoutMs, signal });
        // Fall through to the next command only when this one could not start
        if (outcome.kind !== "launch-failed" || outcome.code !== "ENOENT") break;
      }

      const result = interpretOutcome(outcome, timeoutMs, startTime);
      return {
        ...result,
        diagnostics: result.diagnostics.map((d) =>
          d.file === scratchFile ? { ...d, file: this.target } : d
        ),
      };
    } finally {
      fs.rmSync(scratchDir, { recursive: true, force: true });
    }
  }
}
