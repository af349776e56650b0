#!/usr/bin/env node

/**
 * proof-repair CLI
 *
 * Commands:
 *   proof-repair run <file>      Repair a Lean file in place
 *   proof-repair check <file>    Compile once and print the diagnostics
 *   proof-repair mcp-server      Serve the repair tools over MCP (stdio)
 *
 * Exit codes: 0 fixed, 1 not fixed, 2 tool or configuration error.
 */

import { Command, InvalidArgumentError, Option } from "commander";
import chalk from "chalk";
import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { loadConfig, parseLayer, type ConfigLayer, type RepairConfig } from "./config.js";
import { errorMessage } from "./oracle/errors.js";
import { createSessionLogger } from "./oracle/logger.js";
import { formatEvent, formatInnovationText, formatReportJSON, formatReportText } from "./output/format.js";
import { runMcpServer } from "./mcp/server.js";
import { ensureScratchBranch } from "./session/scratch-branch.js";
import { EXIT_ERROR, EXIT_FIXED, EXIT_NOT_FIXED, exitCodeFor, repairFile } from "./session/pipeline.js";
import { CheckerCollector } from "./toolchain/collector.js";
import { formatDiagnostics } from "./toolchain/parser.js";
import { findProject } from "./toolchain/project.js";

// ============================================================================
// Helpers
// ============================================================================

function readVersion(): string {
  // src/cli.ts and dist/src/cli.js sit at different depths below package.json
  let dir = path.dirname(fileURLToPath(import.meta.url));
  for (let depth = 0; depth < 3; depth++) {
    const candidate = path.join(dir, "package.json");
    if (fs.existsSync(candidate)) {
      const pkg: unknown = JSON.parse(fs.readFileSync(candidate, "utf-8"));
      if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
        return pkg.version;
      }
    }
    dir = path.dirname(dir);
  }
  return "0.0.0";
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

function requireFile(file: string): string {
  const resolved = path.resolve(file);
  if (!fs.existsSync(resolved)) {
    throw new Error(`File not found: ${resolved}`);
  }
  return resolved;
}

interface ConfigFlags {
  config?: string;
  maxIterations?: number;
  timeout?: number;
  model?: string;
}

function resolveConfig(flags: ConfigFlags, extra: ConfigLayer = {}): RepairConfig {
  const layer = parseLayer(
    {
      ...extra,
      maxIterations: flags.maxIterations,
      compileTimeoutMs: flags.timeout,
      generation: { model: flags.model },
    },
    "command-line flags"
  );
  return loadConfig({ configFile: flags.config, flags: layer });
}

function fail(error: unknown): void {
  console.error(chalk.red(`Error: ${errorMessage(error)}`));
  process.exitCode = EXIT_ERROR;
}

// ============================================================================
// Commands
// ============================================================================

interface RunFlags extends ConfigFlags {
  rounds?: number;
  theme?: string;
  document?: boolean;
  snapshots: boolean;
  allowSorry?: boolean;
  scratchBranch?: boolean;
  format: "text" | "json";
  verbose?: boolean;
}

async function runCommand(file: string, flags: RunFlags): Promise<void> {
  const target = requireFile(file);
  const config = resolveConfig(flags, {
    innovation: { rounds: flags.rounds, theme: flags.theme },
    document: flags.document,
    snapshots: flags.snapshots ? undefined : false,
    rejectSorry: flags.allowSorry ? false : undefined,
  });

  if (!config.apiKey) {
    console.error(chalk.yellow("ANTHROPIC_API_KEY is not set; only rule-based fixes will be tried."));
  }

  if (flags.scratchBranch) {
    const branch = await ensureScratchBranch(findProject(target).root);
    console.error(branch ? chalk.dim(`Working on branch ${branch}`) : chalk.dim("Not a git repository; no branch created."));
  }

  const logger = flags.verbose
    ? createSessionLogger((event) => console.error(chalk.dim(formatEvent(event))))
    : undefined;

  const result = await repairFile(target, config, { logger });

  if (flags.format === "json") {
    console.log(formatReportJSON(result.report, result.innovation));
  } else {
    console.log(formatReportText(result.report));
    if (result.innovation) {
      console.log(formatInnovationText(result.innovation));
    }
    if (result.documentation) {
      console.log(
        result.documentation.documented
          ? chalk.blue("Documentation added.")
          : chalk.yellow(`Documentation skipped: ${result.documentation.reason ?? "unknown reason"}`)
      );
    }
    const status = result.report.status === "Fixed" ? chalk.green(result.report.status) : chalk.red(result.report.status);
    console.log(`${status}${result.written ? chalk.dim(` · wrote ${path.basename(target)}`) : ""}`);
    if (config.snapshots) {
      console.log(chalk.dim(`Snapshots: ${path.join(result.runDir, "snapshots")}`));
    }
  }

  process.exitCode = exitCodeFor(result.report.status);
}

async function checkCommand(file: string, flags: ConfigFlags & { format: "text" | "json" }): Promise<void> {
  const target = requireFile(file);
  const config = resolveConfig(flags);
  const collector = new CheckerCollector({ target });
  const result = await collector.compile(fs.readFileSync(target, "utf-8"), config.compileTimeoutMs);

  if (flags.format === "json") {
    console.log(JSON.stringify({ success: result.success, diagnostics: result.diagnostics }, null, 2));
  } else if (result.diagnostics.length > 0) {
    console.log(formatDiagnostics(result.diagnostics, target));
  } else {
    console.log(chalk.green("No diagnostics."));
  }

  process.exitCode = result.success ? EXIT_FIXED : EXIT_NOT_FIXED;
}

// ============================================================================
// Program
// ============================================================================

const version = readVersion();
const program = new Command();

const formatOption = () =>
  new Option("--format <format>", "Output format").choices(["text", "json"]).default("text");

program
  .name("proof-repair")
  .description("Diagnose, fix and re-verify Lean 4 files until they compile")
  .version(version);

program
  .command("run")
  .description("Repair a Lean file in place")
  .argument("<file>", "Lean file to repair")
  .option("--config <path>", "JSON configuration file")
  .option("--max-iterations <n>", "Maximum repair iterations", parseInteger)
  .option("--timeout <ms>", "Checker timeout per compile", parseInteger)
  .option("--model <name>", "Generation model")
  .option("--rounds <n>", "Innovation rounds once the file compiles", parseInteger)
  .option("--theme <text>", "Theme guiding innovation rounds")
  .option("--document", "Add documentation once the file compiles")
  .option("--no-snapshots", "Do not write snapshots")
  .option("--allow-sorry", "Count a file that compiles through sorry or admit as fixed")
  .option("--scratch-branch", "Create a git branch before changing the file")
  .addOption(formatOption())
  .option("--verbose", "Print session events as they happen")
  .action(async (file: string, flags: RunFlags) => {
    try {
      await runCommand(file, flags);
    } catch (error) {
      fail(error);
    }
  });

program
  .command("check")
  .description("Compile a Lean file once and print its diagnostics")
  .argument("<file>", "Lean file to check")
  .option("--config <path>", "JSON configuration file")
  .option("--timeout <ms>", "Checker timeout", parseInteger)
  .addOption(formatOption())
  .action(async (file: string, flags: ConfigFlags & { format: "text" | "json" }) => {
    try {
      await checkCommand(file, flags);
    } catch (error) {
      fail(error);
    }
  });

program
  .command("mcp-server")
  .description("Serve proof_repair_check and proof_repair_run over MCP (stdio)")
  .option("--config <path>", "JSON configuration file")
  .action(async (flags: { config?: string }) => {
    try {
      await runMcpServer({ version, config: loadConfig({ configFile: flags.config }) });
    } catch (error) {
      fail(error);
    }
  });

await program.parseAsync(process.argv);
