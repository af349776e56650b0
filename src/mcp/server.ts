/**
 * MCP Server for proof-repair
 *
 * Exposes the repair loop via Model Context Protocol (MCP) so coding agents
 * can check and repair Lean files.
 *
 * Usage:
 *   proof-repair mcp-server
 *
 * The server communicates over stdio using JSON-RPC.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import fs from "fs";
import path from "path";
import { loadConfig, mergeConfig, parseLayer, type RepairConfig } from "../config.js";
import { errorMessage } from "../oracle/errors.js";
import { formatReportCompact } from "../output/format.js";
import type { CompileResult } from "../output/types.js";
import { repairFile, type PipelineOverrides } from "../session/pipeline.js";
import { CheckerCollector, type DiagnosticsCollector } from "../toolchain/collector.js";
import { formatDiagnostics } from "../toolchain/parser.js";
import {
  TOOLS,
  CheckInputSchema,
  RunInputSchema,
  type CheckInput,
  type RunInput,
} from "./tools.js";

export interface McpServerOptions {
  version?: string;
  /** Base configuration; tool arguments are layered on top */
  config?: RepairConfig;
  /** Collector factory, replaced in tests */
  collectorFor?: (file: string) => DiagnosticsCollector;
  overrides?: Omit<PipelineOverrides, "collector">;
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Resolve a file path relative to the current working directory
 */
function resolveFile(file: string): string {
  const resolved = path.resolve(process.cwd(), file);
  if (!fs.existsSync(resolved)) {
    throw new Error(`File not found: ${resolved}`);
  }
  return resolved;
}

function toolResult(text: string, isError = false) {
  return { content: [{ type: "text" as const, text }], isError };
}

// ============================================================================
// Tool Handlers
// ============================================================================

export async function handleCheck(
  input: CheckInput,
  options: McpServerOptions = {}
): Promise<{ success: boolean; errorCount: number; diagnostics: string }> {
  const file = resolveFile(input.file);
  const config = options.config ?? loadConfig();
  const collector = options.collectorFor?.(file) ?? new CheckerCollector({ target: file });

  const result: CompileResult = await collector.compile(
    fs.readFileSync(file, "utf-8"),
    config.compileTimeoutMs
  );

  return {
    success: result.success,
    errorCount: result.diagnostics.filter((d) => d.severity === "error").length,
    diagnostics: formatDiagnostics(result.diagnostics, file),
  };
}

export async function handleRun(input: RunInput, options: McpServerOptions = {}): Promise<string> {
  const file = resolveFile(input.file);
  const base = options.config ?? loadConfig();
  const flags = parseLayer(
    {
      maxIterations: input.maxIterations,
      innovation: { rounds: input.rounds, theme: input.theme },
      document: input.document,
      rejectSorry: input.allowSorry === undefined ? undefined : !input.allowSorry,
    },
    "tool arguments"
  );

  const result = await repairFile(file, mergeConfig(base, flags), {
    ...options.overrides,
    collector: options.collectorFor?.(file),
  });
  return formatReportCompact(result.report);
}

// ============================================================================
// Server Setup
// ============================================================================

/**
 * Create and configure the MCP server
 */
export function createMcpServer(options: McpServerOptions = {}): McpServer {
  const server = new McpServer({
    name: "proof-repair",
    version: options.version ?? "0.1.0",
  });

  server.tool(
    TOOLS.proof_repair_check.name,
    TOOLS.proof_repair_check.description,
    TOOLS.proof_repair_check.inputSchema.shape,
    async (args) => {
      try {
        const input = CheckInputSchema.parse(args);
        const result = await handleCheck(input, options);
        return toolResult(JSON.stringify(result, null, 2));
      } catch (error) {
        return toolResult(JSON.stringify({ error: errorMessage(error) }), true);
      }
    }
  );

  server.tool(
    TOOLS.proof_repair_run.name,
    TOOLS.proof_repair_run.description,
    TOOLS.proof_repair_run.inputSchema.shape,
    async (args) => {
      try {
        const input = RunInputSchema.parse(args);
        return toolResult(await handleRun(input, options));
      } catch (error) {
        return toolResult(JSON.stringify({ error: errorMessage(error) }), true);
      }
    }
  );

  return server;
}

/**
 * Run the MCP server over stdio
 */
export async function runMcpServer(options: McpServerOptions = {}): Promise<void> {
  const server = createMcpServer(options);
  const transport = new StdioServerTransport();
  await server.connect(transport);
}
