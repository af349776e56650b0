/**
 * MCP Tool Definitions
 *
 * Defines the tools exposed by the proof-repair MCP server.
 */

import { z } from "zod";

// ============================================================================
// Tool Schemas
// ============================================================================

/**
 * Schema for proof_repair_check tool input
 */
export const CheckInputSchema = z.object({
  file: z.string().min(1).describe("Path to the Lean file to check"),
});

export type CheckInput = z.infer<typeof CheckInputSchema>;

/**
 * Schema for proof_repair_run tool input
 */
export const RunInputSchema = z.object({
  file: z.string().min(1).describe("Path to the Lean file to repair in place"),
  maxIterations: z
    .number()
    .int()
    .positive()
    .optional()
    .describe("Maximum repair iterations (default: 20)"),
  rounds: z
    .number()
    .int()
    .min(0)
    .optional()
    .describe("Innovation rounds to run once the file compiles (default: 0)"),
  theme: z.string().optional().describe("Theme guiding innovation rounds"),
  document: z.boolean().optional().describe("Add documentation once the file compiles (default: false)"),
  allowSorry: z
    .boolean()
    .optional()
    .describe("Count a file that compiles through sorry or admit as fixed (default: false)"),
});

export type RunInput = z.infer<typeof RunInputSchema>;

// ============================================================================
// Tool Definitions
// ============================================================================

export const TOOLS = {
  proof_repair_check: {
    name: "proof_repair_check",
    description:
      "Compile a Lean file once and return its diagnostics without changing it. " +
      "Use this to see what errors a file has before repairing it.",
    inputSchema: CheckInputSchema,
  },
  proof_repair_run: {
    name: "proof_repair_run",
    description:
      "Repair a Lean file in place: compile, apply rule-based or generated fixes, and recompile " +
      "until it compiles or the loop stops. Returns the session status, the fixes applied and any remaining diagnostics.",
    inputSchema: RunInputSchema,
  },
} as const;

export type ToolName = keyof typeof TOOLS;
