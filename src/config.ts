/**
 * Configuration
 *
 * Sources, lowest to highest precedence: built-in defaults, a JSON config file,
 * environment variables, command-line flags. Every layer is validated on its
 * own so an error names the source it came from.
 */

import fs from "fs";
import { z } from "zod";
import { DEFAULT_MODEL } from "./oracle/client.js";
import { ConfigError, errorMessage } from "./oracle/errors.js";
import type { GenerationBudget } from "./output/types.js";

// ============================================================================
// Schema
// ============================================================================

const positiveInt = z.number().int().positive();

const GenerationLayerSchema = z
  .object({
    model: z.string().min(1),
    maxOutputTokens: positiveInt,
    maxPromptTokens: positiveInt,
    timeoutMs: positiveInt,
    contextLines: z.number().int().min(0),
  })
  .partial()
  .strict();

const InnovationLayerSchema = z
  .object({
    rounds: z.number().int().min(0),
    theme: z.string(),
  })
  .partial()
  .strict();

export const ConfigLayerSchema = z
  .object({
    maxIterations: positiveInt,
    compileTimeoutMs: positiveInt,
    generation: GenerationLayerSchema,
    innovation: InnovationLayerSchema,
    document: z.boolean(),
    snapshots: z.boolean(),
    rejectSorry: z.boolean(),
  })
  .partial()
  .strict();

export type ConfigLayer = z.infer<typeof ConfigLayerSchema>;

export interface RepairConfig {
  maxIterations: number;
  compileTimeoutMs: number;
  generation: {
    model: string;
    maxOutputTokens: number;
    maxPromptTokens: number;
    timeoutMs: number;
    contextLines: number;
  };
  innovation: {
    rounds: number;
    theme: string;
  };
  document: boolean;
  snapshots: boolean;
  /** A file that compiles only through `sorry` or `admit` is not fixed */
  rejectSorry: boolean;
  /** From ANTHROPIC_API_KEY only; generation is disabled without it */
  apiKey?: string;
}

export const DEFAULT_CONFIG: RepairConfig = {
  maxIterations: 20,
  compileTimeoutMs: 60_000,
  generation: {
    model: DEFAULT_MODEL,
    maxOutputTokens: 8192,
    maxPromptTokens: 60_000,
    timeoutMs: 120_000,
    contextLines: 20,
  },
  innovation: {
    rounds: 0,
    theme: "",
  },
  document: false,
  snapshots: true,
  rejectSorry: true,
};

// ============================================================================
// Layers
// ============================================================================

export function parseLayer(raw: unknown, source: string): ConfigLayer {
  const parsed = ConfigLayerSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new ConfigError(`invalid configuration in ${source}: ${where}${issue?.message ?? "unknown issue"}`, source);
  }
  return parsed.data;
}

export function readConfigFile(filePath: string): ConfigLayer {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw new ConfigError(`cannot read config file ${filePath}: ${errorMessage(error)}`, filePath, { cause: error });
  }
  return parseLayer(raw, filePath);
}

export function envLayer(env: NodeJS.ProcessEnv): ConfigLayer {
  const layer: ConfigLayer = {};

  const model = env["PROOF_REPAIR_MODEL"];
  if (model) {
    layer.generation = parseLayer({ generation: { model } }, "PROOF_REPAIR_MODEL").generation;
  }

  const maxIterations = env["PROOF_REPAIR_MAX_ITERATIONS"];
  if (maxIterations) {
    layer.maxIterations = parseLayer(
      { maxIterations: Number(maxIterations) },
      "PROOF_REPAIR_MAX_ITERATIONS"
    ).maxIterations;
  }

  return layer;
}

export function mergeConfig(base: RepairConfig, layer: ConfigLayer): RepairConfig {
  return {
    maxIterations: layer.maxIterations ?? base.maxIterations,
    compileTimeoutMs: layer.compileTimeoutMs ?? base.compileTimeoutMs,
    generation: {
      model: layer.generation?.model ?? base.generation.model,
      maxOutputTokens: layer.generation?.maxOutputTokens ?? base.generation.maxOutputTokens,
      maxPromptTokens: layer.generation?.maxPromptTokens ?? base.generation.maxPromptTokens,
      timeoutMs: layer.generation?.timeoutMs ?? base.generation.timeoutMs,
      contextLines: layer.generation?.contextLines ?? base.generation.contextLines,
    },
    innovation: {
      rounds: layer.innovation?.rounds ?? base.innovation.rounds,
      theme: layer.innovation?.theme ?? base.innovation.theme,
    },
    document: layer.document ?? base.document,
    snapshots: layer.snapshots ?? base.snapshots,
    rejectSorry: layer.rejectSorry ?? base.rejectSorry,
    apiKey: base.apiKey,
  };
}

// ============================================================================
// Loading
// ============================================================================

export interface LoadConfigOptions {
  configFile?: string;
  env?: NodeJS.ProcessEnv;
  /** Command-line overrides, already validated with parseLayer */
  flags?: ConfigLayer;
}

export function loadConfig(options: LoadConfigOptions = {}): RepairConfig {
  const env = options.env ?? process.env;

  let config = DEFAULT_CONFIG;
  if (options.configFile) {
    config = mergeConfig(config, readConfigFile(options.configFile));
  }
  config = mergeConfig(config, envLayer(env));
  if (options.flags) {
    config = mergeConfig(config, options.flags);
  }

  const apiKey = env["ANTHROPIC_API_KEY"];
  return apiKey ? { ...config, apiKey } : config;
}

export function generationBudget(config: RepairConfig): GenerationBudget {
  return {
    maxOutputTokens: config.generation.maxOutputTokens,
    maxPromptTokens: config.generation.maxPromptTokens,
    timeoutMs: config.generation.timeoutMs,
  };
}
