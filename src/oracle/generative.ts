/**
 * Generative Repair Adapter
 *
 * Fallback patch source backed by a text-generation service. Every failure
 * (service error, timeout, budget, malformed or invalid response) comes back
 * as a GenerationError result; this module never throws.
 */

import { z } from "zod";
import type {
  GenerationBudget,
  GenerationMode,
  GenerationRequest,
  Patch,
  Result,
  TokenUsage,
} from "../output/types.js";
import { contentDigest } from "./applier.js";
import type { TextGenerationClient } from "./client.js";
import { GenerationError, errorMessage } from "./errors.js";
import { SYSTEM_PROMPTS, buildContextWindow, buildPrompt, type ContextWindow } from "./prompts.js";
import { countTokens as defaultCountTokens, type TokenCounter } from "./tokens.js";

export interface GenerativeRepairAdapter {
  propose(
    request: GenerationRequest,
    budget: GenerationBudget,
    signal?: AbortSignal
  ): Promise<Result<Patch, GenerationError>>;
}

// ============================================================================
// Response Schema
// ============================================================================

const confidence = z.number().min(0).max(1).optional();
const rationale = z.string().optional();

export const GenerationResponseSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("replace"),
    original: z.string().min(1),
    replacement: z.string(),
    line: z.number().int().positive().optional(),
    confidence,
    rationale,
  }),
  z.object({ kind: z.literal("file"), content: z.string(), confidence, rationale }),
  z.object({ kind: z.literal("append"), content: z.string(), confidence, rationale }),
]);

export type GenerationResponse = z.infer<typeof GenerationResponseSchema>;

const ALLOWED_KINDS: Record<GenerationMode, ReadonlyArray<GenerationResponse["kind"]>> = {
  repair: ["replace", "file"],
  extend: ["append", "file"],
  document: ["file"],
};

// ============================================================================
// Response Parsing
// ============================================================================

/**
 * Remove a surrounding Markdown code fence, if any
 */
export function stripFences(text: string): string {
  const trimmed = text.trim();
  const match = /^```[\w-]*\n([\s\S]*?)\n?```$/.exec(trimmed);
  return match ? (match[1] ?? "").trim() : trimmed;
}

/**
 * Extract and validate the JSON object in a model response
 */
export function parseGenerationResponse(text: string): Result<GenerationResponse, GenerationError> {
  const body = stripFences(text);
  const start = body.indexOf("{");
  const end = body.lastIndexOf("}");
  if (start === -1 || end < start) {
    return { ok: false, error: new GenerationError("response contains no JSON object", "malformed") };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(body.slice(start, end + 1));
  } catch (error) {
    return {
      ok: false,
      error: new GenerationError(`response is not valid JSON: ${errorMessage(error)}`, "malformed", {
        cause: error,
      }),
    };
  }

  const parsed = GenerationResponseSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    return {
      ok: false,
      error: new GenerationError(
        `response does not match the patch schema${where}: ${issue?.message ?? "unknown issue"}`,
        "malformed"
      ),
    };
  }

  return { ok: true, value: parsed.data };
}

function lineAt(content: string, offset: number): number {
  let line = 1;
  for (let i = content.indexOf("\n"); i !== -1 && i < offset; i = content.indexOf("\n", i + 1)) {
    line++;
  }
  return line;
}

/**
 * Offset of `original` in the buffer, nearest to `line` when it occurs more than once
 */
export function locateOriginal(content: string, original: string, line?: number): number {
  let best = -1;
  let bestDistance = Infinity;

  for (let at = content.indexOf(original); at !== -1; at = content.indexOf(original, at + 1)) {
    if (line === undefined) return at;
    const distance = Math.abs(lineAt(content, at) - line);
    if (distance < bestDistance) {
      best = at;
      bestDistance = distance;
    }
  }

  return best;
}

export interface ToPatchOptions {
  usage?: TokenUsage;
  /** The model saw excerpts rather than the whole file */
  partial?: boolean;
}

/**
 * Turn a validated response into a patch against `content`
 */
export function toPatch(
  response: GenerationResponse,
  request: GenerationRequest,
  id: string,
  options: ToPatchOptions = {}
): Result<Patch, GenerationError> {
  const invalid = (message: string): Result<Patch, GenerationError> => ({
    ok: false,
    error: new GenerationError(message, "invalid"),
  });

  if (!ALLOWED_KINDS[request.mode].includes(response.kind)) {
    return invalid(`"${response.kind}" responses are not accepted in ${request.mode} mode`);
  }

  const base = {
    id,
    origin: "generative" as const,
    targets: request.diagnostics,
    baseDigest: contentDigest(request.content),
    metadata: { confidence: response.confidence, rationale: response.rationale, usage: options.usage },
  };

  switch (response.kind) {
    case "replace": {
      if (response.original === response.replacement) {
        return invalid("replacement is identical to the original text");
      }
      const at = locateOriginal(request.content, response.original, response.line);
      if (at === -1) {
        return invalid("original text does not occur in the file");
      }
      return {
        ok: true,
        value: {
          ...base,
          description: `Replace text at line ${lineAt(request.content, at)}`,
          edit: {
            type: "span",
            start: at,
            end: at + response.original.length,
            expected: response.original,
            replacement: response.replacement,
          },
        },
      };
    }

    case "file": {
      if (options.partial) {
        return invalid("whole-file replacement built from excerpts would drop the omitted lines");
      }
      const content = stripFences(response.content);
      if (content.trim().length === 0) {
        return invalid("whole-file replacement is empty");
      }
      if (content === request.content.trim()) {
        return invalid("whole-file replacement is identical to the current file");
      }
      if (request.mode === "extend" && !content.startsWith(request.content.trim())) {
        return invalid("extended file does not keep the existing content");
      }
      return {
        ok: true,
        value: {
          ...base,
          description: "Replace the whole file",
          edit: { type: "file", content: content.endsWith("\n") ? content : `${content}\n` },
        },
      };
    }

    case "append": {
      const content = stripFences(response.content);
      if (content.trim().length === 0) {
        return invalid("appended content is empty");
      }
      return {
        ok: true,
        value: { ...base, description: "Append new declarations", edit: { type: "append", content } },
      };
    }
  }
}

// ============================================================================
// Adapter
// ============================================================================

export interface LlmRepairAdapterOptions {
  contextLines?: number;
  countTokens?: TokenCounter;
}

/**
 * Run a promise under a deadline, aborting the underlying request on expiry
 */
async function withDeadline<T>(
  run: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<{ value: T } | { timedOut: true }> {
  const controller = new AbortController();
  const onAbort = (): void => controller.abort(parent?.reason);
  parent?.addEventListener("abort", onAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<{ timedOut: true }>((resolve) => {
    timer = setTimeout(() => {
      controller.abort(new Error(`timed out after ${timeoutMs}ms`));
      resolve({ timedOut: true });
    }, timeoutMs);
  });

  try {
    return await Promise.race([run(controller.signal).then((value) => ({ value })), deadline]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener("abort", onAbort);
  }
}

export class LlmRepairAdapter implements GenerativeRepairAdapter {
  private readonly client: TextGenerationClient;
  private readonly contextLines: number;
  private readonly countTokens: TokenCounter;
  private calls = 0;

  constructor(client: TextGenerationClient, options: LlmRepairAdapterOptions = {}) {
    this.client = client;
    this.contextLines = options.contextLines ?? 20;
    this.countTokens = options.countTokens ?? defaultCountTokens;
  }

  async propose(
    request: GenerationRequest,
    budget: GenerationBudget,
    signal?: AbortSignal
  ): Promise<Result<Patch, GenerationError>> {
    const id = `gen-${request.mode}-${++this.calls}`;

    let window: ContextWindow;
    let prompt: string;
    let promptTokens: number;
    try {
      window = buildContextWindow(request.content, request.diagnostics, {
        maxTokens: budget.maxPromptTokens,
        contextLines: this.contextLines,
        countTokens: this.countTokens,
      });
      prompt = buildPrompt(request, window);
      promptTokens = this.countTokens(prompt);
    } catch (error) {
      return {
        ok: false,
        error: new GenerationError(`could not measure the prompt: ${errorMessage(error)}`, "budget", {
          cause: error,
        }),
      };
    }

    if (window.partial && request.mode !== "repair") {
      return {
        ok: false,
        error: new GenerationError(`file exceeds the prompt budget for ${request.mode} mode`, "budget"),
      };
    }
    if (promptTokens > budget.maxPromptTokens) {
      return {
        ok: false,
        error: new GenerationError(
          `prompt needs ${promptTokens} tokens, budget is ${budget.maxPromptTokens}`,
          "budget"
        ),
      };
    }

    let text: string;
    let usage: TokenUsage;
    try {
      const outcome = await withDeadline(
        (requestSignal) =>
          this.client.complete({
            system: SYSTEM_PROMPTS[request.mode],
            prompt,
            maxOutputTokens: budget.maxOutputTokens,
            timeoutMs: budget.timeoutMs,
            signal: requestSignal,
          }),
        budget.timeoutMs,
        signal
      );
      if ("timedOut" in outcome) {
        return {
          ok: false,
          error: new GenerationError(`generation timed out after ${budget.timeoutMs}ms`, "timeout"),
        };
      }
      ({ text, usage } = outcome.value);
    } catch (error) {
      return {
        ok: false,
        error: new GenerationError(`generation service failed: ${errorMessage(error)}`, "service", {
          cause: error,
        }),
      };
    }

    const parsed = parseGenerationResponse(text);
    if (!parsed.ok) return parsed;

    return toPatch(parsed.value, request, id, { usage, partial: window.partial });
  }
}
