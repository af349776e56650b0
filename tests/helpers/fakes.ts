/**
 * In-process stand-ins for the checker and the generation service
 */

import { contentDigest } from "../../src/oracle/applier.js";
import type { TextGenerationClient, CompletionRequest, CompletionResponse } from "../../src/oracle/client.js";
import type { GenerationError } from "../../src/oracle/errors.js";
import type { GenerativeRepairAdapter } from "../../src/oracle/generative.js";
import type {
  CompileResult,
  Diagnostic,
  GenerationBudget,
  GenerationRequest,
  Patch,
  Result,
  Severity,
} from "../../src/output/types.js";
import type { DiagnosticsCollector } from "../../src/toolchain/collector.js";

export const BUDGET: GenerationBudget = {
  maxOutputTokens: 1024,
  maxPromptTokens: 4096,
  timeoutMs: 1000,
};

export function diag(line: number, column: number, message: string, severity: Severity = "error"): Diagnostic {
  return { severity, message, line, column, kind: "source" };
}

export function compiled(diagnostics: Diagnostic[] = []): CompileResult {
  const success = !diagnostics.some((d) => d.severity === "error");
  return { success, diagnostics, exitCode: success ? 0 : 1, output: "", durationMs: 1 };
}

/**
 * Collector whose verdict is a function of the buffer
 */
export class FakeCollector implements DiagnosticsCollector {
  readonly compiled: string[] = [];

  constructor(private readonly check: (content: string) => Diagnostic[]) {}

  async compile(fileContent: string): Promise<CompileResult> {
    this.compiled.push(fileContent);
    return compiled(this.check(fileContent));
  }

  get calls(): number {
    return this.compiled.length;
  }
}

/**
 * Generator answering from a queue of results; empty queue means "unavailable"
 */
export class QueueGenerator implements GenerativeRepairAdapter {
  readonly requests: GenerationRequest[] = [];

  constructor(private readonly answers: Array<(request: GenerationRequest) => Result<Patch, GenerationError>>) {}

  async propose(request: GenerationRequest): Promise<Result<Patch, GenerationError>> {
    this.requests.push(request);
    const next = this.answers.shift();
    if (!next) {
      throw new Error("QueueGenerator ran out of answers");
    }
    return next(request);
  }
}

export function filePatch(id: string, content: string, base?: string): Patch {
  return {
    id,
    origin: "generative",
    description: "Replace the whole file",
    edit: { type: "file", content },
    targets: [],
    baseDigest: base === undefined ? undefined : contentDigest(base),
  };
}

export function appendPatch(id: string, content: string): Patch {
  return {
    id,
    origin: "generative",
    description: "Append new declarations",
    edit: { type: "append", content },
    targets: [],
  };
}

/**
 * Generation client returning canned text
 */
export class CannedClient implements TextGenerationClient {
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly reply: (request: CompletionRequest) => Promise<string> | string) {}

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    this.requests.push(request);
    const text = await this.reply(request);
    return { text, usage: { inputTokens: 10, outputTokens: 5 } };
  }
}

/** Whitespace-separated word count; keeps token budgets predictable in tests */
export const wordCount = (text: string): number => text.split(/\s+/).filter(Boolean).length;
