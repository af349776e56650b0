/**
 * Text generation client
 *
 * The repair loop only needs "prompt in, text out" from the service; this
 * interface is the whole contract.
 */

import Anthropic from "@anthropic-ai/sdk";
import type { TokenUsage } from "../output/types.js";

export interface CompletionRequest {
  system: string;
  prompt: string;
  maxOutputTokens: number;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface CompletionResponse {
  text: string;
  usage: TokenUsage;
}

export interface TextGenerationClient {
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}

export const DEFAULT_MODEL = "claude-sonnet-4-20250514";

/**
 * Real client using the Anthropic SDK
 */
export class AnthropicGenerationClient implements TextGenerationClient {
  private client: Anthropic;
  private model: string;

  constructor(apiKey: string, model: string = DEFAULT_MODEL) {
    // Retries would multiply the time budget; the loop decides what to do on failure
    this.client = new Anthropic({ apiKey, maxRetries: 0 });
    this.model = model;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const response = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: request.maxOutputTokens,
        system: request.system,
        messages: [{ role: "user", content: request.prompt }],
      },
      { timeout: request.timeoutMs, signal: request.signal }
    );

    const text = response.content
      .map((block) => (block.type === "text" ? block.text : ""))
      .join("");

    return {
      text,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
    };
  }
}
