/**
 * Anthropic judge using the Messages API.
 */

import Anthropic from "@anthropic-ai/sdk";
import {
  JUDGE_MAX_TOKENS,
  JUDGE_SYSTEM_PROMPT,
  JUDGE_TEMPERATURE,
  type Judge,
  type JudgeAskOptions,
} from "./types.js";

/** "anthropic/claude-3-sonnet" -> "claude-3-sonnet" */
export function toAnthropicModelId(model: string): string {
  return model.startsWith("anthropic/") ? model.slice("anthropic/".length) : model;
}

export class AnthropicJudge implements Judge {
  readonly provider = "anthropic" as const;
  private readonly client: Anthropic;

  constructor(apiKey: string) {
    if (apiKey.trim() === "") {
      throw new Error("An Anthropic API key is required for AnthropicJudge.");
    }
    this.client = new Anthropic({ apiKey, maxRetries: 0 });
  }

  async ask(prompt: string, model: string, opts?: JudgeAskOptions): Promise<string> {
    const response = await this.client.messages.create(
      {
        model: toAnthropicModelId(model),
        max_tokens: JUDGE_MAX_TOKENS,
        temperature: JUDGE_TEMPERATURE,
        system: JUDGE_SYSTEM_PROMPT,
        messages: [{ role: "user", content: prompt }],
      },
      { signal: opts?.signal }
    );
    return response.content.map((block) => ("text" in block ? block.text : "")).join("");
  }
}
