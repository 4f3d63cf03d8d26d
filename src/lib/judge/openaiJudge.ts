/**
 * Chat Completions judge. Serves OpenAI directly and OpenRouter through its
 * OpenAI-compatible endpoint.
 */

import OpenAI from "openai";
import {
  JUDGE_MAX_TOKENS,
  JUDGE_SYSTEM_PROMPT,
  JUDGE_TEMPERATURE,
  type Judge,
  type JudgeAskOptions,
} from "./types.js";

export const OPENROUTER_BASE_URL = "https://openrouter.ai/api/v1";

export class OpenAIJudge implements Judge {
  readonly provider: "openai" | "openrouter";
  private readonly client: OpenAI;

  constructor(apiKey: string, provider: "openai" | "openrouter" = "openai") {
    if (apiKey.trim() === "") {
      throw new Error(`An API key is required for the ${provider} judge.`);
    }
    this.provider = provider;
    this.client = new OpenAI({
      apiKey,
      maxRetries: 0,
      ...(provider === "openrouter" && { baseURL: OPENROUTER_BASE_URL }),
    });
  }

  async ask(prompt: string, model: string, opts?: JudgeAskOptions): Promise<string> {
    const response = await this.client.chat.completions.create(
      {
        model: this.provider === "openai" ? model.replace(/^openai\//, "") : model,
        messages: [
          { role: "system", content: JUDGE_SYSTEM_PROMPT },
          { role: "user", content: prompt },
        ],
        temperature: JUDGE_TEMPERATURE,
        max_tokens: JUDGE_MAX_TOKENS,
      },
      { signal: opts?.signal }
    );
    return response.choices[0]?.message?.content ?? "";
  }
}
