/**
 * Judge factory and credential resolution.
 */

import { AnthropicJudge } from "./anthropicJudge.js";
import { OpenAIJudge } from "./openaiJudge.js";
import { JUDGE_PROVIDERS, type Judge, type JudgeCredentials, type JudgeProvider } from "./types.js";

export type { Judge, JudgeCredentials, JudgeProvider } from "./types.js";

/** Env var per provider; looked up in JUDGE_PROVIDERS order. */
const PROVIDER_ENV: Record<JudgeProvider, string> = {
  openrouter: "OPENROUTER_API_KEY",
  anthropic: "ANTHROPIC_API_KEY",
  openai: "OPENAI_API_KEY",
};

export function isJudgeProvider(value: string): value is JudgeProvider {
  return JUDGE_PROVIDERS.some((p) => p === value);
}

/** First provider with a non-empty key in the given env. Resolved once by the caller. */
export function resolveJudgeCredentials(env: NodeJS.ProcessEnv = process.env): JudgeCredentials | null {
  for (const provider of JUDGE_PROVIDERS) {
    const key = env[PROVIDER_ENV[provider]]?.trim();
    if (key) return { provider, apiKey: key };
  }
  return null;
}

export function createJudge(credentials: JudgeCredentials | null | undefined): Judge | null {
  if (!credentials || credentials.apiKey.trim() === "") return null;
  switch (credentials.provider) {
    case "anthropic":
      return new AnthropicJudge(credentials.apiKey);
    case "openai":
    case "openrouter":
      return new OpenAIJudge(credentials.apiKey, credentials.provider);
  }
}
