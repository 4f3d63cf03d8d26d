/**
 * Judge abstraction: an external model that grades a solution from a prompt.
 */

export type JudgeProvider = "openrouter" | "openai" | "anthropic";

export const JUDGE_PROVIDERS: readonly JudgeProvider[] = ["openrouter", "anthropic", "openai"];

/**
 * Request-scoped judge credentials. Passed explicitly to the judge factory;
 * never cached process-wide.
 */
export interface JudgeCredentials {
  provider: JudgeProvider;
  apiKey: string;
}

export interface JudgeAskOptions {
  signal?: AbortSignal;
}

export interface Judge {
  readonly provider: JudgeProvider;
  /** Returns the raw reply text. Throws on transport or API failure. */
  ask(prompt: string, model: string, opts?: JudgeAskOptions): Promise<string>;
}

export const JUDGE_SYSTEM_PROMPT =
  "You are an expert code reviewer evaluating AI agent solutions. Always respond with valid JSON.";

export const JUDGE_TEMPERATURE = 0.1;

export const JUDGE_MAX_TOKENS = 2000;
