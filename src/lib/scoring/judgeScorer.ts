/**
 * AI-judge scorer: builds a grading prompt, asks the injected Judge under a
 * timeout, and normalizes the reply. Never throws; failures become a zero score
 * with an error marker.
 */

import { z } from "zod";
import { JudgeError, errorMessage } from "../errors.js";
import type { Judge } from "../judge/types.js";
import { parseJsonObject } from "../llm/jsonExtract.js";
import type { RubricCriterion, Task } from "../tasks/types.js";
import type { FileSet, JudgeScore } from "./types.js";

export const FILE_PREVIEW_CHARS = 3000;

export interface JudgeScorerOptions {
  timeoutMs: number;
  /** Used when the task names no judge model. */
  defaultModel: string;
}

export interface JudgeScoreInput {
  task: Task;
  agentName: string;
  baseline: FileSet;
  solution: FileSet;
}

const JudgeReplySchema = z.object({
  scores: z.record(z.string(), z.number()).nullish(),
  total_score: z.number().nullish(),
  feedback: z.string().nullish(),
  strengths: z.array(z.string()).nullish(),
  improvements: z.array(z.string()).nullish(),
});

function formatCriteria(rubric: RubricCriterion[]): string {
  if (rubric.length === 0) return "No specific criteria defined.";
  return rubric.map((c) => `- **${c.name}** (${c.weight} points): ${c.description || "No description"}`).join("\n");
}

function formatFiles(files: FileSet, label: string): string {
  const entries = Object.entries(files);
  if (entries.length === 0) return `${label}: No files provided`;
  const parts = [`${label}:`];
  for (const [name, content] of entries) {
    const body =
      content.length > FILE_PREVIEW_CHARS ? content.slice(0, FILE_PREVIEW_CHARS) + "\n... (truncated)" : content;
    parts.push(`\n### ${name}`, "```\n" + body + "\n```");
  }
  return parts.join("\n");
}

/** Deterministic for identical inputs. */
export function buildJudgePrompt(input: JudgeScoreInput): string {
  const { task, agentName, baseline, solution } = input;
  let prompt = `# Task Evaluation: ${task.name}

## Task Description
${task.description || "No description provided"}

## Agent Being Evaluated
${agentName}

## Scoring Criteria
${formatCriteria(task.rubric)}

## Baseline Files (Original)
${formatFiles(baseline, "BASELINE")}

## Solution Files (Agent Output)
${formatFiles(solution, "SOLUTION")}

## Instructions
Grade the solution against the scoring criteria. Weigh whether it meets the task goals,
the quality and maintainability of the result, and anything it broke along the way.
Never award a criterion more than its points.

Reply with JSON only, in exactly this shape:
\`\`\`json
{
  "scores": { "<criterion_name>": <points awarded> },
  "total_score": <sum of scores, 0-100>,
  "feedback": "<2-3 sentence summary>",
  "strengths": ["..."],
  "improvements": ["..."]
}
\`\`\``;
  if (task.judgePromptTemplate) {
    prompt += `\n\n## Additional Evaluation Guidelines\n${task.judgePromptTemplate}`;
  }
  return prompt;
}

async function askWithTimeout(judge: Judge, prompt: string, model: string, timeoutMs: number): Promise<string> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Settle first so the race reports the timeout, not the aborted call.
      reject(new JudgeError(`Judge timed out after ${timeoutMs}ms`));
      controller.abort();
    }, timeoutMs);
  });
  try {
    return await Promise.race([judge.ask(prompt, model, { signal: controller.signal }), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function clamp(n: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, n));
}

/**
 * Normalize a judge reply into a JudgeScore. Rubric criteria are capped to
 * their weight; the total defaults to the sum of criterion scores.
 * @throws JudgeError when the reply holds no usable JSON object
 */
export function parseJudgeReply(text: string, rubric: RubricCriterion[], model: string): JudgeScore {
  let raw: unknown;
  try {
    raw = parseJsonObject(text);
  } catch (err) {
    throw new JudgeError(errorMessage(err), { cause: err });
  }
  const result = JudgeReplySchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "reply"}: ${i.message}`).join("; ");
    throw new JudgeError(`Unexpected judge reply: ${issues}`);
  }
  const reply = result.data;
  const weights = new Map(rubric.map((c) => [c.name, c.weight]));
  const breakdown: Record<string, number> = {};
  for (const [name, value] of Object.entries(reply.scores ?? {})) {
    breakdown[name] = clamp(value, 0, weights.get(name) ?? 100);
  }
  const sum = Object.values(breakdown).reduce((a, b) => a + b, 0);
  return {
    kind: "ai_judge",
    totalScore: Math.round(clamp(reply.total_score ?? sum, 0, 100)),
    breakdown,
    feedback: reply.feedback ?? "No feedback provided",
    strengths: reply.strengths ?? [],
    improvements: reply.improvements ?? [],
    model,
  };
}

export function judgeFailure(model: string, reason: string): JudgeScore {
  return {
    kind: "ai_judge",
    totalScore: 0,
    breakdown: {},
    feedback: `Evaluation failed: ${reason}`,
    strengths: [],
    improvements: [],
    model,
    error: reason,
  };
}

export class JudgeScorer {
  constructor(
    private readonly judge: Judge,
    private readonly options: JudgeScorerOptions
  ) {}

  async score(input: JudgeScoreInput): Promise<JudgeScore> {
    const model = input.task.judgeModel ?? this.options.defaultModel;
    try {
      const prompt = buildJudgePrompt(input);
      const text = await askWithTimeout(this.judge, prompt, model, this.options.timeoutMs);
      return parseJudgeReply(text, input.task.rubric, model);
    } catch (err) {
      const reason = errorMessage(err);
      console.warn(`[JudgeScorer] ${this.judge.provider} judge failed for ${input.agentName}: ${reason}`);
      return judgeFailure(model, reason);
    }
  }
}
