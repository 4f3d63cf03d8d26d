/**
 * Scoring strategies: one handler per evaluation type. Hybrid composes the
 * other two through the score combiner.
 */

import type { EvaluationType } from "../evaluation/types.js";
import type { Judge } from "../judge/types.js";
import type { Task } from "../tasks/types.js";
import { JudgeScorer, type JudgeScorerOptions } from "./judgeScorer.js";
import { combineScores } from "./scoreCombiner.js";
import { scoreStructure } from "./structuralScorer.js";
import type { FileSet, JudgeScore, ScoreResult, StructuralScore } from "./types.js";

export interface ScoringInput {
  task: Task;
  agentName: string;
  baseline: FileSet;
  solution: FileSet;
}

export interface ScoringDeps {
  /** Absent when no judge credentials are configured. */
  judge?: Judge | null;
  judgeOptions: JudgeScorerOptions;
}

type StrategyHandler = (input: ScoringInput, judge: Judge, deps: ScoringDeps) => Promise<ScoreResult>;

export function fromStructural(structural: StructuralScore): ScoreResult {
  return {
    kind: "rule_based",
    totalScore: structural.totalScore,
    breakdown: { ...structural.breakdown },
    feedback: `Structural analysis: ${structural.totalScore}/100`,
    strengths: [],
    improvements: [...structural.improvements],
    details: { structural },
  };
}

export function fromJudge(judge: JudgeScore): ScoreResult {
  return {
    kind: "ai_judge",
    totalScore: judge.totalScore,
    breakdown: { ...judge.breakdown },
    feedback: judge.feedback,
    strengths: [...judge.strengths],
    improvements: [...judge.improvements],
    ...(judge.error !== undefined && { error: judge.error }),
    details: { judge },
  };
}

function runJudge(input: ScoringInput, judge: Judge, deps: ScoringDeps): Promise<JudgeScore> {
  return new JudgeScorer(judge, deps.judgeOptions).score(input);
}

const JUDGE_HANDLERS: Record<Exclude<EvaluationType, "rule_based">, StrategyHandler> = {
  ai_judge: async (input, judge, deps) => fromJudge(await runJudge(input, judge, deps)),
  hybrid: async (input, judge, deps) => {
    const structural = scoreStructure(input.baseline, input.solution);
    return combineScores(structural, await runJudge(input, judge, deps));
  },
};

/** The strategy that will actually run: judge strategies degrade to rule_based without a judge. */
export function effectiveStrategy(requested: EvaluationType, judge: Judge | null | undefined): EvaluationType {
  return requested !== "rule_based" && !judge ? "rule_based" : requested;
}

export async function runScoring(input: ScoringInput, deps: ScoringDeps): Promise<ScoreResult> {
  const requested = input.task.evaluationType;
  const strategy = effectiveStrategy(requested, deps.judge);
  if (strategy === "rule_based" || !deps.judge) {
    if (requested !== strategy) {
      console.warn(`[Scoring] No judge configured; scoring ${input.agentName} with rule_based instead of ${requested}`);
    }
    return fromStructural(scoreStructure(input.baseline, input.solution));
  }
  return JUDGE_HANDLERS[strategy](input, deps.judge, deps);
}
