/**
 * Hybrid score: fixed 70/30 blend of the structural and judge scores.
 */

import type { JudgeScore, ScoreResult, StructuralScore } from "./types.js";

export const STRUCTURAL_SHARE = 0.7;
export const JUDGE_SHARE = 0.3;

export function combineScores(structural: StructuralScore, judge: JudgeScore): ScoreResult {
  const combined = Math.round(STRUCTURAL_SHARE * structural.totalScore + JUDGE_SHARE * judge.totalScore);
  return {
    kind: "hybrid",
    totalScore: combined,
    breakdown: {
      rule_based_score: structural.totalScore,
      ai_judge_score: judge.totalScore,
      combined_score: combined,
    },
    feedback: `Rule-based: ${structural.totalScore}/100, AI Judge: ${judge.totalScore}/100`,
    strengths: [...judge.strengths],
    improvements: [...structural.improvements, ...judge.improvements],
    ...(judge.error !== undefined && { error: judge.error }),
    details: { structural, judge },
  };
}
