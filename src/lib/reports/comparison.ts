/**
 * Ranking and comparison views over agent results.
 */

import type { AgentResult, Evaluation, RankedResult } from "../evaluation/types.js";

const MEDALS = ["🥇", "🥈", "🥉"];

export function medalFor(rank: number): string {
  return MEDALS[rank - 1] ?? "";
}

function round1(n: number): number {
  return Math.round(n * 10) / 10;
}

/** Score descending; ties keep the evaluation's agent order. */
export function rankResults(agents: readonly string[], results: readonly AgentResult[]): RankedResult[] {
  const order = (name: string) => {
    const i = agents.indexOf(name);
    return i < 0 ? agents.length : i;
  };
  return [...results]
    .sort((a, b) => b.score - a.score || order(a.agentName) - order(b.agentName))
    .map((r, i) => ({
      rank: i + 1,
      agentName: r.agentName,
      score: r.score,
      feedback: r.feedback,
      breakdown: { ...r.breakdown },
    }));
}

/** "70-79"; 100 falls into "90-100". */
export function scoreBucket(score: number): string {
  const low = Math.min(90, Math.floor(score / 10) * 10);
  return low === 90 ? "90-100" : `${low}-${low + 9}`;
}

export interface ComparisonRanking extends RankedResult {
  medal: string;
  completedAtISO?: string;
}

export interface ScoreSummary {
  averageScore: number;
  highestScore: number;
  lowestScore: number;
  scoreRange: number;
  totalAgents: number;
}

export interface CriterionStats {
  average: number;
  max: number;
  min: number;
  scores: Record<string, number>;
}

export interface ComparisonReport {
  evaluationId: string;
  taskId: string;
  status: Evaluation["status"];
  rankings: ComparisonRanking[];
  summary: ScoreSummary | null;
  scoreDistribution: Record<string, number>;
  criteriaBreakdown: Record<string, CriterionStats>;
}

export function summarizeScores(ranked: readonly RankedResult[]): ScoreSummary | null {
  const first = ranked[0];
  const last = ranked[ranked.length - 1];
  if (!first || !last) return null;
  const total = ranked.reduce((sum, r) => sum + r.score, 0);
  return {
    averageScore: round1(total / ranked.length),
    highestScore: first.score,
    lowestScore: last.score,
    scoreRange: first.score - last.score,
    totalAgents: ranked.length,
  };
}

export function buildComparison(evaluation: Evaluation, results: readonly AgentResult[]): ComparisonReport {
  const ranked = rankResults(evaluation.agents, results);
  const completedAt = new Map(results.map((r) => [r.agentName, r.completedAtISO]));
  const distribution: Record<string, number> = {};
  const criteria: Record<string, Record<string, number>> = {};

  for (const r of ranked) {
    const bucket = scoreBucket(r.score);
    distribution[bucket] = (distribution[bucket] ?? 0) + 1;
    for (const [criterion, score] of Object.entries(r.breakdown)) {
      const byAgent = criteria[criterion] ?? {};
      byAgent[r.agentName] = score;
      criteria[criterion] = byAgent;
    }
  }

  const criteriaBreakdown: Record<string, CriterionStats> = {};
  for (const [criterion, byAgent] of Object.entries(criteria)) {
    const scores = Object.values(byAgent);
    criteriaBreakdown[criterion] = {
      average: round1(scores.reduce((a, b) => a + b, 0) / scores.length),
      max: Math.max(...scores),
      min: Math.min(...scores),
      scores: byAgent,
    };
  }

  return {
    evaluationId: evaluation.id,
    taskId: evaluation.taskId,
    status: evaluation.status,
    rankings: ranked.map((r) => ({ ...r, medal: medalFor(r.rank), completedAtISO: completedAt.get(r.agentName) })),
    summary: summarizeScores(ranked),
    scoreDistribution: distribution,
    criteriaBreakdown,
  };
}

export function renderComparisonMarkdown(evaluationId: string, ranked: readonly RankedResult[]): string {
  const lines = [`# Evaluation Results: ${evaluationId}`, "", "## Rankings", ""];
  for (const r of ranked) {
    const medal = medalFor(r.rank);
    lines.push(`${r.rank}. ${medal ? medal + " " : ""}**${r.agentName}**: ${r.score}/100`);
    if (r.feedback) lines.push(`   - ${r.feedback}`);
  }
  const summary = summarizeScores(ranked);
  if (summary) {
    lines.push(
      "",
      "## Summary",
      "",
      `- Agents: ${summary.totalAgents}`,
      `- Average: ${summary.averageScore}`,
      `- Range: ${summary.lowestScore}-${summary.highestScore}`
    );
  }
  return lines.join("\n") + "\n";
}

export interface LeaderboardEntry {
  rank: number;
  medal: string;
  agentName: string;
  averageScore: number;
  totalEvaluations: number;
  bestScore: number;
  worstScore: number;
  /** average / best * 100 */
  consistency: number;
}

export function buildLeaderboard(results: readonly AgentResult[], limit = 10): LeaderboardEntry[] {
  const byAgent = new Map<string, number[]>();
  for (const r of results) {
    const scores = byAgent.get(r.agentName) ?? [];
    scores.push(r.score);
    byAgent.set(r.agentName, scores);
  }
  const rows = [...byAgent.entries()].map(([agentName, scores]) => {
    const avg = scores.reduce((a, b) => a + b, 0) / scores.length;
    const best = Math.max(...scores);
    return {
      agentName,
      avg,
      averageScore: round1(avg),
      totalEvaluations: scores.length,
      bestScore: best,
      worstScore: Math.min(...scores),
      consistency: best > 0 ? round1((avg / best) * 100) : 0,
    };
  });
  rows.sort((a, b) => b.avg - a.avg || a.agentName.localeCompare(b.agentName));
  return rows.slice(0, limit).map(({ avg: _avg, ...row }, i) => ({ rank: i + 1, medal: medalFor(i + 1), ...row }));
}

export interface ResultsSummary {
  totalEvaluations: number;
  byStatus: Record<Evaluation["status"], number>;
  recentEvaluations: number;
  agentPerformance: Record<string, { averageScore: number; totalEvaluations: number }>;
}

export function buildResultsSummary(
  evaluations: readonly Evaluation[],
  results: readonly AgentResult[],
  now: Date = new Date(),
  recentDays = 7
): ResultsSummary {
  const byStatus: Record<Evaluation["status"], number> = { pending: 0, active: 0, completed: 0, failed: 0 };
  const cutoff = now.getTime() - recentDays * 24 * 60 * 60 * 1000;
  let recent = 0;
  for (const e of evaluations) {
    byStatus[e.status]++;
    if (Date.parse(e.createdAtISO) >= cutoff) recent++;
  }
  const agentPerformance: ResultsSummary["agentPerformance"] = {};
  for (const entry of buildLeaderboard(results, Number.POSITIVE_INFINITY)) {
    agentPerformance[entry.agentName] = {
      averageScore: entry.averageScore,
      totalEvaluations: entry.totalEvaluations,
    };
  }
  return { totalEvaluations: evaluations.length, byStatus, recentEvaluations: recent, agentPerformance };
}

export interface TrendPoint {
  date: string;
  score: number;
}

export interface Trends {
  days: number;
  agents: Record<string, TrendPoint[]>;
  dailyAverages: Record<string, number>;
}

/** Scores per agent per day (UTC) over the last `days` days, oldest first. */
export function buildTrends(results: readonly AgentResult[], days: number, now: Date = new Date()): Trends {
  const cutoff = now.getTime() - days * 24 * 60 * 60 * 1000;
  const agents: Record<string, TrendPoint[]> = {};
  const perDay: Record<string, number[]> = {};
  const inWindow = results
    .filter((r) => Date.parse(r.completedAtISO) >= cutoff)
    .sort((a, b) => a.completedAtISO.localeCompare(b.completedAtISO));
  for (const r of inWindow) {
    const date = r.completedAtISO.slice(0, 10);
    agents[r.agentName] = [...(agents[r.agentName] ?? []), { date, score: r.score }];
    perDay[date] = [...(perDay[date] ?? []), r.score];
  }
  const dailyAverages: Record<string, number> = {};
  for (const [date, scores] of Object.entries(perDay)) {
    dailyAverages[date] = round1(scores.reduce((a, b) => a + b, 0) / scores.length);
  }
  return { days, agents, dailyAverages };
}
