import { describe, it, expect } from "vitest";
import { makeEvaluation, makeResult } from "../../testing/fakes.js";
import {
  buildComparison,
  buildLeaderboard,
  buildResultsSummary,
  buildTrends,
  rankResults,
  renderComparisonMarkdown,
  scoreBucket,
} from "../comparison.js";

describe("rankResults", () => {
  it("orders by score and breaks ties by agent order", () => {
    const ranked = rankResults(
      ["x", "y", "z"],
      [makeResult({ agentName: "y", score: 80 }), makeResult({ agentName: "x", score: 80 }), makeResult({ agentName: "z", score: 90 })]
    );
    expect(ranked.map((r) => [r.rank, r.agentName])).toEqual([
      [1, "z"],
      [2, "x"],
      [3, "y"],
    ]);
  });
});

describe("scoreBucket", () => {
  it("puts 100 with the nineties", () => {
    expect(scoreBucket(100)).toBe("90-100");
    expect(scoreBucket(90)).toBe("90-100");
    expect(scoreBucket(89)).toBe("80-89");
    expect(scoreBucket(0)).toBe("0-9");
  });
});

describe("buildComparison", () => {
  const evaluation = makeEvaluation({ id: "e1", status: "completed" });
  const results = [
    makeResult({ evaluationId: "e1", agentName: "b", score: 60, feedback: "ok", breakdown: { p: 20, s: 5 } }),
    makeResult({
      evaluationId: "e1",
      agentName: "a",
      score: 95,
      feedback: "great",
      breakdown: { p: 40, s: 10 },
      completedAtISO: "2026-01-02T00:00:00.000Z",
    }),
  ];

  it("ranks agents and aggregates per-criterion stats", () => {
    const report = buildComparison(evaluation, results);
    expect(report.rankings.map((r) => [r.rank, r.medal, r.agentName, r.completedAtISO])).toEqual([
      [1, "🥇", "a", "2026-01-02T00:00:00.000Z"],
      [2, "🥈", "b", "2026-01-01T00:01:00.000Z"],
    ]);
    expect(report.summary).toEqual({
      averageScore: 77.5,
      highestScore: 95,
      lowestScore: 60,
      scoreRange: 35,
      totalAgents: 2,
    });
    expect(report.scoreDistribution).toEqual({ "90-100": 1, "60-69": 1 });
    expect(report.criteriaBreakdown).toEqual({
      p: { average: 30, max: 40, min: 20, scores: { a: 40, b: 20 } },
      s: { average: 7.5, max: 10, min: 5, scores: { a: 10, b: 5 } },
    });
  });

  it("has no summary without results", () => {
    expect(buildComparison(evaluation, []).summary).toBeNull();
  });

  it("renders the markdown report", () => {
    const markdown = renderComparisonMarkdown("e1", rankResults(evaluation.agents, results));
    expect(markdown).toBe(
      [
        "# Evaluation Results: e1",
        "",
        "## Rankings",
        "",
        "1. 🥇 **a**: 95/100",
        "   - great",
        "2. 🥈 **b**: 60/100",
        "   - ok",
        "",
        "## Summary",
        "",
        "- Agents: 2",
        "- Average: 77.5",
        "- Range: 60-95",
        "",
      ].join("\n")
    );
    expect(renderComparisonMarkdown("e1", [])).toBe("# Evaluation Results: e1\n\n## Rankings\n\n");
  });
});

describe("buildLeaderboard", () => {
  it("averages per agent and limits the rows", () => {
    const results = [
      makeResult({ agentName: "a", score: 90 }),
      makeResult({ agentName: "a", score: 70 }),
      makeResult({ agentName: "b", score: 85 }),
      makeResult({ agentName: "c", score: 0 }),
    ];
    expect(buildLeaderboard(results, 2)).toEqual([
      {
        rank: 1,
        medal: "🥇",
        agentName: "b",
        averageScore: 85,
        totalEvaluations: 1,
        bestScore: 85,
        worstScore: 85,
        consistency: 100,
      },
      {
        rank: 2,
        medal: "🥈",
        agentName: "a",
        averageScore: 80,
        totalEvaluations: 2,
        bestScore: 90,
        worstScore: 70,
        consistency: 88.9,
      },
    ]);
    expect(buildLeaderboard(results).at(-1)?.consistency).toBe(0);
  });
});

describe("buildResultsSummary", () => {
  it("counts statuses and recent evaluations", () => {
    const now = new Date("2026-01-10T00:00:00.000Z");
    const summary = buildResultsSummary(
      [
        makeEvaluation({ id: "e1", status: "completed", createdAtISO: "2026-01-05T00:00:00.000Z" }),
        makeEvaluation({ id: "e2", status: "active", createdAtISO: "2025-12-01T00:00:00.000Z" }),
      ],
      [makeResult({ agentName: "a", score: 40 }), makeResult({ agentName: "a", score: 61 })],
      now
    );
    expect(summary).toEqual({
      totalEvaluations: 2,
      byStatus: { pending: 0, active: 1, completed: 1, failed: 0 },
      recentEvaluations: 1,
      agentPerformance: { a: { averageScore: 50.5, totalEvaluations: 2 } },
    });
  });
});

describe("buildTrends", () => {
  it("groups in-window scores by day", () => {
    const now = new Date("2026-01-10T12:00:00.000Z");
    const trends = buildTrends(
      [
        makeResult({ agentName: "a", score: 60, completedAtISO: "2026-01-09T10:00:00.000Z" }),
        makeResult({ agentName: "b", score: 80, completedAtISO: "2026-01-09T11:00:00.000Z" }),
        makeResult({ agentName: "a", score: 40, completedAtISO: "2026-01-05T08:00:00.000Z" }),
        makeResult({ agentName: "a", score: 99, completedAtISO: "2025-12-20T08:00:00.000Z" }),
      ],
      7,
      now
    );
    expect(trends).toEqual({
      days: 7,
      agents: {
        a: [
          { date: "2026-01-05", score: 40 },
          { date: "2026-01-09", score: 60 },
        ],
        b: [{ date: "2026-01-09", score: 80 }],
      },
      dailyAverages: { "2026-01-05": 40, "2026-01-09": 70 },
    });
  });
});
