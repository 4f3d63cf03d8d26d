/**
 * Result views: per-evaluation comparison, cross-evaluation leaderboard,
 * summary and trends.
 */

import type { Request, Response } from "express";
import { z } from "zod";
import type { EvaluationRuntime } from "../../src/lib/evaluation/index.js";
import { NotFoundError } from "../../src/lib/errors.js";
import {
  buildComparison,
  buildLeaderboard,
  buildResultsSummary,
  buildTrends,
} from "../../src/lib/reports/comparison.js";
import { TaskCategorySchema } from "../../src/lib/tasks/taskConfig.js";
import { sendError, validationError } from "./http.js";

const LeaderboardQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10),
  category: TaskCategorySchema.optional(),
});

const TrendsQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(365).default(30),
  agent: z.string().min(1).optional(),
});

export function resultRoutes(runtime: EvaluationRuntime) {
  const { store, tasks } = runtime;

  return {
    async comparisonGet(req: Request, res: Response): Promise<void> {
      try {
        const id = req.params.id ?? "";
        const evaluation = await store.getEvaluation(id);
        if (!evaluation) throw new NotFoundError(`Evaluation ${id} not found`);
        const [results, task] = await Promise.all([
          store.listAgentResults({ evaluationId: id }),
          tasks.getTask(evaluation.taskId).catch(() => null),
        ]);
        res.json({
          ...buildComparison(evaluation, results),
          task: task ? { id: task.id, name: task.name, category: task.category } : null,
        });
      } catch (err) {
        sendError(res, err);
      }
    },

    async leaderboardGet(req: Request, res: Response): Promise<void> {
      try {
        const parsed = LeaderboardQuerySchema.safeParse(req.query);
        if (!parsed.success) throw validationError(parsed.error);
        const { limit, category } = parsed.data;
        let results = await store.listAgentResults();
        if (category) {
          const taskIds = new Set(
            (await tasks.listTasks({ includeInactive: true })).filter((t) => t.category === category).map((t) => t.id)
          );
          const evaluationIds = new Set(
            (await store.listEvaluations()).filter((e) => taskIds.has(e.taskId)).map((e) => e.id)
          );
          results = results.filter((r) => evaluationIds.has(r.evaluationId));
        }
        res.json({ leaderboard: buildLeaderboard(results, limit) });
      } catch (err) {
        sendError(res, err);
      }
    },

    async summaryGet(_req: Request, res: Response): Promise<void> {
      try {
        const [evaluations, results] = await Promise.all([store.listEvaluations(), store.listAgentResults()]);
        res.json(buildResultsSummary(evaluations, results));
      } catch (err) {
        sendError(res, err);
      }
    },

    async trendsGet(req: Request, res: Response): Promise<void> {
      try {
        const parsed = TrendsQuerySchema.safeParse(req.query);
        if (!parsed.success) throw validationError(parsed.error);
        const results = await store.listAgentResults(parsed.data.agent ? { agentName: parsed.data.agent } : undefined);
        res.json(buildTrends(results, parsed.data.days));
      } catch (err) {
        sendError(res, err);
      }
    },
  };
}
