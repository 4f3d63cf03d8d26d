/**
 * API route registration for Express.
 * Mounts all routes under /api via a dedicated router.
 */

import express, { type Express } from "express";
import type { EvaluationRuntime } from "../../src/lib/evaluation/index.js";
import { evaluationRoutes } from "./evaluations.js";
import { resultRoutes } from "./results.js";
import { taskRoutes } from "./tasks.js";

export function registerApiRoutes(app: Express, runtime: EvaluationRuntime): void {
  const api = express.Router();
  const tasks = taskRoutes(runtime);
  const evaluations = evaluationRoutes(runtime);
  const results = resultRoutes(runtime);

  api.get("/health", (_req, res) => {
    res.json({ ok: true, queue: runtime.queue.stats() });
  });

  // Tasks
  api.get("/tasks", tasks.listGet);
  api.get("/tasks/:id", tasks.getOne);

  // Evaluations
  api.post("/evaluations", evaluations.createPost);
  api.get("/evaluations", evaluations.listGet);
  api.get("/evaluations/:id", evaluations.getOne);
  api.post("/evaluations/:id/agents/:agent/complete", evaluations.agentCompletePost);
  api.post("/evaluations/:id/run", evaluations.runPost);
  api.post("/evaluations/:id/reset", evaluations.resetPost);
  api.get("/jobs/:jobId", evaluations.jobGet);

  // Results
  api.get("/results/leaderboard", results.leaderboardGet);
  api.get("/results/summary", results.summaryGet);
  api.get("/results/trends", results.trendsGet);
  api.get("/results/:id/comparison", results.comparisonGet);

  app.use("/api", api);
}
