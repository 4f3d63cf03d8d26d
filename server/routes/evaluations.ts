/**
 * Evaluation lifecycle routes: create, inspect, submit agents for scoring, reset.
 */

import type { Request, Response } from "express";
import { z } from "zod";
import type { EvaluationRuntime } from "../../src/lib/evaluation/index.js";
import { EvaluationStatusSchema } from "../../src/lib/evaluation/schemas.js";
import { InvalidInputError, NotFoundError } from "../../src/lib/errors.js";
import { requestJudge, sendError, validationError } from "./http.js";

const CreateBodySchema = z.object({
  taskId: z.string().min(1),
  agents: z.array(z.string().min(1)).min(1),
  createdBy: z.string().min(1).optional(),
  metadata: z.record(z.string(), z.unknown()).optional(),
});

const ListQuerySchema = z.object({
  status: EvaluationStatusSchema.optional(),
  taskId: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

export function evaluationRoutes(runtime: EvaluationRuntime) {
  const { store, orchestrator, queue } = runtime;

  async function requireEvaluation(id: string) {
    const evaluation = await store.getEvaluation(id);
    if (!evaluation) throw new NotFoundError(`Evaluation ${id} not found`);
    return evaluation;
  }

  return {
    async createPost(req: Request, res: Response): Promise<void> {
      try {
        const parsed = CreateBodySchema.safeParse(req.body);
        if (!parsed.success) throw validationError(parsed.error);
        const evaluation = await orchestrator.createEvaluation(parsed.data);
        res.status(201).json(evaluation);
      } catch (err) {
        sendError(res, err);
      }
    },

    async listGet(req: Request, res: Response): Promise<void> {
      try {
        const parsed = ListQuerySchema.safeParse(req.query);
        if (!parsed.success) throw validationError(parsed.error);
        const evaluations = await store.listEvaluations(parsed.data);
        res.json({ evaluations });
      } catch (err) {
        sendError(res, err);
      }
    },

    async getOne(req: Request, res: Response): Promise<void> {
      try {
        const id = req.params.id ?? "";
        const evaluation = await requireEvaluation(id);
        const results = await store.listAgentResults({ evaluationId: id });
        res.json({ ...evaluation, results, jobs: queue.listJobs(id) });
      } catch (err) {
        sendError(res, err);
      }
    },

    /** Agent signals its solution is ready; scoring runs in the background. */
    async agentCompletePost(req: Request, res: Response): Promise<void> {
      try {
        const id = req.params.id ?? "";
        const agent = req.params.agent ?? "";
        const evaluation = await requireEvaluation(id);
        if (!evaluation.agents.includes(agent)) {
          throw new InvalidInputError(`Agent ${agent} is not part of evaluation ${id}`);
        }
        const job = queue.submit(id, agent, { judge: requestJudge(req) });
        res.status(202).json({ job });
      } catch (err) {
        sendError(res, err);
      }
    },

    /** Queues every agent that has not completed yet. */
    async runPost(req: Request, res: Response): Promise<void> {
      try {
        const id = req.params.id ?? "";
        const evaluation = await requireEvaluation(id);
        const judge = requestJudge(req);
        const jobs = evaluation.agents
          .filter((a) => evaluation.agentStatus[a] !== "completed")
          .map((a) => queue.submit(id, a, { judge }));
        res.status(202).json({ jobs });
      } catch (err) {
        sendError(res, err);
      }
    },

    async resetPost(req: Request, res: Response): Promise<void> {
      try {
        const evaluation = await orchestrator.resetEvaluation(req.params.id ?? "");
        res.json(evaluation);
      } catch (err) {
        sendError(res, err);
      }
    },

    async jobGet(req: Request, res: Response): Promise<void> {
      const job = queue.getJob(req.params.jobId ?? "");
      if (!job) {
        res.status(404).json({ error: "Job not found" });
        return;
      }
      res.json(job);
    },
  };
}
