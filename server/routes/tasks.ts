/**
 * Task catalog routes.
 */

import type { Request, Response } from "express";
import type { EvaluationRuntime } from "../../src/lib/evaluation/index.js";
import { NotFoundError } from "../../src/lib/errors.js";
import { sendError } from "./http.js";

export function taskRoutes(runtime: EvaluationRuntime) {
  return {
    async listGet(req: Request, res: Response): Promise<void> {
      try {
        const tasks = await runtime.tasks.listTasks({ includeInactive: req.query.includeInactive === "true" });
        res.json({ tasks });
      } catch (err) {
        sendError(res, err);
      }
    },

    async getOne(req: Request, res: Response): Promise<void> {
      try {
        const task = await runtime.tasks.getTask(req.params.id ?? "");
        if (!task) throw new NotFoundError(`Task ${req.params.id} not found`);
        res.json(task);
      } catch (err) {
        sendError(res, err);
      }
    },
  };
}
