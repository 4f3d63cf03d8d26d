/**
 * Express app factory. Kept apart from the listener so tests can mount it
 * on an ephemeral port.
 */

import express, { type Express } from "express";
import cors from "cors";
import type { EvaluationRuntime } from "../src/lib/evaluation/index.js";
import { registerApiRoutes } from "./routes/index.js";

export function createApp(runtime: EvaluationRuntime): Express {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "10mb" }));

  registerApiRoutes(app, runtime);

  // Express 5 requires named wildcard: /{*splat}
  app.all("/{*splat}", (req, res) => {
    res.status(404).json({ error: `No route for ${req.method} ${req.path}` });
  });
  return app;
}
