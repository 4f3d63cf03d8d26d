/**
 * Evaluation domain types.
 */

import type { z } from "zod";
import type {
  AgentResultSchema,
  AgentStatusSchema,
  EvaluationSchema,
  EvaluationStatusSchema,
  EvaluationTypeSchema,
} from "./schemas.js";

/** Scoring strategy a task selects. */
export type EvaluationType = z.infer<typeof EvaluationTypeSchema>;

export type EvaluationStatus = z.infer<typeof EvaluationStatusSchema>;

export type AgentStatus = z.infer<typeof AgentStatusSchema>;

export type AgentStatusMap = Record<string, AgentStatus>;

/**
 * One evaluation run of a task across a fixed set of agents.
 * status is "completed" exactly when every agent is "completed".
 */
export type Evaluation = z.infer<typeof EvaluationSchema>;

/** Persisted score for one agent in one evaluation. Unique per (evaluationId, agentName). */
export type AgentResult = z.infer<typeof AgentResultSchema>;

/** Agent result with its position in the evaluation ranking. */
export interface RankedResult {
  rank: number;
  agentName: string;
  score: number;
  feedback: string;
  breakdown: Record<string, number>;
}
