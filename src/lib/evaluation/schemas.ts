/**
 * Zod schemas for persisted evaluation records. Stores validate on read.
 */

import { z } from "zod";

export const EvaluationTypeSchema = z.enum(["rule_based", "ai_judge", "hybrid"]);

export const EvaluationStatusSchema = z.enum(["pending", "active", "completed", "failed"]);

export const AgentStatusSchema = z.enum(["pending", "ready", "evaluating", "completed", "failed"]);

export const EvaluationSchema = z.object({
  id: z.string().min(1),
  taskId: z.string().min(1),
  agents: z.array(z.string().min(1)).min(1),
  status: EvaluationStatusSchema,
  agentStatus: z.record(z.string(), AgentStatusSchema),
  metadata: z.record(z.string(), z.unknown()).default({}),
  failureReason: z.string().optional(),
  createdAtISO: z.string(),
  updatedAtISO: z.string(),
});

export const AgentResultSchema = z.object({
  evaluationId: z.string().min(1),
  agentName: z.string().min(1),
  score: z.number().int().min(0).max(100),
  breakdown: z.record(z.string(), z.number()),
  feedback: z.string(),
  strengths: z.array(z.string()).default([]),
  improvements: z.array(z.string()).default([]),
  scoringKind: EvaluationTypeSchema,
  error: z.string().optional(),
  details: z.unknown(),
  status: z.enum(["completed", "failed"]),
  startedAtISO: z.string(),
  completedAtISO: z.string(),
});
