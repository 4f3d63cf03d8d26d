/**
 * Drizzle schema for evaluation persistence.
 */

import { integer, jsonb, pgTable, serial, text, timestamp, uniqueIndex } from "drizzle-orm/pg-core";
import type { AgentStatusMap, EvaluationStatus, EvaluationType } from "../evaluation/types.js";

/** One evaluation run of a task across its agents. */
export const evaluations = pgTable("evaluations", {
  id: text("id").primaryKey(),
  taskId: text("task_id").notNull(),
  agents: jsonb("agents").$type<string[]>().notNull(),
  status: text("status").$type<EvaluationStatus>().notNull(),
  agentStatus: jsonb("agent_status").$type<AgentStatusMap>().notNull(),
  metadata: jsonb("metadata").$type<Record<string, unknown>>().notNull(),
  failureReason: text("failure_reason"),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull(),
});

/** Per-agent scores. Re-evaluation updates the row for (evaluation_id, agent_name). */
export const agentResults = pgTable(
  "agent_results",
  {
    id: serial("id").primaryKey(),
    evaluationId: text("evaluation_id")
      .notNull()
      .references(() => evaluations.id),
    agentName: text("agent_name").notNull(),
    score: integer("score").notNull(),
    breakdown: jsonb("breakdown").$type<Record<string, number>>().notNull(),
    feedback: text("feedback").notNull(),
    strengths: jsonb("strengths").$type<string[]>().notNull(),
    improvements: jsonb("improvements").$type<string[]>().notNull(),
    scoringKind: text("scoring_kind").$type<EvaluationType>().notNull(),
    error: text("error"),
    details: jsonb("details"),
    status: text("status").$type<"completed" | "failed">().notNull(),
    startedAt: timestamp("started_at", { withTimezone: true }).notNull(),
    completedAt: timestamp("completed_at", { withTimezone: true }).notNull(),
  },
  (t) => ({
    evaluationAgentIdx: uniqueIndex("agent_results_evaluation_agent_idx").on(t.evaluationId, t.agentName),
  })
);
