/**
 * PostgreSQL result store (drizzle). withEvaluation runs a transaction that
 * holds the evaluation row FOR UPDATE.
 */

import { and, desc, eq, type SQL } from "drizzle-orm";
import { getDb, type DbTx } from "../db/index.js";
import { agentResults, evaluations } from "../db/schema.js";
import { AppError, InvalidInputError, NotFoundError, PersistenceError, errorMessage } from "../errors.js";
import type { AgentResult, AgentStatusMap, Evaluation, EvaluationStatus } from "../evaluation/types.js";
import type { AgentResultFilter, EvaluationFilter, EvaluationTx, ResultStore } from "./types.js";

const DEFAULT_LIST_LIMIT = 1000;

type EvaluationRow = typeof evaluations.$inferSelect;
type AgentResultRow = typeof agentResults.$inferSelect;

function rowToEvaluation(row: EvaluationRow): Evaluation {
  return {
    id: row.id,
    taskId: row.taskId,
    agents: row.agents,
    status: row.status,
    agentStatus: row.agentStatus,
    metadata: row.metadata,
    ...(row.failureReason != null && { failureReason: row.failureReason }),
    createdAtISO: row.createdAt.toISOString(),
    updatedAtISO: row.updatedAt.toISOString(),
  };
}

function rowToAgentResult(row: AgentResultRow): AgentResult {
  return {
    evaluationId: row.evaluationId,
    agentName: row.agentName,
    score: row.score,
    breakdown: row.breakdown,
    feedback: row.feedback,
    strengths: row.strengths,
    improvements: row.improvements,
    scoringKind: row.scoringKind,
    ...(row.error != null && { error: row.error }),
    details: row.details,
    status: row.status,
    startedAtISO: row.startedAt.toISOString(),
    completedAtISO: row.completedAt.toISOString(),
  };
}

class DbEvaluationTx implements EvaluationTx {
  constructor(private readonly tx: DbTx) {}

  async getEvaluation(evaluationId: string): Promise<Evaluation | null> {
    const rows = await this.tx.select().from(evaluations).where(eq(evaluations.id, evaluationId)).limit(1);
    const row = rows[0];
    return row ? rowToEvaluation(row) : null;
  }

  async upsertAgentResult(record: AgentResult): Promise<void> {
    const values = {
      evaluationId: record.evaluationId,
      agentName: record.agentName,
      score: record.score,
      breakdown: record.breakdown,
      feedback: record.feedback,
      strengths: record.strengths,
      improvements: record.improvements,
      scoringKind: record.scoringKind,
      error: record.error ?? null,
      details: record.details ?? null,
      status: record.status,
      startedAt: new Date(record.startedAtISO),
      completedAt: new Date(record.completedAtISO),
    };
    const exists = await this.getEvaluation(record.evaluationId);
    if (!exists) throw new NotFoundError(`Evaluation ${record.evaluationId} not found`);
    await this.tx
      .insert(agentResults)
      .values(values)
      .onConflictDoUpdate({
        target: [agentResults.evaluationId, agentResults.agentName],
        set: values,
      });
  }

  async updateEvaluationStatus(
    evaluationId: string,
    status: EvaluationStatus,
    agentStatus: AgentStatusMap,
    failureReason?: string
  ): Promise<void> {
    const updated = await this.tx
      .update(evaluations)
      .set({ status, agentStatus, failureReason: failureReason ?? null, updatedAt: new Date() })
      .where(eq(evaluations.id, evaluationId))
      .returning({ id: evaluations.id });
    if (updated.length === 0) throw new NotFoundError(`Evaluation ${evaluationId} not found`);
  }
}

export class DbResultStore implements ResultStore {
  private async transact<T>(op: string, fn: (tx: DbTx) => Promise<T>): Promise<T> {
    try {
      return await getDb().transaction(fn);
    } catch (err) {
      if (err instanceof AppError) throw err;
      throw new PersistenceError(`[ResultStore] ${op} failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  withEvaluation<T>(evaluationId: string, fn: (tx: EvaluationTx) => Promise<T>): Promise<T> {
    return this.transact("withEvaluation", async (tx) => {
      await tx.select({ id: evaluations.id }).from(evaluations).where(eq(evaluations.id, evaluationId)).for("update");
      return fn(new DbEvaluationTx(tx));
    });
  }

  getEvaluation(evaluationId: string): Promise<Evaluation | null> {
    return this.transact("getEvaluation", (tx) => new DbEvaluationTx(tx).getEvaluation(evaluationId));
  }

  upsertAgentResult(record: AgentResult): Promise<void> {
    return this.transact("upsertAgentResult", (tx) => new DbEvaluationTx(tx).upsertAgentResult(record));
  }

  updateEvaluationStatus(
    evaluationId: string,
    status: EvaluationStatus,
    agentStatus: AgentStatusMap,
    failureReason?: string
  ): Promise<void> {
    return this.transact("updateEvaluationStatus", (tx) =>
      new DbEvaluationTx(tx).updateEvaluationStatus(evaluationId, status, agentStatus, failureReason)
    );
  }

  createEvaluation(evaluation: Evaluation): Promise<void> {
    return this.transact("createEvaluation", async (tx) => {
      const inserted = await tx
        .insert(evaluations)
        .values({
          id: evaluation.id,
          taskId: evaluation.taskId,
          agents: evaluation.agents,
          status: evaluation.status,
          agentStatus: evaluation.agentStatus,
          metadata: evaluation.metadata,
          failureReason: evaluation.failureReason ?? null,
          createdAt: new Date(evaluation.createdAtISO),
          updatedAt: new Date(evaluation.updatedAtISO),
        })
        .onConflictDoNothing()
        .returning({ id: evaluations.id });
      if (inserted.length === 0) throw new InvalidInputError(`Evaluation ${evaluation.id} already exists`);
    });
  }

  listEvaluations(filter?: EvaluationFilter): Promise<Evaluation[]> {
    return this.transact("listEvaluations", async (tx) => {
      const conditions: SQL[] = [];
      if (filter?.status) conditions.push(eq(evaluations.status, filter.status));
      if (filter?.taskId) conditions.push(eq(evaluations.taskId, filter.taskId));
      const rows = await tx
        .select()
        .from(evaluations)
        .where(and(...conditions))
        .orderBy(desc(evaluations.createdAt))
        .limit(filter?.limit ?? DEFAULT_LIST_LIMIT);
      return rows.map(rowToEvaluation);
    });
  }

  listAgentResults(filter?: AgentResultFilter): Promise<AgentResult[]> {
    return this.transact("listAgentResults", async (tx) => {
      const conditions: SQL[] = [];
      if (filter?.evaluationId) conditions.push(eq(agentResults.evaluationId, filter.evaluationId));
      if (filter?.agentName) conditions.push(eq(agentResults.agentName, filter.agentName));
      const rows = await tx
        .select()
        .from(agentResults)
        .where(and(...conditions))
        .orderBy(agentResults.id);
      return rows.map(rowToAgentResult);
    });
  }
}
