/**
 * Result store: evaluation records and per-agent results.
 */

import type {
  AgentResult,
  AgentStatusMap,
  Evaluation,
  EvaluationStatus,
} from "../evaluation/types.js";

/** Operations that may run inside one atomic unit of work. */
export interface EvaluationTx {
  getEvaluation(evaluationId: string): Promise<Evaluation | null>;
  /** Insert or replace the result keyed by (evaluationId, agentName). */
  upsertAgentResult(record: AgentResult): Promise<void>;
  /** failureReason is stored as given; omit it to clear. */
  updateEvaluationStatus(
    evaluationId: string,
    status: EvaluationStatus,
    agentStatus: AgentStatusMap,
    failureReason?: string
  ): Promise<void>;
}

export interface EvaluationFilter {
  status?: EvaluationStatus;
  taskId?: string;
  limit?: number;
}

export interface AgentResultFilter {
  evaluationId?: string;
  agentName?: string;
}

/**
 * Implementations throw PersistenceError on storage failure and NotFoundError
 * when writing against an evaluation that does not exist.
 */
export interface ResultStore extends EvaluationTx {
  /**
   * Runs fn with exclusive access to one evaluation; everything done through
   * tx commits together or not at all (the file driver stages writes and
   * restores the results file if the evaluation write fails). Do not call the store's own methods for
   * the same evaluation from inside fn.
   */
  withEvaluation<T>(evaluationId: string, fn: (tx: EvaluationTx) => Promise<T>): Promise<T>;
  createEvaluation(evaluation: Evaluation): Promise<void>;
  /** Newest first. */
  listEvaluations(filter?: EvaluationFilter): Promise<Evaluation[]>;
  listAgentResults(filter?: AgentResultFilter): Promise<AgentResult[]>;
}
