/**
 * Evaluation orchestrator: runs one agent's scoring and advances the
 * evaluation lifecycle.
 *
 * Evaluation: pending -> active -> completed (once). failed is a sink set only
 * on unrecoverable orchestration errors.
 * Agent: pending | ready -> evaluating -> completed, or failed.
 */

import { randomUUID } from "crypto";
import { getDefaultJudgeModel, getJudgeTimeoutMs } from "../config.js";
import { InvalidInputError, NotFoundError, errorMessage } from "../errors.js";
import { EventLog, type EvaluationEvent } from "../eventLog.js";
import type { Judge } from "../judge/types.js";
import { rankResults } from "../reports/comparison.js";
import type { ReportSink } from "../reports/reportSink.js";
import type { JudgeScorerOptions } from "../scoring/judgeScorer.js";
import { runScoring } from "../scoring/strategies.js";
import type { FileSet, ScoreResult } from "../scoring/types.js";
import type { ResultStore } from "../store/types.js";
import type { TaskCatalog } from "../tasks/taskCatalog.js";
import type { Task } from "../tasks/types.js";
import type { WorkspaceProvider } from "../workspace/types.js";
import type { AgentResult, AgentStatusMap, Evaluation, EvaluationStatus, EvaluationType } from "./types.js";

export interface OrchestratorDeps {
  store: ResultStore;
  tasks: TaskCatalog;
  workspace: WorkspaceProvider;
  reportSink?: ReportSink;
  /** Default judge; evaluate() callers may pass their own. */
  judge?: Judge | null;
  judgeOptions?: Partial<JudgeScorerOptions>;
  /** JSONL event log. Unset disables it. */
  logPath?: string;
  now?: () => Date;
}

export interface EvaluateOptions {
  /** Request-scoped judge. null forces rule-based scoring. */
  judge?: Judge | null;
}

export interface EvaluateOutcome {
  result: AgentResult;
  evaluation: Evaluation;
  /** True only for the call that moved the evaluation to completed. */
  completed: boolean;
}

export interface CreateEvaluationInput {
  taskId: string;
  agents: string[];
  createdBy?: string;
  metadata?: Record<string, unknown>;
}

const AGENT_NAME = /^[A-Za-z0-9._-]+$/;

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** eval-YYYYMMDD-HHMMSS-xxxxxxxx (UTC) */
export function newEvaluationId(now: Date): string {
  const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`;
  const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  return `eval-${date}-${time}-${randomUUID().replace(/-/g, "").slice(0, 8)}`;
}

function requireMember(evaluation: Evaluation | null, evaluationId: string, agentName: string): Evaluation {
  if (!evaluation) throw new NotFoundError(`Evaluation ${evaluationId} not found`);
  if (!evaluation.agents.includes(agentName)) {
    throw new InvalidInputError(`Agent ${agentName} is not part of evaluation ${evaluationId}`);
  }
  return evaluation;
}

function requireEvaluable(evaluation: Evaluation | null, evaluationId: string, agentName: string): Evaluation {
  const e = requireMember(evaluation, evaluationId, agentName);
  if (e.status === "failed") {
    throw new InvalidInputError(`Evaluation ${evaluationId} has failed${e.failureReason ? `: ${e.failureReason}` : ""}`);
  }
  return e;
}

function scoringFailure(kind: EvaluationType, err: unknown): ScoreResult {
  const reason = errorMessage(err);
  return {
    kind,
    totalScore: 0,
    breakdown: {},
    feedback: `Scoring failed: ${reason}`,
    strengths: [],
    improvements: [],
    error: reason,
    details: {},
  };
}

export class EvaluationOrchestrator {
  private readonly pendingReports = new Set<Promise<void>>();
  private readonly now: () => Date;
  private readonly events: EventLog;

  constructor(private readonly deps: OrchestratorDeps) {
    this.now = deps.now ?? (() => new Date());
    this.events = new EventLog(deps.logPath, this.now);
  }

  private judgeOptions(): JudgeScorerOptions {
    return {
      timeoutMs: this.deps.judgeOptions?.timeoutMs ?? getJudgeTimeoutMs(),
      defaultModel: this.deps.judgeOptions?.defaultModel ?? getDefaultJudgeModel(),
    };
  }

  private async requireTask(taskId: string): Promise<Task> {
    const task = await this.deps.tasks.getTask(taskId);
    if (!task) throw new NotFoundError(`Task ${taskId} not found`);
    return task;
  }

  private async loadOrEmpty(label: string, load: () => Promise<FileSet>): Promise<FileSet> {
    try {
      return await load();
    } catch (err) {
      console.warn(`[Orchestrator] Could not load ${label}; scoring an empty file set: ${errorMessage(err)}`);
      return {};
    }
  }

  private logEvent(event: EvaluationEvent): void {
    this.events
      .record(event)
      .catch((err) => console.warn(`[Orchestrator] Event log write failed: ${errorMessage(err)}`));
  }

  async createEvaluation(input: CreateEvaluationInput): Promise<Evaluation> {
    const agents = input.agents.map((a) => a.trim());
    if (agents.length === 0) throw new InvalidInputError("At least one agent is required");
    const bad = agents.find((a) => !AGENT_NAME.test(a));
    if (bad !== undefined) throw new InvalidInputError(`Invalid agent name: "${bad}"`);
    if (new Set(agents).size !== agents.length) throw new InvalidInputError("Agent names must be unique");

    const task = await this.requireTask(input.taskId);
    if (!task.isActive) throw new NotFoundError(`Task ${input.taskId} is not active`);

    const nowISO = this.now().toISOString();
    const evaluation: Evaluation = {
      id: newEvaluationId(this.now()),
      taskId: task.id,
      agents,
      status: "pending",
      agentStatus: Object.fromEntries(agents.map((a) => [a, "pending" as const])),
      metadata: { ...input.metadata, createdBy: input.createdBy ?? "api", agentCount: agents.length },
      createdAtISO: nowISO,
      updatedAtISO: nowISO,
    };
    await this.deps.store.createEvaluation(evaluation);
    console.log(`[Orchestrator] Created ${evaluation.id} for task ${task.id} with ${agents.length} agent(s)`);

    const { workspace } = this.deps;
    if (!workspace.prepare) return evaluation;
    try {
      await workspace.prepare(evaluation.id, task, agents);
    } catch (err) {
      console.warn(`[Orchestrator] Workspace preparation failed for ${evaluation.id}: ${errorMessage(err)}`);
      return evaluation;
    }
    // An evaluate() may already have started; only agents still pending become ready.
    return this.deps.store.withEvaluation(evaluation.id, async (tx) => {
      const current = (await tx.getEvaluation(evaluation.id)) ?? evaluation;
      const agentStatus: AgentStatusMap = { ...current.agentStatus };
      for (const agent of agents) {
        if (agentStatus[agent] === "pending") agentStatus[agent] = "ready";
      }
      await tx.updateEvaluationStatus(evaluation.id, current.status, agentStatus, current.failureReason);
      return { ...current, agentStatus };
    });
  }

  /**
   * Score one agent and persist its result. Throws NotFoundError /
   * InvalidInputError before touching any state, and PersistenceError when the
   * store fails. Judge and workspace failures never throw.
   */
  async evaluate(evaluationId: string, agentName: string, opts?: EvaluateOptions): Promise<EvaluateOutcome> {
    const snapshot = requireEvaluable(await this.deps.store.getEvaluation(evaluationId), evaluationId, agentName);
    const task = await this.requireTask(snapshot.taskId);
    const startedAtISO = this.now().toISOString();

    await this.deps.store.withEvaluation(evaluationId, async (tx) => {
      const current = requireEvaluable(await tx.getEvaluation(evaluationId), evaluationId, agentName);
      const agentStatus = { ...current.agentStatus };
      if (agentStatus[agentName] !== "completed") agentStatus[agentName] = "evaluating";
      const status: EvaluationStatus = current.status === "pending" ? "active" : current.status;
      await tx.updateEvaluationStatus(evaluationId, status, agentStatus, current.failureReason);
    });

    const { workspace } = this.deps;
    const [baseline, solution] = await Promise.all([
      this.loadOrEmpty(`baseline for task ${task.id}`, () => workspace.loadBaseline(task.id)),
      this.loadOrEmpty(`solution of ${agentName} in ${evaluationId}`, () =>
        workspace.loadSolution(evaluationId, agentName)
      ),
    ]);

    const judge = opts?.judge !== undefined ? opts.judge : this.deps.judge;
    let score: ScoreResult;
    let scoringFailed = false;
    try {
      score = await runScoring(
        { task, agentName, baseline, solution },
        { judge, judgeOptions: this.judgeOptions() }
      );
    } catch (err) {
      console.warn(`[Orchestrator] Scoring ${agentName} in ${evaluationId} failed: ${errorMessage(err)}`);
      score = scoringFailure(task.evaluationType, err);
      scoringFailed = true;
    }

    const result: AgentResult = {
      evaluationId,
      agentName,
      score: Math.round(Math.max(0, Math.min(100, score.totalScore))),
      breakdown: score.breakdown,
      feedback: score.feedback,
      strengths: score.strengths,
      improvements: score.improvements,
      scoringKind: score.kind,
      ...(score.error !== undefined && { error: score.error }),
      details: score.details,
      status: scoringFailed ? "failed" : "completed",
      startedAtISO,
      completedAtISO: this.now().toISOString(),
    };

    const { evaluation, transitioned } = await this.deps.store.withEvaluation(evaluationId, async (tx) => {
      const current = await tx.getEvaluation(evaluationId);
      if (!current) throw new NotFoundError(`Evaluation ${evaluationId} not found`);
      await tx.upsertAgentResult(result);
      const agentStatus: AgentStatusMap = { ...current.agentStatus, [agentName]: "completed" };
      const allCompleted = current.agents.every((a) => agentStatus[a] === "completed");
      const canComplete = current.status === "pending" || current.status === "active";
      const transitioned = allCompleted && canComplete;
      let status: EvaluationStatus = current.status === "pending" ? "active" : current.status;
      if (transitioned) status = "completed";
      await tx.updateEvaluationStatus(evaluationId, status, agentStatus, current.failureReason);
      const next: Evaluation = { ...current, status, agentStatus, updatedAtISO: this.now().toISOString() };
      return { evaluation: next, transitioned };
    });

    console.log(`[Orchestrator] ${evaluationId}/${agentName} scored ${result.score}/100 (${result.scoringKind})`);
    this.logEvent({
      type: "agent_scored",
      evaluationId,
      agentName,
      score: result.score,
      scoringKind: result.scoringKind,
      ...(result.error !== undefined && { error: result.error }),
    });

    if (transitioned) {
      console.log(`[Orchestrator] Evaluation ${evaluationId} completed`);
      this.logEvent({ type: "evaluation_completed", evaluationId, agents: evaluation.agents });
      this.trackReport(this.publishReport(evaluation));
    }

    return { result, evaluation, completed: transitioned };
  }

  private trackReport(report: Promise<void>): void {
    const tracked: Promise<void> = report.finally(() => {
      this.pendingReports.delete(tracked);
    });
    this.pendingReports.add(tracked);
  }

  private async publishReport(evaluation: Evaluation): Promise<void> {
    const sink = this.deps.reportSink;
    if (!sink) return;
    try {
      const results = await this.deps.store.listAgentResults({ evaluationId: evaluation.id });
      await sink.publish(evaluation.id, rankResults(evaluation.agents, results));
    } catch (err) {
      console.warn(`[Orchestrator] Report for ${evaluation.id} failed: ${errorMessage(err)}`);
    }
  }

  /** Resolves once every report started so far has been published (or failed). */
  async flushReports(): Promise<void> {
    await Promise.all([...this.pendingReports]);
  }

  /** Marks an agent failed after evaluate() itself threw. A completed agent keeps its result. */
  async recordAgentFailure(evaluationId: string, agentName: string, reason: string): Promise<void> {
    await this.deps.store.withEvaluation(evaluationId, async (tx) => {
      const current = requireMember(await tx.getEvaluation(evaluationId), evaluationId, agentName);
      if (current.agentStatus[agentName] === "completed") return;
      const agentStatus: AgentStatusMap = { ...current.agentStatus, [agentName]: "failed" };
      await tx.updateEvaluationStatus(evaluationId, current.status, agentStatus, current.failureReason);
    });
    console.warn(`[Orchestrator] ${evaluationId}/${agentName} marked failed: ${reason}`);
    this.logEvent({ type: "agent_failed", evaluationId, agentName, reason });
  }

  /** Sink transition for unrecoverable errors. Completed evaluations are left alone. */
  async failEvaluation(evaluationId: string, reason: string): Promise<Evaluation> {
    const { evaluation, changed } = await this.deps.store.withEvaluation(evaluationId, async (tx) => {
      const current = await tx.getEvaluation(evaluationId);
      if (!current) throw new NotFoundError(`Evaluation ${evaluationId} not found`);
      if (current.status === "completed" || current.status === "failed") {
        return { evaluation: current, changed: false };
      }
      await tx.updateEvaluationStatus(evaluationId, "failed", current.agentStatus, reason);
      const next: Evaluation = { ...current, status: "failed", failureReason: reason };
      return { evaluation: next, changed: true };
    });
    if (changed) {
      console.warn(`[Orchestrator] Evaluation ${evaluationId} failed: ${reason}`);
      this.logEvent({ type: "evaluation_failed", evaluationId, reason });
    }
    return evaluation;
  }

  /** Back to pending with every agent pending. Stored results are kept. */
  async resetEvaluation(evaluationId: string): Promise<Evaluation> {
    return this.deps.store.withEvaluation(evaluationId, async (tx) => {
      const current = await tx.getEvaluation(evaluationId);
      if (!current) throw new NotFoundError(`Evaluation ${evaluationId} not found`);
      const agentStatus: AgentStatusMap = Object.fromEntries(current.agents.map((a) => [a, "pending" as const]));
      await tx.updateEvaluationStatus(evaluationId, "pending", agentStatus);
      const next: Evaluation = { ...current, status: "pending", agentStatus };
      delete next.failureReason;
      return next;
    });
  }
}
