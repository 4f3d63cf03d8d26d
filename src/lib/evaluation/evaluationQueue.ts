/**
 * In-process evaluation queue: submit() enqueues one (evaluation, agent) job;
 * a bounded pool of workers runs evaluate() and records failures through the
 * orchestrator's store-backed transitions.
 */

import { randomUUID } from "crypto";
import { getMaxConcurrentEvaluations } from "../config.js";
import { AppError, errorMessage } from "../errors.js";
import type { Judge } from "../judge/types.js";
import type { EvaluationOrchestrator } from "./evaluationOrchestrator.js";

export type JobState = "queued" | "running" | "succeeded" | "failed";

export interface EvaluationJob {
  id: string;
  evaluationId: string;
  agentName: string;
  state: JobState;
  submittedAtISO: string;
  startedAtISO?: string;
  finishedAtISO?: string;
  score?: number;
  /** Set when this job moved the evaluation to completed. */
  completedEvaluation?: boolean;
  error?: string;
}

export interface SubmitOptions {
  judge?: Judge | null;
}

export type EvaluationRunner = Pick<EvaluationOrchestrator, "evaluate" | "recordAgentFailure" | "failEvaluation">;

export interface EvaluationQueueOptions {
  concurrency?: number;
  /** Finished jobs kept for lookup. */
  maxHistory?: number;
}

interface QueueEntry {
  job: EvaluationJob;
  opts?: SubmitOptions;
}

export class EvaluationQueue {
  private readonly waiting: QueueEntry[] = [];
  private readonly jobs = new Map<string, EvaluationJob>();
  private readonly concurrency: number;
  private readonly maxHistory: number;
  private running = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly runner: EvaluationRunner,
    options: EvaluationQueueOptions = {}
  ) {
    this.concurrency = Math.max(1, options.concurrency ?? getMaxConcurrentEvaluations());
    this.maxHistory = options.maxHistory ?? 500;
  }

  /** A job already queued for the same agent is returned instead of a duplicate. */
  submit(evaluationId: string, agentName: string, opts?: SubmitOptions): EvaluationJob {
    const queued = this.waiting.find(
      (e) => e.job.evaluationId === evaluationId && e.job.agentName === agentName
    );
    if (queued) return { ...queued.job };

    const job: EvaluationJob = {
      id: randomUUID(),
      evaluationId,
      agentName,
      state: "queued",
      submittedAtISO: new Date().toISOString(),
    };
    this.jobs.set(job.id, job);
    this.waiting.push({ job, opts });
    this.pump();
    return { ...job };
  }

  getJob(jobId: string): EvaluationJob | undefined {
    const job = this.jobs.get(jobId);
    return job ? { ...job } : undefined;
  }

  listJobs(evaluationId?: string): EvaluationJob[] {
    return [...this.jobs.values()]
      .filter((j) => !evaluationId || j.evaluationId === evaluationId)
      .map((j) => ({ ...j }));
  }

  stats(): { queued: number; running: number; concurrency: number } {
    return { queued: this.waiting.length, running: this.running, concurrency: this.concurrency };
  }

  /** Resolves when nothing is queued or running. */
  onIdle(): Promise<void> {
    if (this.running === 0 && this.waiting.length === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private pump(): void {
    while (this.running < this.concurrency) {
      const entry = this.waiting.shift();
      if (!entry) break;
      this.running++;
      this.runJob(entry)
        .catch((err) => console.error(`[EvaluationQueue] Job ${entry.job.id} crashed: ${errorMessage(err)}`))
        .finally(() => {
          this.running--;
          this.pruneHistory();
          this.pump();
          this.notifyIdle();
        });
    }
  }

  private notifyIdle(): void {
    if (this.running > 0 || this.waiting.length > 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private pruneHistory(): void {
    const finished = [...this.jobs.values()].filter((j) => j.state === "succeeded" || j.state === "failed");
    const excess = finished.length - this.maxHistory;
    for (let i = 0; i < excess; i++) {
      const job = finished[i];
      if (job) this.jobs.delete(job.id);
    }
  }

  private async runJob({ job, opts }: QueueEntry): Promise<void> {
    job.state = "running";
    job.startedAtISO = new Date().toISOString();
    try {
      const outcome = await this.runner.evaluate(job.evaluationId, job.agentName, opts);
      job.state = "succeeded";
      job.score = outcome.result.score;
      job.completedEvaluation = outcome.completed;
    } catch (err) {
      job.state = "failed";
      job.error = errorMessage(err);
      await this.recordFailure(job, err);
    } finally {
      job.finishedAtISO = new Date().toISOString();
    }
  }

  private async recordFailure(job: EvaluationJob, err: unknown): Promise<void> {
    const reason = errorMessage(err);
    const code = err instanceof AppError ? err.code : undefined;
    console.warn(`[EvaluationQueue] ${job.evaluationId}/${job.agentName} failed (${code ?? "Error"}): ${reason}`);
    try {
      if (code === "NotFound" || code === "InvalidInput") return;
      if (code === "TaskConfig") {
        await this.runner.failEvaluation(job.evaluationId, reason);
        return;
      }
      await this.runner.recordAgentFailure(job.evaluationId, job.agentName, reason);
    } catch (recordErr) {
      console.error(
        `[EvaluationQueue] Could not record failure for ${job.evaluationId}/${job.agentName}: ${errorMessage(recordErr)}`
      );
    }
  }
}
