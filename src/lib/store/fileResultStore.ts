/**
 * File-backed result store.
 * Layout: <dataDir>/evaluations/<id>.json, <dataDir>/results/<id>.json (agent -> result).
 */

import { mkdir, readFile, readdir, rename, rm, writeFile } from "fs/promises";
import { join } from "path";
import { z } from "zod";
import { getDataDir } from "../config.js";
import { AppError, InvalidInputError, NotFoundError, PersistenceError, errorMessage } from "../errors.js";
import { AgentResultSchema, EvaluationSchema } from "../evaluation/schemas.js";
import type { AgentResult, AgentStatusMap, Evaluation, EvaluationStatus } from "../evaluation/types.js";
import { KeyedLock } from "./keyedLock.js";
import type { AgentResultFilter, EvaluationFilter, EvaluationTx, ResultStore } from "./types.js";

const ResultsDocumentSchema = z.record(z.string(), AgentResultSchema);

const SAFE_ID = /^[A-Za-z0-9._-]+$/;

interface StagedWrites {
  evaluation?: Evaluation | null;
  results?: Record<string, AgentResult>;
  evaluationDirty: boolean;
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class FileResultStore implements ResultStore {
  private readonly evaluationsDir: string;
  private readonly resultsDir: string;
  private readonly lock = new KeyedLock();

  constructor(dataDir?: string) {
    const root = dataDir ?? getDataDir();
    this.evaluationsDir = join(root, "evaluations");
    this.resultsDir = join(root, "results");
  }

  private async guard<T>(op: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof AppError) throw err;
      throw new PersistenceError(`[ResultStore] ${op} failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async readJson(path: string): Promise<unknown> {
    let raw: string;
    try {
      raw = await readFile(path, "utf-8");
    } catch (err) {
      if (isMissing(err)) return undefined;
      throw err;
    }
    return JSON.parse(raw);
  }

  private async writeJson(dir: string, id: string, value: unknown): Promise<void> {
    await mkdir(dir, { recursive: true });
    const path = join(dir, `${id}.json`);
    const tmp = `${path}.${process.pid}.tmp`;
    await writeFile(tmp, JSON.stringify(value, null, 2), "utf-8");
    await rename(tmp, path);
  }

  private async readEvaluation(id: string): Promise<Evaluation | null> {
    if (!SAFE_ID.test(id)) return null;
    const raw = await this.readJson(join(this.evaluationsDir, `${id}.json`));
    if (raw === undefined) return null;
    const parsed = EvaluationSchema.safeParse(raw);
    if (!parsed.success) {
      throw new PersistenceError(`Corrupt evaluation record ${id}: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    return parsed.data;
  }

  private async readResults(id: string): Promise<Record<string, AgentResult>> {
    const raw = await this.readJson(join(this.resultsDir, `${id}.json`));
    if (raw === undefined) return {};
    const parsed = ResultsDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      throw new PersistenceError(`Corrupt results record ${id}: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    return parsed.data;
  }

  private async requireEvaluation(id: string): Promise<Evaluation> {
    const evaluation = await this.readEvaluation(id);
    if (!evaluation) throw new NotFoundError(`Evaluation ${id} not found`);
    return evaluation;
  }

  /** Unlocked operations; callers hold the evaluation's lock. */
  private readonly tx: EvaluationTx = {
    getEvaluation: (id) => this.guard("getEvaluation", () => this.readEvaluation(id)),
    upsertAgentResult: (record) =>
      this.guard("upsertAgentResult", async () => {
        await this.requireEvaluation(record.evaluationId);
        const results = await this.readResults(record.evaluationId);
        results[record.agentName] = record;
        await this.writeJson(this.resultsDir, record.evaluationId, results);
      }),
    updateEvaluationStatus: (id, status, agentStatus, failureReason) =>
      this.guard("updateEvaluationStatus", async () => {
        const current = await this.requireEvaluation(id);
        const next: Evaluation = {
          ...current,
          status,
          agentStatus: { ...agentStatus },
          failureReason,
          updatedAtISO: new Date().toISOString(),
        };
        await this.writeJson(this.evaluationsDir, id, next);
      }),
  };

  /**
   * Writes made through tx are staged in memory and committed after fn
   * resolves: results first, then the evaluation. If the evaluation write
   * fails the results file is put back as it was.
   */
  withEvaluation<T>(evaluationId: string, fn: (tx: EvaluationTx) => Promise<T>): Promise<T> {
    return this.lock.run(evaluationId, async () => {
      const stage: StagedWrites = { evaluationDirty: false };

      const loadEvaluation = async (): Promise<Evaluation | null> => {
        if (stage.evaluation === undefined) stage.evaluation = await this.tx.getEvaluation(evaluationId);
        return stage.evaluation;
      };
      const requireStaged = async (): Promise<Evaluation> => {
        const current = await loadEvaluation();
        if (!current) throw new NotFoundError(`Evaluation ${evaluationId} not found`);
        return current;
      };

      const staged: EvaluationTx = {
        getEvaluation: (id) => (id === evaluationId ? loadEvaluation() : this.tx.getEvaluation(id)),
        upsertAgentResult: async (record) => {
          if (record.evaluationId !== evaluationId) {
            throw new InvalidInputError(`Result for ${record.evaluationId} written inside ${evaluationId}`);
          }
          await requireStaged();
          const results =
            stage.results ?? (await this.guard("upsertAgentResult", () => this.readResults(evaluationId)));
          results[record.agentName] = record;
          stage.results = results;
        },
        updateEvaluationStatus: async (id, status, agentStatus, failureReason) => {
          if (id !== evaluationId) {
            throw new InvalidInputError(`Status for ${id} written inside ${evaluationId}`);
          }
          const current = await requireStaged();
          stage.evaluation = {
            ...current,
            status,
            agentStatus: { ...agentStatus },
            failureReason,
            updatedAtISO: new Date().toISOString(),
          };
          stage.evaluationDirty = true;
        },
      };

      const value = await fn(staged);
      const evaluation = stage.evaluationDirty && stage.evaluation ? stage.evaluation : undefined;
      await this.guard("withEvaluation", () => this.commit(evaluationId, stage.results, evaluation));
      return value;
    });
  }

  private async commit(
    evaluationId: string,
    results: Record<string, AgentResult> | undefined,
    evaluation: Evaluation | undefined
  ): Promise<void> {
    const resultsPath = join(this.resultsDir, `${evaluationId}.json`);
    const previous = results ? await this.readJson(resultsPath) : undefined;
    if (results) await this.writeJson(this.resultsDir, evaluationId, results);
    if (!evaluation) return;
    try {
      await this.writeJson(this.evaluationsDir, evaluationId, evaluation);
    } catch (err) {
      if (results) {
        if (previous === undefined) await rm(resultsPath, { force: true });
        else await this.writeJson(this.resultsDir, evaluationId, previous);
      }
      throw err;
    }
  }

  getEvaluation(evaluationId: string): Promise<Evaluation | null> {
    return this.tx.getEvaluation(evaluationId);
  }

  upsertAgentResult(record: AgentResult): Promise<void> {
    return this.lock.run(record.evaluationId, () => this.tx.upsertAgentResult(record));
  }

  updateEvaluationStatus(
    evaluationId: string,
    status: EvaluationStatus,
    agentStatus: AgentStatusMap,
    failureReason?: string
  ): Promise<void> {
    return this.lock.run(evaluationId, () =>
      this.tx.updateEvaluationStatus(evaluationId, status, agentStatus, failureReason)
    );
  }

  createEvaluation(evaluation: Evaluation): Promise<void> {
    if (!SAFE_ID.test(evaluation.id)) {
      return Promise.reject(new InvalidInputError(`Evaluation id ${evaluation.id} contains unsupported characters`));
    }
    return this.lock.run(evaluation.id, () =>
      this.guard("createEvaluation", async () => {
        if (await this.readEvaluation(evaluation.id)) {
          throw new InvalidInputError(`Evaluation ${evaluation.id} already exists`);
        }
        await this.writeJson(this.evaluationsDir, evaluation.id, evaluation);
      })
    );
  }

  private async evaluationIds(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.evaluationsDir);
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }
    return entries.filter((e) => e.endsWith(".json")).map((e) => e.slice(0, -".json".length));
  }

  listEvaluations(filter?: EvaluationFilter): Promise<Evaluation[]> {
    return this.guard("listEvaluations", async () => {
      const out: Evaluation[] = [];
      for (const id of await this.evaluationIds()) {
        try {
          const evaluation = await this.readEvaluation(id);
          if (evaluation) out.push(evaluation);
        } catch (err) {
          console.warn(`[ResultStore] Skipping evaluation ${id}: ${errorMessage(err)}`);
        }
      }
      const filtered = out
        .filter((e) => !filter?.status || e.status === filter.status)
        .filter((e) => !filter?.taskId || e.taskId === filter.taskId)
        .sort((a, b) => b.createdAtISO.localeCompare(a.createdAtISO));
      return filter?.limit != null ? filtered.slice(0, filter.limit) : filtered;
    });
  }

  listAgentResults(filter?: AgentResultFilter): Promise<AgentResult[]> {
    return this.guard("listAgentResults", async () => {
      const ids = filter?.evaluationId ? [filter.evaluationId] : await this.evaluationIds();
      const out: AgentResult[] = [];
      for (const id of ids) {
        if (!SAFE_ID.test(id)) continue;
        const results = await this.readResults(id);
        for (const r of Object.values(results)) {
          if (!filter?.agentName || r.agentName === filter.agentName) out.push(r);
        }
      }
      return out;
    });
  }
}
