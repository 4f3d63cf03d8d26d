/**
 * Evaluator config: env-based getters with safe parsing and clamped defaults.
 */

import { join } from "path";

function parseIntEnv(key: string, defaultVal: number, min: number, max: number): number {
  const raw = process.env[key];
  if (raw == null || raw === "") return defaultVal;
  const n = parseInt(raw, 10);
  if (Number.isNaN(n)) return defaultVal;
  return Math.max(min, Math.min(max, n));
}

function stringEnv(key: string, defaultVal: string): string {
  const raw = process.env[key];
  if (raw == null || raw.trim() === "") return defaultVal;
  return raw.trim();
}

/** Task definitions: <dir>/<taskId>/config.yaml plus baseline/. */
export function getTasksDir(): string {
  return stringEnv("TASKS_DIR", join(process.cwd(), "tasks"));
}

/** Comparison reports: <dir>/<evaluationId>/comparison_report.md. */
export function getResultsDir(): string {
  return stringEnv("RESULTS_DIR", join(process.cwd(), "results"));
}

/** File persistence driver root. */
export function getDataDir(): string {
  return stringEnv("EVAL_DATA_DIR", join(process.cwd(), ".data", "evaluator"));
}

/** Agent solutions for the file workspace: <dir>/<evaluationId>/<agent>/. */
export function getSolutionsDir(): string {
  return stringEnv("SOLUTIONS_DIR", join(process.cwd(), "workspace", "solutions"));
}

/** JSONL event log. Empty string disables it. */
export function getEvalLogPath(): string | undefined {
  const raw = process.env.EVAL_LOG_PATH;
  if (raw === "") return undefined;
  return raw ?? "./runs/evaluations.jsonl";
}

/** Upper bound on a single judge call. Default 120s. */
export function getJudgeTimeoutMs(): number {
  return parseIntEnv("JUDGE_TIMEOUT_MS", 120_000, 1_000, 600_000);
}

/** Worker pool size for queued evaluations. Default 5. */
export function getMaxConcurrentEvaluations(): number {
  return parseIntEnv("MAX_CONCURRENT_EVALUATIONS", 5, 1, 64);
}

export function getDefaultJudgeModel(): string {
  return stringEnv("DEFAULT_AI_JUDGE_MODEL", "anthropic/claude-3.5-sonnet");
}

export type PersistenceDriver = "db" | "file";

/** PERSISTENCE_DRIVER=db stores results in PostgreSQL; anything else uses files. */
export function getPersistenceDriver(): PersistenceDriver {
  const v = process.env.PERSISTENCE_DRIVER?.toLowerCase();
  if (v === "db") return "db";
  return "file";
}

export type WorkspaceDriver = "file" | "github";

export function getWorkspaceDriver(): WorkspaceDriver {
  const v = process.env.WORKSPACE_DRIVER?.toLowerCase();
  if (v === "github") return "github";
  return "file";
}

export interface GitHubSettings {
  token?: string;
  repo: string;
  branchPrefix: string;
  timeoutMs: number;
}

export function getGitHubSettings(): GitHubSettings {
  return {
    token: process.env.GITHUB_TOKEN || undefined,
    repo: stringEnv("GITHUB_REPO", ""),
    branchPrefix: stringEnv("GITHUB_BRANCH_PREFIX", "eval"),
    timeoutMs: parseIntEnv("GITHUB_TIMEOUT_MS", 30_000, 1_000, 120_000),
  };
}

export function getPort(): number {
  return parseIntEnv("PORT", 3000, 1, 65_535);
}
