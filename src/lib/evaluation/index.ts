/**
 * Evaluation module: singleton runtime and public API.
 */

import { getEvalLogPath } from "../config.js";
import { createJudge, resolveJudgeCredentials } from "../judge/index.js";
import { FileReportSink, type ReportSink } from "../reports/reportSink.js";
import { createResultStore } from "../store/index.js";
import type { ResultStore } from "../store/types.js";
import { FileTaskCatalog, type TaskCatalog } from "../tasks/taskCatalog.js";
import { createWorkspaceProvider } from "../workspace/index.js";
import type { WorkspaceProvider } from "../workspace/types.js";
import { EvaluationOrchestrator } from "./evaluationOrchestrator.js";
import { EvaluationQueue } from "./evaluationQueue.js";

export interface EvaluationRuntime {
  store: ResultStore;
  tasks: TaskCatalog;
  workspace: WorkspaceProvider;
  reportSink: ReportSink;
  orchestrator: EvaluationOrchestrator;
  queue: EvaluationQueue;
}

let singleton: EvaluationRuntime | null = null;

/** Wires the env-configured drivers. The default judge comes from env credentials, resolved once here. */
export function makeEvaluationRuntime(): EvaluationRuntime {
  if (singleton) return singleton;
  const store = createResultStore();
  const tasks = new FileTaskCatalog();
  const workspace = createWorkspaceProvider();
  const reportSink = new FileReportSink();
  const orchestrator = new EvaluationOrchestrator({
    store,
    tasks,
    workspace,
    reportSink,
    judge: createJudge(resolveJudgeCredentials()),
    logPath: getEvalLogPath(),
  });
  const queue = new EvaluationQueue(orchestrator);
  singleton = { store, tasks, workspace, reportSink, orchestrator, queue };
  return singleton;
}

export { EvaluationOrchestrator, EvaluationQueue };
export type { EvaluateOptions, EvaluateOutcome, CreateEvaluationInput } from "./evaluationOrchestrator.js";
export type { EvaluationJob, SubmitOptions } from "./evaluationQueue.js";
