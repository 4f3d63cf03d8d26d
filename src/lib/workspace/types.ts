import type { FileSet } from "../scoring/types.js";
import type { Task } from "../tasks/types.js";

/**
 * Source of baseline and solution files. Methods throw on failure; the
 * orchestrator treats a failed load as an empty file set.
 */
export interface WorkspaceProvider {
  loadBaseline(taskId: string): Promise<FileSet>;
  loadSolution(evaluationId: string, agentName: string): Promise<FileSet>;
  /** Sets up each agent's workspace; agents become "ready" once it resolves. */
  prepare?(evaluationId: string, task: Task, agents: string[]): Promise<void>;
}
