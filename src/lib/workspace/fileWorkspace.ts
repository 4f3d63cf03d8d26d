/**
 * Local directory workspace.
 * Baseline: <tasksDir>/<taskId>/baseline/. Solutions: <solutionsDir>/<evaluationId>/<agent>/.
 */

import { cp, mkdir, stat, writeFile } from "fs/promises";
import { dirname, join } from "path";
import { getSolutionsDir, getTasksDir } from "../config.js";
import type { FileSet } from "../scoring/types.js";
import type { Task } from "../tasks/types.js";
import { readFileTree } from "./fileTree.js";
import type { WorkspaceProvider } from "./types.js";

export interface FileWorkspaceOptions {
  tasksDir?: string;
  solutionsDir?: string;
}

const SAFE_SEGMENT = /^[A-Za-z0-9._-]+$/;

function segment(value: string, label: string): string {
  if (!SAFE_SEGMENT.test(value) || value === "." || value === "..") {
    throw new Error(`Unsupported ${label}: ${value}`);
  }
  return value;
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

export function renderInstructions(task: Task, agent: string): string {
  const prompt = task.agentPrompts[agent] ?? task.description;
  const lines = [
    `# ${task.name}`,
    "",
    task.description,
    "",
    "## Instructions",
    "",
    prompt,
    "",
  ];
  if (task.rubric.length > 0) {
    lines.push("## Scoring", "");
    for (const c of task.rubric) lines.push(`- ${c.name} (${c.weight} points): ${c.description}`);
    lines.push("");
  }
  return lines.join("\n");
}

export class FileWorkspaceProvider implements WorkspaceProvider {
  private readonly tasksDir: string;
  private readonly solutionsDir: string;

  constructor(options: FileWorkspaceOptions = {}) {
    this.tasksDir = options.tasksDir ?? getTasksDir();
    this.solutionsDir = options.solutionsDir ?? getSolutionsDir();
  }

  baselineDir(taskId: string): string {
    return join(this.tasksDir, segment(taskId, "task id"), "baseline");
  }

  solutionDir(evaluationId: string, agentName: string): string {
    return join(this.solutionsDir, segment(evaluationId, "evaluation id"), segment(agentName, "agent name"));
  }

  instructionsPath(evaluationId: string, agentName: string): string {
    return join(this.solutionsDir, segment(evaluationId, "evaluation id"), "instructions", `${segment(agentName, "agent name")}.md`);
  }

  async loadBaseline(taskId: string): Promise<FileSet> {
    return readFileTree(this.baselineDir(taskId));
  }

  async loadSolution(evaluationId: string, agentName: string): Promise<FileSet> {
    return readFileTree(this.solutionDir(evaluationId, agentName));
  }

  /** Copies the baseline into each agent's directory and writes its instructions beside it. */
  async prepare(evaluationId: string, task: Task, agents: string[]): Promise<void> {
    const baseline = this.baselineDir(task.id);
    const hasBaseline = await exists(baseline);
    for (const agent of agents) {
      const dir = this.solutionDir(evaluationId, agent);
      await mkdir(dir, { recursive: true });
      if (hasBaseline) await cp(baseline, dir, { recursive: true, force: false, errorOnExist: false });
      const instructions = this.instructionsPath(evaluationId, agent);
      await mkdir(dirname(instructions), { recursive: true });
      await writeFile(instructions, renderInstructions(task, agent), "utf-8");
    }
    console.log(`[Workspace] Prepared ${agents.length} agent workspace(s) for ${evaluationId}`);
  }
}
