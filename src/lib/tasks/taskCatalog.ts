/**
 * Task catalog backed by the tasks directory: <tasksDir>/<taskId>/config.yaml.
 */

import { readdir, stat } from "fs/promises";
import { join } from "path";
import { getTasksDir } from "../config.js";
import { errorMessage } from "../errors.js";
import { loadTaskConfigFile } from "./taskConfig.js";
import type { Task } from "./types.js";

export interface TaskCatalog {
  /** null when no such task exists. Throws TaskConfigError when it exists but is invalid. */
  getTask(taskId: string): Promise<Task | null>;
  listTasks(opts?: { includeInactive?: boolean }): Promise<Task[]>;
}

const CONFIG_FILE = "config.yaml";

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

export class FileTaskCatalog implements TaskCatalog {
  private readonly tasksDir: string;

  constructor(tasksDir?: string) {
    this.tasksDir = tasksDir ?? getTasksDir();
  }

  async getTask(taskId: string): Promise<Task | null> {
    if (!/^[a-z0-9-]+$/.test(taskId)) return null;
    const configPath = join(this.tasksDir, taskId, CONFIG_FILE);
    if (!(await isFile(configPath))) return null;
    const task = await loadTaskConfigFile(configPath);
    if (task.id !== taskId) {
      console.warn(`[TaskCatalog] ${configPath} declares id "${task.id}"; using directory name`);
      return { ...task, id: taskId };
    }
    return task;
  }

  async listTasks(opts?: { includeInactive?: boolean }): Promise<Task[]> {
    let entries: string[];
    try {
      entries = await readdir(this.tasksDir);
    } catch {
      return [];
    }
    const tasks: Task[] = [];
    for (const entry of entries.sort()) {
      try {
        const task = await this.getTask(entry);
        if (task && (task.isActive || opts?.includeInactive)) tasks.push(task);
      } catch (err) {
        console.warn(`[TaskCatalog] Skipping ${entry}: ${errorMessage(err)}`);
      }
    }
    return tasks;
  }
}
