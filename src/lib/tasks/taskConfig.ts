/**
 * YAML task document loader.
 *
 * Parses and validates a task's config.yaml into a Task.
 */

import { readFile } from "fs/promises";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { EvaluationTypeSchema } from "../evaluation/schemas.js";
import { TaskConfigError, errorMessage } from "../errors.js";
import type { Task } from "./types.js";

const CriterionSchema = z.object({
  weight: z.number().int().min(1).max(100),
  description: z.string().default(""),
});

export const TaskCategorySchema = z.enum(["refactoring", "bug_fixing", "feature", "optimization"]);

export const TaskDocumentSchema = z.object({
  task: z.object({
    id: z.string().regex(/^[a-z0-9]+(?:-[a-z0-9]+)*$/, "must be a lowercase slug"),
    name: z.string().min(1),
    description: z.string().default(""),
    category: TaskCategorySchema,
    active: z.boolean().default(true),
  }),
  evaluation: z
    .object({
      type: EvaluationTypeSchema.default("rule_based"),
      scoring: z.record(z.string(), CriterionSchema).default({}),
    })
    .default({}),
  ai_judge: z
    .object({
      model: z.string().min(1).optional(),
      prompt_template: z.string().optional(),
    })
    .optional(),
  agents: z.record(z.string(), z.string()).default({}),
});

export type TaskDocument = z.infer<typeof TaskDocumentSchema>;

export function taskFromDocument(doc: TaskDocument): Task {
  return {
    id: doc.task.id,
    name: doc.task.name,
    description: doc.task.description,
    category: doc.task.category,
    rubric: Object.entries(doc.evaluation.scoring).map(([name, c]) => ({
      name,
      weight: c.weight,
      description: c.description,
    })),
    evaluationType: doc.evaluation.type,
    judgeModel: doc.ai_judge?.model,
    judgePromptTemplate: doc.ai_judge?.prompt_template?.trim() || undefined,
    agentPrompts: Object.fromEntries(
      Object.entries(doc.agents).map(([agent, prompt]) => [agent, prompt.trim()])
    ),
    isActive: doc.task.active,
  };
}

/**
 * Parse YAML text into a Task.
 * @throws TaskConfigError when the YAML is malformed or fails validation
 */
export function parseTaskConfig(content: string, source = "<inline>"): Task {
  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new TaskConfigError(`Invalid YAML in ${source}: ${errorMessage(err)}`, { cause: err });
  }
  const result = TaskDocumentSchema.safeParse(parsed);
  if (!result.success) {
    const errors = result.error.issues
      .map((e) => `  - ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new TaskConfigError(`Invalid task config ${source}:\n${errors}`);
  }
  return taskFromDocument(result.data);
}

export async function loadTaskConfigFile(filePath: string): Promise<Task> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (err) {
    throw new TaskConfigError(`Cannot read task config ${filePath}: ${errorMessage(err)}`, { cause: err });
  }
  return parseTaskConfig(content, filePath);
}
