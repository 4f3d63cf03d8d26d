import type { EvaluationType } from "../evaluation/types.js";

export type TaskCategory = "refactoring" | "bug_fixing" | "feature" | "optimization";

export interface RubricCriterion {
  name: string;
  /** 1-100. A criterion never contributes more than its weight. */
  weight: number;
  description: string;
}

export interface Task {
  id: string;
  name: string;
  description: string;
  category: TaskCategory;
  rubric: RubricCriterion[];
  evaluationType: EvaluationType;
  judgeModel?: string;
  /** Extra guidance appended to the judge prompt. */
  judgePromptTemplate?: string;
  /** Prompt text handed to each agent, keyed by agent name. */
  agentPrompts: Record<string, string>;
  isActive: boolean;
}
