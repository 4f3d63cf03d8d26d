/**
 * JSONL event log for evaluation lifecycle events. One JSON line per event,
 * written in the order recorded.
 */

import { appendFile, mkdir } from "fs/promises";
import { dirname } from "path";
import type { EvaluationType } from "./evaluation/types.js";

export type EvaluationEvent =
  | {
      type: "agent_scored";
      evaluationId: string;
      agentName: string;
      score: number;
      scoringKind: EvaluationType;
      error?: string;
    }
  | { type: "evaluation_completed"; evaluationId: string; agents: string[] }
  | { type: "agent_failed"; evaluationId: string; agentName: string; reason: string }
  | { type: "evaluation_failed"; evaluationId: string; reason: string };

export type LoggedEvent = EvaluationEvent & { tsISO: string };

async function appendJsonl(path: string, event: unknown): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await appendFile(path, JSON.stringify(event) + "\n");
}

export class EventLog {
  private tail: Promise<void> = Promise.resolve();

  /** Without a path, record() is a no-op. */
  constructor(
    private readonly path: string | undefined,
    private readonly now: () => Date = () => new Date()
  ) {}

  /** Resolves once this event (and every earlier one) has been written. */
  record(event: EvaluationEvent): Promise<void> {
    const path = this.path;
    if (!path) return Promise.resolve();
    const logged: LoggedEvent = { tsISO: this.now().toISOString(), ...event };
    const write = this.tail.then(() => appendJsonl(path, logged));
    this.tail = write.catch(() => undefined);
    return write;
  }
}
