import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { NotFoundError, TaskConfigError } from "../../errors.js";
import {
  InMemoryResultStore,
  MemoryWorkspace,
  StaticTaskCatalog,
  makeEvaluation,
  makeResult,
  makeTask,
} from "../../testing/fakes.js";
import { EvaluationOrchestrator, type EvaluateOutcome } from "../evaluationOrchestrator.js";
import { EvaluationQueue, type EvaluationRunner } from "../evaluationQueue.js";

function outcome(agentName: string): EvaluateOutcome {
  return { result: makeResult({ agentName, score: 70 }), evaluation: makeEvaluation(), completed: false };
}

function stubRunner(evaluate: EvaluationRunner["evaluate"]) {
  return {
    evaluate: vi.fn(evaluate),
    recordAgentFailure: vi.fn(async () => {}),
    failEvaluation: vi.fn(async () => makeEvaluation({ status: "failed" })),
  };
}

describe("EvaluationQueue", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("runs jobs through the orchestrator and records outcomes", async () => {
    const orchestrator = new EvaluationOrchestrator({
      store: new InMemoryResultStore(),
      tasks: new StaticTaskCatalog([makeTask()]),
      workspace: new MemoryWorkspace({}, { a: {}, b: {} }),
    });
    const { id } = await orchestrator.createEvaluation({ taskId: "css-consolidation", agents: ["a", "b"] });
    const queue = new EvaluationQueue(orchestrator, { concurrency: 2 });

    const jobA = queue.submit(id, "a");
    queue.submit(id, "b");
    expect(jobA.state).toBe("running");
    await queue.onIdle();

    const jobs = queue.listJobs(id);
    expect(jobs.map((j) => j.state)).toEqual(["succeeded", "succeeded"]);
    expect(jobs.map((j) => j.score)).toEqual([100, 100]);
    expect(jobs.filter((j) => j.completedEvaluation)).toHaveLength(1);
    expect(queue.getJob(jobA.id)?.finishedAtISO).toBeDefined();
  });

  it("bounds concurrency and returns the queued job for duplicate submits", async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((r) => {
      release = r;
    });
    const runner = stubRunner(async (_id, agent) => {
      await gate;
      return outcome(agent);
    });
    const queue = new EvaluationQueue(runner, { concurrency: 1 });

    queue.submit("e", "a");
    const queued = queue.submit("e", "b");
    const duplicate = queue.submit("e", "b");
    expect(duplicate.id).toBe(queued.id);
    expect(queue.stats()).toEqual({ queued: 1, running: 1, concurrency: 1 });

    release();
    await queue.onIdle();
    expect(runner.evaluate).toHaveBeenCalledTimes(2);
    expect(queue.stats()).toEqual({ queued: 0, running: 0, concurrency: 1 });
  });

  it("routes failures by error kind", async () => {
    const runner = stubRunner(async (_id, agent) => {
      if (agent === "missing") throw new NotFoundError("Evaluation e not found");
      if (agent === "config") throw new TaskConfigError("bad yaml");
      throw new Error("disk full");
    });
    const queue = new EvaluationQueue(runner, { concurrency: 3 });

    const missing = queue.submit("e", "missing");
    queue.submit("e", "config");
    const crashed = queue.submit("e", "crash");
    await queue.onIdle();

    expect(queue.getJob(missing.id)).toMatchObject({ state: "failed", error: "Evaluation e not found" });
    expect(queue.getJob(crashed.id)?.error).toBe("disk full");
    expect(runner.failEvaluation).toHaveBeenCalledTimes(1);
    expect(runner.failEvaluation).toHaveBeenCalledWith("e", "bad yaml");
    expect(runner.recordAgentFailure).toHaveBeenCalledTimes(1);
    expect(runner.recordAgentFailure).toHaveBeenCalledWith("e", "crash", "disk full");
  });

  it("keeps only the newest finished jobs", async () => {
    const queue = new EvaluationQueue(stubRunner(async (_id, agent) => outcome(agent)), {
      concurrency: 1,
      maxHistory: 2,
    });
    const first = queue.submit("e", "a");
    queue.submit("e", "b");
    queue.submit("e", "c");
    await queue.onIdle();
    expect(queue.getJob(first.id)).toBeUndefined();
    expect(queue.listJobs().map((j) => j.agentName)).toEqual(["b", "c"]);
  });
});
