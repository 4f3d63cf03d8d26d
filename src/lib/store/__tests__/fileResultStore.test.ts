/**
 * Tests for FileResultStore: upsert keyed by (evaluation, agent), atomic
 * read-modify-write under withEvaluation, and corrupt record handling.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdir, rm, writeFile } from "fs/promises";
import { join } from "path";
import { tmpdir } from "os";
import { InvalidInputError, NotFoundError, PersistenceError } from "../../errors.js";
import { makeEvaluation, makeResult } from "../../testing/fakes.js";
import { FileResultStore } from "../fileResultStore.js";

describe("FileResultStore", () => {
  let testDir: string;
  let store: FileResultStore;

  beforeEach(async () => {
    testDir = join(tmpdir(), `result-store-${Date.now()}-${Math.random().toString(16).slice(2)}`);
    await mkdir(testDir, { recursive: true });
    store = new FileResultStore(testDir);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(testDir, { recursive: true, force: true });
  });

  it("creates and reads back an evaluation", async () => {
    const evaluation = makeEvaluation({ metadata: { createdBy: "test" } });
    await store.createEvaluation(evaluation);
    expect(await store.getEvaluation(evaluation.id)).toEqual(evaluation);
    expect(await store.getEvaluation("missing")).toBeNull();
    expect(await store.getEvaluation("../escape")).toBeNull();
  });

  it("rejects duplicate ids", async () => {
    await store.createEvaluation(makeEvaluation());
    await expect(store.createEvaluation(makeEvaluation())).rejects.toBeInstanceOf(InvalidInputError);
  });

  it("replaces the result for the same agent instead of adding a row", async () => {
    await store.createEvaluation(makeEvaluation());
    await store.upsertAgentResult(makeResult({ agentName: "a", score: 10 }));
    await store.upsertAgentResult(makeResult({ agentName: "a", score: 90 }));
    await store.upsertAgentResult(makeResult({ agentName: "b", score: 40 }));

    const results = await store.listAgentResults({ evaluationId: makeEvaluation().id });
    expect(results.map((r) => [r.agentName, r.score])).toEqual([
      ["a", 90],
      ["b", 40],
    ]);
    expect(await store.listAgentResults({ agentName: "b" })).toHaveLength(1);
  });

  it("throws NotFoundError when writing against an unknown evaluation", async () => {
    await expect(store.upsertAgentResult(makeResult({ evaluationId: "nope" }))).rejects.toBeInstanceOf(NotFoundError);
    await expect(store.updateEvaluationStatus("nope", "active", {})).rejects.toBeInstanceOf(NotFoundError);
  });

  it("sets and clears the failure reason", async () => {
    const evaluation = makeEvaluation();
    await store.createEvaluation(evaluation);
    await store.updateEvaluationStatus(evaluation.id, "failed", evaluation.agentStatus, "bad task");
    expect((await store.getEvaluation(evaluation.id))?.failureReason).toBe("bad task");
    await store.updateEvaluationStatus(evaluation.id, "pending", evaluation.agentStatus);
    const after = await store.getEvaluation(evaluation.id);
    expect(after?.status).toBe("pending");
    expect(after?.failureReason).toBeUndefined();
  });

  it("serializes concurrent read-modify-write units on one evaluation", async () => {
    const evaluation = makeEvaluation({ agents: ["a", "b", "c"] });
    await store.createEvaluation(evaluation);
    await Promise.all(
      evaluation.agents.map((agent) =>
        store.withEvaluation(evaluation.id, async (tx) => {
          const current = await tx.getEvaluation(evaluation.id);
          if (!current) throw new Error("missing");
          await tx.updateEvaluationStatus(evaluation.id, "active", { ...current.agentStatus, [agent]: "completed" });
        })
      )
    );
    const after = await store.getEvaluation(evaluation.id);
    expect(after?.agentStatus).toEqual({ a: "completed", b: "completed", c: "completed" });
  });

  it("writes nothing when the unit of work throws", async () => {
    const evaluation = makeEvaluation();
    await store.createEvaluation(evaluation);
    await expect(
      store.withEvaluation(evaluation.id, async (tx) => {
        await tx.upsertAgentResult(makeResult({ evaluationId: evaluation.id }));
        await tx.updateEvaluationStatus(evaluation.id, "active", { a: "completed", b: "pending" });
        expect((await tx.getEvaluation(evaluation.id))?.status).toBe("active");
        throw new Error("scorer blew up");
      })
    ).rejects.toThrow("scorer blew up");

    expect(await store.listAgentResults({ evaluationId: evaluation.id })).toEqual([]);
    expect((await store.getEvaluation(evaluation.id))?.status).toBe("pending");
  });

  it("puts the results file back when the evaluation write fails", async () => {
    const evaluation = makeEvaluation();
    await store.createEvaluation(evaluation);
    await store.upsertAgentResult(makeResult({ evaluationId: evaluation.id, agentName: "b", score: 10 }));
    // A directory where the temp file should go makes the evaluation write fail.
    await mkdir(join(testDir, "evaluations", `${evaluation.id}.json.${process.pid}.tmp`), { recursive: true });

    await expect(
      store.withEvaluation(evaluation.id, async (tx) => {
        await tx.upsertAgentResult(makeResult({ evaluationId: evaluation.id, agentName: "a", score: 90 }));
        await tx.updateEvaluationStatus(evaluation.id, "active", { a: "completed", b: "pending" });
      })
    ).rejects.toBeInstanceOf(PersistenceError);

    const kept = await store.listAgentResults({ evaluationId: evaluation.id });
    expect(kept.map((r) => [r.agentName, r.score])).toEqual([["b", 10]]);
    expect((await store.getEvaluation(evaluation.id))?.agentStatus).toEqual({ a: "pending", b: "pending" });
  });

  it("lists newest first with filters", async () => {
    await store.createEvaluation(makeEvaluation({ id: "e1", createdAtISO: "2026-01-01T00:00:00.000Z" }));
    await store.createEvaluation(
      makeEvaluation({ id: "e2", createdAtISO: "2026-01-03T00:00:00.000Z", status: "completed" })
    );
    await store.createEvaluation(makeEvaluation({ id: "e3", createdAtISO: "2026-01-02T00:00:00.000Z" }));

    expect((await store.listEvaluations()).map((e) => e.id)).toEqual(["e2", "e3", "e1"]);
    expect((await store.listEvaluations({ status: "pending" })).map((e) => e.id)).toEqual(["e3", "e1"]);
    expect((await store.listEvaluations({ limit: 1 })).map((e) => e.id)).toEqual(["e2"]);
  });

  it("reports corrupt records as PersistenceError and skips them in listings", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    await store.createEvaluation(makeEvaluation({ id: "good" }));
    await writeFile(join(testDir, "evaluations", "bad.json"), "{ not json", "utf-8");
    await writeFile(join(testDir, "evaluations", "wrong.json"), JSON.stringify({ id: "wrong" }), "utf-8");

    await expect(store.getEvaluation("bad")).rejects.toBeInstanceOf(PersistenceError);
    await expect(store.getEvaluation("wrong")).rejects.toThrow(/^Corrupt evaluation record wrong/);
    expect((await store.listEvaluations()).map((e) => e.id)).toEqual(["good"]);
    expect(warn).toHaveBeenCalledTimes(2);
  });
});
