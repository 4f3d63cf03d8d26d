import { describe, it, expect, afterEach, vi } from "vitest";
import {
  getEvalLogPath,
  getJudgeTimeoutMs,
  getMaxConcurrentEvaluations,
  getPersistenceDriver,
  getWorkspaceDriver,
} from "../config.js";

describe("config", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("clamps numeric settings to their range", () => {
    vi.stubEnv("MAX_CONCURRENT_EVALUATIONS", "500");
    expect(getMaxConcurrentEvaluations()).toBe(64);
    vi.stubEnv("MAX_CONCURRENT_EVALUATIONS", "0");
    expect(getMaxConcurrentEvaluations()).toBe(1);
    vi.stubEnv("JUDGE_TIMEOUT_MS", "not-a-number");
    expect(getJudgeTimeoutMs()).toBe(120_000);
  });

  it("disables the event log with an empty path", () => {
    vi.stubEnv("EVAL_LOG_PATH", "");
    expect(getEvalLogPath()).toBeUndefined();
    vi.stubEnv("EVAL_LOG_PATH", "/tmp/events.jsonl");
    expect(getEvalLogPath()).toBe("/tmp/events.jsonl");
  });

  it("uses the file store unless db is named", () => {
    vi.stubEnv("PERSISTENCE_DRIVER", "DB");
    expect(getPersistenceDriver()).toBe("db");
    vi.stubEnv("PERSISTENCE_DRIVER", "");
    expect(getPersistenceDriver()).toBe("file");
  });

  it("selects the github workspace only when asked", () => {
    vi.stubEnv("WORKSPACE_DRIVER", "GitHub");
    expect(getWorkspaceDriver()).toBe("github");
    vi.stubEnv("WORKSPACE_DRIVER", "s3");
    expect(getWorkspaceDriver()).toBe("file");
  });
});
