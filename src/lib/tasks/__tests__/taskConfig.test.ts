import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdir, rm, writeFile } from "fs/promises";
import { join } from "path";
import { tmpdir } from "os";
import { fileURLToPath } from "url";
import { TaskConfigError } from "../../errors.js";
import { FileTaskCatalog } from "../taskCatalog.js";
import { loadTaskConfigFile, parseTaskConfig } from "../taskConfig.js";

const REPO_TASKS_DIR = fileURLToPath(new URL("../../../../tasks", import.meta.url));

function doc(id: string, extra = ""): string {
  return `task:\n  id: ${id}\n  name: "Task ${id}"\n  category: feature\n${extra}`;
}

describe("parseTaskConfig", () => {
  it("loads the bundled css-consolidation task", async () => {
    const task = await loadTaskConfigFile(join(REPO_TASKS_DIR, "css-consolidation", "config.yaml"));
    expect(task.id).toBe("css-consolidation");
    expect(task.category).toBe("refactoring");
    expect(task.evaluationType).toBe("hybrid");
    expect(task.rubric.map((c) => [c.name, c.weight])).toEqual([
      ["pattern_consolidation", 40],
      ["ie_hack_removal", 20],
      ["font_tag_modernization", 15],
      ["style_block_cleanup", 15],
      ["smart_retention", 10],
    ]);
    expect(task.judgeModel).toBe("anthropic/claude-3.5-sonnet");
    expect(task.judgePromptTemplate?.startsWith("Pay particular attention to:")).toBe(true);
    expect(Object.keys(task.agentPrompts)).toEqual(["claude", "cursor", "manual"]);
    expect(task.agentPrompts.manual).toBe("Produce the reference consolidation by hand.");
    expect(task.isActive).toBe(true);
  });

  it("applies defaults for optional sections", () => {
    expect(parseTaskConfig(doc("minimal"))).toEqual({
      id: "minimal",
      name: "Task minimal",
      description: "",
      category: "feature",
      rubric: [],
      evaluationType: "rule_based",
      judgeModel: undefined,
      judgePromptTemplate: undefined,
      agentPrompts: {},
      isActive: true,
    });
  });

  it("reports schema violations with their path", () => {
    const bad = "task:\n  id: Bad Id\n  name: x\n  category: chores\n";
    expect(() => parseTaskConfig(bad, "bad.yaml")).toThrow(TaskConfigError);
    try {
      parseTaskConfig(bad, "bad.yaml");
    } catch (err) {
      expect(err instanceof Error ? err.message : "").toContain("  - task.id: must be a lowercase slug");
      expect(err instanceof Error ? err.message : "").toContain("  - task.category:");
    }
  });

  it("wraps YAML syntax errors", () => {
    expect(() => parseTaskConfig("task: [", "broken.yaml")).toThrow(/^Invalid YAML in broken\.yaml/);
  });
});

describe("FileTaskCatalog", () => {
  let testDir: string;

  beforeEach(async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    testDir = join(tmpdir(), `task-catalog-${Date.now()}-${Math.random().toString(16).slice(2)}`);
    for (const dir of ["alpha", "beta", "retired", "broken"]) {
      await mkdir(join(testDir, dir), { recursive: true });
    }
    await writeFile(join(testDir, "alpha", "config.yaml"), doc("alpha"), "utf-8");
    await writeFile(join(testDir, "beta", "config.yaml"), doc("renamed"), "utf-8");
    await writeFile(join(testDir, "retired", "config.yaml"), doc("retired", "  active: false\n"), "utf-8");
    await writeFile(join(testDir, "broken", "config.yaml"), "task: {}\n", "utf-8");
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(testDir, { recursive: true, force: true });
  });

  it("lists active tasks in directory order, skipping broken ones", async () => {
    const catalog = new FileTaskCatalog(testDir);
    expect((await catalog.listTasks()).map((t) => t.id)).toEqual(["alpha", "beta"]);
    expect((await catalog.listTasks({ includeInactive: true })).map((t) => t.id)).toEqual([
      "alpha",
      "beta",
      "retired",
    ]);
  });

  it("uses the directory name when the document declares another id", async () => {
    const task = await new FileTaskCatalog(testDir).getTask("beta");
    expect(task?.id).toBe("beta");
    expect(task?.name).toBe("Task renamed");
  });

  it("returns null for unknown or unsafe ids and throws for invalid documents", async () => {
    const catalog = new FileTaskCatalog(testDir);
    expect(await catalog.getTask("nope")).toBeNull();
    expect(await catalog.getTask("../alpha")).toBeNull();
    await expect(catalog.getTask("broken")).rejects.toBeInstanceOf(TaskConfigError);
  });

  it("returns no tasks when the directory is missing", async () => {
    expect(await new FileTaskCatalog(join(testDir, "absent")).listTasks()).toEqual([]);
  });
});
