/**
 * GitHub workspace: baseline from the local tasks directory, each agent's
 * solution from branch <prefix>-<evaluationId>-<agent> via the contents API.
 */

import { z } from "zod";
import { getGitHubSettings, type GitHubSettings } from "../config.js";
import type { FileSet } from "../scoring/types.js";
import { FileWorkspaceProvider } from "./fileWorkspace.js";
import { MAX_FILE_BYTES } from "./fileTree.js";
import type { WorkspaceProvider } from "./types.js";

const API_BASE = "https://api.github.com";
const MAX_SOLUTION_FILES = 200;

const TreeSchema = z.object({
  truncated: z.boolean().optional(),
  tree: z.array(
    z.object({
      path: z.string(),
      type: z.string(),
      size: z.number().optional(),
    })
  ),
});

export function solutionBranch(prefix: string, evaluationId: string, agentName: string): string {
  return `${prefix}-${evaluationId}-${agentName}`;
}

export class GitHubWorkspaceProvider implements WorkspaceProvider {
  private readonly settings: GitHubSettings;
  private readonly local: FileWorkspaceProvider;

  constructor(settings?: GitHubSettings, local?: FileWorkspaceProvider) {
    this.settings = settings ?? getGitHubSettings();
    this.local = local ?? new FileWorkspaceProvider();
    if (!/^[\w.-]+\/[\w.-]+$/.test(this.settings.repo)) {
      throw new Error(`GITHUB_REPO must be "owner/name", got "${this.settings.repo}"`);
    }
  }

  private async request(path: string, accept: string): Promise<Response> {
    const controller = new AbortController();
    const tid = setTimeout(() => controller.abort(), this.settings.timeoutMs);
    try {
      const res = await fetch(`${API_BASE}${path}`, {
        headers: {
          Accept: accept,
          "X-GitHub-Api-Version": "2022-11-28",
          ...(this.settings.token ? { Authorization: `Bearer ${this.settings.token}` } : {}),
        },
        signal: controller.signal,
      });
      if (!res.ok) {
        const body = await res.text().catch(() => "");
        throw new Error(`GitHub ${res.status} for ${path}: ${body.slice(0, 200)}`);
      }
      return res;
    } finally {
      clearTimeout(tid);
    }
  }

  loadBaseline(taskId: string): Promise<FileSet> {
    return this.local.loadBaseline(taskId);
  }

  async loadSolution(evaluationId: string, agentName: string): Promise<FileSet> {
    const { repo, branchPrefix } = this.settings;
    const branch = encodeURIComponent(solutionBranch(branchPrefix, evaluationId, agentName));
    const treeRes = await this.request(`/repos/${repo}/git/trees/${branch}?recursive=1`, "application/vnd.github+json");
    const tree = TreeSchema.parse(await treeRes.json());
    if (tree.truncated) {
      console.warn(`[Workspace] Tree for ${decodeURIComponent(branch)} is truncated; loading a partial solution`);
    }
    const blobs = tree.tree
      .filter((e) => e.type === "blob" && (e.size ?? 0) <= MAX_FILE_BYTES)
      .slice(0, MAX_SOLUTION_FILES);
    const files: FileSet = {};
    for (const blob of blobs) {
      const path = blob.path.split("/").map(encodeURIComponent).join("/");
      const res = await this.request(`/repos/${repo}/contents/${path}?ref=${branch}`, "application/vnd.github.raw+json");
      files[blob.path] = await res.text();
    }
    return files;
  }
}
