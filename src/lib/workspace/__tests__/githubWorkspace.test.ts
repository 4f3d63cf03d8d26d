import { describe, it, expect, afterEach, vi } from "vitest";
import { FileWorkspaceProvider } from "../fileWorkspace.js";
import { GitHubWorkspaceProvider, solutionBranch } from "../githubWorkspace.js";

const SETTINGS = { token: "test-token", repo: "acme/solutions", branchPrefix: "eval", timeoutMs: 1000 };

function stubFetch(routes: Record<string, string>) {
  const fetchMock = vi.fn(async (input: string | URL | Request, _init?: RequestInit) => {
    const url = String(input);
    const body = routes[url];
    return body === undefined ? new Response("missing", { status: 404 }) : new Response(body, { status: 200 });
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

describe("GitHubWorkspaceProvider", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("names solution branches by evaluation and agent", () => {
    expect(solutionBranch("eval", "e1", "a")).toBe("eval-e1-a");
  });

  it("rejects malformed repository names", () => {
    expect(() => new GitHubWorkspaceProvider({ ...SETTINGS, repo: "no-owner" }, new FileWorkspaceProvider())).toThrow(
      'GITHUB_REPO must be "owner/name", got "no-owner"'
    );
  });

  it("loads blob files from the agent's branch", async () => {
    const api = "https://api.github.com/repos/acme/solutions";
    const fetchMock = stubFetch({
      [`${api}/git/trees/eval-e1-a?recursive=1`]: JSON.stringify({
        truncated: false,
        tree: [
          { path: "index.html", type: "blob", size: 20 },
          { path: "css", type: "tree" },
          { path: "css/site.css", type: "blob", size: 15 },
          { path: "big.bin", type: "blob", size: 5_000_000 },
        ],
      }),
      [`${api}/contents/index.html?ref=eval-e1-a`]: "<p>solution</p>",
      [`${api}/contents/css/site.css?ref=eval-e1-a`]: "p { color: red }",
    });
    const workspace = new GitHubWorkspaceProvider(SETTINGS, new FileWorkspaceProvider());

    expect(await workspace.loadSolution("e1", "a")).toEqual({
      "index.html": "<p>solution</p>",
      "css/site.css": "p { color: red }",
    });
    expect(fetchMock).toHaveBeenCalledTimes(3);
    const headers = new Headers(fetchMock.mock.calls[0]?.[1]?.headers);
    expect(headers.get("Authorization")).toBe("Bearer test-token");
  });

  it("surfaces API errors with the status code", async () => {
    stubFetch({});
    const workspace = new GitHubWorkspaceProvider(SETTINGS, new FileWorkspaceProvider());
    await expect(workspace.loadSolution("e1", "a")).rejects.toThrow(
      "GitHub 404 for /repos/acme/solutions/git/trees/eval-e1-a?recursive=1: missing"
    );
  });
});
