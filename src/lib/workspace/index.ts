import { getWorkspaceDriver } from "../config.js";
import { FileWorkspaceProvider } from "./fileWorkspace.js";
import { GitHubWorkspaceProvider } from "./githubWorkspace.js";
import type { WorkspaceProvider } from "./types.js";

export type { WorkspaceProvider } from "./types.js";

export function createWorkspaceProvider(): WorkspaceProvider {
  return getWorkspaceDriver() === "github" ? new GitHubWorkspaceProvider() : new FileWorkspaceProvider();
}
