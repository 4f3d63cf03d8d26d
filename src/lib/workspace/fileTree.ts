/**
 * Recursive text file reader for workspace directories.
 */

import { readdir, readFile, stat } from "fs/promises";
import { join, relative, sep } from "path";
import type { FileSet } from "../scoring/types.js";

export const MAX_FILE_BYTES = 1_000_000;
const SKIPPED_DIRS = new Set([".git", "node_modules"]);

function toPosix(path: string): string {
  return path.split(sep).join("/");
}

/** Reads every text file under root, keyed by posix path relative to root. Binary files are skipped. */
export async function readFileTree(root: string): Promise<FileSet> {
  const files: FileSet = {};

  async function walk(dir: string): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => a.name.localeCompare(b.name));
    for (const entry of entries) {
      const full = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!SKIPPED_DIRS.has(entry.name)) await walk(full);
        continue;
      }
      if (!entry.isFile()) continue;
      if ((await stat(full)).size > MAX_FILE_BYTES) continue;
      const buf = await readFile(full);
      if (buf.includes(0)) continue;
      files[toPosix(relative(root, full))] = buf.toString("utf-8");
    }
  }

  await walk(root);
  return files;
}
