import { promises as fs } from "node:fs";
import { homedir } from "node:os";
import path from "node:path";

import { ReviewError, isErrnoException } from "./errors.js";

export const CONFIG_DIR_NAME = ".offline-review";

export async function resolveRepoRoot(start: string = process.cwd()): Promise<string> {
  let current = path.resolve(start);
  while (true) {
    // A worktree or submodule has a .git file pointing at the real git dir.
    const gitEntry = path.join(current, ".git");
    const stat = await fs.stat(gitEntry).catch(() => undefined);
    if (stat) {
      return current;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      throw new ReviewError("GitError", "Unable to locate repository root (missing .git)");
    }
    current = parent;
  }
}

export function getReviewsDir(gitDir: string): string {
  return path.join(gitDir, "reviews");
}

export function getArchiveDir(reviewsDir: string): string {
  return path.join(reviewsDir, "archive");
}

export function getSessionFileName(prNumber: number): string {
  return `${prNumber}-review.json`;
}

export function getConfigDir(repoRoot: string): string {
  return path.join(repoRoot, CONFIG_DIR_NAME);
}

/** Config files in precedence order: the repository's own first, then the user's. */
export function getConfigPaths(repoRoot: string): string[] {
  const home = process.env.HOME || homedir();
  return [path.join(getConfigDir(repoRoot), "config.json"), path.join(home, CONFIG_DIR_NAME, "config.json")];
}

export async function ensureDir(dir: string): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
}

export async function loadEnv(repoRoot: string): Promise<void> {
  for (const file of [path.join(repoRoot, ".env"), path.join(getConfigDir(repoRoot), ".env")]) {
    try {
      await fs.access(file);
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        continue;
      }
      throw error;
    }
    process.loadEnvFile(file);
  }
}
