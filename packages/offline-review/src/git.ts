import path from "node:path";

import { $, ProcessOutput } from "zx";

import { parseUnifiedDiff } from "./diff.js";
import type { FileDiff } from "./diff.js";
import { ReviewError } from "./errors.js";

$.verbose = false;

/** Supplies the parsed diff a review is anchored against. */
export interface DiffSource {
  diff(baseRef: string, headRef: string): Promise<FileDiff[]>;
}

export class GitDiffSource implements DiffSource {
  constructor(private readonly repoRoot: string) {}

  async diff(baseRef: string, headRef: string): Promise<FileDiff[]> {
    const text = await getDiff(this.repoRoot, baseRef, headRef);
    return parseUnifiedDiff(text);
  }
}

/** Diff from the merge base of `baseRef` and `headRef` to `headRef`, as a pull/merge request shows it. */
export async function getDiff(repoRoot: string, baseRef: string, headRef: string): Promise<string> {
  return runGit(repoRoot, [
    "-c",
    "core.quotePath=false",
    "diff",
    "--no-color",
    "--no-ext-diff",
    "--find-renames",
    `${baseRef}...${headRef}`,
  ]);
}

export async function getGitDir(repoRoot: string): Promise<string> {
  const output = await runGit(repoRoot, ["rev-parse", "--git-dir"]);
  return path.resolve(repoRoot, output.trim());
}

export async function revParse(repoRoot: string, ref: string): Promise<string> {
  const output = await runGit(repoRoot, ["rev-parse", "--verify", `${ref}^{commit}`]);
  return output.trim();
}

export async function getRemoteUrl(repoRoot: string, remote = "origin"): Promise<string | undefined> {
  try {
    const output = await runGit(repoRoot, ["remote", "get-url", remote]);
    return output.trim() || undefined;
  } catch (error) {
    if (error instanceof ReviewError && error.kind === "GitError") {
      return undefined;
    }
    throw error;
  }
}

/** The remote's default branch (`origin/HEAD`), falling back to `origin/main`. */
export async function defaultBaseRef(repoRoot: string): Promise<string> {
  try {
    const output = await runGit(repoRoot, ["symbolic-ref", "--short", "refs/remotes/origin/HEAD"]);
    return output.trim();
  } catch (error) {
    if (error instanceof ReviewError && error.kind === "GitError") {
      return "origin/main";
    }
    throw error;
  }
}

async function runGit(repoRoot: string, args: string[]): Promise<string> {
  try {
    const result = await $({ cwd: repoRoot, quiet: true })`git ${args}`;
    return result.stdout;
  } catch (error) {
    if (error instanceof ProcessOutput) {
      const detail = error.stderr.trim() || `exit code ${error.exitCode ?? "unknown"}`;
      throw new ReviewError("GitError", `git ${args.join(" ")} failed: ${detail}`, { cause: error });
    }
    throw error;
  }
}
