import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { getArchiveDir, getReviewsDir, getSessionFileName, resolveRepoRoot } from "./paths.js";

describe("paths", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it("finds the repository root from a nested directory", async () => {
    dir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), "offline-review-root-")));
    await fs.mkdir(path.join(dir, ".git"));
    await fs.mkdir(path.join(dir, "src", "deep"), { recursive: true });

    await expect(resolveRepoRoot(path.join(dir, "src", "deep"))).resolves.toBe(dir);
  });

  it("accepts a .git file, as worktrees have", async () => {
    dir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), "offline-review-worktree-")));
    await fs.writeFile(path.join(dir, ".git"), "gitdir: /elsewhere/.git/worktrees/app\n");

    await expect(resolveRepoRoot(dir)).resolves.toBe(dir);
  });

  it("lays out session files under the git directory", () => {
    const reviews = getReviewsDir("/work/app/.git");
    expect(reviews).toBe(path.join("/work/app/.git", "reviews"));
    expect(getArchiveDir(reviews)).toBe(path.join("/work/app/.git", "reviews", "archive"));
    expect(getSessionFileName(42)).toBe("42-review.json");
  });
});
