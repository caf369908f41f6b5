import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { resolveAnchor } from "./anchor.js";
import { parseUnifiedDiff } from "./diff.js";
import { ReviewDraft, createSession } from "./draft.js";
import { FileSessionStore, writeFileAtomic } from "./store.js";
import { APP_DIFF, FIXED_NOW, GITHUB_TARGET } from "./testing.js";
import type { ReviewSession } from "./types.js";

const key = { repoRoot: "/work/app", prNumber: 42 };

function sampleSession(): ReviewSession {
  const draft = new ReviewDraft(
    createSession({ ...key, backend: GITHUB_TARGET, baseRef: "origin/main", headRef: "HEAD", now: FIXED_NOW }),
    () => FIXED_NOW,
  );
  draft.addComment(resolveAnchor(parseUnifiedDiff(APP_DIFF), "app.py", { start: 8, end: 15 }), "Explain the config lookup");
  draft.setBody("Mostly fine");
  return draft.session;
}

describe("FileSessionStore", () => {
  let dir: string;
  let store: FileSessionStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "offline-review-store-"));
    store = new FileSessionStore(async () => dir);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("returns undefined when no review exists", async () => {
    await expect(store.load(key)).resolves.toBeUndefined();
  });

  it("reloads exactly what it saved", async () => {
    const session = sampleSession();
    await store.save(session);

    await expect(store.load(key)).resolves.toEqual(session);
    expect(await fs.readdir(dir)).toEqual(["42-review.json"]);
  });

  it("reports unreadable files as LocalStorageError", async () => {
    await fs.writeFile(path.join(dir, "42-review.json"), "{ not json");
    await expect(store.load(key)).rejects.toMatchObject({ kind: "LocalStorageError" });

    await fs.writeFile(path.join(dir, "42-review.json"), JSON.stringify({ schemaVersion: 1, prNumber: 42 }));
    await expect(store.load(key)).rejects.toMatchObject({ kind: "LocalStorageError" });
  });

  it("loads a session interrupted mid-publish as partially published once a comment went out", async () => {
    const draft = new ReviewDraft(sampleSession(), () => FIXED_NOW);
    draft.recordStatus(1, { state: "submitted", submittedAt: FIXED_NOW.toISOString() }, { backendId: "1001" });
    await store.save({ ...draft.session, status: "publishing" });

    const loaded = await store.load(key);
    expect(loaded?.status).toBe("partially-published");
  });

  it("loads a session interrupted before any comment went out as a draft", async () => {
    await store.save({ ...sampleSession(), status: "publishing" });
    const loaded = await store.load(key);
    expect(loaded?.status).toBe("draft");
  });

  it("keeps the paired line counters of anchored lines", async () => {
    await store.save(sampleSession());
    const loaded = await store.load(key);
    expect(loaded?.comments[0]?.anchor.lines[7]).toEqual({ kind: "add", newLine: 15, pairedLine: 8, content: "    print(config)" });
  });

  it("moves corrupt files aside", async () => {
    await fs.writeFile(path.join(dir, "42-review.json"), "garbage");
    const moved = await store.quarantine(key);

    expect(moved).toMatch(/42-review\.json\.corrupt-\d{8}T\d{6}Z$/);
    await expect(store.load(key)).resolves.toBeUndefined();
    await expect(store.quarantine(key)).resolves.toBeUndefined();
  });

  it("archives a published session", async () => {
    const session = sampleSession();
    await store.save(session);
    const archived = await store.archive({ ...session, status: "published" });

    expect(archived).toBe(path.join(dir, "archive", "42-review-20260301T120000Z.json"));
    expect(JSON.parse(await fs.readFile(archived, "utf8"))).toMatchObject({ status: "published", prNumber: 42 });
    await expect(store.load(key)).resolves.toBeUndefined();
  });
});

describe("writeFileAtomic", () => {
  it("replaces the file without leaving temporary files", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "offline-review-atomic-"));
    try {
      const file = path.join(dir, "nested", "data.json");
      await writeFileAtomic(file, "first");
      await writeFileAtomic(file, "second");

      expect(await fs.readFile(file, "utf8")).toBe("second");
      expect(await fs.readdir(path.dirname(file))).toEqual(["data.json"]);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
