import { beforeEach, describe, expect, it } from "vitest";

import { resolveAnchor } from "./anchor.js";
import { parseUnifiedDiff } from "./diff.js";
import { ReviewDraft, createSession } from "./draft.js";
import { BackendError, LocalStorageError } from "./errors.js";
import { Publisher, publishExitCode } from "./publisher.js";
import {
  APP_DIFF,
  FIXED_NOW,
  GITHUB_HANDLE as HANDLE,
  GITHUB_TARGET,
  MemoryDiffSource,
  MemorySessionStore,
  ScriptedAdapter,
} from "./testing.js";
import type { ReviewSession } from "./types.js";

const diff = parseUnifiedDiff(APP_DIFF);

function reviewWith(lines: number[], body = "Thanks for the cleanup"): ReviewSession {
  const draft = new ReviewDraft(
    createSession({
      repoRoot: "/work/app",
      prNumber: 42,
      backend: GITHUB_TARGET,
      baseRef: "origin/main",
      headRef: "HEAD",
      now: FIXED_NOW,
    }),
    () => FIXED_NOW,
  );
  for (const line of lines) {
    draft.addComment(resolveAnchor(diff, "app.py", line), `Comment on line ${line}`);
  }
  draft.setBody(body);
  return draft.session;
}

describe("Publisher", () => {
  let store: MemorySessionStore;
  let diffs: MemoryDiffSource;
  let adapter: ScriptedAdapter;
  let publisher: Publisher;

  beforeEach(() => {
    store = new MemorySessionStore();
    diffs = new MemoryDiffSource();
    adapter = new ScriptedAdapter();
    publisher = new Publisher({ store, diffs, adapter, clock: () => FIXED_NOW });
  });

  it("publishes every comment and the body, then archives the session", async () => {
    const outcome = await publisher.publish(reviewWith([10]));

    expect(outcome).toMatchObject({
      status: "published",
      submitted: [{ localId: 1, backendId: "1001" }],
      failures: [],
      finalized: true,
      reviewId: "900",
      aborted: false,
    });
    expect(adapter.finalized).toEqual(["Thanks for the cleanup"]);
    expect(diffs.calls).toEqual([{ baseRef: "origin/main", headRef: "HEAD" }]);
    expect(store.sessions.has(42)).toBe(false);
    expect(store.archived[0]?.comments[0]).toMatchObject({
      backendId: "1001",
      status: { state: "submitted", submittedAt: "2026-03-01T12:00:00.000Z" },
    });
    expect(store.archived[0]).toMatchObject({ status: "published", bodyStatus: "submitted", remote: HANDLE });
  });

  it("deletes instead of archiving when archiving is off", async () => {
    publisher = new Publisher({ store, diffs, adapter, archive: false });
    await store.save(reviewWith([10]));

    const outcome = await publisher.publish(reviewWith([10]));
    expect(outcome.archivedTo).toBeUndefined();
    expect(store.archived).toEqual([]);
    expect(store.sessions.has(42)).toBe(false);
  });

  it("stops at an auth failure and resumes without re-sending", async () => {
    adapter.failures.set(2, new BackendError("AuthError", "Bad credentials"));

    const first = await publisher.publish(reviewWith([10, 12]));
    expect(first).toMatchObject({
      status: "partially-published",
      finalized: false,
      failures: [{ localId: 2, reason: "AuthError", message: "Bad credentials" }],
    });
    const saved = store.sessions.get(42);
    expect(saved?.comments.map((comment) => comment.status.state)).toEqual(["submitted", "failed"]);
    expect(saved?.lastError).toBe("AuthError: Bad credentials");
    expect(saved?.remote).toEqual(HANDLE);
    expect(adapter.finalized).toEqual([]);
    expect(publishExitCode(first)).toBe(3);

    adapter.failures.clear();
    const resumed = saved ? await publisher.publish(saved) : undefined;
    expect(resumed?.finalized).toBe(true);
    expect(resumed?.submitted).toEqual([{ localId: 2, backendId: "1002" }]);
    expect(adapter.sent).toEqual([1, 2]);
  });

  it("keeps going past a rejected comment but does not finalize", async () => {
    adapter.failures.set(2, new BackendError("ValidationError", "line must be part of the diff"));

    const outcome = await publisher.publish(reviewWith([8, 10, 12]));
    expect(outcome.status).toBe("partially-published");
    expect(outcome.failures).toEqual([{ localId: 2, reason: "BackendRejected", message: "line must be part of the diff" }]);
    expect(adapter.sent).toEqual([1, 3]);
    expect(adapter.finalized).toEqual([]);
  });

  it("never sends a comment whose lines changed", async () => {
    diffs.files = parseUnifiedDiff(APP_DIFF.replace("+def load():", "+def load_config():"));

    const outcome = await publisher.publish(reviewWith([9]));
    expect(outcome.status).toBe("draft");
    expect(outcome.failures[0]?.reason).toBe("StaleAnchor");
    expect(adapter.sent).toEqual([]);
    expect(adapter.createCalls).toBe(0);
    expect(store.sessions.get(42)?.comments[0]?.status).toMatchObject({ state: "failed", reason: "StaleAnchor" });
  });

  it("stops between comments when aborted", async () => {
    const controller = new AbortController();
    adapter.onSubmit = () => controller.abort();

    const outcome = await publisher.publish(reviewWith([10, 12]), { signal: controller.signal });
    expect(outcome).toMatchObject({ status: "partially-published", aborted: true, finalized: false });
    expect(adapter.sent).toEqual([1]);
    expect(store.sessions.get(42)?.comments[1]?.status).toEqual({ state: "draft" });
  });

  it("refuses an empty review", async () => {
    await expect(publisher.publish(reviewWith([], ""))).rejects.toMatchObject({ kind: "EmptyReview" });
    expect(adapter.createCalls).toBe(0);
  });

  it("refuses a second publish of the same review while one is running", async () => {
    const session = reviewWith([10]);
    const running = publisher.publish(session);

    await expect(publisher.publish(session)).rejects.toMatchObject({ kind: "PublishInProgress" });
    await expect(running).resolves.toMatchObject({ finalized: true });
  });

  it("finalizes once even when clearing the local copy fails", async () => {
    const archive = store.archive.bind(store);
    let archiveFailures = 1;
    store.archive = async (session) => {
      if (archiveFailures > 0) {
        archiveFailures -= 1;
        throw new LocalStorageError("archive/42-review.json", "No space left on device");
      }
      return archive(session);
    };

    await expect(publisher.publish(reviewWith([10]))).rejects.toMatchObject({ kind: "LocalStorageError" });
    const saved = store.sessions.get(42);
    expect(saved).toMatchObject({ status: "published", bodyStatus: "submitted" });

    const again = saved ? await publisher.publish(saved) : undefined;
    expect(again).toMatchObject({ status: "published", finalized: true, submitted: [], archivedTo: "archive/42-review.json" });
    expect(adapter.finalized).toEqual(["Thanks for the cleanup"]);
    expect(adapter.createCalls).toBe(1);
    expect(diffs.calls).toHaveLength(1);
    expect(store.sessions.has(42)).toBe(false);
  });

  it("keeps what was sent when the backend fails to finalize", async () => {
    adapter.finalizeReview = async () => {
      throw new BackendError("TransientNetworkError", "timed out");
    };

    await expect(publisher.publish(reviewWith([10]))).rejects.toMatchObject({ kind: "TransientNetworkError" });
    expect(store.sessions.get(42)).toMatchObject({
      status: "partially-published",
      lastError: "TransientNetworkError: timed out",
      bodyStatus: "draft",
    });
  });
});

describe("publishExitCode", () => {
  it("separates refused credentials from failures a re-run may clear", () => {
    expect(publishExitCode({ finalized: true, failures: [] })).toBe(0);
    expect(publishExitCode({ finalized: false, failures: [{ localId: 1, reason: "AuthError", message: "Bad credentials" }] })).toBe(3);
    expect(publishExitCode({ finalized: false, failures: [{ localId: 1, reason: "BackendRejected", message: "outdated" }] })).toBe(2);
    expect(publishExitCode({ finalized: false, failures: [] })).toBe(2);
  });
});
