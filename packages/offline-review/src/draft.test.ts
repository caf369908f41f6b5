import { describe, expect, it } from "vitest";

import { resolveAnchor } from "./anchor.js";
import { parseUnifiedDiff } from "./diff.js";
import { ReviewDraft, createSession } from "./draft.js";
import { APP_DIFF, FIXED_NOW, GITHUB_TARGET, captureError } from "./testing.js";

const diff = parseUnifiedDiff(APP_DIFF);
const anchor = resolveAnchor(diff, "app.py", { start: 8, end: 15 });

function newDraft(): ReviewDraft {
  const session = createSession({
    repoRoot: "/work/app",
    prNumber: 42,
    backend: GITHUB_TARGET,
    baseRef: "origin/main",
    headRef: "HEAD",
    now: FIXED_NOW,
  });
  return new ReviewDraft(session, () => FIXED_NOW);
}

describe("ReviewDraft", () => {
  it("starts empty", () => {
    const { session } = newDraft();
    expect(session).toMatchObject({ status: "draft", body: "", bodyStatus: "draft", comments: [], nextLocalId: 1 });
    expect(session.createdAt).toBe("2026-03-01T12:00:00.000Z");
  });

  it("keeps comments in insertion order and never reuses ids", () => {
    const draft = newDraft();
    const first = draft.addComment(anchor, "Needs a docstring");
    const second = draft.addComment(resolveAnchor(diff, "app.py", 17), "Guard this");
    draft.deleteComment(second);
    const third = draft.addComment(anchor, "Handle a missing APP_CONFIG");

    expect([first, second, third]).toEqual([1, 2, 3]);
    expect(draft.listComments().map((comment) => comment.localId)).toEqual([1, 3]);
    expect(draft.session.nextLocalId).toBe(4);
  });

  it("treats an identical edit as a no-op", () => {
    const draft = newDraft();
    const id = draft.addComment(anchor, "text");
    const before = draft.session;

    expect(draft.editComment(id, "text")).toBe(false);
    expect(draft.session).toBe(before);
    expect(draft.editComment(id, "new text")).toBe(true);
    expect(draft.getComment(id).body).toBe("new text");
  });

  it("reports unknown ids without changing the session", () => {
    const draft = newDraft();
    draft.addComment(anchor, "text");
    const before = draft.session;

    expect(captureError(() => draft.deleteComment(7))).toMatchObject({
      kind: "NotFoundError",
      message: "No comment with id 7 in the review of #42",
    });
    expect(captureError(() => draft.editComment(7, "x"))).toMatchObject({ kind: "NotFoundError" });
    expect(draft.session).toBe(before);
  });

  it("refuses to change a submitted comment", () => {
    const draft = newDraft();
    const id = draft.addComment(anchor, "text");
    draft.recordStatus(id, { state: "submitted", submittedAt: FIXED_NOW.toISOString() }, { backendId: "1001" });

    expect(captureError(() => draft.editComment(id, "other"))).toMatchObject({ kind: "CommentAlreadySubmitted" });
    expect(captureError(() => draft.deleteComment(id))).toMatchObject({ kind: "CommentAlreadySubmitted" });
  });

  it("puts a failed comment back in draft when it is edited", () => {
    const draft = newDraft();
    const id = draft.addComment(anchor, "text");
    draft.recordStatus(id, { state: "failed", reason: "BackendRejected", message: "422" });

    expect(draft.editComment(id, "text")).toBe(true);
    expect(draft.getComment(id).status).toEqual({ state: "draft" });
  });

  it("finds the first comment covering a line", () => {
    const draft = newDraft();
    draft.addComment(anchor, "range");
    draft.addComment(resolveAnchor(diff, "app.py", 10), "single");

    expect(draft.commentAt("app.py", 10)?.body).toBe("range");
    expect(draft.commentAt("app.py", 17)).toBeUndefined();
  });

  it("reports whether the body changed", () => {
    const draft = newDraft();
    expect(draft.setBody("Looks good")).toBe(true);
    expect(draft.setBody("Looks good")).toBe(false);
    expect(draft.session.body).toBe("Looks good");
  });
});
