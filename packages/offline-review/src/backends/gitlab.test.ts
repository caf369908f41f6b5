import { createHash } from "node:crypto";

import { describe, expect, it } from "vitest";

import { resolveAnchor } from "../anchor.js";
import { DEFAULT_SETTINGS } from "../config.js";
import { parseUnifiedDiff } from "../diff.js";
import { createSession } from "../draft.js";
import { APP_DIFF, FIXED_NOW, GITLAB_TARGET, fakeFetch, noSleep } from "../testing.js";
import type { FakeReply } from "../testing.js";
import type { Anchor, RemoteReviewHandle } from "../types.js";
import { buildPosition } from "./gitlab.js";
import { createBackendAdapter } from "./index.js";

const MR_URL = "https://gitlab.example.com/api/v4/projects/group%2Fsub%2Fapp/merge_requests/42";
const handle = { kind: "gitlab", baseSha: "b1", startSha: "s1", headSha: "h1" } as const satisfies RemoteReviewHandle;
const diff = parseUnifiedDiff(APP_DIFF);
const appHash = createHash("sha1").update("app.py").digest("hex");

function adapterWith(replies: FakeReply[]) {
  const { fetch, requests } = fakeFetch(replies);
  const adapter = createBackendAdapter({
    target: GITLAB_TARGET,
    credential: { kind: "gitlab", baseUrl: GITLAB_TARGET.baseUrl, token: "test-secret" },
    prNumber: 42,
    settings: DEFAULT_SETTINGS,
    fetch,
    sleep: noSleep,
  });
  return { adapter, requests };
}

function draftComment(anchor: Anchor) {
  return {
    localId: 1,
    anchor,
    body: "Consider a default",
    status: { state: "draft" as const },
    createdAt: FIXED_NOW.toISOString(),
    updatedAt: FIXED_NOW.toISOString(),
  };
}

describe("GitLabAdapter", () => {
  it("reads the diff refs of the merge request", async () => {
    const { adapter, requests } = adapterWith([{ body: { iid: 42, diff_refs: { base_sha: "b1", start_sha: "s1", head_sha: "h1" } } }]);
    const session = createSession({
      repoRoot: "/work/app",
      prNumber: 42,
      backend: GITLAB_TARGET,
      baseRef: "origin/main",
      headRef: "HEAD",
      now: FIXED_NOW,
    });

    await expect(adapter.createReview(session)).resolves.toEqual(handle);
    expect(requests[0]).toMatchObject({ method: "GET", url: MR_URL, headers: { authorization: "Bearer test-secret" } });
    expect(requests[0]?.headers["x-github-api-version"]).toBeUndefined();
  });

  it("rejects a merge request without diff refs", async () => {
    const { adapter } = adapterWith([{ body: { iid: 42, diff_refs: null } }]);
    const session = createSession({
      repoRoot: "/work/app",
      prNumber: 42,
      backend: GITLAB_TARGET,
      baseRef: "origin/main",
      headRef: "HEAD",
    });
    await expect(adapter.createReview(session)).rejects.toMatchObject({ kind: "ValidationError" });
  });

  it("opens one discussion per comment", async () => {
    const { adapter, requests } = adapterWith([{ status: 201, body: { id: "d41d8cd9", notes: [] } }]);
    const comment = draftComment(resolveAnchor(diff, "app.py", 17));

    await expect(adapter.submitComment(handle, comment)).resolves.toBe("d41d8cd9");
    expect(requests[0]).toMatchObject({ method: "POST", url: `${MR_URL}/discussions` });
    expect(requests[0]?.body).toEqual({
      body: "Consider a default",
      position: {
        position_type: "text",
        base_sha: "b1",
        start_sha: "s1",
        head_sha: "h1",
        old_path: "app.py",
        new_path: "app.py",
        old_line: 9,
        new_line: 17,
      },
    });
  });

  it("posts the body as a note, and nothing when it is empty", async () => {
    const { adapter, requests } = adapterWith([{ status: 201, body: { id: 77, body: "Thanks" } }]);

    await expect(adapter.finalizeReview(handle, "  ")).resolves.toEqual({});
    expect(requests).toHaveLength(0);
    await expect(adapter.finalizeReview(handle, "Thanks")).resolves.toEqual({ id: "77" });
    expect(requests[0]).toMatchObject({ url: `${MR_URL}/notes`, body: { body: "Thanks" } });
  });
});

describe("buildPosition", () => {
  it("describes a multi-line range of added lines", () => {
    const position = buildPosition(handle, resolveAnchor(diff, "app.py", { start: 8, end: 15 }));

    expect(position).toMatchObject({ new_line: 15 });
    expect(position.old_line).toBeUndefined();
    expect(position.line_range).toEqual({
      start: { line_code: `${appHash}_8_8`, type: "new", new_line: 8 },
      end: { line_code: `${appHash}_8_15`, type: "new", new_line: 15 },
    });
  });

  it("builds line codes for a base-side range from both line counters", () => {
    const utilsHash = createHash("sha1").update("utils.py").digest("hex");
    const position = buildPosition(handle, resolveAnchor(diff, "utils.py", { start: 1, end: 2 }, "base"));

    expect(position).toMatchObject({ old_line: 2 });
    expect(position.line_range).toEqual({
      start: { line_code: `${utilsHash}_1_1`, type: "old", old_line: 1, new_line: 1 },
      end: { line_code: `${utilsHash}_2_2`, type: "old", old_line: 2 },
    });
  });

  it("uses the old line for deleted lines", () => {
    const position = buildPosition(handle, resolveAnchor(diff, "utils.py", 2, "base"));

    expect(position).toMatchObject({ old_path: "utils.py", new_path: "utils.py", old_line: 2 });
    expect(position.new_line).toBeUndefined();
    expect(position.line_range).toBeUndefined();
  });
});
