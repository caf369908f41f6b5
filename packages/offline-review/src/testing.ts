// Shared fixtures for the unit tests; not part of the published build.
import { parseUnifiedDiff } from "./diff.js";
import type { FileDiff } from "./diff.js";
import type { BackendAdapter } from "./backends/types.js";
import type { BackendError } from "./errors.js";
import type { DiffSource } from "./git.js";
import type { FetchFn } from "./http.js";
import type { SessionStore } from "./store.js";
import type {
  BackendTarget,
  FinalizedReview,
  RemoteReviewHandle,
  ReviewComment,
  ReviewSession,
  SessionKey,
} from "./types.js";

/** app.py gains lines 8-15 on the head side. */
export const APP_DIFF = [
  "diff --git a/app.py b/app.py",
  "index 1111111..2222222 100644",
  "--- a/app.py",
  "+++ b/app.py",
  "@@ -5,6 +5,14 @@ import os",
  " def main():",
  "     config = load()",
  "     run(config)",
  "+",
  "+def load():",
  '+    path = os.environ["APP_CONFIG"]',
  "+    with open(path) as handle:",
  "+        return json.load(handle)",
  "+",
  "+def run(config):",
  "+    print(config)",
  " ",
  ' if __name__ == "__main__":',
  "     main()",
  "diff --git a/utils.py b/utils.py",
  "index 3333333..4444444 100644",
  "--- a/utils.py",
  "+++ b/utils.py",
  "@@ -1,4 +1,3 @@",
  " import os",
  "-import sys",
  " ",
  " def helper():",
  "",
].join("\n");

export const GITHUB_TARGET: BackendTarget = {
  kind: "github",
  baseUrl: "https://github.com",
  owner: "octo",
  repo: "app",
};

export const GITLAB_TARGET: BackendTarget = {
  kind: "gitlab",
  baseUrl: "https://gitlab.example.com",
  owner: "group/sub",
  repo: "app",
};

export const FIXED_NOW = new Date("2026-03-01T12:00:00.000Z");

export class MemoryDiffSource implements DiffSource {
  readonly calls: Array<{ baseRef: string; headRef: string }> = [];
  files: FileDiff[];

  constructor(text: string = APP_DIFF) {
    this.files = parseUnifiedDiff(text);
  }

  async diff(baseRef: string, headRef: string): Promise<FileDiff[]> {
    this.calls.push({ baseRef, headRef });
    return this.files;
  }
}

export class MemorySessionStore implements SessionStore {
  readonly sessions = new Map<number, ReviewSession>();
  readonly archived: ReviewSession[] = [];
  saves = 0;

  async load(key: SessionKey): Promise<ReviewSession | undefined> {
    return this.sessions.get(key.prNumber);
  }

  async save(session: ReviewSession): Promise<void> {
    this.saves += 1;
    this.sessions.set(session.prNumber, session);
  }

  async delete(key: SessionKey): Promise<void> {
    this.sessions.delete(key.prNumber);
  }

  async archive(session: ReviewSession): Promise<string> {
    this.archived.push(session);
    this.sessions.delete(session.prNumber);
    return `archive/${session.prNumber}-review.json`;
  }

  async quarantine(): Promise<string | undefined> {
    return undefined;
  }
}

export interface RecordedRequest {
  readonly method: string;
  readonly url: string;
  readonly headers: Record<string, string>;
  readonly body: unknown;
}

export interface FakeReply {
  readonly status?: number;
  readonly body?: unknown;
  readonly headers?: Record<string, string>;
}

/**
 * A `fetch` stand-in answering from a queue of replies, in order. Requests are recorded with their
 * JSON bodies parsed.
 */
export function fakeFetch(replies: Array<FakeReply | Error>): { fetch: FetchFn; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const queue = [...replies];
  const fetch: FetchFn = async (input, init) => {
    const headers = new Headers(init.headers);
    requests.push({
      method: init.method ?? "GET",
      url: input,
      headers: Object.fromEntries(headers.entries()),
      body: typeof init.body === "string" ? JSON.parse(init.body) : undefined,
    });
    const reply = queue.shift();
    if (reply === undefined) {
      throw new Error(`Unexpected request ${init.method ?? "GET"} ${input}`);
    }
    if (reply instanceof Error) {
      throw reply;
    }
    const text = reply.body === undefined ? null : JSON.stringify(reply.body);
    return new Response(text, { status: reply.status ?? 200, headers: reply.headers });
  };
  return { fetch, requests };
}

export const noSleep = async (): Promise<void> => {};

export function captureError(action: () => unknown): unknown {
  try {
    action();
  } catch (error) {
    return error;
  }
  throw new Error("Expected the action to throw");
}

export const GITHUB_HANDLE: RemoteReviewHandle = { kind: "github", reviewId: 900, nodeId: "PRR_kw1", commitId: "abc123" };

/** Records what it is sent; comments listed in `failures` are answered with that error. */
export class ScriptedAdapter implements BackendAdapter {
  readonly sent: number[] = [];
  readonly finalized: string[] = [];
  readonly failures = new Map<number, BackendError>();
  createCalls = 0;
  onSubmit?: (localId: number) => void;
  private nextId = 1000;

  async createReview(session: ReviewSession): Promise<RemoteReviewHandle> {
    this.createCalls += 1;
    return session.remote ?? GITHUB_HANDLE;
  }

  async submitComment(_handle: RemoteReviewHandle, comment: ReviewComment): Promise<string> {
    const failure = this.failures.get(comment.localId);
    if (failure) {
      throw failure;
    }
    this.sent.push(comment.localId);
    this.onSubmit?.(comment.localId);
    this.nextId += 1;
    return String(this.nextId);
  }

  async finalizeReview(_handle: RemoteReviewHandle, body: string): Promise<FinalizedReview> {
    this.finalized.push(body);
    return { id: "900" };
  }
}
