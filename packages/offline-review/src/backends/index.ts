import type { ReviewSettings } from "../config.js";
import { HttpClient } from "../http.js";
import type { FetchFn, HttpClientOptions } from "../http.js";
import type { BackendCredential, BackendTarget } from "../types.js";
import { GITHUB_HEADERS, GitHubAdapter } from "./github.js";
import { GitLabAdapter } from "./gitlab.js";
import type { BackendAdapter } from "./types.js";

export type { BackendAdapter } from "./types.js";
export { GitHubAdapter, githubApiUrls } from "./github.js";
export { GitLabAdapter } from "./gitlab.js";

const USER_AGENT = "offline-review";

export interface AdapterRequest {
  readonly target: BackendTarget;
  readonly credential: BackendCredential;
  readonly prNumber: number;
  readonly settings: ReviewSettings;
  /** Head commit the review's line numbers were resolved against (GitHub only). */
  readonly commitId?: string;
  readonly fetch?: FetchFn;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly onRetry?: HttpClientOptions["onRetry"];
}

export function createBackendAdapter(request: AdapterRequest): BackendAdapter {
  const { target, credential, settings } = request;
  const client = new HttpClient({
    headers: {
      Authorization: `Bearer ${credential.token}`,
      "User-Agent": USER_AGENT,
      ...(target.kind === "github" ? GITHUB_HEADERS : {}),
    },
    timeoutMs: settings.requestTimeoutMs,
    retry: { maxAttempts: settings.maxAttempts, baseDelayMs: settings.retryBaseDelayMs, maxDelayMs: 30_000 },
    fetch: request.fetch,
    sleep: request.sleep,
    onRetry: request.onRetry,
  });
  switch (target.kind) {
    case "github":
      return new GitHubAdapter({ target, prNumber: request.prNumber, client, commitId: request.commitId });
    case "gitlab":
      return new GitLabAdapter({ target, mrIid: request.prNumber, client });
  }
}
