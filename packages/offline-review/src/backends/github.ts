import { displayPath } from "../diff.js";
import { BackendError } from "../errors.js";
import type { HttpClient } from "../http.js";
import { asRecord, requireArray, requireNumber, requireString } from "../json.js";
import type { BackendTarget, FinalizedReview, RemoteReviewHandle, ReviewComment, ReviewSession } from "../types.js";
import { readResponse } from "./response.js";
import type { BackendAdapter } from "./types.js";

export const GITHUB_HEADERS = {
  Accept: "application/vnd.github+json",
  "X-GitHub-Api-Version": "2022-11-28",
};

const ADD_THREAD_MUTATION = `
  mutation($input: AddPullRequestReviewThreadInput!) {
    addPullRequestReviewThread(input: $input) {
      thread {
        id
        comments(first: 1) {
          nodes {
            id
            databaseId
          }
        }
      }
    }
  }
`;

export interface GitHubAdapterOptions {
  readonly target: BackendTarget;
  readonly prNumber: number;
  readonly client: HttpClient;
  /** Commit the line numbers refer to; GitHub uses the pull request's head when omitted. */
  readonly commitId?: string;
}

type GitHubHandle = Extract<RemoteReviewHandle, { kind: "github" }>;

/**
 * GitHub keeps a pending review server-side: comments are added to it one thread at a time through
 * GraphQL and stay invisible to others until the review is submitted over REST.
 */
export class GitHubAdapter implements BackendAdapter {
  private readonly restBase: string;
  private readonly graphqlUrl: string;

  constructor(private readonly options: GitHubAdapterOptions) {
    const urls = githubApiUrls(options.target.baseUrl);
    this.restBase = urls.rest;
    this.graphqlUrl = urls.graphql;
  }

  async createReview(session: ReviewSession): Promise<RemoteReviewHandle> {
    if (session.remote?.kind === "github") {
      return session.remote;
    }
    const payload = this.options.commitId ? { commit_id: this.options.commitId } : {};
    try {
      const created = await this.options.client.request("POST", this.reviewsUrl(), payload);
      return parseReview(created, "created review");
    } catch (error) {
      // Only one pending review per user and pull request; a leftover one is adopted rather than duplicated.
      if (error instanceof BackendError && error.kind === "ValidationError") {
        const pending = await this.findPendingReview();
        if (pending) {
          return pending;
        }
      }
      throw error;
    }
  }

  async submitComment(handle: RemoteReviewHandle, comment: ReviewComment): Promise<string> {
    const review = requireGitHubHandle(handle);
    const { anchor } = comment;
    const side = anchor.side === "head" ? "RIGHT" : "LEFT";
    const input: Record<string, unknown> = {
      pullRequestReviewId: review.nodeId,
      path: displayPath(anchor),
      body: comment.body,
      line: anchor.endLine,
      side,
    };
    if (anchor.startLine !== anchor.endLine) {
      input.startLine = anchor.startLine;
      input.startSide = side;
    }
    const data = await this.graphql({ query: ADD_THREAD_MUTATION, variables: { input } });
    return readResponse("addPullRequestReviewThread", () => {
      const result = asRecord(asRecord(data, "data").addPullRequestReviewThread, "addPullRequestReviewThread");
      if (result.thread === null) {
        throw new BackendError("ValidationError", `GitHub did not create a thread for ${anchor.path}:${anchor.endLine}`);
      }
      const thread = asRecord(result.thread, "thread");
      const [first] = requireArray(asRecord(thread.comments, "comments"), "nodes");
      return String(requireNumber(asRecord(first, "comment"), "databaseId"));
    });
  }

  async finalizeReview(handle: RemoteReviewHandle, body: string): Promise<FinalizedReview> {
    const review = requireGitHubHandle(handle);
    const submitted = await this.options.client.request("POST", `${this.reviewsUrl()}/${review.reviewId}/events`, {
      event: "COMMENT",
      body,
    });
    return readResponse("submitted review", () => ({ id: String(requireNumber(asRecord(submitted, "review"), "id")) }));
  }

  private async findPendingReview(): Promise<GitHubHandle | undefined> {
    const reviews = await this.options.client.request("GET", `${this.reviewsUrl()}?per_page=100`);
    if (!Array.isArray(reviews)) {
      return undefined;
    }
    const pending = reviews.find((review: unknown) => readResponse("review list", () => asRecord(review, "review").state === "PENDING"));
    return pending === undefined ? undefined : parseReview(pending, "pending review");
  }

  private async graphql(payload: { query: string; variables: Record<string, unknown> }): Promise<unknown> {
    const response = await this.options.client.request("POST", this.graphqlUrl, payload, checkGraphqlErrors);
    return readResponse("GraphQL", () => asRecord(response, "GraphQL response").data);
  }

  private reviewsUrl(): string {
    const { owner, repo } = this.options.target;
    return `${this.restBase}/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}/pulls/${this.options.prNumber}/reviews`;
  }
}

export function githubApiUrls(baseUrl: string): { rest: string; graphql: string } {
  const origin = baseUrl.replace(/\/+$/, "");
  if (/^https?:\/\/(www\.)?github\.com$/i.test(origin)) {
    return { rest: "https://api.github.com", graphql: "https://api.github.com/graphql" };
  }
  // GitHub Enterprise Server
  return { rest: `${origin}/api/v3`, graphql: `${origin}/api/graphql` };
}

/** GraphQL reports failures in a 200 response; these map onto the same error kinds as REST statuses. */
export function checkGraphqlErrors(response: unknown): void {
  if (!response || typeof response !== "object" || !("errors" in response) || !Array.isArray(response.errors)) {
    return;
  }
  const errors: unknown[] = response.errors;
  if (errors.length === 0) {
    return;
  }
  const details = errors.map((error) => {
    const record = error && typeof error === "object" ? Object.fromEntries(Object.entries(error)) : {};
    return {
      type: typeof record.type === "string" ? record.type : undefined,
      message: typeof record.message === "string" ? record.message : String(error),
    };
  });
  const message = `GitHub GraphQL error: ${details.map((detail) => detail.message).join(", ")}`;
  if (details.some((detail) => detail.type === "RATE_LIMITED")) {
    throw new BackendError("RateLimited", message);
  }
  if (details.some((detail) => detail.type === "FORBIDDEN")) {
    throw new BackendError("AuthError", message);
  }
  throw new BackendError("ValidationError", message);
}

function parseReview(value: unknown, label: string): GitHubHandle {
  return readResponse(label, () => {
    const record = asRecord(value, label);
    return {
      kind: "github",
      reviewId: requireNumber(record, "id"),
      nodeId: requireString(record, "node_id"),
      commitId: requireString(record, "commit_id"),
    };
  });
}

function requireGitHubHandle(handle: RemoteReviewHandle): GitHubHandle {
  if (handle.kind !== "github") {
    throw new Error(`GitHub adapter received a ${handle.kind} review handle`);
  }
  return handle;
}
