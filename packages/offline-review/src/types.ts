export type BackendKind = "github" | "gitlab";

/** Which version of the file a line number refers to: `base` is the old side, `head` the new side. */
export type Side = "base" | "head";

export type DiffLineKind = "add" | "del" | "context";

export interface LineRange {
  readonly start: number;
  readonly end: number;
}

export interface AnchorLine {
  readonly kind: DiffLineKind;
  readonly oldLine?: number;
  readonly newLine?: number;
  /** Other side's line counter for an added or deleted line; see `DiffLine.pairedLine`. */
  readonly pairedLine?: number;
  readonly content: string;
}

export interface Anchor {
  /** Path the reviewer used; matches either `oldPath` or `newPath`. */
  readonly path: string;
  readonly oldPath: string;
  readonly newPath: string;
  readonly side: Side;
  readonly startLine: number;
  readonly endLine: number;
  /** Diff lines covered by the range on `side`, captured when the anchor was resolved. */
  readonly lines: AnchorLine[];
}

export type CommentFailureReason =
  | "StaleAnchor"
  | "BackendRejected"
  | "AuthError"
  | "RateLimited"
  | "TransientNetworkError";

export type CommentStatus =
  | { readonly state: "draft" }
  | { readonly state: "submitted"; readonly submittedAt: string }
  | { readonly state: "failed"; readonly reason: CommentFailureReason; readonly message: string };

export interface ReviewComment {
  readonly localId: number;
  readonly anchor: Anchor;
  readonly body: string;
  readonly backendId?: string;
  readonly status: CommentStatus;
  readonly createdAt: string;
  readonly updatedAt: string;
}

export type SessionStatus = "draft" | "publishing" | "published" | "partially-published";

export type BodyStatus = "draft" | "submitted";

export interface BackendTarget {
  readonly kind: BackendKind;
  /** Web origin of the host, e.g. `https://github.com` or `https://gitlab.example.com`. */
  readonly baseUrl: string;
  readonly owner: string;
  readonly repo: string;
}

export interface BackendCredential {
  readonly kind: BackendKind;
  readonly baseUrl: string;
  readonly token: string;
}

export type RemoteReviewHandle =
  | {
      readonly kind: "github";
      readonly reviewId: number;
      readonly nodeId: string;
      readonly commitId: string;
    }
  | {
      readonly kind: "gitlab";
      readonly baseSha: string;
      readonly startSha: string;
      readonly headSha: string;
    };

export interface SessionKey {
  readonly repoRoot: string;
  readonly prNumber: number;
}

export interface ReviewSession extends SessionKey {
  readonly schemaVersion: 1;
  readonly backend: BackendTarget;
  readonly baseRef: string;
  readonly headRef: string;
  readonly body: string;
  readonly bodyStatus: BodyStatus;
  readonly comments: ReviewComment[];
  readonly nextLocalId: number;
  readonly status: SessionStatus;
  readonly remote?: RemoteReviewHandle;
  readonly lastError?: string;
  readonly createdAt: string;
  readonly updatedAt: string;
}

export interface FinalizedReview {
  /** Backend id of the review (GitHub) or of the summary note (GitLab), when one was created. */
  readonly id?: string;
}

export interface CommandFailure {
  readonly kind: string;
  readonly message: string;
}

export type CommandResult<T> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly error: CommandFailure };
