import { anchorContains } from "./anchor.js";
import { NotFoundError, ReviewError } from "./errors.js";
import type {
  Anchor,
  BackendTarget,
  CommentStatus,
  ReviewComment,
  ReviewSession,
  SessionKey,
  SessionStatus,
} from "./types.js";

export interface NewSessionOptions extends SessionKey {
  readonly backend: BackendTarget;
  readonly baseRef: string;
  readonly headRef: string;
  readonly now?: Date;
}

export function createSession(options: NewSessionOptions): ReviewSession {
  const timestamp = (options.now ?? new Date()).toISOString();
  return {
    schemaVersion: 1,
    repoRoot: options.repoRoot,
    prNumber: options.prNumber,
    backend: options.backend,
    baseRef: options.baseRef,
    headRef: options.headRef,
    body: "",
    bodyStatus: "draft",
    comments: [],
    nextLocalId: 1,
    status: "draft",
    createdAt: timestamp,
    updatedAt: timestamp,
  };
}

/** Status of a session whose publish stopped before finalizing. */
export function unfinishedStatus(session: Pick<ReviewSession, "comments">): SessionStatus {
  return session.comments.some((comment) => comment.status.state === "submitted") ? "partially-published" : "draft";
}

/**
 * Mutable view over a review session. Every mutator replaces the session snapshot, so callers persist
 * `draft.session` after each call.
 */
export class ReviewDraft {
  private current: ReviewSession;
  private readonly clock: () => Date;

  constructor(session: ReviewSession, clock: () => Date = () => new Date()) {
    this.current = session;
    this.clock = clock;
  }

  get session(): ReviewSession {
    return this.current;
  }

  addComment(anchor: Anchor, body: string): number {
    const localId = this.current.nextLocalId;
    const timestamp = this.now();
    const comment: ReviewComment = {
      localId,
      anchor,
      body,
      status: { state: "draft" },
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.replace({ comments: [...this.current.comments, comment], nextLocalId: localId + 1 });
    return localId;
  }

  /** Returns false when the comment already had this body and nothing changed. */
  editComment(localId: number, body: string): boolean {
    const existing = this.mutable(localId);
    if (existing.body === body && existing.status.state === "draft") {
      return false;
    }
    this.updateComment(localId, { body, status: { state: "draft" } });
    return true;
  }

  deleteComment(localId: number): ReviewComment {
    const existing = this.mutable(localId);
    this.replace({ comments: this.current.comments.filter((comment) => comment.localId !== localId) });
    return existing;
  }

  setBody(body: string): boolean {
    if (this.current.body === body) {
      return false;
    }
    this.replace({ body, bodyStatus: "draft" });
    return true;
  }

  listComments(): ReviewComment[] {
    return [...this.current.comments];
  }

  getComment(localId: number): ReviewComment {
    const comment = this.current.comments.find((candidate) => candidate.localId === localId);
    if (!comment) {
      throw new NotFoundError(`No comment with id ${localId} in the review of #${this.current.prNumber}`);
    }
    return comment;
  }

  /** First comment, in insertion order, whose range covers `line` of `path`. */
  commentAt(path: string, line: number): ReviewComment | undefined {
    return this.current.comments.find((comment) => anchorContains(comment.anchor, path, line));
  }

  /** Records the outcome of publishing one comment. Used by the publisher, not by editing commands. */
  recordStatus(localId: number, status: CommentStatus, changes: { anchor?: Anchor; backendId?: string } = {}): void {
    this.getComment(localId);
    this.updateComment(localId, { status, ...changes });
  }

  update(changes: Partial<Omit<ReviewSession, "schemaVersion" | "repoRoot" | "prNumber" | "comments">>): void {
    this.replace(changes);
  }

  private mutable(localId: number): ReviewComment {
    const comment = this.getComment(localId);
    if (comment.status.state === "submitted") {
      throw new ReviewError(
        "CommentAlreadySubmitted",
        `Comment ${localId} was already published (backend id ${comment.backendId ?? "unknown"}); change it on the backend instead`,
      );
    }
    return comment;
  }

  private updateComment(localId: number, changes: Partial<Omit<ReviewComment, "localId" | "createdAt">>): void {
    const updatedAt = this.now();
    this.replace({
      comments: this.current.comments.map((comment) =>
        comment.localId === localId ? { ...comment, ...changes, updatedAt } : comment,
      ),
    });
  }

  private replace(changes: Partial<ReviewSession>): void {
    this.current = { ...this.current, ...changes, updatedAt: this.now() };
  }

  private now(): string {
    return this.clock().toISOString();
  }
}
