import { reanchor } from "./anchor.js";
import type { BackendAdapter } from "./backends/types.js";
import { AnchorError, BackendError, ReviewError, exitCodeFor } from "./errors.js";
import type { BackendErrorKind } from "./errors.js";
import { ReviewDraft, unfinishedStatus } from "./draft.js";
import type { DiffSource } from "./git.js";
import type { SessionStore } from "./store.js";
import type { CommentFailureReason, RemoteReviewHandle, ReviewSession, SessionStatus } from "./types.js";

export interface PublisherDeps {
  readonly store: SessionStore;
  readonly diffs: DiffSource;
  readonly adapter: BackendAdapter;
  /** Archive the session file after a successful publish instead of deleting it. */
  readonly archive?: boolean;
  readonly clock?: () => Date;
  readonly log?: (message: string) => void;
}

export interface PublishFailure {
  readonly localId: number;
  readonly reason: CommentFailureReason;
  readonly message: string;
}

export interface PublishOutcome {
  readonly status: SessionStatus;
  /** Comments sent during this run. */
  readonly submitted: ReadonlyArray<{ readonly localId: number; readonly backendId: string }>;
  readonly failures: readonly PublishFailure[];
  readonly finalized: boolean;
  readonly reviewId?: string;
  readonly archivedTo?: string;
  readonly aborted: boolean;
  readonly session: ReviewSession;
}

const FAILURE_REASONS: Record<BackendErrorKind, CommentFailureReason> = {
  ValidationError: "BackendRejected",
  AuthError: "AuthError",
  RateLimited: "RateLimited",
  TransientNetworkError: "TransientNetworkError",
};

const inFlight = new Set<string>();

/**
 * Sends a draft review to its backend. State is saved after every step, so a run that stops part-way
 * (error, abort or crash) can be resumed and never re-sends a comment that was accepted.
 */
export class Publisher {
  private readonly clock: () => Date;
  private readonly log: (message: string) => void;

  constructor(private readonly deps: PublisherDeps) {
    this.clock = deps.clock ?? (() => new Date());
    this.log = deps.log ?? (() => {});
  }

  async publish(session: ReviewSession, options: { signal?: AbortSignal } = {}): Promise<PublishOutcome> {
    const key = `${session.repoRoot}#${session.prNumber}`;
    if (inFlight.has(key)) {
      throw new ReviewError("PublishInProgress", `A publish of #${session.prNumber} is already running`);
    }
    if (session.comments.length === 0 && session.body.trim() === "") {
      throw new ReviewError("EmptyReview", `The review of #${session.prNumber} has no comments and no body`);
    }
    inFlight.add(key);
    try {
      return await this.run(new ReviewDraft(session, this.clock), options.signal);
    } finally {
      inFlight.delete(key);
    }
  }

  private async run(draft: ReviewDraft, signal: AbortSignal | undefined): Promise<PublishOutcome> {
    const { store, adapter } = this.deps;
    if (draft.session.bodyStatus === "submitted") {
      // Finalized on an earlier run that failed to clear the local file.
      this.log(`Review of #${draft.session.prNumber} was already published; clearing the local copy`);
      const archivedTo = await this.finish(draft.session);
      return { status: "published", submitted: [], failures: [], finalized: true, archivedTo, aborted: false, session: draft.session };
    }
    const { baseRef, headRef } = draft.session;
    const diff = await this.deps.diffs.diff(baseRef, headRef);
    const failures: PublishFailure[] = [];
    const submitted: Array<{ localId: number; backendId: string }> = [];

    for (const comment of draft.listComments()) {
      if (comment.status.state === "submitted") {
        continue;
      }
      try {
        draft.recordStatus(comment.localId, { state: "draft" }, { anchor: reanchor(diff, comment.anchor) });
      } catch (error) {
        if (!(error instanceof AnchorError)) {
          throw error;
        }
        this.log(`Comment ${comment.localId}: ${error.message}`);
        draft.recordStatus(comment.localId, { state: "failed", reason: "StaleAnchor", message: error.message });
        failures.push({ localId: comment.localId, reason: "StaleAnchor", message: error.message });
      }
    }

    const ready = draft.listComments().filter((comment) => comment.status.state === "draft");
    if (ready.length === 0 && failures.length > 0) {
      draft.update({ status: unfinishedStatus(draft.session) });
      await store.save(draft.session);
      return { status: draft.session.status, submitted, failures, finalized: false, aborted: false, session: draft.session };
    }

    draft.update({ status: "publishing", lastError: undefined });
    await store.save(draft.session);

    let handle: RemoteReviewHandle;
    try {
      handle = await adapter.createReview(draft.session);
    } catch (error) {
      await this.halt(draft, error);
      throw error;
    }
    draft.update({ remote: handle });
    await store.save(draft.session);

    let aborted = false;
    for (const [index, comment] of ready.entries()) {
      if (signal?.aborted) {
        aborted = true;
        this.log(`Stopped before comment ${comment.localId}; ${ready.length - index} left unsent`);
        break;
      }
      try {
        const backendId = await adapter.submitComment(handle, comment);
        draft.recordStatus(comment.localId, { state: "submitted", submittedAt: this.clock().toISOString() }, { backendId });
        submitted.push({ localId: comment.localId, backendId });
        this.log(`Comment ${comment.localId} published as ${backendId}`);
      } catch (error) {
        if (!(error instanceof BackendError)) {
          await this.halt(draft, error);
          throw error;
        }
        const reason = FAILURE_REASONS[error.kind];
        draft.recordStatus(comment.localId, { state: "failed", reason, message: error.message });
        failures.push({ localId: comment.localId, reason, message: error.message });
        this.log(`Comment ${comment.localId} failed (${error.kind}): ${error.message}`);
        if (error.kind !== "ValidationError") {
          draft.update({ lastError: `${error.kind}: ${error.message}` });
          await store.save(draft.session);
          break;
        }
      }
      await store.save(draft.session);
    }

    const complete = draft.session.comments.every((comment) => comment.status.state === "submitted");
    if (!complete || aborted) {
      draft.update({ status: unfinishedStatus(draft.session) });
      await store.save(draft.session);
      return { status: draft.session.status, submitted, failures, finalized: false, aborted, session: draft.session };
    }

    let reviewId: string | undefined;
    try {
      ({ id: reviewId } = await adapter.finalizeReview(handle, draft.session.body));
    } catch (error) {
      await this.halt(draft, error);
      throw error;
    }
    draft.update({ status: "published", bodyStatus: "submitted", lastError: undefined });
    await store.save(draft.session);
    this.log(reviewId ? `Review published (${reviewId})` : "Review published");

    const archivedTo = await this.finish(draft.session);
    return { status: "published", submitted, failures, finalized: true, reviewId, archivedTo, aborted, session: draft.session };
  }

  private async finish(session: ReviewSession): Promise<string | undefined> {
    if (this.deps.archive ?? true) {
      return this.deps.store.archive(session);
    }
    await this.deps.store.delete(session);
    return undefined;
  }

  /** Saves what was done so far before an error leaves the run. */
  private async halt(draft: ReviewDraft, error: unknown): Promise<void> {
    const message = error instanceof ReviewError ? `${error.kind}: ${error.message}` : String(error);
    draft.update({ status: unfinishedStatus(draft.session), lastError: message });
    await this.deps.store.save(draft.session);
  }
}

/** 0 once finalized; otherwise 3 when credentials were refused and 2 for anything a re-run may finish. */
export function publishExitCode(outcome: Pick<PublishOutcome, "finalized" | "failures">): number {
  if (outcome.finalized) {
    return 0;
  }
  return outcome.failures.some((failure) => exitCodeFor(failure.reason) === 3) ? 3 : 2;
}
