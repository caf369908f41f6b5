import type { FinalizedReview, RemoteReviewHandle, ReviewComment, ReviewSession } from "../types.js";

/**
 * What every backend offers the publisher. Implementations throw `BackendError` for failed calls; the
 * HTTP layer has already retried the retryable ones by the time an error reaches the caller.
 */
export interface BackendAdapter {
  /** Opens the remote review, or returns `session.remote` when a previous run already opened it. */
  createReview(session: ReviewSession): Promise<RemoteReviewHandle>;
  /** Posts one line comment and returns the backend's id for it. */
  submitComment(handle: RemoteReviewHandle, comment: ReviewComment): Promise<string>;
  /** Publishes the review body with every submitted comment, as a plain "comment" review. */
  finalizeReview(handle: RemoteReviewHandle, body: string): Promise<FinalizedReview>;
}
