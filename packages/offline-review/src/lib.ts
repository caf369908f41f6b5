export { ReviewCommands } from "./commands.js";
export type { AddedComment, RefResolver, ReviewCommandsDeps, StartedReview } from "./commands.js";
export { createReviewCommands } from "./setup.js";
export { Publisher, publishExitCode } from "./publisher.js";
export type { PublishFailure, PublishOutcome, PublisherDeps } from "./publisher.js";
export { ReviewDraft, createSession } from "./draft.js";
export { FileSessionStore, writeFileAtomic } from "./store.js";
export type { SessionStore } from "./store.js";
export { anchorContains, formatRange, parseLineSpec, reanchor, resolveAnchor } from "./anchor.js";
export type { LineSpec } from "./anchor.js";
export { parseUnifiedDiff } from "./diff.js";
export type { DiffHunk, DiffLine, FileDiff } from "./diff.js";
export { GitDiffSource } from "./git.js";
export type { DiffSource } from "./git.js";
export { loadConfigFile, parseRemoteUrl, requireCredential, resolveConfig } from "./config.js";
export type { ResolvedConfig, ReviewConfigFile, ReviewSettings } from "./config.js";
export { GitHubAdapter, GitLabAdapter, createBackendAdapter } from "./backends/index.js";
export type { AdapterRequest, BackendAdapter } from "./backends/index.js";
export { HttpClient } from "./http.js";
export type { FetchFn, RetryPolicy } from "./http.js";
export * from "./errors.js";
export type * from "./types.js";
