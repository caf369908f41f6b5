import { resolveAnchor } from "./anchor.js";
import type { LineSpec } from "./anchor.js";
import { createBackendAdapter } from "./backends/index.js";
import type { AdapterRequest, BackendAdapter } from "./backends/index.js";
import { requireBackend, requireCredential } from "./config.js";
import type { ResolvedConfig } from "./config.js";
import { ReviewDraft, createSession } from "./draft.js";
import { LocalStorageError, NotFoundError, toCommandFailure } from "./errors.js";
import type { DiffSource } from "./git.js";
import { Publisher } from "./publisher.js";
import type { PublishOutcome } from "./publisher.js";
import type { SessionStore } from "./store.js";
import type { Anchor, CommandResult, ReviewComment, ReviewSession, Side } from "./types.js";

/** Git lookups the commands need besides the diff itself. */
export interface RefResolver {
  /** Base ref used when neither the caller nor the config names one. */
  defaultBase(): Promise<string>;
  /** Full commit id of `ref`; fails with `GitError` when it does not exist. */
  resolveCommit(ref: string): Promise<string>;
}

export interface ReviewCommandsDeps {
  readonly repoRoot: string;
  readonly store: SessionStore;
  readonly diffs: DiffSource;
  readonly refs: RefResolver;
  readonly loadConfig: () => Promise<ResolvedConfig>;
  readonly createAdapter?: (request: AdapterRequest) => BackendAdapter;
  readonly clock?: () => Date;
  readonly log?: (message: string) => void;
}

export interface StartedReview {
  readonly session: ReviewSession;
  /** True when a review already in progress was picked up instead of creating one. */
  readonly resumed: boolean;
  /** Where an unreadable previous session file was moved. */
  readonly quarantined?: string;
}

export interface AddedComment {
  readonly localId: number;
  readonly anchor: Anchor;
}

/**
 * The command surface editors and the CLI call. Every method loads the session, applies one change,
 * saves, and reports failures as a `{ kind, message }` result instead of throwing.
 */
export class ReviewCommands {
  private readonly clock: () => Date;

  constructor(private readonly deps: ReviewCommandsDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  startReview(prNumber: number, options: { base?: string; head?: string } = {}): Promise<CommandResult<StartedReview>> {
    return this.run(async () => {
      const key = { repoRoot: this.deps.repoRoot, prNumber };
      let quarantined: string | undefined;
      try {
        const existing = await this.deps.store.load(key);
        if (existing) {
          return { session: existing, resumed: true };
        }
      } catch (error) {
        if (!(error instanceof LocalStorageError)) {
          throw error;
        }
        quarantined = await this.deps.store.quarantine(key);
        this.deps.log?.(`${error.message}; moved it to ${quarantined ?? "nowhere (already gone)"} and starting over`);
      }

      const config = await this.deps.loadConfig();
      const backend = requireBackend(config);
      const baseRef = options.base ?? config.settings.base ?? (await this.deps.refs.defaultBase());
      const headRef = options.head ?? "HEAD";
      await this.deps.refs.resolveCommit(baseRef);
      await this.deps.refs.resolveCommit(headRef);

      const session = createSession({ ...key, backend, baseRef, headRef, now: this.clock() });
      await this.deps.store.save(session);
      return { session, resumed: false, ...(quarantined === undefined ? {} : { quarantined }) };
    });
  }

  reviewComment(
    prNumber: number,
    file: string,
    lines: LineSpec,
    text: string,
    side: Side = "head",
  ): Promise<CommandResult<AddedComment>> {
    return this.run(async () => {
      const draft = await this.open(prNumber);
      const { baseRef, headRef } = draft.session;
      const anchor = resolveAnchor(await this.deps.diffs.diff(baseRef, headRef), file, lines, side);
      const localId = draft.addComment(anchor, text);
      await this.deps.store.save(draft.session);
      return { localId, anchor };
    });
  }

  editComment(prNumber: number, localId: number, text: string): Promise<CommandResult<ReviewComment>> {
    return this.run(async () => {
      const draft = await this.open(prNumber);
      if (draft.editComment(localId, text)) {
        await this.deps.store.save(draft.session);
      }
      return draft.getComment(localId);
    });
  }

  deleteComment(prNumber: number, localId: number): Promise<CommandResult<ReviewComment>> {
    return this.run(async () => {
      const draft = await this.open(prNumber);
      const removed = draft.deleteComment(localId);
      await this.deps.store.save(draft.session);
      return removed;
    });
  }

  reviewBody(prNumber: number, text: string): Promise<CommandResult<ReviewSession>> {
    return this.run(async () => {
      const draft = await this.open(prNumber);
      if (draft.setBody(text)) {
        await this.deps.store.save(draft.session);
      }
      return draft.session;
    });
  }

  publishReview(prNumber: number, options: { signal?: AbortSignal } = {}): Promise<CommandResult<PublishOutcome>> {
    return this.run(async () => {
      const { session } = await this.open(prNumber);
      const config = await this.deps.loadConfig();
      const credential = requireCredential(config, session.backend);
      const commitId =
        session.remote?.kind === "github"
          ? session.remote.commitId
          : session.backend.kind === "github"
            ? await this.deps.refs.resolveCommit(session.headRef)
            : undefined;
      const createAdapter = this.deps.createAdapter ?? createBackendAdapter;
      const adapter = createAdapter({
        target: session.backend,
        credential,
        prNumber,
        settings: config.settings,
        commitId,
        onRetry: ({ attempt, waitMs, error }) =>
          this.deps.log?.(`${error.kind} on attempt ${attempt}, retrying in ${Math.round(waitMs / 100) / 10}s`),
      });
      const publisher = new Publisher({
        store: this.deps.store,
        diffs: this.deps.diffs,
        adapter,
        archive: config.settings.archivePublished,
        clock: this.clock,
        log: this.deps.log,
      });
      return publisher.publish(session, options);
    });
  }

  listComments(prNumber: number): Promise<CommandResult<ReviewComment[]>> {
    return this.run(async () => (await this.open(prNumber)).listComments());
  }

  showReview(prNumber: number): Promise<CommandResult<ReviewSession>> {
    return this.run(async () => (await this.open(prNumber)).session);
  }

  commentAt(prNumber: number, file: string, line: number): Promise<CommandResult<ReviewComment | null>> {
    return this.run(async () => (await this.open(prNumber)).commentAt(file, line) ?? null);
  }

  private async open(prNumber: number): Promise<ReviewDraft> {
    const session = await this.deps.store.load({ repoRoot: this.deps.repoRoot, prNumber });
    if (!session) {
      throw new NotFoundError(`No review in progress for #${prNumber}; start one first`);
    }
    return new ReviewDraft(session, this.clock);
  }

  private async run<T>(action: () => Promise<T>): Promise<CommandResult<T>> {
    try {
      return { ok: true, value: await action() };
    } catch (error) {
      return { ok: false, error: toCommandFailure(error) };
    }
  }
}
