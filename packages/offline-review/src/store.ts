import { randomBytes } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";

import { unfinishedStatus } from "./draft.js";
import { LocalStorageError, isErrnoException } from "./errors.js";
import { asRecord, requireArray, requireNumber, requireOneOf, requireString } from "./json.js";
import { ensureDir, getArchiveDir, getSessionFileName } from "./paths.js";
import type {
  Anchor,
  AnchorLine,
  BackendTarget,
  CommentStatus,
  RemoteReviewHandle,
  ReviewComment,
  ReviewSession,
  SessionKey,
} from "./types.js";

export interface SessionStore {
  /** Returns undefined when no review is in progress for the key. */
  load(key: SessionKey): Promise<ReviewSession | undefined>;
  save(session: ReviewSession): Promise<void>;
  delete(key: SessionKey): Promise<void>;
  /** Moves a finished session out of active storage and returns where it went. */
  archive(session: ReviewSession): Promise<string>;
  /** Moves an unreadable session file aside and returns its new location. */
  quarantine(key: SessionKey): Promise<string | undefined>;
}

/** One JSON file per pull/merge request under a directory chosen per repository. */
export class FileSessionStore implements SessionStore {
  constructor(private readonly locateDir: (repoRoot: string) => Promise<string>) {}

  async load(key: SessionKey): Promise<ReviewSession | undefined> {
    const file = await this.fileFor(key);
    let raw: string;
    try {
      raw = await fs.readFile(file, "utf8");
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return undefined;
      }
      throw new LocalStorageError(file, `Unable to read ${file}: ${describe(error)}`, error);
    }
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new LocalStorageError(file, `Review file ${file} is not valid JSON: ${describe(error)}`, error);
    }
    try {
      return parseSession(data, key);
    } catch (error) {
      throw new LocalStorageError(file, `Review file ${file} is corrupt: ${describe(error)}`, error);
    }
  }

  async save(session: ReviewSession): Promise<void> {
    const file = await this.fileFor(session);
    await writeFileAtomic(file, `${JSON.stringify(session, null, 2)}\n`);
  }

  async delete(key: SessionKey): Promise<void> {
    const file = await this.fileFor(key);
    await fs.rm(file, { force: true });
  }

  async archive(session: ReviewSession): Promise<string> {
    const dir = await this.locateDir(session.repoRoot);
    const archiveDir = getArchiveDir(dir);
    await ensureDir(archiveDir);
    const destination = path.join(archiveDir, `${session.prNumber}-review-${fileTimestamp(session.updatedAt)}.json`);
    await writeFileAtomic(destination, `${JSON.stringify(session, null, 2)}\n`);
    await this.delete(session);
    return destination;
  }

  async quarantine(key: SessionKey): Promise<string | undefined> {
    const file = await this.fileFor(key);
    const destination = `${file}.corrupt-${fileTimestamp(new Date().toISOString())}`;
    try {
      await fs.rename(file, destination);
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return undefined;
      }
      throw error;
    }
    return destination;
  }

  private async fileFor(key: SessionKey): Promise<string> {
    const dir = await this.locateDir(key.repoRoot);
    return path.join(dir, getSessionFileName(key.prNumber));
  }
}

/** Writes to a temporary file beside `file`, flushes it, then renames it over `file`. */
export async function writeFileAtomic(file: string, contents: string): Promise<void> {
  const dir = path.dirname(file);
  await ensureDir(dir);
  const temp = path.join(dir, `.${path.basename(file)}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`);
  const handle = await fs.open(temp, "w");
  try {
    await handle.writeFile(contents, "utf8");
    await handle.sync();
  } finally {
    await handle.close();
  }
  try {
    await fs.rename(temp, file);
  } catch (error) {
    await fs.rm(temp, { force: true });
    throw error;
  }
}

function fileTimestamp(iso: string): string {
  return iso.replace(/[-:]/g, "").replace(/\.\d+Z$/, "Z");
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function parseSession(data: unknown, key: SessionKey): ReviewSession {
  const record = asRecord(data, "session");
  if (record.schemaVersion !== 1) {
    throw new Error(`unsupported schemaVersion ${String(record.schemaVersion)}`);
  }
  const prNumber = requireNumber(record, "prNumber");
  if (prNumber !== key.prNumber) {
    throw new Error(`file belongs to #${prNumber}, expected #${key.prNumber}`);
  }
  const status = requireOneOf(record, "status", ["draft", "publishing", "published", "partially-published"] as const);
  const comments = requireArray(record, "comments").map(parseComment);
  const nextLocalId = requireNumber(record, "nextLocalId");
  if (comments.some((comment) => comment.localId >= nextLocalId)) {
    throw new Error("a comment id is not below nextLocalId");
  }
  return {
    schemaVersion: 1,
    repoRoot: key.repoRoot,
    prNumber,
    backend: parseBackend(record.backend),
    baseRef: requireString(record, "baseRef"),
    headRef: requireString(record, "headRef"),
    body: requireString(record, "body"),
    bodyStatus: requireOneOf(record, "bodyStatus", ["draft", "submitted"] as const),
    comments,
    nextLocalId,
    // A crash mid-publish leaves "publishing" behind; what was sent is already recorded per comment.
    status: status === "publishing" ? unfinishedStatus({ comments }) : status,
    ...(record.remote === undefined ? {} : { remote: parseRemote(record.remote) }),
    ...(record.lastError === undefined ? {} : { lastError: requireString(record, "lastError") }),
    createdAt: requireString(record, "createdAt"),
    updatedAt: requireString(record, "updatedAt"),
  };
}

function parseBackend(value: unknown): BackendTarget {
  const record = asRecord(value, "backend");
  return {
    kind: requireOneOf(record, "kind", ["github", "gitlab"] as const),
    baseUrl: requireString(record, "baseUrl"),
    owner: requireString(record, "owner"),
    repo: requireString(record, "repo"),
  };
}

function parseRemote(value: unknown): RemoteReviewHandle {
  const record = asRecord(value, "remote");
  const kind = requireOneOf(record, "kind", ["github", "gitlab"] as const);
  if (kind === "github") {
    return {
      kind,
      reviewId: requireNumber(record, "reviewId"),
      nodeId: requireString(record, "nodeId"),
      commitId: requireString(record, "commitId"),
    };
  }
  return {
    kind,
    baseSha: requireString(record, "baseSha"),
    startSha: requireString(record, "startSha"),
    headSha: requireString(record, "headSha"),
  };
}

function parseComment(value: unknown): ReviewComment {
  const record = asRecord(value, "comment");
  const backendId = record.backendId;
  return {
    localId: requireNumber(record, "localId"),
    anchor: parseAnchor(record.anchor),
    body: requireString(record, "body"),
    ...(backendId === undefined ? {} : { backendId: requireString(record, "backendId") }),
    status: parseStatus(record.status),
    createdAt: requireString(record, "createdAt"),
    updatedAt: requireString(record, "updatedAt"),
  };
}

function parseStatus(value: unknown): CommentStatus {
  const record = asRecord(value, "status");
  const state = requireOneOf(record, "state", ["draft", "submitted", "failed"] as const);
  switch (state) {
    case "draft":
      return { state };
    case "submitted":
      return { state, submittedAt: requireString(record, "submittedAt") };
    case "failed":
      return {
        state,
        reason: requireOneOf(record, "reason", [
          "StaleAnchor",
          "BackendRejected",
          "AuthError",
          "RateLimited",
          "TransientNetworkError",
        ] as const),
        message: requireString(record, "message"),
      };
  }
}

function parseAnchor(value: unknown): Anchor {
  const record = asRecord(value, "anchor");
  const startLine = requireNumber(record, "startLine");
  const endLine = requireNumber(record, "endLine");
  if (endLine < startLine) {
    throw new Error(`anchor ends (${endLine}) before it starts (${startLine})`);
  }
  return {
    path: requireString(record, "path"),
    oldPath: requireString(record, "oldPath"),
    newPath: requireString(record, "newPath"),
    side: requireOneOf(record, "side", ["base", "head"] as const),
    startLine,
    endLine,
    lines: requireArray(record, "lines").map(parseAnchorLine),
  };
}

function parseAnchorLine(value: unknown): AnchorLine {
  const record = asRecord(value, "anchor line");
  const line: AnchorLine = {
    kind: requireOneOf(record, "kind", ["add", "del", "context"] as const),
    content: requireString(record, "content"),
  };
  return {
    ...line,
    ...(record.oldLine === undefined ? {} : { oldLine: requireNumber(record, "oldLine") }),
    ...(record.newLine === undefined ? {} : { newLine: requireNumber(record, "newLine") }),
    ...(record.pairedLine === undefined ? {} : { pairedLine: requireNumber(record, "pairedLine") }),
  };
}
