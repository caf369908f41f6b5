import { createHash } from "node:crypto";

import { DEV_NULL } from "../diff.js";
import type { HttpClient } from "../http.js";
import { asRecord, requireNumber, requireString } from "../json.js";
import type {
  Anchor,
  AnchorLine,
  BackendTarget,
  FinalizedReview,
  RemoteReviewHandle,
  ReviewComment,
  ReviewSession,
} from "../types.js";
import { readResponse } from "./response.js";
import type { BackendAdapter } from "./types.js";

export interface GitLabAdapterOptions {
  readonly target: BackendTarget;
  readonly mrIid: number;
  readonly client: HttpClient;
}

type GitLabHandle = Extract<RemoteReviewHandle, { kind: "gitlab" }>;

interface LinePosition {
  readonly old_line?: number;
  readonly new_line?: number;
}

/**
 * GitLab has no pending review over the REST API: each comment becomes its own diff discussion,
 * positioned against the merge request's diff refs, and the body is posted as a plain note at the end.
 */
export class GitLabAdapter implements BackendAdapter {
  private readonly mergeRequestUrl: string;

  constructor(private readonly options: GitLabAdapterOptions) {
    const { baseUrl, owner, repo } = options.target;
    const project = encodeURIComponent(`${owner}/${repo}`);
    this.mergeRequestUrl = `${baseUrl.replace(/\/+$/, "")}/api/v4/projects/${project}/merge_requests/${options.mrIid}`;
  }

  async createReview(session: ReviewSession): Promise<RemoteReviewHandle> {
    if (session.remote?.kind === "gitlab") {
      return session.remote;
    }
    const mergeRequest = await this.options.client.request("GET", this.mergeRequestUrl);
    return readResponse("merge request", () => {
      const refs = asRecord(asRecord(mergeRequest, "merge request").diff_refs, "diff_refs");
      const handle: GitLabHandle = {
        kind: "gitlab",
        baseSha: requireString(refs, "base_sha"),
        startSha: requireString(refs, "start_sha"),
        headSha: requireString(refs, "head_sha"),
      };
      return handle;
    });
  }

  async submitComment(handle: RemoteReviewHandle, comment: ReviewComment): Promise<string> {
    if (handle.kind !== "gitlab") {
      throw new Error(`GitLab adapter received a ${handle.kind} review handle`);
    }
    const discussion = await this.options.client.request("POST", `${this.mergeRequestUrl}/discussions`, {
      body: comment.body,
      position: buildPosition(handle, comment.anchor),
    });
    return readResponse("discussion", () => requireString(asRecord(discussion, "discussion"), "id"));
  }

  async finalizeReview(_handle: RemoteReviewHandle, body: string): Promise<FinalizedReview> {
    if (body.trim() === "") {
      return {};
    }
    const note = await this.options.client.request("POST", `${this.mergeRequestUrl}/notes`, { body });
    return readResponse("note", () => ({ id: String(requireNumber(asRecord(note, "note"), "id")) }));
  }
}

export function buildPosition(handle: GitLabHandle, anchor: Anchor): Record<string, unknown> {
  const newPath = anchor.newPath === DEV_NULL ? anchor.oldPath : anchor.newPath;
  const oldPath = anchor.oldPath === DEV_NULL ? anchor.newPath : anchor.oldPath;
  const end = lineAt(anchor, anchor.endLine);
  const position: Record<string, unknown> = {
    position_type: "text",
    base_sha: handle.baseSha,
    start_sha: handle.startSha,
    head_sha: handle.headSha,
    old_path: oldPath,
    new_path: newPath,
    ...linePosition(anchor, end, anchor.endLine),
  };
  if (anchor.startLine !== anchor.endLine) {
    const pathHash = createHash("sha1").update(newPath).digest("hex");
    position.line_range = {
      start: rangeEndpoint(anchor, lineAt(anchor, anchor.startLine), anchor.startLine, pathHash),
      end: rangeEndpoint(anchor, end, anchor.endLine, pathHash),
    };
  }
  return position;
}

function lineAt(anchor: Anchor, line: number): AnchorLine | undefined {
  return anchor.lines.find((candidate) => (anchor.side === "head" ? candidate.newLine : candidate.oldLine) === line);
}

// Added lines only exist on the new side and deleted lines on the old side; context lines carry both.
function linePosition(anchor: Anchor, line: AnchorLine | undefined, number: number): LinePosition {
  if (!line) {
    return anchor.side === "head" ? { new_line: number } : { old_line: number };
  }
  switch (line.kind) {
    case "add":
      return { new_line: line.newLine ?? number };
    case "del":
      return { old_line: line.oldLine ?? number };
    case "context":
      return { old_line: line.oldLine ?? number, new_line: line.newLine ?? number };
  }
}

// GitLab's line_code is `<sha1 of path>_<old counter>_<new counter>`; a one-sided line takes the other
// side's running counter, which anchors saved before `pairedLine` existed lack.
function rangeEndpoint(anchor: Anchor, line: AnchorLine | undefined, number: number, pathHash: string) {
  const { old_line, new_line } = linePosition(anchor, line, number);
  const kind = line?.kind ?? "context";
  const paired = line?.pairedLine ?? number;
  return {
    line_code: `${pathHash}_${old_line ?? paired}_${new_line ?? paired}`,
    type: kind === "add" ? "new" : kind === "del" ? "old" : anchor.side === "head" ? "new" : "old",
    ...(old_line === undefined ? {} : { old_line }),
    ...(new_line === undefined ? {} : { new_line }),
  };
}
