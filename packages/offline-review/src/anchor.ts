import { AnchorError, ReviewError } from "./errors.js";
import { DEV_NULL } from "./diff.js";
import type { DiffHunk, DiffLine, FileDiff } from "./diff.js";
import type { Anchor, AnchorLine, LineRange, Side } from "./types.js";

export type LineSpec = number | LineRange;

export function parseLineSpec(raw: string): LineRange {
  const match = raw.trim().match(/^(\d+)(?:\s*[-,:]\s*(\d+))?$/);
  if (!match) {
    throw new ReviewError("InvalidLineSpec", `Expected a line number or range such as 10 or 8-15, got "${raw}"`);
  }
  const start = Number(match[1]);
  const end = match[2] === undefined ? start : Number(match[2]);
  return toRange({ start, end });
}

export function toRange(lines: LineSpec): LineRange {
  const range = typeof lines === "number" ? { start: lines, end: lines } : lines;
  if (!Number.isInteger(range.start) || !Number.isInteger(range.end) || range.start < 1) {
    throw new ReviewError("InvalidLineSpec", `Line numbers must be positive integers (got ${range.start}-${range.end})`);
  }
  if (range.end < range.start) {
    throw new ReviewError("InvalidLineSpec", `Range end ${range.end} is before its start ${range.start}`);
  }
  return range;
}

/**
 * Resolves a line or inclusive range on one side of the diff to an anchor. The result depends only on
 * the arguments, so resolving again against an unchanged diff yields an equal anchor.
 */
export function resolveAnchor(diff: readonly FileDiff[], filePath: string, target: LineSpec, side: Side = "head"): Anchor {
  const range = toRange(target);
  const path = normalizePath(filePath);
  const file = findFile(diff, path, side);
  if (!file) {
    throw new AnchorError("FileNotInDiff", `${path} is not changed between the review's base and head`);
  }
  if (side === "head" && file.newPath === DEV_NULL) {
    throw new AnchorError("FileNotInDiff", `${path} is deleted on the head side; comment on the base side instead`);
  }
  if (side === "base" && file.oldPath === DEV_NULL) {
    throw new AnchorError("FileNotInDiff", `${path} is added on the head side; it has no base side`);
  }
  if (file.hunks.length === 0) {
    throw new AnchorError("LineOutsideHunk", `${path} has no textual hunks (binary or mode-only change)`);
  }

  const touched = file.hunks
    .map((hunk) => ({ hunk, span: hunkSpan(hunk, side) }))
    .filter(({ span }) => span.end >= span.start && span.start <= range.end && span.end >= range.start);

  const label = formatRange(range);
  if (touched.length === 0) {
    throw new AnchorError("LineOutsideHunk", `${path}:${label} (${side}) is outside every hunk of the diff`);
  }
  const [first] = touched;
  if (touched.length > 1 || !first || first.span.start > range.start || first.span.end < range.end) {
    throw new AnchorError(
      "AmbiguousRange",
      `${path}:${label} (${side}) crosses a hunk boundary; split it into one comment per hunk`,
    );
  }

  const lines = first.hunk.lines
    .filter((line) => {
      const number = lineNumberOn(line, side);
      return number !== undefined && number >= range.start && number <= range.end;
    })
    .map(toAnchorLine);

  return {
    path,
    oldPath: file.oldPath,
    newPath: file.newPath,
    side,
    startLine: range.start,
    endLine: range.end,
    lines,
  };
}

/**
 * Resolves a stored anchor against a newer diff. Throws `StaleAnchor` when the lines no longer resolve or
 * no longer hold what they held when the comment was written.
 */
export function reanchor(diff: readonly FileDiff[], anchor: Anchor): Anchor {
  let fresh: Anchor;
  try {
    fresh = resolveAnchor(diff, anchor.path, { start: anchor.startLine, end: anchor.endLine }, anchor.side);
  } catch (error) {
    if (error instanceof AnchorError) {
      throw new AnchorError("StaleAnchor", `Anchor no longer resolves: ${error.message}`, error.kind);
    }
    throw error;
  }
  if (!sameSnapshot(anchor.lines, fresh.lines)) {
    throw new AnchorError(
      "StaleAnchor",
      `${anchor.path}:${formatRange({ start: anchor.startLine, end: anchor.endLine })} (${anchor.side}) changed since the comment was written`,
    );
  }
  return fresh;
}

export function anchorContains(anchor: Anchor, path: string, line: number): boolean {
  const normalized = normalizePath(path);
  const matchesPath = anchor.path === normalized || anchor.newPath === normalized || anchor.oldPath === normalized;
  return matchesPath && line >= anchor.startLine && line <= anchor.endLine;
}

export function formatRange(range: LineRange): string {
  return range.start === range.end ? `${range.start}` : `${range.start}-${range.end}`;
}

export function normalizePath(filePath: string): string {
  return filePath.replace(/\\/g, "/").replace(/^\.\//, "");
}

function findFile(diff: readonly FileDiff[], path: string, side: Side): FileDiff | undefined {
  const preferred = diff.find((file) => (side === "head" ? file.newPath : file.oldPath) === path);
  return preferred ?? diff.find((file) => file.newPath === path || file.oldPath === path);
}

function hunkSpan(hunk: DiffHunk, side: Side): LineRange {
  return side === "head"
    ? { start: hunk.newStart, end: hunk.newStart + hunk.newLines - 1 }
    : { start: hunk.oldStart, end: hunk.oldStart + hunk.oldLines - 1 };
}

function lineNumberOn(line: DiffLine, side: Side): number | undefined {
  return side === "head" ? line.newLine : line.oldLine;
}

function toAnchorLine(line: DiffLine): AnchorLine {
  const anchorLine: AnchorLine = { kind: line.kind, content: line.content };
  return {
    ...anchorLine,
    ...(line.oldLine === undefined ? {} : { oldLine: line.oldLine }),
    ...(line.newLine === undefined ? {} : { newLine: line.newLine }),
    ...(line.pairedLine === undefined ? {} : { pairedLine: line.pairedLine }),
  };
}

function sameSnapshot(previous: readonly AnchorLine[], next: readonly AnchorLine[]): boolean {
  if (previous.length !== next.length) {
    return false;
  }
  return previous.every((line, index) => {
    const other = next[index];
    return other !== undefined && other.kind === line.kind && other.content === line.content;
  });
}
