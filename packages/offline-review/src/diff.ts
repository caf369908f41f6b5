import type { DiffLineKind } from "./types.js";

export interface DiffLine {
  readonly kind: DiffLineKind;
  readonly oldLine?: number;
  readonly newLine?: number;
  /** For an added or deleted line, the other side's line counter at that point of the hunk. */
  readonly pairedLine?: number;
  readonly content: string;
}

export interface DiffHunk {
  readonly oldStart: number;
  readonly oldLines: number;
  readonly newStart: number;
  readonly newLines: number;
  readonly lines: DiffLine[];
}

export type FileChange = "added" | "deleted" | "modified" | "renamed";

export interface FileDiff {
  /** Path before the change, or `/dev/null` for an added file. */
  readonly oldPath: string;
  /** Path after the change, or `/dev/null` for a deleted file. */
  readonly newPath: string;
  readonly change: FileChange;
  readonly binary: boolean;
  readonly hunks: DiffHunk[];
}

export const DEV_NULL = "/dev/null";

const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;

interface MutableFile {
  oldPath: string;
  newPath: string;
  change: FileChange;
  binary: boolean;
  hunks: DiffHunk[];
}

interface HunkCursor {
  oldLine: number;
  newLine: number;
  oldRemaining: number;
  newRemaining: number;
  lines: DiffLine[];
}

/**
 * Parses `git diff` output. Only the subset git emits with `--no-color --no-ext-diff` is understood;
 * combined (merge) diffs are not.
 */
export function parseUnifiedDiff(text: string): FileDiff[] {
  const files: FileDiff[] = [];
  let file: MutableFile | undefined;
  let hunk: HunkCursor | undefined;

  const flush = () => {
    if (file) {
      files.push({ ...file });
    }
    file = undefined;
    hunk = undefined;
  };

  const lines = text.split("\n");
  if (lines.at(-1) === "") {
    lines.pop();
  }

  for (const raw of lines) {
    const line = raw.endsWith("\r") ? raw.slice(0, -1) : raw;

    if (hunk && (hunk.oldRemaining > 0 || hunk.newRemaining > 0)) {
      if (consumeHunkLine(hunk, line)) {
        continue;
      }
    }

    if (line.startsWith("diff --git ")) {
      flush();
      const paths = parseGitHeaderPaths(line.slice("diff --git ".length));
      file = { oldPath: paths.oldPath, newPath: paths.newPath, change: "modified", binary: false, hunks: [] };
      continue;
    }
    if (!file) {
      continue;
    }
    if (line.startsWith("\\")) {
      // "\ No newline at end of file"
      continue;
    }
    if (line.startsWith("new file mode")) {
      file.change = "added";
      file.oldPath = DEV_NULL;
    } else if (line.startsWith("deleted file mode")) {
      file.change = "deleted";
      file.newPath = DEV_NULL;
    } else if (line.startsWith("rename from ")) {
      file.change = "renamed";
      file.oldPath = unquote(line.slice("rename from ".length));
    } else if (line.startsWith("rename to ")) {
      file.change = "renamed";
      file.newPath = unquote(line.slice("rename to ".length));
    } else if (line.startsWith("--- ")) {
      file.oldPath = stripPrefix(line.slice(4), "a/");
    } else if (line.startsWith("+++ ")) {
      file.newPath = stripPrefix(line.slice(4), "b/");
    } else if (line.startsWith("Binary files ") || line === "GIT binary patch") {
      file.binary = true;
    } else {
      const match = line.match(HUNK_HEADER);
      if (match) {
        const oldStart = Number(match[1]);
        const oldLines = match[2] === undefined ? 1 : Number(match[2]);
        const newStart = Number(match[3]);
        const newLines = match[4] === undefined ? 1 : Number(match[4]);
        hunk = { oldLine: oldStart, newLine: newStart, oldRemaining: oldLines, newRemaining: newLines, lines: [] };
        file.hunks.push({ oldStart, oldLines, newStart, newLines, lines: hunk.lines });
      }
    }
  }
  flush();
  return files;
}

function consumeHunkLine(hunk: HunkCursor, line: string): boolean {
  const marker = line.charAt(0);
  const content = line.slice(1);
  if (marker === "+") {
    hunk.lines.push({ kind: "add", newLine: hunk.newLine, pairedLine: hunk.oldLine, content });
    hunk.newLine += 1;
    hunk.newRemaining -= 1;
    return true;
  }
  if (marker === "-") {
    hunk.lines.push({ kind: "del", oldLine: hunk.oldLine, pairedLine: hunk.newLine, content });
    hunk.oldLine += 1;
    hunk.oldRemaining -= 1;
    return true;
  }
  // git writes an empty context line as a single space, but some tools trim it away.
  if (marker === " " || line === "") {
    hunk.lines.push({ kind: "context", oldLine: hunk.oldLine, newLine: hunk.newLine, content });
    hunk.oldLine += 1;
    hunk.newLine += 1;
    hunk.oldRemaining -= 1;
    hunk.newRemaining -= 1;
    return true;
  }
  return marker === "\\";
}

function parseGitHeaderPaths(rest: string): { oldPath: string; newPath: string } {
  if (rest.startsWith('"')) {
    const end = findClosingQuote(rest);
    const oldPath = stripPrefix(rest.slice(0, end + 1), "a/");
    const newPath = stripPrefix(rest.slice(end + 2), "b/");
    return { oldPath, newPath };
  }
  // Unquoted paths are ambiguous when they contain " b/"; the ---/+++ or rename lines that follow settle it.
  const separator = rest.indexOf(" b/");
  if (separator === -1) {
    return { oldPath: rest, newPath: rest };
  }
  return {
    oldPath: stripPrefix(rest.slice(0, separator), "a/"),
    newPath: stripPrefix(rest.slice(separator + 1), "b/"),
  };
}

function findClosingQuote(value: string): number {
  for (let i = 1; i < value.length; i++) {
    if (value[i] === "\\") {
      i += 1;
    } else if (value[i] === '"') {
      return i;
    }
  }
  return value.length - 1;
}

function stripPrefix(rawPath: string, prefix: string): string {
  const trimmed = unquote(rawPath.replace(/\t.*$/, ""));
  if (trimmed === DEV_NULL) {
    return trimmed;
  }
  return trimmed.startsWith(prefix) ? trimmed.slice(prefix.length) : trimmed;
}

function unquote(value: string): string {
  if (!value.startsWith('"') || !value.endsWith('"') || value.length < 2) {
    return value;
  }
  const inner = value.slice(1, -1);
  const bytes: number[] = [];
  for (let i = 0; i < inner.length; i++) {
    const char = inner.charAt(i);
    if (char !== "\\") {
      bytes.push(...Buffer.from(char, "utf8"));
      continue;
    }
    const next = inner.charAt(i + 1);
    const octal = inner.slice(i + 1, i + 4);
    if (/^[0-7]{3}$/.test(octal)) {
      bytes.push(parseInt(octal, 8));
      i += 3;
    } else {
      bytes.push(...Buffer.from(ESCAPES[next] ?? next, "utf8"));
      i += 1;
    }
  }
  return Buffer.from(bytes).toString("utf8");
}

const ESCAPES: Record<string, string> = { n: "\n", t: "\t", '"': '"', "\\": "\\" };

/** Path under which a reviewer would name the file: the new path unless the file was deleted. */
export function displayPath(file: Pick<FileDiff, "oldPath" | "newPath">): string {
  return file.newPath === DEV_NULL ? file.oldPath : file.newPath;
}
