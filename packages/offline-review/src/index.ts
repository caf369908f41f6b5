#!/usr/bin/env node

import process from "node:process";

import { Command, InvalidArgumentError } from "commander";
import { chalk, stdin } from "zx";

import { formatRange, parseLineSpec } from "./anchor.js";
import type { ReviewCommands } from "./commands.js";
import { NotFoundError, exitCodeFor, isReviewError, toCommandFailure } from "./errors.js";
import { resolveRepoRoot } from "./paths.js";
import { publishExitCode } from "./publisher.js";
import type { PublishOutcome } from "./publisher.js";
import { createReviewCommands } from "./setup.js";
import type { CommandFailure, CommandResult, ReviewComment, Side } from "./types.js";

interface PrOption {
  pr: number;
}

class CommandError extends Error {
  constructor(readonly failure: CommandFailure) {
    super(failure.message);
  }
}

const program = new Command();
program.name("offline-review").description("Draft pull/merge request reviews offline and publish them in one go");

const parsePr = (value: string) => {
  const pr = Number(value);
  if (!Number.isInteger(pr) || pr < 1) {
    throw new InvalidArgumentError("Expected a pull/merge request number.");
  }
  return pr;
};

const parseSide = (value: string): Side => {
  if (value === "head" || value === "base") {
    return value;
  }
  throw new InvalidArgumentError("Expected 'head' or 'base'.");
};

const prCommand = (name: string) => program.command(name).requiredOption("-p, --pr <number>", "Pull/merge request number", parsePr);

prCommand("start")
  .description("Start (or resume) the review of a pull/merge request")
  .option("--base <ref>", "Base ref the diff is taken from (default: config 'base', then origin/HEAD)")
  .option("--head <ref>", "Head ref the comments refer to", "HEAD")
  .action(async (options: PrOption & { base?: string; head?: string }) => {
    const commands = await open();
    const started = unwrap(await commands.startReview(options.pr, { base: options.base, head: options.head }));
    if (started.quarantined) {
      console.error(chalk.yellow(`Previous review file was unreadable and was moved to ${started.quarantined}`));
    }
    const { session } = started;
    const verb = started.resumed ? "Resumed" : "Started";
    console.log(`${verb} review of #${session.prNumber} (${session.baseRef}...${session.headRef}) on ${session.backend.kind}`);
    if (started.resumed) {
      console.log(`${session.comments.length} comment(s), status ${session.status}`);
    }
  });

prCommand("comment <file> <lines>")
  .description("Add a comment on a line (10) or range (8-15) of a changed file")
  .option("-m, --message <text>", "Comment text (read from stdin when omitted)")
  .option("--side <side>", "Which version the line numbers refer to: head or base", parseSide, "head")
  .action(async (file: string, lines: string, options: PrOption & { message?: string; side: Side }) => {
    const commands = await open();
    const text = await readMessage(options.message);
    const added = unwrap(await commands.reviewComment(options.pr, file, parseLineSpec(lines), text, options.side));
    console.log(
      `Added comment ${chalk.bold(String(added.localId))} on ${added.anchor.path}:${formatRange({ start: added.anchor.startLine, end: added.anchor.endLine })}`,
    );
  });

prCommand("edit <target>")
  .description("Replace the text of a comment, by id or by file:line")
  .option("-m, --message <text>", "New text (read from stdin when omitted)")
  .action(async (target: string, options: PrOption & { message?: string }) => {
    const commands = await open();
    const localId = await resolveTarget(commands, options.pr, target);
    const text = await readMessage(options.message);
    const comment = unwrap(await commands.editComment(options.pr, localId, text));
    console.log(`Updated comment ${comment.localId}`);
  });

prCommand("delete <target>")
  .description("Delete a comment, by id or by file:line")
  .action(async (target: string, options: PrOption) => {
    const commands = await open();
    const localId = await resolveTarget(commands, options.pr, target);
    const removed = unwrap(await commands.deleteComment(options.pr, localId));
    console.log(`Deleted comment ${removed.localId} on ${removed.anchor.path}`);
  });

prCommand("body")
  .description("Set the review's summary text")
  .option("-m, --message <text>", "Body text (read from stdin when omitted)")
  .action(async (options: PrOption & { message?: string }) => {
    const commands = await open();
    unwrap(await commands.reviewBody(options.pr, await readMessage(options.message)));
    console.log("Review body saved.");
  });

prCommand("list")
  .description("List the review's comments")
  .option("--format <format>", "text, quickfix or json", "text")
  .action(async (options: PrOption & { format: string }) => {
    const commands = await open();
    const comments = unwrap(await commands.listComments(options.pr));
    switch (options.format) {
      case "json":
        console.log(JSON.stringify(comments, null, 2));
        break;
      case "quickfix":
        for (const comment of comments) {
          console.log(`${comment.anchor.path}:${comment.anchor.startLine}: [${comment.localId}] ${firstLine(comment.body)}`);
        }
        break;
      case "text":
        if (comments.length === 0) {
          console.log("No comments yet.");
        }
        for (const comment of comments) {
          console.log(describeComment(comment));
        }
        break;
      default:
        throw new InvalidArgumentError(`Unknown format '${options.format}'. Use text, quickfix or json.`);
    }
  });

prCommand("show")
  .description("Print the whole review session as JSON")
  .action(async (options: PrOption) => {
    const commands = await open();
    console.log(JSON.stringify(unwrap(await commands.showReview(options.pr)), null, 2));
  });

prCommand("publish")
  .description("Publish the review; re-run to resume after a partial publish")
  .action(async (options: PrOption) => {
    const commands = await open();
    const controller = new AbortController();
    const onInterrupt = () => {
      console.error(chalk.yellow("Stopping after the current comment (press Ctrl-C again to quit now)..."));
      controller.abort();
    };
    process.once("SIGINT", onInterrupt);
    try {
      const outcome = unwrap(await commands.publishReview(options.pr, { signal: controller.signal }));
      printOutcome(outcome);
      process.exitCode = publishExitCode(outcome);
    } finally {
      process.off("SIGINT", onInterrupt);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  const failure = error instanceof CommandError ? error.failure : isReviewError(error) ? toCommandFailure(error) : undefined;
  if (failure) {
    console.error(`${chalk.red(failure.kind)}: ${failure.message}`);
    process.exitCode = exitCodeFor(failure.kind);
    return;
  }
  console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  process.exitCode = 1;
});

async function open(): Promise<ReviewCommands> {
  const repoRoot = await resolveRepoRoot();
  return createReviewCommands(repoRoot, { log: (message) => console.error(chalk.dim(message)) });
}

function unwrap<T>(result: CommandResult<T>): T {
  if (!result.ok) {
    throw new CommandError(result.error);
  }
  return result.value;
}

async function readMessage(message: string | undefined): Promise<string> {
  if (message !== undefined) {
    return message;
  }
  if (process.stdin.isTTY) {
    throw new InvalidArgumentError("Pass the text with -m or pipe it on stdin.");
  }
  return (await stdin()).replace(/\n$/, "");
}

async function resolveTarget(commands: ReviewCommands, pr: number, target: string): Promise<number> {
  if (/^\d+$/.test(target)) {
    return Number(target);
  }
  const match = target.match(/^(.+):(\d+)$/);
  if (!match?.[1] || !match[2]) {
    throw new InvalidArgumentError(`Expected a comment id or file:line, got '${target}'.`);
  }
  const comment = unwrap(await commands.commentAt(pr, match[1], Number(match[2])));
  if (!comment) {
    throw new CommandError(new NotFoundError(`No comment covers ${target}`));
  }
  return comment.localId;
}

function describeComment(comment: ReviewComment): string {
  const { anchor, status } = comment;
  const location = `${anchor.path}:${formatRange({ start: anchor.startLine, end: anchor.endLine })}${anchor.side === "base" ? " (base)" : ""}`;
  const state =
    status.state === "failed"
      ? chalk.red(`failed: ${status.reason}`)
      : status.state === "submitted"
        ? chalk.green(`submitted ${comment.backendId ?? ""}`.trim())
        : chalk.cyan("draft");
  return `${chalk.bold(`[${comment.localId}]`)} ${location} ${state}\n    ${firstLine(comment.body)}`;
}

function firstLine(text: string): string {
  return text.split("\n", 1)[0] ?? "";
}

function printOutcome(outcome: PublishOutcome): void {
  for (const failure of outcome.failures) {
    console.error(chalk.red(`Comment ${failure.localId} failed (${failure.reason}): ${failure.message}`));
  }
  console.log(`${outcome.submitted.length} comment(s) published in this run.`);
  if (outcome.finalized) {
    console.log(chalk.green(`Review published${outcome.reviewId ? ` (id ${outcome.reviewId})` : ""}.`));
    if (outcome.archivedTo) {
      console.log(`Archived to ${outcome.archivedTo}`);
    }
    return;
  }
  const reason = outcome.aborted ? "interrupted" : "not every comment was accepted";
  console.log(chalk.yellow(`Review is ${outcome.session.status} (${reason}); fix the failures and run publish again.`));
}
