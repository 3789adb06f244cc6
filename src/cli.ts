#!/usr/bin/env node
import { copyFileSync, existsSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import chalk from "chalk";
import { Command, InvalidArgumentError } from "commander";
import {
  createContext,
  describeError,
  parseChangeNumber,
  parseScore,
  runDownload,
  runList,
  runPush,
  runReviewAction,
  runShow,
  type ActionRequest,
  type ContextOptions,
} from "./commands.js";
import { CONFIG_FILE } from "./config.js";

const program = new Command();

program
  .name("revline")
  .description("Gerrit review lists and review actions over ssh")
  .version("0.3.0")
  .option("-p, --project <name>", "Gerrit project (defaults to the one in the remote url)")
  .option("--creds <user@host>", "ssh credentials for the gerrit server")
  .option("--port <number>", "gerrit ssh port", parseIntOption)
  .option("--no-color", "Disable colors")
  .option("-v, --verbose", "Print the commands being run");

interface GlobalOptions {
  project?: string;
  creds?: string;
  port?: number;
  color: boolean;
  verbose?: boolean;
}

// ── helpers ─────────────────────────────────────────────────────
function parseIntOption(value: string): number {
  const n = parseInt(value, 10);
  if (Number.isNaN(n) || n <= 0) throw new InvalidArgumentError("Not a positive number.");
  return n;
}

function contextOptions(): ContextOptions {
  const g = program.opts<GlobalOptions>();
  return {
    project: g.project,
    hostAndUser: g.creds,
    port: g.port,
    color: g.color,
    verbose: g.verbose,
    spinners: process.stderr.isTTY === true,
  };
}

function handle<A extends unknown[]>(fn: (...args: A) => Promise<unknown>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (err) {
      for (const line of describeError(err)) console.error(chalk.red(line));
      process.exitCode = 1;
    }
  };
}

async function act(change: string, req: ActionRequest) {
  const ctx = await createContext(contextOptions());
  await runReviewAction(ctx, parseChangeNumber(change), req);
}

// ── init ────────────────────────────────────────────────────────
program
  .command("init")
  .description("Create revline.config.yaml and .env in the current directory")
  .action(() => {
    const root = resolve(dirname(fileURLToPath(import.meta.url)), "..");
    const files: Array<[string, string, string]> = [
      [resolve(root, ".env.example"), ".env", "ssh credentials and project overrides"],
      [resolve(root, CONFIG_FILE), CONFIG_FILE, "labels, filter and remote"],
    ];

    for (const [source, target, hint] of files) {
      if (existsSync(target)) {
        console.log(chalk.yellow("⊘") + ` ${target} already exists`);
      } else if (existsSync(source)) {
        copyFileSync(source, target);
        console.log(chalk.green("✓") + ` Created ${target} (${hint})`);
      }
    }

    console.log("\n" + chalk.bold("Next steps:"));
    console.log("  1. Check the remote in revline.config.yaml points at your gerrit ssh remote");
    console.log("  2. Run: revline list");
  });

// ── list ────────────────────────────────────────────────────────
program
  .command("list [filter...]")
  .alias("ls")
  .description("List reviews for the project (default filter: status:open)")
  .option("-w, --width <columns>", "Output width", parseIntOption)
  .option("-x, --extra <options>", "Extra gerrit query options")
  .action(
    handle(async (filter: string[], opts: { width?: number; extra?: string }) => {
      const ctx = await createContext(contextOptions());
      await runList(ctx, {
        filter: filter.join(" ") || undefined,
        extraOptions: opts.extra,
        width: opts.width ?? process.stdout.columns ?? 80,
      });
    }),
  );

// ── show ────────────────────────────────────────────────────────
program
  .command("show <change>")
  .description("Show one change and its approvals")
  .action(
    handle(async (change: string) => {
      const ctx = await createContext(contextOptions());
      await runShow(ctx, parseChangeNumber(change));
    }),
  );

// ── review actions ──────────────────────────────────────────────
program
  .command("review <change> <score>")
  .description("Score the current patchset on Code-Review")
  .option("-m, --message <text>", "Review message")
  .action(
    handle((change: string, score: string, opts: { message?: string }) =>
      act(change, { kind: "code-review", score: parseScore(score), message: opts.message }),
    ),
  );

program
  .command("verify <change> <score>")
  .description("Score the current patchset on Verified")
  .option("-m, --message <text>", "Review message")
  .action(
    handle((change: string, score: string, opts: { message?: string }) =>
      act(change, { kind: "verify", score: parseScore(score), message: opts.message }),
    ),
  );

program
  .command("submit <change>")
  .description("Submit the current patchset")
  .option("-m, --message <text>", "Review message")
  .action(handle((change: string, opts: { message?: string }) => act(change, { kind: "submit", message: opts.message })));

program
  .command("abandon <change>")
  .description("Abandon the change")
  .option("-m, --message <text>", "Reason")
  .action(handle((change: string, opts: { message?: string }) => act(change, { kind: "abandon", message: opts.message })));

program
  .command("publish <change>")
  .description("Publish a draft patchset")
  .action(handle((change: string) => act(change, { kind: "publish" })));

program
  .command("delete-draft <change>")
  .description("Delete a draft patchset")
  .action(handle((change: string) => act(change, { kind: "delete-draft" })));

program
  .command("add-reviewer <change> <reviewers...>")
  .description("Add reviewers to the change")
  .option("--remove <reviewers...>", "Reviewers to remove instead")
  .action(
    handle((change: string, reviewers: string[], opts: { remove?: string[] }) =>
      act(change, { kind: "set-reviewers", add: reviewers, remove: opts.remove }),
    ),
  );

// ── git workflow ────────────────────────────────────────────────
program
  .command("push [branch]")
  .description("Push HEAD for review to refs/for/<branch> (defaults to the current branch)")
  .option("-d, --draft", "Push as a draft (refs/drafts/<branch>)")
  .action(
    handle(async (branch: string | undefined, opts: { draft?: boolean }) => {
      const ctx = await createContext(contextOptions());
      await runPush(ctx, { branch, draft: opts.draft });
    }),
  );

program
  .command("download <change>")
  .description("Fetch the current patchset and check it out on a review branch")
  .action(
    handle(async (change: string) => {
      const ctx = await createContext(contextOptions());
      await runDownload(ctx, parseChangeNumber(change));
    }),
  );

await program.parseAsync();
