import chalk, { Chalk, type ChalkInstance } from "chalk";
import ora from "ora";
import { runAction, type ReviewAction } from "./actions.js";
import { findLabel, loadConfig, loadEnvConfig, remoteName, resolveSettings, type Settings, type SettingsOverrides } from "./config.js";
import { ConfigurationError, ExecutionError } from "./errors.js";
import { spawnRunner } from "./exec.js";
import { GerritClient } from "./gerrit.js";
import { currentBranch, downloadChange, getRemoteUrl, parseRemoteUrl, pushForReview, reviewRef, type RemoteInfo } from "./git.js";
import { renderApprovals } from "./renderer.js";
import { generateReport } from "./report.js";
import type { CommandRunner, Label } from "./types.js";

export interface CommandContext {
  settings: Settings;
  gerrit: GerritClient;
  runner: CommandRunner;
  verbose: boolean;
  color: boolean;
  spinners: boolean;
  c: ChalkInstance;
  log: (line: string) => void;
}

export interface ContextOptions extends SettingsOverrides {
  verbose?: boolean;
  color?: boolean;
  spinners?: boolean;
  runner?: CommandRunner;
  log?: (line: string) => void;
}

export async function createContext(opts: ContextOptions = {}): Promise<CommandContext> {
  const config = loadConfig();
  const env = loadEnvConfig();
  const runner = opts.runner ?? spawnRunner;
  const log = opts.log ?? ((line: string) => console.log(line));
  const verbose = opts.verbose ?? false;
  const color = opts.color ?? true;
  const c = color ? chalk : new Chalk({ level: 0 });

  const remote = remoteName(config, env);
  let remoteInfo: RemoteInfo | null = null;
  try {
    remoteInfo = parseRemoteUrl(await getRemoteUrl(remote, runner));
  } catch (err) {
    // outside a git checkout everything must come from flags, env or config
    if (!(err instanceof ExecutionError)) throw err;
    if (verbose) log(c.dim(`no url for remote "${remote}": ${err.stderr.trim() || err.message}`));
  }

  const settings = resolveSettings(config, env, remoteInfo, opts);
  const gerrit = new GerritClient(settings.connection, {
    runner,
    onCommand: verbose ? (cmd) => log(c.dim(`$ ${cmd}`)) : undefined,
  });

  return {
    settings,
    gerrit,
    runner,
    verbose,
    color,
    spinners: opts.spinners ?? true,
    c,
    log,
  };
}

export function parseChangeNumber(value: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(n) || n <= 0) {
    throw new ConfigurationError(`invalid change number: ${value}`);
  }
  return n;
}

export function parseScore(value: string): number {
  if (!/^[+-]?\d+$/.test(value.trim())) {
    throw new ConfigurationError(`invalid score: ${value}`);
  }
  return parseInt(value, 10);
}

function requireLabel(ctx: CommandContext, name: string): Label {
  const label = findLabel(ctx.settings.labels, name);
  if (!label) throw new ConfigurationError(`label ${name} is not configured`);
  return label;
}

export async function runList(ctx: CommandContext, opts: { filter?: string; extraOptions?: string; width: number }) {
  const { settings } = ctx;
  const spinner = ora({ text: `Querying ${settings.project || "gerrit"}...`, isSilent: !ctx.spinners }).start();
  let skipped = 0;

  let report: string;
  try {
    report = await generateReport({
      connection: settings.connection,
      labels: settings.labels,
      project: settings.project,
      filter: opts.filter || settings.filter,
      extraOptions: opts.extraOptions || settings.extraOptions,
      width: opts.width,
      color: ctx.color,
      title: `Reviews for ${settings.project}:`,
      runner: ctx.runner,
      onCommand: ctx.verbose ? (cmd) => ctx.log(ctx.c.dim(`$ ${cmd}`)) : undefined,
      onMalformed: (record) => {
        skipped++;
        if (ctx.verbose) ctx.log(ctx.c.dim(`skipped line ${record.line}: ${record.reason}`));
      },
    });
  } catch (err) {
    spinner.fail("Query failed");
    throw err;
  }
  spinner.stop();

  ctx.log(report);
  return { report, skipped };
}

export async function runShow(ctx: CommandContext, changeNumber: number) {
  const { settings } = ctx;
  const review = await ctx.gerrit.resolveChange(settings.project, changeNumber);

  const draft = review.isDraft ? ctx.c.magenta(" [draft]") : "";
  ctx.log(ctx.c.bold(`${review.number}: ${review.subject}`) + draft);
  ctx.log(`  Owner:    ${review.ownerName}${review.ownerEmail ? ` <${review.ownerEmail}>` : ""}`);
  ctx.log(`  Branch:   ${review.branch}`);
  ctx.log(`  Status:   ${review.status}`);
  ctx.log(`  Patchset: ${review.patchsetNumber} (${review.revision.slice(0, 12)})`);
  ctx.log(`  Size:     +${review.sizeInsertions}/-${review.sizeDeletions}`);
  if (review.url) ctx.log(`  URL:      ${review.url}`);

  if (review.approvals.length === 0) {
    ctx.log(ctx.c.dim("\n  No approvals yet"));
  } else {
    ctx.log("\n" + renderApprovals(review, settings.labels, { color: ctx.color }));
  }
  return review;
}

export type ActionRequest =
  | { kind: "code-review"; score: number; message?: string }
  | { kind: "verify"; score: number; message?: string }
  | { kind: "submit"; message?: string }
  | { kind: "abandon"; message?: string }
  | { kind: "publish" }
  | { kind: "delete-draft" }
  | { kind: "set-reviewers"; add: string[]; remove?: string[] };

function toAction(ctx: CommandContext, req: ActionRequest): ReviewAction {
  switch (req.kind) {
    case "code-review":
      return { ...req, label: requireLabel(ctx, "Code-Review") };
    case "verify":
      return { ...req, label: requireLabel(ctx, "Verified") };
    default:
      return req;
  }
}

const DONE: Record<ActionRequest["kind"], string> = {
  "code-review": "Reviewed",
  verify: "Verified",
  submit: "Submitted",
  abandon: "Abandoned",
  publish: "Published",
  "delete-draft": "Deleted draft",
  "set-reviewers": "Updated reviewers on",
};

export async function runReviewAction(ctx: CommandContext, changeNumber: number, req: ActionRequest) {
  const action = toAction(ctx, req);
  const spinner = ora({ text: `${req.kind} ${changeNumber}...`, isSilent: !ctx.spinners }).start();
  try {
    const review = await runAction(ctx.gerrit, ctx.settings.project, changeNumber, action);
    spinner.stop();
    ctx.log(ctx.c.green("✓") + ` ${DONE[req.kind]} ${review.number},${review.patchsetNumber}: ${review.subject}`);
    return review;
  } catch (err) {
    spinner.fail(`${req.kind} ${changeNumber} failed`);
    throw err;
  }
}

export async function runPush(ctx: CommandContext, opts: { branch?: string; draft?: boolean }) {
  const branch = opts.branch || (await currentBranch(ctx.runner));
  const target = reviewRef(branch, opts.draft).replace(/^HEAD:/, "");
  await pushForReview(ctx.settings.remote, branch, { draft: opts.draft }, ctx.runner);
  ctx.log(ctx.c.green("✓") + ` Pushed HEAD to ${ctx.settings.remote} ${target}`);
  return target;
}

export async function runDownload(ctx: CommandContext, changeNumber: number) {
  const review = await ctx.gerrit.resolveChange(ctx.settings.project, changeNumber);
  const branch = await downloadChange(ctx.settings.remote, review, ctx.runner);
  ctx.log(ctx.c.green("✓") + ` Checked out ${review.number},${review.patchsetNumber} on ${branch}`);
  return branch;
}

export function describeError(err: unknown): string[] {
  if (err instanceof ExecutionError) {
    const lines = [`error: ${err.message}`];
    const stderr = err.stderr.trim();
    if (stderr && !err.message.includes(stderr)) lines.push(...stderr.split("\n").map((l) => `  ${l}`));
    if (err.command) lines.push(`  command: ${err.command}`);
    return lines;
  }
  if (err instanceof ConfigurationError) return [`config error: ${err.message}`];
  if (err instanceof Error) return [`error: ${err.message}`];
  return [`error: ${String(err)}`];
}
