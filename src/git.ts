import { ExecutionError } from "./errors.js";
import { formatCommand, spawnRunner } from "./exec.js";
import { DEFAULT_PORT } from "./gerrit.js";
import type { CommandResult, CommandRunner, Review } from "./types.js";

export interface RemoteInfo {
  hostAndUser: string;
  port: number;
  project: string;
}

function cleanProject(path: string): string {
  return path.replace(/^\/+/, "").replace(/\/+$/, "").replace(/\.git$/, "");
}

/**
 * Derives gerrit ssh credentials and the project name from a git remote URL.
 * Handles ssh:// URLs and scp-style `user@host:project`; anything else
 * (https, local paths) yields null.
 */
export function parseRemoteUrl(url: string): RemoteInfo | null {
  const trimmed = url.trim();
  if (!trimmed) return null;

  const scheme = trimmed.match(/^([a-z][a-z0-9+.-]*):\/\//i);
  if (scheme) {
    if (!/^(git\+)?ssh$/i.test(scheme[1])) return null;
    let parsed: URL;
    try {
      parsed = new URL(trimmed.replace(/^git\+ssh:/i, "ssh:"));
    } catch {
      return null;
    }
    const project = cleanProject(decodeURIComponent(parsed.pathname));
    if (!parsed.hostname || !project) return null;
    return {
      hostAndUser: parsed.username ? `${decodeURIComponent(parsed.username)}@${parsed.hostname}` : parsed.hostname,
      port: parsed.port ? parseInt(parsed.port, 10) : DEFAULT_PORT,
      project,
    };
  }

  const scp = trimmed.match(/^(?:([^@/\s]+)@)?([^:/\s]+):(\S+)$/);
  if (!scp) return null;
  const [, user, host, path] = scp;
  const project = cleanProject(path);
  if (!project) return null;
  return { hostAndUser: user ? `${user}@${host}` : host, port: DEFAULT_PORT, project };
}

async function git(args: string[], runner: CommandRunner): Promise<string> {
  const printable = formatCommand("git", args);
  let result: CommandResult;
  try {
    result = await runner("git", args);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ExecutionError(`could not start git: ${reason}`, { command: printable, exitCode: null, stderr: "" });
  }
  if (result.exitCode !== 0) {
    throw new ExecutionError(`${printable} failed (exit ${result.exitCode})`, {
      command: printable,
      exitCode: result.exitCode,
      stderr: result.stderr,
    });
  }
  return result.stdout;
}

export async function getRemoteUrl(remote: string, runner: CommandRunner = spawnRunner): Promise<string> {
  return (await git(["ls-remote", "--get-url", remote], runner)).trim();
}

export function reviewRef(branch: string, draft = false): string {
  return `HEAD:refs/${draft ? "drafts" : "for"}/${branch}`;
}

export async function pushForReview(
  remote: string,
  branch: string,
  opts: { draft?: boolean } = {},
  runner: CommandRunner = spawnRunner,
): Promise<string> {
  return git(["push", remote, reviewRef(branch, opts.draft)], runner);
}

export function reviewBranchName(review: Review): string {
  const owner = review.ownerName.toLowerCase().trim().replace(/\s+/g, "_");
  return `review/${owner}/${review.number}-${review.patchsetNumber}`;
}

/** Fetches the change's current patchset and checks it out on a local review branch. */
export async function downloadChange(remote: string, review: Review, runner: CommandRunner = spawnRunner): Promise<string> {
  if (!review.ref) {
    throw new ExecutionError(`change ${review.number} has no patchset ref to fetch`, {
      command: "git fetch",
      exitCode: null,
      stderr: "",
    });
  }
  const branch = reviewBranchName(review);
  await git(["fetch", remote, review.ref], runner);
  await git(["checkout", "-b", branch, "FETCH_HEAD"], runner);
  return branch;
}

export async function currentBranch(runner: CommandRunner = spawnRunner): Promise<string> {
  return (await git(["rev-parse", "--abbrev-ref", "HEAD"], runner)).trim();
}
