import { ConfigurationError, ExecutionError, type MalformedRecord } from "./errors.js";
import { formatCommand, spawnRunner } from "./exec.js";
import { parseReviews } from "./parser.js";
import type { CommandResult, CommandRunner, ConnectionConfig, Review } from "./types.js";

export const DEFAULT_PORT = 29418;
export const DEFAULT_FILTER = "status:open";

export function buildQueryCommand(project: string, filter?: string | null, extraOptions?: string | null): string {
  const parts = ["gerrit", "query", "--format=JSON", "--current-patch-set", `project:${project}`];
  if (extraOptions?.trim()) parts.push(extraOptions.trim());
  parts.push(filter?.trim() || DEFAULT_FILTER);
  return parts.join(" ");
}

export function sshArgs(connection: ConnectionConfig, command: string): string[] {
  if (!connection.hostAndUser) {
    throw new ConfigurationError(
      "gerrit ssh credentials are not set. set GERRIT_SSH_CREDS, ssh.host_and_user in revline.config.yaml, or use an ssh:// remote",
    );
  }
  return ["-x", "-p", String(connection.port), connection.hostAndUser, command];
}

export interface QueryOptions {
  filter?: string | null;
  extraOptions?: string | null;
  onMalformed?: (record: MalformedRecord) => void;
}

export class GerritClient {
  private connection: ConnectionConfig;
  private runner: CommandRunner;
  private onCommand?: (command: string) => void;

  constructor(connection: ConnectionConfig, opts: { runner?: CommandRunner; onCommand?: (command: string) => void } = {}) {
    this.connection = connection;
    this.runner = opts.runner ?? spawnRunner;
    this.onCommand = opts.onCommand;
  }

  /** Runs one gerrit command over ssh and returns its stdout. Never retries. */
  async run(command: string): Promise<string> {
    const args = sshArgs(this.connection, command);
    const printable = formatCommand("ssh", args);
    this.onCommand?.(printable);

    let result: CommandResult;
    try {
      result = await this.runner("ssh", args);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ExecutionError(`could not start ssh: ${reason}`, { command: printable, exitCode: null, stderr: "" });
    }

    if (result.exitCode !== 0) {
      const detail = result.stderr.trim();
      throw new ExecutionError(`gerrit command failed (exit ${result.exitCode})${detail ? `: ${detail}` : ""}`, {
        command: printable,
        exitCode: result.exitCode,
        stderr: result.stderr,
      });
    }
    return result.stdout;
  }

  async queryRaw(project: string, opts: QueryOptions = {}): Promise<string> {
    if (!project.trim()) {
      throw new ConfigurationError("gerrit project is not set. pass --project or set GERRIT_PROJECT");
    }
    return this.run(buildQueryCommand(project, opts.filter, opts.extraOptions));
  }

  async queryReviews(project: string, opts: QueryOptions = {}): Promise<Review[]> {
    const raw = await this.queryRaw(project, opts);
    return [...parseReviews(raw, { onMalformed: opts.onMalformed })];
  }

  /** Looks up one change by number, throwing when the server has no such change. */
  async resolveChange(project: string, changeNumber: number): Promise<Review> {
    const [review] = await this.queryReviews(project, { filter: `change:${changeNumber}` });
    if (!review) {
      throw new ExecutionError(`change ${changeNumber} not found in ${project}`, {
        command: buildQueryCommand(project, `change:${changeNumber}`),
        exitCode: 0,
        stderr: "",
      });
    }
    return review;
  }
}
