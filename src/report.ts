import type { MalformedRecord } from "./errors.js";
import { GerritClient } from "./gerrit.js";
import { parseReviews } from "./parser.js";
import { renderTable } from "./renderer.js";
import type { CommandRunner, ConnectionConfig, LabelSet } from "./types.js";

export interface ReportOptions {
  connection: ConnectionConfig;
  labels: LabelSet;
  project: string;
  filter?: string | null;
  extraOptions?: string | null;
  width: number;
  /** epoch seconds, defaults to the current time */
  now?: number;
  color?: boolean;
  title?: string;
  runner?: CommandRunner;
  onCommand?: (command: string) => void;
  onMalformed?: (record: MalformedRecord) => void;
}

/**
 * Queries Gerrit once and renders the result. Rejects with ConfigurationError
 * or ExecutionError; an empty result still renders the header.
 */
export async function generateReport(opts: ReportOptions): Promise<string> {
  const client = new GerritClient(opts.connection, { runner: opts.runner, onCommand: opts.onCommand });
  const raw = await client.queryRaw(opts.project, { filter: opts.filter, extraOptions: opts.extraOptions });
  const reviews = parseReviews(raw, { onMalformed: opts.onMalformed });

  return renderTable(reviews, {
    labels: opts.labels,
    width: opts.width,
    now: opts.now ?? Math.floor(Date.now() / 1000),
    color: opts.color,
    title: opts.title,
  });
}
