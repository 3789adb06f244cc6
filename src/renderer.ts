import chalk, { Chalk, type ChalkInstance } from "chalk";
import Table from "cli-table3";
import { fit, padStart, relativeAge } from "./format.js";
import type { Approval, Label, LabelSet, Review } from "./types.js";

export const APPROVED_GLYPH = "✓";
export const REJECTED_GLYPH = "✗";

export type ColumnKey =
  | "number"
  | "patchset"
  | "subject"
  | "owner"
  | "branch"
  | "insertions"
  | "deletions"
  | "updated"
  | "scores";

export interface Column {
  key: ColumnKey;
  width: number;
}

const SCORE_CELL_WIDTH = 2;
const SEPARATOR = " ";

// Column tiers: each entry appears once the width exceeds `minWidth`.
const FIXED_COLUMNS: ReadonlyArray<{ key: Exclude<ColumnKey, "subject" | "scores">; width: number; minWidth: number }> = [
  { key: "number", width: 8, minWidth: 0 },
  { key: "patchset", width: 5, minWidth: 0 },
  { key: "owner", width: 10, minWidth: 0 },
  { key: "branch", width: 20, minWidth: 128 },
  { key: "insertions", width: 7, minWidth: 94 },
  { key: "deletions", width: 7, minWidth: 94 },
  { key: "updated", width: 12, minWidth: 108 },
];
const SCORES_MIN_WIDTH = 80;

// Dropped in this order when not even a one-column subject would fit.
const NARROW_DROP_ORDER: readonly ColumnKey[] = ["owner", "patchset", "number"];

const COLUMN_ORDER: readonly ColumnKey[] = [
  "number",
  "patchset",
  "subject",
  "owner",
  "branch",
  "insertions",
  "deletions",
  "updated",
  "scores",
];

/**
 * Picks the columns shown at `width` and sizes the subject to take whatever
 * is left. Columns are joined by a single space and the last terminal column
 * stays free, so a row is always `width - 1` columns wide.
 */
export function columnsForWidth(width: number, labels: LabelSet): Column[] {
  const shown = new Map<ColumnKey, number>();
  for (const col of FIXED_COLUMNS) {
    if (width > col.minWidth) shown.set(col.key, col.width);
  }
  if (width > SCORES_MIN_WIDTH && labels.length > 0) {
    shown.set("scores", labels.length * (SCORE_CELL_WIDTH + SEPARATOR.length) - SEPARATOR.length);
  }

  // one separator after each column but the last
  const remaining = () => width - 1 - [...shown.values()].reduce((sum, w) => sum + w + SEPARATOR.length, 0);
  for (const key of NARROW_DROP_ORDER) {
    if (remaining() >= 1) break;
    shown.delete(key);
  }
  shown.set("subject", Math.max(0, remaining()));

  return COLUMN_ORDER.filter((key) => shown.has(key)).map((key) => ({ key, width: shown.get(key) ?? 0 }));
}

type ScoreKind = "none" | "rejected" | "approved" | "positive" | "neutral";

function reduceScore(approvals: readonly Approval[], label: Label): { text: string; kind: ScoreKind } {
  const values = approvals.filter((a) => a.labelType === label.name).map((a) => a.value);
  if (values.length === 0) return { text: " ", kind: "none" };

  const min = Math.min(...values);
  const max = Math.max(...values);
  // a single veto outranks any approval
  if (min <= label.rejected) return { text: REJECTED_GLYPH, kind: "rejected" };
  if (max >= label.approved) return { text: APPROVED_GLYPH, kind: "approved" };
  if (min > 0) return { text: `+${min}`, kind: "positive" };
  return { text: String(min), kind: "neutral" };
}

/** One display value for all of a review's approvals on `label`. */
export function scoreCell(approvals: readonly Approval[], label: Label): string {
  return reduceScore(approvals, label).text;
}

export interface RenderOptions {
  labels: LabelSet;
  width: number;
  /** epoch seconds used for the age column */
  now: number;
  color?: boolean;
  title?: string;
}

function painter(color: boolean | undefined): ChalkInstance {
  return color === false ? new Chalk({ level: 0 }) : chalk;
}

function headerCell(col: Column, labels: LabelSet): string {
  switch (col.key) {
    case "number":
      return fit("#", col.width);
    case "patchset":
      return fit("PS", col.width);
    case "subject":
      return fit("Subject", col.width);
    case "owner":
      return fit("Owner", col.width);
    case "branch":
      return fit("Branch", col.width);
    case "insertions":
      return fit("Ins", col.width, "right");
    case "deletions":
      return fit("Del", col.width, "right");
    case "updated":
      return fit("Updated", col.width);
    case "scores":
      return labels.map((l) => fit(l.short, SCORE_CELL_WIDTH, "right")).join(SEPARATOR);
  }
}

function scoreCells(review: Review, labels: LabelSet, c: ChalkInstance): string {
  return labels
    .map((label) => {
      const { text, kind } = reduceScore(review.approvals, label);
      const cell = padStart(text, SCORE_CELL_WIDTH);
      const styled =
        kind === "approved"
          ? c.green.bold(cell)
          : kind === "rejected"
            ? c.red.bold(cell)
            : kind === "positive"
              ? c.green(cell)
              : kind === "neutral"
                ? c.yellow(cell)
                : cell;
      return styled;
    })
    .join(SEPARATOR);
}

function rowCell(col: Column, review: Review, opts: RenderOptions, c: ChalkInstance): string {
  switch (col.key) {
    case "number":
      return c.yellow(fit(String(review.number), col.width));
    case "patchset":
      return c.dim(fit(`[${review.patchsetNumber}]`, col.width));
    case "subject": {
      const text = fit(review.subject, col.width);
      return review.isDraft ? c.magenta(text) : text;
    }
    case "owner":
      return c.cyan(fit(review.ownerName, col.width));
    case "branch":
      return c.blue(fit(review.branch, col.width));
    case "insertions":
      return c.green(fit(`+${review.sizeInsertions}`, col.width, "right"));
    case "deletions":
      return c.red(fit(`-${review.sizeDeletions}`, col.width, "right"));
    case "updated":
      return c.dim(fit(review.lastUpdated > 0 ? relativeAge(opts.now - review.lastUpdated) : "", col.width));
    case "scores":
      return scoreCells(review, opts.labels, c);
  }
}

/**
 * Lays reviews out as a header row plus one row per review. With a title the
 * block is framed by a title line and a trailing blank line.
 */
export function renderTable(reviews: Iterable<Review>, opts: RenderOptions): string {
  const c = painter(opts.color);
  const columns = columnsForWidth(opts.width, opts.labels);

  const lines: string[] = [];
  if (opts.title) lines.push(c.bold(opts.title));
  lines.push(c.bold(columns.map((col) => headerCell(col, opts.labels)).join(SEPARATOR)));
  for (const review of reviews) {
    lines.push(columns.map((col) => rowCell(col, review, opts, c)).join(SEPARATOR));
  }
  if (opts.title) lines.push("");

  return lines.map((line) => line + "\n").join("");
}

/** Change number → Review, for commands that act on a listed row. */
export function rowIndex(reviews: Iterable<Review>): Map<number, Review> {
  const index = new Map<number, Review>();
  for (const review of reviews) index.set(review.number, review);
  return index;
}

function signed(value: number): string {
  return value > 0 ? `+${value}` : String(value);
}

export function renderApprovals(review: Review, labels: LabelSet, opts: { color?: boolean } = {}): string {
  const table = new Table({
    head: ["Reviewer", ...labels.map((l) => l.name)],
    style: opts.color === false ? { head: [], border: [] } : { head: ["cyan"], border: ["grey"] },
  });

  const byReviewer = new Map<string, Map<string, number>>();
  for (const approval of review.approvals) {
    const who = approval.byName || approval.byEmail || "unknown";
    const scores = byReviewer.get(who) ?? new Map<string, number>();
    scores.set(approval.labelType, approval.value);
    byReviewer.set(who, scores);
  }

  for (const [who, scores] of byReviewer) {
    table.push([who, ...labels.map((l) => {
      const v = scores.get(l.name);
      return v === undefined ? "" : signed(v);
    })]);
  }

  return table.toString();
}
