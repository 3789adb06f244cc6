import { z } from "zod";
import type { MalformedRecord } from "./errors.js";
import type { Approval, Review } from "./types.js";

// Gerrit's ssh query output encodes some integers as strings ("value":"-1")
const IntLike = z.union([
  z.number().int(),
  z.string().regex(/^-?\d+$/).transform((s) => parseInt(s, 10)),
]);

const ApprovalSchema = z.object({
  type: z.string(),
  value: IntLike,
  by: z.object({ name: z.string().optional(), email: z.string().optional() }).optional(),
});

const PatchSetSchema = z.object({
  number: IntLike.catch(0),
  revision: z.string().catch(""),
  ref: z.string().catch(""),
  isDraft: z.unknown().transform((v) => v === true || v === "true"),
  approvals: z.array(z.unknown()).catch([]),
  sizeInsertions: IntLike.catch(0),
  sizeDeletions: IntLike.catch(0),
});

const ChangeSchema = z.object({
  number: IntLike,
  subject: z.string(),
  owner: z.object({ name: z.string(), email: z.string().optional() }),
  id: z.string().catch(""),
  project: z.string().catch(""),
  branch: z.string().catch(""),
  status: z.string().catch(""),
  url: z.string().catch(""),
  lastUpdated: IntLike.catch(0),
  currentPatchSet: PatchSetSchema.optional().catch(undefined),
});

function toApprovals(raw: unknown[]): Approval[] {
  const approvals: Approval[] = [];
  for (const entry of raw) {
    const parsed = ApprovalSchema.safeParse(entry);
    if (!parsed.success) continue;
    approvals.push({
      labelType: parsed.data.type,
      value: parsed.data.value,
      byName: parsed.data.by?.name,
      byEmail: parsed.data.by?.email,
    });
  }
  return approvals;
}

/**
 * Converts one decoded Gerrit change object into a Review.
 * Returns the reason as a string when required fields are missing.
 */
export function toReview(obj: unknown): Review | string {
  const parsed = ChangeSchema.safeParse(obj);
  if (!parsed.success) {
    const fields = [...new Set(parsed.error.issues.map((i) => i.path.join(".") || "(root)"))];
    return `missing or invalid ${fields.join(", ")}`;
  }
  const change = parsed.data;
  const ps = change.currentPatchSet;
  return {
    number: change.number,
    subject: change.subject,
    branch: change.branch,
    project: change.project,
    status: change.status,
    ownerName: change.owner.name,
    ownerEmail: change.owner.email,
    patchsetNumber: ps?.number ?? 0,
    revision: ps?.revision ?? "",
    ref: ps?.ref ?? "",
    lastUpdated: change.lastUpdated,
    // Gerrit reports deletions as a negative count
    sizeInsertions: Math.abs(ps?.sizeInsertions ?? 0),
    sizeDeletions: Math.abs(ps?.sizeDeletions ?? 0),
    isDraft: ps?.isDraft ?? false,
    approvals: toApprovals(ps?.approvals ?? []),
    url: change.url,
    id: change.id,
  };
}

export interface ParseOptions {
  onMalformed?: (record: MalformedRecord) => void;
}

function* walk(raw: string, opts: ParseOptions): Generator<Review> {
  let start = 0;
  let lineNo = 0;
  while (start < raw.length) {
    const end = raw.indexOf("\n", start);
    const stop = end === -1 ? raw.length : end;
    const text = raw.slice(start, stop).trim();
    start = stop + 1;
    lineNo++;
    if (!text) continue;

    let obj: unknown;
    try {
      obj = JSON.parse(text);
    } catch {
      opts.onMalformed?.({ line: lineNo, reason: "invalid JSON", text });
      continue;
    }

    const review = toReview(obj);
    if (typeof review === "string") {
      opts.onMalformed?.({ line: lineNo, reason: review, text });
      continue;
    }
    yield review;
  }
}

/**
 * Parses Gerrit's JSON-lines query output. Each iteration walks the input
 * again, so the result can be consumed more than once. Entries without a
 * change number, subject or owner name (including the trailing stats
 * object) are skipped.
 */
export function parseReviews(raw: string, opts: ParseOptions = {}): Iterable<Review> {
  return {
    [Symbol.iterator]: () => walk(raw, opts),
  };
}
