import { ConfigurationError } from "./errors.js";
import type { GerritClient } from "./gerrit.js";
import type { Label, Review } from "./types.js";

/** Quotes a free-text argument for Gerrit's ssh command-line parser. */
export function quoteArg(text: string): string {
  return `'${text.replace(/'/g, "'\\''")}'`;
}

function reviewCommand(project: string, revision: string, flags: string[], message?: string): string {
  const parts = ["gerrit", "review", "--project", project, ...flags];
  if (message) parts.push("--message", quoteArg(message));
  parts.push(revision);
  return parts.join(" ");
}

export function checkScore(label: Label, score: number): void {
  if (!Number.isInteger(score) || score < label.rejected || score > label.approved) {
    throw new ConfigurationError(
      `${label.name} score must be an integer between ${label.rejected} and +${label.approved}, got ${score}`,
    );
  }
}

function signed(score: number): string {
  return score > 0 ? `+${score}` : String(score);
}

/** `<change>,<patchset>`, the revision form `gerrit review` accepts. */
export function revisionOf(review: Review): string {
  return `${review.number},${review.patchsetNumber}`;
}

export function codeReviewCommand(project: string, revision: string, label: Label, score: number, message?: string) {
  checkScore(label, score);
  return reviewCommand(project, revision, ["--code-review", signed(score)], message);
}

export function verifyCommand(project: string, revision: string, label: Label, score: number, message?: string) {
  checkScore(label, score);
  return reviewCommand(project, revision, ["--verified", signed(score)], message);
}

export function submitCommand(project: string, revision: string, message?: string) {
  return reviewCommand(project, revision, ["--submit"], message);
}

export function abandonCommand(project: string, revision: string, message?: string) {
  return reviewCommand(project, revision, ["--abandon"], message);
}

export function publishCommand(project: string, revision: string) {
  return reviewCommand(project, revision, ["--publish"]);
}

export function deleteDraftCommand(project: string, revision: string) {
  return reviewCommand(project, revision, ["--delete"]);
}

export function setReviewersCommand(
  project: string,
  changeId: string,
  add: readonly string[],
  remove: readonly string[] = [],
): string {
  if (add.length === 0 && remove.length === 0) {
    throw new ConfigurationError("set-reviewers needs at least one reviewer to add or remove");
  }
  const parts = ["gerrit", "set-reviewers", "--project", project];
  for (const r of add) parts.push("--add", r);
  for (const r of remove) parts.push("--remove", r);
  parts.push(changeId);
  return parts.join(" ");
}

export type ReviewAction =
  | { kind: "code-review"; label: Label; score: number; message?: string }
  | { kind: "verify"; label: Label; score: number; message?: string }
  | { kind: "submit"; message?: string }
  | { kind: "abandon"; message?: string }
  | { kind: "publish" }
  | { kind: "delete-draft" }
  | { kind: "set-reviewers"; add: readonly string[]; remove?: readonly string[] };

export function actionCommand(project: string, review: Review, action: ReviewAction): string {
  const rev = revisionOf(review);
  switch (action.kind) {
    case "code-review":
      return codeReviewCommand(project, rev, action.label, action.score, action.message);
    case "verify":
      return verifyCommand(project, rev, action.label, action.score, action.message);
    case "submit":
      return submitCommand(project, rev, action.message);
    case "abandon":
      return abandonCommand(project, rev, action.message);
    case "publish":
      return publishCommand(project, rev);
    case "delete-draft":
      return deleteDraftCommand(project, rev);
    case "set-reviewers":
      return setReviewersCommand(project, review.id || String(review.number), action.add, action.remove);
  }
}

/** Resolves the change's current patchset and runs one review action on it. */
export async function runAction(
  gerrit: GerritClient,
  project: string,
  changeNumber: number,
  action: ReviewAction,
): Promise<Review> {
  const review = await gerrit.resolveChange(project, changeNumber);
  await gerrit.run(actionCommand(project, review, action));
  return review;
}
