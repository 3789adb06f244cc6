import { vi } from "vitest";
import type { CommandResult, Review } from "../types.js";

export const NOW = 1_700_000_000;

export function makeReview(overrides: Partial<Review> = {}): Review {
  return {
    number: 4242,
    subject: "Fix parser crash on empty input",
    branch: "main",
    project: "tools/revline",
    status: "NEW",
    ownerName: "Ada Lovelace",
    ownerEmail: "ada@example.com",
    patchsetNumber: 3,
    revision: "abcdef1234567890",
    ref: "refs/changes/42/4242/3",
    lastUpdated: NOW - 3 * 86_400,
    sizeInsertions: 12,
    sizeDeletions: 4,
    isDraft: false,
    approvals: [],
    url: "https://review.example.com/4242",
    id: "I0123456789abcdef",
    ...overrides,
  };
}

/** A change object the way `gerrit query --format=JSON` prints it. */
export function changeJson(overrides: Record<string, unknown> = {}, patchSet: Record<string, unknown> = {}): string {
  return JSON.stringify({
    project: "tools/revline",
    branch: "main",
    id: "I0123456789abcdef",
    number: 4242,
    subject: "Fix parser crash on empty input",
    owner: { name: "Ada Lovelace", email: "ada@example.com" },
    url: "https://review.example.com/4242",
    lastUpdated: NOW - 3 * 86_400,
    status: "NEW",
    currentPatchSet: {
      number: 3,
      revision: "abcdef1234567890",
      ref: "refs/changes/42/4242/3",
      isDraft: false,
      sizeInsertions: 12,
      sizeDeletions: -4,
      ...patchSet,
    },
    ...overrides,
  });
}

export const STATS_LINE = JSON.stringify({ type: "stats", rowCount: 2, runTimeMilliseconds: 14 });

export function result(stdout: string, exitCode = 0, stderr = ""): CommandResult {
  return { stdout, stderr, exitCode };
}

export function fakeRunner(stdout = "") {
  return vi.fn(async (_file: string, _args: readonly string[]): Promise<CommandResult> => result(stdout));
}
