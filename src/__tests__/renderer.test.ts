import { describe, expect, it } from "vitest";
import { DEFAULT_LABELS } from "../config.js";
import { displayWidth } from "../format.js";
import {
  APPROVED_GLYPH,
  columnsForWidth,
  REJECTED_GLYPH,
  renderApprovals,
  renderTable,
  rowIndex,
  scoreCell,
} from "../renderer.js";
import type { Approval, Label } from "../types.js";
import { makeReview, NOW } from "./fixtures.js";

const CODE_REVIEW: Label = { name: "Code-Review", short: "CR", approved: 2, rejected: -2 };
const VERIFIED: Label = { name: "Verified", short: "VR", approved: 1, rejected: -1 };

function cr(...values: number[]): Approval[] {
  return values.map((value) => ({ labelType: "Code-Review", value }));
}

function lines(text: string): string[] {
  return text.split("\n").slice(0, -1);
}

function row(...cells: string[]): string {
  return cells.join(" ");
}

describe("columnsForWidth", () => {
  const keysAt = (width: number) => columnsForWidth(width, DEFAULT_LABELS).map((c) => c.key);
  const subjectAt = (width: number) => columnsForWidth(width, DEFAULT_LABELS).find((c) => c.key === "subject")?.width;

  it("shows only the base columns up to 80", () => {
    expect(keysAt(80)).toEqual(["number", "patchset", "subject", "owner"]);
    expect(subjectAt(80)).toBe(53);
  });

  it("adds score cells above 80", () => {
    expect(keysAt(81)).toEqual(["number", "patchset", "subject", "owner", "scores"]);
    expect(keysAt(94)).toEqual(["number", "patchset", "subject", "owner", "scores"]);
    expect(subjectAt(94)).toBe(61);
  });

  it("adds the size pair above 94", () => {
    expect(keysAt(95)).toEqual(["number", "patchset", "subject", "owner", "insertions", "deletions", "scores"]);
    expect(subjectAt(95)).toBe(46);
  });

  it("adds the age above 108", () => {
    expect(keysAt(109)).toEqual([
      "number",
      "patchset",
      "subject",
      "owner",
      "insertions",
      "deletions",
      "updated",
      "scores",
    ]);
  });

  it("adds the branch above 128", () => {
    expect(keysAt(128)).not.toContain("branch");
    expect(keysAt(129)).toEqual([
      "number",
      "patchset",
      "subject",
      "owner",
      "branch",
      "insertions",
      "deletions",
      "updated",
      "scores",
    ]);
    expect(subjectAt(129)).toBe(46);
  });

  it("sizes score cells by the number of labels", () => {
    const labels: Label[] = [...DEFAULT_LABELS, { name: "QA", short: "QA", approved: 1, rejected: -1 }];
    expect(columnsForWidth(90, labels).find((c) => c.key === "scores")?.width).toBe(8);
  });

  it("leaves one column of the width unused, counting separators", () => {
    for (const width of [60, 81, 95, 109, 129, 200]) {
      const columns = columnsForWidth(width, DEFAULT_LABELS);
      const total = columns.reduce((sum, c) => sum + c.width, 0) + columns.length - 1;
      expect(total).toBe(width - 1);
    }
  });

  it("drops owner, patchset, then number when the terminal is too narrow", () => {
    expect(keysAt(28)).toEqual(["number", "patchset", "subject", "owner"]);
    expect(subjectAt(28)).toBe(1);
    expect(keysAt(27)).toEqual(["number", "patchset", "subject"]);
    expect(subjectAt(27)).toBe(11);
    expect(keysAt(16)).toEqual(["number", "subject"]);
    expect(subjectAt(16)).toBe(6);
    expect(keysAt(10)).toEqual(["subject"]);
    expect(subjectAt(10)).toBe(9);
  });
});

describe("scoreCell", () => {
  it("renders a space when nobody scored the label", () => {
    expect(scoreCell([], CODE_REVIEW)).toBe(" ");
    expect(scoreCell([{ labelType: "Verified", value: 1 }], CODE_REVIEW)).toBe(" ");
  });

  it("renders the rejected glyph at the rejection threshold", () => {
    expect(scoreCell(cr(-2), CODE_REVIEW)).toBe(REJECTED_GLYPH);
  });

  it("lets one veto override an approval", () => {
    expect(scoreCell(cr(2, -2), CODE_REVIEW)).toBe(REJECTED_GLYPH);
  });

  it("renders the approved glyph when the maximum clears the bar", () => {
    expect(scoreCell(cr(2, -1), CODE_REVIEW)).toBe(APPROVED_GLYPH);
  });

  it("renders the minimum otherwise", () => {
    expect(scoreCell(cr(1), CODE_REVIEW)).toBe("+1");
    expect(scoreCell(cr(1, 1), CODE_REVIEW)).toBe("+1");
    expect(scoreCell(cr(0, 1), CODE_REVIEW)).toBe("0");
    expect(scoreCell(cr(1, -1), CODE_REVIEW)).toBe("-1");
  });

  it("uses each label's own thresholds", () => {
    expect(scoreCell([{ labelType: "Verified", value: 1 }], VERIFIED)).toBe(APPROVED_GLYPH);
    expect(scoreCell([{ labelType: "Verified", value: -1 }], VERIFIED)).toBe(REJECTED_GLYPH);
  });

  it("does not depend on approval order", () => {
    const orders = [
      [1, -1, 0],
      [1, 0, -1],
      [-1, 1, 0],
      [-1, 0, 1],
      [0, 1, -1],
      [0, -1, 1],
    ];
    const cells = orders.map((values) => scoreCell(cr(...values), CODE_REVIEW));
    expect(new Set(cells)).toEqual(new Set(["-1"]));
  });
});

describe("renderTable", () => {
  const subject = "Fix parser crash on empty input";

  it("renders the base columns at width 80", () => {
    const out = renderTable([makeReview()], { labels: DEFAULT_LABELS, width: 80, now: NOW, color: false });
    expect(lines(out)).toEqual([
      row("#".padEnd(8), "PS".padEnd(5), "Subject".padEnd(53), "Owner".padEnd(10)),
      row("4242".padEnd(8), "[3]".padEnd(5), subject.padEnd(53), "Ada Lovel…"),
    ]);
  });

  it("renders every column at width 140", () => {
    const review = makeReview({ approvals: cr(2, -1) });
    const out = renderTable([review], { labels: DEFAULT_LABELS, width: 140, now: NOW, color: false });
    expect(lines(out)).toEqual([
      row(
        "#".padEnd(8),
        "PS".padEnd(5),
        "Subject".padEnd(57),
        "Owner".padEnd(10),
        "Branch".padEnd(20),
        "    Ins",
        "    Del",
        "Updated".padEnd(12),
        "CR",
        "VR",
      ),
      row(
        "4242".padEnd(8),
        "[3]".padEnd(5),
        subject.padEnd(57),
        "Ada Lovel…",
        "main".padEnd(20),
        "    +12",
        "     -4",
        "3 days ago".padEnd(12),
        ` ${APPROVED_GLYPH}`,
        "  ",
      ),
    ]);
  });

  it("frames the table with a title and a trailing blank line", () => {
    const out = renderTable([], { labels: DEFAULT_LABELS, width: 80, now: NOW, color: false, title: "Reviews:" });
    expect(out).toBe("Reviews:\n" + row("#".padEnd(8), "PS".padEnd(5), "Subject".padEnd(53), "Owner".padEnd(10)) + "\n\n");
  });

  it("leaves a subject and owner exactly as wide as their columns untouched", () => {
    const fitting = "x".repeat(53);
    const out = renderTable([makeReview({ subject: fitting, ownerName: "Jane Smith" })], {
      labels: DEFAULT_LABELS,
      width: 80,
      now: NOW,
      color: false,
    });
    expect(lines(out)[1]).toBe(row("4242".padEnd(8), "[3]".padEnd(5), fitting, "Jane Smith"));
  });

  it("truncates a long subject with an ellipsis", () => {
    const out = renderTable([makeReview({ subject: "y".repeat(70) })], {
      labels: DEFAULT_LABELS,
      width: 80,
      now: NOW,
      color: false,
    });
    expect(lines(out)[1].slice(15, 69)).toBe("y".repeat(52) + "… ");
  });

  it("keeps rows with wide characters to the display width", () => {
    const out = renderTable([makeReview({ subject: "修复解析器在空输入时崩溃的问题".repeat(4), ownerName: "山田太郎さん" })], {
      labels: DEFAULT_LABELS,
      width: 100,
      now: NOW,
      color: false,
    });
    for (const line of lines(out)) expect(displayWidth(line)).toBe(99);
  });

  it("keeps rows to the display width on narrow terminals", () => {
    for (const width of [1, 5, 12, 20, 27, 28]) {
      const out = renderTable([makeReview()], { labels: DEFAULT_LABELS, width, now: NOW, color: false });
      expect(lines(out).map(displayWidth)).toEqual([width - 1, width - 1]);
    }
    const out = renderTable([makeReview()], { labels: DEFAULT_LABELS, width: 20, now: NOW, color: false });
    expect(lines(out)[1]).toBe(row("4242".padEnd(8), "[3]".padEnd(5), "Fix…"));
  });

  it("leaves the age empty when the change has no update time", () => {
    const out = renderTable([makeReview({ lastUpdated: 0 })], { labels: DEFAULT_LABELS, width: 110, now: NOW, color: false });
    const columns = columnsForWidth(110, DEFAULT_LABELS);
    const start = columns
      .slice(0, columns.findIndex((c) => c.key === "updated"))
      .reduce((sum, c) => sum + c.width + 1, 0);
    expect(lines(out)[1].slice(start, start + 12)).toBe(" ".repeat(12));
    expect(lines(out)[1]).not.toContain("ago");
  });

  it("renders one row per review", () => {
    const reviews = [makeReview({ number: 1 }), makeReview({ number: 2 }), makeReview({ number: 3 })];
    const out = renderTable(reviews, { labels: DEFAULT_LABELS, width: 120, now: NOW, color: false });
    expect(lines(out).map((l) => l.slice(0, 8).trim())).toEqual(["#", "1", "2", "3"]);
  });
});

describe("rowIndex", () => {
  it("maps change numbers to reviews", () => {
    const a = makeReview({ number: 10 });
    const b = makeReview({ number: 11 });
    const index = rowIndex([a, b]);
    expect(index.get(11)).toBe(b);
    expect(index.get(12)).toBeUndefined();
  });
});

describe("renderApprovals", () => {
  it("lists each reviewer's score per label", () => {
    const review = makeReview({
      approvals: [
        { labelType: "Code-Review", value: 2, byName: "Grace Hopper" },
        { labelType: "Verified", value: -1, byName: "CI Bot" },
        { labelType: "Code-Review", value: -1, byEmail: "ken@example.com" },
      ],
    });
    const out = renderApprovals(review, DEFAULT_LABELS, { color: false });
    expect(out).toMatch(/│ Reviewer\s+│ Code-Review │ Verified │/);
    expect(out).toMatch(/│ Grace Hopper\s+│ \+2\s+│\s+│/);
    expect(out).toMatch(/│ CI Bot\s+│\s+│ -1\s+│/);
    expect(out).toMatch(/│ ken@example\.com\s+│ -1\s+│\s+│/);
  });
});
