import stringWidth from "string-width";

export const ELLIPSIS = "…";

const MINUTE = 60;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;
const MONTH = 31 * DAY;
const YEAR = 365 * DAY;

// A year is only shown once twelve 31-day months have passed.
const AGE_UNITS: ReadonlyArray<{ name: string; seconds: number; after: number }> = [
  { name: "year", seconds: YEAR, after: 12 * MONTH },
  { name: "month", seconds: MONTH, after: MONTH },
  { name: "day", seconds: DAY, after: DAY },
  { name: "hour", seconds: HOUR, after: HOUR },
  { name: "minute", seconds: MINUTE, after: MINUTE },
];

const segmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

export function displayWidth(text: string): number {
  return stringWidth(text);
}

/**
 * Shortens `text` to at most `max` terminal columns, marking the cut with an
 * ellipsis. Text that already fits is returned as is.
 */
export function truncate(text: string, max: number): string {
  if (displayWidth(text) <= max) return text;
  if (max <= 0) return "";

  const room = max - displayWidth(ELLIPSIS);
  let out = "";
  let used = 0;
  for (const { segment } of segmenter.segment(text)) {
    const w = displayWidth(segment);
    if (used + w > room) break;
    out += segment;
    used += w;
  }
  return out + ELLIPSIS;
}

export function padEnd(text: string, width: number): string {
  return text + " ".repeat(Math.max(0, width - displayWidth(text)));
}

export function padStart(text: string, width: number): string {
  return " ".repeat(Math.max(0, width - displayWidth(text))) + text;
}

/** Truncates text wider than `width`, then pads it to exactly `width`. */
export function fit(text: string, width: number, align: "left" | "right" = "left"): string {
  const cut = truncate(text, width);
  return align === "left" ? padEnd(cut, width) : padStart(cut, width);
}

/** "3 days ago" style age. Counts of one and two keep the singular form. */
export function relativeAge(seconds: number): string {
  for (const unit of AGE_UNITS) {
    if (seconds < unit.after) continue;
    const count = Math.floor(seconds / unit.seconds);
    return `${count} ${unit.name}${count > 2 ? "s" : ""} ago`;
  }
  return "just now";
}
