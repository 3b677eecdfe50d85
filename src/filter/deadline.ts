import type { DeadlineFilterConfig } from "../config.js";
import { lexicon } from "../data/lexicon.js";
import type { FilterResult, Posting } from "../postings/types.js";
import {
  NEEDS_CONFIRMATION,
  parsed,
  unparsed,
  type Parsed,
} from "./parsing.js";
import { filterResult, type Filter, type FilterEnv } from "./types.js";

const DAY_MS = 86_400_000;

type DateReader = (match: RegExpMatchArray) => [number, number, number];

function lastDayOf(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

// First match wins; year-only and year-month resolve to the end of their period.
const DATE_PATTERNS: Array<[RegExp, DateReader]> = [
  [
    /(\d{4})\s*[./\-年]\s*(\d{1,2})\s*[./\-月]\s*(\d{1,2})\s*日?/,
    (m) => [Number(m[1]), Number(m[2]), Number(m[3])],
  ],
  [
    /(\d{4})\s*[./\-年]\s*(\d{1,2})\s*月?/,
    (m) => [Number(m[1]), Number(m[2]), lastDayOf(Number(m[1]), Number(m[2]))],
  ],
  [
    /(?<!\d)(\d{2})\s*[./年]\s*(\d{1,2})\s*[./月]\s*(\d{1,2})\s*日?/,
    (m) => [2000 + Number(m[1]), Number(m[2]), Number(m[3])],
  ],
  [/(?<!\d)(\d{4})\s*年?(?!\d)/, (m) => [Number(m[1]), 12, 31]],
];

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

const PREFIX = new RegExp(
  `^(?:${lexicon.deadlinePrefixes.map(escapeRegExp).join("|")})\\s*[:：]?\\s*`,
  "i"
);

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Normalizes a deadline to `YYYY-MM-DD`. */
export function standardizeDeadline(text: string): Parsed<string> {
  const stripped = text.trim().replace(PREFIX, "");
  for (const [pattern, read] of DATE_PATTERNS) {
    const match = stripped.match(pattern);
    if (!match) continue;
    const [year, month, day] = read(match);
    if (month < 1 || month > 12 || day < 1 || day > lastDayOf(year, month)) {
      return unparsed(text);
    }
    return parsed(`${year}-${pad(month)}-${pad(day)}`);
  }
  return unparsed(text);
}

/** Whole days from the UTC calendar date of `now` to `isoDate`. */
export function daysUntil(isoDate: string, now: Date): number {
  const today = Date.UTC(
    now.getUTCFullYear(),
    now.getUTCMonth(),
    now.getUTCDate()
  );
  return Math.round((Date.parse(`${isoDate}T00:00:00Z`) - today) / DAY_MS);
}

export class DeadlineFilter implements Filter {
  readonly kind = "deadline";
  readonly weight: number;
  readonly hard: boolean;

  constructor(private readonly config: DeadlineFilterConfig) {
    this.weight = config.weight;
    this.hard = config.is_hard_filter;
  }

  evaluate(posting: Posting, env: FilterEnv): FilterResult {
    const text = posting.deadline?.trim() ?? "";
    if (!text) {
      return filterResult(
        0.8,
        "No deadline",
        {},
        "No explicit deadline; apply soon"
      );
    }

    const deadline = standardizeDeadline(text);
    if (!deadline.ok) {
      return filterResult(
        NEEDS_CONFIRMATION,
        "Deadline needs confirmation",
        { original: text },
        "Confirm the deadline manually"
      );
    }

    const daysLeft = daysUntil(deadline.value, env.now);
    const details = { deadline: deadline.value, daysLeft };

    if (daysLeft < 0) {
      return filterResult(0, "Applications closed", {
        ...details,
        rejectReason: "expired_deadline",
      });
    }
    if (daysLeft <= this.config.urgent_days) {
      return filterResult(
        0.7,
        `Closing soon (${daysLeft} days)`,
        details,
        `${daysLeft} days left; apply now`
      );
    }
    if (daysLeft <= this.config.soon_days) {
      return filterResult(
        0.9,
        `Closing this week (${daysLeft} days)`,
        details,
        `${daysLeft} days left; prioritize`
      );
    }
    return filterResult(
      1.0,
      `Open (${daysLeft} days left)`,
      details,
      `${daysLeft} days to prepare`
    );
  }
}
