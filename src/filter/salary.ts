import type { SalaryFilterConfig } from "../config.js";
import { lexicon } from "../data/lexicon.js";
import type { FilterResult, Posting } from "../postings/types.js";
import {
  NEEDS_CONFIRMATION,
  parsed,
  round1,
  unparsed,
  type Parsed,
} from "./parsing.js";
import { filterResult, includesAny, type Filter } from "./types.js";

/** Monthly salary in thousands. */
export type SalaryQuote =
  | { kind: "range"; min: number; max: number; months?: number }
  | { kind: "negotiable" };

type RangeReader = (match: RegExpMatchArray) => { min: number; max: number };

const NUM = String.raw`(\d+(?:\.\d+)?)`;
const DASH = String.raw`\s*[-~～到至]\s*`;

const RANGE_PATTERNS: Array<[RegExp, RangeReader]> = [
  [new RegExp(`${NUM}\\s*[kK]${DASH}${NUM}\\s*[kK]`), (m) => pair(m, 1)],
  [new RegExp(`${NUM}${DASH}${NUM}\\s*[kK]`), (m) => pair(m, 1)],
  [new RegExp(`${NUM}${DASH}${NUM}\\s*万`), (m) => pair(m, 10)],
  [
    new RegExp(`${NUM}\\s*(?:\\+\\s*[kK]|[kK]\\s*\\+)`),
    (m) => scaled(m, 1, 1.3),
  ],
  [new RegExp(`${NUM}\\s*万\\s*\\+`), (m) => scaled(m, 10, 13)],
  [new RegExp(`${NUM}\\s*[kK]`), (m) => scaled(m, 0.9, 1.1)],
];

const MONTHS_PATTERN = /[·•.*×]\s*(\d{2})\s*薪/;

const DESCRIPTION_PATTERNS = [
  /\d+(?:\.\d+)?\s*[kK]\s*[-~～到至]\s*\d+(?:\.\d+)?\s*[kK]/,
  /\d+(?:\.\d+)?\s*[-~～到至]\s*\d+(?:\.\d+)?\s*[kK万]/,
  /(?:薪资|月薪|salary)\s*[:：]\s*\d+(?:\.\d+)?\s*[kK万]\+?/i,
];

function pair(
  match: RegExpMatchArray,
  unit: number
): { min: number; max: number } {
  return {
    min: round1(Number(match[1]) * unit),
    max: round1(Number(match[2]) * unit),
  };
}

function scaled(
  match: RegExpMatchArray,
  low: number,
  high: number
): { min: number; max: number } {
  const base = Number(match[1]);
  return { min: round1(base * low), max: round1(base * high) };
}

export function parseSalary(text: string): Parsed<SalaryQuote> {
  const months = text.match(MONTHS_PATTERN);
  for (const [pattern, read] of RANGE_PATTERNS) {
    const match = text.match(pattern);
    if (!match) continue;
    const { min, max } = read(match);
    return parsed({
      kind: "range",
      min: Math.min(min, max),
      max: Math.max(min, max),
      ...(months ? { months: Number(months[1]) } : {}),
    });
  }
  if (includesAny(text, lexicon.negotiableSalaryKeywords)) {
    return parsed({ kind: "negotiable" });
  }
  return unparsed(text);
}

export function salaryFromDescription(description: string | undefined): string {
  if (!description) return "";
  for (const pattern of DESCRIPTION_PATTERNS) {
    const match = description.match(pattern);
    if (match) return match[0];
  }
  return "";
}

/** Banded by relative distance of the range midpoint from the target. */
export function salaryScore(mid: number, target: number): number {
  const deviation = Math.abs(mid - target) / target;
  if (deviation <= 0.1) return 1.0;
  if (deviation <= 0.3) return 0.8;
  if (deviation <= 0.5) return 0.6;
  return 0.3;
}

function salarySuggestion(mid: number, target: number): string {
  const ratio = mid / target;
  if (ratio >= 1.2) {
    return `Pays ${Math.round((ratio - 1) * 100)}% above target`;
  }
  if (ratio >= 1.0) return "Salary meets target";
  if (ratio >= 0.8) return "Salary slightly below target";
  return `Pays ${Math.round((1 - ratio) * 100)}% below target`;
}

export class SalaryFilter implements Filter {
  readonly kind = "salary";
  readonly weight: number;
  readonly hard: boolean;

  constructor(private readonly config: SalaryFilterConfig) {
    this.weight = config.weight;
    this.hard = config.is_hard_filter;
  }

  evaluate(posting: Posting): FilterResult {
    const fromField = posting.salary?.trim() ?? "";
    const text = fromField || salaryFromDescription(posting.description);
    const source = fromField ? "salary" : "description";

    if (!text) return filterResult(NEEDS_CONFIRMATION, "No salary information");

    const quote = parseSalary(text);
    if (!quote.ok) {
      return filterResult(
        NEEDS_CONFIRMATION,
        "Salary needs confirmation",
        { salaryText: text, source },
        "Check the salary with the employer"
      );
    }
    if (quote.value.kind === "negotiable") {
      return filterResult(NEEDS_CONFIRMATION, "Salary negotiable", {
        salaryText: text,
        source,
      });
    }

    const { min, max, months } = quote.value;
    const {
      hard_min_salary: floor,
      hard_max_salary: ceiling,
      target_salary: target,
    } = this.config;
    const range = { min, max, ...(months ? { months } : {}) };

    if (max < floor) {
      return filterResult(0, `Salary too low (${max}k < ${floor}k)`, {
        salaryRange: range,
        source,
        rejectReason: "below_minimum",
      });
    }
    if (min > ceiling) {
      return filterResult(0, `Salary too high (${min}k > ${ceiling}k)`, {
        salaryRange: range,
        source,
        rejectReason: "above_maximum",
      });
    }

    const mid = (min + max) / 2;
    return filterResult(
      salaryScore(mid, target),
      `Salary ${min}-${max}k`,
      { salaryRange: range, midSalary: mid, targetSalary: target, source },
      salarySuggestion(mid, target)
    );
  }
}
