import type { GraduationFilterConfig } from "../config.js";
import { lexicon } from "../data/lexicon.js";
import type { FilterResult, Posting } from "../postings/types.js";
import {
  NEEDS_CONFIRMATION,
  parsed,
  unparsed,
  type Parsed,
} from "./parsing.js";
import {
  filterResult,
  includesAny,
  type Filter,
  type FilterEnv,
} from "./types.js";

export interface YearMonth {
  year: number;
  month: number;
}

export type GraduationRequirement =
  | { kind: "window"; start: YearMonth; end: YearMonth }
  | { kind: "cohorts"; years: number[] }
  | { kind: "fresh_graduate" };

const YM = String.raw`(\d{4})\s*[.\-/年]\s*(\d{1,2})\s*月?`;
const WINDOW = new RegExp(`${YM}\\s*[-~～到至]\\s*${YM}`);
const COHORT = /(?<!\d)(\d{4}|\d{2})\s*届/g;

// Recruiting cohorts run September to August: a December 2023 graduate is in the 2024 cohort.
const COHORT_START_MONTH = 9;

export function parseYearMonth(text: string): YearMonth | undefined {
  const match = text.trim().match(/^(\d{4})-(\d{2})$/);
  if (!match) return undefined;
  const month = Number(match[2]);
  if (month < 1 || month > 12) return undefined;
  return { year: Number(match[1]), month };
}

export function cohortOf(date: YearMonth): number {
  return date.month >= COHORT_START_MONTH ? date.year + 1 : date.year;
}

function monthIndex(date: YearMonth): number {
  return date.year * 12 + (date.month - 1);
}

export function parseGraduation(text: string): Parsed<GraduationRequirement> {
  const window = text.match(WINDOW);
  if (window) {
    return parsed({
      kind: "window",
      start: { year: Number(window[1]), month: Number(window[2]) },
      end: { year: Number(window[3]), month: Number(window[4]) },
    });
  }

  const years = [...text.matchAll(COHORT)].map((m) =>
    m[1].length === 2 ? 2000 + Number(m[1]) : Number(m[1])
  );
  if (years.length > 0) {
    return parsed({ kind: "cohorts", years: [...new Set(years)] });
  }

  if (includesAny(text, lexicon.freshGraduateKeywords)) {
    return parsed({ kind: "fresh_graduate" });
  }
  return unparsed(text);
}

export class GraduationFilter implements Filter {
  readonly kind = "graduation";
  readonly weight: number;
  readonly hard: boolean;

  constructor(config: GraduationFilterConfig) {
    this.weight = config.weight;
    this.hard = config.is_hard_filter;
  }

  evaluate(posting: Posting, env: FilterEnv): FilterResult {
    const text = posting.graduation?.trim() ?? "";
    if (!text) {
      return filterResult(
        0.8,
        "No graduation requirement",
        {},
        "No explicit graduation window"
      );
    }

    const requirement = parseGraduation(text);
    if (!requirement.ok) {
      return filterResult(
        NEEDS_CONFIRMATION,
        "Graduation requirement needs confirmation",
        { requirement: text },
        "Confirm the graduation requirement manually"
      );
    }

    const user = parseYearMonth(env.profile.graduation);
    if (!user) {
      return filterResult(
        NEEDS_CONFIRMATION,
        "Profile graduation date unreadable",
        { requirement: text }
      );
    }

    const req = requirement.value;
    switch (req.kind) {
      case "window": {
        const inside =
          monthIndex(req.start) <= monthIndex(user) &&
          monthIndex(user) <= monthIndex(req.end);
        return inside
          ? filterResult(
              1.0,
              "Graduation date inside the window",
              { requirement: req },
              "Graduation date fits"
            )
          : filterResult(0, "Graduation date outside the window", {
              requirement: req,
              rejectReason: "outside_window",
            });
      }
      case "cohorts": {
        const cohort = cohortOf(user);
        if (req.years.includes(cohort)) {
          return filterResult(
            1.0,
            `${cohort} cohort matches`,
            { requirement: req, userCohort: cohort },
            "Graduation cohort matches"
          );
        }
        const expired = Math.max(...req.years) < cohort;
        const years = req.years.join("/");
        return filterResult(
          0,
          expired
            ? `Cohort ${years} already closed`
            : `Cohort ${years} does not match`,
          {
            requirement: req,
            userCohort: cohort,
            rejectReason: expired
              ? "expired_graduation"
              : "graduation_mismatch",
          }
        );
      }
      case "fresh_graduate":
        return filterResult(
          0.8,
          "Fresh graduate hiring",
          { requirement: req },
          "Campus hiring; check the detailed requirements"
        );
    }
  }
}
