import type { ExperienceFilterConfig } from "../config.js";
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

export type ExperienceRequirement =
  | { kind: "fresh_graduate" }
  | { kind: "unlimited" }
  | { kind: "at_least"; min: number }
  | { kind: "range"; min: number; max: number };

const YEARS = String.raw`(?:年|\s*years?|\s*yrs?)`;
const NUM = String.raw`(\d+(?:\.\d+)?)`;

const RANGE = new RegExp(`${NUM}\\s*[-~～到至]\\s*${NUM}${YEARS}`, "i");
const AT_LEAST = [
  new RegExp(`${NUM}\\s*年以上`),
  new RegExp(`${NUM}\\s*\\+\\s*${YEARS}`, "i"),
  new RegExp(`${NUM}${YEARS}\\s*(?:\\+|or more|and above)`, "i"),
];
const EXACT = new RegExp(`${NUM}${YEARS}`, "i");

export function parseExperience(text: string): Parsed<ExperienceRequirement> {
  if (
    includesAny(text, lexicon.freshGraduateKeywords) ||
    includesAny(text, lexicon.internshipKeywords)
  ) {
    return parsed({ kind: "fresh_graduate" });
  }
  if (includesAny(text, lexicon.unlimitedExperienceKeywords)) {
    return parsed({ kind: "unlimited" });
  }

  const range = text.match(RANGE);
  if (range) {
    return parsed({
      kind: "range",
      min: Number(range[1]),
      max: Number(range[2]),
    });
  }
  for (const pattern of AT_LEAST) {
    const match = text.match(pattern);
    if (match) return parsed({ kind: "at_least", min: Number(match[1]) });
  }
  const exact = text.match(EXACT);
  if (exact) {
    const years = Number(exact[1]);
    return parsed({
      kind: "range",
      min: Math.max(0, years - 0.5),
      max: years + 0.5,
    });
  }
  return unparsed(text);
}

export function experienceScore(
  userYears: number,
  requirement: ExperienceRequirement
): number {
  switch (requirement.kind) {
    case "fresh_graduate":
      return userYears <= 2 ? 0.9 : 0.5;
    case "unlimited":
      return 0.8;
    case "at_least":
      if (userYears >= requirement.min) {
        return userYears <= requirement.min + 2 ? 1.0 : 0.8;
      }
      return requirement.min - userYears <= 1 ? 0.6 : 0.2;
    case "range":
      if (userYears < requirement.min) {
        return requirement.min - userYears <= 1 ? 0.6 : 0.2;
      }
      return userYears <= requirement.max ? 1.0 : 0.8;
  }
}

function experienceSuggestion(
  userYears: number,
  requirement: ExperienceRequirement,
  score: number
): string {
  if (requirement.kind === "fresh_graduate") return "Open to fresh graduates";
  if (score >= 0.9) return "Experience fully matches";
  if (score >= 0.6) return "Experience roughly matches";
  const min = requirement.kind === "unlimited" ? 0 : requirement.min;
  if (userYears < min) {
    return `${(min - userYears).toFixed(1)} years short; highlight project work`;
  }
  return "Experience well above the requirement";
}

export class ExperienceFilter implements Filter {
  readonly kind = "experience";
  readonly weight: number;
  readonly hard: boolean;

  constructor(config: ExperienceFilterConfig) {
    this.weight = config.weight;
    this.hard = config.is_hard_filter;
  }

  evaluate(posting: Posting, env: FilterEnv): FilterResult {
    const text = posting.experience?.trim() ?? "";
    if (!text) {
      return filterResult(
        0.7,
        "No experience requirement",
        {},
        "Experience requirement unclear, worth applying"
      );
    }

    const requirement = parseExperience(text);
    if (!requirement.ok) {
      return filterResult(
        NEEDS_CONFIRMATION,
        "Experience requirement needs confirmation",
        { experienceText: text },
        "Read the experience requirement manually"
      );
    }

    const userYears = env.profile.experience_years;
    const score = experienceScore(userYears, requirement.value);
    const verdict =
      score >= 0.9
        ? "matches"
        : score >= 0.6
          ? "roughly matches"
          : "does not match";
    return filterResult(
      score,
      `Experience ${verdict} (${userYears} years)`,
      { requirement: requirement.value, userYears },
      experienceSuggestion(userYears, requirement.value, score)
    );
  }
}
