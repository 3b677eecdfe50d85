import type { ProfileConfig } from "../config.js";
import type { FilterKind, FilterResult, Posting } from "../postings/types.js";

export interface FilterEnv {
  now: Date;
  profile: ProfileConfig;
}

/**
 * One scoring rule. `evaluate` is pure: a score of exactly 0 means the
 * posting broke an explicit bound, which only rejects when `hard` is set.
 */
export interface Filter {
  readonly kind: FilterKind;
  readonly weight: number;
  readonly hard: boolean;
  evaluate(posting: Posting, env: FilterEnv): FilterResult;
}

export function filterResult(
  score: number,
  reason: string,
  details: Record<string, unknown> = {},
  suggestion?: string
): FilterResult {
  return suggestion === undefined
    ? { score, reason, details }
    : { score, reason, suggestion, details };
}

export function includesAny(
  text: string,
  terms: readonly string[]
): string | undefined {
  const lowered = text.toLowerCase();
  return terms.find(
    (term) => term !== "" && lowered.includes(term.toLowerCase())
  );
}
