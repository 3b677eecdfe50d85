import * as core from "@actions/core";
import type { TriageConfig } from "../config.js";
import type { RunContext } from "../context.js";
import { NEUTRAL_SCORE, weightedAverage } from "../filter/engine.js";
import type { Filter, FilterEnv } from "../filter/types.js";
import type {
  BasicPassedPosting,
  FilterResult,
  FilterTrail,
  RecommendationTier,
  ScoredPosting,
} from "../postings/types.js";
import { CompanyFilter } from "./company.js";
import { DomainFilter } from "./domain.js";

type TierThresholds = TriageConfig["scoring"]["tiers"];

const TIER_SUMMARIES: Record<RecommendationTier, string> = {
  "strongly recommended": "Strong overall match, apply",
  recommended: "Good overall match, worth applying",
  "worth considering": "Partial match, consider it",
  "not recommended": "Weak match, think twice",
};

export function buildAdvancedFilters(config: TriageConfig): Filter[] {
  const advanced = config.filters.advanced;
  const candidates: Array<[boolean, () => Filter]> = [
    [advanced.company.enabled, () => new CompanyFilter(advanced.company)],
    [advanced.domain.enabled, () => new DomainFilter(advanced.domain)],
  ];
  return candidates
    .filter(([enabled]) => enabled)
    .map(([, create]) => create());
}

export function compositeScore(
  basicScore: number,
  advancedScore: number,
  scoring: Pick<TriageConfig["scoring"], "basic_weight" | "advanced_weight">
): number {
  return (
    basicScore * scoring.basic_weight +
    advancedScore * scoring.advanced_weight
  );
}

export function tierFor(
  score: number,
  tiers: TierThresholds
): RecommendationTier {
  if (score >= tiers.strongly_recommended) return "strongly recommended";
  if (score >= tiers.recommended) return "recommended";
  if (score >= tiers.worth_considering) return "worth considering";
  return "not recommended";
}

export function buildSuggestion(
  tier: RecommendationTier,
  results: Array<FilterResult | undefined>,
  maxSuggestions: number
): string {
  const fragments = results
    .map((r) => r?.suggestion?.trim() ?? "")
    .filter((s) => s !== "")
    .slice(0, maxSuggestions);
  return [TIER_SUMMARIES[tier], ...fragments].join(" | ");
}

/**
 * Scores postings that passed the basic filters and ranks them by final
 * score, keeping input order among ties.
 */
export function scorePostings(
  passed: BasicPassedPosting[],
  filters: readonly Filter[],
  ctx: RunContext
): ScoredPosting[] {
  const { scoring } = ctx.config;
  const env: FilterEnv = { now: ctx.now, profile: ctx.config.profile };

  const scored = passed.map(({ posting, basicScore, basic }): ScoredPosting => {
    const advanced: FilterTrail = {};
    const weighted: Array<{ score: number; weight: number }> = [];
    for (const filter of filters) {
      const result = filter.evaluate(posting, env);
      advanced[filter.kind] = result;
      weighted.push({ score: result.score, weight: filter.weight });
    }

    const advancedScore = weightedAverage(weighted, NEUTRAL_SCORE);
    const finalScore = compositeScore(basicScore, advancedScore, scoring);
    const tier = tierFor(finalScore, scoring.tiers);
    const suggestion = buildSuggestion(
      tier,
      [...Object.values(basic), ...Object.values(advanced)],
      scoring.max_suggestions
    );

    return {
      ...posting,
      score: Math.round(finalScore * 100),
      finalScore,
      basicScore,
      advancedScore,
      tier,
      suggestion,
      basic,
      advanced,
    };
  });

  // Array.prototype.sort is stable.
  const ranked = [...scored].sort((a, b) => b.finalScore - a.finalScore);

  const distribution = countTiers(ranked);
  core.info(
    `Scoring: ${ranked.length} postings ranked (${Object.entries(distribution)
      .map(([tier, n]) => `${n} ${tier}`)
      .join(", ")})`
  );
  return ranked;
}

export function countTiers(
  postings: ScoredPosting[]
): Record<RecommendationTier, number> {
  const counts: Record<RecommendationTier, number> = {
    "strongly recommended": 0,
    recommended: 0,
    "worth considering": 0,
    "not recommended": 0,
  };
  for (const posting of postings) counts[posting.tier]++;
  return counts;
}
