import type { CompanyFilterConfig } from "../config.js";
import { filterResult, includesAny, type Filter } from "../filter/types.js";
import type { FilterResult, Posting } from "../postings/types.js";

export type CompanyTier = "tier1" | "tier2" | "tier3" | "large" | "small";

const TIER_SCORES: Record<CompanyTier, number> = {
  tier1: 1.0,
  tier2: 0.9,
  tier3: 0.8,
  large: 0.5,
  small: 0.3,
};

const TIER_SUGGESTIONS: Record<CompanyTier, string> = {
  tier1: "Top-tier employer",
  tier2: "Well-known AI company with strong engineering",
  tier3: "Established internet company",
  large: "Research the company background",
  small: "Small company; weigh its growth prospects",
};

/** Reputation by tier list; highest tier wins. */
export class CompanyFilter implements Filter {
  readonly kind = "company";
  readonly weight: number;
  readonly hard = false;

  constructor(private readonly config: CompanyFilterConfig) {
    this.weight = config.weight;
  }

  classify(company: string): { tier: CompanyTier; matched?: string } {
    const lists: Array<[CompanyTier, string[]]> = [
      ["tier1", this.config.tier1_companies],
      ["tier2", this.config.tier2_companies],
      ["tier3", this.config.tier3_companies],
    ];
    for (const [tier, names] of lists) {
      const matched = includesAny(company, names);
      if (matched) return { tier, matched };
    }
    if (includesAny(company, this.config.large_enterprise_keywords)) {
      return { tier: "large" };
    }
    return { tier: "small" };
  }

  evaluate(posting: Posting): FilterResult {
    const company = posting.company?.trim() ?? "";
    if (!company) {
      return filterResult(TIER_SCORES.small, "No company information");
    }

    const { tier, matched } = this.classify(company);
    const label = matched ? `${tier} (${matched})` : `${tier} (${company})`;
    return filterResult(
      TIER_SCORES[tier],
      `Company ${label}`,
      matched
        ? { companyTier: tier, matchedCompany: matched }
        : { companyTier: tier },
      TIER_SUGGESTIONS[tier]
    );
  }
}
