import type { DomainFilterConfig } from "../config.js";
import { filterResult, type Filter } from "../filter/types.js";
import type { FilterResult, Posting } from "../postings/types.js";

interface DomainMatches {
  core: string[];
  ai: string[];
  related: string[];
}

export function matchDomains(
  text: string,
  config: DomainFilterConfig
): DomainMatches {
  const lowered = text.toLowerCase();
  const hits = (terms: string[]) =>
    terms.filter((term) => term !== "" && lowered.includes(term.toLowerCase()));
  return {
    core: hits(config.core_domains),
    ai: hits(config.ai_domains),
    related: hits(config.related_domains),
  };
}

export class DomainFilter implements Filter {
  readonly kind = "domain";
  readonly weight: number;
  readonly hard = false;

  constructor(private readonly config: DomainFilterConfig) {
    this.weight = config.weight;
  }

  evaluate(posting: Posting): FilterResult {
    const text = [posting.title, posting.description, posting.direction]
      .filter((part) => part !== undefined && part.trim() !== "")
      .join(" ");
    if (!text) {
      return filterResult(
        0.5,
        "No business description",
        {},
        "Posting lacks a business description"
      );
    }

    const matches = matchDomains(text, this.config);
    const details = { ...matches };

    if (matches.core.length > 0) {
      return filterResult(
        1.0,
        `Core domain (${matches.core.slice(0, 2).join(", ")})`,
        details,
        "Closely matches the core focus"
      );
    }
    if (matches.ai.length > 0) {
      return filterResult(
        0.8,
        `AI domain (${matches.ai.slice(0, 2).join(", ")})`,
        details,
        "Matches the AI focus"
      );
    }
    if (matches.related.length > 0) {
      return filterResult(
        0.6,
        `Related domain (${matches.related.slice(0, 2).join(", ")})`,
        details,
        "Related technical area"
      );
    }
    return filterResult(
      0.3,
      "No matching domain",
      details,
      "Business area is a weak match"
    );
  }
}
