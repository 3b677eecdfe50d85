import type { LocationFilterConfig } from "../config.js";
import { lexicon } from "../data/lexicon.js";
import type { FilterResult, Posting } from "../postings/types.js";
import { NEEDS_CONFIRMATION } from "./parsing.js";
import { filterResult, includesAny, type Filter } from "./types.js";

export class LocationFilter implements Filter {
  readonly kind = "location";
  readonly weight: number;
  readonly hard: boolean;

  constructor(private readonly config: LocationFilterConfig) {
    this.weight = config.weight;
    this.hard = config.is_hard_filter;
  }

  evaluate(posting: Posting): FilterResult {
    const location = posting.location?.trim() ?? "";
    if (!location) {
      return filterResult(NEEDS_CONFIRMATION, "No location information");
    }

    const rejected = includesAny(location, this.config.rejected_cities);
    if (rejected) {
      return filterResult(0, `Rejected city (${rejected})`, {
        matchedCity: rejected,
        rejectReason: "rejected_city",
      });
    }

    if (includesAny(location, lexicon.remoteKeywords)) {
      return filterResult(
        1.0,
        "Remote work",
        { locationType: "remote" },
        "Remote position, no relocation needed"
      );
    }

    const preferred = includesAny(location, this.config.preferred_cities);
    if (preferred) {
      return filterResult(
        1.0,
        `Preferred city (${preferred})`,
        { matchedCity: preferred, locationType: "preferred" },
        `${preferred} is a preferred city`
      );
    }

    const acceptable = includesAny(location, this.config.acceptable_cities);
    if (acceptable) {
      return filterResult(
        0.8,
        `Acceptable city (${acceptable})`,
        { matchedCity: acceptable, locationType: "acceptable" },
        `${acceptable} is acceptable`
      );
    }

    return filterResult(
      0.4,
      `Other city (${location})`,
      { location, locationType: "other" },
      "Weigh the cost of relocating"
    );
  }
}
