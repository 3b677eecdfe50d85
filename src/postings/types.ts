export interface Posting {
  title?: string;
  company?: string;
  location?: string;
  salary?: string;
  description?: string;
  url?: string;
  experience?: string;
  graduation?: string;
  deadline?: string;
  direction?: string;
  platform?: string;
  crawledAt?: string;
  fingerprints?: PostingFingerprints;
  keywords?: string[];
}

export interface PostingFingerprints {
  urlId: string;
  content: string;
}

/** A posting that has been through local dedup and carries both keys. */
export interface FingerprintedPosting extends Posting {
  fingerprints: PostingFingerprints;
}

export type FilterKind =
  | "salary"
  | "location"
  | "experience"
  | "graduation"
  | "deadline"
  | "company"
  | "domain";

export interface FilterResult {
  score: number;
  reason: string;
  suggestion?: string;
  details: Record<string, unknown>;
}

export type FilterTrail = Partial<Record<FilterKind, FilterResult>>;

export type PostingState = "REJECTED" | "SOFT_DROPPED" | "PASSED";

export interface BasicPassedPosting {
  posting: FingerprintedPosting;
  basicScore: number;
  basic: FilterTrail;
}

export type RecommendationTier =
  | "strongly recommended"
  | "recommended"
  | "worth considering"
  | "not recommended";

export interface ScoredPosting extends FingerprintedPosting {
  score: number;
  finalScore: number;
  basicScore: number;
  advancedScore: number;
  tier: RecommendationTier;
  suggestion: string;
  basic: FilterTrail;
  advanced: FilterTrail;
}
