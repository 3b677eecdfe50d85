import * as core from "@actions/core";
import type { KeywordExtractor } from "../classifier/keywords.js";
import type { DomainFilterConfig } from "../config.js";
import { describePosting, type RunContext } from "../context.js";
import type { FingerprintedPosting, Posting } from "../postings/types.js";
import { canonicalizeCompany, canonicalizeLocation } from "./canonical.js";

const KEYWORD_WEIGHT = 0.4;
const COMPANY_WEIGHT = 0.3;
const DOMAIN_WEIGHT = 0.2;
const LOCATION_WEIGHT = 0.1;

type DomainTier = "core" | "ai" | "related";

export interface SemanticDedupResult {
  unique: FingerprintedPosting[];
  semanticDuplicates: number;
}

function jaccard<T>(a: Set<T>, b: Set<T>): number {
  if (a.size === 0 && b.size === 0) return 0;
  let intersection = 0;
  for (const item of a) if (b.has(item)) intersection++;
  return intersection / (a.size + b.size - intersection);
}

function lowerSet(keywords: string[]): Set<string> {
  return new Set(
    keywords.map((kw) => kw.trim().toLowerCase()).filter((kw) => kw.length > 0)
  );
}

export function buildPostingText(posting: Posting): string {
  const parts: string[] = [];
  if (posting.title) parts.push(`title: ${posting.title}`);
  if (posting.company) parts.push(`company: ${posting.company}`);
  if (posting.location) parts.push(`location: ${posting.location}`);
  if (posting.description) parts.push(`description: ${posting.description}`);
  return parts.join("\n");
}

export function keywordOverlap(a: string[], b: string[]): number {
  return jaccard(lowerSet(a), lowerSet(b));
}

export function companySimilarity(a?: string, b?: string): number {
  const left = canonicalizeCompany(a);
  const right = canonicalizeCompany(b);
  if (!left || !right) return 0;
  if (left === right) return 1;
  if (left.includes(right) || right.includes(left)) return 0.8;
  return 0;
}

export function citySimilarity(a?: string, b?: string): number {
  const left = canonicalizeLocation(a);
  const right = canonicalizeLocation(b);
  return left !== "" && left === right ? 1 : 0;
}

function domainTiersOf(
  keywords: Set<string>,
  taxonomy: DomainFilterConfig
): Set<DomainTier> {
  const tiers: Array<[DomainTier, string[]]> = [
    ["core", taxonomy.core_domains],
    ["ai", taxonomy.ai_domains],
    ["related", taxonomy.related_domains],
  ];
  const found = new Set<DomainTier>();
  for (const [tier, terms] of tiers) {
    const lowered = terms.map((t) => t.toLowerCase());
    for (const keyword of keywords) {
      if (lowered.some((term) => keyword.includes(term))) {
        found.add(tier);
        break;
      }
    }
  }
  return found;
}

export function domainOverlap(
  a: string[],
  b: string[],
  taxonomy: DomainFilterConfig
): number {
  const left = domainTiersOf(lowerSet(a), taxonomy);
  const right = domainTiersOf(lowerSet(b), taxonomy);
  if (left.size === 0 || right.size === 0) return 0;
  return jaccard(left, right);
}

export interface KeywordedPosting {
  posting: Posting;
  keywords: string[];
}

export function semanticSimilarity(
  a: KeywordedPosting,
  b: KeywordedPosting,
  taxonomy: DomainFilterConfig
): number {
  return (
    keywordOverlap(a.keywords, b.keywords) * KEYWORD_WEIGHT +
    companySimilarity(a.posting.company, b.posting.company) * COMPANY_WEIGHT +
    domainOverlap(a.keywords, b.keywords, taxonomy) * DOMAIN_WEIGHT +
    citySimilarity(a.posting.location, b.posting.location) * LOCATION_WEIGHT
  );
}

/**
 * Greedy online clustering: each posting is compared only with postings already
 * accepted in this pass, so the first member of a cluster is its representative.
 * Must stay sequential; acceptance order defines the result.
 */
export async function semanticDedup(
  postings: FingerprintedPosting[],
  extractor: KeywordExtractor,
  ctx: RunContext
): Promise<SemanticDedupResult> {
  const { similarity_threshold: threshold } = ctx.config.dedup.semantic;
  const taxonomy = ctx.config.filters.advanced.domain;
  const accepted: KeywordedPosting[] = [];
  const unique: FingerprintedPosting[] = [];
  let semanticDuplicates = 0;

  for (const posting of postings) {
    const keywords = await extractor.extract(
      buildPostingText(posting),
      ctx.signal
    );
    const current: KeywordedPosting = { posting, keywords };

    if (keywords.length === 0) {
      unique.push({ ...posting, keywords });
      continue;
    }

    let duplicateOf: KeywordedPosting | undefined;
    let similarity = 0;
    for (const candidate of accepted) {
      similarity = semanticSimilarity(current, candidate, taxonomy);
      if (similarity >= threshold) {
        duplicateOf = candidate;
        break;
      }
    }

    if (duplicateOf) {
      semanticDuplicates++;
      ctx.diagnostics.record({
        stage: "semantic",
        posting: describePosting(posting),
        message: `near-duplicate of ${describePosting(duplicateOf.posting)}`,
        details: {
          similarity: Number(similarity.toFixed(3)),
          keywords,
          matchedKeywords: duplicateOf.keywords,
        },
      });
      continue;
    }

    accepted.push(current);
    unique.push({ ...posting, keywords });
  }

  core.info(
    `Semantic dedup: ${postings.length} → ${unique.length} postings (threshold ${threshold})`
  );
  return { unique, semanticDuplicates };
}
