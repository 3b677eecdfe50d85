import * as core from "@actions/core";
import type { KeywordExtractor } from "./classifier/keywords.js";
import type { TriageConfig } from "./config.js";
import { createRunContext, type RunContext } from "./context.js";
import {
  crossSessionDedup,
  populateIndex,
  primaryKey,
  type IndexSource,
} from "./dedup/cross-session.js";
import { hasNoIdentity } from "./dedup/canonical.js";
import { localDedup } from "./dedup/local.js";
import { semanticDedup } from "./dedup/semantic.js";
import { errorMessage } from "./errors.js";
import { applyBasicFilters, buildBasicFilters } from "./filter/engine.js";
import type { RunSummary } from "./output/results.js";
import type {
  FilterKind,
  FingerprintedPosting,
  Posting,
  RecommendationTier,
  ScoredPosting,
} from "./postings/types.js";
import {
  buildAdvancedFilters,
  countTiers,
  scorePostings,
} from "./scoring/engine.js";
import type { PostingStore } from "./store/types.js";

export interface PipelineStats {
  postingsFound: number;
  urlDuplicates: number;
  contentDuplicates: number;
  semanticDuplicates: number;
  postingsUnique: number;
  crossSessionDuplicates: number;
  indexSource: IndexSource | "disabled";
  postingsNew: number;
  hardRejected: number;
  rejectedBy: Partial<Record<FilterKind, number>>;
  softDropped: number;
  filterErrors: number;
  postingsRanked: number;
  tiers: Record<RecommendationTier, number>;
}

export interface PipelineResult {
  postingsFound: number;
  postingsUnique: number;
  postingsNew: number;
  postingsRanked: number;
  postingsWritten: number;
  ranked: ScoredPosting[];
  stats: PipelineStats;
}

export interface PipelineDeps {
  load: (config: TriageConfig) => Promise<Posting[]>;
  keywords: KeywordExtractor;
  /** Persisted postings of earlier runs; absent when no database is configured. */
  store?: PostingStore;
  output: (
    ranked: ScoredPosting[],
    summary: RunSummary,
    config: TriageConfig,
    dryRun: boolean
  ) => Promise<number>;
}

export interface PipelineOptions {
  now?: Date;
  signal?: AbortSignal;
}

async function removeNearDuplicates(
  postings: FingerprintedPosting[],
  deps: PipelineDeps,
  ctx: RunContext
): Promise<{ unique: FingerprintedPosting[]; semanticDuplicates: number }> {
  if (!ctx.config.dedup.semantic.enabled) {
    return { unique: postings, semanticDuplicates: 0 };
  }
  try {
    return await semanticDedup(postings, deps.keywords, ctx);
  } catch (error) {
    if (ctx.signal?.aborted) throw error;
    core.warning(
      `Semantic dedup failed, keeping all ${postings.length} postings: ${errorMessage(error)}`
    );
    return { unique: postings, semanticDuplicates: 0 };
  }
}

export async function runPipeline(
  config: TriageConfig,
  deps: PipelineDeps,
  dryRun: boolean,
  options: PipelineOptions = {}
): Promise<PipelineResult> {
  const ctx = createRunContext(config, options);

  core.info("Stage 1/6: Loading postings...");
  const postings = await deps.load(config);
  core.info(`  Found ${postings.length} postings`);

  core.info("Stage 2/6: Removing duplicates within the batch...");
  const local = localDedup(postings);
  const { unique, semanticDuplicates } = await removeNearDuplicates(
    local.unique,
    deps,
    ctx
  );
  core.info(`  ${unique.length} unique postings`);

  core.info("Stage 3/6: Checking postings from earlier runs...");
  let fresh = unique;
  let newKeys = unique.filter((p) => !hasNoIdentity(p)).map(primaryKey);
  let indexSource: PipelineStats["indexSource"] = "disabled";
  let crossSessionDuplicates = 0;
  if (config.dedup.cross_session.enabled) {
    indexSource = await populateIndex(ctx, deps.store);
    const crossSession = crossSessionDedup(unique, ctx);
    fresh = crossSession.fresh;
    newKeys = crossSession.newKeys;
    crossSessionDuplicates = crossSession.duplicates.length;
  }
  core.info(`  ${fresh.length} new postings`);

  core.info("Stage 4/6: Applying eligibility filters...");
  const basic = applyBasicFilters(fresh, buildBasicFilters(config), ctx);
  core.info(`  ${basic.passed.length} postings eligible`);

  core.info("Stage 5/6: Scoring postings...");
  const ranked = scorePostings(basic.passed, buildAdvancedFilters(config), ctx);
  core.info(`  ${ranked.length} postings ranked`);

  const stats: PipelineStats = {
    postingsFound: postings.length,
    urlDuplicates: local.urlDuplicates,
    contentDuplicates: local.contentDuplicates,
    semanticDuplicates,
    postingsUnique: unique.length,
    crossSessionDuplicates,
    indexSource,
    postingsNew: fresh.length,
    hardRejected: basic.rejected,
    rejectedBy: basic.rejectedBy,
    softDropped: basic.softDropped,
    filterErrors: basic.errors,
    postingsRanked: ranked.length,
    tiers: countTiers(ranked),
  };

  core.info("Stage 6/6: Writing results...");
  const postingsWritten = await deps.output(
    ranked,
    {
      generatedAt: ctx.now.toISOString(),
      stats,
      newKeys,
      diagnostics: ctx.diagnostics.entries,
    },
    config,
    dryRun
  );
  core.info(`  ${postingsWritten} postings written`);

  return {
    postingsFound: postings.length,
    postingsUnique: unique.length,
    postingsNew: fresh.length,
    postingsRanked: ranked.length,
    postingsWritten,
    ranked,
    stats,
  };
}
