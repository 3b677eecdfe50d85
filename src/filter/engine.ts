import * as core from "@actions/core";
import type { TriageConfig } from "../config.js";
import { describePosting, type RunContext } from "../context.js";
import { errorMessage } from "../errors.js";
import type {
  BasicPassedPosting,
  FilterKind,
  FilterTrail,
  FingerprintedPosting,
  Posting,
  PostingState,
} from "../postings/types.js";
import { DeadlineFilter } from "./deadline.js";
import { ExperienceFilter } from "./experience.js";
import { GraduationFilter } from "./graduation.js";
import { LocationFilter } from "./location.js";
import { SalaryFilter } from "./salary.js";
import type { Filter, FilterEnv } from "./types.js";

/** Score used when nothing could be evaluated. */
export const NEUTRAL_SCORE = 0.5;

// A bound violation on a filter that is not hard still counts, but low.
const SOFT_VIOLATION_SCORE = 0.1;

export interface BasicEvaluation {
  state: PostingState;
  score: number;
  trail: FilterTrail;
  rejectedBy?: FilterKind;
}

export interface BasicFilterOutcome {
  passed: BasicPassedPosting[];
  rejected: number;
  softDropped: number;
  rejectedBy: Partial<Record<FilterKind, number>>;
  errors: number;
}

/** Enabled basic filters in evaluation order. */
export function buildBasicFilters(config: TriageConfig): Filter[] {
  const basic = config.filters.basic;
  const candidates: Array<[boolean, () => Filter]> = [
    [basic.salary.enabled, () => new SalaryFilter(basic.salary)],
    [basic.location.enabled, () => new LocationFilter(basic.location)],
    [basic.experience.enabled, () => new ExperienceFilter(basic.experience)],
    [basic.graduation.enabled, () => new GraduationFilter(basic.graduation)],
    [basic.deadline.enabled, () => new DeadlineFilter(basic.deadline)],
  ];
  return candidates
    .filter(([enabled]) => enabled)
    .map(([, create]) => create());
}

export function weightedAverage(
  entries: Array<{ score: number; weight: number }>,
  fallback: number
): number {
  let total = 0;
  let weight = 0;
  for (const entry of entries) {
    total += entry.score * entry.weight;
    weight += entry.weight;
  }
  return weight > 0 ? total / weight : fallback;
}

/**
 * PENDING → REJECTED | SOFT_DROPPED | PASSED. Stops at the first hard
 * rejection; later filters could not change the outcome.
 */
export function evaluateBasic(
  posting: Posting,
  filters: readonly Filter[],
  env: FilterEnv,
  globalThreshold: number
): BasicEvaluation {
  const trail: FilterTrail = {};
  const weighted: Array<{ score: number; weight: number }> = [];

  for (const filter of filters) {
    let result = filter.evaluate(posting, env);
    if (result.score === 0) {
      if (filter.hard) {
        trail[filter.kind] = result;
        return { state: "REJECTED", score: 0, trail, rejectedBy: filter.kind };
      }
      result = {
        ...result,
        score: SOFT_VIOLATION_SCORE,
        details: { ...result.details, softened: true },
      };
    }
    trail[filter.kind] = result;
    weighted.push({ score: result.score, weight: filter.weight });
  }

  const score = weightedAverage(weighted, NEUTRAL_SCORE);
  return {
    state: score < globalThreshold ? "SOFT_DROPPED" : "PASSED",
    score,
    trail,
  };
}

export function applyBasicFilters(
  postings: FingerprintedPosting[],
  filters: readonly Filter[],
  ctx: RunContext
): BasicFilterOutcome {
  const threshold = ctx.config.filters.global_threshold;
  const env: FilterEnv = { now: ctx.now, profile: ctx.config.profile };
  const outcome: BasicFilterOutcome = {
    passed: [],
    rejected: 0,
    softDropped: 0,
    rejectedBy: {},
    errors: 0,
  };

  for (const posting of postings) {
    const label = describePosting(posting);
    let evaluation: BasicEvaluation;
    try {
      evaluation = evaluateBasic(posting, filters, env, threshold);
    } catch (error) {
      outcome.errors++;
      ctx.diagnostics.record({
        stage: "basic",
        posting: label,
        message: `filter error, passed through: ${errorMessage(error)}`,
      });
      outcome.passed.push({ posting, basicScore: NEUTRAL_SCORE, basic: {} });
      continue;
    }

    switch (evaluation.state) {
      case "REJECTED": {
        outcome.rejected++;
        const kind = evaluation.rejectedBy;
        if (kind) {
          outcome.rejectedBy[kind] = (outcome.rejectedBy[kind] ?? 0) + 1;
        }
        const reason = kind ? evaluation.trail[kind]?.reason : "hard filter";
        ctx.diagnostics.record({
          stage: "basic",
          posting: label,
          message: `rejected: ${reason}`,
          details: { filter: kind },
        });
        break;
      }
      case "SOFT_DROPPED":
        outcome.softDropped++;
        ctx.diagnostics.record({
          stage: "basic",
          posting: label,
          message:
            `score ${evaluation.score.toFixed(2)} ` +
            `below threshold ${threshold}`,
        });
        break;
      case "PASSED":
        outcome.passed.push({
          posting,
          basicScore: evaluation.score,
          basic: evaluation.trail,
        });
        break;
    }
  }

  core.info(
    `Basic filters: ${outcome.passed.length}/${postings.length} passed ` +
      `(${outcome.rejected} rejected, ${outcome.softDropped} below threshold)`
  );
  return outcome;
}
