import { describe, it, expect, vi } from "vitest";
import { TriageConfigSchema } from "../../src/config.js";
import { createRunContext } from "../../src/context.js";
import { fingerprintPosting } from "../../src/dedup/canonical.js";
import {
  applyBasicFilters,
  buildBasicFilters,
  evaluateBasic,
  weightedAverage,
} from "../../src/filter/engine.js";
import type { Filter, FilterEnv } from "../../src/filter/types.js";
import type { FingerprintedPosting, Posting } from "../../src/postings/types.js";

vi.mock("@actions/core", () => ({
  info: vi.fn(),
  debug: vi.fn(),
}));

const now = new Date("2024-03-10T00:00:00Z");
const config = TriageConfigSchema.parse({});
const env: FilterEnv = { now, profile: config.profile };
const filters = buildBasicFilters(config);

const ideal: Posting = {
  title: "算法工程师",
  company: "腾讯",
  salary: "28-32k",
  location: "北京",
  experience: "1-3年",
  graduation: "2024届",
  deadline: "2024-04-30",
};

function fingerprinted(posting: Posting): FingerprintedPosting {
  return { ...posting, fingerprints: fingerprintPosting(posting) };
}

describe("buildBasicFilters", () => {
  it("orders the enabled filters", () => {
    expect(filters.map((f) => f.kind)).toEqual([
      "salary",
      "location",
      "experience",
      "graduation",
      "deadline",
    ]);
  });

  it("leaves out disabled filters", () => {
    const partial = TriageConfigSchema.parse({
      filters: { basic: { location: { enabled: false }, deadline: { enabled: false } } },
    });
    expect(buildBasicFilters(partial).map((f) => f.kind)).toEqual([
      "salary",
      "experience",
      "graduation",
    ]);
  });
});

describe("weightedAverage", () => {
  it("falls back when there is no weight", () => {
    expect(weightedAverage([], 0.5)).toBe(0.5);
    expect(weightedAverage([{ score: 1, weight: 0 }], 0.5)).toBe(0.5);
  });
});

describe("evaluateBasic", () => {
  it("passes an ideal posting with a full score", () => {
    const result = evaluateBasic(ideal, filters, env, 0.3);

    expect(result.state).toBe("PASSED");
    expect(result.score).toBe(1);
    expect(Object.keys(result.trail)).toHaveLength(5);
  });

  it("rejects a low salary whatever the other fields say", () => {
    const result = evaluateBasic({ ...ideal, salary: "10-12k" }, filters, env, 0);

    expect(result.state).toBe("REJECTED");
    expect(result.rejectedBy).toBe("salary");
    expect(result.score).toBe(0);
    expect(Object.keys(result.trail)).toEqual(["salary"]);
  });

  it("averages the filter scores by weight", () => {
    const posting: Posting = { salary: "20-30k", location: "长沙" };
    const result = evaluateBasic(posting, filters, env, 0.3);

    // salary 0.8*0.3 + location 0.4*0.2 + experience 0.7*0.3 + graduation 0.8*0.1 + deadline 0.8*0.1
    expect(result.score).toBeCloseTo(0.69);
    expect(result.state).toBe("PASSED");
  });

  it("soft-drops postings below the global threshold", () => {
    const result = evaluateBasic({ salary: "20-30k", location: "长沙" }, filters, env, 0.9);
    expect(result.state).toBe("SOFT_DROPPED");
  });

  it("turns a bound violation into a low score when the filter is not hard", () => {
    const soft = TriageConfigSchema.parse({
      filters: { basic: { salary: { is_hard_filter: false } } },
    });
    const result = evaluateBasic({ ...ideal, salary: "10-12k" }, buildBasicFilters(soft), env, 0.3);

    expect(result.state).toBe("PASSED");
    expect(result.trail.salary?.score).toBe(0.1);
    expect(result.trail.salary?.details.softened).toBe(true);
    // 0.1*0.3 + 1.0*0.7
    expect(result.score).toBeCloseTo(0.73);
  });

  it("returns a neutral score when no filter is enabled", () => {
    const result = evaluateBasic(ideal, [], env, 0.3);
    expect(result).toEqual({ state: "PASSED", score: 0.5, trail: {} });
  });

  it("keeps every filter score within [0, 1]", () => {
    const samples: Posting[] = [
      ideal,
      {},
      { salary: "面议", location: "Remote", experience: "10年以上", graduation: "应届", deadline: "2025" },
      { salary: "100k+", location: "长沙", experience: "经验不限", graduation: "2023.1-2023.6", deadline: "??" },
      { salary: "5k", experience: "3+ years", graduation: "2030届", deadline: "2024-03-11" },
    ];
    for (const posting of samples) {
      for (const filter of filters) {
        const { score } = filter.evaluate(posting, env);
        expect(score).toBeGreaterThanOrEqual(0);
        expect(score).toBeLessThanOrEqual(1);
      }
    }
  });
});

describe("applyBasicFilters", () => {
  it("partitions postings and counts rejections per filter", () => {
    const ctx = createRunContext(config, { now });
    const outcome = applyBasicFilters(
      [
        fingerprinted(ideal),
        fingerprinted({ ...ideal, title: "低薪", salary: "10-12k" }),
        fingerprinted({ ...ideal, title: "错届", graduation: "2025届" }),
      ],
      filters,
      ctx
    );

    expect(outcome.passed.map((p) => p.posting.title)).toEqual(["算法工程师"]);
    expect(outcome.passed[0].basicScore).toBe(1);
    expect(outcome.rejected).toBe(2);
    expect(outcome.rejectedBy).toEqual({ salary: 1, graduation: 1 });
    expect(ctx.diagnostics.count("basic")).toBe(2);
    expect(ctx.diagnostics.entries[0].message).toBe("rejected: Salary too low (12k < 15k)");
  });

  it("passes a posting through with a neutral score when a filter throws", () => {
    const broken: Filter = {
      kind: "salary",
      weight: 1,
      hard: true,
      evaluate: () => {
        throw new Error("boom");
      },
    };
    const ctx = createRunContext(config, { now });
    const outcome = applyBasicFilters([fingerprinted(ideal)], [broken], ctx);

    expect(outcome.passed).toHaveLength(1);
    expect(outcome.passed[0].basicScore).toBe(0.5);
    expect(outcome.errors).toBe(1);
    expect(ctx.diagnostics.entries[0].message).toBe("filter error, passed through: boom");
  });
});
