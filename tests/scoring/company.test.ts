import { describe, it, expect } from "vitest";
import { TriageConfigSchema } from "../../src/config.js";
import { CompanyFilter } from "../../src/scoring/company.js";

const filter = new CompanyFilter(TriageConfigSchema.parse({}).filters.advanced.company);

describe("CompanyFilter", () => {
  it("matches tier-1 companies by substring", () => {
    const result = filter.evaluate({ company: "腾讯科技" });

    expect(result.score).toBe(1.0);
    expect(result.details).toEqual({ companyTier: "tier1", matchedCompany: "腾讯" });
  });

  it("scores lower tiers", () => {
    expect(filter.evaluate({ company: "商汤科技" }).score).toBe(0.9);
    expect(filter.evaluate({ company: "携程旅行网" }).score).toBe(0.8);
  });

  it("falls back to large-enterprise keywords", () => {
    const result = filter.evaluate({ company: "某某信息股份有限公司" });

    expect(result.score).toBe(0.5);
    expect(result.details).toEqual({ companyTier: "large" });
  });

  it("gives small and missing companies a low score", () => {
    expect(filter.evaluate({ company: "小蚂蚁工作室" }).score).toBe(0.3);
    expect(filter.evaluate({}).reason).toBe("No company information");
  });

  it("honours custom tier lists", () => {
    const custom = new CompanyFilter(
      TriageConfigSchema.parse({
        filters: { advanced: { company: { tier1_companies: ["Acme"] } } },
      }).filters.advanced.company
    );
    expect(custom.classify("acme robotics")).toEqual({ tier: "tier1", matched: "Acme" });
    expect(custom.classify("腾讯")).toEqual({ tier: "small" });
  });
});
