import { describe, it, expect } from "vitest";
import { TriageConfigSchema } from "../../src/config.js";
import {
  parseSalary,
  salaryFromDescription,
  salaryScore,
  SalaryFilter,
} from "../../src/filter/salary.js";

const filter = new SalaryFilter(TriageConfigSchema.parse({}).filters.basic.salary);

describe("parseSalary", () => {
  it.each([
    ["20-30k·13薪", { kind: "range", min: 20, max: 30, months: 13 }],
    ["20k-30k", { kind: "range", min: 20, max: 30 }],
    ["2-3万", { kind: "range", min: 20, max: 30 }],
    ["25k+", { kind: "range", min: 25, max: 32.5 }],
    ["3万+", { kind: "range", min: 30, max: 39 }],
    ["30k", { kind: "range", min: 27, max: 33 }],
    ["面议", { kind: "negotiable" }],
  ])("parses %s", (text, expected) => {
    expect(parseSalary(text)).toEqual({ ok: true, value: expected });
  });

  it("reports text it cannot read", () => {
    expect(parseSalary("competitive")).toEqual({ ok: false, text: "competitive" });
  });
});

describe("salaryFromDescription", () => {
  it("finds a range in free text", () => {
    expect(salaryFromDescription("月薪15-25k，五险一金")).toBe("15-25k");
  });

  it("returns empty when nothing matches", () => {
    expect(salaryFromDescription("待遇优厚")).toBe("");
    expect(salaryFromDescription(undefined)).toBe("");
  });
});

describe("salaryScore", () => {
  it("bands by relative distance from the target", () => {
    expect(salaryScore(30, 30)).toBe(1.0);
    expect(salaryScore(25, 30)).toBe(0.8);
    expect(salaryScore(45, 30)).toBe(0.6);
    expect(salaryScore(60, 30)).toBe(0.3);
  });
});

describe("SalaryFilter", () => {
  it("rejects a range entirely below the floor", () => {
    const result = filter.evaluate({ salary: "10-12k" });

    expect(result.score).toBe(0);
    expect(result.reason).toBe("Salary too low (12k < 15k)");
    expect(result.details.rejectReason).toBe("below_minimum");
  });

  it("rejects a range entirely above the ceiling", () => {
    const result = filter.evaluate({ salary: "90-120k" });

    expect(result.score).toBe(0);
    expect(result.details.rejectReason).toBe("above_maximum");
  });

  it("scores a range around the target", () => {
    const result = filter.evaluate({ salary: "28-32k" });

    expect(result.score).toBe(1.0);
    expect(result.reason).toBe("Salary 28-32k");
    expect(result.suggestion).toBe("Salary meets target");
  });

  it("describes how far the salary is from the target", () => {
    expect(filter.evaluate({ salary: "20-30k" }).suggestion).toBe("Salary slightly below target");
    expect(filter.evaluate({ salary: "40-50k" }).suggestion).toBe("Pays 50% above target");
    expect(filter.evaluate({ salary: "10-20k" }).suggestion).toBe("Pays 50% below target");
  });

  it("reads the salary from the description when the field is empty", () => {
    const result = filter.evaluate({ description: "月薪15-25k，五险一金" });

    expect(result.score).toBe(0.6);
    expect(result.details.source).toBe("description");
  });

  it("returns a neutral score for missing or unreadable salaries", () => {
    expect(filter.evaluate({}).score).toBe(0.5);
    expect(filter.evaluate({ salary: "competitive" }).reason).toBe("Salary needs confirmation");
    expect(filter.evaluate({ salary: "面议" }).reason).toBe("Salary negotiable");
  });
});
