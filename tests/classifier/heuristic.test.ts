import { describe, it, expect } from "vitest";
import {
  extractKeywordsHeuristically,
  HeuristicKeywordExtractor,
} from "../../src/classifier/heuristic.js";

describe("extractKeywordsHeuristically", () => {
  it("finds team, product and business-line terms", () => {
    expect(extractKeywordsHeuristically("抖音推荐系统 大模型")).toEqual([
      "抖音",
      "抖音推荐系统",
      "大模型",
    ]);
  });

  it("finds a cloud team name", () => {
    expect(extractKeywordsHeuristically("华为云AI团队招聘大模型工程师")).toEqual([
      "华为云AI团队",
      "大模型",
    ]);
  });

  it("keeps at most three distinct terms", () => {
    expect(extractKeywordsHeuristically("微信 抖音 淘宝 钉钉 微信")).toEqual([
      "微信",
      "抖音",
      "淘宝",
    ]);
  });

  it("returns nothing for generic text", () => {
    expect(extractKeywordsHeuristically("Backend engineer, Go")).toEqual([]);
  });
});

describe("HeuristicKeywordExtractor", () => {
  it("resolves the pattern result", async () => {
    await expect(new HeuristicKeywordExtractor().extract("使用ChatGPT")).resolves.toEqual([
      "ChatGPT",
    ]);
  });
});
