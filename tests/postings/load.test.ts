import { describe, it, expect, vi } from "vitest";
import { join } from "node:path";
import * as core from "@actions/core";
import { PostingsFileError } from "../../src/errors.js";
import { loadPostings, parsePostings } from "../../src/postings/load.js";

vi.mock("@actions/core", () => ({
  warning: vi.fn(),
}));

const fixturePath = join(__dirname, "..", "fixtures", "postings.json");

describe("loadPostings", () => {
  it("reads postings and normalizes field types", () => {
    const postings = loadPostings(fixturePath);

    expect(postings).toEqual([
      {
        title: "算法工程师",
        company: "腾讯",
        location: "深圳",
        salary: "25-35k",
        url: "https://www.zhipin.com/job_detail/abc123.html",
        graduation: "2024",
      },
      { title: "后端开发", company: "字节跳动", deadline: "2024-04-30" },
    ]);
    expect(postings[0]).not.toHaveProperty("experience");
  });

  it("warns about entries that are not postings", () => {
    loadPostings(fixturePath);

    expect(core.warning).toHaveBeenCalledWith(
      `Skipping posting #1 in ${fixturePath}: not a posting object`
    );
  });

  it("fails on a missing file", () => {
    expect(() => loadPostings(join(__dirname, "no-such-file.json"))).toThrow(PostingsFileError);
  });
});

describe("parsePostings", () => {
  it("rejects invalid JSON", () => {
    expect(() => parsePostings("[{", "feed.json")).toThrow(
      /^Postings file feed\.json is not valid JSON: /
    );
  });

  it("rejects a document that is not an array", () => {
    expect(() => parsePostings('{"title": "x"}', "feed.json")).toThrow(
      "Postings file feed.json must contain a JSON array"
    );
  });

  it("keeps a posting and drops only its badly typed fields", () => {
    const postings = parsePostings(
      JSON.stringify([
        { title: "算法工程师", company: "腾讯", salary: { min: 20, max: 30 } },
        { title: "后端开发", company: "美团", experience: false },
      ]),
      "feed.json"
    );

    expect(postings).toEqual([
      { title: "算法工程师", company: "腾讯" },
      { title: "后端开发", company: "美团" },
    ]);
    expect(core.warning).toHaveBeenCalledWith(
      "Posting #0 in feed.json: ignoring salary, which is not text"
    );
    expect(core.warning).toHaveBeenCalledWith(
      "Posting #1 in feed.json: ignoring experience, which is not text"
    );
  });

  it("skips entries that are not objects", () => {
    expect(parsePostings('[null, ["x"], 3, {"title": "y"}]', "feed.json")).toEqual([
      { title: "y" },
    ]);
  });
});
