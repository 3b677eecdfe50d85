import { describe, it, expect } from "vitest";
import {
  canonicalUrlId,
  canonicalizeCompany,
  canonicalizeLocation,
  canonicalizeTitle,
  contentFingerprint,
  fingerprintPosting,
  fingerprintRulesHash,
  hasNoIdentity,
  md5,
} from "../../src/dedup/canonical.js";

describe("canonicalUrlId", () => {
  it("extracts the job id of known boards", () => {
    expect(canonicalUrlId("https://www.zhipin.com/job_detail/abc123.html?ka=search")).toBe("abc123");
    expect(canonicalUrlId("https://www.liepin.com/job/1948213.shtml")).toBe("1948213");
    expect(canonicalUrlId("https://www.lagou.com/jobs/778899.html")).toBe("778899");
  });

  it("falls back to the last path segment without query or fragment", () => {
    expect(canonicalUrlId("https://careers.example.com/positions/42/?ref=feed#apply")).toBe("42");
  });

  it("returns empty for empty input", () => {
    expect(canonicalUrlId(undefined)).toBe("");
    expect(canonicalUrlId("  ")).toBe("");
  });
});

describe("canonicalizeCompany", () => {
  it("strips legal suffixes until stable", () => {
    expect(canonicalizeCompany("华为技术有限公司")).toBe("华为");
    expect(canonicalizeCompany("华为科技有限公司")).toBe("华为");
  });

  it("drops parenthetical qualifiers", () => {
    expect(canonicalizeCompany("字节跳动（北京）")).toBe("字节跳动");
  });

  it("keeps Latin suffix letters inside a word", () => {
    expect(canonicalizeCompany("Zinc")).toBe("zinc");
    expect(canonicalizeCompany("Acme Inc.")).toBe("acme");
  });

  it("is idempotent", () => {
    const once = canonicalizeCompany("Acme Holdings Co., Ltd.");
    expect(canonicalizeCompany(once)).toBe(once);
  });
});

describe("canonicalizeTitle", () => {
  it("removes bracketed qualifiers and noise words", () => {
    expect(canonicalizeTitle("机器学习工程师(急招)")).toBe("机器学习工程师");
    expect(canonicalizeTitle("【高薪】算法工程师 双休")).toBe("算法工程师");
  });
});

describe("canonicalizeLocation", () => {
  it("keeps the city before the first separator", () => {
    expect(canonicalizeLocation("北京·海淀区")).toBe("北京");
    expect(canonicalizeLocation("上海-浦东新区")).toBe("上海");
  });

  it("drops a trailing 市", () => {
    expect(canonicalizeLocation("深圳市")).toBe("深圳");
  });
});

describe("contentFingerprint", () => {
  it("collides for the same job posted under different legal names", () => {
    const a = contentFingerprint({
      company: "华为技术有限公司",
      title: "机器学习工程师(急招)",
      location: "北京·海淀区",
    });
    const b = contentFingerprint({
      company: "华为科技有限公司",
      title: "机器学习工程师",
      location: "北京",
    });
    expect(a).toBe(b);
    expect(a).toBe(md5("华为_机器学习工程师_北京"));
  });
});

describe("fingerprintPosting", () => {
  it("returns both keys", () => {
    const fp = fingerprintPosting({
      url: "https://www.lagou.com/jobs/5.html",
      company: "Acme",
      title: "Engineer",
      location: "Remote",
    });
    expect(fp).toEqual({ urlId: "5", content: md5("acme_engineer_remote") });
  });
});

describe("hasNoIdentity", () => {
  it("is true only when every identity field is blank", () => {
    expect(hasNoIdentity({ description: "text only" })).toBe(true);
    expect(hasNoIdentity({ title: "Engineer" })).toBe(false);
  });
});

describe("fingerprintRulesHash", () => {
  it("is a stable md5 of the key derivation rules", () => {
    expect(fingerprintRulesHash()).toMatch(/^[0-9a-f]{32}$/);
    expect(fingerprintRulesHash()).toBe(fingerprintRulesHash());
  });
});
