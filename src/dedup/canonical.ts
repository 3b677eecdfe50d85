import { createHash } from "node:crypto";
import { lexicon } from "../data/lexicon.js";
import type { Posting, PostingFingerprints } from "../postings/types.js";

interface PlatformPattern {
  host: string;
  pattern: RegExp;
}

// Detail-page markers of the boards we ingest from; the captured group is the job id.
const PLATFORM_PATTERNS: PlatformPattern[] = [
  { host: "zhipin.com", pattern: /\/job_detail\/([^/.]+)/ },
  { host: "liepin.com", pattern: /\/job\/(\d+)/ },
  { host: "lagou.com", pattern: /\/jobs\/(\d+)/ },
];

const BRACKETED = /（[^）]*）|\([^)]*\)|【[^】]*】|\[[^\]]*\]/g;
const LOCATION_SEPARATORS = /[·•\-－—/／,，|｜]/;
const LEGAL_SUFFIXES = [...lexicon.legalSuffixes].sort(
  (a, b) => b.length - a.length
);

function collapse(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function untilStable(value: string, step: (v: string) => string): string {
  let current = value;
  for (;;) {
    const next = step(current);
    if (next === current) return current;
    current = next;
  }
}

function stripQueryAndFragment(url: string): string {
  return url.split("#")[0].split("?")[0];
}

// Latin suffixes must stand alone ("zinc" keeps its "inc").
function endsWithSuffix(value: string, suffix: string): boolean {
  if (!value.endsWith(suffix) || value.length <= suffix.length) return false;
  if (!/^[a-z]/.test(suffix)) return true;
  const before = value[value.length - suffix.length - 1];
  return !/[a-z0-9]/.test(before);
}

// Bump when key derivation changes in a way the patterns and lexicon do not show.
const FINGERPRINT_RULES_VERSION = 1;

/** Identifies how keys are derived; keys saved under other rules are stale. */
export function fingerprintRulesHash(): string {
  return md5(
    JSON.stringify({
      version: FINGERPRINT_RULES_VERSION,
      platforms: PLATFORM_PATTERNS.map((p) => `${p.host} ${p.pattern.source}`),
      bracketed: BRACKETED.source,
      locationSeparators: LOCATION_SEPARATORS.source,
      legalSuffixes: lexicon.legalSuffixes,
      titleNoise: lexicon.titleNoise,
    })
  );
}

export function canonicalUrlId(url: string | undefined): string {
  if (!url) return "";
  const base = stripQueryAndFragment(url.trim());
  if (!base) return "";

  for (const { host, pattern } of PLATFORM_PATTERNS) {
    if (!base.includes(host)) continue;
    const match = base.match(pattern);
    if (match) return match[1];
  }

  const segments = base.split("/").filter((s) => s.length > 0);
  return segments.length > 0 ? segments[segments.length - 1] : base;
}

export function canonicalizeCompany(company: string | undefined): string {
  if (!company) return "";
  return untilStable(collapse(company.toLowerCase()), (value) => {
    let next = value.replace(BRACKETED, "").trim();
    const suffix = LEGAL_SUFFIXES.find((s) => endsWithSuffix(next, s));
    if (suffix) next = next.slice(0, -suffix.length);
    return collapse(next.replace(/[,，.]+$/, ""));
  });
}

export function canonicalizeTitle(title: string | undefined): string {
  if (!title) return "";
  return untilStable(collapse(title.toLowerCase()), (value) => {
    let next = value.replace(BRACKETED, " ");
    for (const noise of lexicon.titleNoise) {
      next = next.split(noise).join(" ");
    }
    return collapse(next);
  });
}

export function canonicalizeLocation(location: string | undefined): string {
  if (!location) return "";
  const head = location.toLowerCase().split(LOCATION_SEPARATORS)[0];
  return untilStable(collapse(head), (city) =>
    city.length > 2 && city.endsWith("市") ? city.slice(0, -1) : city
  );
}

export function md5(text: string): string {
  return createHash("md5").update(text, "utf8").digest("hex");
}

export function contentFingerprint(posting: Posting): string {
  const company = canonicalizeCompany(posting.company);
  const title = canonicalizeTitle(posting.title);
  const location = canonicalizeLocation(posting.location);
  return md5(`${company}_${title}_${location}`);
}

/** True when none of the identity fields survive canonicalization. */
export function hasNoIdentity(posting: Posting): boolean {
  return (
    canonicalUrlId(posting.url) === "" &&
    canonicalizeCompany(posting.company) === "" &&
    canonicalizeTitle(posting.title) === "" &&
    canonicalizeLocation(posting.location) === ""
  );
}

export function fingerprintPosting(posting: Posting): PostingFingerprints {
  return {
    urlId: canonicalUrlId(posting.url),
    content: contentFingerprint(posting),
  };
}
