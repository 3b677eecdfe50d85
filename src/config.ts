import { readFileSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { lexicon } from "./data/lexicon.js";
import { ConfigError } from "./errors.js";

const weight = (value: number) => z.number().min(0).default(value);

const filterSpec = (defaultWeight: number) => ({
  enabled: z.boolean().default(true),
  weight: weight(defaultWeight),
  is_hard_filter: z.boolean().default(true),
});

const SalaryFilterSchema = z
  .object({
    ...filterSpec(0.3),
    hard_min_salary: z.number().nonnegative().default(15),
    hard_max_salary: z.number().positive().default(80),
    target_salary: z.number().positive().default(30),
  })
  .refine(
    (s) => s.hard_min_salary <= s.hard_max_salary,
    "hard_min_salary must not exceed hard_max_salary"
  );

const LocationFilterSchema = z.object({
  ...filterSpec(0.2),
  preferred_cities: z.array(z.string()).default(lexicon.preferredCities),
  acceptable_cities: z.array(z.string()).default(lexicon.acceptableCities),
  rejected_cities: z.array(z.string()).default([]),
});

const ExperienceFilterSchema = z.object(filterSpec(0.3));
const GraduationFilterSchema = z.object(filterSpec(0.1));

const DeadlineFilterSchema = z.object({
  ...filterSpec(0.1),
  urgent_days: z.number().int().nonnegative().default(3),
  soon_days: z.number().int().nonnegative().default(7),
});

const CompanyFilterSchema = z.object({
  enabled: z.boolean().default(true),
  weight: weight(0.4),
  tier1_companies: z.array(z.string()).default(lexicon.companyTiers.tier1),
  tier2_companies: z.array(z.string()).default(lexicon.companyTiers.tier2),
  tier3_companies: z.array(z.string()).default(lexicon.companyTiers.tier3),
  large_enterprise_keywords: z
    .array(z.string())
    .default(lexicon.largeEnterpriseKeywords),
});

const DomainFilterSchema = z.object({
  enabled: z.boolean().default(true),
  weight: weight(0.6),
  core_domains: z.array(z.string()).default(lexicon.domainTiers.core),
  ai_domains: z.array(z.string()).default(lexicon.domainTiers.ai),
  related_domains: z.array(z.string()).default(lexicon.domainTiers.related),
});

const ProfileSchema = z.object({
  experience_years: z.number().nonnegative().default(1),
  graduation: z
    .string()
    .regex(/^\d{4}-\d{2}$/, 'Must be in format "YYYY-MM" (e.g. "2023-12")')
    .default("2023-12"),
});

const SemanticDedupSchema = z.object({
  enabled: z.boolean().default(true),
  similarity_threshold: z.number().min(0).max(1).default(0.5),
});

const CrossSessionSchema = z.object({
  enabled: z.boolean().default(true),
  snapshot_file: z.string().default(".cache/posting-index.json"),
  prefer_snapshot: z.boolean().default(false),
  max_snapshot_age_hours: z.number().positive().default(24),
  on_load_failure: z
    .enum(["fail_closed", "fail_open", "last_snapshot"])
    .default("last_snapshot"),
  page_size: z.number().int().min(1).max(1000).default(100),
  page_delay_ms: z.number().int().nonnegative().default(500),
  max_attempts: z.number().int().min(1).default(3),
  timeout_ms: z.number().int().positive().default(30_000),
});

const KeywordsSchema = z.object({
  model: z.string().default("claude-haiku-4-5"),
  max_retries: z.number().int().nonnegative().default(2),
  timeout_ms: z.number().int().positive().default(60_000),
});

const TierThresholdsSchema = z
  .object({
    strongly_recommended: z.number().min(0).max(1).default(0.8),
    recommended: z.number().min(0).max(1).default(0.65),
    worth_considering: z.number().min(0).max(1).default(0.5),
  })
  .refine(
    (t) =>
      t.strongly_recommended >= t.recommended &&
      t.recommended >= t.worth_considering,
    "Tier thresholds must be in descending order"
  );

const WEIGHT_SUM_TOLERANCE = 1e-6;

// Final scores are scaled to 0-100, so the two weights must sum to 1.
const ScoringSchema = z
  .object({
    basic_weight: z.number().min(0).max(1).default(0.6),
    advanced_weight: z.number().min(0).max(1).default(0.4),
    tiers: TierThresholdsSchema.default({}),
    max_suggestions: z.number().int().nonnegative().default(2),
  })
  .refine(
    (s) =>
      Math.abs(s.basic_weight + s.advanced_weight - 1) <= WEIGHT_SUM_TOLERANCE,
    "basic_weight and advanced_weight must sum to 1"
  );

export const TriageConfigSchema = z.object({
  profile: ProfileSchema.default({}),
  dedup: z
    .object({
      semantic: SemanticDedupSchema.default({}),
      cross_session: CrossSessionSchema.default({}),
    })
    .default({}),
  keywords: KeywordsSchema.default({}),
  filters: z
    .object({
      global_threshold: z.number().min(0).max(1).default(0.3),
      basic: z
        .object({
          salary: SalaryFilterSchema.default({}),
          location: LocationFilterSchema.default({}),
          experience: ExperienceFilterSchema.default({}),
          graduation: GraduationFilterSchema.default({}),
          deadline: DeadlineFilterSchema.default({}),
        })
        .default({}),
      advanced: z
        .object({
          company: CompanyFilterSchema.default({}),
          domain: DomainFilterSchema.default({}),
        })
        .default({}),
    })
    .default({}),
  scoring: ScoringSchema.default({}),
  output: z
    .object({
      file: z.string().default("ranked-postings.json"),
    })
    .default({}),
});

export type TriageConfig = z.infer<typeof TriageConfigSchema>;
export type SalaryFilterConfig = TriageConfig["filters"]["basic"]["salary"];
export type LocationFilterConfig = TriageConfig["filters"]["basic"]["location"];
export type ExperienceFilterConfig =
  TriageConfig["filters"]["basic"]["experience"];
export type GraduationFilterConfig =
  TriageConfig["filters"]["basic"]["graduation"];
export type DeadlineFilterConfig = TriageConfig["filters"]["basic"]["deadline"];
export type CompanyFilterConfig =
  TriageConfig["filters"]["advanced"]["company"];
export type DomainFilterConfig = TriageConfig["filters"]["advanced"]["domain"];
export type CrossSessionConfig = TriageConfig["dedup"]["cross_session"];
export type ProfileConfig = TriageConfig["profile"];

export function parseConfig(yamlContent: string): TriageConfig {
  const raw: unknown = parseYaml(yamlContent) ?? {};
  const result = TriageConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid config: ${issues}`);
  }
  return result.data;
}

export function loadConfig(filePath: string): TriageConfig {
  const content = readFileSync(filePath, "utf-8");
  return parseConfig(content);
}
