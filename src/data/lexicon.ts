import { readFileSync } from "node:fs";
import { z } from "zod";

const TieredListSchema = z.object({
  tier1: z.array(z.string()),
  tier2: z.array(z.string()),
  tier3: z.array(z.string()),
});

const DomainTiersSchema = z.object({
  core: z.array(z.string()),
  ai: z.array(z.string()),
  related: z.array(z.string()),
});

export const LexiconSchema = z.object({
  legalSuffixes: z.array(z.string()).min(1),
  titleNoise: z.array(z.string()),
  remoteKeywords: z.array(z.string()),
  freshGraduateKeywords: z.array(z.string()),
  internshipKeywords: z.array(z.string()),
  unlimitedExperienceKeywords: z.array(z.string()),
  negotiableSalaryKeywords: z.array(z.string()),
  deadlinePrefixes: z.array(z.string()),
  largeEnterpriseKeywords: z.array(z.string()),
  companyTiers: TieredListSchema,
  domainTiers: DomainTiersSchema,
  preferredCities: z.array(z.string()),
  acceptableCities: z.array(z.string()),
});

export type Lexicon = z.infer<typeof LexiconSchema>;
export type DomainTiers = z.infer<typeof DomainTiersSchema>;

function loadLexicon(): Lexicon {
  const raw = readFileSync(new URL("./lexicon.json", import.meta.url), "utf-8");
  return LexiconSchema.parse(JSON.parse(raw));
}

// Loaded once; every canonicalizer and filter default reads from here.
export const lexicon: Lexicon = loadLexicon();
