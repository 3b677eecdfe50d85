import { mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import * as core from "@actions/core";
import type { TriageConfig } from "../config.js";
import type { DiagnosticEntry } from "../context.js";
import type { PipelineStats } from "../pipeline.js";
import type { ScoredPosting } from "../postings/types.js";

export interface RunSummary {
  generatedAt: string;
  stats: PipelineStats;
  /** Keys the downstream writer should persist once it stores the postings. */
  newKeys: string[];
  diagnostics: readonly DiagnosticEntry[];
}

export interface ResultsReport extends RunSummary {
  postings: ScoredPosting[];
}

export type WriteFile = (path: string, content: string) => void;

function writeFileCreatingDirs(path: string, content: string): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content);
}

export function formatPostingLine(
  posting: ScoredPosting,
  rank: number
): string {
  const title = posting.title ?? "(untitled)";
  const company = posting.company ?? "(unknown)";
  const where = posting.location ? ` (${posting.location})` : "";
  return `${rank}. [${posting.score}] ${title} @ ${company}${where}: ${posting.tier}`;
}

export function buildReport(
  ranked: ScoredPosting[],
  summary: RunSummary
): ResultsReport {
  return { ...summary, postings: ranked };
}

export async function writeResults(
  ranked: ScoredPosting[],
  summary: RunSummary,
  config: TriageConfig,
  dryRun: boolean,
  writeFile: WriteFile = writeFileCreatingDirs
): Promise<number> {
  if (dryRun) {
    core.info(
      `[dry-run] Would write ${ranked.length} ranked postings to ${config.output.file}`
    );
    ranked.forEach((posting, i) =>
      core.info(`  ${formatPostingLine(posting, i + 1)}`)
    );
    return 0;
  }

  const report = buildReport(ranked, summary);
  writeFile(config.output.file, JSON.stringify(report, null, 2) + "\n");
  core.info(`Wrote ${ranked.length} ranked postings to ${config.output.file}`);
  return ranked.length;
}
