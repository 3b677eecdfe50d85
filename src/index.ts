import * as core from "@actions/core";
import { HeuristicKeywordExtractor } from "./classifier/heuristic.js";
import {
  createKeywordClient,
  LlmKeywordExtractor,
  type KeywordExtractor,
} from "./classifier/keywords.js";
import { loadConfig } from "./config.js";
import { writeResults } from "./output/results.js";
import { runPipeline } from "./pipeline.js";
import { loadPostings } from "./postings/load.js";
import {
  createPostgresStore,
  type PostgresPostingStore,
} from "./store/postgres.js";

const DEFAULT_CONFIG_PATH = "triage.config.yml";

async function run(): Promise<void> {
  const controller = new AbortController();
  const abort = () => controller.abort(new Error("Run cancelled"));
  process.once("SIGINT", abort);
  process.once("SIGTERM", abort);

  let store: PostgresPostingStore | undefined;
  try {
    const configPath = core.getInput("config_path") || DEFAULT_CONFIG_PATH;
    const postingsPath = core.getInput("postings_path", { required: true });
    const dryRun = core.getInput("dry_run") === "true";
    const apiKey = core.getInput("anthropic_api_key");
    const databaseUrl = core.getInput("database_url");

    core.info(`Loading config from ${configPath}`);
    const config = loadConfig(configPath);

    let keywords: KeywordExtractor;
    let llm: LlmKeywordExtractor | undefined;
    if (apiKey) {
      core.setSecret(apiKey);
      llm = new LlmKeywordExtractor(
        createKeywordClient(apiKey, config.keywords),
        config.keywords.model
      );
      keywords = llm;
    } else {
      core.info(
        "No Anthropic API key, extracting keywords with local patterns"
      );
      keywords = new HeuristicKeywordExtractor();
    }

    if (databaseUrl) {
      core.setSecret(databaseUrl);
      store = createPostgresStore(databaseUrl, {
        queryTimeoutMs: config.dedup.cross_session.timeout_ms,
      });
    }

    const result = await runPipeline(
      config,
      {
        load: async () => loadPostings(postingsPath),
        keywords,
        store,
        output: writeResults,
      },
      dryRun,
      { signal: controller.signal }
    );

    if (llm) {
      const { llmCalls, cacheHits, fallbacks } = llm.stats;
      core.info(
        `Keyword extraction: ${llmCalls} model calls, ${cacheHits} cache hits, ${fallbacks} fallbacks`
      );
    }

    core.setOutput("postings_found", result.postingsFound);
    core.setOutput("postings_unique", result.postingsUnique);
    core.setOutput("postings_new", result.postingsNew);
    core.setOutput("postings_ranked", result.postingsRanked);
    core.setOutput("stats", JSON.stringify(result.stats));
  } catch (error) {
    if (error instanceof Error) {
      core.setFailed(error.message);
    } else {
      core.setFailed("An unexpected error occurred");
    }
  } finally {
    process.off("SIGINT", abort);
    process.off("SIGTERM", abort);
    await store?.close();
  }
}

void run();
