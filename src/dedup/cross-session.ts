import * as core from "@actions/core";
import { describePosting, type RunContext } from "../context.js";
import { CrossSessionLoadError, errorMessage } from "../errors.js";
import type { FingerprintedPosting } from "../postings/types.js";
import { fingerprintKeys, loadAllFingerprints } from "../store/fingerprints.js";
import {
  readSnapshot,
  snapshotAgeHours,
  writeSnapshot,
  type IndexSnapshot,
} from "../store/snapshot.js";
import type { PostingStore } from "../store/types.js";
import { fingerprintRulesHash, hasNoIdentity } from "./canonical.js";

export type IndexSource = "store" | "snapshot" | "unavailable";

export interface CrossSessionResult {
  fresh: FingerprintedPosting[];
  duplicates: FingerprintedPosting[];
  /** Primary keys of the postings accepted as new, for the downstream writer. */
  newKeys: string[];
}

/** `url:<id>` when the posting has a URL id, else `content:<md5>`. */
export function primaryKey(posting: FingerprintedPosting): string {
  const [first] = fingerprintKeys(posting.fingerprints);
  return first;
}

function tryReadSnapshot(ctx: RunContext): IndexSnapshot | undefined {
  const { snapshot_file: path } = ctx.config.dedup.cross_session;
  let snapshot: IndexSnapshot | undefined;
  try {
    snapshot = readSnapshot(path);
  } catch (error) {
    core.warning(
      `Ignoring unreadable index snapshot ${path}: ${errorMessage(error)}`
    );
    return undefined;
  }
  if (snapshot && snapshot.rulesHash !== fingerprintRulesHash()) {
    core.warning(
      `Ignoring index snapshot ${path}: its keys were built with other fingerprint rules`
    );
    return undefined;
  }
  return snapshot;
}

function loadFromSnapshot(ctx: RunContext, snapshot: IndexSnapshot): void {
  const { max_snapshot_age_hours: maxAge, snapshot_file: path } =
    ctx.config.dedup.cross_session;
  const age = snapshotAgeHours(snapshot, ctx.now);
  if (age > maxAge) {
    core.warning(
      `Index snapshot ${path} is ${age.toFixed(1)}h old (limit ${maxAge}h); duplicates stored since may be missed`
    );
  }
  ctx.index.loadPersisted(snapshot.keys);
  core.info(
    `Loaded ${snapshot.keys.length} fingerprint keys from snapshot ${path}`
  );
}

function saveSnapshot(ctx: RunContext, keys: Set<string>): void {
  const { snapshot_file: path } = ctx.config.dedup.cross_session;
  try {
    writeSnapshot(path, keys, ctx.now, fingerprintRulesHash());
  } catch (error) {
    core.warning(
      `Could not write index snapshot ${path}: ${errorMessage(error)}`
    );
  }
}

/**
 * Fills the persisted half of the run's index, once per run.
 * A failed store load is resolved by `on_load_failure`.
 */
export async function populateIndex(
  ctx: RunContext,
  store: PostingStore | undefined
): Promise<IndexSource> {
  if (ctx.index.persistedLoaded) return "store";
  const cfg = ctx.config.dedup.cross_session;

  if (cfg.prefer_snapshot) {
    const snapshot = tryReadSnapshot(ctx);
    if (snapshot) {
      loadFromSnapshot(ctx, snapshot);
      return "snapshot";
    }
  }

  try {
    if (!store) throw new Error("no posting store configured");
    const keys = await loadAllFingerprints(store, {
      pageSize: cfg.page_size,
      pageDelayMs: cfg.page_delay_ms,
      maxAttempts: cfg.max_attempts,
      signal: ctx.signal,
    });
    ctx.index.loadPersisted(keys);
    saveSnapshot(ctx, keys);
    return "store";
  } catch (error) {
    if (ctx.signal?.aborted) throw error;
    const reason = errorMessage(error);

    if (cfg.on_load_failure === "fail_open") {
      core.warning(
        `Persisted index unavailable (${reason}); treating every posting as new`
      );
      ctx.index.markPersistedUnavailable();
      return "unavailable";
    }

    if (cfg.on_load_failure === "last_snapshot") {
      const snapshot = tryReadSnapshot(ctx);
      if (snapshot) {
        core.warning(
          `Persisted index unavailable (${reason}); using last snapshot`
        );
        loadFromSnapshot(ctx, snapshot);
        return "snapshot";
      }
    }

    throw new CrossSessionLoadError(
      `Could not load the persisted posting index: ${reason}`,
      { cause: error }
    );
  }
}

/**
 * Splits postings into new and already-seen. Keys of each new posting are
 * accepted immediately, so a later posting sharing either key is a duplicate.
 */
export function crossSessionDedup(
  postings: FingerprintedPosting[],
  ctx: RunContext
): CrossSessionResult {
  const fresh: FingerprintedPosting[] = [];
  const duplicates: FingerprintedPosting[] = [];
  const newKeys: string[] = [];

  for (const posting of postings) {
    if (hasNoIdentity(posting)) {
      fresh.push(posting);
      continue;
    }

    const keys = fingerprintKeys(posting.fingerprints);
    const hit = keys.find((key) => ctx.index.has(key));

    if (hit) {
      duplicates.push(posting);
      ctx.diagnostics.record({
        stage: "cross_session",
        posting: describePosting(posting),
        message: ctx.index.hasPersisted(hit)
          ? "already stored by an earlier run"
          : "duplicate of a posting accepted in this run",
        details: { key: hit },
      });
      continue;
    }

    ctx.index.accept(keys);
    fresh.push(posting);
    newKeys.push(primaryKey(posting));
  }

  core.info(
    `Cross-session dedup: ${postings.length} → ${fresh.length} new postings ` +
      `(${duplicates.length} already seen)`
  );
  return { fresh, duplicates, newKeys };
}
