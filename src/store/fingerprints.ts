import * as core from "@actions/core";
import {
  canonicalUrlId,
  contentFingerprint,
  hasNoIdentity,
} from "../dedup/canonical.js";
import { errorMessage } from "../errors.js";
import type { PostingFingerprints } from "../postings/types.js";
import { sleep, withRetry } from "../utils/retry.js";
import type { PostingStore, StoredPostingRecord } from "./types.js";

export interface LoadFingerprintsOptions {
  pageSize: number;
  pageDelayMs: number;
  maxAttempts: number;
  retryDelayMs?: number;
  signal?: AbortSignal;
}

export function urlKey(urlId: string): string {
  return `url:${urlId}`;
}

export function contentKey(fingerprint: string): string {
  return `content:${fingerprint}`;
}

/** Every key a fingerprinted posting is indexed under: URL first when present. */
export function fingerprintKeys(fingerprints: PostingFingerprints): string[] {
  const keys: string[] = [];
  if (fingerprints.urlId) keys.push(urlKey(fingerprints.urlId));
  keys.push(contentKey(fingerprints.content));
  return keys;
}

export function recordKeys(record: StoredPostingRecord): string[] {
  if (hasNoIdentity(record)) return [];
  return fingerprintKeys({
    urlId: canonicalUrlId(record.url),
    content: contentFingerprint(record),
  });
}

/**
 * Pages through the store and rebuilds the keys of every persisted posting.
 * Each page is retried with exponential backoff; pages are spaced by `pageDelayMs`.
 */
export async function loadAllFingerprints(
  store: PostingStore,
  options: LoadFingerprintsOptions
): Promise<Set<string>> {
  const keys = new Set<string>();
  let cursor: string | undefined;
  let page = 0;

  for (;;) {
    const current = cursor;
    const result = await withRetry(
      () => store.fetchPage(current, options.pageSize),
      {
        maxAttempts: options.maxAttempts,
        baseDelayMs: options.retryDelayMs ?? 1000,
        signal: options.signal,
        onRetry: (attempt, error, delayMs) =>
          core.warning(
            `Store page ${page + 1} failed (attempt ${attempt}): ${errorMessage(error)}; retrying in ${delayMs}ms`
          ),
      }
    );
    page++;

    for (const record of result.records) {
      for (const key of recordKeys(record)) keys.add(key);
    }
    core.debug(`Store page ${page}: ${result.records.length} records`);

    if (!result.nextCursor) break;
    cursor = result.nextCursor;
    if (options.pageDelayMs > 0) {
      await sleep(options.pageDelayMs, options.signal);
    }
  }

  core.info(`Loaded ${keys.size} fingerprint keys from ${page} store page(s)`);
  return keys;
}
