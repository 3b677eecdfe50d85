import * as core from "@actions/core";
import type {
  FingerprintedPosting,
  Posting,
} from "../postings/types.js";
import { fingerprintPosting, hasNoIdentity } from "./canonical.js";

export interface LocalDedupResult {
  unique: FingerprintedPosting[];
  seenUrlIds: Set<string>;
  seenContentFingerprints: Set<string>;
  urlDuplicates: number;
  contentDuplicates: number;
}

/**
 * Keeps the first posting of every URL-id / content-fingerprint cluster, in input order.
 * Postings with no usable identity pass through without registering keys.
 */
export function localDedup(postings: Posting[]): LocalDedupResult {
  const seenUrlIds = new Set<string>();
  const seenContentFingerprints = new Set<string>();
  const unique: FingerprintedPosting[] = [];
  let urlDuplicates = 0;
  let contentDuplicates = 0;

  for (const posting of postings) {
    const fingerprints = posting.fingerprints ?? fingerprintPosting(posting);
    const fingerprinted: FingerprintedPosting = { ...posting, fingerprints };

    if (hasNoIdentity(posting)) {
      unique.push(fingerprinted);
      continue;
    }

    if (fingerprints.urlId && seenUrlIds.has(fingerprints.urlId)) {
      urlDuplicates++;
      continue;
    }
    if (seenContentFingerprints.has(fingerprints.content)) {
      contentDuplicates++;
      continue;
    }

    if (fingerprints.urlId) seenUrlIds.add(fingerprints.urlId);
    seenContentFingerprints.add(fingerprints.content);
    unique.push(fingerprinted);
  }

  core.info(
    `Local dedup: ${postings.length} → ${unique.length} postings ` +
      `(${urlDuplicates} URL, ${contentDuplicates} content duplicates)`
  );

  return {
    unique,
    seenUrlIds,
    seenContentFingerprints,
    urlDuplicates,
    contentDuplicates,
  };
}
