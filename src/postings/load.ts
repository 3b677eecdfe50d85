import { readFileSync } from "node:fs";
import * as core from "@actions/core";
import { z } from "zod";
import { errorMessage, PostingsFileError } from "../errors.js";
import type { Posting } from "./types.js";

// Scraped fields are often null or numeric; both are read as text.
const field = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) =>
    value === null || value === undefined ? undefined : String(value)
  );

const EntrySchema = z.record(z.string(), z.unknown());

const POSTING_FIELDS = [
  "title",
  "company",
  "location",
  "salary",
  "description",
  "url",
  "experience",
  "graduation",
  "deadline",
  "direction",
  "platform",
  "crawledAt",
] as const satisfies readonly (keyof Posting)[];

type PostingField = (typeof POSTING_FIELDS)[number];

// A field of the wrong type is dropped; the rest of the posting is kept.
function toPosting(
  entry: Record<string, unknown>,
  onInvalid: (name: PostingField) => void
): Posting {
  const posting: Posting = {};
  for (const name of POSTING_FIELDS) {
    const result = field.safeParse(entry[name]);
    if (!result.success) {
      onInvalid(name);
      continue;
    }
    if (result.data !== undefined) posting[name] = result.data;
  }
  return posting;
}

export function parsePostings(content: string, path: string): Posting[] {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new PostingsFileError(
      `Postings file ${path} is not valid JSON: ${errorMessage(error)}`,
      path,
      { cause: error }
    );
  }
  if (!Array.isArray(raw)) {
    throw new PostingsFileError(
      `Postings file ${path} must contain a JSON array`,
      path
    );
  }

  const postings: Posting[] = [];
  raw.forEach((entry: unknown, index) => {
    const result = EntrySchema.safeParse(entry);
    if (!result.success) {
      core.warning(
        `Skipping posting #${index} in ${path}: not a posting object`
      );
      return;
    }
    postings.push(
      toPosting(result.data, (name) =>
        core.warning(
          `Posting #${index} in ${path}: ignoring ${name}, which is not text`
        )
      )
    );
  });
  return postings;
}

export function loadPostings(path: string): Posting[] {
  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (error) {
    throw new PostingsFileError(
      `Could not read postings file ${path}: ${errorMessage(error)}`,
      path,
      { cause: error }
    );
  }
  return parsePostings(content, path);
}
