import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";

const IndexSnapshotSchema = z.object({
  savedAt: z.string().datetime(),
  /** Hash of the fingerprint rules the keys were derived with. */
  rulesHash: z.string(),
  keys: z.array(z.string()),
});

export type IndexSnapshot = z.infer<typeof IndexSnapshotSchema>;

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

/**
 * Returns undefined when no snapshot has been written yet.
 * Throws on a corrupt or unreadable file.
 */
export function readSnapshot(path: string): IndexSnapshot | undefined {
  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) return undefined;
    throw error;
  }
  const parsed: unknown = JSON.parse(content);
  return IndexSnapshotSchema.parse(parsed);
}

export function writeSnapshot(
  path: string,
  keys: Iterable<string>,
  now: Date,
  rulesHash: string
): IndexSnapshot {
  const snapshot: IndexSnapshot = {
    savedAt: now.toISOString(),
    rulesHash,
    keys: [...keys].sort(),
  };
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(snapshot, null, 2) + "\n");
  return snapshot;
}

export function snapshotAgeHours(snapshot: IndexSnapshot, now: Date): number {
  return (now.getTime() - Date.parse(snapshot.savedAt)) / 3_600_000;
}
