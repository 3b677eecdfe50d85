import * as core from "@actions/core";
import type { TriageConfig } from "./config.js";

export type DiagnosticStage = "semantic" | "cross_session" | "basic";

export interface DiagnosticEntry {
  stage: DiagnosticStage;
  posting: string;
  message: string;
  details?: Record<string, unknown>;
}

/** Collects per-posting decisions for the output file; echoes each at debug level. */
export class Diagnostics {
  private readonly items: DiagnosticEntry[] = [];

  record(entry: DiagnosticEntry): void {
    this.items.push(entry);
    core.debug(`[${entry.stage}] ${entry.posting}: ${entry.message}`);
  }

  get entries(): readonly DiagnosticEntry[] {
    return this.items;
  }

  count(stage: DiagnosticStage): number {
    return this.items.filter((e) => e.stage === stage).length;
  }
}

/**
 * Fingerprint keys known to the run. `persisted` holds what earlier runs stored,
 * `accepted` what this run decided is new. Keys are only ever added.
 */
export class DeduplicationIndex {
  private readonly persistedKeys = new Set<string>();
  private readonly acceptedKeys = new Set<string>();
  private loaded = false;

  get persistedLoaded(): boolean {
    return this.loaded;
  }

  get persistedSize(): number {
    return this.persistedKeys.size;
  }

  get accepted(): ReadonlySet<string> {
    return this.acceptedKeys;
  }

  loadPersisted(keys: Iterable<string>): void {
    for (const key of keys) this.persistedKeys.add(key);
    this.loaded = true;
  }

  /** Marks the persisted half as settled without keys (fail-open). */
  markPersistedUnavailable(): void {
    this.loaded = true;
  }

  hasPersisted(key: string): boolean {
    return this.persistedKeys.has(key);
  }

  has(key: string): boolean {
    return this.persistedKeys.has(key) || this.acceptedKeys.has(key);
  }

  accept(keys: Iterable<string>): void {
    for (const key of keys) this.acceptedKeys.add(key);
  }
}

export interface RunContext {
  config: TriageConfig;
  index: DeduplicationIndex;
  diagnostics: Diagnostics;
  now: Date;
  signal?: AbortSignal;
}

export function createRunContext(
  config: TriageConfig,
  options: { now?: Date; signal?: AbortSignal } = {}
): RunContext {
  return {
    config,
    index: new DeduplicationIndex(),
    diagnostics: new Diagnostics(),
    now: options.now ?? new Date(),
    signal: options.signal,
  };
}

export function describePosting(posting: {
  title?: string;
  company?: string;
}): string {
  return `${posting.title ?? "(untitled)"} @ ${posting.company ?? "(unknown)"}`;
}
