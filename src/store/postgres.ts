import pg from "pg";
import type { Pool } from "pg";
import * as core from "@actions/core";
import type { PostingStore, StorePage, StoredPostingRecord } from "./types.js";

type PostingRow = {
  id: string;
  title: string | null;
  company: string | null;
  location: string | null;
  url: string | null;
};

export interface PostgresStoreOptions {
  queryTimeoutMs: number;
}

function toRecord(row: PostingRow): StoredPostingRecord {
  return {
    title: row.title ?? undefined,
    company: row.company ?? undefined,
    location: row.location ?? undefined,
    url: row.url ?? undefined,
  };
}

/**
 * Reads the identity columns of postings written by earlier runs.
 * Pages by primary key so concurrent inserts never shift a page.
 */
export class PostgresPostingStore implements PostingStore {
  constructor(private readonly pool: Pool) {}

  async fetchPage(
    cursor: string | undefined,
    pageSize: number
  ): Promise<StorePage> {
    const result = await this.pool.query<PostingRow>(
      `SELECT id::text AS id, title, company, location, url
       FROM postings
       WHERE id > $1
       ORDER BY id
       LIMIT $2`,
      [cursor ?? "0", pageSize]
    );

    const rows = result.rows;
    const last = rows[rows.length - 1];
    return {
      records: rows.map(toRecord),
      nextCursor: rows.length === pageSize && last ? last.id : undefined,
    };
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

export function createPostgresStore(
  databaseUrl: string,
  options: PostgresStoreOptions
): PostgresPostingStore {
  const pool = new pg.Pool({
    connectionString: databaseUrl,
    max: 2,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: options.queryTimeoutMs,
    query_timeout: options.queryTimeoutMs,
  });

  pool.on("error", (err) => {
    core.warning(`Unexpected error on idle database client: ${err.message}`);
  });

  return new PostgresPostingStore(pool);
}
