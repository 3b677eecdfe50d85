/** The identity fields of a posting persisted by an earlier run. */
export interface StoredPostingRecord {
  title?: string;
  company?: string;
  location?: string;
  url?: string;
}

export interface StorePage {
  records: StoredPostingRecord[];
  nextCursor?: string;
}

export interface PostingStore {
  fetchPage(cursor: string | undefined, pageSize: number): Promise<StorePage>;
}
