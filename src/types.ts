export interface Table {
  headers: string[];
  rows: string[][];
}

export type StatRecord = Record<string, string>;

export interface RecordSet {
  // De-duplicated headers in first-seen order; fixes the CSV column order.
  columns: string[];
  records: StatRecord[];
}

export interface PlayerSearchResult {
  id: string;
  name: string;
  url: string;
}

export type DocumentFetcher = (path: string) => Promise<string>;
