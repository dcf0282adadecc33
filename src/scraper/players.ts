import type { DocumentFetcher, RecordSet } from "../types";
import { buildPerGameStatsPath } from "../urls";
import { PER_GAME_TABLE_ID } from "./seasons";
import { extractTable, toRecordSet } from "./table";

export async function fetchPlayerSeasonTable(fetchDocument: DocumentFetcher, season: number): Promise<RecordSet> {
  const html = await fetchDocument(buildPerGameStatsPath(season));
  const { headers, rows } = extractTable(html, PER_GAME_TABLE_ID);
  return toRecordSet(headers, rows);
}
